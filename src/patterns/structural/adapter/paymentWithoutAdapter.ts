import { createLogger } from '../../../utils/logger.js'
import type { PaymentProcessor } from './types.js'

const logger = createLogger('payment')

/**
 * A processor implemented directly against PaymentProcessor, for comparison.
 */
export class PaymentWithoutAdapter implements PaymentProcessor {
  pay(amount: number, currency: string): boolean {
    logger.info(`Payment without adapter... total: ${amount}, currency: ${currency}`)
    return true
  }
}
