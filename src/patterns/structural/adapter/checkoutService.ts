import { readEnv } from '../../../config/env.js'
import { PaymentFailedError } from '../../../utils/errors.js'
import { createLogger } from '../../../utils/logger.js'
import type { PaymentProcessor } from './types.js'

const logger = createLogger('checkout')

export class CheckoutService {
  private readonly currency: string

  constructor(
    private readonly paymentProcessor: PaymentProcessor,
    currency?: string
  ) {
    this.currency = currency ?? readEnv('CHECKOUT_CURRENCY', 'COP')
  }

  /**
   * @throws PaymentFailedError when the processor declines the charge
   */
  checkout(amount: number): void {
    const success = this.paymentProcessor.pay(amount, this.currency)

    if (!success) {
      throw new PaymentFailedError(amount, this.currency)
    }

    logger.info('Payment successful', { amount, currency: this.currency })
  }
}
