import { createLogger } from '../../../utils/logger.js'
import type { ExternalPaymentSdk } from './externalPaymentSdk.js'
import type { PaymentProcessor } from './types.js'

const logger = createLogger('payment-adapter')

export function toCents(amount: number): number {
  return Math.round(amount * 100)
}

export class ExternalPaymentAdapter implements PaymentProcessor {
  constructor(private readonly sdk: ExternalPaymentSdk) {}

  pay(amount: number, currency: string): boolean {
    const response = this.sdk.makeTransaction({
      totalInCents: toCents(amount),
      currencyCode: currency,
    })

    if (response.status !== 'success') {
      logger.warn('External transaction declined', {
        transactionId: response.transactionId,
        reason: response.reason,
      })
      return false
    }
    return true
  }
}
