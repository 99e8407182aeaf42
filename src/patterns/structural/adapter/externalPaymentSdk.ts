/**
 * Simulated third-party payment SDK. Its interface (cents, currency codes,
 * status objects) does not match PaymentProcessor.
 */

import type { TransactionRequest, TransactionResponse } from './types.js'

const CURRENCY_CODE_RE = /^[A-Z]{3}$/

export class ExternalPaymentSdk {
  private sequence = 0

  makeTransaction(request: TransactionRequest): TransactionResponse {
    const transactionId = `txn_${++this.sequence}`

    if (!Number.isInteger(request.totalInCents) || request.totalInCents <= 0) {
      return { status: 'failed', transactionId, reason: 'invalid_amount' }
    }
    if (!CURRENCY_CODE_RE.test(request.currencyCode)) {
      return { status: 'failed', transactionId, reason: 'invalid_currency' }
    }
    return { status: 'success', transactionId }
  }
}
