export interface PaymentProcessor {
  /** Charge `amount` in major units. Returns false when the charge was declined. */
  pay(amount: number, currency: string): boolean
}

export interface TransactionRequest {
  totalInCents: number
  currencyCode: string
}

export type TransactionStatus = 'success' | 'failed'

export interface TransactionResponse {
  status: TransactionStatus
  transactionId: string
  reason?: string
}
