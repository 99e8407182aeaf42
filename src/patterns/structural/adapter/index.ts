/**
 * Adapter — public API
 */
export type {
  PaymentProcessor,
  TransactionRequest,
  TransactionResponse,
  TransactionStatus,
} from './types.js'

export { ExternalPaymentSdk } from './externalPaymentSdk.js'
export { ExternalPaymentAdapter, toCents } from './externalPaymentAdapter.js'
export { PaymentWithoutAdapter } from './paymentWithoutAdapter.js'
export { CheckoutService } from './checkoutService.js'
export { runAdapterDemo } from './demo.js'
