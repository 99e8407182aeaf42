import { CheckoutService } from './checkoutService.js'
import { ExternalPaymentAdapter } from './externalPaymentAdapter.js'
import { ExternalPaymentSdk } from './externalPaymentSdk.js'
import { PaymentWithoutAdapter } from './paymentWithoutAdapter.js'

export function runAdapterDemo(): void {
  const adapter = new ExternalPaymentAdapter(new ExternalPaymentSdk())
  new CheckoutService(adapter).checkout(100.5)

  new CheckoutService(new PaymentWithoutAdapter()).checkout(200.95)
}
