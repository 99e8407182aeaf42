import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { CheckoutService } from './checkoutService.js'
import { PaymentWithoutAdapter } from './paymentWithoutAdapter.js'
import { ExternalPaymentAdapter } from './externalPaymentAdapter.js'
import { ExternalPaymentSdk } from './externalPaymentSdk.js'
import { runAdapterDemo } from './demo.js'
import { PaymentFailedError } from '../../../utils/errors.js'
import type { PaymentProcessor } from './types.js'

describe('CheckoutService', () => {
  let originalCurrency: string | undefined

  beforeEach(() => {
    originalCurrency = process.env.CHECKOUT_CURRENCY
    delete process.env.CHECKOUT_CURRENCY
    vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(() => {
    if (originalCurrency === undefined) {
      delete process.env.CHECKOUT_CURRENCY
    } else {
      process.env.CHECKOUT_CURRENCY = originalCurrency
    }
    vi.restoreAllMocks()
  })

  it('should charge in COP by default', () => {
    const processor: PaymentProcessor = { pay: vi.fn(() => true) }

    new CheckoutService(processor).checkout(42)

    expect(processor.pay).toHaveBeenCalledWith(42, 'COP')
  })

  it('should use CHECKOUT_CURRENCY when set', () => {
    process.env.CHECKOUT_CURRENCY = 'EUR'
    const processor: PaymentProcessor = { pay: vi.fn(() => true) }

    new CheckoutService(processor).checkout(10)

    expect(processor.pay).toHaveBeenCalledWith(10, 'EUR')
  })

  it('should prefer an explicit currency', () => {
    process.env.CHECKOUT_CURRENCY = 'EUR'
    const processor: PaymentProcessor = { pay: vi.fn(() => true) }

    new CheckoutService(processor, 'USD').checkout(10)

    expect(processor.pay).toHaveBeenCalledWith(10, 'USD')
  })

  it('should log a successful payment', () => {
    new CheckoutService(new PaymentWithoutAdapter()).checkout(200.95)

    expect(console.log).toHaveBeenCalledWith(
      '[INFO] [payment] Payment without adapter... total: 200.95, currency: COP'
    )
    expect(console.log).toHaveBeenCalledWith(
      '[INFO] [checkout] Payment successful {"amount":200.95,"currency":"COP"}'
    )
  })

  it('should throw PaymentFailedError when the processor declines', () => {
    const processor: PaymentProcessor = { pay: () => false }
    const service = new CheckoutService(processor)

    expect(() => service.checkout(15)).toThrow(PaymentFailedError)
    expect(() => service.checkout(15)).toThrow('Payment of 15 COP failed')
  })

  it('should surface a declined external transaction through the adapter', () => {
    const service = new CheckoutService(new ExternalPaymentAdapter(new ExternalPaymentSdk()), 'cop')

    expect(() => service.checkout(100)).toThrow('Payment of 100 cop failed')
  })

  it('should run the demo with and without the adapter', () => {
    expect(() => runAdapterDemo()).not.toThrow()
    expect(console.log).toHaveBeenCalledWith(
      '[INFO] [checkout] Payment successful {"amount":100.5,"currency":"COP"}'
    )
  })
})
