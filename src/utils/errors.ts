/**
 * Error types shared across the catalogue.
 */

/**
 * Raised when a lookup by key misses (templates, provider factories, demos).
 */
export class NotFoundError extends Error {
  constructor(
    public readonly resource: string,
    public readonly key: string,
    public readonly available: string[] = []
  ) {
    const list = available.length > 0 ? available.join(', ') : '(none)'
    super(`${resource} "${key}" not found. Available: ${list}`)
    this.name = 'NotFoundError'
  }
}

export class ConfigError extends Error {
  constructor(
    public readonly key: string,
    message: string
  ) {
    super(`${key}: ${message}`)
    this.name = 'ConfigError'
  }
}

export class ValidationError extends Error {
  constructor(
    public readonly field: string,
    message: string
  ) {
    super(`Invalid ${field}: ${message}`)
    this.name = 'ValidationError'
  }
}

export class PaymentFailedError extends Error {
  constructor(
    public readonly amount: number,
    public readonly currency: string
  ) {
    super(`Payment of ${amount} ${currency} failed`)
    this.name = 'PaymentFailedError'
  }
}

export class UnsupportedChannelError extends Error {
  constructor(public readonly channel: string) {
    super(`Unsupported notification channel: ${channel}`)
    this.name = 'UnsupportedChannelError'
  }
}
