/**
 * Abstract factory types.
 *
 * A provider factory produces a matching family of senders, so a service
 * that depends only on these interfaces never mixes vendors.
 */

export type ProviderName = 'aws' | 'twilio'

export interface EmailSender {
  /** Returns true once the message has been handed to the provider. */
  send(to: string, message: string): boolean
}

export interface SmsSender {
  send(to: string, message: string): boolean
}

export interface ProviderFactory {
  readonly provider: ProviderName
  createEmailSender(): EmailSender
  createSmsSender(): SmsSender
}

export interface NotificationResult {
  email: boolean
  sms: boolean
}
