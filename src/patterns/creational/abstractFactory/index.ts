/**
 * Abstract factory — public API
 */
export type {
  EmailSender,
  NotificationResult,
  ProviderFactory,
  ProviderName,
  SmsSender,
} from './types.js'

export { AwsEmailSender, AwsSmsSender, AwsFactory } from './aws.js'
export { TwilioEmailSender, TwilioSmsSender, TwilioFactory } from './twilio.js'
export { NotificationService } from './notificationService.js'
export { createProviderFactory, getProviderNames, providerFromEnv } from './registry.js'
export { runAbstractFactoryDemo } from './demo.js'
export type { ProviderDemoResult } from './demo.js'
