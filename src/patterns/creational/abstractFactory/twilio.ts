import { createLogger } from '../../../utils/logger.js'
import type { EmailSender, ProviderFactory, SmsSender } from './types.js'

const logger = createLogger('twilio')

export class TwilioEmailSender implements EmailSender {
  send(to: string, message: string): boolean {
    logger.info(`Sending email via Twilio to ${to}... message: ${message}`)
    return true
  }
}

export class TwilioSmsSender implements SmsSender {
  send(to: string, message: string): boolean {
    logger.info(`Sending SMS via Twilio to ${to}... message: ${message}`)
    return true
  }
}

export class TwilioFactory implements ProviderFactory {
  readonly provider = 'twilio' as const

  createEmailSender(): EmailSender {
    return new TwilioEmailSender()
  }

  createSmsSender(): SmsSender {
    return new TwilioSmsSender()
  }
}
