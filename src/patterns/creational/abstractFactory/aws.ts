import { createLogger } from '../../../utils/logger.js'
import type { EmailSender, ProviderFactory, SmsSender } from './types.js'

const logger = createLogger('aws')

export class AwsEmailSender implements EmailSender {
  send(to: string, message: string): boolean {
    logger.info(`Sending email via AWS to ${to}... message: ${message}`)
    return true
  }
}

export class AwsSmsSender implements SmsSender {
  send(to: string, message: string): boolean {
    logger.info(`Sending SMS via AWS to ${to}... message: ${message}`)
    return true
  }
}

export class AwsFactory implements ProviderFactory {
  readonly provider = 'aws' as const

  createEmailSender(): EmailSender {
    return new AwsEmailSender()
  }

  createSmsSender(): SmsSender {
    return new AwsSmsSender()
  }
}
