import { createLogger } from '../../../utils/logger.js'
import type { Notification } from './types.js'

const logger = createLogger('notifications')

export class EmailNotification implements Notification {
  readonly channel = 'email' as const

  send(message: string): boolean {
    logger.info(`Sending notification via email... message: ${message}`)
    return true
  }
}

export class SmsNotification implements Notification {
  readonly channel = 'sms' as const

  send(message: string): boolean {
    logger.info(`Sending notification via SMS... message: ${message}`)
    return true
  }
}

export class WhatsappNotification implements Notification {
  readonly channel = 'whatsapp' as const

  send(message: string): boolean {
    logger.info(`Sending notification via WhatsApp... message: ${message}`)
    return true
  }
}
