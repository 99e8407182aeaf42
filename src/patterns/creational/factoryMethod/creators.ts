/**
 * Notification creators.
 *
 * Subclasses decide which Notification to build; the base class owns the
 * sending flow and never names a concrete notification type.
 */

import { UnsupportedChannelError } from '../../../utils/errors.js'
import { EmailNotification, SmsNotification, WhatsappNotification } from './notifications.js'
import type { Notification } from './types.js'

export abstract class NotificationCreator {
  abstract createNotification(): Notification

  sendNotification(message: string): boolean {
    const notification = this.createNotification()
    return notification.send(message)
  }
}

export class EmailCreator extends NotificationCreator {
  createNotification(): Notification {
    return new EmailNotification()
  }
}

export class SmsCreator extends NotificationCreator {
  createNotification(): Notification {
    return new SmsNotification()
  }
}

export class WhatsappCreator extends NotificationCreator {
  createNotification(): Notification {
    return new WhatsappNotification()
  }
}

export function createNotificationCreator(channel: string): NotificationCreator {
  switch (channel) {
    case 'email':
      return new EmailCreator()
    case 'sms':
      return new SmsCreator()
    case 'whatsapp':
      return new WhatsappCreator()
    default:
      throw new UnsupportedChannelError(channel)
  }
}
