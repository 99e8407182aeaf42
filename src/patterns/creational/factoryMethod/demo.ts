import { EmailCreator, SmsCreator, WhatsappCreator } from './creators.js'
import type { NotificationChannel } from './types.js'

export function runFactoryMethodDemo(message: string = 'Hello, world!'): Record<NotificationChannel, boolean> {
  return {
    email: new EmailCreator().sendNotification(message),
    sms: new SmsCreator().sendNotification(message),
    whatsapp: new WhatsappCreator().sendNotification(message),
  }
}
