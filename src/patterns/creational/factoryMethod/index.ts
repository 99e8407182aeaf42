/**
 * Factory method — public API
 */
export type { Notification, NotificationChannel } from './types.js'

export { EmailNotification, SmsNotification, WhatsappNotification } from './notifications.js'
export {
  NotificationCreator,
  EmailCreator,
  SmsCreator,
  WhatsappCreator,
  createNotificationCreator,
} from './creators.js'
export { runFactoryMethodDemo } from './demo.js'
