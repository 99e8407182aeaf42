export type NotificationChannel = 'email' | 'sms' | 'whatsapp'

export interface Notification {
  readonly channel: NotificationChannel
  send(message: string): boolean
}
