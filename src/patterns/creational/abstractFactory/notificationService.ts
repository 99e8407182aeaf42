import type { EmailSender, NotificationResult, ProviderFactory, SmsSender } from './types.js'

export class NotificationService {
  private readonly emailSender: EmailSender
  private readonly smsSender: SmsSender

  constructor(factory: ProviderFactory) {
    this.emailSender = factory.createEmailSender()
    this.smsSender = factory.createSmsSender()
  }

  sendNotification(email: string, phone: string, message: string): NotificationResult {
    return {
      email: this.emailSender.send(email, message),
      sms: this.smsSender.send(phone, message),
    }
  }
}
