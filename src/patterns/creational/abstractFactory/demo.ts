import { NotificationService } from './notificationService.js'
import { createProviderFactory, getProviderNames } from './registry.js'
import type { NotificationResult, ProviderName } from './types.js'

export interface ProviderDemoResult extends NotificationResult {
  provider: ProviderName
}

export function runAbstractFactoryDemo(): ProviderDemoResult[] {
  return getProviderNames().map((provider) => {
    const service = new NotificationService(createProviderFactory(provider))
    return {
      provider,
      ...service.sendNotification('test@test.com', '1234567890', 'Hello, world!'),
    }
  })
}
