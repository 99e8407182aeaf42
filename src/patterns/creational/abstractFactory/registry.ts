/**
 * Provider factory lookup.
 *
 * Maps a provider name (from config or a caller) to a fresh factory.
 */

import { readEnv } from '../../../config/env.js'
import { NotFoundError } from '../../../utils/errors.js'
import { AwsFactory } from './aws.js'
import { TwilioFactory } from './twilio.js'
import type { ProviderFactory, ProviderName } from './types.js'

const factories: Record<ProviderName, () => ProviderFactory> = {
  aws: () => new AwsFactory(),
  twilio: () => new TwilioFactory(),
}

function isProviderName(name: string): name is ProviderName {
  return Object.prototype.hasOwnProperty.call(factories, name)
}

export function getProviderNames(): ProviderName[] {
  return Object.keys(factories).filter(isProviderName)
}

export function createProviderFactory(name: string): ProviderFactory {
  const normalized = name.trim().toLowerCase()
  if (!isProviderName(normalized)) {
    throw new NotFoundError('Provider', name, getProviderNames())
  }
  return factories[normalized]()
}

/**
 * Factory for the provider named by NOTIFICATION_PROVIDER (default: aws).
 */
export function providerFromEnv(): ProviderFactory {
  return createProviderFactory(readEnv('NOTIFICATION_PROVIDER', 'aws'))
}
