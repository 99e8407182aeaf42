import dotenv from 'dotenv'
import { ConfigError } from '../utils/errors.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('config')

let loaded = false

/**
 * Load a local .env file into process.env. Variables already present in the
 * environment win over the file. Runs at most once per process.
 */
export function loadEnv(path?: string): void {
  if (loaded) return
  loaded = true

  const result = dotenv.config(path ? { path } : undefined)
  if (result.error) {
    logger.debug('No .env file loaded, using process environment', {
      reason: result.error.message,
    })
    return
  }
  logger.debug('Loaded .env file', { keys: Object.keys(result.parsed ?? {}).length })
}

export function readEnv(key: string, fallback: string): string {
  const value = process.env[key]
  return value === undefined || value === '' ? fallback : value
}

export function readIntEnv(key: string, fallback: number): number {
  const raw = process.env[key]
  if (raw === undefined || raw.trim() === '') return fallback

  if (!/^-?\d+$/.test(raw.trim())) {
    throw new ConfigError(key, `expected an integer, got "${raw}"`)
  }
  const value = Number.parseInt(raw, 10)
  if (!Number.isSafeInteger(value)) {
    throw new ConfigError(key, `integer out of range, got "${raw}"`)
  }
  return value
}
