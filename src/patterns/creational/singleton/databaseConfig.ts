/**
 * PostgreSQL connection settings, read from the environment once and shared.
 *
 * Environment variables:
 *   DB_HOST      server host (default: localhost)
 *   DB_PORT      server port (default: 5432)
 *   DB_USER      user name (default: postgres)
 *   DB_PASSWORD  password (default: postgres)
 *   DB_NAME      database name (default: mydatabase)
 */

import { readEnv, readIntEnv } from '../../../config/env.js'
import { ConfigError } from '../../../utils/errors.js'
import { createLogger } from '../../../utils/logger.js'
import { createSingleton } from '../../../utils/singleton.js'

const logger = createLogger('database-config')

const MASKED_PASSWORD = '****'
const MIN_PORT = 1
const MAX_PORT = 65535

export interface ConnectionDict {
  host: string
  port: number
  user: string
  password: string
  database: string
}

export class DatabaseConfig {
  readonly host: string
  readonly port: number
  readonly user: string
  readonly password: string
  readonly database: string

  constructor(settings: ConnectionDict) {
    this.host = settings.host
    this.port = settings.port
    this.user = settings.user
    this.password = settings.password
    this.database = settings.database

    logger.info(`Database config initialized for ${this.host}:${this.port}`)
  }

  static fromEnv(): DatabaseConfig {
    const port = readIntEnv('DB_PORT', 5432)
    if (port < MIN_PORT || port > MAX_PORT) {
      throw new ConfigError('DB_PORT', `expected a port between ${MIN_PORT} and ${MAX_PORT}, got ${port}`)
    }

    return new DatabaseConfig({
      host: readEnv('DB_HOST', 'localhost'),
      port,
      user: readEnv('DB_USER', 'postgres'),
      password: readEnv('DB_PASSWORD', 'postgres'),
      database: readEnv('DB_NAME', 'mydatabase'),
    })
  }

  /**
   * PostgreSQL URI. The password is masked unless `hidePassword` is false.
   */
  getConnectionString(hidePassword: boolean = true): string {
    const password = hidePassword ? MASKED_PASSWORD : this.password
    return `postgresql://${this.user}:${password}@${this.host}:${this.port}/${this.database}`
  }

  getConnectionDict(): ConnectionDict {
    return {
      host: this.host,
      port: this.port,
      user: this.user,
      password: this.password,
      database: this.database,
    }
  }

  toString(): string {
    return `DatabaseConfig(host=${this.host}, port=${this.port}, database=${this.database})`
  }
}

const databaseConfig = createSingleton(() => DatabaseConfig.fromEnv())

export const getDatabaseConfig = (): DatabaseConfig => databaseConfig.get()

/**
 * Forget the shared config so the next call re-reads the environment.
 */
export const resetDatabaseConfig = (): void => databaseConfig.reset()
