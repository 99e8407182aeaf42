import { createLogger } from '../../../utils/logger.js'
import { getDatabaseConfig, type DatabaseConfig } from './databaseConfig.js'

const logger = createLogger('singleton')

export interface SingletonDemoResult {
  sameInstance: boolean
  config: DatabaseConfig
}

export function runSingletonDemo(): SingletonDemoResult {
  // Separate call sites standing in for separate modules
  const connection = getDatabaseConfig()
  logger.info(`Connecting to ${connection.getConnectionString()}`)

  const migration = getDatabaseConfig()
  logger.info(`Running migrations on ${migration.database}`)

  const backup = getDatabaseConfig()
  logger.info(`Backing up ${backup.database}`)

  const sameInstance = connection === migration && migration === backup
  logger.info(`All modules share one config: ${sameInstance}`)
  logger.info(connection.toString())

  return { sameInstance, config: connection }
}
