/**
 * Singleton — public API
 */
export type { ConnectionDict } from './databaseConfig.js'
export { DatabaseConfig, getDatabaseConfig, resetDatabaseConfig } from './databaseConfig.js'
export { runSingletonDemo } from './demo.js'
export type { SingletonDemoResult } from './demo.js'
