/**
 * Pattern catalogue — public API
 */
export * from './patterns/creational/prototype/index.js'
export * from './patterns/creational/abstractFactory/index.js'
export * from './patterns/creational/factoryMethod/index.js'
export * from './patterns/creational/builder/index.js'
export * from './patterns/creational/singleton/index.js'
export * from './patterns/structural/adapter/index.js'

export { DEMOS, getDemoNames, runDemos } from './demos.js'
export type { DemoName } from './demos.js'

export { loadEnv, readEnv, readIntEnv } from './config/env.js'
export {
  NotFoundError,
  ConfigError,
  ValidationError,
  PaymentFailedError,
  UnsupportedChannelError,
} from './utils/errors.js'
export { Logger, LogLevel, createLogger, parseLogLevel } from './utils/logger.js'
export type { LogContext, LogEntry } from './utils/logger.js'
export { createSingleton } from './utils/singleton.js'
export type { Singleton } from './utils/singleton.js'
export { cloneJsonMap, cloneJsonValue } from './utils/jsonValue.js'
export type { JsonMap, JsonValue } from './utils/jsonValue.js'
