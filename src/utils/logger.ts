/**
 * Structured Logger
 *
 * Provides consistent, structured logging with context and metadata support.
 * Outputs JSON lines in production and a readable single-line format elsewhere.
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export interface LogContext {
  service?: string
  operation?: string
  [key: string]: unknown
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  context?: LogContext
  error?: {
    name: string
    message: string
    stack?: string
  }
}

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR]

/**
 * Parse a LOG_LEVEL value. Anything unrecognised falls back to info.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase()
  return LEVEL_ORDER.find((level) => level === normalized) ?? LogLevel.INFO
}

export class Logger {
  private readonly service: string
  // unset: LOG_LEVEL is read on every entry
  private minLevel?: LogLevel

  constructor(service: string, minLevel?: LogLevel) {
    this.service = service
    this.minLevel = minLevel
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level
  }

  private shouldLog(level: LogLevel): boolean {
    const minLevel = this.minLevel ?? parseLogLevel(process.env.LOG_LEVEL)
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(minLevel)
  }

  private formatLog(level: LogLevel, message: string, context?: LogContext, error?: Error): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: {
        service: this.service,
        ...context,
      },
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: process.env.NODE_ENV === 'development' ? error.stack : undefined,
      }
    }

    return entry
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog(level)) {
      return
    }

    const entry = this.formatLog(level, message, context, error)

    if (process.env.NODE_ENV === 'production') {
      console.log(JSON.stringify(entry))
      return
    }

    const prefix = `[${entry.level.toUpperCase()}] [${this.service}]`
    // service is already in the prefix
    const { service: _service, ...rest }: LogContext = entry.context ?? {}
    const ctx = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : ''
    const err = entry.error ? `\n${entry.error.stack ?? entry.error.message}` : ''
    console.log(`${prefix} ${entry.message}${ctx}${err}`)
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context)
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context)
  }

  warn(message: string, context?: LogContext, error?: Error): void {
    this.log(LogLevel.WARN, message, context, error)
  }

  error(message: string, context?: LogContext, error?: Error): void {
    this.log(LogLevel.ERROR, message, context, error)
  }
}

export function createLogger(service: string): Logger {
  return new Logger(service)
}
