/**
 * @metaget/logger
 *
 * Structured console logging for the metaget packages.
 *
 * - JSON lines in production, colored single lines in development
 * - ISO 8601 timestamps
 * - Child loggers that inherit component path and context
 *
 * Environment variables:
 * - LOG_LEVEL: debug, info, warn, error, fatal. Default: info
 * - LOG_FORMAT: json or pretty. Default: json in production, pretty otherwise
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'
export type LogFormat = 'json' | 'pretty'

export interface LogContext {
  [key: string]: unknown
}

interface SerializedError {
  name: string
  message: string
  code?: string
  stack?: string
}

interface LogEntry {
  timestamp: string
  level: LogLevel
  service: string
  component?: string
  message: string
  error?: SerializedError
  [key: string]: unknown
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
}

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m', // Green
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
  fatal: '\x1b[35m', // Magenta
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BRIGHT = '\x1b[1m'

let levelOverride: LogLevel | null = null
let formatOverride: LogFormat | null = null

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value)
}

function getLogLevel(): LogLevel {
  if (levelOverride) return levelOverride
  const level = process.env.LOG_LEVEL?.toLowerCase()
  return isLogLevel(level) ? level : 'info'
}

function getLogFormat(): LogFormat {
  if (formatOverride) return formatOverride
  const format = process.env.LOG_FORMAT?.toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format
  }
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

/**
 * Pin the minimum level, ignoring LOG_LEVEL. Pass null to go back to the
 * environment.
 */
export function setLogLevel(level: LogLevel | null): void {
  levelOverride = level
}

export function setLogFormat(format: LogFormat | null): void {
  formatOverride = format
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[getLogLevel()]
}

function formatError(error: unknown): SerializedError {
  if (error instanceof Error) {
    const code = 'code' in error ? error.code : undefined
    return {
      name: error.name,
      message: error.message,
      ...(typeof code === 'string' ? { code } : {}),
      stack: error.stack,
    }
  }

  return {
    name: 'UnknownError',
    message: String(error),
  }
}

/**
 * Strip userinfo from a URL so credentials never reach the log sink.
 * Values that do not parse as URLs are returned unchanged.
 */
export function redactUrl(url: string): string {
  let parsed: URL
  try {
    parsed = new URL(url)
  } catch {
    return url
  }
  if (!parsed.username && !parsed.password) {
    return url
  }
  parsed.username = ''
  parsed.password = ''
  return parsed.toString()
}

function formatPretty(entry: LogEntry): string {
  const color = LOG_COLORS[entry.level]
  const levelStr = entry.level.toUpperCase().padEnd(5)
  const { timestamp, level: _level, service, component, message, error, ...meta } = entry

  const componentPath = component ? `${service}:${component}` : service
  const metaStr = Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''
  const errorStr = error ? `\n  ${DIM}${error.stack || error.message}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${color}${BRIGHT}${levelStr}${RESET} ${DIM}[${componentPath}]${RESET} ${message}${metaStr}${errorStr}`
}

function output(entry: LogEntry): void {
  const formatted = getLogFormat() === 'json' ? JSON.stringify(entry) : formatPretty(entry)

  switch (entry.level) {
    case 'debug':
      console.debug(formatted)
      break
    case 'info':
      console.info(formatted)
      break
    case 'warn':
      console.warn(formatted)
      break
    case 'error':
    case 'fatal':
      console.error(formatted)
      break
  }
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * Create a child logger. The component is appended to the parent's path
   * (`extractor:fetch`) and the context is merged over the parent's.
   */
  child(component: string, defaultContext?: LogContext): ILogger
}

export class Logger implements ILogger {
  private readonly service: string
  private readonly component?: string
  private readonly defaultContext: LogContext

  constructor(service: string, component?: string, defaultContext: LogContext = {}) {
    this.service = service
    this.component = component
    this.defaultContext = defaultContext
  }

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (!shouldLog(level)) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...this.defaultContext,
      ...meta,
    }

    if (this.component) {
      entry.component = this.component
    }

    if (error !== undefined) {
      entry.error = formatError(error)
    }

    output(entry)
  }

  debug(message: string, meta?: LogContext): void {
    this.log('debug', message, meta)
  }

  info(message: string, meta?: LogContext): void {
    this.log('info', message, meta)
  }

  warn(message: string, meta?: LogContext, error?: unknown): void {
    this.log('warn', message, meta, error)
  }

  error(message: string, meta?: LogContext, error?: unknown): void {
    this.log('error', message, meta, error)
  }

  fatal(message: string, meta?: LogContext, error?: unknown): void {
    this.log('fatal', message, meta, error)
  }

  child(component: string, defaultContext: LogContext = {}): ILogger {
    const path = this.component ? `${this.component}:${component}` : component
    return new Logger(this.service, path, {
      ...this.defaultContext,
      ...defaultContext,
    })
  }
}

/**
 * Create a logger for a service.
 *
 * @example
 * ```ts
 * const logger = createLogger('metaget')
 * logger.child('fetch').debug('page fetched', { statusCode: 200 })
 * ```
 */
export function createLogger(service: string): ILogger {
  return new Logger(service)
}
