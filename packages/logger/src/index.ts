/**
 * @plugindex/logger
 *
 * Structured logging for the plugindex tools.
 *
 * Features:
 * - JSON-formatted output for production (machine-parseable)
 * - Colored output for development (human-readable)
 * - ISO 8601 timestamps
 * - Log levels: debug, info, warn, error, fatal
 * - Child loggers with inherited context
 * - Optional append-only log file per logger (always JSON lines)
 *
 * Environment variables:
 * - LOG_LEVEL: Minimum log level (debug, info, warn, error, fatal). Default: info
 * - LOG_FORMAT: Console format (json, pretty). Default: json in production, pretty otherwise
 * - NODE_ENV: Used to determine defaults
 */

import { appendFileSync, mkdirSync } from 'node:fs'
import { dirname } from 'node:path'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export interface LogContext {
  [key: string]: unknown
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  service: string
  component?: string
  message: string
  error?: {
    name: string
    message: string
    stack?: string
  }
  [key: string]: unknown
}

export interface LoggerOptions {
  /** Append every entry to this file as a JSON line */
  file?: string
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

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value)
}

export function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase()
  if (isLogLevel(level)) {
    return level
  }
  return 'info'
}

function getLogFormat(): 'json' | 'pretty' {
  const format = process.env.LOG_FORMAT?.toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format
  }
  // Default: pretty in development, json in production
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[getLogLevel()]
}

export function formatError(error: unknown): LogEntry['error'] | undefined {
  if (!error) return undefined

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    }
  }

  return {
    name: 'UnknownError',
    message: String(error),
  }
}

function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
}

function formatPretty(entry: LogEntry): string {
  const color = LOG_COLORS[entry.level]
  const levelStr = entry.level.toUpperCase().padEnd(5)

  const componentPath = entry.component
    ? `${entry.service}:${entry.component}`
    : entry.service

  const { timestamp, level, service, component, message, error, ...meta } = entry

  const metaStr =
    Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''

  const errorStr = error ? `\n  ${DIM}${error.stack || error.message}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${color}${BRIGHT}${levelStr}${RESET} ${DIM}[${componentPath}]${RESET} ${message}${metaStr}${errorStr}`
}

// Files that failed once are not retried for the rest of the process
const brokenFiles = new Set<string>()
const preparedDirs = new Set<string>()

function appendToFile(file: string, entry: LogEntry): void {
  if (brokenFiles.has(file)) return

  try {
    const dir = dirname(file)
    if (!preparedDirs.has(dir)) {
      mkdirSync(dir, { recursive: true })
      preparedDirs.add(dir)
    }
    appendFileSync(file, `${formatJson(entry)}\n`, 'utf-8')
  } catch (error) {
    brokenFiles.add(file)
    const reason = error instanceof Error ? error.message : String(error)
    console.error(`Log file ${file} disabled: ${reason}`)
  }
}

function output(entry: LogEntry, file?: string): void {
  const format = getLogFormat()
  const formatted = format === 'json' ? formatJson(entry) : formatPretty(entry)

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

  if (file) {
    appendToFile(file, entry)
  }
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * Create a child logger
   * @param componentOrContext - Component name, or a context object merged into every entry
   * @param defaultContext - Extra context (only used when the first arg is a string)
   */
  child(componentOrContext: string | LogContext, defaultContext?: LogContext): ILogger
}

export class Logger implements ILogger {
  private readonly service: string
  private readonly component?: string
  private readonly defaultContext: LogContext
  private readonly file?: string

  constructor(
    service: string,
    component?: string,
    defaultContext: LogContext = {},
    options: LoggerOptions = {}
  ) {
    this.service = service
    this.component = component
    this.defaultContext = defaultContext
    this.file = options.file
  }

  private log(
    level: LogLevel,
    message: string,
    meta?: LogContext,
    error?: unknown
  ): void {
    if (!shouldLog(level)) return

    const errorData = error ? formatError(error) : undefined

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

    if (errorData) {
      entry.error = errorData
    }

    output(entry, this.file)
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

  child(componentOrContext: string | LogContext, defaultContext: LogContext = {}): ILogger {
    const options = { file: this.file }
    if (typeof componentOrContext === 'object') {
      return new Logger(
        this.service,
        this.component,
        { ...this.defaultContext, ...componentOrContext },
        options
      )
    }
    const newComponent = this.component
      ? `${this.component}:${componentOrContext}`
      : componentOrContext
    return new Logger(
      this.service,
      newComponent,
      { ...this.defaultContext, ...defaultContext },
      options
    )
  }
}

/**
 * Create a logger for a service
 *
 * @param service - The service name (e.g., 'crawler', 'processor')
 *
 * @example
 * ```ts
 * import { createLogger } from '@plugindex/logger'
 *
 * const logger = createLogger('crawler', { file: 'logs/crawler.log' })
 * logger.info('Crawl started', { maxPages: 100 })
 *
 * const pageLogger = logger.child('page', { pageIndex: 0 })
 * pageLogger.info('Page fetched', { records: 100 })
 * ```
 */
export function createLogger(service: string, options: LoggerOptions = {}): ILogger {
  return new Logger(service, undefined, {}, options)
}
