/**
 * Error Classification
 *
 * Every failure the harvester reports is a HarvestError with a stable code.
 * Fetch errors are split into transient (retried by the crawl driver) and
 * fatal (never retried). Export and input errors end the current step only.
 */

import type { FetchFailureKind } from './marketplace/types.js'

export const ERROR_CODES = {
  TRANSIENT_FETCH: 'TRANSIENT_FETCH',
  FATAL_FETCH: 'FATAL_FETCH',
  EXPORT_FAILED: 'EXPORT_FAILED',
  INPUT_INVALID: 'INPUT_INVALID',
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export abstract class HarvestError extends Error {
  abstract readonly code: ErrorCode

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

interface FetchErrorDetails {
  url?: string
  statusCode?: number
  cause?: unknown
}

/**
 * Network failure, timeout, or a retryable HTTP status (408, 429, 5xx).
 */
export class TransientFetchError extends HarvestError {
  readonly code = ERROR_CODES.TRANSIENT_FETCH
  readonly url?: string
  readonly statusCode?: number
  /** Server-requested wait from Retry-After, when present */
  readonly retryAfterMs?: number

  constructor(message: string, details: FetchErrorDetails & { retryAfterMs?: number } = {}) {
    super(message, { cause: details.cause })
    this.url = details.url
    this.statusCode = details.statusCode
    this.retryAfterMs = details.retryAfterMs
  }
}

/**
 * Non-retryable status or a response body that does not match the listing shape.
 */
export class FatalFetchError extends HarvestError {
  readonly code = ERROR_CODES.FATAL_FETCH
  readonly url?: string
  readonly statusCode?: number

  constructor(message: string, details: FetchErrorDetails = {}) {
    super(message, { cause: details.cause })
    this.url = details.url
    this.statusCode = details.statusCode
  }
}

export type ExportTarget = 'csv' | 'sqlite' | 'snapshot'

export class ExportError extends HarvestError {
  readonly code = ERROR_CODES.EXPORT_FAILED
  readonly target: ExportTarget
  readonly path: string

  constructor(target: ExportTarget, path: string, cause: unknown) {
    super(`Failed to write ${target} output to ${path}: ${describeCause(cause)}`, { cause })
    this.target = target
    this.path = path
  }
}

/**
 * Crawl input (snapshot file or pages directory) is unreadable or malformed.
 */
export class InputError extends HarvestError {
  readonly code = ERROR_CODES.INPUT_INVALID
  readonly path: string

  constructor(path: string, message: string, cause?: unknown) {
    super(`Invalid crawl input ${path}: ${message}`, { cause })
    this.path = path
  }
}

export class ConfigError extends HarvestError {
  readonly code = ERROR_CODES.CONFIG_INVALID
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
    this.issues = issues
  }
}

const RETRYABLE_STATUS_CODES = new Set([408, 429])

export function isRetryableStatus(statusCode: number): boolean {
  return RETRYABLE_STATUS_CODES.has(statusCode) || (statusCode >= 500 && statusCode <= 599)
}

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined

  const trimmed = value.trim()
  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10) * 1000
  }

  const at = Date.parse(trimmed)
  if (Number.isNaN(at)) return undefined
  return Math.max(0, at - now)
}

export function isHarvestError(error: unknown): error is HarvestError {
  return error instanceof HarvestError
}

/**
 * Only TransientFetchError is worth another attempt. Anything else a fetcher
 * throws, including unexpected exceptions, is fatal for the page.
 */
export function classifyFetchError(error: unknown): FetchFailureKind {
  return error instanceof TransientFetchError ? 'transient' : 'fatal'
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}

/**
 * Flatten an error into log metadata.
 */
export function formatErrorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof TransientFetchError || error instanceof FatalFetchError) {
    return {
      errorCode: error.code,
      errorMessage: error.message,
      statusCode: error.statusCode,
    }
  }

  if (isHarvestError(error)) {
    return {
      errorCode: error.code,
      errorMessage: error.message,
    }
  }

  return {
    errorCode: 'UNEXPECTED_ERROR',
    errorMessage: describeCause(error),
  }
}
