/**
 * Structured logging helpers for harvest workflows.
 *
 * Stamps common envelope fields on every event and keeps full query strings
 * out of the logs.
 */

import { createHash } from 'node:crypto'
import type { ILogger, LogContext } from '@plugindex/logger'

export type WorkflowContext = {
  workflow: 'crawl' | 'process' | 'run'
  stage: string
  runId?: string
  pageIndex?: number
  attempt?: number
  [key: string]: unknown
}

export type WorkflowLogger = {
  debug: (event: string, meta?: LogContext) => void
  info: (event: string, meta?: LogContext) => void
  warn: (event: string, meta?: LogContext, err?: unknown) => void
  error: (event: string, meta?: LogContext, err?: unknown) => void
  child: (extra: Partial<WorkflowContext>) => WorkflowLogger
}

export function createWorkflowLogger(base: ILogger, context: WorkflowContext): WorkflowLogger {
  const baseContext = compact(context)

  const payload = (event: string, meta?: LogContext): LogContext => ({
    event_name: event,
    ...baseContext,
    ...(meta ? compact(meta) : {}),
  })

  return {
    debug: (event, meta) => base.debug(event, payload(event, meta)),
    info: (event, meta) => base.info(event, payload(event, meta)),
    warn: (event, meta, err) => base.warn(event, payload(event, meta), err),
    error: (event, meta, err) => base.error(event, payload(event, meta), err),
    child: extra => createWorkflowLogger(base, { ...context, ...extra }),
  }
}

export function sanitizeUrl(url?: string | null): {
  urlHost?: string
  urlPath?: string
  urlHash?: string
} {
  if (!url) return {}
  try {
    const parsed = new URL(url)
    return {
      urlHost: parsed.host,
      urlPath: parsed.pathname,
      urlHash: hashValue(`${parsed.host}${parsed.pathname}${parsed.search}`),
    }
  } catch {
    return { urlHash: hashValue(url) }
  }
}

export function hashValue(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 16)
}

export function newRunId(): string {
  return `${Date.now().toString(36)}-${hashValue(String(Math.random())).slice(0, 6)}`
}

function compact(value: Record<string, unknown>): LogContext {
  const next: LogContext = {}
  for (const [key, val] of Object.entries(value)) {
    if (val === undefined || val === null) continue
    next[key] = val
  }
  return next
}
