/**
 * Crawl Driver
 *
 * Walks listing pages strictly in order, one request at a time, retrying
 * transient failures per page. A page that cannot be fetched ends the crawl
 * early; everything collected before it is still returned. crawl() never
 * rejects for fetch problems.
 */

import type { ILogger } from '@plugindex/logger'
import {
  createWorkflowLogger,
  newRunId,
  sanitizeUrl,
  type WorkflowLogger,
} from '../../config/structured-log.js'
import {
  FatalFetchError,
  TransientFetchError,
  classifyFetchError,
  formatErrorForLog,
} from '../../errors.js'
import {
  DEFAULT_RETRY_POLICY,
  type CrawlFailure,
  type CrawlResult,
  type CrawlStopReason,
  type ExtensionRecord,
  type PageFetcher,
  type PageHook,
  type PageResult,
  type RetryPolicy,
} from '../types.js'

export const DEFAULT_MAX_PAGES = 100

export interface CrawlDriverOptions {
  fetcher: PageFetcher
  logger: ILogger
  retryPolicy?: RetryPolicy
  /** Used when crawl() is called without a page limit */
  defaultMaxPages?: number
  /** Runs after every successful page (page archive) */
  onPage?: PageHook
  sleep?: (ms: number) => Promise<void>
  now?: () => Date
}

type PageOutcome =
  | { ok: true; page: PageResult; attempts: number }
  | { ok: false; failure: CrawlFailure }

/**
 * Delay before the attempt following `attempt` (1-based).
 * A server-provided Retry-After wins over the backoff when longer.
 */
export function computeRetryDelay(
  policy: RetryPolicy,
  attempt: number,
  retryAfterMs?: number
): number {
  const backoff = policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1)
  return Math.min(Math.max(backoff, retryAfterMs ?? 0), policy.maxDelayMs)
}

function toCrawlFailure(pageIndex: number, error: unknown, attempts: number): CrawlFailure {
  return {
    pageIndex,
    kind: classifyFetchError(error),
    message: error instanceof Error ? error.message : String(error),
    statusCode:
      error instanceof TransientFetchError || error instanceof FatalFetchError
        ? error.statusCode
        : undefined,
    attempts,
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

export class CrawlDriver {
  private readonly fetcher: PageFetcher
  private readonly logger: ILogger
  private readonly retryPolicy: RetryPolicy
  private readonly defaultMaxPages: number
  private readonly onPage?: PageHook
  private readonly sleep: (ms: number) => Promise<void>
  private readonly now: () => Date

  constructor(options: CrawlDriverOptions) {
    this.fetcher = options.fetcher
    this.logger = options.logger
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.defaultMaxPages = options.defaultMaxPages ?? DEFAULT_MAX_PAGES
    this.onPage = options.onPage
    this.sleep = options.sleep ?? defaultSleep
    this.now = options.now ?? (() => new Date())

    if (!Number.isInteger(this.retryPolicy.maxAttempts) || this.retryPolicy.maxAttempts < 1) {
      throw new RangeError(`retryPolicy.maxAttempts must be a positive integer, got ${this.retryPolicy.maxAttempts}`)
    }
  }

  async crawl(maxPages: number = this.defaultMaxPages): Promise<CrawlResult> {
    if (!Number.isInteger(maxPages) || maxPages < 1) {
      throw new RangeError(`maxPages must be a positive integer, got ${maxPages}`)
    }

    const log = createWorkflowLogger(this.logger, {
      workflow: 'crawl',
      stage: 'fetch',
      runId: newRunId(),
    })
    const startedAt = this.now().toISOString()
    const records: ExtensionRecord[] = []
    let pagesFetched = 0
    let skippedRecords = 0
    let stopReason: CrawlStopReason = 'page_limit'
    let failure: CrawlFailure | undefined

    log.info('CRAWL_START', { maxPages, maxAttempts: this.retryPolicy.maxAttempts })

    for (let pageIndex = 0; pageIndex < maxPages; pageIndex++) {
      const pageLog = log.child({ pageIndex })
      pageLog.info('CRAWL_PAGE_START')

      const outcome = await this.fetchWithRetry(pageIndex, pageLog)
      if (!outcome.ok) {
        failure = outcome.failure
        stopReason = failure.kind === 'transient' ? 'transient_failure' : 'fatal_failure'
        pageLog.error('CRAWL_PAGE_FAILED', {
          kind: failure.kind,
          attempts: failure.attempts,
          statusCode: failure.statusCode,
          errorMessage: failure.message,
          totalRecords: records.length,
        })
        break
      }

      const { page } = outcome
      for (const warning of page.warnings) {
        if (warning.skipped) {
          skippedRecords++
          pageLog.warn('CRAWL_RECORD_SKIPPED', { ...warning })
        } else {
          pageLog.warn('CRAWL_RECORD_ADJUSTED', { ...warning })
        }
      }

      records.push(...page.records)
      pagesFetched++
      pageLog.info('CRAWL_PAGE_OK', {
        records: page.records.length,
        totalRecords: records.length,
        skipped: page.warnings.filter(warning => warning.skipped).length,
        attempts: outcome.attempts,
        hasMore: page.hasMore,
      })

      await this.runPageHook(page, pageLog)

      if (!page.hasMore) {
        stopReason = 'exhausted'
        break
      }
    }

    const result: CrawlResult = Object.freeze({
      records: Object.freeze(records),
      pagesFetched,
      skippedRecords,
      stopReason,
      failure,
      startedAt,
      finishedAt: this.now().toISOString(),
    })

    log.info('CRAWL_SUMMARY', {
      stopReason,
      pagesFetched,
      totalRecords: records.length,
      skippedRecords,
    })

    return result
  }

  private async fetchWithRetry(pageIndex: number, log: WorkflowLogger): Promise<PageOutcome> {
    const { maxAttempts } = this.retryPolicy

    for (let attempt = 1; ; attempt++) {
      try {
        const page = await this.fetcher.fetchPage(pageIndex)
        return { ok: true, page, attempts: attempt }
      } catch (error) {
        if (error instanceof TransientFetchError && attempt < maxAttempts) {
          const delayMs = computeRetryDelay(this.retryPolicy, attempt, error.retryAfterMs)
          log.warn('CRAWL_PAGE_RETRY', {
            attempt,
            delayMs,
            ...formatErrorForLog(error),
            ...sanitizeUrl(error.url),
          })
          await this.sleep(delayMs)
          continue
        }

        return { ok: false, failure: toCrawlFailure(pageIndex, error, attempt) }
      }
    }
  }

  private async runPageHook(page: PageResult, log: WorkflowLogger): Promise<void> {
    if (!this.onPage) return
    try {
      await this.onPage(page)
    } catch (error) {
      log.error('CRAWL_PAGE_HOOK_FAILED', formatErrorForLog(error), error)
    }
  }
}
