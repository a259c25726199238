/**
 * Marketplace Harvest Core Types
 *
 * Records, page results and crawl results shared by the fetcher, the crawl
 * driver and the export writers.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Extension Record
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One marketplace listing, flattened.
 *
 * Absent upstream fields hold their missing value ('' / 0 / [] / null) so a
 * partial listing is still exported. Only `id` is mandatory.
 */
export interface ExtensionRecord {
  /** Marketplace-assigned identifier (numeric ids are stringified) */
  id: string
  name: string
  /** Non-negative install counter */
  downloads: number
  /** Average rating, typically 0-5 */
  rating: number
  /** Licensing model as reported upstream (FREE, PAID, FREEMIUM, ...) */
  pricing: string
  vendor: string
  /** Labels in upstream order */
  tags: string[]
  /** First publication, YYYY-MM-DD (UTC) */
  publishedDate: string | null
  /** Last update, YYYY-MM-DD (UTC). Never earlier than publishedDate */
  date: string | null
}

/**
 * Column order for every tabular export.
 */
export const EXTENSION_FIELDS = [
  'id',
  'name',
  'downloads',
  'rating',
  'pricing',
  'vendor',
  'tags',
  'publishedDate',
  'date',
] as const satisfies ReadonlyArray<keyof ExtensionRecord>

// ═══════════════════════════════════════════════════════════════════════════════
// Parse Warnings
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Why a single listing was skipped or adjusted.
 * Warnings never abort a page.
 */
export type RecordWarningReason =
  | 'NOT_AN_OBJECT' // Listing entry is not a JSON object (skipped)
  | 'MISSING_ID' // No usable id (skipped)
  | 'DATE_ORDER' // Last update before first publication (kept, publishedDate clamped)

export interface RecordParseWarning {
  reason: RecordWarningReason
  /** Position of the listing inside the page payload */
  position: number
  /** Present when the listing had an id */
  id?: string
  /** True when the listing was dropped */
  skipped: boolean
  details?: string
}

// ═══════════════════════════════════════════════════════════════════════════════
// Fetcher Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface PageResult {
  /** Zero-based page index */
  pageIndex: number
  records: ExtensionRecord[]
  /** False once the listing is exhausted */
  hasMore: boolean
  warnings: RecordParseWarning[]
  /** Decoded response body, kept for the page archive */
  raw: unknown
}

/**
 * One page per call, no retries and no caching.
 * Throws TransientFetchError or FatalFetchError.
 */
export interface PageFetcher {
  fetchPage(pageIndex: number): Promise<PageResult>
}

/**
 * Retry policy for transient page failures.
 */
export interface RetryPolicy {
  /** Total attempts per page, including the first */
  maxAttempts: number
  initialDelayMs: number
  maxDelayMs: number
  backoffMultiplier: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
}

// ═══════════════════════════════════════════════════════════════════════════════
// Crawl Result
// ═══════════════════════════════════════════════════════════════════════════════

export type CrawlStopReason =
  | 'exhausted' // Upstream reported no more pages
  | 'page_limit' // maxPages pages processed
  | 'transient_failure' // A page failed every retry
  | 'fatal_failure' // A page failed with a non-retryable error

export type FetchFailureKind = 'transient' | 'fatal'

export interface CrawlFailure {
  pageIndex: number
  kind: FetchFailureKind
  message: string
  statusCode?: number
  attempts: number
}

export interface CrawlResult {
  readonly records: readonly ExtensionRecord[]
  readonly pagesFetched: number
  readonly skippedRecords: number
  readonly stopReason: CrawlStopReason
  readonly failure?: CrawlFailure
  readonly startedAt: string
  readonly finishedAt: string
}

/**
 * Called after each successful page, before the next one is requested.
 */
export type PageHook = (page: PageResult) => Promise<void> | void
