/**
 * Harvester configuration
 *
 * Environment variables are validated once at startup and turned into an
 * explicit HarvesterConfig that is passed to the fetcher, the crawl driver
 * and the CLI commands. Nothing below the CLI reads process.env.
 *
 * Environment variables:
 * - MARKETPLACE_URL: Listing endpoint
 * - MARKETPLACE_PAGE_SIZE: Listings per request (default 100)
 * - MARKETPLACE_ORDER_BY: Sort key (default downloads)
 * - MARKETPLACE_PRODUCTS: Comma-separated product codes
 * - MARKETPLACE_EXCLUDE_TAGS: Comma-separated tags to exclude (default internal)
 * - MARKETPLACE_USER_AGENT: User-Agent header
 * - CRAWL_TIMEOUT_MS: Per-request timeout (default 30000)
 * - CRAWL_MAX_PAGES: Default page limit (default 100)
 * - CRAWL_RETRY_ATTEMPTS / CRAWL_RETRY_BASE_MS / CRAWL_RETRY_MAX_MS / CRAWL_RETRY_FACTOR
 * - LOG_DIR: Directory for crawler.log and processor.log (default logs)
 * - OUTPUT_SNAPSHOT / OUTPUT_PAGES_DIR / OUTPUT_CSV / OUTPUT_SQLITE / OUTPUT_TABLE
 */

import { z } from 'zod'
import { ConfigError } from '../errors.js'
import type { RetryPolicy } from '../marketplace/types.js'

export const DEFAULT_MARKETPLACE_URL = 'https://plugins.jetbrains.com/api/searchPlugins'

const DEFAULT_PRODUCTS = [
  'androidstudio',
  'appcode',
  'aqua',
  'clion',
  'dataspell',
  'dbe',
  'fleet',
  'go',
  'idea',
  'idea_ce',
  'mps',
  'phpstorm',
  'pycharm',
  'pycharm_ce',
  'rider',
  'ruby',
  'rust',
  'webstorm',
  'writerside',
].join(',')

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36'

export const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/

export interface MarketplaceSettings {
  endpoint: string
  pageSize: number
  orderBy: string
  products: string[]
  excludeTags: string[]
  headers: Record<string, string>
  timeoutMs: number
}

export interface HarvesterConfig {
  marketplace: MarketplaceSettings
  crawl: {
    maxPages: number
    retry: RetryPolicy
  }
  output: {
    snapshotPath: string
    pagesDir: string
    csvPath: string
    sqlitePath: string
    table: string
  }
  logDir: string
}

// Blank variables fall back to defaults instead of failing coercion
function fromEnv<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(value => (value === '' ? undefined : value), schema)
}

const intSetting = (fallback: number, min: number) =>
  fromEnv(z.coerce.number().int().min(min).default(fallback))

const listSetting = (fallback: string) =>
  fromEnv(z.string().default(fallback)).transform(value =>
    value
      .split(',')
      .map(entry => entry.trim())
      .filter(entry => entry.length > 0)
  )

const pathSetting = (fallback: string) => fromEnv(z.string().min(1).default(fallback))

const envSchema = z.object({
  MARKETPLACE_URL: fromEnv(z.string().url().default(DEFAULT_MARKETPLACE_URL)),
  MARKETPLACE_PAGE_SIZE: intSetting(100, 1),
  MARKETPLACE_ORDER_BY: fromEnv(z.string().default('downloads')),
  MARKETPLACE_PRODUCTS: listSetting(DEFAULT_PRODUCTS),
  MARKETPLACE_EXCLUDE_TAGS: listSetting('internal'),
  MARKETPLACE_USER_AGENT: fromEnv(z.string().default(DEFAULT_USER_AGENT)),
  CRAWL_TIMEOUT_MS: intSetting(30000, 1),
  CRAWL_MAX_PAGES: intSetting(100, 1),
  CRAWL_RETRY_ATTEMPTS: intSetting(3, 1),
  CRAWL_RETRY_BASE_MS: intSetting(1000, 0),
  CRAWL_RETRY_MAX_MS: intSetting(30000, 0),
  CRAWL_RETRY_FACTOR: fromEnv(z.coerce.number().min(1).default(2)),
  LOG_DIR: pathSetting('logs'),
  OUTPUT_SNAPSHOT: pathSetting('data/crawl.json'),
  OUTPUT_PAGES_DIR: pathSetting('data/pages'),
  OUTPUT_CSV: pathSetting('plugins.csv'),
  OUTPUT_SQLITE: pathSetting('plugins.db'),
  OUTPUT_TABLE: fromEnv(
    z.string().regex(TABLE_NAME_PATTERN, 'must be a plain SQL identifier').default('extensions')
  ),
})

/**
 * Validate the environment and build the harvester configuration.
 * Throws ConfigError listing every invalid variable.
 */
export function loadHarvesterConfig(env: NodeJS.ProcessEnv = process.env): HarvesterConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    )
  }

  const settings = parsed.data
  return {
    marketplace: {
      endpoint: settings.MARKETPLACE_URL,
      pageSize: settings.MARKETPLACE_PAGE_SIZE,
      orderBy: settings.MARKETPLACE_ORDER_BY,
      products: settings.MARKETPLACE_PRODUCTS,
      excludeTags: settings.MARKETPLACE_EXCLUDE_TAGS,
      headers: {
        accept: 'application/json, text/plain',
        'accept-language': 'en-US,en;q=0.9',
        'cache-control': 'no-cache',
        pragma: 'no-cache',
        'user-agent': settings.MARKETPLACE_USER_AGENT,
      },
      timeoutMs: settings.CRAWL_TIMEOUT_MS,
    },
    crawl: {
      maxPages: settings.CRAWL_MAX_PAGES,
      retry: {
        maxAttempts: settings.CRAWL_RETRY_ATTEMPTS,
        initialDelayMs: settings.CRAWL_RETRY_BASE_MS,
        maxDelayMs: settings.CRAWL_RETRY_MAX_MS,
        backoffMultiplier: settings.CRAWL_RETRY_FACTOR,
      },
    },
    output: {
      snapshotPath: settings.OUTPUT_SNAPSHOT,
      pagesDir: settings.OUTPUT_PAGES_DIR,
      csvPath: settings.OUTPUT_CSV,
      sqlitePath: settings.OUTPUT_SQLITE,
      table: settings.OUTPUT_TABLE,
    },
    logDir: settings.LOG_DIR,
  }
}
