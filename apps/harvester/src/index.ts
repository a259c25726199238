export * from './marketplace/types.js'
export * from './errors.js'
export { loadHarvesterConfig, type HarvesterConfig, type MarketplaceSettings } from './config/settings.js'
export { createHarvesterLoggers, type HarvesterLoggers } from './config/logger.js'
export { HttpFetcher } from './marketplace/fetch/http-fetcher.js'
export { MarketplacePageFetcher, buildPageUrl } from './marketplace/fetch/page-fetcher.js'
export { parseListingPayload, computeHasMore } from './marketplace/parse/listing.js'
export { CrawlDriver, computeRetryDelay, type CrawlDriverOptions } from './marketplace/crawl/driver.js'
export { clearPageArchive, createPageArchive, pageFileName } from './marketplace/storage/page-archive.js'
export { readCrawlInput, writeCrawlSnapshot, type CrawlInput } from './marketplace/storage/snapshot.js'
export { writeExtensionsCsv, readExtensionsCsv, formatExtensionsCsv } from './export/csv.js'
export { writeExtensionsSqlite, readExtensionsSqlite } from './export/sqlite.js'
export { exportRecords, type ExportSummary, type ExportTargets } from './export/index.js'
