import { MarketplacePageFetcher } from '../../marketplace/fetch/page-fetcher.js'
import { CrawlDriver } from '../../marketplace/crawl/driver.js'
import { createPageArchive } from '../../marketplace/storage/page-archive.js'
import { writeCrawlSnapshot } from '../../marketplace/storage/snapshot.js'
import type { CrawlResult } from '../../marketplace/types.js'
import { formatErrorForLog } from '../../errors.js'
import type { CommandContext } from '../context.js'

export interface CrawlCommandArgs {
  maxPages?: number
  output?: string
  pagesDir?: string
}

/**
 * Build the driver from configuration and run one crawl.
 */
export async function crawlMarketplace(
  context: CommandContext,
  options: { maxPages?: number; pagesDir?: string }
): Promise<CrawlResult> {
  const { config, loggers } = context
  const driver = new CrawlDriver({
    fetcher: context.fetcher ?? new MarketplacePageFetcher(config.marketplace),
    logger: loggers.crawler,
    retryPolicy: config.crawl.retry,
    defaultMaxPages: config.crawl.maxPages,
    onPage: createPageArchive(options.pagesDir ?? config.output.pagesDir),
    sleep: context.sleep,
  })
  return driver.crawl(options.maxPages)
}

export async function runCrawlCommand(
  args: CrawlCommandArgs,
  context: CommandContext
): Promise<number> {
  const logger = context.loggers.crawler
  const output = args.output ?? context.config.output.snapshotPath

  const result = await crawlMarketplace(context, args)
  if (result.records.length === 0) {
    logger.error('Crawl finished without any records', {
      stopReason: result.stopReason,
      pagesFetched: result.pagesFetched,
    })
    return 1
  }

  try {
    await writeCrawlSnapshot(result, output)
  } catch (error) {
    logger.error('Failed to write crawl snapshot', { output, ...formatErrorForLog(error) }, error)
    return 1
  }

  logger.info('Crawling completed', {
    totalExtensions: result.records.length,
    pagesFetched: result.pagesFetched,
    stopReason: result.stopReason,
    output,
  })
  return 0
}
