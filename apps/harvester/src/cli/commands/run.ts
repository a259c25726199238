import { exportRecords } from '../../export/index.js'
import type { CommandContext } from '../context.js'
import { crawlMarketplace } from './crawl.js'

export interface RunCommandArgs {
  maxPages?: number
  pagesDir?: string
  csv?: string
  sqlite?: string
  table?: string
}

/**
 * Crawl, then export the in-memory result. The two stages share nothing but
 * the CrawlResult value.
 */
export async function runHarvestCommand(
  args: RunCommandArgs,
  context: CommandContext
): Promise<number> {
  const { output } = context.config

  const result = await crawlMarketplace(context, args)
  if (result.records.length === 0) {
    context.loggers.crawler.error('Crawl finished without any records', {
      stopReason: result.stopReason,
      pagesFetched: result.pagesFetched,
    })
    return 1
  }

  const summary = await exportRecords(
    result.records,
    {
      csvPath: args.csv ?? output.csvPath,
      sqlitePath: args.sqlite ?? output.sqlitePath,
      table: args.table ?? output.table,
    },
    context.loggers.processor
  )
  return summary.ok ? 0 : 1
}
