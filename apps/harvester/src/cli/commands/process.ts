import { exportRecords } from '../../export/index.js'
import { formatErrorForLog } from '../../errors.js'
import { readCrawlInput, type CrawlInput } from '../../marketplace/storage/snapshot.js'
import type { CommandContext } from '../context.js'

export interface ProcessCommandArgs {
  input?: string
  csv?: string
  sqlite?: string
  table?: string
}

export async function runProcessCommand(
  args: ProcessCommandArgs,
  context: CommandContext
): Promise<number> {
  const logger = context.loggers.processor
  const { output } = context.config
  const input = args.input ?? output.snapshotPath

  let crawlInput: CrawlInput
  try {
    crawlInput = await readCrawlInput(input)
  } catch (error) {
    logger.error('Error loading crawl input', { input, ...formatErrorForLog(error) }, error)
    return 1
  }

  for (const warning of crawlInput.warnings) {
    logger.warn('Listing skipped or adjusted while loading pages', { ...warning })
  }
  logger.info('Loaded crawl input', {
    input,
    source: crawlInput.source,
    files: crawlInput.files,
    records: crawlInput.records.length,
  })

  const summary = await exportRecords(
    crawlInput.records,
    {
      csvPath: args.csv ?? output.csvPath,
      sqlitePath: args.sqlite ?? output.sqlitePath,
      table: args.table ?? output.table,
    },
    logger
  )
  return summary.ok ? 0 : 1
}
