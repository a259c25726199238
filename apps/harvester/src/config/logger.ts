/**
 * Harvester log streams.
 *
 * Crawling and processing write to independent streams: each goes to the
 * console and to its own file under the configured log directory.
 */

import { join } from 'node:path'
import { createLogger, type ILogger } from '@plugindex/logger'

export const CRAWLER_LOG_FILE = 'crawler.log'
export const PROCESSOR_LOG_FILE = 'processor.log'

export interface HarvesterLoggers {
  crawler: ILogger
  processor: ILogger
}

export function createHarvesterLoggers(logDir: string): HarvesterLoggers {
  return {
    crawler: createLogger('crawler', { file: join(logDir, CRAWLER_LOG_FILE) }),
    processor: createLogger('processor', { file: join(logDir, PROCESSOR_LOG_FILE) }),
  }
}
