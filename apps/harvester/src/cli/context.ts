import type { HarvesterConfig } from '../config/settings.js'
import type { HarvesterLoggers } from '../config/logger.js'
import type { PageFetcher } from '../marketplace/types.js'

/**
 * Everything a command needs besides its flags. Tests swap the fetcher and
 * sleep for in-process fakes.
 */
export interface CommandContext {
  config: HarvesterConfig
  loggers: HarvesterLoggers
  fetcher?: PageFetcher
  sleep?: (ms: number) => Promise<void>
}
