import { createHarvesterLoggers } from '../config/logger.js'
import { TABLE_NAME_PATTERN, loadHarvesterConfig, type HarvesterConfig } from '../config/settings.js'
import { ConfigError } from '../errors.js'
import { runCrawlCommand } from './commands/crawl.js'
import { runProcessCommand } from './commands/process.js'
import { runHarvestCommand } from './commands/run.js'
import type { CommandContext } from './context.js'
import { asPositiveInt, asString, findFlagError, parseFlags, type FlagSpec } from './parse-flags.js'

function printHelp(): void {
  console.log('plugindex harvester')
  console.log('')
  console.log('Commands:')
  console.log('  crawl [--max-pages N] [--output PATH] [--pages-dir DIR]')
  console.log('  process [--input PATH] [--csv PATH] [--sqlite PATH] [--table NAME]')
  console.log('  run [--max-pages N] [--pages-dir DIR] [--csv PATH] [--sqlite PATH] [--table NAME]')
  console.log('')
  console.log('--input accepts a crawl snapshot file or a directory of page_<n>.json files.')
}

const HELP_SWITCHES = ['help', 'h']

const COMMAND_FLAGS = {
  crawl: { values: ['max-pages', 'output', 'pages-dir'], switches: HELP_SWITCHES },
  process: { values: ['input', 'csv', 'sqlite', 'table'], switches: HELP_SWITCHES },
  run: { values: ['max-pages', 'pages-dir', 'csv', 'sqlite', 'table'], switches: HELP_SWITCHES },
} satisfies Record<string, FlagSpec>

type Command = keyof typeof COMMAND_FLAGS

function isCommand(value: string): value is Command {
  return Object.prototype.hasOwnProperty.call(COMMAND_FLAGS, value)
}

/**
 * Run one CLI invocation and resolve to its exit code.
 */
export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const [command, ...rest] = argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    return 0
  }

  if (!isCommand(command)) {
    console.error(`Unknown command: ${command}`)
    printHelp()
    return 2
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp()
    return 0
  }

  const flagError = findFlagError(flags, COMMAND_FLAGS[command])
  if (flagError) {
    console.error(flagError)
    return 2
  }

  const maxPages = asPositiveInt('max-pages', flags['max-pages'])
  if (!maxPages.ok) {
    console.error(maxPages.error)
    return 2
  }

  const table = asString(flags.table)
  if (table !== undefined && !TABLE_NAME_PATTERN.test(table)) {
    console.error('--table expects a plain SQL identifier')
    return 2
  }

  let config: HarvesterConfig
  try {
    config = loadHarvesterConfig(env)
  } catch (error) {
    if (error instanceof ConfigError) {
      for (const issue of error.issues) {
        console.error(`Invalid configuration: ${issue}`)
      }
      return 2
    }
    throw error
  }

  const context: CommandContext = {
    config,
    loggers: createHarvesterLoggers(config.logDir),
  }

  switch (command) {
    case 'crawl':
      return runCrawlCommand(
        {
          maxPages: maxPages.value,
          output: asString(flags.output),
          pagesDir: asString(flags['pages-dir']),
        },
        context
      )
    case 'process':
      return runProcessCommand(
        {
          input: asString(flags.input),
          csv: asString(flags.csv),
          sqlite: asString(flags.sqlite),
          table,
        },
        context
      )
    case 'run':
      return runHarvestCommand(
        {
          maxPages: maxPages.value,
          pagesDir: asString(flags['pages-dir']),
          csv: asString(flags.csv),
          sqlite: asString(flags.sqlite),
          table,
        },
        context
      )
    default:
      return 2
  }
}
