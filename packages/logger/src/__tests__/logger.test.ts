import { mkdtempSync, readFileSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createLogger, getLogLevel } from '../index.js'

function restoreEnv(key: string, value: string | undefined): void {
  if (value === undefined) {
    delete process.env[key]
  } else {
    process.env[key] = value
  }
}

describe('logger', () => {
  const originalLogFormat = process.env.LOG_FORMAT
  const originalLogLevel = process.env.LOG_LEVEL
  let dir: string

  beforeEach(() => {
    process.env.LOG_FORMAT = 'json'
    delete process.env.LOG_LEVEL
    dir = mkdtempSync(join(tmpdir(), 'plugindex-logger-'))
  })

  afterEach(() => {
    vi.restoreAllMocks()
    restoreEnv('LOG_FORMAT', originalLogFormat)
    restoreEnv('LOG_LEVEL', originalLogLevel)
    rmSync(dir, { recursive: true, force: true })
  })

  it('writes JSON entries with service, message and metadata', () => {
    const consoleInfo = vi.spyOn(console, 'info').mockImplementation(() => {})

    createLogger('crawler').info('Page fetched', { pageIndex: 2, records: 50 })

    expect(consoleInfo).toHaveBeenCalledTimes(1)
    const payload: Record<string, unknown> = JSON.parse(String(consoleInfo.mock.calls[0][0]))
    expect(payload.service).toBe('crawler')
    expect(payload.level).toBe('info')
    expect(payload.message).toBe('Page fetched')
    expect(payload.pageIndex).toBe(2)
    expect(payload.records).toBe(50)
  })

  it('drops entries below the minimum level', () => {
    const consoleInfo = vi.spyOn(console, 'info').mockImplementation(() => {})
    const consoleWarn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    process.env.LOG_LEVEL = 'warn'

    const logger = createLogger('crawler')
    logger.info('hidden')
    logger.warn('shown')

    expect(consoleInfo).not.toHaveBeenCalled()
    expect(consoleWarn).toHaveBeenCalledTimes(1)
  })

  it('reads the level from LOG_LEVEL case-insensitively', () => {
    process.env.LOG_LEVEL = 'ERROR'
    expect(getLogLevel()).toBe('error')

    process.env.LOG_LEVEL = 'verbose'
    expect(getLogLevel()).toBe('info')
  })

  it('nests component names and merges context in child loggers', () => {
    const consoleInfo = vi.spyOn(console, 'info').mockImplementation(() => {})

    const logger = createLogger('processor')
      .child('export', { runId: 'run-1' })
      .child('csv')
    logger.info('Wrote file', { rows: 3 })

    const payload: Record<string, unknown> = JSON.parse(String(consoleInfo.mock.calls[0][0]))
    expect(payload.component).toBe('export:csv')
    expect(payload.runId).toBe('run-1')
    expect(payload.rows).toBe(3)
  })

  it('serializes errors passed to error()', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {})

    createLogger('crawler').error('Page failed', { pageIndex: 1 }, new TypeError('socket hang up'))

    const payload: { error: { name: string; message: string } } = JSON.parse(
      String(consoleError.mock.calls[0][0])
    )
    expect(payload.error.name).toBe('TypeError')
    expect(payload.error.message).toBe('socket hang up')
  })

  it('appends JSON lines to the configured file, including from children', () => {
    vi.spyOn(console, 'info').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const file = join(dir, 'nested', 'crawler.log')

    const logger = createLogger('crawler', { file })
    logger.info('first')
    logger.child('driver').warn('second')

    const lines = readFileSync(file, 'utf-8').trim().split('\n')
    expect(lines).toHaveLength(2)
    const first: Record<string, unknown> = JSON.parse(lines[0])
    const second: Record<string, unknown> = JSON.parse(lines[1])
    expect(first.message).toBe('first')
    expect(second.message).toBe('second')
    expect(second.component).toBe('driver')
    expect(second.level).toBe('warn')
  })
})
