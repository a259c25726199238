import { existsSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createMockLogger, createRecord, createTempDir, loggedEvents } from '../../test-utils/fixtures.js'
import { readExtensionsCsv } from '../csv.js'
import { exportRecords } from '../index.js'
import { readExtensionsSqlite } from '../sqlite.js'

describe('exportRecords', () => {
  let dir: string
  let cleanup: () => void

  beforeEach(() => {
    ;({ dir, cleanup } = createTempDir('export'))
  })

  afterEach(() => {
    cleanup()
  })

  it('writes both targets with the same records', async () => {
    const logger = createMockLogger()
    const records = [createRecord({ id: '1' }), createRecord({ id: '2', name: 'Second' })]
    const targets = { csvPath: join(dir, 'plugins.csv'), sqlitePath: join(dir, 'plugins.db') }

    const summary = await exportRecords(records, targets, logger)

    expect(summary).toEqual({
      csv: { ok: true, path: targets.csvPath, rows: 2 },
      sqlite: { ok: true, path: targets.sqlitePath, rows: 2 },
      ok: true,
    })
    expect(await readExtensionsCsv(targets.csvPath)).toEqual(records)
    expect(readExtensionsSqlite(targets.sqlitePath)).toEqual(records)
    expect(loggedEvents(logger.info)).toEqual(['EXPORT_CSV_OK', 'EXPORT_SQLITE_OK'])
  })

  it('still writes SQLite when the CSV target fails', async () => {
    const logger = createMockLogger()
    writeFileSync(join(dir, 'blocker'), '')
    const targets = {
      csvPath: join(dir, 'blocker', 'plugins.csv'),
      sqlitePath: join(dir, 'plugins.db'),
    }

    const summary = await exportRecords([createRecord()], targets, logger)

    expect(summary.ok).toBe(false)
    expect(summary.csv.ok).toBe(false)
    expect(summary.sqlite).toEqual({ ok: true, path: targets.sqlitePath, rows: 1 })
    expect(existsSync(targets.sqlitePath)).toBe(true)
    expect(loggedEvents(logger.error)).toEqual(['EXPORT_CSV_FAILED'])
  })

  it('still writes CSV when the SQLite target fails', async () => {
    const logger = createMockLogger()
    const targets = {
      csvPath: join(dir, 'plugins.csv'),
      sqlitePath: join(dir, 'plugins.db'),
      table: 'bad-name',
    }

    const summary = await exportRecords([createRecord()], targets, logger)

    expect(summary.ok).toBe(false)
    expect(summary.csv).toEqual({ ok: true, path: targets.csvPath, rows: 1 })
    expect(summary.sqlite.ok).toBe(false)
    expect(loggedEvents(logger.error)).toEqual(['EXPORT_SQLITE_FAILED'])
  })
})
