import { mkdirSync } from 'node:fs'
import { join } from 'node:path'
import Database from 'better-sqlite3'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { ExportError, InputError } from '../../errors.js'
import { createRecord, createTempDir } from '../../test-utils/fixtures.js'
import { readExtensionsSqlite, writeExtensionsSqlite } from '../sqlite.js'

describe('SQLite export', () => {
  let dir: string
  let cleanup: () => void

  beforeEach(() => {
    ;({ dir, cleanup } = createTempDir('sqlite'))
  })

  afterEach(() => {
    cleanup()
  })

  it('creates the table and stores every record', () => {
    const path = join(dir, 'db', 'plugins.db')
    const records = [
      createRecord({ id: '2', name: 'Beta', tags: ['Tools'] }),
      createRecord({ id: '1', name: 'Alpha', publishedDate: null, date: null, tags: [] }),
    ]

    expect(writeExtensionsSqlite(records, path)).toBe(2)
    expect(readExtensionsSqlite(path)).toEqual([records[1], records[0]])
  })

  it('stores tags as one comma-joined column', () => {
    const path = join(dir, 'plugins.db')
    writeExtensionsSqlite([createRecord({ id: '7', tags: ['Editor', 'UI'] })], path)

    const db = new Database(path, { readonly: true })
    try {
      expect(db.prepare('SELECT tags FROM "extensions" WHERE id = ?').get('7')).toEqual({
        tags: 'Editor,UI',
      })
    } finally {
      db.close()
    }
  })

  it('updates rows in place when exported again', () => {
    const path = join(dir, 'plugins.db')
    writeExtensionsSqlite([createRecord({ id: '5', downloads: 10, rating: 3 })], path)

    writeExtensionsSqlite([createRecord({ id: '5', downloads: 25, rating: 4.5 })], path)

    const rows = readExtensionsSqlite(path)
    expect(rows).toHaveLength(1)
    expect(rows[0]).toMatchObject({ id: '5', downloads: 25, rating: 4.5 })
  })

  it('writes to a custom table', () => {
    const path = join(dir, 'plugins.db')

    writeExtensionsSqlite([createRecord({ id: '9' })], path, { table: 'plugins_2024' })

    expect(readExtensionsSqlite(path, { table: 'plugins_2024' }).map(row => row.id)).toEqual(['9'])
    expect(() => readExtensionsSqlite(path)).toThrow(InputError)
  })

  it('rejects table names that are not plain identifiers', () => {
    const path = join(dir, 'plugins.db')

    expect(() => writeExtensionsSqlite([createRecord()], path, { table: 'x"; DROP TABLE y' })).toThrow(
      ExportError
    )
  })

  it('reports an unusable database path as an ExportError', () => {
    const path = join(dir, 'is-a-directory')
    mkdirSync(path)

    expect(() => writeExtensionsSqlite([createRecord()], path)).toThrow(ExportError)
  })

  it('does not create a database when reading a missing file', () => {
    expect(() => readExtensionsSqlite(join(dir, 'absent.db'))).toThrow(InputError)
  })
})
