/**
 * SQLite export
 *
 * One table with the CSV columns and `id` as primary key. Records are
 * upserted in a single transaction, so re-running an export updates rows
 * in place instead of duplicating them.
 */

import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import Database from 'better-sqlite3'
import { z } from 'zod'
import { TABLE_NAME_PATTERN } from '../config/settings.js'
import { ExportError, InputError } from '../errors.js'
import { EXTENSION_FIELDS, type ExtensionRecord } from '../marketplace/types.js'
import { joinTags, splitTags } from './csv.js'

export const DEFAULT_TABLE = 'extensions'

export interface SqliteExportOptions {
  table?: string
}

function assertTableName(table: string): void {
  if (!TABLE_NAME_PATTERN.test(table)) {
    throw new Error(`Invalid table name: ${table}`)
  }
}

function createTableSql(table: string): string {
  return `CREATE TABLE IF NOT EXISTS "${table}" (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    downloads INTEGER NOT NULL,
    rating REAL NOT NULL,
    pricing TEXT NOT NULL,
    vendor TEXT NOT NULL,
    tags TEXT NOT NULL,
    publishedDate TEXT,
    date TEXT
  )`
}

function upsertSql(table: string): string {
  const columns = EXTENSION_FIELDS.join(', ')
  const params = EXTENSION_FIELDS.map(field => `@${field}`).join(', ')
  const updates = EXTENSION_FIELDS.filter(field => field !== 'id')
    .map(field => `${field} = excluded.${field}`)
    .join(', ')
  return `INSERT INTO "${table}" (${columns}) VALUES (${params}) ON CONFLICT(id) DO UPDATE SET ${updates}`
}

/**
 * Upsert records into `path`. Returns the number of records written.
 */
export function writeExtensionsSqlite(
  records: readonly ExtensionRecord[],
  path: string,
  options: SqliteExportOptions = {}
): number {
  const table = options.table ?? DEFAULT_TABLE
  let db: Database.Database | undefined

  try {
    assertTableName(table)
    mkdirSync(dirname(path), { recursive: true })
    db = new Database(path)
    db.exec(createTableSql(table))

    const upsert = db.prepare(upsertSql(table))
    const upsertAll = db.transaction((batch: readonly ExtensionRecord[]) => {
      for (const record of batch) {
        upsert.run({ ...record, tags: joinTags(record.tags) })
      }
    })
    upsertAll(records)
    return records.length
  } catch (error) {
    throw new ExportError('sqlite', path, error)
  } finally {
    db?.close()
  }
}

const rowSchema = z.object({
  id: z.string(),
  name: z.string(),
  downloads: z.number(),
  rating: z.number(),
  pricing: z.string(),
  vendor: z.string(),
  tags: z.string(),
  publishedDate: z.string().nullable(),
  date: z.string().nullable(),
})

/**
 * Read every row of the export table, ordered by id.
 */
export function readExtensionsSqlite(
  path: string,
  options: SqliteExportOptions = {}
): ExtensionRecord[] {
  const table = options.table ?? DEFAULT_TABLE
  let db: Database.Database | undefined

  try {
    assertTableName(table)
    db = new Database(path, { readonly: true, fileMustExist: true })
    const rows = z.array(rowSchema).parse(db.prepare(`SELECT * FROM "${table}" ORDER BY id`).all())
    return rows.map(row => ({ ...row, tags: splitTags(row.tags) }))
  } catch (error) {
    throw new InputError(path, error instanceof Error ? error.message : String(error), error)
  } finally {
    db?.close()
  }
}
