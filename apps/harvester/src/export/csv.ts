/**
 * CSV export
 *
 * One header row with the nine record fields, then one row per record.
 * Tags are joined with commas inside a single cell (the listing parser never
 * lets a comma into a tag name); missing dates are empty cells. The target is
 * replaced atomically.
 */

import { readFile } from 'node:fs/promises'
import { parse } from 'csv-parse/sync'
import { stringify } from 'csv-stringify/sync'
import { z } from 'zod'
import { ExportError, InputError } from '../errors.js'
import { EXTENSION_FIELDS, type ExtensionRecord } from '../marketplace/types.js'
import { writeFileAtomic } from '../utils/files.js'

export const TAG_SEPARATOR = ','

export function joinTags(tags: readonly string[]): string {
  return tags.join(TAG_SEPARATOR)
}

export function splitTags(cell: string): string[] {
  return cell
    .split(TAG_SEPARATOR)
    .map(tag => tag.trim())
    .filter(tag => tag.length > 0)
}

function toRow(record: ExtensionRecord): Array<string | number> {
  return [
    record.id,
    record.name,
    record.downloads,
    record.rating,
    record.pricing,
    record.vendor,
    joinTags(record.tags),
    record.publishedDate ?? '',
    record.date ?? '',
  ]
}

export function formatExtensionsCsv(records: readonly ExtensionRecord[]): string {
  return stringify([[...EXTENSION_FIELDS], ...records.map(toRow)])
}

/**
 * Write records to `path`, replacing any existing file.
 * Returns the number of data rows written.
 */
export async function writeExtensionsCsv(
  records: readonly ExtensionRecord[],
  path: string
): Promise<number> {
  try {
    await writeFileAtomic(path, formatExtensionsCsv(records))
  } catch (error) {
    throw new ExportError('csv', path, error)
  }
  return records.length
}

const csvRowsSchema = z.array(z.array(z.string()))

function toNumber(cell: string): number {
  const value = Number(cell)
  return cell.trim() !== '' && Number.isFinite(value) ? value : 0
}

/**
 * Read a file produced by writeExtensionsCsv back into records.
 */
export async function readExtensionsCsv(path: string): Promise<ExtensionRecord[]> {
  let text: string
  try {
    text = await readFile(path, 'utf-8')
  } catch (error) {
    throw new InputError(path, 'unreadable', error)
  }

  let rows: string[][]
  try {
    rows = csvRowsSchema.parse(parse(text, { skip_empty_lines: true }))
  } catch (error) {
    throw new InputError(path, 'not valid CSV', error)
  }

  const [header, ...body] = rows
  if (!header || header.join(',') !== EXTENSION_FIELDS.join(',')) {
    throw new InputError(path, `expected header ${EXTENSION_FIELDS.join(',')}`)
  }

  return body.map(cells => {
    const [id, name, downloads, rating, pricing, vendor, tags, publishedDate, date] = cells
    return {
      id,
      name,
      downloads: toNumber(downloads),
      rating: toNumber(rating),
      pricing,
      vendor,
      tags: splitTags(tags),
      publishedDate: publishedDate || null,
      date: date || null,
    }
  })
}
