/**
 * Crawl snapshot I/O
 *
 * The snapshot is the hand-off between `crawl` and `process`. `process` also
 * accepts a directory of archived page payloads, which are re-parsed with the
 * listing parser.
 */

import { readFile, readdir, stat } from 'node:fs/promises'
import { join } from 'node:path'
import { z } from 'zod'
import { ExportError, InputError } from '../../errors.js'
import { writeJsonFile } from '../../utils/files.js'
import { parseListingPayload } from '../parse/listing.js'
import type { CrawlResult, ExtensionRecord, RecordParseWarning } from '../types.js'
import { PAGE_FILE_PATTERN } from './page-archive.js'

export const SNAPSHOT_VERSION = 1

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/).nullable()

export const extensionRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  downloads: z.number().int().nonnegative(),
  rating: z.number().nonnegative(),
  pricing: z.string(),
  vendor: z.string(),
  tags: z.array(z.string()),
  publishedDate: isoDate,
  date: isoDate,
})

const snapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  pagesFetched: z.number().int().nonnegative(),
  stopReason: z.string(),
  records: z.array(extensionRecordSchema),
})

export interface CrawlInput {
  source: 'snapshot' | 'pages'
  records: ExtensionRecord[]
  /** Page files read; 1 for a snapshot */
  files: number
  warnings: RecordParseWarning[]
}

export async function writeCrawlSnapshot(result: CrawlResult, path: string): Promise<void> {
  try {
    await writeJsonFile(path, { version: SNAPSHOT_VERSION, ...result })
  } catch (error) {
    throw new ExportError('snapshot', path, error)
  }
}

export async function readCrawlInput(path: string): Promise<CrawlInput> {
  let isDirectory: boolean
  try {
    isDirectory = (await stat(path)).isDirectory()
  } catch (error) {
    throw new InputError(path, 'not found or unreadable', error)
  }

  return isDirectory ? readPagesDirectory(path) : readSnapshotFile(path)
}

async function readJson(path: string): Promise<unknown> {
  let text: string
  try {
    text = await readFile(path, 'utf-8')
  } catch (error) {
    throw new InputError(path, 'unreadable', error)
  }

  try {
    return JSON.parse(text)
  } catch (error) {
    throw new InputError(path, 'not valid JSON', error)
  }
}

async function readSnapshotFile(path: string): Promise<CrawlInput> {
  const parsed = snapshotSchema.safeParse(await readJson(path))
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new InputError(path, `${issue.path.join('.') || '(root)'}: ${issue.message}`)
  }

  return {
    source: 'snapshot',
    records: parsed.data.records,
    files: 1,
    warnings: [],
  }
}

async function readPagesDirectory(dir: string): Promise<CrawlInput> {
  let entries: string[]
  try {
    entries = await readdir(dir)
  } catch (error) {
    throw new InputError(dir, 'directory unreadable', error)
  }

  const pageFiles = entries
    .map(name => ({ name, match: PAGE_FILE_PATTERN.exec(name) }))
    .filter((entry): entry is { name: string; match: RegExpExecArray } => entry.match !== null)
    .map(entry => ({ name: entry.name, page: Number.parseInt(entry.match[1], 10) }))
    .sort((a, b) => a.page - b.page)

  if (pageFiles.length === 0) {
    throw new InputError(dir, 'no page_<n>.json files found')
  }

  const records: ExtensionRecord[] = []
  const warnings: RecordParseWarning[] = []
  for (const file of pageFiles) {
    const filePath = join(dir, file.name)
    const parsed = parseListingPayload(await readJson(filePath))
    if (!parsed.ok) {
      throw new InputError(filePath, parsed.error)
    }
    records.push(...parsed.page.records)
    warnings.push(...parsed.page.warnings)
  }

  return {
    source: 'pages',
    records,
    files: pageFiles.length,
    warnings,
  }
}
