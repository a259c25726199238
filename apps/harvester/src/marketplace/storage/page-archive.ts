import { readdir, rm } from 'node:fs/promises'
import { join } from 'node:path'
import { writeJsonFile } from '../../utils/files.js'
import type { PageHook } from '../types.js'

export const PAGE_FILE_PATTERN = /^page_(\d+)\.json$/

/**
 * Archive file name for a zero-based page index (files are numbered from 1).
 */
export function pageFileName(pageIndex: number): string {
  return `page_${pageIndex + 1}.json`
}

function isMissingPath(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Remove page files left by an earlier crawl. Other files in the directory
 * are kept. Returns the number of files removed.
 */
export async function clearPageArchive(dir: string): Promise<number> {
  let entries: string[]
  try {
    entries = await readdir(dir)
  } catch (error) {
    if (isMissingPath(error)) return 0
    throw error
  }

  const stale = entries.filter(name => PAGE_FILE_PATTERN.test(name))
  await Promise.all(stale.map(name => rm(join(dir, name), { force: true })))
  return stale.length
}

/**
 * Page hook that stores each raw page payload as soon as it arrives, so an
 * interrupted crawl still leaves every fetched page on disk.
 *
 * The directory only ever holds one crawl: pages from a previous run are
 * removed right before the first page of this run is written. A crawl that
 * fetches nothing leaves the previous archive untouched.
 */
export function createPageArchive(dir: string): PageHook {
  let cleared = false

  return async page => {
    if (!cleared) {
      await clearPageArchive(dir)
      cleared = true
    }
    await writeJsonFile(join(dir, pageFileName(page.pageIndex)), page.raw)
  }
}
