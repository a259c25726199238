import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { vi } from 'vitest'
import type { ExtensionRecord, PageResult } from '../marketplace/types.js'

export function createMockLogger() {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  }
  logger.child.mockReturnValue(logger)
  return logger
}

export type MockLogger = ReturnType<typeof createMockLogger>

/** Event names passed as the first argument of a mocked log method */
export function loggedEvents(method: MockLogger['info']): string[] {
  return method.mock.calls.map(call => String(call[0]))
}

export const createRecord = (overrides: Partial<ExtensionRecord> = {}): ExtensionRecord => ({
  id: '1001',
  name: 'Sample Plugin',
  downloads: 1500,
  rating: 4.2,
  pricing: 'FREE',
  vendor: 'Sample Vendor',
  tags: ['Editor', 'Tools'],
  publishedDate: '2021-02-03',
  date: '2024-05-06',
  ...overrides,
})

/**
 * A page of `count` generated records whose ids encode page and position.
 */
export function createPage(pageIndex: number, count: number, hasMore: boolean): PageResult {
  const records = Array.from({ length: count }, (_, position) =>
    createRecord({ id: `${pageIndex}-${position}`, name: `Plugin ${pageIndex}-${position}` })
  )
  return {
    pageIndex,
    records,
    hasMore,
    warnings: [],
    raw: {
      plugins: records.map(record => ({
        id: record.id,
        name: record.name,
        downloads: record.downloads,
        rating: record.rating,
        pricingModel: record.pricing,
        vendor: { name: record.vendor },
        tags: record.tags,
        pdate: record.publishedDate,
        cdate: record.date,
      })),
    },
  }
}

export function createTempDir(prefix: string): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), `plugindex-${prefix}-`))
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) }
}
