import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { MarketplaceSettings } from '../../../config/settings.js'
import { FatalFetchError, TransientFetchError } from '../../../errors.js'
import { HttpFetcher } from '../http-fetcher.js'
import { MarketplacePageFetcher, buildPageUrl } from '../page-fetcher.js'

const settings: MarketplaceSettings = {
  endpoint: 'https://marketplace.test/api/searchPlugins',
  pageSize: 50,
  orderBy: 'downloads',
  products: ['idea', 'go'],
  excludeTags: ['internal'],
  headers: { accept: 'application/json' },
  timeoutMs: 2500,
}

describe('buildPageUrl', () => {
  it('encodes paging and repeats product filters', () => {
    expect(buildPageUrl(settings, 2)).toBe(
      'https://marketplace.test/api/searchPlugins?excludeTags=internal&max=50&offset=100&orderBy=downloads&products=idea&products=go'
    )
  })

  it('starts at offset zero', () => {
    expect(new URL(buildPageUrl(settings, 0)).searchParams.get('offset')).toBe('0')
  })
})

describe('MarketplacePageFetcher', () => {
  let http: HttpFetcher

  beforeEach(() => {
    http = new HttpFetcher()
  })

  it('requests the page URL with configured headers and timeout', async () => {
    const fetchJson = vi.spyOn(http, 'fetchJson').mockResolvedValue({
      statusCode: 200,
      body: { plugins: [] },
      durationMs: 3,
    })

    await new MarketplacePageFetcher(settings, http).fetchPage(1)

    expect(fetchJson).toHaveBeenCalledWith(buildPageUrl(settings, 1), {
      headers: { accept: 'application/json' },
      timeoutMs: 2500,
    })
  })

  it('maps listings and keeps the raw payload for archiving', async () => {
    const body = {
      plugins: [
        { id: 11, name: 'Alpha', downloads: 10 },
        { name: 'No id' },
        { id: 12, name: 'Beta', downloads: 5 },
      ],
      total: 103,
    }
    vi.spyOn(http, 'fetchJson').mockResolvedValue({ statusCode: 200, body, durationMs: 1 })

    const page = await new MarketplacePageFetcher(settings, http).fetchPage(1)

    expect(page.pageIndex).toBe(1)
    expect(page.records.map(record => record.name)).toEqual(['Alpha', 'Beta'])
    expect(page.warnings).toEqual([
      { reason: 'MISSING_ID', position: 1, skipped: true, details: 'name=No id' },
    ])
    // offset 50 + 3 listings < 103
    expect(page.hasMore).toBe(true)
    expect(page.raw).toBe(body)
  })

  it('reports no more pages once the total is reached', async () => {
    vi.spyOn(http, 'fetchJson').mockResolvedValue({
      statusCode: 200,
      body: { plugins: [{ id: 1 }, { id: 2 }, { id: 3 }], total: 103 },
      durationMs: 1,
    })

    const page = await new MarketplacePageFetcher(settings, http).fetchPage(2)

    expect(page.hasMore).toBe(false)
  })

  it('throws a fatal error for an unexpected payload shape', async () => {
    vi.spyOn(http, 'fetchJson').mockResolvedValue({
      statusCode: 200,
      body: { message: 'unexpected' },
      durationMs: 1,
    })

    const error = await new MarketplacePageFetcher(settings, http)
      .fetchPage(0)
      .catch((err: unknown) => err)

    expect(error).toBeInstanceOf(FatalFetchError)
    expect(error).toMatchObject({ statusCode: 200, url: buildPageUrl(settings, 0) })
  })

  it('lets transport errors through unchanged', async () => {
    const transient = new TransientFetchError('HTTP 502: Bad Gateway', { statusCode: 502 })
    vi.spyOn(http, 'fetchJson').mockRejectedValue(transient)

    await expect(new MarketplacePageFetcher(settings, http).fetchPage(0)).rejects.toBe(transient)
  })
})
