import type { MarketplaceSettings } from '../../config/settings.js'
import { FatalFetchError } from '../../errors.js'
import { computeHasMore, parseListingPayload } from '../parse/listing.js'
import type { PageFetcher, PageResult } from '../types.js'
import { HttpFetcher } from './http-fetcher.js'

/**
 * Build the listing URL for a zero-based page index.
 * Products and excluded tags are sent as repeated query keys.
 */
export function buildPageUrl(settings: MarketplaceSettings, pageIndex: number): string {
  const url = new URL(settings.endpoint)
  for (const tag of settings.excludeTags) {
    url.searchParams.append('excludeTags', tag)
  }
  url.searchParams.set('max', String(settings.pageSize))
  url.searchParams.set('offset', String(pageIndex * settings.pageSize))
  url.searchParams.set('orderBy', settings.orderBy)
  for (const product of settings.products) {
    url.searchParams.append('products', product)
  }
  return url.toString()
}

/**
 * Fetches listing pages from the marketplace search endpoint.
 */
export class MarketplacePageFetcher implements PageFetcher {
  private readonly settings: MarketplaceSettings
  private readonly http: HttpFetcher

  constructor(settings: MarketplaceSettings, http: HttpFetcher = new HttpFetcher()) {
    this.settings = settings
    this.http = http
  }

  async fetchPage(pageIndex: number): Promise<PageResult> {
    const url = buildPageUrl(this.settings, pageIndex)
    const response = await this.http.fetchJson(url, {
      headers: this.settings.headers,
      timeoutMs: this.settings.timeoutMs,
    })

    const parsed = parseListingPayload(response.body)
    if (!parsed.ok) {
      throw new FatalFetchError(parsed.error, { url, statusCode: response.statusCode })
    }

    const { page } = parsed
    return {
      pageIndex,
      records: page.records,
      hasMore: computeHasMore({
        listingCount: page.listingCount,
        offset: pageIndex * this.settings.pageSize,
        pageSize: this.settings.pageSize,
        total: page.total,
      }),
      warnings: page.warnings,
      raw: response.body,
    }
  }
}
