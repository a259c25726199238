import { describe, expect, it } from 'vitest'
import { ConfigError } from '../../errors.js'
import { DEFAULT_MARKETPLACE_URL, loadHarvesterConfig } from '../settings.js'

describe('loadHarvesterConfig', () => {
  it('uses defaults for an empty environment', () => {
    const config = loadHarvesterConfig({})

    expect(config.marketplace).toMatchObject({
      endpoint: DEFAULT_MARKETPLACE_URL,
      pageSize: 100,
      orderBy: 'downloads',
      excludeTags: ['internal'],
      timeoutMs: 30000,
    })
    expect(config.marketplace.products).toHaveLength(19)
    expect(config.marketplace.products).toContain('idea')
    expect(config.marketplace.headers['user-agent']).toMatch(/^Mozilla\/5\.0/)
    expect(config.crawl).toEqual({
      maxPages: 100,
      retry: { maxAttempts: 3, initialDelayMs: 1000, maxDelayMs: 30000, backoffMultiplier: 2 },
    })
    expect(config.output).toEqual({
      snapshotPath: 'data/crawl.json',
      pagesDir: 'data/pages',
      csvPath: 'plugins.csv',
      sqlitePath: 'plugins.db',
      table: 'extensions',
    })
    expect(config.logDir).toBe('logs')
  })

  it('reads overrides and splits list variables', () => {
    const config = loadHarvesterConfig({
      MARKETPLACE_URL: 'https://marketplace.test/api/searchPlugins',
      MARKETPLACE_PAGE_SIZE: '25',
      MARKETPLACE_PRODUCTS: ' idea, go ,,',
      MARKETPLACE_EXCLUDE_TAGS: '',
      MARKETPLACE_USER_AGENT: 'test-agent',
      CRAWL_RETRY_FACTOR: '1.5',
      OUTPUT_TABLE: 'plugins_2024',
    })

    expect(config.marketplace.endpoint).toBe('https://marketplace.test/api/searchPlugins')
    expect(config.marketplace.pageSize).toBe(25)
    expect(config.marketplace.products).toEqual(['idea', 'go'])
    expect(config.marketplace.excludeTags).toEqual(['internal'])
    expect(config.marketplace.headers['user-agent']).toBe('test-agent')
    expect(config.crawl.retry.backoffMultiplier).toBe(1.5)
    expect(config.output.table).toBe('plugins_2024')
  })

  it('treats blank variables as unset', () => {
    const config = loadHarvesterConfig({ MARKETPLACE_PAGE_SIZE: '', LOG_DIR: '' })

    expect(config.marketplace.pageSize).toBe(100)
    expect(config.logDir).toBe('logs')
  })

  it('reports every invalid variable at once', () => {
    let caught: unknown
    try {
      loadHarvesterConfig({ MARKETPLACE_PAGE_SIZE: 'abc', OUTPUT_TABLE: 'bad-name' })
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(ConfigError)
    const issues = caught instanceof ConfigError ? caught.issues : []
    expect(issues).toHaveLength(2)
    expect(issues[0]).toMatch(/^MARKETPLACE_PAGE_SIZE: /)
    expect(issues[1]).toBe('OUTPUT_TABLE: must be a plain SQL identifier')
  })

  it('rejects out-of-range numbers and malformed URLs', () => {
    expect(() => loadHarvesterConfig({ MARKETPLACE_PAGE_SIZE: '0' })).toThrow(ConfigError)
    expect(() => loadHarvesterConfig({ CRAWL_RETRY_ATTEMPTS: '2.5' })).toThrow(ConfigError)
    expect(() => loadHarvesterConfig({ MARKETPLACE_URL: 'not a url' })).toThrow(ConfigError)
  })
})
