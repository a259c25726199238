import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { main } from '../main.js'

describe('main', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('prints help without a command', async () => {
    expect(await main([], {})).toBe(0)
    expect(await main(['crawl', '--help'], {})).toBe(0)
  })

  it('rejects unknown commands', async () => {
    expect(await main(['export'], {})).toBe(2)
    expect(console.error).toHaveBeenCalledWith('Unknown command: export')
  })

  it('rejects an invalid page limit', async () => {
    expect(await main(['crawl', '--max-pages', '0'], {})).toBe(2)
    expect(console.error).toHaveBeenCalledWith('--max-pages expects a positive integer')
  })

  it('rejects unknown flags and value flags without a value', async () => {
    expect(await main(['crawl', '--csv', 'plugins.csv'], {})).toBe(2)
    expect(console.error).toHaveBeenCalledWith('Unknown flag: --csv')

    expect(await main(['crawl', '--output'], {})).toBe(2)
    expect(console.error).toHaveBeenCalledWith('--output expects a value')
  })

  it('rejects a table name that is not an identifier', async () => {
    expect(await main(['process', '--table', 'bad-name'], {})).toBe(2)
    expect(console.error).toHaveBeenCalledWith('--table expects a plain SQL identifier')
  })

  it('rejects invalid environment configuration', async () => {
    expect(await main(['process'], { OUTPUT_TABLE: 'bad-name' })).toBe(2)
    expect(console.error).toHaveBeenCalledWith(
      'Invalid configuration: OUTPUT_TABLE: must be a plain SQL identifier'
    )
  })
})
