/**
 * Listing payload parser
 *
 * Maps one page of marketplace JSON onto ExtensionRecords. The envelope is
 * validated strictly (a mismatch fails the whole page); individual listings
 * are mapped leniently, field by field, and only a listing without an id is
 * dropped.
 */

import { z } from 'zod'
import type { ExtensionRecord, RecordParseWarning } from '../types.js'

const envelopeSchema = z.union([
  z
    .object({
      plugins: z.array(z.unknown()),
      total: z.number().int().nonnegative().optional().catch(undefined),
    })
    .passthrough(),
  z.array(z.unknown()),
])

export type ParsedListingPage = {
  records: ExtensionRecord[]
  warnings: RecordParseWarning[]
  /** Listing entries in the payload, before any were skipped */
  listingCount: number
  /** Total listing count reported upstream, when present */
  total?: number
}

export type ParseListingResult =
  | { ok: true; page: ParsedListingPage }
  | { ok: false; error: string }

export function parseListingPayload(payload: unknown): ParseListingResult {
  const envelope = envelopeSchema.safeParse(payload)
  if (!envelope.success) {
    return {
      ok: false,
      error: 'Response is neither a { plugins: [...] } object nor an array of listings',
    }
  }

  const listings = Array.isArray(envelope.data) ? envelope.data : envelope.data.plugins
  const total = Array.isArray(envelope.data) ? undefined : envelope.data.total

  const records: ExtensionRecord[] = []
  const warnings: RecordParseWarning[] = []

  listings.forEach((listing, position) => {
    const mapped = mapListing(listing, position)
    if (mapped.warning) {
      warnings.push(mapped.warning)
    }
    if (mapped.record) {
      records.push(mapped.record)
    }
  })

  return {
    ok: true,
    page: { records, warnings, listingCount: listings.length, total },
  }
}

/**
 * Whether another page should be requested after this one.
 * An empty page always ends the listing.
 */
export function computeHasMore(input: {
  listingCount: number
  offset: number
  pageSize: number
  total?: number
}): boolean {
  if (input.listingCount === 0) {
    return false
  }
  if (input.total !== undefined) {
    return input.offset + input.listingCount < input.total
  }
  return input.listingCount >= input.pageSize
}

type MappedListing = {
  record?: ExtensionRecord
  warning?: RecordParseWarning
}

export function mapListing(listing: unknown, position: number): MappedListing {
  if (!isPlainObject(listing)) {
    return { warning: { reason: 'NOT_AN_OBJECT', position, skipped: true } }
  }

  const id = toId(listing.id)
  if (id === null) {
    return {
      warning: {
        reason: 'MISSING_ID',
        position,
        skipped: true,
        details: typeof listing.name === 'string' ? `name=${listing.name}` : undefined,
      },
    }
  }

  const date = toIsoDate(listing.cdate)
  let publishedDate = toIsoDate(listing.pdate)
  let warning: RecordParseWarning | undefined

  // ISO dates compare correctly as strings
  if (date !== null && publishedDate !== null && date < publishedDate) {
    warning = {
      reason: 'DATE_ORDER',
      position,
      id,
      skipped: false,
      details: `publishedDate=${publishedDate} date=${date}`,
    }
    publishedDate = date
  }

  const record: ExtensionRecord = {
    id,
    name: toText(listing.name),
    downloads: toCount(listing.downloads),
    rating: toRating(listing.rating),
    pricing: toText(listing.pricingModel),
    vendor: toVendor(listing.vendor),
    tags: toTags(listing.tags),
    publishedDate,
    date,
  }

  return { record, warning }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Field coercion
// ═══════════════════════════════════════════════════════════════════════════════

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function toId(value: unknown): string | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : null
  }
  if (typeof value === 'string') {
    const trimmed = value.trim()
    return trimmed.length > 0 ? trimmed : null
  }
  return null
}

function toText(value: unknown): string {
  if (typeof value === 'string') return value.trim()
  if (typeof value === 'number' && Number.isFinite(value)) return String(value)
  return ''
}

function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim())
    return Number.isFinite(parsed) ? parsed : null
  }
  return null
}

function toCount(value: unknown): number {
  const parsed = toFiniteNumber(value)
  return parsed !== null && parsed > 0 ? Math.trunc(parsed) : 0
}

function toRating(value: unknown): number {
  const parsed = toFiniteNumber(value)
  return parsed !== null && parsed > 0 ? parsed : 0
}

function toVendor(value: unknown): string {
  if (isPlainObject(value)) {
    return toText(value.name)
  }
  return toText(value)
}

function toTags(value: unknown): string[] {
  if (!Array.isArray(value)) return []

  const tags: string[] = []
  for (const entry of value) {
    const text = isPlainObject(entry) ? toText(entry.name) : toText(entry)
    // Exports store tags comma-joined in one cell
    const tag = text.replace(/\s*,\s*/g, ' ').trim()
    if (tag) {
      tags.push(tag)
    }
  }
  return tags
}

const ISO_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/

/**
 * Epoch milliseconds (number or digit string) or any Date.parse-able string,
 * normalized to YYYY-MM-DD in UTC. A zero timestamp counts as missing, and so
 * does anything outside years 0000-9999.
 */
export function toIsoDate(value: unknown): string | null {
  let millis: number
  if (typeof value === 'number') {
    if (value <= 0) return null
    millis = value
  } else if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    millis = Number(value.trim())
    if (millis <= 0) return null
  } else if (typeof value === 'string' && value.trim() !== '') {
    millis = Date.parse(value.trim())
  } else {
    return null
  }

  if (!Number.isFinite(millis)) return null
  const parsed = new Date(millis)
  if (Number.isNaN(parsed.getTime())) return null
  const iso = parsed.toISOString()
  return ISO_DATE_PREFIX.test(iso) ? iso.slice(0, 10) : null
}
