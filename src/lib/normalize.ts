/**
 * Title, price and platform normalization for storefront listings.
 * Pure string helpers shared by the record schema, the item normalizer and
 * the dedup clustering.
 */

const MARKUP_RX = /<[^>]+>/g
const MARK_RX = /[™®©]/g
const EDITION_RX =
  /\b(deluxe|definitive|gold|ultimate|goty|complete|remastered|hd|bundle|collection|director['’]?s cut|edition)\b/gi

/** Characters trimmed from both ends once edition words are gone */
const EDGE_RX = /^[\s\-–—:]+|[\s\-–—:]+$/g

/** Strip markup and trademark glyphs, collapse whitespace */
export function cleanTitle(name: string | null | undefined): string {
  return (name ?? '')
    .replace(MARKUP_RX, '')
    .replace(MARK_RX, '')
    .replace(/\s+/g, ' ')
    .trim()
}

/**
 * Remove edition/bundle noise ("Deluxe Edition", "GOTY", "Director's Cut").
 * Falls back to the cleaned title when nothing would be left.
 */
export function stripEditionNoise(name: string | null | undefined): string {
  const cleaned = cleanTitle(name)
  const stripped = cleaned
    .replace(EDITION_RX, '')
    .replace(/\s+/g, ' ')
    .replace(EDGE_RX, '')
  return stripped || cleaned
}

/**
 * Format a price for display.
 * A flag ("Free", "Announced", …) always wins; USD renders as "$19.99",
 * anything else as "EUR 19.99".
 */
export function priceToString(
  amount: number | null | undefined,
  currency: string | null | undefined,
  flag?: string | null
): string {
  const label = flag?.trim()
  if (label) return label
  if (amount == null || !Number.isFinite(amount) || !currency?.trim()) return 'Unavailable'
  const code = currency.trim().toUpperCase()
  const symbol = code === 'USD' ? '$' : `${code} `
  return `${symbol}${amount.toFixed(2)}`
}

/** Parse a numeric amount out of a number or a loosely formatted string */
export function parseAmount(raw: unknown): number | null {
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null
  if (typeof raw !== 'string') return null
  const cleaned = raw.replace(/[^\d.,-]/g, '').replace(/,/g, '')
  if (!cleaned) return null
  const num = parseFloat(cleaned)
  return Number.isNaN(num) ? null : num
}

/** Stringify, trim, drop empties and case-insensitive duplicates (first one wins) */
export function dedupePlatforms(platforms: ReadonlyArray<string | number> | null | undefined): string[] {
  const seen = new Set<string>()
  const out: string[] = []
  for (const raw of platforms ?? []) {
    const p = String(raw).trim()
    const key = p.toLowerCase()
    if (!p || seen.has(key)) continue
    seen.add(key)
    out.push(p)
  }
  return out
}

/** Output bucket for a title: its lower-cased first letter, or "_" */
export function letterBucket(name: string): string {
  const ch = name.trim().charAt(0).toLowerCase()
  return ch >= 'a' && ch <= 'z' ? ch : '_'
}
