/**
 * Embedded-data sub-parser.
 *
 * Listing pages built on Next.js ship their whole page state as JSON inside
 * <script id="__NEXT_DATA__">. Product modules can sit anywhere in that tree,
 * and one page often nests several of them, so the walk collects every list
 * under a product-ish key at any depth instead of stopping at the first.
 */

import type { JsonObject, JsonValue } from '../schema/game-record.js'
import { ParseError } from '../lib/errors.js'
import type { HtmlDocument } from './html.js'
import { scriptContents } from './html.js'
import { isJsonObject, safeJsonParse } from './json.js'

export const LISTING_KEYS = ['products', 'items', 'results', 'tiles'] as const

/**
 * Collect candidate items from the embedded payload, in document order.
 * Returns [] when the page has no such script; throws ParseError when the
 * payload is not valid JSON.
 */
export function parseEmbeddedData($: HtmlDocument, scriptId = '__NEXT_DATA__'): JsonObject[] {
  const [payload] = scriptContents($, 'id', scriptId)
  if (payload === undefined) return []

  const parsed = safeJsonParse(payload)
  if (!parsed.ok) {
    throw new ParseError('embedded', `#${scriptId}: ${parsed.error}`)
  }
  return collectListingItems(parsed.value)
}

/**
 * Depth-first walk over objects and arrays with an explicit stack, so deeply
 * nested payloads cannot overflow the call stack.
 */
export function collectListingItems(root: JsonValue): JsonObject[] {
  const found: JsonObject[] = []
  const stack: JsonValue[] = [root]

  while (stack.length > 0) {
    const node = stack.pop()
    if (node === undefined || node === null || typeof node !== 'object') continue

    const children: JsonValue[] = Array.isArray(node) ? node : Object.values(node)

    if (isJsonObject(node)) {
      for (const key of LISTING_KEYS) {
        const list = node[key]
        if (!Array.isArray(list)) continue
        for (const entry of list) {
          if (isJsonObject(entry)) found.push(entry)
        }
      }
    }

    // Reverse so the first child is visited first
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i])
    }
  }

  return found
}
