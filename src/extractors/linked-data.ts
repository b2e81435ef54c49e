/**
 * Linked-data sub-parser — schema.org blocks in <script type="application/ld+json">.
 *
 * A block is one object or an array of objects. Product and VideoGame
 * entities are taken as-is; a block with an @graph contributes its matching
 * members instead.
 */

import type { JsonObject, JsonValue } from '../schema/game-record.js'
import { ParseError } from '../lib/errors.js'
import type { HtmlDocument } from './html.js'
import { scriptContents } from './html.js'
import { isJsonObject, safeJsonParse } from './json.js'

const ACCEPTED_TYPES = new Set(['product', 'videogame'])

/** "VideoGame", "schema:VideoGame" and "https://schema.org/VideoGame" all match */
function typeNames(value: JsonValue | undefined): string[] {
  const raw = Array.isArray(value) ? value : [value]
  return raw
    .filter((t): t is string => typeof t === 'string')
    .map(t => t.split(/[/:#]/).pop()?.toLowerCase() ?? '')
}

export function isProductEntity(entity: JsonObject): boolean {
  return typeNames(entity['@type']).some(t => ACCEPTED_TYPES.has(t))
}

/**
 * Every Product/VideoGame entity on the page. A malformed block is reported
 * through `onError` and skipped; the remaining blocks still count.
 */
export function parseLinkedData(
  $: HtmlDocument,
  onError: (err: ParseError) => void = () => {}
): JsonObject[] {
  const out: JsonObject[] = []

  scriptContents($, 'type', 'application/ld+json').forEach((payload, index) => {
    const parsed = safeJsonParse(payload)
    if (!parsed.ok) {
      onError(new ParseError('linked-data', `block ${index}: ${parsed.error}`))
      return
    }

    const blocks = Array.isArray(parsed.value) ? parsed.value : [parsed.value]
    for (const block of blocks) {
      if (!isJsonObject(block)) continue

      const graph = block['@graph']
      if (Array.isArray(graph)) {
        for (const member of graph) {
          if (isJsonObject(member) && isProductEntity(member)) out.push(member)
        }
      } else if (isProductEntity(block)) {
        out.push(block)
      }
    }
  })

  return out
}
