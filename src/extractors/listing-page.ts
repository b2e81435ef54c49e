/**
 * Strategy B — one seed listing page.
 *
 * Both sub-parsers always run and their items are concatenated; a parse
 * failure in one of them only costs that parser's items for this page.
 */

import type { HttpClient } from '../core/http.js'
import { ParseError, errorMessage, isRecoverable } from '../lib/errors.js'
import type { Logger } from '../lib/logger.js'
import type { JsonObject } from '../schema/game-record.js'
import { coerceLinkedData, coerceTile } from './coerce.js'
import { parseEmbeddedData } from './embedded-data.js'
import { loadHtml } from './html.js'
import { parseLinkedData } from './linked-data.js'
import type { ItemSource } from './normalize-item.js'

export interface ScrapedItem {
  source: Extract<ItemSource, 'embedded' | 'linked-data'>
  item: JsonObject
}

/** Parse an already fetched page */
export function extractListingItems(
  html: string,
  pageUrl: string,
  log: Logger,
  scriptId?: string
): ScrapedItem[] {
  const $ = loadHtml(html)
  const out: ScrapedItem[] = []

  try {
    for (const tile of parseEmbeddedData($, scriptId)) {
      out.push({ source: 'embedded', item: coerceTile(tile, pageUrl) })
    }
  } catch (err) {
    if (!(err instanceof ParseError)) throw err
    log.warn({ url: pageUrl }, err.message)
  }

  const onError = (err: ParseError) => log.warn({ url: pageUrl }, err.message)
  for (const entity of parseLinkedData($, onError)) {
    out.push({ source: 'linked-data', item: coerceLinkedData(entity, pageUrl) })
  }

  return out
}

/** Fetch and parse one seed page; a failed fetch yields no items */
export async function scrapeListingPage(
  http: HttpClient,
  pageUrl: string,
  log: Logger,
  scriptId?: string
): Promise<ScrapedItem[]> {
  let html: string
  try {
    html = await http.getText(pageUrl, { Accept: 'text/html' })
  } catch (err) {
    if (!isRecoverable(err)) throw err
    log.warn({ url: pageUrl }, `listing page skipped: ${errorMessage(err)}`)
    return []
  }

  const items = extractListingItems(html, pageUrl, log, scriptId)
  log.debug({ url: pageUrl, count: items.length }, 'listing page parsed')
  return items
}
