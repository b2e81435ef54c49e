/**
 * Strategy A — paginated JSON search API.
 *
 * For each query token the API is paged with a fixed page size until the stop
 * policy says the last page was reached. A failed page ends that query only.
 */

import type { HttpClient } from '../core/http.js'
import { sleep } from '../core/sleep.js'
import { errorMessage, isRecoverable } from '../lib/errors.js'
import type { Logger } from '../lib/logger.js'
import type { JsonObject, JsonValue } from '../schema/game-record.js'
import type { AdapterConfig } from '../schema/store-profile.js'
import { fillTemplate } from '../schema/store-profile.js'
import { firstList, firstObject, isJsonObject } from './json.js'

export interface PageStopContext {
  query: string
  pageIndex: number
  /** Items in the page before any filtering */
  rawCount: number
  pageSize: number
}

/** Returns true when no further page should be requested */
export type PageStopPolicy = (page: PageStopContext) => boolean

/**
 * A page shorter than the page size is taken as the last one. This is an
 * approximation: an API that caps pages below `count` stops early (missed
 * data, never wrong data); duplicates across pages are removed later.
 */
export const shortPageStop: PageStopPolicy = ({ rawCount, pageSize }) => rawCount < pageSize

const CONTAINER_KEYS = ['products', 'items', 'results'] as const

export interface SearchApiOptions {
  /** URL template with {query} {count} {country} {locale} {page} */
  template: string
  queries: readonly string[]
  pageSize: number
  config: AdapterConfig
  /** false: only page 0 is requested per query */
  paginate: boolean
  stopPolicy?: PageStopPolicy
  /** Hard cap per query, for APIs that ignore the page parameter */
  maxPages?: number
  pageDelayMs?: number
  queryDelayMs?: number
}

export interface SearchApiPage {
  url: string
  items: JsonObject[]
}

/** Locate the item array in an API response: top level first, then under `data` */
export function extractApiItems(body: JsonValue): JsonValue[] {
  if (!isJsonObject(body)) return []
  const top = firstList(body, CONTAINER_KEYS, { nonEmpty: true })
  if (top) return top
  const data = firstObject(body, ['data'])
  return (data && firstList(data, CONTAINER_KEYS, { nonEmpty: true })) ?? []
}

export async function* paginateSearchApi(
  http: HttpClient,
  log: Logger,
  options: SearchApiOptions
): AsyncGenerator<SearchApiPage> {
  const {
    template,
    queries,
    pageSize,
    config,
    paginate,
    stopPolicy = shortPageStop,
    maxPages = 500,
    pageDelayMs = 50,
    queryDelayMs = 100,
  } = options

  for (const [queryIndex, query] of queries.entries()) {
    if (queryIndex > 0) await sleep(queryDelayMs, http.signal)

    for (let pageIndex = 0; pageIndex < maxPages; pageIndex++) {
      if (pageIndex > 0) await sleep(pageDelayMs, http.signal)

      const url = fillTemplate(template, {
        query,
        count: pageSize,
        country: config.country,
        locale: config.locale,
        page: pageIndex,
      })

      let body: JsonValue
      try {
        body = await http.getJson(url)
      } catch (err) {
        if (!isRecoverable(err)) throw err
        log.warn({ url, query, page: pageIndex }, `search page skipped: ${errorMessage(err)}`)
        break
      }

      const raw = extractApiItems(body)
      log.debug({ query, page: pageIndex, count: raw.length }, 'search page fetched')
      yield { url, items: raw.filter(isJsonObject) }

      if (!paginate || stopPolicy({ query, pageIndex, rawCount: raw.length, pageSize })) break
    }
  }
}
