/**
 * Generic storefront adapter.
 *
 * Every store is this adapter plus a StoreProfile: Strategy A runs when the
 * profile has a search API template, Strategy B over its seed pages, and both
 * feed the same normalizer. Nothing here is shared between instances except
 * the DomainLimiter passed in.
 */

import { HttpClient } from '../core/http.js'
import type { DomainLimiter } from '../core/rate-limiter.js'
import { sleep } from '../core/sleep.js'
import { config as appConfig } from '../lib/config.js'
import { ValidationError } from '../lib/errors.js'
import { logger, type Logger } from '../lib/logger.js'
import type { CanonicalRecord, JsonObject } from '../schema/game-record.js'
import type { AdapterConfig, Capabilities, StoreProfile } from '../schema/store-profile.js'
import { buildEndpoints } from '../schema/store-profile.js'
import { scrapeListingPage } from '../extractors/listing-page.js'
import { normalizeItem, type NormalizeContext } from '../extractors/normalize-item.js'
import { paginateSearchApi, type PageStopPolicy } from '../extractors/search-api.js'
import type { StoreAdapter } from './types.js'

export interface ListingAdapterDeps {
  limiter: DomainLimiter
  log?: Logger
  /** Run-level cancellation */
  signal?: AbortSignal
  timeoutMs?: number
  maxRetries?: number
  userAgent?: string
  /** Replaces the short-page heuristic for the search API */
  stopPolicy?: PageStopPolicy
  seedPageDelayMs?: number
  pageDelayMs?: number
  queryDelayMs?: number
}

export function createListingAdapter(
  profile: StoreProfile,
  config: AdapterConfig,
  deps: ListingAdapterDeps
): StoreAdapter {
  const endpoints = buildEndpoints(profile, config)
  const capabilities: Capabilities = Object.freeze({ ...profile.capabilities })
  const log = (deps.log ?? logger).child({ store: profile.slug })

  if (profile.rateLimitMs !== undefined) {
    deps.limiter.setInterval(profile.domain, profile.rateLimitMs)
  }

  let http: HttpClient | null = null
  let rejected = 0

  function session(): HttpClient {
    if (!http) throw new Error(`${profile.slug} adapter used before open()`)
    return http
  }

  function toRecord(item: JsonObject, ctx: NormalizeContext): CanonicalRecord | null {
    try {
      const record = normalizeItem(item, ctx)
      if (!record) rejected++
      return record
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err
      rejected++
      log.debug({ url: ctx.baseUrl, issues: err.issues }, 'item rejected')
      return null
    }
  }

  return {
    store: profile.slug,
    capabilities,

    async open() {
      if (http) return
      http = new HttpClient({
        limiter: deps.limiter,
        signal: deps.signal,
        timeoutMs: deps.timeoutMs ?? appConfig.http.timeoutMs,
        maxRetries: deps.maxRetries ?? appConfig.http.maxRetries,
        headers: {
          'User-Agent': deps.userAgent ?? appConfig.http.userAgent,
          'Accept-Language': config.locale,
        },
      })
    },

    async close() {
      http?.close()
      http = null
    },

    async *iterGames() {
      const client = session()
      const base = { profile, config }
      rejected = 0

      if (endpoints.searchApi) {
        log.info({ queries: profile.queryTokens.length }, 'crawling search API')
        const pages = paginateSearchApi(client, log, {
          template: endpoints.searchApi,
          queries: profile.queryTokens,
          pageSize: profile.pageSize,
          config,
          paginate: capabilities.pagination,
          stopPolicy: deps.stopPolicy,
          pageDelayMs: deps.pageDelayMs,
          queryDelayMs: deps.queryDelayMs,
        })
        for await (const page of pages) {
          for (const item of page.items) {
            const record = toRecord(item, { ...base, baseUrl: page.url, source: 'search-api' })
            if (record) yield record
          }
        }
      }

      for (const [index, pageUrl] of endpoints.seedPages.entries()) {
        if (index > 0) await sleep(deps.seedPageDelayMs ?? 200, client.signal)
        const scraped = await scrapeListingPage(client, pageUrl, log, profile.embeddedScriptId)
        for (const { source, item } of scraped) {
          const record = toRecord(item, { ...base, baseUrl: pageUrl, source })
          if (record) yield record
        }
      }

      if (rejected > 0) log.info({ rejected }, 'items without a usable record skipped')
    },
  }
}
