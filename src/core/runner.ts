/**
 * Core runner — orchestrates: open adapter → drain records → close → write → summarize.
 *
 * Each store is an independent task. A store's records are buffered in full
 * before anything is written, so an aborted or failed crawl leaves no partial
 * catalog behind; sibling stores carry on regardless.
 */

import { join } from 'node:path'
import type { StoreAdapter } from '../adapters/types.js'
import { createAdapter, listStores, loadStoreProfiles } from '../adapters/registry.js'
import type { ListingAdapterDeps } from '../adapters/listing-adapter.js'
import { config as appConfig } from '../lib/config.js'
import { cluster } from '../lib/dedupe.js'
import { errorMessage } from '../lib/errors.js'
import { logger, type Logger } from '../lib/logger.js'
import type { CanonicalRecord, Store } from '../schema/game-record.js'
import type { AdapterConfig } from '../schema/store-profile.js'
import { writeCatalog } from './catalog-writer.js'
import { DomainLimiter } from './rate-limiter.js'
import { buildSummary, type Summary } from './summary.js'

export interface RunResult {
  store: Store
  itemCount: number
  outputDir: string | null
  summary: Summary | null
  durationMs: number
  error: string | null
  aborted: boolean
}

export interface RunOptions {
  signal?: AbortSignal
  log?: Logger
}

/**
 * Run a full crawl for one store.
 */
export async function runStore(
  adapter: StoreAdapter,
  outDir: string,
  options: RunOptions = {}
): Promise<RunResult> {
  const startTime = Date.now()
  const { signal } = options
  const log = (options.log ?? logger).child({ store: adapter.store })
  const records: CanonicalRecord[] = []

  try {
    log.info(
      {
        pagination: adapter.capabilities.pagination,
        partialPrice: adapter.capabilities.returnsPartialPrice,
      },
      'crawl started'
    )

    // 1. Drain the adapter; its resources are released on every path
    try {
      signal?.throwIfAborted()
      await adapter.open()
      for await (const record of adapter.iterGames()) {
        signal?.throwIfAborted()
        records.push(record)
      }
    } finally {
      await adapter.close()
    }
    signal?.throwIfAborted()
    log.info({ count: records.length }, 'records collected')

    // 2. Write letter buckets
    const byBucket = writeCatalog(outDir, adapter.store, records)
    const outputDir = join(outDir, adapter.store)

    // 3. Summarize
    const clusters = cluster(records)
    const summary = buildSummary(records, byBucket, clusters)
    log.info(
      { count: records.length, clusters: summary.clusterCount, outputDir },
      'catalog written'
    )

    return {
      store: adapter.store,
      itemCount: records.length,
      outputDir,
      summary,
      durationMs: Date.now() - startTime,
      error: null,
      aborted: false,
    }
  } catch (err) {
    const aborted = signal?.aborted ?? false
    if (aborted) {
      log.warn({ buffered: records.length }, 'crawl aborted; buffered records discarded')
    } else {
      log.error({ err }, 'crawl failed')
    }

    return {
      store: adapter.store,
      itemCount: 0,
      outputDir: null,
      summary: null,
      durationMs: Date.now() - startTime,
      error: errorMessage(err),
      aborted,
    }
  }
}

/**
 * Run several stores concurrently. Results come back in input order; one
 * store failing never cancels the others.
 */
export async function runStores(
  adapters: readonly StoreAdapter[],
  outDir: string,
  options: RunOptions = {}
): Promise<RunResult[]> {
  const settled = await Promise.allSettled(adapters.map(a => runStore(a, outDir, options)))
  return settled.map((outcome, i) =>
    outcome.status === 'fulfilled'
      ? outcome.value
      : {
          store: adapters[i].store,
          itemCount: 0,
          outputDir: null,
          summary: null,
          durationMs: 0,
          error: errorMessage(outcome.reason),
          aborted: options.signal?.aborted ?? false,
        }
  )
}

export interface CrawlOptions extends RunOptions {
  stores: readonly string[]
  outDir: string
  config: AdapterConfig
  limiter?: DomainLimiter
  adapterDeps?: Omit<ListingAdapterDeps, 'limiter' | 'signal' | 'log'>
}

/**
 * Build adapters for the named stores and crawl them. Profiles come from
 * stores/ unless some were registered already. An unknown store name throws
 * ConfigError before any crawl starts.
 */
export async function crawl(options: CrawlOptions): Promise<RunResult[]> {
  const limiter = options.limiter ?? new DomainLimiter(appConfig.http.rateLimitIntervalMs)
  if (listStores().length === 0) loadStoreProfiles()

  const adapters = options.stores.map(slug =>
    createAdapter(slug, options.config, {
      ...options.adapterDeps,
      limiter,
      signal: options.signal,
      log: options.log,
    })
  )

  return runStores(adapters, options.outDir, options)
}
