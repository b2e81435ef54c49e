/**
 * Catalog writer — one store's records → <outDir>/<store>/{_,a…z}.json.
 *
 * Every bucket file is written, empty ones as [], so a store directory always
 * has the full layout. Each file goes through a temp file and a rename.
 */

import { mkdirSync, renameSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import type { CanonicalRecord, OutputItem, Store } from '../schema/game-record.js'
import { toOutputItem } from '../schema/game-record.js'
import { letterBucket } from '../lib/normalize.js'

export const BUCKETS = ['_', ...'abcdefghijklmnopqrstuvwxyz'] as const

/** Partition records by letter bucket, keeping arrival order within a bucket */
export function partitionByLetter(records: Iterable<CanonicalRecord>): Map<string, OutputItem[]> {
  const buckets = new Map(BUCKETS.map((b): [string, OutputItem[]] => [b, []]))
  for (const record of records) {
    buckets.get(letterBucket(record.name))?.push(toOutputItem(record))
  }
  return buckets
}

/** Write one store's catalog; returns the item count per bucket */
export function writeCatalog(
  outDir: string,
  store: Store,
  records: Iterable<CanonicalRecord>
): Record<string, number> {
  const storeDir = join(outDir, store)
  mkdirSync(storeDir, { recursive: true })

  const counts: Record<string, number> = {}
  for (const [bucket, items] of partitionByLetter(records)) {
    const target = join(storeDir, `${bucket}.json`)
    const temp = `${target}.tmp`
    writeFileSync(temp, JSON.stringify(items, null, 2) + '\n', 'utf-8')
    renameSync(temp, target)
    counts[bucket] = items.length
  }
  return counts
}
