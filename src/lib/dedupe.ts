/**
 * Canonical-key clustering of records across stores.
 *
 * Buckets are stable (first-seen order) and no representative is chosen;
 * merge policy belongs to whoever consumes the map.
 */

import type { CanonicalRecord } from '../schema/game-record.js'
import { stripEditionNoise } from './normalize.js'

export function canonicalKey(name: string): string {
  return stripEditionNoise(name).toLowerCase().replace(/[^a-z0-9]+/g, '')
}

export function cluster(records: Iterable<CanonicalRecord>): Map<string, CanonicalRecord[]> {
  const buckets = new Map<string, CanonicalRecord[]>()
  for (const record of records) {
    const key = canonicalKey(record.name)
    const bucket = buckets.get(key)
    if (bucket) bucket.push(record)
    else buckets.set(key, [record])
  }
  return buckets
}
