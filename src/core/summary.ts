/**
 * Run summary — counts describing one store's crawl.
 */

import type { CanonicalRecord } from '../schema/game-record.js'
import { UNAVAILABLE } from '../schema/game-record.js'

export interface Summary {
  totalCount: number
  byBucket: Record<string, number>
  byPlatform: Record<string, number>
  bySource: Record<string, number>
  unavailablePrice: number
  /** Distinct canonical keys */
  clusterCount: number
  /** Canonical keys shared by more than one record */
  duplicateClusters: number
  generatedAt: string
}

function sortByCount(counts: Record<string, number>): Record<string, number> {
  return Object.fromEntries(Object.entries(counts).sort(([, a], [, b]) => b - a))
}

export function buildSummary(
  records: readonly CanonicalRecord[],
  byBucket: Record<string, number>,
  clusters: ReadonlyMap<string, readonly CanonicalRecord[]>
): Summary {
  const byPlatform: Record<string, number> = {}
  const bySource: Record<string, number> = {}
  for (const record of records) {
    for (const platform of record.platforms) {
      byPlatform[platform] = (byPlatform[platform] || 0) + 1
    }
    const source = typeof record.extra.source === 'string' ? record.extra.source : 'unknown'
    bySource[source] = (bySource[source] || 0) + 1
  }

  let duplicateClusters = 0
  for (const group of clusters.values()) {
    if (group.length > 1) duplicateClusters++
  }

  return {
    totalCount: records.length,
    byBucket: Object.fromEntries(Object.entries(byBucket).filter(([, n]) => n > 0)),
    byPlatform: sortByCount(byPlatform),
    bySource: sortByCount(bySource),
    unavailablePrice: records.filter(r => r.price === UNAVAILABLE).length,
    clusterCount: clusters.size,
    duplicateClusters,
    generatedAt: new Date().toISOString(),
  }
}
