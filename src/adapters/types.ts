/**
 * The contract between the orchestrator and a storefront.
 *
 * The orchestrator only ever sees this interface plus the store identity;
 * how an adapter finds its items is its own business.
 */

import type { CanonicalRecord, Store } from '../schema/game-record.js'
import type { Capabilities } from '../schema/store-profile.js'

export interface StoreAdapter {
  readonly store: Store
  readonly capabilities: Capabilities

  /** Acquire run-scoped resources (HTTP session). Called once before iterGames() */
  open(): Promise<void>

  /** Release everything open() acquired. Safe to call more than once */
  close(): Promise<void>

  /** Lazy, unbounded sequence of normalized records */
  iterGames(): AsyncIterable<CanonicalRecord>
}
