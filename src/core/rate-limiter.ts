/**
 * Per-domain request pacing.
 *
 * acquire() suspends the caller until at least `intervalMs` has elapsed since
 * the last grant for the same domain. Grants for one domain are serialized
 * through a promise chain (first come, first served); different domains never
 * wait on each other. Shared by every store task in the process.
 */

import { abortable } from './abortable.js'
import { sleep } from './sleep.js'

export interface DomainLimiterOptions {
  /** Per-domain interval overrides, keyed by lower-cased hostname */
  domainOverrides?: Map<string, number>

  /** Clock, replaceable in tests */
  now?: () => number
}

export class DomainLimiter {
  private readonly lastGrant = new Map<string, number>()
  private readonly tails = new Map<string, Promise<void>>()
  private readonly domainOverrides: Map<string, number>
  private readonly now: () => number

  constructor(
    readonly intervalMs: number,
    options: DomainLimiterOptions = {}
  ) {
    this.domainOverrides = options.domainOverrides ?? new Map()
    this.now = options.now ?? Date.now
  }

  /** Minimum spacing for a domain */
  getInterval(domain: string): number {
    return this.domainOverrides.get(domain.toLowerCase()) ?? this.intervalMs
  }

  setInterval(domain: string, intervalMs: number): void {
    this.domainOverrides.set(domain.toLowerCase(), intervalMs)
  }

  /**
   * Wait for this domain's turn. Rejects as soon as `signal` aborts, even while
   * queued; no grant is recorded and the queue order of the others is kept.
   */
  async acquire(domain: string, signal?: AbortSignal): Promise<void> {
    const key = domain.toLowerCase()
    const previous = this.tails.get(key) ?? Promise.resolve()

    let release: () => void = () => {}
    const turn = new Promise<void>(resolve => {
      release = resolve
    })
    const tail = previous.then(() => turn)
    this.tails.set(key, tail)

    try {
      // An aborted waiter leaves the queue at once; later waiters still wait for `previous`
      await (signal ? abortable(previous, signal) : previous)

      const last = this.lastGrant.get(key)
      if (last !== undefined) {
        const waitMs = last + this.getInterval(key) - this.now()
        if (waitMs > 0) await sleep(waitMs, signal)
      }
      this.lastGrant.set(key, this.now())
    } finally {
      release()
      // The chain may still be waiting on an earlier caller; drop it once settled
      void tail.then(() => {
        if (this.tails.get(key) === tail) this.tails.delete(key)
      })
    }
  }
}
