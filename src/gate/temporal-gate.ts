/**
 * Temporal Gate
 *
 * Puts a wall-clock window in front of a memo store. Before each call:
 *
 * 1. switch disabled → clear the store, run the operation directly
 * 2. more than `durationSeconds` since the last invalidation → clear the
 *    store and restart the window
 * 3. delegate to the store
 *
 * Expiry is checked on the calling path only; there are no timers. A
 * `durationSeconds` of zero never expires.
 */

import type { MemoStore } from '../memo/types'
import { type CacheSwitch, globalCacheSwitch } from './switch'

export type Clock = () => number

export interface TemporalGateOptions {
  /** Length of the window in seconds; 0 = never expire */
  readonly durationSeconds?: number | undefined
  /** Default: the process-wide switch */
  readonly cacheSwitch?: CacheSwitch | undefined
  /** Milliseconds since the epoch (default: Date.now) */
  readonly now?: Clock | undefined
}

export class TemporalGate<A extends unknown[], R> {
  readonly durationSeconds: number
  private readonly cacheSwitch: CacheSwitch
  private readonly now: Clock
  private invalidatedAt: number

  constructor(
    readonly store: MemoStore<A, R>,
    options: TemporalGateOptions = {}
  ) {
    this.durationSeconds = options.durationSeconds ?? 0
    this.cacheSwitch = options.cacheSwitch ?? globalCacheSwitch
    this.now = options.now ?? (() => Date.now())
    this.invalidatedAt = this.now()
  }

  /** Timestamp (ms) of the last clear, manual or expired */
  get lastInvalidation(): number {
    return this.invalidatedAt
  }

  async call(...args: A): Promise<Awaited<R>> {
    if (this.cacheSwitch.disabled) {
      this.store.clear()
      return await this.store.invoke(...args)
    }

    const now = this.now()
    const elapsedSeconds = (now - this.invalidatedAt) / 1000
    if (this.durationSeconds > 0 && elapsedSeconds > this.durationSeconds) {
      this.store.clear()
      this.invalidatedAt = now
    }

    return await this.store.call(...args)
  }

  clear(): void {
    this.store.clear()
    this.invalidatedAt = this.now()
  }
}
