/**
 * Memo Store Types
 */

/**
 * Anything a memo store can wrap. Synchronous and promise-returning
 * functions are both accepted; stores always answer with a promise.
 */
export type Operation<A extends unknown[], R> = (...args: A) => R

/**
 * A bounded memo over one operation.
 */
export interface MemoStore<A extends unknown[], R> {
  /** Serve from cache, or run the operation and remember its result */
  call(...args: A): Promise<Awaited<R>>
  /** Run the operation without reading or writing the cache */
  invoke(...args: A): Promise<Awaited<R>>
  /** Forget every entry */
  clear(): void
  has(...args: A): boolean
  readonly size: number
  readonly capacity: number
}

export interface MemoStoreOptions {
  /** Max entries before the least recently used one is evicted (default: 128) */
  readonly capacity?: number | undefined
}
