/**
 * Keyed Memo Store
 *
 * LRU-bounded memoization of an operation, keyed by its serialized
 * arguments. Only successful results are stored; a failing operation leaves
 * the cache untouched and its error reaches the caller as is.
 *
 * Concurrent misses on the same key each run the operation. The last one to
 * finish owns the slot.
 */

import { LRUCache } from 'lru-cache'
import { DEFAULT_CAPACITY } from '../policy/types'
import { serializeArgs } from './key'
import type { MemoStore, MemoStoreOptions, Operation } from './types'

/**
 * Stored values are boxed so that `undefined`, `null` and `false` results
 * are cacheable too.
 */
export interface Memo<V> {
  readonly value: V
}

export class KeyedMemoStore<A extends unknown[], R> implements MemoStore<A, R> {
  readonly capacity: number
  protected readonly entries: LRUCache<string, Memo<Awaited<R>>>
  /** Bumped by clear() so results of calls started earlier are not stored */
  private generation = 0

  constructor(
    private readonly operation: Operation<A, R>,
    options: MemoStoreOptions = {}
  ) {
    this.capacity = options.capacity ?? DEFAULT_CAPACITY
    this.entries = new LRUCache({ max: this.capacity })
  }

  get size(): number {
    return this.entries.size
  }

  has(...args: A): boolean {
    return this.entries.has(serializeArgs(args))
  }

  async call(...args: A): Promise<Awaited<R>> {
    const key = serializeArgs(args)
    const hit = this.entries.get(key)
    if (hit) return hit.value

    const generation = this.generation
    const value = await this.operation(...args)
    if (generation === this.generation) {
      this.entries.set(key, { value })
      this.afterInsert(key)
    }
    return value
  }

  async invoke(...args: A): Promise<Awaited<R>> {
    return await this.operation(...args)
  }

  clear(): void {
    this.generation++
    this.entries.clear()
  }

  /**
   * Hook for subclasses; runs after every insertion.
   */
  protected afterInsert(_key: string): void {}
}
