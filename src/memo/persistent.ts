/**
 * Persistent Memo Store
 *
 * A KeyedMemoStore whose contents are mirrored to one durable blob:
 *
 * - hydrated once, in the constructor, from an existing snapshot
 * - rewritten in full after every insertion (write-through)
 * - deleted by clear()
 *
 * Durability is best effort. A snapshot that cannot be read, written or
 * deleted produces a PersistenceWarning through `onWarning` and the store
 * carries on in memory.
 *
 * Each write re-encodes the whole store, so cost grows with capacity.
 */

import { PersistenceWarning, type WarningHandler } from '../errors'
import { logPersistenceWarning } from '../logger'
import { type BlobStore, localBlobStore } from './blob-store'
import { KeyedMemoStore } from './keyed'
import { createSnapshotCodec, type SnapshotCodec, type SnapshotEntry } from './snapshot'
import type { MemoStoreOptions, Operation } from './types'

export interface PersistentMemoStoreOptions<V> extends MemoStoreOptions {
  /** Location of the snapshot blob */
  readonly path: string
  /** Where blobs live (default: local disk) */
  readonly blobStore?: BlobStore | undefined
  /** Snapshot format (default: gzip structured clone) */
  readonly codec?: SnapshotCodec<V> | undefined
  /** Receives persistence failures (default: logged as a warning) */
  readonly onWarning?: WarningHandler | undefined
}

export class PersistentMemoStore<A extends unknown[], R> extends KeyedMemoStore<A, R> {
  readonly path: string
  private readonly blobStore: BlobStore
  private readonly codec: SnapshotCodec<Awaited<R>>
  private readonly onWarning: WarningHandler

  constructor(operation: Operation<A, R>, options: PersistentMemoStoreOptions<Awaited<R>>) {
    super(operation, options)
    this.path = options.path
    this.blobStore = options.blobStore ?? localBlobStore
    this.codec = options.codec ?? createSnapshotCodec<Awaited<R>>()
    this.onWarning = options.onWarning ?? logPersistenceWarning
    this.hydrate()
  }

  override clear(): void {
    super.clear()
    try {
      this.blobStore.delete(this.path)
    } catch (error) {
      this.onWarning(new PersistenceWarning('delete', this.path, error))
    }
  }

  protected override afterInsert(_key: string): void {
    this.persist()
  }

  private hydrate(): void {
    let entries: SnapshotEntry<Awaited<R>>[]
    try {
      const blob = this.blobStore.read(this.path)
      if (blob === null) return
      entries = this.codec.decode(blob)
    } catch (error) {
      this.onWarning(new PersistenceWarning('read', this.path, error))
      return
    }

    // Oldest first: loading past capacity evicts the oldest entries
    for (const [key, value] of entries) {
      this.entries.set(key, { value })
    }
  }

  private persist(): void {
    // LRUCache iterates most recently used first
    const snapshot: SnapshotEntry<Awaited<R>>[] = []
    for (const [key, memo] of this.entries.entries()) {
      snapshot.unshift([key, memo.value])
    }

    try {
      this.blobStore.write(this.path, this.codec.encode(snapshot))
    } catch (error) {
      this.onWarning(new PersistenceWarning('write', this.path, error))
    }
  }
}
