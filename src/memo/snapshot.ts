/**
 * Snapshot Codec
 *
 * Encodes the full contents of a memo store as one blob. The default codec
 * writes the structured-clone form of
 *
 * ```ts
 * { version: 2, updatedAt: '...', entries: [['<args>', value], ...] }
 * ```
 *
 * gzip-compressed. Values come back as they went in: `undefined`, Dates,
 * Maps, Sets, Buffers and typed arrays keep their type. Class instances come
 * back as plain objects. A function or symbol anywhere in a value makes
 * encode() throw.
 *
 * Entries are ordered least recently used first, so loading them in order
 * restores recency.
 */

import { deserialize, serialize } from 'node:v8'
import { gunzipSync, gzipSync } from 'node:zlib'

export type SnapshotEntry<V> = readonly [key: string, value: V]

export interface SnapshotCodec<V> {
  /** @throws when a value cannot be stored faithfully */
  encode(entries: readonly SnapshotEntry<V>[]): Uint8Array
  /** @throws when the blob is not a snapshot this codec wrote */
  decode(data: Uint8Array): SnapshotEntry<V>[]
}

export const SNAPSHOT_VERSION = 2

interface SnapshotFile<V> {
  version: typeof SNAPSHOT_VERSION
  updatedAt: string
  entries: SnapshotEntry<V>[]
}

function isEntryList(value: unknown): value is SnapshotEntry<unknown>[] {
  return (
    Array.isArray(value) &&
    value.every(
      (entry) => Array.isArray(entry) && entry.length === 2 && typeof entry[0] === 'string'
    )
  )
}

export function createSnapshotCodec<V>(): SnapshotCodec<V> {
  return {
    encode(entries) {
      const file: SnapshotFile<V> = {
        version: SNAPSHOT_VERSION,
        updatedAt: new Date().toISOString(),
        entries: [...entries]
      }
      return new Uint8Array(gzipSync(serialize(file)))
    },

    decode(data) {
      const file: unknown = deserialize(gunzipSync(data))
      if (typeof file !== 'object' || file === null || !('version' in file)) {
        throw new Error('Snapshot is malformed')
      }
      if (file.version !== SNAPSHOT_VERSION) {
        throw new Error(`Unsupported snapshot version: ${String(file.version)}`)
      }
      if (!('entries' in file) || !isEntryList(file.entries)) {
        throw new Error('Snapshot entries are malformed')
      }
      // Written by encode() above with the same V
      return file.entries as SnapshotEntry<V>[]
    }
  }
}
