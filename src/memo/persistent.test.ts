import { existsSync, mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { PersistenceWarning } from '../errors'
import { type BlobStore, MemoryBlobStore } from './blob-store'
import { PersistentMemoStore } from './persistent'
import { createSnapshotCodec } from './snapshot'

const SNAPSHOT = '/cache/readFile.snapshot.gz'

describe('PersistentMemoStore', () => {
  let blobStore: MemoryBlobStore

  beforeEach(() => {
    blobStore = new MemoryBlobStore()
  })

  it('writes a snapshot on every insertion', async () => {
    const store = new PersistentMemoStore((key: string) => `v:${key}`, {
      path: SNAPSHOT,
      blobStore
    })

    await store.call('a')
    await store.call('b')

    const blob = blobStore.read(SNAPSHOT)
    expect(blob).not.toBeNull()
    expect(createSnapshotCodec<string>().decode(blob ?? new Uint8Array())).toEqual([
      ['["a"]', 'v:a'],
      ['["b"]', 'v:b']
    ])
  })

  it('does not rewrite the snapshot on a hit', async () => {
    const write = vi.spyOn(blobStore, 'write')
    const store = new PersistentMemoStore((key: string) => key, { path: SNAPSHOT, blobStore })

    await store.call('a')
    await store.call('a')

    expect(write).toHaveBeenCalledTimes(1)
  })

  it('serves hydrated entries without running the operation', async () => {
    const first = new PersistentMemoStore((key: string) => `v:${key}`, {
      path: SNAPSHOT,
      blobStore
    })
    await first.call('a')

    const operation = vi.fn((key: string) => `fresh:${key}`)
    const second = new PersistentMemoStore(operation, { path: SNAPSHOT, blobStore })

    expect(second.size).toBe(1)
    expect(await second.call('a')).toBe('v:a')
    expect(operation).not.toHaveBeenCalled()
  })

  it('reloads undefined and Date values unchanged', async () => {
    const results: Record<string, Date | undefined> = { u: undefined, d: new Date(0) }
    const first = new PersistentMemoStore((key: string) => results[key], {
      path: SNAPSHOT,
      blobStore
    })
    await first.call('u')
    await first.call('d')

    const operation = vi.fn((_key: string): Date | undefined => new Date(1))
    const second = new PersistentMemoStore(operation, { path: SNAPSHOT, blobStore })

    expect(await second.call('u')).toBeUndefined()
    const date = await second.call('d')
    expect(date).toBeInstanceOf(Date)
    expect(date?.getTime()).toBe(0)
    expect(operation).not.toHaveBeenCalled()
  })

  it('warns at write time about a value it cannot store', async () => {
    const onWarning = vi.fn<(warning: PersistenceWarning) => void>()
    const store = new PersistentMemoStore((_key: string) => () => 1, {
      path: SNAPSHOT,
      blobStore,
      onWarning
    })

    const value = await store.call('f')

    expect(value()).toBe(1)
    expect(store.has('f')).toBe(true)
    expect(onWarning).toHaveBeenCalledTimes(1)
    expect(onWarning.mock.calls[0]?.[0].action).toBe('write')
    expect(blobStore.read(SNAPSHOT)).toBeNull()
  })

  it('keeps the newest entries when hydrating past capacity', async () => {
    const large = new PersistentMemoStore((key: string) => key, {
      path: SNAPSHOT,
      blobStore,
      capacity: 3
    })
    for (const key of ['a', 'b', 'c']) {
      await large.call(key)
    }

    const small = new PersistentMemoStore((key: string) => key, {
      path: SNAPSHOT,
      blobStore,
      capacity: 2
    })

    expect(small.size).toBe(2)
    expect(small.has('a')).toBe(false)
    expect(small.has('b')).toBe(true)
    expect(small.has('c')).toBe(true)
  })

  it('carries recency into the snapshot at the next insertion', async () => {
    const first = new PersistentMemoStore((key: string) => key, {
      path: SNAPSHOT,
      blobStore,
      capacity: 2
    })
    await first.call('a')
    await first.call('b')
    await first.call('a')
    await first.call('c')

    const second = new PersistentMemoStore((key: string) => key, {
      path: SNAPSHOT,
      blobStore,
      capacity: 2
    })
    await second.call('d')

    expect(second.has('a')).toBe(false)
    expect(second.has('b')).toBe(false)
    expect(second.has('c')).toBe(true)
    expect(second.has('d')).toBe(true)
  })

  it('starts empty and warns when the snapshot is corrupt', () => {
    blobStore.write(SNAPSHOT, new Uint8Array([0, 1, 2]))
    const onWarning = vi.fn<(warning: PersistenceWarning) => void>()

    const store = new PersistentMemoStore((key: string) => key, {
      path: SNAPSHOT,
      blobStore,
      onWarning
    })

    expect(store.size).toBe(0)
    expect(onWarning).toHaveBeenCalledTimes(1)
    expect(onWarning.mock.calls[0]?.[0].action).toBe('read')
    expect(onWarning.mock.calls[0]?.[0].path).toBe(SNAPSHOT)
  })

  it('starts empty without warning when there is no snapshot', () => {
    const onWarning = vi.fn<(warning: PersistenceWarning) => void>()
    const store = new PersistentMemoStore((key: string) => key, {
      path: SNAPSHOT,
      blobStore,
      onWarning
    })

    expect(store.size).toBe(0)
    expect(onWarning).not.toHaveBeenCalled()
  })

  it('keeps serving from memory when writes fail', async () => {
    const failing: BlobStore = {
      read: () => null,
      write: () => {
        throw new Error('disk full')
      },
      delete: () => {}
    }
    const onWarning = vi.fn<(warning: PersistenceWarning) => void>()
    const operation = vi.fn((key: string) => key)
    const store = new PersistentMemoStore(operation, {
      path: SNAPSHOT,
      blobStore: failing,
      onWarning
    })

    expect(await store.call('a')).toBe('a')
    expect(await store.call('a')).toBe('a')

    expect(operation).toHaveBeenCalledTimes(1)
    expect(onWarning).toHaveBeenCalledTimes(1)
    expect(onWarning.mock.calls[0]?.[0].message).toBe(
      `Failed to write cache snapshot ${SNAPSHOT}: disk full`
    )
  })

  it('deletes the snapshot on clear', async () => {
    const store = new PersistentMemoStore((key: string) => key, { path: SNAPSHOT, blobStore })
    await store.call('a')

    store.clear()

    expect(store.size).toBe(0)
    expect(blobStore.read(SNAPSHOT)).toBeNull()
  })

  it('reports a failed delete on clear', () => {
    const failing: BlobStore = {
      read: () => null,
      write: () => {},
      delete: () => {
        throw new Error('read-only')
      }
    }
    const onWarning = vi.fn<(warning: PersistenceWarning) => void>()
    const store = new PersistentMemoStore((key: string) => key, {
      path: SNAPSHOT,
      blobStore: failing,
      onWarning
    })

    store.clear()

    expect(onWarning.mock.calls[0]?.[0].action).toBe('delete')
  })

  describe('on the local disk', () => {
    let testDir: string

    beforeEach(() => {
      testDir = mkdtempSync(join(tmpdir(), 'temporal-cache-persist-test-'))
    })

    afterEach(() => {
      if (existsSync(testDir)) {
        rmSync(testDir, { recursive: true, force: true })
      }
    })

    it('round-trips byte values through a file', async () => {
      const path = join(testDir, 'snapshots', 'readFile.snapshot.gz')
      const first = new PersistentMemoStore((_path: string) => Buffer.from('file body'), { path })
      await first.call('/a.bin')
      expect(existsSync(path)).toBe(true)

      const operation = vi.fn((_path: string) => Buffer.from('changed'))
      const second = new PersistentMemoStore(operation, { path })
      const value = await second.call('/a.bin')

      expect(value.toString()).toBe('file body')
      expect(operation).not.toHaveBeenCalled()
    })
  })
})
