import { existsSync, mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { LocalBlobStore, MemoryBlobStore } from './blob-store'

describe('LocalBlobStore', () => {
  let testDir: string
  const store = new LocalBlobStore()

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'temporal-cache-blob-test-'))
  })

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true })
    }
  })

  it('returns null for a missing blob', () => {
    expect(store.read(join(testDir, 'missing.gz'))).toBeNull()
  })

  it('creates parent directories on write', () => {
    const path = join(testDir, 'nested', 'deeper', 'blob.gz')
    store.write(path, new Uint8Array([1, 2, 3]))

    expect(existsSync(path)).toBe(true)
    expect([...(store.read(path) ?? [])]).toEqual([1, 2, 3])
  })

  it('deletes blobs and ignores missing ones', () => {
    const path = join(testDir, 'blob.gz')
    store.write(path, new Uint8Array([9]))
    store.delete(path)
    store.delete(path)

    expect(existsSync(path)).toBe(false)
  })
})

describe('MemoryBlobStore', () => {
  it('stores copies of the written bytes', () => {
    const store = new MemoryBlobStore()
    const data = new Uint8Array([1, 2])
    store.write('/blob', data)
    data[0] = 7

    expect([...(store.read('/blob') ?? [])]).toEqual([1, 2])
    expect(store.paths()).toEqual(['/blob'])
  })

  it('forgets deleted blobs', () => {
    const store = new MemoryBlobStore()
    store.write('/blob', new Uint8Array([1]))
    store.delete('/blob')

    expect(store.read('/blob')).toBeNull()
  })
})
