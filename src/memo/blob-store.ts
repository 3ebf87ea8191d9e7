/**
 * Blob Stores
 *
 * Durable byte storage for persisted memo snapshots, addressed by path.
 * Calls are synchronous so a store can be hydrated inside a constructor.
 */

import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { dirname } from 'node:path'

export interface BlobStore {
  /** Blob contents, or null when nothing is stored at `path` */
  read(path: string): Uint8Array | null
  /** Replace the blob at `path` */
  write(path: string, data: Uint8Array): void
  /** Remove the blob at `path`; missing blobs are not an error */
  delete(path: string): void
}

/**
 * Blobs as files on the local disk. Parent directories are created on write.
 */
export class LocalBlobStore implements BlobStore {
  read(path: string): Uint8Array | null {
    if (!existsSync(path)) {
      return null
    }
    return new Uint8Array(readFileSync(path))
  }

  write(path: string, data: Uint8Array): void {
    const dir = dirname(path)
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true })
    }
    writeFileSync(path, data)
  }

  delete(path: string): void {
    rmSync(path, { force: true })
  }
}

/**
 * In-process blob store, for tests and throwaway caches.
 */
export class MemoryBlobStore implements BlobStore {
  private readonly blobs = new Map<string, Uint8Array>()

  read(path: string): Uint8Array | null {
    const blob = this.blobs.get(path)
    return blob ? new Uint8Array(blob) : null
  }

  write(path: string, data: Uint8Array): void {
    this.blobs.set(path, new Uint8Array(data))
  }

  delete(path: string): void {
    this.blobs.delete(path)
  }

  paths(): string[] {
    return [...this.blobs.keys()]
  }
}

export const localBlobStore = new LocalBlobStore()
