/**
 * Cached Filesystem
 *
 * Wraps a FileSystemProvider so that reads are served through a CacheRouter.
 * Each read method is a separate operation keyed by path, so one policy
 * covers contents, listings and metadata alike:
 *
 * @example
 * ```ts
 * const fs = new CachedFileSystem(new LocalFileSystem('/srv/data'), {
 *   paths: { '/config.json': { hours: 24 } },
 *   globs: { '*.parquet': { hours: 1 } },
 *   regex: { '\\.tmp$': { seconds: 30 } },
 *   default: { hours: 1 }
 * })
 * const bytes = await fs.readFile('/daily.parquet') // cached for an hour
 * ```
 *
 * Writes and removals go straight to the provider and do not invalidate
 * anything; call clearCache() when a cached path is known to have changed.
 */

import { createHash } from 'node:crypto'
import { Readable } from 'node:stream'
import { FileNotFoundError } from '../errors'
import type { PolicyConfig } from '../policy/types'
import { type CachedOperation, CacheRouter, type CacheRouterOptions } from '../router'
import type { ByteRange, FileInfo, FileSystemProvider, FileType } from './types'

async function hasType(
  provider: FileSystemProvider,
  path: string,
  type: FileType
): Promise<boolean> {
  try {
    return (await provider.stat(path)).type === type
  } catch (error) {
    if (error instanceof FileNotFoundError) return false
    throw error
  }
}

export class CachedFileSystem {
  readonly router: CacheRouter
  private readonly reads: CachedOperation<[range?: ByteRange | undefined], Promise<Buffer>>
  private readonly listings: CachedOperation<[], Promise<FileInfo[]>>
  private readonly stats: CachedOperation<[], Promise<FileInfo>>
  private readonly existence: CachedOperation<[], Promise<boolean>>
  private readonly sizes: CachedOperation<[], Promise<number>>
  private readonly directories: CachedOperation<[], Promise<boolean>>
  private readonly files: CachedOperation<[], Promise<boolean>>
  private readonly checksums: CachedOperation<[], Promise<string>>

  /**
   * @throws ConfigurationError when the policy is malformed
   */
  constructor(
    readonly provider: FileSystemProvider,
    readonly policy: PolicyConfig = {},
    options: CacheRouterOptions = {}
  ) {
    this.router = new CacheRouter(policy, options)
    this.reads = this.router.operation(
      'readFile',
      (path: string, range?: ByteRange | undefined) => provider.readFile(path, range)
    )
    this.listings = this.router.operation('list', (path: string) => provider.list(path))
    this.stats = this.router.operation('stat', (path: string) => provider.stat(path))
    this.existence = this.router.operation('exists', (path: string) => provider.exists(path))
    this.sizes = this.router.operation(
      'size',
      async (path: string) => (await provider.stat(path)).size
    )
    this.directories = this.router.operation('isDir', (path: string) =>
      hasType(provider, path, 'directory')
    )
    this.files = this.router.operation('isFile', (path: string) => hasType(provider, path, 'file'))
    this.checksums = this.router.operation('checksum', async (path: string) =>
      createHash('sha256')
        .update(await provider.readFile(path))
        .digest('hex')
    )
  }

  get protocol(): string {
    return this.provider.protocol
  }

  /**
   * File contents, or a slice of them. Every caller gets its own copy.
   */
  async readFile(path: string, range?: ByteRange): Promise<Buffer> {
    const data =
      range === undefined ? await this.reads.call(path) : await this.reads.call(path, range)
    return Buffer.from(data)
  }

  async readText(path: string, encoding: BufferEncoding = 'utf-8'): Promise<string> {
    return (await this.readFile(path)).toString(encoding)
  }

  /**
   * Stream of the (possibly cached) file contents. A missing file surfaces
   * as an `error` event.
   */
  createReadStream(path: string): Readable {
    return Readable.from(this.chunks(path))
  }

  list(path: string): Promise<FileInfo[]> {
    return this.listings.call(path)
  }

  stat(path: string): Promise<FileInfo> {
    return this.stats.call(path)
  }

  exists(path: string): Promise<boolean> {
    return this.existence.call(path)
  }

  size(path: string): Promise<number> {
    return this.sizes.call(path)
  }

  isDir(path: string): Promise<boolean> {
    return this.directories.call(path)
  }

  isFile(path: string): Promise<boolean> {
    return this.files.call(path)
  }

  /** Hex SHA-256 of the file contents */
  checksum(path: string): Promise<string> {
    return this.checksums.call(path)
  }

  writeFile(path: string, data: Uint8Array | string): Promise<void> {
    return this.provider.writeFile(path, data)
  }

  remove(path: string): Promise<void> {
    return this.provider.remove(path)
  }

  /**
   * Drop cached results for the policy `path` resolves to, or everything.
   * Other paths sharing that policy are dropped too.
   */
  clearCache(path?: string): void {
    this.router.invalidate(path)
  }

  private async *chunks(path: string): AsyncGenerator<Buffer> {
    yield await this.readFile(path)
  }

  toString(): string {
    return `CachedFileSystem(${this.protocol}, policy=${JSON.stringify(this.policy)})`
  }
}
