/**
 * Filesystem
 *
 * Providers plus the caching wrapper, and a factory that builds both from a
 * protocol name.
 */

import { ConfigurationError } from '../errors'
import type { PolicyConfig } from '../policy/types'
import type { CacheRouterOptions } from '../router'
import { CachedFileSystem } from './cached'
import { LocalFileSystem } from './local'
import { MemoryFileSystem } from './memory'
import type { FileSystemProvider } from './types'

export { CachedFileSystem } from './cached'
export { LocalFileSystem } from './local'
export { MemoryFileSystem } from './memory'
export { normalizePath } from './paths'
export type { ByteRange, FileInfo, FileSystemProvider, FileType } from './types'

export const PROTOCOLS = ['memory', 'file'] as const
export type Protocol = (typeof PROTOCOLS)[number]

export interface CreateFileSystemOptions extends CacheRouterOptions {
  readonly policy?: PolicyConfig | undefined
  /** Root directory for the `file` protocol (default: cwd) */
  readonly root?: string | undefined
  /** Initial contents for the `memory` protocol */
  readonly files?: Readonly<Record<string, Uint8Array | string>> | undefined
}

export function isProtocol(name: string): name is Protocol {
  return PROTOCOLS.some((protocol) => protocol === name)
}

function createProvider(protocol: Protocol, options: CreateFileSystemOptions): FileSystemProvider {
  switch (protocol) {
    case 'memory':
      return new MemoryFileSystem(options.files)
    case 'file':
      return new LocalFileSystem(options.root)
  }
}

/**
 * @throws ConfigurationError for an unknown protocol or malformed policy
 */
export function createFileSystem(
  protocol: string,
  options: CreateFileSystemOptions = {}
): CachedFileSystem {
  if (!isProtocol(protocol)) {
    throw new ConfigurationError(
      `Unknown filesystem protocol "${protocol}" (expected ${PROTOCOLS.join(', ')})`
    )
  }
  return new CachedFileSystem(createProvider(protocol, options), options.policy, options)
}
