/**
 * Resolve Command
 *
 * Show which rule of the cache policy a path falls under. Touches no files.
 */

import type { CachedFileSystem } from '../../filesystem/index'
import type { CLIArgs } from '../args'

export interface ResolveOutput {
  path: string
  cacheable: boolean
  source: string
  pattern: string | null
  seconds: number
  capacity: number
  persistPath: string | null
}

export function describePolicy(fs: CachedFileSystem, path: string): ResolveOutput {
  const policy = fs.router.resolve(path)
  return {
    path,
    cacheable: policy.cacheable,
    source: policy.source,
    pattern: policy.pattern ?? null,
    seconds: policy.durationSeconds,
    capacity: policy.capacity,
    persistPath: policy.persistPath ?? null
  }
}

export function cmdResolve(args: CLIArgs, fs: CachedFileSystem): string {
  if (!args.path) {
    throw new Error('No path specified')
  }
  return `${JSON.stringify(describePolicy(fs, args.path), null, 2)}\n`
}
