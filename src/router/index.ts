/**
 * Cache Router
 *
 * Registry of named operations over keyed resources, all cached under one
 * declarative policy.
 *
 * @example
 * ```ts
 * const router = new CacheRouter({
 *   paths: { '/config.json': { hours: 24 } },
 *   globs: { '*.parquet': { hours: 1, capacity: 32 } },
 *   default: { minutes: 5 }
 * })
 * const read = router.operation('readFile', (path: string) => fs.readFile(path))
 *
 * await read.call('/data/a.parquet') // runs readFile
 * await read.call('/data/a.parquet') // cached for an hour
 * ```
 */

import { ConfigurationError, type WarningHandler } from '../errors'
import { type CacheSwitch, globalCacheSwitch } from '../gate/switch'
import type { Clock } from '../gate/temporal-gate'
import type { BlobStore } from '../memo/blob-store'
import { PolicyResolver } from '../policy/resolver'
import type { PolicyConfig, ResolvedPolicy } from '../policy/types'
import { CachedOperation, type KeyedOperation, type OperationContext } from './operation'

export { CachedOperation, type KeyedOperation, snapshotPath } from './operation'

export interface CacheRouterOptions {
  /** Default: the process-wide switch */
  readonly cacheSwitch?: CacheSwitch | undefined
  /** Milliseconds since the epoch (default: Date.now) */
  readonly now?: Clock | undefined
  /** Storage for persisted policies (default: local disk) */
  readonly blobStore?: BlobStore | undefined
  /** Receives persistence failures (default: logged as a warning) */
  readonly onWarning?: WarningHandler | undefined
}

interface Clearable {
  clear(identity?: string): void
  readonly gateCount: number
}

export class CacheRouter {
  readonly resolver: PolicyResolver
  private readonly context: OperationContext
  private readonly operations = new Map<string, Clearable>()

  /**
   * @throws ConfigurationError when the policy is malformed
   */
  constructor(policy: PolicyConfig | undefined, options: CacheRouterOptions = {}) {
    this.resolver = new PolicyResolver(policy)
    this.context = {
      resolver: this.resolver,
      cacheSwitch: options.cacheSwitch ?? globalCacheSwitch,
      now: options.now,
      blobStore: options.blobStore,
      onWarning: options.onWarning
    }
  }

  /**
   * Register a named operation. The key passed to `call()` is the operation's
   * first argument and is what policies are matched against.
   */
  operation<A extends unknown[], R>(
    name: string,
    operation: KeyedOperation<A, R>
  ): CachedOperation<A, R> {
    if (this.operations.has(name)) {
      throw new ConfigurationError(`Operation "${name}" is already registered`)
    }
    const cached = new CachedOperation(name, operation, this.context)
    this.operations.set(name, cached)
    return cached
  }

  resolve(key: string): ResolvedPolicy {
    return this.resolver.resolve(key)
  }

  /**
   * Clear cached results.
   *
   * With a key, clears the gate of every operation for the policy that key
   * resolves to, which also drops every other key sharing that policy.
   * Without one, clears everything.
   */
  invalidate(key?: string): void {
    if (key === undefined) {
      for (const operation of this.operations.values()) {
        operation.clear()
      }
      return
    }

    const policy = this.resolver.resolve(key)
    if (!policy.cacheable) return
    for (const operation of this.operations.values()) {
      operation.clear(policy.identity)
    }
  }

  /** Gates created across all operations */
  get gateCount(): number {
    let count = 0
    for (const operation of this.operations.values()) {
      count += operation.gateCount
    }
    return count
  }
}
