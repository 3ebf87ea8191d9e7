/**
 * Cached Operation
 *
 * One named operation behind a router. Each distinct resolved policy gets
 * its own gate and store, created on first use and kept for the lifetime of
 * the router; keys resolving to equal params share that gate.
 */

import { createHash } from 'node:crypto'
import { join } from 'node:path'
import type { WarningHandler } from '../errors'
import type { CacheSwitch } from '../gate/switch'
import { type Clock, TemporalGate } from '../gate/temporal-gate'
import type { BlobStore } from '../memo/blob-store'
import { KeyedMemoStore } from '../memo/keyed'
import { PersistentMemoStore } from '../memo/persistent'
import type { MemoStore } from '../memo/types'
import type { PolicyResolver } from '../policy/resolver'
import type { ResolvedPolicy } from '../policy/types'

export type KeyedOperation<A extends unknown[], R> = (key: string, ...args: A) => R

/**
 * Collaborators shared by every operation of a router.
 */
export interface OperationContext {
  readonly resolver: PolicyResolver
  readonly cacheSwitch: CacheSwitch
  readonly now: Clock | undefined
  readonly blobStore: BlobStore | undefined
  readonly onWarning: WarningHandler | undefined
}

/**
 * Snapshot blob for one operation under one policy. The name carries a
 * digest of the policy identity, so policies sharing a `persistPath` keep
 * separate blobs.
 *
 * @example
 * ```ts
 * snapshotPath('/var/cache', 'readFile', '{"hours":1}')
 * // '/var/cache/readFile.<12 hex digits>.snapshot.gz'
 * ```
 */
export function snapshotPath(
  persistPath: string,
  operationName: string,
  identity: string
): string {
  const digest = createHash('sha256').update(identity).digest('hex').slice(0, 12)
  return join(persistPath, `${operationName}.${digest}.snapshot.gz`)
}

export class CachedOperation<A extends unknown[], R> {
  private readonly gates = new Map<string, TemporalGate<[string, ...A], R>>()

  constructor(
    readonly name: string,
    private readonly operation: KeyedOperation<A, R>,
    private readonly context: OperationContext
  ) {}

  /**
   * Run the operation for `key` under the policy the key resolves to.
   * Keys without a cacheable policy go straight to the operation, and so do
   * all keys while caching is disabled and their gate does not exist yet.
   * A snapshot on disk is left untouched in that case.
   */
  async call(key: string, ...args: A): Promise<Awaited<R>> {
    const policy = this.context.resolver.resolve(key)
    if (!policy.cacheable) {
      return await this.operation(key, ...args)
    }
    const gate = this.gates.get(policy.identity)
    if (gate) {
      return await gate.call(key, ...args)
    }
    if (this.context.cacheSwitch.disabled) {
      return await this.operation(key, ...args)
    }
    return await this.createGate(policy).call(key, ...args)
  }

  /** Number of gates created so far */
  get gateCount(): number {
    return this.gates.size
  }

  /**
   * Clear the gate for one policy identity, or every gate.
   */
  clear(identity?: string): void {
    if (identity === undefined) {
      for (const gate of this.gates.values()) {
        gate.clear()
      }
      return
    }
    this.gates.get(identity)?.clear()
  }

  private createGate(policy: ResolvedPolicy): TemporalGate<[string, ...A], R> {
    // Construction is synchronous, so no other call can race the lookup in call()
    const gate = new TemporalGate(this.createStore(policy), {
      durationSeconds: policy.durationSeconds,
      cacheSwitch: this.context.cacheSwitch,
      now: this.context.now
    })
    this.gates.set(policy.identity, gate)
    return gate
  }

  private createStore(policy: ResolvedPolicy): MemoStore<[string, ...A], R> {
    if (policy.persistPath === undefined) {
      return new KeyedMemoStore(this.operation, { capacity: policy.capacity })
    }
    return new PersistentMemoStore(this.operation, {
      capacity: policy.capacity,
      path: snapshotPath(policy.persistPath, this.name, policy.identity),
      blobStore: this.context.blobStore,
      onWarning: this.context.onWarning
    })
  }
}
