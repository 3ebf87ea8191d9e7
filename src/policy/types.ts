/**
 * Cache Policy Types
 */

import type { DurationParts } from './duration'

/**
 * Cache parameters for one rule. An empty record means "do not cache".
 */
export interface CacheParams extends DurationParts {
  /** Max entries per store (default: 128) */
  readonly capacity?: number | undefined
  /** Directory for persisted snapshots; memory only when absent */
  readonly persistPath?: string | undefined
}

export type PolicyRule = readonly [pattern: string, params: CacheParams]

/**
 * Ordered pattern rules, as an object or as `[pattern, params]` pairs.
 *
 * Objects enumerate integer-like keys (`'2024'`) before all others, so a
 * pattern of that shape is only accepted in the pair form.
 */
export type PolicyRules = Readonly<Record<string, CacheParams>> | readonly PolicyRule[]

/**
 * Declarative rule set. Rules within `globs` and `regex` are tried in
 * declaration order.
 */
export interface PolicyConfig {
  /** Exact key → params */
  readonly paths?: Readonly<Record<string, CacheParams>> | undefined
  /** Shell glob → params */
  readonly globs?: PolicyRules | undefined
  /** Regular expression (searched anywhere in the key) → params */
  readonly regex?: PolicyRules | undefined
  /** Params for keys no rule matches */
  readonly default?: CacheParams | undefined
}

/**
 * A validated PolicyConfig with its pattern rules in match order.
 */
export interface ParsedPolicyConfig extends PolicyConfig {
  readonly globs?: readonly PolicyRule[] | undefined
  readonly regex?: readonly PolicyRule[] | undefined
}

export type PolicySource = 'path' | 'glob' | 'regex' | 'default' | 'none'

/**
 * Outcome of resolving a key against a policy.
 */
export interface ResolvedPolicy {
  readonly params: CacheParams
  /** False when the params are empty; calls then bypass caching */
  readonly cacheable: boolean
  /** Zero means the cache never expires on its own */
  readonly durationSeconds: number
  readonly capacity: number
  readonly persistPath: string | undefined
  /** Order-independent serialization of `params` */
  readonly identity: string
  readonly source: PolicySource
  /** The rule that matched, for `path`, `glob` and `regex` sources */
  readonly pattern: string | undefined
}

export const DEFAULT_CAPACITY = 128
