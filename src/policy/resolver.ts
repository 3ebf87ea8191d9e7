/**
 * Policy Resolver
 *
 * Maps a key (usually a path) to the cache parameters that apply to it.
 * Precedence, first match wins:
 *
 * 1. exact key in `paths`
 * 2. first glob in `globs` matching the whole key
 * 3. first pattern in `regex` found anywhere in the key
 * 4. `default`, or no caching at all
 *
 * Rules are compiled once. Resolutions are memoized per key, since the rule
 * set cannot change after construction.
 */

import { LRUCache } from 'lru-cache'
import { ConfigurationError } from '../errors'
import { totalSeconds } from './duration'
import { globToRegExp } from './glob'
import { isCacheable, paramsIdentity, parsePolicyConfig } from './params'
import type { CacheParams, PolicySource, ResolvedPolicy } from './types'
import { DEFAULT_CAPACITY } from './types'

interface CompiledRule {
  readonly pattern: string
  readonly matcher: RegExp
  readonly policy: ResolvedPolicy
}

export interface PolicyResolverOptions {
  /** Number of key resolutions to remember (default: 1024) */
  readonly memoSize?: number | undefined
}

function buildPolicy(
  params: CacheParams,
  source: PolicySource,
  pattern: string | undefined
): ResolvedPolicy {
  const cacheable = isCacheable(params)
  return {
    params,
    cacheable,
    durationSeconds: totalSeconds(params),
    capacity: params.capacity ?? DEFAULT_CAPACITY,
    persistPath: params.persistPath,
    identity: paramsIdentity(params),
    source: cacheable ? source : 'none',
    pattern
  }
}

function compileRegex(pattern: string): RegExp {
  try {
    return new RegExp(pattern)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`regex[${JSON.stringify(pattern)}]: ${message}`, {
      cause: error
    })
  }
}

export class PolicyResolver {
  private readonly exact = new Map<string, ResolvedPolicy>()
  private readonly globs: CompiledRule[] = []
  private readonly regexes: CompiledRule[] = []
  private readonly fallback: ResolvedPolicy
  private readonly memo: LRUCache<string, ResolvedPolicy>

  /**
   * @throws ConfigurationError for malformed params or regex patterns
   */
  constructor(config: unknown, options: PolicyResolverOptions = {}) {
    const policy = parsePolicyConfig(config)

    for (const [key, params] of Object.entries(policy.paths ?? {})) {
      this.exact.set(key, buildPolicy(params, 'path', key))
    }
    for (const [pattern, params] of policy.globs ?? []) {
      this.globs.push({
        pattern,
        matcher: globToRegExp(pattern),
        policy: buildPolicy(params, 'glob', pattern)
      })
    }
    for (const [pattern, params] of policy.regex ?? []) {
      this.regexes.push({
        pattern,
        matcher: compileRegex(pattern),
        policy: buildPolicy(params, 'regex', pattern)
      })
    }
    this.fallback = buildPolicy(policy.default ?? {}, 'default', undefined)
    this.memo = new LRUCache({ max: options.memoSize ?? 1024 })
  }

  resolve(key: string): ResolvedPolicy {
    const known = this.memo.get(key)
    if (known) return known

    const policy = this.match(key)
    this.memo.set(key, policy)
    return policy
  }

  private match(key: string): ResolvedPolicy {
    const exact = this.exact.get(key)
    if (exact) return exact

    for (const rule of this.globs) {
      if (rule.matcher.test(key)) return rule.policy
    }
    for (const rule of this.regexes) {
      if (rule.matcher.test(key)) return rule.policy
    }
    return this.fallback
  }
}
