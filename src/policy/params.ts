/**
 * Policy Validation
 *
 * Structural checks for policy configs coming from code or JSON files.
 * Everything here throws ConfigurationError; nothing is checked at call time.
 */

import { ConfigurationError } from '../errors'
import { stableStringify } from '../memo/key'
import { type DurationUnit, isDurationUnit } from './duration'
import type { CacheParams, ParsedPolicyConfig, PolicyRule } from './types'

const CONFIG_SECTIONS: readonly string[] = ['paths', 'globs', 'regex', 'default']

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Validate one params record.
 *
 * @param where - Location used in error messages, e.g. `globs["*.txt"]`
 */
export function parseCacheParams(value: unknown, where: string): CacheParams {
  if (!isRecord(value)) {
    throw new ConfigurationError(`${where}: cache params must be an object`)
  }

  const duration: { [U in DurationUnit]?: number } = {}
  let capacity: number | undefined
  let persistPath: string | undefined

  for (const [field, raw] of Object.entries(value)) {
    if (raw === undefined) continue

    if (isDurationUnit(field)) {
      if (typeof raw !== 'number' || !Number.isFinite(raw) || raw < 0) {
        throw new ConfigurationError(
          `${where}: ${field} must be a non-negative number, got ${JSON.stringify(raw)}`
        )
      }
      duration[field] = raw
    } else if (field === 'capacity') {
      if (typeof raw !== 'number' || !Number.isInteger(raw) || raw < 1) {
        throw new ConfigurationError(
          `${where}: capacity must be a positive integer, got ${JSON.stringify(raw)}`
        )
      }
      capacity = raw
    } else if (field === 'persistPath') {
      if (typeof raw !== 'string' || raw.trim() === '') {
        throw new ConfigurationError(`${where}: persistPath must be a non-empty string`)
      }
      persistPath = raw
    } else {
      throw new ConfigurationError(`${where}: unknown cache param "${field}"`)
    }
  }

  return {
    ...duration,
    ...(capacity !== undefined ? { capacity } : {}),
    ...(persistPath !== undefined ? { persistPath } : {})
  }
}

function parsePathSection(value: unknown): Record<string, CacheParams> | undefined {
  if (value === undefined) return undefined
  if (!isRecord(value)) {
    throw new ConfigurationError('paths: must map keys to cache params')
  }

  const paths: Record<string, CacheParams> = {}
  for (const [key, params] of Object.entries(value)) {
    paths[key] = parseCacheParams(params, `paths[${JSON.stringify(key)}]`)
  }
  return paths
}

/** Keys an object enumerates ahead of its other keys, in numeric order */
function isIndexLike(key: string): boolean {
  return /^(0|[1-9]\d*)$/.test(key) && Number(key) < 2 ** 32 - 1
}

function parseRuleSection(value: unknown, section: 'globs' | 'regex'): PolicyRule[] | undefined {
  if (value === undefined) return undefined

  if (Array.isArray(value)) {
    return value.map((rule: unknown, index): PolicyRule => {
      if (!Array.isArray(rule) || rule.length !== 2) {
        throw new ConfigurationError(`${section}[${index}]: must be a [pattern, params] pair`)
      }
      const [pattern, params]: unknown[] = rule
      if (typeof pattern !== 'string') {
        throw new ConfigurationError(`${section}[${index}]: pattern must be a string`)
      }
      return [pattern, parseCacheParams(params, `${section}[${JSON.stringify(pattern)}]`)]
    })
  }

  if (!isRecord(value)) {
    throw new ConfigurationError(
      `${section}: must map patterns to cache params or list [pattern, params] pairs`
    )
  }
  return Object.entries(value).map(([pattern, params]): PolicyRule => {
    const where = `${section}[${JSON.stringify(pattern)}]`
    if (isIndexLike(pattern)) {
      throw new ConfigurationError(
        `${where}: an object lists integer-like patterns first; use [pattern, params] pairs`
      )
    }
    return [pattern, parseCacheParams(params, where)]
  })
}

/**
 * Validate a whole policy config. `undefined` and `null` are an empty policy.
 */
export function parsePolicyConfig(value: unknown): ParsedPolicyConfig {
  if (value === undefined || value === null) return {}
  if (!isRecord(value)) {
    throw new ConfigurationError('cache policy must be an object')
  }

  for (const section of Object.keys(value)) {
    if (!CONFIG_SECTIONS.includes(section)) {
      throw new ConfigurationError(
        `unknown cache policy section "${section}" (expected ${CONFIG_SECTIONS.join(', ')})`
      )
    }
  }

  return {
    paths: parsePathSection(value['paths']),
    globs: parseRuleSection(value['globs'], 'globs'),
    regex: parseRuleSection(value['regex'], 'regex'),
    default:
      value['default'] === undefined ? undefined : parseCacheParams(value['default'], 'default')
  }
}

export function isCacheable(params: CacheParams): boolean {
  return Object.values(params).some((value) => value !== undefined)
}

/**
 * Identity of a params record: equal sets of key/value pairs give equal
 * identities whatever order they were written in.
 */
export function paramsIdentity(params: CacheParams): string {
  return stableStringify(params)
}
