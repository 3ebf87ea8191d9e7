/**
 * Policy Configuration
 *
 * Cache policies can be kept in a JSON file shaped like a PolicyConfig:
 *
 * ```json
 * {
 *   "paths": { "/config.json": { "hours": 24 } },
 *   "globs": { "*.parquet": { "hours": 1, "capacity": 32 } },
 *   "regex": [["^/logs/", { "seconds": 30 }], ["2024", { "days": 1 }]],
 *   "default": { "minutes": 5 }
 * }
 * ```
 *
 * `globs` and `regex` take either form. Integer-like patterns such as
 * "2024" need the list form.
 *
 * Stored at ~/.config/temporal-cache/config.json unless overridden by
 * --config or TEMPORAL_CACHE_CONFIG.
 */

import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { ConfigurationError } from './errors'
import { parsePolicyConfig } from './policy/params'
import type { PolicyConfig } from './policy/types'

export const CONFIG_ENV_VAR = 'TEMPORAL_CACHE_CONFIG'

function getDefaultConfigDir(): string {
  return join(homedir(), '.config', 'temporal-cache')
}

/**
 * Priority: explicit path > TEMPORAL_CACHE_CONFIG > default XDG path
 */
export function getConfigPath(configFile?: string): string {
  if (configFile) {
    return configFile
  }
  const fromEnv = process.env[CONFIG_ENV_VAR]
  if (fromEnv) {
    return fromEnv
  }
  return join(getDefaultConfigDir(), 'config.json')
}

/**
 * Load and validate a policy file. Returns null if the file doesn't exist.
 *
 * @throws ConfigurationError when the file is not valid JSON or not a policy
 */
export async function loadPolicyConfig(path: string): Promise<PolicyConfig | null> {
  if (!existsSync(path)) {
    return null
  }

  const content = await readFile(path, 'utf-8')
  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`${path}: invalid JSON (${message})`, { cause: error })
  }

  try {
    return parsePolicyConfig(parsed)
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw new ConfigurationError(`${path}: ${error.message}`, { cause: error })
    }
    throw error
  }
}
