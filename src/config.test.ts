import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { homedir, tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { CONFIG_ENV_VAR, getConfigPath, loadPolicyConfig } from './config'
import { ConfigurationError } from './errors'

describe('getConfigPath', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('prefers an explicit path', () => {
    vi.stubEnv(CONFIG_ENV_VAR, '/from/env.json')

    expect(getConfigPath('/explicit.json')).toBe('/explicit.json')
  })

  it('falls back to the environment variable', () => {
    vi.stubEnv(CONFIG_ENV_VAR, '/from/env.json')

    expect(getConfigPath()).toBe('/from/env.json')
  })

  it('defaults to the XDG config directory', () => {
    vi.stubEnv(CONFIG_ENV_VAR, '')

    expect(getConfigPath()).toBe(join(homedir(), '.config', 'temporal-cache', 'config.json'))
  })
})

describe('loadPolicyConfig', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'temporal-cache-config-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('returns null when the file does not exist', async () => {
    expect(await loadPolicyConfig(join(dir, 'missing.json'))).toBeNull()
  })

  it('loads a valid policy', async () => {
    const path = join(dir, 'config.json')
    writeFileSync(
      path,
      JSON.stringify({ globs: { '*.csv': { hours: 1, capacity: 8 } }, default: { minutes: 5 } })
    )

    const policy = await loadPolicyConfig(path)

    expect(policy?.globs).toEqual([['*.csv', { hours: 1, capacity: 8 }]])
    expect(policy?.default).toEqual({ minutes: 5 })
  })

  it('rejects invalid JSON', async () => {
    const path = join(dir, 'config.json')
    writeFileSync(path, '{ not json')

    await expect(loadPolicyConfig(path)).rejects.toBeInstanceOf(ConfigurationError)
  })

  it('names the file in validation errors', async () => {
    const path = join(dir, 'config.json')
    writeFileSync(path, JSON.stringify({ default: { capacity: 0 } }))

    await expect(loadPolicyConfig(path)).rejects.toThrow(
      `${path}: default: capacity must be a positive integer, got 0`
    )
  })
})
