import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'
import { ConfigurationError } from '../errors'
import { CacheSwitch } from '../gate/switch'
import { createFileSystem, isProtocol } from './index'
import { LocalFileSystem } from './local'
import { MemoryFileSystem } from './memory'

describe('createFileSystem', () => {
  it('builds a memory filesystem with initial files', async () => {
    const fs = createFileSystem('memory', {
      files: { '/a.txt': 'hello' },
      policy: { default: { seconds: 5 } },
      cacheSwitch: new CacheSwitch()
    })

    expect(fs.provider).toBeInstanceOf(MemoryFileSystem)
    expect(fs.protocol).toBe('memory')
    expect(await fs.readText('/a.txt')).toBe('hello')
  })

  it('builds a local filesystem rooted at a directory', async () => {
    const root = mkdtempSync(join(tmpdir(), 'temporal-cache-factory-'))
    try {
      writeFileSync(join(root, 'b.txt'), 'on disk')
      const fs = createFileSystem('file', { root })

      expect(fs.provider).toBeInstanceOf(LocalFileSystem)
      expect(await fs.readText('/b.txt')).toBe('on disk')
    } finally {
      rmSync(root, { recursive: true, force: true })
    }
  })

  it('rejects unknown protocols', () => {
    expect(() => createFileSystem('s3')).toThrow(
      new ConfigurationError('Unknown filesystem protocol "s3" (expected memory, file)')
    )
  })
})

describe('isProtocol', () => {
  it('accepts known protocol names only', () => {
    expect(isProtocol('memory')).toBe(true)
    expect(isProtocol('file')).toBe(true)
    expect(isProtocol('gcs')).toBe(false)
  })
})
