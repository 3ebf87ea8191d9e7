import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { FileNotFoundError } from '../errors'
import { LocalFileSystem } from './local'

describe('LocalFileSystem', () => {
  let root: string
  let fs: LocalFileSystem

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'temporal-cache-fs-'))
    fs = new LocalFileSystem(root)
  })

  afterEach(() => {
    rmSync(root, { recursive: true, force: true })
  })

  it('reads files beneath the root', async () => {
    writeFileSync(join(root, 'a.txt'), 'hello')

    expect((await fs.readFile('/a.txt')).toString()).toBe('hello')
    expect((await fs.readFile('/a.txt', { start: 1, end: 3 })).toString()).toBe('el')
  })

  it('creates parent directories on write', async () => {
    await fs.writeFile('/nested/dir/b.txt', 'data')

    expect(existsSync(join(root, 'nested', 'dir', 'b.txt'))).toBe(true)
  })

  it('keeps paths inside the root', async () => {
    await fs.writeFile('/../../escape.txt', 'x')

    expect(existsSync(join(root, 'escape.txt'))).toBe(true)
  })

  it('lists and stats entries', async () => {
    await fs.writeFile('/data/b.csv', '12')
    await fs.writeFile('/data/sub/c.csv', '123')

    const entries = await fs.list('/data')

    expect(entries.map((entry) => [entry.path, entry.type, entry.size])).toEqual([
      ['/data/b.csv', 'file', 2],
      ['/data/sub', 'directory', 0]
    ])
    expect(await fs.stat('/data/b.csv')).toMatchObject({ name: 'b.csv', type: 'file', size: 2 })
  })

  it('reports existence', async () => {
    await fs.writeFile('/a.txt', 'a')

    expect(await fs.exists('/a.txt')).toBe(true)
    expect(await fs.exists('/missing.txt')).toBe(false)
  })

  it('maps missing paths to FileNotFoundError', async () => {
    await expect(fs.readFile('/missing.txt')).rejects.toBeInstanceOf(FileNotFoundError)
    await expect(fs.stat('/missing.txt')).rejects.toBeInstanceOf(FileNotFoundError)
    await expect(fs.remove('/missing.txt')).rejects.toBeInstanceOf(FileNotFoundError)
  })

  it('removes directories recursively', async () => {
    await fs.writeFile('/data/sub/c.csv', 'c')

    await fs.remove('/data')

    expect(existsSync(join(root, 'data'))).toBe(false)
  })
})
