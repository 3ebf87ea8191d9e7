/**
 * Local Filesystem
 *
 * Files on disk beneath a root directory. Provider paths are resolved
 * against the root and cannot escape it.
 */

import { mkdir, readdir, readFile, rm, stat, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import { FileNotFoundError } from '../errors'
import { baseName, normalizePath } from './paths'
import type { ByteRange, FileInfo, FileSystemProvider } from './types'

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

export class LocalFileSystem implements FileSystemProvider {
  readonly protocol = 'file'

  constructor(readonly root: string = process.cwd()) {}

  async readFile(path: string, range: ByteRange = {}): Promise<Buffer> {
    const data = await this.withNotFound(path, () => readFile(this.resolve(path)))
    if (range.start === undefined && range.end === undefined) return data
    return data.subarray(range.start ?? 0, range.end)
  }

  async list(path: string): Promise<FileInfo[]> {
    const info = await this.stat(path)
    if (info.type === 'file') return [info]

    const target = normalizePath(path)
    const names = await this.withNotFound(path, () => readdir(this.resolve(target)))
    const entries = await Promise.all(
      names.map((name) => this.stat(target === '/' ? `/${name}` : `${target}/${name}`))
    )
    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  }

  async stat(path: string): Promise<FileInfo> {
    const target = normalizePath(path)
    const stats = await this.withNotFound(path, () => stat(this.resolve(target)))
    const isDirectory = stats.isDirectory()
    return {
      path: target,
      name: baseName(target),
      type: isDirectory ? 'directory' : 'file',
      size: isDirectory ? 0 : stats.size,
      modifiedAt: stats.mtime.toISOString()
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(this.resolve(path))
      return true
    } catch (error) {
      if (isNotFound(error)) return false
      throw error
    }
  }

  async writeFile(path: string, data: Uint8Array | string): Promise<void> {
    const target = this.resolve(path)
    await mkdir(dirname(target), { recursive: true })
    await writeFile(target, data)
  }

  async remove(path: string): Promise<void> {
    const target = this.resolve(path)
    await this.withNotFound(path, () => stat(target))
    await rm(target, { recursive: true })
  }

  private resolve(path: string): string {
    return join(this.root, normalizePath(path))
  }

  private async withNotFound<T>(path: string, read: () => Promise<T>): Promise<T> {
    try {
      return await read()
    } catch (error) {
      if (isNotFound(error)) throw new FileNotFoundError(path, { cause: error })
      throw error
    }
  }
}
