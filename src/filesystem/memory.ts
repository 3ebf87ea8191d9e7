/**
 * Memory Filesystem
 *
 * Files held in a map keyed by normalized path. Directories are implied by
 * the files beneath them and vanish with their last file.
 */

import { FileNotFoundError } from '../errors'
import { baseName, normalizePath } from './paths'
import type { ByteRange, FileInfo, FileSystemProvider } from './types'

interface StoredFile {
  readonly data: Buffer
  readonly modifiedAt: string
}

export class MemoryFileSystem implements FileSystemProvider {
  readonly protocol = 'memory'
  private readonly files = new Map<string, StoredFile>()

  constructor(files: Readonly<Record<string, Uint8Array | string>> = {}) {
    for (const [path, data] of Object.entries(files)) {
      this.put(path, data)
    }
  }

  async readFile(path: string, range: ByteRange = {}): Promise<Buffer> {
    const file = this.files.get(normalizePath(path))
    if (!file) throw new FileNotFoundError(path)
    return Buffer.from(file.data.subarray(range.start ?? 0, range.end))
  }

  async list(path: string): Promise<FileInfo[]> {
    const target = normalizePath(path)
    const file = this.files.get(target)
    if (file) return [this.fileInfo(target, file)]
    if (!this.isDirectory(target)) throw new FileNotFoundError(path)

    const prefix = target === '/' ? '/' : `${target}/`
    const children = new Map<string, FileInfo>()
    for (const [filePath, stored] of this.files) {
      if (!filePath.startsWith(prefix)) continue
      const [name = '', ...rest] = filePath.slice(prefix.length).split('/')
      if (children.has(name)) continue
      children.set(
        name,
        rest.length > 0 ? this.directoryInfo(`${prefix}${name}`) : this.fileInfo(filePath, stored)
      )
    }
    return [...children.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  }

  async stat(path: string): Promise<FileInfo> {
    const target = normalizePath(path)
    const file = this.files.get(target)
    if (file) return this.fileInfo(target, file)
    if (this.isDirectory(target)) return this.directoryInfo(target)
    throw new FileNotFoundError(path)
  }

  async exists(path: string): Promise<boolean> {
    const target = normalizePath(path)
    return this.files.has(target) || this.isDirectory(target)
  }

  async writeFile(path: string, data: Uint8Array | string): Promise<void> {
    this.put(path, data)
  }

  async remove(path: string): Promise<void> {
    const target = normalizePath(path)
    if (this.files.delete(target)) return
    if (!this.isDirectory(target)) throw new FileNotFoundError(path)

    const prefix = target === '/' ? '/' : `${target}/`
    for (const filePath of [...this.files.keys()]) {
      if (filePath.startsWith(prefix)) this.files.delete(filePath)
    }
  }

  private put(path: string, data: Uint8Array | string): void {
    this.files.set(normalizePath(path), {
      data: typeof data === 'string' ? Buffer.from(data, 'utf-8') : Buffer.from(data),
      modifiedAt: new Date().toISOString()
    })
  }

  private isDirectory(path: string): boolean {
    if (path === '/') return true
    const prefix = `${path}/`
    for (const filePath of this.files.keys()) {
      if (filePath.startsWith(prefix)) return true
    }
    return false
  }

  private fileInfo(path: string, file: StoredFile): FileInfo {
    return {
      path,
      name: baseName(path),
      type: 'file',
      size: file.data.length,
      modifiedAt: file.modifiedAt
    }
  }

  private directoryInfo(path: string): FileInfo {
    return { path, name: baseName(path), type: 'directory', size: 0 }
  }
}
