/**
 * Filesystem Types
 */

export type FileType = 'file' | 'directory'

/**
 * Metadata for one entry. Plain data, so it can be cached and persisted.
 */
export interface FileInfo {
  readonly path: string
  readonly name: string
  readonly type: FileType
  /** Bytes; 0 for directories */
  readonly size: number
  /** ISO 8601, when the provider tracks it */
  readonly modifiedAt?: string | undefined
}

/**
 * Half-open byte range, like `Buffer#subarray`.
 */
export interface ByteRange {
  readonly start?: number | undefined
  readonly end?: number | undefined
}

/**
 * A storage backend addressed by absolute, slash-separated paths.
 * Missing paths reject with FileNotFoundError.
 */
export interface FileSystemProvider {
  /** Short name such as "memory" or "file" */
  readonly protocol: string
  readFile(path: string, range?: ByteRange): Promise<Buffer>
  list(path: string): Promise<FileInfo[]>
  stat(path: string): Promise<FileInfo>
  exists(path: string): Promise<boolean>
  writeFile(path: string, data: Uint8Array | string): Promise<void>
  remove(path: string): Promise<void>
}
