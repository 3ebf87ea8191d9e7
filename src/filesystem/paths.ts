import { posix } from 'node:path'

/**
 * Absolute, slash-separated form of a path: `a//b/../c/` → `/a/c`.
 * Paths cannot climb above the root.
 */
export function normalizePath(path: string): string {
  const normalized = posix.normalize(`/${path}`)
  return normalized.length > 1 && normalized.endsWith('/') ? normalized.slice(0, -1) : normalized
}

export function baseName(path: string): string {
  return posix.basename(path)
}
