/**
 * Ls Command
 *
 * List a directory through the cached filesystem.
 */

import type { CachedFileSystem, FileInfo } from '../../filesystem/index'
import type { Logger } from '../../logger'
import type { CLIArgs } from '../args'

function formatEntry(entry: FileInfo, long: boolean): string {
  const name = entry.type === 'directory' ? `${entry.name}/` : entry.name
  if (!long) return name
  const type = entry.type === 'directory' ? 'd' : '-'
  return `${type} ${String(entry.size).padStart(10)}  ${name}`
}

export async function cmdLs(args: CLIArgs, fs: CachedFileSystem, logger: Logger): Promise<string> {
  const path = args.path || '/'
  const entries = await fs.list(path)
  logger.verbose(`Found ${entries.length} entries in ${path}`)
  return entries.map((entry) => `${formatEntry(entry, args.long)}\n`).join('')
}
