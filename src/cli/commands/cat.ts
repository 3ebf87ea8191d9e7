/**
 * Cat Command
 *
 * Print a file's contents as read through the cached filesystem.
 */

import type { CachedFileSystem } from '../../filesystem/index'
import type { Logger } from '../../logger'
import type { CLIArgs } from '../args'

export async function cmdCat(args: CLIArgs, fs: CachedFileSystem, logger: Logger): Promise<string> {
  if (!args.path) {
    throw new Error('No path specified')
  }
  const data = await fs.readFile(args.path)
  logger.verbose(`Read ${data.length} bytes from ${args.path}`)
  return data.toString('utf-8')
}
