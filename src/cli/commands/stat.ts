/**
 * Stat Command
 */

import type { CachedFileSystem } from '../../filesystem/index'
import type { CLIArgs } from '../args'

export async function cmdStat(args: CLIArgs, fs: CachedFileSystem): Promise<string> {
  if (!args.path) {
    throw new Error('No path specified')
  }
  return `${JSON.stringify(await fs.stat(args.path), null, 2)}\n`
}
