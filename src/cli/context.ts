/**
 * CLI Context
 *
 * Builds the cached filesystem a command runs against from the global options.
 */

import { getConfigPath, loadPolicyConfig } from '../config'
import { type CachedFileSystem, createFileSystem } from '../filesystem/index'
import type { Logger } from '../logger'
import type { CLIArgs } from './args'

export async function openFileSystem(args: CLIArgs, logger: Logger): Promise<CachedFileSystem> {
  const configPath = getConfigPath(args.configFile)
  const policy = await loadPolicyConfig(configPath)
  if (policy) {
    logger.verbose(`Loaded cache policy from ${configPath}`)
  } else {
    logger.verbose(`No cache policy at ${configPath}, reading without cache`)
  }

  return createFileSystem('file', {
    root: args.root,
    policy: policy ?? undefined,
    onWarning: (warning) => logger.warn(warning.message)
  })
}
