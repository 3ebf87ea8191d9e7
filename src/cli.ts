#!/usr/bin/env node
/**
 * temporal-cache CLI
 *
 * Reads files beneath --root through a cache configured by a policy file.
 */

import { type CLIArgs, parseCliArgs } from './cli/args'
import { cmdCat } from './cli/commands/cat'
import { cmdLs } from './cli/commands/ls'
import { cmdResolve } from './cli/commands/resolve'
import { cmdStat } from './cli/commands/stat'
import { openFileSystem } from './cli/context'
import { createLogger, type Logger } from './logger'

async function run(args: CLIArgs, logger: Logger): Promise<string> {
  const fs = await openFileSystem(args, logger)
  logger.verbose(fs.toString())

  switch (args.command) {
    case 'cat':
      return await cmdCat(args, fs, logger)
    case 'ls':
      return await cmdLs(args, fs, logger)
    case 'stat':
      return await cmdStat(args, fs)
    case 'resolve':
      return cmdResolve(args, fs)
    case 'help':
      throw new Error("Unknown command. Run 'temporal-cache --help' for usage.")
  }
}

async function main(): Promise<void> {
  const args = parseCliArgs()
  const logger = createLogger(args.quiet, args.verbose)

  try {
    process.stdout.write(await run(args, logger))
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(msg)
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exitCode = 1
  }
}

main().catch((error: unknown) => {
  console.error(error)
  process.exitCode = 1
})
