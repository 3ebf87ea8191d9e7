/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with shared global options.
 */

import { Command } from 'commander'
import { CONFIG_ENV_VAR } from '../config'
import { VERSION } from '../index'

export const COMMANDS = ['cat', 'ls', 'stat', 'resolve'] as const
export type CommandName = (typeof COMMANDS)[number]

export interface CLIArgs {
  command: CommandName | 'help'
  path: string
  /** Directory that paths are resolved against */
  root: string
  configFile: string | undefined
  /** For ls: show type and size */
  long: boolean
  quiet: boolean
  verbose: boolean
}

const DESCRIPTION = `Read files through a time-windowed cache driven by a policy file.

The policy (JSON) maps paths, globs and regexes to cache windows:
  { "globs": { "*.csv": { "minutes": 10 } }, "default": { "seconds": 30 } }

Examples:
  $ temporal-cache resolve /data/report.csv
  $ temporal-cache --root ./data cat /report.csv
  $ temporal-cache ls -l /`

function createProgram(): Command {
  const program = new Command()
    .name('temporal-cache')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--config <path>', `Cache policy file (or set ${CONFIG_ENV_VAR})`)
    .option('--root <dir>', 'Directory to serve files from', '.')

  program
    .command('cat')
    .description('Print a file through the cache')
    .argument('<path>', 'File path, relative to --root')

  program
    .command('ls')
    .description('List a directory through the cache')
    .argument('[path]', 'Directory path, relative to --root', '/')
    .option('-l, --long', 'Show entry type and size')

  program
    .command('stat')
    .description('Print file metadata as JSON')
    .argument('<path>', 'File path, relative to --root')

  program
    .command('resolve')
    .description('Show which cache policy applies to a path')
    .argument('<path>', 'Path to match against the policy')

  return program
}

function isCommandName(name: string): name is CommandName {
  return COMMANDS.some((command) => command === name)
}

function buildCLIArgs(commandName: string, path: string, opts: Record<string, unknown>): CLIArgs {
  return {
    command: isCommandName(commandName) ? commandName : 'help',
    path,
    root: typeof opts.root === 'string' ? opts.root : '.',
    configFile: typeof opts.config === 'string' ? opts.config : undefined,
    long: opts.long === true,
    quiet: opts.quiet === true,
    verbose: opts.verbose === true
  }
}

/**
 * Register an action on every subcommand that stores its parsed args.
 */
function captureArgs(program: Command, capture: (args: CLIArgs) => void): void {
  for (const cmd of program.commands) {
    cmd.action((path?: string) => {
      capture(buildCLIArgs(cmd.name(), path ?? '', cmd.optsWithGlobals()))
    })
  }
}

/**
 * Parse process.argv. Exits on --help, --version, or no command.
 */
export function parseCliArgs(): CLIArgs {
  const program = createProgram()

  let result: CLIArgs | null = null
  captureArgs(program, (args) => {
    result = args
  })

  program.parse()

  if (!result) {
    program.help()
  }
  return result ?? buildCLIArgs('help', '', {})
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const program = createProgram()

  if (!exitOnHelp) {
    program.exitOverride()
    program.configureOutput({ writeOut: () => {}, writeErr: () => {} })
  }

  let result: CLIArgs | null = null
  captureArgs(program, (args) => {
    result = args
  })

  try {
    program.parse(argv, { from: 'user' })
  } catch (error) {
    // exitOverride throws on help, version and usage errors
    if (!result) {
      return buildCLIArgs('help', '', {})
    }
    throw error
  }

  return result ?? buildCLIArgs('help', '', {})
}
