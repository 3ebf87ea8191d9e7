/**
 * Logger
 *
 * Console-backed logging shared by the CLI and the default warning handler.
 */

import type { PersistenceWarning } from './errors'

export interface Logger {
  log: (msg: string) => void
  verbose: (msg: string) => void
  warn: (msg: string) => void
  error: (msg: string) => void
}

export function createLogger(quiet: boolean, verbose: boolean): Logger {
  return {
    log: (msg: string) => {
      if (!quiet) console.log(msg)
    },
    verbose: (msg: string) => {
      if (verbose) console.log(`  [debug] ${msg}`)
    },
    warn: (msg: string) => {
      console.warn(`  ! ${msg}`)
    },
    error: (msg: string) => {
      console.error(`  ✗ ${msg}`)
    }
  }
}

const defaultLogger = createLogger(false, false)

/**
 * Used when a persistent store is built without an `onWarning` handler.
 */
export function logPersistenceWarning(warning: PersistenceWarning): void {
  defaultLogger.warn(warning.message)
}
