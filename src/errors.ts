/**
 * Error Types
 *
 * Configuration problems fail fast at construction time. Persistence problems
 * are warnings: they are reported through a side channel and never fail a call.
 * Errors raised by wrapped operations are not wrapped at all.
 */

/**
 * Thrown when a cache policy or config file cannot be used as given.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ConfigurationError'
  }
}

export type PersistenceAction = 'read' | 'write' | 'delete'

/**
 * Non-fatal failure to read, write or delete a persisted cache snapshot.
 */
export class PersistenceWarning extends Error {
  readonly path: string
  readonly action: PersistenceAction

  constructor(action: PersistenceAction, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Failed to ${action} cache snapshot ${path}: ${reason}`, { cause })
    this.name = 'PersistenceWarning'
    this.path = path
    this.action = action
  }
}

export type WarningHandler = (warning: PersistenceWarning) => void

/**
 * Raised by filesystem providers for a path that does not exist.
 */
export class FileNotFoundError extends Error {
  readonly code = 'ENOENT'
  readonly path: string

  constructor(path: string, options?: { cause?: unknown }) {
    super(`No such file or directory: ${path}`, options)
    this.name = 'FileNotFoundError'
    this.path = path
  }
}
