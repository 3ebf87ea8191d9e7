/**
 * temporal-cache
 *
 * Time-windowed, policy-driven memoization for operations on keyed
 * resources, with a caching filesystem wrapper built on top.
 */

export { CONFIG_ENV_VAR, getConfigPath, loadPolicyConfig } from './config'
export {
  ConfigurationError,
  FileNotFoundError,
  type PersistenceAction,
  PersistenceWarning,
  type WarningHandler
} from './errors'
export {
  type ByteRange,
  CachedFileSystem,
  type CreateFileSystemOptions,
  createFileSystem,
  type FileInfo,
  type FileSystemProvider,
  type FileType,
  isProtocol,
  LocalFileSystem,
  MemoryFileSystem,
  normalizePath,
  PROTOCOLS,
  type Protocol
} from './filesystem/index'
export {
  CacheSwitch,
  disable,
  enable,
  globalCacheSwitch,
  isCacheDisabled
} from './gate/switch'
export { type Clock, TemporalGate, type TemporalGateOptions } from './gate/temporal-gate'
export { createLogger, type Logger } from './logger'
export { type BlobStore, LocalBlobStore, MemoryBlobStore } from './memo/blob-store'
export { encodeKeyValue, serializeArgs, stableStringify } from './memo/key'
export { KeyedMemoStore } from './memo/keyed'
export { PersistentMemoStore, type PersistentMemoStoreOptions } from './memo/persistent'
export { createSnapshotCodec, type SnapshotCodec, type SnapshotEntry } from './memo/snapshot'
export type { MemoStore, MemoStoreOptions, Operation } from './memo/types'
export {
  DURATION_UNITS,
  type DurationParts,
  type DurationUnit,
  totalSeconds
} from './policy/duration'
export { globMatch, globToRegExp } from './policy/glob'
export { parseCacheParams, parsePolicyConfig } from './policy/params'
export { PolicyResolver, type PolicyResolverOptions } from './policy/resolver'
export {
  type CacheParams,
  DEFAULT_CAPACITY,
  type ParsedPolicyConfig,
  type PolicyConfig,
  type PolicyRule,
  type PolicyRules,
  type PolicySource,
  type ResolvedPolicy
} from './policy/types'
export {
  CachedOperation,
  CacheRouter,
  type CacheRouterOptions,
  type KeyedOperation,
  snapshotPath
} from './router/index'

export const VERSION = '0.1.0'
