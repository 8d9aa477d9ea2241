/**
 * storage module: barrel exports
 */

export type { BinaryStorage } from './storage.js'
export { SIDECAR_FILENAME, DEFAULT_VERSION_FILENAME } from './storage.js'
export { FsBinaryStorage } from './storage-impl.js'
export { withLock, lockFilePath, GLOBAL_LOCK_KEY, DEFAULT_LOCK_STALE_MS } from './file-lock.js'
export type { LockOptions } from './file-lock.js'
export { resolveDataDirPath, ensureDataDir, platformDataDir } from './data-dir.js'
export type { DataDirEnvironment } from './data-dir.js'
