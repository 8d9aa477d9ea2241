/**
 * version-manager module: barrel exports
 *
 * Re-exports all public types and classes for the version management subsystem.
 */

export type { VersionManager } from './version-manager.js'
export type { VersionManagerDeps, CreateVersionManagerOptions } from './version-manager-impl.js'
export { VersionManagerImpl, createVersionManager } from './version-manager-impl.js'
export {
  localBinary,
  remoteBinary,
  binaryVersion,
  localPath,
  compareBinaries,
  describeBinary,
} from './binary.js'
export type { Binary, BinaryInfo } from './binary.js'
