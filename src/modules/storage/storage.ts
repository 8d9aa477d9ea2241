/**
 * BinaryStorage interface: public contract for the on-disk layout.
 *
 * Layout under the root directory:
 *   <root>/<version>/<binary-name>   installed executable
 *   <root>/<version>/build.json      build metadata sidecar
 *   <root>/.default_version          default-version pointer
 *   <root>/.lock-<version>           transient per-version lock
 *   <root>/.lock-0.0.0               transient global lock
 */

import type { CatalogBuild, InstalledBuild } from '../releases/types.js'

export const SIDECAR_FILENAME = 'build.json'
export const DEFAULT_VERSION_FILENAME = '.default_version'

export interface BinaryStorage {
  /** Root directory all paths are relative to */
  readonly root: string

  /** `<root>/<version>` */
  versionDir(version: string): string

  /** `<root>/<version>/<name>` */
  binaryPath(build: Pick<CatalogBuild, 'name' | 'version'>): string

  /** Whether the version directory exists (complete or not) */
  hasVersionDir(version: string): Promise<boolean>

  /** Whether both the binary and its sidecar are on disk */
  isInstalled(build: Pick<CatalogBuild, 'name' | 'version'>): Promise<boolean>

  /**
   * Persist `blob` as the binary for `build`, under the per-version lock.
   * Succeeds without writing when a complete install is already present.
   */
  install(build: CatalogBuild, blob: Uint8Array): Promise<void>

  /**
   * Delete an installed version under its lock, clearing the default
   * pointer first when it references that version. No-op if absent.
   */
  remove(version: string): Promise<void>

  /**
   * Every installed build with a readable sidecar. Entries with a missing
   * or malformed sidecar are skipped.
   */
  installedVersions(): Promise<InstalledBuild[]>

  /** Current default version, or undefined when the pointer is unset */
  getDefaultVersion(): Promise<string | undefined>

  setDefaultVersion(version: string): Promise<void>

  /** Delete the default pointer; succeeds when it is already unset */
  removeDefault(): Promise<void>
}
