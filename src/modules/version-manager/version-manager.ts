/**
 * VersionManager interface.
 *
 * Orchestrates the release catalog and the on-disk storage: look up builds,
 * install them, pick a default and list what is available.
 */

import type { Binary } from './binary.js'

export interface VersionManager {
  /** Whether the catalog was synthesized from local installs */
  readonly offline: boolean

  /**
   * Return an already installed binary. Never installs.
   *
   * @param version - Resolc version
   * @param solcVersion - when given, the build must support this solc version
   * @throws {UnknownVersionError} if the version is not in the catalog
   * @throws {SolcVersionNotSupportedError} if `solcVersion` is out of range
   * @throws {NotInstalledError} if the build is not on disk
   */
  get(version: string, solcVersion?: string): Promise<Binary>

  /**
   * Return the installed binary, downloading, verifying and installing it
   * first when needed.
   *
   * @throws {CantInstallOfflineError} in offline mode when the build is missing
   * @throws {ChecksumValidationError} if the download does not match the manifest
   */
  getOrInstall(version: string, solcVersion?: string): Promise<Binary>

  /**
   * Uninstall a version, clearing the default pointer if it pointed there.
   *
   * @throws {NotInstalledError} if the version directory is absent
   */
  remove(version: string): Promise<void>

  /**
   * Resolve the default version to an installed binary.
   *
   * @throws {DefaultVersionNotSetError} if no default was set
   */
  getDefault(): Promise<Binary>

  /** Point the default at an installed version (refuses anything not installed) */
  setDefault(version: string): Promise<void>

  /**
   * Installed builds (compatible with `solcVersion`, when given) as local
   * binaries followed by every other catalog build as remote, sorted by version.
   */
  listAvailable(solcVersion?: string): Promise<Binary[]>

  /** Whether the catalog knows `version` and it is fully installed */
  isInstalled(version: string): Promise<boolean>

  /** Latest release flagged by the catalog */
  latestRelease(): string
}
