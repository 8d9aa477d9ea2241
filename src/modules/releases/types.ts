/**
 * Build types shared by the release catalog, storage layer and version manager.
 */

/**
 * Metadata every known build carries, whether it came from the remote
 * manifest or from a `build.json` sidecar on disk.
 */
export interface InstalledBuild {
  /** Platform-specific artifact filename */
  readonly name: string
  /** Resolc version; unique key within a catalog */
  readonly version: string
  /** Extended identifier embedding build metadata (commit hash, LLVM version) */
  readonly longVersion: string
  /** First solc version supported by this build (inclusive) */
  readonly firstSolcVersion: string
  /** Last solc version supported by this build (inclusive) */
  readonly lastSolcVersion: string
}

/** A published, downloadable build */
export interface BuildDescriptor extends InstalledBuild {
  readonly url: string
  /** Expected SHA-256 of the binary; absent when the manifest does not publish one */
  readonly sha256?: string
}

/** Builds synthesized from local installs carry no source URL */
export type CatalogBuild = BuildDescriptor | InstalledBuild

export function isDownloadable(build: CatalogBuild): build is BuildDescriptor {
  return 'url' in build && typeof build.url === 'string'
}

/** Strip the download-only fields before persisting a sidecar */
export function toInstalledBuild(build: CatalogBuild): InstalledBuild {
  return {
    name: build.name,
    version: build.version,
    longVersion: build.longVersion,
    firstSolcVersion: build.firstSolcVersion,
    lastSolcVersion: build.lastSolcVersion,
  }
}
