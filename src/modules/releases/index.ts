/**
 * releases module: barrel exports
 */

export { ReleaseCatalog, fetchReleaseCatalog } from './release-catalog.js'
export { HttpsReleaseClient, DEFAULT_REQUEST_TIMEOUT_MS } from './release-client.js'
export type { ReleaseClient } from './release-client.js'
export { detectPlatform, manifestUrl, DEFAULT_MANIFEST_BASE_URL } from './platform.js'
export type { Platform, ReleaseChannel } from './platform.js'
export { sha256Hex, verifyChecksum } from './checksum.js'
export { ManifestSchema, ManifestBuildSchema, InstalledBuildSchema } from './schemas.js'
export type { Manifest, ManifestBuild } from './schemas.js'
export { isDownloadable, toInstalledBuild } from './types.js'
export type { BuildDescriptor, InstalledBuild, CatalogBuild } from './types.js'
