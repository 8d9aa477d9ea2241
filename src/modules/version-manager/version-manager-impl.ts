/**
 * VersionManagerImpl: concrete implementation of the VersionManager interface.
 *
 * Holds one release catalog for its whole lifetime (fetched online, or
 * synthesized from local installs when offline) and delegates all disk
 * state to BinaryStorage. The default pointer is re-read on every call since
 * other processes may change it.
 */

import type pino from 'pino'
import * as semver from 'semver'
import {
  CantInstallOfflineError,
  DefaultVersionNotSetError,
  InvalidVersionError,
  NotInstalledError,
} from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { checkSolcCompat, isSolcCompatible } from '../compat/solc-compat.js'
import { DEFAULT_CONFIG } from '../config/defaults.js'
import type { RvmConfig } from '../config/config-schema.js'
import { verifyChecksum } from '../releases/checksum.js'
import { detectPlatform, manifestUrl } from '../releases/platform.js'
import type { Platform } from '../releases/platform.js'
import { ReleaseCatalog, fetchReleaseCatalog } from '../releases/release-catalog.js'
import { HttpsReleaseClient } from '../releases/release-client.js'
import type { ReleaseClient } from '../releases/release-client.js'
import { isDownloadable } from '../releases/types.js'
import { ensureDataDir, resolveDataDirPath } from '../storage/data-dir.js'
import { FsBinaryStorage } from '../storage/storage-impl.js'
import type { BinaryStorage } from '../storage/storage.js'
import { compareBinaries, localBinary, remoteBinary } from './binary.js'
import type { Binary } from './binary.js'
import type { VersionManager } from './version-manager.js'

// ---------------------------------------------------------------------------
// Dependencies interface
// ---------------------------------------------------------------------------

export interface VersionManagerDeps {
  catalog: ReleaseCatalog
  storage: BinaryStorage
  client: ReleaseClient
  offline?: boolean
  logger?: pino.Logger
}

// ---------------------------------------------------------------------------
// VersionManagerImpl
// ---------------------------------------------------------------------------

export class VersionManagerImpl implements VersionManager {
  readonly offline: boolean
  private readonly catalog: ReleaseCatalog
  private readonly storage: BinaryStorage
  private readonly client: ReleaseClient
  private readonly logger: pino.Logger

  constructor(deps: VersionManagerDeps) {
    this.catalog = deps.catalog
    this.storage = deps.storage
    this.client = deps.client
    this.offline = deps.offline === true
    this.logger = deps.logger ?? createLogger('version-manager')
  }

  async get(version: string, solcVersion?: string): Promise<Binary> {
    const build = this.catalog.lookup(version)

    if (solcVersion !== undefined) {
      checkSolcCompat(build, solcVersion)
    }

    if (await this.storage.isInstalled(build)) {
      return localBinary(build, this.storage.binaryPath(build))
    }
    throw new NotInstalledError(build.version)
  }

  async getOrInstall(version: string, solcVersion?: string): Promise<Binary> {
    try {
      return await this.get(version, solcVersion)
    } catch (err) {
      if (!(err instanceof NotInstalledError)) throw err
    }

    if (this.offline) {
      throw new CantInstallOfflineError({ version })
    }

    const build = this.catalog.lookup(version)
    if (!isDownloadable(build)) {
      throw new CantInstallOfflineError({ version, reason: 'build has no source URL' })
    }

    this.logger.info({ version: build.version, url: build.url }, 'Downloading build')
    const blob = await this.client.download(build.url)

    if (build.sha256 !== undefined) {
      verifyChecksum(blob, build.sha256)
    } else {
      this.logger.warn({ version: build.version }, 'Manifest publishes no checksum; skipping verification')
    }

    await this.storage.install(build, blob)
    return localBinary(build, this.storage.binaryPath(build))
  }

  async remove(version: string): Promise<void> {
    const normalized = semver.valid(version)
    if (normalized === null) {
      throw new InvalidVersionError(version, { operation: 'remove' })
    }
    if (!(await this.storage.hasVersionDir(normalized))) {
      throw new NotInstalledError(normalized)
    }
    await this.storage.remove(normalized)
  }

  async getDefault(): Promise<Binary> {
    const version = await this.storage.getDefaultVersion()
    if (version === undefined) {
      throw new DefaultVersionNotSetError()
    }
    return this.get(version)
  }

  async setDefault(version: string): Promise<void> {
    const binary = await this.get(version)
    await this.storage.setDefaultVersion(binary.info.version)
  }

  async listAvailable(solcVersion?: string): Promise<Binary[]> {
    const installedVersions = new Set<string>()
    const installed: Binary[] = []

    for (const build of await this.storage.installedVersions()) {
      if (solcVersion !== undefined && !isSolcCompatible(build, solcVersion)) continue
      installedVersions.add(build.version)
      installed.push(localBinary(build, this.storage.binaryPath(build)))
    }

    const available = this.catalog.builds
      .filter((build) => !installedVersions.has(build.version))
      .map((build) => remoteBinary(build))

    return [...installed, ...available].sort(compareBinaries)
  }

  async isInstalled(version: string): Promise<boolean> {
    if (!this.catalog.has(version)) return false
    return this.storage.isInstalled(this.catalog.lookup(version))
  }

  latestRelease(): string {
    return this.catalog.latestRelease
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export interface CreateVersionManagerOptions {
  /** Synthesize the catalog from local installs instead of fetching it */
  offline?: boolean
  config?: RvmConfig
  /** Root directory; resolved from the environment when omitted */
  rootDir?: string
  client?: ReleaseClient
  platform?: Platform
}

/**
 * Build a VersionManager for the current machine.
 *
 * @throws {NoVersionsInstalledError} offline with nothing installed
 * @throws {PlatformNotSupportedError} online on a platform without binaries
 * @throws {HttpRequestError | ManifestParseError} if the manifest cannot be fetched
 */
export async function createVersionManager(
  options: CreateVersionManagerOptions = {}
): Promise<VersionManager> {
  const config = options.config ?? DEFAULT_CONFIG
  const offline = options.offline ?? config.offline
  const root = await ensureDataDir(options.rootDir ?? resolveDataDirPath())
  const storage = new FsBinaryStorage(root, { staleMs: config.lock_stale_ms })
  const client = options.client ?? new HttpsReleaseClient(config.request_timeout_ms)
  const logger = createLogger('version-manager')

  let catalog: ReleaseCatalog
  if (offline) {
    catalog = ReleaseCatalog.fromInstalled(await storage.installedVersions())
  } else {
    const platform = options.platform ?? detectPlatform()
    catalog = await fetchReleaseCatalog(
      manifestUrl(platform, 'stable', config.manifest_base_url),
      client
    )
    if (config.include_nightly) {
      const nightly = await fetchReleaseCatalog(
        manifestUrl(platform, 'nightly', config.manifest_base_url),
        client
      )
      catalog = catalog.merge(nightly)
    }
  }

  logger.debug(
    { root, offline, builds: catalog.builds.length, latest: catalog.latestRelease },
    'Version manager ready'
  )
  return new VersionManagerImpl({ catalog, storage, client, offline, logger })
}
