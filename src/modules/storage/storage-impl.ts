/**
 * FsBinaryStorage: filesystem implementation of BinaryStorage.
 *
 * Installs are guarded by a per-version lock and written with create-new
 * semantics: the binary first, then the `build.json` sidecar, which marks
 * the install as complete.
 */

import { chmod, mkdir, readFile, readdir, rm, stat, unlink, writeFile } from 'node:fs/promises'
import path from 'node:path'
import * as semver from 'semver'
import { InvalidVersionError, isErrnoException } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { InstalledBuildSchema } from '../releases/schemas.js'
import { toInstalledBuild } from '../releases/types.js'
import type { CatalogBuild, InstalledBuild } from '../releases/types.js'
import { GLOBAL_LOCK_KEY, withLock } from './file-lock.js'
import type { LockOptions } from './file-lock.js'
import { DEFAULT_VERSION_FILENAME, SIDECAR_FILENAME } from './storage.js'
import type { BinaryStorage } from './storage.js'

const logger = createLogger('storage')

const EXECUTABLE_MODE = 0o755

async function pathExists(p: string): Promise<boolean> {
  try {
    await stat(p)
    return true
  } catch (err) {
    if (isErrnoException(err, 'ENOENT') || isErrnoException(err, 'ENOTDIR')) return false
    throw err
  }
}

// ---------------------------------------------------------------------------
// FsBinaryStorage
// ---------------------------------------------------------------------------

export class FsBinaryStorage implements BinaryStorage {
  readonly root: string
  private readonly lockOptions: LockOptions

  constructor(root: string, lockOptions: LockOptions = {}) {
    this.root = root
    this.lockOptions = lockOptions
  }

  /** @throws {InvalidVersionError} unless `version` is a canonical semver string */
  versionDir(version: string): string {
    if (semver.valid(version) !== version) {
      throw new InvalidVersionError(version, { root: this.root })
    }
    const dir = path.join(this.root, version)
    if (path.dirname(path.resolve(dir)) !== path.resolve(this.root)) {
      throw new InvalidVersionError(version, { root: this.root })
    }
    return dir
  }

  binaryPath(build: Pick<CatalogBuild, 'name' | 'version'>): string {
    return path.join(this.versionDir(build.version), build.name)
  }

  async hasVersionDir(version: string): Promise<boolean> {
    return pathExists(this.versionDir(version))
  }

  async isInstalled(build: Pick<CatalogBuild, 'name' | 'version'>): Promise<boolean> {
    return (
      (await pathExists(this.binaryPath(build))) &&
      (await pathExists(path.join(this.versionDir(build.version), SIDECAR_FILENAME)))
    )
  }

  async install(build: CatalogBuild, blob: Uint8Array): Promise<void> {
    const { version } = build

    await withLock(
      this.root,
      version,
      async () => {
        // Another process may have finished this install while we waited
        if (await this.hasCompleteInstall(build)) {
          logger.debug({ version }, 'Build already installed')
          return
        }

        const dir = this.versionDir(version)
        if (await pathExists(dir)) {
          logger.warn({ version, dir }, 'Removing incomplete install')
          await rm(dir, { recursive: true, force: true })
        }

        await mkdir(dir, { recursive: true })

        const binaryPath = this.binaryPath(build)
        const sidecarPath = path.join(dir, SIDECAR_FILENAME)
        try {
          await writeFile(binaryPath, blob, { flag: 'wx', mode: EXECUTABLE_MODE })
          if (process.platform !== 'win32') {
            // Creation mode is filtered by the umask
            await chmod(binaryPath, EXECUTABLE_MODE)
          }
          await writeFile(sidecarPath, JSON.stringify(toInstalledBuild(build), null, 2), {
            flag: 'wx',
          })
        } catch (err) {
          if (isErrnoException(err, 'EEXIST') && (await this.hasCompleteInstall(build))) {
            logger.debug({ version }, 'Install already present')
            return
          }
          throw err
        }

        logger.info({ version, path: binaryPath }, 'Installed build')
      },
      this.lockOptions
    )
  }

  async remove(version: string): Promise<void> {
    const dir = this.versionDir(version)
    if (!(await pathExists(dir))) return

    await withLock(
      this.root,
      version,
      async () => {
        await this.clearDefaultIf(version)
        await rm(dir, { recursive: true, force: true })
        logger.info({ version }, 'Removed build')
      },
      this.lockOptions
    )
  }

  async installedVersions(): Promise<InstalledBuild[]> {
    const entries = await readdir(this.root, { withFileTypes: true })
    const builds: InstalledBuild[] = []

    for (const entry of entries) {
      if (entry.isFile()) continue
      const build = await this.readSidecar(path.join(this.root, entry.name))
      if (build !== undefined) builds.push(build)
    }

    return builds.sort((a, b) => semver.compare(a.version, b.version))
  }

  async getDefaultVersion(): Promise<string | undefined> {
    let raw: string
    try {
      raw = await readFile(path.join(this.root, DEFAULT_VERSION_FILENAME), 'utf-8')
    } catch (err) {
      if (isErrnoException(err, 'ENOENT')) return undefined
      throw err
    }

    const value = raw.trim().replace(/^\/+|\/+$/g, '')
    const version = semver.valid(value)
    if (version === null) {
      throw new InvalidVersionError(value, { source: DEFAULT_VERSION_FILENAME })
    }
    return version
  }

  async setDefaultVersion(version: string): Promise<void> {
    await withLock(
      this.root,
      GLOBAL_LOCK_KEY,
      async () => {
        await writeFile(path.join(this.root, DEFAULT_VERSION_FILENAME), version, 'utf-8')
      },
      this.lockOptions
    )
    logger.info({ version }, 'Default version set')
  }

  async removeDefault(): Promise<void> {
    await withLock(
      this.root,
      GLOBAL_LOCK_KEY,
      async () => {
        await this.unlinkDefault()
      },
      this.lockOptions
    )
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async unlinkDefault(): Promise<void> {
    try {
      await unlink(path.join(this.root, DEFAULT_VERSION_FILENAME))
    } catch (err) {
      if (!isErrnoException(err, 'ENOENT')) throw err
    }
  }

  /** Check and clear under one hold of the global lock */
  private async clearDefaultIf(version: string): Promise<void> {
    await withLock(
      this.root,
      GLOBAL_LOCK_KEY,
      async () => {
        let current: string | undefined
        try {
          current = await this.getDefaultVersion()
        } catch (err) {
          if (err instanceof InvalidVersionError) return
          throw err
        }
        if (current === version) {
          await this.unlinkDefault()
          logger.info({ version }, 'Cleared default version')
        }
      },
      this.lockOptions
    )
  }

  private async hasCompleteInstall(build: Pick<CatalogBuild, 'name' | 'version'>): Promise<boolean> {
    if (!(await pathExists(this.binaryPath(build)))) return false
    const sidecar = await this.readSidecar(this.versionDir(build.version))
    return sidecar?.version === build.version
  }

  private async readSidecar(dir: string): Promise<InstalledBuild | undefined> {
    let raw: string
    try {
      raw = await readFile(path.join(dir, SIDECAR_FILENAME), 'utf-8')
    } catch (err) {
      logger.debug({ dir, err }, 'No readable build sidecar')
      return undefined
    }

    let document: unknown
    try {
      document = JSON.parse(raw)
    } catch (err) {
      logger.debug({ dir, err }, 'Malformed build sidecar')
      return undefined
    }

    const result = InstalledBuildSchema.safeParse(document)
    if (!result.success) {
      logger.debug({ dir, issues: result.error.issues }, 'Invalid build sidecar')
      return undefined
    }
    return result.data
  }
}
