/**
 * Shared bootstrap for CLI entry points: resolve the root, load config,
 * apply the configured log level and build a VersionManager.
 */

import { InvalidArgumentError } from 'commander'
import * as semver from 'semver'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { PartialRvmConfig } from '../../modules/config/config-schema.js'
import { ensureDataDir, resolveDataDirPath } from '../../modules/storage/data-dir.js'
import { createVersionManager } from '../../modules/version-manager/version-manager-impl.js'
import type { VersionManager } from '../../modules/version-manager/version-manager.js'
import { setLogLevel } from '../../utils/logger.js'

export interface OpenVersionManagerOptions {
  offline?: boolean
  /** Root directory; resolved from the environment when omitted */
  rootDir?: string
}

export async function openVersionManager(options: OpenVersionManagerOptions = {}): Promise<VersionManager> {
  const rootDir = await ensureDataDir(options.rootDir ?? resolveDataDirPath())

  const cliOverrides: PartialRvmConfig = {}
  if (options.offline === true) cliOverrides.offline = true

  const configSystem = createConfigSystem({ configDir: rootDir, cliOverrides })
  await configSystem.load()
  const config = configSystem.getConfig()
  setLogLevel(config.log_level)

  return createVersionManager({ config, rootDir, offline: config.offline })
}

/** Commander argument parser accepting a strict semver version (a leading `v` is allowed) */
export function parseVersionArgument(value: string): string {
  const parsed = semver.valid(value)
  if (parsed === null) {
    throw new InvalidArgumentError(`"${value}" is not a valid semver version`)
  }
  return parsed
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
