/**
 * `rvm install` command
 *
 * Downloads, verifies and installs a Resolc build.
 *
 * Usage:
 *   rvm install <version>                 Install a version
 *   rvm install <version> --set-default   Install and make it the default
 *
 * Exit codes:
 *   0 - Installed, or already installed
 *   1 - Error (offline, unknown version, checksum mismatch, ...)
 */

import type { Command } from 'commander'
import { CantInstallOfflineError } from '../../core/errors.js'
import type { VersionManager } from '../../modules/version-manager/version-manager.js'
import { createLogger } from '../../utils/logger.js'
import { errorMessage, openVersionManager, parseVersionArgument } from '../shared/manager.js'

const logger = createLogger('install-cmd')

export const INSTALL_EXIT_SUCCESS = 0
export const INSTALL_EXIT_ERROR = 1

export interface InstallActionOptions {
  version: string
  setDefault: boolean
  offline: boolean
  /** Injected manager (tests); opened from the environment otherwise */
  versionManager?: VersionManager
}

export async function runInstallAction(options: InstallActionOptions): Promise<number> {
  const { version, setDefault, offline } = options

  try {
    if (offline) {
      throw new CantInstallOfflineError({ version })
    }

    const manager = options.versionManager ?? (await openVersionManager({ offline }))
    // RVM_OFFLINE or config.yaml may have switched the manager offline
    if (manager.offline) {
      throw new CantInstallOfflineError({ version })
    }

    if (await manager.isInstalled(version)) {
      console.log(`Resolc v${version} is already installed`)
      return INSTALL_EXIT_SUCCESS
    }

    process.stderr.write(`Downloading and installing Resolc v${version}\n`)
    await manager.getOrInstall(version)
    console.log(`Resolc v${version} is installed successfully`)

    if (setDefault) {
      await manager.setDefault(version)
      console.log(`Successfully set Resolc v${version} as default`)
    }
    return INSTALL_EXIT_SUCCESS
  } catch (err) {
    logger.debug({ err, version }, 'install failed')
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    return INSTALL_EXIT_ERROR
  }
}

export function registerInstallCommand(program: Command): void {
  program
    .command('install')
    .description('Install given version of Resolc')
    .argument('<version>', 'Resolc version', parseVersionArgument)
    .option('--set-default', 'Use as default Resolc version', false)
    .action(async (version: string, opts: { setDefault: boolean }) => {
      const exitCode = await runInstallAction({
        version,
        setDefault: opts.setDefault,
        offline: program.opts<{ offline: boolean }>().offline,
      })
      process.exitCode = exitCode
    })
}
