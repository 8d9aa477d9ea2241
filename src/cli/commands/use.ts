/**
 * `rvm use` command
 *
 * Sets the default Resolc version, optionally installing it first.
 *
 * Usage:
 *   rvm use <version>
 *   rvm use <version> --install   Install first when missing (ignored offline)
 */

import type { Command } from 'commander'
import { NotInstalledError } from '../../core/errors.js'
import type { VersionManager } from '../../modules/version-manager/version-manager.js'
import { errorMessage, openVersionManager, parseVersionArgument } from '../shared/manager.js'

export const USE_EXIT_SUCCESS = 0
export const USE_EXIT_ERROR = 1

export interface UseActionOptions {
  version: string
  install: boolean
  offline: boolean
  versionManager?: VersionManager
}

async function isMissing(manager: VersionManager, version: string): Promise<boolean> {
  try {
    await manager.get(version)
    return false
  } catch (err) {
    if (err instanceof NotInstalledError) return true
    throw err
  }
}

export async function runUseAction(options: UseActionOptions): Promise<number> {
  const { version, install, offline } = options
  try {
    const manager = options.versionManager ?? (await openVersionManager({ offline }))

    if (install && !(offline || manager.offline) && (await isMissing(manager, version))) {
      process.stderr.write(`Downloading and installing Resolc v${version}\n`)
      await manager.getOrInstall(version)
      console.log(`Resolc v${version} is installed successfully`)
    }

    await manager.setDefault(version)
    console.log(`Successfully set Resolc v${version} as default`)
    return USE_EXIT_SUCCESS
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    return USE_EXIT_ERROR
  }
}

export function registerUseCommand(program: Command): void {
  program
    .command('use')
    .description('Set a default Resolc version to use')
    .argument('<version>', 'Resolc version', parseVersionArgument)
    .option('--install', "Install Resolc binary if it's not already installed", false)
    .action(async (version: string, opts: { install: boolean }) => {
      const exitCode = await runUseAction({
        version,
        install: opts.install,
        offline: program.opts<{ offline: boolean }>().offline,
      })
      process.exitCode = exitCode
    })
}
