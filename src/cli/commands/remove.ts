/**
 * `rvm remove` command
 *
 * Uninstalls a Resolc version. If it was the default, the default is cleared.
 */

import type { Command } from 'commander'
import type { VersionManager } from '../../modules/version-manager/version-manager.js'
import { errorMessage, openVersionManager, parseVersionArgument } from '../shared/manager.js'

export const REMOVE_EXIT_SUCCESS = 0
export const REMOVE_EXIT_ERROR = 1

export interface RemoveActionOptions {
  version: string
  offline: boolean
  versionManager?: VersionManager
}

export async function runRemoveAction(options: RemoveActionOptions): Promise<number> {
  const { version, offline } = options
  try {
    const manager = options.versionManager ?? (await openVersionManager({ offline }))
    await manager.remove(version)
    console.log(`Resolc v${version} is removed successfully`)
    return REMOVE_EXIT_SUCCESS
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    return REMOVE_EXIT_ERROR
  }
}

export function registerRemoveCommand(program: Command): void {
  program
    .command('remove')
    .description('Uninstall given version of Resolc')
    .argument('<version>', 'Resolc version', parseVersionArgument)
    .action(async (version: string) => {
      const exitCode = await runRemoveAction({
        version,
        offline: program.opts<{ offline: boolean }>().offline,
      })
      process.exitCode = exitCode
    })
}
