/**
 * `rvm which` command
 *
 * Prints the path of an installed Resolc binary.
 *
 * Usage:
 *   rvm which <version>
 *   rvm which <version> --solc <solcVersion>   Also require solc compatibility
 */

import type { Command } from 'commander'
import type { VersionManager } from '../../modules/version-manager/version-manager.js'
import { errorMessage, openVersionManager, parseVersionArgument } from '../shared/manager.js'

export const WHICH_EXIT_SUCCESS = 0
export const WHICH_EXIT_ERROR = 1

export interface WhichActionOptions {
  version: string
  solc?: string
  offline: boolean
  versionManager?: VersionManager
}

export async function runWhichAction(options: WhichActionOptions): Promise<number> {
  const { version, solc, offline } = options
  try {
    const manager = options.versionManager ?? (await openVersionManager({ offline }))
    // get() only ever returns installed binaries
    const binary = await manager.get(version, solc)
    if (binary.kind !== 'local') {
      throw new Error(`Resolc v${version} has no local binary`)
    }
    console.log(`Path to the requested binary version of Resolc: ${binary.path}`)
    return WHICH_EXIT_SUCCESS
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    return WHICH_EXIT_ERROR
  }
}

export function registerWhichCommand(program: Command): void {
  program
    .command('which')
    .description('Print path to the installed Resolc version')
    .argument('<version>', 'Resolc version', parseVersionArgument)
    .option('--solc <version>', 'Require compatibility with this solc version', parseVersionArgument)
    .action(async (version: string, opts: { solc?: string }) => {
      const exitCode = await runWhichAction({
        version,
        solc: opts.solc,
        offline: program.opts<{ offline: boolean }>().offline,
      })
      process.exitCode = exitCode
    })
}
