/**
 * `rvm list` command
 *
 * Prints the default version (when set), the versions available to install
 * and the versions already installed.
 *
 * Usage:
 *   rvm list
 *   rvm list --solc <version>   Only installed builds supporting this solc version
 */

import type { Command } from 'commander'
import { DefaultVersionNotSetError, NotInstalledError, UnknownVersionError } from '../../core/errors.js'
import type { Binary } from '../../modules/version-manager/binary.js'
import type { VersionManager } from '../../modules/version-manager/version-manager.js'
import { errorMessage, openVersionManager, parseVersionArgument } from '../shared/manager.js'

export const LIST_EXIT_SUCCESS = 0
export const LIST_EXIT_ERROR = 1

export interface ListActionOptions {
  solc?: string
  offline: boolean
  versionManager?: VersionManager
}

/** Default version, or undefined when there is none to report */
async function resolveDefault(manager: VersionManager): Promise<string | undefined> {
  try {
    const binary = await manager.getDefault()
    return binary.info.version
  } catch (err) {
    if (
      err instanceof DefaultVersionNotSetError ||
      err instanceof NotInstalledError ||
      err instanceof UnknownVersionError
    ) {
      return undefined
    }
    throw err
  }
}

function formatVersions(binaries: Binary[]): string {
  return `[${binaries.map((binary) => `"${binary.info.version}"`).join(', ')}]`
}

export async function runListAction(options: ListActionOptions): Promise<number> {
  const { solc, offline } = options
  try {
    const manager = options.versionManager ?? (await openVersionManager({ offline }))
    const binaries = await manager.listAvailable(solc)

    const defaultVersion = await resolveDefault(manager)
    if (defaultVersion !== undefined) {
      console.log(`Default version of Resolc is: ${defaultVersion}`)
    }

    const remote = binaries.filter((binary) => binary.kind === 'remote')
    const local = binaries.filter((binary) => binary.kind === 'local')
    console.log(`Available to install Resolc versions: ${formatVersions(remote)}`)
    console.log(`Already installed Resolc versions: ${formatVersions(local)}`)
    return LIST_EXIT_SUCCESS
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    return LIST_EXIT_ERROR
  }
}

export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('List all available and installed versions of Resolc, and the default if set')
    .option('--solc <version>', 'Only list installed builds supporting this solc version', parseVersionArgument)
    .action(async (opts: { solc?: string }) => {
      const exitCode = await runListAction({
        solc: opts.solc,
        offline: program.opts<{ offline: boolean }>().offline,
      })
      process.exitCode = exitCode
    })
}
