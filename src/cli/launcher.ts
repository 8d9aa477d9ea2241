/**
 * resolc launcher
 *
 * Resolves the Resolc binary to run (`+<version>` as the first argument, or
 * the default version) from local installs only, then executes it with the
 * remaining arguments and inherited stdio.
 */

import { spawn } from 'child_process'
import { existsSync } from 'fs'
import * as semver from 'semver'
import { InvalidVersionError } from '../core/errors.js'
import type { Binary } from '../modules/version-manager/binary.js'
import type { VersionManager } from '../modules/version-manager/version-manager.js'
import { createLogger } from '../utils/logger.js'
import { openVersionManager } from './shared/manager.js'

const logger = createLogger('launcher')

/** Exit code reported when the child is terminated by a signal */
export const SIGNAL_EXIT_CODE = -1

export type SpawnFn = typeof spawn

export interface LauncherDeps {
  /** Manager factory; defaults to an offline manager over the resolved root */
  openManager?: () => Promise<VersionManager>
  spawnFn?: SpawnFn
  /** Existence check for the resolved binary path */
  exists?: (path: string) => boolean
}

export interface LaunchTarget {
  binaryPath: string
  version: string
  args: string[]
}

/**
 * Pick the binary to run and the arguments to forward.
 *
 * @throws {InvalidVersionError} if `+<version>` does not parse
 */
export async function resolveLaunchTarget(
  argv: readonly string[],
  manager: VersionManager,
  exists: (path: string) => boolean = existsSync
): Promise<LaunchTarget> {
  const [first, ...rest] = argv
  let binary: Binary
  let args: string[]

  if (first !== undefined && first.startsWith('+')) {
    const requested = semver.valid(first.slice(1))
    if (requested === null) {
      throw new InvalidVersionError(first.slice(1), { reason: 'failed to parse version specifier' })
    }
    binary = await manager.get(requested)
    args = rest
  } else {
    binary = await manager.getDefault()
    args = [...argv]
  }

  if (binary.kind !== 'local' || !exists(binary.path)) {
    const where = binary.kind === 'local' ? `; looked at ${binary.path}` : ''
    throw new Error(`Resolc version ${binary.info.version} is not installed or does not exist${where}`)
  }

  return { binaryPath: binary.path, version: binary.info.version, args }
}

/** Run the child to completion and return its exit code */
export function execBinary(binaryPath: string, args: string[], spawnFn: SpawnFn = spawn): Promise<number> {
  return new Promise<number>((resolve, reject) => {
    const child = spawnFn(binaryPath, args, { stdio: 'inherit' })
    child.on('close', (code) => {
      resolve(code ?? SIGNAL_EXIT_CODE)
    })
    child.on('error', (err) => {
      reject(new Error(`Failed to spawn ${binaryPath}: ${err.message}`))
    })
  })
}

/**
 * Launcher core. Returns the process exit code: the child's, or 1 when the
 * binary could not be resolved or started.
 */
export async function runLauncher(argv: readonly string[], deps: LauncherDeps = {}): Promise<number> {
  const openManager = deps.openManager ?? (() => openVersionManager({ offline: true }))
  try {
    const manager = await openManager()
    const target = await resolveLaunchTarget(argv, manager, deps.exists)
    logger.debug({ version: target.version, path: target.binaryPath }, 'Launching resolc')
    return await execBinary(target.binaryPath, target.args, deps.spawnFn)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    process.stderr.write(`rvm: error: ${message}\n`)
    return 1
  }
}
