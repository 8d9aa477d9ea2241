/**
 * Resolution of the root directory holding installed Resolc versions.
 *
 * Order:
 *   RVM_HOME
 *     → ~/.rvm when it already exists
 *     → <platform data dir>/rvm
 *     → ~/.rvm
 */

import { existsSync } from 'node:fs'
import { mkdir, stat } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { DataDirError, isErrnoException } from '../../core/errors.js'

export interface DataDirEnvironment {
  env: NodeJS.ProcessEnv
  platform: NodeJS.Platform
  homedir: string
  exists: (p: string) => boolean
}

function defaultEnvironment(): DataDirEnvironment {
  return {
    env: process.env,
    platform: process.platform,
    homedir: os.homedir(),
    exists: existsSync,
  }
}

/**
 * Per-user data directory following platform conventions, or undefined
 * when none can be determined.
 */
export function platformDataDir(environment: DataDirEnvironment): string | undefined {
  const { env, platform, homedir } = environment
  switch (platform) {
    case 'win32':
      return env.APPDATA || undefined
    case 'darwin':
      return homedir ? path.join(homedir, 'Library', 'Application Support') : undefined
    default: {
      const xdg = env.XDG_DATA_HOME
      if (xdg && path.isAbsolute(xdg)) return xdg
      return homedir ? path.join(homedir, '.local', 'share') : undefined
    }
  }
}

/**
 * Compute the rvm root path without touching the filesystem beyond an
 * existence check of `~/.rvm`.
 */
export function resolveDataDirPath(
  environment: DataDirEnvironment = defaultEnvironment()
): string {
  const override = environment.env.RVM_HOME
  if (override) return path.resolve(override)

  if (!environment.homedir) {
    throw new DataDirError('$HOME directory does not exist')
  }
  const legacy = path.join(environment.homedir, '.rvm')
  if (environment.exists(legacy)) return legacy

  const dataDir = platformDataDir(environment)
  return dataDir !== undefined ? path.join(dataDir, 'rvm') : legacy
}

/**
 * Create the directory if needed and confirm it is a directory.
 *
 * @throws {DataDirError} if something other than a directory is in the way
 */
export async function ensureDataDir(dir: string): Promise<string> {
  try {
    await mkdir(dir, { recursive: true })
  } catch (err) {
    // EEXIST from recursive mkdir means a file sits at (or above) the path
    if (!isErrnoException(err, 'EEXIST') && !isErrnoException(err, 'ENOTDIR')) throw err
  }

  const info = await stat(dir)
  if (!info.isDirectory()) {
    throw new DataDirError(`${dir} is not a directory`, { path: dir })
  }
  return dir
}
