/**
 * Cross-process advisory locks keyed by version.
 *
 * Each key maps to `<root>/.lock-<key>`. Acquisition blocks (with a bounded
 * retry backoff) while another process holds the lock; release removes the
 * lock file. `withLock` is the only way to take a lock, so release runs on
 * every exit path.
 *
 * A process that dies while holding a lock stops refreshing it; once the lock
 * is older than `staleMs` it is taken over. A plain file left at the lock path
 * is never a live lock and is replaced.
 */

import { lstat, unlink } from 'node:fs/promises'
import path from 'node:path'
import lockfile from 'proper-lockfile'
import { LockError, isErrnoException } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('file-lock')

/** Key of the lock guarding the default-version pointer */
export const GLOBAL_LOCK_KEY = '0.0.0'

/** proper-lockfile refuses stale thresholds below two seconds */
const MIN_STALE_MS = 2_000

export const DEFAULT_LOCK_STALE_MS = 10_000

export interface LockOptions {
  /** Age after which an unrefreshed lock counts as abandoned */
  staleMs?: number
  /** Number of acquisition attempts after the first */
  retries?: number
}

export function lockFilePath(root: string, key: string): string {
  return path.join(root, `.lock-${key}`)
}

async function removeLeftoverFile(lockPath: string): Promise<void> {
  try {
    const info = await lstat(lockPath)
    if (!info.isDirectory()) {
      logger.debug({ lockPath }, 'Removing leftover lock file')
      await unlink(lockPath)
    }
  } catch (err) {
    if (!isErrnoException(err, 'ENOENT')) throw err
  }
}

/**
 * Run `fn` while holding the exclusive lock for `key`.
 *
 * @throws {LockError} if the lock cannot be obtained within the retry budget
 */
export async function withLock<T>(
  root: string,
  key: string,
  fn: () => Promise<T>,
  options: LockOptions = {}
): Promise<T> {
  const lockPath = lockFilePath(root, key)
  const stale = Math.max(options.staleMs ?? DEFAULT_LOCK_STALE_MS, MIN_STALE_MS)

  await removeLeftoverFile(lockPath)

  let release: () => Promise<void>
  try {
    release = await lockfile.lock(lockPath, {
      lockfilePath: lockPath,
      realpath: false,
      stale,
      retries: {
        retries: options.retries ?? 600,
        factor: 1.5,
        minTimeout: 50,
        maxTimeout: 1_000,
      },
      onCompromised: (err) => {
        logger.error({ err, lockPath }, 'Lock compromised')
      },
    })
  } catch (err) {
    if (isErrnoException(err, 'ELOCKED')) {
      throw new LockError(`Timed out waiting for lock ${lockPath}`, { key, lockPath })
    }
    throw err
  }

  logger.debug({ key }, 'Lock acquired')
  try {
    return await fn()
  } finally {
    // A compromised lock fails to release; the guarded outcome still surfaces
    try {
      await release()
      logger.debug({ key }, 'Lock released')
    } catch (err) {
      logger.warn({ err, key, lockPath }, 'Lock release failed')
    }
  }
}
