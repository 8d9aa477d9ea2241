/**
 * solc compatibility checks for Resolc builds.
 *
 * A build declares an inclusive solc range; independently of that range no
 * solc older than MIN_SOLC_VERSION is ever accepted.
 */

import * as semver from 'semver'
import { InvalidVersionError, SolcVersionNotSupportedError } from '../../core/errors.js'

/** Minimum supported solc version */
export const MIN_SOLC_VERSION = '0.8.0'

/** The part of a build the checker looks at */
export interface SolcRange {
  readonly version: string
  readonly firstSolcVersion: string
  readonly lastSolcVersion: string
}

/**
 * Render the supported range the way it is reported to users,
 * e.g. `>=0.8.0, <=0.8.29`.
 */
export function formatSolcRange(range: Pick<SolcRange, 'firstSolcVersion' | 'lastSolcVersion'>): string {
  return `>=${range.firstSolcVersion}, <=${range.lastSolcVersion}`
}

export function isSolcCompatible(build: SolcRange, solcVersion: string): boolean {
  const solc = semver.valid(solcVersion)
  if (solc === null) return false
  return (
    semver.gte(solc, build.firstSolcVersion) &&
    semver.lte(solc, build.lastSolcVersion) &&
    semver.gte(solc, MIN_SOLC_VERSION)
  )
}

/**
 * Check that `solcVersion` can be used together with the given Resolc build.
 *
 * @throws {InvalidVersionError} if `solcVersion` is not a semantic version
 * @throws {SolcVersionNotSupportedError} if it falls outside the supported range
 */
export function checkSolcCompat(build: SolcRange, solcVersion: string): void {
  if (semver.valid(solcVersion) === null) {
    throw new InvalidVersionError(solcVersion, { kind: 'solc' })
  }
  if (!isSolcCompatible(build, solcVersion)) {
    throw new SolcVersionNotSupportedError(solcVersion, build.version, formatSolcRange(build))
  }
}
