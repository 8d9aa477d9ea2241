/**
 * Binary: result type handed to callers: a build that is either installed
 * locally (with a path) or only known to the catalog.
 */

import * as semver from 'semver'
import { formatSolcRange } from '../compat/solc-compat.js'
import type { CatalogBuild } from '../releases/types.js'

/** Basic information about a Resolc binary */
export interface BinaryInfo {
  readonly version: string
  readonly firstSolcVersion: string
  readonly lastSolcVersion: string
}

export type Binary =
  | { readonly kind: 'local'; readonly path: string; readonly info: BinaryInfo }
  | { readonly kind: 'remote'; readonly info: BinaryInfo }

function toInfo(build: CatalogBuild): BinaryInfo {
  return {
    version: build.version,
    firstSolcVersion: build.firstSolcVersion,
    lastSolcVersion: build.lastSolcVersion,
  }
}

export function localBinary(build: CatalogBuild, binaryPath: string): Binary {
  return { kind: 'local', path: binaryPath, info: toInfo(build) }
}

export function remoteBinary(build: CatalogBuild): Binary {
  return { kind: 'remote', info: toInfo(build) }
}

export function binaryVersion(binary: Binary): string {
  return binary.info.version
}

/** Filesystem path of an installed binary; undefined for remote ones */
export function localPath(binary: Binary): string | undefined {
  return binary.kind === 'local' ? binary.path : undefined
}

/** Order by version; an installed binary sorts before a remote one of the same version */
export function compareBinaries(a: Binary, b: Binary): number {
  const byVersion = semver.compare(a.info.version, b.info.version)
  if (byVersion !== 0) return byVersion
  if (a.kind === b.kind) return 0
  return a.kind === 'local' ? -1 : 1
}

/** One-line human-readable description, e.g. for `rvm list` */
export function describeBinary(binary: Binary): string {
  const range = formatSolcRange(binary.info)
  return binary.kind === 'local'
    ? `v${binary.info.version} (installed at ${binary.path}, solc ${range})`
    : `v${binary.info.version} (solc ${range})`
}
