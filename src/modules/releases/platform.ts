/**
 * Platform detection and manifest URL selection.
 */

import os from 'node:os'
import { PlatformNotSupportedError } from '../../core/errors.js'

/** Platforms Resolc publishes binaries for */
export type Platform = 'linux' | 'macos' | 'windows'

/** Release channels; each has its own manifest per platform */
export type ReleaseChannel = 'stable' | 'nightly'

/** Repository hosting the per-platform `list.json` manifests */
export const DEFAULT_MANIFEST_BASE_URL =
  'https://raw.githubusercontent.com/paritytech/resolc-bin/refs/heads/main'

/**
 * Map a Node platform/arch pair onto a supported Resolc platform.
 *
 * @throws {PlatformNotSupportedError} for anything without published binaries
 */
export function detectPlatform(
  platform: NodeJS.Platform = os.platform(),
  arch: string = os.arch()
): Platform {
  if (platform === 'linux' && arch === 'x64') return 'linux'
  if (platform === 'darwin' && (arch === 'arm64' || arch === 'x64')) return 'macos'
  if (platform === 'win32' && arch === 'x64') return 'windows'
  throw new PlatformNotSupportedError(platform, arch)
}

/**
 * Build the manifest URL for a platform and channel.
 *
 * stable:  `<base>/<platform>/list.json`
 * nightly: `<base>/nightly/<platform>/list.json`
 */
export function manifestUrl(
  platform: Platform,
  channel: ReleaseChannel = 'stable',
  baseUrl: string = DEFAULT_MANIFEST_BASE_URL
): string {
  const base = baseUrl.replace(/\/+$/, '')
  const prefix = channel === 'nightly' ? `${base}/nightly` : base
  // Throws a TypeError for a malformed base, same as any URL parse failure
  return new URL(`${prefix}/${platform}/list.json`).toString()
}
