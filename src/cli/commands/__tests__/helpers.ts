/**
 * Shared doubles for CLI command tests: an in-memory VersionManager and
 * captured stdout/stderr.
 */

import { vi } from 'vitest'
import { DefaultVersionNotSetError, NotInstalledError } from '../../../core/errors.js'
import type { Binary } from '../../../modules/version-manager/binary.js'
import type { VersionManager } from '../../../modules/version-manager/version-manager.js'

export function localBin(version: string): Binary {
  return {
    kind: 'local',
    path: `/rvm/${version}/resolc`,
    info: { version, firstSolcVersion: '0.8.0', lastSolcVersion: '0.8.29' },
  }
}

export function remoteBin(version: string): Binary {
  return { kind: 'remote', info: { version, firstSolcVersion: '0.8.0', lastSolcVersion: '0.8.29' } }
}

/**
 * A manager whose installed set and default live in memory. Individual
 * methods can be replaced through `overrides`.
 */
export function buildMockVersionManager(
  options: { installed?: string[]; defaultVersion?: string; offline?: boolean } = {},
  overrides: Partial<VersionManager> = {}
): VersionManager {
  const installed = new Set(options.installed ?? [])
  let defaultVersion = options.defaultVersion

  const get = vi.fn(async (version: string): Promise<Binary> => {
    if (!installed.has(version)) throw new NotInstalledError(version)
    return localBin(version)
  })

  return {
    offline: options.offline ?? false,
    get,
    getOrInstall: vi.fn(async (version: string): Promise<Binary> => {
      installed.add(version)
      return localBin(version)
    }),
    remove: vi.fn(async (version: string): Promise<void> => {
      if (!installed.has(version)) throw new NotInstalledError(version)
      installed.delete(version)
      if (defaultVersion === version) defaultVersion = undefined
    }),
    getDefault: vi.fn(async (): Promise<Binary> => {
      if (defaultVersion === undefined) throw new DefaultVersionNotSetError()
      return get(defaultVersion)
    }),
    setDefault: vi.fn(async (version: string): Promise<void> => {
      await get(version)
      defaultVersion = version
    }),
    listAvailable: vi.fn(async (): Promise<Binary[]> => []),
    isInstalled: vi.fn(async (version: string): Promise<boolean> => installed.has(version)),
    latestRelease: vi.fn((): string => '0.1.0'),
    ...overrides,
  }
}

export interface CapturedOutput {
  stdout: string[]
  stderr: string[]
}

/** Capture console.log lines and stderr writes until mocks are restored */
export function captureOutput(): CapturedOutput {
  const output: CapturedOutput = { stdout: [], stderr: [] }
  vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    output.stdout.push(args.map(String).join(' '))
  })
  vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
    output.stderr.push(String(chunk))
    return true
  })
  return output
}
