/**
 * Tests for the resolc launcher: target resolution and process execution.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { chmodSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { InvalidVersionError } from '../../core/errors.js'
import { SIGNAL_EXIT_CODE, resolveLaunchTarget, runLauncher } from '../launcher.js'
import { buildMockVersionManager, captureOutput, localBin } from '../commands/__tests__/helpers.js'

describe('resolveLaunchTarget', () => {
  const exists = () => true

  it('selects the +<version> binary and drops the selector', async () => {
    const manager = buildMockVersionManager({ installed: ['0.1.0'] })
    const target = await resolveLaunchTarget(['+0.1.0', '--version'], manager, exists)
    expect(target).toEqual({ binaryPath: '/rvm/0.1.0/resolc', version: '0.1.0', args: ['--version'] })
    expect(manager.get).toHaveBeenCalledWith('0.1.0')
  })

  it('falls back to the default version and forwards every argument', async () => {
    const manager = buildMockVersionManager({ installed: ['0.1.0'], defaultVersion: '0.1.0' })
    const target = await resolveLaunchTarget(['input.sol', '-O3'], manager, exists)
    expect(target.args).toEqual(['input.sol', '-O3'])
    expect(target.version).toBe('0.1.0')
  })

  it('rejects an unparsable version selector', async () => {
    const manager = buildMockVersionManager()
    await expect(resolveLaunchTarget(['+latest'], manager, exists)).rejects.toBeInstanceOf(InvalidVersionError)
  })

  it('rejects a binary that is missing on disk', async () => {
    const manager = buildMockVersionManager({ installed: ['0.1.0'] })
    await expect(resolveLaunchTarget(['+0.1.0'], manager, () => false)).rejects.toThrow(
      'Resolc version 0.1.0 is not installed or does not exist; looked at /rvm/0.1.0/resolc'
    )
  })
})

describe.skipIf(process.platform === 'win32')('runLauncher', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'rvm-launcher-'))
  })

  afterEach(() => {
    vi.restoreAllMocks()
    rmSync(dir, { recursive: true, force: true })
  })

  function writeScript(body: string): string {
    const script = join(dir, 'resolc')
    writeFileSync(script, `#!/bin/sh\n${body}\n`)
    chmodSync(script, 0o755)
    return script
  }

  function managerFor(script: string) {
    return buildMockVersionManager(
      {},
      { getDefault: vi.fn().mockResolvedValue({ ...localBin('0.1.0'), path: script }) }
    )
  }

  it('forwards arguments and returns the child exit code', async () => {
    const argsFile = join(dir, 'args.txt')
    const script = writeScript(`printf '%s\\n' "$@" > '${argsFile}'\nexit 3`)

    const code = await runLauncher(['--bin', 'input.sol'], { openManager: async () => managerFor(script) })

    expect(code).toBe(3)
    expect(readFileSync(argsFile, 'utf-8')).toBe('--bin\ninput.sol\n')
  })

  it('reports a signal-terminated child as -1', async () => {
    const script = writeScript('kill -TERM $$')
    const code = await runLauncher([], { openManager: async () => managerFor(script) })
    expect(code).toBe(SIGNAL_EXIT_CODE)
  })

  it('prints the error and returns 1 when nothing can be resolved', async () => {
    const output = captureOutput()
    const code = await runLauncher([], { openManager: async () => buildMockVersionManager() })
    expect(code).toBe(1)
    expect(output.stderr).toEqual(['rvm: error: Default version of Resolc is not set\n'])
  })
})
