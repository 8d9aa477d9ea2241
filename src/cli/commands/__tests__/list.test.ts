import { describe, it, expect, vi, afterEach } from 'vitest'
import { HttpRequestError, InvalidVersionError } from '../../../core/errors.js'
import { LIST_EXIT_ERROR, LIST_EXIT_SUCCESS, runListAction } from '../list.js'
import { buildMockVersionManager, captureOutput, localBin, remoteBin } from './helpers.js'

describe('list command', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  const listing = () => vi.fn().mockResolvedValue([remoteBin('0.1.0-dev.13'), localBin('0.1.0'), remoteBin('0.2.0')])

  it('prints the default, the available and the installed versions', async () => {
    const output = captureOutput()
    const versionManager = buildMockVersionManager(
      { installed: ['0.1.0'], defaultVersion: '0.1.0' },
      { listAvailable: listing() }
    )

    const exitCode = await runListAction({ offline: false, versionManager })

    expect(exitCode).toBe(LIST_EXIT_SUCCESS)
    expect(output.stdout).toEqual([
      'Default version of Resolc is: 0.1.0',
      'Available to install Resolc versions: ["0.1.0-dev.13", "0.2.0"]',
      'Already installed Resolc versions: ["0.1.0"]',
    ])
  })

  it('omits the default line when none is set', async () => {
    const output = captureOutput()
    const versionManager = buildMockVersionManager({ installed: ['0.1.0'] }, { listAvailable: listing() })

    await runListAction({ offline: false, versionManager })

    expect(output.stdout).toEqual([
      'Available to install Resolc versions: ["0.1.0-dev.13", "0.2.0"]',
      'Already installed Resolc versions: ["0.1.0"]',
    ])
  })

  it('prints empty lists', async () => {
    const output = captureOutput()

    await runListAction({ offline: false, versionManager: buildMockVersionManager() })

    expect(output.stdout).toEqual([
      'Available to install Resolc versions: []',
      'Already installed Resolc versions: []',
    ])
  })

  it('passes the solc filter through', async () => {
    captureOutput()
    const versionManager = buildMockVersionManager()

    await runListAction({ solc: '0.8.20', offline: false, versionManager })

    expect(versionManager.listAvailable).toHaveBeenCalledWith('0.8.20')
  })

  it('fails on a malformed default pointer', async () => {
    const output = captureOutput()
    const versionManager = buildMockVersionManager(
      {},
      { getDefault: vi.fn().mockRejectedValue(new InvalidVersionError('latest')) }
    )

    const exitCode = await runListAction({ offline: false, versionManager })

    expect(exitCode).toBe(LIST_EXIT_ERROR)
    expect(output.stderr).toEqual(['Error: Invalid semantic version: "latest"\n'])
  })

  it('fails when listing fails', async () => {
    const output = captureOutput()
    const versionManager = buildMockVersionManager(
      {},
      { listAvailable: vi.fn().mockRejectedValue(new HttpRequestError('HTTP 500', 'https://manifests.example.test', 500)) }
    )

    const exitCode = await runListAction({ offline: false, versionManager })

    expect(exitCode).toBe(LIST_EXIT_ERROR)
    expect(output.stderr).toEqual(['Error: HTTP 500\n'])
  })
})
