import { describe, it, expect, vi, afterEach } from 'vitest'
import { REMOVE_EXIT_ERROR, REMOVE_EXIT_SUCCESS, runRemoveAction } from '../remove.js'
import { buildMockVersionManager, captureOutput } from './helpers.js'

describe('remove command', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('removes an installed version', async () => {
    const output = captureOutput()
    const versionManager = buildMockVersionManager({ installed: ['0.1.0'] })

    const exitCode = await runRemoveAction({ version: '0.1.0', offline: false, versionManager })

    expect(exitCode).toBe(REMOVE_EXIT_SUCCESS)
    expect(versionManager.remove).toHaveBeenCalledWith('0.1.0')
    expect(output.stdout).toEqual(['Resolc v0.1.0 is removed successfully'])
  })

  it('fails for a version that is not installed', async () => {
    const output = captureOutput()
    const versionManager = buildMockVersionManager()

    const exitCode = await runRemoveAction({ version: '0.1.0', offline: false, versionManager })

    expect(exitCode).toBe(REMOVE_EXIT_ERROR)
    expect(output.stderr).toEqual(['Error: Version of Resolc v0.1.0 is not installed.\n'])
    expect(output.stdout).toEqual([])
  })
})
