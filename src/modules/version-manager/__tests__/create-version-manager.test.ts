/**
 * Tests for createVersionManager: online catalog fetching, nightly merging
 * and offline synthesis from local installs.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { NoVersionsInstalledError } from '../../../core/errors.js'
import { DEFAULT_CONFIG } from '../../config/defaults.js'
import type { RvmConfig } from '../../config/config-schema.js'
import { createVersionManager } from '../version-manager-impl.js'
import { FakeReleaseClient, blobFor, buildDescriptor, checksumFor, manifestFor } from '../../../../test/helpers/releases.js'

const BASE_URL = 'https://manifests.example.test'
const STABLE_URL = `${BASE_URL}/linux/list.json`
const NIGHTLY_URL = `${BASE_URL}/nightly/linux/list.json`

const STABLE = [buildDescriptor('0.1.0', { sha256: checksumFor('0.1.0') })]
const NIGHTLY = [buildDescriptor('0.2.0-nightly.1')]

describe('createVersionManager', () => {
  let root: string
  let client: FakeReleaseClient
  let config: RvmConfig

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'rvm-create-'))
    client = new FakeReleaseClient()
    client.documents.set(STABLE_URL, manifestFor(STABLE))
    client.documents.set(NIGHTLY_URL, manifestFor(NIGHTLY))
    for (const build of [...STABLE, ...NIGHTLY]) {
      client.blobs.set(build.url, blobFor(build.version))
    }
    config = { ...DEFAULT_CONFIG, manifest_base_url: BASE_URL }
  })

  afterEach(() => {
    rmSync(root, { recursive: true, force: true })
  })

  it('fetches the stable manifest for the platform', async () => {
    const vm = await createVersionManager({ config, rootDir: root, client, platform: 'linux' })
    expect(vm.offline).toBe(false)
    expect(vm.latestRelease()).toBe('0.1.0')
    expect(client.fetchJson).toHaveBeenCalledWith(STABLE_URL)
    expect(client.fetchJson).toHaveBeenCalledTimes(1)
  })

  it('merges the nightly manifest when configured', async () => {
    const vm = await createVersionManager({
      config: { ...config, include_nightly: true },
      rootDir: root,
      client,
      platform: 'linux',
    })
    const versions = (await vm.listAvailable()).map((binary) => binary.info.version)
    expect(versions).toEqual(['0.1.0', '0.2.0-nightly.1'])
    expect(vm.latestRelease()).toBe('0.1.0')
  })

  it('fails offline when nothing is installed', async () => {
    await expect(createVersionManager({ offline: true, config, rootDir: root, client })).rejects.toBeInstanceOf(
      NoVersionsInstalledError
    )
    expect(client.fetchJson).not.toHaveBeenCalled()
  })

  it('builds the offline catalog from local installs', async () => {
    const online = await createVersionManager({ config, rootDir: root, client, platform: 'linux' })
    await online.getOrInstall('0.1.0')
    await online.setDefault('0.1.0')

    const offline = await createVersionManager({ offline: true, config, rootDir: root, client })
    expect(offline.offline).toBe(true)
    expect(offline.latestRelease()).toBe('0.1.0')
    await expect(offline.getDefault()).resolves.toMatchObject({ kind: 'local', info: { version: '0.1.0' } })
    expect(client.fetchJson).toHaveBeenCalledTimes(1)
  })

  it('takes the offline flag from config when not given', async () => {
    await expect(
      createVersionManager({ config: { ...config, offline: true }, rootDir: root, client })
    ).rejects.toBeInstanceOf(NoVersionsInstalledError)
  })
})
