/**
 * Tests for ReleaseCatalog: manifest parsing, lookup, offline synthesis and merge.
 */

import { describe, it, expect } from 'vitest'
import {
  ManifestParseError,
  NoVersionsInstalledError,
  UnknownVersionError,
} from '../../../core/errors.js'
import { ReleaseCatalog, fetchReleaseCatalog } from '../release-catalog.js'
import { isDownloadable } from '../types.js'
import { FakeReleaseClient, buildDescriptor, loadManifestFixture, manifestFor } from '../../../../test/helpers/releases.js'

describe('ReleaseCatalog', () => {
  describe('fromManifest', () => {
    it('parses every build and the release map', () => {
      const catalog = ReleaseCatalog.fromManifest(loadManifestFixture())
      expect(catalog.builds).toHaveLength(4)
      expect(catalog.releases.size).toBe(4)
      expect(catalog.latestRelease).toBe('0.1.0')
    })

    it('keeps url and checksum on downloadable builds', () => {
      const build = ReleaseCatalog.fromManifest(loadManifestFixture()).lookup('0.1.0-dev.13')
      expect(isDownloadable(build)).toBe(true)
      expect(build).toMatchObject({
        name: 'resolc-x86_64-unknown-linux-musl',
        longVersion: '0.1.0-dev.13+commit.ad331534.llvm-18.1.8',
        sha256: 'a'.repeat(64),
        firstSolcVersion: '0.8.0',
        lastSolcVersion: '0.8.29',
      })
    })

    it('omits sha256 when the manifest has none', () => {
      const build = ReleaseCatalog.fromManifest(loadManifestFixture()).lookup('0.1.0')
      expect('sha256' in build).toBe(false)
    })

    it('rejects a build whose solc range is inverted', () => {
      const doc = manifestFor([buildDescriptor('0.1.0', { firstSolcVersion: '0.8.29', lastSolcVersion: '0.8.0' })])
      expect(() => ReleaseCatalog.fromManifest(doc)).toThrow(ManifestParseError)
      expect(() => ReleaseCatalog.fromManifest(doc)).toThrow(
        'builds.0.firstSolcVersion: firstSolcVersion must not be greater than lastSolcVersion'
      )
    })

    it('rejects a non-semver version', () => {
      const doc = manifestFor([buildDescriptor('latest')], '0.1.0')
      expect(() => ReleaseCatalog.fromManifest(doc)).toThrow('builds.0.version: must be a valid semantic version')
    })

    it('rejects documents that are not manifests', () => {
      expect(() => ReleaseCatalog.fromManifest({ builds: 'nope' })).toThrow(ManifestParseError)
      expect(() => ReleaseCatalog.fromManifest(null)).toThrow(ManifestParseError)
    })
  })

  describe('lookup', () => {
    const catalog = ReleaseCatalog.fromManifest(loadManifestFixture())

    it('finds a released build', () => {
      expect(catalog.lookup('0.1.0-dev.14').version).toBe('0.1.0-dev.14')
    })

    it('normalizes a leading v', () => {
      expect(catalog.lookup('v0.1.0').version).toBe('0.1.0')
    })

    it('rejects a build that has no release entry', () => {
      expect(() => catalog.lookup('0.2.0')).toThrow(UnknownVersionError)
      expect(catalog.has('0.2.0')).toBe(false)
    })

    it('rejects a release entry that has no build', () => {
      expect(() => catalog.lookup('0.3.0')).toThrow(UnknownVersionError)
      expect(catalog.has('0.3.0')).toBe(false)
    })

    it('rejects a version that appears nowhere', () => {
      expect(() => catalog.lookup('9.9.9')).toThrow('Unknown version of Resolc v9.9.9.')
    })
  })

  describe('versions', () => {
    it('lists released builds in ascending order', () => {
      const catalog = ReleaseCatalog.fromManifest(loadManifestFixture())
      expect(catalog.versions()).toEqual(['0.1.0-dev.13', '0.1.0-dev.14', '0.1.0'])
    })
  })

  describe('fromInstalled', () => {
    it('synthesizes releases and picks the highest version as latest', () => {
      const catalog = ReleaseCatalog.fromInstalled([
        { name: 'resolc', version: '0.1.0', longVersion: '0.1.0+commit.a', firstSolcVersion: '0.8.0', lastSolcVersion: '0.8.30' },
        { name: 'resolc', version: '0.2.0', longVersion: '0.2.0+commit.b', firstSolcVersion: '0.8.0', lastSolcVersion: '0.8.30' },
        { name: 'resolc', version: '0.1.0-dev.13', longVersion: '0.1.0-dev.13+commit.c', firstSolcVersion: '0.8.0', lastSolcVersion: '0.8.29' },
      ])
      expect(catalog.latestRelease).toBe('0.2.0')
      expect(catalog.releases.get('0.1.0')).toBe('resolc+0.1.0+commit.a')
      expect(catalog.lookup('0.1.0-dev.13').longVersion).toBe('0.1.0-dev.13+commit.c')
      expect(isDownloadable(catalog.lookup('0.2.0'))).toBe(false)
    })

    it('throws when nothing is installed', () => {
      expect(() => ReleaseCatalog.fromInstalled([])).toThrow(NoVersionsInstalledError)
    })
  })

  describe('merge', () => {
    const stable = ReleaseCatalog.fromManifest(
      manifestFor([buildDescriptor('0.1.0'), buildDescriptor('0.1.1')], '0.1.1')
    )
    const nightly = ReleaseCatalog.fromManifest({
      builds: [
        buildDescriptor('0.1.1', { url: 'https://nightly.example.test/resolc' }),
        buildDescriptor('0.2.0-nightly.1'),
      ],
      releases: { '0.1.1': 'nightly-0.1.1', '0.2.0-nightly.1': 'nightly-0.2.0' },
      latestRelease: '0.2.0-nightly.1',
    })
    const merged = stable.merge(nightly)

    it('de-duplicates builds by long version, keeping the first', () => {
      expect(merged.builds.map((build) => build.version)).toEqual(['0.1.0', '0.1.1', '0.2.0-nightly.1'])
      expect(merged.lookup('0.1.1')).toMatchObject({ url: 'https://releases.example.test/v0.1.1/resolc-test' })
    })

    it('lets the merged-in release map win on a clash', () => {
      expect(merged.releases.get('0.1.1')).toBe('nightly-0.1.1')
      expect(merged.releases.get('0.1.0')).toBe('resolc-test+0.1.0+commit.00000000')
    })

    it('keeps the latest release of the receiving catalog', () => {
      expect(merged.latestRelease).toBe('0.1.1')
    })

    it('leaves both inputs untouched', () => {
      expect(stable.builds).toHaveLength(2)
      expect(nightly.builds).toHaveLength(2)
    })
  })

  describe('fetchReleaseCatalog', () => {
    it('fetches and parses the manifest at the URL', async () => {
      const client = new FakeReleaseClient()
      client.documents.set('https://manifests.example.test/linux/list.json', loadManifestFixture())
      const catalog = await fetchReleaseCatalog('https://manifests.example.test/linux/list.json', client)
      expect(catalog.latestRelease).toBe('0.1.0')
      expect(client.fetchJson).toHaveBeenCalledTimes(1)
    })

    it('propagates network failures', async () => {
      const client = new FakeReleaseClient()
      await expect(
        fetchReleaseCatalog('https://manifests.example.test/missing.json', client)
      ).rejects.toMatchObject({ code: 'HTTP_REQUEST', statusCode: 404 })
    })
  })
})
