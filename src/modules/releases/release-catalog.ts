/**
 * ReleaseCatalog: a point-in-time, read-only index of known Resolc builds.
 *
 * Built either from a remote `list.json` manifest or, in offline mode,
 * synthesized from the builds installed on disk.
 */

import * as semver from 'semver'
import { ManifestParseError, NoVersionsInstalledError, UnknownVersionError } from '../../core/errors.js'
import type { ReleaseClient } from './release-client.js'
import { ManifestSchema } from './schemas.js'
import type { CatalogBuild, InstalledBuild } from './types.js'

// ---------------------------------------------------------------------------
// ReleaseCatalog
// ---------------------------------------------------------------------------

export class ReleaseCatalog {
  readonly builds: readonly CatalogBuild[]
  /** version → release identifier (`<name>+<longVersion>`) */
  readonly releases: ReadonlyMap<string, string>
  readonly latestRelease: string

  constructor(
    builds: readonly CatalogBuild[],
    releases: ReadonlyMap<string, string>,
    latestRelease: string
  ) {
    this.builds = Object.freeze([...builds])
    this.releases = new Map(releases)
    this.latestRelease = latestRelease
  }

  /**
   * Parse and validate a manifest document.
   *
   * @throws {ManifestParseError} if the document does not match the manifest schema
   */
  static fromManifest(document: unknown): ReleaseCatalog {
    const result = ManifestSchema.safeParse(document)
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`)
        .join('\n')
      throw new ManifestParseError(`Invalid release manifest:\n${issues}`, {
        issues: result.error.issues,
      })
    }

    const { builds, releases, latestRelease } = result.data
    const releaseMap = new Map<string, string>()
    for (const [version, identifier] of Object.entries(releases)) {
      releaseMap.set(semver.valid(version) ?? version, identifier)
    }

    return new ReleaseCatalog(
      builds.map((build) =>
        Object.freeze({
          name: build.name,
          version: build.version,
          longVersion: build.longVersion,
          url: build.url,
          ...(build.sha256 !== undefined ? { sha256: build.sha256 } : {}),
          firstSolcVersion: build.firstSolcVersion,
          lastSolcVersion: build.lastSolcVersion,
        })
      ),
      releaseMap,
      latestRelease
    )
  }

  /**
   * Synthesize a catalog from locally installed builds (offline mode).
   * The latest release is the highest installed version.
   *
   * @throws {NoVersionsInstalledError} if nothing is installed
   */
  static fromInstalled(installed: readonly InstalledBuild[]): ReleaseCatalog {
    const first = installed[0]
    if (first === undefined) {
      throw new NoVersionsInstalledError()
    }

    const releases = new Map<string, string>()
    let latest = first.version
    for (const build of installed) {
      releases.set(build.version, `${build.name}+${build.longVersion}`)
      if (semver.gt(build.version, latest)) latest = build.version
    }

    return new ReleaseCatalog(installed, releases, latest)
  }

  /**
   * Return the build for `version`. A version must appear both in
   * `releases` and in `builds` to be considered known.
   *
   * @throws {UnknownVersionError}
   */
  lookup(version: string): CatalogBuild {
    const key = semver.valid(version) ?? version
    if (this.releases.has(key)) {
      const build = this.builds.find((item) => item.version === key)
      if (build !== undefined) return build
    }
    throw new UnknownVersionError(version)
  }

  has(version: string): boolean {
    const key = semver.valid(version) ?? version
    return this.releases.has(key) && this.builds.some((item) => item.version === key)
  }

  /** All known versions, ascending */
  versions(): string[] {
    return this.builds
      .filter((build) => this.releases.has(build.version))
      .map((build) => build.version)
      .sort(semver.compare)
  }

  /**
   * Combine with another catalog (e.g. stable + nightly). Builds are
   * concatenated and de-duplicated by `longVersion`, keeping the first
   * occurrence; release maps are unioned with `other` winning on a clash.
   * `latestRelease` always stays this catalog's value.
   */
  merge(other: ReleaseCatalog): ReleaseCatalog {
    const seen = new Set<string>()
    const builds: CatalogBuild[] = []
    for (const build of [...this.builds, ...other.builds]) {
      if (seen.has(build.longVersion)) continue
      seen.add(build.longVersion)
      builds.push(build)
    }

    const releases = new Map(this.releases)
    for (const [version, identifier] of other.releases) {
      releases.set(version, identifier)
    }

    return new ReleaseCatalog(builds, releases, this.latestRelease)
  }
}

// ---------------------------------------------------------------------------
// Fetching
// ---------------------------------------------------------------------------

/**
 * Fetch and parse the manifest at `url`. Network and parse failures are
 * surfaced as-is; nothing is retried here.
 */
export async function fetchReleaseCatalog(
  url: string,
  client: ReleaseClient
): Promise<ReleaseCatalog> {
  const document = await client.fetchJson(url)
  return ReleaseCatalog.fromManifest(document)
}
