/**
 * Zod validation schemas for the remote release manifest (`list.json`)
 * and the `build.json` sidecar written next to every installed binary.
 */

import { z } from 'zod'
import * as semver from 'semver'

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

/** A strict semantic version string; normalized (e.g. leading "v" stripped) */
export const SemverSchema = z
  .string()
  .refine((value) => semver.valid(value) !== null, {
    message: 'must be a valid semantic version',
  })
  .transform((value) => semver.valid(value) ?? value)

/** Hex-encoded SHA-256 digest */
export const Sha256Schema = z
  .string()
  .regex(/^(0x)?[0-9a-fA-F]{64}$/, { message: 'must be a hex-encoded SHA-256 digest' })

// ---------------------------------------------------------------------------
// Build records
// ---------------------------------------------------------------------------

const BuildFields = {
  name: z.string().min(1),
  version: SemverSchema,
  longVersion: z.string().min(1),
  firstSolcVersion: SemverSchema,
  lastSolcVersion: SemverSchema,
}

function solcRangeIsOrdered(build: { firstSolcVersion: string; lastSolcVersion: string }): boolean {
  return semver.lte(build.firstSolcVersion, build.lastSolcVersion)
}

const SOLC_RANGE_MESSAGE = {
  message: 'firstSolcVersion must not be greater than lastSolcVersion',
  path: ['firstSolcVersion'],
}

/** One installable build as published in the manifest */
export const ManifestBuildSchema = z
  .object({
    ...BuildFields,
    /** Build metadata suffix, e.g. "commit.ad331534"; informational only */
    build: z.string().optional(),
    url: z.string().url(),
    sha256: Sha256Schema.optional(),
  })
  .refine(solcRangeIsOrdered, SOLC_RANGE_MESSAGE)

/** Metadata persisted as `<root>/<version>/build.json` */
export const InstalledBuildSchema = z
  .object(BuildFields)
  .refine(solcRangeIsOrdered, SOLC_RANGE_MESSAGE)

/** The full manifest document */
export const ManifestSchema = z.object({
  builds: z.array(ManifestBuildSchema),
  releases: z.record(z.string()),
  latestRelease: SemverSchema,
})

export type ManifestBuild = z.infer<typeof ManifestBuildSchema>
export type InstalledBuildRecord = z.infer<typeof InstalledBuildSchema>
export type Manifest = z.infer<typeof ManifestSchema>
