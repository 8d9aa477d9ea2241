/**
 * Zod validation schemas for the rvm configuration file (`<root>/config.yaml`).
 */

import { z } from 'zod'

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

/** Current supported config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

/** All config format versions this tool can read and validate */
export const SUPPORTED_CONFIG_FORMAT_VERSIONS: readonly string[] = ['1']

export const RvmConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    log_level: LogLevelSchema,
    /** Base URL under which `<platform>/list.json` manifests live */
    manifest_base_url: z.string().url(),
    /** Merge the nightly manifest into the stable one */
    include_nightly: z.boolean(),
    /** Timeout for manifest fetches and binary downloads */
    request_timeout_ms: z.number().int().positive(),
    /** Age after which an abandoned lock file is taken over (min 2000) */
    lock_stale_ms: z.number().int().min(2_000),
    /** Never touch the network; serve only what is installed */
    offline: z.boolean(),
  })
  .strict()

export type RvmConfig = z.infer<typeof RvmConfigSchema>

export const PartialRvmConfigSchema = RvmConfigSchema.partial()
export type PartialRvmConfig = z.infer<typeof PartialRvmConfigSchema>
