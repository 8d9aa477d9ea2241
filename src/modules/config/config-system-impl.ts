/**
 * ConfigSystem implementation: loads configuration in hierarchy order.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → config file         (<root>/config.yaml)
 *     → environment vars    (RVM_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import yaml from 'js-yaml'
import { ConfigError, isErrnoException } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import {
  RvmConfigSchema,
  PartialRvmConfigSchema,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
  type RvmConfig,
  type PartialRvmConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

export const CONFIG_FILENAME = 'config.yaml'

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of RVM_ environment variable names to config keys.
 */
const ENV_VAR_MAP: Record<string, keyof RvmConfig> = {
  RVM_LOG_LEVEL: 'log_level',
  RVM_MANIFEST_BASE_URL: 'manifest_base_url',
  RVM_INCLUDE_NIGHTLY: 'include_nightly',
  RVM_REQUEST_TIMEOUT_MS: 'request_timeout_ms',
  RVM_LOCK_STALE_MS: 'lock_stale_ms',
  RVM_OFFLINE: 'offline',
}

const BOOLEAN_KEYS: ReadonlySet<keyof RvmConfig> = new Set<keyof RvmConfig>(['include_nightly', 'offline'])

/**
 * Read relevant environment variables and return a partial config overlay.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): PartialRvmConfig {
  const overrides: Record<string, unknown> = {}

  for (const [envKey, configKey] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined || rawValue === '') continue

    if (BOOLEAN_KEYS.has(configKey)) {
      if (rawValue === 'true' || rawValue === '1') overrides[configKey] = true
      else if (rawValue === 'false' || rawValue === '0') overrides[configKey] = false
      else overrides[configKey] = rawValue
    } else if (/^\d+$/.test(rawValue)) {
      overrides[configKey] = parseInt(rawValue, 10)
    } else {
      overrides[configKey] = rawValue
    }
  }

  const parsed = PartialRvmConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  readonly configPath: string
  private _config: RvmConfig | null = null
  private readonly _cliOverrides: PartialRvmConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions) {
    this.configPath = join(resolve(options.configDir), CONFIG_FILENAME)
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    const fileConfig = (await this._loadYamlFile(this.configPath)) ?? {}

    // Later sources win; undefined values never mask earlier ones
    const merged: Record<string, unknown> = { ...DEFAULT_CONFIG }
    for (const layer of [fileConfig, readEnvOverrides(this._env), this._cliOverrides]) {
      for (const [key, value] of Object.entries(layer)) {
        if (value !== undefined) merged[key] = value
      }
    }

    const result = RvmConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`, {
        issues: result.error.issues,
      })
    }

    this._config = result.data
    logger.debug({ configPath: this.configPath }, 'Configuration loaded successfully')
  }

  getConfig(): RvmConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _loadYamlFile(filePath: string): Promise<PartialRvmConfig | null> {
    let raw: string
    try {
      raw = await readFile(filePath, 'utf-8')
    } catch (err) {
      if (isErrnoException(err, 'ENOENT')) return null
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }

    let parsed: unknown
    try {
      parsed = yaml.load(raw)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Invalid YAML in config file at ${filePath}: ${message}`, { filePath })
    }

    // An empty file loads as undefined
    if (parsed === undefined || parsed === null) return null

    if (typeof parsed === 'object' && !Array.isArray(parsed) && 'config_format_version' in parsed) {
      const version = parsed.config_format_version
      if (typeof version !== 'string' || !SUPPORTED_CONFIG_FORMAT_VERSIONS.includes(version)) {
        throw new ConfigError(
          `Unsupported config format version "${String(version)}" in ${filePath}. ` +
            `Supported versions: ${SUPPORTED_CONFIG_FORMAT_VERSIONS.join(', ')}`,
          { filePath, version }
        )
      }
    }

    const result = PartialRvmConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        issues: result.error.issues,
      })
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem({ configDir: root })
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions): ConfigSystem {
  return new ConfigSystemImpl(options)
}
