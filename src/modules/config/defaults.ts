/**
 * Built-in default values for the rvm configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   config file → environment variables → CLI flags
 */

import { DEFAULT_MANIFEST_BASE_URL } from '../releases/platform.js'
import { DEFAULT_REQUEST_TIMEOUT_MS } from '../releases/release-client.js'
import { DEFAULT_LOCK_STALE_MS } from '../storage/file-lock.js'
import type { RvmConfig } from './config-schema.js'

export const DEFAULT_CONFIG: RvmConfig = {
  config_format_version: '1',
  log_level: 'warn',
  manifest_base_url: DEFAULT_MANIFEST_BASE_URL,
  include_nightly: false,
  request_timeout_ms: DEFAULT_REQUEST_TIMEOUT_MS,
  lock_stale_ms: DEFAULT_LOCK_STALE_MS,
  offline: false,
}
