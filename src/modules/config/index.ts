/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, CONFIG_FILENAME, readEnvOverrides } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  RvmConfigSchema,
  PartialRvmConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
} from './config-schema.js'
export type { RvmConfig, PartialRvmConfig, LogLevelValue } from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
