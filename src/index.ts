/**
 * rvm - Main module exports
 * Public API surface of the Resolc version manager
 */

// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger, setLogLevel } from './utils/logger.js'

// Version manager
export * from './modules/version-manager/index.js'

// Release catalog and download client
export * from './modules/releases/index.js'

// solc compatibility
export * from './modules/compat/index.js'

// On-disk storage
export * from './modules/storage/index.js'

// Configuration
export * from './modules/config/index.js'
