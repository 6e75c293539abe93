/**
 * deptrack - Main module exports
 * Public API surface for the library
 */

// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger } from './utils/logger.js'
export type { LoggerOptions } from './utils/logger.js'

// Dependency tree engine
export * from './modules/dep-tree/index.js'

// Graph-definition files
export * from './modules/graph-file/index.js'

// Configuration
export * from './modules/config/index.js'
