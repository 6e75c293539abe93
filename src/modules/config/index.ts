/**
 * Barrel exports for the config module.
 */

export { loadConfig } from './config-loader.js'
export type { LoadConfigOptions } from './config-loader.js'
export {
  DeptrackConfigSchema,
  PartialDeptrackConfigSchema,
  ReadinessModeSchema,
  LogLevelSchema,
  OutputFormatSchema,
} from './config-schema.js'
export type {
  DeptrackConfig,
  PartialDeptrackConfig,
  LogLevelValue,
  OutputFormat,
} from './config-schema.js'
export { DEFAULT_CONFIG, PROJECT_CONFIG_FILE } from './defaults.js'
