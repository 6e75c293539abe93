/**
 * Built-in default values for the deptrack configuration.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   project config → environment variables → explicit overrides (CLI flags)
 */

import type { DeptrackConfig } from './config-schema.js'

/** File name looked up in the project directory */
export const PROJECT_CONFIG_FILE = '.deptrack.yaml'

export const DEFAULT_CONFIG: DeptrackConfig = {
  readiness: 'strict',
  log_level: 'warn',
  output_format: 'human',
}
