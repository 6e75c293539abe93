/**
 * Configuration loader - resolves the effective configuration in hierarchy order.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → project config      (<projectDir>/.deptrack.yaml)
 *     → environment vars    (DEPTRACK_* prefixed)
 *     → explicit overrides  (CLI flags)
 */

import { readFile } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { load as parseYaml } from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { ConfigError } from '../../core/errors.js'
import {
  DeptrackConfigSchema,
  PartialDeptrackConfigSchema,
  type DeptrackConfig,
  type PartialDeptrackConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG, PROJECT_CONFIG_FILE } from './defaults.js'

const logger = createLogger('config')

export interface LoadConfigOptions {
  /** Directory holding .deptrack.yaml (default: process.cwd()) */
  projectDir?: string
  /** Environment to read DEPTRACK_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv
  /** Highest-priority values, typically from CLI flags */
  overrides?: PartialDeptrackConfig
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

const ENV_VAR_MAP: Record<string, keyof DeptrackConfig> = {
  DEPTRACK_READINESS: 'readiness',
  DEPTRACK_LOG_LEVEL: 'log_level',
  DEPTRACK_OUTPUT_FORMAT: 'output_format',
}

/**
 * Read relevant environment variables and return a partial config overlay.
 * Invalid values are logged and ignored.
 */
function readEnvOverrides(env: NodeJS.ProcessEnv): PartialDeptrackConfig {
  const overrides: Record<string, unknown> = {}

  for (const [envKey, configKey] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined || rawValue === '') continue
    overrides[configKey] = rawValue
  }

  const parsed = PartialDeptrackConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Project file
// ---------------------------------------------------------------------------

async function loadYamlFile(filePath: string): Promise<Record<string, unknown> | null> {
  let content: string
  try {
    content = await readFile(filePath, 'utf-8')
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null
    throw new ConfigError(`Failed to read config file: ${filePath}`, {
      filePath,
      cause: err instanceof Error ? err.message : String(err),
    })
  }

  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (err) {
    throw new ConfigError(`Config file is not valid YAML: ${filePath}`, {
      filePath,
      cause: err instanceof Error ? err.message : String(err),
    })
  }

  // An empty file parses to undefined
  if (parsed === undefined || parsed === null) return {}
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError(`Config file must contain a mapping: ${filePath}`, { filePath })
  }
  return { ...parsed }
}

// ---------------------------------------------------------------------------
// loadConfig
// ---------------------------------------------------------------------------

/**
 * Resolve the effective configuration.
 *
 * @throws {ConfigError} if the project file cannot be read or parsed, or the
 *   merged configuration fails validation
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<DeptrackConfig> {
  const projectDir = resolve(options.projectDir ?? process.cwd())
  const filePath = join(projectDir, PROJECT_CONFIG_FILE)

  const projectConfig = await loadYamlFile(filePath)
  const envOverrides = readEnvOverrides(options.env ?? process.env)

  const merged: Record<string, unknown> = {
    ...DEFAULT_CONFIG,
    ...(projectConfig ?? {}),
    ...envOverrides,
    ...(options.overrides ?? {}),
  }

  const result = DeptrackConfigSchema.safeParse(merged)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  • ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n')
    throw new ConfigError(`Configuration validation failed:\n${issues}`, {
      issues: result.error.issues,
    })
  }

  logger.debug({ projectFile: projectConfig === null ? null : filePath }, 'Configuration loaded')
  return result.data
}
