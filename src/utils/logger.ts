/**
 * Logger utility for deptrack
 *
 * pino JSON logging, written to stderr: stdout belongs to command output
 * (`deptrack graph --output-format json` must stay parseable). Pretty printing
 * through pino-pretty in development.
 */

import pino from 'pino'
import type { DestinationStream, Logger, LoggerOptions as PinoOptions } from 'pino'
import type { LogLevelValue } from '../modules/config/config-schema.js'

/** Logger configuration options */
export interface LoggerOptions {
  /** Overrides LOG_LEVEL and the NODE_ENV default */
  level?: LogLevelValue
  name?: string
  pretty?: boolean
  /** Where JSON lines go (default: stderr); ignored in pretty mode */
  stream?: DestinationStream
}

const STDERR_FD = 2

function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'test' || process.env.NODE_ENV === 'development') return 'debug'
  // Plain CLI use
  return 'warn'
}

function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  return process.env.NODE_ENV === 'development' || process.env.NODE_ENV === 'test'
}

/**
 * Create a named logger
 * @param name - Module identifier, logged as `name`
 */
export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const baseOptions: PinoOptions = {
    name: options.name ?? name,
    level: options.level ?? getDefaultLogLevel(),
    formatters: {
      level(label) {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      pid: process.pid,
    },
  }

  if (options.pretty ?? isPrettyMode()) {
    // pino-pretty is a devDependency
    return pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: STDERR_FD,
        },
      },
    })
  }

  return pino(baseOptions, options.stream ?? pino.destination(STDERR_FD))
}

/** Root logger */
export const logger = createLogger('deptrack')

/** Child logger carrying extra bindings, e.g. the graph file being processed */
export function childLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings)
}
