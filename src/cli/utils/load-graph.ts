/**
 * Shared graph loading for CLI commands: existence check, parse, validate,
 * with errors reported on stderr.
 */

import { existsSync } from 'node:fs'
import { GraphIncompatibleFormatError } from '../../core/errors.js'
import { ParseError, parseGraphFile } from '../../modules/graph-file/graph-parser.js'
import { validateGraph } from '../../modules/graph-file/graph-validator.js'
import type { GraphFile } from '../../modules/graph-file/schemas.js'

export const EXIT_SUCCESS = 0
export const EXIT_ERROR = 1
export const EXIT_USAGE_ERROR = 2

export type LoadGraphResult =
  | { ok: true; graph: GraphFile }
  | { ok: false; exitCode: number }

/**
 * Load and validate a graph file. Problems are written to stderr and mapped
 * to an exit code; warnings are written but do not fail the load.
 */
export function loadGraphFile(filePath: string): LoadGraphResult {
  if (!existsSync(filePath)) {
    process.stderr.write(`Error: Graph file not found: ${filePath}\n`)
    return { ok: false, exitCode: EXIT_USAGE_ERROR }
  }

  let raw: unknown
  try {
    raw = parseGraphFile(filePath)
  } catch (err) {
    if (err instanceof ParseError || err instanceof GraphIncompatibleFormatError) {
      process.stderr.write(`Error: Failed to parse graph file: ${filePath}\n${err.message}\n`)
      return { ok: false, exitCode: EXIT_USAGE_ERROR }
    }
    const message = err instanceof Error ? err.message : String(err)
    process.stderr.write(`Error: ${message}\n`)
    return { ok: false, exitCode: EXIT_ERROR }
  }

  const result = validateGraph(raw)
  for (const warning of result.warnings) {
    process.stderr.write(`Warning: ${warning}\n`)
  }
  if (!result.valid || result.graph === undefined) {
    for (const error of result.errors) {
      process.stderr.write(`Error: ${error}\n`)
    }
    return { ok: false, exitCode: EXIT_USAGE_ERROR }
  }

  return { ok: true, graph: result.graph }
}
