/**
 * Graph-definition file and string parser.
 *
 * Reads YAML or JSON graph files/strings and returns raw parsed objects
 * (before Zod validation). Format is determined by file extension for file-based
 * loading, or explicitly specified for string-based loading.
 */

import { readFileSync } from 'node:fs'
import { extname } from 'node:path'
import { load as parse } from 'js-yaml'
import { GraphIncompatibleFormatError } from '../../core/errors.js'
import { SUPPORTED_GRAPH_VERSIONS } from './schemas.js'
import type { RawGraphFile } from './schemas.js'

// ---------------------------------------------------------------------------
// ParseError
// ---------------------------------------------------------------------------

export class ParseError extends Error {
  public readonly filePath?: string
  public readonly format?: string
  public readonly originalError?: Error

  constructor(
    message: string,
    options: {
      filePath?: string
      format?: string
      originalError?: Error
    } = {},
  ) {
    super(message)
    this.name = 'ParseError'
    this.filePath = options.filePath
    this.format = options.format
    this.originalError = options.originalError
  }
}

// ---------------------------------------------------------------------------
// Format detection
// ---------------------------------------------------------------------------

export type GraphFormat = 'yaml' | 'json'

export function detectFormat(filePath: string): GraphFormat {
  const ext = extname(filePath).toLowerCase()
  if (ext === '.json') {
    return 'json'
  }
  // .yaml, .yml and anything else are read as YAML
  return 'yaml'
}

// ---------------------------------------------------------------------------
// parseGraphString
// ---------------------------------------------------------------------------

/**
 * Parse a graph definition from a string (YAML or JSON).
 * Returns the raw parsed object before Zod validation.
 *
 * @throws {ParseError} on syntax errors
 * @throws {GraphIncompatibleFormatError} if the document declares an unsupported version
 */
export function parseGraphString(content: string, format: GraphFormat): RawGraphFile {
  let parsed: unknown

  try {
    parsed = format === 'json' ? JSON.parse(content) : parse(content)
  } catch (err) {
    const original = err instanceof Error ? err : new Error(String(err))
    throw new ParseError(`${format === 'json' ? 'JSON' : 'YAML'} parse error: ${original.message}`, {
      format,
      originalError: original,
    })
  }

  if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed) && 'version' in parsed) {
    const version = parsed.version
    if (typeof version === 'string' && !(SUPPORTED_GRAPH_VERSIONS as readonly string[]).includes(version)) {
      throw new GraphIncompatibleFormatError(
        `Graph format version "${version}" is not supported. ` +
          `This toolkit supports: ${SUPPORTED_GRAPH_VERSIONS.join(', ')}.`,
        { version }
      )
    }
  }

  return parsed
}

// ---------------------------------------------------------------------------
// parseGraphFile
// ---------------------------------------------------------------------------

/**
 * Read a graph file and parse its contents.
 * Format is determined by file extension (.json vs .yaml/.yml).
 *
 * @param filePath - Absolute or relative path to the graph file
 * @throws {ParseError} on file read errors or syntax errors
 */
export function parseGraphFile(filePath: string): RawGraphFile {
  let content: string

  try {
    content = readFileSync(filePath, 'utf-8')
  } catch (err) {
    const original = err instanceof Error ? err : new Error(String(err))
    throw new ParseError(`Failed to read file: ${original.message}`, {
      filePath,
      originalError: original,
    })
  }

  try {
    return parseGraphString(content, detectFormat(filePath))
  } catch (err) {
    if (err instanceof ParseError) {
      // Re-throw with file path context added
      throw new ParseError(err.message, {
        filePath,
        format: err.format,
        originalError: err.originalError,
      })
    }
    throw err
  }
}
