/**
 * Graph-definition validator.
 *
 * Combines Zod schema validation and dangling reference detection into a
 * single ValidationResult. Acyclicity is the author's responsibility and is
 * not checked here.
 */

import { GraphFileSchema, SUPPORTED_GRAPH_VERSIONS } from './schemas.js'
import type { GraphFile } from './schemas.js'

// ---------------------------------------------------------------------------
// ValidationResult
// ---------------------------------------------------------------------------

export interface ValidationResult {
  valid: boolean
  errors: string[]
  warnings: string[]
  /** The validated and typed graph (only present when valid === true) */
  graph?: GraphFile
}

// ---------------------------------------------------------------------------
// ValidationError
// ---------------------------------------------------------------------------

export class ValidationError extends Error {
  public readonly errors: string[]
  public readonly warnings: string[]

  constructor(errors: string[], warnings: string[] = []) {
    super(`Graph validation failed:\n${errors.join('\n')}`)
    this.name = 'ValidationError'
    this.errors = errors
    this.warnings = warnings
  }
}

// ---------------------------------------------------------------------------
// findDanglingReferences
// ---------------------------------------------------------------------------

/**
 * Check that every `depends_on` entry names a target of the graph.
 *
 * @returns One message per missing reference (empty if all valid)
 */
export function findDanglingReferences(targets: GraphFile['targets']): string[] {
  const errors: string[] = []
  const ids = new Set(Object.keys(targets))

  for (const [id, target] of Object.entries(targets)) {
    for (const dep of target.depends_on) {
      if (!ids.has(dep)) {
        errors.push(`Target "${id}" references unknown dependency "${dep}"`)
      }
    }
  }

  return errors
}

// ---------------------------------------------------------------------------
// validateGraph
// ---------------------------------------------------------------------------

/**
 * Validate a raw (unknown) graph object.
 *
 * Runs in order:
 *  1. Version field check (before full schema parse) for a clear message
 *  2. Zod schema validation
 *  3. Dangling reference detection
 *  4. Duplicate dependency warnings
 *
 * @param raw - Raw parsed object (output of parseGraphFile/parseGraphString)
 */
export function validateGraph(raw: unknown): ValidationResult {
  const errors: string[] = []
  const warnings: string[] = []

  // Step 1: Pre-check version
  if (raw !== null && typeof raw === 'object' && !Array.isArray(raw)) {
    const version = 'version' in raw ? raw.version : undefined
    if (version === undefined || version === null) {
      errors.push(
        `Graph version is missing. This toolkit supports: ${SUPPORTED_GRAPH_VERSIONS.join(', ')}`,
      )
      return { valid: false, errors, warnings }
    }
  }

  // Step 2: Zod schema validation
  const parseResult = GraphFileSchema.safeParse(raw)
  if (!parseResult.success) {
    for (const issue of parseResult.error.issues) {
      const path = issue.path.length > 0 ? ` (at ${issue.path.join('.')})` : ''
      errors.push(`${issue.message}${path}`)
    }
    return { valid: false, errors, warnings }
  }

  const graph = parseResult.data

  // Step 3: Dangling references
  errors.push(...findDanglingReferences(graph.targets))

  // Step 4: Repeated entries are harmless (edges are a set) but usually a typo
  for (const [id, target] of Object.entries(graph.targets)) {
    const seen = new Set<string>()
    for (const dep of target.depends_on) {
      if (seen.has(dep)) {
        warnings.push(`Target "${id}" lists dependency "${dep}" more than once`)
      }
      seen.add(dep)
    }
  }

  if (errors.length > 0) {
    return { valid: false, errors, warnings }
  }

  return { valid: true, errors, warnings, graph }
}

// ---------------------------------------------------------------------------
// assertValidGraph
// ---------------------------------------------------------------------------

/**
 * Validate a raw graph object and return it typed.
 *
 * @throws {ValidationError} carrying every error and warning when invalid
 */
export function assertValidGraph(raw: unknown): GraphFile {
  const result = validateGraph(raw)
  if (!result.valid || result.graph === undefined) {
    throw new ValidationError(result.errors, result.warnings)
  }
  return result.graph
}
