/**
 * Validation of enum-valued command-line flags against the config schemas.
 */

import type { z } from 'zod'
import { EXIT_USAGE_ERROR } from './load-graph.js'

export type ParseFlagResult<T> =
  | { ok: true; value: T | undefined }
  | { ok: false; exitCode: number }

/**
 * Check a raw flag value against `schema`. An absent flag is valid and stays
 * undefined so the configured value applies; a bad one is reported on stderr.
 */
export function parseFlag<S extends z.ZodTypeAny>(
  schema: S,
  flag: string,
  value: string | undefined,
): ParseFlagResult<z.infer<S>> {
  if (value === undefined) return { ok: true, value: undefined }

  const result = schema.safeParse(value)
  if (!result.success) {
    const message = result.error.issues[0]?.message ?? 'invalid value'
    process.stderr.write(`Error: ${flag}: ${message}\n`)
    return { ok: false, exitCode: EXIT_USAGE_ERROR }
  }
  return { ok: true, value: result.data }
}
