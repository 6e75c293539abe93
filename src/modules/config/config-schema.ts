/**
 * Zod validation schemas for the deptrack configuration.
 */

import { z } from 'zod'

export const ReadinessModeSchema = z.enum(['strict', 'legacy'])

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const OutputFormatSchema = z.enum(['human', 'json'])
export type OutputFormat = z.infer<typeof OutputFormatSchema>

export const DeptrackConfigSchema = z
  .object({
    /** How finishing a target promotes its dependents */
    readiness: ReadinessModeSchema,
    log_level: LogLevelSchema,
    /** Default output format for CLI commands */
    output_format: OutputFormatSchema,
  })
  .strict()

export type DeptrackConfig = z.infer<typeof DeptrackConfigSchema>

export const PartialDeptrackConfigSchema = DeptrackConfigSchema.partial()

export type PartialDeptrackConfig = z.infer<typeof PartialDeptrackConfigSchema>
