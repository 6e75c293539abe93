/**
 * Zod schemas for graph-definition YAML/JSON files.
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Supported graph versions
// ---------------------------------------------------------------------------

export const SUPPORTED_GRAPH_VERSIONS = ['1', '1.0'] as const

// ---------------------------------------------------------------------------
// TargetDefinitionSchema
// ---------------------------------------------------------------------------

export const TargetDefinitionSchema = z
  .object({
    /** Display name; defaults to the target's key */
    name: z.string().min(1, 'Target name must not be empty').optional(),
    description: z.string().optional(),
    depends_on: z.array(z.string().min(1)).default([]),
    /** Opaque payload handed to the tree untouched */
    attribs: z.record(z.string(), z.unknown()).optional(),
  })
  .strict()

export type TargetDefinition = z.infer<typeof TargetDefinitionSchema>

// ---------------------------------------------------------------------------
// GraphFileSchema
// ---------------------------------------------------------------------------

export const GraphFileSchema = z.object({
  version: z.string().superRefine((v, ctx) => {
    if (!(SUPPORTED_GRAPH_VERSIONS as readonly string[]).includes(v)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Graph version '${v}' is not supported. This toolkit supports: ${SUPPORTED_GRAPH_VERSIONS.join(', ')}`,
      })
    }
  }),
  targets: z
    .record(z.string().min(1), TargetDefinitionSchema)
    .refine((targets) => Object.keys(targets).length > 0, {
      message: 'Graph must define at least one target',
    }),
})

export type GraphFile = z.infer<typeof GraphFileSchema>

/** Raw parsed graph document (before Zod validation) */
export type RawGraphFile = unknown
