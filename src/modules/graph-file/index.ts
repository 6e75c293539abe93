export { ParseError, parseGraphFile, parseGraphString, detectFormat } from './graph-parser.js'
export type { GraphFormat } from './graph-parser.js'
export { ValidationError, validateGraph, assertValidGraph, findDanglingReferences } from './graph-validator.js'
export type { ValidationResult } from './graph-validator.js'
export { buildTree } from './graph-builder.js'
export type { BuiltGraph, GraphTargetAttribs } from './graph-builder.js'
export {
  GraphFileSchema,
  TargetDefinitionSchema,
  SUPPORTED_GRAPH_VERSIONS,
} from './schemas.js'
export type { GraphFile, TargetDefinition, RawGraphFile } from './schemas.js'
