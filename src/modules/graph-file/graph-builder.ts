/**
 * Builds a DepTree from a validated graph definition.
 */

import { DepTree } from '../dep-tree/dep-tree.js'
import type { DepTreeOptions, TargetHandle } from '../dep-tree/types.js'
import { ValidationError, findDanglingReferences } from './graph-validator.js'
import type { GraphFile, TargetDefinition } from './schemas.js'

/** Per-target payload carried by trees built from graph files */
export interface GraphTargetAttribs {
  /** Key of the target in the graph file */
  id: string
  description?: string
  attribs?: Record<string, unknown>
}

export interface BuiltGraph {
  tree: DepTree<GraphTargetAttribs>
  /** Target key → handle */
  handles: Map<string, TargetHandle>
  /** Handle → target key (index is the handle) */
  ids: string[]
}

/**
 * Insert every target (in key order), then every edge (in depends_on order).
 *
 * @throws {ValidationError} if a depends_on entry names no target of the graph
 */
export function buildTree(graph: GraphFile, options: DepTreeOptions = {}): BuiltGraph {
  const dangling = findDanglingReferences(graph.targets)
  if (dangling.length > 0) {
    throw new ValidationError(dangling)
  }

  const tree = new DepTree<GraphTargetAttribs>(options)
  const handles = new Map<string, TargetHandle>()
  const ids: string[] = []

  const entries: [string, TargetDefinition][] = Object.entries(graph.targets)

  for (const [id, target] of entries) {
    const handle = tree.addTarget(target.name ?? id, {
      id,
      description: target.description,
      attribs: target.attribs,
    })
    handles.set(id, handle)
    ids.push(id)
  }

  for (const [id, target] of entries) {
    const dependent = lookup(handles, id)
    for (const dep of target.depends_on) {
      tree.depend(dependent, lookup(handles, dep))
    }
  }

  return { tree, handles, ids }
}

function lookup(handles: Map<string, TargetHandle>, id: string): TargetHandle {
  const handle = handles.get(id)
  if (handle === undefined) {
    throw new ValidationError([`Unknown target "${id}"`])
  }
  return handle
}
