/**
 * Transitive reduction of the dependent → dependency edge set.
 *
 * Removes every edge `dependent → dependency` for which a longer path already
 * connects the two targets, leaving each target with the minimal set of direct
 * dependents that readiness propagation has to notify.
 *
 * Algorithm: iterative post-order DFS along "down" edges. When a target is
 * completed, each of its direct dependents already carries its full
 * downstream reachability set. A direct dependent that appears in any such
 * set is reachable through a sibling, so its edge is dropped. The remaining
 * direct dependents are folded into the target's own reachability set.
 *
 * A single visited marker is shared across all start points, so each target
 * and each edge is traversed once per pass. Along chains the reachability set
 * is handed from child to parent instead of copied.
 */

import type { EdgeIndex } from './edge-index.js'
import type { TargetHandle } from './types.js'

interface Frame {
  handle: TargetHandle
  /** Snapshot of direct dependents taken when the frame was pushed */
  children: TargetHandle[]
  next: number
}

const NOTHING_BELOW: ReadonlySet<TargetHandle> = new Set()

/**
 * Reduce `edges` in place.
 *
 * @param edges - Edge index to prune
 * @param starts - Handles to start traversals from, in order; handles not
 *   reachable from any of them are traversed afterwards in handle order
 * @returns Number of edges removed
 */
export function reduceTransitively(
  edges: EdgeIndex,
  starts: Iterable<TargetHandle>,
): number {
  const visited = new Uint8Array(edges.size)
  const below: (Set<TargetHandle> | undefined)[] = new Array<undefined>(edges.size)
  let removed = 0

  const complete = (handle: TargetHandle): Set<TargetHandle> => {
    const children = [...edges.dependentsOf(handle)]

    // A child with no other dependency is read by nobody else: take its set over
    let reach: Set<TargetHandle> | undefined
    for (const child of children) {
      const childBelow = below[child]
      if (childBelow !== undefined && edges.dependenciesOf(child).size === 1) {
        reach = childBelow
        below[child] = undefined
        break
      }
    }
    reach ??= new Set<TargetHandle>()

    for (const child of children) {
      // Undefined for a set taken over above, or for a target still on the stack (a cycle)
      for (const descendant of below[child] ?? NOTHING_BELOW) reach.add(descendant)
    }
    for (const child of children) {
      if (reach.has(child)) {
        edges.unlink(child, handle)
        removed++
      } else {
        reach.add(child)
      }
    }
    return reach
  }

  const traverse = (origin: TargetHandle): void => {
    if (visited[origin] === 1) return
    visited[origin] = 1
    const stack: Frame[] = [{ handle: origin, children: [...edges.dependentsOf(origin)], next: 0 }]

    while (stack.length > 0) {
      const frame = stack[stack.length - 1]
      if (frame === undefined) break

      const child = frame.children[frame.next]
      if (child !== undefined) {
        frame.next++
        if (visited[child] !== 1) {
          visited[child] = 1
          stack.push({ handle: child, children: [...edges.dependentsOf(child)], next: 0 })
        }
        continue
      }

      stack.pop()
      below[frame.handle] = complete(frame.handle)
    }
  }

  for (const start of starts) traverse(start)
  for (let handle = 0; handle < edges.size; handle++) traverse(handle)

  return removed
}
