/**
 * Unit tests for reduceTransitively.
 */

import { describe, it, expect } from 'vitest'
import { EdgeIndex } from '../edge-index.js'
import { reduceTransitively } from '../transitive-reduction.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Build an index from [dependent, dependency] pairs */
function indexOf(size: number, pairs: [number, number][]): EdgeIndex {
  const edges = new EdgeIndex()
  for (let i = 0; i < size; i++) edges.grow()
  for (const [dependent, dependency] of pairs) edges.link(dependent, dependency)
  return edges
}

function edgeList(edges: EdgeIndex): [number, number][] {
  const pairs: [number, number][] = []
  for (let dependent = 0; dependent < edges.size; dependent++) {
    for (const dependency of edges.dependenciesOf(dependent)) pairs.push([dependent, dependency])
  }
  return pairs.sort((a, b) => a[0] - b[0] || a[1] - b[1])
}

/** Everything `from` depends on, directly or not, optionally ignoring one edge */
function upstream(edges: EdgeIndex, from: number, skip?: [number, number]): Set<number> {
  const seen = new Set<number>()
  const pending = [from]
  for (let node = pending.pop(); node !== undefined; node = pending.pop()) {
    for (const dep of edges.dependenciesOf(node)) {
      if (skip !== undefined && node === skip[0] && dep === skip[1]) continue
      if (!seen.has(dep)) {
        seen.add(dep)
        pending.push(dep)
      }
    }
  }
  return seen
}

/** Small deterministic generator so failures are reproducible */
function lcg(seed: number): () => number {
  let state = seed
  return () => {
    state = (state * 1103515245 + 12345) % 2147483648
    return state / 2147483648
  }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('reduceTransitively', () => {
  it('drops the shortcut edge of a diamond', () => {
    // 1 → 0, 2 → 1, 2 → 0
    const edges = indexOf(3, [[1, 0], [2, 1], [2, 0]])
    expect(reduceTransitively(edges, [0])).toBe(1)
    expect(edgeList(edges)).toEqual([[1, 0], [2, 1]])
  })

  it('reduces a fully connected DAG to a chain', () => {
    const pairs: [number, number][] = []
    for (let j = 1; j < 4; j++) for (let i = 0; i < j; i++) pairs.push([j, i])
    const edges = indexOf(4, pairs)

    expect(reduceTransitively(edges, [0])).toBe(3)
    expect(edgeList(edges)).toEqual([[1, 0], [2, 1], [3, 2]])
  })

  it('keeps two independent paths to the same target', () => {
    // 3 needs 1 and 2, both need 0
    const edges = indexOf(4, [[1, 0], [2, 0], [3, 1], [3, 2]])
    expect(reduceTransitively(edges, [0])).toBe(0)
    expect(edgeList(edges)).toHaveLength(4)
  })

  it('reaches targets that are not below any start point', () => {
    const edges = indexOf(6, [[1, 0], [2, 1], [2, 0], [4, 3], [5, 4], [5, 3]])
    expect(reduceTransitively(edges, [])).toBe(2)
    expect(edgeList(edges)).toEqual([[1, 0], [2, 1], [4, 3], [5, 4]])
  })

  it('removes nothing on a second pass', () => {
    const edges = indexOf(3, [[1, 0], [2, 1], [2, 0]])
    reduceTransitively(edges, [0])
    const after = edgeList(edges)
    expect(reduceTransitively(edges, [0])).toBe(0)
    expect(edgeList(edges)).toEqual(after)
  })

  it('handles a long chain without recursion limits', () => {
    const size = 100_000
    const pairs: [number, number][] = []
    for (let i = 1; i < size; i++) pairs.push([i, i - 1])
    pairs.push([size - 1, 0])
    const edges = indexOf(size, pairs)

    expect(reduceTransitively(edges, [0])).toBe(1)
    expect([...edges.dependenciesOf(size - 1)]).toEqual([size - 2])
  })

  it('preserves reachability and leaves no implied edge in random DAGs', () => {
    const random = lcg(7)
    for (let round = 0; round < 20; round++) {
      const size = 25
      const pairs: [number, number][] = []
      // Edges only point to lower handles, so the graph is acyclic
      for (let j = 1; j < size; j++) {
        for (let i = 0; i < j; i++) {
          if (random() < 0.2) pairs.push([j, i])
        }
      }
      const edges = indexOf(size, pairs)
      const before = Array.from({ length: size }, (_, h) => upstream(edges, h))

      reduceTransitively(edges, [])

      for (let h = 0; h < size; h++) {
        expect(upstream(edges, h)).toEqual(before[h])
      }
      for (const edge of edgeList(edges)) {
        expect(upstream(edges, edge[0], edge).has(edge[1])).toBe(false)
      }
    }
  })
})
