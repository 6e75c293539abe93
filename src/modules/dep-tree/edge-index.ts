/**
 * Edge index - per-target sets of direct dependencies ("up") and direct
 * dependents ("down"). Both directions are kept in step by every mutation.
 */

import type { TargetHandle } from './types.js'

export class EdgeIndex {
  private readonly up: Set<TargetHandle>[] = []
  private readonly down: Set<TargetHandle>[] = []

  get size(): number {
    return this.up.length
  }

  /** Total number of dependency edges */
  get edgeCount(): number {
    let count = 0
    for (const deps of this.up) count += deps.size
    return count
  }

  /** Allocate empty edge sets for the next handle */
  grow(): void {
    this.up.push(new Set())
    this.down.push(new Set())
  }

  /**
   * Record that `dependent` needs `dependency`.
   *
   * @returns false when the edge already existed
   */
  link(dependent: TargetHandle, dependency: TargetHandle): boolean {
    const deps = this.upOf(dependent)
    const dependents = this.downOf(dependency)
    if (deps.has(dependency)) return false
    deps.add(dependency)
    dependents.add(dependent)
    return true
  }

  unlink(dependent: TargetHandle, dependency: TargetHandle): void {
    this.upOf(dependent).delete(dependency)
    this.downOf(dependency).delete(dependent)
  }

  dependenciesOf(handle: TargetHandle): ReadonlySet<TargetHandle> {
    return this.upOf(handle)
  }

  dependentsOf(handle: TargetHandle): ReadonlySet<TargetHandle> {
    return this.downOf(handle)
  }

  private upOf(handle: TargetHandle): Set<TargetHandle> {
    const deps = this.up[handle]
    if (deps === undefined) throw new RangeError(`No edge set for handle ${String(handle)}`)
    return deps
  }

  private downOf(handle: TargetHandle): Set<TargetHandle> {
    const dependents = this.down[handle]
    if (dependents === undefined) throw new RangeError(`No edge set for handle ${String(handle)}`)
    return dependents
  }
}
