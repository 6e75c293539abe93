/**
 * DepTree - dependency graph of targets with a per-target lifecycle and a
 * readiness query for an external scheduler to poll.
 *
 * Builder phase: addTarget / depend.
 * Run phase: ready → start → finish | fail, until done().
 *
 * Readiness bookkeeping is incremental. A target enters the root set when it
 * is inserted and leaves it when it gains a dependency; finishing a target
 * promotes its dependents back into the root set (see ReadinessMode). ready()
 * filters the root set down to targets that are still Unstarted.
 *
 * Before a finish propagates readiness the edge set is transitively reduced,
 * so dependents are only notified along the tightest dependency chain.
 *
 * Not thread-safe, and no callbacks: every mutating call must be serialized
 * by the caller.
 */

import type { Logger } from 'pino'
import { createLogger } from '../../utils/logger.js'
import { EdgeIndex } from './edge-index.js'
import { nextState } from './lifecycle.js'
import { TargetStore } from './target-store.js'
import { reduceTransitively } from './transitive-reduction.js'
import type {
  DepTreeOptions,
  LifecycleOperation,
  ReadinessMode,
  TargetHandle,
  TargetState,
  TreeSummary,
} from './types.js'

const moduleLogger = createLogger('dep-tree')

export class DepTree<TAttribs = unknown> {
  private readonly targets = new TargetStore<TAttribs>()
  private readonly edges = new EdgeIndex()
  private readonly roots = new Set<TargetHandle>()
  private readonly readiness: ReadinessMode
  private readonly logger: Logger
  private reduced = true
  private runningCount = 0

  constructor(options: DepTreeOptions = {}) {
    this.readiness = options.readiness ?? 'strict'
    this.logger = options.logger ?? moduleLogger
  }

  // -------------------------------------------------------------------------
  // Builder phase
  // -------------------------------------------------------------------------

  addTarget(name: string, attribs?: TAttribs): TargetHandle {
    const handle = this.targets.add(name, attribs)
    this.edges.grow()
    this.roots.add(handle)
    this.reduced = false
    return handle
  }

  /**
   * Declare that `dependent` may not start before `dependency` finishes.
   * Inserting an existing edge again is a no-op apart from the readiness
   * update. Cycles are not detected.
   */
  depend(dependent: TargetHandle, dependency: TargetHandle): void {
    this.targets.get(dependent)
    const dependencyRecord = this.targets.get(dependency)

    this.edges.link(dependent, dependency)
    if (this.readiness === 'legacy' || dependencyRecord.state !== 'Finished') {
      this.roots.delete(dependent)
    }
    this.reduced = false
  }

  // -------------------------------------------------------------------------
  // Accessors
  // -------------------------------------------------------------------------

  get size(): number {
    return this.targets.size
  }

  /** Number of targets currently Started */
  get running(): number {
    return this.runningCount
  }

  handles(): TargetHandle[] {
    return this.targets.handles()
  }

  name(handle: TargetHandle): string {
    return this.targets.get(handle).name
  }

  attribs(handle: TargetHandle): TAttribs | undefined {
    return this.targets.get(handle).attribs
  }

  state(handle: TargetHandle): TargetState {
    return this.targets.get(handle).state
  }

  /** Direct dependencies, as of the most recent reduction pass */
  dependsOn(handle: TargetHandle): TargetHandle[] {
    this.targets.get(handle)
    return [...this.edges.dependenciesOf(handle)]
  }

  /** Direct dependents, as of the most recent reduction pass */
  dependedBy(handle: TargetHandle): TargetHandle[] {
    this.targets.get(handle)
    return [...this.edges.dependentsOf(handle)]
  }

  // -------------------------------------------------------------------------
  // Run phase
  // -------------------------------------------------------------------------

  /** Targets that may start now, in the order they became roots */
  ready(): TargetHandle[] {
    const result: TargetHandle[] = []
    for (const handle of this.roots) {
      if (this.targets.get(handle).state === 'Unstarted') result.push(handle)
    }
    return result
  }

  /** @throws {TargetStateError} unless the target is Unstarted */
  start(handle: TargetHandle): void {
    this.transition(handle, 'start')
    this.runningCount++
  }

  /** @throws {TargetStateError} unless the target is Started */
  finish(handle: TargetHandle): void {
    this.simplify()
    this.transition(handle, 'finish')
    this.runningCount--
    this.roots.delete(handle)

    for (const dependent of this.edges.dependentsOf(handle)) {
      if (this.readiness === 'legacy' ? !this.isSettled(dependent) : this.isUnblocked(dependent)) {
        this.roots.add(dependent)
      }
    }
  }

  /**
   * Dependents of a failed target are left blocked; deciding what to do
   * about them is up to the scheduler.
   *
   * @throws {TargetStateError} unless the target is Started
   */
  fail(handle: TargetHandle): void {
    this.transition(handle, 'fail')
    this.runningCount--
    this.roots.delete(handle)
  }

  /**
   * True once nothing is running and no root is left. A failed target's
   * descendants never become roots, so done() alone does not mean success:
   * check summarize().succeeded.
   */
  done(): boolean {
    return this.runningCount === 0 && this.roots.size === 0
  }

  summarize(): TreeSummary {
    const summary: TreeSummary = {
      done: this.done(),
      succeeded: false,
      finished: [],
      failed: [],
      started: [],
      unstarted: [],
    }
    const groups: Record<TargetState, TargetHandle[]> = {
      Finished: summary.finished,
      Failed: summary.failed,
      Started: summary.started,
      Unstarted: summary.unstarted,
    }
    for (const handle of this.targets.handles()) {
      groups[this.targets.get(handle).state].push(handle)
    }
    summary.succeeded = summary.done && summary.finished.length === this.targets.size
    return summary
  }

  /**
   * Remove edges implied by longer paths. Runs at most once per batch of
   * insertions; called implicitly by finish().
   *
   * @returns Number of edges removed by this call
   */
  simplify(): number {
    if (this.reduced) return 0
    const removed = reduceTransitively(this.edges, this.roots)
    this.reduced = true
    this.logger.debug(
      { removed, targets: this.targets.size, edges: this.edges.edgeCount },
      'Dependency graph reduced',
    )
    return removed
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private transition(handle: TargetHandle, operation: LifecycleOperation): void {
    const record = this.targets.get(handle)
    const from = record.state
    record.state = nextState(operation, from, { name: record.name, handle })
    this.logger.debug(
      { target: record.name, handle, operation, from, to: record.state },
      'Target state changed',
    )
  }

  /** Legacy promotion can reach a dependent that already ran; it stays out of the root set */
  private isSettled(handle: TargetHandle): boolean {
    const state = this.targets.get(handle).state
    return state === 'Finished' || state === 'Failed'
  }

  private isUnblocked(handle: TargetHandle): boolean {
    if (this.targets.get(handle).state !== 'Unstarted') return false
    for (const dependency of this.edges.dependenciesOf(handle)) {
      if (this.targets.get(dependency).state !== 'Finished') return false
    }
    return true
  }
}
