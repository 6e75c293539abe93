/**
 * Shared types for the dependency tree engine.
 */

import type { Logger } from 'pino'

/** Stable index of a target inside the tree that created it */
export type TargetHandle = number

export type TargetState = 'Unstarted' | 'Started' | 'Failed' | 'Finished'

/** Lifecycle operations a scheduler reports against a target */
export type LifecycleOperation = 'start' | 'finish' | 'fail'

/**
 * How finishing a target promotes its dependents.
 *
 *  - strict: promote a dependent only once all its direct dependencies are Finished
 *  - legacy: promote every direct dependent of the finished target that has
 *    not already finished or failed
 */
export type ReadinessMode = 'strict' | 'legacy'

export interface TargetRecord<TAttribs> {
  readonly name: string
  readonly attribs: TAttribs | undefined
  state: TargetState
}

export interface DepTreeOptions {
  /** @default 'strict' */
  readiness?: ReadinessMode
  /** Logger for transition and reduction events; defaults to the module logger */
  logger?: Logger
}

/** Final (or current) standing of every target, grouped by state */
export interface TreeSummary {
  done: boolean
  /** True when done() holds and every target finished */
  succeeded: boolean
  finished: TargetHandle[]
  failed: TargetHandle[]
  started: TargetHandle[]
  unstarted: TargetHandle[]
}
