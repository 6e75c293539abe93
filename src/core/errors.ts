/**
 * Error definitions for deptrack
 * Provides structured error hierarchy for all engine operations
 */

import type { LifecycleOperation, TargetHandle, TargetState } from '../modules/dep-tree/types.js'

/** Base error class for all deptrack errors */
export class DeptrackError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'DeptrackError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DeptrackError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Closed set of illegal lifecycle transitions */
export type TargetStateErrorKind =
  | 'AlreadyStarted'
  | 'StartedFailed'
  | 'StartedFinished'
  | 'NotYetStarted'
  | 'AlreadyFinished'
  | 'FinishFailed'
  | 'UnstartedFailed'
  | 'AlreadyFailed'

const KIND_DESCRIPTIONS: Record<TargetStateErrorKind, string> = {
  AlreadyStarted: 'target is already started',
  StartedFailed: 'target has already failed',
  StartedFinished: 'target has already finished',
  NotYetStarted: 'target has not been started',
  AlreadyFinished: 'target has already finished',
  FinishFailed: 'target cannot both finish and fail',
  UnstartedFailed: 'target has not been started',
  AlreadyFailed: 'target has already failed',
}

/** Error thrown when a lifecycle operation is illegal in the target's current state */
export class TargetStateError extends DeptrackError {
  public readonly kind: TargetStateErrorKind
  public readonly operation: LifecycleOperation
  public readonly target: string
  public readonly handle: TargetHandle
  public readonly state: TargetState

  constructor(params: {
    kind: TargetStateErrorKind
    operation: LifecycleOperation
    target: string
    handle: TargetHandle
    state: TargetState
  }) {
    super(
      `Cannot ${params.operation} "${params.target}": ${KIND_DESCRIPTIONS[params.kind]}`,
      'TARGET_STATE_ERROR',
      {
        kind: params.kind,
        operation: params.operation,
        target: params.target,
        handle: params.handle,
        state: params.state,
      }
    )
    this.name = 'TargetStateError'
    this.kind = params.kind
    this.operation = params.operation
    this.target = params.target
    this.handle = params.handle
    this.state = params.state
  }
}

/** Error thrown when a handle does not address a target of the tree */
export class InvalidHandleError extends DeptrackError {
  constructor(handle: number, size: number) {
    super(
      `Invalid target handle ${String(handle)} (tree holds ${String(size)} targets)`,
      'INVALID_HANDLE',
      { handle, size }
    )
    this.name = 'InvalidHandleError'
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends DeptrackError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when a graph file uses an incompatible format version */
export class GraphIncompatibleFormatError extends DeptrackError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'GRAPH_INCOMPATIBLE_FORMAT', context)
    this.name = 'GraphIncompatibleFormatError'
  }
}
