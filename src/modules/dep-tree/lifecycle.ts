/**
 * Target lifecycle rules.
 *
 * State machine transitions:
 *   Unstarted → Started   (start)
 *   Started   → Finished  (finish)
 *   Started   → Failed    (fail)
 *
 * Finished and Failed are terminal. Every other (operation, state) pair maps
 * to exactly one TargetStateError kind.
 */

import { TargetStateError } from '../../core/errors.js'
import type { TargetStateErrorKind } from '../../core/errors.js'
import type { LifecycleOperation, TargetHandle, TargetState } from './types.js'

interface TransitionRule {
  /** The only state the operation is legal from */
  from: TransitionFrom
  to: TargetState
  /** Error raised for each illegal source state */
  illegal: Record<Exclude<TargetState, TransitionFrom>, TargetStateErrorKind>
}

type TransitionFrom = 'Unstarted' | 'Started'

const TRANSITIONS: Record<LifecycleOperation, TransitionRule> = {
  start: {
    from: 'Unstarted',
    to: 'Started',
    illegal: { Failed: 'StartedFailed', Finished: 'StartedFinished' },
  },
  finish: {
    from: 'Started',
    to: 'Finished',
    illegal: { Failed: 'FinishFailed', Finished: 'AlreadyFinished' },
  },
  fail: {
    from: 'Started',
    to: 'Failed',
    illegal: { Failed: 'AlreadyFailed', Finished: 'FinishFailed' },
  },
}

/**
 * Resolve the error kind for an illegal operation, or null when the
 * operation is legal from `state`.
 */
export function illegalTransition(
  operation: LifecycleOperation,
  state: TargetState,
): TargetStateErrorKind | null {
  const rule = TRANSITIONS[operation]
  switch (state) {
    case rule.from:
      return null
    case 'Unstarted':
      // Only finish/fail get here
      return operation === 'finish' ? 'NotYetStarted' : 'UnstartedFailed'
    case 'Started':
      return 'AlreadyStarted'
    case 'Failed':
    case 'Finished':
      return rule.illegal[state]
  }
}

/**
 * Check an operation against the target's state and return the next state.
 *
 * @throws {TargetStateError} if the operation is illegal from `state`
 */
export function nextState(
  operation: LifecycleOperation,
  state: TargetState,
  target: { name: string; handle: TargetHandle },
): TargetState {
  const kind = illegalTransition(operation, state)
  if (kind !== null) {
    throw new TargetStateError({
      kind,
      operation,
      target: target.name,
      handle: target.handle,
      state,
    })
  }
  return TRANSITIONS[operation].to
}
