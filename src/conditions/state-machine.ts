/**
 * Locked Output State Machine
 *
 * pending -> releasable -> released. There is no cancellation or expiry:
 * a condition that can never be met stays pending.
 */

import { LockState, type ReleaseCondition } from './types.js'

export type StateTransitionResult =
  | { ok: true; newState: LockState }
  | { ok: false; error: string }

const VALID_TRANSITIONS: Record<LockState, LockState[]> = {
  [LockState.PENDING]: [LockState.RELEASABLE],
  [LockState.RELEASABLE]: [LockState.RELEASED],
  [LockState.RELEASED]: []  // Terminal state
}

export function canTransition(from: LockState, to: LockState): boolean {
  return VALID_TRANSITIONS[from].includes(to)
}

export function transition(from: LockState, to: LockState): StateTransitionResult {
  if (!canTransition(from, to)) {
    return { ok: false, error: `Invalid transition: ${from} -> ${to}` }
  }
  return { ok: true, newState: to }
}

/**
 * State of an unspent locked output at the observed ledger time (ms)
 */
export function assessCondition(condition: ReleaseCondition, observedTime: number): LockState {
  switch (condition.kind) {
    case 'fixed':
      return LockState.RELEASABLE
    case 'time-locked':
      return observedTime > condition.deadline ? LockState.RELEASABLE : LockState.PENDING
  }
}
