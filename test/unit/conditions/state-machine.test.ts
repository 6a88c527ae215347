import { describe, it, expect } from 'vitest'
import { assessCondition, canTransition, transition } from '../../../src/conditions/state-machine.js'
import { fixed, LockState, timeLocked } from '../../../src/conditions/types.js'

describe('Lock state machine', () => {
  describe('state transitions', () => {
    it('should allow PENDING → RELEASABLE', () => {
      expect(canTransition(LockState.PENDING, LockState.RELEASABLE)).toBe(true)
    })

    it('should allow RELEASABLE → RELEASED', () => {
      expect(canTransition(LockState.RELEASABLE, LockState.RELEASED)).toBe(true)
    })

    it('should not allow PENDING → RELEASED (skip RELEASABLE)', () => {
      expect(canTransition(LockState.PENDING, LockState.RELEASED)).toBe(false)
    })

    it('should not allow transitions from RELEASED', () => {
      expect(canTransition(LockState.RELEASED, LockState.PENDING)).toBe(false)
      expect(canTransition(LockState.RELEASED, LockState.RELEASABLE)).toBe(false)
      expect(canTransition(LockState.RELEASED, LockState.RELEASED)).toBe(false)
    })

    it('should report the reason for a rejected transition', () => {
      expect(transition(LockState.RELEASED, LockState.PENDING)).toEqual({
        ok: false,
        error: 'Invalid transition: released -> pending'
      })
    })

    it('should return the new state for a valid transition', () => {
      expect(transition(LockState.PENDING, LockState.RELEASABLE)).toEqual({ ok: true, newState: LockState.RELEASABLE })
    })
  })

  describe('assessCondition', () => {
    const beneficiary = 'ab'.repeat(28)

    it('should treat fixed conditions as releasable', () => {
      expect(assessCondition(fixed(1), 0)).toBe(LockState.RELEASABLE)
    })

    it('should keep a time lock pending at exactly the deadline', () => {
      expect(assessCondition(timeLocked(beneficiary, 1000), 1000)).toBe(LockState.PENDING)
    })

    it('should release a time lock once time is past the deadline', () => {
      expect(assessCondition(timeLocked(beneficiary, 1000), 1001)).toBe(LockState.RELEASABLE)
    })
  })
})
