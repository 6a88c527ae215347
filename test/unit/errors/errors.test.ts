import { describe, it, expect } from 'vitest'
import { formatError, friendlyError, isReleaseError, ReleaseError } from '../../../src/errors.js'

describe('Friendly errors', () => {
  it('should keep the detail as the cause', () => {
    const friendly = friendlyError('SUBMISSION_REJECTED', 'ValidatorFailed')
    expect(friendly.code).toBe('SUBMISSION_REJECTED')
    expect(friendly.cause).toBe('ValidatorFailed')
  })

  it('should fall back to UNKNOWN_ERROR for unregistered codes', () => {
    const friendly = friendlyError('NOT_A_CODE', 'boom')
    expect(friendly.code).toBe('UNKNOWN_ERROR')
    expect(friendly.message).toBe('boom')
  })

  it('should not resolve prototype properties as codes', () => {
    expect(friendlyError('toString').code).toBe('UNKNOWN_ERROR')
  })

  it('should put the tx id into confirmation timeouts', () => {
    const friendly = friendlyError('CONFIRMATION_TIMEOUT', 'abc123')
    expect(friendly.message).toBe('Transaction abc123 was not confirmed within the polling window.')
  })

  it('should format message, cause and fix lines', () => {
    const text = formatError(friendlyError('INVALID_ARGUMENT', 'Amount must be positive, got 0'))
    expect(text.split('\n')).toEqual([
      '',
      '❌ An argument was out of range.',
      '',
      '  Why: Amount must be positive, got 0',
      '',
      '  Fix:',
      '  • Check the command arguments and try again',
      ''
    ])
  })
})

describe('ReleaseError', () => {
  it('should carry code and detail', () => {
    const err = new ReleaseError('MISSING_COLLATERAL', 'no output')
    expect(err).toBeInstanceOf(Error)
    expect(err.name).toBe('ReleaseError')
    expect(err.message).toBe('MISSING_COLLATERAL: no output')
    expect(err.toFriendly().cause).toBe('no output')
  })

  it('should keep the underlying cause', () => {
    const cause = new Error('ENOENT')
    const err = new ReleaseError('CREDENTIAL_UNAVAILABLE', 'missing', { cause })
    expect(err.cause).toBe(cause)
  })

  it('isReleaseError should narrow by code', () => {
    const err = new ReleaseError('INSUFFICIENT_FUNDS')
    expect(isReleaseError(err)).toBe(true)
    expect(isReleaseError(err, 'INSUFFICIENT_FUNDS')).toBe(true)
    expect(isReleaseError(err, 'MISSING_COLLATERAL')).toBe(false)
    expect(isReleaseError(new Error('x'))).toBe(false)
  })
})
