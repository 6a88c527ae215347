import { describe, it, expect } from 'vitest'
import { mConStr0, mConStr1, serializeData } from '@meshsdk/core'
import { conditionFromJson, encodeCondition, tryDecode } from '../../../src/conditions/codec.js'
import { fixed, timeLocked } from '../../../src/conditions/types.js'

const BENEFICIARY = 'ab'.repeat(28)

describe('Condition codec', () => {
  describe('encodeCondition', () => {
    it('should encode a fixed condition as a plain integer', () => {
      expect(encodeCondition(fixed(42))).toBe('182a')
    })

    it('should encode a small fixed value in one byte', () => {
      expect(encodeCondition(fixed(7))).toBe('07')
    })

    it('should encode a time-locked condition as constructor 0', () => {
      const cbor = encodeCondition(timeLocked(BENEFICIARY, 1_700_000_000_000))
      expect(cbor.startsWith('d879')).toBe(true)
      expect(cbor).toContain('581c' + BENEFICIARY)
    })
  })

  describe('tryDecode', () => {
    it('should round-trip a fixed condition', () => {
      expect(tryDecode(encodeCondition(fixed(42)))).toEqual({ kind: 'fixed', value: 42n })
    })

    it('should round-trip a time-locked condition', () => {
      const condition = timeLocked(BENEFICIARY, 1_700_000_123_456)
      expect(tryDecode(encodeCondition(condition))).toEqual(condition)
    })

    it('should return null for other constructors', () => {
      expect(tryDecode(serializeData(mConStr1([BENEFICIARY, 1000])))).toBeNull()
    })

    it('should return null for a constructor with the wrong arity', () => {
      expect(tryDecode(serializeData(mConStr0([BENEFICIARY])))).toBeNull()
    })

    it('should return null when the beneficiary is not 28 bytes', () => {
      expect(tryDecode(serializeData(mConStr0(['abcd', 1000])))).toBeNull()
    })

    it('should return null for bytes payloads', () => {
      expect(tryDecode('4101')).toBeNull()
    })

    it('should return null for garbage', () => {
      expect(tryDecode('zz-not-cbor')).toBeNull()
    })
  })

  describe('conditionFromJson', () => {
    it('should accept string and bigint integers', () => {
      expect(conditionFromJson({ int: '12345678901234567890' })).toEqual({ kind: 'fixed', value: 12345678901234567890n })
      expect(conditionFromJson({ int: 5n })).toEqual({ kind: 'fixed', value: 5n })
    })

    it('should lowercase the beneficiary', () => {
      const decoded = conditionFromJson({
        constructor: 0,
        fields: [{ bytes: 'AB'.repeat(28) }, { int: 99 }]
      })
      expect(decoded).toEqual({ kind: 'time-locked', beneficiary: BENEFICIARY, deadline: 99 })
    })

    it('should reject negative deadlines', () => {
      expect(conditionFromJson({
        constructor: 0,
        fields: [{ bytes: BENEFICIARY }, { int: -1 }]
      })).toBeNull()
    })

    it('should not treat inherited properties as fields', () => {
      expect(conditionFromJson({})).toBeNull()
      expect(conditionFromJson([])).toBeNull()
      expect(conditionFromJson(null)).toBeNull()
    })
  })
})
