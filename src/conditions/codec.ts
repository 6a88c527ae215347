/**
 * Release condition <-> Plutus data
 *
 * The datum layout must match what the validators expect byte for byte:
 * - fixed:       the plain integer `value`
 * - time-locked: Constr 0 [Bytes beneficiary, Int deadline]
 */

import { deserializeDatum, mConStr0, serializeData } from '@meshsdk/core'
import type { Data } from '@meshsdk/core'
import { isKeyHash, type ReleaseCondition } from './types.js'

const TIME_LOCKED_CONSTRUCTOR = 0

/**
 * Mesh data form of a condition, as taken by the transaction builder
 */
export function conditionToData(condition: ReleaseCondition): Data {
  switch (condition.kind) {
    case 'fixed':
      return condition.value
    case 'time-locked':
      return mConStr0([condition.beneficiary, condition.deadline])
  }
}

/**
 * CBOR hex of a condition's datum
 */
export function encodeCondition(condition: ReleaseCondition): string {
  return serializeData(conditionToData(condition))
}

/**
 * Decode an inline datum. Anything that is not one of the two
 * condition shapes yields null.
 */
export function tryDecode(datumCbor: string): ReleaseCondition | null {
  let json: unknown
  try {
    json = deserializeDatum<unknown>(datumCbor)
  } catch {
    return null
  }
  return conditionFromJson(json)
}

/**
 * Interpret Plutus data in its JSON form ({ int }, { bytes },
 * { constructor, fields })
 */
export function conditionFromJson(json: unknown): ReleaseCondition | null {
  if (!isRecord(json)) return null

  if (hasOwn(json, 'int')) {
    const value = toBigInt(json['int'])
    return value === null ? null : { kind: 'fixed', value }
  }

  if (!hasOwn(json, 'constructor')) return null
  if (toBigInt(json['constructor']) !== BigInt(TIME_LOCKED_CONSTRUCTOR)) return null

  const fields = json['fields']
  if (!Array.isArray(fields) || fields.length !== 2) return null

  const [beneficiaryField, deadlineField]: unknown[] = fields
  if (!isRecord(beneficiaryField) || typeof beneficiaryField.bytes !== 'string') return null
  if (!isKeyHash(beneficiaryField.bytes)) return null
  if (!isRecord(deadlineField)) return null

  const deadline = toBigInt(deadlineField.int)
  if (deadline === null || deadline < 0n || deadline > BigInt(Number.MAX_SAFE_INTEGER)) return null

  return {
    kind: 'time-locked',
    beneficiary: beneficiaryField.bytes.toLowerCase(),
    deadline: Number(deadline)
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function hasOwn(record: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key)
}

function toBigInt(value: unknown): bigint | null {
  if (typeof value === 'bigint') return value
  if (typeof value === 'number' && Number.isSafeInteger(value)) return BigInt(value)
  if (typeof value === 'string' && /^-?\d+$/.test(value)) return BigInt(value)
  return null
}
