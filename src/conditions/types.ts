/**
 * Release Condition Types
 *
 * A condition is attached to a locked output as an inline datum and
 * decides what a release transaction must present.
 */

import type { UTxO } from '@meshsdk/core'

/** Length of a payment key hash in hex (28 bytes) */
export const KEY_HASH_HEX_LENGTH = 56

export type ReleaseCondition = FixedCondition | TimeLockedCondition

export interface FixedCondition {
  kind: 'fixed'
  /** Value the redeemer must equal */
  value: bigint
}

export interface TimeLockedCondition {
  kind: 'time-locked'
  /** Payment key hash (hex) whose signature is required */
  beneficiary: string
  /** POSIX time in milliseconds that ledger time must exceed */
  deadline: number
}

export type ConditionKind = ReleaseCondition['kind']

export function fixed(value: bigint | number): FixedCondition {
  return { kind: 'fixed', value: BigInt(value) }
}

export function timeLocked(beneficiary: string, deadline: number): TimeLockedCondition {
  return { kind: 'time-locked', beneficiary: beneficiary.toLowerCase(), deadline }
}

export function isKeyHash(value: string): boolean {
  return value.length === KEY_HASH_HEX_LENGTH && /^[0-9a-f]+$/i.test(value)
}

export type Witness = ValueWitness | SignersWitness

/** Redeemer value for a fixed condition */
export interface ValueWitness {
  kind: 'value'
  value: bigint
}

/** Extra required signers for a time-locked condition (beneficiary is always added) */
export interface SignersWitness {
  kind: 'signers'
  signers: string[]
}

export interface LockedOutput {
  utxo: UTxO
  condition: ReleaseCondition
  /** Lovelace held by the output */
  lovelace: bigint
}

export type ConditionMatcher = (condition: ReleaseCondition, utxo: UTxO) => boolean

export enum LockState {
  PENDING = 'pending',        // Locked, condition not yet satisfiable
  RELEASABLE = 'releasable',  // Condition satisfiable under current ledger state
  RELEASED = 'released'       // Consumed by a release transaction
}
