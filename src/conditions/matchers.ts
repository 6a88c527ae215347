/**
 * Matchers for findReleasable
 */

import type { ConditionKind, ConditionMatcher } from './types.js'

export const matchers = {
  /** Accept any decodable condition */
  any: (): ConditionMatcher => () => true,

  /** Time-locked gifts for the given beneficiary key hash */
  beneficiary: (keyHash: string): ConditionMatcher => {
    const wanted = keyHash.toLowerCase()
    return (condition) => condition.kind === 'time-locked' && condition.beneficiary === wanted
  },

  /** Fixed-value locks expecting exactly `value` */
  fixedValue: (value: bigint | number): ConditionMatcher => {
    const wanted = BigInt(value)
    return (condition) => condition.kind === 'fixed' && condition.value === wanted
  },

  kind: (kind: ConditionKind): ConditionMatcher => (condition) => condition.kind === kind,

  /** Only the output created by a given transaction */
  fromTx: (txHash: string, matcher: ConditionMatcher = () => true): ConditionMatcher =>
    (condition, utxo) => utxo.input.txHash === txHash && matcher(condition, utxo)
}
