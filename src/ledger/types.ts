/**
 * Ledger gateway and transaction intent types
 */

import type { Asset, Data, UTxO } from '@meshsdk/core'
import type { ScriptArtifact } from '../scripts/artifact.js'

export type ConfirmationStatus = 'pending' | 'confirmed' | 'unknown'

/**
 * Where the validator comes from when spending a script output
 */
export type ScriptSource =
  | { kind: 'inline'; script: ScriptArtifact }
  | { kind: 'reference'; utxo: UTxO; script: ScriptArtifact }

export interface IntentOutput {
  address: string
  amount: Asset[]
  /** Inline datum, CBOR hex */
  datum?: string
  /** Store this script in the output for later reference */
  referenceScript?: ScriptArtifact
}

export interface ScriptInput {
  utxo: UTxO
  redeemer: Data
  source: ScriptSource
}

/**
 * Everything that must be committed atomically by one transaction.
 * Balancing, fees and change are left to the builder.
 */
export interface TransactionIntent {
  /** Wallet outputs spent explicitly */
  inputs: UTxO[]
  scriptInput?: ScriptInput
  outputs: IntentOutput[]
  collateral?: UTxO
  /** Payment key hashes that must sign */
  requiredSigners: string[]
  /** Validity interval, in slots */
  validFrom?: number
  validTo?: number
  changeAddress: string
  /** Outputs the builder may add to cover fees */
  selectable: UTxO[]
}

export interface LedgerGateway {
  /** Unspent outputs at an address; re-queried on every call */
  spendableOutputs(address: string): Promise<UTxO[]>
  /** Time of the latest block, POSIX milliseconds */
  currentTime(): Promise<number>
  /** Slot of the latest block */
  currentSlot(): Promise<number>
  /** Balanced, fee-computed, unsigned transaction (CBOR hex) */
  build(intent: TransactionIntent): Promise<string>
  /** Submit a signed transaction, returning its id */
  submit(signedTx: string): Promise<string>
  confirmationStatus(txId: string): Promise<ConfirmationStatus>
}

export function lovelaceOf(utxo: UTxO): bigint {
  const entry = utxo.output.amount.find(asset => asset.unit === 'lovelace')
  return entry ? BigInt(entry.quantity) : 0n
}

export function lovelace(quantity: bigint): Asset[] {
  return [{ unit: 'lovelace', quantity: quantity.toString() }]
}

/**
 * An output holding only ADA, with no datum and no script
 */
export function isPlainOutput(utxo: UTxO): boolean {
  const { output } = utxo
  return (
    output.amount.every(asset => asset.unit === 'lovelace') &&
    !output.plutusData &&
    !output.dataHash &&
    !output.scriptRef &&
    !output.scriptHash
  )
}

export function sameOutRef(a: UTxO, b: UTxO): boolean {
  return a.input.txHash === b.input.txHash && a.input.outputIndex === b.input.outputIndex
}

export function outRef(utxo: UTxO): string {
  return `${utxo.input.txHash}#${utxo.input.outputIndex}`
}
