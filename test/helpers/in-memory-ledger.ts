/**
 * In-process ledger for workflow tests.
 *
 * Keeps a UTxO set, balances intents with a flat fee and evaluates the
 * two release predicates on submit, rejecting the way a node would.
 */

import type { UTxO } from '@meshsdk/core'
import { tryDecode } from '../../src/conditions/codec.js'
import { ReleaseError } from '../../src/errors.js'
import type { Credential } from '../../src/keys/key-provider.js'
import { SlotClock } from '../../src/ledger/time.js'
import {
  isPlainOutput,
  lovelaceOf,
  sameOutRef,
  type ConfirmationStatus,
  type LedgerGateway,
  type TransactionIntent
} from '../../src/ledger/types.js'
import type { ScriptArtifact } from '../../src/scripts/artifact.js'

export const ZERO_TIME = 1_700_000_000_000

/** One-second slots starting at ZERO_TIME */
export const testClock = new SlotClock({
  zeroTime: ZERO_TIME,
  zeroSlot: 0,
  slotLength: 1000,
  startEpoch: 0,
  epochLength: 432000
})

export const testScript: ScriptArtifact = {
  code: '4e4d01000033222220051200120011',
  version: 'V2',
  hash: 'cc'.repeat(28),
  address: 'addr_test1_script'
}

export const FLAT_FEE = 200_000n

/**
 * Signing appends `:<pubKeyHash>` so the ledger can see who signed
 */
export function fakeCredential(name: string, pubKeyHash: string): Credential {
  return {
    address: `addr_test1_${name}`,
    pubKeyHash,
    signTx: async (tx) => `${tx}:${pubKeyHash}`
  }
}

export class InMemoryLedger implements LedgerGateway {
  time: number
  slot: number
  /** Added to `time` after every currentTime() read */
  timeStep = 0
  /** confirmationStatus() reports pending this many times per tx first */
  confirmationDelay = 0

  readonly built = new Map<string, TransactionIntent>()
  readonly submitted: string[] = []

  private utxos: UTxO[] = []
  private statusChecks = new Map<string, number>()
  private txCounter = 0

  constructor(private clock: SlotClock = testClock, time: number = ZERO_TIME + 1_000_000) {
    this.time = time
    this.slot = clock.timeToSlot(time)
  }

  setTime(time: number): void {
    this.time = time
    this.slot = this.clock.timeToSlot(time)
  }

  /** Create a plain ADA output out of thin air */
  fund(address: string, lovelace: bigint): UTxO {
    const utxo = makeUtxo(this.nextTxHash(), 0, address, lovelace)
    this.utxos.push(utxo)
    return utxo
  }

  addOutput(utxo: UTxO): void {
    this.utxos.push(utxo)
  }

  outputsAt(address: string): UTxO[] {
    return this.utxos.filter(utxo => utxo.output.address === address)
  }

  get lastIntent(): TransactionIntent | undefined {
    return Array.from(this.built.values()).pop()
  }

  async spendableOutputs(address: string): Promise<UTxO[]> {
    return this.outputsAt(address)
  }

  async currentTime(): Promise<number> {
    const observed = this.time
    if (this.timeStep) this.setTime(this.time + this.timeStep)
    return observed
  }

  async currentSlot(): Promise<number> {
    return this.slot
  }

  async build(intent: TransactionIntent): Promise<string> {
    const id = `unsigned-${this.built.size}`
    this.built.set(id, intent)
    return id
  }

  async submit(signedTx: string): Promise<string> {
    const [id, ...signers] = signedTx.split(':')
    const intent = this.built.get(id)
    if (!intent) throw new ReleaseError('SUBMISSION_REJECTED', 'DeserialiseFailure')

    const spent = [...intent.inputs]
    if (intent.scriptInput) spent.push(intent.scriptInput.utxo)
    for (const input of spent) {
      if (!this.exists(input)) throw new ReleaseError('SUBMISSION_REJECTED', 'BadInputsUTxO')
    }

    if (intent.validFrom !== undefined && this.slot < intent.validFrom) {
      throw new ReleaseError('SUBMISSION_REJECTED', 'OutsideValidityIntervalUTxO')
    }
    if (intent.validTo !== undefined && this.slot >= intent.validTo) {
      throw new ReleaseError('SUBMISSION_REJECTED', 'OutsideValidityIntervalUTxO')
    }

    const missing = intent.requiredSigners.filter(hash => !signers.includes(hash))
    if (missing.length > 0) {
      throw new ReleaseError('SUBMISSION_REJECTED', `MissingVKeyWitnessesUTXOW ${missing.join(',')}`)
    }

    if (intent.scriptInput) {
      if (!intent.collateral || !this.exists(intent.collateral) || !isPlainOutput(intent.collateral)) {
        throw new ReleaseError('SUBMISSION_REJECTED', 'NoCollateralInputs')
      }
      this.evaluate(intent)
    }

    const required = intent.outputs.reduce((sum, out) => sum + amountOf(out.amount), FLAT_FEE)
    let available = spent.reduce((sum, utxo) => sum + lovelaceOf(utxo), 0n)
    for (const utxo of intent.selectable) {
      if (available >= required) break
      if (!this.exists(utxo) || spent.some(s => sameOutRef(s, utxo))) continue
      spent.push(utxo)
      available += lovelaceOf(utxo)
    }
    if (available < required) {
      throw new ReleaseError('SUBMISSION_REJECTED', 'ValueNotConservedUTxO')
    }

    const txHash = this.nextTxHash()
    const created = intent.outputs.map((out, index) => {
      const utxo = makeUtxo(txHash, index, out.address, amountOf(out.amount))
      if (out.datum) utxo.output.plutusData = out.datum
      if (out.referenceScript) {
        utxo.output.scriptRef = out.referenceScript.code
        utxo.output.scriptHash = out.referenceScript.hash
      }
      return utxo
    })
    const change = available - required
    if (change > 0n) {
      created.push(makeUtxo(txHash, created.length, intent.changeAddress, change))
    }

    this.utxos = this.utxos.filter(utxo => !spent.some(s => sameOutRef(s, utxo))).concat(created)
    this.submitted.push(txHash)
    return txHash
  }

  async confirmationStatus(txId: string): Promise<ConfirmationStatus> {
    if (!this.submitted.includes(txId)) return 'unknown'
    const checks = (this.statusChecks.get(txId) ?? 0) + 1
    this.statusChecks.set(txId, checks)
    return checks > this.confirmationDelay ? 'confirmed' : 'pending'
  }

  private evaluate(intent: TransactionIntent): void {
    const scriptInput = intent.scriptInput
    if (!scriptInput) return

    const datum = scriptInput.utxo.output.plutusData
    const condition = datum ? tryDecode(datum) : null
    if (!condition) throw new ReleaseError('SUBMISSION_REJECTED', 'ValidatorFailed: undecodable datum')

    switch (condition.kind) {
      case 'fixed':
        if (scriptInput.redeemer !== condition.value) {
          throw new ReleaseError('SUBMISSION_REJECTED', 'ValidatorFailed: redeemer mismatch')
        }
        return
      case 'time-locked':
        if (intent.validFrom === undefined || this.clock.slotToTime(intent.validFrom) <= condition.deadline) {
          throw new ReleaseError('SUBMISSION_REJECTED', 'ValidatorFailed: deadline not passed')
        }
        if (!intent.requiredSigners.includes(condition.beneficiary)) {
          throw new ReleaseError('SUBMISSION_REJECTED', 'ValidatorFailed: beneficiary did not sign')
        }
        return
    }
  }

  private exists(utxo: UTxO): boolean {
    return this.utxos.some(u => sameOutRef(u, utxo))
  }

  private nextTxHash(): string {
    this.txCounter++
    return this.txCounter.toString(16).padStart(64, '0')
  }
}

export function makeUtxo(txHash: string, outputIndex: number, address: string, lovelace: bigint): UTxO {
  return {
    input: { txHash, outputIndex },
    output: {
      address,
      amount: [{ unit: 'lovelace', quantity: lovelace.toString() }]
    }
  }
}

function amountOf(amount: { unit: string; quantity: string }[]): bigint {
  return amount.filter(asset => asset.unit === 'lovelace').reduce((sum, asset) => sum + BigInt(asset.quantity), 0n)
}
