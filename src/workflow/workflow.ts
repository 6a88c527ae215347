/**
 * Conditional Release Workflow
 *
 * Locks value at a validator address under a ReleaseCondition and
 * releases it once the condition can be met. One operation in flight per
 * instance; the ledger, not this class, prevents double releases.
 */

import { mConStr0 } from '@meshsdk/core'
import type { Data, UTxO } from '@meshsdk/core'
import { encodeCondition, tryDecode } from '../conditions/codec.js'
import { matchers } from '../conditions/matchers.js'
import { assessCondition } from '../conditions/state-machine.js'
import {
  isKeyHash,
  LockState,
  timeLocked,
  type ConditionMatcher,
  type LockedOutput,
  type ReleaseCondition,
  type Witness
} from '../conditions/types.js'
import { ReleaseError } from '../errors.js'
import type { Credential } from '../keys/key-provider.js'
import {
  isPlainOutput,
  lovelace,
  lovelaceOf,
  outRef,
  sameOutRef,
  type ScriptSource,
  type TransactionIntent
} from '../ledger/types.js'
import { silentLogger, type Logger } from '../logging.js'
import { poll } from './polling.js'
import type {
  ConfirmationReceipt,
  LockReceipt,
  PublishReceipt,
  ReleaseOptions,
  ReleaseReceipt,
  WorkflowContext
} from './types.js'

/** Lovelace parked with a published reference script */
export const DEFAULT_REFERENCE_LOVELACE = 50_000_000n

export class ConditionalReleaseWorkflow {
  private readonly ctx: WorkflowContext
  private readonly logger: Logger
  private readonly now: () => number

  constructor(ctx: WorkflowContext) {
    this.ctx = ctx
    this.logger = ctx.logger ?? silentLogger
    this.now = ctx.now ?? Date.now
  }

  get scriptAddress(): string {
    return this.ctx.script.address
  }

  /**
   * Lock `value` lovelace at the script address under `condition`
   */
  async lock(value: bigint, condition: ReleaseCondition, funding: Credential = this.ctx.credential): Promise<LockReceipt> {
    if (value <= 0n) {
      throw new ReleaseError('INVALID_ARGUMENT', `Amount must be positive, got ${value}`)
    }
    validateCondition(condition)

    const { input, selectable } = await this.selectFunding(funding, value)
    const { script } = this.ctx

    const intent: TransactionIntent = {
      inputs: [input],
      outputs: [{
        address: script.address,
        amount: lovelace(value),
        datum: encodeCondition(condition)
      }],
      requiredSigners: [],
      changeAddress: funding.address,
      selectable
    }

    this.logger.info(`Locking ${value} lovelace at ${script.address} (${describeCondition(condition)})`)
    const txId = await this.signAndSubmit(intent, funding)

    return {
      txId,
      scriptAddress: script.address,
      outputIndex: 0,
      lovelace: value,
      condition,
      deadline: condition.kind === 'time-locked' ? condition.deadline : undefined
    }
  }

  /**
   * Lock a gift for `beneficiary` that becomes releasable `durationMs` from now
   */
  async lockFor(value: bigint, beneficiary: string, durationMs: number): Promise<LockReceipt> {
    if (!Number.isSafeInteger(durationMs) || durationMs < 0) {
      throw new ReleaseError('INVALID_ARGUMENT', `Lock duration must be a non-negative integer, got ${durationMs}`)
    }
    return this.lock(value, timeLocked(beneficiary, this.now() + durationMs))
  }

  /**
   * First output at `address` whose datum decodes to a condition accepted
   * by `matcher`, in the order the gateway returns them. Outputs with other
   * datum shapes are skipped. Null when nothing matches.
   */
  async findReleasable(
    address: string = this.ctx.script.address,
    matcher: ConditionMatcher = matchers.any()
  ): Promise<LockedOutput | null> {
    const outputs = await this.ctx.gateway.spendableOutputs(address)

    for (const utxo of outputs) {
      const datum = utxo.output.plutusData
      if (!datum) continue

      const condition = tryDecode(datum)
      if (!condition) {
        this.logger.debug(`Skipping ${outRef(utxo)}: datum is not a release condition`)
        continue
      }

      if (matcher(condition, utxo)) {
        return { utxo, condition, lovelace: lovelaceOf(utxo) }
      }
    }

    return null
  }

  /**
   * Spend a locked output, forwarding its full value to `destination`
   */
  async release(
    locked: LockedOutput,
    witness: Witness,
    destination: string,
    options: ReleaseOptions = {}
  ): Promise<ReleaseReceipt> {
    const { condition } = locked
    const releaser = this.ctx.credential

    let redeemer: Data
    let requiredSigners: string[] = []
    let validFrom: number | undefined
    let validTo: number | undefined

    switch (condition.kind) {
      case 'fixed': {
        if (witness.kind !== 'value') {
          throw new ReleaseError('INVALID_WITNESS', 'A fixed-value lock needs a value witness')
        }
        // Sent as given; the validator decides whether it matches
        redeemer = witness.value
        break
      }
      case 'time-locked': {
        if (witness.kind !== 'signers') {
          throw new ReleaseError('INVALID_WITNESS', 'A time-locked gift needs a signers witness')
        }
        const window = await this.validityWindow(condition.deadline)
        validFrom = window.validFrom
        validTo = window.validTo
        requiredSigners = unique([condition.beneficiary, ...witness.signers.map(s => s.toLowerCase())])
        redeemer = mConStr0([])
        break
      }
    }

    const available = await this.ctx.gateway.spendableOutputs(releaser.address)
    const plain = available.filter(isPlainOutput)
    const collateral = plain.find(utxo => lovelaceOf(utxo) >= this.ctx.minCollateral)
    if (!collateral) {
      throw new ReleaseError(
        'MISSING_COLLATERAL',
        `No plain output of at least ${this.ctx.minCollateral} lovelace at ${releaser.address}`
      )
    }

    const source: ScriptSource = options.scriptSource ?? { kind: 'inline', script: this.ctx.script }

    const intent: TransactionIntent = {
      inputs: [],
      scriptInput: { utxo: locked.utxo, redeemer, source },
      outputs: [{ address: destination, amount: lovelace(locked.lovelace) }],
      collateral,
      requiredSigners,
      validFrom,
      validTo,
      changeAddress: releaser.address,
      selectable: plain
    }

    this.logger.info(`Releasing ${outRef(locked.utxo)} (${locked.lovelace} lovelace) to ${destination}`)
    const txId = await this.signAndSubmit(intent, releaser)

    return {
      txId,
      released: outRef(locked.utxo),
      destination,
      lovelace: locked.lovelace,
      validFrom,
      validTo
    }
  }

  /**
   * Store the validator in an output at our own address so later
   * releases can reference it instead of attaching it
   */
  async publishScript(value: bigint = DEFAULT_REFERENCE_LOVELACE): Promise<PublishReceipt> {
    const owner = this.ctx.credential
    const { input, selectable } = await this.selectFunding(owner, value)

    const intent: TransactionIntent = {
      inputs: [input],
      outputs: [{ address: owner.address, amount: lovelace(value), referenceScript: this.ctx.script }],
      requiredSigners: [],
      changeAddress: owner.address,
      selectable
    }

    this.logger.info(`Publishing reference script ${this.ctx.script.hash} at ${owner.address}`)
    const txId = await this.signAndSubmit(intent, owner)
    return { txId, address: owner.address, outputIndex: 0 }
  }

  /**
   * An output at `address` carrying this workflow's validator as a
   * reference script
   */
  async findReferenceScript(address: string = this.ctx.credential.address): Promise<ScriptSource | null> {
    const { script } = this.ctx
    const outputs = await this.ctx.gateway.spendableOutputs(address)
    const utxo = outputs.find(u => u.output.scriptHash === script.hash)
    return utxo ? { kind: 'reference', utxo, script } : null
  }

  /**
   * Poll until the transaction is confirmed. Exhausting the policy throws
   * CONFIRMATION_TIMEOUT; the transaction may still confirm later.
   */
  async awaitConfirmation(txId: string): Promise<ConfirmationReceipt> {
    this.logger.info(`Waiting for ${txId}...`)

    const outcome = await poll(this.ctx.confirmation, async (attempt) => {
      const status = await this.ctx.gateway.confirmationStatus(txId)
      this.logger.debug(`${txId}: ${status} (attempt ${attempt})`)
      return status === 'confirmed' ? status : undefined
    })

    if (!outcome.done) {
      throw new ReleaseError('CONFIRMATION_TIMEOUT', txId)
    }

    this.logger.info(`Confirmed ${txId} after ${outcome.attempts} attempt(s)`)
    return { txId, attempts: outcome.attempts }
  }

  /**
   * Poll ledger time until a time lock has passed; returns the observed
   * time. Fixed-value locks are releasable immediately.
   */
  async awaitReleasable(locked: LockedOutput): Promise<number> {
    const { condition } = locked
    if (condition.kind === 'fixed') {
      return await this.ctx.gateway.currentTime()
    }

    const outcome = await poll(this.ctx.readiness, async () => {
      const observed = await this.ctx.gateway.currentTime()
      this.logger.debug(`Ledger time ${observed} | deadline ${condition.deadline}`)
      return observed > condition.deadline ? observed : undefined
    })

    if (!outcome.done) {
      throw new ReleaseError(
        'CONDITION_NOT_YET_MET',
        `Deadline ${condition.deadline} not passed after ${outcome.attempts} checks`
      )
    }
    return outcome.value
  }

  /**
   * Where a locked output stands right now
   */
  async inspect(locked: LockedOutput): Promise<LockState> {
    const outputs = await this.ctx.gateway.spendableOutputs(locked.utxo.output.address)
    if (!outputs.some(utxo => sameOutRef(utxo, locked.utxo))) {
      return LockState.RELEASED
    }
    return assessCondition(locked.condition, await this.ctx.gateway.currentTime())
  }

  /**
   * Validity interval for a time-locked release. Both clocks must be past
   * the deadline: ledger time, and the start of the slot used as the
   * lower bound (which is what the validator sees).
   */
  private async validityWindow(deadline: number): Promise<{ validFrom: number; validTo: number }> {
    const observed = await this.ctx.gateway.currentTime()
    if (observed <= deadline) {
      throw new ReleaseError('CONDITION_NOT_YET_MET', `Ledger time ${observed} has not passed deadline ${deadline}`)
    }

    const slot = await this.ctx.gateway.currentSlot()
    const slotStart = this.ctx.clock.slotToTime(slot)
    if (slotStart <= deadline) {
      throw new ReleaseError(
        'CONDITION_NOT_YET_MET',
        `Slot ${slot} starts at ${slotStart}, not after deadline ${deadline}; first usable slot is ${this.ctx.clock.firstSlotAfter(deadline)}`
      )
    }

    return { validFrom: slot, validTo: slot + this.ctx.ttlSlots }
  }

  /**
   * First plain output covering `value` plus the fee buffer
   */
  private async selectFunding(funding: Credential, value: bigint): Promise<{ input: UTxO; selectable: UTxO[] }> {
    const available = await this.ctx.gateway.spendableOutputs(funding.address)
    const plain = available.filter(isPlainOutput)
    const needed = value + this.ctx.feeBuffer

    const input = plain.find(utxo => lovelaceOf(utxo) >= needed)
    if (!input) {
      const total = plain.reduce((sum, utxo) => sum + lovelaceOf(utxo), 0n)
      throw new ReleaseError(
        'INSUFFICIENT_FUNDS',
        `No spendable output at ${funding.address} covers ${needed} lovelace (${plain.length} outputs, ${total} total)`
      )
    }

    return { input, selectable: plain.filter(utxo => !sameOutRef(utxo, input)) }
  }

  private async signAndSubmit(intent: TransactionIntent, signer: Credential): Promise<string> {
    const unsignedTx = await this.ctx.gateway.build(intent)
    const signedTx = await signer.signTx(unsignedTx)
    const txId = await this.ctx.gateway.submit(signedTx)
    this.logger.info(`Submitted ${txId}`)
    return txId
  }
}

function validateCondition(condition: ReleaseCondition): void {
  if (condition.kind !== 'time-locked') return
  if (!isKeyHash(condition.beneficiary)) {
    throw new ReleaseError('INVALID_ARGUMENT', `Beneficiary must be a 28-byte key hash, got "${condition.beneficiary}"`)
  }
  if (!Number.isSafeInteger(condition.deadline) || condition.deadline < 0) {
    throw new ReleaseError('INVALID_ARGUMENT', `Deadline must be a POSIX time in ms, got ${condition.deadline}`)
  }
}

export function describeCondition(condition: ReleaseCondition): string {
  switch (condition.kind) {
    case 'fixed':
      return `fixed ${condition.value}`
    case 'time-locked':
      return `beneficiary ${condition.beneficiary}, deadline ${new Date(condition.deadline).toISOString()}`
  }
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values))
}
