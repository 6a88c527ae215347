/**
 * Workflow context and receipts
 */

import type { ReleaseCondition } from '../conditions/types.js'
import type { Credential } from '../keys/key-provider.js'
import type { LedgerGateway, ScriptSource } from '../ledger/types.js'
import type { SlotClock } from '../ledger/time.js'
import type { Logger } from '../logging.js'
import type { ScriptArtifact } from '../scripts/artifact.js'
import type { RetryPolicy } from './polling.js'

/**
 * Everything a workflow instance needs, built once and passed in.
 */
export interface WorkflowContext {
  gateway: LedgerGateway
  /** Default funding and releasing identity */
  credential: Credential
  script: ScriptArtifact
  clock: SlotClock
  confirmation: RetryPolicy
  readiness: RetryPolicy
  ttlSlots: number
  minCollateral: bigint
  feeBuffer: bigint
  logger?: Logger
  /** Wall clock used to compute deadlines (POSIX ms) */
  now?: () => number
}

export interface LockReceipt {
  txId: string
  scriptAddress: string
  /** Index of the locked output in the transaction */
  outputIndex: number
  lovelace: bigint
  condition: ReleaseCondition
  /** Present for time-locked conditions */
  deadline?: number
}

export interface ReleaseReceipt {
  txId: string
  /** txHash#index of the consumed locked output */
  released: string
  destination: string
  lovelace: bigint
  validFrom?: number
  validTo?: number
}

export interface PublishReceipt {
  txId: string
  address: string
  outputIndex: number
}

export interface ConfirmationReceipt {
  txId: string
  attempts: number
}

export interface ReleaseOptions {
  /** Inline by default */
  scriptSource?: ScriptSource
}
