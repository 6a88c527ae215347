/**
 * LedgerGateway backed by Blockfrost for queries and submission and
 * MeshTxBuilder for balancing.
 */

import type { UTxO } from '@meshsdk/core'
import { ReleaseError } from '../errors.js'
import type { BlockfrostBlock, BlockfrostClient } from './blockfrost.js'
import type { MeshIntentBuilder } from './mesh-builder.js'
import type { ConfirmationStatus, LedgerGateway, TransactionIntent } from './types.js'

export class BlockfrostGateway implements LedgerGateway {
  private readonly client: BlockfrostClient
  private readonly builder: MeshIntentBuilder

  constructor(client: BlockfrostClient, builder: MeshIntentBuilder) {
    this.client = client
    this.builder = builder
  }

  spendableOutputs(address: string): Promise<UTxO[]> {
    return this.client.fetchAddressUtxos(address)
  }

  async currentTime(): Promise<number> {
    const block = await this.client.fetchLatestBlock()
    return block.time * 1000
  }

  async currentSlot(): Promise<number> {
    const block = await this.client.fetchLatestBlock()
    return requireSlot(block)
  }

  build(intent: TransactionIntent): Promise<string> {
    return this.builder.build(intent)
  }

  submit(signedTx: string): Promise<string> {
    return this.client.submitTransaction(signedTx)
  }

  async confirmationStatus(txId: string): Promise<ConfirmationStatus> {
    try {
      return await this.client.fetchConfirmationStatus(txId)
    } catch (err) {
      if (err instanceof ReleaseError && err.code === 'LEDGER_UNAVAILABLE') return 'unknown'
      throw err
    }
  }
}

function requireSlot(block: BlockfrostBlock): number {
  if (block.slot === null) {
    throw new ReleaseError('LEDGER_UNAVAILABLE', `Latest block ${block.hash} has no slot`)
  }
  return block.slot
}
