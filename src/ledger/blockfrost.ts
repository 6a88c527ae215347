/**
 * Blockfrost REST client
 *
 * Handles:
 * - UTxO queries per address (all pages)
 * - Latest block (ledger time and slot)
 * - Transaction submission
 * - Confirmation lookup
 */

import type { UTxO } from '@meshsdk/core'
import { ReleaseError } from '../errors.js'
import type { CardanoNetwork } from './time.js'
import type { ConfirmationStatus } from './types.js'

export const BLOCKFROST_URLS: Record<CardanoNetwork, string> = {
  mainnet: 'https://cardano-mainnet.blockfrost.io/api/v0',
  preprod: 'https://cardano-preprod.blockfrost.io/api/v0',
  preview: 'https://cardano-preview.blockfrost.io/api/v0'
}

const PAGE_SIZE = 100

export interface BlockfrostUtxo {
  address: string
  tx_hash: string
  output_index: number
  amount: Array<{ unit: string; quantity: string }>
  block: string
  data_hash: string | null
  inline_datum: string | null
  reference_script_hash: string | null
}

export interface BlockfrostBlock {
  hash: string
  height: number | null
  slot: number | null
  /** Unix seconds */
  time: number
}

export interface BlockfrostClientConfig {
  projectId: string
  network: CardanoNetwork
  /** Overrides the network's public endpoint */
  baseUrl?: string
}

interface RequestOptions {
  method?: 'GET' | 'POST'
  contentType?: string
  body?: Buffer
}

export class BlockfrostClient {
  private readonly projectId: string
  private readonly baseUrl: string

  constructor(config: BlockfrostClientConfig) {
    this.projectId = config.projectId
    this.baseUrl = config.baseUrl ?? BLOCKFROST_URLS[config.network]
  }

  /**
   * Fetch every unspent output at an address
   */
  async fetchAddressUtxos(address: string): Promise<UTxO[]> {
    const result: UTxO[] = []

    for (let page = 1; ; page++) {
      const response = await this.request(`/addresses/${address}/utxos?page=${page}`)
      // Addresses with no history are reported as not found
      if (response.status === 404) break
      if (!response.ok) {
        throw new ReleaseError('LEDGER_UNAVAILABLE', `Failed to fetch UTxOs: ${await describe(response)}`)
      }

      const utxos: BlockfrostUtxo[] = await response.json()
      result.push(...utxos.map(toMeshUtxo))
      if (utxos.length < PAGE_SIZE) break
    }

    return result
  }

  async fetchLatestBlock(): Promise<BlockfrostBlock> {
    const response = await this.request('/blocks/latest')
    if (!response.ok) {
      throw new ReleaseError('LEDGER_UNAVAILABLE', `Failed to fetch latest block: ${await describe(response)}`)
    }
    return await response.json()
  }

  /**
   * Submit a signed transaction (CBOR hex)
   */
  async submitTransaction(txCbor: string): Promise<string> {
    const response = await this.request('/tx/submit', {
      method: 'POST',
      contentType: 'application/cbor',
      body: Buffer.from(txCbor, 'hex')
    })

    if (!response.ok) {
      // Passed on verbatim; a rejected intent is never resubmitted
      throw new ReleaseError('SUBMISSION_REJECTED', await response.text())
    }

    const txId: string = await response.json()
    return txId
  }

  /**
   * Confirmed once the indexer has the transaction in a block
   */
  async fetchConfirmationStatus(txId: string): Promise<ConfirmationStatus> {
    const response = await this.request(`/txs/${txId}`)
    if (response.ok) return 'confirmed'
    if (response.status === 404) return 'pending'
    return 'unknown'
  }

  private async request(path: string, options: RequestOptions = {}): Promise<Response> {
    const headers: Record<string, string> = { project_id: this.projectId }
    if (options.contentType) headers['Content-Type'] = options.contentType

    try {
      return await fetch(`${this.baseUrl}${path}`, {
        method: options.method ?? 'GET',
        headers,
        body: options.body
      })
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new ReleaseError('LEDGER_UNAVAILABLE', `Request to ${path} failed: ${reason}`, { cause: err })
    }
  }
}

export function toMeshUtxo(utxo: BlockfrostUtxo): UTxO {
  return {
    input: {
      txHash: utxo.tx_hash,
      outputIndex: utxo.output_index
    },
    output: {
      address: utxo.address,
      amount: utxo.amount,
      dataHash: utxo.data_hash ?? undefined,
      plutusData: utxo.inline_datum ?? undefined,
      scriptHash: utxo.reference_script_hash ?? undefined
    }
  }
}

async function describe(response: Response): Promise<string> {
  const body = await response.text().catch(() => '')
  return body ? `${response.status} ${body}` : `${response.status} ${response.statusText}`
}
