/**
 * Signing credentials from cardano-cli key files
 *
 * A payment.skey is a text envelope:
 *   { "type": "PaymentSigningKeyShelley_ed25519", "description": "...", "cborHex": "5820..." }
 */

import { readFileSync } from 'fs'
import { MeshWallet, deserializeAddress } from '@meshsdk/core'
import { ReleaseError } from '../errors.js'

export interface Credential {
  /** Enterprise address derived from the verification key */
  readonly address: string
  /** Payment key hash, hex (28 bytes) */
  readonly pubKeyHash: string
  /** Add this key's witness to an unsigned transaction */
  signTx(unsignedTx: string): Promise<string>
}

export interface KeyProvider {
  load(path: string): Promise<Credential>
}

export interface SigningKeyEnvelope {
  type: string
  description?: string
  cborHex: string
}

// Extended (bip32) keys are not accepted by MeshWallet's cli key path
const SIGNING_KEY_TYPES = ['PaymentSigningKeyShelley_ed25519']

export function parseSigningKeyEnvelope(contents: string): SigningKeyEnvelope {
  let json: unknown
  try {
    json = JSON.parse(contents)
  } catch (err) {
    throw new ReleaseError('CREDENTIAL_UNAVAILABLE', 'Key file is not valid JSON', { cause: err })
  }

  if (typeof json !== 'object' || json === null) {
    throw new ReleaseError('CREDENTIAL_UNAVAILABLE', 'Key file must contain a JSON object')
  }
  if (!('type' in json) || typeof json.type !== 'string' || !SIGNING_KEY_TYPES.includes(json.type)) {
    throw new ReleaseError('CREDENTIAL_UNAVAILABLE', 'Key file is not a payment signing key')
  }
  if (!('cborHex' in json) || typeof json.cborHex !== 'string' || !/^[0-9a-f]+$/i.test(json.cborHex)) {
    throw new ReleaseError('CREDENTIAL_UNAVAILABLE', 'Key file has no valid cborHex')
  }

  const description = 'description' in json && typeof json.description === 'string'
    ? json.description
    : undefined
  return { type: json.type, description, cborHex: json.cborHex }
}

/**
 * Loads payment keys from disk and signs with MeshWallet
 */
export class FileKeyProvider implements KeyProvider {
  private readonly networkId: 0 | 1

  constructor(networkId: 0 | 1) {
    this.networkId = networkId
  }

  async load(path: string): Promise<Credential> {
    let contents: string
    try {
      contents = readFileSync(path, 'utf-8')
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new ReleaseError('CREDENTIAL_UNAVAILABLE', `Cannot read ${path}: ${reason}`, { cause: err })
    }

    const envelope = parseSigningKeyEnvelope(contents)

    let wallet: MeshWallet
    let address: string
    try {
      wallet = new MeshWallet({
        networkId: this.networkId,
        key: { type: 'cli', payment: envelope.cborHex }
      })
      await wallet.init()
      address = await wallet.getChangeAddress('enterprise')
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new ReleaseError('CREDENTIAL_UNAVAILABLE', `${path} is not a usable signing key: ${reason}`, { cause: err })
    }
    const { pubKeyHash } = deserializeAddress(address)

    return {
      address,
      pubKeyHash,
      signTx: (unsignedTx) => wallet.signTx(unsignedTx)
    }
  }
}
