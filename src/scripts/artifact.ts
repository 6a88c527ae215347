/**
 * Compiled validator loading
 *
 * Accepts three on-disk formats:
 * - raw CBOR hex (the `.plutus` files written by most toolchains)
 * - cardano-cli text envelope ({ type: "PlutusScriptV2", cborHex })
 * - Aiken blueprint (plutus.json, validators[].compiledCode)
 */

import { readFileSync } from 'fs'
import {
  applyCborEncoding,
  deserializeAddress,
  scriptAddress,
  serializeAddressObj,
  serializePlutusScript
} from '@meshsdk/core'
import type { LanguageVersion } from '@meshsdk/core'
import { ReleaseError } from '../errors.js'

export interface ScriptArtifact {
  /** CBOR-wrapped script, hex */
  code: string
  version: LanguageVersion
  /** Script hash, hex */
  hash: string
  /** Enterprise script address for the configured network */
  address: string
}

export interface ParsedScript {
  code: string
  version: LanguageVersion
}

export interface LoadScriptOptions {
  networkId: 0 | 1
  /** Version for formats that do not carry one (raw hex) */
  version?: LanguageVersion
  /** Blueprint validator title; defaults to the first spend validator */
  validator?: string
}

const HEX = /^[0-9a-f]+$/i

export function loadScriptArtifact(path: string, options: LoadScriptOptions): ScriptArtifact {
  let contents: string
  try {
    contents = readFileSync(path, 'utf-8')
  } catch (err) {
    throw new ReleaseError('SCRIPT_UNAVAILABLE', `Cannot read ${path}: ${errorMessage(err)}`, { cause: err })
  }

  const parsed = parseScriptFile(contents, options)
  return deriveArtifact(parsed, options.networkId)
}

/**
 * Hash and address of a parsed script
 */
export function deriveArtifact(script: ParsedScript, networkId: 0 | 1): ScriptArtifact {
  try {
    const { address } = serializePlutusScript(script, undefined, networkId)
    const { scriptHash } = deserializeAddress(address)
    return { ...script, hash: scriptHash, address }
  } catch (err) {
    throw new ReleaseError('SCRIPT_UNAVAILABLE', `Not a valid Plutus script: ${errorMessage(err)}`, { cause: err })
  }
}

export function parseScriptFile(
  contents: string,
  options: Pick<LoadScriptOptions, 'version' | 'validator'> = {}
): ParsedScript {
  const text = contents.trim()
  if (!text) {
    throw new ReleaseError('SCRIPT_UNAVAILABLE', 'Script file is empty')
  }

  if (!text.startsWith('{')) {
    if (!HEX.test(text) || text.length % 2 !== 0) {
      throw new ReleaseError('SCRIPT_UNAVAILABLE', 'Script file is neither JSON nor CBOR hex')
    }
    return { code: text.toLowerCase(), version: options.version ?? 'V2' }
  }

  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (err) {
    throw new ReleaseError('SCRIPT_UNAVAILABLE', `Invalid JSON: ${errorMessage(err)}`, { cause: err })
  }
  if (typeof json !== 'object' || json === null) {
    throw new ReleaseError('SCRIPT_UNAVAILABLE', 'Script JSON must be an object')
  }

  if ('cborHex' in json) {
    return parseTextEnvelope(json)
  }
  if ('validators' in json) {
    return parseBlueprint(json, options.validator)
  }
  throw new ReleaseError('SCRIPT_UNAVAILABLE', 'JSON is neither a text envelope nor a blueprint')
}

function parseTextEnvelope(envelope: { cborHex: unknown; type?: unknown }): ParsedScript {
  const { cborHex, type } = envelope
  if (typeof cborHex !== 'string' || !HEX.test(cborHex)) {
    throw new ReleaseError('SCRIPT_UNAVAILABLE', 'Text envelope has no valid cborHex')
  }
  const match = typeof type === 'string' ? /^PlutusScriptV([123])$/.exec(type) : null
  if (!match) {
    throw new ReleaseError('SCRIPT_UNAVAILABLE', `Unsupported envelope type: ${String(type)}`)
  }
  return { code: cborHex.toLowerCase(), version: toLanguageVersion(match[1]) }
}

function parseBlueprint(
  blueprint: { validators: unknown; preamble?: unknown },
  title?: string
): ParsedScript {
  const { validators, preamble } = blueprint
  if (!Array.isArray(validators) || validators.length === 0) {
    throw new ReleaseError('SCRIPT_UNAVAILABLE', 'Blueprint has no validators')
  }

  const entries = validators.filter(isBlueprintValidator)
  const validator = title
    ? entries.find(v => v.title === title)
    : entries.find(v => v.title.endsWith('.spend')) ?? entries[0]
  if (!validator) {
    throw new ReleaseError('SCRIPT_UNAVAILABLE', `Validator ${title ?? '(any)'} not found in blueprint`)
  }

  let version: LanguageVersion = 'V3'
  if (typeof preamble === 'object' && preamble !== null && 'plutusVersion' in preamble) {
    const declared = preamble.plutusVersion
    const match = typeof declared === 'string' ? /^v([123])$/i.exec(declared) : null
    if (match) version = toLanguageVersion(match[1])
  }

  return { code: applyCborEncoding(validator.compiledCode), version }
}

interface BlueprintValidator {
  title: string
  compiledCode: string
}

function isBlueprintValidator(value: unknown): value is BlueprintValidator {
  return (
    typeof value === 'object' && value !== null &&
    'title' in value && typeof value.title === 'string' &&
    'compiledCode' in value && typeof value.compiledCode === 'string' &&
    HEX.test(value.compiledCode)
  )
}

function toLanguageVersion(digit: string): LanguageVersion {
  switch (digit) {
    case '1': return 'V1'
    case '2': return 'V2'
    default: return 'V3'
  }
}

/**
 * Enterprise address of a script given only its hash
 */
export function scriptAddressFromHash(hash: string, networkId: 0 | 1): string {
  if (!/^[0-9a-f]{56}$/i.test(hash)) {
    throw new ReleaseError('INVALID_ARGUMENT', `Script hash must be 28 bytes of hex, got "${hash}"`)
  }
  return serializeAddressObj(scriptAddress(hash.toLowerCase()), networkId)
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
