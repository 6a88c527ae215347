import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import {
  deriveArtifact,
  loadScriptArtifact,
  parseScriptFile,
  scriptAddressFromHash
} from '../../../src/scripts/artifact.js'
import { ReleaseError } from '../../../src/errors.js'

const ALWAYS_TRUE = '4e4d01000033222220051200120011'

function scriptError(run: () => unknown): ReleaseError {
  try {
    run()
  } catch (err) {
    if (err instanceof ReleaseError) return err
    throw err
  }
  throw new Error('expected a ReleaseError')
}

describe('parseScriptFile', () => {
  it('should accept raw CBOR hex as V2 by default', () => {
    expect(parseScriptFile(`${ALWAYS_TRUE.toUpperCase()}\n`)).toEqual({ code: ALWAYS_TRUE, version: 'V2' })
  })

  it('should honour an explicit version for raw hex', () => {
    expect(parseScriptFile(ALWAYS_TRUE, { version: 'V3' }).version).toBe('V3')
  })

  it('should read cardano-cli text envelopes', () => {
    const envelope = JSON.stringify({ type: 'PlutusScriptV1', description: '', cborHex: ALWAYS_TRUE })
    expect(parseScriptFile(envelope)).toEqual({ code: ALWAYS_TRUE, version: 'V1' })
  })

  it('should reject envelopes of other types', () => {
    const envelope = JSON.stringify({ type: 'PaymentSigningKeyShelley_ed25519', cborHex: '5820' })
    expect(scriptError(() => parseScriptFile(envelope)).detail).toBe('Unsupported envelope type: PaymentSigningKeyShelley_ed25519')
  })

  it('should pick the first spend validator from a blueprint', () => {
    const blueprint = JSON.stringify({
      preamble: { plutusVersion: 'v3' },
      validators: [
        { title: 'gift.gift.mint', compiledCode: '0101' },
        { title: 'gift.gift.spend', compiledCode: '0202' }
      ]
    })

    const parsed = parseScriptFile(blueprint)
    expect(parsed.version).toBe('V3')
    expect(parsed.code).toMatch(/0202$/)
  })

  it('should pick a blueprint validator by title', () => {
    const blueprint = JSON.stringify({
      preamble: { plutusVersion: 'v2' },
      validators: [
        { title: 'a.spend', compiledCode: '0101' },
        { title: 'b.spend', compiledCode: '0202' }
      ]
    })

    const parsed = parseScriptFile(blueprint, { validator: 'b.spend' })
    expect(parsed.version).toBe('V2')
    expect(parsed.code).toMatch(/0202$/)
  })

  it('should report a missing validator title', () => {
    const blueprint = JSON.stringify({ validators: [{ title: 'a.spend', compiledCode: '0101' }] })
    expect(scriptError(() => parseScriptFile(blueprint, { validator: 'nope' })).detail).toBe('Validator nope not found in blueprint')
  })

  it('should reject malformed files with SCRIPT_UNAVAILABLE', () => {
    expect(scriptError(() => parseScriptFile('   ')).detail).toBe('Script file is empty')
    expect(scriptError(() => parseScriptFile('not hex')).detail).toBe('Script file is neither JSON nor CBOR hex')
    expect(scriptError(() => parseScriptFile('abc')).detail).toBe('Script file is neither JSON nor CBOR hex')
    expect(scriptError(() => parseScriptFile('{"name": "x"}')).detail).toBe('JSON is neither a text envelope nor a blueprint')
    expect(scriptError(() => parseScriptFile('{"validators": []}')).detail).toBe('Blueprint has no validators')
    expect(scriptError(() => parseScriptFile('{"cborHex": 12}')).detail).toBe('Text envelope has no valid cborHex')
    expect(scriptError(() => parseScriptFile('{oops')).code).toBe('SCRIPT_UNAVAILABLE')
  })
})

describe('deriveArtifact', () => {
  it('should give a testnet enterprise script address matching the hash', () => {
    const artifact = deriveArtifact({ code: ALWAYS_TRUE, version: 'V2' }, 0)

    expect(artifact.hash).toMatch(/^[0-9a-f]{56}$/)
    expect(artifact.address.startsWith('addr_test1w')).toBe(true)
    expect(scriptAddressFromHash(artifact.hash, 0)).toBe(artifact.address)
  })

  it('should give different hashes for different versions', () => {
    const v2 = deriveArtifact({ code: ALWAYS_TRUE, version: 'V2' }, 0)
    const v3 = deriveArtifact({ code: ALWAYS_TRUE, version: 'V3' }, 0)
    expect(v2.hash).not.toBe(v3.hash)
  })
})

describe('scriptAddressFromHash', () => {
  it('should use the mainnet prefix for network 1', () => {
    expect(scriptAddressFromHash('ab'.repeat(28), 1).startsWith('addr1w')).toBe(true)
  })

  it('should reject hashes of the wrong length', () => {
    expect(scriptError(() => scriptAddressFromHash('abcd', 0)).code).toBe('INVALID_ARGUMENT')
  })
})

describe('loadScriptArtifact', () => {
  let dir: string

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'conditional-release-'))
  })

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('should load a script file from disk', () => {
    const path = join(dir, 'always-true.plutus')
    writeFileSync(path, JSON.stringify({ type: 'PlutusScriptV2', description: '', cborHex: ALWAYS_TRUE }))

    const artifact = loadScriptArtifact(path, { networkId: 0 })

    expect(artifact.code).toBe(ALWAYS_TRUE)
    expect(artifact.version).toBe('V2')
    expect(artifact).toEqual(deriveArtifact({ code: ALWAYS_TRUE, version: 'V2' }, 0))
  })

  it('should raise SCRIPT_UNAVAILABLE for a missing file', () => {
    const err = scriptError(() => loadScriptArtifact(join(dir, 'missing.plutus'), { networkId: 0 }))
    expect(err.code).toBe('SCRIPT_UNAVAILABLE')
    expect(err.detail?.startsWith(`Cannot read ${join(dir, 'missing.plutus')}:`)).toBe(true)
  })
})
