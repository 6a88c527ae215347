/**
 * conditional-release
 *
 * Lock ADA at a Plutus validator address under a release condition and
 * release it once the condition holds.
 */

export * from './conditions/index.js'
export * from './ledger/index.js'
export * from './workflow/index.js'
export * from './errors.js'
export * from './logging.js'
export { loadConfig, parseNetwork, DEFAULT_CONFIG, type ReleaseConfig } from './config/index.js'
export { FileKeyProvider, parseSigningKeyEnvelope, type Credential, type KeyProvider, type SigningKeyEnvelope } from './keys/key-provider.js'
export {
  loadScriptArtifact,
  parseScriptFile,
  deriveArtifact,
  scriptAddressFromHash,
  type ScriptArtifact,
  type ParsedScript,
  type LoadScriptOptions
} from './scripts/artifact.js'
export { LockJournal, withJournal, type JournalEntry } from './journal/storage.js'
