/**
 * Ledger access
 *
 * - Gateway interface and transaction intents
 * - Blockfrost REST client
 * - MeshTxBuilder-based intent builder
 * - Slot clock
 */

export * from './types.js'
export * from './time.js'
export * from './blockfrost.js'
export * from './mesh-builder.js'
export * from './gateway.js'
