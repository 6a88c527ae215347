/**
 * Environment configuration
 *
 * Parsed once at startup into a ReleaseConfig that is passed explicitly
 * to everything that needs it.
 */

import { homedir } from 'os'
import { join } from 'path'
import { ReleaseError } from '../errors.js'
import { isLogLevel, type LogLevel } from '../logging.js'
import type { CardanoNetwork } from '../ledger/time.js'
import type { RetryPolicy } from '../workflow/polling.js'

export interface ReleaseConfig {
  paymentKeyPath: string
  blockfrostProjectId: string
  network: CardanoNetwork
  networkId: 0 | 1
  /** Compiled validator, optional because some commands take --script */
  scriptPath?: string
  /** Polling for transaction confirmation */
  confirmation: RetryPolicy
  /** Polling for a time lock to pass */
  readiness: RetryPolicy
  /** Validity window length for release transactions, in slots */
  ttlSlots: number
  /** Smallest output accepted as collateral (lovelace) */
  minCollateral: bigint
  /** Headroom above the locked amount a funding output must carry (lovelace) */
  feeBuffer: bigint
  journalPath: string
  logLevel: LogLevel
}

export const DEFAULT_CONFIG = {
  confirmation: { intervalMs: 5_000, maxAttempts: 20 },
  readiness: { intervalMs: 10_000, maxAttempts: 60 },
  ttlSlots: 500,
  minCollateral: 5_000_000n,    // 5 ADA
  feeBuffer: 1_000_000n,        // 1 ADA
  journalPath: join(homedir(), '.conditional-release', 'journal.db'),
  logLevel: 'info'
} satisfies Omit<ReleaseConfig, 'paymentKeyPath' | 'blockfrostProjectId' | 'network' | 'networkId' | 'scriptPath'>

const NETWORKS: CardanoNetwork[] = ['mainnet', 'preprod', 'preview']

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ReleaseConfig {
  const paymentKeyPath = required(env, 'PAYMENT_KEY_PATH')
  const blockfrostProjectId = required(env, 'BLOCKFROST_ID')
  const network = parseNetwork(required(env, 'CARDANO_NETWORK'))

  const logLevel = env.LOG_LEVEL?.trim() || DEFAULT_CONFIG.logLevel
  if (!isLogLevel(logLevel)) {
    throw new ReleaseError('CONFIGURATION_MISSING', `LOG_LEVEL must be debug, info, warn, error or silent, got "${logLevel}"`)
  }

  return {
    paymentKeyPath,
    blockfrostProjectId,
    network,
    networkId: network === 'mainnet' ? 1 : 0,
    scriptPath: optional(env, 'SCRIPT_PATH'),
    confirmation: {
      intervalMs: integer(env, 'POLL_INTERVAL_MS', DEFAULT_CONFIG.confirmation.intervalMs),
      maxAttempts: integer(env, 'POLL_MAX_ATTEMPTS', DEFAULT_CONFIG.confirmation.maxAttempts, 1)
    },
    readiness: {
      intervalMs: integer(env, 'READY_INTERVAL_MS', DEFAULT_CONFIG.readiness.intervalMs),
      maxAttempts: integer(env, 'READY_MAX_ATTEMPTS', DEFAULT_CONFIG.readiness.maxAttempts, 1)
    },
    ttlSlots: integer(env, 'TTL_SLOTS', DEFAULT_CONFIG.ttlSlots, 1),
    minCollateral: lovelace(env, 'MIN_COLLATERAL', DEFAULT_CONFIG.minCollateral),
    feeBuffer: lovelace(env, 'FEE_BUFFER', DEFAULT_CONFIG.feeBuffer),
    journalPath: optional(env, 'JOURNAL_PATH') ?? DEFAULT_CONFIG.journalPath,
    logLevel
  }
}

export function parseNetwork(value: string): CardanoNetwork {
  const network = NETWORKS.find(n => n === value.toLowerCase())
  if (!network) {
    throw new ReleaseError('CONFIGURATION_MISSING', `CARDANO_NETWORK must be one of ${NETWORKS.join(', ')}, got "${value}"`)
  }
  return network
}

function optional(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim()
  return value ? value : undefined
}

function required(env: NodeJS.ProcessEnv, key: string): string {
  const value = optional(env, key)
  if (!value) {
    throw new ReleaseError('CONFIGURATION_MISSING', `Environment variable ${key} is not set`)
  }
  return value
}

function integer(env: NodeJS.ProcessEnv, key: string, fallback: number, min = 0): number {
  const raw = optional(env, key)
  if (raw === undefined) return fallback
  const value = Number(raw)
  if (!Number.isSafeInteger(value) || value < min) {
    throw new ReleaseError('CONFIGURATION_MISSING', `${key} must be an integer >= ${min}, got "${raw}"`)
  }
  return value
}

function lovelace(env: NodeJS.ProcessEnv, key: string, fallback: bigint): bigint {
  const raw = optional(env, key)
  if (raw === undefined) return fallback
  if (!/^\d+$/.test(raw)) {
    throw new ReleaseError('CONFIGURATION_MISSING', `${key} must be a whole number of lovelace, got "${raw}"`)
  }
  return BigInt(raw)
}
