/**
 * User-friendly error messages for lock and release failures.
 * Every error includes: what happened, why, and what to do about it.
 */

export type ErrorCode =
  | 'CONFIGURATION_MISSING'
  | 'CREDENTIAL_UNAVAILABLE'
  | 'SCRIPT_UNAVAILABLE'
  | 'INSUFFICIENT_FUNDS'
  | 'CONDITION_NOT_YET_MET'
  | 'MISSING_COLLATERAL'
  | 'SUBMISSION_REJECTED'
  | 'CONFIRMATION_TIMEOUT'
  | 'INVALID_WITNESS'
  | 'INVALID_ARGUMENT'
  | 'LEDGER_UNAVAILABLE'

export interface FriendlyError {
  code: ErrorCode | 'UNKNOWN_ERROR'
  message: string
  cause?: string
  fix: string
}

const errors: Record<ErrorCode, (detail?: string) => FriendlyError> = {
  CONFIGURATION_MISSING: (detail) => ({
    code: 'CONFIGURATION_MISSING',
    message: 'Required configuration is missing or invalid.',
    cause: detail || 'An environment variable the workflow needs is not set.',
    fix: [
      'Set PAYMENT_KEY_PATH to your cardano-cli payment.skey file',
      'Set BLOCKFROST_ID to your Blockfrost project id',
      'Set CARDANO_NETWORK to mainnet, preprod or preview',
    ].join('\n  • '),
  }),

  CREDENTIAL_UNAVAILABLE: (detail) => ({
    code: 'CREDENTIAL_UNAVAILABLE',
    message: 'Could not load the signing key.',
    cause: detail || 'The key file is missing, unreadable or not a signing-key envelope.',
    fix: [
      'Check that PAYMENT_KEY_PATH points at an existing file',
      'The file must be a cardano-cli text envelope with a cborHex field',
      'Generate one with: cardano-cli address key-gen',
    ].join('\n  • '),
  }),

  SCRIPT_UNAVAILABLE: (detail) => ({
    code: 'SCRIPT_UNAVAILABLE',
    message: 'Could not load the compiled validator.',
    cause: detail || 'The script file is absent or malformed.',
    fix: [
      'Check that SCRIPT_PATH (or --script) points at the compiled script',
      'Accepted formats: raw CBOR hex, cardano-cli text envelope, Aiken plutus.json',
      'Rebuild the validator if the file is truncated',
    ].join('\n  • '),
  }),

  INSUFFICIENT_FUNDS: (detail) => ({
    code: 'INSUFFICIENT_FUNDS',
    message: 'Not enough ADA to complete this transaction.',
    cause: detail || 'No spendable output covers the amount plus the fee buffer.',
    fix: [
      'Fund the wallet address (the testnet faucet works for preprod/preview)',
      'Lock a smaller amount',
      'Consolidate small outputs into one larger output',
    ].join('\n  • '),
  }),

  CONDITION_NOT_YET_MET: (detail) => ({
    code: 'CONDITION_NOT_YET_MET',
    message: 'The release condition is not satisfiable yet.',
    cause: detail || 'Ledger time has not passed the deadline.',
    fix: [
      'Wait until the deadline has passed on chain, then retry',
      'Use the gift or status commands to poll instead of retrying by hand',
    ].join('\n  • '),
  }),

  MISSING_COLLATERAL: (detail) => ({
    code: 'MISSING_COLLATERAL',
    message: 'No output is available to pledge as collateral.',
    cause: detail || 'Script spends need a plain ADA-only output owned by the releasing wallet.',
    fix: [
      'Send at least 5 ADA to your own address in a separate output',
      'Make sure that output carries no datum, script or native tokens',
    ].join('\n  • '),
  }),

  SUBMISSION_REJECTED: (detail) => ({
    code: 'SUBMISSION_REJECTED',
    message: 'The ledger rejected the transaction.',
    cause: detail || 'The validator failed or an input was already spent.',
    fix: [
      'Read the rejection reason above; it is reported exactly as the node sent it',
      'If the output was already released by someone else, nothing is left to do',
      'Do not resubmit the same transaction; fix the witness or inputs first',
    ].join('\n  • '),
  }),

  CONFIRMATION_TIMEOUT: (detail) => ({
    code: 'CONFIRMATION_TIMEOUT',
    message: `Transaction ${detail || '(unknown)'} was not confirmed within the polling window.`,
    cause: 'The transaction may still be in the mempool and can confirm later.',
    fix: [
      `Check again later: conditional-release status ${detail || '<txId>'}`,
      'Increase POLL_MAX_ATTEMPTS or POLL_INTERVAL_MS for slower networks',
    ].join('\n  • '),
  }),

  INVALID_WITNESS: (detail) => ({
    code: 'INVALID_WITNESS',
    message: 'The witness does not fit the locked condition.',
    cause: detail || 'A value witness was given for a time lock, or the reverse.',
    fix: [
      'Use --witness <n> for fixed-value locks',
      'Omit --witness for time-locked gifts',
    ].join('\n  • '),
  }),

  INVALID_ARGUMENT: (detail) => ({
    code: 'INVALID_ARGUMENT',
    message: 'An argument was out of range.',
    cause: detail || 'Amounts must be positive whole numbers of lovelace.',
    fix: 'Check the command arguments and try again',
  }),

  LEDGER_UNAVAILABLE: (detail) => ({
    code: 'LEDGER_UNAVAILABLE',
    message: 'Could not query the chain indexer.',
    cause: detail || 'Blockfrost returned an error or could not be reached.',
    fix: [
      'Check your internet connection',
      'Verify BLOCKFROST_ID belongs to the selected CARDANO_NETWORK',
      'Check your Blockfrost request quota',
    ].join('\n  • '),
  }),
}

/**
 * Get a user-friendly error message for a known error code.
 */
export function friendlyError(code: string, detail?: string): FriendlyError {
  if (!isErrorCode(code)) {
    return {
      code: 'UNKNOWN_ERROR',
      message: detail || 'An unexpected error occurred.',
      fix: 'Run again with LOG_LEVEL=debug for details.',
    }
  }
  return errors[code](detail)
}

function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(errors, code)
}

/**
 * Error thrown by the workflow and its collaborators.
 * `detail` is kept verbatim (e.g. a node's rejection reason).
 */
export class ReleaseError extends Error {
  readonly code: ErrorCode
  readonly detail?: string

  constructor(code: ErrorCode, detail?: string, options?: { cause?: unknown }) {
    super(detail ? `${code}: ${detail}` : code, options)
    this.name = 'ReleaseError'
    this.code = code
    this.detail = detail
  }

  toFriendly(): FriendlyError {
    return friendlyError(this.code, this.detail)
  }
}

export function isReleaseError(err: unknown, code?: ErrorCode): err is ReleaseError {
  return err instanceof ReleaseError && (code === undefined || err.code === code)
}

/**
 * Format a FriendlyError for console output.
 */
export function formatError(err: FriendlyError): string {
  const lines = [
    `\n❌ ${err.message}`,
    ``,
    `  Why: ${err.cause || 'Unknown'}`,
    ``,
    `  Fix:`,
    `  • ${err.fix}`,
    ``,
  ]
  return lines.join('\n')
}
