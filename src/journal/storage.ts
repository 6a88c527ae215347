/**
 * SQLite journal of locks submitted from this machine
 */

import Database from 'better-sqlite3'
import { existsSync, mkdirSync } from 'fs'
import { dirname } from 'path'
import { transition } from '../conditions/state-machine.js'
import { LockState, type ConditionKind } from '../conditions/types.js'
import { ReleaseError } from '../errors.js'
import type { LockReceipt } from '../workflow/types.js'

export interface JournalEntry {
  txId: string
  scriptAddress: string
  outputIndex: number
  kind: ConditionKind
  lovelace: bigint
  deadline?: number
  state: LockState
  releaseTxId?: string
  createdAt: number
  updatedAt: number
}

export interface JournalRow {
  tx_id: string
  script_address: string
  output_index: number
  kind: string
  lovelace: string
  deadline: number | null
  state: string
  release_tx_id: string | null
  created_at: number
  updated_at: number
}

const LOCK_STATES: LockState[] = [LockState.PENDING, LockState.RELEASABLE, LockState.RELEASED]
const KINDS: ConditionKind[] = ['fixed', 'time-locked']

export class LockJournal {
  private db: Database.Database
  private now: () => number

  constructor(dbPath: string, now: () => number = Date.now) {
    const expandedPath = dbPath.replace(/^~/, process.env.HOME || '')

    if (expandedPath !== ':memory:') {
      const dir = dirname(expandedPath)
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true })
      }
    }

    this.db = new Database(expandedPath)
    this.db.pragma('journal_mode = WAL')
    this.now = now
    this.init()
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS locks (
        tx_id TEXT PRIMARY KEY,
        script_address TEXT NOT NULL,
        output_index INTEGER NOT NULL,
        kind TEXT NOT NULL,
        lovelace TEXT NOT NULL,
        deadline INTEGER,
        state TEXT NOT NULL DEFAULT 'pending',
        release_tx_id TEXT,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      )
    `)

    this.db.exec('CREATE INDEX IF NOT EXISTS idx_locks_state ON locks(state)')
  }

  /**
   * Record a freshly submitted lock as pending
   */
  recordLock(receipt: LockReceipt): JournalEntry {
    const timestamp = this.now()
    this.db.prepare(`
      INSERT INTO locks (
        tx_id, script_address, output_index, kind, lovelace, deadline,
        state, release_tx_id, created_at, updated_at
      ) VALUES (
        @tx_id, @script_address, @output_index, @kind, @lovelace, @deadline,
        @state, NULL, @created_at, @updated_at
      )
      ON CONFLICT(tx_id) DO NOTHING
    `).run({
      tx_id: receipt.txId,
      script_address: receipt.scriptAddress,
      output_index: receipt.outputIndex,
      kind: receipt.condition.kind,
      lovelace: receipt.lovelace.toString(),
      deadline: receipt.deadline ?? null,
      state: LockState.PENDING,
      created_at: timestamp,
      updated_at: timestamp
    })

    return this.require(receipt.txId)
  }

  /**
   * Mark a lock as releasable. Already releasable entries are left alone.
   */
  markReleasable(lockTxId: string): JournalEntry {
    const entry = this.require(lockTxId)
    if (entry.state === LockState.RELEASABLE) return entry
    return this.move(entry, LockState.RELEASABLE, null)
  }

  /**
   * Mark a lock as released by `releaseTxId`. A pending entry passes
   * through releasable, since the release proves the condition was met.
   */
  recordRelease(lockTxId: string, releaseTxId: string): JournalEntry {
    let entry = this.require(lockTxId)
    if (entry.state === LockState.PENDING) {
      entry = this.move(entry, LockState.RELEASABLE, null)
    }
    return this.move(entry, LockState.RELEASED, releaseTxId)
  }

  get(txId: string): JournalEntry | null {
    const row = this.db
      .prepare<[string], JournalRow>('SELECT * FROM locks WHERE tx_id = ?')
      .get(txId)
    return row ? rowToEntry(row) : null
  }

  /**
   * Entries newest first, optionally filtered by state
   */
  list(state?: LockState): JournalEntry[] {
    const rows = state
      ? this.db.prepare<[string], JournalRow>('SELECT * FROM locks WHERE state = ? ORDER BY created_at DESC, rowid DESC').all(state)
      : this.db.prepare<[], JournalRow>('SELECT * FROM locks ORDER BY created_at DESC, rowid DESC').all()
    return rows.map(rowToEntry)
  }

  close(): void {
    this.db.close()
  }

  private require(txId: string): JournalEntry {
    const entry = this.get(txId)
    if (!entry) {
      throw new ReleaseError('INVALID_ARGUMENT', `No journal entry for ${txId}`)
    }
    return entry
  }

  private move(entry: JournalEntry, to: LockState, releaseTxId: string | null): JournalEntry {
    const result = transition(entry.state, to)
    if (!result.ok) {
      throw new ReleaseError('INVALID_ARGUMENT', `${entry.txId}: ${result.error}`)
    }

    this.db.prepare(`
      UPDATE locks SET state = @state, release_tx_id = COALESCE(@release_tx_id, release_tx_id), updated_at = @updated_at
      WHERE tx_id = @tx_id
    `).run({
      tx_id: entry.txId,
      state: result.newState,
      release_tx_id: releaseTxId,
      updated_at: this.now()
    })

    return this.require(entry.txId)
  }
}

/**
 * Open the journal for the duration of `body`, closing it however `body` ends
 */
export async function withJournal<T>(dbPath: string, body: (journal: LockJournal) => Promise<T>): Promise<T> {
  const journal = new LockJournal(dbPath)
  try {
    return await body(journal)
  } finally {
    journal.close()
  }
}

function rowToEntry(row: JournalRow): JournalEntry {
  const state = LOCK_STATES.find(s => s === row.state)
  const kind = KINDS.find(k => k === row.kind)
  if (!state || !kind) {
    throw new ReleaseError('INVALID_ARGUMENT', `Corrupt journal row for ${row.tx_id}`)
  }

  return {
    txId: row.tx_id,
    scriptAddress: row.script_address,
    outputIndex: row.output_index,
    kind,
    lovelace: BigInt(row.lovelace),
    deadline: row.deadline ?? undefined,
    state,
    releaseTxId: row.release_tx_id ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  }
}
