#!/usr/bin/env node

import { BlockfrostProvider } from '@meshsdk/core'
import { Command } from 'commander'
import chalk from 'chalk'
import { matchers } from '../conditions/matchers.js'
import { fixed, isKeyHash, LockState, type ConditionMatcher, type LockedOutput, type Witness } from '../conditions/types.js'
import { loadConfig, parseNetwork, type ReleaseConfig } from '../config/index.js'
import { formatError, friendlyError, isReleaseError, ReleaseError } from '../errors.js'
import { withJournal } from '../journal/storage.js'
import { FileKeyProvider, type Credential } from '../keys/key-provider.js'
import { BlockfrostClient } from '../ledger/blockfrost.js'
import { BlockfrostGateway } from '../ledger/gateway.js'
import { MeshIntentBuilder } from '../ledger/mesh-builder.js'
import { SlotClock } from '../ledger/time.js'
import { outRef, type ScriptSource } from '../ledger/types.js'
import { createLogger } from '../logging.js'
import { loadScriptArtifact, scriptAddressFromHash } from '../scripts/artifact.js'
import { poll, type RetryPolicy } from '../workflow/polling.js'
import type { LockReceipt, ReleaseReceipt } from '../workflow/types.js'
import { ConditionalReleaseWorkflow, describeCondition } from '../workflow/workflow.js'

const program = new Command()

program
  .name('conditional-release')
  .description('Lock ADA under a release condition and release it once the condition holds')
  .version('0.1.0')

interface Session {
  config: ReleaseConfig
  credential: Credential
  workflow: ConditionalReleaseWorkflow
}

async function openSession(scriptPath?: string): Promise<Session> {
  const config = loadConfig()

  const path = scriptPath ?? config.scriptPath
  if (!path) {
    throw new ReleaseError('CONFIGURATION_MISSING', 'Pass --script or set SCRIPT_PATH')
  }

  const credential = await new FileKeyProvider(config.networkId).load(config.paymentKeyPath)
  const script = loadScriptArtifact(path, { networkId: config.networkId })

  const client = new BlockfrostClient({ projectId: config.blockfrostProjectId, network: config.network })
  const builder = new MeshIntentBuilder({
    network: config.network,
    fetcher: new BlockfrostProvider(config.blockfrostProjectId),
    verbose: config.logLevel === 'debug'
  })

  const workflow = new ConditionalReleaseWorkflow({
    gateway: new BlockfrostGateway(client, builder),
    credential,
    script,
    clock: SlotClock.forNetwork(config.network),
    confirmation: config.confirmation,
    readiness: config.readiness,
    ttlSlots: config.ttlSlots,
    minCollateral: config.minCollateral,
    feeBuffer: config.feeBuffer,
    logger: createLogger('Workflow', config.logLevel)
  })

  return { config, credential, workflow }
}

/**
 * Run a command body, printing failures through the error registry
 */
function run<A extends unknown[]>(body: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await body(...args)
    } catch (err) {
      if (isReleaseError(err)) {
        console.error(chalk.red(formatError(err.toFriendly())))
      } else {
        const message = err instanceof Error ? err.message : String(err)
        console.error(chalk.red(formatError(friendlyError('UNKNOWN', message))))
      }
      process.exit(1)
    }
  }
}

function parseLovelace(raw: string, name = 'amount'): bigint {
  if (!/^\d+$/.test(raw) || BigInt(raw) === 0n) {
    throw new ReleaseError('INVALID_ARGUMENT', `${name} must be a positive whole number of lovelace, got "${raw}"`)
  }
  return BigInt(raw)
}

function parseInteger(raw: string, name: string): bigint {
  if (!/^-?\d+$/.test(raw)) {
    throw new ReleaseError('INVALID_ARGUMENT', `${name} must be an integer, got "${raw}"`)
  }
  return BigInt(raw)
}

function parseSeconds(raw: string): number {
  const seconds = Number(raw)
  if (!Number.isSafeInteger(seconds) || seconds < 0) {
    throw new ReleaseError('INVALID_ARGUMENT', `--duration must be whole seconds, got "${raw}"`)
  }
  return seconds * 1000
}

function formatAda(lovelace: bigint): string {
  const whole = lovelace / 1_000_000n
  const fraction = (lovelace % 1_000_000n).toString().padStart(6, '0')
  return `${whole}.${fraction} ADA`
}

function printLocked(locked: LockedOutput): void {
  console.log(`${chalk.gray('Output:')}     ${outRef(locked.utxo)}`)
  console.log(`${chalk.gray('Value:')}      ${formatAda(locked.lovelace)}`)
  console.log(`${chalk.gray('Condition:')}  ${describeCondition(locked.condition)}`)
}

interface FindOptions {
  beneficiary?: string
  fixed?: string
  tx?: string
}

function matcherFor(options: FindOptions, fallback: ConditionMatcher = matchers.any()): ConditionMatcher {
  let matcher = fallback
  if (options.beneficiary) matcher = matchers.beneficiary(options.beneficiary)
  if (options.fixed) matcher = matchers.fixedValue(parseInteger(options.fixed, '--fixed'))
  return options.tx ? matchers.fromTx(options.tx, matcher) : matcher
}

// ============ ADDRESS COMMAND ============
program
  .command('address [script]')
  .description('Print the script address of a compiled validator')
  .option('--hash <hash>', 'Use a script hash instead of a script file')
  .option('-n, --network <network>', 'mainnet, preprod or preview (default: CARDANO_NETWORK)')
  .action(run(async (scriptPath: string | undefined, options: { hash?: string; network?: string }) => {
    const network = parseNetwork(options.network ?? process.env.CARDANO_NETWORK ?? '')
    const networkId = network === 'mainnet' ? 1 : 0

    if (options.hash) {
      console.log(scriptAddressFromHash(options.hash, networkId))
      return
    }

    const path = scriptPath ?? process.env.SCRIPT_PATH
    if (!path) {
      throw new ReleaseError('CONFIGURATION_MISSING', 'Pass a script file, --hash, or set SCRIPT_PATH')
    }
    const artifact = loadScriptArtifact(path, { networkId })
    console.log(`${chalk.gray('Address:')}  ${artifact.address}`)
    console.log(`${chalk.gray('Hash:')}     ${artifact.hash}`)
    console.log(`${chalk.gray('Version:')}  ${artifact.version}`)
  }))

// ============ PUBLISH-SCRIPT COMMAND ============
program
  .command('publish-script')
  .description('Store the validator as a reference script at your address')
  .option('-s, --script <path>', 'Compiled validator (default: SCRIPT_PATH)')
  .option('--lovelace <amount>', 'Lovelace to park with the script', '50000000')
  .option('-w, --wait', 'Wait for confirmation')
  .action(run(async (options: { script?: string; lovelace: string; wait?: boolean }) => {
    const { workflow } = await openSession(options.script)
    const receipt = await workflow.publishScript(parseLovelace(options.lovelace, '--lovelace'))

    console.log(chalk.green(`\n✓ Reference script published`))
    console.log(`${chalk.gray('Tx:')}       ${receipt.txId}`)
    console.log(`${chalk.gray('Output:')}   ${receipt.txId}#${receipt.outputIndex}`)

    if (options.wait) await workflow.awaitConfirmation(receipt.txId)
  }))

// ============ LOCK COMMAND ============
program
  .command('lock <lovelace>')
  .description('Lock lovelace at the script address')
  .option('-s, --script <path>', 'Compiled validator (default: SCRIPT_PATH)')
  .option('--fixed <value>', 'Fixed-value condition: release needs this redeemer')
  .option('--beneficiary <keyHash>', 'Time-locked condition: beneficiary payment key hash')
  .option('--duration <seconds>', 'Time-locked condition: seconds until release')
  .option('-w, --wait', 'Wait for confirmation')
  .action(run(async (amount: string, options: {
    script?: string
    fixed?: string
    beneficiary?: string
    duration?: string
    wait?: boolean
  }) => {
    const value = parseLovelace(amount)
    if (options.fixed !== undefined && options.beneficiary !== undefined) {
      throw new ReleaseError('INVALID_ARGUMENT', 'Use either --fixed or --beneficiary, not both')
    }

    const { config, workflow } = await openSession(options.script)

    let receipt: LockReceipt
    if (options.fixed !== undefined) {
      receipt = await workflow.lock(value, fixed(parseInteger(options.fixed, '--fixed')))
    } else if (options.beneficiary !== undefined) {
      if (options.duration === undefined) {
        throw new ReleaseError('INVALID_ARGUMENT', '--beneficiary needs --duration')
      }
      receipt = await workflow.lockFor(value, options.beneficiary, parseSeconds(options.duration))
    } else {
      throw new ReleaseError('INVALID_ARGUMENT', 'Pass --fixed <value> or --beneficiary <keyHash> --duration <seconds>')
    }

    await withJournal(config.journalPath, async journal => journal.recordLock(receipt))

    console.log(chalk.green(`\n✓ Locked ${formatAda(receipt.lovelace)}`))
    console.log(`${chalk.gray('Tx:')}         ${receipt.txId}`)
    console.log(`${chalk.gray('Address:')}    ${receipt.scriptAddress}`)
    console.log(`${chalk.gray('Condition:')}  ${describeCondition(receipt.condition)}`)

    if (options.wait) await workflow.awaitConfirmation(receipt.txId)
  }))

// ============ FIND COMMAND ============
program
  .command('find')
  .description('Find a releasable output at the script address')
  .option('-s, --script <path>', 'Compiled validator (default: SCRIPT_PATH)')
  .option('--beneficiary <keyHash>', 'Only time-locked gifts for this key hash')
  .option('--fixed <value>', 'Only fixed-value locks expecting this value')
  .option('--tx <hash>', 'Only outputs created by this transaction')
  .action(run(async (options: FindOptions & { script?: string }) => {
    const { workflow } = await openSession(options.script)
    const locked = await workflow.findReleasable(workflow.scriptAddress, matcherFor(options))

    if (!locked) {
      console.log(chalk.yellow('No matching output'))
      return
    }

    const state = await workflow.inspect(locked)
    console.log()
    printLocked(locked)
    console.log(`${chalk.gray('State:')}      ${state === LockState.RELEASABLE ? chalk.green(state) : chalk.yellow(state)}`)
    console.log()
  }))

// ============ RELEASE COMMAND ============
program
  .command('release')
  .description('Release a locked output')
  .option('-s, --script <path>', 'Compiled validator (default: SCRIPT_PATH)')
  .option('--witness <value>', 'Redeemer for a fixed-value lock')
  .option('--signer <keyHash...>', 'Extra required signers for a time-locked gift')
  .option('--beneficiary <keyHash>', 'Only time-locked gifts for this key hash')
  .option('--fixed <value>', 'Only fixed-value locks expecting this value')
  .option('--tx <hash>', 'Only outputs created by this transaction')
  .option('--to <address>', 'Destination (default: your address)')
  .option('--reference', 'Use a published reference script instead of attaching the validator')
  .option('-w, --wait', 'Wait for confirmation')
  .action(run(async (options: FindOptions & {
    script?: string
    witness?: string
    signer?: string[]
    to?: string
    reference?: boolean
    wait?: boolean
  }) => {
    const { config, workflow, credential } = await openSession(options.script)

    // Without filters: fixed-value locks when a witness is given, else gifts for our own key
    const fallback = options.witness !== undefined
      ? matchers.kind('fixed')
      : matchers.beneficiary(credential.pubKeyHash)
    const locked = await workflow.findReleasable(workflow.scriptAddress, matcherFor(options, fallback))
    if (!locked) {
      console.log(chalk.yellow('No matching output'))
      return
    }

    const witness: Witness = options.witness !== undefined
      ? { kind: 'value', value: parseInteger(options.witness, '--witness') }
      : { kind: 'signers', signers: validSigners(options.signer ?? []) }

    let scriptSource: ScriptSource | undefined
    if (options.reference) {
      scriptSource = await workflow.findReferenceScript() ?? undefined
      if (!scriptSource) {
        throw new ReleaseError('SCRIPT_UNAVAILABLE', 'No reference script found at your address; run publish-script first')
      }
    }

    const receipt = await workflow.release(locked, witness, options.to ?? credential.address, { scriptSource })
    await withJournal(config.journalPath, async journal => {
      if (journal.get(locked.utxo.input.txHash)) {
        journal.recordRelease(locked.utxo.input.txHash, receipt.txId)
      }
    })

    console.log(chalk.green(`\n✓ Released ${formatAda(receipt.lovelace)}`))
    console.log(`${chalk.gray('Tx:')}           ${receipt.txId}`)
    console.log(`${chalk.gray('Consumed:')}     ${receipt.released}`)
    console.log(`${chalk.gray('Destination:')}  ${receipt.destination}`)

    if (options.wait) await workflow.awaitConfirmation(receipt.txId)
  }))

function validSigners(signers: string[]): string[] {
  const bad = signers.find(signer => !isKeyHash(signer))
  if (bad !== undefined) {
    throw new ReleaseError('INVALID_ARGUMENT', `--signer must be a 28-byte key hash, got "${bad}"`)
  }
  return signers
}

// ============ STATUS COMMAND ============
program
  .command('status <txId>')
  .description('Poll until a transaction is confirmed')
  .option('-s, --script <path>', 'Compiled validator (default: SCRIPT_PATH)')
  .action(run(async (txId: string, options: { script?: string }) => {
    const { workflow } = await openSession(options.script)
    const receipt = await workflow.awaitConfirmation(txId)
    console.log(chalk.green(`✓ ${receipt.txId} confirmed`) + chalk.gray(` (${receipt.attempts} checks)`))
  }))

// ============ GIFT COMMAND ============
program
  .command('gift <lovelace>')
  .description('Lock a time-locked gift, wait for the deadline, then release it')
  .option('-s, --script <path>', 'Compiled validator (default: SCRIPT_PATH)')
  .option('--beneficiary <keyHash>', 'Beneficiary key hash (default: your own)')
  .option('--duration <seconds>', 'Seconds until release', '60')
  .option('--to <address>', 'Destination (default: your address)')
  .action(run(async (amount: string, options: {
    script?: string
    beneficiary?: string
    duration: string
    to?: string
  }) => {
    const value = parseLovelace(amount)
    const { config, workflow, credential } = await openSession(options.script)
    const beneficiary = options.beneficiary ?? credential.pubKeyHash

    await withJournal(config.journalPath, async journal => {
      console.log(chalk.bold('\n🎁 Time-locked gift\n'))

      const lockReceipt = await workflow.lockFor(value, beneficiary, parseSeconds(options.duration))
      journal.recordLock(lockReceipt)
      console.log(chalk.gray(`Locked in ${lockReceipt.txId}`))
      await workflow.awaitConfirmation(lockReceipt.txId)

      const locked = await workflow.findReleasable(
        workflow.scriptAddress,
        matchers.fromTx(lockReceipt.txId, matchers.beneficiary(beneficiary))
      )
      if (!locked) {
        throw new ReleaseError('LEDGER_UNAVAILABLE', `Confirmed lock ${lockReceipt.txId} is not visible at ${workflow.scriptAddress}`)
      }

      await workflow.awaitReleasable(locked)
      journal.markReleasable(lockReceipt.txId)

      // The slot lower bound can trail ledger time
      const releaseReceipt = await releaseWhenSlotReady(workflow, locked, options.to ?? credential.address, config.readiness)
      journal.recordRelease(lockReceipt.txId, releaseReceipt.txId)
      await workflow.awaitConfirmation(releaseReceipt.txId)

      console.log(chalk.green(`\n✓ Gift of ${formatAda(releaseReceipt.lovelace)} released in ${releaseReceipt.txId}\n`))
    })
  }))

async function releaseWhenSlotReady(
  workflow: ConditionalReleaseWorkflow,
  locked: LockedOutput,
  destination: string,
  policy: RetryPolicy
): Promise<ReleaseReceipt> {
  const outcome = await poll(policy, async () => {
    try {
      return await workflow.release(locked, { kind: 'signers', signers: [] }, destination)
    } catch (err) {
      if (isReleaseError(err, 'CONDITION_NOT_YET_MET')) return undefined
      throw err
    }
  })

  if (!outcome.done) {
    throw new ReleaseError('CONDITION_NOT_YET_MET', `No slot past the deadline after ${outcome.attempts} checks`)
  }
  return outcome.value
}

// ============ JOURNAL COMMAND ============
program
  .command('journal')
  .description('List locks recorded on this machine')
  .option('--state <state>', 'pending, releasable or released')
  .action(run(async (options: { state?: string }) => {
    const config = loadConfig()
    const state = options.state === undefined
      ? undefined
      : [LockState.PENDING, LockState.RELEASABLE, LockState.RELEASED].find(s => s === options.state)
    if (options.state !== undefined && state === undefined) {
      throw new ReleaseError('INVALID_ARGUMENT', `--state must be pending, releasable or released, got "${options.state}"`)
    }

    const entries = await withJournal(config.journalPath, async journal => journal.list(state))

    if (entries.length === 0) {
      console.log(chalk.gray('No journal entries'))
      return
    }

    console.log(chalk.bold(`\n📒 Journal (${entries.length})\n`))
    for (const entry of entries) {
      const color = entry.state === LockState.RELEASED ? chalk.green : chalk.yellow
      console.log(`${color('●')} ${entry.txId}#${entry.outputIndex} ${chalk.gray(entry.kind)} ${formatAda(entry.lovelace)} ${color(entry.state)}`)
      if (entry.deadline !== undefined) {
        console.log(chalk.gray(`    deadline ${new Date(entry.deadline).toISOString()}`))
      }
      if (entry.releaseTxId) {
        console.log(chalk.gray(`    released in ${entry.releaseTxId}`))
      }
    }
    console.log()
  }))

await program.parseAsync(process.argv)
