/**
 * TransactionIntent -> unsigned transaction, via MeshTxBuilder
 *
 * Coin selection, fee computation and change are MeshTxBuilder's job;
 * this only declares what the intent requires.
 */

import { MeshTxBuilder } from '@meshsdk/core'
import type { IFetcher, Protocol } from '@meshsdk/core'
import type { CardanoNetwork } from './time.js'
import type { IntentOutput, ScriptInput, TransactionIntent } from './types.js'

export interface MeshIntentBuilderConfig {
  network: CardanoNetwork
  /** Resolves the inputs, collateral and reference outputs the builder is handed */
  fetcher: IFetcher
  /** Protocol parameters; MeshTxBuilder defaults when omitted */
  params?: Partial<Protocol>
  verbose?: boolean
}

export class MeshIntentBuilder {
  private readonly config: MeshIntentBuilderConfig

  constructor(config: MeshIntentBuilderConfig) {
    this.config = config
  }

  async build(intent: TransactionIntent): Promise<string> {
    const txBuilder = new MeshTxBuilder({
      fetcher: this.config.fetcher,
      params: this.config.params,
      verbose: this.config.verbose ?? false
    })

    if (intent.scriptInput) {
      this.addScriptInput(txBuilder, intent.scriptInput)
    }

    for (const utxo of intent.inputs) {
      txBuilder.txIn(
        utxo.input.txHash,
        utxo.input.outputIndex,
        utxo.output.amount,
        utxo.output.address
      )
    }

    for (const output of intent.outputs) {
      this.addOutput(txBuilder, output)
    }

    if (intent.collateral) {
      const { input, output } = intent.collateral
      txBuilder.txInCollateral(input.txHash, input.outputIndex, output.amount, output.address)
    }

    for (const signer of intent.requiredSigners) {
      txBuilder.requiredSignerHash(signer)
    }

    if (intent.validFrom !== undefined) txBuilder.invalidBefore(intent.validFrom)
    if (intent.validTo !== undefined) txBuilder.invalidHereafter(intent.validTo)

    txBuilder
      .changeAddress(intent.changeAddress)
      .selectUtxosFrom(intent.selectable)
      .setNetwork(this.config.network)

    return await txBuilder.complete()
  }

  private addScriptInput(txBuilder: MeshTxBuilder, scriptInput: ScriptInput): void {
    const { utxo, redeemer, source } = scriptInput

    txBuilder
      .spendingPlutusScript(source.script.version)
      .txIn(utxo.input.txHash, utxo.input.outputIndex, utxo.output.amount, utxo.output.address)

    if (source.kind === 'inline') {
      txBuilder.txInScript(source.script.code)
    } else {
      txBuilder.spendingTxInReference(
        source.utxo.input.txHash,
        source.utxo.input.outputIndex,
        (source.script.code.length / 2).toString(),
        source.script.hash
      )
    }

    txBuilder
      .spendingReferenceTxInInlineDatumPresent()
      .spendingReferenceTxInRedeemerValue(redeemer)
  }

  private addOutput(txBuilder: MeshTxBuilder, output: IntentOutput): void {
    txBuilder.txOut(output.address, output.amount)
    if (output.datum) {
      txBuilder.txOutInlineDatumValue(output.datum, 'CBOR')
    }
    if (output.referenceScript) {
      txBuilder.txOutReferenceScript(output.referenceScript.code, output.referenceScript.version)
    }
  }
}
