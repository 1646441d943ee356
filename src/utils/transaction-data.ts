/**
 * Conversions between raw transaction hex and immutable {@link TransactionData} values,
 * plus the small copy-with-change helpers the pipeline stages build on.
 */

import { Buffer } from 'node:buffer';

import * as bitcoin from 'bitcoinjs-lib';

import {
  type Outpoint,
  SEQUENCE_OPT_OUT,
  type TransactionData,
  type TransactionInput,
  type TransactionOutput,
} from '../interfaces/transaction.interface.ts';
import { TransactionId } from './transaction-id.ts';

export function decodeTransaction(hex: string): TransactionData {
  const tx = bitcoin.Transaction.fromHex(hex);

  return {
    version: tx.version,
    locktime: tx.locktime,
    inputs: tx.ins.map((input) => ({
      prevout: {
        txid: TransactionId.fromInternal(input.hash),
        vout: input.index,
      },
      sequence: input.sequence,
      script: Buffer.from(input.script),
      witness: input.witness.map((item) => Buffer.from(item)),
    })),
    outputs: tx.outs.map((output) => ({
      value: output.value,
      script: Buffer.from(output.script),
    })),
  };
}

export function toBitcoinTransaction(data: TransactionData): bitcoin.Transaction {
  const tx = new bitcoin.Transaction();
  tx.version = data.version;
  tx.locktime = data.locktime;

  data.inputs.forEach((input, index) => {
    tx.addInput(
      input.prevout.txid.toInternal(),
      input.prevout.vout,
      input.sequence,
      input.script,
    );
    if (input.witness.length > 0) {
      tx.setWitness(index, [...input.witness]);
    }
  });

  for (const output of data.outputs) {
    tx.addOutput(output.script, output.value);
  }

  return tx;
}

export function encodeTransaction(data: TransactionData): string {
  return toBitcoinTransaction(data).toHex();
}

/**
 * Serialised size in bytes, witness data included
 */
export function transactionSize(data: TransactionData): number {
  return toBitcoinTransaction(data).byteLength();
}

export function computeTransactionId(data: TransactionData): TransactionId {
  return TransactionId.fromHex(toBitcoinTransaction(data).getId());
}

export function outpointsEqual(a: Outpoint, b: Outpoint): boolean {
  return a.vout === b.vout && a.txid.equals(b.txid);
}

export function formatOutpoint(outpoint: Outpoint): string {
  return `${outpoint.txid.toHex()}:${outpoint.vout}`;
}

export function signalsReplaceability(input: TransactionInput): boolean {
  return input.sequence < SEQUENCE_OPT_OUT;
}

export function withInputs(
  data: TransactionData,
  inputs: readonly TransactionInput[],
): TransactionData {
  return { ...data, inputs: [...inputs] };
}

export function withOutputs(
  data: TransactionData,
  outputs: readonly TransactionOutput[],
): TransactionData {
  return { ...data, outputs: [...outputs] };
}

export function withOutputValue(
  data: TransactionData,
  index: number,
  value: number,
): TransactionData {
  if (index < 0 || index >= data.outputs.length) {
    throw new RangeError(`Output index ${index} out of range (${data.outputs.length} outputs)`);
  }
  return withOutputs(
    data,
    data.outputs.map((output, i) => (i === index ? { ...output, value } : output)),
  );
}

export function withSequence(data: TransactionData, sequence: number): TransactionData {
  return withInputs(
    data,
    data.inputs.map((input) => ({ ...input, sequence })),
  );
}

/**
 * Drop scriptSig and witness from every input
 */
export function withoutSignatures(data: TransactionData): TransactionData {
  return withInputs(
    data,
    data.inputs.map((input) => ({ ...input, script: Buffer.alloc(0), witness: [] })),
  );
}

export function totalOutputValue(data: TransactionData): number {
  return data.outputs.reduce((sum, output) => sum + output.value, 0);
}
