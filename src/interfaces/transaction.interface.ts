/**
 * Transaction Interface
 * Immutable transaction values passed between the stages of the combine pipeline
 */

import type { Buffer } from 'node:buffer';

import type { TransactionId } from '../utils/transaction-id.ts';

/** Sequence value that disables both RBF signalling and relative locktime */
export const SEQUENCE_FINAL = 0xffffffff;

/** Highest sequence value that still allows locktime but does not signal RBF */
export const SEQUENCE_OPT_OUT = 0xfffffffe;

/** Sequence used on every input when the new transaction opts in to RBF */
export const SEQUENCE_OPT_IN = 0;

export interface Outpoint {
  readonly txid: TransactionId;
  readonly vout: number;
}

export interface TransactionInput {
  readonly prevout: Outpoint;
  readonly sequence: number;
  /** scriptSig; empty until signed */
  readonly script: Buffer;
  readonly witness: readonly Buffer[];
}

export interface TransactionOutput {
  /** Satoshis */
  readonly value: number;
  readonly script: Buffer;
}

export interface TransactionData {
  readonly version: number;
  readonly locktime: number;
  readonly inputs: readonly TransactionInput[];
  readonly outputs: readonly TransactionOutput[];
}
