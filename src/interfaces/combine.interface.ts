/**
 * Combine Interface
 * Values produced by each stage of the combine pipeline
 */

import type { Buffer } from 'node:buffer';

import type { TransactionPosition } from '../errors/index.ts';
import type { TransactionId } from '../utils/transaction-id.ts';
import type { TransactionData, TransactionOutput } from './transaction.interface.ts';

export interface CandidateTransaction {
  position: TransactionPosition;
  txid: TransactionId;
  tx: TransactionData;
  /** Serialised size in bytes */
  size: number;
}

export interface CandidatePair {
  first: CandidateTransaction;
  second: CandidateTransaction;
}

export interface OutputConsolidation {
  /** One output per distinct script, values summed, first-seen order */
  consolidated: readonly TransactionOutput[];
  /** Consolidated outputs whose script the wallet does not own */
  payees: readonly TransactionOutput[];
  /** Wallet-owned scripts, first-seen order, each once */
  changeScripts: readonly Buffer[];
  /** First wallet-owned script; the replacement's change goes here */
  changeAnchor?: Buffer;
}

export interface FeeRequirements {
  /** Modified fees of the two originals, satoshis */
  fee1: number;
  fee2: number;
  size1: number;
  size2: number;
  oldFees: number;
  /** Combined fee rate of the originals, sat/byte */
  oldFeeRate: number;
  /** Union of both descendant sets */
  descendants: ReadonlyMap<string, number>;
  descendantFees: number;
  /** oldFees + descendantFees */
  requiredFee: number;
  /** max(fee1/size1, fee2/size2), sat/byte */
  minFeeRate: number;
}

export type DroppedInput = 'first' | 'second';

export interface ReplacementSkeleton {
  tx: TransactionData;
  dropped?: DroppedInput;
}

export interface FundedReplacement {
  /** Funded, sequence-adjusted and signed */
  tx: TransactionData;
  fee: number;
  changeIndex: number;
  dropped?: DroppedInput;
}

export interface FeeAdjustment {
  /** Final signed transaction */
  tx: TransactionData;
  fee: number;
  size: number;
  feeRate: number;
  /** Bandwidth fee paid for relaying the replacement */
  relayBandwidthFee: number;
  /** Signing rounds the adjustment took */
  passes: number;
}

export type PublishResult =
  | { kind: 'dry-run'; hex: string }
  | { kind: 'broadcast'; txid: TransactionId; hex: string };

export interface CombineOptions {
  /** Return the signed hex instead of broadcasting */
  dryRun?: boolean;
  /** Make the replacement itself replaceable (sequence 0) */
  optIn?: boolean;
}

export interface CombineResult {
  publish: PublishResult;
  fee: number;
  size: number;
  feeRate: number;
  requirements: FeeRequirements;
  consolidation: OutputConsolidation;
}
