/**
 * Node RPC Interface
 * The operations the combine pipeline needs from a wallet-enabled Bitcoin node
 */

import type { Buffer } from 'node:buffer';

import type { TransactionId } from '../utils/transaction-id.ts';

export interface WalletTransactionInfo {
  /** 0 while the transaction is unconfirmed */
  confirmations: number;
}

export interface RawTransactionInfo {
  hex: string;
}

export interface MempoolEntry {
  /** Fee in satoshis after any prioritisetransaction adjustment */
  modifiedFee: number;
}

/** Descendant txid (display hex) to its modified fee in satoshis */
export type DescendantFees = ReadonlyMap<string, number>;

export interface FundOptions {
  /** Send change here instead of a fresh wallet address */
  changeScript?: Buffer;
}

export interface FundResult {
  hex: string;
  /** Satoshis */
  fee: number;
  /** Index of the added change output, -1 when none was needed */
  changePosition: number;
}

export interface SignResult {
  hex: string;
  complete: boolean;
  errors: string[];
}

export interface NetworkInfo {
  /** Minimum relay fee rate, satoshis per 1000 bytes */
  relayFee: number;
}

export interface NodeRpc {
  /**
   * Look a transaction up in the wallet; null when the wallet does not know it.
   * Answers for mined transactions too, which getRawTransaction may not without -txindex.
   */
  getWalletTransaction(txid: TransactionId): Promise<WalletTransactionInfo | null>;

  /**
   * Serialised transaction; only asked for once it is known to be unconfirmed
   */
  getRawTransaction(txid: TransactionId): Promise<RawTransactionInfo>;

  /**
   * Whether the wallet owns the output script
   */
  isMine(script: Buffer): Promise<boolean>;

  /**
   * Mempool entry; null when the transaction is not in the mempool
   */
  getMempoolEntry(txid: TransactionId): Promise<MempoolEntry | null>;

  /**
   * Unconfirmed descendants; null when the transaction is not in the mempool
   */
  getMempoolDescendants(txid: TransactionId): Promise<DescendantFees | null>;

  /**
   * Add inputs and a change output so the transaction pays for its outputs
   */
  fundRawTransaction(hex: string, options?: FundOptions): Promise<FundResult>;

  /**
   * Sign every input the wallet has keys for
   */
  signRawTransaction(hex: string): Promise<SignResult>;

  /**
   * Submit to the mempool and relay
   */
  sendRawTransaction(hex: string): Promise<TransactionId>;

  getNetworkInfo(): Promise<NetworkInfo>;
}
