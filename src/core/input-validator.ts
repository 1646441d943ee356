/**
 * Input Validator
 * Parses the two txids and checks both transactions can still be replaced
 */

import {
  AlreadyConfirmedError,
  InvalidIdentifierError,
  NotInWalletError,
  NotReplaceableError,
  type TransactionPosition,
} from '../errors/index.ts';
import type { CandidatePair, CandidateTransaction } from '../interfaces/combine.interface.ts';
import type { NodeRpc, RawTransactionInfo, WalletTransactionInfo } from '../interfaces/node-rpc.interface.ts';
import type { TransactionData } from '../interfaces/transaction.interface.ts';
import { type Logger, NullLogger } from '../utils/logger.ts';
import { decodeTransaction, signalsReplaceability, transactionSize } from '../utils/transaction-data.ts';
import { type ByteOrder, TransactionId } from '../utils/transaction-id.ts';

export type TransactionIdPair = readonly [TransactionId, TransactionId];

/**
 * Parse both command line txids; fails before any node call
 */
export function parseTransactionIds(
  txid1: string,
  txid2: string,
  byteOrder: ByteOrder = 'display',
): TransactionIdPair {
  const first = TransactionId.fromHex(txid1, { byteOrder, position: 1 });
  const second = TransactionId.fromHex(txid2, { byteOrder, position: 2 });

  if (first.equals(second)) {
    throw new InvalidIdentifierError(txid2, 'same transaction as txid 1', 2);
  }

  return [first, second];
}

/**
 * True when every input signals replace-by-fee
 */
export function signalsFullReplaceability(tx: TransactionData): boolean {
  return tx.inputs.length > 0 && tx.inputs.every(signalsReplaceability);
}

export class InputValidator {
  private readonly rpc: NodeRpc;
  private readonly logger: Logger;

  constructor(rpc: NodeRpc, logger: Logger = new NullLogger()) {
    this.rpc = rpc;
    this.logger = logger;
  }

  async validate(ids: TransactionIdPair): Promise<CandidatePair> {
    const [id1, id2] = ids;

    const wallet1 = await this.requireInWallet(id1, 1);
    const wallet2 = await this.requireInWallet(id2, 2);

    this.requireUnconfirmed(id1, wallet1);
    this.requireUnconfirmed(id2, wallet2);

    const info1 = await this.rpc.getRawTransaction(id1);
    const info2 = await this.rpc.getRawTransaction(id2);

    const first = this.toCandidate(1, id1, info1);
    const second = this.toCandidate(2, id2, info2);

    for (const candidate of [first, second]) {
      if (!signalsFullReplaceability(candidate.tx)) {
        throw new NotReplaceableError(candidate.txid.toHex());
      }
    }

    this.logger.debug?.('Both transactions are unconfirmed and replaceable', {
      txid1: id1.toHex(),
      txid2: id2.toHex(),
    });

    return { first, second };
  }

  private async requireInWallet(
    txid: TransactionId,
    position: TransactionPosition,
  ): Promise<WalletTransactionInfo> {
    const walletTx = await this.rpc.getWalletTransaction(txid);
    if (walletTx === null) {
      throw new NotInWalletError(txid.toHex(), position);
    }
    return walletTx;
  }

  private requireUnconfirmed(txid: TransactionId, info: WalletTransactionInfo): void {
    if (info.confirmations > 0) {
      throw new AlreadyConfirmedError(txid.toHex(), info.confirmations);
    }
  }

  private toCandidate(
    position: TransactionPosition,
    txid: TransactionId,
    info: RawTransactionInfo,
  ): CandidateTransaction {
    const tx = decodeTransaction(info.hex);
    return { position, txid, tx, size: transactionSize(tx) };
  }
}
