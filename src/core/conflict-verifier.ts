/**
 * Conflict Verifier & Publisher
 */

import { ConflictInvariantViolatedError } from '../errors/index.ts';
import type { CandidatePair, PublishResult } from '../interfaces/combine.interface.ts';
import type { NodeRpc } from '../interfaces/node-rpc.interface.ts';
import type { TransactionData } from '../interfaces/transaction.interface.ts';
import { type Logger, NullLogger } from '../utils/logger.ts';
import { encodeTransaction, formatOutpoint, outpointsEqual } from '../utils/transaction-data.ts';

/**
 * The replacement's first input must spend tx1's first input and its second input
 * tx2's first input. This fails whenever a dependent input was dropped while
 * building, which is known and left as a hard stop.
 */
export function verifyConflicts(replacement: TransactionData, pair: CandidatePair): void {
  const checks = [
    { index: 0, original: pair.first },
    { index: 1, original: pair.second },
  ];

  for (const { index, original } of checks) {
    const expected = original.tx.inputs[0];
    const actual = replacement.inputs[index];
    if (expected === undefined) {
      throw new ConflictInvariantViolatedError(`txid ${original.position} has no inputs`);
    }
    if (actual === undefined || !outpointsEqual(actual.prevout, expected.prevout)) {
      throw new ConflictInvariantViolatedError(
        `input ${index} spends ${actual ? formatOutpoint(actual.prevout) : 'nothing'}, ` +
          `expected ${formatOutpoint(expected.prevout)} from txid ${original.position}`,
      );
    }
  }
}

export class ConflictVerifier {
  private readonly rpc: NodeRpc;
  private readonly logger: Logger;

  constructor(rpc: NodeRpc, logger: Logger = new NullLogger()) {
    this.rpc = rpc;
    this.logger = logger;
  }

  async publish(
    replacement: TransactionData,
    pair: CandidatePair,
    dryRun: boolean,
  ): Promise<PublishResult> {
    verifyConflicts(replacement, pair);

    const hex = encodeTransaction(replacement);
    if (dryRun) {
      return { kind: 'dry-run', hex };
    }

    this.logger.debug?.(`Sending tx ${hex}`);
    const txid = await this.rpc.sendRawTransaction(hex);
    this.logger.info(`Broadcast replacement ${txid.toHex()}`);
    return { kind: 'broadcast', txid, hex };
  }
}
