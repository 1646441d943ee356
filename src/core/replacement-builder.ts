/**
 * Replacement Builder
 *
 * Keeps only the first input of each original, which is enough to conflict with
 * both, pays the consolidated payees, and lets the wallet add inputs and change.
 */

import {
  ConflictInvariantViolatedError,
  FundingFailedError,
  NodeRpcError,
  SigningIncompleteError,
  UnsupportedNoChangeCaseError,
} from '../errors/index.ts';
import type {
  CandidatePair,
  FeeRequirements,
  FundedReplacement,
  OutputConsolidation,
  ReplacementSkeleton,
} from '../interfaces/combine.interface.ts';
import type { FundResult, NodeRpc } from '../interfaces/node-rpc.interface.ts';
import {
  SEQUENCE_OPT_IN,
  SEQUENCE_OPT_OUT,
  type TransactionData,
  type TransactionInput,
} from '../interfaces/transaction.interface.ts';
import { type Logger, NullLogger } from '../utils/logger.ts';
import {
  decodeTransaction,
  encodeTransaction,
  formatOutpoint,
  withInputs,
  withOutputs,
  withoutSignatures,
  withSequence,
} from '../utils/transaction-data.ts';

export interface ReplacementBuilderOptions {
  /** Let the replacement itself be replaced (sequence 0 instead of 0xfffffffe) */
  optIn?: boolean;
}

/**
 * Skeleton replacement: tx1's version and locktime, the first input of each
 * original, one output per payee.
 *
 * If the second kept input spends a descendant of either original it is dropped;
 * otherwise the same check is made for the first. Only these two inputs are looked
 * at, so this does not detect every way the originals can depend on each other.
 */
export function buildSkeleton(
  pair: CandidatePair,
  consolidation: OutputConsolidation,
  descendants: ReadonlyMap<string, number>,
): ReplacementSkeleton {
  const first = pair.first.tx.inputs[0];
  const second = pair.second.tx.inputs[0];
  if (first === undefined || second === undefined) {
    throw new ConflictInvariantViolatedError('an original transaction has no inputs');
  }

  let inputs: TransactionInput[] = [first, second];
  let dropped: ReplacementSkeleton['dropped'];

  if (descendants.has(second.prevout.txid.toHex())) {
    inputs = [first];
    dropped = 'second';
  } else if (descendants.has(first.prevout.txid.toHex())) {
    inputs = [second];
    dropped = 'first';
  }

  const tx = withOutputs(withoutSignatures(withInputs(pair.first.tx, inputs)), consolidation.payees);
  return dropped === undefined ? { tx } : { tx, dropped };
}

/**
 * Sign through the wallet; the result must be complete
 */
export async function signWithWallet(rpc: NodeRpc, tx: TransactionData): Promise<TransactionData> {
  const signed = await rpc.signRawTransaction(encodeTransaction(tx));
  if (!signed.complete) {
    throw new SigningIncompleteError(signed.errors);
  }
  return decodeTransaction(signed.hex);
}

export class ReplacementBuilder {
  private readonly rpc: NodeRpc;
  private readonly logger: Logger;

  constructor(rpc: NodeRpc, logger: Logger = new NullLogger()) {
    this.rpc = rpc;
    this.logger = logger;
  }

  async build(
    pair: CandidatePair,
    consolidation: OutputConsolidation,
    requirements: FeeRequirements,
    options: ReplacementBuilderOptions = {},
  ): Promise<FundedReplacement> {
    const skeleton = buildSkeleton(pair, consolidation, requirements.descendants);
    if (skeleton.dropped !== undefined) {
      const droppedInput = (skeleton.dropped === 'first' ? pair.first : pair.second).tx.inputs[0];
      if (droppedInput !== undefined) {
        this.logger.warn(
          `Dropping ${skeleton.dropped} input ${formatOutpoint(droppedInput.prevout)}: it spends a descendant`,
        );
      }
    }

    const funded = await this.fund(skeleton.tx, consolidation);
    if (funded.changePosition < 0) {
      throw new UnsupportedNoChangeCaseError();
    }

    const sequence = options.optIn ? SEQUENCE_OPT_IN : SEQUENCE_OPT_OUT;
    const unsigned = withSequence(decodeTransaction(funded.hex), sequence);
    if (funded.changePosition >= unsigned.outputs.length) {
      throw new FundingFailedError(
        `change position ${funded.changePosition} is outside the ${unsigned.outputs.length} outputs`,
      );
    }

    this.logger.debug?.('Funded replacement', {
      inputs: unsigned.inputs.length,
      outputs: unsigned.outputs.length,
      fee: funded.fee,
      changePosition: funded.changePosition,
      sequence,
    });

    const tx = await signWithWallet(this.rpc, unsigned);
    const result: FundedReplacement = { tx, fee: funded.fee, changeIndex: funded.changePosition };
    return skeleton.dropped === undefined ? result : { ...result, dropped: skeleton.dropped };
  }

  private async fund(tx: TransactionData, consolidation: OutputConsolidation): Promise<FundResult> {
    try {
      return await this.rpc.fundRawTransaction(
        encodeTransaction(tx),
        consolidation.changeAnchor !== undefined ? { changeScript: consolidation.changeAnchor } : {},
      );
    } catch (error) {
      if (error instanceof NodeRpcError) {
        throw new FundingFailedError(error.message, { cause: error });
      }
      throw error;
    }
  }
}
