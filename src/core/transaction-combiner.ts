/**
 * Transaction Combiner
 * Runs the combine pipeline end to end against one node
 */

import type { CombineOptions, CombineResult } from '../interfaces/combine.interface.ts';
import type { NodeRpc } from '../interfaces/node-rpc.interface.ts';
import { type Logger, NullLogger } from '../utils/logger.ts';
import type { ByteOrder } from '../utils/transaction-id.ts';
import { ConflictVerifier } from './conflict-verifier.ts';
import { FeeAccountant } from './fee-accountant.ts';
import { FeeAdjuster } from './fee-adjuster.ts';
import { InputValidator, parseTransactionIds } from './input-validator.ts';
import { OutputConsolidator } from './output-consolidator.ts';
import { ReplacementBuilder } from './replacement-builder.ts';

export interface TransactionCombinerConfig {
  rpc: NodeRpc;
  logger?: Logger;
  /** Byte order of the txids passed to {@link TransactionCombiner.combine} */
  byteOrder?: ByteOrder;
}

/**
 * Replace two unconfirmed wallet transactions with one that pays all of their
 * non-change outputs.
 *
 * @example
 * ```typescript
 * const combiner = new TransactionCombiner({ rpc: new BitcoinCoreRpcProvider(config) });
 * const result = await combiner.combine(txid1, txid2, { dryRun: true });
 * if (result.publish.kind === 'dry-run') console.log(result.publish.hex);
 * ```
 */
export class TransactionCombiner {
  private readonly rpc: NodeRpc;
  private readonly logger: Logger;
  private readonly byteOrder: ByteOrder;

  constructor(config: TransactionCombinerConfig) {
    this.rpc = config.rpc;
    this.logger = config.logger ?? new NullLogger();
    this.byteOrder = config.byteOrder ?? 'display';
  }

  async combine(txid1: string, txid2: string, options: CombineOptions = {}): Promise<CombineResult> {
    const ids = parseTransactionIds(txid1, txid2, this.byteOrder);

    const pair = await new InputValidator(this.rpc, this.logger).validate(ids);
    const consolidation = await new OutputConsolidator(this.rpc, this.logger).consolidate(pair);
    const requirements = await new FeeAccountant(this.rpc, this.logger).assess(pair);

    const funded = await new ReplacementBuilder(this.rpc, this.logger).build(
      pair,
      consolidation,
      requirements,
      { optIn: options.optIn ?? false },
    );
    const adjusted = await new FeeAdjuster(this.rpc, this.logger).adjust(funded, requirements);

    const publish = await new ConflictVerifier(this.rpc, this.logger).publish(
      adjusted.tx,
      pair,
      options.dryRun ?? false,
    );

    return {
      publish,
      fee: adjusted.fee,
      size: adjusted.size,
      feeRate: adjusted.feeRate,
      requirements,
      consolidation,
    };
  }
}
