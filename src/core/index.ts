/**
 * @module Core
 * @description The combine pipeline: validate both originals, consolidate their outputs,
 * work out the fee the replacement owes, build and fund it through the wallet, take the
 * fee out of change, then verify it conflicts with both originals and publish it.
 *
 * @example Running the stages by hand
 * ```typescript
 * import { FeeAccountant, InputValidator, parseTransactionIds } from 'tx-combiner';
 *
 * const pair = await new InputValidator(rpc).validate(parseTransactionIds(txid1, txid2));
 * const requirements = await new FeeAccountant(rpc).assess(pair);
 * console.log(requirements.requiredFee, requirements.minFeeRate);
 * ```
 */

export * from './input-validator.ts';
export * from './output-consolidator.ts';
export * from './fee-accountant.ts';
export * from './replacement-builder.ts';
export * from './fee-adjuster.ts';
export * from './conflict-verifier.ts';
export * from './transaction-combiner.ts';
