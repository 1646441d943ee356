/**
 * @module tx-combiner
 *
 * Combine two unconfirmed replace-by-fee wallet transactions into a single replacement
 * that conflicts with both, pays every non-change output of both exactly once, sends
 * change to one of the wallet's existing outputs, and outbids the originals and all
 * of their descendants.
 *
 * @example Dry run against a local testnet node
 * ```typescript
 * import { BitcoinCoreRpcProvider, ConfigLoader, TransactionCombiner } from 'tx-combiner';
 *
 * const config = ConfigLoader.loadConfig({ network: 'testnet' });
 * const combiner = new TransactionCombiner({ rpc: new BitcoinCoreRpcProvider(config) });
 * const result = await combiner.combine(txid1, txid2, { dryRun: true });
 * ```
 */

export * from './core/index.ts';
export * from './config/index.ts';
export * from './errors/index.ts';
export * from './interfaces/index.ts';
export * from './providers/index.ts';
export * from './utils/index.ts';
