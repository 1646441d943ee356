/**
 * @module Providers
 * @description Node RPC implementations the combine pipeline runs against.
 *
 * @example
 * ```typescript
 * import { BitcoinCoreRpcProvider, ConfigLoader } from 'tx-combiner';
 *
 * const rpc = new BitcoinCoreRpcProvider(ConfigLoader.loadConfig({ network: 'testnet' }));
 * const info = await rpc.getNetworkInfo();
 * ```
 */

export * from './bitcoin-core-rpc-provider.ts';
