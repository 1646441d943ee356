/**
 * Interfaces shared by the pipeline stages and node implementations
 */

export * from './transaction.interface.ts';
export type * from './node-rpc.interface.ts';
export type * from './combine.interface.ts';
