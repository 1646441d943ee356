/**
 * Utility exports
 */

export * from './amount.ts';
export * from './logger.ts';
export * from './transaction-data.ts';
export * from './transaction-id.ts';
export * from './type-guards.ts';
