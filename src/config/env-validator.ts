/**
 * Environment Variable Configuration Validator for the node RPC connection
 */

import process from 'node:process';

import { type NetworkName, parseNetworkName, type RpcConfigOptions } from './rpc-config.ts';

export type Environment = Record<string, string | undefined>;

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  config: RpcConfigOptions;
}

/**
 * Recognised environment variables
 */
export const RPC_ENV_VARS = {
  BITCOIN_NETWORK: {
    type: 'string' as const,
    description: 'Bitcoin network (mainnet, testnet)',
    example: 'testnet',
  },
  BITCOIN_RPC_URL: {
    type: 'url' as const,
    description: 'Node RPC URL; overrides rpcconnect/rpcport from bitcoin.conf',
    example: 'http://127.0.0.1:18332',
  },
  BITCOIN_RPC_USERNAME: {
    type: 'string' as const,
    description: 'RPC user name',
    example: 'alice',
  },
  BITCOIN_RPC_PASSWORD: {
    type: 'string' as const,
    description: 'RPC password',
    example: 'test-secret',
  },
  BITCOIN_RPC_WALLET: {
    type: 'string' as const,
    description: 'Wallet name on a multi-wallet node',
    example: 'savings',
  },
  BITCOIN_RPC_TIMEOUT: {
    type: 'number' as const,
    description: 'Request timeout in milliseconds',
    example: '30000',
    min: 1,
    max: 3_600_000,
  },
  BITCOIN_DATADIR: {
    type: 'string' as const,
    description: 'Node data directory (bitcoin.conf and .cookie are read from here)',
    example: '/home/alice/.bitcoin',
  },
} as const;

function validateNumber(
  value: string,
  varName: string,
  options: { min?: number; max?: number } = {},
): { errors: string[]; parsed?: number } {
  const parsed = Number(value.trim());

  if (!Number.isInteger(parsed)) {
    return { errors: [`${varName}: Invalid number "${value}"`] };
  }

  const errors: string[] = [];
  if (options.min !== undefined && parsed < options.min) {
    errors.push(`${varName}: Value ${parsed} is below minimum ${options.min}`);
  }
  if (options.max !== undefined && parsed > options.max) {
    errors.push(`${varName}: Value ${parsed} is above maximum ${options.max}`);
  }

  return errors.length === 0 ? { errors, parsed } : { errors };
}

function validateUrl(value: string, varName: string): string[] {
  try {
    new URL(value);
    return [];
  } catch {
    return [`${varName}: Invalid URL "${value}"`];
  }
}

/**
 * Read and validate the RPC environment variables
 */
export function loadRpcEnvironmentConfig(env: Environment = process.env): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const config: RpcConfigOptions = {};

  const network = env.BITCOIN_NETWORK;
  if (network) {
    const parsed: NetworkName | undefined = parseNetworkName(network);
    if (parsed === undefined) {
      errors.push(`BITCOIN_NETWORK: Invalid value "${network}". Allowed: mainnet, testnet`);
    } else {
      config.network = parsed;
    }
  }

  const url = env.BITCOIN_RPC_URL;
  if (url) {
    const urlErrors = validateUrl(url, 'BITCOIN_RPC_URL');
    errors.push(...urlErrors);
    if (urlErrors.length === 0) {
      config.url = url.replace(/\/+$/, '');
    }
  }

  if (env.BITCOIN_RPC_USERNAME) {
    config.username = env.BITCOIN_RPC_USERNAME;
  }
  if (env.BITCOIN_RPC_PASSWORD !== undefined && env.BITCOIN_RPC_PASSWORD !== '') {
    config.password = env.BITCOIN_RPC_PASSWORD;
  }
  if (config.password !== undefined && config.username === undefined) {
    warnings.push('BITCOIN_RPC_PASSWORD is set without BITCOIN_RPC_USERNAME');
  }

  if (env.BITCOIN_RPC_WALLET) {
    config.wallet = env.BITCOIN_RPC_WALLET;
  }

  const timeout = env.BITCOIN_RPC_TIMEOUT;
  if (timeout) {
    const validation = validateNumber(timeout, 'BITCOIN_RPC_TIMEOUT', RPC_ENV_VARS.BITCOIN_RPC_TIMEOUT);
    errors.push(...validation.errors);
    if (validation.parsed !== undefined) {
      config.timeout = validation.parsed;
    }
  }

  if (env.BITCOIN_DATADIR) {
    config.datadir = env.BITCOIN_DATADIR;
  }

  return { valid: errors.length === 0, errors, warnings, config };
}

export function getRpcEnvironmentDocumentation(): string {
  return Object.entries(RPC_ENV_VARS)
    .map(([name, spec]) => `   ${name}=${spec.example}\n      ${spec.description}`)
    .join('\n');
}
