/**
 * Node RPC configuration
 */

import * as bitcoin from 'bitcoinjs-lib';
import type { Network } from 'bitcoinjs-lib';

export type NetworkName = 'mainnet' | 'testnet';

export interface RpcConfig {
  network: NetworkName;
  /** Base URL of the node's RPC server, without the wallet path */
  url: string;
  username: string;
  password: string;
  /** Wallet to address on a multi-wallet node */
  wallet?: string;
  /** Request timeout in ms; unset leaves the HTTP client's default (none) */
  timeout?: number;
  /** Node data directory used to find bitcoin.conf and the cookie file */
  datadir: string;
}

/**
 * Values a caller can force, highest priority
 */
export interface RpcConfigOptions {
  network?: NetworkName;
  url?: string;
  username?: string;
  password?: string;
  wallet?: string;
  timeout?: number;
  datadir?: string;
  /** Path to bitcoin.conf (default: <datadir>/bitcoin.conf) */
  confFile?: string;
}

export const DEFAULT_RPC_HOST = '127.0.0.1';

export const DEFAULT_RPC_PORTS: Record<NetworkName, number> = {
  mainnet: 8332,
  testnet: 18332,
};

/** Subdirectory of the datadir holding per-network files such as .cookie */
export const NETWORK_DATA_SUBDIRS: Record<NetworkName, string> = {
  mainnet: '',
  testnet: 'testnet3',
};

/** Section name used in bitcoin.conf for each network */
export const CONF_SECTIONS: Record<NetworkName, string> = {
  mainnet: 'main',
  testnet: 'test',
};

export function getBitcoinNetwork(name: NetworkName): Network {
  return name === 'testnet' ? bitcoin.networks.testnet : bitcoin.networks.bitcoin;
}

export function parseNetworkName(value: string): NetworkName | undefined {
  switch (value.toLowerCase().trim()) {
    case 'mainnet':
    case 'main':
    case 'bitcoin':
      return 'mainnet';
    case 'testnet':
    case 'testnet3':
    case 'test':
      return 'testnet';
    default:
      return undefined;
  }
}

export interface HostPort {
  host: string;
  port?: number;
}

/**
 * Split `host`, `host:port`, `[v6]` or `[v6]:port` the way bitcoin.conf's rpcconnect takes them.
 * A bare IPv6 address has no port.
 */
export function splitHostPort(value: string): HostPort {
  const bracketed = /^\[([^\]]+)\](?::(\d+))?$/.exec(value);
  if (bracketed?.[1] !== undefined) {
    return bracketed[2] !== undefined ? { host: bracketed[1], port: Number(bracketed[2]) } : { host: bracketed[1] };
  }

  const withPort = /^([^:]+):(\d+)$/.exec(value);
  if (withPort?.[1] !== undefined && withPort[2] !== undefined) {
    return { host: withPort[1], port: Number(withPort[2]) };
  }
  return { host: value };
}

/**
 * URL from rpcconnect and rpcport; rpcport wins over a port given in rpcconnect
 */
export function defaultRpcUrl(network: NetworkName, connect = DEFAULT_RPC_HOST, port?: number): string {
  const target = splitHostPort(connect);
  const host = target.host.includes(':') ? `[${target.host}]` : target.host;
  return `http://${host}:${port ?? target.port ?? DEFAULT_RPC_PORTS[network]}`;
}

export function validateConfig(config: RpcConfig): string[] {
  const errors: string[] = [];

  try {
    const url = new URL(config.url);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      errors.push(`RPC URL must use http or https: ${config.url}`);
    }
  } catch {
    errors.push(`Invalid RPC URL: ${config.url}`);
  }

  if (!config.username) {
    errors.push(
      'No RPC credentials: set rpcuser/rpcpassword, BITCOIN_RPC_USERNAME/BITCOIN_RPC_PASSWORD, or run the node with a cookie file',
    );
  }

  if (config.timeout !== undefined && (!Number.isInteger(config.timeout) || config.timeout <= 0)) {
    errors.push(`RPC timeout must be a positive integer, got ${config.timeout}`);
  }

  return errors;
}

/**
 * Configuration as JSON with the password masked
 */
export function formatRpcConfig(config: RpcConfig): string {
  return JSON.stringify(
    {
      ...config,
      password: config.password ? '***' : undefined,
    },
    null,
    2,
  );
}
