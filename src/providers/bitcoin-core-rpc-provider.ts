/**
 * Bitcoin Core RPC Provider
 * JSON-RPC 1.0 over HTTP against a wallet-enabled bitcoind
 */

import type { Buffer } from 'node:buffer';

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import * as bitcoin from 'bitcoinjs-lib';
import type { Network } from 'bitcoinjs-lib';

import { getBitcoinNetwork, type RpcConfig } from '../config/rpc-config.ts';
import { NodeRpcError, RpcTransportError } from '../errors/index.ts';
import type {
  DescendantFees,
  FundOptions,
  FundResult,
  MempoolEntry,
  NetworkInfo,
  NodeRpc,
  RawTransactionInfo,
  SignResult,
  WalletTransactionInfo,
} from '../interfaces/node-rpc.interface.ts';
import { btcToSats } from '../utils/amount.ts';
import { type Logger, NullLogger } from '../utils/logger.ts';
import { TransactionId } from '../utils/transaction-id.ts';
import { getOptionalNumber, getOptionalString, getRpcErrorDetails, isRecord } from '../utils/type-guards.ts';

/** RPC_INVALID_ADDRESS_OR_KEY: unknown txid, not in mempool, not in wallet */
export const RPC_INVALID_ADDRESS_OR_KEY = -5;

export interface BitcoinCoreRpcProviderOptions {
  /** HTTP client to send requests through (default: a fresh axios instance) */
  http?: AxiosInstance;
  logger?: Logger;
}

export class BitcoinCoreRpcProvider implements NodeRpc {
  private readonly config: RpcConfig;
  private readonly network: Network;
  private readonly http: AxiosInstance;
  private readonly logger: Logger;
  private requestId = 0;

  constructor(config: RpcConfig, options: BitcoinCoreRpcProviderOptions = {}) {
    this.config = config;
    this.network = getBitcoinNetwork(config.network);
    this.http = options.http ?? axios.create();
    this.logger = options.logger ?? new NullLogger();
  }

  /**
   * Call an RPC method and return its `result`
   */
  async call(method: string, params: unknown[] = []): Promise<unknown> {
    const id = ++this.requestId;
    this.logger.debug?.(`RPC ${method}`, { id });

    const response = await this.post(method, { jsonrpc: '1.0', id, method, params });

    if (response.status === 401 || response.status === 403) {
      throw new RpcTransportError(method, `authentication rejected (HTTP ${response.status})`);
    }

    const body = response.data;
    if (!isRecord(body)) {
      throw new RpcTransportError(method, `unexpected HTTP ${response.status} response`);
    }

    const rpcError = getRpcErrorDetails(body.error);
    if (rpcError !== undefined) {
      throw new NodeRpcError(method, rpcError.code, rpcError.message);
    }

    if (response.status >= 400) {
      throw new RpcTransportError(method, `HTTP ${response.status} ${response.statusText}`);
    }

    return body.result;
  }

  async getWalletTransaction(txid: TransactionId): Promise<WalletTransactionInfo | null> {
    const result = await this.callOrNotFound('gettransaction', [txid.toHex()]);
    if (result === undefined) {
      return null;
    }
    const record = this.expectRecord('gettransaction', result);
    return { confirmations: getOptionalNumber(record.confirmations) };
  }

  async getRawTransaction(txid: TransactionId): Promise<RawTransactionInfo> {
    const record = this.expectRecord(
      'getrawtransaction',
      await this.call('getrawtransaction', [txid.toHex(), true]),
    );
    return { hex: this.expectString('getrawtransaction', record, 'hex') };
  }

  async isMine(script: Buffer): Promise<boolean> {
    const address = this.scriptToAddress(script);
    if (address === undefined) {
      return false;
    }
    const record = this.expectRecord('getaddressinfo', await this.call('getaddressinfo', [address]));
    return record.ismine === true;
  }

  async getMempoolEntry(txid: TransactionId): Promise<MempoolEntry | null> {
    const result = await this.callOrNotFound('getmempoolentry', [txid.toHex()]);
    if (result === undefined) {
      return null;
    }
    const record = this.expectRecord('getmempoolentry', result);
    return { modifiedFee: this.modifiedFee('getmempoolentry', record) };
  }

  async getMempoolDescendants(txid: TransactionId): Promise<DescendantFees | null> {
    const result = await this.callOrNotFound('getmempooldescendants', [txid.toHex(), true]);
    if (result === undefined) {
      return null;
    }
    const descendants = new Map<string, number>();
    for (const [descendantId, entry] of Object.entries(this.expectRecord('getmempooldescendants', result))) {
      descendants.set(
        descendantId,
        this.modifiedFee('getmempooldescendants', this.expectRecord('getmempooldescendants', entry)),
      );
    }
    return descendants;
  }

  async fundRawTransaction(hex: string, options: FundOptions = {}): Promise<FundResult> {
    const fundOptions: Record<string, unknown> = {};
    if (options.changeScript !== undefined) {
      const changeAddress = this.scriptToAddress(options.changeScript);
      if (changeAddress !== undefined) {
        fundOptions.changeAddress = changeAddress;
      } else {
        this.logger.warn('Change script has no address form; letting the wallet pick a change address');
      }
    }

    const record = this.expectRecord(
      'fundrawtransaction',
      await this.call('fundrawtransaction', [hex, fundOptions]),
    );
    return {
      hex: this.expectString('fundrawtransaction', record, 'hex'),
      fee: btcToSats(this.expectNumber('fundrawtransaction', record, 'fee')),
      changePosition: this.expectNumber('fundrawtransaction', record, 'changepos'),
    };
  }

  async signRawTransaction(hex: string): Promise<SignResult> {
    const method = 'signrawtransactionwithwallet';
    const record = this.expectRecord(method, await this.call(method, [hex]));
    const errors = Array.isArray(record.errors)
      ? record.errors.map((error) => (isRecord(error) ? getOptionalString(error.error, 'unknown error') : String(error)))
      : [];
    return {
      hex: this.expectString(method, record, 'hex'),
      complete: record.complete === true,
      errors,
    };
  }

  async sendRawTransaction(hex: string): Promise<TransactionId> {
    const result = await this.call('sendrawtransaction', [hex]);
    if (typeof result !== 'string') {
      throw new RpcTransportError('sendrawtransaction', 'expected a txid string');
    }
    return TransactionId.fromHex(result);
  }

  async getNetworkInfo(): Promise<NetworkInfo> {
    const record = this.expectRecord('getnetworkinfo', await this.call('getnetworkinfo'));
    return { relayFee: btcToSats(this.expectNumber('getnetworkinfo', record, 'relayfee')) };
  }

  private endpoint(): string {
    const base = this.config.url.replace(/\/+$/, '');
    return this.config.wallet !== undefined
      ? `${base}/wallet/${encodeURIComponent(this.config.wallet)}`
      : base;
  }

  private async post(method: string, body: Record<string, unknown>): Promise<AxiosResponse<unknown>> {
    try {
      return await this.http.post<unknown>(this.endpoint(), body, {
        auth: { username: this.config.username, password: this.config.password },
        headers: { 'Content-Type': 'application/json' },
        timeout: this.config.timeout,
        // Bitcoin Core reports RPC errors with HTTP 500 and a JSON body
        validateStatus: () => true,
      });
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new RpcTransportError(method, error.message, { cause: error });
      }
      throw error;
    }
  }

  /**
   * Like {@link call}, but resolves undefined when the node reports the id unknown
   */
  private async callOrNotFound(method: string, params: unknown[]): Promise<unknown> {
    try {
      return await this.call(method, params);
    } catch (error) {
      if (error instanceof NodeRpcError && error.rpcCode === RPC_INVALID_ADDRESS_OR_KEY) {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Modified fee in satoshis; `fees.modified` on current nodes, `modifiedfee` on older ones
   */
  private modifiedFee(method: string, entry: Record<string, unknown>): number {
    if (isRecord(entry.fees) && typeof entry.fees.modified === 'number') {
      return btcToSats(entry.fees.modified);
    }
    return btcToSats(this.expectNumber(method, entry, 'modifiedfee'));
  }

  private scriptToAddress(script: Buffer): string | undefined {
    try {
      return bitcoin.address.fromOutputScript(script, this.network);
    } catch {
      return undefined;
    }
  }

  private expectRecord(method: string, value: unknown): Record<string, unknown> {
    if (!isRecord(value)) {
      throw new RpcTransportError(method, 'expected an object result');
    }
    return value;
  }

  private expectString(method: string, record: Record<string, unknown>, key: string): string {
    const value = record[key];
    if (typeof value !== 'string') {
      throw new RpcTransportError(method, `missing string field "${key}"`);
    }
    return value;
  }

  private expectNumber(method: string, record: Record<string, unknown>, key: string): number {
    const value = record[key];
    if (typeof value !== 'number') {
      throw new RpcTransportError(method, `missing number field "${key}"`);
    }
    return value;
  }
}
