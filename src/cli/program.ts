/**
 * Command line front end
 *
 * Prints only the replacement (hex on a dry run, txid otherwise) on stdout; logs and
 * errors go to stderr.
 */

import { Console } from 'node:console';
import process from 'node:process';
import type { Writable } from 'node:stream';

import { Command, CommanderError, Option } from 'commander';

import { ConfigLoader } from '../config/config-loader.ts';
import type { RpcConfig, RpcConfigOptions } from '../config/rpc-config.ts';
import { formatRpcConfig } from '../config/rpc-config.ts';
import { TransactionCombiner } from '../core/transaction-combiner.ts';
import { CombineError } from '../errors/index.ts';
import type { NodeRpc } from '../interfaces/node-rpc.interface.ts';
import { BitcoinCoreRpcProvider } from '../providers/bitcoin-core-rpc-provider.ts';
import { formatFeeRatePerKb, formatMoney } from '../utils/amount.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';
import type { ByteOrder } from '../utils/transaction-id.ts';

export const EXIT_SUCCESS = 0;
/** Bad input, a node refusal, or a configuration problem */
export const EXIT_USER_ERROR = 1;
/** A broken internal invariant */
export const EXIT_INTERNAL_ERROR = 2;

export const VERSION = '0.1.0';

export interface CliOptions {
  verbose?: boolean;
  testnet?: boolean;
  dryRun?: boolean;
  optIn?: boolean;
  byteOrder: ByteOrder;
  rpcUrl?: string;
  rpcUser?: string;
  rpcPassword?: string;
  rpcWallet?: string;
  datadir?: string;
  conf?: string;
}

export interface CliDependencies {
  stdout?: Writable;
  stderr?: Writable;
  loadConfig?: (options: RpcConfigOptions, logger: Logger) => RpcConfig;
  createRpc?: (config: RpcConfig, logger: Logger) => NodeRpc;
}

export function toConfigOptions(options: CliOptions): RpcConfigOptions {
  const config: RpcConfigOptions = {};
  if (options.testnet) config.network = 'testnet';
  if (options.rpcUrl !== undefined) config.url = options.rpcUrl;
  if (options.rpcUser !== undefined) config.username = options.rpcUser;
  if (options.rpcPassword !== undefined) config.password = options.rpcPassword;
  if (options.rpcWallet !== undefined) config.wallet = options.rpcWallet;
  if (options.datadir !== undefined) config.datadir = options.datadir;
  if (options.conf !== undefined) config.confFile = options.conf;
  return config;
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof CombineError) {
    return error.kind === 'internal' ? EXIT_INTERNAL_ERROR : EXIT_USER_ERROR;
  }
  return EXIT_INTERNAL_ERROR;
}

export function createProgram(
  run: (txid1: string, txid2: string, options: CliOptions) => Promise<void>,
  stdout: Writable,
  stderr: Writable,
): Command {
  return new Command()
    .name('tx-combiner')
    .description('Combine two unconfirmed RBF transactions into one replacement')
    .version(VERSION)
    .argument('<txid1>', 'first transaction to replace')
    .argument('<txid2>', 'second transaction to replace')
    .option('-v, --verbose', 'debug logging')
    .option('-t, --testnet', 'use testnet parameters')
    .option('-n, --dry-run', 'print the signed replacement hex instead of broadcasting')
    .option('-o, --opt-in', 'let the replacement itself be replaced (full RBF opt-in)')
    .addOption(
      new Option('--byte-order <order>', 'byte order of the txid arguments')
        .choices(['display', 'internal'])
        .default('display'),
    )
    .option('--rpc-url <url>', 'node RPC URL')
    .option('--rpc-user <user>', 'RPC user name')
    .option('--rpc-password <password>', 'RPC password')
    .option('--rpc-wallet <name>', 'wallet on a multi-wallet node')
    .option('--datadir <dir>', 'node data directory')
    .option('--conf <file>', 'path to bitcoin.conf')
    .addHelpText('after', `\n${ConfigLoader.getConfigDocumentation()}`)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => stdout.write(text),
      writeErr: (text) => stderr.write(text),
    })
    .action(async (txid1: string, txid2: string, options: CliOptions) => {
      await run(txid1, txid2, options);
    });
}

/**
 * Run the command line; resolves the process exit status
 */
export async function main(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const sink = new Console({ stdout: stderr, stderr });
  let logger: Logger = new ConsoleLogger({ level: 'warn', sink });

  const loadConfig = deps.loadConfig
    ?? ((options: RpcConfigOptions, log: Logger) => ConfigLoader.loadConfig(options, { logger: log }));
  const createRpc = deps.createRpc
    ?? ((config: RpcConfig, log: Logger) => new BitcoinCoreRpcProvider(config, { logger: log }));

  const run = async (txid1: string, txid2: string, options: CliOptions): Promise<void> => {
    if (options.verbose) {
      logger = new ConsoleLogger({ level: 'debug', sink });
    }

    const config = loadConfig(toConfigOptions(options), logger);
    logger.debug?.(`RPC configuration: ${formatRpcConfig(config)}`);

    const combiner = new TransactionCombiner({
      rpc: createRpc(config, logger),
      logger,
      byteOrder: options.byteOrder,
    });
    const result = await combiner.combine(txid1, txid2, {
      dryRun: options.dryRun ?? false,
      optIn: options.optIn ?? false,
    });

    logger.info(
      `Replacement pays ${formatMoney(result.fee)} BTC, ` +
        `${formatFeeRatePerKb(result.fee, result.size)} BTC/KB`,
    );
    stdout.write(
      `${result.publish.kind === 'dry-run' ? result.publish.hex : result.publish.txid.toHex()}\n`,
    );
  };

  try {
    await createProgram(run, stdout, stderr).parseAsync(argv, { from: 'user' });
    return EXIT_SUCCESS;
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander has already written its own message
      return error.exitCode;
    }
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`error: ${message}`);
    if (error instanceof Error && error.cause !== undefined) {
      logger.debug?.('Caused by', { cause: error.cause });
    }
    return exitCodeFor(error);
  }
}
