/**
 * Configuration Loader for the node RPC connection
 * Loads configuration with priority:
 * 1. Runtime options (command line flags)
 * 2. Environment variables
 * 3. bitcoin.conf (rpcuser, rpcpassword, rpcconnect, rpcport)
 * 4. The node's .cookie file, for credentials only
 * 5. Default values
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import process from 'node:process';

import { ConfigurationError } from '../errors/index.ts';
import type { Logger } from '../utils/logger.ts';
import { parseBitcoinConf, parseCookie } from './bitcoin-conf.ts';
import { type Environment, getRpcEnvironmentDocumentation, loadRpcEnvironmentConfig } from './env-validator.ts';
import {
  defaultRpcUrl,
  NETWORK_DATA_SUBDIRS,
  type NetworkName,
  type RpcConfig,
  type RpcConfigOptions,
  validateConfig,
} from './rpc-config.ts';

export interface ConfigSources {
  env?: Environment;
  homeDir?: string;
  platform?: NodeJS.Platform;
  logger?: Logger;
}

export class ConfigLoader {
  private readonly env: Environment;
  private readonly homeDir: string;
  private readonly platform: NodeJS.Platform;
  private readonly logger?: Logger;

  constructor(sources: ConfigSources = {}) {
    this.env = sources.env ?? process.env;
    this.homeDir = sources.homeDir ?? os.homedir();
    this.platform = sources.platform ?? process.platform;
    this.logger = sources.logger;
  }

  static loadConfig(options: RpcConfigOptions = {}, sources: ConfigSources = {}): RpcConfig {
    return new ConfigLoader(sources).load(options);
  }

  load(options: RpcConfigOptions = {}): RpcConfig {
    const envResult = loadRpcEnvironmentConfig(this.env);
    if (!envResult.valid) {
      throw new ConfigurationError(envResult.errors);
    }
    for (const warning of envResult.warnings) {
      this.logger?.warn(warning);
    }
    const envConfig = envResult.config;

    const network: NetworkName = options.network ?? envConfig.network ?? 'mainnet';
    const datadir = options.datadir ?? envConfig.datadir ?? this.defaultDatadir();
    const conf = this.loadConfFile(options.confFile ?? path.join(datadir, 'bitcoin.conf'), network);

    const confPort = conf.rpcport !== undefined ? Number(conf.rpcport) : undefined;
    if (confPort !== undefined && !Number.isInteger(confPort)) {
      throw new ConfigurationError([`bitcoin.conf: invalid rpcport "${conf.rpcport}"`]);
    }

    let username = options.username ?? envConfig.username ?? conf.rpcuser ?? '';
    let password = options.password ?? envConfig.password ?? conf.rpcpassword ?? '';

    if (!username) {
      const cookie = this.loadCookie(conf.rpccookiefile, datadir, network);
      if (cookie) {
        username = cookie.username;
        password = cookie.password;
      }
    }

    const config: RpcConfig = {
      network,
      url: options.url ?? envConfig.url ?? defaultRpcUrl(network, conf.rpcconnect, confPort),
      username,
      password,
      datadir,
    };

    const wallet = options.wallet ?? envConfig.wallet ?? conf.wallet;
    if (wallet) {
      config.wallet = wallet;
    }
    const timeout = options.timeout ?? envConfig.timeout;
    if (timeout !== undefined) {
      config.timeout = timeout;
    }

    const validationErrors = validateConfig(config);
    if (validationErrors.length > 0) {
      throw new ConfigurationError(validationErrors);
    }

    return config;
  }

  private defaultDatadir(): string {
    switch (this.platform) {
      case 'darwin':
        return path.join(this.homeDir, 'Library', 'Application Support', 'Bitcoin');
      case 'win32':
        return path.join(this.env.APPDATA ?? path.join(this.homeDir, 'AppData', 'Roaming'), 'Bitcoin');
      default:
        return path.join(this.homeDir, '.bitcoin');
    }
  }

  private loadConfFile(confPath: string, network: NetworkName): Record<string, string> {
    if (!fs.existsSync(confPath)) {
      this.logger?.debug?.(`No config file at ${confPath}`);
      return {};
    }
    return parseBitcoinConf(fs.readFileSync(confPath, 'utf-8'), network);
  }

  private loadCookie(
    cookieFile: string | undefined,
    datadir: string,
    network: NetworkName,
  ): { username: string; password: string } | undefined {
    const cookiePath = cookieFile !== undefined
      ? path.resolve(datadir, NETWORK_DATA_SUBDIRS[network], cookieFile)
      : path.join(datadir, NETWORK_DATA_SUBDIRS[network], '.cookie');

    if (!fs.existsSync(cookiePath)) {
      return undefined;
    }
    this.logger?.debug?.(`Using RPC cookie ${cookiePath}`);
    return parseCookie(fs.readFileSync(cookiePath, 'utf-8'));
  }

  /**
   * Get configuration documentation
   */
  static getConfigDocumentation(): string {
    return `
Environment Variables:
${getRpcEnvironmentDocumentation()}

Configuration File:
   <datadir>/bitcoin.conf, read the same way the node reads it:
   rpcuser=alice
   rpcpassword=test-secret
   rpcconnect=127.0.0.1
   [test]
   rpcport=18332

Without rpcuser the node's cookie file is used (<datadir>/.cookie, or
<datadir>/testnet3/.cookie on testnet).

Configuration Priority Order:
1. Command line flags (--rpc-url, --rpc-user, ...)
2. Environment variables
3. bitcoin.conf
4. Cookie file (credentials only)
5. Defaults: 127.0.0.1:8332 on mainnet, 127.0.0.1:18332 on testnet
    `;
  }
}
