/**
 * Configuration module exports
 */

export {
  CONF_SECTIONS,
  DEFAULT_RPC_HOST,
  DEFAULT_RPC_PORTS,
  defaultRpcUrl,
  formatRpcConfig,
  getBitcoinNetwork,
  type HostPort,
  NETWORK_DATA_SUBDIRS,
  type NetworkName,
  parseNetworkName,
  type RpcConfig,
  type RpcConfigOptions,
  splitHostPort,
  validateConfig,
} from './rpc-config.ts';

export { type CookieCredentials, parseBitcoinConf, parseCookie } from './bitcoin-conf.ts';

export {
  type Environment,
  getRpcEnvironmentDocumentation,
  loadRpcEnvironmentConfig,
  RPC_ENV_VARS,
  type ValidationResult,
} from './env-validator.ts';

export { ConfigLoader, type ConfigSources } from './config-loader.ts';
