/**
 * bitcoin.conf and .cookie parsing
 */

import { CONF_SECTIONS, type NetworkName } from './rpc-config.ts';

const NETWORK_SECTIONS = ['main', 'test', 'testnet4', 'signet', 'regtest'];

/**
 * Settings that apply to `network`: top-level keys, then `[section]` keys and
 * `section.key` prefixed keys, which override them. Later lines win.
 */
export function parseBitcoinConf(content: string, network: NetworkName): Record<string, string> {
  const wanted = CONF_SECTIONS[network];
  const global: Record<string, string> = {};
  const scoped: Record<string, string> = {};
  let section: string | undefined;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim();
    if (line === '') continue;

    const header = /^\[([^\]]+)\]$/.exec(line);
    if (header?.[1] !== undefined) {
      section = header[1].trim();
      continue;
    }

    const separator = line.indexOf('=');
    if (separator <= 0) continue;

    let key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();
    let keySection = section;

    const dot = key.indexOf('.');
    if (dot > 0 && NETWORK_SECTIONS.includes(key.slice(0, dot))) {
      keySection = key.slice(0, dot);
      key = key.slice(dot + 1);
    }

    if (keySection === undefined) {
      global[key] = value;
    } else if (keySection === wanted) {
      scoped[key] = value;
    }
  }

  return { ...global, ...scoped };
}

export interface CookieCredentials {
  username: string;
  password: string;
}

/**
 * `.cookie` holds a single `user:password` line
 */
export function parseCookie(content: string): CookieCredentials | undefined {
  const line = content.trim();
  const separator = line.indexOf(':');
  if (separator <= 0) {
    return undefined;
  }
  return {
    username: line.slice(0, separator),
    password: line.slice(separator + 1),
  };
}
