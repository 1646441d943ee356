/**
 * Satoshi/BTC conversion and formatting
 */

export const SATS_PER_BTC = 100_000_000;

/**
 * Convert a BTC amount as reported by the node's JSON-RPC to satoshis
 */
export function btcToSats(btc: number): number {
  return Math.round(btc * SATS_PER_BTC);
}

/**
 * Render satoshis as a BTC decimal with trailing zeros stripped, e.g. 1500 -> "0.000015".
 * Fractional satoshis are truncated.
 */
export function formatMoney(sats: number): string {
  const sign = sats < 0 ? '-' : '';
  const absolute = Math.abs(sats);
  const whole = Math.floor(absolute / SATS_PER_BTC);
  const fraction = Math.floor(absolute - whole * SATS_PER_BTC);

  let rendered = `${whole}.${fraction.toString().padStart(8, '0')}`.replace(/0+$/, '');
  if (rendered.endsWith('.')) {
    rendered += '0';
  }
  return sign + rendered;
}

/**
 * Fee rate in BTC per 1000 bytes, formatted with {@link formatMoney}
 */
export function formatFeeRatePerKb(feeSats: number, sizeBytes: number): string {
  return formatMoney((feeSats * 1000) / sizeBytes);
}

export function formatKilobytes(sizeBytes: number): string {
  return (sizeBytes / 1000).toFixed(3);
}
