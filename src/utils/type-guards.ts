/**
 * Type guards and safe type conversion for untyped JSON-RPC payloads
 */

export interface RpcErrorDetails {
  code: number;
  message: string;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getOptionalNumber(value: unknown, defaultValue = 0): number {
  return typeof value === 'number' && !isNaN(value) ? value : defaultValue;
}

export function getOptionalString(value: unknown, defaultValue = ''): string {
  return typeof value === 'string' ? value : defaultValue;
}

/**
 * The `error` member of a JSON-RPC reply, or undefined when it is null or absent
 */
export function getRpcErrorDetails(value: unknown): RpcErrorDetails | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  return {
    code: getOptionalNumber(value.code, -1),
    message: getOptionalString(value.message, 'unknown error'),
  };
}

export function isHexString(value: string): boolean {
  return /^(?:[0-9a-fA-F]{2})*$/.test(value);
}
