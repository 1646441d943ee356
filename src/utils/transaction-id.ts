/**
 * Transaction identifiers
 *
 * Users and the node's RPC interface print txids big-endian ("display" order) while
 * transaction inputs carry the same 32 bytes reversed ("internal" order).
 */

import { Buffer } from 'node:buffer';

import { InvalidIdentifierError, type TransactionPosition } from '../errors/index.ts';
import { isHexString } from './type-guards.ts';

export type ByteOrder = 'display' | 'internal';

export interface ParseTransactionIdOptions {
  /** Byte order of the hex string (default: display) */
  byteOrder?: ByteOrder;
  /** Reported in the error when parsing fails */
  position?: TransactionPosition;
}

export class TransactionId {
  static readonly BYTE_LENGTH = 32;

  private readonly internal: Buffer;

  private constructor(internal: Buffer) {
    this.internal = internal;
  }

  static fromHex(hex: string, options: ParseTransactionIdOptions = {}): TransactionId {
    const value = hex.trim();
    if (!isHexString(value)) {
      throw new InvalidIdentifierError(hex, 'not a hex string', options.position);
    }

    const bytes = Buffer.from(value, 'hex');
    if (bytes.length !== TransactionId.BYTE_LENGTH) {
      throw new InvalidIdentifierError(
        hex,
        `wrong length (${bytes.length} bytes, expected ${TransactionId.BYTE_LENGTH})`,
        options.position,
      );
    }

    return new TransactionId(
      (options.byteOrder ?? 'display') === 'display' ? bytes.reverse() : bytes,
    );
  }

  static fromInternal(bytes: Uint8Array): TransactionId {
    if (bytes.length !== TransactionId.BYTE_LENGTH) {
      throw new InvalidIdentifierError(
        Buffer.from(bytes).toString('hex'),
        `wrong length (${bytes.length} bytes, expected ${TransactionId.BYTE_LENGTH})`,
      );
    }
    return new TransactionId(Buffer.from(bytes));
  }

  /** Big-endian hex, as shown by block explorers and the node */
  toHex(): string {
    return Buffer.from(this.internal).reverse().toString('hex');
  }

  /** Little-endian bytes, as serialised in a transaction input */
  toInternal(): Buffer {
    return Buffer.from(this.internal);
  }

  equals(other: TransactionId): boolean {
    return this.internal.equals(other.internal);
  }

  toString(): string {
    return this.toHex();
  }
}
