/**
 * Custom Error Classes
 *
 * Every failure of the combine pipeline is terminal. `kind` separates problems the
 * user can act on from broken internal invariants; the CLI maps the two to
 * different exit statuses.
 */

export type CombineErrorKind = 'user' | 'internal';

/** Which of the two command line transactions an error refers to */
export type TransactionPosition = 1 | 2;

export class CombineError extends Error {
  public readonly code: string;
  public readonly kind: CombineErrorKind;

  constructor(
    message: string,
    code: string,
    kind: CombineErrorKind = 'user',
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'CombineError';
    this.code = code;
    this.kind = kind;
  }
}

export class InvalidIdentifierError extends CombineError {
  public readonly value: string;
  public readonly position?: TransactionPosition;

  constructor(value: string, reason: string, position?: TransactionPosition) {
    super(
      `Invalid txid${position !== undefined ? ` ${position}` : ''}: ${reason}`,
      'INVALID_IDENTIFIER',
    );
    this.name = 'InvalidIdentifierError';
    this.value = value;
    this.position = position;
  }
}

export class NotInWalletError extends CombineError {
  public readonly txid: string;
  public readonly position: TransactionPosition;

  constructor(txid: string, position: TransactionPosition) {
    super(`Invalid txid ${position}: ${txid} is not in the wallet`, 'NOT_IN_WALLET');
    this.name = 'NotInWalletError';
    this.txid = txid;
    this.position = position;
  }
}

export class AlreadyConfirmedError extends CombineError {
  public readonly txid: string;
  public readonly confirmations: number;

  constructor(txid: string, confirmations: number) {
    super(
      `Transaction ${txid} already mined; ${confirmations} confirmations`,
      'ALREADY_CONFIRMED',
    );
    this.name = 'AlreadyConfirmedError';
    this.txid = txid;
    this.confirmations = confirmations;
  }
}

export class NotReplaceableError extends CombineError {
  public readonly txid: string;

  constructor(txid: string) {
    super(
      `Transaction ${txid} has not opted in to replace-by-fee on every input`,
      'NOT_REPLACEABLE',
    );
    this.name = 'NotReplaceableError';
    this.txid = txid;
  }
}

export class MempoolEntryUnavailableError extends CombineError {
  public readonly txid: string;

  constructor(txid: string) {
    super(`Transaction ${txid} is no longer in the mempool`, 'MEMPOOL_ENTRY_UNAVAILABLE');
    this.name = 'MempoolEntryUnavailableError';
    this.txid = txid;
  }
}

export class FundingFailedError extends CombineError {
  constructor(reason: string, options?: ErrorOptions) {
    super(`Unable to fund replacement transaction: ${reason}`, 'FUNDING_FAILED', 'user', options);
    this.name = 'FundingFailedError';
  }
}

export class UnsupportedNoChangeCaseError extends CombineError {
  constructor() {
    super(
      'Funding the replacement did not create a change output; this case is not supported',
      'UNSUPPORTED_NO_CHANGE',
      'internal',
    );
    this.name = 'UnsupportedNoChangeCaseError';
  }
}

export class SigningIncompleteError extends CombineError {
  public readonly details: string[];

  constructor(details: string[] = []) {
    super(
      `Wallet could not fully sign the replacement transaction${
        details.length > 0 ? `: ${details.join('; ')}` : ''
      }`,
      'SIGNING_INCOMPLETE',
      'internal',
    );
    this.name = 'SigningIncompleteError';
    this.details = details;
  }
}

export class InsufficientChangeForFeeError extends CombineError {
  public readonly changeValue: number;
  public readonly deduction: number;

  constructor(changeValue: number, deduction: number, reason?: string) {
    super(
      reason ??
        `Unable to sufficiently bump fee: change output of ${changeValue} sat cannot absorb ${deduction} sat`,
      'INSUFFICIENT_CHANGE_FOR_FEE',
    );
    this.name = 'InsufficientChangeForFeeError';
    this.changeValue = changeValue;
    this.deduction = deduction;
  }
}

export class ConflictInvariantViolatedError extends CombineError {
  constructor(detail: string) {
    super(`Replacement does not conflict with both originals: ${detail}`, 'CONFLICT_INVARIANT', 'internal');
    this.name = 'ConflictInvariantViolatedError';
  }
}

export class ConfigurationError extends CombineError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration validation failed: ${errors.join(', ')}`, 'CONFIGURATION');
    this.name = 'ConfigurationError';
    this.errors = errors;
  }
}

/**
 * The node answered the call with a JSON-RPC error object
 */
export class NodeRpcError extends CombineError {
  public readonly method: string;
  public readonly rpcCode: number;

  constructor(method: string, rpcCode: number, message: string) {
    super(`${method} failed (${rpcCode}): ${message}`, 'NODE_RPC');
    this.name = 'NodeRpcError';
    this.method = method;
    this.rpcCode = rpcCode;
  }
}

/**
 * The node could not be reached or answered with something other than JSON-RPC
 */
export class RpcTransportError extends CombineError {
  public readonly method: string;

  constructor(method: string, message: string, options?: ErrorOptions) {
    super(`${method}: ${message}`, 'RPC_TRANSPORT', 'user', options);
    this.name = 'RpcTransportError';
    this.method = method;
  }
}
