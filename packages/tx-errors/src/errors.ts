/**
 * Typed error definitions for legacy message compilation.
 *
 * @packageDocumentation
 */

/**
 * Error codes raised while compiling or decoding a message.
 */
export type MessageErrorCode =
  | 'MISSING_BLOCKHASH_OR_NONCE'
  | 'NO_INSTRUCTIONS'
  | 'MISSING_FEE_PAYER'
  | 'INVALID_BLOCKHASH'
  | 'ACCOUNT_INDEX_OVERFLOW'
  | 'ACCOUNT_NOT_FOUND'
  | 'MALFORMED_COMPACT_LENGTH'
  | 'HEADER_COUNT_OVERFLOW'
  | 'MALFORMED_MESSAGE';

/**
 * Base error class for all message errors.
 */
export class MessageCompileError extends Error {
  constructor(
    message: string,
    public readonly code: MessageErrorCode,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MessageCompileError';
    Object.setPrototypeOf(this, MessageCompileError.prototype);
  }
}

/**
 * Error thrown when neither a recent blockhash nor nonce information was set.
 */
export class MissingBlockhashOrNonceError extends MessageCompileError {
  declare readonly code: 'MISSING_BLOCKHASH_OR_NONCE';

  constructor() {
    super(
      'Recent blockhash or nonce information is required',
      'MISSING_BLOCKHASH_OR_NONCE'
    );
    this.name = 'MissingBlockhashOrNonceError';
    Object.setPrototypeOf(this, MissingBlockhashOrNonceError.prototype);
  }
}

/**
 * Error thrown when building a message without instructions.
 */
export class NoInstructionsError extends MessageCompileError {
  declare readonly code: 'NO_INSTRUCTIONS';

  constructor() {
    super('No instructions provided in the message', 'NO_INSTRUCTIONS');
    this.name = 'NoInstructionsError';
    Object.setPrototypeOf(this, NoInstructionsError.prototype);
  }
}

/**
 * Error thrown when the fee payer was never set.
 */
export class MissingFeePayerError extends MessageCompileError {
  declare readonly code: 'MISSING_FEE_PAYER';

  constructor() {
    super('Fee payer is required', 'MISSING_FEE_PAYER');
    this.name = 'MissingFeePayerError';
    Object.setPrototypeOf(this, MissingFeePayerError.prototype);
  }
}

/**
 * Error thrown when the recent blockhash (or nonce value) does not decode to 32 bytes.
 */
export class InvalidBlockhashError extends MessageCompileError {
  declare readonly code: 'INVALID_BLOCKHASH';

  constructor(
    public readonly blockhash: string,
    public readonly decodedLength?: number,
    cause?: unknown
  ) {
    super(
      decodedLength === undefined
        ? `Invalid blockhash: ${blockhash} is not a base-58 string`
        : `Invalid blockhash: ${blockhash} decodes to ${decodedLength} bytes (expected 32)`,
      'INVALID_BLOCKHASH',
      { blockhash, decodedLength },
      cause === undefined ? undefined : { cause }
    );
    this.name = 'InvalidBlockhashError';
    Object.setPrototypeOf(this, InvalidBlockhashError.prototype);
  }
}

/**
 * Error thrown when the account table cannot be addressed with single-byte indices.
 */
export class AccountIndexOverflowError extends MessageCompileError {
  declare readonly code: 'ACCOUNT_INDEX_OVERFLOW';

  constructor(
    public readonly accountCount: number,
    public readonly maxAccounts: number
  ) {
    super(
      `Too many accounts: ${accountCount} (max: ${maxAccounts})`,
      'ACCOUNT_INDEX_OVERFLOW',
      { accountCount, maxAccounts }
    );
    this.name = 'AccountIndexOverflowError';
    Object.setPrototypeOf(this, AccountIndexOverflowError.prototype);
  }
}

/**
 * Error thrown when a compiled instruction references an account missing from the table.
 * Indicates a bug in table construction, not bad input.
 */
export class AccountNotFoundError extends MessageCompileError {
  declare readonly code: 'ACCOUNT_NOT_FOUND';

  constructor(public readonly account: string) {
    super(
      `Account ${account} was not found among the message accounts. The account table was built incorrectly.`,
      'ACCOUNT_NOT_FOUND',
      { account }
    );
    this.name = 'AccountNotFoundError';
    Object.setPrototypeOf(this, AccountNotFoundError.prototype);
  }
}

/**
 * Error thrown when a compact-length sequence is truncated or out of range.
 */
export class MalformedCompactLengthError extends MessageCompileError {
  declare readonly code: 'MALFORMED_COMPACT_LENGTH';

  constructor(
    public readonly offset: number,
    public readonly reason: string
  ) {
    super(`Malformed compact length at offset ${offset}: ${reason}`, 'MALFORMED_COMPACT_LENGTH', {
      offset,
      reason,
    });
    this.name = 'MalformedCompactLengthError';
    Object.setPrototypeOf(this, MalformedCompactLengthError.prototype);
  }
}

/**
 * Error thrown when a header count does not fit in one byte.
 */
export class HeaderCountOverflowError extends MessageCompileError {
  declare readonly code: 'HEADER_COUNT_OVERFLOW';

  constructor(
    public readonly field: string,
    public readonly count: number
  ) {
    super(`Header count ${field} is ${count} (max: 255)`, 'HEADER_COUNT_OVERFLOW', {
      field,
      count,
    });
    this.name = 'HeaderCountOverflowError';
    Object.setPrototypeOf(this, HeaderCountOverflowError.prototype);
  }
}

/**
 * Error thrown when message bytes cannot be decoded.
 */
export class MalformedMessageError extends MessageCompileError {
  declare readonly code: 'MALFORMED_MESSAGE';

  constructor(
    public readonly reason: string,
    public readonly offset: number
  ) {
    super(`Malformed message at offset ${offset}: ${reason}`, 'MALFORMED_MESSAGE', {
      reason,
      offset,
    });
    this.name = 'MalformedMessageError';
    Object.setPrototypeOf(this, MalformedMessageError.prototype);
  }
}

/**
 * Union type of all message errors.
 */
export type MessageErrorType =
  | MissingBlockhashOrNonceError
  | NoInstructionsError
  | MissingFeePayerError
  | InvalidBlockhashError
  | AccountIndexOverflowError
  | AccountNotFoundError
  | MalformedCompactLengthError
  | HeaderCountOverflowError
  | MalformedMessageError;
