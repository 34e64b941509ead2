/**
 * Type guards and predicates for errors.
 *
 * @packageDocumentation
 */

import {
  type MessageErrorCode,
  MessageCompileError,
  MissingBlockhashOrNonceError,
  NoInstructionsError,
  MissingFeePayerError,
  InvalidBlockhashError,
  AccountIndexOverflowError,
  AccountNotFoundError,
  MalformedCompactLengthError,
  HeaderCountOverflowError,
  MalformedMessageError,
} from './errors.js';

/**
 * Check if error was raised while compiling or decoding a message.
 * Pass a code to narrow to one error kind.
 */
export function isMessageCompileError(
  error: unknown,
  code?: MessageErrorCode
): error is MessageCompileError {
  if (!(error instanceof MessageCompileError)) return false;
  return code === undefined || error.code === code;
}

/**
 * Check if error is MissingBlockhashOrNonceError.
 */
export function isMissingBlockhashOrNonceError(error: unknown): error is MissingBlockhashOrNonceError {
  return error instanceof MissingBlockhashOrNonceError;
}

/**
 * Check if error is NoInstructionsError.
 */
export function isNoInstructionsError(error: unknown): error is NoInstructionsError {
  return error instanceof NoInstructionsError;
}

/**
 * Check if error is MissingFeePayerError.
 */
export function isMissingFeePayerError(error: unknown): error is MissingFeePayerError {
  return error instanceof MissingFeePayerError;
}

/**
 * Check if error is InvalidBlockhashError.
 */
export function isInvalidBlockhashError(error: unknown): error is InvalidBlockhashError {
  return error instanceof InvalidBlockhashError;
}

/**
 * Check if error is AccountIndexOverflowError.
 */
export function isAccountIndexOverflowError(error: unknown): error is AccountIndexOverflowError {
  return error instanceof AccountIndexOverflowError;
}

/**
 * Check if error is AccountNotFoundError.
 */
export function isAccountNotFoundError(error: unknown): error is AccountNotFoundError {
  return error instanceof AccountNotFoundError;
}

/**
 * Check if error is MalformedCompactLengthError.
 */
export function isMalformedCompactLengthError(error: unknown): error is MalformedCompactLengthError {
  return error instanceof MalformedCompactLengthError;
}

/**
 * Check if error is HeaderCountOverflowError.
 */
export function isHeaderCountOverflowError(error: unknown): error is HeaderCountOverflowError {
  return error instanceof HeaderCountOverflowError;
}

/**
 * Check if error is MalformedMessageError.
 */
export function isMalformedMessageError(error: unknown): error is MalformedMessageError {
  return error instanceof MalformedMessageError;
}

/**
 * Check if error was caused by caller input rather than an internal invariant.
 * AccountNotFoundError signals a table construction bug.
 */
export function isInputError(error: unknown): boolean {
  return isMessageCompileError(error) && error.code !== 'ACCOUNT_NOT_FOUND';
}
