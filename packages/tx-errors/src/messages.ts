/**
 * Human-readable error messages for message errors.
 *
 * @packageDocumentation
 */

import type { MessageErrorType } from './errors.js';

/**
 * Get a human-readable error message for a message error.
 */
export function getErrorMessage(error: MessageErrorType): string {
  switch (error.code) {
    case 'MISSING_BLOCKHASH_OR_NONCE':
      return 'Set a recent blockhash or durable nonce before building the message.';
    case 'NO_INSTRUCTIONS':
      return 'Add at least one instruction before building the message.';
    case 'MISSING_FEE_PAYER':
      return 'Set a fee payer before building the message.';
    case 'INVALID_BLOCKHASH':
      return `Blockhash ${error.blockhash} is not a 32-byte base-58 value.`;
    case 'ACCOUNT_INDEX_OVERFLOW':
      return `The message references ${error.accountCount} accounts. At most ${error.maxAccounts} fit in a legacy message.`;
    case 'ACCOUNT_NOT_FOUND':
      return `Internal error: account ${error.account} is missing from the account table.`;
    case 'MALFORMED_COMPACT_LENGTH':
      return `Invalid length prefix at byte ${error.offset}.`;
    case 'HEADER_COUNT_OVERFLOW':
      return `Header field ${error.field} would be ${error.count}, which does not fit in one byte.`;
    case 'MALFORMED_MESSAGE':
      return `Invalid message bytes at byte ${error.offset}: ${error.reason}`;
  }
}

/**
 * Get user-friendly error title.
 */
export function getErrorTitle(error: MessageErrorType): string {
  switch (error.code) {
    case 'MISSING_BLOCKHASH_OR_NONCE':
      return 'Missing Lifetime';
    case 'NO_INSTRUCTIONS':
      return 'No Instructions';
    case 'MISSING_FEE_PAYER':
      return 'Missing Fee Payer';
    case 'INVALID_BLOCKHASH':
      return 'Invalid Blockhash';
    case 'ACCOUNT_INDEX_OVERFLOW':
      return 'Too Many Accounts';
    case 'ACCOUNT_NOT_FOUND':
      return 'Account Not Found';
    case 'MALFORMED_COMPACT_LENGTH':
      return 'Malformed Length';
    case 'HEADER_COUNT_OVERFLOW':
      return 'Header Overflow';
    case 'MALFORMED_MESSAGE':
      return 'Malformed Message';
  }
}
