/**
 * Legacy message serialization.
 *
 * Wire layout (no padding, no outer length prefix):
 * - 3 bytes: header
 * - compact: account count, then 32 bytes per account key
 * - 32 bytes: recent blockhash
 * - compact: instruction count, then each compiled instruction
 *
 * @packageDocumentation
 */

import { getAddressEncoder } from '@solana/addresses';
import { mergeBytes } from '@solana/codecs';
import { AccountIndexOverflowError } from '@solwire/tx-errors';
import { encodeCompactLength, getCompactLengthSize } from '../codecs/compact-length.js';
import { encodeMessageHeader, MESSAGE_HEADER_LENGTH } from '../header/header.js';
import {
  encodeCompiledInstruction,
  getCompiledInstructionSize,
  MAX_ACCOUNT_KEYS,
} from '../instructions/compile.js';
import type { CompiledMessage } from '../types.js';
import { BLOCKHASH_LENGTH, decodeBlockhash } from './blockhash.js';

const ADDRESS_LENGTH = 32;

/**
 * Serialize a compiled message into its wire bytes.
 *
 * @throws {InvalidBlockhashError} when the blockhash is not 32 base-58 bytes
 * @throws {AccountIndexOverflowError} when the message has more than 256 accounts
 */
export function serializeMessage(message: CompiledMessage): Uint8Array {
  if (message.accountKeys.length > MAX_ACCOUNT_KEYS) {
    throw new AccountIndexOverflowError(message.accountKeys.length, MAX_ACCOUNT_KEYS);
  }

  const addressEncoder = getAddressEncoder();
  return mergeBytes([
    encodeMessageHeader(message.header),
    encodeCompactLength(message.accountKeys.length),
    ...message.accountKeys.map((key) => new Uint8Array(addressEncoder.encode(key))),
    decodeBlockhash(message.recentBlockhash),
    encodeCompactLength(message.instructions.length),
    ...message.instructions.map(encodeCompiledInstruction),
  ]);
}

/**
 * Size in bytes of the serialized message.
 */
export function getMessageSize(message: CompiledMessage): number {
  return (
    MESSAGE_HEADER_LENGTH +
    getCompactLengthSize(message.accountKeys.length) +
    message.accountKeys.length * ADDRESS_LENGTH +
    BLOCKHASH_LENGTH +
    getCompactLengthSize(message.instructions.length) +
    message.instructions.reduce((size, instruction) => size + getCompiledInstructionSize(instruction), 0)
  );
}
