/**
 * Message header derivation.
 *
 * @packageDocumentation
 */

import {
  getStructDecoder,
  getStructEncoder,
  getU8Decoder,
  getU8Encoder,
  type FixedSizeDecoder,
  type FixedSizeEncoder,
} from '@solana/codecs';
import { HeaderCountOverflowError } from '@solwire/tx-errors';
import type { AccountMeta, MessageHeader } from '../types.js';

/**
 * Serialized header size in bytes.
 */
export const MESSAGE_HEADER_LENGTH = 3;

const MAX_HEADER_COUNT = 0xff;

/**
 * Count signers and read-only accounts of a finalized account table.
 *
 * With 128 or more signers the first byte has its high bit set, which readers
 * (including `decodeMessage`) take as a versioned-message prefix.
 *
 * @throws {HeaderCountOverflowError} when a count does not fit in one byte
 */
export function computeMessageHeader(accounts: readonly AccountMeta[]): MessageHeader {
  const header: MessageHeader = {
    numRequiredSignatures: 0,
    numReadonlySignedAccounts: 0,
    numReadonlyUnsignedAccounts: 0,
  };

  for (const account of accounts) {
    if (account.isSigner) {
      header.numRequiredSignatures++;
      if (!account.isWritable) header.numReadonlySignedAccounts++;
    } else if (!account.isWritable) {
      header.numReadonlyUnsignedAccounts++;
    }
  }

  assertHeaderFits(header);
  return header;
}

function assertHeaderFits(header: MessageHeader): void {
  for (const field of [
    'numRequiredSignatures',
    'numReadonlySignedAccounts',
    'numReadonlyUnsignedAccounts',
  ] as const) {
    if (header[field] > MAX_HEADER_COUNT) {
      throw new HeaderCountOverflowError(field, header[field]);
    }
  }
}

/**
 * Fixed-size encoder for the three header bytes.
 */
export function getMessageHeaderEncoder(): FixedSizeEncoder<MessageHeader> {
  return getStructEncoder([
    ['numRequiredSignatures', getU8Encoder()],
    ['numReadonlySignedAccounts', getU8Encoder()],
    ['numReadonlyUnsignedAccounts', getU8Encoder()],
  ]);
}

/**
 * Fixed-size decoder for the three header bytes.
 */
export function getMessageHeaderDecoder(): FixedSizeDecoder<MessageHeader> {
  return getStructDecoder([
    ['numRequiredSignatures', getU8Decoder()],
    ['numReadonlySignedAccounts', getU8Decoder()],
    ['numReadonlyUnsignedAccounts', getU8Decoder()],
  ]);
}

/**
 * Encode the header as three consecutive bytes.
 */
export function encodeMessageHeader(header: MessageHeader): Uint8Array {
  assertHeaderFits(header);
  return new Uint8Array(getMessageHeaderEncoder().encode(header));
}
