/**
 * Recent blockhash decoding.
 *
 * @packageDocumentation
 */

import { getBase58Encoder } from '@solana/codecs-strings';
import { isSolanaError, SOLANA_ERROR__CODECS__INVALID_STRING_FOR_BASE } from '@solana/errors';
import { InvalidBlockhashError } from '@solwire/tx-errors';

/**
 * Length of a recent blockhash (or nonce value) in bytes.
 */
export const BLOCKHASH_LENGTH = 32;

/**
 * Decode a base-58 blockhash to its raw bytes.
 *
 * @throws {InvalidBlockhashError} when the string is not base-58 or not 32 bytes long
 */
export function decodeBlockhash(blockhash: string): Uint8Array {
  let bytes: Uint8Array;
  try {
    bytes = new Uint8Array(getBase58Encoder().encode(blockhash));
  } catch (error) {
    if (isSolanaError(error, SOLANA_ERROR__CODECS__INVALID_STRING_FOR_BASE)) {
      throw new InvalidBlockhashError(blockhash, undefined, error);
    }
    throw error;
  }

  if (bytes.length !== BLOCKHASH_LENGTH) {
    throw new InvalidBlockhashError(blockhash, bytes.length);
  }
  return bytes;
}
