/**
 * Compact-length (short vector) encoding used to prefix every variable-length
 * array in the legacy message wire format.
 *
 * Values are written as 7-bit groups, least significant first. Every byte except
 * the last has the continuation bit (0x80) set.
 *
 * @packageDocumentation
 */

import {
  combineCodec,
  createDecoder,
  createEncoder,
  type ReadonlyUint8Array,
  type VariableSizeCodec,
  type VariableSizeDecoder,
  type VariableSizeEncoder,
} from '@solana/codecs';
import { MalformedCompactLengthError } from '@solwire/tx-errors';

const CONTINUATION_BIT = 0x80;
const GROUP_MASK = 0x7f;
const GROUP_BASE = 0x80;

function assertEncodableLength(value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Compact length must be a non-negative safe integer, got ${value}`);
  }
}

/**
 * Number of bytes `encodeCompactLength(value)` produces.
 */
export function getCompactLengthSize(value: number): number {
  assertEncodableLength(value);
  let size = 1;
  let remaining = Math.floor(value / GROUP_BASE);
  while (remaining > 0) {
    size++;
    remaining = Math.floor(remaining / GROUP_BASE);
  }
  return size;
}

/**
 * Encode a non-negative integer.
 *
 * @example
 * ```ts
 * encodeCompactLength(127);   // [0x7f]
 * encodeCompactLength(128);   // [0x80, 0x01]
 * encodeCompactLength(16384); // [0x80, 0x80, 0x01]
 * ```
 */
export function encodeCompactLength(value: number): Uint8Array {
  assertEncodableLength(value);
  const bytes: number[] = [];
  let remaining = value;
  for (;;) {
    // Arithmetic rather than bitwise ops: values may exceed 32 bits.
    const group = remaining % GROUP_BASE;
    remaining = Math.floor(remaining / GROUP_BASE);
    if (remaining === 0) {
      bytes.push(group);
      return new Uint8Array(bytes);
    }
    bytes.push(group | CONTINUATION_BIT);
  }
}

/**
 * Decode a compact length starting at `offset`.
 *
 * @returns The decoded value and the number of bytes it occupied.
 * @throws {MalformedCompactLengthError} on a truncated, non-canonical or oversized sequence
 */
export function decodeCompactLength(
  bytes: ReadonlyUint8Array | Uint8Array,
  offset = 0
): [value: number, bytesConsumed: number] {
  let value = 0;
  let multiplier = 1;
  let position = offset;

  for (;;) {
    if (position >= bytes.length) {
      throw new MalformedCompactLengthError(
        offset,
        position === offset ? 'no bytes to read' : 'truncated continuation sequence'
      );
    }
    const byte = bytes[position];
    position++;
    value += (byte & GROUP_MASK) * multiplier;

    if ((byte & CONTINUATION_BIT) === 0) {
      if (byte === 0 && position - offset > 1) {
        throw new MalformedCompactLengthError(offset, 'non-canonical encoding');
      }
      break;
    }

    multiplier *= GROUP_BASE;
    if (multiplier > Number.MAX_SAFE_INTEGER) {
      throw new MalformedCompactLengthError(offset, 'value exceeds the safe integer range');
    }
  }

  if (!Number.isSafeInteger(value)) {
    throw new MalformedCompactLengthError(offset, 'value exceeds the safe integer range');
  }

  return [value, position - offset];
}

/**
 * Compact-length encoder composable with `@solana/codecs` combinators.
 */
export function getCompactLengthEncoder(): VariableSizeEncoder<number> {
  return createEncoder({
    getSizeFromValue: getCompactLengthSize,
    write: (value: number, bytes: Uint8Array, offset: number) => {
      const encoded = encodeCompactLength(value);
      bytes.set(encoded, offset);
      return offset + encoded.length;
    },
  });
}

/**
 * Compact-length decoder composable with `@solana/codecs` combinators.
 */
export function getCompactLengthDecoder(): VariableSizeDecoder<number> {
  return createDecoder({
    read: (bytes: ReadonlyUint8Array | Uint8Array, offset: number) => {
      const [value, consumed] = decodeCompactLength(bytes, offset);
      return [value, offset + consumed];
    },
  });
}

/**
 * Compact-length codec.
 */
export function getCompactLengthCodec(): VariableSizeCodec<number> {
  return combineCodec(getCompactLengthEncoder(), getCompactLengthDecoder());
}
