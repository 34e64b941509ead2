/**
 * Shared fixtures for message tests.
 */

import { getAddressDecoder, type Address } from '@solana/addresses';
import { getBase58Decoder } from '@solana/codecs-strings';
import type { AccountMeta, MessageInstruction } from '../types.js';

/**
 * Raw 32 bytes of a deterministic test key. Distinct for every seed below 65280.
 */
export function testAddressBytes(seed: number): Uint8Array {
  const bytes = new Uint8Array(32).fill(7);
  bytes[0] = seed % 256;
  bytes[1] = Math.floor(seed / 256) + 1;
  return bytes;
}

export function testAddress(seed: number): Address {
  return getAddressDecoder().decode(testAddressBytes(seed));
}

/** 32 zero bytes. */
export const ZERO_BLOCKHASH = '11111111111111111111111111111111';

/** 32 bytes of 0x09. */
export const NONZERO_BLOCKHASH = getBase58Decoder().decode(new Uint8Array(32).fill(9));

export function writable(address: Address): AccountMeta {
  return { address, isSigner: false, isWritable: true };
}

export function readonly(address: Address): AccountMeta {
  return { address, isSigner: false, isWritable: false };
}

export function signer(address: Address, isWritable = false): AccountMeta {
  return { address, isSigner: true, isWritable };
}

export function instruction(
  programAddress: Address,
  accounts: AccountMeta[],
  data: number[] = []
): MessageInstruction {
  return { programAddress, accounts, data: new Uint8Array(data) };
}
