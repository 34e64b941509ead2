/**
 * Instruction compilation against a finalized account table.
 *
 * @packageDocumentation
 */

import type { Address } from '@solana/addresses';
import { AccountIndexOverflowError, AccountNotFoundError } from '@solwire/tx-errors';
import { encodeCompactLength, getCompactLengthSize } from '../codecs/compact-length.js';
import type { CompiledInstruction, MessageInstruction } from '../types.js';

/**
 * Account indices are single bytes, so a legacy message holds at most 256 accounts.
 */
export const MAX_ACCOUNT_KEYS = 256;

/**
 * Resolves an address to its position in the account table.
 */
export type AccountIndexLookup = (address: Address) => number;

/**
 * Build an index lookup over finalized account keys.
 *
 * @throws {AccountIndexOverflowError} when the table exceeds {@link MAX_ACCOUNT_KEYS}
 */
export function createAccountIndexLookup(accountKeys: readonly Address[]): AccountIndexLookup {
  if (accountKeys.length > MAX_ACCOUNT_KEYS) {
    throw new AccountIndexOverflowError(accountKeys.length, MAX_ACCOUNT_KEYS);
  }

  const indices = new Map<Address, number>();
  accountKeys.forEach((key, index) => {
    if (!indices.has(key)) indices.set(key, index);
  });

  return (address) => {
    const index = indices.get(address);
    if (index === undefined) {
      throw new AccountNotFoundError(address);
    }
    return index;
  };
}

/**
 * Rewrite an instruction to reference accounts by table index.
 *
 * @throws {AccountNotFoundError} when the table is missing a referenced account
 */
export function compileInstruction(
  instruction: MessageInstruction,
  accountKeys: readonly Address[] | AccountIndexLookup
): CompiledInstruction {
  const lookup = typeof accountKeys === 'function' ? accountKeys : createAccountIndexLookup(accountKeys);
  return {
    programIdIndex: lookup(instruction.programAddress),
    accountIndices: instruction.accounts.map((account) => lookup(account.address)),
    data: instruction.data,
  };
}

/**
 * Compile every instruction against the same table.
 */
export function compileInstructions(
  instructions: readonly MessageInstruction[],
  accountKeys: readonly Address[]
): CompiledInstruction[] {
  const lookup = createAccountIndexLookup(accountKeys);
  return instructions.map((instruction) => compileInstruction(instruction, lookup));
}

/**
 * Serialized size of a compiled instruction.
 */
export function getCompiledInstructionSize(instruction: CompiledInstruction): number {
  return (
    1 +
    getCompactLengthSize(instruction.accountIndices.length) +
    instruction.accountIndices.length +
    getCompactLengthSize(instruction.data.length) +
    instruction.data.length
  );
}

/**
 * Wire layout:
 * - 1 byte: program id index
 * - compact: account index count, then one byte per index
 * - compact: data length, then the data
 */
export function encodeCompiledInstruction(instruction: CompiledInstruction): Uint8Array {
  for (const index of [instruction.programIdIndex, ...instruction.accountIndices]) {
    if (!Number.isInteger(index) || index < 0 || index >= MAX_ACCOUNT_KEYS) {
      throw new AccountIndexOverflowError(index + 1, MAX_ACCOUNT_KEYS);
    }
  }

  const out = new Uint8Array(getCompiledInstructionSize(instruction));
  let offset = 0;
  out[offset++] = instruction.programIdIndex;

  const accountCount = encodeCompactLength(instruction.accountIndices.length);
  out.set(accountCount, offset);
  offset += accountCount.length;
  out.set(instruction.accountIndices, offset);
  offset += instruction.accountIndices.length;

  const dataLength = encodeCompactLength(instruction.data.length);
  out.set(dataLength, offset);
  offset += dataLength.length;
  out.set(instruction.data, offset);

  return out;
}
