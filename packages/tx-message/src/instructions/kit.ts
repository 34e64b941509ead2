/**
 * Conversion between Kit instructions and message instructions.
 *
 * @packageDocumentation
 */

import {
  AccountRole,
  isSignerRole,
  isWritableRole,
  type Instruction,
} from '@solana/instructions';
import type { AccountMeta, MessageInstruction } from '../types.js';

/**
 * Convert a Kit instruction (accounts carrying an `AccountRole`) into a message instruction.
 * Lookup-table metas are treated as plain account references.
 *
 * @example
 * ```ts
 * const ix = getTransferSolInstruction({ source, destination, amount });
 * builder.addInstruction(fromKitInstruction(ix));
 * ```
 */
export function fromKitInstruction(instruction: Instruction): MessageInstruction {
  return {
    programAddress: instruction.programAddress,
    accounts: (instruction.accounts ?? []).map((account) => ({
      address: account.address,
      isSigner: isSignerRole(account.role),
      isWritable: isWritableRole(account.role),
    })),
    data: new Uint8Array(instruction.data ?? []),
  };
}

/**
 * Map signer/writable flags to the equivalent Kit account role.
 */
export function toAccountRole(meta: Pick<AccountMeta, 'isSigner' | 'isWritable'>): AccountRole {
  if (meta.isSigner) {
    return meta.isWritable ? AccountRole.WRITABLE_SIGNER : AccountRole.READONLY_SIGNER;
  }
  return meta.isWritable ? AccountRole.WRITABLE : AccountRole.READONLY;
}

/**
 * Convert a message instruction back into a Kit instruction.
 */
export function toKitInstruction(instruction: MessageInstruction): Instruction {
  return {
    programAddress: instruction.programAddress,
    accounts: instruction.accounts.map((account) => ({
      address: account.address,
      role: toAccountRole(account),
    })),
    data: instruction.data,
  };
}
