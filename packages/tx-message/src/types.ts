/**
 * Core types for legacy message compilation.
 *
 * @packageDocumentation
 */

import type { Address } from '@solana/addresses';

/**
 * An account referenced by an instruction.
 * Two metas describe the same account when their addresses match; flags are merged.
 */
export interface AccountMeta {
  address: Address;
  isSigner: boolean;
  isWritable: boolean;
}

/**
 * A high-level instruction. The payload is opaque to the compiler.
 */
export interface MessageInstruction {
  programAddress: Address;
  /**
   * Accounts in the order the program expects them. Duplicates are allowed.
   */
  accounts: readonly AccountMeta[];
  data: Uint8Array;
}

/**
 * Durable nonce lifetime used in place of a recent blockhash.
 */
export interface NonceInfo {
  /**
   * Current nonce value (a base-58 blockhash).
   */
  nonce: string;
  /**
   * Instruction advancing the nonce. Always executed first.
   */
  instruction: MessageInstruction;
}

/**
 * Signature and permission counts derived from the account table.
 */
export interface MessageHeader {
  /**
   * Signatures must match the first `numRequiredSignatures` account keys.
   */
  numRequiredSignatures: number;
  /** The last `numReadonlySignedAccounts` of the signed keys are read-only. */
  numReadonlySignedAccounts: number;
  /** The last `numReadonlyUnsignedAccounts` of the unsigned keys are read-only. */
  numReadonlyUnsignedAccounts: number;
}

/**
 * An instruction rewritten to reference accounts by table index.
 */
export interface CompiledInstruction {
  programIdIndex: number;
  accountIndices: readonly number[];
  data: Uint8Array;
}

/**
 * Structured form of a legacy message.
 */
export interface CompiledMessage {
  header: MessageHeader;
  accountKeys: readonly Address[];
  recentBlockhash: string;
  instructions: readonly CompiledInstruction[];
}
