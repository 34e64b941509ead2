/**
 * Durable nonce helpers.
 *
 * @packageDocumentation
 */

import { address, type Address } from '@solana/addresses';
import { getU32Encoder } from '@solana/codecs';
import type { MessageInstruction, NonceInfo } from '../types.js';

/**
 * System program address.
 */
export const SYSTEM_PROGRAM = address('11111111111111111111111111111111');

/**
 * Recent blockhashes sysvar, required by the advance nonce instruction.
 */
export const SYSVAR_RECENT_BLOCKHASHES = address('SysvarRecentB1ockHashes11111111111111111111');

/**
 * System instruction discriminator for AdvanceNonceAccount.
 */
const ADVANCE_NONCE_ACCOUNT_DISCRIMINATOR = 4;

/**
 * Accounts of a durable nonce.
 */
export interface DurableNonceAccounts {
  /**
   * Address of the nonce account.
   */
  nonceAccountAddress: Address;

  /**
   * Address of the nonce authority (signer that can advance the nonce).
   */
  nonceAuthorityAddress: Address;
}

/**
 * Configuration for a durable nonce lifetime.
 */
export interface DurableNonceConfig extends DurableNonceAccounts {
  /**
   * Current nonce value stored in the nonce account.
   */
  nonce: string;
}

/**
 * Build the System program instruction that advances a nonce account.
 *
 * Accounts:
 * - nonce account (writable)
 * - recent blockhashes sysvar (read-only)
 * - nonce authority (read-only signer)
 */
export function getAdvanceNonceAccountInstruction({
  nonceAccountAddress,
  nonceAuthorityAddress,
}: DurableNonceAccounts): MessageInstruction {
  return {
    programAddress: SYSTEM_PROGRAM,
    accounts: [
      { address: nonceAccountAddress, isSigner: false, isWritable: true },
      { address: SYSVAR_RECENT_BLOCKHASHES, isSigner: false, isWritable: false },
      { address: nonceAuthorityAddress, isSigner: true, isWritable: false },
    ],
    data: new Uint8Array(getU32Encoder().encode(ADVANCE_NONCE_ACCOUNT_DISCRIMINATOR)),
  };
}

/**
 * Create nonce information for {@link MessageBuilder.setNonceInfo}.
 *
 * @example
 * ```ts
 * const nonceInfo = createNonceInfo({
 *   nonce: 'GfVcyD4kkTrj4bKc7WA9sZCin9JDbdT4Zkd3EittNR1W',
 *   nonceAccountAddress: address('...'),
 *   nonceAuthorityAddress: address('...'),
 * });
 * ```
 */
export function createNonceInfo(config: DurableNonceConfig): NonceInfo {
  return {
    nonce: config.nonce,
    instruction: getAdvanceNonceAccountInstruction(config),
  };
}
