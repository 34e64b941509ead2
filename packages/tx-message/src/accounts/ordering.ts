/**
 * Final account ordering rules.
 *
 * @packageDocumentation
 */

import type { Address } from '@solana/addresses';
import type { AccountMeta } from '../types.js';

/**
 * Rank of an account class. Lower ranks come first in the message.
 * The header counts only describe the table if signers precede non-signers
 * and read-only accounts close each section.
 */
export function getAccountClassRank(meta: AccountMeta): number {
  if (meta.isSigner) {
    return meta.isWritable ? 0 : 1;
  }
  return meta.isWritable ? 2 : 3;
}

/**
 * Move the fee payer to position 0 as a writable signer.
 * Whatever flags the fee payer had merged before are replaced.
 */
export function placeFeePayerFirst(metas: readonly AccountMeta[], feePayer: Address): AccountMeta[] {
  return [
    { address: feePayer, isSigner: true, isWritable: true },
    ...metas.filter((meta) => meta.address !== feePayer),
  ];
}

/**
 * Stable grouping: writable signers, read-only signers, writable non-signers,
 * read-only non-signers. Insertion order is kept inside each group.
 */
export function groupByAccountClass(metas: readonly AccountMeta[]): AccountMeta[] {
  // Array.prototype.sort is stable on every supported runtime.
  return [...metas].sort((a, b) => getAccountClassRank(a) - getAccountClassRank(b));
}

/**
 * Reorder `metas` to follow `priorKeys` when every address appears there.
 * Used to re-serialize a decoded message byte for byte.
 *
 * @returns the reordered metas, or `undefined` when some address is not covered
 */
export function applyPriorOrdering(
  metas: readonly AccountMeta[],
  priorKeys: readonly Address[]
): AccountMeta[] | undefined {
  const priorIndex = new Map<Address, number>();
  priorKeys.forEach((key, index) => {
    if (!priorIndex.has(key)) priorIndex.set(key, index);
  });

  const ranked: Array<{ meta: AccountMeta; index: number }> = [];
  for (const meta of metas) {
    const index = priorIndex.get(meta.address);
    if (index === undefined) return undefined;
    ranked.push({ meta, index });
  }

  return ranked.sort((a, b) => a.index - b.index).map(({ meta }) => meta);
}
