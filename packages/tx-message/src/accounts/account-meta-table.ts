/**
 * Order-preserving, deduplicating account table.
 *
 * @packageDocumentation
 */

import type { Address } from '@solana/addresses';
import type { AccountMeta } from '../types.js';

/**
 * Collects account references in first-seen order. Adding an address twice
 * keeps its original position and ORs the signer/writable flags.
 *
 * @example
 * ```ts
 * const table = new AccountMetaTable();
 * table.add({ address: a, isSigner: false, isWritable: true });
 * table.add({ address: a, isSigner: true, isWritable: false });
 * table.snapshot(); // [{ address: a, isSigner: true, isWritable: true }]
 * ```
 */
export class AccountMetaTable {
  // Map iteration follows insertion order, which is the table order.
  private readonly entries = new Map<Address, AccountMeta>();

  constructor(metas: Iterable<AccountMeta> = []) {
    this.addAll(metas);
  }

  /**
   * Insert a new account at the end, or merge flags into the existing entry.
   */
  add(meta: AccountMeta): this {
    const existing = this.entries.get(meta.address);
    if (existing) {
      existing.isSigner = existing.isSigner || meta.isSigner;
      existing.isWritable = existing.isWritable || meta.isWritable;
    } else {
      this.entries.set(meta.address, {
        address: meta.address,
        isSigner: meta.isSigner,
        isWritable: meta.isWritable,
      });
    }
    return this;
  }

  /**
   * Add each meta in order.
   */
  addAll(metas: Iterable<AccountMeta>): this {
    for (const meta of metas) {
      this.add(meta);
    }
    return this;
  }

  /**
   * Remove an account, discarding its merged flags.
   *
   * @returns whether the account was present
   */
  remove(address: Address): boolean {
    return this.entries.delete(address);
  }

  has(address: Address): boolean {
    return this.entries.has(address);
  }

  get(address: Address): AccountMeta | undefined {
    const meta = this.entries.get(address);
    return meta && { ...meta };
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Current entries in table order. Mutating the result does not affect the table.
   */
  snapshot(): AccountMeta[] {
    return Array.from(this.entries.values(), (meta) => ({ ...meta }));
  }

  clone(): AccountMetaTable {
    return new AccountMetaTable(this.entries.values());
  }
}
