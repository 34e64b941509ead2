/**
 * Tests for the account table and ordering rules.
 */

import { describe, it, expect } from 'vitest';
import { AccountMetaTable } from '../account-meta-table.js';
import {
  applyPriorOrdering,
  getAccountClassRank,
  groupByAccountClass,
  placeFeePayerFirst,
} from '../ordering.js';
import { readonly, signer, testAddress, writable } from '../../__tests__/helpers.js';

const A = testAddress(1);
const B = testAddress(2);
const C = testAddress(3);
const D = testAddress(4);

describe('AccountMetaTable', () => {
  it('should keep first-seen order', () => {
    const table = new AccountMetaTable().add(readonly(B)).add(writable(A)).add(readonly(C));
    expect(table.snapshot().map((meta) => meta.address)).toEqual([B, A, C]);
    expect(table.size).toBe(3);
  });

  it('should merge duplicate references by ORing flags', () => {
    const table = new AccountMetaTable()
      .add(readonly(A))
      .add(writable(B))
      .add(signer(A))
      .add(writable(A));
    expect(table.snapshot()).toEqual([
      { address: A, isSigner: true, isWritable: true },
      { address: B, isSigner: false, isWritable: true },
    ]);
  });

  it('should never downgrade flags', () => {
    const table = new AccountMetaTable().add(signer(A, true)).add(readonly(A));
    expect(table.get(A)).toEqual({ address: A, isSigner: true, isWritable: true });
  });

  it('should add all metas in order', () => {
    const table = new AccountMetaTable().addAll([writable(C), readonly(A), signer(C)]);
    expect(table.snapshot()).toEqual([
      { address: C, isSigner: true, isWritable: true },
      { address: A, isSigner: false, isWritable: false },
    ]);
  });

  it('should not expose internal entries', () => {
    const table = new AccountMetaTable().add(readonly(A));
    const [first] = table.snapshot();
    first.isWritable = true;
    const fetched = table.get(A);
    if (fetched) fetched.isSigner = true;
    expect(table.get(A)).toEqual({ address: A, isSigner: false, isWritable: false });
  });

  it('should remove entries and forget their flags', () => {
    const table = new AccountMetaTable().add(signer(A, true)).add(readonly(B));
    expect(table.remove(A)).toBe(true);
    expect(table.remove(A)).toBe(false);
    expect(table.has(A)).toBe(false);
    table.add(readonly(A));
    expect(table.snapshot()).toEqual([readonly(B), readonly(A)]);
  });

  it('should clone independently', () => {
    const table = new AccountMetaTable().add(readonly(A));
    const copy = table.clone().add(signer(A)).add(readonly(B));
    expect(table.snapshot()).toEqual([readonly(A)]);
    expect(copy.snapshot()).toEqual([signer(A), readonly(B)]);
  });

  it('should produce the same order for the same inputs', () => {
    const inputs = [writable(C), readonly(A), signer(B), readonly(C), writable(D)];
    expect(new AccountMetaTable(inputs).snapshot()).toEqual(new AccountMetaTable(inputs).snapshot());
  });
});

describe('ordering', () => {
  it('should rank account classes', () => {
    expect(getAccountClassRank(signer(A, true))).toBe(0);
    expect(getAccountClassRank(signer(A))).toBe(1);
    expect(getAccountClassRank(writable(A))).toBe(2);
    expect(getAccountClassRank(readonly(A))).toBe(3);
  });

  it('should place the fee payer first as a writable signer', () => {
    const ordered = placeFeePayerFirst([readonly(A), readonly(B), writable(C)], B);
    expect(ordered).toEqual([signer(B, true), readonly(A), writable(C)]);
  });

  it('should add the fee payer when it is not referenced', () => {
    expect(placeFeePayerFirst([readonly(A)], D)).toEqual([signer(D, true), readonly(A)]);
  });

  it('should group by class and keep insertion order within a class', () => {
    const grouped = groupByAccountClass([
      readonly(A),
      writable(B),
      signer(C),
      writable(D),
      signer(testAddress(5), true),
    ]);
    expect(grouped.map((meta) => meta.address)).toEqual([testAddress(5), C, B, D, A]);
  });

  it('should follow a prior ordering that covers every account', () => {
    const metas = [signer(A, true), writable(B), readonly(C)];
    const reordered = applyPriorOrdering(metas, [C, D, A, B]);
    expect(reordered).toEqual([readonly(C), signer(A, true), writable(B)]);
  });

  it('should refuse a prior ordering missing an account', () => {
    expect(applyPriorOrdering([readonly(A), readonly(B)], [A, C])).toBeUndefined();
  });
});
