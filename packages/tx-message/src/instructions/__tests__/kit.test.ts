import { describe, it, expect } from 'vitest';
import { AccountRole, type Instruction } from '@solana/instructions';
import { fromKitInstruction, toAccountRole, toKitInstruction } from '../kit.js';
import { instruction, readonly, signer, testAddress, writable } from '../../__tests__/helpers.js';

const PROGRAM = testAddress(10);

describe('fromKitInstruction', () => {
  it('should map account roles to flags', () => {
    const kitInstruction: Instruction = {
      programAddress: PROGRAM,
      accounts: [
        { address: testAddress(1), role: AccountRole.WRITABLE_SIGNER },
        { address: testAddress(2), role: AccountRole.READONLY_SIGNER },
        { address: testAddress(3), role: AccountRole.WRITABLE },
        { address: testAddress(4), role: AccountRole.READONLY },
      ],
      data: new Uint8Array([7, 8]),
    };

    const converted = fromKitInstruction(kitInstruction);
    expect(converted.programAddress).toBe(PROGRAM);
    expect(converted.accounts).toEqual([
      signer(testAddress(1), true),
      signer(testAddress(2)),
      writable(testAddress(3)),
      readonly(testAddress(4)),
    ]);
    expect(Array.from(converted.data)).toEqual([7, 8]);
  });

  it('should default missing accounts and data to empty', () => {
    const converted = fromKitInstruction({ programAddress: PROGRAM });
    expect(converted.accounts).toEqual([]);
    expect(converted.data.length).toBe(0);
  });
});

describe('toKitInstruction', () => {
  it('should map flags to account roles', () => {
    expect(toAccountRole({ isSigner: true, isWritable: true })).toBe(AccountRole.WRITABLE_SIGNER);
    expect(toAccountRole({ isSigner: true, isWritable: false })).toBe(AccountRole.READONLY_SIGNER);
    expect(toAccountRole({ isSigner: false, isWritable: true })).toBe(AccountRole.WRITABLE);
    expect(toAccountRole({ isSigner: false, isWritable: false })).toBe(AccountRole.READONLY);
  });

  it('should convert back to the same message instruction', () => {
    const original = instruction(PROGRAM, [signer(testAddress(1)), writable(testAddress(2))], [1]);
    expect(fromKitInstruction(toKitInstruction(original))).toEqual(original);
  });
});
