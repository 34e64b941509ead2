import { describe, it, expect } from 'vitest';
import { MalformedCompactLengthError, MalformedMessageError } from '@solwire/tx-errors';
import { MessageBuilder } from '../../builder/builder.js';
import {
  decodeMessage,
  getAccountMetasFromCompiledMessage,
  getInstructionsFromCompiledMessage,
} from '../decode.js';
import { serializeMessage } from '../serialize.js';
import {
  instruction,
  readonly,
  signer,
  testAddress,
  writable,
  ZERO_BLOCKHASH,
} from '../../__tests__/helpers.js';

const P = testAddress(1);
const W = testAddress(2);
const R = testAddress(3);
const X = testAddress(4);

const builder = new MessageBuilder({ logLevel: 'silent' })
  .setFeePayer(P)
  .setRecentBlockhash(ZERO_BLOCKHASH)
  .addInstruction(instruction(X, [writable(W), readonly(R)], [1, 2, 3]));

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('decodeMessage', () => {
  it('should decode what the builder serializes', () => {
    expect(decodeMessage(builder.build())).toEqual(builder.compile());
  });

  it('should reject input shorter than the header', () => {
    expect(() => decodeMessage(new Uint8Array([1, 0]))).toThrow(
      'Malformed message at offset 0: expected 3 header bytes, found 2'
    );
  });

  it('should reject a versioned message', () => {
    const bytes = builder.build();
    bytes[0] = 0x80;
    expect(() => decodeMessage(bytes)).toThrow('versioned message (prefix 0x80) is not a legacy message');
  });

  it('should reject a header requiring more signatures than accounts', () => {
    expect(() => decodeMessage(new Uint8Array([5, 0, 0, 4]))).toThrow(
      'header requires 5 signatures but the message has 4 accounts'
    );
  });

  it('should report where a truncated message ends', () => {
    const error = catchError(() => decodeMessage(builder.build().slice(0, 100)));
    expect(error).toBeInstanceOf(MalformedMessageError);
    expect(error).toMatchObject({
      offset: 100,
      reason: 'expected 32 bytes of account key 3, found 0',
    });
  });

  it('should reject an account index past the account table', () => {
    const bytes = builder.build();
    bytes[165] = 9;
    const error = catchError(() => decodeMessage(bytes));
    expect(error).toBeInstanceOf(MalformedMessageError);
    expect(error).toMatchObject({
      offset: 165,
      reason: 'instruction 0 references account 9 but the message has 4 accounts',
    });
  });

  it('should reject a repeated account key', () => {
    const bytes = serializeMessage({
      header: { numRequiredSignatures: 1, numReadonlySignedAccounts: 0, numReadonlyUnsignedAccounts: 1 },
      accountKeys: [P, W, W, X],
      recentBlockhash: ZERO_BLOCKHASH,
      instructions: [{ programIdIndex: 3, accountIndices: [2], data: new Uint8Array() }],
    });
    const error = catchError(() => decodeMessage(bytes));
    expect(error).toBeInstanceOf(MalformedMessageError);
    expect(error).toMatchObject({ offset: 68, reason: 'duplicate account key 2' });
  });

  it('should reject a malformed account count', () => {
    const error = catchError(() => decodeMessage(new Uint8Array([1, 0, 0, 0x80])));
    expect(error).toBeInstanceOf(MalformedCompactLengthError);
    expect(error).toMatchObject({ offset: 3, reason: 'truncated continuation sequence' });
  });

  it('should reject trailing bytes', () => {
    const bytes = builder.build();
    const padded = new Uint8Array(bytes.length + 1);
    padded.set(bytes);
    const error = catchError(() => decodeMessage(padded));
    expect(error).toMatchObject({ offset: 173, reason: '1 trailing bytes' });
  });
});

describe('getAccountMetasFromCompiledMessage', () => {
  it('should derive flags from header positions', () => {
    const metas = getAccountMetasFromCompiledMessage({
      header: { numRequiredSignatures: 2, numReadonlySignedAccounts: 1, numReadonlyUnsignedAccounts: 1 },
      accountKeys: [P, W, R, X],
      recentBlockhash: ZERO_BLOCKHASH,
      instructions: [],
    });
    expect(metas).toEqual([signer(P, true), signer(W), writable(R), readonly(X)]);
  });
});

describe('getInstructionsFromCompiledMessage', () => {
  it('should restore addresses and flags', () => {
    const [restored] = getInstructionsFromCompiledMessage(builder.compile());
    expect(restored.programAddress).toBe(X);
    expect(restored.accounts).toEqual([writable(W), readonly(R)]);
    expect(Array.from(restored.data)).toEqual([1, 2, 3]);
  });

  it('should reject an index past the account table', () => {
    expect(() =>
      getInstructionsFromCompiledMessage({
        header: { numRequiredSignatures: 1, numReadonlySignedAccounts: 0, numReadonlyUnsignedAccounts: 0 },
        accountKeys: [P],
        recentBlockhash: ZERO_BLOCKHASH,
        instructions: [{ programIdIndex: 2, accountIndices: [], data: new Uint8Array() }],
      })
    ).toThrow(MalformedMessageError);
  });
});
