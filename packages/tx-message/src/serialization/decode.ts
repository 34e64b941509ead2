/**
 * Legacy message decoding.
 *
 * @packageDocumentation
 */

import { getAddressDecoder, type Address } from '@solana/addresses';
import type { ReadonlyUint8Array } from '@solana/codecs';
import { getBase58Decoder } from '@solana/codecs-strings';
import { MalformedMessageError } from '@solwire/tx-errors';
import { decodeCompactLength } from '../codecs/compact-length.js';
import { getMessageHeaderDecoder, MESSAGE_HEADER_LENGTH } from '../header/header.js';
import type {
  AccountMeta,
  CompiledInstruction,
  CompiledMessage,
  MessageHeader,
  MessageInstruction,
} from '../types.js';
import { BLOCKHASH_LENGTH } from './blockhash.js';

const ADDRESS_LENGTH = 32;
const VERSION_PREFIX_MASK = 0x80;

/**
 * Sequential reader over message bytes. Every read checks bounds.
 */
class MessageReader {
  private offset = 0;

  constructor(private readonly bytes: ReadonlyUint8Array) {}

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  readCompactLength(): number {
    const [value, consumed] = decodeCompactLength(this.bytes, this.offset);
    this.offset += consumed;
    return value;
  }

  readByte(what: string): number {
    this.ensure(1, what);
    return this.bytes[this.offset++];
  }

  readBytes(length: number, what: string): Uint8Array {
    this.ensure(length, what);
    const bytes = this.bytes.slice(this.offset, this.offset + length);
    this.offset += length;
    return bytes;
  }

  private ensure(length: number, what: string): void {
    if (this.remaining < length) {
      throw new MalformedMessageError(
        `expected ${length} bytes of ${what}, found ${this.remaining}`,
        this.offset
      );
    }
  }
}

function assertHeaderConsistent(header: MessageHeader, accountCount: number): void {
  const {
    numRequiredSignatures,
    numReadonlySignedAccounts,
    numReadonlyUnsignedAccounts,
  } = header;
  if (numRequiredSignatures > accountCount) {
    throw new MalformedMessageError(
      `header requires ${numRequiredSignatures} signatures but the message has ${accountCount} accounts`,
      0
    );
  }
  if (numReadonlySignedAccounts > numRequiredSignatures) {
    throw new MalformedMessageError(
      `header marks ${numReadonlySignedAccounts} read-only signers out of ${numRequiredSignatures} signers`,
      1
    );
  }
  if (numReadonlyUnsignedAccounts > accountCount - numRequiredSignatures) {
    throw new MalformedMessageError(
      `header marks ${numReadonlyUnsignedAccounts} read-only non-signers out of ${accountCount - numRequiredSignatures}`,
      2
    );
  }
}

/**
 * Decode legacy message bytes.
 *
 * @throws {MalformedMessageError} on truncated input, a versioned message,
 * inconsistent header counts, a repeated account key, out-of-range account
 * indices or trailing bytes
 * @throws {MalformedCompactLengthError} on an invalid length prefix
 */
export function decodeMessage(bytes: ReadonlyUint8Array): CompiledMessage {
  if (bytes.length < MESSAGE_HEADER_LENGTH) {
    throw new MalformedMessageError(
      `expected ${MESSAGE_HEADER_LENGTH} header bytes, found ${bytes.length}`,
      0
    );
  }
  if ((bytes[0] & VERSION_PREFIX_MASK) !== 0) {
    throw new MalformedMessageError(
      `versioned message (prefix 0x${bytes[0].toString(16)}) is not a legacy message`,
      0
    );
  }

  const reader = new MessageReader(bytes);
  const header = getMessageHeaderDecoder().decode(reader.readBytes(MESSAGE_HEADER_LENGTH, 'header'));

  const accountCount = reader.readCompactLength();
  assertHeaderConsistent(header, accountCount);

  const addressDecoder = getAddressDecoder();
  const accountKeys: Address[] = [];
  const seen = new Set<Address>();
  for (let i = 0; i < accountCount; i++) {
    const keyOffset = reader.position;
    const key = addressDecoder.decode(reader.readBytes(ADDRESS_LENGTH, `account key ${i}`));
    if (seen.has(key)) {
      throw new MalformedMessageError(`duplicate account key ${i}`, keyOffset);
    }
    seen.add(key);
    accountKeys.push(key);
  }

  const recentBlockhash = getBase58Decoder().decode(
    reader.readBytes(BLOCKHASH_LENGTH, 'recent blockhash')
  );

  const instructionCount = reader.readCompactLength();
  const instructions: CompiledInstruction[] = [];
  for (let i = 0; i < instructionCount; i++) {
    const indexOffset = reader.position;
    const programIdIndex = reader.readByte(`instruction ${i} program index`);
    const accountIndices = Array.from(
      reader.readBytes(reader.readCompactLength(), `instruction ${i} account indices`)
    );
    const data = reader.readBytes(reader.readCompactLength(), `instruction ${i} data`);

    for (const index of [programIdIndex, ...accountIndices]) {
      if (index >= accountCount) {
        throw new MalformedMessageError(
          `instruction ${i} references account ${index} but the message has ${accountCount} accounts`,
          indexOffset
        );
      }
    }
    instructions.push({ programIdIndex, accountIndices, data });
  }

  if (reader.remaining > 0) {
    throw new MalformedMessageError(`${reader.remaining} trailing bytes`, reader.position);
  }

  return { header, accountKeys, recentBlockhash, instructions };
}

/**
 * Signer/writable flags of every account key, derived from the header.
 */
export function getAccountMetasFromCompiledMessage(message: CompiledMessage): AccountMeta[] {
  const { numRequiredSignatures, numReadonlySignedAccounts, numReadonlyUnsignedAccounts } =
    message.header;
  const accountCount = message.accountKeys.length;

  return message.accountKeys.map((address, index) => {
    const isSigner = index < numRequiredSignatures;
    const isWritable = isSigner
      ? index < numRequiredSignatures - numReadonlySignedAccounts
      : index < accountCount - numReadonlyUnsignedAccounts;
    return { address, isSigner, isWritable };
  });
}

/**
 * Expand compiled instructions back to address-based instructions.
 * Each account reference carries the flags its key has in the message.
 */
export function getInstructionsFromCompiledMessage(message: CompiledMessage): MessageInstruction[] {
  const metas = getAccountMetasFromCompiledMessage(message);
  const metaAt = (index: number): AccountMeta => {
    const meta = metas[index];
    if (meta === undefined) {
      throw new MalformedMessageError(
        `account index ${index} is out of range for ${metas.length} accounts`,
        0
      );
    }
    return meta;
  };

  return message.instructions.map((instruction) => ({
    programAddress: metaAt(instruction.programIdIndex).address,
    accounts: instruction.accountIndices.map((index) => ({ ...metaAt(index) })),
    data: instruction.data,
  }));
}
