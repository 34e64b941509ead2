/**
 * Legacy message builder.
 *
 * Collects instructions, a fee payer and a lifetime (recent blockhash or durable
 * nonce), then compiles them into the legacy message wire format.
 *
 * @example
 * ```ts
 * const bytes = new MessageBuilder()
 *   .setFeePayer(payer)
 *   .setRecentBlockhash(blockhash)
 *   .addInstruction(transferIx)
 *   .build();
 *
 * // Durable nonce: the advance instruction is prepended at build time
 * const bytes = new MessageBuilder()
 *   .setFeePayer(payer)
 *   .setNonceInfo(createNonceInfo({ nonce, nonceAccountAddress, nonceAuthorityAddress }))
 *   .addInstruction(transferIx)
 *   .build();
 *
 * // Re-serialize a decoded message byte for byte
 * const same = MessageBuilder.fromBytes(bytes).build();
 * ```
 *
 * @packageDocumentation
 */

import type { Address } from '@solana/addresses';
import type { ReadonlyUint8Array } from '@solana/codecs';
import {
  MissingBlockhashOrNonceError,
  MissingFeePayerError,
  NoInstructionsError,
} from '@solwire/tx-errors';
import { AccountMetaTable } from '../accounts/account-meta-table.js';
import { applyPriorOrdering, groupByAccountClass, placeFeePayerFirst } from '../accounts/ordering.js';
import { computeMessageHeader } from '../header/header.js';
import { compileInstructions } from '../instructions/compile.js';
import { createLevelLogger, type LevelLogger, type Logger, type LogLevel } from '../logging/logger.js';
import { decodeBlockhash } from '../serialization/blockhash.js';
import {
  decodeMessage,
  getAccountMetasFromCompiledMessage,
  getInstructionsFromCompiledMessage,
} from '../serialization/decode.js';
import { serializeMessage } from '../serialization/serialize.js';
import type { AccountMeta, CompiledMessage, MessageInstruction, NonceInfo } from '../types.js';

/**
 * Configuration for the message builder.
 */
export interface MessageBuilderConfig {
  /**
   * Logging level.
   */
  logLevel?: LogLevel;

  /**
   * Custom logger function. Defaults to the console.
   */
  logger?: Logger;

  /**
   * Account order of a previously decoded message. When it covers every account
   * of the built message, that order is kept so an unmodified message
   * re-serializes to identical bytes.
   */
  accountKeys?: readonly Address[];
}

// Stored instructions must not follow later changes the caller makes to its own objects.
function copyInstruction(instruction: MessageInstruction): MessageInstruction {
  return {
    programAddress: instruction.programAddress,
    accounts: instruction.accounts.map((account) => ({ ...account })),
    data: new Uint8Array(instruction.data),
  };
}

function mergeInstructionAccounts(table: AccountMetaTable, instruction: MessageInstruction): void {
  table.addAll(instruction.accounts);
  table.add({ address: instruction.programAddress, isSigner: false, isWritable: false });
}

/**
 * Immutable builder: every setter returns a new builder and leaves the original untouched.
 */
export class MessageBuilder {
  private feePayer?: Address;
  private recentBlockhash?: string;
  private nonceInfo?: NonceInfo;
  private accountKeys?: readonly Address[];
  private instructions: MessageInstruction[] = [];
  private accounts = new AccountMetaTable();

  private readonly config: {
    logLevel: LogLevel;
    logger?: Logger;
  };
  private readonly log: LevelLogger;

  constructor(config: MessageBuilderConfig = {}) {
    this.config = {
      logLevel: config.logLevel ?? 'minimal',
      ...(config.logger && { logger: config.logger }),
    };
    this.log = createLevelLogger(this.config.logLevel, this.config.logger);
    if (config.accountKeys) {
      this.accountKeys = [...config.accountKeys];
    }
  }

  /**
   * Rebuild a builder from a compiled (typically decoded) message.
   * The fee payer is the first account key, flags come from the header and
   * the message's account order is kept. Keys no instruction references stay
   * in the table.
   */
  static fromCompiledMessage(
    message: CompiledMessage,
    config: Omit<MessageBuilderConfig, 'accountKeys'> = {}
  ): MessageBuilder {
    const base = new MessageBuilder({ ...config, accountKeys: message.accountKeys });
    base.accounts.addAll(getAccountMetasFromCompiledMessage(message));

    let builder = base
      .setRecentBlockhash(message.recentBlockhash)
      .addInstructions(getInstructionsFromCompiledMessage(message));
    if (message.accountKeys.length > 0) {
      builder = builder.setFeePayer(message.accountKeys[0]);
    }
    return builder;
  }

  /**
   * Rebuild a builder from legacy message bytes.
   */
  static fromBytes(
    bytes: ReadonlyUint8Array,
    config: Omit<MessageBuilderConfig, 'accountKeys'> = {}
  ): MessageBuilder {
    return MessageBuilder.fromCompiledMessage(decodeMessage(bytes), config);
  }

  /**
   * Set the fee payer. It is always placed first as a writable signer.
   */
  setFeePayer(feePayer: Address): MessageBuilder {
    const builder = this.clone();
    builder.feePayer = feePayer;
    return builder;
  }

  /**
   * Set the recent blockhash (base-58). Ignored while nonce information is set.
   */
  setRecentBlockhash(blockhash: string): MessageBuilder {
    const builder = this.clone();
    builder.recentBlockhash = blockhash;
    return builder;
  }

  /**
   * Use a durable nonce instead of a recent blockhash.
   */
  setNonceInfo(nonceInfo: NonceInfo): MessageBuilder {
    const builder = this.clone();
    builder.nonceInfo = { nonce: nonceInfo.nonce, instruction: copyInstruction(nonceInfo.instruction) };
    return builder;
  }

  /**
   * Set the account order to preserve (see {@link MessageBuilderConfig.accountKeys}).
   */
  setAccountKeys(accountKeys: readonly Address[]): MessageBuilder {
    const builder = this.clone();
    builder.accountKeys = [...accountKeys];
    return builder;
  }

  /**
   * Add a single instruction. Its accounts are merged into the account table,
   * followed by its program as a read-only non-signer.
   */
  addInstruction(instruction: MessageInstruction): MessageBuilder {
    const builder = this.clone();
    const copy = copyInstruction(instruction);
    mergeInstructionAccounts(builder.accounts, copy);
    builder.instructions.push(copy);
    return builder;
  }

  /**
   * Add multiple instructions in order.
   */
  addInstructions(instructions: readonly MessageInstruction[]): MessageBuilder {
    const builder = this.clone();
    for (const instruction of instructions) {
      const copy = copyInstruction(instruction);
      mergeInstructionAccounts(builder.accounts, copy);
      builder.instructions.push(copy);
    }
    return builder;
  }

  getFeePayer(): Address | undefined {
    return this.feePayer;
  }

  /**
   * Accounts merged so far, in insertion order, before fee payer placement.
   */
  getAccountMetas(): AccountMeta[] {
    return this.accounts.snapshot();
  }

  /**
   * Compile into the structured message: final account order, header and
   * index-based instructions. Does not modify the builder.
   */
  compile(): CompiledMessage {
    const recentBlockhash = this.nonceInfo?.nonce ?? this.recentBlockhash;
    if (recentBlockhash === undefined) {
      throw new MissingBlockhashOrNonceError();
    }
    if (this.instructions.length === 0) {
      throw new NoInstructionsError();
    }

    let accounts = this.accounts;
    let instructions: readonly MessageInstruction[] = this.instructions;
    if (this.nonceInfo) {
      // The advance instruction runs first, so its accounts are merged first too.
      accounts = new AccountMetaTable();
      mergeInstructionAccounts(accounts, this.nonceInfo.instruction);
      accounts.addAll(this.accounts.snapshot());
      instructions = [this.nonceInfo.instruction, ...this.instructions];
    }

    if (this.feePayer === undefined) {
      throw new MissingFeePayerError();
    }

    const orderedAccounts = this.finalizeAccounts(accounts.snapshot(), this.feePayer);
    const accountKeys = orderedAccounts.map((meta) => meta.address);
    const compiledInstructions = compileInstructions(instructions, accountKeys);
    const header = computeMessageHeader(orderedAccounts);
    decodeBlockhash(recentBlockhash);

    return {
      header,
      accountKeys,
      recentBlockhash,
      instructions: compiledInstructions,
    };
  }

  /**
   * Compile and serialize into the legacy message wire format.
   * Calling it again without changes returns identical bytes.
   */
  build(): Uint8Array {
    const message = this.compile();
    const bytes = serializeMessage(message);

    this.log.verbose('Built message', {
      accounts: message.accountKeys.length,
      instructions: message.instructions.length,
      header: message.header,
      size: bytes.length,
    });

    return bytes;
  }

  /**
   * Fee payer first, then accounts grouped by signer/writable class, unless a
   * prior account order covers the whole table.
   */
  private finalizeAccounts(metas: readonly AccountMeta[], feePayer: Address): AccountMeta[] {
    const ordered = groupByAccountClass(placeFeePayerFirst(metas, feePayer));
    if (!this.accountKeys) {
      return ordered;
    }

    const reordered = applyPriorOrdering(ordered, this.accountKeys);
    if (!reordered) {
      const known = new Set(this.accountKeys);
      this.log.minimal('Prior account order does not cover every account, using computed order', {
        missing: ordered.filter((meta) => !known.has(meta.address)).map((meta) => meta.address),
      });
      return ordered;
    }
    return reordered;
  }

  /**
   * Clone the builder for immutability.
   */
  private clone(): MessageBuilder {
    const builder = new MessageBuilder({
      logLevel: this.config.logLevel,
      ...(this.config.logger && { logger: this.config.logger }),
      ...(this.accountKeys && { accountKeys: this.accountKeys }),
    });
    if (this.feePayer !== undefined) {
      builder.feePayer = this.feePayer;
    }
    if (this.recentBlockhash !== undefined) {
      builder.recentBlockhash = this.recentBlockhash;
    }
    if (this.nonceInfo !== undefined) {
      builder.nonceInfo = this.nonceInfo;
    }
    builder.instructions = [...this.instructions];
    builder.accounts = this.accounts.clone();
    return builder;
  }
}
