/**
 * @solwire/tx-message
 *
 * Compiles instructions into the legacy Solana transaction-message wire format.
 *
 * Features:
 * - Deduplicated, deterministic account table with fee payer first
 * - Header counts and index-based instruction compilation
 * - Recent blockhash or durable nonce lifetimes
 * - Byte-identical re-serialization of decoded messages
 * - Interop with Kit instructions
 *
 * @packageDocumentation
 */

// Main export - message builder
export { MessageBuilder } from './builder/builder.js';
export type { MessageBuilderConfig } from './builder/builder.js';

// Types
export type {
  AccountMeta,
  MessageInstruction,
  NonceInfo,
  MessageHeader,
  CompiledInstruction,
  CompiledMessage,
} from './types.js';

// Compact-length codec
export * from './codecs/compact-length.js';

// Account table
export { AccountMetaTable } from './accounts/account-meta-table.js';
export {
  applyPriorOrdering,
  getAccountClassRank,
  groupByAccountClass,
  placeFeePayerFirst,
} from './accounts/ordering.js';

// Header
export * from './header/header.js';

// Instructions
export * from './instructions/compile.js';
export * from './instructions/kit.js';

// Serialization
export * from './serialization/blockhash.js';
export * from './serialization/serialize.js';
export * from './serialization/decode.js';

// Nonce - durable nonce helpers
export * from './nonce/advance-nonce.js';

// Logging
export { createLevelLogger, defaultLogger } from './logging/logger.js';
export type { LevelLogger, Logger, LogLevel } from './logging/logger.js';

// Errors (re-exported for convenience)
export * from '@solwire/tx-errors';
