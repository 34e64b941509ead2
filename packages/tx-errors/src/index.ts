/**
 * @solwire/tx-errors
 *
 * Typed error definitions and error handling utilities for legacy message compilation.
 *
 * @packageDocumentation
 */

export * from './errors.js';
export * from './predicates.js';
export * from './messages.js';
