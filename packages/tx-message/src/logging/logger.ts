/**
 * Build logging.
 *
 * @packageDocumentation
 */

/**
 * Logging level.
 * - `silent`: nothing
 * - `minimal`: fallbacks the caller should know about
 * - `verbose`: also a summary of every built message
 */
export type LogLevel = 'silent' | 'minimal' | 'verbose';

/**
 * Custom logger function.
 */
export type Logger = (message: string, data?: Record<string, unknown>) => void;

/**
 * Default logger (console).
 */
export function defaultLogger(message: string, data?: Record<string, unknown>): void {
  if (data) {
    console.log(`[Solwire] ${message}`, data);
  } else {
    console.log(`[Solwire] ${message}`);
  }
}

/**
 * Logger gated by level.
 */
export interface LevelLogger {
  minimal(message: string, data?: Record<string, unknown>): void;
  verbose(message: string, data?: Record<string, unknown>): void;
}

/**
 * Create a logger that only forwards messages at or below `level`.
 */
export function createLevelLogger(level: LogLevel, logger: Logger = defaultLogger): LevelLogger {
  return {
    minimal(message, data) {
      if (level !== 'silent') logger(message, data);
    },
    verbose(message, data) {
      if (level === 'verbose') logger(message, data);
    },
  };
}
