/**
 * @flagfield/observability
 *
 * Logger implementations for the codec. @flagfield/core only declares the
 * Logger interface, so applications that want no logging do not bundle
 * this package.
 *
 * @example
 * ```typescript
 * import { createFlagBuilder } from '@flagfield/core';
 * import { createConsoleLogger } from '@flagfield/observability';
 *
 * const logger = createConsoleLogger({ format: 'json', minLevel: 'info' });
 * const field = createFlagBuilder(records, { name: 'qa', logger })
 *   .binary('missing', r => r.value === undefined)
 *   .encode();
 * ```
 */

// Re-export logging types from core
export type {
  Logger,
  LogLevel,
  LogEntry,
  LoggerConfig,
  ConsoleLoggerConfig,
  TestLogger,
  LogContext,
  LogContextValue,
} from '@flagfield/core';

export {
  // Type guards
  isLogContext,
  isLogContextValue,
  isLogLevel,
  // Factory functions
  createLogger,
  createConsoleLogger,
  createNoopLogger,
  createTestLogger,
  // Context helpers
  withContext,
  timed,
  // Formatting
  formatLogEntry,
  // Constants and utilities
  LogLevels,
} from './logging.js';
