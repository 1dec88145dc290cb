/**
 * Structured logging for flagfield
 *
 * Implements the Logger abstraction that @flagfield/core declares. Codec
 * operations accept a `logger` option and emit debug entries with the
 * registry, flag and row counts as structured context.
 *
 * @example
 * ```typescript
 * import { encode } from '@flagfield/core';
 * import { createConsoleLogger, withContext } from '@flagfield/observability';
 *
 * const logger = withContext(createConsoleLogger({ format: 'pretty' }), { service: 'qa-job' });
 * const field = encode(registry, columns, { logger });
 * ```
 */

import type {
  ConsoleLoggerConfig,
  LogContext,
  LogContextValue,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  TestLogger,
} from '@flagfield/core';

// =============================================================================
// Type Guards
// =============================================================================

export function isLogContextValue(value: unknown): value is LogContextValue {
  if (value === null) return true;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return true;
  if (Array.isArray(value)) {
    return value.every(isLogContextValue);
  }
  if (typeof value === 'object') {
    return Object.values(value).every(isLogContextValue);
  }
  return false;
}

export function isLogContext(value: unknown): value is LogContext {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(v => v === undefined || isLogContextValue(v));
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_ORDER, value);
}

export const LogLevels = {
  DEBUG: 'debug' as const,
  INFO: 'info' as const,
  WARN: 'warn' as const,
  ERROR: 'error' as const,

  order(level: LogLevel): number {
    return LOG_LEVEL_ORDER[level];
  },

  isAtLeast(level: LogLevel, minLevel: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
  },
};

// =============================================================================
// Logger Factory Functions
// =============================================================================

/**
 * Create a logger that hands every entry at or above `minLevel` to `output`.
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   minLevel: 'info',
 *   output: entry => shipToCollector(entry),
 * });
 * ```
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const minLevel = config.minLevel ?? 'debug';
  const output = config.output ?? (() => {});

  const log = (level: LogLevel, message: string, context?: LogContext, error?: Error): void => {
    if (!LogLevels.isAtLeast(level, minLevel)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
    };
    if (context !== undefined) {
      entry.context = context;
    }
    if (error !== undefined) {
      entry.error = error;
    }

    output(entry);
  };

  return {
    debug(message: string, context?: LogContext): void {
      log('debug', message, context);
    },
    info(message: string, context?: LogContext): void {
      log('info', message, context);
    },
    warn(message: string, context?: LogContext): void {
      log('warn', message, context);
    },
    error(message: string, error?: Error, context?: LogContext): void {
      log('error', message, context, error);
    },
  };
}

/**
 * Render one entry as a single JSON line or a human-readable line.
 */
export function formatLogEntry(entry: LogEntry, format: 'json' | 'pretty'): string {
  if (format === 'json') {
    return JSON.stringify({
      level: entry.level,
      message: entry.message,
      timestamp: entry.timestamp,
      ...(entry.context && { context: entry.context }),
      ...(entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message,
          stack: entry.error.stack,
        },
      }),
    });
  }

  const time = new Date(entry.timestamp).toISOString();
  let output = `[${time}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`;
  if (entry.context) {
    output += ` ${JSON.stringify(entry.context)}`;
  }
  if (entry.error) {
    output += `\n  Error: ${entry.error.message}`;
    if (entry.error.stack) {
      output += `\n  ${entry.error.stack}`;
    }
  }
  return output;
}

/**
 * Create a logger that writes to the console, JSON lines by default.
 */
export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const format = config.format ?? 'json';

  return createLogger({
    ...config,
    output: entry => {
      console.log(formatLogEntry(entry, format));
    },
  });
}

export function createNoopLogger(): Logger {
  return {
    debug(): void {},
    info(): void {},
    warn(): void {},
    error(): void {},
  };
}

/**
 * Create a logger that keeps its entries for assertions.
 *
 * @example
 * ```typescript
 * const logger = createTestLogger();
 * encode(registry, columns, { logger });
 * expect(logger.getLogsByLevel('debug').map(e => e.message)).toContain('Field encoded');
 * ```
 */
export function createTestLogger(config: LoggerConfig = {}): TestLogger {
  const logs: LogEntry[] = [];
  const logger = createLogger({
    minLevel: config.minLevel,
    output: entry => {
      logs.push(entry);
      config.output?.(entry);
    },
  });

  return {
    ...logger,
    getLogs(): LogEntry[] {
      return [...logs];
    },
    getLogsByLevel(level: LogLevel): LogEntry[] {
      return logs.filter(entry => entry.level === level);
    },
    clear(): void {
      logs.length = 0;
    },
  };
}

// =============================================================================
// Child Logger / Context
// =============================================================================

/**
 * Create a child logger that adds `context` to every entry. Context given
 * at log time wins over the bound context on key clashes.
 *
 * @example
 * ```typescript
 * const jobLogger = withContext(rootLogger, { service: 'qa-job' });
 * const registryLogger = withContext(jobLogger, { registry: 'station-qa' });
 * ```
 */
export function withContext(logger: Logger, context: LogContext): Logger {
  const mergeContext = (localContext?: LogContext): LogContext =>
    localContext === undefined ? context : { ...context, ...localContext };

  return {
    debug(message: string, localContext?: LogContext): void {
      logger.debug(message, mergeContext(localContext));
    },
    info(message: string, localContext?: LogContext): void {
      logger.info(message, mergeContext(localContext));
    },
    warn(message: string, localContext?: LogContext): void {
      logger.warn(message, mergeContext(localContext));
    },
    error(message: string, error?: Error, localContext?: LogContext): void {
      logger.error(message, error, mergeContext(localContext));
    },
  };
}

/**
 * Run `fn`, then log `operation` at info level with its duration. A thrown
 * error is logged at error level with its code, then rethrown.
 */
export function timed<T>(logger: Logger, operation: string, fn: () => T, context: LogContext = {}): T {
  const started = Date.now();
  try {
    const result = fn();
    logger.info(`${operation} completed`, { ...context, operation, durationMs: Date.now() - started });
    return result;
  } catch (error) {
    const failure = error instanceof Error ? error : new Error(String(error));
    const code = 'code' in failure && typeof failure.code === 'string' ? failure.code : undefined;
    logger.error(`${operation} failed`, failure, {
      ...context,
      operation,
      durationMs: Date.now() - started,
      ...(code !== undefined && { errorCode: code }),
    });
    throw error;
  }
}
