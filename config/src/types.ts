/**
 * @flagfield/config - Type Definitions
 *
 * Configuration schema shared by codec jobs: encoder limits, builder
 * defaults and logging.
 *
 * @packageDocumentation
 * @module @flagfield/config
 */

import type { CaseOverlap, LogLevel, PrecisionName } from '@flagfield/core';

// =============================================================================
// Utility Types
// =============================================================================

/**
 * Deep partial type that makes all nested properties optional.
 */
export type DeepPartial<T> = T extends object
  ? { [P in keyof T]?: DeepPartial<T[P]> }
  : T;

// =============================================================================
// Codec Configuration
// =============================================================================

/**
 * @example
 * ```typescript
 * const codecConfig: CodecConfig = {
 *   maxFieldWidth: 32,
 *   defaultPrecision: 'half',
 *   caseOverlap: 'error',
 *   lookupSeparator: '|',
 * };
 * ```
 */
export interface CodecConfig {
  /** Widest packed field the target storage accepts, in bits (1..64) */
  maxFieldWidth: number;

  /** Precision of numeric flags that do not name one */
  defaultPrecision: PrecisionName;

  /** Overlap rule of non-exclusive case flags that do not name one */
  caseOverlap: CaseOverlap;

  /** Separator between flag bit groups in lookup-table output */
  lookupSeparator: string;
}

// =============================================================================
// Observability Configuration
// =============================================================================

export type LogFormat = 'json' | 'pretty';

export interface ObservabilityConfig {
  /** Minimum log level */
  logLevel: LogLevel;

  /** Log output format */
  logFormat: LogFormat;

  /** Added to every log entry as `service` */
  serviceName: string;
}

// =============================================================================
// Unified Configuration
// =============================================================================

export interface FlagFieldConfig {
  codec: CodecConfig;
  observability: ObservabilityConfig;
}

// =============================================================================
// Validation Types
// =============================================================================

export interface ConfigValidationError {
  /** Path to the invalid field (e.g., 'codec.maxFieldWidth') */
  path: string;
  message: string;
  value: unknown;
  suggestion?: string;
}

export interface ConfigValidationWarning {
  path: string;
  message: string;
  value: unknown;
  recommendation?: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
  warnings: ConfigValidationWarning[];
}

// =============================================================================
// Environment Configuration Types
// =============================================================================

export interface EnvConfigOptions {
  /** Environment variable prefix (default: 'FLAGFIELD') */
  prefix?: string;

  /** Custom environment object (default: process.env) */
  env?: Record<string, string | undefined>;
}
