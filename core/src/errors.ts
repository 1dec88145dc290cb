/**
 * Typed exception classes for flagfield
 *
 * Error hierarchy:
 * - FlagFieldError: Base error class for all flagfield errors
 *   - RegistryError: Registry growth failures (duplicate names, overlapping or gapped ranges)
 *   - CodecError: Per-flag encoding failures (unknown precision, count overflow, case overlap)
 *   - FieldError: Encode/decode shape failures (missing columns, length or width mismatches)
 *   - ValidationError: Raw input validation failures (type mismatch, NA without sentinel)
 *
 * None of these are retryable: each one points at a configuration or data-shape
 * defect that has to be fixed by the caller.
 *
 * @example
 * ```typescript
 * import { RegistryError, FieldError, ErrorCode } from '@flagfield/core';
 *
 * try {
 *   registry = appendFlag(registry, { name: 'missing', kind: { type: 'binary' }, position: 0 });
 * } catch (error) {
 *   if (error instanceof RegistryError && error.code === ErrorCode.BIT_RANGE_COLLISION) {
 *     logger.warn(error.message, { code: error.code });
 *   }
 * }
 * ```
 */

import { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard error codes for programmatic error handling.
 *
 * @example
 * ```typescript
 * if (error.code === ErrorCode.COUNT_OVERFLOW) {
 *   // Re-learn the count width from the full column
 * }
 * ```
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL_ERROR = 'INTERNAL_ERROR',

  // Registry errors
  DUPLICATE_FLAG_NAME = 'DUPLICATE_FLAG_NAME',
  BIT_RANGE_COLLISION = 'BIT_RANGE_COLLISION',
  BIT_RANGE_GAP = 'BIT_RANGE_GAP',
  REGISTRY_SEALED = 'REGISTRY_SEALED',

  // Codec errors
  UNKNOWN_PRECISION = 'UNKNOWN_PRECISION',
  COUNT_OVERFLOW = 'COUNT_OVERFLOW',
  CASE_OVERLAP = 'CASE_OVERLAP',

  // Field errors
  MISSING_COLUMN = 'MISSING_COLUMN',
  LENGTH_MISMATCH = 'LENGTH_MISMATCH',
  FIELD_WIDTH_EXCEEDED = 'FIELD_WIDTH_EXCEEDED',
  REGISTRY_FIELD_MISMATCH = 'REGISTRY_FIELD_MISMATCH',

  // Validation errors
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  TYPE_MISMATCH = 'TYPE_MISMATCH',
  NULL_NOT_ALLOWED = 'NULL_NOT_ALLOWED',
  INVALID_FORMAT = 'INVALID_FORMAT',
  JSON_PARSE_ERROR = 'JSON_PARSE_ERROR',
  SCHEMA_VALIDATION_ERROR = 'SCHEMA_VALIDATION_ERROR',
}

/**
 * Type guard to check if a string is a valid ErrorCode.
 */
export function isErrorCode(code: string): code is ErrorCode {
  const codes: readonly string[] = Object.values(ErrorCode);
  return codes.includes(code);
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all flagfield errors
 *
 * All flagfield-specific errors extend this class, allowing for:
 * - Catching every codec error with a single catch block
 * - Programmatic identification via the `code` property
 * - Structured `details` and an optional `suggestion` for logging
 */
export class FlagFieldError extends Error {
  /**
   * Error code for programmatic identification.
   * Use ErrorCode enum values for consistency.
   */
  public readonly code: string;

  /**
   * Structured details for debugging (flag, registry, positions, values)
   */
  public readonly details?: Record<string, unknown>;

  /**
   * Helpful suggestion for resolving the error (when applicable)
   */
  public readonly suggestion?: string;

  /**
   * Timestamp when the error was created (milliseconds since epoch)
   */
  public readonly timestamp: number;

  /**
   * @param message - Human-readable error message
   * @param code - Error code for programmatic identification (use ErrorCode enum)
   * @param details - Optional structured details for debugging
   * @param suggestion - Optional helpful suggestion for resolving the error
   */
  constructor(
    message: string,
    code: string = ErrorCode.UNKNOWN,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message);
    this.name = 'FlagFieldError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
    this.timestamp = Date.now();

    captureStackTrace(this, FlagFieldError);
  }

  /**
   * Format error for logging with all context.
   * Returns a structured object suitable for JSON logging.
   */
  toLogContext(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
      ...(this.suggestion && { suggestion: this.suggestion }),
      timestamp: this.timestamp,
    };
  }

  /**
   * Format error as a detailed string for debugging.
   */
  toDetailedString(): string {
    const parts = [`[${this.code}] ${this.message}`];
    if (this.details) {
      const ctx = Object.entries(this.details)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(', ');
      parts.push(`Details: ${ctx}`);
    }
    if (this.suggestion) {
      parts.push(`Suggestion: ${this.suggestion}`);
    }
    return parts.join('\n  ');
  }
}

// =============================================================================
// Registry Errors
// =============================================================================

/**
 * Error thrown when a registry cannot grow as requested
 *
 * @example
 * ```typescript
 * throw RegistryError.duplicateFlagName('qa', 'missing');
 * throw RegistryError.bitRangeCollision('qa', 'value', { start: 0, width: 16 }, 'missing');
 * ```
 */
export class RegistryError extends FlagFieldError {
  constructor(
    message: string,
    code: string = ErrorCode.DUPLICATE_FLAG_NAME,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'RegistryError';
    captureStackTrace(this, RegistryError);
  }

  static duplicateFlagName(registry: string, flag: string): RegistryError {
    return new RegistryError(
      `Flag "${flag}" is already defined in registry "${registry}"`,
      ErrorCode.DUPLICATE_FLAG_NAME,
      { registry, flag },
      'Choose a unique flag name for every test mapped into one registry'
    );
  }

  static bitRangeCollision(
    registry: string,
    flag: string,
    range: { start: number; width: number },
    occupiedBy: string
  ): RegistryError {
    const end = range.start + range.width - 1;
    return new RegistryError(
      `Bits ${range.start}..${end} requested by "${flag}" overlap flag "${occupiedBy}"`,
      ErrorCode.BIT_RANGE_COLLISION,
      { registry, flag, start: range.start, width: range.width, occupiedBy },
      'Omit the position to append after the last occupied bit'
    );
  }

  static bitRangeGap(registry: string, flag: string, position: number, extent: number): RegistryError {
    return new RegistryError(
      `Position ${position} for "${flag}" would leave bits ${extent}..${position - 1} unassigned`,
      ErrorCode.BIT_RANGE_GAP,
      { registry, flag, position, extent },
      `The next free position in registry "${registry}" is ${extent}`
    );
  }

  static sealed(registry: string, flag: string): RegistryError {
    return new RegistryError(
      `Registry "${registry}" is sealed; cannot add flag "${flag}" after encoding started`,
      ErrorCode.REGISTRY_SEALED,
      { registry, flag },
      'Map every flag before calling encode()'
    );
  }
}

// =============================================================================
// Codec Errors
// =============================================================================

/**
 * Error thrown when a flag codec cannot represent a value or layout
 */
export class CodecError extends FlagFieldError {
  constructor(
    message: string,
    code: string = ErrorCode.INTERNAL_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'CodecError';
    captureStackTrace(this, CodecError);
  }

  static unknownPrecision(precision: string, supported: readonly string[]): CodecError {
    return new CodecError(
      `Unknown precision "${precision}"`,
      ErrorCode.UNKNOWN_PRECISION,
      { precision, supported: [...supported] },
      `Supported precisions: ${supported.join(', ')}`
    );
  }

  static countOverflow(flag: string, value: number, maxValue: number, row?: number): CodecError {
    return new CodecError(
      `Count ${value} exceeds the maximum ${maxValue} of flag "${flag}"`,
      ErrorCode.COUNT_OVERFLOW,
      { flag, value, maxValue, ...(row !== undefined && { row }) },
      'Learn the count width from the complete column before encoding'
    );
  }

  static caseOverlap(flag: string, matches: readonly number[], row?: number): CodecError {
    return new CodecError(
      `Cases ${matches.join(', ')} of flag "${flag}" are true at once`,
      ErrorCode.CASE_OVERLAP,
      { flag, matches: [...matches], ...(row !== undefined && { row }) },
      "Use overlap 'first' or 'last' to pick one case, or make the predicates exclusive"
    );
  }
}

// =============================================================================
// Field Errors
// =============================================================================

/**
 * Error thrown when inputs to encode/decode do not match the registry's shape
 */
export class FieldError extends FlagFieldError {
  constructor(
    message: string,
    code: string = ErrorCode.INTERNAL_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'FieldError';
    captureStackTrace(this, FieldError);
  }

  static missingColumn(registry: string, flag: string): FieldError {
    return new FieldError(
      `No raw column supplied for flag "${flag}"`,
      ErrorCode.MISSING_COLUMN,
      { registry, flag },
      'Pass one raw column per flag defined in the registry'
    );
  }

  static lengthMismatch(flag: string, expected: number, actual: number): FieldError {
    return new FieldError(
      `Column "${flag}" has ${actual} values, expected ${expected}`,
      ErrorCode.LENGTH_MISMATCH,
      { flag, expected, actual }
    );
  }

  static fieldWidthExceeded(registry: string, width: number, maxWidth: number): FieldError {
    return new FieldError(
      `Registry "${registry}" needs ${width} bits, more than the supported ${maxWidth}`,
      ErrorCode.FIELD_WIDTH_EXCEEDED,
      { registry, width, maxWidth },
      'Split the flags over several registries'
    );
  }

  static registryFieldMismatch(registry: string, registryWidth: number, fieldWidth: number): FieldError {
    return new FieldError(
      `Field of ${fieldWidth} bits cannot be decoded with registry "${registry}" of ${registryWidth} bits`,
      ErrorCode.REGISTRY_FIELD_MISMATCH,
      { registry, registryWidth, fieldWidth },
      'Decode with the registry the field was encoded with'
    );
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when raw input or options fail validation
 *
 * @example
 * ```typescript
 * throw ValidationError.typeMismatch('missing', 'boolean', 'string', 3);
 * throw ValidationError.nullNotAllowed('run_length', 7);
 * ```
 */
export class ValidationError extends FlagFieldError {
  constructor(
    message: string,
    code: string = ErrorCode.VALIDATION_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'ValidationError';
    captureStackTrace(this, ValidationError);
  }

  static typeMismatch(flag: string, expectedType: string, actualType: string, row?: number): ValidationError {
    const at = row === undefined ? '' : ` at row ${row}`;
    return new ValidationError(
      `Type mismatch for flag "${flag}"${at}: expected ${expectedType}, got ${actualType}`,
      ErrorCode.TYPE_MISMATCH,
      { flag, expectedType, actualType, ...(row !== undefined && { row }) },
      `Ensure every raw value of "${flag}" is ${expectedType}`
    );
  }

  static nullNotAllowed(flag: string, row?: number): ValidationError {
    const at = row === undefined ? '' : ` at row ${row}`;
    return new ValidationError(
      `Flag "${flag}" has a missing value${at} but reserves no NA sentinel`,
      ErrorCode.NULL_NOT_ALLOWED,
      { flag, ...(row !== undefined && { row }) },
      'Declare the flag with { na: true } to encode missing values'
    );
  }

  static invalidFormat(what: string, reason: string, details?: Record<string, unknown>): ValidationError {
    return new ValidationError(
      `Invalid ${what}: ${reason}`,
      ErrorCode.INVALID_FORMAT,
      { what, ...details }
    );
  }
}

// =============================================================================
// Error Factory Utilities
// =============================================================================

/**
 * Wrap an unknown error as a FlagFieldError.
 *
 * @param error - The error to wrap
 * @param operation - The operation that failed (for context)
 * @returns The original if already a FlagFieldError, otherwise a wrapped one
 */
export function wrapError(error: unknown, operation?: string): FlagFieldError {
  if (error instanceof FlagFieldError) {
    return error;
  }

  if (error instanceof Error) {
    return new FlagFieldError(
      error.message,
      ErrorCode.INTERNAL_ERROR,
      { operation, originalError: error.name }
    );
  }

  return new FlagFieldError(
    String(error),
    ErrorCode.INTERNAL_ERROR,
    { operation }
  );
}

/**
 * Check if an error is a FlagFieldError with a specific code.
 */
export function hasErrorCode(error: unknown, code: ErrorCode | string): boolean {
  return error instanceof FlagFieldError && error.code === code;
}
