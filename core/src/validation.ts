/**
 * Type-safe JSON parsing
 *
 * parseJSON() checks parsed JSON against any zod-compatible schema and
 * reports failures through the ValidationError hierarchy.
 *
 * @module validation
 */

import { ErrorCode, ValidationError } from './errors.js';
import { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Schema Shape
// =============================================================================

/**
 * The part of a ZodError the parser reports
 */
export interface ZodErrorLike {
  issues: Array<{
    code: string;
    path: (string | number)[];
    message: string;
  }>;
  message: string;
}

/**
 * The part of a zod schema the parser drives
 */
export interface ZodSchemaLike<T> {
  safeParse(data: unknown): { success: true; data: T } | { success: false; error: ZodErrorLike };
}

export type SafeParseJSONResult<T> =
  | { success: true; data: T; error?: never }
  | { success: false; data?: never; error: ZodErrorLike };

// =============================================================================
// Errors
// =============================================================================

/**
 * Thrown when a string is not JSON at all.
 */
export class JSONParseError extends ValidationError {
  constructor(message: string, cause?: unknown) {
    super(
      message,
      ErrorCode.JSON_PARSE_ERROR,
      { cause: cause instanceof Error ? cause.message : String(cause) },
      'Ensure the JSON string is valid.'
    );
    this.name = 'JSONParseError';
    this.cause = cause;
    captureStackTrace(this, JSONParseError);
  }
}

/**
 * Thrown when parsed JSON does not match its schema.
 */
export class JSONValidationError extends ValidationError {
  public readonly zodError: ZodErrorLike;

  constructor(message: string, zodError: ZodErrorLike) {
    super(
      message,
      ErrorCode.SCHEMA_VALIDATION_ERROR,
      { issues: zodError.issues.map(i => ({ path: i.path, message: i.message })) },
      'Ensure the JSON data matches the expected schema.'
    );
    this.name = 'JSONValidationError';
    this.zodError = zodError;
    captureStackTrace(this, JSONValidationError);
  }
}

function formatIssues(error: ZodErrorLike): string {
  return error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join(', ');
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * @throws JSONParseError if `json` is not valid JSON
 * @throws JSONValidationError if the value does not match `schema`
 */
export function parseJSON<T>(json: string, schema: ZodSchemaLike<T>): T {
  let parsed: unknown;

  try {
    parsed = JSON.parse(json);
  } catch (cause) {
    throw new JSONParseError(
      `Failed to parse JSON: ${cause instanceof Error ? cause.message : String(cause)}`,
      cause
    );
  }

  return validate(parsed, schema);
}

/**
 * Like parseJSON() but never throws.
 */
export function safeParseJSON<T>(json: string, schema: ZodSchemaLike<T>): SafeParseJSONResult<T> {
  let parsed: unknown;

  try {
    parsed = JSON.parse(json);
  } catch {
    // Report syntax errors in the same shape as schema issues.
    return {
      success: false,
      error: {
        issues: [{ code: 'custom', path: [], message: 'Invalid JSON syntax' }],
        message: 'Invalid JSON syntax',
      },
    };
  }

  const result = schema.safeParse(parsed);
  return result.success
    ? { success: true, data: result.data }
    : { success: false, error: result.error };
}

/**
 * Validate an already-parsed value.
 *
 * @throws JSONValidationError if the value does not match `schema`
 */
export function validate<T>(value: unknown, schema: ZodSchemaLike<T>): T {
  const result = schema.safeParse(value);

  if (!result.success) {
    throw new JSONValidationError(`JSON validation failed: ${formatIssues(result.error)}`, result.error);
  }

  return result.data;
}
