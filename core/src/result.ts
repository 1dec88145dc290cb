/**
 * Result<T, E> - error handling without exceptions
 *
 * The codec throws FlagFieldError subclasses at its boundaries. Callers
 * that prefer to branch on a value instead (batch jobs that log and skip a
 * bad chunk, for instance) use tryEncode() / tryDecode().
 *
 * @example
 * ```typescript
 * const result = tryEncode(registry, columns);
 * if (isErr(result)) {
 *   logger.warn('Chunk skipped', result.error.toLogContext());
 * } else {
 *   store(result.value);
 * }
 * ```
 *
 * @module result
 */

import { decode, type DecodeOptions } from './decoder.js';
import { encode, type EncodeOptions } from './encoder.js';
import { wrapError, type FlagFieldError } from './errors.js';
import type { DecodedFlags, EncodedField, RawColumns, Registry } from './types.js';

// =============================================================================
// Core Types
// =============================================================================

export interface Ok<T> {
  readonly _tag: 'Ok';
  readonly value: T;
  readonly error?: never;
  map<U>(fn: (value: T) => U): Result<U, never>;
  mapErr<F>(fn: (error: never) => F): Result<T, F>;
  unwrap(): T;
  unwrapOr(defaultValue: T): T;
  match<U>(handlers: { ok: (value: T) => U; err: (error: never) => U }): U;
}

export interface Err<E> {
  readonly _tag: 'Err';
  readonly error: E;
  readonly value?: never;
  map<U>(fn: (value: never) => U): Result<U, E>;
  mapErr<F>(fn: (error: E) => F): Result<never, F>;
  /** @throws the error (wrapped in an Error if it is not one) */
  unwrap(): never;
  unwrapOr<T>(defaultValue: T): T;
  match<U>(handlers: { ok: (value: never) => U; err: (error: E) => U }): U;
}

export type Result<T, E> = Ok<T> | Err<E>;

// =============================================================================
// Implementation Classes
// =============================================================================

class OkImpl<T> implements Ok<T> {
  readonly _tag = 'Ok' as const;
  readonly error?: never;

  constructor(readonly value: T) {}

  map<U>(fn: (value: T) => U): Result<U, never> {
    return new OkImpl(fn(this.value));
  }

  mapErr<F>(_fn: (error: never) => F): Result<T, F> {
    return new OkImpl(this.value);
  }

  unwrap(): T {
    return this.value;
  }

  unwrapOr(_defaultValue: T): T {
    return this.value;
  }

  match<U>(handlers: { ok: (value: T) => U; err: (error: never) => U }): U {
    return handlers.ok(this.value);
  }
}

class ErrImpl<E> implements Err<E> {
  readonly _tag = 'Err' as const;
  readonly value?: never;

  constructor(readonly error: E) {}

  map<U>(_fn: (value: never) => U): Result<U, E> {
    return new ErrImpl(this.error);
  }

  mapErr<F>(fn: (error: E) => F): Result<never, F> {
    return new ErrImpl(fn(this.error));
  }

  unwrap(): never {
    if (this.error instanceof Error) {
      throw this.error;
    }
    throw new Error(String(this.error));
  }

  unwrapOr<T>(defaultValue: T): T {
    return defaultValue;
  }

  match<U>(handlers: { ok: (value: never) => U; err: (error: E) => U }): U {
    return handlers.err(this.error);
  }
}

// =============================================================================
// Constructors and Guards
// =============================================================================

export function ok<T>(value: T): Ok<T> {
  return new OkImpl(value);
}

export function err<E>(error: E): Err<E> {
  return new ErrImpl(error);
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result._tag === 'Ok';
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result._tag === 'Err';
}

/**
 * Wrap a function that might throw into one that returns a Result. Thrown
 * values are normalized with wrapError().
 */
export function tryCatch<T, Args extends unknown[]>(
  fn: (...args: Args) => T,
  operation?: string
): (...args: Args) => Result<T, FlagFieldError> {
  return (...args: Args): Result<T, FlagFieldError> => {
    try {
      return ok(fn(...args));
    } catch (error) {
      return err(wrapError(error, operation));
    }
  };
}

// =============================================================================
// Codec wrappers
// =============================================================================

export function tryEncode(
  registry: Registry,
  columns: RawColumns,
  options?: EncodeOptions
): Result<EncodedField, FlagFieldError> {
  return tryCatch(encode, 'encode')(registry, columns, options);
}

export function tryDecode(
  field: EncodedField,
  registry: Registry,
  options?: DecodeOptions
): Result<DecodedFlags, FlagFieldError> {
  return tryCatch((f: EncodedField, r: Registry) => decode(f, r, options ?? {}), 'decode')(field, registry);
}
