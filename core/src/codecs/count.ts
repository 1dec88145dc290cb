/**
 * Count flag codec
 *
 * A non-negative integer stored as its zero-padded binary form. The width is
 * fixed when the flag is appended, from the largest value in the column, so
 * counts are a two-phase flag: learnCountKind() reduces the column first.
 */

import { CodecError, ValidationError } from '../errors.js';
import type { CountKind, DecodedValue, FlagDefinition, RawColumn, RawValue } from '../types.js';
import { rawTypeName, type CountCodec } from './types.js';

/** Number of bits needed for a non-negative safe integer (at least 1) */
export function bitLength(value: number): number {
  return value.toString(2).length;
}

export function countWidth(kind: CountKind): number {
  return bitLength(kind.na ? kind.maxValue + 1 : kind.maxValue);
}

export function isCountValue(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

/**
 * Phase 1 of count encoding: reduce the column to its maximum.
 *
 * Missing values are skipped; the returned kind reserves an NA sentinel when
 * any were seen (or when `na` is forced).
 */
export function learnCountKind(column: RawColumn, options: { na?: boolean; flag?: string } = {}): CountKind {
  const flag = options.flag ?? 'count';
  let maxValue = 0;
  let sawMissing = false;

  for (let row = 0; row < column.length; row++) {
    const value = column[row];
    if (value === null) {
      sawMissing = true;
      continue;
    }
    if (!isCountValue(value)) {
      throw ValidationError.typeMismatch(flag, 'non-negative integer', rawTypeName(value), row);
    }
    if (value > maxValue) maxValue = value;
  }

  const na = options.na ?? sawMissing;
  if (sawMissing && !na) {
    throw ValidationError.nullNotAllowed(flag, column.indexOf(null));
  }
  return na ? { type: 'count', maxValue, na: true } : { type: 'count', maxValue };
}

export function createCountCodec(flag: FlagDefinition, kind: CountKind): CountCodec {
  const { maxValue } = kind;
  const sentinel = flag.naSentinel;

  return {
    type: 'count',
    flag,
    width: flag.width,
    maxValue,

    encode(value: RawValue, row?: number): bigint {
      if (value === null) {
        if (sentinel === undefined) throw ValidationError.nullNotAllowed(flag.name, row);
        return sentinel;
      }
      if (!isCountValue(value)) {
        throw ValidationError.typeMismatch(flag.name, 'non-negative integer', rawTypeName(value), row);
      }
      if (value > maxValue) {
        throw CodecError.countOverflow(flag.name, value, maxValue, row);
      }
      return BigInt(value);
    },

    decode(bits: bigint): DecodedValue {
      if (sentinel !== undefined && bits === sentinel) return null;
      return Number(bits);
    },
  };
}
