import type { DecodedValue, FlagDefinition, PrecisionSpec, RawValue } from '../types.js';

/**
 * Converts one flag's raw values to and from a fixed-width bit pattern.
 *
 * Bit patterns are right-aligned bigints of at most `width` bits; the
 * encoder shifts them into place.
 */
export interface FlagCodec {
  readonly flag: FlagDefinition;
  readonly width: number;
  /**
   * @param row - Record index, reported in error details
   */
  encode(value: RawValue, row?: number): bigint;
  decode(bits: bigint): DecodedValue;
}

export interface BinaryCodec extends FlagCodec {
  readonly type: 'binary';
}

export interface CaseCodec extends FlagCodec {
  readonly type: 'case';
  /** Reserved code emitted when no predicate matches */
  readonly noCase: bigint;
}

export interface CountCodec extends FlagCodec {
  readonly type: 'count';
  readonly maxValue: number;
}

/**
 * Outcome of placing a real number into a narrower layout.
 * `overflow` and `underflow` mark silent saturation to ±infinity and ±0.
 */
export type NumericStatus =
  | 'normal'
  | 'subnormal'
  | 'zero'
  | 'infinite'
  | 'nan'
  | 'overflow'
  | 'underflow';

export interface NumericEncoding {
  bits: bigint;
  status: NumericStatus;
}

export interface NumericCodec extends FlagCodec {
  readonly type: 'numeric';
  readonly precision: PrecisionSpec;
  encodeDetailed(value: RawValue, row?: number): NumericEncoding;
}

export type AnyCodec = BinaryCodec | CaseCodec | CountCodec | NumericCodec;

/** Name of a raw value's type for error messages */
export function rawTypeName(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
