/**
 * Numeric flag codec
 *
 * Places a real number into a sign/exponent/mantissa layout:
 *
 *   [sign:1][exponent:exponentBits][mantissa:mantissaBits]
 *
 * - zero keeps its sign and has an all-zero exponent and mantissa
 * - stored exponents at or above all-ones saturate to ±infinity
 * - stored exponents at or below zero become subnormals; magnitudes below
 *   the smallest subnormal flush to a signed zero
 * - the mantissa is rounded to nearest, ties away from zero; a carry out of
 *   the mantissa increments the exponent
 * - NaN (and a missing value) is stored as the quiet-NaN pattern
 *
 * Decoding is exact for the stored bits; encoding loses whatever mantissa
 * precision the layout cannot hold.
 */

import { ValidationError } from '../errors.js';
import { smallestSubnormal } from '../precision.js';
import type { DecodedValue, FlagDefinition, PrecisionSpec, RawValue } from '../types.js';
import { rawTypeName, type NumericCodec, type NumericEncoding } from './types.js';

/**
 * x * 2^exp without intermediate overflow to Infinity or underflow to 0.
 * Exact whenever the result is representable.
 */
export function scalePow2(x: number, exp: number): number {
  let result = x;
  let remaining = exp;
  while (remaining > 1000) {
    result *= 2 ** 1000;
    remaining -= 1000;
  }
  while (remaining < -1000) {
    result *= 2 ** -1000;
    remaining += 1000;
  }
  return result * 2 ** remaining;
}

function roundHalfAwayFromZero(x: number): number {
  const whole = Math.floor(x);
  return x - whole >= 0.5 ? whole + 1 : whole;
}

/**
 * Split a finite positive number into `significand * 2^exponent` with the
 * significand in [1, 2).
 */
export function normalize(magnitude: number): { significand: number; exponent: number } {
  let exponent = Math.floor(Math.log2(magnitude));
  let significand = scalePow2(magnitude, -exponent);
  // log2 can be off by one near powers of two
  while (significand >= 2) {
    exponent += 1;
    significand = scalePow2(magnitude, -exponent);
  }
  while (significand < 1) {
    exponent -= 1;
    significand = scalePow2(magnitude, -exponent);
  }
  return { significand, exponent };
}

/** All-ones exponent, top mantissa bit set, sign clear */
export function quietNaNBits(spec: PrecisionSpec): bigint {
  const m = BigInt(spec.mantissaBits);
  return (allOnesExponent(spec) << m) | (1n << (m - 1n));
}

function allOnesExponent(spec: PrecisionSpec): bigint {
  return (1n << BigInt(spec.exponentBits)) - 1n;
}

export function encodeNumeric(value: number, spec: PrecisionSpec): NumericEncoding {
  if (Number.isNaN(value)) {
    return { bits: quietNaNBits(spec), status: 'nan' };
  }

  const m = BigInt(spec.mantissaBits);
  const infinity = allOnesExponent(spec) << m;
  const negative = value < 0 || Object.is(value, -0);
  const signBit = negative ? 1n << BigInt(spec.exponentBits + spec.mantissaBits) : 0n;
  const abs = Math.abs(value);

  if (abs === Infinity) {
    return { bits: signBit | infinity, status: 'infinite' };
  }
  if (abs === 0) {
    return { bits: signBit, status: 'zero' };
  }
  if (abs < smallestSubnormal(spec)) {
    return { bits: signBit, status: 'underflow' };
  }

  const { significand, exponent } = normalize(abs);
  const storedExponent = exponent + spec.bias;

  if (BigInt(storedExponent) >= allOnesExponent(spec)) {
    return { bits: signBit | infinity, status: 'overflow' };
  }

  if (storedExponent <= 0) {
    // Subnormal: abs / 2^(1 - bias), scaled to mantissa units.
    const mantissa = roundHalfAwayFromZero(scalePow2(abs, spec.bias - 1 + spec.mantissaBits));
    // A mantissa of 2^m carries into exponent 1, the smallest normal.
    const status = mantissa === 2 ** spec.mantissaBits ? 'normal' : 'subnormal';
    return { bits: signBit | BigInt(mantissa), status };
  }

  const mantissa = roundHalfAwayFromZero(scalePow2(significand - 1, spec.mantissaBits));
  const magnitude = (BigInt(storedExponent) << m) + BigInt(mantissa);
  if (magnitude >= infinity) {
    return { bits: signBit | infinity, status: 'overflow' };
  }
  return { bits: signBit | magnitude, status: 'normal' };
}

export function decodeNumeric(bits: bigint, spec: PrecisionSpec): number {
  const m = BigInt(spec.mantissaBits);
  const mantissa = Number(bits & ((1n << m) - 1n));
  const exponent = (bits >> m) & allOnesExponent(spec);
  const negative = ((bits >> BigInt(spec.exponentBits + spec.mantissaBits)) & 1n) === 1n;

  let magnitude: number;
  if (exponent === allOnesExponent(spec)) {
    if (mantissa !== 0) return Number.NaN;
    magnitude = Infinity;
  } else if (exponent === 0n) {
    magnitude = scalePow2(mantissa, 1 - spec.bias - spec.mantissaBits);
  } else {
    magnitude = scalePow2(
      2 ** spec.mantissaBits + mantissa,
      Number(exponent) - spec.bias - spec.mantissaBits
    );
  }
  return negative ? -magnitude : magnitude;
}

export function createNumericCodec(flag: FlagDefinition, precision: PrecisionSpec): NumericCodec {
  const encodeDetailed = (value: RawValue, row?: number): NumericEncoding => {
    if (value === null) {
      return { bits: quietNaNBits(precision), status: 'nan' };
    }
    if (typeof value !== 'number') {
      throw ValidationError.typeMismatch(flag.name, 'number', rawTypeName(value), row);
    }
    return encodeNumeric(value, precision);
  };

  return {
    type: 'numeric',
    flag,
    width: flag.width,
    precision,
    encodeDetailed,

    encode(value: RawValue, row?: number): bigint {
      return encodeDetailed(value, row).bits;
    },

    decode(bits: bigint): DecodedValue {
      return decodeNumeric(bits, precision);
    },
  };
}
