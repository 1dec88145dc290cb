/**
 * Floating-point precision tables
 *
 * Sign/exponent/mantissa layouts used by numeric flags. Every layout has one
 * sign bit and an IEEE-style bias of `2^(exponentBits - 1) - 1`.
 *
 * @module precision
 */

import { CodecError, ValidationError } from './errors.js';
import type { PrecisionName, PrecisionSpec } from './types.js';

function layout(name: string, exponentBits: number, mantissaBits: number): PrecisionSpec {
  return Object.freeze({
    name,
    signBits: 1,
    exponentBits,
    mantissaBits,
    bias: 2 ** (exponentBits - 1) - 1,
    totalWidth: 1 + exponentBits + mantissaBits,
  });
}

const PRECISIONS: Readonly<Record<PrecisionName, PrecisionSpec>> = Object.freeze({
  half: layout('half', 5, 10),
  single: layout('single', 8, 23),
  double: layout('double', 11, 52),
  bfloat16: layout('bfloat16', 8, 7),
  minifloat: layout('minifloat', 4, 3),
});

/** Names accepted by specFor() */
export const PRECISION_NAMES: readonly PrecisionName[] = Object.freeze([
  'half',
  'single',
  'double',
  'bfloat16',
  'minifloat',
]);

export function isPrecisionName(name: string): name is PrecisionName {
  return PRECISION_NAMES.some(known => known === name);
}

/**
 * Look up a named precision.
 *
 * @throws CodecError (UNKNOWN_PRECISION) for unrecognized names
 */
export function specFor(name: string): PrecisionSpec {
  if (!isPrecisionName(name)) {
    throw CodecError.unknownPrecision(name, PRECISION_NAMES);
  }
  return PRECISIONS[name];
}

/**
 * Build a non-standard layout. Exponent widths of 2..11 and mantissa widths
 * of 1..52 keep every representable value within a JavaScript double.
 */
export function customPrecision(exponentBits: number, mantissaBits: number): PrecisionSpec {
  if (!Number.isInteger(exponentBits) || exponentBits < 2 || exponentBits > 11) {
    throw ValidationError.invalidFormat('precision', 'exponentBits must be an integer in 2..11', {
      exponentBits,
    });
  }
  if (!Number.isInteger(mantissaBits) || mantissaBits < 1 || mantissaBits > 52) {
    throw ValidationError.invalidFormat('precision', 'mantissaBits must be an integer in 1..52', {
      mantissaBits,
    });
  }
  return layout(`e${exponentBits}m${mantissaBits}`, exponentBits, mantissaBits);
}

/**
 * Accept either a precision name or an explicit spec. Explicit specs are
 * re-derived through customPrecision() so a hand-written bias or width
 * cannot disagree with the exponent and mantissa widths.
 */
export function resolvePrecision(precision: PrecisionName | PrecisionSpec): PrecisionSpec {
  if (typeof precision === 'string') {
    return specFor(precision);
  }
  if (isPrecisionName(precision.name)) {
    const known = PRECISIONS[precision.name];
    if (known.exponentBits === precision.exponentBits && known.mantissaBits === precision.mantissaBits) {
      return known;
    }
  }
  return customPrecision(precision.exponentBits, precision.mantissaBits);
}

/** Smallest positive subnormal magnitude of a layout */
export function smallestSubnormal(spec: PrecisionSpec): number {
  return 2 ** (1 - spec.bias - spec.mantissaBits);
}

/** Largest finite magnitude of a layout */
export function largestFinite(spec: PrecisionSpec): number {
  const maxExponent = 2 ** spec.exponentBits - 2 - spec.bias;
  return (2 - 2 ** -spec.mantissaBits) * 2 ** maxExponent;
}
