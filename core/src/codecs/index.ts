/**
 * @flagfield/core/codecs - Per-kind flag codecs
 *
 * widthOf() and naSentinelOf() fix a flag's layout when it is appended;
 * codecFor() returns the codec the encoder and decoder drive.
 *
 * @module codecs
 */

import { BINARY_NA_SENTINEL } from '../constants.js';
import { resolvePrecision } from '../precision.js';
import { assertNever, type FlagDefinition, type FlagKind } from '../types.js';
import { binaryWidth, createBinaryCodec } from './binary.js';
import { caseWidth, createCaseCodec } from './case.js';
import { countWidth, createCountCodec } from './count.js';
import { createNumericCodec, quietNaNBits } from './numeric.js';
import type { AnyCodec } from './types.js';

/** Bit width a flag of this kind occupies */
export function widthOf(kind: FlagKind): number {
  switch (kind.type) {
    case 'binary':
      return binaryWidth(kind);
    case 'case':
      return caseWidth(kind.caseCount);
    case 'count':
      return countWidth(kind);
    case 'numeric':
      return resolvePrecision(kind.precision).totalWidth;
    default:
      return assertNever(kind, 'Unhandled flag kind');
  }
}

/** Bit pattern reserved for missing data, if the kind reserves one */
export function naSentinelOf(kind: FlagKind, width: number): bigint | undefined {
  switch (kind.type) {
    case 'binary':
      return kind.na ? BINARY_NA_SENTINEL : undefined;
    case 'case':
      return undefined;
    case 'count':
      return kind.na ? (1n << BigInt(width)) - 1n : undefined;
    case 'numeric':
      return quietNaNBits(resolvePrecision(kind.precision));
    default:
      return assertNever(kind, 'Unhandled flag kind');
  }
}

export function codecFor(flag: FlagDefinition): AnyCodec {
  const { kind } = flag;
  switch (kind.type) {
    case 'binary':
      return createBinaryCodec(flag, kind);
    case 'case':
      return createCaseCodec(flag, kind);
    case 'count':
      return createCountCodec(flag, kind);
    case 'numeric':
      return createNumericCodec(flag, resolvePrecision(kind.precision));
    default:
      return assertNever(kind, 'Unhandled flag kind');
  }
}

/** Zero-padded, most-significant-first bit string */
export function toBitString(bits: bigint, width: number): string {
  return bits.toString(2).padStart(width, '0');
}

export { binaryWidth, createBinaryCodec, decodeBinary, encodeBinary } from './binary.js';
export { caseWidth, createCaseCodec, noCaseCode, resolveCase } from './case.js';
export { bitLength, countWidth, createCountCodec, isCountValue, learnCountKind } from './count.js';
export {
  createNumericCodec,
  decodeNumeric,
  encodeNumeric,
  normalize,
  quietNaNBits,
  scalePow2,
} from './numeric.js';
export type {
  AnyCodec,
  BinaryCodec,
  CaseCodec,
  CountCodec,
  FlagCodec,
  NumericCodec,
  NumericEncoding,
  NumericStatus,
} from './types.js';
export { rawTypeName } from './types.js';
