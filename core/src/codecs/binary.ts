/**
 * Binary flag codec
 *
 * Layout without NA: 1 bit, `0` false, `1` true.
 * Layout with NA: 2 bits, `00` false, `01` true, `11` missing.
 */

import { BINARY_NA_SENTINEL, BINARY_NA_WIDTH, BINARY_WIDTH } from '../constants.js';
import { ValidationError } from '../errors.js';
import type { BinaryKind, DecodedValue, FlagDefinition, RawValue } from '../types.js';
import { rawTypeName, type BinaryCodec } from './types.js';

export function binaryWidth(kind: BinaryKind): number {
  return kind.na ? BINARY_NA_WIDTH : BINARY_WIDTH;
}

export function encodeBinary(value: boolean): bigint {
  return value ? 1n : 0n;
}

export function decodeBinary(bits: bigint): boolean {
  return bits !== 0n;
}

export function createBinaryCodec(flag: FlagDefinition, kind: BinaryKind): BinaryCodec {
  const na = kind.na === true;

  return {
    type: 'binary',
    flag,
    width: flag.width,

    encode(value: RawValue, row?: number): bigint {
      if (value === null) {
        if (!na) throw ValidationError.nullNotAllowed(flag.name, row);
        return BINARY_NA_SENTINEL;
      }
      if (typeof value !== 'boolean') {
        throw ValidationError.typeMismatch(flag.name, 'boolean', rawTypeName(value), row);
      }
      return encodeBinary(value);
    },

    decode(bits: bigint): DecodedValue {
      if (na && bits === BINARY_NA_SENTINEL) return null;
      return decodeBinary(bits);
    },
  };
}
