/**
 * Case flag codec
 *
 * Stores the index of the matching case among `caseCount` ordered
 * predicates. The highest representable code is reserved for "no case", so
 * the width is the bit length of `caseCount` (ceil(log2(caseCount + 1))):
 * three cases take two bits with codes 0..2 and 3 for no case.
 */

import { ValidationError, CodecError } from '../errors.js';
import type { CaseKind, CaseOverlap, DecodedValue, FlagDefinition, RawValue } from '../types.js';
import { bitLength } from './count.js';
import { rawTypeName, type CaseCodec } from './types.js';

export function caseWidth(caseCount: number): number {
  return bitLength(caseCount);
}

/** Reserved "no case" code for a case flag of the given width */
export function noCaseCode(width: number): bigint {
  return (1n << BigInt(width)) - 1n;
}

/**
 * Pick one case index from predicate outcomes.
 *
 * @returns the chosen index, or null when no predicate is true
 * @throws CodecError (CASE_OVERLAP) when overlap is 'error' and several match
 */
export function resolveCase(
  outcomes: readonly boolean[],
  overlap: CaseOverlap,
  flag = 'case',
  row?: number
): number | null {
  const matches: number[] = [];
  for (let i = 0; i < outcomes.length; i++) {
    if (outcomes[i]) matches.push(i);
  }

  if (matches.length === 0) return null;
  if (matches.length > 1 && overlap === 'error') {
    throw CodecError.caseOverlap(flag, matches, row);
  }
  return overlap === 'last' ? matches[matches.length - 1] : matches[0];
}

export function createCaseCodec(flag: FlagDefinition, kind: CaseKind): CaseCodec {
  const { caseCount } = kind;
  // Exclusive predicates resolve by declaration order.
  const overlap: CaseOverlap = kind.exclusive === false ? (kind.overlap ?? 'first') : 'first';
  const noCase = noCaseCode(flag.width);

  const indexOf = (value: RawValue, row?: number): number | null => {
    if (value === null) return null;

    if (typeof value === 'number') {
      if (!Number.isInteger(value) || value < 0 || value >= caseCount) {
        throw ValidationError.typeMismatch(flag.name, `case index 0..${caseCount - 1}`, String(value), row);
      }
      return value;
    }

    if (Array.isArray(value)) {
      if (value.length !== caseCount) {
        throw ValidationError.invalidFormat('case outcomes', `expected ${caseCount} outcomes, got ${value.length}`, {
          flag: flag.name,
          ...(row !== undefined && { row }),
        });
      }
      if (!value.every(v => typeof v === 'boolean')) {
        throw ValidationError.typeMismatch(flag.name, 'boolean[]', 'array', row);
      }
      return resolveCase(value, overlap, flag.name, row);
    }

    throw ValidationError.typeMismatch(flag.name, 'case index or boolean[]', rawTypeName(value), row);
  };

  return {
    type: 'case',
    flag,
    width: flag.width,
    noCase,

    encode(value: RawValue, row?: number): bigint {
      const index = indexOf(value, row);
      return index === null ? noCase : BigInt(index);
    },

    decode(bits: bigint): DecodedValue {
      // Anything at or past caseCount (including the reserved code) is "no case".
      return bits < BigInt(caseCount) ? Number(bits) : null;
    },
  };
}
