/**
 * Tests for packing records into a field and reading them back
 */

import { describe, it, expect } from 'vitest';
import {
  decode,
  decodeRecord,
  fieldFromNumbers,
  fieldToNumbers,
  lookupRecord,
  validateSeparator,
} from '../decoder.js';
import { encode, encodeRecord, validateColumns } from '../encoder.js';
import { ErrorCode, FlagFieldError } from '../errors.js';
import { appendFlag, createRegistry } from '../registry.js';
import type { EncodedField, FlagSpec, RawColumn, Registry } from '../types.js';

function build(name: string, specs: readonly FlagSpec[]): Registry {
  return specs.reduce((registry, spec) => appendFlag(registry, spec), createRegistry(name));
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof FlagFieldError) return error.code;
    throw error;
  }
  return undefined;
}

const qa = build('qa', [
  { name: 'missing', kind: { type: 'binary' }, position: 0 },
  { name: 'quality', kind: { type: 'case', caseCount: 3 } },
  { name: 'run_length', kind: { type: 'count', maxValue: 7 } },
  { name: 'value', kind: { type: 'numeric', precision: 'half' } },
]);

const columns = {
  missing: [false, true, false],
  quality: [
    [false, false, true],
    [false, false, false],
    [true, false, false],
  ],
  run_length: [5, 0, 7],
  value: [3.625, null, 1],
};

describe('encode', () => {
  it('should pack every record most significant flag first', () => {
    const field = encode(qa, columns);

    expect(field.registry).toBe('qa');
    expect(field.width).toBe(22);
    expect(field.values).toEqual([1393472n, 3702272n, 474112n]);
  });

  it('should accept a Map of columns', () => {
    const map = new Map<string, RawColumn>(Object.entries(columns));
    expect(encode(qa, map).values).toEqual(encode(qa, columns).values);
  });

  it('should encode an empty column set to an empty field', () => {
    const empty = { missing: [], quality: [], run_length: [], value: [] };
    expect(encode(qa, empty)).toEqual({ registry: 'qa', width: 22, values: [] });
  });

  it('should encode an empty registry to zeros of width 0', () => {
    expect(encode(createRegistry('none'), {})).toEqual({ registry: 'none', width: 0, values: [] });
  });

  it('should reject a registry wider than the target storage', () => {
    expect(() => encode(qa, columns, { maxFieldWidth: 16 })).toThrow(
      'Registry "qa" needs 22 bits, more than the supported 16'
    );
  });

  it('should reject a missing column', () => {
    const withoutValue = { missing: columns.missing, quality: columns.quality, run_length: columns.run_length };
    expect(codeOf(() => encode(qa, withoutValue))).toBe(ErrorCode.MISSING_COLUMN);
  });

  it('should reject columns of different lengths', () => {
    expect(() => encode(qa, { ...columns, run_length: [1, 2] })).toThrow(
      'Column "run_length" has 2 values, expected 3'
    );
  });

  it('should surface codec errors with the row', () => {
    let caught: unknown;
    try {
      encode(qa, { ...columns, run_length: [1, 9, 2] });
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({ code: ErrorCode.COUNT_OVERFLOW, details: { flag: 'run_length', row: 1 } });
  });

  it('should count rows in validateColumns', () => {
    expect(validateColumns(qa, columns)).toBe(3);
  });

  it('should encode one record', () => {
    expect(encodeRecord(qa, { missing: false, quality: 2, run_length: 5, value: 3.625 })).toBe(1393472n);
  });

  it('should freeze the field', () => {
    const field = encode(qa, columns);
    expect(Object.isFrozen(field)).toBe(true);
    expect(Object.isFrozen(field.values)).toBe(true);
  });
});

describe('decode', () => {
  const field = encode(qa, columns);

  it('should reconstruct every flag', () => {
    const decoded = decode(field, qa);

    expect(decoded.names).toEqual(['missing', 'quality', 'run_length', 'value']);
    expect(decoded.rowCount).toBe(3);
    expect(decoded.columns.missing).toEqual([false, true, false]);
    expect(decoded.columns.quality).toEqual([2, null, 0]);
    expect(decoded.columns.run_length).toEqual([5, 0, 7]);
    expect(decoded.columns.value[0]).toBe(3.625);
    expect(decoded.columns.value[1]).toBeNaN();
    expect(decoded.columns.value[2]).toBe(1);
  });

  it('should render lookup-table strings', () => {
    expect(decode(field, qa, { lookupTable: true, separator: '|' })).toEqual([
      '0|10|101|0100001101000000',
      '1|11|000|0111111000000000',
      '0|00|111|0011110000000000',
    ]);
  });

  it('should accept multi-character separators', () => {
    expect(decode(field, qa, { lookupTable: true, separator: ' : ' })[0]).toBe('0 : 10 : 101 : 0100001101000000');
  });

  it('should reject a field of another width', () => {
    const narrow: EncodedField = { registry: 'qa', width: 16, values: [0n] };
    expect(() => decode(narrow, qa)).toThrow('Field of 16 bits cannot be decoded with registry "qa" of 22 bits');
  });

  it('should reject values that do not fit the width', () => {
    const bad: EncodedField = { registry: 'qa', width: 22, values: [1n << 22n] };

    expect(() => decode(bad, qa)).toThrow('Invalid packed value: does not fit in 22 bits');
    expect(codeOf(() => decode({ ...bad, values: [-1n] }, qa))).toBe(ErrorCode.INVALID_FORMAT);
  });

  it('should decode values outside a case range as no case', () => {
    const registry = build('g', [{ name: 'grade', kind: { type: 'case', caseCount: 5 } }]);
    const decoded = decode({ registry: 'g', width: 3, values: [4n, 5n, 6n, 7n] }, registry);

    expect(decoded.columns.grade).toEqual([4, null, null, null]);
  });

  it('should decode one record', () => {
    expect(decodeRecord(1393472n, qa)).toEqual({ missing: false, quality: 2, run_length: 5, value: 3.625 });
    expect(lookupRecord(1393472n, qa)).toBe('0|10|101|0100001101000000');
    expect(lookupRecord(1393472n, qa, ',')).toBe('0,10,101,0100001101000000');
  });

  it('should keep a flag named after an Object.prototype key as its own column', () => {
    const registry = build('p', [
      { name: '__proto__', kind: { type: 'binary' } },
      { name: 'n', kind: { type: 'count', maxValue: 3 } },
    ]);
    const packed = encode(
      registry,
      new Map<string, RawColumn>([
        ['__proto__', [true, false]],
        ['n', [3, 1]],
      ])
    );
    expect(packed.values).toEqual([7n, 1n]);

    const decoded = decode(packed, registry);
    expect(Object.entries(decoded.columns)).toEqual([
      ['__proto__', [true, false]],
      ['n', [3, 1]],
    ]);
    expect(Object.entries(decodeRecord(7n, registry))).toEqual([
      ['__proto__', true],
      ['n', 3],
    ]);
    expect(encodeRecord(registry, { ['__proto__']: false, n: 2 })).toBe(2n);
  });
});

describe('validateSeparator', () => {
  it.each(['|', ' ', ', ', '\t'])('should accept %j', separator => {
    expect(() => validateSeparator(separator)).not.toThrow();
  });

  it.each(['', '0', '1', 'a1b'])('should reject %j', separator => {
    expect(codeOf(() => validateSeparator(separator))).toBe(ErrorCode.INVALID_FORMAT);
  });

  it('should be checked before decoding', () => {
    const field = encode(qa, columns);
    expect(() => decode(field, qa, { lookupTable: true, separator: '' })).toThrow(
      'Invalid separator: must not be empty'
    );
  });
});

describe('plain-number storage', () => {
  it('should round-trip through numbers', () => {
    const field = encode(qa, columns);
    const numbers = fieldToNumbers(field);

    expect(numbers).toEqual([1393472, 3702272, 474112]);
    expect(fieldFromNumbers(qa, numbers)).toEqual(field);
  });

  it('should refuse fields wider than 53 bits', () => {
    const wide = build('wide', [
      { name: 'a', kind: { type: 'numeric', precision: 'single' } },
      { name: 'b', kind: { type: 'numeric', precision: 'single' } },
    ]);
    const field = encode(wide, { a: [1], b: [2] });

    expect(codeOf(() => fieldToNumbers(field))).toBe(ErrorCode.FIELD_WIDTH_EXCEEDED);
    expect(codeOf(() => fieldFromNumbers(wide, [0]))).toBe(ErrorCode.FIELD_WIDTH_EXCEEDED);
  });

  it('should reject numbers that are not packed values', () => {
    expect(() => fieldFromNumbers(qa, [1.5])).toThrow('Invalid packed value: must be a non-negative safe integer');
    expect(() => fieldFromNumbers(qa, [2 ** 22])).toThrow('Invalid packed value: does not fit in 22 bits');
  });
});
