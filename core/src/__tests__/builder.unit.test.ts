/**
 * Tests for the flag builder
 */

import { describe, it, expect } from 'vitest';
import { createFlagBuilder, FlagBuilder } from '../builder.js';
import { decode } from '../decoder.js';
import { ErrorCode, FlagFieldError } from '../errors.js';

interface Station {
  id: string;
  temperature?: number;
  grade: 'A' | 'B' | 'C' | 'D';
  run: number;
}

const stations: Station[] = [
  { id: 's1', temperature: 3.625, grade: 'C', run: 5 },
  { id: 's2', grade: 'D', run: 0 },
  { id: 's3', temperature: 1, grade: 'A', run: 7 },
];

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof FlagFieldError) return error.code;
    throw error;
  }
  return undefined;
}

describe('FlagBuilder', () => {
  it('should build the registry and field from tests', () => {
    const builder = createFlagBuilder(stations, { name: 'qa' })
      .binary('missing', s => s.temperature === undefined, { position: 0 })
      .cases('quality', [s => s.grade === 'A', s => s.grade === 'B', s => s.grade === 'C'])
      .count('run_length', s => s.run)
      .numeric('value', s => s.temperature ?? null, { precision: 'half' });

    const field = builder.encode();

    expect(builder).toBeInstanceOf(FlagBuilder);
    expect(builder.registry.totalWidth).toBe(22);
    expect(field.values).toEqual([1393472n, 3702272n, 474112n]);
    expect(decode(field, builder.registry, { lookupTable: true, separator: '|' })[0]).toBe(
      '0|10|101|0100001101000000'
    );
  });

  it('should keep each raw column in the encode context', () => {
    const builder = createFlagBuilder(stations, { name: 'qa' })
      .cases('quality', [s => s.grade === 'A', s => s.grade === 'B'])
      .count('run_length', s => s.run);

    expect(builder.column('quality')).toEqual([
      [false, false],
      [false, false],
      [true, false],
    ]);
    expect(builder.column('run_length')).toEqual([5, 0, 7]);
    expect(builder.column('nope')).toBeUndefined();
  });

  it('should pass the record index to tests', () => {
    const builder = createFlagBuilder(stations, { name: 'qa' }).binary('even', (_s, i) => i % 2 === 0);
    expect(builder.column('even')).toEqual([true, false, true]);
  });

  describe('binary', () => {
    it('should reserve NA and skip the test for missing records', () => {
      const seen: string[] = [];
      const builder = createFlagBuilder(stations, { name: 'qa' }).binary(
        'warm',
        s => {
          seen.push(s.id);
          return (s.temperature ?? 0) > 2;
        },
        { missing: s => s.temperature === undefined }
      );

      expect(seen).toEqual(['s1', 's3']);
      expect(builder.registry.flags[0]).toMatchObject({ width: 2, kind: { type: 'binary', na: true } });
      expect(builder.encode().values).toEqual([0b01n, 0b11n, 0b00n]);
    });

    it('should reserve NA when a test returns null', () => {
      const builder = createFlagBuilder(stations, { name: 'qa' }).binary('warm', s =>
        s.temperature === undefined ? null : s.temperature > 2
      );

      expect(builder.registry.flags[0].width).toBe(2);
    });

    it('should stay one bit when nothing is missing', () => {
      const builder = createFlagBuilder(stations, { name: 'qa' }).binary('graded', s => s.grade !== 'D');
      expect(builder.registry.flags[0].width).toBe(1);
    });
  });

  describe('cases', () => {
    it('should use the builder overlap for non-exclusive flags', () => {
      const builder = createFlagBuilder(stations, { name: 'qa', caseOverlap: 'last' }).cases(
        'bands',
        [s => s.run >= 0, s => s.run >= 5],
        { exclusive: false }
      );

      expect(builder.registry.flags[0].kind).toEqual({
        type: 'case',
        caseCount: 2,
        exclusive: false,
        overlap: 'last',
      });
      expect(builder.encode().values).toEqual([1n, 0n, 1n]);
    });

    it('should raise CASE_OVERLAP under the error rule', () => {
      const builder = createFlagBuilder(stations, { name: 'qa' }).cases(
        'bands',
        [s => s.run >= 0, s => s.run >= 5],
        { exclusive: false, overlap: 'error' }
      );

      expect(codeOf(() => builder.encode())).toBe(ErrorCode.CASE_OVERLAP);
    });

    it('should treat a given overlap rule as non-exclusive', () => {
      const builder = createFlagBuilder(stations, { name: 'qa' }).cases(
        'bands',
        [s => s.run >= 0, s => s.run >= 5],
        { overlap: 'error' }
      );

      expect(builder.registry.flags[0].kind).toEqual({
        type: 'case',
        caseCount: 2,
        exclusive: false,
        overlap: 'error',
      });
      expect(codeOf(() => builder.encode())).toBe(ErrorCode.CASE_OVERLAP);
    });

    it('should reject an overlap rule on an exclusive flag', () => {
      const builder = createFlagBuilder(stations, { name: 'qa' });

      expect(() =>
        builder.cases('bands', [s => s.run >= 0, s => s.run >= 5], { exclusive: true, overlap: 'last' })
      ).toThrow('Invalid options for case flag "bands": overlap applies only to non-exclusive cases');
      expect(builder.registry.flags).toHaveLength(0);
    });
  });

  describe('count', () => {
    it('should learn the width from the column maximum', () => {
      const builder = createFlagBuilder(stations, { name: 'qa' }).count('run', s => s.run);
      expect(builder.registry.flags[0]).toMatchObject({ width: 3, kind: { type: 'count', maxValue: 7 } });
    });

    it('should reserve NA for missing counts', () => {
      const builder = createFlagBuilder(stations, { name: 'qa' }).count('run', s =>
        s.grade === 'D' ? null : s.run
      );

      expect(builder.registry.flags[0]).toMatchObject({ width: 4, naSentinel: 15n });
      expect(builder.encode().values).toEqual([5n, 15n, 7n]);
    });

    it('should honor an explicit bound', () => {
      const builder = createFlagBuilder(stations, { name: 'qa' }).count('run', s => s.run, { maxValue: 15 });
      expect(builder.registry.flags[0].width).toBe(4);
    });
  });

  describe('numeric', () => {
    it('should fall back to the builder default precision', () => {
      const builder = createFlagBuilder(stations, { name: 'qa', defaultPrecision: 'bfloat16' }).numeric(
        't',
        s => s.temperature ?? null
      );

      expect(builder.registry.flags[0].kind).toEqual({ type: 'numeric', precision: 'bfloat16' });
    });

    it('should default to half precision', () => {
      const builder = createFlagBuilder(stations, { name: 'qa' }).numeric('t', s => s.temperature ?? null);
      expect(builder.registry.flags[0].width).toBe(16);
    });
  });

  it('should add any kind through map', () => {
    const builder = createFlagBuilder(stations, { name: 'qa' }).map(
      'grade',
      { type: 'case', caseCount: 4 },
      s => ['A', 'B', 'C', 'D'].indexOf(s.grade)
    );

    expect(builder.encode().values).toEqual([2n, 3n, 0n]);
  });

  it('should seal the registry on encode', () => {
    const builder = createFlagBuilder(stations, { name: 'qa' }).count('run', s => s.run);
    builder.encode();

    expect(builder.isSealed).toBe(true);
    expect(() => builder.binary('late', () => true)).toThrow(
      'Registry "qa" is sealed; cannot add flag "late" after encoding started'
    );
    expect(codeOf(() => builder.count('later', s => s.run))).toBe(ErrorCode.REGISTRY_SEALED);
    expect(builder.encode().values).toEqual([5n, 0n, 7n]);
  });

  it('should check the configured field width at encode time', () => {
    const builder = createFlagBuilder(stations, { name: 'qa', maxFieldWidth: 8 }).numeric('t', () => 1);

    expect(codeOf(() => builder.encode())).toBe(ErrorCode.FIELD_WIDTH_EXCEEDED);
    expect(builder.encode({ maxFieldWidth: 16 }).width).toBe(16);
  });

  it('should reject duplicate names', () => {
    const builder = createFlagBuilder(stations, { name: 'qa' }).binary('x', () => true);
    expect(codeOf(() => builder.binary('x', () => false))).toBe(ErrorCode.DUPLICATE_FLAG_NAME);
  });
});
