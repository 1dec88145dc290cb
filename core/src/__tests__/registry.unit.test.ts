/**
 * Tests for registry growth and reporting
 */

import { describe, it, expect } from 'vitest';
import { ErrorCode, FieldError, FlagFieldError, RegistryError, ValidationError } from '../errors.js';
import {
  appendFlag,
  createRegistry,
  describeRegistry,
  flagNames,
  getFlag,
  hasFlag,
  kindLabel,
  summarizeRegistry,
  validateKind,
} from '../registry.js';
import type { FlagSpec, Registry } from '../types.js';

function build(name: string, specs: readonly FlagSpec[], maxWidth?: number): Registry {
  return specs.reduce((registry, spec) => appendFlag(registry, spec), createRegistry(name, '', { maxWidth }));
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

describe('createRegistry', () => {
  it('should start empty', () => {
    const registry = createRegistry('qa', 'Quality flags');

    expect(registry).toEqual({ name: 'qa', description: 'Quality flags', flags: [], totalWidth: 0, maxWidth: 64 });
    expect(Object.isFrozen(registry)).toBe(true);
  });

  it('should reject an empty name', () => {
    expect(() => createRegistry(' ')).toThrow('Invalid registry name: must not be empty');
  });

  it.each([0, 65, 8.5])('should reject maxWidth %s', maxWidth => {
    expect(() => createRegistry('qa', '', { maxWidth })).toThrow(ValidationError);
  });
});

describe('appendFlag', () => {
  it('should tile the field in definition order', () => {
    expect(qa.flags.map(f => [f.name, f.start, f.width])).toEqual([
      ['missing', 0, 1],
      ['quality', 1, 2],
      ['run_length', 3, 3],
      ['value', 6, 16],
    ]);
    expect(qa.totalWidth).toBe(22);
  });

  it('should leave the input registry untouched', () => {
    const before = createRegistry('qa');
    const after = appendFlag(before, { name: 'ok', kind: { type: 'binary' } });

    expect(before.flags).toHaveLength(0);
    expect(after.flags).toHaveLength(1);
    expect(Object.isFrozen(after.flags[0])).toBe(true);
  });

  it('should record NA sentinels', () => {
    const registry = build('qa', [
      { name: 'ok', kind: { type: 'binary', na: true } },
      { name: 'run', kind: { type: 'count', maxValue: 7, na: true } },
      { name: 'grade', kind: { type: 'case', caseCount: 2 } },
    ]);

    expect(registry.flags.map(f => f.naSentinel)).toEqual([3n, 15n, undefined]);
    expect('naSentinel' in registry.flags[2]).toBe(false);
  });

  it('should reject duplicate names', () => {
    expect(() => appendFlag(qa, { name: 'value', kind: { type: 'binary' } })).toThrow(RegistryError);
    expect(codeOf(() => appendFlag(qa, { name: 'value', kind: { type: 'binary' } }))).toBe(
      ErrorCode.DUPLICATE_FLAG_NAME
    );
  });

  it('should reject an explicit position inside an existing flag', () => {
    const flags = qa.flags;

    expect(() => appendFlag(qa, { name: 'extra', kind: { type: 'binary' }, position: 10 })).toThrow(
      'Bits 10..10 requested by "extra" overlap flag "value"'
    );
    expect(codeOf(() => appendFlag(qa, { name: 'extra', kind: { type: 'binary' }, position: 10 }))).toBe(
      ErrorCode.BIT_RANGE_COLLISION
    );
    expect(qa.flags).toBe(flags);
    expect(qa.flags.map(f => f.name)).toEqual(['missing', 'quality', 'run_length', 'value']);
    expect(qa.totalWidth).toBe(22);
    expect(hasFlag(qa, 'extra')).toBe(false);
  });

  it('should reject an explicit position past the last occupied bit', () => {
    expect(codeOf(() => appendFlag(qa, { name: 'extra', kind: { type: 'binary' }, position: 23 }))).toBe(
      ErrorCode.BIT_RANGE_GAP
    );
  });

  it('should accept an explicit position at the extent', () => {
    const registry = appendFlag(qa, { name: 'extra', kind: { type: 'binary' }, position: 22 });
    expect(getFlag(registry, 'extra')).toMatchObject({ start: 22, width: 1 });
  });

  it('should reject negative or fractional positions', () => {
    expect(codeOf(() => appendFlag(qa, { name: 'x', kind: { type: 'binary' }, position: -1 }))).toBe(
      ErrorCode.INVALID_FORMAT
    );
    expect(codeOf(() => appendFlag(qa, { name: 'x', kind: { type: 'binary' }, position: 1.5 }))).toBe(
      ErrorCode.INVALID_FORMAT
    );
  });

  it('should refuse to grow past maxWidth', () => {
    const registry = build('small', [{ name: 'a', kind: { type: 'numeric', precision: 'half' } }], 20);

    expect(() => appendFlag(registry, { name: 'b', kind: { type: 'count', maxValue: 31 } })).toThrow(FieldError);
    expect(() => appendFlag(registry, { name: 'b', kind: { type: 'count', maxValue: 31 } })).toThrow(
      'Registry "small" needs 21 bits, more than the supported 20'
    );
  });

  it('should allow exactly 64 bits', () => {
    const registry = build('wide', [
      { name: 'a', kind: { type: 'numeric', precision: 'single' } },
      { name: 'b', kind: { type: 'numeric', precision: 'single' } },
    ]);

    expect(registry.totalWidth).toBe(64);
    expect(codeOf(() => appendFlag(registry, { name: 'c', kind: { type: 'binary' } }))).toBe(
      ErrorCode.FIELD_WIDTH_EXCEEDED
    );
  });

  it('should reject an empty flag name', () => {
    expect(() => appendFlag(qa, { name: '', kind: { type: 'binary' } })).toThrow('Invalid flag name: must not be empty');
  });
});

describe('validateKind', () => {
  it('should accept valid kinds', () => {
    expect(() => validateKind({ type: 'case', caseCount: 1 })).not.toThrow();
    expect(() => validateKind({ type: 'count', maxValue: 0 })).not.toThrow();
    expect(() => validateKind({ type: 'numeric', precision: 'minifloat' })).not.toThrow();
  });

  it.each([0, -1, 2.5, 65537])('should reject a case count of %s', caseCount => {
    expect(codeOf(() => validateKind({ type: 'case', caseCount }))).toBe(ErrorCode.INVALID_FORMAT);
  });

  it('should reject invalid count bounds', () => {
    expect(codeOf(() => validateKind({ type: 'count', maxValue: -1 }))).toBe(ErrorCode.INVALID_FORMAT);
    expect(
      codeOf(() => validateKind({ type: 'count', maxValue: Number.MAX_SAFE_INTEGER, na: true }))
    ).toBe(ErrorCode.INVALID_FORMAT);
  });

  it('should reject custom precisions out of range', () => {
    const precision = { name: 'wide', signBits: 1, exponentBits: 12, mantissaBits: 3, bias: 0, totalWidth: 16 } as const;
    expect(codeOf(() => validateKind({ type: 'numeric', precision }))).toBe(ErrorCode.INVALID_FORMAT);
  });
});

describe('lookup', () => {
  it('should find flags by name', () => {
    expect(getFlag(qa, 'quality')?.start).toBe(1);
    expect(getFlag(qa, 'nope')).toBeUndefined();
    expect(hasFlag(qa, 'value')).toBe(true);
    expect(hasFlag(qa, 'nope')).toBe(false);
    expect(flagNames(qa)).toEqual(['missing', 'quality', 'run_length', 'value']);
  });
});

describe('reporting', () => {
  it('should label kinds', () => {
    expect(kindLabel({ type: 'binary', na: true })).toBe('binary(na)');
    expect(kindLabel({ type: 'case', caseCount: 3 })).toBe('case(3, exclusive)');
    expect(kindLabel({ type: 'case', caseCount: 3, exclusive: false })).toBe('case(3, overlap=first)');
    expect(kindLabel({ type: 'count', maxValue: 7, na: true })).toBe('count(max=7, na)');
    expect(kindLabel({ type: 'numeric', precision: 'half' })).toBe('numeric(half)');
  });

  it('should summarize bit ranges', () => {
    expect(summarizeRegistry(qa).map(s => s.bits)).toEqual(['0', '1-2', '3-5', '6-21']);
  });

  it('should describe an empty registry', () => {
    expect(describeRegistry(createRegistry('qa', 'Quality flags'))).toBe(
      'Registry "qa" (0 bits): Quality flags\n  (no flags)'
    );
  });

  it('should describe flags in aligned columns', () => {
    const registry = build('qa', [
      { name: 'missing', kind: { type: 'binary' }, description: 'No reading' },
      { name: 'grade', kind: { type: 'case', caseCount: 3 } },
    ]);

    expect(describeRegistry(registry).split('\n')).toEqual([
      'Registry "qa" (3 bits)',
      '  bits  name     kind                description',
      '  0     missing  binary              No reading',
      '  1-2   grade    case(3, exclusive)',
    ]);
  });
});
