/**
 * Tests for the precision tables
 */

import { describe, it, expect } from 'vitest';
import { CodecError, ValidationError } from '../errors.js';
import {
  PRECISION_NAMES,
  customPrecision,
  isPrecisionName,
  largestFinite,
  resolvePrecision,
  smallestSubnormal,
  specFor,
} from '../precision.js';

describe('specFor', () => {
  it.each([
    ['half', 5, 10, 15, 16],
    ['single', 8, 23, 127, 32],
    ['double', 11, 52, 1023, 64],
    ['bfloat16', 8, 7, 127, 16],
    ['minifloat', 4, 3, 7, 8],
  ])('should describe %s', (name, exponentBits, mantissaBits, bias, totalWidth) => {
    expect(specFor(name)).toEqual({ name, signBits: 1, exponentBits, mantissaBits, bias, totalWidth });
  });

  it('should reject unknown names', () => {
    expect(() => specFor('quad')).toThrow(CodecError);
    expect(() => specFor('quad')).toThrow('Unknown precision "quad"');
  });

  it('should return frozen specs', () => {
    expect(Object.isFrozen(specFor('half'))).toBe(true);
  });

  it('should list every name', () => {
    expect(PRECISION_NAMES).toEqual(['half', 'single', 'double', 'bfloat16', 'minifloat']);
    expect(isPrecisionName('single')).toBe(true);
    expect(isPrecisionName('Single')).toBe(false);
  });
});

describe('customPrecision', () => {
  it('should derive bias and width', () => {
    expect(customPrecision(6, 9)).toEqual({
      name: 'e6m9',
      signBits: 1,
      exponentBits: 6,
      mantissaBits: 9,
      bias: 31,
      totalWidth: 16,
    });
  });

  it.each([
    [1, 3],
    [12, 3],
    [5, 0],
    [5, 53],
    [4.5, 3],
  ])('should reject exponentBits=%s mantissaBits=%s', (exponentBits, mantissaBits) => {
    expect(() => customPrecision(exponentBits, mantissaBits)).toThrow(ValidationError);
  });
});

describe('resolvePrecision', () => {
  it('should resolve names', () => {
    expect(resolvePrecision('bfloat16')).toBe(specFor('bfloat16'));
  });

  it('should map a spec matching a named layout to that layout', () => {
    expect(resolvePrecision({ ...specFor('half') })).toBe(specFor('half'));
  });

  it('should re-derive inconsistent hand-written specs', () => {
    const spec = resolvePrecision({
      name: 'half',
      signBits: 1,
      exponentBits: 4,
      mantissaBits: 3,
      bias: 99,
      totalWidth: 99,
    });

    expect(spec).toMatchObject({ name: 'e4m3', bias: 7, totalWidth: 8 });
  });
});

describe('range helpers', () => {
  it('should give half limits', () => {
    expect(smallestSubnormal(specFor('half'))).toBe(2 ** -24);
    expect(largestFinite(specFor('half'))).toBe(65504);
  });

  it('should give minifloat limits', () => {
    expect(smallestSubnormal(specFor('minifloat'))).toBe(2 ** -9);
    expect(largestFinite(specFor('minifloat'))).toBe(240);
  });

  it('should match the double range', () => {
    expect(largestFinite(specFor('double'))).toBe(Number.MAX_VALUE);
    expect(smallestSubnormal(specFor('double'))).toBe(Number.MIN_VALUE);
  });
});
