/**
 * Flag Registry
 *
 * The ordered catalog of flags in one bitfield layout. Registries have value
 * semantics: appendFlag() validates the new flag against the existing ranges
 * and returns a new frozen registry, leaving its input untouched.
 *
 * Invariant after every append: flag ranges are pairwise disjoint and tile
 * [0, totalWidth) in definition order, position 0 being the most
 * significant bit of the packed field.
 *
 * @example
 * ```typescript
 * let registry = createRegistry('qa', 'Quality flags for station records');
 * registry = appendFlag(registry, { name: 'missing', kind: { type: 'binary' }, position: 0 });
 * registry = appendFlag(registry, { name: 'quality', kind: { type: 'case', caseCount: 3 } });
 * console.log(describeRegistry(registry));
 * ```
 */

import { widthOf, naSentinelOf } from './codecs/index.js';
import { DEFAULT_MAX_FIELD_WIDTH, MAX_CASE_COUNT, MAX_FIELD_WIDTH } from './constants.js';
import { FieldError, RegistryError, ValidationError } from './errors.js';
import { noopLogger, type Logger } from './logging-types.js';
import { resolvePrecision } from './precision.js';
import { assertNever, type FlagDefinition, type FlagKind, type FlagSpec, type Registry } from './types.js';

// =============================================================================
// Options
// =============================================================================

export interface RegistryOptions {
  /** Growth limit in bits (default and upper bound: 64) */
  maxWidth?: number;
}

export interface AppendOptions {
  logger?: Logger;
}

// =============================================================================
// Creation
// =============================================================================

export function createRegistry(name: string, description = '', options: RegistryOptions = {}): Registry {
  if (name.trim() === '') {
    throw ValidationError.invalidFormat('registry name', 'must not be empty');
  }
  const maxWidth = options.maxWidth ?? DEFAULT_MAX_FIELD_WIDTH;
  if (!Number.isInteger(maxWidth) || maxWidth < 1 || maxWidth > MAX_FIELD_WIDTH) {
    throw ValidationError.invalidFormat('maxWidth', `must be an integer in 1..${MAX_FIELD_WIDTH}`, { maxWidth });
  }

  return Object.freeze({
    name,
    description,
    flags: Object.freeze([]),
    totalWidth: 0,
    maxWidth,
  });
}

// =============================================================================
// Kind validation
// =============================================================================

/**
 * Validate a flag kind's parameters.
 *
 * @throws ValidationError (INVALID_FORMAT) for out-of-range parameters
 * @throws CodecError (UNKNOWN_PRECISION) for unknown precision names
 */
export function validateKind(kind: FlagKind): void {
  switch (kind.type) {
    case 'binary':
      return;
    case 'case':
      if (!Number.isSafeInteger(kind.caseCount) || kind.caseCount < 1 || kind.caseCount > MAX_CASE_COUNT) {
        throw ValidationError.invalidFormat('caseCount', `must be an integer in 1..${MAX_CASE_COUNT}`, {
          caseCount: kind.caseCount,
        });
      }
      if (kind.overlap !== undefined && !['first', 'last', 'error'].includes(kind.overlap)) {
        throw ValidationError.invalidFormat('overlap', "must be 'first', 'last' or 'error'", {
          overlap: kind.overlap,
        });
      }
      return;
    case 'count': {
      const limit = kind.na ? Number.MAX_SAFE_INTEGER - 1 : Number.MAX_SAFE_INTEGER;
      if (!Number.isSafeInteger(kind.maxValue) || kind.maxValue < 0 || kind.maxValue > limit) {
        throw ValidationError.invalidFormat('maxValue', 'must be a non-negative safe integer', {
          maxValue: kind.maxValue,
        });
      }
      return;
    }
    case 'numeric':
      resolvePrecision(kind.precision);
      return;
    default:
      return assertNever(kind, 'Unhandled flag kind');
  }
}

// =============================================================================
// Growth
// =============================================================================

/**
 * Append one flag, returning a new registry.
 *
 * @throws RegistryError (DUPLICATE_FLAG_NAME) if the name is taken
 * @throws RegistryError (BIT_RANGE_COLLISION) if an explicit position overlaps a flag
 * @throws RegistryError (BIT_RANGE_GAP) if an explicit position lies past the last occupied bit
 * @throws FieldError (FIELD_WIDTH_EXCEEDED) if the registry would outgrow maxWidth
 */
export function appendFlag(registry: Registry, spec: FlagSpec, options: AppendOptions = {}): Registry {
  const logger = options.logger ?? noopLogger;
  const { name, kind } = spec;

  if (name.trim() === '') {
    throw ValidationError.invalidFormat('flag name', 'must not be empty', { registry: registry.name });
  }
  if (hasFlag(registry, name)) {
    throw RegistryError.duplicateFlagName(registry.name, name);
  }

  validateKind(kind);
  const width = widthOf(kind);
  const start = placeFlag(registry, name, width, spec.position);

  const totalWidth = start + width;
  if (totalWidth > registry.maxWidth) {
    throw FieldError.fieldWidthExceeded(registry.name, totalWidth, registry.maxWidth);
  }

  const naSentinel = naSentinelOf(kind, width);
  const flag: FlagDefinition = Object.freeze({
    name,
    kind: Object.freeze({ ...kind }),
    start,
    width,
    ...(naSentinel !== undefined && { naSentinel }),
    description: spec.description ?? '',
  });

  logger.debug('Flag appended', {
    registry: registry.name,
    flag: name,
    kind: kind.type,
    start,
    width,
    totalWidth,
  });

  return Object.freeze({
    ...registry,
    flags: Object.freeze([...registry.flags, flag]),
    totalWidth,
  });
}

function placeFlag(registry: Registry, name: string, width: number, position: number | undefined): number {
  const extent = registry.totalWidth;
  if (position === undefined) {
    return extent;
  }

  if (!Number.isInteger(position) || position < 0) {
    throw ValidationError.invalidFormat('position', 'must be a non-negative integer', { flag: name, position });
  }

  const end = position + width;
  for (const existing of registry.flags) {
    if (position < existing.start + existing.width && existing.start < end) {
      throw RegistryError.bitRangeCollision(registry.name, name, { start: position, width }, existing.name);
    }
  }
  if (position > extent) {
    throw RegistryError.bitRangeGap(registry.name, name, position, extent);
  }
  return position;
}

// =============================================================================
// Lookup
// =============================================================================

export function getFlag(registry: Registry, name: string): FlagDefinition | undefined {
  return registry.flags.find(flag => flag.name === name);
}

export function hasFlag(registry: Registry, name: string): boolean {
  return getFlag(registry, name) !== undefined;
}

export function flagNames(registry: Registry): string[] {
  return registry.flags.map(flag => flag.name);
}

// =============================================================================
// Reporting
// =============================================================================

export interface FlagSummary {
  name: string;
  kind: string;
  /** "start" for one bit, "start-end" otherwise (inclusive, MSB = 0) */
  bits: string;
  width: number;
  description: string;
}

export function kindLabel(kind: FlagKind): string {
  switch (kind.type) {
    case 'binary':
      return kind.na ? 'binary(na)' : 'binary';
    case 'case': {
      const mode = kind.exclusive === false ? `overlap=${kind.overlap ?? 'first'}` : 'exclusive';
      return `case(${kind.caseCount}, ${mode})`;
    }
    case 'count':
      return kind.na ? `count(max=${kind.maxValue}, na)` : `count(max=${kind.maxValue})`;
    case 'numeric':
      return `numeric(${resolvePrecision(kind.precision).name})`;
    default:
      return assertNever(kind, 'Unhandled flag kind');
  }
}

export function summarizeRegistry(registry: Registry): FlagSummary[] {
  return registry.flags.map(flag => ({
    name: flag.name,
    kind: kindLabel(flag.kind),
    bits: flag.width === 1 ? `${flag.start}` : `${flag.start}-${flag.start + flag.width - 1}`,
    width: flag.width,
    description: flag.description,
  }));
}

/**
 * Human-readable report of a registry: one line per flag with its bit
 * range, kind and description.
 */
export function describeRegistry(registry: Registry): string {
  const rows = summarizeRegistry(registry);
  const header = `Registry "${registry.name}" (${registry.totalWidth} bits)` +
    (registry.description ? `: ${registry.description}` : '');

  if (rows.length === 0) {
    return `${header}\n  (no flags)`;
  }

  const columns = ['bits', 'name', 'kind'] as const;
  const widths = columns.map(col =>
    Math.max(col.length, ...rows.map(row => row[col].length))
  );
  const line = (cells: readonly string[], description: string): string =>
    `  ${cells.map((cell, i) => cell.padEnd(widths[i])).join('  ')}  ${description}`.trimEnd();

  return [
    header,
    line(columns, 'description'),
    ...rows.map(row => line([row.bits, row.name, row.kind], row.description)),
  ].join('\n');
}
