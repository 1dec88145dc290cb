/**
 * Bitfield Decoder
 *
 * Reconstructs every flag's value from packed integers, or renders each
 * flag's literal bits for human audit (lookup-table mode).
 */

import { codecFor, toBitString, type AnyCodec } from './codecs/index.js';
import { DEFAULT_LOOKUP_SEPARATOR, MAX_SAFE_FIELD_WIDTH } from './constants.js';
import { FieldError, ValidationError } from './errors.js';
import { noopLogger, type Logger } from './logging-types.js';
import type { DecodedFlags, DecodedValue, EncodedField, Registry } from './types.js';

export interface DecodeOptions {
  lookupTable?: false;
  logger?: Logger;
}

export interface LookupTableOptions {
  lookupTable: true;
  /** Placed between flag bit groups; non-empty and free of '0' and '1' */
  separator: string;
  logger?: Logger;
}

interface Extractor {
  codec: AnyCodec;
  shift: bigint;
  mask: bigint;
}

function extractorsFor(registry: Registry): Extractor[] {
  return registry.flags.map(flag => ({
    codec: codecFor(flag),
    shift: BigInt(registry.totalWidth - flag.start - flag.width),
    mask: (1n << BigInt(flag.width)) - 1n,
  }));
}

/**
 * @throws ValidationError (INVALID_FORMAT) for an empty separator or one containing '0' or '1'
 */
export function validateSeparator(separator: string): void {
  if (separator.length === 0) {
    throw ValidationError.invalidFormat('separator', 'must not be empty');
  }
  if (/[01]/.test(separator)) {
    throw ValidationError.invalidFormat('separator', "must not contain '0' or '1'", { separator });
  }
}

function checkValue(value: bigint, width: number, row?: number): void {
  if (value < 0n || value >> BigInt(width) !== 0n) {
    throw ValidationError.invalidFormat('packed value', `does not fit in ${width} bits`, {
      value: value.toString(),
      ...(row !== undefined && { row }),
    });
  }
}

function checkField(field: EncodedField, registry: Registry): void {
  if (field.width !== registry.totalWidth) {
    throw FieldError.registryFieldMismatch(registry.name, registry.totalWidth, field.width);
  }
}

/**
 * Decode a packed field.
 *
 * @throws FieldError (REGISTRY_FIELD_MISMATCH) when the field's width differs from the registry's
 */
export function decode(field: EncodedField, registry: Registry): DecodedFlags;
export function decode(field: EncodedField, registry: Registry, options: DecodeOptions): DecodedFlags;
export function decode(field: EncodedField, registry: Registry, options: LookupTableOptions): string[];
export function decode(
  field: EncodedField,
  registry: Registry,
  options: DecodeOptions | LookupTableOptions = {}
): DecodedFlags | string[] {
  const logger = options.logger ?? noopLogger;
  checkField(field, registry);

  if (options.lookupTable === true) {
    validateSeparator(options.separator);
    const extractors = extractorsFor(registry);
    const rows = field.values.map((value, row) => {
      checkValue(value, field.width, row);
      return lookupBits(value, extractors, options.separator);
    });
    logger.debug('Field decoded', {
      registry: registry.name,
      mode: 'lookup-table',
      rowsProcessed: rows.length,
    });
    return rows;
  }

  const extractors = extractorsFor(registry);
  const decoded = extractors.map(() => new Array<DecodedValue>(field.values.length));

  field.values.forEach((value, row) => {
    checkValue(value, field.width, row);
    extractors.forEach(({ codec, shift, mask }, i) => {
      decoded[i][row] = codec.decode((value >> shift) & mask);
    });
  });

  // Own keys only: a flag named "__proto__" is a column like any other
  const columns: Record<string, DecodedValue[]> = Object.fromEntries(
    extractors.map(({ codec }, i): [string, DecodedValue[]] => [codec.flag.name, decoded[i]])
  );

  logger.debug('Field decoded', {
    registry: registry.name,
    mode: 'typed',
    rowsProcessed: field.values.length,
  });

  return {
    names: registry.flags.map(flag => flag.name),
    rowCount: field.values.length,
    columns,
  };
}

function lookupBits(value: bigint, extractors: readonly Extractor[], separator: string): string {
  return extractors
    .map(({ codec, shift, mask }) => toBitString((value >> shift) & mask, codec.width))
    .join(separator);
}

/**
 * Decode a single packed integer into flag name to value.
 */
export function decodeRecord(value: bigint, registry: Registry): Record<string, DecodedValue> {
  checkValue(value, registry.totalWidth);
  return Object.fromEntries(
    extractorsFor(registry).map(({ codec, shift, mask }): [string, DecodedValue] => [
      codec.flag.name,
      codec.decode((value >> shift) & mask),
    ])
  );
}

/**
 * Render one packed integer as its per-flag bit groups.
 */
export function lookupRecord(value: bigint, registry: Registry, separator = DEFAULT_LOOKUP_SEPARATOR): string {
  validateSeparator(separator);
  checkValue(value, registry.totalWidth);
  return lookupBits(value, extractorsFor(registry), separator);
}

// =============================================================================
// Plain-number storage
// =============================================================================

/**
 * Convert a field to plain numbers, for storage in numeric columns or raster bands.
 *
 * @throws FieldError (FIELD_WIDTH_EXCEEDED) for fields wider than 53 bits
 */
export function fieldToNumbers(field: EncodedField): number[] {
  if (field.width > MAX_SAFE_FIELD_WIDTH) {
    throw FieldError.fieldWidthExceeded(field.registry, field.width, MAX_SAFE_FIELD_WIDTH);
  }
  return field.values.map(value => Number(value));
}

/**
 * Rebuild a field from plain numbers previously produced by fieldToNumbers().
 */
export function fieldFromNumbers(registry: Registry, values: readonly number[]): EncodedField {
  if (registry.totalWidth > MAX_SAFE_FIELD_WIDTH) {
    throw FieldError.fieldWidthExceeded(registry.name, registry.totalWidth, MAX_SAFE_FIELD_WIDTH);
  }
  const packed = values.map((value, row) => {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw ValidationError.invalidFormat('packed value', 'must be a non-negative safe integer', { value, row });
    }
    const bits = BigInt(value);
    checkValue(bits, registry.totalWidth, row);
    return bits;
  });
  return Object.freeze({
    registry: registry.name,
    width: registry.totalWidth,
    values: Object.freeze(packed),
  });
}
