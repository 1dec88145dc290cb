/**
 * Bitfield Encoder
 *
 * Packs one record's flag outcomes into a single unsigned integer. For every
 * record, flags are visited in registry order and their bits are shifted to
 * `totalWidth - start - width`, so the first-declared flag occupies the most
 * significant bits.
 *
 * Count widths must already be fixed (see learnCountKind()); the registry
 * is read-only here. Each record is encoded independently of every other.
 * The call is atomic: either every record is packed or an error is thrown
 * and nothing is returned.
 */

import { codecFor, type AnyCodec, type NumericStatus } from './codecs/index.js';
import { DEFAULT_MAX_FIELD_WIDTH } from './constants.js';
import { FieldError } from './errors.js';
import { noopLogger, type Logger } from './logging-types.js';
import type { EncodedField, RawColumn, RawColumns, RawValue, Registry } from './types.js';

export interface EncodeOptions {
  /** Widest field the target storage supports (default 64) */
  maxFieldWidth?: number;
  logger?: Logger;
}

function isColumnMap(columns: RawColumns): columns is ReadonlyMap<string, RawColumn> {
  return columns instanceof Map;
}

function columnFor(columns: RawColumns, name: string): RawColumn | undefined {
  if (isColumnMap(columns)) {
    return columns.get(name);
  }
  return Object.prototype.hasOwnProperty.call(columns, name) ? columns[name] : undefined;
}

/**
 * Check that every flag has a column and all columns have one length.
 *
 * @returns the record count
 * @throws FieldError (MISSING_COLUMN, LENGTH_MISMATCH)
 */
export function validateColumns(registry: Registry, columns: RawColumns): number {
  let rowCount: number | undefined;

  for (const flag of registry.flags) {
    const column = columnFor(columns, flag.name);
    if (column === undefined) {
      throw FieldError.missingColumn(registry.name, flag.name);
    }
    if (rowCount === undefined) {
      rowCount = column.length;
    } else if (column.length !== rowCount) {
      throw FieldError.lengthMismatch(flag.name, rowCount, column.length);
    }
  }

  return rowCount ?? 0;
}

interface PlacedCodec {
  codec: AnyCodec;
  column: RawColumn;
  shift: bigint;
  saturated: number;
}

const SATURATED: ReadonlySet<NumericStatus> = new Set<NumericStatus>(['overflow', 'underflow']);

/**
 * Encode every record of `columns` with `registry`.
 *
 * @throws FieldError (FIELD_WIDTH_EXCEEDED, MISSING_COLUMN, LENGTH_MISMATCH)
 * @throws CodecError / ValidationError for values a flag cannot represent
 */
export function encode(registry: Registry, columns: RawColumns, options: EncodeOptions = {}): EncodedField {
  const logger = options.logger ?? noopLogger;
  const maxFieldWidth = options.maxFieldWidth ?? DEFAULT_MAX_FIELD_WIDTH;

  if (registry.totalWidth > maxFieldWidth) {
    throw FieldError.fieldWidthExceeded(registry.name, registry.totalWidth, maxFieldWidth);
  }

  const rowCount = validateColumns(registry, columns);
  const placed: PlacedCodec[] = registry.flags.map(flag => ({
    codec: codecFor(flag),
    column: columnFor(columns, flag.name) ?? [],
    shift: BigInt(registry.totalWidth - flag.start - flag.width),
    saturated: 0,
  }));

  const values: bigint[] = new Array<bigint>(rowCount);
  for (let row = 0; row < rowCount; row++) {
    let packed = 0n;
    for (const entry of placed) {
      const raw = entry.column[row];
      let bits: bigint;
      if (entry.codec.type === 'numeric') {
        const result = entry.codec.encodeDetailed(raw, row);
        if (SATURATED.has(result.status)) entry.saturated++;
        bits = result.bits;
      } else {
        bits = entry.codec.encode(raw, row);
      }
      packed |= bits << entry.shift;
    }
    values[row] = packed;
  }

  for (const entry of placed) {
    if (entry.saturated > 0) {
      logger.debug('Numeric values saturated', {
        registry: registry.name,
        flag: entry.codec.flag.name,
        saturated: entry.saturated,
      });
    }
  }
  logger.debug('Field encoded', {
    registry: registry.name,
    flags: registry.flags.length,
    width: registry.totalWidth,
    rowsProcessed: rowCount,
  });

  return Object.freeze({
    registry: registry.name,
    width: registry.totalWidth,
    values: Object.freeze(values),
  });
}

/**
 * Encode a single record given as flag name to raw value.
 */
export function encodeRecord(
  registry: Registry,
  record: Readonly<Record<string, RawValue>>,
  options: EncodeOptions = {}
): bigint {
  const columns = new Map<string, RawColumn>();
  for (const flag of registry.flags) {
    if (Object.prototype.hasOwnProperty.call(record, flag.name)) {
      columns.set(flag.name, [record[flag.name]]);
    }
  }
  return encode(registry, columns, options).values[0] ?? 0n;
}
