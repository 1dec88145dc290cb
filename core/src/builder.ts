/**
 * Flag Builder
 *
 * The operator layer over registry and encoder. A builder owns one registry
 * while it grows and an explicit encode context: each flag's raw column is
 * computed once, by mapping the caller's test over the records, and handed
 * to encode() directly. Tests are plain functions; how a caller expresses
 * them (closures, compiled expressions, column lookups) is its own business.
 *
 * @example
 * ```typescript
 * const field = createFlagBuilder(stations, { name: 'qa' })
 *   .binary('missing', s => s.temperature === undefined)
 *   .cases('quality', [s => s.grade === 'A', s => s.grade === 'B', s => s.grade === 'C'])
 *   .count('run_length', s => s.run)
 *   .numeric('value', s => s.temperature ?? null, { precision: 'half' })
 *   .encode();
 * ```
 */

import { learnCountKind } from './codecs/index.js';
import { RegistryError, ValidationError } from './errors.js';
import { encode, type EncodeOptions } from './encoder.js';
import { noopLogger, type Logger } from './logging-types.js';
import { appendFlag, createRegistry } from './registry.js';
import type {
  CaseKind,
  CaseOverlap,
  EncodedField,
  FlagKind,
  PrecisionName,
  PrecisionSpec,
  RawColumn,
  RawValue,
  Registry,
} from './types.js';

/** A caller-supplied test: one record in, one raw value out */
export type FlagTest<R, V extends RawValue = RawValue> = (record: R, index: number) => V;

export interface FlagBuilderOptions {
  name: string;
  description?: string;
  /** Registry growth limit in bits (default 64) */
  maxWidth?: number;
  /** Widest field the target storage accepts, checked at encode time (default 64) */
  maxFieldWidth?: number;
  logger?: Logger;
  /** Overlap rule for non-exclusive case flags that do not set their own */
  caseOverlap?: CaseOverlap;
  /** Precision for numeric flags that do not set their own (default 'half') */
  defaultPrecision?: PrecisionName | PrecisionSpec;
}

interface PlacementOptions {
  /** Explicit start bit */
  position?: number;
  description?: string;
}

export interface BinaryFlagOptions<R> extends PlacementOptions {
  /**
   * Marks records whose source datum is missing. Those records store the NA
   * sentinel and the test is not evaluated for them.
   */
  missing?: FlagTest<R, boolean>;
  /** Reserve the NA sentinel even without a `missing` test */
  na?: boolean;
}

export interface CaseFlagOptions extends PlacementOptions {
  /** Default true, or false when `overlap` is given */
  exclusive?: boolean;
  overlap?: CaseOverlap;
}

export interface CountFlagOptions extends PlacementOptions {
  /** Fix the width from this bound instead of the column maximum */
  maxValue?: number;
  na?: boolean;
}

export interface NumericFlagOptions extends PlacementOptions {
  precision?: PrecisionName | PrecisionSpec;
}

export class FlagBuilder<R> {
  private readonly records: readonly R[];
  private readonly logger: Logger;
  private readonly options: FlagBuilderOptions;
  private readonly context: Map<string, RawColumn> = new Map();
  private current: Registry;
  private sealed = false;

  constructor(records: readonly R[], options: FlagBuilderOptions) {
    this.records = records;
    this.options = options;
    this.logger = options.logger ?? noopLogger;
    this.current = createRegistry(options.name, options.description ?? '', {
      maxWidth: options.maxWidth,
    });
  }

  /** The registry as grown so far */
  get registry(): Registry {
    return this.current;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /** Raw column computed for a flag, if it has been added */
  column(name: string): RawColumn | undefined {
    return this.context.get(name);
  }

  binary(name: string, test: FlagTest<R, boolean | null>, options: BinaryFlagOptions<R> = {}): this {
    const { missing } = options;
    const column = this.records.map((record, index) =>
      missing?.(record, index) ? null : test(record, index)
    );
    const na = options.na ?? (missing !== undefined || column.includes(null));
    return this.add(name, na ? { type: 'binary', na: true } : { type: 'binary' }, column, options);
  }

  /**
   * Add a case flag from ordered predicates. Each record's column entry is
   * the vector of predicate outcomes; the codec resolves it to an index.
   */
  cases(name: string, tests: readonly FlagTest<R, boolean>[], options: CaseFlagOptions = {}): this {
    const column = this.records.map((record, index) => tests.map(test => test(record, index)));
    if (options.exclusive === true && options.overlap !== undefined) {
      throw ValidationError.invalidFormat(
        `options for case flag "${name}"`,
        'overlap applies only to non-exclusive cases',
        { flag: name, overlap: options.overlap }
      );
    }
    const exclusive = options.exclusive ?? options.overlap === undefined;
    const kind: CaseKind = exclusive
      ? { type: 'case', caseCount: tests.length }
      : {
          type: 'case',
          caseCount: tests.length,
          exclusive: false,
          overlap: options.overlap ?? this.options.caseOverlap ?? 'first',
        };
    return this.add(name, kind, column, options);
  }

  /**
   * Add a count flag. The column is reduced to its maximum first, and that
   * fixes the flag's width.
   */
  count(name: string, test: FlagTest<R, number | null>, options: CountFlagOptions = {}): this {
    this.assertOpen(name);
    const column = this.records.map((record, index) => test(record, index));
    const learned = learnCountKind(column, { flag: name, na: options.na });
    const kind: FlagKind = options.maxValue === undefined ? learned : { ...learned, maxValue: options.maxValue };
    return this.add(name, kind, column, options);
  }

  numeric(name: string, test: FlagTest<R, number | null>, options: NumericFlagOptions = {}): this {
    const precision = options.precision ?? this.options.defaultPrecision ?? 'half';
    const column = this.records.map((record, index) => test(record, index));
    return this.add(name, { type: 'numeric', precision }, column, options);
  }

  /** Add a flag of any kind from a test producing its raw values directly */
  map(name: string, kind: FlagKind, test: FlagTest<R>, options: PlacementOptions = {}): this {
    const column = this.records.map((record, index) => test(record, index));
    return this.add(name, kind, column, options);
  }

  /**
   * Seal the registry and encode every record. After this call the builder
   * rejects further flags with REGISTRY_SEALED; encode() itself may be
   * called again.
   */
  encode(options: Omit<EncodeOptions, 'logger'> = {}): EncodedField {
    if (!this.sealed) {
      this.sealed = true;
      this.logger.debug('Registry sealed', {
        registry: this.current.name,
        flags: this.current.flags.length,
        width: this.current.totalWidth,
      });
    }
    return encode(this.current, this.context, {
      maxFieldWidth: options.maxFieldWidth ?? this.options.maxFieldWidth,
      logger: this.logger,
    });
  }

  private add(name: string, kind: FlagKind, column: RawColumn, placement: PlacementOptions): this {
    this.assertOpen(name);
    this.current = appendFlag(
      this.current,
      { name, kind, position: placement.position, description: placement.description },
      { logger: this.logger }
    );
    this.context.set(name, column);
    return this;
  }

  private assertOpen(name: string): void {
    if (this.sealed) {
      throw RegistryError.sealed(this.current.name, name);
    }
  }
}

export function createFlagBuilder<R>(records: readonly R[], options: FlagBuilderOptions): FlagBuilder<R> {
  return new FlagBuilder(records, options);
}
