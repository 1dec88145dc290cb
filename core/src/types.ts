// Flag, registry and field types shared by every codec module

// =============================================================================
// Precision
// =============================================================================

/** Named floating-point layouts known to the precision table */
export type PrecisionName = 'half' | 'single' | 'double' | 'bfloat16' | 'minifloat';

/**
 * Floating-point bit layout.
 * `1 + exponentBits + mantissaBits === totalWidth` and
 * `bias === 2 ** (exponentBits - 1) - 1`.
 */
export interface PrecisionSpec {
  readonly name: string;
  readonly signBits: 1;
  readonly exponentBits: number;
  readonly mantissaBits: number;
  readonly bias: number;
  readonly totalWidth: number;
}

// =============================================================================
// Flag Kinds
// =============================================================================

/**
 * How a non-exclusive case flag resolves several true predicates:
 * - first: lowest index wins (same as exclusive mode)
 * - last: highest index wins
 * - error: raise CASE_OVERLAP
 */
export type CaseOverlap = 'first' | 'last' | 'error';

export interface BinaryKind {
  readonly type: 'binary';
  /** Reserve a sentinel for missing data (widens the flag to 2 bits) */
  readonly na?: boolean;
}

export interface CaseKind {
  readonly type: 'case';
  readonly caseCount: number;
  /** Predicates are declared mutually exclusive; the first true one wins (default true) */
  readonly exclusive?: boolean;
  /** Only consulted when `exclusive` is false */
  readonly overlap?: CaseOverlap;
}

export interface CountKind {
  readonly type: 'count';
  readonly maxValue: number;
  /** Reserve the all-ones pattern for missing data */
  readonly na?: boolean;
}

export interface NumericKind {
  readonly type: 'numeric';
  readonly precision: PrecisionName | PrecisionSpec;
}

export type FlagKind = BinaryKind | CaseKind | CountKind | NumericKind;

export type FlagType = FlagKind['type'];

// =============================================================================
// Registry
// =============================================================================

/**
 * One named region of the bitfield. `start` counts from the most
 * significant bit: the flag occupies bits `start .. start + width - 1`
 * read left to right.
 */
export interface FlagDefinition {
  readonly name: string;
  readonly kind: FlagKind;
  readonly start: number;
  readonly width: number;
  /** Bit pattern reserved for missing data, if any */
  readonly naSentinel?: bigint;
  readonly description: string;
}

export interface Registry {
  readonly name: string;
  readonly description: string;
  readonly flags: readonly FlagDefinition[];
  /** Sum of all flag widths; the ranges tile [0, totalWidth) */
  readonly totalWidth: number;
  /** Growth limit in bits */
  readonly maxWidth: number;
}

/** Input for appending one flag */
export interface FlagSpec {
  readonly name: string;
  readonly kind: FlagKind;
  /** Explicit start bit; must not overlap existing flags */
  readonly position?: number;
  readonly description?: string;
}

// =============================================================================
// Raw and Decoded Values
// =============================================================================

/**
 * One raw value for one record, as produced by the caller's test:
 * - boolean: binary outcome
 * - number: count, numeric value, or a resolved case index
 * - boolean[]: per-case predicate outcomes
 * - null: missing datum (binary/count/numeric) or no matching case
 */
export type RawValue = boolean | number | readonly boolean[] | null;

export type RawColumn = readonly RawValue[];

/** Explicit encode context: flag name to that flag's raw column */
export type RawColumns =
  | ReadonlyMap<string, RawColumn>
  | Readonly<Record<string, RawColumn>>;

/** Decoded value of one flag for one record; null marks NA or no case */
export type DecodedValue = boolean | number | null;

export interface EncodedField {
  /** Name of the registry the field was encoded with */
  readonly registry: string;
  /** Declared field width in bits */
  readonly width: number;
  /** One packed non-negative integer per record */
  readonly values: readonly bigint[];
}

export interface DecodedFlags {
  readonly names: readonly string[];
  readonly rowCount: number;
  readonly columns: Readonly<Record<string, readonly DecodedValue[]>>;
}

// =============================================================================
// Exhaustiveness
// =============================================================================

/**
 * Exhaustiveness check for discriminated unions.
 *
 * @example
 * ```typescript
 * switch (kind.type) {
 *   case 'binary': ...
 *   default:
 *     return assertNever(kind, `Unhandled flag kind`);
 * }
 * ```
 */
export function assertNever(value: never, message?: string): never {
  throw new Error(message ?? `Unexpected value: ${JSON.stringify(value)}`);
}
