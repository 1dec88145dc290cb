/**
 * flagfield Common Constants
 *
 * Centralized constants for field widths, sentinels and lookup-table output.
 * All packages should import from @flagfield/core instead of using inline values.
 *
 * @module constants
 */

// =============================================================================
// FIELD WIDTH CONSTANTS
// =============================================================================

/** Widest packed field supported (bits). Fields are held as bigint and fit a BigUint64Array. */
export const MAX_FIELD_WIDTH = 64;

/** Default field width limit used by registries and the encoder */
export const DEFAULT_MAX_FIELD_WIDTH = MAX_FIELD_WIDTH;

/** Widest field that can be converted to plain JavaScript numbers without loss */
export const MAX_SAFE_FIELD_WIDTH = 53;

// =============================================================================
// FLAG CONSTANTS
// =============================================================================

/** Width of a binary flag without an NA sentinel */
export const BINARY_WIDTH = 1;

/** Width of a binary flag that reserves an NA sentinel */
export const BINARY_NA_WIDTH = 2;

/** NA sentinel for binary flags (distinct from false=0b00 and true=0b01) */
export const BINARY_NA_SENTINEL = 0b11n;

/** Upper bound on the number of cases a case flag may declare */
export const MAX_CASE_COUNT = 1 << 16;

// =============================================================================
// LOOKUP TABLE CONSTANTS
// =============================================================================

/** Default separator between flag bit groups in lookup-table output */
export const DEFAULT_LOOKUP_SEPARATOR = '|';
