// @flagfield/core
// Packs per-record test outcomes into one fixed-width integer and back

// =============================================================================
// Types
// =============================================================================

export {
  assertNever,
  type PrecisionName,
  type PrecisionSpec,
  type CaseOverlap,
  type BinaryKind,
  type CaseKind,
  type CountKind,
  type NumericKind,
  type FlagKind,
  type FlagType,
  type FlagDefinition,
  type Registry,
  type FlagSpec,
  type RawValue,
  type RawColumn,
  type RawColumns,
  type DecodedValue,
  type EncodedField,
  type DecodedFlags,
} from './types.js';

export {
  MAX_FIELD_WIDTH,
  DEFAULT_MAX_FIELD_WIDTH,
  MAX_SAFE_FIELD_WIDTH,
  BINARY_WIDTH,
  BINARY_NA_WIDTH,
  BINARY_NA_SENTINEL,
  MAX_CASE_COUNT,
  DEFAULT_LOOKUP_SEPARATOR,
} from './constants.js';

// =============================================================================
// Precision
// =============================================================================

export {
  PRECISION_NAMES,
  isPrecisionName,
  specFor,
  customPrecision,
  resolvePrecision,
  smallestSubnormal,
  largestFinite,
} from './precision.js';

// =============================================================================
// Codecs
// =============================================================================

export {
  widthOf,
  naSentinelOf,
  codecFor,
  toBitString,
  binaryWidth,
  createBinaryCodec,
  decodeBinary,
  encodeBinary,
  caseWidth,
  createCaseCodec,
  noCaseCode,
  resolveCase,
  bitLength,
  countWidth,
  createCountCodec,
  isCountValue,
  learnCountKind,
  createNumericCodec,
  decodeNumeric,
  encodeNumeric,
  quietNaNBits,
  rawTypeName,
  type AnyCodec,
  type BinaryCodec,
  type CaseCodec,
  type CountCodec,
  type FlagCodec,
  type NumericCodec,
  type NumericEncoding,
  type NumericStatus,
} from './codecs/index.js';

// =============================================================================
// Registry
// =============================================================================

export {
  createRegistry,
  appendFlag,
  validateKind,
  getFlag,
  hasFlag,
  flagNames,
  kindLabel,
  summarizeRegistry,
  describeRegistry,
  type RegistryOptions,
  type AppendOptions,
  type FlagSummary,
} from './registry.js';

export {
  REGISTRY_FORMAT,
  REGISTRY_FORMAT_VERSION,
  FlagKindSchema,
  RegistryJSONSchema,
  registryToJSON,
  registryFromJSON,
  serializeRegistry,
  parseRegistry,
  type SerializedRegistry,
  type ParseRegistryOptions,
} from './registry-json.js';

// =============================================================================
// Encode / Decode
// =============================================================================

export { encode, encodeRecord, validateColumns, type EncodeOptions } from './encoder.js';

export {
  decode,
  decodeRecord,
  lookupRecord,
  validateSeparator,
  fieldToNumbers,
  fieldFromNumbers,
  type DecodeOptions,
  type LookupTableOptions,
} from './decoder.js';

export {
  FlagBuilder,
  createFlagBuilder,
  type FlagTest,
  type FlagBuilderOptions,
  type BinaryFlagOptions,
  type CaseFlagOptions,
  type CountFlagOptions,
  type NumericFlagOptions,
} from './builder.js';

// =============================================================================
// Errors and Results
// =============================================================================

export {
  ErrorCode,
  isErrorCode,
  FlagFieldError,
  RegistryError,
  CodecError,
  FieldError,
  ValidationError,
  wrapError,
  hasErrorCode,
} from './errors.js';

export {
  JSONParseError,
  JSONValidationError,
  parseJSON,
  safeParseJSON,
  validate,
  type ZodSchemaLike,
  type ZodErrorLike,
  type SafeParseJSONResult,
} from './validation.js';

export {
  ok,
  err,
  isOk,
  isErr,
  tryCatch,
  tryEncode,
  tryDecode,
  type Ok,
  type Err,
  type Result,
} from './result.js';

// =============================================================================
// Logging
// =============================================================================

export {
  noopLogger,
  type LogLevel,
  type LogContextValue,
  type LogContext,
  type LogEntry,
  type Logger,
  type LoggerConfig,
  type ConsoleLoggerConfig,
  type TestLogger,
} from './logging-types.js';
