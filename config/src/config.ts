/**
 * @flagfield/config - Configuration Factory Functions
 *
 * Create, merge and load configurations, and turn them into the options
 * the codec and logger factories take.
 *
 * @packageDocumentation
 */

import {
  ValidationError,
  isPrecisionName,
  type CaseOverlap,
  type DecodeOptions,
  type EncodeOptions,
  type FlagBuilderOptions,
  type Logger,
  type LookupTableOptions,
} from '@flagfield/core';
import { createConsoleLogger, isLogLevel, withContext } from '@flagfield/observability';

import { DEFAULT_CONFIG } from './defaults.js';
import type {
  CodecConfig,
  DeepPartial,
  EnvConfigOptions,
  FlagFieldConfig,
  LogFormat,
  ObservabilityConfig,
} from './types.js';

/**
 * Copy `base` and apply every defined value of `overrides`. Undefined
 * values never override.
 */
function mergeSection<T extends object>(base: T, overrides: Partial<T> | null | undefined): T {
  const result: T = { ...base };
  if (!overrides) {
    return result;
  }
  for (const key in overrides) {
    const value = overrides[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Create a complete, frozen configuration.
 *
 * @example
 * ```typescript
 * const config = createConfig({ codec: { maxFieldWidth: 32 } });
 * const strict = createConfig({ codec: { caseOverlap: 'error' } }, config);
 * ```
 */
export function createConfig(
  overrides?: DeepPartial<FlagFieldConfig> | null,
  base: FlagFieldConfig = DEFAULT_CONFIG
): FlagFieldConfig {
  return Object.freeze({
    codec: Object.freeze(mergeSection<CodecConfig>(base.codec, overrides?.codec)),
    observability: Object.freeze(mergeSection<ObservabilityConfig>(base.observability, overrides?.observability)),
  });
}

/**
 * Merge partial configurations; later ones take precedence.
 */
export function mergeConfigs(
  ...configs: Array<DeepPartial<FlagFieldConfig> | null | undefined>
): DeepPartial<FlagFieldConfig> {
  let result: DeepPartial<FlagFieldConfig> = {};

  for (const config of configs) {
    if (config) {
      result = {
        codec: mergeSection<DeepPartial<CodecConfig>>(result.codec ?? {}, config.codec),
        observability: mergeSection<DeepPartial<ObservabilityConfig>>(
          result.observability ?? {},
          config.observability
        ),
      };
    }
  }

  return result;
}

// =============================================================================
// Environment
// =============================================================================

function oneOf<T extends string>(choices: readonly T[]): (value: string) => value is T {
  return (value: string): value is T => choices.some(choice => choice === value);
}

class EnvReader {
  constructor(
    private readonly env: Record<string, string | undefined>,
    private readonly prefix: string
  ) {}

  key(...parts: string[]): string {
    return [this.prefix, ...parts].join('_').toUpperCase();
  }

  string(...parts: string[]): string | undefined {
    return this.env[this.key(...parts)];
  }

  number(...parts: string[]): number | undefined {
    const raw = this.string(...parts);
    if (raw === undefined || raw.trim() === '') {
      return undefined;
    }
    const value = Number(raw);
    if (Number.isNaN(value)) {
      throw ValidationError.invalidFormat(this.key(...parts), 'must be a number', { value: raw });
    }
    return value;
  }

  choice<T extends string>(
    choices: readonly T[] | ((value: string) => value is T),
    ...parts: string[]
  ): T | undefined {
    const raw = this.string(...parts);
    if (raw === undefined) {
      return undefined;
    }
    const value = raw.trim().toLowerCase();
    const accepts = typeof choices === 'function' ? choices : oneOf(choices);
    if (!accepts(value)) {
      throw ValidationError.invalidFormat(this.key(...parts), 'is not a recognized value', { value: raw });
    }
    return value;
  }
}

const CASE_OVERLAPS: readonly CaseOverlap[] = ['first', 'last', 'error'];
const LOG_FORMATS: readonly LogFormat[] = ['json', 'pretty'];

/**
 * Create configuration from environment variables named
 * `<PREFIX>_<SECTION>_<FIELD>`, for example:
 * - FLAGFIELD_CODEC_MAX_FIELD_WIDTH=32
 * - FLAGFIELD_CODEC_DEFAULT_PRECISION=single
 * - FLAGFIELD_OBSERVABILITY_LOG_LEVEL=debug
 *
 * @throws ValidationError (INVALID_FORMAT) for values that cannot be parsed
 */
export function getConfigFromEnv(
  options: EnvConfigOptions = {},
  base: FlagFieldConfig = DEFAULT_CONFIG
): FlagFieldConfig {
  const env = new EnvReader(options.env ?? process.env, options.prefix ?? 'FLAGFIELD');

  return createConfig(
    {
      codec: {
        maxFieldWidth: env.number('CODEC', 'MAX', 'FIELD', 'WIDTH'),
        defaultPrecision: env.choice(isPrecisionName, 'CODEC', 'DEFAULT', 'PRECISION'),
        caseOverlap: env.choice(CASE_OVERLAPS, 'CODEC', 'CASE', 'OVERLAP'),
        lookupSeparator: env.string('CODEC', 'LOOKUP', 'SEPARATOR'),
      },
      observability: {
        logLevel: env.choice(isLogLevel, 'OBSERVABILITY', 'LOG', 'LEVEL'),
        logFormat: env.choice(LOG_FORMATS, 'OBSERVABILITY', 'LOG', 'FORMAT'),
        serviceName: env.string('OBSERVABILITY', 'SERVICE', 'NAME'),
      },
    },
    base
  );
}

// =============================================================================
// Options
// =============================================================================

/**
 * Builder defaults taken from a configuration. Spread into the options of
 * createFlagBuilder() next to the registry name.
 */
export function toBuilderOptions(
  config: FlagFieldConfig,
  logger?: Logger
): Omit<FlagBuilderOptions, 'name' | 'description'> {
  return {
    maxFieldWidth: config.codec.maxFieldWidth,
    caseOverlap: config.codec.caseOverlap,
    defaultPrecision: config.codec.defaultPrecision,
    ...(logger && { logger }),
  };
}

export function toEncodeOptions(config: FlagFieldConfig, logger?: Logger): EncodeOptions {
  return {
    maxFieldWidth: config.codec.maxFieldWidth,
    ...(logger && { logger }),
  };
}

export function toLookupOptions(config: FlagFieldConfig, logger?: Logger): LookupTableOptions {
  return {
    lookupTable: true,
    separator: config.codec.lookupSeparator,
    ...(logger && { logger }),
  };
}

export function toDecodeOptions(logger?: Logger): DecodeOptions {
  return logger ? { logger } : {};
}

/**
 * Console logger at the configured level and format, tagging every entry
 * with the service name.
 */
export function createLoggerFromConfig(config: FlagFieldConfig): Logger {
  const { logLevel, logFormat, serviceName } = config.observability;
  return withContext(createConsoleLogger({ minLevel: logLevel, format: logFormat }), {
    service: serviceName,
  });
}
