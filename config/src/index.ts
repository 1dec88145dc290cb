/**
 * @flagfield/config - Configuration for flagfield jobs
 *
 * One configuration object for encoder limits, builder defaults and
 * logging, loaded from defaults, overrides or the environment.
 *
 * @example
 * ```typescript
 * import { createFlagBuilder } from '@flagfield/core';
 * import {
 *   assertValidConfig,
 *   createLoggerFromConfig,
 *   getConfigFromEnv,
 *   toBuilderOptions,
 * } from '@flagfield/config';
 *
 * const config = assertValidConfig(getConfigFromEnv());
 * const logger = createLoggerFromConfig(config);
 *
 * const field = createFlagBuilder(records, { name: 'qa', ...toBuilderOptions(config, logger) })
 *   .numeric('value', r => r.value)
 *   .encode();
 * ```
 *
 * @packageDocumentation
 */

export type {
  DeepPartial,
  CodecConfig,
  LogFormat,
  ObservabilityConfig,
  FlagFieldConfig,
  ConfigValidationError,
  ConfigValidationWarning,
  ConfigValidationResult,
  EnvConfigOptions,
} from './types.js';

export { DEFAULT_CONFIG, DEFAULT_CODEC_CONFIG, DEFAULT_OBSERVABILITY_CONFIG } from './defaults.js';

export {
  createConfig,
  mergeConfigs,
  getConfigFromEnv,
  toBuilderOptions,
  toEncodeOptions,
  toDecodeOptions,
  toLookupOptions,
  createLoggerFromConfig,
} from './config.js';

export { validateConfig, assertValidConfig } from './validation.js';
