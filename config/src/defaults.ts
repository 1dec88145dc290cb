/**
 * @flagfield/config - Default Configuration Values
 *
 * Limits come from @flagfield/core constants.
 *
 * @packageDocumentation
 */

import { DEFAULT_LOOKUP_SEPARATOR, DEFAULT_MAX_FIELD_WIDTH } from '@flagfield/core';

import type { CodecConfig, FlagFieldConfig, ObservabilityConfig } from './types.js';

export const DEFAULT_CODEC_CONFIG: Readonly<CodecConfig> = Object.freeze({
  maxFieldWidth: DEFAULT_MAX_FIELD_WIDTH,
  defaultPrecision: 'half',
  caseOverlap: 'first',
  lookupSeparator: DEFAULT_LOOKUP_SEPARATOR,
});

export const DEFAULT_OBSERVABILITY_CONFIG: Readonly<ObservabilityConfig> = Object.freeze({
  logLevel: 'info',
  logFormat: 'json',
  serviceName: 'flagfield',
});

export const DEFAULT_CONFIG: Readonly<FlagFieldConfig> = Object.freeze({
  codec: DEFAULT_CODEC_CONFIG,
  observability: DEFAULT_OBSERVABILITY_CONFIG,
});
