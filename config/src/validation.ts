/**
 * @flagfield/config - Configuration Validation
 *
 * Reports every problem at once, with the path of the offending field.
 *
 * @packageDocumentation
 */

import {
  MAX_FIELD_WIDTH,
  ValidationError,
  isPrecisionName,
  validateSeparator,
} from '@flagfield/core';
import { isLogLevel } from '@flagfield/observability';

import type {
  ConfigValidationError,
  ConfigValidationResult,
  ConfigValidationWarning,
  FlagFieldConfig,
} from './types.js';

/**
 * @example
 * ```typescript
 * const result = validateConfig(config);
 * if (!result.valid) {
 *   console.error('Config errors:', result.errors);
 * }
 * ```
 */
export function validateConfig(config: FlagFieldConfig): ConfigValidationResult {
  const errors: ConfigValidationError[] = [];
  const warnings: ConfigValidationWarning[] = [];

  validateCodecConfig(config.codec, errors);
  validateObservabilityConfig(config.observability, errors, warnings);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

function validateCodecConfig(
  codec: FlagFieldConfig['codec'],
  errors: ConfigValidationError[]
): void {
  const { maxFieldWidth } = codec;
  if (!Number.isInteger(maxFieldWidth) || maxFieldWidth < 1 || maxFieldWidth > MAX_FIELD_WIDTH) {
    errors.push({
      path: 'codec.maxFieldWidth',
      message: `Max field width must be an integer between 1 and ${MAX_FIELD_WIDTH}`,
      value: maxFieldWidth,
      suggestion: 'Use the bit width of the integer column the fields are stored in',
    });
  }

  if (!isPrecisionName(codec.defaultPrecision)) {
    errors.push({
      path: 'codec.defaultPrecision',
      message: 'Unknown precision',
      value: codec.defaultPrecision,
      suggestion: "Use 'half', 'single', 'double', 'bfloat16' or 'minifloat'",
    });
  }

  if (!['first', 'last', 'error'].includes(codec.caseOverlap)) {
    errors.push({
      path: 'codec.caseOverlap',
      message: "Case overlap must be 'first', 'last' or 'error'",
      value: codec.caseOverlap,
    });
  }

  try {
    validateSeparator(codec.lookupSeparator);
  } catch (error) {
    if (!(error instanceof ValidationError)) {
      throw error;
    }
    errors.push({
      path: 'codec.lookupSeparator',
      message: error.message,
      value: codec.lookupSeparator,
      suggestion: "Use a separator such as '|' or ' '",
    });
  }
}

function validateObservabilityConfig(
  observability: FlagFieldConfig['observability'],
  errors: ConfigValidationError[],
  warnings: ConfigValidationWarning[]
): void {
  if (!isLogLevel(observability.logLevel)) {
    errors.push({
      path: 'observability.logLevel',
      message: "Log level must be 'debug', 'info', 'warn' or 'error'",
      value: observability.logLevel,
    });
  } else if (observability.logLevel === 'debug') {
    warnings.push({
      path: 'observability.logLevel',
      message: 'Debug logging emits an entry for every flag appended and every field encoded',
      value: observability.logLevel,
      recommendation: "Use 'info' outside of development",
    });
  }

  if (observability.logFormat !== 'json' && observability.logFormat !== 'pretty') {
    errors.push({
      path: 'observability.logFormat',
      message: "Log format must be 'json' or 'pretty'",
      value: observability.logFormat,
    });
  }

  if (observability.serviceName.trim() === '') {
    errors.push({
      path: 'observability.serviceName',
      message: 'Service name must not be empty',
      value: observability.serviceName,
    });
  }
}

/**
 * @throws ValidationError (VALIDATION_ERROR) listing every invalid field
 */
export function assertValidConfig(config: FlagFieldConfig): FlagFieldConfig {
  const result = validateConfig(config);
  if (!result.valid) {
    throw new ValidationError(
      `Invalid configuration: ${result.errors.map(e => `${e.path}: ${e.message}`).join('; ')}`,
      undefined,
      { errors: result.errors.map(({ path, message }) => ({ path, message })) }
    );
  }
  return config;
}
