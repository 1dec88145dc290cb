/**
 * Registry persistence
 *
 * A registry is stored as JSON next to the fields it encoded, so a decoder
 * in another process can read them back. Parsing validates the document
 * shape with zod and then replays every flag through appendFlag(), which
 * re-checks names, ranges and widths. NA sentinels are not stored; they
 * follow from each flag's kind.
 *
 * @module registry-json
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';
import type { Logger } from './logging-types.js';
import { appendFlag, createRegistry } from './registry.js';
import type { Registry } from './types.js';
import { parseJSON, validate } from './validation.js';

export const REGISTRY_FORMAT = 'flagfield-registry';
export const REGISTRY_FORMAT_VERSION = 1;

// =============================================================================
// Schemas
// =============================================================================

const PrecisionSchema = z.union([
  z.enum(['half', 'single', 'double', 'bfloat16', 'minifloat']),
  z.object({
    name: z.string(),
    signBits: z.literal(1),
    exponentBits: z.number().int(),
    mantissaBits: z.number().int(),
    bias: z.number().int(),
    totalWidth: z.number().int(),
  }),
]);

export const FlagKindSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('binary'), na: z.boolean().optional() }),
  z.object({
    type: z.literal('case'),
    caseCount: z.number().int().positive(),
    exclusive: z.boolean().optional(),
    overlap: z.enum(['first', 'last', 'error']).optional(),
  }),
  z.object({ type: z.literal('count'), maxValue: z.number().int().nonnegative(), na: z.boolean().optional() }),
  z.object({ type: z.literal('numeric'), precision: PrecisionSchema }),
]);

const FlagSchema = z.object({
  name: z.string().min(1),
  kind: FlagKindSchema,
  start: z.number().int().nonnegative(),
  width: z.number().int().positive(),
  description: z.string().default(''),
});

export const RegistryJSONSchema = z.object({
  format: z.literal(REGISTRY_FORMAT),
  version: z.literal(REGISTRY_FORMAT_VERSION),
  name: z.string().min(1),
  description: z.string().default(''),
  maxWidth: z.number().int().positive(),
  totalWidth: z.number().int().nonnegative(),
  flags: z.array(FlagSchema),
});

export type SerializedRegistry = z.infer<typeof RegistryJSONSchema>;

// =============================================================================
// Serialization
// =============================================================================

export function registryToJSON(registry: Registry): SerializedRegistry {
  return {
    format: REGISTRY_FORMAT,
    version: REGISTRY_FORMAT_VERSION,
    name: registry.name,
    description: registry.description,
    maxWidth: registry.maxWidth,
    totalWidth: registry.totalWidth,
    flags: registry.flags.map(flag => ({
      name: flag.name,
      kind: flag.kind,
      start: flag.start,
      width: flag.width,
      description: flag.description,
    })),
  };
}

export function serializeRegistry(registry: Registry, space?: number): string {
  return JSON.stringify(registryToJSON(registry), null, space);
}

// =============================================================================
// Parsing
// =============================================================================

export interface ParseRegistryOptions {
  logger?: Logger;
}

/**
 * Rebuild a registry from an already-parsed document.
 *
 * @throws JSONValidationError if the document shape is wrong
 * @throws RegistryError / FieldError if the flags do not form a valid layout
 * @throws ValidationError (INVALID_FORMAT) if a stored width disagrees with its kind
 */
export function registryFromJSON(value: unknown, options: ParseRegistryOptions = {}): Registry {
  return replay(validate(value, RegistryJSONSchema), options);
}

/**
 * Parse a registry written by serializeRegistry().
 *
 * @throws JSONParseError if `json` is not valid JSON
 * @throws JSONValidationError if the document shape is wrong
 */
export function parseRegistry(json: string, options: ParseRegistryOptions = {}): Registry {
  return replay(parseJSON(json, RegistryJSONSchema), options);
}

function replay(document: SerializedRegistry, options: ParseRegistryOptions): Registry {
  let registry = createRegistry(document.name, document.description, { maxWidth: document.maxWidth });

  for (const flag of document.flags) {
    registry = appendFlag(
      registry,
      { name: flag.name, kind: flag.kind, position: flag.start, description: flag.description },
      { logger: options.logger }
    );
    const appended = registry.flags[registry.flags.length - 1];
    if (appended.width !== flag.width) {
      throw ValidationError.invalidFormat('registry JSON', `flag "${flag.name}" is stored with width ${flag.width} but its kind needs ${appended.width}`, {
        registry: document.name,
        flag: flag.name,
      });
    }
  }

  if (registry.totalWidth !== document.totalWidth) {
    throw ValidationError.invalidFormat('registry JSON', `stored totalWidth ${document.totalWidth} does not match the flags (${registry.totalWidth})`, {
      registry: document.name,
    });
  }

  return registry;
}
