import type { GenericMap, GenericValue } from './value.js';
import type { SanitizeLogger } from './logger.js';
import { noopLogger } from './logger.js';
import { generify } from './generify.js';
import { isGenericMap } from './value.js';
import { SanitizedConfig } from './sanitized.js';
import { PLUGIN_FIELD, TYPE_FIELD } from './fields.js';
import { MissingOrInvalidTypeError, SanitizeError } from './errors.js';

export type SanitizeResult = { ok: true; value: SanitizedConfig } | { ok: false; error: SanitizeError };

export interface SanitizeOptions {
  logger?: SanitizeLogger;
}

/**
 * Read the `type` discriminant from an unknown input.
 * Returns null for non-mappings and missing or non-string types. Does NOT throw.
 */
export function detectComponentType(input: unknown): string | null {
  if (!isGenericMap(input)) return null;
  const type = input[TYPE_FIELD];
  return typeof type === 'string' ? type : null;
}

/**
 * Reduce a component config to `type` plus the single payload that belongs
 * to it. Payload precedence:
 *   1. the entry named after the type (any value, null included)
 *   2. a non-null `plugin` entry
 *   3. nothing
 */
export function sanitizeComponent(conf: unknown, options: SanitizeOptions = {}): SanitizeResult {
  const logger = options.logger ?? noopLogger;

  let record: GenericMap;
  try {
    record = generify(conf);
  } catch (err) {
    if (err instanceof SanitizeError) {
      logger.debug('rejecting config that failed to generify', { error: err.message });
      return { ok: false, error: err };
    }
    throw err;
  }

  const type = record[TYPE_FIELD];
  if (typeof type !== 'string') {
    const received = type === undefined ? 'undefined' : type === null ? 'null' : typeof type;
    logger.debug('rejecting config without a string type', { received });
    return { ok: false, error: new MissingOrInvalidTypeError(received) };
  }

  const entries: Array<[string, GenericValue]> = [[TYPE_FIELD, type]];
  if (Object.hasOwn(record, type)) {
    entries.push([type, record[type]]);
  } else {
    const plugin = record[PLUGIN_FIELD];
    if (plugin !== undefined && plugin !== null) entries.push([PLUGIN_FIELD, plugin]);
  }

  logger.debug('sanitized component config', {
    type,
    payloadKey: entries.length > 1 ? entries[1][0] : null,
  });
  return { ok: true, value: SanitizedConfig.fromEntries(entries) };
}

/** Same as sanitizeComponent(), but throws the SanitizeError instead. */
export function sanitizeComponentOrThrow(
  conf: unknown,
  options?: SanitizeOptions,
): SanitizedConfig {
  const result = sanitizeComponent(conf, options);
  if (!result.ok) throw result.error;
  return result.value;
}
