import { parse, stringify } from 'yaml';
import type { GenericMap } from './value.js';
import { isGenericMap, isGenericValue } from './value.js';
import { EncodingError } from './errors.js';

/**
 * Locate a bigint anywhere in `value`. YAML would write it out as a plain
 * integer and read it back as a lossy number.
 * Each object is visited once, so cyclic input terminates here and is left
 * for the serializer to reject.
 */
function findBigInt(value: unknown, path: string, seen: WeakSet<object>): string | null {
  if (typeof value === 'bigint') return path;
  if (value === null || typeof value !== 'object') return null;
  if (seen.has(value)) return null;
  seen.add(value);

  if (value instanceof Map) {
    for (const [key, item] of value) {
      const found = findBigInt(item, `${path}.${String(key)}`, seen);
      if (found !== null) return found;
    }
    return null;
  }
  if (Array.isArray(value) || value instanceof Set) {
    let i = 0;
    for (const item of value) {
      const found = findBigInt(item, `${path}[${i}]`, seen);
      if (found !== null) return found;
      i += 1;
    }
    return null;
  }
  for (const [key, item] of Object.entries(value)) {
    const found = findBigInt(item, `${path}.${key}`, seen);
    if (found !== null) return found;
  }
  return null;
}

/**
 * Convert an arbitrary config value into a plain string-keyed map by
 * round-tripping it through YAML text.
 *
 * - null/undefined (and documents that parse to null) become {}
 * - anything that does not come back as a mapping is an EncodingError
 * - bigint values anywhere in the input are an EncodingError
 * - duplicate-object aliasing is off, so a cyclic input fails instead of
 *   producing a self-referencing document
 */
export function generify(conf: unknown): GenericMap {
  if (conf === null || conf === undefined) return {};

  const bigintPath = findBigInt(conf, '$', new WeakSet());
  if (bigintPath !== null) {
    throw new EncodingError(
      'config',
      new TypeError(`bigint at ${bigintPath} has no exact generic representation`),
    );
  }

  let text: string;
  try {
    text = stringify(conf, { aliasDuplicateObjects: false });
  } catch (err) {
    throw new EncodingError('config as YAML', err);
  }

  let doc: unknown;
  try {
    doc = parse(text);
  } catch (err) {
    throw new EncodingError('config from intermediate YAML', err);
  }

  if (doc === null || doc === undefined) return {};
  if (!isGenericMap(doc) || !isGenericValue(doc)) {
    const shape = Array.isArray(doc) ? 'sequence' : typeof doc;
    throw new EncodingError('config', new TypeError(`expected a mapping, got ${shape}`));
  }
  return doc;
}
