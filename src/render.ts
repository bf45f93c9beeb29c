import { Document, YAMLMap } from 'yaml';
import type { GenericValue } from './value.js';
import { TYPE_FIELD } from './fields.js';
import { EncodingError } from './errors.js';

export type SanitizedEntries = ReadonlyMap<string, GenericValue>;

/** Orders strings by Unicode code point (UTF-8 byte order), not UTF-16 code unit. */
export function compareCodePoints(a: string, b: string): number {
  const x = [...a];
  const y = [...b];
  const n = Math.min(x.length, y.length);
  for (let i = 0; i < n; i++) {
    const diff = (x[i].codePointAt(0) ?? 0) - (y[i].codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
  return x.length - y.length;
}

/** Every key except `type`, sorted by code point. */
export function otherKeys(entries: SanitizedEntries): string[] {
  return [...entries.keys()].filter(k => k !== TYPE_FIELD).sort(compareCodePoints);
}

function rejectUnencodable(key: string, value: unknown): unknown {
  switch (typeof value) {
    case 'undefined':
    case 'function':
    case 'symbol':
    case 'bigint':
      throw new TypeError(`unsupported ${typeof value} at key "${key}"`);
    case 'number':
      if (!Number.isFinite(value)) {
        throw new TypeError(`non-finite number ${String(value)} at key "${key}"`);
      }
      return value;
    default:
      return value;
  }
}

function encodeJSON(value: unknown, stage: string): string {
  try {
    return JSON.stringify(value, rejectUnencodable);
  } catch (err) {
    throw new EncodingError(stage, err);
  }
}

/**
 * Format B. Assembled piecewise so that `type` is always the first pair:
 *   {"type":<V>,"k1":<V1>,...}
 * A null/absent type drops the pair (and its comma) entirely.
 * Each value is encoded on its own; nested mappings keep their own order.
 */
export function renderOrderedJSON(entries: SanitizedEntries): string {
  const keys = otherKeys(entries);
  const typeValue = entries.get(TYPE_FIELD);
  const parts: string[] = [];

  if (typeValue !== undefined && typeValue !== null) {
    parts.push(`"${TYPE_FIELD}":${encodeJSON(typeValue, `"${TYPE_FIELD}" as JSON`)}`);
  }
  for (const key of keys) {
    const encodedKey = encodeJSON(key, 'key as JSON');
    parts.push(`${encodedKey}:${encodeJSON(entries.get(key), `${encodedKey} as JSON`)}`);
  }

  return `{${parts.join(',')}}`;
}

/**
 * Format A. One block mapping: `type` first (always present, null when
 * absent), then the remaining keys as its siblings in sorted order.
 */
export function renderOrderedYAML(entries: SanitizedEntries): string {
  const doc = new Document();
  const root = new YAMLMap();

  try {
    root.add(
      doc.createPair(TYPE_FIELD, entries.get(TYPE_FIELD) ?? null, { aliasDuplicateObjects: false }),
    );
    for (const key of otherKeys(entries)) {
      root.add(doc.createPair(key, entries.get(key), { aliasDuplicateObjects: false }));
    }
    doc.contents = root;
    return doc.toString();
  } catch (err) {
    throw new EncodingError('config as YAML', err);
  }
}
