import type { GenericMap, GenericValue } from './value.js';
import { freezeGenericValue } from './value.js';
import type { SanitizedEntries } from './render.js';
import { otherKeys, renderOrderedJSON, renderOrderedYAML } from './render.js';
import { TYPE_FIELD } from './fields.js';

/**
 * A component config reduced to its `type` and (at most) one payload.
 *
 * Instances are deeply immutable: values are cloned and frozen on
 * construction, so later changes to the caller's objects do not leak in.
 * `sanitizeComponent()` only ever builds them with a
 * string type, but direct construction accepts any entries so stored records
 * can be re-rendered; the renderers define the output for a missing type.
 */
export class SanitizedConfig {
  private readonly entries: SanitizedEntries;

  private constructor(entries: Map<string, GenericValue>) {
    this.entries = entries;
  }

  static fromEntries(entries: Iterable<readonly [string, GenericValue]>): SanitizedConfig {
    const map = new Map<string, GenericValue>();
    for (const [key, value] of entries) {
      const copy = structuredClone(value);
      freezeGenericValue(copy);
      map.set(key, copy);
    }
    return new SanitizedConfig(map);
  }

  static fromRecord(record: GenericMap): SanitizedConfig {
    return SanitizedConfig.fromEntries(Object.entries(record));
  }

  /** The discriminant, or null when absent or not a string. */
  get type(): string | null {
    const value = this.entries.get(TYPE_FIELD);
    return typeof value === 'string' ? value : null;
  }

  get payloadKey(): string | null {
    return otherKeys(this.entries)[0] ?? null;
  }

  /** Payload value, or undefined when there is no payload entry. */
  get payload(): GenericValue | undefined {
    const key = this.payloadKey;
    return key === null ? undefined : this.entries.get(key);
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get(key: string): GenericValue | undefined {
    return this.entries.get(key);
  }

  /** Keys in emitted order: `type` first, then the rest sorted. */
  keys(): string[] {
    const rest = otherKeys(this.entries);
    return this.entries.has(TYPE_FIELD) ? [TYPE_FIELD, ...rest] : rest;
  }

  toRecord(): GenericMap {
    const out: GenericMap = {};
    for (const key of this.keys()) {
      const value = this.entries.get(key);
      if (value !== undefined) out[key] = value;
    }
    return out;
  }

  renderYAML(): string {
    return renderOrderedYAML(this.entries);
  }

  renderJSON(): string {
    return renderOrderedJSON(this.entries);
  }
}
