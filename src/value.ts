/**
 * Schema-less value model produced by the generify pass.
 * Mirrors what a YAML/JSON document can hold: scalars, sequences, mappings.
 */
export type GenericValue = null | boolean | number | string | GenericValue[] | GenericMap;

export interface GenericMap {
  [key: string]: GenericValue;
}

export function isGenericMap(value: unknown): value is GenericMap {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep-freeze a generic value in place. Cycles are tolerated.
 */
export function freezeGenericValue(value: GenericValue, seen = new WeakSet<object>()): void {
  if (value === null || typeof value !== 'object' || seen.has(value)) return;
  seen.add(value);

  if (Array.isArray(value)) {
    value.forEach(item => freezeGenericValue(item, seen));
  } else {
    Object.values(value).forEach(item => freezeGenericValue(item, seen));
  }
  Object.freeze(value);
}

/**
 * Deep check that `value` only contains members of the generic model.
 * Does NOT detect cycles; callers feed it parser output, which has none.
 */
export function isGenericValue(value: unknown): value is GenericValue {
  if (value === null) return true;

  switch (typeof value) {
    case 'boolean':
    case 'number':
    case 'string':
      return true;
    case 'object': {
      if (Array.isArray(value)) return value.every(isGenericValue);
      return isGenericMap(value) && Object.values(value).every(isGenericValue);
    }
    default:
      return false;
  }
}
