/**
 * Value comparison utilities.
 *
 * Orders bin values the way the store orders collection elements:
 * null < boolean < number < string < bytes < list < map. Strings compare by
 * UTF-16 code units, not by locale. Maps are either `Map` instances or
 * plain objects.
 *
 * @module utils/compare
 */

export type MapLike = ReadonlyMap<unknown, unknown> | Readonly<Record<string, unknown>>;

export function isMapLike(value: unknown): value is MapLike {
  if (value instanceof Map) return true;
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function mapEntries(value: MapLike): [unknown, unknown][] {
  return value instanceof Map ? [...value.entries()] : Object.entries(value);
}

function typeRank(value: unknown): number {
  if (value === null || value === undefined) return 0;
  if (typeof value === 'boolean') return 1;
  if (typeof value === 'number' || typeof value === 'bigint') return 2;
  if (typeof value === 'string') return 3;
  if (value instanceof Uint8Array) return 4;
  if (Array.isArray(value)) return 5;
  if (isMapLike(value)) return 6;
  return 7;
}

/**
 * Whether two values belong to the same ordering class (both numbers,
 * both strings ...). Range operations only match within one class.
 */
export function sameTypeClass(a: unknown, b: unknown): boolean {
  return typeRank(a) === typeRank(b);
}

function compareSequences(a: readonly unknown[], b: readonly unknown[]): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const c = compareValues(a[i], b[i]);
    if (c !== 0) return c;
  }
  return a.length - b.length;
}

function sortedEntries(value: MapLike): [unknown, unknown][] {
  return mapEntries(value).sort((x, y) => compareValues(x[0], y[0]));
}

/**
 * Compare two values.
 *
 * @returns Negative if a < b, 0 if equal, positive if a > b
 *
 * @example
 * ```typescript
 * compareValues(1, 2);       // negative
 * compareValues('b', 'a');   // positive
 * compareValues(null, 1);    // negative
 * compareValues(5, 'a');     // negative, numbers sort before strings
 * ```
 */
export function compareValues(a: unknown, b: unknown): number {
  const ra = typeRank(a);
  const rb = typeRank(b);
  if (ra !== rb) return ra - rb;

  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return a === b ? 0 : a ? 1 : -1;
  }
  if ((typeof a === 'number' || typeof a === 'bigint') && (typeof b === 'number' || typeof b === 'bigint')) {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (a instanceof Uint8Array && b instanceof Uint8Array) {
    return compareSequences([...a], [...b]);
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    return compareSequences(a, b);
  }
  if (isMapLike(a) && isMapLike(b)) {
    const ea = sortedEntries(a);
    const eb = sortedEntries(b);
    return compareSequences(ea.flat(), eb.flat());
  }
  if (ra === 0) return 0;
  return String(a) < String(b) ? -1 : String(a) > String(b) ? 1 : 0;
}

/** NaN equals nothing, itself included. */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (Number.isNaN(a) || Number.isNaN(b)) return false;
  return compareValues(a, b) === 0;
}
