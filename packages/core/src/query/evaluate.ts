/**
 * Residual predicate evaluation.
 *
 * Applies a qualifier tree to a fetched record. This is the authority for
 * correctness: records returned through a secondary-index filter are
 * checked here again, since collection indexes match coarsely.
 *
 * @module query/evaluate
 */

import type { ContextPath, ContextStep } from '../context/ContextPath';
import type { KeyRecord, RecordMetadata } from '../store/StoreClient';
import { RealClock, type ClockSource } from '../utils/clock';
import { compareValues, isMapLike, mapEntries, sameTypeClass, valuesEqual } from '../utils/compare';
import { NEGATED_OPERATIONS, type FilterOperation, type MetadataField } from './FilterOperation';
import { isWithin, toGeoPoint, toGeoRegion } from './geo';
import type { BinQualifier, MetadataQualifier, Qualifier } from './Qualifier';

export interface EvaluationContext {
  /** Time source for SINCE_UPDATE_TIME */
  clock: ClockSource;
}

const DEFAULT_CONTEXT: EvaluationContext = { clock: RealClock };

const MISSING: unique symbol = Symbol('missing');
type Resolved = unknown | typeof MISSING;

function atPosition<T>(items: readonly T[], position: number): T | typeof MISSING {
  const i = position < 0 ? items.length + position : position;
  return i >= 0 && i < items.length ? items[i] : MISSING;
}

function byRank(values: readonly unknown[], rank: number): unknown {
  return atPosition([...values].sort(compareValues), rank);
}

function navigate(current: unknown, s: ContextStep): Resolved {
  switch (s.kind) {
    case 'mapKey': {
      if (current instanceof Map) return current.has(s.value) ? current.get(s.value) : MISSING;
      if (!isMapLike(current)) return MISSING;
      const own = Object.getOwnPropertyDescriptor(current, String(s.value));
      return own ? own.value : MISSING;
    }
    case 'mapIndex': {
      if (!isMapLike(current)) return MISSING;
      const entries = mapEntries(current).sort((a, b) => compareValues(a[0], b[0]));
      const entry = atPosition(entries, s.value);
      return entry === MISSING ? MISSING : entry[1];
    }
    case 'mapRank':
      return isMapLike(current) ? byRank(mapEntries(current).map((e) => e[1]), s.value) : MISSING;
    case 'mapValue': {
      if (!isMapLike(current)) return MISSING;
      const entry = mapEntries(current).find((e) => valuesEqual(e[1], s.value));
      return entry ? entry[1] : MISSING;
    }
    case 'listIndex':
      return Array.isArray(current) ? atPosition(current, s.value) : MISSING;
    case 'listRank':
      return Array.isArray(current) ? byRank(current, s.value) : MISSING;
    case 'listValue': {
      if (!Array.isArray(current)) return MISSING;
      const found: unknown[] = current.filter((item) => valuesEqual(item, s.value));
      return found.length > 0 ? found[0] : MISSING;
    }
  }
}

/**
 * Value addressed by a bin name plus context path, or MISSING.
 */
function resolve(bins: Readonly<Record<string, unknown>>, bin: string, context: ContextPath): Resolved {
  if (!Object.prototype.hasOwnProperty.call(bins, bin)) return MISSING;
  let current: Resolved = bins[bin];
  for (const s of context) {
    if (current === MISSING) return MISSING;
    current = navigate(current, s);
  }
  return current;
}

function fold(value: unknown, ignoreCase: boolean): unknown {
  return ignoreCase && typeof value === 'string' ? value.toLowerCase() : value;
}

function comparable(a: unknown, b: unknown): boolean {
  return a !== null && a !== undefined && !Number.isNaN(a) && sameTypeClass(a, b);
}

const likePatterns = new WeakMap<BinQualifier, RegExp>();

/** Compiled once per qualifier; the builder has already validated the pattern. */
function likePattern(q: BinQualifier, pattern: string): RegExp {
  let re = likePatterns.get(q);
  if (!re) {
    re = new RegExp(pattern, q.ignoreCase ? 'i' : '');
    likePatterns.set(q, re);
  }
  return re;
}

function inRange(x: unknown, from: unknown, to: unknown): boolean {
  return comparable(x, from) && comparable(x, to) && compareValues(x, from) >= 0 && compareValues(x, to) < 0;
}

function stringOperands(x: unknown, v: unknown, ignoreCase: boolean): [string, string] | undefined {
  if (typeof x !== 'string' || typeof v !== 'string') return undefined;
  return ignoreCase ? [x.toLowerCase(), v.toLowerCase()] : [x, v];
}

function mapKeys(x: unknown): unknown[] | undefined {
  return isMapLike(x) ? mapEntries(x).map((e) => e[0]) : undefined;
}

function mapValues(x: unknown): unknown[] | undefined {
  return isMapLike(x) ? mapEntries(x).map((e) => e[1]) : undefined;
}

/**
 * Positive form of an operation, applied to a present value. Negated
 * operations are evaluated as the complement of their positive form.
 */
function matchPositive(op: FilterOperation, x: unknown, q: BinQualifier): boolean {
  const v = q.value;
  switch (op) {
    case 'EQ':
    case 'NOTEQ':
      return valuesEqual(fold(x, q.ignoreCase), fold(v, q.ignoreCase));
    case 'GT':
      return comparable(x, v) && compareValues(x, v) > 0;
    case 'GTEQ':
      return comparable(x, v) && compareValues(x, v) >= 0;
    case 'LT':
      return comparable(x, v) && compareValues(x, v) < 0;
    case 'LTEQ':
      return comparable(x, v) && compareValues(x, v) <= 0;
    case 'BETWEEN':
      return inRange(x, v, q.secondValue);
    case 'STARTS_WITH': {
      const s = stringOperands(x, v, q.ignoreCase);
      return s !== undefined && s[0].startsWith(s[1]);
    }
    case 'ENDS_WITH': {
      const s = stringOperands(x, v, q.ignoreCase);
      return s !== undefined && s[0].endsWith(s[1]);
    }
    case 'CONTAINING':
    case 'NOT_CONTAINING': {
      const s = stringOperands(x, v, q.ignoreCase);
      return s !== undefined && s[0].includes(s[1]);
    }
    case 'LIKE':
      return typeof x === 'string' && typeof v === 'string' && likePattern(q, v).test(x);
    case 'IN':
    case 'NOT_IN':
      return Array.isArray(v) && v.some((item) => valuesEqual(fold(x, q.ignoreCase), fold(item, q.ignoreCase)));
    case 'IS_NULL':
      return x === null;
    case 'IS_NOT_NULL':
      return x !== null;
    case 'MAP_KEYS_CONTAIN':
    case 'MAP_KEYS_NOT_CONTAIN':
      return (mapKeys(x) ?? []).some((k) => valuesEqual(k, v));
    case 'MAP_VALUES_CONTAIN':
    case 'MAP_VALUES_NOT_CONTAIN':
      return (mapValues(x) ?? []).some((item) => valuesEqual(item, v));
    case 'MAP_KEYS_BETWEEN':
      return (mapKeys(x) ?? []).some((k) => inRange(k, v, q.secondValue));
    case 'MAP_VAL_BETWEEN':
      return (mapValues(x) ?? []).some((item) => inRange(item, v, q.secondValue));
    case 'COLLECTION_VAL_CONTAINING':
    case 'COLLECTION_VAL_NOT_CONTAINING':
      return Array.isArray(x) && x.some((item) => valuesEqual(item, v));
    case 'COLLECTION_VAL_BETWEEN':
      return Array.isArray(x) && x.some((item) => inRange(item, v, q.secondValue));
    case 'COLLECTION_VAL_GT':
      return Array.isArray(x) && x.some((item) => comparable(item, v) && compareValues(item, v) > 0);
    case 'COLLECTION_VAL_GTEQ':
      return Array.isArray(x) && x.some((item) => comparable(item, v) && compareValues(item, v) >= 0);
    case 'COLLECTION_VAL_LT':
      return Array.isArray(x) && x.some((item) => comparable(item, v) && compareValues(item, v) < 0);
    case 'COLLECTION_VAL_LTEQ':
      return Array.isArray(x) && x.some((item) => comparable(item, v) && compareValues(item, v) <= 0);
    case 'GEO_WITHIN': {
      const point = toGeoPoint(x);
      const region = toGeoRegion(v);
      return point !== undefined && region !== undefined && isWithin(point, region);
    }
  }
}

export function evaluateBinQualifier(q: BinQualifier, bins: Readonly<Record<string, unknown>>): boolean {
  const x = resolve(bins, q.bin, q.context);
  if (x === MISSING) {
    return q.operation === 'IS_NULL' || NEGATED_OPERATIONS.has(q.operation);
  }
  const positive = matchPositive(q.operation, x, q);
  return NEGATED_OPERATIONS.has(q.operation) ? !positive : positive;
}

function metadataValue(field: MetadataField, metadata: RecordMetadata, ctx: EvaluationContext): number {
  switch (field) {
    case 'SINCE_UPDATE_TIME':
      return ctx.clock.now() - metadata.lastUpdateTime;
    case 'LAST_UPDATE_TIME':
      return metadata.lastUpdateTime;
    case 'VOID_TIME':
      return metadata.voidTime;
    case 'TTL':
      return metadata.ttl;
    case 'RECORD_SIZE':
      return metadata.size;
  }
}

export function evaluateMetadataQualifier(
  q: MetadataQualifier,
  metadata: RecordMetadata,
  ctx: EvaluationContext = DEFAULT_CONTEXT
): boolean {
  const x = metadataValue(q.field, metadata, ctx);
  const v = q.value;
  if (typeof v !== 'number') {
    const found = v.includes(x);
    return q.operation === 'NOT_IN' ? !found : q.operation === 'IN' && found;
  }
  switch (q.operation) {
    case 'EQ':
      return x === v;
    case 'NOTEQ':
      return x !== v;
    case 'GT':
      return x > v;
    case 'GTEQ':
      return x >= v;
    case 'LT':
      return x < v;
    case 'LTEQ':
      return x <= v;
    case 'BETWEEN':
      return q.secondValue !== undefined && x >= v && x < q.secondValue;
    case 'IN':
    case 'NOT_IN':
      return false;
  }
}

/**
 * Evaluate a qualifier tree against one record.
 *
 * @example
 * ```typescript
 * const adults = Qualifier.builder().setBin('age').setFilterOperation('GTEQ').setValue(18).build();
 * evaluateQualifier(adults, keyRecord); // true when keyRecord's age bin is >= 18
 * ```
 */
export function evaluateQualifier(
  qualifier: Qualifier,
  keyRecord: KeyRecord,
  ctx: EvaluationContext = DEFAULT_CONTEXT
): boolean {
  switch (qualifier.type) {
    case 'and':
      return qualifier.children.every((child) => evaluateQualifier(child, keyRecord, ctx));
    case 'or':
      return qualifier.children.some((child) => evaluateQualifier(child, keyRecord, ctx));
    case 'bin':
      return evaluateBinQualifier(qualifier, keyRecord.record.bins);
    case 'metadata':
      return evaluateMetadataQualifier(qualifier, keyRecord.record.metadata, ctx);
    case 'id':
      return qualifier.ids.some((id) => id === keyRecord.key.userKey);
  }
}
