/**
 * Translation of a single bin qualifier into a secondary-index filter.
 *
 * Only operations the store's index can evaluate have a translation:
 * integer/string equality, integer ranges, collection and map-key/value
 * containment, and geo containment. Case-insensitive and pattern
 * operations never do.
 *
 * @module query/IndexFilter
 */

import type { IndexCollectionType, IndexDescriptor } from '../index/IndexTypes';
import { toGeoRegion } from './geo';
import type { BinQualifier } from './Qualifier';
import type { SecondaryIndexFilter } from './QueryTypes';

const MIN = Number.MIN_SAFE_INTEGER;
const MAX = Number.MAX_SAFE_INTEGER;

function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value);
}

function equal(bin: string, value: unknown, collectionType: IndexCollectionType): SecondaryIndexFilter | undefined {
  if (isInteger(value)) {
    return { kind: 'equal', bin, value, indexType: 'NUMERIC', collectionType };
  }
  if (typeof value === 'string') {
    return { kind: 'equal', bin, value, indexType: 'STRING', collectionType };
  }
  return undefined;
}

function range(
  bin: string,
  begin: unknown,
  end: unknown,
  collectionType: IndexCollectionType
): SecondaryIndexFilter | undefined {
  if (!isInteger(begin) || !isInteger(end) || begin > end) return undefined;
  return { kind: 'range', bin, begin, end, indexType: 'NUMERIC', collectionType };
}

/** Upper bound below `value`, or undefined when nothing is below it */
function below(value: unknown): number | undefined {
  return isInteger(value) && value > MIN ? value - 1 : undefined;
}

function above(value: unknown): number | undefined {
  return isInteger(value) && value < MAX ? value + 1 : undefined;
}

/**
 * Candidate filter for a leaf, independent of which indexes exist.
 * The filter may select a superset of the matching records; the residual
 * predicate narrows it.
 */
export function toSecondaryIndexFilter(q: BinQualifier): SecondaryIndexFilter | undefined {
  const { bin, value, secondValue } = q;

  switch (q.operation) {
    case 'EQ':
      return q.ignoreCase ? undefined : equal(bin, value, 'DEFAULT');
    case 'GT':
      return range(bin, above(value), MAX, 'DEFAULT');
    case 'GTEQ':
      return range(bin, value, MAX, 'DEFAULT');
    case 'LT':
      return range(bin, MIN, below(value), 'DEFAULT');
    case 'LTEQ':
      return range(bin, MIN, value, 'DEFAULT');
    case 'BETWEEN':
      return range(bin, value, secondValue, 'DEFAULT');
    case 'MAP_KEYS_CONTAIN':
      return equal(bin, value, 'MAPKEYS');
    case 'MAP_VALUES_CONTAIN':
      return equal(bin, value, 'MAPVALUES');
    case 'MAP_KEYS_BETWEEN':
      return range(bin, value, secondValue, 'MAPKEYS');
    case 'MAP_VAL_BETWEEN':
      return range(bin, value, secondValue, 'MAPVALUES');
    case 'COLLECTION_VAL_CONTAINING':
      return equal(bin, value, 'LIST');
    case 'COLLECTION_VAL_BETWEEN':
      return range(bin, value, secondValue, 'LIST');
    case 'COLLECTION_VAL_GT':
      return range(bin, above(value), MAX, 'LIST');
    case 'COLLECTION_VAL_GTEQ':
      return range(bin, value, MAX, 'LIST');
    case 'COLLECTION_VAL_LT':
      return range(bin, MIN, below(value), 'LIST');
    case 'COLLECTION_VAL_LTEQ':
      return range(bin, MIN, value, 'LIST');
    case 'GEO_WITHIN': {
      const region = toGeoRegion(value);
      return region ? { kind: 'geoWithin', bin, region, indexType: 'GEO2DSPHERE', collectionType: 'DEFAULT' } : undefined;
    }
    default:
      return undefined;
  }
}

/**
 * Whether an index can serve the filter: same value type and collection type.
 */
export function indexServes(descriptor: IndexDescriptor, filter: SecondaryIndexFilter): boolean {
  return descriptor.indexType === filter.indexType && descriptor.collectionType === filter.collectionType;
}
