/**
 * Query Types
 *
 * Compiled statement produced by the QueryEngine and the secondary-index
 * filter it may carry.
 *
 * @module query/QueryTypes
 */

import type { IndexCollectionType, IndexValueType } from '../index/IndexTypes';
import type { RecordKey } from '../store/StoreClient';
import type { GeoRegion } from './geo';
import type { Qualifier } from './Qualifier';

interface FilterBase {
  readonly bin: string;
  /** Value type of the index that can serve this filter */
  readonly indexType: IndexValueType;
  readonly collectionType: IndexCollectionType;
}

export interface EqualFilter extends FilterBase {
  readonly kind: 'equal';
  readonly value: string | number;
}

/** Inclusive on both ends */
export interface RangeFilter extends FilterBase {
  readonly kind: 'range';
  readonly begin: number;
  readonly end: number;
}

export interface GeoWithinFilter extends FilterBase {
  readonly kind: 'geoWithin';
  readonly region: GeoRegion;
}

/**
 * Physical filter attached to a store query. At most one per statement.
 */
export type SecondaryIndexFilter = EqualFilter | RangeFilter | GeoWithinFilter;

export interface CompiledStatement {
  readonly namespace: string;
  readonly set: string;
  readonly filter?: SecondaryIndexFilter;
  /**
   * Predicate every returned record must satisfy. Includes the qualifier
   * the filter was derived from.
   */
  readonly residual?: Qualifier;
  /** True when the statement has neither a filter nor ids */
  readonly fullScanRequired: boolean;
  /** Primary keys for a direct multi-get; bypasses query and scan */
  readonly ids?: readonly RecordKey[];
  readonly binNames?: readonly string[];
  /** 0 or undefined means unlimited */
  readonly maxRecords?: number;
}

export interface CompileOptions {
  binNames?: readonly string[];
  maxRecords?: number;
}

export interface ExecuteOptions {
  /** Per-call opt-in for full scans, overriding the engine setting */
  scansEnabled?: boolean;
}

export type SelectOptions = CompileOptions & ExecuteOptions;
