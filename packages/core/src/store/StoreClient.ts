/**
 * Store Client Interface
 *
 * The operations the query and index layers need from the key-value store.
 * Implementations wrap a real client (or, in tests, MemoryStoreClient).
 *
 * @module store/StoreClient
 */

import type { IndexCollectionType, IndexMetadata, IndexValueType } from '../index/IndexTypes';
import type { SecondaryIndexFilter } from '../query/QueryTypes';

export type RecordKey = string | number;

export type Bins = Readonly<Record<string, unknown>>;

/**
 * Per-record metadata. `ttl` is in seconds, times are epoch milliseconds,
 * `size` in bytes. A `voidTime` of 0 means the record never expires.
 */
export interface RecordMetadata {
  readonly generation: number;
  readonly ttl: number;
  readonly lastUpdateTime: number;
  readonly voidTime: number;
  readonly size: number;
}

export interface StoreKey {
  readonly namespace: string;
  readonly set: string;
  readonly userKey: RecordKey;
}

export interface StoreRecord {
  readonly bins: Bins;
  readonly metadata: RecordMetadata;
}

export interface KeyRecord {
  readonly key: StoreKey;
  readonly record: StoreRecord;
}

/**
 * Pull-based cursor over query/scan results. `next()` resolves to
 * `undefined` once exhausted. `close()` must be safe to call repeatedly.
 */
export interface RecordCursor {
  next(): Promise<KeyRecord | undefined>;
  close(): Promise<void>;
}

export interface ScanRequest {
  readonly namespace: string;
  readonly set: string;
  /** Bins to return; all bins when omitted */
  readonly binNames?: readonly string[];
  /** Upper bound on returned records; 0 or omitted means unlimited */
  readonly maxRecords?: number;
}

export interface QueryRequest extends ScanRequest {
  readonly filter: SecondaryIndexFilter;
}

export interface CreateIndexRequest {
  readonly namespace: string;
  readonly set: string;
  readonly name: string;
  readonly bin: string;
  readonly indexType: IndexValueType;
  readonly collectionType: IndexCollectionType;
  /** Base64 wire form of the context path, when the index targets a nested value */
  readonly context?: string;
}

export interface StoreClient {
  query(request: QueryRequest): Promise<RecordCursor>;
  scan(request: ScanRequest): Promise<RecordCursor>;
  /** One entry per requested id, `undefined` where the record does not exist */
  getMany(
    namespace: string,
    set: string,
    ids: readonly RecordKey[],
    binNames?: readonly string[]
  ): Promise<(KeyRecord | undefined)[]>;
  listIndexes(namespace: string): Promise<IndexMetadata[]>;
  createIndex(request: CreateIndexRequest): Promise<void>;
  dropIndex(namespace: string, set: string, name: string): Promise<void>;
}

/**
 * Server result codes the core reacts to.
 */
export const ResultCode = {
  OK: 0,
  SERVER_ERROR: 1,
  KEY_NOT_FOUND_ERROR: 2,
  TIMEOUT: 9,
  INDEX_ALREADY_EXISTS: 200,
  INDEX_NOTFOUND: 201,
  INDEX_OOM: 202,
  INDEX_NOTREADABLE: 203,
  INDEX_GENERIC: 204,
  INDEX_NAME_MAXLEN: 205,
  INDEX_MAXCOUNT: 206,
} as const;

export type ResultCodeValue = (typeof ResultCode)[keyof typeof ResultCode];

const SECONDARY_INDEX_FAILURES: ReadonlySet<number> = new Set([
  ResultCode.INDEX_NOTFOUND,
  ResultCode.INDEX_OOM,
  ResultCode.INDEX_NOTREADABLE,
  ResultCode.INDEX_GENERIC,
  ResultCode.INDEX_NAME_MAXLEN,
  ResultCode.INDEX_MAXCOUNT,
]);

/**
 * Whether a result code reports an unusable secondary index, in which case
 * an indexed query can be retried as a filtered scan.
 */
export function isSecondaryIndexFailure(resultCode: number): boolean {
  return SECONDARY_INDEX_FAILURES.has(resultCode);
}
