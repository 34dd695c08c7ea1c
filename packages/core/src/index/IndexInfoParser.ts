/**
 * Parser for the store's `sindex-list` info response.
 *
 * The response is a `;`-separated list of entries, each a `:`-separated
 * list of `key=value` pairs:
 *
 * ```
 * ns=test:indexname=person_age_idx:set=person:bin=age:type=numeric:indextype=default:context=NULL:state=RW
 * ```
 *
 * Store clients that talk the info protocol use this to implement
 * `StoreClient.listIndexes`.
 *
 * @module index/IndexInfoParser
 */

import type { IndexCollectionType, IndexMetadata, IndexValueType } from './IndexTypes';

/** Info command that lists indexes with their context base64-encoded */
export const SINDEX_LIST_COMMAND = 'sindex-list:;b64=true';

const VALUE_TYPES: Readonly<Record<string, IndexValueType>> = {
  string: 'STRING',
  numeric: 'NUMERIC',
  geo2dsphere: 'GEO2DSPHERE',
  geojson: 'GEO2DSPHERE',
  blob: 'BLOB',
};

const COLLECTION_TYPES: Readonly<Record<string, IndexCollectionType>> = {
  default: 'DEFAULT',
  none: 'DEFAULT',
  list: 'LIST',
  mapkeys: 'MAPKEYS',
  mapvalues: 'MAPVALUES',
};

function isNull(value: string | undefined): boolean {
  return value === undefined || value === '' || value.toUpperCase() === 'NULL';
}

export function parseIndexInfoEntry(entry: string): IndexMetadata {
  const props = new Map<string, string>();
  for (const pair of entry.split(':')) {
    const eq = pair.indexOf('=');
    if (eq <= 0) continue;
    props.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim());
  }

  const name = props.get('indexname');
  const namespace = props.get('ns');
  const bin = props.get('bin') ?? props.get('bins');
  if (isNull(name) || isNull(namespace) || isNull(bin) || !name || !namespace || !bin) {
    throw new Error(`Malformed index info entry: '${entry}'`);
  }

  const rawType = (props.get('type') ?? '').toLowerCase();
  const indexType = VALUE_TYPES[rawType];
  if (!indexType) {
    throw new Error(`Unknown index type '${rawType}' in index info entry '${entry}'`);
  }

  const rawCollection = (props.get('indextype') ?? 'default').toLowerCase();
  const collectionType = COLLECTION_TYPES[rawCollection];
  if (!collectionType) {
    throw new Error(`Unknown index collection type '${rawCollection}' in index info entry '${entry}'`);
  }

  const set = props.get('set');
  const context = props.get('context');

  return {
    name,
    namespace,
    set: isNull(set) || !set ? '' : set,
    bin,
    indexType,
    collectionType,
    ...(isNull(context) || !context ? {} : { context }),
  };
}

/**
 * Parses a full `sindex-list` response. An empty response yields no indexes.
 */
export function parseIndexInfo(response: string): IndexMetadata[] {
  return response
    .split(';')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map(parseIndexInfoEntry);
}
