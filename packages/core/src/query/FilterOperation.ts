/**
 * Filter Operations
 *
 * The closed set of leaf operations a qualifier can carry, with the number
 * of operands each one takes.
 *
 * @module query/FilterOperation
 */

import { InvalidQualifierArityError, InvalidQualifierError } from '../errors';

export const FILTER_OPERATIONS = [
  'EQ',
  'NOTEQ',
  'GT',
  'GTEQ',
  'LT',
  'LTEQ',
  'BETWEEN',
  'STARTS_WITH',
  'ENDS_WITH',
  'CONTAINING',
  'NOT_CONTAINING',
  'LIKE',
  'IN',
  'NOT_IN',
  'IS_NULL',
  'IS_NOT_NULL',
  'MAP_KEYS_CONTAIN',
  'MAP_KEYS_NOT_CONTAIN',
  'MAP_VALUES_CONTAIN',
  'MAP_VALUES_NOT_CONTAIN',
  'MAP_KEYS_BETWEEN',
  'MAP_VAL_BETWEEN',
  'COLLECTION_VAL_CONTAINING',
  'COLLECTION_VAL_NOT_CONTAINING',
  'COLLECTION_VAL_BETWEEN',
  'COLLECTION_VAL_GT',
  'COLLECTION_VAL_GTEQ',
  'COLLECTION_VAL_LT',
  'COLLECTION_VAL_LTEQ',
  'GEO_WITHIN',
] as const;

export type FilterOperation = (typeof FILTER_OPERATIONS)[number];

/** Operations accepted by metadata qualifiers */
export const METADATA_OPERATIONS = ['EQ', 'NOTEQ', 'GT', 'GTEQ', 'LT', 'LTEQ', 'BETWEEN', 'IN', 'NOT_IN'] as const;

export type MetadataOperation = (typeof METADATA_OPERATIONS)[number];

/**
 * Record metadata a qualifier can target instead of a bin.
 *
 * - SINCE_UPDATE_TIME: milliseconds elapsed since the last update
 * - LAST_UPDATE_TIME: last update, epoch milliseconds
 * - VOID_TIME: expiration, epoch milliseconds (0 = never)
 * - TTL: remaining time to live, seconds
 * - RECORD_SIZE: bytes
 */
export type MetadataField = 'SINCE_UPDATE_TIME' | 'LAST_UPDATE_TIME' | 'VOID_TIME' | 'TTL' | 'RECORD_SIZE';

export type Arity = 'none' | 'one' | 'two' | 'collection';

export const OPERATION_ARITY: Readonly<Record<FilterOperation, Arity>> = {
  EQ: 'one',
  NOTEQ: 'one',
  GT: 'one',
  GTEQ: 'one',
  LT: 'one',
  LTEQ: 'one',
  BETWEEN: 'two',
  STARTS_WITH: 'one',
  ENDS_WITH: 'one',
  CONTAINING: 'one',
  NOT_CONTAINING: 'one',
  LIKE: 'one',
  IN: 'collection',
  NOT_IN: 'collection',
  IS_NULL: 'none',
  IS_NOT_NULL: 'none',
  MAP_KEYS_CONTAIN: 'one',
  MAP_KEYS_NOT_CONTAIN: 'one',
  MAP_VALUES_CONTAIN: 'one',
  MAP_VALUES_NOT_CONTAIN: 'one',
  MAP_KEYS_BETWEEN: 'two',
  MAP_VAL_BETWEEN: 'two',
  COLLECTION_VAL_CONTAINING: 'one',
  COLLECTION_VAL_NOT_CONTAINING: 'one',
  COLLECTION_VAL_BETWEEN: 'two',
  COLLECTION_VAL_GT: 'one',
  COLLECTION_VAL_GTEQ: 'one',
  COLLECTION_VAL_LT: 'one',
  COLLECTION_VAL_LTEQ: 'one',
  GEO_WITHIN: 'one',
};

/** Operations whose result is the complement of a positive match; missing values satisfy them */
export const NEGATED_OPERATIONS: ReadonlySet<FilterOperation> = new Set<FilterOperation>([
  'NOTEQ',
  'NOT_CONTAINING',
  'NOT_IN',
  'MAP_KEYS_NOT_CONTAIN',
  'MAP_VALUES_NOT_CONTAIN',
  'COLLECTION_VAL_NOT_CONTAINING',
]);

export function isFilterOperation(value: string): value is FilterOperation {
  return (FILTER_OPERATIONS as readonly string[]).includes(value);
}

export function isMetadataOperation(value: FilterOperation): value is MetadataOperation {
  return (METADATA_OPERATIONS as readonly string[]).includes(value);
}

/**
 * Validates the operands of an operation.
 *
 * @param owner - entity or set the field belongs to, used in messages
 * @param field - field (bin) name
 * @param args - supplied operands, undefined entries count as absent
 * @throws InvalidQualifierArityError, e.g. `Person.strings EQ: invalid number of arguments, expecting one`
 * @throws InvalidQualifierError when IN/NOT_IN receive a non-collection operand
 */
export function validateArguments(
  owner: string,
  field: string,
  operation: FilterOperation,
  args: readonly unknown[]
): void {
  const description = `${owner}.${field} ${operation}`;
  const count = args.filter((a) => a !== undefined).length;

  const nonFinite = (a: unknown): boolean =>
    (typeof a === 'number' && !Number.isFinite(a)) || (Array.isArray(a) && a.some(nonFinite));
  if (args.some(nonFinite)) {
    throw new InvalidQualifierError(`${description}: numeric arguments must be finite`);
  }

  switch (OPERATION_ARITY[operation]) {
    case 'none':
      if (count !== 0) {
        throw new InvalidQualifierArityError(`${description}: expecting no arguments`);
      }
      return;
    case 'one':
      if (count !== 1) {
        throw new InvalidQualifierArityError(`${description}: invalid number of arguments, expecting one`);
      }
      return;
    case 'two':
      if (count !== 2) {
        throw new InvalidQualifierArityError(`${description}: invalid number of arguments, expecting two`);
      }
      return;
    case 'collection':
      if (count !== 1) {
        throw new InvalidQualifierArityError(`${description}: invalid number of arguments, expecting one`);
      }
      if (!Array.isArray(args.find((a) => a !== undefined))) {
        throw new InvalidQualifierError(`${description}: invalid argument type, expecting Collection`);
      }
      return;
  }
}
