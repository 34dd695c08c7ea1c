/**
 * Qualifier Model
 *
 * Immutable predicate tree handed to the QueryEngine. Leaves test one bin
 * (optionally a nested value inside it), record metadata, or the primary
 * key; `and`/`or` nodes combine children in the given order.
 *
 * @module query/Qualifier
 */

import { InvalidQualifierError } from '../errors';
import { parseContextPath } from '../context/ContextPathParser';
import { EMPTY_CONTEXT, type ContextPath } from '../context/ContextPath';
import type { RecordKey } from '../store/StoreClient';
import {
  isFilterOperation,
  isMetadataOperation,
  validateArguments,
  type FilterOperation,
  type MetadataField,
  type MetadataOperation,
} from './FilterOperation';

export interface BinQualifier {
  readonly type: 'bin';
  readonly bin: string;
  /** Path to a nested value inside the bin; empty for the bin itself */
  readonly context: ContextPath;
  readonly operation: FilterOperation;
  readonly value?: unknown;
  readonly secondValue?: unknown;
  /** Case-insensitive matching for string operations */
  readonly ignoreCase: boolean;
}

export interface MetadataQualifier {
  readonly type: 'metadata';
  readonly field: MetadataField;
  readonly operation: MetadataOperation;
  /** Single operand, or the collection for IN / NOT_IN */
  readonly value: number | readonly number[];
  readonly secondValue?: number;
}

export interface IdQualifier {
  readonly type: 'id';
  readonly ids: readonly RecordKey[];
}

export interface ConjunctionQualifier {
  readonly type: 'and' | 'or';
  readonly children: readonly Qualifier[];
}

export type LeafQualifier = BinQualifier | MetadataQualifier | IdQualifier;

export type Qualifier = LeafQualifier | ConjunctionQualifier;

export function isConjunction(q: Qualifier): q is ConjunctionQualifier {
  return q.type === 'and' || q.type === 'or';
}

/**
 * Names of the bins a qualifier tree reads.
 */
export function referencedBins(q: Qualifier, out: Set<string> = new Set()): Set<string> {
  switch (q.type) {
    case 'bin':
      out.add(q.bin);
      break;
    case 'and':
    case 'or':
      q.children.forEach((child) => referencedBins(child, out));
      break;
    default:
      break;
  }
  return out;
}

function isPlainObject(value: unknown): value is object {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Copy of an operand that the caller can no longer reach. Arrays and plain
 * objects are frozen; maps and byte arrays are copied only.
 */
function frozenCopy(value: unknown): unknown {
  if (Array.isArray(value)) {
    return Object.freeze(value.map(frozenCopy));
  }
  if (value instanceof Map) {
    return new Map([...value].map(([k, v]): [unknown, unknown] => [frozenCopy(k), frozenCopy(v)]));
  }
  if (value instanceof Uint8Array) {
    return value.slice();
  }
  if (isPlainObject(value)) {
    return Object.freeze(Object.fromEntries(Object.entries(value).map(([k, v]): [string, unknown] => [k, frozenCopy(v)])));
  }
  return value;
}

function validateLikePattern(pattern: unknown, ignoreCase: boolean): void {
  if (typeof pattern !== 'string') {
    throw new InvalidQualifierError('LIKE: value is expected to be a regular expression string');
  }
  try {
    new RegExp(pattern, ignoreCase ? 'i' : '');
  } catch (err) {
    throw new InvalidQualifierError(`LIKE: invalid regular expression '${pattern}'`, { cause: err });
  }
}

/**
 * Builder for bin qualifiers.
 *
 * @example
 * ```typescript
 * const q = Qualifier.builder()
 *   .setPath('address.city')
 *   .setFilterOperation('EQ')
 *   .setValue('Paris')
 *   .setIgnoreCase(true)
 *   .build();
 * ```
 */
export class QualifierBuilder {
  private bin?: string;
  private context: ContextPath = EMPTY_CONTEXT;
  private operation?: FilterOperation;
  private value?: unknown;
  private secondValue?: unknown;
  private ignoreCase = false;
  private owner = 'Qualifier';

  /**
   * Dot-separated path in context grammar; the first segment names the bin,
   * the rest navigate into it.
   */
  setPath(path: string): this {
    const steps = parseContextPath(path);
    const [first, ...rest] = steps;
    if (!first || first.kind !== 'mapKey') {
      throw new InvalidQualifierError(`Cannot resolve the given path '${path}'`);
    }
    this.bin = String(first.value);
    this.context = Object.freeze(rest);
    return this;
  }

  setBin(bin: string): this {
    this.bin = bin;
    return this;
  }

  setContext(context: ContextPath | string): this {
    this.context = typeof context === 'string' ? parseContextPath(context) : Object.freeze([...context]);
    return this;
  }

  setFilterOperation(operation: FilterOperation): this {
    this.operation = operation;
    return this;
  }

  setValue(value: unknown): this {
    this.value = value;
    return this;
  }

  setSecondValue(value: unknown): this {
    this.secondValue = value;
    return this;
  }

  setIgnoreCase(ignoreCase: boolean): this {
    this.ignoreCase = ignoreCase;
    return this;
  }

  /**
   * Entity or set name used as the prefix of arity messages.
   */
  setOwner(owner: string): this {
    this.owner = owner;
    return this;
  }

  build(): BinQualifier {
    if (!this.bin) {
      throw new InvalidQualifierError('Expecting path parameter to be provided');
    }
    if (!this.operation || !isFilterOperation(this.operation)) {
      throw new InvalidQualifierError('Expecting operation type parameter to be provided');
    }
    validateArguments(this.owner, this.bin, this.operation, [this.value, this.secondValue]);
    if (this.operation === 'LIKE') {
      validateLikePattern(this.value, this.ignoreCase);
    }

    const qualifier: BinQualifier = {
      type: 'bin',
      bin: this.bin,
      context: this.context,
      operation: this.operation,
      ...(this.value === undefined ? {} : { value: frozenCopy(this.value) }),
      ...(this.secondValue === undefined ? {} : { secondValue: frozenCopy(this.secondValue) }),
      ignoreCase: this.ignoreCase,
    };
    return Object.freeze(qualifier);
  }
}

/**
 * Builder for qualifiers over record metadata. Operands are integers:
 * milliseconds for times, seconds for TTL, bytes for size.
 */
export class MetadataQualifierBuilder {
  private field?: MetadataField;
  private operation?: FilterOperation;
  private value?: unknown;
  private secondValue?: unknown;

  setMetadataField(field: MetadataField): this {
    this.field = field;
    return this;
  }

  setFilterOperation(operation: FilterOperation): this {
    this.operation = operation;
    return this;
  }

  setValue(value: number | readonly number[]): this {
    this.value = value;
    return this;
  }

  setSecondValue(value: number): this {
    this.secondValue = value;
    return this;
  }

  build(): MetadataQualifier {
    const { field, operation, value, secondValue } = this;
    if (!field) {
      throw new InvalidQualifierError('Expecting metadataField parameter to be provided');
    }
    if (!operation) {
      throw new InvalidQualifierError('Expecting operation type parameter to be provided');
    }
    if (!isMetadataOperation(operation)) {
      throw new InvalidQualifierError(`Operation ${operation} cannot be applied to metadataField`);
    }
    if (value === undefined) {
      throw new InvalidQualifierError('Expecting value parameter to be provided');
    }

    if (operation === 'IN' || operation === 'NOT_IN') {
      if (!Array.isArray(value) || value.length === 0 || !value.every(Number.isInteger)) {
        throw new InvalidQualifierError(`${operation}: value is expected to be a non-empty collection of integers`);
      }
      const qualifier: MetadataQualifier = { type: 'metadata', field, operation, value: Object.freeze([...value]) };
      return Object.freeze(qualifier);
    }

    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw new InvalidQualifierError(`${operation}: value is expected to be an integer`);
    }
    if (operation === 'BETWEEN') {
      if (secondValue === undefined) {
        throw new InvalidQualifierError('BETWEEN: expecting secondValue to be provided');
      }
      if (typeof secondValue !== 'number' || !Number.isInteger(secondValue)) {
        throw new InvalidQualifierError('BETWEEN: secondValue is expected to be an integer');
      }
      const qualifier: MetadataQualifier = { type: 'metadata', field, operation, value, secondValue };
      return Object.freeze(qualifier);
    }
    const qualifier: MetadataQualifier = { type: 'metadata', field, operation, value };
    return Object.freeze(qualifier);
  }
}

function conjunction(type: 'and' | 'or', children: readonly Qualifier[]): ConjunctionQualifier {
  if (children.length === 0) {
    throw new InvalidQualifierError(`Expecting at least one qualifier with ${type.toUpperCase()} operation`);
  }
  return Object.freeze({ type, children: Object.freeze([...children]) });
}

/**
 * Qualifier factories. Composites keep the grouping they are given:
 * `and(and(a, b), c)` stays two levels deep.
 */
export const Qualifier = {
  builder: (): QualifierBuilder => new QualifierBuilder(),

  metadataBuilder: (): MetadataQualifierBuilder => new MetadataQualifierBuilder(),

  and: (...children: Qualifier[]): ConjunctionQualifier => conjunction('and', children),

  or: (...children: Qualifier[]): ConjunctionQualifier => conjunction('or', children),

  idEquals: (id: RecordKey): IdQualifier => Object.freeze({ type: 'id', ids: Object.freeze([id]) }),

  idIn: (...ids: RecordKey[]): IdQualifier => {
    if (ids.length === 0) {
      throw new InvalidQualifierError('Expecting at least one id to be provided');
    }
    return Object.freeze({ type: 'id', ids: Object.freeze([...ids]) });
  },
} as const;
