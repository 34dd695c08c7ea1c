/**
 * StatementBuilder Implementation
 *
 * Compiles a qualifier tree into a statement for the store:
 *
 * - at most one leaf becomes the secondary-index filter; candidates are the
 *   root leaf or leaves reached from the root through AND nodes only, and
 *   the first candidate in pre-order wins
 * - the whole tree stays the residual predicate, filter leaf included
 * - an id qualifier turns the statement into a multi-get, with the rest of
 *   the tree as residual
 *
 * Leaves with a context path never become the filter.
 *
 * @module query/StatementBuilder
 */

import { InvalidQualifierError, UnsupportedQualifierError } from '../errors';
import type { IndexRegistry } from '../index/IndexRegistry';
import type { IndexedField } from '../index/IndexTypes';
import { indexServes, toSecondaryIndexFilter } from './IndexFilter';
import type { BinQualifier, IdQualifier, Qualifier } from './Qualifier';
import type { CompileOptions, CompiledStatement, SecondaryIndexFilter } from './QueryTypes';

interface FilterCandidate {
  qualifier: BinQualifier;
  filter: SecondaryIndexFilter;
}

interface IdMatch {
  qualifier: IdQualifier;
  underOr: boolean;
}

function collectIdQualifiers(q: Qualifier, underOr: boolean, out: IdMatch[]): void {
  switch (q.type) {
    case 'id':
      out.push({ qualifier: q, underOr });
      return;
    case 'and':
    case 'or':
      for (const child of q.children) {
        collectIdQualifiers(child, underOr || q.type === 'or', out);
      }
      return;
    default:
      return;
  }
}

/**
 * The tree with `target` removed. Conjunctions left without children
 * disappear; remaining grouping is kept as is.
 */
function without(q: Qualifier, target: Qualifier): Qualifier | undefined {
  if (q === target) return undefined;
  if (q.type !== 'and' && q.type !== 'or') return q;

  const children = q.children
    .map((child) => without(child, target))
    .filter((child): child is Qualifier => child !== undefined);
  if (children.length === q.children.length && children.every((c, i) => c === q.children[i])) {
    return q;
  }
  return children.length === 0 ? undefined : Object.freeze({ type: q.type, children: Object.freeze(children) });
}

export class StatementBuilder {
  constructor(private readonly indexRegistry: IndexRegistry) {}

  /**
   * Compile a qualifier tree for `namespace`/`set`. Pure; reads the index
   * registry snapshot but never changes it.
   *
   * @throws InvalidQualifierError if the tree holds more than one id qualifier
   * @throws UnsupportedQualifierError if an id qualifier sits under an OR
   */
  build(
    qualifier: Qualifier | undefined,
    namespace: string,
    set: string,
    options: CompileOptions = {}
  ): CompiledStatement {
    const common = {
      namespace,
      set,
      ...(options.binNames ? { binNames: options.binNames } : {}),
      ...(options.maxRecords ? { maxRecords: options.maxRecords } : {}),
    };

    if (!qualifier) {
      return { ...common, fullScanRequired: true };
    }

    const idQualifier = this.findIdQualifier(qualifier);
    if (idQualifier) {
      const residual = without(qualifier, idQualifier);
      return {
        ...common,
        ids: idQualifier.ids,
        ...(residual ? { residual } : {}),
        fullScanRequired: false,
      };
    }

    const candidate = this.findFilterCandidate(qualifier, namespace, set);
    if (candidate) {
      return { ...common, filter: candidate.filter, residual: qualifier, fullScanRequired: false };
    }
    return { ...common, residual: qualifier, fullScanRequired: true };
  }

  private findIdQualifier(qualifier: Qualifier): IdQualifier | undefined {
    const matches: IdMatch[] = [];
    collectIdQualifiers(qualifier, false, matches);
    if (matches.length === 0) return undefined;
    if (matches.length > 1) {
      throw new InvalidQualifierError(
        `Expecting not more than one id qualifier in qualifiers array, got ${matches.length}`
      );
    }
    const [match] = matches;
    if (match.underOr) {
      throw new UnsupportedQualifierError(
        'Id qualifier cannot be combined with other qualifiers through OR, it can only narrow the result'
      );
    }
    return match.qualifier;
  }

  /**
   * Pre-order walk over the root and its AND descendants; OR subtrees are
   * never entered.
   */
  private findFilterCandidate(q: Qualifier, namespace: string, set: string): FilterCandidate | undefined {
    switch (q.type) {
      case 'bin': {
        const filter = this.indexableFilter(q, namespace, set);
        return filter ? { qualifier: q, filter } : undefined;
      }
      case 'and':
        for (const child of q.children) {
          const found = this.findFilterCandidate(child, namespace, set);
          if (found) return found;
        }
        return undefined;
      case 'or':
      case 'metadata':
      case 'id':
        return undefined;
    }
  }

  private indexableFilter(q: BinQualifier, namespace: string, set: string): SecondaryIndexFilter | undefined {
    if (q.context.length > 0) return undefined;

    const filter = toSecondaryIndexFilter(q);
    if (!filter) return undefined;

    const field: IndexedField = { namespace, set, bin: q.bin };
    if (!this.indexRegistry.hasIndexFor(field)) return undefined;

    const descriptors = this.indexRegistry.lookup(field);
    for (const descriptor of descriptors ?? []) {
      if (indexServes(descriptor, filter)) return filter;
    }
    return undefined;
  }
}
