/**
 * StatementBuilder Tests
 */

import * as fc from 'fast-check';
import { Ctx } from '../../context/ContextPath';
import { InvalidQualifierError, UnsupportedQualifierError } from '../../errors';
import { IndexRegistry } from '../../index/IndexRegistry';
import type { IndexDescriptor } from '../../index/IndexTypes';
import type { FilterOperation } from '../../query/FilterOperation';
import { toSecondaryIndexFilter } from '../../query/IndexFilter';
import { Qualifier, type BinQualifier } from '../../query/Qualifier';
import { StatementBuilder } from '../../query/StatementBuilder';

function index(bin: string, indexType: IndexDescriptor['indexType'], collectionType: IndexDescriptor['collectionType'] = 'DEFAULT'): IndexDescriptor {
  return {
    name: `person_${bin}_${indexType}`.toLowerCase(),
    namespace: 'test',
    set: 'person',
    bin,
    context: [],
    indexType,
    collectionType,
  };
}

function leaf(bin: string, op: FilterOperation, value?: unknown, secondValue?: unknown): BinQualifier {
  const builder = Qualifier.builder().setBin(bin).setFilterOperation(op);
  if (value !== undefined) builder.setValue(value);
  if (secondValue !== undefined) builder.setSecondValue(secondValue);
  return builder.build();
}

describe('StatementBuilder', () => {
  let registry: IndexRegistry;
  let builder: StatementBuilder;

  beforeEach(() => {
    registry = new IndexRegistry();
    registry.replaceAll([index('age', 'NUMERIC'), index('name', 'STRING'), index('tags', 'STRING', 'LIST')]);
    builder = new StatementBuilder(registry);
  });

  describe('without qualifier', () => {
    it('should require a full scan', () => {
      expect(builder.build(undefined, 'test', 'person')).toEqual({
        namespace: 'test',
        set: 'person',
        fullScanRequired: true,
      });
    });

    it('should carry bin names and record limit', () => {
      expect(builder.build(undefined, 'test', 'person', { binNames: ['age'], maxRecords: 5 })).toEqual({
        namespace: 'test',
        set: 'person',
        binNames: ['age'],
        maxRecords: 5,
        fullScanRequired: true,
      });
    });
  });

  describe('filter selection', () => {
    it('should turn an indexed equality into a filter and keep it in the residual', () => {
      const q = leaf('age', 'EQ', 30);

      expect(builder.build(q, 'test', 'person')).toEqual({
        namespace: 'test',
        set: 'person',
        filter: { kind: 'equal', bin: 'age', value: 30, indexType: 'NUMERIC', collectionType: 'DEFAULT' },
        residual: q,
        fullScanRequired: false,
      });
    });

    it('should translate exclusive bounds into inclusive ranges', () => {
      expect(builder.build(leaf('age', 'GT', 20), 'test', 'person').filter).toEqual({
        kind: 'range',
        bin: 'age',
        begin: 21,
        end: Number.MAX_SAFE_INTEGER,
        indexType: 'NUMERIC',
        collectionType: 'DEFAULT',
      });
      expect(builder.build(leaf('age', 'BETWEEN', 20, 30), 'test', 'person').filter).toMatchObject({
        kind: 'range',
        begin: 20,
        end: 30,
      });
    });

    it('should scan when the bin has no index', () => {
      const q = leaf('height', 'EQ', 180);
      const statement = builder.build(q, 'test', 'person');

      expect(statement.filter).toBeUndefined();
      expect(statement.residual).toBe(q);
      expect(statement.fullScanRequired).toBe(true);
    });

    it('should scan when the index holds another value type', () => {
      expect(builder.build(leaf('age', 'EQ', 'thirty'), 'test', 'person').fullScanRequired).toBe(true);
      expect(builder.build(leaf('name', 'GT', 3), 'test', 'person').fullScanRequired).toBe(true);
    });

    it('should only use a LIST index for collection operations', () => {
      expect(builder.build(leaf('tags', 'COLLECTION_VAL_CONTAINING', 'ops'), 'test', 'person').filter).toEqual({
        kind: 'equal',
        bin: 'tags',
        value: 'ops',
        indexType: 'STRING',
        collectionType: 'LIST',
      });
      expect(builder.build(leaf('tags', 'EQ', 'ops'), 'test', 'person').filter).toBeUndefined();
    });

    it('should pick the first indexable leaf under AND', () => {
      const q = Qualifier.and(leaf('height', 'EQ', 180), leaf('name', 'EQ', 'Al'), leaf('age', 'EQ', 3));
      const statement = builder.build(q, 'test', 'person');

      expect(statement.filter).toMatchObject({ kind: 'equal', bin: 'name', value: 'Al' });
      expect(statement.residual).toBe(q);
    });

    it('should never take a filter from under OR', () => {
      const or = Qualifier.or(leaf('age', 'EQ', 3), leaf('name', 'EQ', 'x'));
      expect(builder.build(or, 'test', 'person').fullScanRequired).toBe(true);

      const mixed = Qualifier.and(or, leaf('name', 'EQ', 'Al'));
      expect(builder.build(mixed, 'test', 'person').filter).toMatchObject({ bin: 'name', value: 'Al' });
    });

    it('should not use case-insensitive or context-qualified leaves', () => {
      const folded = Qualifier.builder().setBin('name').setFilterOperation('EQ').setValue('al').setIgnoreCase(true).build();
      const nested = Qualifier.builder().setBin('age').setContext([Ctx.mapKey('years')]).setFilterOperation('EQ').setValue(3).build();

      expect(builder.build(folded, 'test', 'person').filter).toBeUndefined();
      expect(builder.build(nested, 'test', 'person').filter).toBeUndefined();
    });

    it('should only use indexes of the queried set', () => {
      expect(builder.build(leaf('age', 'EQ', 30), 'test', 'animals').fullScanRequired).toBe(true);
    });

    it('should scan for metadata qualifiers', () => {
      const q = Qualifier.metadataBuilder().setMetadataField('TTL').setFilterOperation('LT').setValue(60).build();

      expect(builder.build(q, 'test', 'person')).toMatchObject({ residual: q, fullScanRequired: true });
    });
  });

  describe('id qualifiers', () => {
    it('should turn a lone id qualifier into a multi-get', () => {
      expect(builder.build(Qualifier.idIn('k1', 'k2'), 'test', 'person')).toEqual({
        namespace: 'test',
        set: 'person',
        ids: ['k1', 'k2'],
        fullScanRequired: false,
      });
    });

    it('should keep the remaining qualifiers as residual', () => {
      const age = leaf('age', 'EQ', 3);
      const statement = builder.build(Qualifier.and(Qualifier.idEquals('k1'), age), 'test', 'person');

      expect(statement.ids).toEqual(['k1']);
      expect(statement.filter).toBeUndefined();
      expect(statement.residual).toEqual({ type: 'and', children: [age] });
    });

    it('should reject more than one id qualifier', () => {
      const q = Qualifier.and(Qualifier.idEquals('k1'), Qualifier.idEquals('k2'));

      expect(() => builder.build(q, 'test', 'person')).toThrow(
        'Expecting not more than one id qualifier in qualifiers array, got 2'
      );
      expect(() => builder.build(q, 'test', 'person')).toThrow(InvalidQualifierError);
    });

    it('should reject an id qualifier under OR', () => {
      const q = Qualifier.or(Qualifier.idEquals('k1'), leaf('age', 'EQ', 3));

      expect(() => builder.build(q, 'test', 'person')).toThrow(UnsupportedQualifierError);
    });
  });

  describe('properties', () => {
    const arbLeaf: fc.Arbitrary<Qualifier> = fc
      .record({
        bin: fc.constantFrom('age', 'height'),
        op: fc.constantFrom<FilterOperation>('EQ', 'GT', 'LT', 'NOTEQ'),
        value: fc.integer({ min: 0, max: 100 }),
      })
      .map(({ bin, op, value }) => leaf(bin, op, value));

    const nest = (child: fc.Arbitrary<Qualifier>): fc.Arbitrary<Qualifier> =>
      fc.oneof(
        child,
        fc.array(child, { minLength: 1, maxLength: 3 }).map((c) => Qualifier.and(...c)),
        fc.array(child, { minLength: 1, maxLength: 3 }).map((c) => Qualifier.or(...c))
      );

    const arbTree = nest(nest(nest(arbLeaf)));

    function andReachableLeaves(q: Qualifier): BinQualifier[] {
      if (q.type === 'bin') return [q];
      if (q.type === 'and') return q.children.flatMap(andReachableLeaves);
      return [];
    }

    it('should keep the whole tree as residual and take the filter from the first AND-reachable leaf', () => {
      fc.assert(
        fc.property(arbTree, (q) => {
          const statement = builder.build(q, 'test', 'person');
          const expected = andReachableLeaves(q).find((l) => l.bin === 'age' && l.operation !== 'NOTEQ');

          expect(statement.residual).toBe(q);
          expect(statement.filter).toEqual(expected ? toSecondaryIndexFilter(expected) : undefined);
          expect(statement.fullScanRequired).toBe(expected === undefined);
        }),
        { numRuns: 300 }
      );
    });
  });
});
