/**
 * Qualifier Tests
 */

import { Ctx } from '../../context/ContextPath';
import { InvalidContextSyntaxError, InvalidQualifierArityError, InvalidQualifierError } from '../../errors';
import { validateArguments } from '../../query/FilterOperation';
import { Qualifier, referencedBins } from '../../query/Qualifier';

describe('Qualifier', () => {
  describe('builder', () => {
    it('should build a bin qualifier', () => {
      const q = Qualifier.builder().setBin('age').setFilterOperation('GT').setValue(30).build();

      expect(q).toEqual({ type: 'bin', bin: 'age', context: [], operation: 'GT', value: 30, ignoreCase: false });
    });

    it('should split a path into bin and context', () => {
      const q = Qualifier.builder().setPath('address.{=city}.[0]').setFilterOperation('IS_NOT_NULL').build();

      expect(q.bin).toBe('address');
      expect(q.context).toEqual([Ctx.mapValue('city'), Ctx.listIndex(0)]);
    });

    it('should reject a path that does not start with a bin name', () => {
      expect(() => Qualifier.builder().setPath('[0].a')).toThrow("Cannot resolve the given path '[0].a'");
    });

    it('should propagate context syntax errors', () => {
      expect(() => Qualifier.builder().setContext('a..b')).toThrow(InvalidContextSyntaxError);
    });

    it('should require a bin and an operation', () => {
      expect(() => Qualifier.builder().setFilterOperation('EQ').setValue(1).build()).toThrow(
        'Expecting path parameter to be provided'
      );
      expect(() => Qualifier.builder().setBin('age').setValue(1).build()).toThrow(
        'Expecting operation type parameter to be provided'
      );
    });

    it('should freeze the qualifier and its operands', () => {
      const q = Qualifier.builder().setBin('tags').setFilterOperation('IN').setValue(['a', 'b']).build();

      expect(Object.isFrozen(q)).toBe(true);
      expect(Object.isFrozen(q.value)).toBe(true);
    });

    it('should copy operands and leave the caller free to change them', () => {
      const values = ['a', 'b'];
      const q = Qualifier.builder().setBin('tags').setFilterOperation('IN').setValue(values).build();

      values.push('c');

      expect(values).toEqual(['a', 'b', 'c']);
      expect(q.value).toEqual(['a', 'b']);
    });

    it('should copy map operands', () => {
      const shape = new Map<string, number>([['x', 1]]);
      const q = Qualifier.builder().setBin('shape').setFilterOperation('EQ').setValue(shape).build();

      shape.set('y', 2);

      expect(q.value).toEqual(new Map([['x', 1]]));
      expect(q.value).not.toBe(shape);
    });

    it('should reject an invalid LIKE pattern', () => {
      expect(() => Qualifier.builder().setBin('name').setFilterOperation('LIKE').setValue('(').build()).toThrow(
        "LIKE: invalid regular expression '('"
      );
      expect(() => Qualifier.builder().setBin('name').setFilterOperation('LIKE').setValue(5).build()).toThrow(
        InvalidQualifierError
      );
    });

    it('should reject non-finite numeric operands', () => {
      expect(() => Qualifier.builder().setBin('age').setFilterOperation('EQ').setValue(NaN).build()).toThrow(
        'Qualifier.age EQ: numeric arguments must be finite'
      );
      expect(() =>
        Qualifier.builder().setBin('age').setFilterOperation('IN').setValue([1, Infinity]).build()
      ).toThrow(InvalidQualifierError);
    });

    it('should not share state with values changed after build', () => {
      const builder = Qualifier.builder().setBin('age').setFilterOperation('EQ').setValue(1);
      const first = builder.build();

      builder.setValue(2);

      expect(first.value).toBe(1);
    });
  });

  describe('argument validation', () => {
    it('should name owner, field and operation in arity errors', () => {
      expect(() => Qualifier.builder().setOwner('Person').setBin('strings').setFilterOperation('EQ').build()).toThrow(
        'Person.strings EQ: invalid number of arguments, expecting one'
      );
      expect(() =>
        Qualifier.builder().setOwner('Person').setBin('ints').setFilterOperation('BETWEEN').setValue(1).build()
      ).toThrow('Person.ints BETWEEN: invalid number of arguments, expecting two');
    });

    it('should reject operands for operations without arguments', () => {
      expect(() => Qualifier.builder().setBin('name').setFilterOperation('IS_NULL').setValue('x').build()).toThrow(
        'Qualifier.name IS_NULL: expecting no arguments'
      );
    });

    it('should require a collection for IN', () => {
      expect(() => validateArguments('Person', 'age', 'NOT_IN', [5])).toThrow(
        'Person.age NOT_IN: invalid argument type, expecting Collection'
      );
      expect(() => validateArguments('Person', 'age', 'IN', [[1, 2], 3])).toThrow(InvalidQualifierArityError);
    });

    it('should accept well-formed operands', () => {
      expect(() => validateArguments('Person', 'age', 'BETWEEN', [1, 10])).not.toThrow();
      expect(() => validateArguments('Person', 'age', 'IS_NOT_NULL', [undefined, undefined])).not.toThrow();
      expect(() => validateArguments('Person', 'age', 'IN', [[]])).not.toThrow();
    });
  });

  describe('metadataBuilder', () => {
    it('should build a metadata qualifier', () => {
      const q = Qualifier.metadataBuilder().setMetadataField('TTL').setFilterOperation('GT').setValue(60).build();

      expect(q).toEqual({ type: 'metadata', field: 'TTL', operation: 'GT', value: 60 });
    });

    it('should require a metadata field', () => {
      expect(() => Qualifier.metadataBuilder().setFilterOperation('EQ').setValue(1).build()).toThrow(
        'Expecting metadataField parameter to be provided'
      );
    });

    it('should reject operations that do not apply to metadata', () => {
      expect(() =>
        Qualifier.metadataBuilder().setMetadataField('RECORD_SIZE').setFilterOperation('STARTS_WITH').setValue(1).build()
      ).toThrow('Operation STARTS_WITH cannot be applied to metadataField');
    });

    it('should require a second value for BETWEEN', () => {
      expect(() =>
        Qualifier.metadataBuilder().setMetadataField('TTL').setFilterOperation('BETWEEN').setValue(1).build()
      ).toThrow('BETWEEN: expecting secondValue to be provided');
    });

    it('should require integer collections for IN', () => {
      const q = Qualifier.metadataBuilder().setMetadataField('TTL').setFilterOperation('IN').setValue([1, 2]).build();
      expect(q.value).toEqual([1, 2]);

      expect(() =>
        Qualifier.metadataBuilder().setMetadataField('TTL').setFilterOperation('IN').setValue([]).build()
      ).toThrow('IN: value is expected to be a non-empty collection of integers');
      expect(() =>
        Qualifier.metadataBuilder().setMetadataField('TTL').setFilterOperation('IN').setValue(3).build()
      ).toThrow(InvalidQualifierError);
    });
  });

  describe('composites', () => {
    const a = Qualifier.builder().setBin('a').setFilterOperation('EQ').setValue(1).build();
    const b = Qualifier.builder().setBin('b').setFilterOperation('EQ').setValue(2).build();
    const c = Qualifier.builder().setBin('c').setFilterOperation('EQ').setValue(3).build();

    it('should keep the grouping it is given', () => {
      const q = Qualifier.and(Qualifier.and(a, b), c);

      expect(q.children).toHaveLength(2);
      expect(q.children[0]).toEqual({ type: 'and', children: [a, b] });
    });

    it('should require at least one child', () => {
      expect(() => Qualifier.and()).toThrow('Expecting at least one qualifier with AND operation');
      expect(() => Qualifier.or()).toThrow('Expecting at least one qualifier with OR operation');
    });

    it('should list the bins a tree reads', () => {
      const q = Qualifier.or(Qualifier.and(a, Qualifier.idEquals('k1')), c);

      expect([...referencedBins(q)]).toEqual(['a', 'c']);
    });

    it('should build id qualifiers', () => {
      expect(Qualifier.idEquals(7)).toEqual({ type: 'id', ids: [7] });
      expect(Qualifier.idIn('a', 'b').ids).toEqual(['a', 'b']);
      expect(() => Qualifier.idIn()).toThrow('Expecting at least one id to be provided');
    });
  });
});
