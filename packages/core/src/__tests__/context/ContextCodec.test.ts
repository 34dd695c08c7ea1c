/**
 * ContextCodec Tests
 */

import {
  CONTEXT_TYPE_IDS,
  contextFromBase64,
  contextToBase64,
  decodeContext,
  encodeContext,
} from '../../context/ContextCodec';
import { Ctx } from '../../context/ContextPath';
import { parseContextPath } from '../../context/ContextPathParser';
import { InvalidContextSyntaxError } from '../../errors';
import { deserialize, serialize } from '../../serializer';

describe('ContextCodec', () => {
  describe('encodeContext', () => {
    it('should write alternating type ids and values', () => {
      const bytes = encodeContext([Ctx.mapKey('address'), Ctx.listIndex(-1)]);

      expect(deserialize(bytes)).toEqual([0x22, '\u0003address', 0x10, -1]);
    });

    it('should prefix string values but not integers', () => {
      const bytes = encodeContext([Ctx.mapValue('x'), Ctx.listValue(7)]);

      expect(deserialize(bytes)).toEqual([CONTEXT_TYPE_IDS.mapValue, '\u0003x', CONTEXT_TYPE_IDS.listValue, 7]);
    });

    it('should encode an empty path as an empty array', () => {
      expect(deserialize(encodeContext([]))).toEqual([]);
    });
  });

  describe('decodeContext', () => {
    it('should decode every step kind', () => {
      const path = parseContextPath("a.{0}.{#1}.{='v'}.[2].[#3].[=4]");

      expect(decodeContext(encodeContext(path))).toEqual(path);
    });

    it('should accept string values without the particle prefix', () => {
      expect(decodeContext(serialize([0x22, 'plain']))).toEqual([Ctx.mapKey('plain')]);
    });

    it('should return a frozen path', () => {
      expect(Object.isFrozen(decodeContext(serialize([0x10, 0])))).toBe(true);
    });

    it('should reject a payload that is not a pair list', () => {
      expect(() => decodeContext(serialize({ a: 1 }))).toThrow(InvalidContextSyntaxError);
      expect(() => decodeContext(serialize([0x10]))).toThrow(
        'Context payload must be an array of type/value pairs'
      );
    });

    it('should reject unknown type ids', () => {
      expect(() => decodeContext(serialize([0x99, 1]))).toThrow('Unknown context type id 153 at pair 0');
      expect(() => decodeContext(serialize([0x10, 1, 'x', 2]))).toThrow('Unknown context type id x at pair 1');
    });

    it('should reject non-integer values for positional steps', () => {
      expect(() => decodeContext(serialize([0x10, '\u0003x']))).toThrow(
        'Unsupported value for context type id 0x10 at pair 0'
      );
      expect(() => decodeContext(serialize([0x21, 1.5]))).toThrow(
        'Unsupported value for context type id 0x21 at pair 0'
      );
    });
  });

  describe('base64', () => {
    it('should round trip through base64', () => {
      const path = [Ctx.mapKey('address'), Ctx.mapValue('city')];

      expect(contextFromBase64(contextToBase64(path))).toEqual(path);
    });

    it('should reject text outside the base64 alphabet', () => {
      expect(() => contextFromBase64('not base64!')).toThrow("Invalid base64 string: 'not base64!'");
    });
  });
});
