/**
 * Property-Based Tests for context paths
 *
 * 1. Formatting a path and parsing it back yields the same path
 * 2. Encoding a path to its wire form and decoding it yields the same path
 */

import * as fc from 'fast-check';
import { decodeContext, encodeContext } from '../../context/ContextCodec';
import { Ctx, contextPathsEqual, formatContextPath, type ContextStep } from '../../context/ContextPath';
import { parseContextPath } from '../../context/ContextPathParser';

const arbPosition = fc.integer({ min: -1000, max: 1000 });

const arbValue = fc.oneof(fc.string({ maxLength: 8 }), arbPosition);

const arbStep: fc.Arbitrary<ContextStep> = fc.oneof(
  arbValue.map(Ctx.mapKey),
  arbValue.map(Ctx.mapValue),
  arbValue.map(Ctx.listValue),
  arbPosition.map(Ctx.mapIndex),
  arbPosition.map(Ctx.mapRank),
  arbPosition.map(Ctx.listIndex),
  arbPosition.map(Ctx.listRank)
);

const arbPath = fc.array(arbStep, { maxLength: 6 });

describe('ContextPath Properties', () => {
  it('should parse the formatted path back to the same path', () => {
    fc.assert(
      fc.property(arbPath, (path) => {
        const parsed = parseContextPath(formatContextPath(path));
        return contextPathsEqual(parsed, path);
      }),
      { numRuns: 500 }
    );
  });

  it('should decode the encoded path back to the same path', () => {
    fc.assert(
      fc.property(arbPath, (path) => contextPathsEqual(decodeContext(encodeContext(path)), path)),
      { numRuns: 300 }
    );
  });
});
