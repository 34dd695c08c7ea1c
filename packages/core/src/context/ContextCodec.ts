/**
 * Context Codec
 *
 * Wire form of context paths as found in index metadata: a MessagePack
 * array of alternating `[typeId, value, typeId, value, ...]` pairs,
 * usually transported base64-encoded. String values carry the store's
 * string particle-type prefix byte.
 *
 * Decoding goes through a lookup table, never through the annotation
 * parser, since the metadata is already structured.
 *
 * @module context/ContextCodec
 */

import { InvalidContextSyntaxError } from '../errors';
import { deserialize, serialize } from '../serializer';
import { decodeBase64, encodeBase64 } from '../utils/base64';
import {
  Ctx,
  type ContextPath,
  type ContextStep,
  type ContextStepKind,
  type ContextValue,
} from './ContextPath';

export const CONTEXT_TYPE_IDS: Readonly<Record<ContextStepKind, number>> = {
  listIndex: 0x10,
  listRank: 0x11,
  listValue: 0x13,
  mapIndex: 0x20,
  mapRank: 0x21,
  mapKey: 0x22,
  mapValue: 0x23,
};

const STRING_PARTICLE_PREFIX = '\u0003';

type StepFactory = (value: ContextValue) => ContextStep | undefined;

const positional =
  (make: (value: number) => ContextStep): StepFactory =>
  (value) =>
    typeof value === 'number' && Number.isInteger(value) ? make(value) : undefined;

const STEP_BY_TYPE_ID: ReadonlyMap<number, StepFactory> = new Map<number, StepFactory>([
  [CONTEXT_TYPE_IDS.listIndex, positional(Ctx.listIndex)],
  [CONTEXT_TYPE_IDS.listRank, positional(Ctx.listRank)],
  [CONTEXT_TYPE_IDS.listValue, Ctx.listValue],
  [CONTEXT_TYPE_IDS.mapIndex, positional(Ctx.mapIndex)],
  [CONTEXT_TYPE_IDS.mapRank, positional(Ctx.mapRank)],
  [CONTEXT_TYPE_IDS.mapKey, Ctx.mapKey],
  [CONTEXT_TYPE_IDS.mapValue, Ctx.mapValue],
]);

function encodeValue(value: ContextValue): ContextValue {
  return typeof value === 'string' ? STRING_PARTICLE_PREFIX + value : value;
}

function decodeValue(raw: unknown): ContextValue | undefined {
  if (typeof raw === 'number') return raw;
  if (typeof raw === 'bigint') {
    const n = Number(raw);
    return Number.isSafeInteger(n) ? n : undefined;
  }
  if (typeof raw === 'string') {
    return raw.startsWith(STRING_PARTICLE_PREFIX) ? raw.slice(1) : raw;
  }
  return undefined;
}

export function encodeContext(path: ContextPath): Uint8Array {
  const flat: ContextValue[] = [];
  for (const s of path) {
    flat.push(CONTEXT_TYPE_IDS[s.kind], encodeValue(s.value));
  }
  return serialize(flat);
}

/**
 * @throws InvalidContextSyntaxError when the payload is not a well-formed pair list
 */
export function decodeContext(bytes: Uint8Array): ContextPath {
  const raw = deserialize(bytes);
  if (!Array.isArray(raw) || raw.length % 2 !== 0) {
    throw new InvalidContextSyntaxError('Context payload must be an array of type/value pairs');
  }
  const steps: ContextStep[] = [];
  for (let i = 0; i < raw.length; i += 2) {
    const typeId: unknown = raw[i];
    if (typeof typeId !== 'number') {
      throw new InvalidContextSyntaxError(`Unknown context type id ${String(typeId)} at pair ${i / 2}`);
    }
    const factory = STEP_BY_TYPE_ID.get(typeId);
    if (!factory) {
      throw new InvalidContextSyntaxError(`Unknown context type id ${typeId} at pair ${i / 2}`);
    }
    const value = decodeValue(raw[i + 1]);
    const decoded = value === undefined ? undefined : factory(value);
    if (!decoded) {
      throw new InvalidContextSyntaxError(
        `Unsupported value for context type id 0x${typeId.toString(16)} at pair ${i / 2}`
      );
    }
    steps.push(decoded);
  }
  return Object.freeze(steps);
}

export function contextToBase64(path: ContextPath): string {
  return encodeBase64(encodeContext(path));
}

export function contextFromBase64(encoded: string): ContextPath {
  return decodeContext(decodeBase64(encoded));
}
