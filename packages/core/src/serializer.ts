import { pack, unpack } from 'msgpackr';

/**
 * Serializes a value to MessagePack, the encoding the store uses for
 * collection data and index context metadata.
 */
export function serialize(data: unknown): Uint8Array {
  return pack(data);
}

/**
 * Deserializes MessagePack bytes. The result is untyped; callers validate
 * its shape.
 */
export function deserialize(data: Uint8Array | ArrayBuffer): unknown {
  const buffer = data instanceof ArrayBuffer ? new Uint8Array(data) : data;
  return unpack(buffer);
}
