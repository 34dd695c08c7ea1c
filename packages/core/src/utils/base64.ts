/**
 * Base64 helpers for binary metadata carried in text responses
 * (index context blobs in `sindex-list` output).
 *
 * @module utils/base64
 */

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}

/**
 * @throws Error if the input contains characters outside the base64 alphabet
 */
export function decodeBase64(encoded: string): Uint8Array {
  const trimmed = encoded.trim();
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(trimmed) || trimmed.length % 4 !== 0) {
    throw new Error(`Invalid base64 string: '${encoded}'`);
  }
  return new Uint8Array(Buffer.from(trimmed, 'base64'));
}
