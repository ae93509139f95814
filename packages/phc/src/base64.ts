/**
 * Unpadded standard base64 (RFC 4648 §4 alphabet, no `=`)
 * Used for binary salts and hashes in PHC strings
 */

import { PATTERNS } from './constants.js';

/**
 * Encode bytes to base64 without padding
 */
export function base64Encode(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64').replace(/=+$/, '');
}

/**
 * Decode unpadded base64 to bytes
 *
 * Returns undefined unless the input is canonical: only alphabet characters,
 * no padding, a length that is not 1 mod 4, and zero trailing bits.
 * Canonical input re-encodes to exactly the same text.
 */
export function base64Decode(str: string): Uint8Array | undefined {
  if (str.length === 0) {
    return new Uint8Array(0);
  }
  if (!PATTERNS.base64.test(str) || str.length % 4 === 1) {
    return undefined;
  }

  const bytes = new Uint8Array(Buffer.from(str, 'base64'));
  if (base64Encode(bytes) !== str) {
    return undefined;
  }
  return bytes;
}
