/**
 * Salt values embedded in PHC strings.
 *
 * A salt is either an ASCII token taken literally from the string or an
 * opaque byte payload rendered as unpadded base64. The two construction
 * paths are disjoint: nothing inspects the content to pick one.
 */

import { base64Decode, base64Encode } from './base64.js';
import { PATTERNS } from './constants.js';
import { PhcError } from './errors.js';

/**
 * A salt written with characters in `[a-zA-Z0-9/+.-]`
 */
export interface AsciiSalt {
  readonly kind: 'ascii';
  readonly text: string;
}

/**
 * A binary salt, serialized as base64
 */
export interface BinarySalt {
  readonly kind: 'binary';
  /** A fresh copy on every read */
  readonly bytes: Uint8Array;
}

export type Salt = AsciiSalt | BinarySalt;

/**
 * Create an ASCII salt.
 *
 * @throws PhcError (PHC_INVALID_SALT) if the text is empty or uses characters
 *   outside the value alphabet
 */
export function asciiSalt(text: string): AsciiSalt {
  if (!PATTERNS.value.test(text)) {
    throw new PhcError('PHC_INVALID_SALT', `Salt must match ${PATTERNS.value.source}`);
  }
  return Object.freeze({ kind: 'ascii', text });
}

/**
 * Create a binary salt. The bytes are copied in and copied out again on
 * each read, so the salt cannot be changed after construction.
 *
 * @throws PhcError (PHC_INVALID_SALT) if there are no bytes, since an empty
 *   salt segment cannot be written
 */
export function binarySalt(bytes: Uint8Array | ArrayLike<number>): BinarySalt {
  if (bytes.length === 0) {
    throw new PhcError('PHC_INVALID_SALT', 'Binary salt must not be empty');
  }
  const stored = Uint8Array.from(bytes);
  return Object.freeze({
    kind: 'binary',
    get bytes() {
      return stored.slice();
    },
  });
}

/**
 * Render a salt the way it appears in a PHC string (without the `$`).
 */
export function saltToString(salt: Salt): string {
  switch (salt.kind) {
    case 'ascii':
      return salt.text;
    case 'binary':
      return base64Encode(salt.bytes);
  }
}

/**
 * Reinterpret a salt as binary.
 *
 * An ASCII salt holding valid unpadded base64 becomes the decoded bytes.
 * Anything else, including a salt that is already binary, comes back as is.
 *
 * @example
 * ```typescript
 * saltAsBinary(asciiSalt('c29tZSBzYWx0'));  // bytes of "some salt"
 * saltAsBinary(asciiSalt('abc.def'));       // unchanged
 * ```
 */
export function saltAsBinary(salt: Salt): Salt {
  if (salt.kind === 'binary') {
    return salt;
  }
  const bytes = base64Decode(salt.text);
  return bytes === undefined ? salt : binarySalt(bytes);
}

/**
 * Structural equality. An ASCII salt never equals a binary one, even when
 * both render to the same text.
 */
export function saltEquals(a: Salt, b: Salt): boolean {
  if (a.kind === 'ascii' && b.kind === 'ascii') {
    return a.text === b.text;
  }
  if (a.kind === 'binary' && b.kind === 'binary') {
    return bytesEqual(a.bytes, b.bytes);
  }
  return false;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
