/**
 * Salt and hash state of a PHC string.
 *
 * A hash never appears without a salt. The only constructor takes an
 * optional `[salt, hash?]` pair, so there is no input that yields a hash
 * on its own.
 */

import { PhcError } from './errors.js';
import { asciiSalt, bytesEqual, saltEquals, type Salt } from './salt.js';

export interface NoSaltOrHash {
  readonly kind: 'neither';
}

export interface SaltOnly {
  readonly kind: 'salt';
  readonly salt: Salt;
}

export interface SaltWithHash {
  readonly kind: 'both';
  readonly salt: Salt;
  /** A fresh copy on every read */
  readonly hash: Uint8Array;
}

export type SaltAndHash = NoSaltOrHash | SaltOnly | SaltWithHash;

/**
 * A salt, given either as a built `Salt` or as ASCII text
 */
export type SaltInput = Salt | string;

/**
 * Salt with an optional hash
 */
export type SaltHashPair = readonly [salt: SaltInput, hash?: Uint8Array];

const NEITHER: NoSaltOrHash = Object.freeze({ kind: 'neither' });

function toSalt(input: SaltInput): Salt {
  return typeof input === 'string' ? asciiSalt(input) : input;
}

/**
 * Build a SaltAndHash from an optional pair.
 *
 * - no pair: `neither`
 * - `[salt]` or `[salt, undefined]`: `salt`
 * - `[salt, hash]`: `both` (the hash bytes are copied)
 *
 * @throws PhcError (PHC_INVALID_HASH) for an empty hash
 */
export function saltAndHashFromOption(pair?: SaltHashPair): SaltAndHash {
  if (pair === undefined) {
    return NEITHER;
  }
  const salt = toSalt(pair[0]);
  const hash = pair[1];
  if (hash === undefined) {
    return Object.freeze({ kind: 'salt', salt });
  }
  if (hash.length === 0) {
    throw new PhcError('PHC_INVALID_HASH', 'Hash must not be empty');
  }
  const stored = Uint8Array.from(hash);
  return Object.freeze({
    kind: 'both',
    salt,
    get hash() {
      return stored.slice();
    },
  });
}

export function saltOf(value: SaltAndHash): Salt | undefined {
  return value.kind === 'neither' ? undefined : value.salt;
}

export function hashOf(value: SaltAndHash): Uint8Array | undefined {
  return value.kind === 'both' ? value.hash : undefined;
}

export function saltAndHashEquals(a: SaltAndHash, b: SaltAndHash): boolean {
  switch (a.kind) {
    case 'neither':
      return b.kind === 'neither';
    case 'salt':
      return b.kind === 'salt' && saltEquals(a.salt, b.salt);
    case 'both':
      return b.kind === 'both' && saltEquals(a.salt, b.salt) && bytesEqual(a.hash, b.hash);
  }
}
