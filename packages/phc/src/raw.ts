/**
 * Raw PHC
 *
 * Parsed PHC string data that has not been associated with a hash function.
 * Used to marshal between the serialized string and a scheme-specific,
 * typed view (see params.ts and scheme.ts).
 */

import { base64Encode } from './base64.js';
import {
  PARAM_ASSIGN,
  PARAM_SEPARATOR,
  PATTERNS,
  SEGMENT_SEPARATOR,
} from './constants.js';
import { PhcError } from './errors.js';
import { ParamSet, extractParam, type Param, type ParamValue } from './params.js';
import { saltToString, type Salt } from './salt.js';
import {
  hashOf,
  saltAndHashEquals,
  saltAndHashFromOption,
  saltOf,
  type SaltAndHash,
} from './salt-and-hash.js';

/**
 * A `name=value` parameter pair
 */
export type RawParam = readonly [name: string, value: string];

/**
 * A parsed PHC string that has not been associated with a hash function.
 */
export class RawPhc {
  /** Id of the hash function this string describes */
  readonly id: string;

  /** Parameters for the hash function, in string order */
  readonly params: readonly RawParam[];

  readonly saltAndHash: SaltAndHash;

  private constructor(id: string, params: readonly RawParam[], saltAndHash: SaltAndHash) {
    this.id = id;
    this.params = params;
    this.saltAndHash = saltAndHash;
    Object.freeze(this);
  }

  /**
   * Create a record from parts.
   *
   * @throws PhcError if the id, a parameter name or a parameter value uses
   *   characters outside its alphabet
   */
  static fromParts(
    id: string,
    params: Iterable<readonly [string, string]> = [],
    saltAndHash: SaltAndHash = saltAndHashFromOption()
  ): RawPhc {
    if (!PATTERNS.name.test(id)) {
      throw new PhcError('PHC_INVALID_ID', `Id must match ${PATTERNS.name.source}: ${JSON.stringify(id)}`);
    }

    const pairs: RawParam[] = [];
    for (const [name, value] of params) {
      if (!PATTERNS.name.test(name)) {
        throw new PhcError(
          'PHC_INVALID_PARAM',
          `Parameter name must match ${PATTERNS.name.source}: ${JSON.stringify(name)}`
        );
      }
      if (!PATTERNS.value.test(value)) {
        throw new PhcError(
          'PHC_INVALID_PARAM',
          `Value of "${name}" must match ${PATTERNS.value.source}: ${JSON.stringify(value)}`
        );
      }
      pairs.push(Object.freeze([name, value] as const));
    }

    return new RawPhc(id, Object.freeze(pairs), saltAndHash);
  }

  get salt(): Salt | undefined {
    return saltOf(this.saltAndHash);
  }

  get hash(): Uint8Array | undefined {
    return hashOf(this.saltAndHash);
  }

  /**
   * Extract typed values for a parameter set (or a single parameter)
   */
  extract<T extends ParamValue[]>(set: ParamSet<T>): T | undefined;
  extract<T extends ParamValue>(param: Param<T>): T | undefined;
  extract(target: ParamSet<ParamValue[]> | Param<ParamValue>): ParamValue[] | ParamValue | undefined {
    if (target instanceof ParamSet) {
      return target.extract(this.params);
    }
    return extractParam(target, this.params);
  }

  equals(other: RawPhc): boolean {
    return (
      this.id === other.id &&
      this.params.length === other.params.length &&
      this.params.every(([name, value], i) => {
        const theirs = other.params[i];
        return theirs !== undefined && theirs[0] === name && theirs[1] === value;
      }) &&
      saltAndHashEquals(this.saltAndHash, other.saltAndHash)
    );
  }

  toString(): string {
    return serializePhc(this);
  }
}

/**
 * Render a record in its canonical textual form.
 *
 * For any string `s` accepted by parsePhc, `serializePhc(parse(s)) === s`.
 */
export function serializePhc(record: RawPhc): string {
  let out = SEGMENT_SEPARATOR + record.id;

  if (record.params.length > 0) {
    out +=
      SEGMENT_SEPARATOR +
      record.params.map(([name, value]) => name + PARAM_ASSIGN + value).join(PARAM_SEPARATOR);
  }

  const { saltAndHash } = record;
  switch (saltAndHash.kind) {
    case 'neither':
      break;
    case 'salt':
      out += SEGMENT_SEPARATOR + saltToString(saltAndHash.salt);
      break;
    case 'both':
      out +=
        SEGMENT_SEPARATOR +
        saltToString(saltAndHash.salt) +
        SEGMENT_SEPARATOR +
        base64Encode(saltAndHash.hash);
      break;
  }

  return out;
}
