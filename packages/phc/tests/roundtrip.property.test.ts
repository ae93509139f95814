/**
 * Property-based tests for parse/serialize round trips
 *
 * Uses fast-check to verify:
 * 1. Every generated grammar-conformant string parses and serializes back
 *    to exactly the same text
 * 2. Records built from parts serialize to strings that parse back to an
 *    equal record
 * 3. Parameter sets round-trip typed values through serialize/extract
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { base64Encode } from '../src/base64.js';
import { codecs } from '../src/codecs.js';
import { param, paramSet } from '../src/params.js';
import { parsePhc } from '../src/parser.js';
import { RawPhc } from '../src/raw.js';
import { saltAndHashFromOption } from '../src/salt-and-hash.js';

// -----------------------------------------------------------------------------
// Arbitraries
// -----------------------------------------------------------------------------

const name = fc.stringMatching(/^[a-z0-9-]{1,12}$/);
const value = fc.stringMatching(/^[a-zA-Z0-9/+.-]{1,16}$/);
const hashBytes = fc.uint8Array({ minLength: 1, maxLength: 48 });

const rawParams = fc.array(fc.tuple(name, value), { maxLength: 5 });

/**
 * Optional `[salt, hash?]` pair
 */
const saltHash = fc.option(
  fc.tuple(value, fc.option(hashBytes, { nil: undefined })),
  { nil: undefined }
);

/**
 * Grammar-conformant PHC strings
 */
const phcString = fc.tuple(name, rawParams, saltHash).map(([id, params, sh]) => {
  let out = `$${id}`;
  if (params.length > 0) {
    out += '$' + params.map(([k, v]) => `${k}=${v}`).join(',');
  }
  if (sh !== undefined) {
    const [salt, hash] = sh;
    out += `$${salt}`;
    if (hash !== undefined) {
      out += `$${base64Encode(hash)}`;
    }
  }
  return out;
});

describe('round trip properties', () => {
  it('should serialize every parsed string back to itself', () => {
    fc.assert(
      fc.property(phcString, (input) => {
        const result = parsePhc(input);
        expect(result.ok).toBe(true);
        if (result.ok) {
          expect(result.value.toString()).toBe(input);
        }
      })
    );
  });

  it('should parse every serialized record back to an equal record', () => {
    fc.assert(
      fc.property(name, rawParams, saltHash, (id, params, sh) => {
        const record = RawPhc.fromParts(id, params, saltAndHashFromOption(sh));
        const result = parsePhc(record.toString());
        expect(result.ok && result.value.equals(record)).toBe(true);
      })
    );
  });

  it('should extract what a parameter set serialized', () => {
    const set = paramSet(
      param('t', codecs.u32),
      param('m', codecs.u32, 4096),
      param('p', codecs.u8, 1),
      param('keyid', codecs.str, 'none')
    );
    const keyId = fc.stringMatching(/^[a-zA-Z0-9/+.-]{1,8}$/);

    fc.assert(
      fc.property(
        fc.nat({ max: 0xffffffff }),
        fc.nat({ max: 0xffffffff }),
        fc.nat({ max: 0xff }),
        keyId,
        (t, m, p, keyid) => {
          const pairs = set.serialize([t, m, p, keyid]);
          expect(set.extract(pairs)).toEqual([t, m, p, keyid]);
        }
      )
    );
  });
});
