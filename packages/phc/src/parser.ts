/**
 * PHC String Grammar
 *
 * ```
 * phc           := '$' id params? salt_and_hash?
 * id            := name_char+                   ; [a-z0-9-]
 * params        := '$' param (',' param)*
 * param         := name_char+ '=' value_char+    ; [A-Za-z0-9/+.-]
 * salt_and_hash := '$' value_char+ ('$' base64_char+)?
 * ```
 *
 * The params segment and the salt segment both start with `$`, and a salt
 * may itself look like a value token. Params are tried first; if they do
 * not match, the parser falls back to an empty list and tries the salt.
 * Hash bytes that fail to decode reject the whole input.
 */

import { base64Decode } from './base64.js';
import {
  char,
  eof,
  map,
  mapOrFail,
  opt,
  orElse,
  pair,
  preceded,
  sepBy1,
  separatedPair,
  takeWhile1,
  type Parser,
} from './combinators.js';
import {
  isBase64Char,
  isNameChar,
  isValueChar,
  PARAM_ASSIGN,
  PARAM_SEPARATOR,
  SEGMENT_SEPARATOR,
} from './constants.js';
import { PhcError, type PhcParseError } from './errors.js';
import { RawPhc, type RawParam } from './raw.js';
import { asciiSalt } from './salt.js';
import { saltAndHashFromOption, type SaltAndHash } from './salt-and-hash.js';

const NAME = 'name character [a-z0-9-]';
const VALUE = 'value character [a-zA-Z0-9/+.-]';

const id: Parser<string> = preceded(
  char(SEGMENT_SEPARATOR, 'PHC_INVALID_ID'),
  takeWhile1(isNameChar, NAME, 'PHC_INVALID_ID')
);

const param: Parser<RawParam> = separatedPair(
  takeWhile1(isNameChar, NAME, 'PHC_INVALID_PARAM'),
  char(PARAM_ASSIGN, 'PHC_INVALID_PARAM'),
  takeWhile1(isValueChar, VALUE, 'PHC_INVALID_PARAM')
);

const params: Parser<RawParam[]> = orElse(
  preceded(
    char(SEGMENT_SEPARATOR, 'PHC_INVALID_PARAM'),
    sepBy1(param, char(PARAM_SEPARATOR, 'PHC_INVALID_PARAM'))
  ),
  () => []
);

const hash: Parser<Uint8Array> = mapOrFail(
  takeWhile1(isBase64Char, 'base64 character [A-Za-z0-9/+]', 'PHC_INVALID_HASH'),
  base64Decode,
  'PHC_INVALID_HASH',
  'canonical unpadded base64'
);

const saltAndHash: Parser<SaltAndHash> = map(
  opt(
    pair(
      preceded(
        char(SEGMENT_SEPARATOR, 'PHC_INVALID_SALT'),
        takeWhile1(isValueChar, VALUE, 'PHC_INVALID_SALT')
      ),
      opt(preceded(char(SEGMENT_SEPARATOR, 'PHC_INVALID_HASH'), hash))
    )
  ),
  (found) =>
    found === undefined ? saltAndHashFromOption() : saltAndHashFromOption([asciiSalt(found[0]), found[1]])
);

const phc: Parser<RawPhc> = (input, pos) => {
  const i = id(input, pos);
  if (!i.ok) return i;
  const p = params(input, i.pos);
  if (!p.ok) return p;
  const sh = saltAndHash(input, p.pos);
  if (!sh.ok) return sh;
  const end = eof('PHC_TRAILING_INPUT')(input, sh.pos);
  if (!end.ok) return end;
  return { ok: true, value: RawPhc.fromParts(i.value, p.value, sh.value), pos: end.pos };
};

export interface ParsePhcOptions {
  /** Maximum input length in characters (default: unlimited) */
  maxLength?: number;
}

export type ParsePhcResult = { ok: true; value: RawPhc } | { ok: false; error: PhcParseError };

/**
 * Parse a PHC string into a RawPhc.
 *
 * Pure and total: every input yields either the record or an error, never
 * a partial result. Only the options passed in affect the outcome.
 *
 * @example
 * ```typescript
 * const result = parsePhc('$argon2id$v=19$c29tZXNhbHQ$aGFzaA');
 * if (result.ok) {
 *   result.value.id;      // 'argon2id'
 *   result.value.params;  // [['v', '19']]
 * }
 * ```
 */
export function parsePhc(input: string, options: ParsePhcOptions = {}): ParsePhcResult {
  if (input.length === 0) {
    return {
      ok: false,
      error: { code: 'PHC_EMPTY_INPUT', message: 'Input must be a non-empty string', offset: 0 },
    };
  }

  const { maxLength } = options;
  if (maxLength !== undefined && input.length > maxLength) {
    return {
      ok: false,
      error: {
        code: 'PHC_INPUT_TOO_LONG',
        message: `Input length ${input.length} exceeds maximum of ${maxLength}`,
        offset: maxLength,
      },
    };
  }

  const reply = phc(input, 0);
  if (!reply.ok) {
    return {
      ok: false,
      error: {
        code: reply.code,
        message: `Expected ${reply.expected} at offset ${reply.pos}`,
        offset: reply.pos,
      },
    };
  }
  return { ok: true, value: reply.value };
}

/**
 * Parse a PHC string, throwing PhcError on failure
 */
export function parsePhcOrThrow(input: string, options?: ParsePhcOptions): RawPhc {
  const result = parsePhc(input, options);
  if (!result.ok) {
    throw PhcError.fromParseError(result.error);
  }
  return result.value;
}
