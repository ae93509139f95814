/**
 * Minimal parser combinators over strings
 *
 * A parser is a function from (input, position) to a Reply. Failures are
 * either recoverable (an alternative may be tried) or fatal: once a parser
 * has committed to an interpretation, `opt` and `orElse` let a fatal
 * failure through instead of backtracking.
 */

import type { PhcErrorCode } from './errors.js';

export interface Success<T> {
  ok: true;
  value: T;
  pos: number;
}

export interface Failure {
  ok: false;
  pos: number;
  code: PhcErrorCode;
  expected: string;
  fatal: boolean;
}

export type Reply<T> = Success<T> | Failure;

export type Parser<T> = (input: string, pos: number) => Reply<T>;

export function success<T>(value: T, pos: number): Success<T> {
  return { ok: true, value, pos };
}

export function failure(pos: number, code: PhcErrorCode, expected: string, fatal = false): Failure {
  return { ok: false, pos, code, expected, fatal };
}

/**
 * Match a single literal character
 */
export function char(c: string, code: PhcErrorCode): Parser<string> {
  return (input, pos) =>
    input[pos] === c ? success(c, pos + 1) : failure(pos, code, `'${c}'`);
}

/**
 * Match one or more characters satisfying a predicate
 */
export function takeWhile1(
  predicate: (c: string) => boolean,
  expected: string,
  code: PhcErrorCode
): Parser<string> {
  return (input, pos) => {
    let end = pos;
    while (end < input.length && predicate(input.charAt(end))) {
      end++;
    }
    return end > pos ? success(input.slice(pos, end), end) : failure(pos, code, expected);
  };
}

/**
 * Succeed only at the end of input
 */
export function eof(code: PhcErrorCode): Parser<null> {
  return (input, pos) =>
    pos === input.length ? success(null, pos) : failure(pos, code, 'end of input');
}

export function map<T, U>(parser: Parser<T>, fn: (value: T) => U): Parser<U> {
  return (input, pos) => {
    const reply = parser(input, pos);
    return reply.ok ? success(fn(reply.value), reply.pos) : reply;
  };
}

/**
 * Map with a conversion that may fail. A failed conversion is fatal: the
 * characters already matched have no other reading.
 */
export function mapOrFail<T, U>(
  parser: Parser<T>,
  fn: (value: T) => U | undefined,
  code: PhcErrorCode,
  expected: string
): Parser<U> {
  return (input, pos) => {
    const reply = parser(input, pos);
    if (!reply.ok) return reply;
    const mapped = fn(reply.value);
    return mapped === undefined ? failure(pos, code, expected, true) : success(mapped, reply.pos);
  };
}

export function pair<A, B>(first: Parser<A>, second: Parser<B>): Parser<[A, B]> {
  return (input, pos) => {
    const a = first(input, pos);
    if (!a.ok) return a;
    const b = second(input, a.pos);
    if (!b.ok) return b;
    return success([a.value, b.value], b.pos);
  };
}

/**
 * Match `prefix` then `parser`, keeping only the latter's value
 */
export function preceded<T>(prefix: Parser<unknown>, parser: Parser<T>): Parser<T> {
  return map(pair(prefix, parser), ([, value]) => value);
}

/**
 * Match `left sep right`, keeping both sides
 */
export function separatedPair<A, B>(
  left: Parser<A>,
  sep: Parser<unknown>,
  right: Parser<B>
): Parser<[A, B]> {
  return pair(left, preceded(sep, right));
}

/**
 * One or more `parser`, separated by `sep`.
 *
 * A separator not followed by an element ends the list before the separator.
 */
export function sepBy1<T>(parser: Parser<T>, sep: Parser<unknown>): Parser<T[]> {
  return (input, pos) => {
    const first = parser(input, pos);
    if (!first.ok) return first;

    const items = [first.value];
    let cursor = first.pos;
    for (;;) {
      const s = sep(input, cursor);
      if (!s.ok) break;
      const next = parser(input, s.pos);
      if (!next.ok) {
        if (next.fatal) return next;
        break;
      }
      items.push(next.value);
      cursor = next.pos;
    }
    return success(items, cursor);
  };
}

/**
 * Try `parser`; on a recoverable failure fall back to `fallback()` without
 * consuming input
 */
export function orElse<T>(parser: Parser<T>, fallback: () => T): Parser<T> {
  return (input, pos) => {
    const reply = parser(input, pos);
    if (reply.ok || reply.fatal) return reply;
    return success(fallback(), pos);
  };
}

export function opt<T>(parser: Parser<T>): Parser<T | undefined> {
  return orElse<T | undefined>(parser, () => undefined);
}
