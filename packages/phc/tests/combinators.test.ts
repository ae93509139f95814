import { describe, it, expect } from 'vitest';
import {
  char,
  eof,
  mapOrFail,
  opt,
  orElse,
  sepBy1,
  takeWhile1,
} from '../src/combinators.js';

const digits = takeWhile1((c) => c >= '0' && c <= '9', 'digit', 'PHC_INVALID_PARAM');
const comma = char(',', 'PHC_INVALID_PARAM');

describe('sepBy1', () => {
  const list = sepBy1(digits, comma);

  it('should collect separated items', () => {
    expect(list('1,22,333', 0)).toEqual({ ok: true, value: ['1', '22', '333'], pos: 8 });
  });

  it('should stop before a separator with no item after it', () => {
    expect(list('1,2,x', 0)).toEqual({ ok: true, value: ['1', '2'], pos: 3 });
  });

  it('should fail without a first item', () => {
    expect(list('x', 0).ok).toBe(false);
  });
});

describe('orElse and opt', () => {
  const even = mapOrFail(
    digits,
    (d) => (Number(d) % 2 === 0 ? Number(d) : undefined),
    'PHC_INVALID_HASH',
    'even number'
  );

  it('should fall back on a recoverable failure without consuming input', () => {
    expect(orElse(digits, () => 'none')('abc', 1)).toEqual({ ok: true, value: 'none', pos: 1 });
    expect(opt(digits)('abc', 0)).toEqual({ ok: true, value: undefined, pos: 0 });
  });

  it('should not recover from a fatal failure', () => {
    expect(opt(even)('3', 0)).toEqual({
      ok: false,
      pos: 0,
      code: 'PHC_INVALID_HASH',
      expected: 'even number',
      fatal: true,
    });
  });

  it('should pass a successful conversion through', () => {
    expect(opt(even)('42', 0)).toEqual({ ok: true, value: 42, pos: 2 });
  });
});

describe('eof', () => {
  it('should only match at the end', () => {
    expect(eof('PHC_TRAILING_INPUT')('ab', 2).ok).toBe(true);
    expect(eof('PHC_TRAILING_INPUT')('ab', 1)).toMatchObject({ ok: false, pos: 1 });
  });
});
