import { describe, it, expect } from 'vitest';
import { isGrammarError, PHC_ERROR_CODES, PhcError } from '../src/errors.js';

describe('PhcError', () => {
  it('should carry code and offset', () => {
    const err = new PhcError('PHC_INVALID_HASH', 'bad hash', 10);
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(PhcError);
    expect(err.name).toBe('PhcError');
    expect(err.code).toBe('PHC_INVALID_HASH');
    expect(err.offset).toBe(10);
    expect(err.message).toBe('bad hash');
  });

  it('should convert a parse error', () => {
    const err = PhcError.fromParseError({ code: 'PHC_INVALID_ID', message: 'no id', offset: 1 });
    expect(err.code).toBe('PHC_INVALID_ID');
    expect(err.offset).toBe(1);
  });
});

describe('isGrammarError', () => {
  it('should classify every code', () => {
    const grammar = PHC_ERROR_CODES.filter(isGrammarError);
    expect(grammar).toEqual([
      'PHC_EMPTY_INPUT',
      'PHC_INPUT_TOO_LONG',
      'PHC_INVALID_ID',
      'PHC_INVALID_SALT',
      'PHC_INVALID_HASH',
      'PHC_TRAILING_INPUT',
    ]);
  });
});
