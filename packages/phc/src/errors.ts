/**
 * Typed errors for phc-string
 *
 * Grammar failures surface as `{ ok: false, error }` results from the
 * parser. `PhcError` is thrown only by constructors handed invalid parts
 * and by the `*OrThrow` variants.
 */

/**
 * Error codes for PHC operations
 */
export const PHC_ERROR_CODES = [
  'PHC_EMPTY_INPUT',
  'PHC_INPUT_TOO_LONG',
  'PHC_INVALID_ID',
  'PHC_INVALID_PARAM',
  'PHC_INVALID_SALT',
  'PHC_INVALID_HASH',
  'PHC_TRAILING_INPUT',
  'PHC_ID_MISMATCH',
  'PHC_PARAMS_UNRESOLVED',
  'PHC_UNKNOWN_SCHEME',
  'PHC_DUPLICATE_SCHEME',
] as const;

export type PhcErrorCode = (typeof PHC_ERROR_CODES)[number];

/**
 * Parse error reported by the grammar parser
 */
export interface PhcParseError {
  code: PhcErrorCode;
  /** Human-readable message */
  message: string;
  /** Offset into the input where the failure was detected */
  offset: number;
}

/**
 * Typed error for PHC operations
 *
 * Use `err.code` to handle errors programmatically without message parsing.
 */
export class PhcError extends Error {
  readonly code: PhcErrorCode;
  readonly offset?: number;

  constructor(code: PhcErrorCode, message: string, offset?: number) {
    super(message);
    this.name = 'PhcError';
    this.code = code;
    this.offset = offset;
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, PhcError.prototype);
  }

  static fromParseError(error: PhcParseError): PhcError {
    return new PhcError(error.code, error.message, error.offset);
  }
}

/**
 * Check if a code is raised by the grammar itself
 * (as opposed to scheme binding or construction)
 */
export function isGrammarError(code: PhcErrorCode): boolean {
  return (
    code === 'PHC_EMPTY_INPUT' ||
    code === 'PHC_INPUT_TOO_LONG' ||
    code === 'PHC_INVALID_ID' ||
    code === 'PHC_INVALID_SALT' ||
    code === 'PHC_INVALID_HASH' ||
    code === 'PHC_TRAILING_INPUT'
  );
}
