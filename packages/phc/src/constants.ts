/**
 * PHC String Format Constants
 *
 * Character classes and limits for the `$id$params$salt$hash` grammar.
 */

/**
 * Separator between top-level components
 */
export const SEGMENT_SEPARATOR = '$' as const;

/**
 * Separator between `name=value` pairs inside the params segment
 */
export const PARAM_SEPARATOR = ',' as const;

/**
 * Separator between a parameter name and its value
 */
export const PARAM_ASSIGN = '=' as const;

/**
 * Anchored patterns for whole tokens
 */
export const PATTERNS = {
  /** Algorithm identifiers and parameter names */
  name: /^[a-z0-9-]+$/,
  /** Parameter values and ASCII salts */
  value: /^[a-zA-Z0-9/+.-]+$/,
  /** Unpadded standard base64 */
  base64: /^[A-Za-z0-9/+]+$/,
} as const;

export function isNameChar(c: string): boolean {
  return (c >= 'a' && c <= 'z') || (c >= '0' && c <= '9') || c === '-';
}

export function isValueChar(c: string): boolean {
  return (
    (c >= 'a' && c <= 'z') ||
    (c >= 'A' && c <= 'Z') ||
    (c >= '0' && c <= '9') ||
    c === '/' ||
    c === '+' ||
    c === '.' ||
    c === '-'
  );
}

export function isBase64Char(c: string): boolean {
  return (
    (c >= 'a' && c <= 'z') ||
    (c >= 'A' && c <= 'Z') ||
    (c >= '0' && c <= '9') ||
    c === '/' ||
    c === '+'
  );
}

/**
 * Input limits
 */
export const PHC_LIMITS = {
  /** Largest arity with exact tuple typing on paramSet() */
  MAX_TYPED_ARITY: 8,
} as const;
