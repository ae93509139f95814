/**
 * Parameter codecs
 *
 * Any type that can be parsed from text, rendered to text and compared for
 * equality works as a parameter type. `codecFromSchema` lifts a zod schema
 * over strings into a codec; the built-in codecs are defined that way.
 */

import { z } from 'zod';
import type { ParamCodec, ParamValue } from './params.js';

/**
 * Build a codec from a zod schema whose input is the raw parameter text.
 *
 * @param schema - Parses (and transforms) the raw value
 * @param format - Renders a value back to text (default: `String`)
 * @param equals - Equality used for default elision (default: `Object.is`)
 */
export function codecFromSchema<T extends ParamValue>(
  schema: z.ZodType<T, z.ZodTypeDef, string>,
  format: (value: T) => string = String,
  equals: (a: T, b: T) => boolean = Object.is
): ParamCodec<T> {
  return {
    parse(raw) {
      const result = schema.safeParse(raw);
      return result.success ? result.data : undefined;
    },
    format,
    equals,
  };
}

const DIGITS = /^[0-9]+$/;
const SIGNED_DIGITS = /^-?[0-9]+$/;
const DECIMAL = /^-?[0-9]+(\.[0-9]+)?$/;

function unsignedCodec(max: number): ParamCodec<number> {
  return codecFromSchema(
    z.string().regex(DIGITS).transform(Number).pipe(z.number().int().min(0).max(max))
  );
}

export const codecs = {
  /** 0 to 255 */
  u8: unsignedCodec(0xff),
  /** 0 to 65535 */
  u16: unsignedCodec(0xffff),
  /** 0 to 4294967295 */
  u32: unsignedCodec(0xffffffff),
  /** Any non-negative safe integer */
  uint: unsignedCodec(Number.MAX_SAFE_INTEGER),
  /** Any safe integer, with an optional leading `-` */
  int: codecFromSchema(
    z
      .string()
      .regex(SIGNED_DIGITS)
      .transform(Number)
      .pipe(z.number().int().min(Number.MIN_SAFE_INTEGER).max(Number.MAX_SAFE_INTEGER))
  ),
  /** Finite, in plain decimal notation (`1`, `-0.5`); no exponent. `-0` reads as `0`. */
  float: codecFromSchema(
    z
      .string()
      .regex(DECIMAL)
      .transform(Number)
      .pipe(z.number().finite())
      .transform((v) => (Object.is(v, -0) ? 0 : v)),
    String,
    (a, b) => a === b
  ),
  /** Exactly `true` or `false` */
  bool: codecFromSchema(z.enum(['true', 'false']).transform((v) => v === 'true')),
  /** The raw text, unchanged */
  str: codecFromSchema(z.string().min(1)),
} as const;
