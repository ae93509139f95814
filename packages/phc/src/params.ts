/**
 * Parameter extraction framework
 *
 * A hash scheme declares its parameters once, as an ordered set of typed
 * `Param` declarations. The set maps the untyped `[name, value]` pairs of a
 * RawPhc onto a typed tuple, and renders a tuple back into pairs.
 *
 * Matching is positional: a cursor walks the raw pairs, and each declared
 * parameter either consumes the pair under the cursor (when the names match)
 * or falls back to its default. There is no search, so parameters must
 * appear in declaration order. Pairs left after the last declared parameter
 * are ignored.
 */

import { PATTERNS } from './constants.js';
import { PhcError } from './errors.js';
import type { RawParam } from './raw.js';

/**
 * Values a parameter can hold. `undefined` is reserved for "no value".
 */
export type ParamValue = string | number | bigint | boolean | object;

/**
 * Text conversion for a parameter type
 */
export interface ParamCodec<T extends ParamValue> {
  /** Parse a value, or return undefined if the text is malformed */
  parse(raw: string): T | undefined;
  format(value: T): string;
  equals(a: T, b: T): boolean;
}

/**
 * Transforms one hash function parameter to and from its serialized form.
 */
export interface Param<T extends ParamValue> {
  /** Key as it appears in the PHC string */
  readonly name: string;

  /** Value used when the parameter is absent, or undefined if it is required */
  default(): T | undefined;

  /** Parse a serialized value, or undefined if parsing failed */
  extract(raw: string): T | undefined;

  /** Serialize a value, or undefined if it equals the default and is elided */
  serialize(value: T): string | undefined;
}

/**
 * A parameter backed by a ParamCodec, suitable for most uses.
 */
export class GenParam<T extends ParamValue> implements Param<T> {
  readonly name: string;
  private readonly codec: ParamCodec<T>;
  private readonly defaultValue: T | undefined;

  constructor(name: string, codec: ParamCodec<T>, defaultValue?: T) {
    if (!PATTERNS.name.test(name)) {
      throw new PhcError(
        'PHC_INVALID_PARAM',
        `Parameter name must match ${PATTERNS.name.source}: ${JSON.stringify(name)}`
      );
    }
    this.name = name;
    this.codec = codec;
    this.defaultValue = defaultValue;
  }

  default(): T | undefined {
    return this.defaultValue;
  }

  extract(raw: string): T | undefined {
    return this.codec.parse(raw);
  }

  serialize(value: T): string | undefined {
    if (this.defaultValue !== undefined && this.codec.equals(value, this.defaultValue)) {
      return undefined;
    }
    return this.codec.format(value);
  }
}

/**
 * Declare a parameter.
 *
 * @example
 * ```typescript
 * const iterations = param('i', codecs.u32);        // required
 * const heap = param('mem', codecs.bool, true);     // optional, elided when true
 * ```
 */
export function param<T extends ParamValue>(
  name: string,
  codec: ParamCodec<T>,
  defaultValue?: T
): GenParam<T> {
  return new GenParam(name, codec, defaultValue);
}

/**
 * Forward-only cursor over raw parameter pairs
 */
export class RawParamCursor {
  private readonly pairs: readonly RawParam[];
  private index = 0;

  constructor(pairs: readonly RawParam[]) {
    this.pairs = pairs;
  }

  get position(): number {
    return this.index;
  }

  /**
   * Consume the pair under the cursor if its name is `key`
   */
  nextIfKey(key: string): string | undefined {
    const pair = this.pairs[this.index];
    if (pair === undefined || pair[0] !== key) {
      return undefined;
    }
    this.index++;
    return pair[1];
  }

  /**
   * Resolve one parameter: the value under the cursor if the name matches,
   * otherwise the parameter's default.
   */
  extractSingle<T extends ParamValue>(param: Param<T>): T | undefined {
    const raw = this.nextIfKey(param.name);
    return raw === undefined ? param.default() : param.extract(raw);
  }
}

interface SetCodec<T extends ParamValue[]> {
  extract(cursor: RawParamCursor): T | undefined;
  serialize(values: T): RawParam[];
}

const NO_PARAMS: SetCodec<[]> = {
  extract: () => [],
  serialize: () => [],
};

/**
 * An ordered set of parameter declarations for one hash scheme.
 *
 * Built with `paramSet()`. The tuple type `T` follows declaration order.
 */
export class ParamSet<T extends ParamValue[]> {
  readonly params: readonly Param<ParamValue>[];
  private readonly codec: SetCodec<T>;

  private constructor(params: readonly Param<ParamValue>[], codec: SetCodec<T>) {
    this.params = params;
    this.codec = codec;
  }

  /**
   * A set holding the single parameter `param`
   */
  static of<U extends ParamValue>(param: Param<U>): ParamSet<[U]> {
    return new ParamSet<[]>([], NO_PARAMS).prepend(param);
  }

  get names(): string[] {
    return this.params.map((p) => p.name);
  }

  /**
   * A new set with `param` declared before the existing parameters
   */
  prepend<U extends ParamValue>(param: Param<U>): ParamSet<[U, ...T]> {
    const rest = this.codec;
    return new ParamSet<[U, ...T]>([param, ...this.params], {
      extract(cursor) {
        const head = cursor.extractSingle(param);
        if (head === undefined) return undefined;
        const tail = rest.extract(cursor);
        if (tail === undefined) return undefined;
        return [head, ...tail];
      },
      serialize([head, ...tail]) {
        const rendered = param.serialize(head);
        const pairs = rest.serialize(tail);
        return rendered === undefined ? pairs : [[param.name, rendered], ...pairs];
      },
    });
  }

  /**
   * Extract the typed tuple from raw pairs, or undefined if any parameter
   * is missing without a default or fails to parse
   */
  extract(pairs: readonly RawParam[]): T | undefined {
    return this.codec.extract(new RawParamCursor(pairs));
  }

  /**
   * Render a tuple to raw pairs, eliding values equal to their default
   */
  serialize(values: T): RawParam[] {
    return this.codec.serialize(values);
  }
}

/**
 * Compose parameter declarations into a set.
 *
 * Arity 1 through 8 yields an exact tuple type; longer sets are typed as
 * `ParamValue[]`.
 */
export function paramSet<A extends ParamValue>(a: Param<A>): ParamSet<[A]>;
export function paramSet<A extends ParamValue, B extends ParamValue>(
  a: Param<A>,
  b: Param<B>
): ParamSet<[A, B]>;
export function paramSet<A extends ParamValue, B extends ParamValue, C extends ParamValue>(
  a: Param<A>,
  b: Param<B>,
  c: Param<C>
): ParamSet<[A, B, C]>;
export function paramSet<
  A extends ParamValue,
  B extends ParamValue,
  C extends ParamValue,
  D extends ParamValue,
>(a: Param<A>, b: Param<B>, c: Param<C>, d: Param<D>): ParamSet<[A, B, C, D]>;
export function paramSet<
  A extends ParamValue,
  B extends ParamValue,
  C extends ParamValue,
  D extends ParamValue,
  E extends ParamValue,
>(a: Param<A>, b: Param<B>, c: Param<C>, d: Param<D>, e: Param<E>): ParamSet<[A, B, C, D, E]>;
export function paramSet<
  A extends ParamValue,
  B extends ParamValue,
  C extends ParamValue,
  D extends ParamValue,
  E extends ParamValue,
  F extends ParamValue,
>(
  a: Param<A>,
  b: Param<B>,
  c: Param<C>,
  d: Param<D>,
  e: Param<E>,
  f: Param<F>
): ParamSet<[A, B, C, D, E, F]>;
export function paramSet<
  A extends ParamValue,
  B extends ParamValue,
  C extends ParamValue,
  D extends ParamValue,
  E extends ParamValue,
  F extends ParamValue,
  G extends ParamValue,
>(
  a: Param<A>,
  b: Param<B>,
  c: Param<C>,
  d: Param<D>,
  e: Param<E>,
  f: Param<F>,
  g: Param<G>
): ParamSet<[A, B, C, D, E, F, G]>;
export function paramSet<
  A extends ParamValue,
  B extends ParamValue,
  C extends ParamValue,
  D extends ParamValue,
  E extends ParamValue,
  F extends ParamValue,
  G extends ParamValue,
  H extends ParamValue,
>(
  a: Param<A>,
  b: Param<B>,
  c: Param<C>,
  d: Param<D>,
  e: Param<E>,
  f: Param<F>,
  g: Param<G>,
  h: Param<H>
): ParamSet<[A, B, C, D, E, F, G, H]>;
export function paramSet(
  ...params: [Param<ParamValue>, ...Param<ParamValue>[]]
): ParamSet<ParamValue[]>;
export function paramSet(...params: Param<ParamValue>[]): ParamSet<ParamValue[]> {
  const [last, ...earlier] = [...params].reverse();
  if (last === undefined) {
    throw new PhcError('PHC_INVALID_PARAM', 'A parameter set needs at least one parameter');
  }
  let set: ParamSet<ParamValue[]> = ParamSet.of(last);
  for (const p of earlier) {
    set = set.prepend(p);
  }
  return set;
}

/**
 * Extract a parameter set from raw pairs
 */
export function extractParams<T extends ParamValue[]>(
  set: ParamSet<T>,
  pairs: readonly RawParam[]
): T | undefined {
  return set.extract(pairs);
}

/**
 * Extract a single parameter from raw pairs
 */
export function extractParam<T extends ParamValue>(
  param: Param<T>,
  pairs: readonly RawParam[]
): T | undefined {
  return new RawParamCursor(pairs).extractSingle(param);
}

export function serializeParams<T extends ParamValue[]>(
  set: ParamSet<T>,
  values: T
): RawParam[] {
  return set.serialize(values);
}
