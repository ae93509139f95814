/**
 * Scheme binding
 *
 * Associates an id with a parameter set so that a PHC string can be decoded
 * straight into typed parameters plus its salt and hash, and encoded back.
 * Only structure is checked; whether the values make sense for the
 * algorithm is up to the algorithm.
 */

import type { Logger } from 'pino';
import { PATTERNS, SEGMENT_SEPARATOR } from './constants.js';
import { PhcError, type PhcParseError } from './errors.js';
import { createLogger } from './logger.js';
import type { ParamSet, ParamValue } from './params.js';
import { parsePhc, type ParsePhcOptions } from './parser.js';
import { RawPhc } from './raw.js';
import { saltAndHashFromOption, type SaltAndHash } from './salt-and-hash.js';

/**
 * A PHC value bound to a scheme
 */
export interface PhcValue<T extends ParamValue[]> {
  id: string;
  params: T;
  saltAndHash: SaltAndHash;
}

export type DecodeResult<T extends ParamValue[]> =
  | { ok: true; value: PhcValue<T> }
  | { ok: false; error: PhcParseError };

export interface EncodeInput<T extends ParamValue[]> {
  params: T;
  saltAndHash?: SaltAndHash;
}

export class PhcScheme<T extends ParamValue[]> {
  readonly id: string;
  readonly params: ParamSet<T>;

  constructor(id: string, params: ParamSet<T>) {
    if (!PATTERNS.name.test(id)) {
      throw new PhcError('PHC_INVALID_ID', `Id must match ${PATTERNS.name.source}: ${JSON.stringify(id)}`);
    }
    this.id = id;
    this.params = params;
  }

  /**
   * Parse a PHC string and bind it to this scheme
   */
  decode(input: string, options?: ParsePhcOptions): DecodeResult<T> {
    const parsed = parsePhc(input, options);
    if (!parsed.ok) {
      return parsed;
    }
    return this.bind(parsed.value);
  }

  /**
   * Bind an already parsed record to this scheme
   */
  bind(raw: RawPhc): DecodeResult<T> {
    if (raw.id !== this.id) {
      return {
        ok: false,
        error: {
          code: 'PHC_ID_MISMATCH',
          message: `Expected id "${this.id}", got "${raw.id}"`,
          offset: SEGMENT_SEPARATOR.length,
        },
      };
    }

    const params = this.params.extract(raw.params);
    if (params === undefined) {
      return {
        ok: false,
        error: {
          code: 'PHC_PARAMS_UNRESOLVED',
          message: `Parameters do not match (${this.params.names.join(', ')}) for "${this.id}"`,
          offset: SEGMENT_SEPARATOR.length + raw.id.length,
        },
      };
    }

    return { ok: true, value: { id: raw.id, params, saltAndHash: raw.saltAndHash } };
  }

  toRaw(input: EncodeInput<T>): RawPhc {
    return RawPhc.fromParts(
      this.id,
      this.params.serialize(input.params),
      input.saltAndHash ?? saltAndHashFromOption()
    );
  }

  /**
   * Render typed parameters (and optional salt and hash) as a PHC string
   */
  encode(input: EncodeInput<T>): string {
    return this.toRaw(input).toString();
  }
}

/**
 * Declare a scheme
 *
 * @example
 * ```typescript
 * const pbkdf2 = defineScheme('pbkdf2-sha256', paramSet(param('i', codecs.u32)));
 * const decoded = pbkdf2.decode('$pbkdf2-sha256$i=10000$c2FsdA$aGFzaA');
 * ```
 */
export function defineScheme<T extends ParamValue[]>(id: string, params: ParamSet<T>): PhcScheme<T> {
  return new PhcScheme(id, params);
}

export interface SchemeRegistryOptions {
  logger?: Logger;
  /** Input length limit applied by decode() when the call passes none */
  maxLength?: number;
}

/**
 * Registry of schemes keyed by id, for decoding strings whose scheme is not
 * known up front.
 */
export class SchemeRegistry {
  private readonly schemes = new Map<string, PhcScheme<ParamValue[]>>();
  private readonly logger: Logger;
  private readonly maxLength: number | undefined;

  constructor(options: SchemeRegistryOptions = {}) {
    this.logger = (options.logger ?? createLogger()).child({ component: 'scheme-registry' });
    this.maxLength = options.maxLength;
  }

  /**
   * @throws PhcError (PHC_DUPLICATE_SCHEME) if the id is already registered
   */
  register<T extends ParamValue[]>(scheme: PhcScheme<T>): this {
    if (this.schemes.has(scheme.id)) {
      throw new PhcError('PHC_DUPLICATE_SCHEME', `Scheme already registered: ${scheme.id}`);
    }
    this.schemes.set(scheme.id, scheme);
    this.logger.debug({ scheme: scheme.id, params: scheme.params.names }, 'Scheme registered');
    return this;
  }

  get(id: string): PhcScheme<ParamValue[]> | undefined {
    return this.schemes.get(id);
  }

  has(id: string): boolean {
    return this.schemes.has(id);
  }

  ids(): string[] {
    return Array.from(this.schemes.keys());
  }

  /**
   * Parse a PHC string and decode it with the scheme named by its id
   */
  decode(input: string, options: ParsePhcOptions = {}): DecodeResult<ParamValue[]> {
    const parsed = parsePhc(input, { maxLength: options.maxLength ?? this.maxLength });
    if (!parsed.ok) {
      this.logger.debug({ code: parsed.error.code, offset: parsed.error.offset }, 'Rejected PHC string');
      return parsed;
    }

    const raw = parsed.value;
    const scheme = this.schemes.get(raw.id);
    if (scheme === undefined) {
      this.logger.debug({ scheme: raw.id }, 'No scheme registered for id');
      return {
        ok: false,
        error: {
          code: 'PHC_UNKNOWN_SCHEME',
          message: `No scheme registered for id "${raw.id}"`,
          offset: SEGMENT_SEPARATOR.length,
        },
      };
    }

    const result = scheme.bind(raw);
    if (!result.ok) {
      this.logger.debug({ scheme: raw.id, code: result.error.code }, 'Parameters rejected by scheme');
    }
    return result;
  }
}
