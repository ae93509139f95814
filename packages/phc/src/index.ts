/**
 * PHC String Format
 *
 * Parser, round-trip serializer and typed parameter extraction for
 * `$id$param=value,...$salt$hash` strings.
 *
 * @packageDocumentation
 */

export * from './base64.js';
export * from './codecs.js';
export * from './config.js';
export * from './constants.js';
export * from './errors.js';
export * from './logger.js';
export * from './params.js';
export * from './parser.js';
export * from './raw.js';
export * from './salt.js';
export * from './salt-and-hash.js';
export * from './scheme.js';
