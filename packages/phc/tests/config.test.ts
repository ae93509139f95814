import { describe, it, expect, afterEach } from 'vitest';
import {
  loadPhcConfig,
  PHC_CONFIG_DEFAULTS,
  PhcConfigError,
  setPhcConfig,
  getPhcConfig,
} from '../src/config.js';
import { parsePhc } from '../src/parser.js';
import { thrown } from './helpers.js';

describe('loadPhcConfig', () => {
  it('should apply defaults', () => {
    expect(loadPhcConfig({})).toEqual({ logLevel: 'silent' });
    expect(loadPhcConfig({})).toEqual(PHC_CONFIG_DEFAULTS);
  });

  it('should read environment variables', () => {
    expect(loadPhcConfig({ PHC_LOG_LEVEL: 'debug' })).toEqual({ logLevel: 'debug' });
  });

  it('should reject an unknown log level', () => {
    const err = thrown(() => loadPhcConfig({ PHC_LOG_LEVEL: 'loud' }));
    expect(err).toBeInstanceOf(PhcConfigError);
    expect(err instanceof PhcConfigError && err.errors.map((e) => e.field)).toEqual(['logLevel']);
    expect(err instanceof PhcConfigError && err.message).toMatch(/^Invalid phc configuration: logLevel: /);
  });
});

describe('setPhcConfig', () => {
  afterEach(() => {
    setPhcConfig(undefined);
  });

  it('should override the loaded configuration', () => {
    setPhcConfig({ logLevel: 'warn' });
    expect(getPhcConfig()).toEqual({ logLevel: 'warn' });
  });
});

describe('parsePhc and configuration', () => {
  const saved = process.env.PHC_LOG_LEVEL;

  afterEach(() => {
    if (saved === undefined) {
      delete process.env.PHC_LOG_LEVEL;
    } else {
      process.env.PHC_LOG_LEVEL = saved;
    }
    setPhcConfig(undefined);
  });

  it('should ignore an overridden configuration', () => {
    const before = parsePhc('$abc-123$i=1$salt');
    setPhcConfig({ logLevel: 'trace' });
    expect(parsePhc('$abc-123$i=1$salt')).toEqual(before);
  });

  it('should ignore an invalid environment', () => {
    process.env.PHC_LOG_LEVEL = 'verbose';
    setPhcConfig(undefined);

    const result = parsePhc('$abc-123');
    expect(result.ok && result.value.id).toBe('abc-123');
    expect(() => getPhcConfig()).toThrow(PhcConfigError);
  });
});
