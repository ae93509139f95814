/**
 * Configuration
 *
 * Read from the environment through a zod schema:
 * - `PHC_LOG_LEVEL`: pino level for the scheme registry logger
 *
 * Parsing and extraction never consult it.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

/**
 * Default configuration values
 */
export const PHC_CONFIG_DEFAULTS = {
  logLevel: 'silent',
} as const;

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const PhcConfigSchema = z.object({
  logLevel: LogLevelSchema.default(PHC_CONFIG_DEFAULTS.logLevel),
});

export type PhcConfig = z.infer<typeof PhcConfigSchema>;

export interface ConfigValidationError {
  field: string;
  message: string;
}

/**
 * Configuration validation error
 */
export class PhcConfigError extends Error {
  readonly errors: ConfigValidationError[];

  constructor(errors: ConfigValidationError[]) {
    const message = errors.map((e) => `${e.field}: ${e.message}`).join('; ');
    super(`Invalid phc configuration: ${message}`);
    this.name = 'PhcConfigError';
    this.errors = errors;
  }
}

/**
 * Load configuration from environment variables.
 *
 * @throws PhcConfigError if a variable is set to an invalid value
 */
export function loadPhcConfig(env: Record<string, string | undefined> = process.env): PhcConfig {
  const result = PhcConfigSchema.safeParse({
    logLevel: env.PHC_LOG_LEVEL,
  });
  if (!result.success) {
    throw new PhcConfigError(
      result.error.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }
  return result.data;
}

const configRef: { current?: PhcConfig } = {
  current: undefined,
};

/**
 * Get the active configuration, loading it from the environment on first use.
 */
export function getPhcConfig(): PhcConfig {
  if (configRef.current === undefined) {
    configRef.current = loadPhcConfig();
  }
  return configRef.current;
}

/**
 * Override the active configuration. Pass undefined to reload from the
 * environment on next use.
 */
export function setPhcConfig(config: Partial<PhcConfig> | undefined): void {
  configRef.current = config === undefined ? undefined : PhcConfigSchema.parse(config);
}
