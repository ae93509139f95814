import { pino, type DestinationStream, type Logger } from 'pino';
import { getPhcConfig, type PhcConfig } from './config.js';

/**
 * Create the library logger.
 *
 * Parsing, serialization and extraction never log; the logger is used by
 * the scheme registry.
 */
export function createLogger(
  config: Pick<PhcConfig, 'logLevel'> = getPhcConfig(),
  destination?: DestinationStream
): Logger {
  const options = {
    name: 'phc',
    level: config.logLevel,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };
  return destination === undefined ? pino(options) : pino(options, destination);
}
