// pattern: Imperative Shell

/**
 * Structured logging for the connector runtime.
 * Components take a `Logger` and derive a child tagged with their component name;
 * credential-bearing fields are redacted before anything reaches the output stream.
 */

import pino from 'pino';
import type { LoggingConfig } from '../config/schema.ts';

export type Logger = pino.Logger;

export const REDACTED_PATHS: ReadonlyArray<string> = [
  'api_key',
  'token',
  'password',
  'authorization',
  'value',
  '*.api_key',
  '*.value',
  '*.token',
  '*.password',
  'headers.authorization',
  'headers.Authorization',
  'headers["x-api-key"]',
  'headers["X-Vault-Token"]',
  'request.headers.authorization',
  'request.headers.Authorization',
];

export function createLogger(
  config: LoggingConfig,
  destination?: pino.DestinationStream,
): Logger {
  const options: pino.LoggerOptions = {
    level: config.level,
    base: { service: 'connector-kit' },
    redact: { paths: [...REDACTED_PATHS], censor: '[redacted]' },
  };
  return destination ? pino(options, destination) : pino(options);
}

let rootLogger: Logger | undefined;

/**
 * Process-wide logger used when a component is not handed one explicitly.
 * Level comes from CONNECTOR_KIT_LOG_LEVEL, defaulting to `info`.
 */
export function getLogger(): Logger {
  if (!rootLogger) {
    const level = process.env['CONNECTOR_KIT_LOG_LEVEL'];
    rootLogger = createLogger({ level: isLevel(level) ? level : 'info' });
  }
  return rootLogger;
}

export function setLogger(logger: Logger): void {
  rootLogger = logger;
}

export function componentLogger(component: string, parent?: Logger): Logger {
  return (parent ?? getLogger()).child({ component });
}

function isLevel(value: string | undefined): value is LoggingConfig['level'] {
  return (
    value === 'fatal' ||
    value === 'error' ||
    value === 'warn' ||
    value === 'info' ||
    value === 'debug' ||
    value === 'trace' ||
    value === 'silent'
  );
}
