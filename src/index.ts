// pattern: Functional Core

/**
 * Public surface of connector-kit.
 */

export * from './errors/index.ts';
export * from './config/index.ts';
export { createLogger, getLogger, setLogger, componentLogger, REDACTED_PATHS } from './logging/logger.ts';
export type { Logger } from './logging/logger.ts';
export * from './timing/index.ts';
export * from './credentials/index.ts';
export * from './ratelimit/index.ts';
export * from './transport/index.ts';
export * from './connector/index.ts';
export * from './tool/index.ts';
export * from './model/index.ts';
export * from './agent/index.ts';
export * from './chat/index.ts';
export * from './connectors/vault/index.ts';
