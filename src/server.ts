// pattern: Imperative Shell

/**
 * Tool server entry point.
 * Composition root that builds the configured connectors, registers their
 * operations as tools and serves them over MCP on stdio.
 */

import pino from 'pino';
import { pathToFileURL } from 'node:url';
import { loadConfig } from './config/config.ts';
import type { AppConfig, ConnectorConfigInput } from './config/schema.ts';
import type { Connector } from './connector/types.ts';
import { createVaultConnector } from './connectors/vault/connector.ts';
import { ConfigError } from './errors/index.ts';
import { componentLogger, createLogger, setLogger } from './logging/logger.ts';
import type { Logger } from './logging/logger.ts';
import type { Clock } from './timing/clock.ts';
import { serveMcpOverStdio } from './tool/adapters/rpc.ts';
import { createToolRegistry } from './tool/registry.ts';
import type { ToolRegistry } from './tool/types.ts';
import type { HttpSender } from './transport/types.ts';

export const SERVER_INFO = { name: 'connector-kit', version: '0.1.0' };

export type ConnectorFactoryOptions = {
  config: ConnectorConfigInput;
  env?: NodeJS.ProcessEnv;
  send?: HttpSender;
  clock?: Clock;
  logger?: Logger;
};

export type ConnectorFactory = (options: ConnectorFactoryOptions) => Connector;

/**
 * Connectors that can be enabled from a `[connectors.<name>]` config section.
 */
export const CONNECTOR_FACTORIES: Readonly<Record<string, ConnectorFactory>> = {
  vault: createVaultConnector,
};

export type ToolServer = {
  registry: ToolRegistry;
  connectors: Array<Connector>;
};

export function buildToolServer(
  config: AppConfig,
  options: Omit<ConnectorFactoryOptions, 'config'> = {},
): ToolServer {
  const registry = createToolRegistry({ logger: options.logger });
  const connectors: Array<Connector> = [];

  for (const [name, section] of Object.entries(config.connectors)) {
    const factory = CONNECTOR_FACTORIES[name];
    if (!factory) {
      throw new ConfigError(`unknown connector: ${name}`, [
        { path: `connectors.${name}`, message: `expected one of: ${Object.keys(CONNECTOR_FACTORIES).join(', ')}` },
      ]);
    }
    const connector = factory({ ...options, config: section });
    registry.registerConnector(connector);
    connectors.push(connector);
  }

  return { registry, connectors };
}

/**
 * Create a graceful shutdown handler that closes the server once, however many
 * signals arrive.
 */
export function createShutdownHandler(
  server: { close(): Promise<void> },
  logger: Logger,
  exit: (code: number) => void = (code) => process.exit(code),
): () => Promise<void> {
  let closing = false;
  return async (): Promise<void> => {
    if (closing) {
      return;
    }
    closing = true;
    logger.info('shutting down');
    try {
      await server.close();
      exit(0);
    } catch (error) {
      logger.error({ error: error instanceof Error ? error.message : String(error) }, 'error closing server');
      exit(1);
    }
  };
}

export async function main(configPath?: string): Promise<void> {
  const config = loadConfig(configPath);
  // stdout carries the MCP protocol; logs go to stderr.
  const logger = createLogger(config.logging, pino.destination(2));
  setLogger(logger);
  const log = componentLogger('server', logger);

  const { registry, connectors } = buildToolServer(config, { logger });
  log.info(
    { connectors: connectors.map((connector) => connector.name), tools: registry.list().length },
    'tool server starting',
  );

  const server = await serveMcpOverStdio(registry, SERVER_INFO, { logger });
  const shutdown = createShutdownHandler(server, log);
  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      log.error({ error: error instanceof Error ? error.message : String(error) }, 'shutdown failed');
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

// Run main entry point only when file is executed directly
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main(process.argv[2]).catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
