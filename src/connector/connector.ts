// pattern: Imperative Shell

/**
 * createConnector: wires configuration, credentials, rate limiting and transport
 * into one per-vendor instance. Nothing here is shared between instances.
 */

import { parseSection } from '../config/config.ts';
import { ConnectorConfigSchema } from '../config/schema.ts';
import type { ConnectorConfigInput } from '../config/schema.ts';
import { createCredentialResolver, defaultStrategies } from '../credentials/resolver.ts';
import type { promptStrategy } from '../credentials/strategies.ts';
import type { Credential, CredentialSpec, SecretStore } from '../credentials/types.ts';
import type { Logger } from '../logging/logger.ts';
import { componentLogger } from '../logging/logger.ts';
import { createTokenBucket } from '../ratelimit/token-bucket.ts';
import type { Clock } from '../timing/clock.ts';
import { buildUrl } from '../transport/http.ts';
import { createRetryingTransport } from '../transport/retrying-transport.ts';
import type { ExecuteOptions, HttpRequest, HttpResponse, HttpSender } from '../transport/types.ts';
import type { Connector, Operation, OperationDefinition } from './types.ts';

export type ConnectorOptions = {
  name: string;
  credentials?: ReadonlyArray<CredentialSpec>;
  config?: ConnectorConfigInput;
  /**
   * Credential whose value is the base URL when `config.base_url` is unset
   * (e.g. `VAULT_ADDR`).
   */
  base_url_credential?: string;
  /** Headers to attach to every request, built from resolved credentials. */
  authenticate?: (connector: Connector) => Promise<Record<string, string>>;
  secret_store?: SecretStore;
  env?: NodeJS.ProcessEnv;
  prompt?: Parameters<typeof promptStrategy>[0];
  send?: HttpSender;
  clock?: Clock;
  random?: () => number;
  logger?: Logger;
};

const NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

export function createConnector(options: ConnectorOptions): Connector {
  if (!NAME_PATTERN.test(options.name)) {
    throw new RangeError(`connector name must match ${NAME_PATTERN}: ${options.name}`);
  }

  const config = parseSection(ConnectorConfigSchema, options.config ?? {}, `connector ${options.name}`);
  const log = componentLogger(`connector:${options.name}`, options.logger);

  const credentials = createCredentialResolver({
    specs: options.credentials ?? [],
    strategies: defaultStrategies({
      explicit: config.credentials,
      env: options.env,
      secrets_dir: config.secrets_dir,
      allow_prompt: config.allow_prompt,
      prompt: options.prompt,
      secret_store: options.secret_store,
    }),
    env: options.env,
    logger: log,
  });

  const limiter = createTokenBucket({ ...config.rate_limit, clock: options.clock, logger: log });

  const transport = createRetryingTransport({
    send: options.send,
    timeout_ms: config.timeout_ms,
    policy: config.retry,
    limiter,
    clock: options.clock,
    random: options.random,
    logger: log,
  });

  const operations = new Map<string, Operation>();

  async function baseUrl(): Promise<string | undefined> {
    if (config.base_url) {
      return config.base_url;
    }
    if (options.base_url_credential) {
      const credential = await credentials.resolve(options.base_url_credential);
      return credential.present ? credential.value : undefined;
    }
    return undefined;
  }

  const connector: Connector = {
    name: options.name,
    config,
    credentials,
    limiter,
    transport,

    credential(name: string): Promise<Credential> {
      return credentials.resolve(name);
    },

    async request(request: HttpRequest, executeOptions?: ExecuteOptions): Promise<HttpResponse> {
      const url = buildUrl(await baseUrl(), request.url).toString();
      const auth = options.authenticate ? await options.authenticate(connector) : {};
      const { response } = await transport.execute(
        { ...request, url, headers: { ...auth, ...request.headers } },
        executeOptions,
      );
      return response;
    },

    defineOperation(definition: OperationDefinition): Operation {
      if (operations.has(definition.name)) {
        throw new Error(`operation already defined on ${options.name}: ${definition.name}`);
      }
      const operation: Operation = Object.freeze({
        connector: options.name,
        name: definition.name,
        description: definition.description,
        category: definition.category ?? options.name,
        parameters: Object.freeze([...(definition.parameters ?? [])]),
        idempotent: definition.idempotent ?? false,
        independent: definition.independent ?? false,
        handler: definition.handler,
      });
      operations.set(operation.name, operation);
      return operation;
    },

    operations(): ReadonlyArray<Operation> {
      return Object.freeze(Array.from(operations.values()));
    },

    describe() {
      return {
        name: options.name,
        base_url: config.base_url,
        credentials: credentials.describe(),
        operations: Array.from(operations.values()).map((op) => ({
          name: op.name,
          category: op.category,
          idempotent: op.idempotent,
        })),
        rate_limit: limiter.snapshot(),
      };
    },
  };

  return connector;
}
