// pattern: Imperative Shell

/**
 * HashiCorp Vault KV v2 connector.
 * Reads and lists go through the connector's retrying transport as idempotent
 * requests; writes are sent once unless the failure happened before sending.
 */

import { z } from 'zod';
import { createConnector } from '../../connector/connector.ts';
import type { ConnectorOptions } from '../../connector/connector.ts';
import { TransportError, VendorApiError } from '../../errors/index.ts';
import { HttpStatusError } from '../../transport/classify.ts';
import type { HttpRequest, HttpResponse } from '../../transport/types.ts';
import type {
  CallOptions,
  ListedSecret,
  ListOptions,
  ReadSecretResult,
  SecretData,
  VaultConnector,
  WriteOptions,
  WriteSecretResult,
} from './types.ts';

export const DEFAULT_MOUNT_POINT = 'secret';
export const DEFAULT_MAX_DEPTH = 10;

export type VaultConnectorOptions = Omit<
  ConnectorOptions,
  'name' | 'credentials' | 'base_url_credential' | 'authenticate'
>;

const ErrorPayloadSchema = z.object({ errors: z.array(z.string()) });

const ReadResponseSchema = z.object({
  data: z.object({
    data: z.record(z.unknown()).nullable(),
  }),
});

const ListResponseSchema = z.object({
  data: z.object({
    keys: z.array(z.string()),
  }),
});

const WriteResponseSchema = z.object({
  data: z.object({
    version: z.number(),
    created_time: z.string(),
  }),
});

const ReadArgsSchema = z.object({ path: z.string(), mount_point: z.string() });
const ListArgsSchema = z.object({ root_path: z.string(), mount_point: z.string(), max_depth: z.number() });
const WriteArgsSchema = z.object({
  path: z.string(),
  data: z.record(z.unknown()),
  mount_point: z.string(),
  cas: z.number().optional(),
});

function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, '');
}

/**
 * `v1/<mount>/<kind>/<path>` with each path segment percent-encoded.
 */
export function kvPath(mountPoint: string, kind: 'data' | 'metadata', path: string): string {
  const segments = path.split('/').filter(Boolean).map(encodeURIComponent);
  return ['v1', trimSlashes(mountPoint), kind, ...segments].join('/');
}

function vaultErrors(data: unknown): Array<string> {
  const parsed = ErrorPayloadSchema.safeParse(data);
  return parsed.success ? parsed.data.errors : [];
}

function parseResponse<S extends z.ZodTypeAny>(schema: S, response: HttpResponse, what: string): z.infer<S> {
  const parsed = schema.safeParse(response.data);
  if (!parsed.success) {
    throw new VendorApiError('vault', `unexpected ${what} response`, response.status);
  }
  return parsed.data;
}

export function createVaultConnector(options: VaultConnectorOptions = {}): VaultConnector {
  const connector = createConnector({
    ...options,
    name: 'vault',
    credentials: [
      { name: 'VAULT_ADDR', description: 'Vault server address', required: false },
      { name: 'VAULT_TOKEN', description: 'Vault token', required: true },
      { name: 'VAULT_NAMESPACE', description: 'Vault Enterprise namespace', required: false },
    ],
    base_url_credential: 'VAULT_ADDR',
    authenticate: async (self) => {
      const headers: Record<string, string> = {
        'X-Vault-Token': (await self.credential('VAULT_TOKEN')).value,
      };
      const namespace = await self.credential('VAULT_NAMESPACE');
      if (namespace.present) {
        headers['X-Vault-Namespace'] = namespace.value;
      }
      return headers;
    },
  });

  /**
   * Vault `errors` payloads become VendorApiError, whatever the status.
   */
  async function call(request: HttpRequest, signal: AbortSignal | undefined): Promise<HttpResponse> {
    let response: HttpResponse;
    try {
      response = await connector.request(request, { signal });
    } catch (error) {
      if (error instanceof TransportError && error.cause instanceof HttpStatusError) {
        const failed = error.cause.response;
        const errors = vaultErrors(failed.data);
        if (errors.length > 0) {
          throw new VendorApiError('vault', errors.join('; '), failed.status, errors);
        }
      }
      throw error;
    }

    const errors = vaultErrors(response.data);
    if (errors.length > 0) {
      throw new VendorApiError('vault', errors.join('; '), response.status, errors);
    }
    return response;
  }

  async function callUnlessMissing(
    request: HttpRequest,
    signal: AbortSignal | undefined,
  ): Promise<HttpResponse | undefined> {
    try {
      return await call(request, signal);
    } catch (error) {
      if ((error instanceof TransportError || error instanceof VendorApiError) && error.status === 404) {
        return undefined;
      }
      throw error;
    }
  }

  async function readSecret(path: string, callOptions: CallOptions = {}): Promise<ReadSecretResult> {
    const mountPoint = callOptions.mount_point ?? DEFAULT_MOUNT_POINT;
    const response = await callUnlessMissing(
      { method: 'GET', url: kvPath(mountPoint, 'data', path), idempotent: true },
      callOptions.signal,
    );
    if (!response) {
      return { path, mount_point: mountPoint, data: {}, found: false };
    }
    const body = parseResponse(ReadResponseSchema, response, 'read');
    // A deleted latest version reads as null data.
    if (body.data.data === null) {
      return { path, mount_point: mountPoint, data: {}, found: false };
    }
    return { path, mount_point: mountPoint, data: body.data.data, found: true };
  }

  async function listKeys(prefix: string, mountPoint: string, signal: AbortSignal | undefined): Promise<Array<string>> {
    const response = await callUnlessMissing(
      { method: 'LIST', url: kvPath(mountPoint, 'metadata', prefix), idempotent: true },
      signal,
    );
    return response ? parseResponse(ListResponseSchema, response, 'list').data.keys : [];
  }

  async function listSecrets(listOptions: ListOptions = {}): Promise<Array<ListedSecret>> {
    const mountPoint = listOptions.mount_point ?? DEFAULT_MOUNT_POINT;
    const maxDepth = listOptions.max_depth ?? DEFAULT_MAX_DEPTH;
    const root = trimSlashes(listOptions.root_path ?? '/');
    const secrets: Array<ListedSecret> = [];

    async function walk(prefix: string, depth: number): Promise<void> {
      for (const key of await listKeys(prefix, mountPoint, listOptions.signal)) {
        const path = `${prefix}${key}`;
        if (key.endsWith('/')) {
          if (depth < maxDepth) {
            await walk(path, depth + 1);
          }
          continue;
        }
        const secret = await readSecret(path, { mount_point: mountPoint, signal: listOptions.signal });
        if (secret.found) {
          secrets.push({
            path,
            mount_point: mountPoint,
            data: secret.data,
            key_count: Object.keys(secret.data).length,
          });
        }
      }
    }

    await walk(root ? `${root}/` : '', 0);
    return secrets;
  }

  async function writeSecret(path: string, data: SecretData, writeOptions: WriteOptions = {}): Promise<WriteSecretResult> {
    const mountPoint = writeOptions.mount_point ?? DEFAULT_MOUNT_POINT;
    const body = writeOptions.cas === undefined ? { data } : { options: { cas: writeOptions.cas }, data };
    const response = await call(
      { method: 'POST', url: kvPath(mountPoint, 'data', path), body, idempotent: false },
      writeOptions.signal,
    );
    const written = parseResponse(WriteResponseSchema, response, 'write');
    return { path, mount_point: mountPoint, version: written.data.version, created_time: written.data.created_time };
  }

  connector.defineOperation({
    name: 'read_secret',
    description: 'Retrieve the data for a specific HashiCorp Vault secret by its path.',
    idempotent: true,
    independent: true,
    parameters: [
      { name: 'path', type: 'string', description: 'Path to the secret.', required: true },
      {
        name: 'mount_point',
        type: 'string',
        description: 'KV engine mount point.',
        required: false,
        default: DEFAULT_MOUNT_POINT,
      },
    ],
    handler: async (args, context) => {
      const { path, mount_point } = ReadArgsSchema.parse(args);
      return readSecret(path, { mount_point, signal: context.signal });
    },
  });

  connector.defineOperation({
    name: 'list_secrets',
    description: 'Recursively list all secrets and their values under a specific Vault path.',
    idempotent: true,
    independent: true,
    parameters: [
      { name: 'root_path', type: 'string', description: "Root path to search (e.g., '/').", required: false, default: '/' },
      {
        name: 'mount_point',
        type: 'string',
        description: 'KV engine mount point.',
        required: false,
        default: DEFAULT_MOUNT_POINT,
      },
      {
        name: 'max_depth',
        type: 'integer',
        description: 'Maximum directory depth to traverse.',
        required: false,
        default: DEFAULT_MAX_DEPTH,
        minimum: 0,
      },
    ],
    handler: async (args, context) => {
      const { root_path, mount_point, max_depth } = ListArgsSchema.parse(args);
      return listSecrets({ root_path, mount_point, max_depth, signal: context.signal });
    },
  });

  connector.defineOperation({
    name: 'write_secret',
    description: 'Create or update a HashiCorp Vault secret at a path.',
    parameters: [
      { name: 'path', type: 'string', description: 'Path to the secret.', required: true },
      { name: 'data', type: 'object', description: 'Key/value pairs to store.', required: true },
      {
        name: 'mount_point',
        type: 'string',
        description: 'KV engine mount point.',
        required: false,
        default: DEFAULT_MOUNT_POINT,
      },
      {
        name: 'cas',
        type: 'integer',
        description: 'Only write if the current version matches.',
        required: false,
        minimum: 0,
      },
    ],
    handler: async (args, context) => {
      const { path, data, mount_point, cas } = WriteArgsSchema.parse(args);
      return writeSecret(path, data, { mount_point, cas, signal: context.signal });
    },
  });

  return { ...connector, readSecret, listSecrets, writeSecret };
}
