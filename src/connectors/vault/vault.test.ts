// pattern: Imperative Shell

import { describe, it, expect } from 'vitest';
import { createConnector } from '../../connector/connector.ts';
import { CredentialNotFoundError, TransportError, VendorApiError } from '../../errors/index.ts';
import { createToolRegistry } from '../../tool/registry.ts';
import type { HttpRequest, HttpResponse, HttpSender } from '../../transport/types.ts';
import { createVaultConnector, kvPath } from './connector.ts';
import { createVaultSecretStore } from './secret-store.ts';
import type { SecretData } from './types.ts';

const noWait = {
  now: () => 0,
  sleep: async () => {},
};

const ENV = { VAULT_ADDR: 'https://vault.test', VAULT_TOKEN: 'test-secret' };

function reply(status: number, data: unknown): HttpResponse {
  return { status, headers: { 'content-type': 'application/json' }, text: JSON.stringify(data), data };
}

function childKeys(secrets: Record<string, SecretData>, prefix: string): Array<string> {
  const keys = new Set<string>();
  for (const path of Object.keys(secrets)) {
    if (!path.startsWith(prefix)) {
      continue;
    }
    const rest = path.slice(prefix.length);
    const slash = rest.indexOf('/');
    keys.add(slash === -1 ? rest : rest.slice(0, slash + 1));
  }
  return [...keys].sort();
}

/**
 * In-process stand-in for a Vault KV v2 mount at `secret/`.
 */
function fakeVault(
  secrets: Record<string, SecretData>,
  override?: (request: HttpRequest) => HttpResponse | undefined,
): { send: HttpSender; requests: Array<HttpRequest> } {
  const requests: Array<HttpRequest> = [];
  return {
    requests,
    send: async (request) => {
      requests.push(request);
      const overridden = override?.(request);
      if (overridden) {
        return overridden;
      }
      if (request.headers?.['X-Vault-Token'] !== 'test-secret') {
        return reply(403, { errors: ['permission denied'] });
      }
      const match = /^\/v1\/secret\/(data|metadata)(?:\/(.*))?$/.exec(new URL(request.url).pathname);
      const kind = match?.[1];
      const path = match?.[2] ?? '';

      if (kind === 'data' && request.method === 'GET') {
        const secret = secrets[path];
        return secret ? reply(200, { data: { data: secret, metadata: { version: 1 } } }) : reply(404, { errors: [] });
      }
      if (kind === 'data' && request.method === 'POST') {
        return reply(200, { data: { version: 2, created_time: '2026-01-01T00:00:00Z' } });
      }
      if (kind === 'metadata' && request.method === 'LIST') {
        const keys = childKeys(secrets, path ? `${path}/` : '');
        return keys.length > 0 ? reply(200, { data: { keys } }) : reply(404, { errors: [] });
      }
      return reply(405, { errors: ['unsupported operation'] });
    },
  };
}

const SECRETS: Record<string, SecretData> = {
  'app/db': { user: 'svc', password: 'test-password' },
  'app/api': { key: 'test-key' },
  'app/nested/deep': { x: '1' },
  root: { a: 'b' },
};

describe('createVaultConnector', () => {
  describe('read_secret', () => {
    it('reads a KV v2 secret with the Vault token header', async () => {
      const { send, requests } = fakeVault(SECRETS);
      const vault = createVaultConnector({ env: ENV, send, clock: noWait });

      const secret = await vault.readSecret('app/db');

      expect(secret).toEqual({
        path: 'app/db',
        mount_point: 'secret',
        data: { user: 'svc', password: 'test-password' },
        found: true,
      });
      expect(requests[0]?.method).toBe('GET');
      expect(requests[0]?.url).toBe('https://vault.test/v1/secret/data/app/db');
      expect(requests[0]?.headers).toEqual({ 'X-Vault-Token': 'test-secret' });
      expect(requests[0]?.idempotent).toBe(true);
    });

    it('reports a missing secret as not found without retrying', async () => {
      const { send, requests } = fakeVault(SECRETS);
      const vault = createVaultConnector({ env: ENV, send, clock: noWait });

      expect(await vault.readSecret('nope')).toEqual({ path: 'nope', mount_point: 'secret', data: {}, found: false });
      expect(requests).toHaveLength(1);
    });

    it('sends the namespace header when one is configured', async () => {
      const { send, requests } = fakeVault(SECRETS);
      const vault = createVaultConnector({ env: { ...ENV, VAULT_NAMESPACE: 'team-a' }, send, clock: noWait });

      await vault.readSecret('root');

      expect(requests[0]?.headers).toEqual({ 'X-Vault-Token': 'test-secret', 'X-Vault-Namespace': 'team-a' });
    });

    it('turns Vault error payloads into VendorApiError', async () => {
      const { send } = fakeVault(SECRETS);
      const vault = createVaultConnector({ env: { ...ENV, VAULT_TOKEN: 'wrong-token' }, send, clock: noWait });

      const error = await vault.readSecret('app/db').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(VendorApiError);
      if (error instanceof VendorApiError) {
        expect(error.message).toBe('vault: permission denied');
        expect(error.status).toBe(403);
        expect(error.errors).toEqual(['permission denied']);
      }
    });

    it('fails before sending when no token is available', async () => {
      const { send, requests } = fakeVault(SECRETS);
      const vault = createVaultConnector({ env: { VAULT_ADDR: 'https://vault.test' }, send, clock: noWait });

      await expect(vault.readSecret('app/db')).rejects.toBeInstanceOf(CredentialNotFoundError);
      expect(requests).toHaveLength(0);
    });
  });

  describe('list_secrets', () => {
    it('walks the mount recursively with the LIST verb', async () => {
      const { send, requests } = fakeVault(SECRETS);
      const vault = createVaultConnector({ env: ENV, send, clock: noWait });

      const secrets = await vault.listSecrets();

      expect(secrets.map((s) => s.path)).toEqual(['app/api', 'app/db', 'app/nested/deep', 'root']);
      expect(secrets[1]).toEqual({
        path: 'app/db',
        mount_point: 'secret',
        data: { user: 'svc', password: 'test-password' },
        key_count: 2,
      });
      expect(requests[0]?.method).toBe('LIST');
      expect(requests[0]?.url).toBe('https://vault.test/v1/secret/metadata');
    });

    it('stops descending at max_depth', async () => {
      const { send } = fakeVault(SECRETS);
      const vault = createVaultConnector({ env: ENV, send, clock: noWait });

      const secrets = await vault.listSecrets({ max_depth: 1 });

      expect(secrets.map((s) => s.path)).toEqual(['app/api', 'app/db', 'root']);
    });

    it('starts from root_path', async () => {
      const { send } = fakeVault(SECRETS);
      const vault = createVaultConnector({ env: ENV, send, clock: noWait });

      const secrets = await vault.listSecrets({ root_path: '/app/nested/' });

      expect(secrets.map((s) => s.path)).toEqual(['app/nested/deep']);
    });

    it('returns nothing for an empty path', async () => {
      const { send } = fakeVault(SECRETS);
      const vault = createVaultConnector({ env: ENV, send, clock: noWait });

      expect(await vault.listSecrets({ root_path: 'missing' })).toEqual([]);
    });
  });

  describe('write_secret', () => {
    it('posts the data with an optional check-and-set version', async () => {
      const { send, requests } = fakeVault(SECRETS);
      const vault = createVaultConnector({ env: ENV, send, clock: noWait });

      const written = await vault.writeSecret('app/new', { token: 'test-token' }, { cas: 0 });

      expect(written).toEqual({
        path: 'app/new',
        mount_point: 'secret',
        version: 2,
        created_time: '2026-01-01T00:00:00Z',
      });
      expect(requests[0]?.method).toBe('POST');
      expect(requests[0]?.body).toEqual({ options: { cas: 0 }, data: { token: 'test-token' } });
      expect(requests[0]?.idempotent).toBe(false);
    });

    it('does not retry a write after a server error', async () => {
      const { send, requests } = fakeVault(SECRETS, (request) =>
        request.method === 'POST' ? reply(500, {}) : undefined,
      );
      const vault = createVaultConnector({ env: ENV, send, clock: noWait });

      const error = await vault.writeSecret('app/new', { a: 'b' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      if (error instanceof TransportError) {
        expect(error.failure).toBe('server');
        expect(error.attempts).toBe(1);
      }
      expect(requests).toHaveLength(1);
    });
  });

  describe('as tools', () => {
    it('registers its operations with derived schemas', async () => {
      const { send } = fakeVault(SECRETS);
      const registry = createToolRegistry();
      registry.registerConnector(createVaultConnector({ env: ENV, send, clock: noWait }));

      expect(registry.list().map((tool) => tool.name)).toEqual([
        'vault_read_secret',
        'vault_list_secrets',
        'vault_write_secret',
      ]);
      expect(registry.get('vault_list_secrets')?.input_schema.properties['max_depth']).toEqual({
        type: 'integer',
        description: 'Maximum directory depth to traverse.',
        default: 10,
        minimum: 0,
      });
      expect(registry.get('vault_write_secret')?.idempotent).toBe(false);

      expect(await registry.invoke({ id: 'call_1', name: 'vault_read_secret', arguments: { path: 'root' } })).toEqual({
        path: 'root',
        mount_point: 'secret',
        data: { a: 'b' },
        found: true,
      });
    });
  });
});

describe('createVaultSecretStore', () => {
  it('serves another connector credentials from a Vault secret', async () => {
    const { send } = fakeVault(SECRETS);
    const vault = createVaultConnector({ env: ENV, send, clock: noWait });
    const acme = createConnector({
      name: 'acme',
      credentials: [{ name: 'ACME_KEY', secret_key: 'key', required: true }],
      secret_store: createVaultSecretStore(vault, { path: 'app/api' }),
      env: {},
    });

    const credential = await acme.credential('ACME_KEY');

    expect(credential.value).toBe('test-key');
    expect(credential.source).toBe('secret_store');
  });
});

describe('kvPath', () => {
  it('encodes path segments and trims slashes', () => {
    expect(kvPath('/kv/', 'data', '/team a/db/')).toBe('v1/kv/data/team%20a/db');
  });
});
