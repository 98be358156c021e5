// pattern: Imperative Shell

import type { SecretStore } from '../../credentials/types.ts';
import { DEFAULT_MOUNT_POINT } from './connector.ts';
import type { VaultConnector } from './types.ts';

/**
 * Serve credentials from the keys of one Vault secret. A credential named
 * `ACME_TOKEN` reads key `ACME_TOKEN` (or its spec's `secret_key`) of the secret
 * at `path`.
 */
export function createVaultSecretStore(
  vault: VaultConnector,
  options: { path: string; mount_point?: string },
): SecretStore {
  const mountPoint = options.mount_point ?? DEFAULT_MOUNT_POINT;
  return {
    name: `vault:${mountPoint}/${options.path}`,

    async read(key: string): Promise<string | undefined> {
      const secret = await vault.readSecret(options.path, { mount_point: mountPoint });
      const value = secret.data[key];
      if (typeof value === 'string') {
        return value;
      }
      if (typeof value === 'number' || typeof value === 'boolean') {
        return String(value);
      }
      return undefined;
    },
  };
}
