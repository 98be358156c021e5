// pattern: Functional Core

import type { Connector } from '../../connector/types.ts';

export type SecretData = Record<string, unknown>;

export type ReadSecretResult = {
  path: string;
  mount_point: string;
  data: SecretData;
  found: boolean;
};

export type ListedSecret = {
  path: string;
  mount_point: string;
  data: SecretData;
  key_count: number;
};

export type WriteSecretResult = {
  path: string;
  mount_point: string;
  version: number;
  created_time: string;
};

export type CallOptions = {
  mount_point?: string;
  signal?: AbortSignal;
};

export type ListOptions = CallOptions & {
  root_path?: string;
  max_depth?: number;
};

export type WriteOptions = CallOptions & {
  /** Check-and-set version; 0 only writes when the secret does not exist. */
  cas?: number;
};

/**
 * Vault KV v2 connector: the generic connector plus typed calls that the
 * registered operations delegate to.
 */
export type VaultConnector = Connector & {
  readSecret(path: string, options?: CallOptions): Promise<ReadSecretResult>;
  listSecrets(options?: ListOptions): Promise<Array<ListedSecret>>;
  writeSecret(path: string, data: SecretData, options?: WriteOptions): Promise<WriteSecretResult>;
};
