// pattern: Functional Core

export type {
  CallOptions,
  ListedSecret,
  ListOptions,
  ReadSecretResult,
  SecretData,
  VaultConnector,
  WriteOptions,
  WriteSecretResult,
} from './types.ts';
export type { VaultConnectorOptions } from './connector.ts';
export { createVaultConnector, kvPath, DEFAULT_MAX_DEPTH, DEFAULT_MOUNT_POINT } from './connector.ts';
export { createVaultSecretStore } from './secret-store.ts';
