// pattern: Functional Core

export type {
  CredentialSource,
  CredentialSpec,
  CredentialStrategy,
  CredentialStatus,
  CredentialResolver,
  SecretStore,
} from './types.ts';

export { Credential } from './types.ts';
export {
  explicitStrategy,
  envStrategy,
  fileStrategy,
  promptStrategy,
  secretStoreStrategy,
} from './strategies.ts';
export { createCredentialResolver, defaultStrategies } from './resolver.ts';
export type { CredentialResolverOptions } from './resolver.ts';
