// pattern: Imperative Shell

/**
 * CredentialResolver implementation.
 * Composes strategies left-to-right with fixed precedence and memoizes results
 * for the lifetime of the resolver (one per connector instance).
 */

import { CredentialNotFoundError } from '../errors/index.ts';
import type { Logger } from '../logging/logger.ts';
import { componentLogger } from '../logging/logger.ts';
import {
  envName,
  envStrategy,
  explicitStrategy,
  fileStrategy,
  promptStrategy,
  secretStoreStrategy,
} from './strategies.ts';
import { Credential } from './types.ts';
import type {
  CredentialResolver,
  CredentialSpec,
  CredentialStatus,
  CredentialStrategy,
  SecretStore,
} from './types.ts';

export type CredentialResolverOptions = {
  specs: ReadonlyArray<CredentialSpec>;
  strategies: ReadonlyArray<CredentialStrategy>;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
};

/**
 * Build the standard ordered strategy list:
 * explicit config → environment → file → prompt (opt-in) → secret store (if declared).
 */
export function defaultStrategies(options: {
  explicit?: Readonly<Record<string, string | undefined>>;
  env?: NodeJS.ProcessEnv;
  secrets_dir?: string;
  allow_prompt?: boolean;
  prompt?: Parameters<typeof promptStrategy>[0];
  secret_store?: SecretStore;
}): Array<CredentialStrategy> {
  const strategies: Array<CredentialStrategy> = [
    explicitStrategy(options.explicit ?? {}),
    envStrategy(options.env),
    fileStrategy({ secrets_dir: options.secrets_dir, env: options.env }),
  ];
  if (options.allow_prompt) {
    strategies.push(promptStrategy(options.prompt));
  }
  if (options.secret_store) {
    strategies.push(secretStoreStrategy(options.secret_store));
  }
  return strategies;
}

export function createCredentialResolver(options: CredentialResolverOptions): CredentialResolver {
  const log = componentLogger('credentials', options.logger);
  const env = options.env ?? process.env;
  const specs = new Map<string, CredentialSpec>();
  for (const spec of options.specs) {
    specs.set(spec.name, spec);
  }

  // Settled entries are served without awaiting a lookup; in-flight lookups are shared.
  const cache = new Map<string, Credential>();
  const inflight = new Map<string, Promise<Credential>>();

  async function lookup(spec: CredentialSpec): Promise<Credential> {
    for (const strategy of options.strategies) {
      const value = await strategy.lookup(spec);
      if (value !== undefined) {
        log.debug({ credential: spec.name, source: strategy.source }, 'credential resolved');
        return new Credential(spec.name, value, strategy.source);
      }
    }

    if (spec.required) {
      throw new CredentialNotFoundError(
        spec.name,
        options.strategies.map((s) => s.source),
      );
    }

    log.debug({ credential: spec.name }, 'optional credential absent');
    return new Credential(spec.name, '', 'absent');
  }

  function start(name: string): Promise<Credential> {
    const spec = specs.get(name);
    if (!spec) {
      return Promise.reject(new CredentialNotFoundError(name));
    }

    const pending = lookup(spec).then(
      (credential) => {
        if (inflight.get(name) === pending) {
          inflight.delete(name);
          cache.set(name, credential);
        }
        return credential;
      },
      (error: unknown) => {
        if (inflight.get(name) === pending) {
          inflight.delete(name);
        }
        throw error;
      },
    );
    inflight.set(name, pending);
    return pending;
  }

  return {
    specs: options.specs,

    async resolve(name: string): Promise<Credential> {
      const cached = cache.get(name);
      if (cached) {
        return cached;
      }
      return inflight.get(name) ?? start(name);
    },

    async refresh(name?: string): Promise<void> {
      const names = name === undefined ? Array.from(specs.keys()) : [name];
      for (const key of names) {
        cache.delete(key);
        inflight.delete(key);
      }
      if (name !== undefined) {
        await start(name);
      }
    },

    describe(): Array<CredentialStatus> {
      return options.specs.map((spec) => {
        const variable = envName(spec);
        const value = env[variable];
        return {
          name: spec.name,
          required: spec.required,
          env: variable,
          env_set: value !== undefined && value.length > 0,
          cached_source: cache.get(spec.name)?.source ?? null,
        };
      });
    },
  };
}
