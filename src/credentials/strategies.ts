// pattern: Imperative Shell

/**
 * Credential lookup strategies, one per source.
 * Each returns `undefined` when it has nothing; the resolver decides precedence.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createInterface } from 'node:readline/promises';
import type { CredentialSpec, CredentialStrategy, SecretStore } from './types.ts';

export function envName(spec: CredentialSpec): string {
  return spec.env ?? spec.name;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim().length > 0 ? value : undefined;
}

export function explicitStrategy(values: Readonly<Record<string, string | undefined>>): CredentialStrategy {
  return {
    source: 'explicit',
    async lookup(spec) {
      return nonEmpty(values[spec.name]);
    },
  };
}

export function envStrategy(env: NodeJS.ProcessEnv = process.env): CredentialStrategy {
  return {
    source: 'env',
    async lookup(spec) {
      return nonEmpty(env[envName(spec)]);
    },
  };
}

export function fileStrategy(options: {
  secrets_dir?: string;
  env?: NodeJS.ProcessEnv;
} = {}): CredentialStrategy {
  const env = options.env ?? process.env;

  function candidatePath(spec: CredentialSpec): string | undefined {
    if (spec.file) {
      return spec.file;
    }
    const fromEnv = env[`${envName(spec)}_FILE`];
    if (fromEnv) {
      return fromEnv;
    }
    if (options.secrets_dir) {
      return join(options.secrets_dir, spec.name);
    }
    return undefined;
  }

  return {
    source: 'file',
    async lookup(spec) {
      const path = candidatePath(spec);
      if (!path) {
        return undefined;
      }
      try {
        const contents = await readFile(path, 'utf-8');
        return nonEmpty(contents.trim());
      } catch (error) {
        if (isMissingFile(error)) {
          return undefined;
        }
        throw error;
      }
    },
  };
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

export function promptStrategy(options: {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  interactive?: boolean;
} = {}): CredentialStrategy {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stderr;
  const interactive = options.interactive ?? process.stdin.isTTY === true;

  return {
    source: 'prompt',
    async lookup(spec) {
      if (!interactive) {
        return undefined;
      }
      const rl = createInterface({ input, output, terminal: false });
      try {
        const answer = await rl.question(`${spec.description ?? spec.name}: `);
        return nonEmpty(answer.trim());
      } finally {
        rl.close();
      }
    },
  };
}

export function secretStoreStrategy(store: SecretStore): CredentialStrategy {
  return {
    source: 'secret_store',
    async lookup(spec) {
      return nonEmpty(await store.read(spec.secret_key ?? spec.name));
    },
  };
}
