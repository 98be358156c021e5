// pattern: Functional Core

/**
 * Credential resolution types.
 * A resolver walks an ordered list of strategies; each strategy answers "do you
 * have a value for this credential?" and the first non-empty answer wins.
 */

import { inspect } from 'node:util';

export type CredentialSource = 'explicit' | 'env' | 'file' | 'prompt' | 'secret_store' | 'absent';

export type CredentialSpec = {
  name: string;
  description?: string;
  /** Environment variable holding the value. Defaults to `name`. */
  env?: string;
  /** File holding the value. Falls back to `<env>_FILE`, then `<secrets_dir>/<name>`. */
  file?: string;
  /** Key to request from the secret store. Defaults to `name`. */
  secret_key?: string;
  required: boolean;
};

/**
 * A resolved credential. The value lives in a private field so that
 * `JSON.stringify`, structured loggers and util.inspect never see it.
 */
export class Credential {
  readonly #value: string;

  constructor(
    readonly name: string,
    value: string,
    readonly source: CredentialSource,
    readonly resolved_at: Date = new Date(),
  ) {
    this.#value = value;
    Object.freeze(this);
  }

  get value(): string {
    return this.#value;
  }

  get present(): boolean {
    return this.#value.length > 0;
  }

  toJSON(): { name: string; source: CredentialSource; resolved_at: string; present: boolean } {
    return {
      name: this.name,
      source: this.source,
      resolved_at: this.resolved_at.toISOString(),
      present: this.present,
    };
  }

  toString(): string {
    return `[credential ${this.name}]`;
  }

  [inspect.custom](): string {
    return this.toString();
  }
}

export interface SecretStore {
  readonly name: string;
  read(key: string): Promise<string | undefined>;
}

export type CredentialStrategy = {
  readonly source: Exclude<CredentialSource, 'absent'>;
  lookup(spec: CredentialSpec): Promise<string | undefined>;
};

export type CredentialStatus = {
  name: string;
  required: boolean;
  env: string;
  env_set: boolean;
  cached_source: CredentialSource | null;
};

export interface CredentialResolver {
  resolve(name: string): Promise<Credential>;
  refresh(name?: string): Promise<void>;
  describe(): Array<CredentialStatus>;
  readonly specs: ReadonlyArray<CredentialSpec>;
}
