// pattern: Imperative Shell

import type { ModelConfig } from "../config/schema.ts";
import { createCredentialResolver, defaultStrategies } from "../credentials/resolver.ts";
import type { CredentialResolver } from "../credentials/types.ts";
import type { Logger } from "../logging/logger.ts";

/**
 * API-key resolver for a model provider: `config.api_key` first, then the
 * provider's environment variable, then `<VAR>_FILE`.
 */
export function createModelCredentials(
  config: ModelConfig,
  key: { name: string; required: boolean },
  options: { env?: NodeJS.ProcessEnv; logger?: Logger } = {},
): CredentialResolver {
  return createCredentialResolver({
    specs: [{ name: key.name, description: `${config.provider} API key`, required: key.required }],
    strategies: defaultStrategies({ explicit: { [key.name]: config.api_key }, env: options.env }),
    env: options.env,
    logger: options.logger,
  });
}
