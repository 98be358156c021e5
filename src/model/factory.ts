// pattern: Imperative Shell

import { parseSection } from "../config/config.ts";
import { ModelConfigSchema } from "../config/schema.ts";
import type { ModelConfigInput, ModelProviderName } from "../config/schema.ts";
import type { CredentialResolver } from "../credentials/types.ts";
import type { Logger } from "../logging/logger.ts";
import { createTokenBucket } from "../ratelimit/token-bucket.ts";
import type { RateLimiter } from "../ratelimit/types.ts";
import type { Clock } from "../timing/clock.ts";
import { createAnthropicAdapter } from "./anthropic.ts";
import type { AnthropicMessagesCreate } from "./anthropic.ts";
import { createOpenAICompatAdapter } from "./openai-compat.ts";
import type { OpenAIChatCreate } from "./openai-compat.ts";
import type { ModelProvider } from "./types.ts";

type OpenAIPreset = {
  api_key_credential: string;
  api_key_required: boolean;
  default_base_url?: string;
};

/**
 * Providers served through the OpenAI-compatible adapter, with the endpoint and
 * key variable each one uses when the config does not say otherwise.
 */
export const OPENAI_COMPATIBLE_PRESETS: Readonly<Record<Exclude<ModelProviderName, "anthropic">, OpenAIPreset>> = {
  openai: { api_key_credential: "OPENAI_API_KEY", api_key_required: true },
  "openai-compat": { api_key_credential: "OPENAI_API_KEY", api_key_required: false },
  xai: { api_key_credential: "XAI_API_KEY", api_key_required: true, default_base_url: "https://api.x.ai/v1" },
  google: {
    api_key_credential: "GOOGLE_API_KEY",
    api_key_required: true,
    default_base_url: "https://generativelanguage.googleapis.com/v1beta/openai/",
  },
  ollama: { api_key_credential: "OLLAMA_API_KEY", api_key_required: false, default_base_url: "http://localhost:11434/v1" },
};

export type ModelProviderOptions = {
  credentials?: CredentialResolver;
  limiter?: RateLimiter;
  env?: NodeJS.ProcessEnv;
  clock?: Clock;
  random?: () => number;
  logger?: Logger;
  /** Replace the SDK calls; used by tests. */
  anthropic_create?: AnthropicMessagesCreate;
  openai_create?: OpenAIChatCreate;
};

/**
 * Build the provider named by `config.provider`. Unrecognized options are rejected.
 */
export function createModelProvider(rawConfig: ModelConfigInput, options: ModelProviderOptions = {}): ModelProvider {
  const config = parseSection(ModelConfigSchema, rawConfig, "model");
  const limiter = options.limiter
    ?? (config.rate_limit ? createTokenBucket({ ...config.rate_limit, clock: options.clock, logger: options.logger }) : undefined);

  const shared = {
    credentials: options.credentials,
    limiter,
    env: options.env,
    clock: options.clock,
    random: options.random,
    logger: options.logger,
  };

  if (config.provider === "anthropic") {
    return createAnthropicAdapter(config, { ...shared, create: options.anthropic_create });
  }

  const preset = OPENAI_COMPATIBLE_PRESETS[config.provider];
  return createOpenAICompatAdapter(config, {
    ...shared,
    ...preset,
    name: config.provider,
    create: options.openai_create,
  });
}
