// pattern: Functional Core

export type {
  AppConfig,
  AgentConfig,
  ModelConfig,
  ModelConfigInput,
  ModelProviderName,
  ConnectorConfig,
  ConnectorConfigInput,
  RateLimitConfig,
  RetryPolicy,
  LoggingConfig,
} from "./schema.ts";

export {
  AppConfigSchema,
  AgentConfigSchema,
  ModelConfigSchema,
  ConnectorConfigSchema,
  RateLimitConfigSchema,
  RetryPolicySchema,
  LoggingConfigSchema,
} from "./schema.ts";

export { loadConfig, parseConfig, parseSection } from "./config.ts";
