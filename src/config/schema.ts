// pattern: Functional Core
import { z } from "zod";

const FailureKindSchema = z.enum([
  "connection",
  "network",
  "timeout",
  "rate_limited",
  "unavailable",
  "server",
  "client",
  "cancelled",
]);

const RetryPolicySchema = z
  .object({
    max_attempts: z.number().int().positive().default(3),
    base_delay_ms: z.number().int().nonnegative().default(1000),
    multiplier: z.number().min(1).default(2),
    max_delay_ms: z.number().int().nonnegative().default(30000),
    jitter: z.number().min(0).max(1).default(0.1),
    retry_on: z
      .array(FailureKindSchema)
      .default(["connection", "network", "timeout", "rate_limited", "unavailable", "server"]),
  })
  .strict();

const RateLimitConfigSchema = z
  .object({
    capacity: z.number().positive().default(10),
    refill_per_second: z.number().positive().default(5),
    mode: z.enum(["fail_fast", "blocking"]).default("blocking"),
    max_wait_ms: z.number().int().nonnegative().default(30000),
    poll_interval_ms: z.number().int().positive().default(50),
  })
  .strict();

const ConnectorConfigSchema = z
  .object({
    base_url: z.string().url().optional(),
    timeout_ms: z.number().int().positive().default(30000),
    allow_prompt: z.boolean().default(false),
    secrets_dir: z.string().optional(),
    credentials: z.record(z.string()).default({}),
    rate_limit: RateLimitConfigSchema.default({}),
    retry: RetryPolicySchema.default({}),
  })
  .strict();

const ModelProviderNameSchema = z.enum([
  "anthropic",
  "openai",
  "openai-compat",
  "xai",
  "google",
  "ollama",
]);

const ModelConfigSchema = z
  .object({
    provider: ModelProviderNameSchema,
    name: z.string().min(1),
    api_key: z.string().optional(),
    base_url: z.string().url().optional(),
    temperature: z.number().min(0).max(2).optional(),
    max_tokens: z.number().int().positive().default(4096),
    timeout_ms: z.number().int().positive().default(120000),
    retry: RetryPolicySchema.default({}),
    rate_limit: RateLimitConfigSchema.optional(),
  })
  .strict()
  .superRefine((data, ctx) => {
    if (data.provider === "anthropic" && data.temperature !== undefined && data.temperature > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "temperature must be between 0 and 1 for anthropic",
        path: ["temperature"],
      });
    }
    if (data.provider === "openai-compat" && !data.base_url) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "base_url is required for openai-compat",
        path: ["base_url"],
      });
    }
  });

const AgentConfigSchema = z
  .object({
    max_tool_rounds: z.number().int().positive().default(20),
    parallel_tool_calls: z.boolean().default(false),
  })
  .strict();

const LoggingConfigSchema = z
  .object({
    level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  })
  .strict();

const AppConfigSchema = z
  .object({
    logging: LoggingConfigSchema.default({}),
    model: ModelConfigSchema.optional(),
    agent: AgentConfigSchema.default({}),
    connectors: z.record(ConnectorConfigSchema).default({}),
  })
  .strict();

export type FailureKindName = z.infer<typeof FailureKindSchema>;
export type RetryPolicy = z.infer<typeof RetryPolicySchema>;
export type RateLimitConfig = z.infer<typeof RateLimitConfigSchema>;
export type ConnectorConfig = z.infer<typeof ConnectorConfigSchema>;
export type ConnectorConfigInput = z.input<typeof ConnectorConfigSchema>;
export type ModelProviderName = z.infer<typeof ModelProviderNameSchema>;
export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type ModelConfigInput = z.input<typeof ModelConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

export {
  AppConfigSchema,
  AgentConfigSchema,
  ModelConfigSchema,
  ModelProviderNameSchema,
  ConnectorConfigSchema,
  RateLimitConfigSchema,
  RetryPolicySchema,
  LoggingConfigSchema,
  FailureKindSchema,
};
