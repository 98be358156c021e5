// pattern: Imperative Shell

import TOML from "@iarna/toml";
import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { z } from "zod";
import { ConfigError } from "../errors/index.ts";
import { AppConfigSchema } from "./schema.ts";
import type { AppConfig } from "./schema.ts";

export function formatIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Validate a raw configuration object. Unrecognized keys are rejected.
 */
export function parseConfig(raw: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError("invalid configuration", formatIssues(result.error));
  }
  return result.data;
}

/**
 * Parse and validate against any schema, converting zod failures into ConfigError.
 * Used by factories that accept a single section of configuration.
 */
export function parseSection<S extends z.ZodTypeAny>(
  schema: S,
  raw: unknown,
  section: string,
): z.infer<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`invalid ${section} configuration`, formatIssues(result.error));
  }
  return result.data;
}

export function loadConfig(configPath?: string): AppConfig {
  const resolvedPath = resolve(configPath ?? "config.toml");
  const raw = readFileSync(resolvedPath, "utf-8");

  let parsed: Record<string, unknown>;
  try {
    parsed = TOML.parse(raw);
  } catch (error) {
    throw new ConfigError(
      `failed to parse ${resolvedPath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  // Environment variable overrides for deployment-specific settings.
  // Secrets are not read here: they resolve through each connector's credential resolver.
  const envOverrides: Record<string, unknown> = {};

  const logLevel = process.env["CONNECTOR_KIT_LOG_LEVEL"];
  if (logLevel) {
    const loggingObj = asRecord(parsed["logging"]);
    envOverrides["logging"] = { ...loggingObj, level: logLevel };
  }

  const provider = process.env["CONNECTOR_KIT_MODEL_PROVIDER"];
  const modelName = process.env["CONNECTOR_KIT_MODEL_NAME"];
  if (provider || modelName) {
    const modelObj = asRecord(parsed["model"]);
    envOverrides["model"] = {
      ...modelObj,
      ...(provider && { provider }),
      ...(modelName && { name: modelName }),
    };
  }

  const merged = { ...parsed, ...envOverrides };
  return parseConfig(merged);
}

function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}
