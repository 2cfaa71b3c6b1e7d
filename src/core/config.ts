import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { CliConfig } from "../types/index.js";

export const DEFAULT_BASE_URL = "https://api.x.ai/v1";
export const DEFAULT_MODEL = "grok-4-0629";
export const DEFAULT_TIMEOUT_MS = 60_000;

/** Blank values (as left by `.env` templates) count as unset */
function optionalSetting<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(
    (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
    schema.optional()
  );
}

const EnvSchema = z.object({
  XAI_API_KEY: z
    .string({ required_error: "missing API key: set XAI_API_KEY in the environment or a .env file" })
    .trim()
    .min(1, "missing API key: XAI_API_KEY is empty"),
  XAI_BASE_URL: optionalSetting(z.string().url("XAI_BASE_URL must be a URL")),
  XAI_MODEL: optionalSetting(z.string().trim().min(1)),
  XAI_TIMEOUT_MS: optionalSetting(
    z.coerce
      .number({ invalid_type_error: "XAI_TIMEOUT_MS must be a number" })
      .int("XAI_TIMEOUT_MS must be an integer")
      .positive("XAI_TIMEOUT_MS must be positive")
  ),
});

/**
 * Read the CLI configuration from the environment.
 * Throws ConfigError when the API key is absent.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(issue ? issue.message : "invalid configuration");
  }

  const vars = parsed.data;
  return {
    apiKey: vars.XAI_API_KEY,
    baseUrl: (vars.XAI_BASE_URL ?? DEFAULT_BASE_URL).replace(/\/+$/, ""),
    model: vars.XAI_MODEL ?? DEFAULT_MODEL,
    timeoutMs: vars.XAI_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
  };
}

export function loadApiKey(env: NodeJS.ProcessEnv = process.env): string {
  return loadConfig(env).apiKey;
}
