import pino from "pino";
import { z } from "zod";
import type { ProviderConfig } from "../providers/llm-provider.js";
import { ConfigError } from "./errors.js";

const logger = pino({ name: "config" });

export const DEFAULT_MODEL = "gpt-3.5-turbo";
export const MOCK_API_KEY = "mock-api-key";

// Blank values count as unset.
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: optionalString,
  MOCK_LLM: optionalString.transform((value) => value?.toLowerCase() === "true"),
  HOST: optionalString.transform((value) => value ?? "127.0.0.1"),
  PORT: optionalString
    .transform((value) => value ?? "8080")
    .pipe(z.string().regex(/^\d+$/, "must be a port number"))
    .transform((value) => parseInt(value, 10))
    .pipe(z.number().int().min(0).max(65535)),
  LOG_LEVEL: optionalString.pipe(
    z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  ),
});

export type LogLevel = z.output<typeof EnvSchema>["LOG_LEVEL"];

export interface AppConfig {
  readonly provider: Readonly<ProviderConfig>;
  readonly host: string;
  readonly port: number;
  readonly logLevel: LogLevel;
}

/**
 * Read service configuration from the environment.
 * Throws ConfigError when the environment cannot produce a usable provider.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join("; ")}`);
  }

  const vars = result.data;
  const mockMode = vars.MOCK_LLM;

  let apiKey = vars.OPENAI_API_KEY;
  if (!apiKey) {
    if (!mockMode) {
      throw new ConfigError("OPENAI_API_KEY is not set and MOCK_LLM is not enabled.");
    }
    logger.info("MOCK_LLM is enabled, using placeholder API key");
    apiKey = MOCK_API_KEY;
  }

  const model = vars.OPENAI_MODEL ?? DEFAULT_MODEL;
  if (!vars.OPENAI_MODEL) {
    logger.info({ model }, "OPENAI_MODEL not set, using default");
  }

  return Object.freeze({
    provider: Object.freeze({ apiKey, model, mockMode }),
    host: vars.HOST,
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
  });
}
