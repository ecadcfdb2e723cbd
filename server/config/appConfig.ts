/**
 * Application Configuration
 *
 * Parses environment variables once, at startup, into an explicit config
 * object that is handed to the components that need it. Nothing below the
 * entry points reads process.env directly.
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { VOCABULARY_CONSTANTS } from "./constants";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = typeof LOG_LEVELS[number];

const envSchema = z.object({
  DATABASE_URL: z.string().min(1, "DATABASE_URL is not set"),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),

  LLM_BASE_URL: z.string().url().default("http://localhost:11434/v1"),
  LLM_API_KEY: z.string().min(1).default("ollama"),
  LLM_MODEL: z.string().min(1).default("phi3:latest"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  VOCABULARY_TTL_MS: z.coerce.number().int().positive().default(VOCABULARY_CONSTANTS.TTL_MS),

  FR_BASE_URL: z.string().url().default("https://www.federalregister.gov"),
  FR_PER_PAGE: z.coerce.number().int().min(1).max(1000).default(100),
  FR_MAX_WORKERS: z.coerce.number().int().min(1).max(32).default(8),
  FR_DAYS_BACK: z.coerce.number().int().min(1).default(30),
});

export type LLMConfig = {
  baseUrl: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
};

export type FederalRegisterConfig = {
  baseUrl: string;
  perPage: number;
  maxWorkers: number;
  daysBack: number;
};

export type AppConfig = {
  databaseUrl: string;
  port: number;
  nodeEnv: "development" | "production" | "test";
  logLevel: LogLevel;
  vocabularyTtlMs: number;
  llm: LLMConfig;
  federalRegister: FederalRegisterConfig;
};

/**
 * Build the application config from an environment map.
 *
 * Empty strings are treated as unset so that a blank line in .env falls back
 * to the default instead of failing validation.
 *
 * @throws Error listing every invalid or missing variable
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value.trim();
    }
  }

  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    throw new Error(`Invalid environment configuration: ${fromZodError(result.error).message}`);
  }

  const parsed = result.data;
  return {
    databaseUrl: parsed.DATABASE_URL,
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    vocabularyTtlMs: parsed.VOCABULARY_TTL_MS,
    llm: {
      baseUrl: parsed.LLM_BASE_URL,
      apiKey: parsed.LLM_API_KEY,
      model: parsed.LLM_MODEL,
      timeoutMs: parsed.LLM_TIMEOUT_MS,
    },
    federalRegister: {
      baseUrl: parsed.FR_BASE_URL.replace(/\/+$/, ""),
      perPage: parsed.FR_PER_PAGE,
      maxWorkers: parsed.FR_MAX_WORKERS,
      daysBack: parsed.FR_DAYS_BACK,
    },
  };
}
