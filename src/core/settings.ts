/**
 * Startup settings, read once from the environment (and a `.env` file in the
 * working directory, whose values never override variables already set).
 *
 * Environment variables:
 *   LLM_PROVIDER       "gemini" (default), "openai", "anthropic" or "ollama"
 *   GEMINI_API_KEY     required when provider = gemini
 *   GEMINI_MODEL       default: gemini-2.0-flash
 *   OPENAI_API_KEY     required when provider = openai
 *   OPENAI_MODEL       default: gpt-4o
 *   ANTHROPIC_API_KEY  required when provider = anthropic
 *   ANTHROPIC_MODEL    default: claude-sonnet-4-6
 *   OLLAMA_HOST        default: http://localhost:11434
 *   OLLAMA_MODEL       default: llama3.2-vision
 *   LLM_TIMEOUT_MS     default: 60000
 *   MAX_PAYLOAD_BYTES  optional request size limit
 *   STRICT_FILES       "true" aborts a request on the first unreadable file
 *   LOG_LEVEL          debug | info (default) | warn | error
 */

import { resolve } from "node:path";
import * as dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "./errors";
import type { LogLevel } from "./logger";

export type ProviderName = "gemini" | "openai" | "anthropic" | "ollama";

export interface AppSettings {
  provider: ProviderName;
  /** API key for the provider; "ollama" for a local Ollama server. */
  credential: string;
  model: string;
  /** Ollama server URL, e.g. "http://localhost:11434" or a remote host */
  ollamaHost: string;
  timeoutMs: number;
  /** Upper bound for one request's content. Undefined = no limit. */
  maxPayloadBytes?: number;
  strictFiles: boolean;
  logLevel: LogLevel;
}

export const DEFAULT_MODELS: Record<ProviderName, string> = {
  gemini: "gemini-2.0-flash",
  openai: "gpt-4o",
  anthropic: "claude-sonnet-4-6",
  ollama: "llama3.2-vision",
};

/** Offered by the shell's /model command; any other id the provider knows works too. */
export const SUGGESTED_MODELS: Record<ProviderName, readonly string[]> = {
  gemini: ["gemini-2.0-flash", "gemini-2.0-flash-lite", "gemini-2.5-flash", "gemini-2.5-pro"],
  openai: ["gpt-4o", "gpt-4o-mini", "gpt-4.1"],
  anthropic: ["claude-sonnet-4-6", "claude-opus-4-1", "claude-3-5-haiku-latest"],
  ollama: ["llama3.2-vision", "llava", "qwen2.5vl"],
};

const CREDENTIAL_VARIABLES: Record<Exclude<ProviderName, "ollama">, string> = {
  gemini: "GEMINI_API_KEY",
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
};

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  LLM_PROVIDER: optionalText
    .transform((value) => value?.toLowerCase())
    .pipe(z.enum(["gemini", "openai", "anthropic", "ollama"]).default("gemini")),
  GEMINI_API_KEY: optionalText,
  GEMINI_MODEL: optionalText,
  OPENAI_API_KEY: optionalText,
  OPENAI_MODEL: optionalText,
  ANTHROPIC_API_KEY: optionalText,
  ANTHROPIC_MODEL: optionalText,
  OLLAMA_HOST: optionalText,
  OLLAMA_MODEL: optionalText,
  LLM_TIMEOUT_MS: optionalText.pipe(z.coerce.number().int().positive().default(60_000)),
  MAX_PAYLOAD_BYTES: optionalText.pipe(z.coerce.number().int().positive().optional()),
  STRICT_FILES: optionalText
    .transform((value) => value?.toLowerCase())
    .pipe(z.enum(["true", "false", "1", "0"]).default("false"))
    .transform((value) => value === "true" || value === "1"),
  LOG_LEVEL: optionalText.pipe(z.enum(["debug", "info", "warn", "error"]).default("info")),
});

type EnvInput = Record<string, string | undefined>;

/** Populate process.env from `.env` in `dir` when the file exists. */
export function loadEnvFile(dir: string = process.cwd()): void {
  const result = dotenv.config({ path: resolve(dir, ".env") });
  if (result.error && !isMissingFile(result.error)) {
    throw new ConfigurationError(`Cannot read .env: ${result.error.message}`);
  }
}

/**
 * Resolve settings from an environment map. Throws ConfigurationError when a
 * value is invalid or the chosen provider's credential is missing.
 */
export function loadSettings(env: EnvInput = process.env): AppSettings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid environment: ${problems.join("; ")}`);
  }
  const vars = parsed.data;
  const provider = vars.LLM_PROVIDER;

  const models: Record<ProviderName, string | undefined> = {
    gemini: vars.GEMINI_MODEL,
    openai: vars.OPENAI_MODEL,
    anthropic: vars.ANTHROPIC_MODEL,
    ollama: vars.OLLAMA_MODEL,
  };

  let credential: string;
  if (provider === "ollama") {
    credential = "ollama";
  } else {
    const keys: Record<Exclude<ProviderName, "ollama">, string | undefined> = {
      gemini: vars.GEMINI_API_KEY,
      openai: vars.OPENAI_API_KEY,
      anthropic: vars.ANTHROPIC_API_KEY,
    };
    const key = keys[provider];
    if (!key) {
      throw new ConfigurationError(`${CREDENTIAL_VARIABLES[provider]} is not set`);
    }
    credential = key;
  }

  return {
    provider,
    credential,
    model: models[provider] ?? DEFAULT_MODELS[provider],
    ollamaHost: vars.OLLAMA_HOST ?? "http://localhost:11434",
    timeoutMs: vars.LLM_TIMEOUT_MS,
    maxPayloadBytes: vars.MAX_PAYLOAD_BYTES,
    strictFiles: vars.STRICT_FILES,
    logLevel: vars.LOG_LEVEL,
  };
}

function isMissingFile(err: Error): boolean {
  return "code" in err && err.code === "ENOENT";
}
