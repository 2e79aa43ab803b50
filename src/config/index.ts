/**
 * Env-based configuration for the code assistant gateway.
 * Load from .env.local, then .env (or process.env). Do not commit secrets.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";

// dotenv never overrides a variable that is already set, so .env.local wins over .env
loadEnv({ path: path.resolve(process.cwd(), ".env.local") });
loadEnv({ path: path.resolve(process.cwd(), ".env") });

export const DEFAULT_CLAUDE_MODEL_IDS: Readonly<Record<string, string>> = {
  "claude-3-5-sonnet": "claude-3-5-sonnet-20241022",
  "claude-3-7-sonnet": "claude-3-7-sonnet-20250219",
  "claude-sonnet-4": "claude-sonnet-4-20250514",
  "claude-sonnet-4-5": "claude-sonnet-4-5-20250929",
};

export const DEFAULT_OPENAI_MODEL_IDS: Readonly<Record<string, string>> = {
  "gpt-4o": "gpt-4o-2024-11-20",
  "gpt-4o-mini": "gpt-4o-mini-2024-07-18",
  o1: "o1-2024-12-17",
  "o1-mini": "o1-mini-2024-09-12",
};

export interface ModelCatalogConfig {
  /** Friendly name -> provider model id. */
  modelIds: Record<string, string>;
  /** Friendly name used when a request names no model, or one this provider does not know. */
  defaultModel: string;
}

export interface AppConfig {
  server: {
    host: string;
    port: number;
  };

  /** LLM providers and call options */
  llm: {
    anthropicApiKey?: string;
    /** Optional proxy or gateway in front of the Anthropic API. */
    anthropicBaseUrl?: string;
    openaiApiKey?: string;
    claude: ModelCatalogConfig;
    openai: ModelCatalogConfig;
    /** Model used when the request does not name one. */
    defaultModel: string;
    maxTokens: number;
    temperature: number;
    /** Passed to the provider SDK; the gateway itself does not time out calls. */
    timeoutMs: number;
  };

  session: {
    /** Max messages retained per conversation buffer (priming pair included). */
    maxMessages: number;
  };
}

function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  if (v === undefined || v === "") return defaultValue;
  return v.trim();
}

function getIntEnv(key: string, defaultValue: number, min = 0): number {
  const v = getEnv(key);
  if (v === undefined) return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) || n < min ? defaultValue : n;
}

function getFloatEnv(key: string, defaultValue: number): number {
  const v = getEnv(key);
  if (v === undefined) return defaultValue;
  const n = parseFloat(v);
  return Number.isFinite(n) ? n : defaultValue;
}

function pickDefault(requested: string | undefined, modelIds: Record<string, string>, fallback: string): string {
  return requested !== undefined && requested in modelIds ? requested : fallback;
}

/**
 * Build config from environment variables.
 * Claude model ids can be overridden per friendly name (CLAUDE_SONNET_4_5_ID etc.), e.g. to point at
 * a pinned snapshot or a regional deployment.
 */
export function loadConfig(): AppConfig {
  const claudeModelIds: Record<string, string> = {
    "claude-3-5-sonnet": getEnv("CLAUDE_3_5_SONNET_ID", DEFAULT_CLAUDE_MODEL_IDS["claude-3-5-sonnet"]) ?? "",
    "claude-3-7-sonnet": getEnv("CLAUDE_3_7_SONNET_ID", DEFAULT_CLAUDE_MODEL_IDS["claude-3-7-sonnet"]) ?? "",
    "claude-sonnet-4": getEnv("CLAUDE_SONNET_4_ID", DEFAULT_CLAUDE_MODEL_IDS["claude-sonnet-4"]) ?? "",
    "claude-sonnet-4-5": getEnv("CLAUDE_SONNET_4_5_ID", DEFAULT_CLAUDE_MODEL_IDS["claude-sonnet-4-5"]) ?? "",
  };
  const openaiModelIds: Record<string, string> = { ...DEFAULT_OPENAI_MODEL_IDS };

  const claudeDefault = pickDefault(getEnv("DEFAULT_CLAUDE_MODEL"), claudeModelIds, "claude-sonnet-4-5");
  const openaiDefault = pickDefault(getEnv("DEFAULT_OPENAI_MODEL"), openaiModelIds, "gpt-4o");

  return {
    server: {
      host: getEnv("HOST") || "0.0.0.0",
      port: getIntEnv("PORT", 5000),
    },
    llm: {
      anthropicApiKey: getEnv("ANTHROPIC_API_KEY"),
      anthropicBaseUrl: getEnv("ANTHROPIC_BASE_URL"),
      openaiApiKey: getEnv("OPENAI_API_KEY"),
      claude: { modelIds: claudeModelIds, defaultModel: claudeDefault },
      openai: { modelIds: openaiModelIds, defaultModel: openaiDefault },
      defaultModel: getEnv("DEFAULT_MODEL") || claudeDefault,
      maxTokens: getIntEnv("LLM_MAX_TOKENS", 4096, 1),
      temperature: getFloatEnv("LLM_TEMPERATURE", 0.3),
      timeoutMs: getIntEnv("LLM_TIMEOUT_MS", 120_000, 1000),
    },
    session: {
      maxMessages: getIntEnv("MAX_MESSAGES", 20, 3),
    },
  };
}
