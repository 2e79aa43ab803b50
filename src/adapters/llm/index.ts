/**
 * LLM gateway factory: one gateway per provider, chosen by config.
 */

import type { AppConfig } from "../../config";
import type { ILLM, ProviderId } from "./types";
import type { ModelCatalog } from "./models";
import { StubLLM } from "./stub";
import { OpenAILLM } from "./openai";
import { AnthropicLLM } from "./anthropic";

export type { ILLM, Message, ContentBlock, InvokeResult, TokenUsage, ProviderId, Role } from "./types";
export { GatewayError, PROVIDERS, ZERO_USAGE, messageText } from "./types";
export type { ModelCatalog } from "./models";
export { resolveProvider, resolveModelId, listModels } from "./models";
export { StubLLM } from "./stub";
export { OpenAILLM } from "./openai";
export { AnthropicLLM } from "./anthropic";

export type Gateways = Record<ProviderId, ILLM>;

export function modelCatalog(config: AppConfig): ModelCatalog {
  return { claude: config.llm.claude, openai: config.llm.openai };
}

/** Providers without an API key get a stub that fails every call, so routing still works. */
export function createGateways(config: AppConfig): Gateways {
  const { anthropicApiKey, anthropicBaseUrl, openaiApiKey, maxTokens, temperature, timeoutMs } = config.llm;
  const claude: ILLM = anthropicApiKey
    ? new AnthropicLLM({
        apiKey: anthropicApiKey,
        baseUrl: anthropicBaseUrl,
        catalog: config.llm.claude,
        maxTokens,
        temperature,
        timeoutMs,
      })
    : new StubLLM({ provider: "claude", failWith: "Claude provider is not configured (set ANTHROPIC_API_KEY)" });
  const openai: ILLM = openaiApiKey
    ? new OpenAILLM({ apiKey: openaiApiKey, catalog: config.llm.openai, maxTokens, temperature, timeoutMs })
    : new StubLLM({ provider: "openai", failWith: "OpenAI provider is not configured (set OPENAI_API_KEY)" });
  return { claude, openai };
}
