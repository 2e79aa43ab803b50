/**
 * OpenAI Chat Completions gateway.
 * OpenAI caches long prompt prefixes on its own, so cache markers are dropped and block content is flattened.
 */

import OpenAI from "openai";
import type { ModelCatalogConfig } from "../../config";
import { resolveModelId } from "./models";
import { GatewayError, describeError, messageText } from "./types";
import type { ILLM, InvokeResult, Message, TokenUsage } from "./types";

export interface OpenAILlmConfig {
  apiKey: string;
  catalog: ModelCatalogConfig;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

export interface OpenAIUsage {
  prompt_tokens: number;
  completion_tokens: number;
  prompt_tokens_details?: { cached_tokens?: number } | null;
}

/** OpenAI reports one cached-token figure; it counts as a cache read. */
export function normalizeOpenAIUsage(usage: OpenAIUsage | undefined): TokenUsage {
  return {
    inputTokens: usage?.prompt_tokens ?? 0,
    outputTokens: usage?.completion_tokens ?? 0,
    cacheWriteTokens: 0,
    cacheReadTokens: usage?.prompt_tokens_details?.cached_tokens ?? 0,
  };
}

export function toOpenAIMessages(messages: Message[], systemPrompt: string): OpenAI.Chat.Completions.ChatCompletionMessageParam[] {
  return [
    { role: "system", content: systemPrompt },
    ...messages.map((m): OpenAI.Chat.Completions.ChatCompletionMessageParam =>
      m.role === "user" ? { role: "user", content: messageText(m) } : { role: "assistant", content: messageText(m) }
    ),
  ];
}

/** o1-family models take max_completion_tokens and reject a temperature. */
export function isReasoningModel(modelId: string): boolean {
  return /^o\d/.test(modelId);
}

export class OpenAILLM implements ILLM {
  readonly provider = "openai" as const;
  private client: OpenAI;

  constructor(private readonly cfg: OpenAILlmConfig) {
    this.client = new OpenAI({ apiKey: cfg.apiKey, timeout: cfg.timeoutMs, maxRetries: 0 });
  }

  async invoke(messages: Message[], systemPrompt: string, modelName?: string): Promise<InvokeResult> {
    const modelId = resolveModelId(this.cfg.catalog, modelName);
    const limits = isReasoningModel(modelId)
      ? { max_completion_tokens: this.cfg.maxTokens }
      : { max_tokens: this.cfg.maxTokens, temperature: this.cfg.temperature };
    let response: OpenAI.Chat.Completions.ChatCompletion;
    try {
      response = await this.client.chat.completions.create({
        model: modelId,
        messages: toOpenAIMessages(messages, systemPrompt),
        ...limits,
        stream: false,
      });
    } catch (err) {
      throw new GatewayError(this.provider, `OpenAI API error: ${describeError(err)}`, { cause: err });
    }
    const text = response.choices[0]?.message?.content;
    if (text == null) {
      throw new GatewayError(this.provider, `OpenAI API error: response from ${modelId} had no message content`);
    }
    return { text, usage: normalizeOpenAIUsage(response.usage), modelId };
  }
}
