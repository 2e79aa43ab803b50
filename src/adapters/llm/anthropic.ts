/**
 * Anthropic Claude gateway.
 * Sends the system prompt as one cached block and turns cache-eligible message blocks into
 * `cache_control: ephemeral` breakpoints.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { ModelCatalogConfig } from "../../config";
import { resolveModelId } from "./models";
import { GatewayError, describeError } from "./types";
import type { ILLM, InvokeResult, Message, TokenUsage } from "./types";

export interface AnthropicLlmConfig {
  apiKey: string;
  baseUrl?: string;
  catalog: ModelCatalogConfig;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

/** Usage fields as Anthropic reports them; the cache figures are null on models without caching. */
export interface AnthropicUsage {
  input_tokens: number;
  output_tokens: number;
  cache_creation_input_tokens?: number | null;
  cache_read_input_tokens?: number | null;
}

export function normalizeAnthropicUsage(usage: AnthropicUsage | undefined): TokenUsage {
  return {
    inputTokens: usage?.input_tokens ?? 0,
    outputTokens: usage?.output_tokens ?? 0,
    cacheWriteTokens: usage?.cache_creation_input_tokens ?? 0,
    cacheReadTokens: usage?.cache_read_input_tokens ?? 0,
  };
}

export function toAnthropicMessages(messages: Message[]): Anthropic.MessageParam[] {
  return messages.map((m): Anthropic.MessageParam => {
    if (typeof m.content === "string") return { role: m.role, content: m.content };
    const blocks: Anthropic.TextBlockParam[] = m.content.map((b): Anthropic.TextBlockParam =>
      b.cacheEligible ? { type: "text", text: b.text, cache_control: { type: "ephemeral" } } : { type: "text", text: b.text }
    );
    return { role: m.role, content: blocks };
  });
}

export class AnthropicLLM implements ILLM {
  readonly provider = "claude" as const;
  private client: Anthropic;

  constructor(private readonly cfg: AnthropicLlmConfig) {
    this.client = new Anthropic({
      apiKey: cfg.apiKey,
      baseURL: cfg.baseUrl,
      timeout: cfg.timeoutMs,
      maxRetries: 0,
    });
  }

  async invoke(messages: Message[], systemPrompt: string, modelName?: string): Promise<InvokeResult> {
    const modelId = resolveModelId(this.cfg.catalog, modelName);
    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create({
        model: modelId,
        max_tokens: this.cfg.maxTokens,
        temperature: this.cfg.temperature,
        system: [{ type: "text", text: systemPrompt, cache_control: { type: "ephemeral" } }],
        messages: toAnthropicMessages(messages),
      });
    } catch (err) {
      throw new GatewayError(this.provider, `Claude API error: ${describeError(err)}`, { cause: err });
    }
    const textBlock = response.content.find((b) => b.type === "text");
    if (!textBlock || textBlock.type !== "text") {
      throw new GatewayError(this.provider, `Claude API error: response from ${modelId} had no text content`);
    }
    return { text: textBlock.text, usage: normalizeAnthropicUsage(response.usage), modelId };
  }
}
