/**
 * Unit tests for LLM adapters: stub, factory, routing, provider message and usage mapping.
 */

import {
  AnthropicLLM,
  GatewayError,
  OpenAILLM,
  StubLLM,
  createGateways,
  listModels,
  messageText,
  modelCatalog,
  resolveModelId,
  resolveProvider,
} from "../../../src/adapters/llm";
import type { Message } from "../../../src/adapters/llm";
import { normalizeAnthropicUsage, toAnthropicMessages } from "../../../src/adapters/llm/anthropic";
import { isReasoningModel, normalizeOpenAIUsage, toOpenAIMessages } from "../../../src/adapters/llm/openai";
import { DEFAULT_CLAUDE_MODEL_IDS, DEFAULT_OPENAI_MODEL_IDS } from "../../../src/config";
import type { AppConfig } from "../../../src/config";

function makeConfig(keys: { anthropic?: string; openai?: string } = {}): AppConfig {
  return {
    server: { host: "127.0.0.1", port: 0 },
    llm: {
      anthropicApiKey: keys.anthropic,
      openaiApiKey: keys.openai,
      claude: { modelIds: { ...DEFAULT_CLAUDE_MODEL_IDS }, defaultModel: "claude-sonnet-4-5" },
      openai: { modelIds: { ...DEFAULT_OPENAI_MODEL_IDS }, defaultModel: "gpt-4o" },
      defaultModel: "claude-sonnet-4-5",
      maxTokens: 4096,
      temperature: 0.3,
      timeoutMs: 1000,
    },
    session: { maxMessages: 20 },
  };
}

const MARKED: Message[] = [
  { role: "user", content: "first" },
  { role: "assistant", content: [{ type: "text", text: "cached", cacheEligible: true }] },
  { role: "user", content: "latest" },
];

describe("StubLLM", () => {
  it("returns scripted replies in order and repeats the last", async () => {
    const llm = new StubLLM({ replies: ["one", "two"] });
    expect((await llm.invoke([], "sys")).text).toBe("one");
    expect((await llm.invoke([], "sys")).text).toBe("two");
    expect((await llm.invoke([], "sys", "gpt-4o")).text).toBe("two");
    expect(llm.calls).toHaveLength(3);
    expect(llm.calls[2].modelName).toBe("gpt-4o");
  });

  it("returns an empty reply by default", async () => {
    const result = await new StubLLM().invoke([{ role: "user", content: "Hello" }], "sys");
    expect(result).toEqual({
      text: "",
      usage: { inputTokens: 0, outputTokens: 0, cacheWriteTokens: 0, cacheReadTokens: 0 },
      modelId: "stub",
    });
  });

  it("fails every call with failWith", async () => {
    const llm = new StubLLM({ provider: "openai", failWith: "offline" });
    const failure = llm.invoke([], "sys");
    await expect(failure).rejects.toBeInstanceOf(GatewayError);
    await expect(failure).rejects.toMatchObject({ provider: "openai", message: "offline" });
  });
});

describe("createGateways", () => {
  it("returns failing stubs for providers without a key", async () => {
    const gateways = createGateways(makeConfig());
    expect(gateways.claude).toBeInstanceOf(StubLLM);
    expect(gateways.openai).toBeInstanceOf(StubLLM);
    await expect(gateways.claude.invoke([], "sys")).rejects.toThrow(
      "Claude provider is not configured (set ANTHROPIC_API_KEY)"
    );
    await expect(gateways.openai.invoke([], "sys")).rejects.toThrow("OpenAI provider is not configured (set OPENAI_API_KEY)");
  });

  it("builds SDK-backed gateways when keys are set", () => {
    const gateways = createGateways(makeConfig({ anthropic: "test-secret", openai: "test-secret" }));
    expect(gateways.claude).toBeInstanceOf(AnthropicLLM);
    expect(gateways.openai).toBeInstanceOf(OpenAILLM);
    expect(gateways.claude.provider).toBe("claude");
    expect(gateways.openai.provider).toBe("openai");
  });
});

describe("model routing", () => {
  const catalog = modelCatalog(makeConfig());

  it("picks the provider by catalogue membership, Claude otherwise", () => {
    expect(resolveProvider("claude-sonnet-4", catalog)).toBe("claude");
    expect(resolveProvider("gpt-4o-mini", catalog)).toBe("openai");
    expect(resolveProvider("o1", catalog)).toBe("openai");
    expect(resolveProvider("llama-3", catalog)).toBe("claude");
    expect(resolveProvider("toString", catalog)).toBe("claude");
  });

  it("resolves friendly names to model ids with a provider default", () => {
    expect(resolveModelId(catalog.claude, "claude-3-7-sonnet")).toBe("claude-3-7-sonnet-20250219");
    expect(resolveModelId(catalog.claude)).toBe("claude-sonnet-4-5-20250929");
    expect(resolveModelId(catalog.openai, "unknown")).toBe("gpt-4o-2024-11-20");
  });

  it("lists models per provider", () => {
    expect(listModels(catalog)).toEqual({
      claude: ["claude-3-5-sonnet", "claude-3-7-sonnet", "claude-sonnet-4", "claude-sonnet-4-5"],
      openai: ["gpt-4o", "gpt-4o-mini", "o1", "o1-mini"],
      defaultClaude: "claude-sonnet-4-5",
      defaultOpenai: "gpt-4o",
    });
  });
});

describe("Anthropic mapping", () => {
  it("turns cache-eligible blocks into ephemeral breakpoints", () => {
    expect(toAnthropicMessages(MARKED)).toEqual([
      { role: "user", content: "first" },
      { role: "assistant", content: [{ type: "text", text: "cached", cache_control: { type: "ephemeral" } }] },
      { role: "user", content: "latest" },
    ]);
  });

  it("normalizes usage with missing cache figures as zero", () => {
    expect(
      normalizeAnthropicUsage({
        input_tokens: 10,
        output_tokens: 5,
        cache_creation_input_tokens: null,
        cache_read_input_tokens: 900,
      })
    ).toEqual({ inputTokens: 10, outputTokens: 5, cacheWriteTokens: 0, cacheReadTokens: 900 });
    expect(normalizeAnthropicUsage(undefined)).toEqual({
      inputTokens: 0,
      outputTokens: 0,
      cacheWriteTokens: 0,
      cacheReadTokens: 0,
    });
  });
});

describe("OpenAI mapping", () => {
  it("prepends the system prompt and flattens blocks", () => {
    expect(toOpenAIMessages(MARKED, "sys")).toEqual([
      { role: "system", content: "sys" },
      { role: "user", content: "first" },
      { role: "assistant", content: "cached" },
      { role: "user", content: "latest" },
    ]);
    expect(messageText(MARKED[1])).toBe("cached");
  });

  it("counts cached prompt tokens as cache reads", () => {
    expect(
      normalizeOpenAIUsage({ prompt_tokens: 2000, completion_tokens: 30, prompt_tokens_details: { cached_tokens: 1536 } })
    ).toEqual({ inputTokens: 2000, outputTokens: 30, cacheWriteTokens: 0, cacheReadTokens: 1536 });
  });

  it("detects reasoning models by id", () => {
    expect(isReasoningModel("o1-2024-12-17")).toBe(true);
    expect(isReasoningModel("o1-mini-2024-09-12")).toBe(true);
    expect(isReasoningModel("gpt-4o-2024-11-20")).toBe(false);
  });
});
