/**
 * Stub gateway for testing or when a provider has no API key.
 * Replies from a fixed script, or fails every call with a GatewayError when `failWith` is set.
 */

import { GatewayError, ZERO_USAGE } from "./types";
import type { ILLM, InvokeResult, Message, ProviderId, TokenUsage } from "./types";

export interface StubLlmOptions {
  provider?: ProviderId;
  /** Replies returned in order; the last one repeats. Defaults to a single empty reply. */
  replies?: string[];
  usage?: TokenUsage;
  /** When set, every call rejects with a GatewayError carrying this message. */
  failWith?: string;
}

export interface StubCall {
  messages: Message[];
  systemPrompt: string;
  modelName?: string;
}

export class StubLLM implements ILLM {
  readonly provider: ProviderId;
  /** Every invoke() argument list, for assertions. */
  readonly calls: StubCall[] = [];
  private readonly replies: string[];
  private readonly usage: TokenUsage;
  private readonly failWith?: string;

  constructor(options: StubLlmOptions = {}) {
    this.provider = options.provider ?? "claude";
    this.replies = options.replies && options.replies.length > 0 ? [...options.replies] : [""];
    this.usage = options.usage ?? { ...ZERO_USAGE };
    this.failWith = options.failWith;
  }

  async invoke(messages: Message[], systemPrompt: string, modelName?: string): Promise<InvokeResult> {
    this.calls.push({ messages, systemPrompt, modelName });
    if (this.failWith !== undefined) {
      throw new GatewayError(this.provider, this.failWith);
    }
    const text = this.replies.length > 1 ? this.replies.shift() ?? "" : this.replies[0];
    return { text, usage: { ...this.usage }, modelId: modelName ?? "stub" };
  }
}
