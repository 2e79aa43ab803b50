/**
 * LLM gateway types.
 * Implementations can be swapped via config (Claude, OpenAI, stub).
 */

export type ProviderId = "claude" | "openai";

export const PROVIDERS: readonly ProviderId[] = ["claude", "openai"];

export type Role = "user" | "assistant";

/** Text block of an exported message; `cacheEligible` marks the end of a stable, reusable prefix. */
export interface ContentBlock {
  type: "text";
  text: string;
  cacheEligible?: boolean;
}

/** Message as handed to a provider. Stored history is always plain text; blocks only appear on export. */
export interface Message {
  role: Role;
  content: string | ContentBlock[];
}

/** Token usage in one shape for every provider; unreported figures are 0. */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  cacheWriteTokens: number;
  cacheReadTokens: number;
}

export interface InvokeResult {
  /** Full text of the assistant reply. */
  text: string;
  usage: TokenUsage;
  /** Provider model id the friendly name resolved to. */
  modelId: string;
}

/**
 * Gateway interface: system prompt + messages in, assistant reply and usage out.
 * Any failure of the remote call rejects with GatewayError.
 */
export interface ILLM {
  readonly provider: ProviderId;
  /**
   * @param messages - Conversation as exported by the buffer (no system message).
   * @param systemPrompt - Sent out-of-band, never stored in history.
   * @param modelName - Friendly model name; unknown or missing names resolve to the provider default.
   */
  invoke(messages: Message[], systemPrompt: string, modelName?: string): Promise<InvokeResult>;
}

export const ZERO_USAGE: Readonly<TokenUsage> = {
  inputTokens: 0,
  outputTokens: 0,
  cacheWriteTokens: 0,
  cacheReadTokens: 0,
};

/** The remote provider call did not succeed (network, auth, quota, malformed provider response). */
export class GatewayError extends Error {
  readonly provider: ProviderId;

  constructor(provider: ProviderId, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GatewayError";
    this.provider = provider;
  }
}

/** Plain text of a message, whichever form its content takes. */
export function messageText(message: Message): string {
  if (typeof message.content === "string") return message.content;
  return message.content.map((b) => b.text).join("");
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
