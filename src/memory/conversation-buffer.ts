/**
 * In-memory conversation buffer: bounded history with a pinned priming pair.
 *
 * Trimming keeps the priming pair at positions 0–1 and makes sure the replayed conversation after
 * it starts with a user turn. Export marks the last message before the three most recent ones as
 * cache-eligible; provider caching is prefix-based, so one marker covers everything before it.
 */

import type { Message, Role } from "../adapters/llm/types";
import type { BufferSnapshot, PrimingPair, StoredMessage } from "./types";

export const DEFAULT_MAX_MESSAGES = 20;
/** Buffers this small are exported as-is. */
export const EXPORT_VERBATIM_THRESHOLD = 3;
/** Most recent messages that are never marked. */
export const RECENT_SUFFIX_SIZE = 3;

export interface ConversationBufferConfig {
  /** Max messages retained, priming pair included. At least 3. */
  maxMessages?: number;
  primingPair: PrimingPair;
}

export class ConversationBuffer {
  private messages: StoredMessage[] = [];
  private injected = false;
  readonly capacity: number;
  private readonly primingPair: PrimingPair;

  constructor(config: ConversationBufferConfig) {
    const capacity = config.maxMessages ?? DEFAULT_MAX_MESSAGES;
    if (!Number.isInteger(capacity) || capacity < 3) {
      throw new RangeError(`ConversationBuffer capacity must be an integer >= 3, got ${capacity}`);
    }
    this.capacity = capacity;
    this.primingPair = config.primingPair;
  }

  get examplesInjected(): boolean {
    return this.injected;
  }

  get size(): number {
    return this.messages.length;
  }

  /** Seed positions 0–1 with the priming pair; only on an empty buffer that was never primed. */
  injectExamples(): void {
    if (this.injected || this.messages.length > 0) return;
    this.messages = [
      { role: "user", content: this.primingPair.user },
      { role: "assistant", content: this.primingPair.assistant },
    ];
    this.injected = true;
  }

  /** Append verbatim, then trim. */
  addMessage(role: Role, content: string): void {
    if (role !== "user" && role !== "assistant") {
      throw new Error(`ConversationBuffer: unsupported role "${String(role)}"`);
    }
    this.messages.push({ role, content });
    this.trim();
  }

  private trim(): void {
    if (this.messages.length <= this.capacity) return;
    if (!this.injected) {
      this.messages = this.messages.slice(this.messages.length - this.capacity);
      return;
    }
    const keep = this.capacity - 2;
    const pair = this.messages.slice(0, 2);
    const recent = this.messages.slice(this.messages.length - keep);
    this.messages = [...pair, ...recent];
    // Replay after the pair must open with a user turn; this can cost one turn of context.
    if (this.messages.length > 2 && this.messages[2].role !== "user") {
      this.messages.splice(2, 1);
    }
  }

  /** Messages for the provider call, with the cache boundary marked. */
  exportForCall(): Message[] {
    const plain = (m: StoredMessage): Message => ({ role: m.role, content: m.content });
    if (this.messages.length <= EXPORT_VERBATIM_THRESHOLD) {
      return this.messages.map(plain);
    }

    const prefix = this.injected ? this.messages.slice(0, 2) : [];
    const conversation = this.injected ? this.messages.slice(2) : this.messages;
    if (conversation.length <= RECENT_SUFFIX_SIZE) {
      return this.messages.map(plain);
    }

    const older = conversation.slice(0, conversation.length - RECENT_SUFFIX_SIZE);
    const recent = conversation.slice(conversation.length - RECENT_SUFFIX_SIZE);
    const boundary = older.length - 1;
    return [
      ...prefix.map(plain),
      ...older.map((m, i): Message =>
        i === boundary ? { role: m.role, content: [{ type: "text", text: m.content, cacheEligible: true }] } : plain(m)
      ),
      ...recent.map(plain),
    ];
  }

  snapshot(): BufferSnapshot {
    return {
      messages: this.messages.map((m) => ({ ...m })),
      examplesInjected: this.injected,
    };
  }

  clear(): void {
    this.messages = [];
    this.injected = false;
  }
}
