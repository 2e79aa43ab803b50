/**
 * Process-wide session store: session id -> conversation buffers (one per provider) and the last
 * generated code. Volatile by design; nothing outlives the process and nothing expires on its own.
 *
 * Turns on one session id run one at a time through runExclusive(); different sessions run
 * concurrently.
 */

import { PROVIDERS } from "../adapters/llm/types";
import type { ProviderId } from "../adapters/llm/types";
import { PromptManager } from "../prompts/prompt-manager";
import { ConversationBuffer, DEFAULT_MAX_MESSAGES } from "./conversation-buffer";
import type { HistoryView } from "./types";

export const DEFAULT_SESSION_ID = "default";

export interface SessionRecord {
  sessionId: string;
  buffers: Partial<Record<ProviderId, ConversationBuffer>>;
  /** Serialized JSON of the most recent code_generation payload. */
  lastGeneratedCode?: string;
}

export interface SessionStoreConfig {
  maxMessages?: number;
  promptManager?: PromptManager;
}

export class SessionStore {
  private readonly sessions = new Map<string, SessionRecord>();
  /** Tail of each session's turn queue; settles (never rejects) when the latest queued task does. */
  private readonly queues = new Map<string, Promise<void>>();
  private readonly maxMessages: number;
  /** Templates for priming buffers; the orchestrator takes its system prompts from here too. */
  readonly prompts: PromptManager;

  constructor(config: SessionStoreConfig = {}) {
    this.maxMessages = config.maxMessages ?? DEFAULT_MAX_MESSAGES;
    this.prompts = config.promptManager ?? new PromptManager();
  }

  /**
   * Run `task` after every task queued earlier for the same session has settled.
   * The task's own result or rejection goes to the caller; the queue only tracks ordering.
   */
  async runExclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(sessionId) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(sessionId, tail);
    try {
      return await result;
    } finally {
      if (this.queues.get(sessionId) === tail) this.queues.delete(sessionId);
    }
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  private record(sessionId: string): SessionRecord {
    let rec = this.sessions.get(sessionId);
    if (!rec) {
      rec = { sessionId, buffers: {} };
      this.sessions.set(sessionId, rec);
    }
    return rec;
  }

  /** Buffer for this session and provider, created and primed on first use. */
  getBuffer(sessionId: string, provider: ProviderId): ConversationBuffer {
    const rec = this.record(sessionId);
    let buffer = rec.buffers[provider];
    if (!buffer) {
      buffer = new ConversationBuffer({
        maxMessages: this.maxMessages,
        primingPair: this.prompts.forProvider(provider).primingPair,
      });
      rec.buffers[provider] = buffer;
    }
    buffer.injectExamples();
    return buffer;
  }

  getLastGeneratedCode(sessionId: string): string | undefined {
    return this.sessions.get(sessionId)?.lastGeneratedCode;
  }

  setLastGeneratedCode(sessionId: string, code: string): void {
    this.record(sessionId).lastGeneratedCode = code;
  }

  getHistory(sessionId: string, provider: ProviderId): HistoryView {
    const rec = this.sessions.get(sessionId);
    const snapshot = rec?.buffers[provider]?.snapshot() ?? { messages: [], examplesInjected: false };
    return {
      sessionId,
      ...snapshot,
      hasCode: rec?.lastGeneratedCode !== undefined,
    };
  }

  /** Drop all state for the session. Unknown ids are fine; waits for an in-flight turn on the same id. */
  async reset(sessionId: string): Promise<void> {
    await this.runExclusive(sessionId, async () => {
      this.sessions.delete(sessionId);
    });
  }

  stats(): { sessions: number; byProvider: Record<ProviderId, number> } {
    const byProvider: Record<ProviderId, number> = { claude: 0, openai: 0 };
    for (const rec of this.sessions.values()) {
      for (const provider of PROVIDERS) {
        if (rec.buffers[provider]) byProvider[provider]++;
      }
    }
    return { sessions: this.sessions.size, byProvider };
  }
}
