/**
 * Session memory types: bounded per-session conversation plus the last generated code.
 */

import type { Role } from "../adapters/llm/types";

/** Buffered message. Always plain text; cache hints are added only when exporting. */
export interface StoredMessage {
  role: Role;
  content: string;
}

/** Synthetic user/assistant exchange placed at positions 0–1 to teach the output format. */
export interface PrimingPair {
  user: string;
  assistant: string;
}

export interface BufferSnapshot {
  messages: StoredMessage[];
  examplesInjected: boolean;
}

export interface HistoryView extends BufferSnapshot {
  sessionId: string;
  hasCode: boolean;
}
