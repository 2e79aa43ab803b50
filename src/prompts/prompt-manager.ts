import type { ProviderId } from "../adapters/llm/types";
import type { PrimingPair } from "../memory/types";
import { CLAUDE_PRIMING_PAIR, CLAUDE_SYSTEM_PROMPT } from "./claude";
import { OPENAI_PRIMING_PAIR, OPENAI_SYSTEM_PROMPT } from "./openai";

export interface PromptTemplates {
  systemPrompt: string;
  primingPair: PrimingPair;
}

export type PromptManagerConfig = Partial<Record<ProviderId, Partial<PromptTemplates>>>;

const DEFAULT_TEMPLATES: Record<ProviderId, PromptTemplates> = {
  claude: { systemPrompt: CLAUDE_SYSTEM_PROMPT, primingPair: CLAUDE_PRIMING_PAIR },
  openai: { systemPrompt: OPENAI_SYSTEM_PROMPT, primingPair: OPENAI_PRIMING_PAIR },
};

/**
 * PromptManager
 *
 * Centralizes which system prompt and priming pair each provider gets, so wording can evolve
 * per provider without touching the orchestrator or the buffers.
 */
export class PromptManager {
  private readonly templates: Record<ProviderId, PromptTemplates>;

  constructor(cfg: PromptManagerConfig = {}) {
    this.templates = {
      claude: { ...DEFAULT_TEMPLATES.claude, ...cfg.claude },
      openai: { ...DEFAULT_TEMPLATES.openai, ...cfg.openai },
    };
  }

  forProvider(provider: ProviderId): PromptTemplates {
    return this.templates[provider];
  }
}
