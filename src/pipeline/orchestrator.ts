/**
 * Orchestrator: runs one chat turn.
 * session lock -> buffer -> classify -> assemble user message -> gateway -> buffer -> parse -> normalize.
 */

import type { Gateways, InvokeResult, ModelCatalog } from "../adapters/llm";
import { GatewayError, resolveProvider } from "../adapters/llm";
import type { SessionStore } from "../memory/session-store";
import { logger, logError, logLlmCall, logTurn } from "../logging";
import { recordGatewayFailure, recordTurnMetrics } from "../metrics";
import { isModificationRequest } from "./classifier";
import { assembleUserMessage, hasStructuredContext } from "./message-assembly";
import { interpretReply } from "./response-parser";
import type { ChatRequest, ChatResponse } from "./types";
import { isCodeKind, requestTypeFor } from "./types";

export interface OrchestratorConfig {
  catalog: ModelCatalog;
  /** Friendly model name used when the request names none. */
  defaultModel: string;
}

/** System prompts come from the store's PromptManager, the same one that primes its buffers. */
export class Orchestrator {
  constructor(
    private readonly gateways: Gateways,
    private readonly store: SessionStore,
    private readonly config: OrchestratorConfig
  ) {}

  /**
   * Run one turn for request.sessionId. Turns on the same session are serialized.
   * Only a failed provider call rejects (GatewayError); every parse outcome is a ChatResponse.
   * On failure the user message stays in the buffer with no assistant reply after it.
   */
  async handleChat(request: ChatRequest): Promise<ChatResponse> {
    const { sessionId, query, context } = request;
    const modelName = request.modelName ?? this.config.defaultModel;
    const provider = resolveProvider(modelName, this.config.catalog);
    const gateway = this.gateways[provider];

    return this.store.runExclusive(sessionId, async () => {
      const turnStart = Date.now();
      logTurn(logger, "start", { sessionId, provider, modelName });

      const buffer = this.store.getBuffer(sessionId, provider);
      const previousCode = this.store.getLastGeneratedCode(sessionId);
      const hasContext = hasStructuredContext(context);
      const isModification = isModificationRequest(query, hasContext, previousCode !== undefined);

      buffer.addMessage("user", assembleUserMessage({ query, context, isModification, previousCode }));
      const messages = buffer.exportForCall();
      const { systemPrompt } = this.store.prompts.forProvider(provider);

      const llmStart = Date.now();
      let result: InvokeResult;
      try {
        result = await gateway.invoke(messages, systemPrompt, modelName);
      } catch (err) {
        recordGatewayFailure(provider);
        const gatewayErr =
          err instanceof GatewayError ? err : new GatewayError(provider, err instanceof Error ? err.message : String(err), { cause: err });
        logError(logger, gatewayErr, { event: "CHAT_REQUEST_FAILED", sessionId, provider, modelName });
        throw gatewayErr;
      }
      const llmLatencyMs = Date.now() - llmStart;
      logLlmCall(logger, {
        provider,
        modelId: result.modelId,
        messageCount: messages.length,
        responseLength: result.text.length,
        usage: result.usage,
        durationMs: llmLatencyMs,
      });

      buffer.addMessage("assistant", result.text);

      const { parsed, generationPayload } = interpretReply(result.text, query);
      if (generationPayload !== undefined) {
        this.store.setLastGeneratedCode(sessionId, generationPayload);
      }

      recordTurnMetrics({
        sessionId,
        provider,
        modelId: result.modelId,
        llmLatencyMs,
        turnLatencyMs: Date.now() - turnStart,
        responseType: parsed.kind,
        usage: result.usage,
      });
      logTurn(logger, "end", { sessionId, provider, responseType: parsed.kind, isModification });

      return {
        type: parsed.kind,
        payload: parsed,
        sessionId,
        isCodeChange: isCodeKind(parsed.kind),
        requestType: requestTypeFor(parsed.kind),
        workspaceTree: context?.workspaceTree,
        usage: result.usage,
        modelName,
        modelId: result.modelId,
        provider,
      };
    });
  }
}
