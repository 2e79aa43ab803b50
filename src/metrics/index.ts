/**
 * High-signal metrics for production.
 * Turn latency and token usage are logged; running totals per provider are exposed on /health.
 */

import { logger } from "../logging";
import type { ProviderId, TokenUsage } from "../adapters/llm/types";
import type { ResponseKind } from "../pipeline/types";

/** Last turn timing and usage. */
export interface TurnMetrics {
  sessionId?: string;
  provider?: ProviderId;
  modelId?: string;
  llmLatencyMs?: number;
  /** Whole turn: lock acquired to response built. */
  turnLatencyMs?: number;
  responseType?: ResponseKind;
  usage?: TokenUsage;
}

/** Running totals for one provider since process start. */
export interface ProviderTotals {
  turns: number;
  failures: number;
  inputTokens: number;
  outputTokens: number;
  cacheWriteTokens: number;
  cacheReadTokens: number;
}

function emptyTotals(): ProviderTotals {
  return { turns: 0, failures: 0, inputTokens: 0, outputTokens: 0, cacheWriteTokens: 0, cacheReadTokens: 0 };
}

let lastTurnMetrics: TurnMetrics = {};
const totals = new Map<ProviderId, ProviderTotals>();

function totalsFor(provider: ProviderId): ProviderTotals {
  let t = totals.get(provider);
  if (!t) {
    t = emptyTotals();
    totals.set(provider, t);
  }
  return t;
}

export function recordTurnMetrics(metrics: TurnMetrics): void {
  lastTurnMetrics = { ...metrics };
  if (metrics.provider) {
    const t = totalsFor(metrics.provider);
    t.turns++;
    if (metrics.usage) {
      t.inputTokens += metrics.usage.inputTokens;
      t.outputTokens += metrics.usage.outputTokens;
      t.cacheWriteTokens += metrics.usage.cacheWriteTokens;
      t.cacheReadTokens += metrics.usage.cacheReadTokens;
    }
  }
  logger.info(
    {
      event: "TURN_METRICS",
      session_id: metrics.sessionId,
      provider: metrics.provider,
      model_id: metrics.modelId,
      llm_latency_ms: metrics.llmLatencyMs,
      turn_latency_ms: metrics.turnLatencyMs,
      response_type: metrics.responseType,
      input_tokens: metrics.usage?.inputTokens,
      output_tokens: metrics.usage?.outputTokens,
      cache_write_tokens: metrics.usage?.cacheWriteTokens,
      cache_read_tokens: metrics.usage?.cacheReadTokens,
    },
    "Turn latency"
  );
}

export function recordGatewayFailure(provider: ProviderId): void {
  totalsFor(provider).failures++;
}

export function getLastTurnMetrics(): TurnMetrics {
  return { ...lastTurnMetrics };
}

export function getProviderTotals(): Partial<Record<ProviderId, ProviderTotals>> {
  const out: Partial<Record<ProviderId, ProviderTotals>> = {};
  for (const [provider, t] of totals) out[provider] = { ...t };
  return out;
}

/** Test hook: forget everything recorded so far. */
export function resetMetrics(): void {
  lastTurnMetrics = {};
  totals.clear();
}
