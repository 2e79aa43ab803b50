/**
 * Structured logging for the gateway.
 * Logs provider calls, turns, shape drift and errors with timestamps. JSON output for shipping.
 *
 * Env:
 *   LOG_LEVEL   - silent | debug | info | warn | error (default: info; silent under tests)
 *   LOG_FILE   - If set, append all logs to this path (creates dirs if needed).
 */

import pino from "pino";
import type { TokenUsage } from "../adapters/llm/types";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ["silent", "debug", "info", "warn", "error"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function levelFromEnv(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) return raw;
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

const defaultConfig: LoggerConfig = {
  level: levelFromEnv(),
  pretty: process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test",
};

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? defaultConfig.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? defaultConfig.pretty;
  const logFile = process.env.LOG_FILE?.trim();

  const streams: pino.StreamEntry[] = [];
  if (pretty) {
    streams.push({
      stream: pino.transport({ target: "pino-pretty", options: { colorize: true } }),
    });
  } else {
    streams.push({ stream: process.stdout });
  }
  if (logFile) {
    streams.push({
      stream: pino.destination({ dest: logFile, append: true, mkdir: true }),
    });
  }

  if (streams.length === 1) {
    return pino(opts, streams[0].stream);
  }
  return pino(opts, pino.multistream(streams));
}

export const logger = createLogger();

/** Log LLM request/response (summary only; message bodies may hold user source code). */
export function logLlmCall(
  log: pino.Logger,
  details: { provider: string; modelId: string; messageCount: number; responseLength: number; usage: TokenUsage; durationMs: number }
): void {
  log.info({ event: "LLM_CALL", ...details }, "LLM completed");
}

/** Log turn start/end. */
export function logTurn(log: pino.Logger, phase: "start" | "end", fields: Record<string, unknown> = {}): void {
  log.info({ event: "TURN", phase, ...fields }, phase === "start" ? "Turn start" : "Turn end");
}

/** Log error. */
export function logError(log: pino.Logger, err: Error, context?: Record<string, unknown>): void {
  log.error({ err: err.message, stack: err.stack, ...context }, "Error");
}
