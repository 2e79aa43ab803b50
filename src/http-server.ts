/**
 * HTTP + WebSocket front end for the orchestrator and session store.
 *
 * POST /chat               -> one chat turn (JSON body, see ChatRequestSchema)
 * POST /reset              -> drop a session's state (idempotent)
 * GET  /history/:sessionId -> buffered messages for one provider (?provider=claude|openai)
 * GET  /code/:sessionId    -> last generated code, or null
 * GET  /models             -> model catalogue
 * GET  /health             -> liveness plus session, socket and usage counters
 * WS   /ws/:sessionId      -> one chat turn per text frame
 */

import * as http from "http";
import type { Duplex } from "stream";
import { WebSocketServer } from "ws";
import type WebSocket from "ws";
import { z } from "zod";
import { GatewayError, PROVIDERS, listModels } from "./adapters/llm";
import type { ModelCatalog } from "./adapters/llm";
import type { SessionStore } from "./memory/session-store";
import type { Orchestrator } from "./pipeline/orchestrator";
import { ChatRequestSchema, ResetRequestSchema } from "./pipeline/types";
import { getLastTurnMetrics, getProviderTotals } from "./metrics";
import { logError, logger } from "./logging";

const DEFAULT_PORT = 5000;
export const MAX_BODY_BYTES = 10 * 1024 * 1024;
const SERVICE_NAME = "React Code Assistant API - Multi-Provider";
const SERVICE_VERSION = "0.1.0";

const CORS_HEADERS: Readonly<Record<string, string>> = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type, Authorization",
};

const ProviderQuerySchema = z.enum(["claude", "openai"]).default("claude");
const SocketFrameSchema = ChatRequestSchema.omit({ sessionId: true });

export interface ServerDeps {
  orchestrator: Orchestrator;
  store: SessionStore;
  catalog: ModelCatalog;
}

export interface ServerOptions {
  port?: number;
  host?: string;
  /** Listen failures such as EADDRINUSE. Defaults to logging and exiting the process. */
  onError?: (err: Error) => void;
}

export interface GatewayServer {
  server: http.Server;
  wss: WebSocketServer;
  activeSockets(): number;
  close(): Promise<void>;
}

class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly body: Record<string, unknown>
  ) {
    super(typeof body.error === "string" ? body.error : `HTTP ${status}`);
    this.name = "HttpError";
  }
}

/** Transport input that failed its zod schema. */
class RequestValidationError extends HttpError {
  constructor(issues: z.ZodIssue[]) {
    super(400, {
      error: "invalid_request",
      issues: issues.map((i) => ({ path: i.path.join("."), message: i.message })),
    });
    this.name = "RequestValidationError";
  }
}

/** Oversized bodies are drained, not buffered, so the 413 still reaches the client. */
function parseJsonBody(req: http.IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;
    req.on("data", (chunk: Buffer) => {
      if (tooLarge) return;
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        tooLarge = true;
        chunks = [];
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      if (tooLarge) {
        reject(new HttpError(413, { error: "payload_too_large", limitBytes: MAX_BODY_BYTES }));
        return;
      }
      const body = Buffer.concat(chunks).toString("utf8");
      if (!body) {
        resolve({});
        return;
      }
      try {
        resolve(JSON.parse(body));
      } catch {
        reject(new HttpError(400, { error: "invalid_json" }));
      }
    });
    req.on("error", reject);
  });
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

function sendJson(res: http.ServerResponse, status: number, data: unknown): void {
  res.writeHead(status, { ...CORS_HEADERS, "Content-Type": "application/json" });
  res.end(JSON.stringify(data));
}

function validate<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const res = schema.safeParse(value);
  if (!res.success) throw new RequestValidationError(res.error.issues);
  return res.data;
}

function pathParam(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    throw new HttpError(400, { error: "invalid_path" });
  }
}

function errorStatus(err: unknown): { status: number; body: Record<string, unknown> } {
  if (err instanceof HttpError) return { status: err.status, body: err.body };
  if (err instanceof GatewayError) {
    return { status: 502, body: { error: "gateway_failure", provider: err.provider, detail: err.message } };
  }
  return { status: 500, body: { error: "internal_error", detail: err instanceof Error ? err.message : String(err) } };
}

export function createGatewayServer(deps: ServerDeps): GatewayServer {
  const { orchestrator, store, catalog } = deps;
  const sockets = new Set<WebSocket>();
  const wss = new WebSocketServer({ noServer: true });

  async function route(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const method = req.method ?? "GET";
    const url = new URL(req.url ?? "/", "http://localhost");
    const path = url.pathname;

    if (method === "OPTIONS") {
      res.writeHead(204, CORS_HEADERS);
      res.end();
      return;
    }

    if (method === "POST" && path === "/chat") {
      const request = validate(ChatRequestSchema, await parseJsonBody(req));
      sendJson(res, 200, await orchestrator.handleChat(request));
      return;
    }

    if (method === "POST" && path === "/reset") {
      const { sessionId } = validate(ResetRequestSchema, await parseJsonBody(req));
      await store.reset(sessionId);
      sendJson(res, 200, { message: `Session ${sessionId} reset successfully`, sessionId });
      return;
    }

    const historyMatch = /^\/history\/([^/]+)$/.exec(path);
    if (method === "GET" && historyMatch) {
      const sessionId = pathParam(historyMatch[1]);
      const provider = validate(ProviderQuerySchema, url.searchParams.get("provider") ?? undefined);
      sendJson(res, 200, { ...store.getHistory(sessionId, provider), provider });
      return;
    }

    const codeMatch = /^\/code\/([^/]+)$/.exec(path);
    if (method === "GET" && codeMatch) {
      const sessionId = pathParam(codeMatch[1]);
      const code = store.getLastGeneratedCode(sessionId);
      if (code === undefined) {
        sendJson(res, 200, { code: null, sessionId, message: "No code generated yet" });
      } else {
        sendJson(res, 200, { code, sessionId });
      }
      return;
    }

    if (method === "GET" && path === "/models") {
      sendJson(res, 200, listModels(catalog));
      return;
    }

    if (method === "GET" && path === "/health") {
      const stats = store.stats();
      sendJson(res, 200, {
        status: "healthy",
        timestamp: new Date().toISOString(),
        sessions: stats.sessions,
        activeSessions: stats.byProvider,
        activeWebsockets: sockets.size,
        providers: PROVIDERS,
        lastTurn: getLastTurnMetrics(),
        totals: getProviderTotals(),
      });
      return;
    }

    if (method === "GET" && path === "/") {
      const models = listModels(catalog);
      sendJson(res, 200, {
        message: SERVICE_NAME,
        version: SERVICE_VERSION,
        providers: {
          claude: { models: models.claude, optimization: "XML-structured prompts with explicit cache breakpoints" },
          openai: { models: models.openai, optimization: "Markdown-structured prompts with automatic caching" },
        },
        websocket: "/ws/{sessionId}",
      });
      return;
    }

    sendJson(res, 404, { error: "not_found", path });
  }

  const server = http.createServer((req, res) => {
    route(req, res).catch((err: unknown) => {
      const { status, body } = errorStatus(err);
      if (status >= 500) {
        logger.error({ event: "HTTP_REQUEST_FAILED", method: req.method, url: req.url, status, ...body }, "Request failed");
      }
      if (res.headersSent) {
        res.end();
        return;
      }
      sendJson(res, status, body);
    });
  });

  async function handleFrame(socket: WebSocket, sessionId: string, raw: string): Promise<void> {
    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch {
      socket.send(JSON.stringify({ error: "invalid_json" }));
      return;
    }
    const frame = SocketFrameSchema.safeParse(payload);
    if (!frame.success) {
      socket.send(JSON.stringify({ error: "invalid_request", issues: frame.error.issues.map((i) => i.message) }));
      return;
    }
    try {
      const response = await orchestrator.handleChat({ ...frame.data, sessionId });
      socket.send(JSON.stringify(response));
    } catch (err) {
      const { body } = errorStatus(err);
      socket.send(JSON.stringify(body));
    }
  }

  function onConnection(socket: WebSocket, sessionId: string): void {
    sockets.add(socket);
    logger.info({ event: "WS_CONNECTED", sessionId }, "WebSocket client connected");
    socket.on("message", (data, isBinary) => {
      if (isBinary) {
        socket.send(JSON.stringify({ error: "binary_frames_not_supported" }));
        return;
      }
      handleFrame(socket, sessionId, rawDataToString(data)).catch((err: unknown) =>
        logger.warn({ event: "WS_FRAME_FAILED", sessionId, err: err instanceof Error ? err.message : String(err) }, "WebSocket frame failed")
      );
    });
    socket.on("close", () => {
      sockets.delete(socket);
      logger.info({ event: "WS_DISCONNECTED", sessionId }, "WebSocket client disconnected");
    });
  }

  server.on("upgrade", (req: http.IncomingMessage, socket: Duplex, head: Buffer) => {
    const path = new URL(req.url ?? "/", "http://localhost").pathname;
    const match = /^\/ws\/([^/]+)$/.exec(path);
    let sessionId: string | undefined;
    try {
      sessionId = match ? decodeURIComponent(match[1]) : undefined;
    } catch {
      sessionId = undefined;
    }
    if (sessionId === undefined) {
      socket.write("HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n");
      socket.destroy();
      return;
    }
    const id = sessionId;
    wss.handleUpgrade(req, socket, head, (ws) => onConnection(ws, id));
  });

  return {
    server,
    wss,
    activeSockets: () => sockets.size,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const s of sockets) s.terminate();
        wss.close();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

export function startServer(deps: ServerDeps, options: ServerOptions = {}): GatewayServer {
  const port = options.port ?? DEFAULT_PORT;
  const host = options.host ?? "0.0.0.0";
  const gateway = createGatewayServer(deps);
  const onError =
    options.onError ??
    ((err: Error): void => {
      logError(logger, err, { event: "HTTP_SERVER_FAILED", host, port });
      process.exit(1);
    });
  gateway.server.once("error", onError);
  gateway.server.listen(port, host, () => {
    logger.info({ event: "HTTP_SERVER_STARTED", host, port }, "Code assistant gateway listening");
  });
  return gateway;
}
