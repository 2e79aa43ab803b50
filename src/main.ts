/**
 * Entry point: load config, build gateways and the session store, serve HTTP + WebSocket.
 * Providers without an API key stay routable but fail each call with a gateway error.
 */

import { loadConfig } from "./config";
import { createGateways, modelCatalog } from "./adapters/llm";
import { SessionStore } from "./memory/session-store";
import { Orchestrator } from "./pipeline/orchestrator";
import { PromptManager } from "./prompts/prompt-manager";
import { startServer } from "./http-server";
import { logger, logError } from "./logging";

async function main(): Promise<void> {
  const config = loadConfig();
  const gateways = createGateways(config);
  const catalog = modelCatalog(config);
  const promptManager = new PromptManager();
  const store = new SessionStore({ maxMessages: config.session.maxMessages, promptManager });
  const orchestrator = new Orchestrator(gateways, store, { catalog, defaultModel: config.llm.defaultModel });

  logger.info(
    {
      event: "PROVIDERS_CONFIGURED",
      claude: Boolean(config.llm.anthropicApiKey),
      openai: Boolean(config.llm.openaiApiKey),
      defaultModel: config.llm.defaultModel,
      maxMessages: config.session.maxMessages,
    },
    "Provider routing is automatic based on model name"
  );

  const gateway = startServer({ orchestrator, store, catalog }, { host: config.server.host, port: config.server.port });

  const shutdown = (signal: string): void => {
    logger.info({ event: "SHUTDOWN", signal }, "Shutting down");
    gateway
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logError(logger, err instanceof Error ? err : new Error(String(err)), { event: "SHUTDOWN_FAILED" });
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  logError(logger, err instanceof Error ? err : new Error(String(err)), { event: "STARTUP_FAILED" });
  process.exit(1);
});
