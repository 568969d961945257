/**
 * @caixa-escolar/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, opens the file store,
 * starts the HTTP server, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { FileLedgerStore } from "@caixa-escolar/store";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const store = new FileLedgerStore({ baseDir: config.DATA_DIR });
  logger.info({ dataDir: store.baseDir }, "File store opened");

  const { app } = createApp({
    store,
    logger,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Ledger node started");

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
