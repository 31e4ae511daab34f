/**
 * @lexledger/node: Entry point.
 *
 * Bootstraps the Hono app, loads config, opens the ledger, starts the
 * HTTP server, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { InMemoryLedgerStore, JsonlLedgerStore } from "@lexledger/ledger";
import type { LedgerStore } from "@lexledger/ledger";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";
import { pinoRequestLog } from "./middleware/logger.js";
import { AmendmentService } from "./services/amendment-service.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  let store: LedgerStore;
  if (config.LEDGER_FILE !== undefined) {
    store = new JsonlLedgerStore({
      filePath: config.LEDGER_FILE,
      logger: logger.child({ component: "store" }),
    });
    logger.info({ file: config.LEDGER_FILE }, "Using JSONL ledger store");
  } else {
    store = new InMemoryLedgerStore();
    logger.warn("LEDGER_FILE is not set; amendments are kept in memory only");
  }

  const service = await AmendmentService.open({
    store,
    act: { actId: config.ACT_ID, actTitle: config.ACT_TITLE },
    appendTimeoutMs: config.LEDGER_APPEND_TIMEOUT_MS,
    maxRecords: config.LEDGER_MAX_RECORDS,
    verifyOnOpen: config.LEDGER_VERIFY_ON_OPEN,
    logger,
  });

  const { app } = createApp({
    service,
    logFn: pinoRequestLog(logger.child({ component: "http" })),
    rateLimit: { rpm: config.RATE_LIMIT_RPM, burst: config.RATE_LIMIT_BURST },
    onInternalError: (err, c) => {
      logger.error({ err, requestId: c.get("requestId") }, "Unhandled error");
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, act: config.ACT_ID },
    "Amendment ledger node started",
  );

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
