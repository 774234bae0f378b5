/**
 * Replay Server Main Entry Point
 *
 * - POST /replay/prepare resolves a requested time to a start snapshot
 * - GET /ws streams stored book messages from that snapshot to the next one
 * - Cancels open sessions and drains the pool on shutdown
 */

import { closeDb, getDb } from "@book-replay/db";
import { createPostgresEventStore } from "@book-replay/repositories";
import { configureLogger, logger, toShutdownListener } from "@book-replay/utils";

import { buildApp } from "./app";
import { env } from "./env";
import { ReplayIndex, ReplaySessionEndpoint } from "./services";

async function main(): Promise<void> {
  configureLogger({ level: env.LOG_LEVEL });

  logger.info("Starting replay server", {
    appEnv: env.APP_ENV,
    host: env.HOST,
    port: env.PORT,
    pacing: env.REPLAY_PACING,
  });

  const db = getDb(env.DATABASE_URL);
  const store = createPostgresEventStore(db);
  const index = new ReplayIndex(store);
  const endpoint = new ReplaySessionEndpoint(store, index, {
    pacing: env.REPLAY_PACING,
    maxDelayMs: env.REPLAY_PACING_MAX_DELAY_MS,
    pageSize: env.REPLAY_SCAN_PAGE_SIZE,
  });

  const app = await buildApp({
    endpoint,
    corsOrigin: env.CORS_ORIGIN,
    subscribeTimeoutMs: env.REPLAY_SUBSCRIBE_TIMEOUT_MS,
    wsMaxPayload: env.WS_MAX_PAYLOAD,
  });

  // ============================================================================
  // Graceful Shutdown
  // ============================================================================

  let shuttingDown = false;

  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down...", { activeSessions: endpoint.activeSessionCount() });

    await endpoint.closeAll();
    await app.close();
    await closeDb(db);

    logger.info("Shutdown complete");
    process.exit(0);
  };

  const requestShutdown = toShutdownListener(shutdown, error => {
    logger.error("Shutdown failed", error);
    process.exit(1);
  });

  process.on("SIGINT", () => {
    requestShutdown();
  });
  process.on("SIGTERM", () => {
    requestShutdown();
  });

  const address = await app.listen({ host: env.HOST, port: env.PORT });
  logger.info("Replay server listening", { address });
}

main().catch((error: unknown) => {
  logger.error("Fatal error", error);
  process.exit(1);
});
