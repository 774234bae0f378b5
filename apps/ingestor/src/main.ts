/**
 * Ingestor Main Entry Point
 *
 * - Subscribe to the Kraken v2 book channel for the configured symbols
 * - Append every book message to ob_messages, then its levels to ob_levels
 * - Log ingest counters periodically
 * - Exit on feed disconnect so the supervisor restarts the process
 */

import { KrakenBookFeedAdapter } from "@book-replay/adapters";
import { closeDb, getDb } from "@book-replay/db";
import { createPostgresEventStore } from "@book-replay/repositories";
import { configureLogger, logger, toShutdownListener } from "@book-replay/utils";

import { env } from "./env";
import { IngestPipeline } from "./services";
import { countersOf } from "./types";

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  configureLogger({ level: env.LOG_LEVEL });

  logger.info("Starting ingestor", {
    appEnv: env.APP_ENV,
    feedUrl: env.FEED_URL,
    symbols: env.SYMBOLS.join(","),
    depth: env.BOOK_DEPTH,
    queueMax: env.INGEST_QUEUE_MAX,
    maxAttempts: env.INGEST_MAX_ATTEMPTS,
  });

  const db = getDb(env.DATABASE_URL);
  const store = createPostgresEventStore(db);

  const pipeline = new IngestPipeline(store, {
    maxQueueSize: env.INGEST_QUEUE_MAX,
    maxAttempts: env.INGEST_MAX_ATTEMPTS,
    retryBaseDelayMs: env.INGEST_RETRY_BASE_MS,
    retryMaxDelayMs: env.INGEST_RETRY_MAX_MS,
  });

  const feed = new KrakenBookFeedAdapter({ url: env.FEED_URL });

  // ============================================================================
  // Graceful Shutdown
  // ============================================================================

  let shuttingDown = false;
  let metricsInterval: ReturnType<typeof setInterval> | null = null;

  const shutdown = async (exitCode: number): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down...");

    if (metricsInterval) clearInterval(metricsInterval);

    await feed.disconnect();
    await pipeline.stop();
    await closeDb(db);

    logger.info("Shutdown complete", countersOf(pipeline.getMetrics()));
    process.exit(exitCode);
  };

  const requestShutdown = toShutdownListener(shutdown, error => {
    logger.error("Shutdown failed", error);
    process.exit(1);
  });

  // ============================================================================
  // Feed Events
  // ============================================================================

  feed.onEvent(event => {
    switch (event.type) {
      case "book":
        pipeline.ingest(event.message, event.receivedAt);
        break;
      case "connected":
        logger.info("Book feed connected", { venue: event.venue });
        break;
      case "disconnected":
        if (!shuttingDown) {
          logger.error("Book feed disconnected", { venue: event.venue, reason: event.reason });
          requestShutdown(1);
        }
        break;
    }
  });

  const subscribed = feed.subscribe({ symbols: env.SYMBOLS, depth: env.BOOK_DEPTH });
  if (subscribed.isErr()) {
    logger.error("Invalid book subscription", subscribed.error);
    await closeDb(db);
    process.exit(1);
  }

  logger.info("Connecting to book feed...");
  const connected = await feed.connect();
  if (connected.isErr()) {
    logger.error("Failed to connect to book feed", connected.error);
    await closeDb(db);
    process.exit(1);
  }

  metricsInterval = setInterval(() => {
    const metrics = pipeline.getMetrics();
    logger.info("Ingest metrics", { ...countersOf(metrics), queued: metrics.queued });
    for (const [symbol, counters] of Object.entries(metrics.bySymbol)) {
      logger.debug("Ingest metrics by symbol", { symbol, ...counters });
    }
  }, env.METRICS_LOG_INTERVAL_MS);

  process.on("SIGINT", () => {
    requestShutdown(0);
  });
  process.on("SIGTERM", () => {
    requestShutdown(0);
  });

  logger.info("Ingestor running");
}

main().catch((error: unknown) => {
  logger.error("Fatal error", error);
  process.exit(1);
});
