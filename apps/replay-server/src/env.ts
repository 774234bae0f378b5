/**
 * Replay Server Environment Configuration
 *
 * Serves replay preparation over HTTP and streams stored book messages over WebSocket.
 *
 * See .env.example at the repository root for a template.
 */

import "dotenv/config";
import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";

export const env = createEnv({
  server: {
    // =========================================================================
    // Database
    // =========================================================================

    DATABASE_URL: z.url(),

    // =========================================================================
    // Logging / Application
    // =========================================================================

    LOG_LEVEL: z.enum(["ERROR", "WARN", "LOG", "INFO", "DEBUG"]).default("INFO"),

    APP_ENV: z.enum(["development", "test", "production"]).default("development"),

    // =========================================================================
    // HTTP
    // =========================================================================

    HOST: z.string().default("0.0.0.0"),

    PORT: z.coerce.number().int().min(1).max(65_535).default(8080),

    /**
     * `*` or a comma-separated list of origins
     */
    CORS_ORIGIN: z.string().default("*"),

    /**
     * Largest inbound WebSocket frame (bytes)
     */
    WS_MAX_PAYLOAD: z.coerce.number().int().positive().default(1_048_576),

    // =========================================================================
    // Replay
    // =========================================================================

    /**
     * Records fetched per store round trip
     */
    REPLAY_SCAN_PAGE_SIZE: z.coerce.number().int().positive().default(500),

    /**
     * How long /ws waits for the subscribe message when no symbol is in the query
     */
    REPLAY_SUBSCRIBE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

    /**
     * asap: as fast as the client reads; realtime: keep recorded spacing
     */
    REPLAY_PACING: z.enum(["asap", "realtime"]).default("asap"),

    /**
     * Longest single pause under realtime pacing
     */
    REPLAY_PACING_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(60_000),
  },
  runtimeEnv: process.env,
  emptyStringAsUndefined: true,
});

export type Env = typeof env;
