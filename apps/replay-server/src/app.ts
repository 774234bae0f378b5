/**
 * Fastify application for the replay server
 */

import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import Fastify from "fastify";
import type { FastifyError, FastifyInstance } from "fastify";
import { createLogger } from "@book-replay/utils";

import { registerReplayRoutes } from "./http/replay-routes";
import type { ReplaySessionEndpoint } from "./services";

const log = createLogger("http");

export interface AppDependencies {
  endpoint: ReplaySessionEndpoint;
  /** `*` or a comma-separated list of origins */
  corsOrigin: string;
  subscribeTimeoutMs: number;
  wsMaxPayload: number;
}

export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
  // Requests are logged through the shared logger below
  const app = Fastify({ logger: false });

  await app.register(cors, {
    origin: deps.corsOrigin === "*" ? true : deps.corsOrigin.split(",").map(origin => origin.trim()),
    credentials: true,
  });
  await app.register(websocket, {
    options: { maxPayload: deps.wsMaxPayload },
  });

  app.addHook("onResponse", async (request, reply) => {
    log.info("Request completed", {
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      responseTimeMs: Math.round(reply.elapsedTime),
    });
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode < 500) {
      return reply.status(statusCode).send({ error: error.message, code: "INVALID_REQUEST" });
    }

    log.error("Unhandled request error", { method: request.method, url: request.url, error });
    return reply.status(500).send({ error: "Internal server error", code: "INTERNAL_ERROR" });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({ error: `Route ${request.method} ${request.url} not found`, code: "NOT_FOUND" });
  });

  registerReplayRoutes(app, { endpoint: deps.endpoint, subscribeTimeoutMs: deps.subscribeTimeoutMs });

  return app;
}
