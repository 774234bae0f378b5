/**
 * Replay HTTP and WebSocket routes
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { parseRequestedTime } from "@book-replay/core";
import { createLogger } from "@book-replay/utils";

import type { ReplaySessionEndpoint } from "../services";
import type { PreparedReplay } from "../types";
import { handleReplaySocket, toReplaySocket } from "./replay-socket";

const log = createLogger("replay-routes");

const RequestedTimeSchema = z.union([z.string(), z.number()]);

const PrepareBodySchema = z.object({
  requestedTime: RequestedTimeSchema.optional(),
  date: RequestedTimeSchema.optional(),
  symbol: z.string().trim().min(1).optional(),
});

export interface ReplayRoutesOptions {
  endpoint: ReplaySessionEndpoint;
  subscribeTimeoutMs: number;
}

export type PrepareResponse = Omit<PreparedReplay, "startPoint">;

export function registerReplayRoutes(app: FastifyInstance, options: ReplayRoutesOptions): void {
  const { endpoint } = options;

  app.post("/replay/prepare", async (request, reply) => {
    const body = PrepareBodySchema.safeParse(request.body ?? {});
    if (!body.success) {
      return reply.status(400).send({ error: z.prettifyError(body.error), code: "INVALID_REQUEST" });
    }

    const rawTime = body.data.requestedTime ?? body.data.date;
    if (rawTime === undefined) {
      return reply.status(400).send({ error: "date parameter required", code: "INVALID_REQUEST" });
    }

    const requestedTime = parseRequestedTime(rawTime);
    if (requestedTime.isErr()) {
      return reply.status(400).send({ error: requestedTime.error.message, code: "INVALID_REQUEST" });
    }

    const prepared = await endpoint.prepare(requestedTime.value, body.data.symbol);
    if (prepared.isErr()) {
      const error = prepared.error;
      if (error.type === "NOT_FOUND") {
        return reply.status(404).send({
          error: error.message,
          code: error.type,
          requestedDate: error.requestedTime.toISOString(),
        });
      }
      log.error("Replay preparation failed", { error: error.message });
      return reply.status(503).send({ error: "Event store unavailable", code: error.type });
    }

    return reply.send(toPrepareResponse(prepared.value));
  });

  app.get("/ws", { websocket: true }, (socket, request) => {
    handleReplaySocket(toReplaySocket(socket), request.query, endpoint, {
      subscribeTimeoutMs: options.subscribeTimeoutMs,
    }).catch((error: unknown) => {
      log.error("Replay socket failed", { error });
      socket.close(1011, "Internal error");
    });
  });

  app.get("/health", async () => ({ status: "ok", activeSessions: endpoint.activeSessionCount() }));
}

export function toPrepareResponse(prepared: PreparedReplay): PrepareResponse {
  return {
    status: prepared.status,
    replayStartTimestamp: prepared.replayStartTimestamp,
    requestedDate: prepared.requestedDate,
    message: prepared.message,
    symbol: prepared.symbol,
    sequenceId: prepared.sequenceId,
  };
}
