/**
 * Replay WebSocket protocol
 *
 * GET /ws?start_date=<replayStartTimestamp>[&symbol=][&sequence_id=]
 *
 * Without `symbol` the client must first send a Kraken v2 subscribe request:
 *   {"method":"subscribe","params":{"channel":"book","symbol":["BTC/USD"]}}
 * The server answers with a Kraken-style acknowledgement, then streams the stored
 * book messages verbatim and closes the socket.
 */

import WebSocket from "ws";
import { z } from "zod";
import { parseIsoTimestamp } from "@book-replay/core";
import { createLogger } from "@book-replay/utils";

import type { ReplaySessionEndpoint } from "../services";
import type { ReplayOutcome, ReplaySession, ReplaySink } from "../types";

const log = createLogger("replay-socket");

// ============================================================================
// Close codes
// ============================================================================

export const CloseCode = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  POLICY_VIOLATION: 1008,
  INTERNAL_ERROR: 1011,
  NOT_FOUND: 4404,
} as const;

// ============================================================================
// Socket abstraction
// ============================================================================

export interface ReplaySocket extends ReplaySink {
  close(code: number, reason: string): void;
  /** Text frames only. Returns a function that removes the listener. */
  onMessage(listener: (text: string) => void): () => void;
  onClose(listener: () => void): void;
}

export function toReplaySocket(ws: WebSocket): ReplaySocket {
  return {
    send: text =>
      new Promise<void>((resolve, reject) => {
        ws.send(text, error => (error ? reject(error) : resolve()));
      }),
    isOpen: () => ws.readyState === WebSocket.OPEN,
    close: (code, reason) => ws.close(code, reason),
    onMessage: listener => {
      const handler = (data: WebSocket.RawData, isBinary: boolean): void => {
        if (!isBinary) listener(rawDataToText(data));
      };
      ws.on("message", handler);
      return () => {
        ws.off("message", handler);
      };
    },
    onClose: listener => {
      ws.once("close", () => listener());
    },
  };
}

function rawDataToText(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

// ============================================================================
// Messages
// ============================================================================

const ReplaySocketQuerySchema = z.object({
  start_date: z.string().trim().min(1),
  symbol: z.string().trim().min(1).optional(),
  sequence_id: z.coerce.number().int().nonnegative().optional(),
});

const SubscribeMessageSchema = z.object({
  method: z.literal("subscribe"),
  params: z.object({
    channel: z.string().optional(),
    symbol: z.union([z.array(z.string().min(1)).min(1), z.string().min(1)]),
  }),
  req_id: z.number().int().optional(),
});

type SubscribeWait =
  | { type: "subscribed"; symbol: string; reqId?: number; receivedAt: Date }
  | { type: "timeout" }
  | { type: "closed" };

export interface SubscribeAck {
  method: "subscribe";
  result: { channel: "book"; snapshot: true; symbol: string };
  success: true;
  time_in: string;
  time_out: string;
  req_id?: number;
}

// ============================================================================
// Handler
// ============================================================================

export interface ReplaySocketOptions {
  subscribeTimeoutMs: number;
  now?: () => Date;
}

export interface ReplaySocketResult {
  /** null when the client went away first */
  closeCode: number | null;
  outcome?: ReplayOutcome;
}

/**
 * Drive one replay connection from query parsing to close
 */
export async function handleReplaySocket(
  socket: ReplaySocket,
  query: unknown,
  endpoint: ReplaySessionEndpoint,
  options: ReplaySocketOptions,
): Promise<ReplaySocketResult> {
  const now = options.now ?? (() => new Date());
  const connectedAt = now();

  let session: ReplaySession | null = null;
  socket.onClose(() => session?.cancel());

  const parsedQuery = ReplaySocketQuerySchema.safeParse(query);
  if (!parsedQuery.success) {
    return reject(socket, CloseCode.POLICY_VIOLATION, "start_date parameter required");
  }

  // `+` in an unencoded offset arrives as a space
  const rawStartDate = parsedQuery.data.start_date.replace(/ /g, "+");
  const startDate = parseIsoTimestamp(rawStartDate);
  if (!startDate) {
    return reject(socket, CloseCode.POLICY_VIOLATION, `Invalid start_date: ${rawStartDate}`);
  }

  let symbol = parsedQuery.data.symbol;
  let reqId: number | undefined;
  let timeIn = connectedAt;

  if (symbol === undefined) {
    const subscription = await waitForSubscribe(socket, options.subscribeTimeoutMs, now);
    if (subscription.type === "closed") return { closeCode: null };
    if (subscription.type === "timeout") {
      return reject(socket, CloseCode.POLICY_VIOLATION, "No subscribe message received");
    }
    symbol = subscription.symbol;
    reqId = subscription.reqId;
    timeIn = subscription.receivedAt;
  }

  const attached = await endpoint.attach(
    { symbol, eventTime: startDate, sequenceId: parsedQuery.data.sequence_id ?? null },
    socket,
  );
  if (attached.isErr()) {
    const error = attached.error;
    if (error.type === "STALE_REFERENCE" || error.type === "NOT_FOUND") {
      return reject(socket, CloseCode.NOT_FOUND, error.message);
    }
    log.error("Attach failed", { symbol, error: error.message });
    return reject(socket, CloseCode.INTERNAL_ERROR, "Event store unavailable");
  }

  const current = attached.value;
  session = current;
  if (!socket.isOpen()) {
    current.cancel();
    return { closeCode: null };
  }

  const ack: SubscribeAck = {
    method: "subscribe",
    result: { channel: "book", snapshot: true, symbol },
    success: true,
    time_in: timeIn.toISOString(),
    time_out: now().toISOString(),
    ...(reqId === undefined ? {} : { req_id: reqId }),
  };
  try {
    await socket.send(JSON.stringify(ack));
  } catch (error) {
    log.debug("Client left before the acknowledgement", { symbol, error });
    current.cancel();
    return { closeCode: null };
  }

  const outcome = await current.run();
  log.info("Replay finished", { id: current.id, symbol, reason: outcome.reason, emitted: outcome.emitted });

  switch (outcome.reason) {
    case "snapshot_boundary":
    case "exhausted":
      return closeWith(socket, CloseCode.NORMAL, "Replay complete", outcome);
    case "cancelled":
      return closeWith(socket, CloseCode.GOING_AWAY, "Replay cancelled", outcome);
    case "sink_closed":
      return { closeCode: null, outcome };
    case "stale_reference":
      return { ...(await reject(socket, CloseCode.NOT_FOUND, "Start snapshot no longer exists")), outcome };
    case "store_error":
      return { ...(await reject(socket, CloseCode.INTERNAL_ERROR, "Event store unavailable")), outcome };
  }
}

function waitForSubscribe(socket: ReplaySocket, timeoutMs: number, now: () => Date): Promise<SubscribeWait> {
  return new Promise(resolve => {
    let settled = false;
    let removeListener: () => void = () => {};

    const settle = (result: SubscribeWait): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      removeListener();
      resolve(result);
    };

    const timer = setTimeout(() => settle({ type: "timeout" }), timeoutMs);

    removeListener = socket.onMessage(text => {
      const parsed = SubscribeMessageSchema.safeParse(parseJson(text));
      if (!parsed.success) {
        log.debug("Ignoring message while waiting for subscribe", { length: text.length });
        return;
      }
      const requested = parsed.data.params.symbol;
      settle({
        type: "subscribed",
        symbol: typeof requested === "string" ? requested : requested[0] ?? "",
        reqId: parsed.data.req_id,
        receivedAt: now(),
      });
    });

    socket.onClose(() => settle({ type: "closed" }));
  });
}

const CLOSE_REASONS: Record<number, string> = {
  [CloseCode.POLICY_VIOLATION]: "Invalid request",
  [CloseCode.INTERNAL_ERROR]: "Store error",
  [CloseCode.NOT_FOUND]: "Not found",
};

/**
 * Send an `{ error }` frame, then close
 */
async function reject(socket: ReplaySocket, code: number, message: string): Promise<ReplaySocketResult> {
  if (!socket.isOpen()) return { closeCode: null };
  try {
    await socket.send(JSON.stringify({ error: message }));
  } catch (error) {
    log.debug("Could not deliver error frame", { error });
  }
  return closeWith(socket, code, CLOSE_REASONS[code] ?? "Error");
}

function closeWith(socket: ReplaySocket, code: number, reason: string, outcome?: ReplayOutcome): ReplaySocketResult {
  if (!socket.isOpen()) return { closeCode: null, outcome };
  socket.close(code, reason);
  return { closeCode: code, outcome };
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
