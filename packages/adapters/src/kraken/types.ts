/**
 * Kraken v2 WebSocket Types
 *
 * Documentation: https://docs.kraken.com/api/docs/websocket-v2/book
 */

import { z } from "zod";

export const KRAKEN_VENUE = "kraken";
export const KRAKEN_DEFAULT_WS_URL = "wss://ws.kraken.com/v2";

/** Depths accepted by the book channel */
export const KRAKEN_BOOK_DEPTHS = [10, 25, 100, 500, 1000] as const;
export type KrakenBookDepth = (typeof KRAKEN_BOOK_DEPTHS)[number];

export const KrakenFeedConfigSchema = z.object({
  url: z.url().default(KRAKEN_DEFAULT_WS_URL),
});

export type KrakenFeedConfig = z.infer<typeof KrakenFeedConfigSchema>;
export type KrakenFeedConfigInput = z.input<typeof KrakenFeedConfigSchema>;

/**
 * Channel frame: `{ channel, type, data: [...] }`.
 * `heartbeat` frames carry only `channel`.
 */
export const KrakenChannelFrameSchema = z.object({
  channel: z.string(),
  type: z.string().optional(),
  data: z.array(z.unknown()).optional(),
});

export type KrakenChannelFrame = z.infer<typeof KrakenChannelFrameSchema>;

/**
 * Header fields of the first `data` entry of a book frame.
 * Level arrays are validated later by the ingest classifier; a bad field reads as absent.
 */
export const KrakenBookEntryHeaderSchema = z.object({
  symbol: z.string().optional().catch(undefined),
  checksum: z.number().int().optional().catch(undefined),
  timestamp: z.string().optional().catch(undefined),
});

/**
 * Method acknowledgement: `{ method, success, result?, error?, req_id? }`
 */
export const KrakenMethodAckSchema = z.object({
  method: z.string(),
  success: z.boolean(),
  error: z.string().optional(),
  result: z.object({ channel: z.string().optional(), symbol: z.string().optional() }).optional(),
  req_id: z.number().optional(),
});

export type KrakenMethodAck = z.infer<typeof KrakenMethodAckSchema>;

export interface KrakenBookSubscribeRequest {
  method: "subscribe";
  params: {
    channel: "book";
    symbol: string[];
    depth: number;
    snapshot: boolean;
  };
  req_id?: number;
}

export function buildBookSubscribeRequest(symbols: string[], depth: number, reqId?: number): KrakenBookSubscribeRequest {
  return {
    method: "subscribe",
    params: { channel: "book", symbol: symbols, depth, snapshot: true },
    ...(reqId === undefined ? {} : { req_id: reqId }),
  };
}

export function isKrakenBookDepth(depth: number): depth is KrakenBookDepth {
  return KRAKEN_BOOK_DEPTHS.some(d => d === depth);
}
