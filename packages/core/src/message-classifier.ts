/**
 * Feed message classification
 *
 * - Channel must be a book channel
 * - Kind indicator "snapshot" marks a full book, "update" an incremental change
 * - Levels come from `data[].bids` / `data[].asks`, as `{ price, qty }` objects (Kraken v2)
 *   or `[price, qty, ...]` tuples (Kraken v1 style)
 *
 * This module is pure logic (no I/O dependencies).
 */

import { err, ok } from "neverthrow";
import type { Result } from "neverthrow";
import { z } from "zod";

import { normalizeDecimal } from "./book-levels";
import { malformed } from "./errors";
import type { MalformedFeedMessage } from "./errors";
import { parseEmbeddedTimestamp } from "./timestamps";
import type { BookSide, ClassifiedMessage, FeedMessage, MessageKind, PriceLevel } from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Payload Schema
// ─────────────────────────────────────────────────────────────────────────────

const NumericSchema = z.union([z.number(), z.string()]);

const LevelSchema = z.union([
  z.object({ price: NumericSchema, qty: NumericSchema }),
  z.tuple([NumericSchema, NumericSchema], z.unknown()),
]);

const BookEntrySchema = z.object({
  symbol: z.string().optional(),
  bids: z.array(LevelSchema).optional(),
  asks: z.array(LevelSchema).optional(),
});

const BookPayloadSchema = z.object({
  data: z.array(BookEntrySchema).min(1),
});

type RawLevel = z.infer<typeof LevelSchema>;

export const DEFAULT_BOOK_CHANNELS: readonly string[] = ["book"];

const KIND_INDICATORS: Record<string, MessageKind> = {
  snapshot: "snapshot",
  update: "update",
};

// ─────────────────────────────────────────────────────────────────────────────
// Classification
// ─────────────────────────────────────────────────────────────────────────────

export function classifyMessageKind(indicator: string | undefined): MessageKind | null {
  if (indicator === undefined) return null;
  return KIND_INDICATORS[indicator.toLowerCase()] ?? null;
}

/**
 * Validate a feed message and extract everything ingest needs from it
 */
export function classifyFeedMessage(
  message: FeedMessage,
  bookChannels: readonly string[] = DEFAULT_BOOK_CHANNELS,
): Result<ClassifiedMessage, MalformedFeedMessage> {
  if (!bookChannels.includes(message.channel)) {
    return err(malformed("UNSUPPORTED_CHANNEL", `Channel "${message.channel}" is not a book channel`));
  }

  const symbol = message.symbol.trim();
  if (symbol === "") {
    return err(malformed("MISSING_SYMBOL", "Message has no symbol"));
  }

  const kind = classifyMessageKind(message.kind);
  if (!kind) {
    return err(malformed("UNKNOWN_KIND", `Unknown kind indicator: ${String(message.kind)}`));
  }

  const parsed = BookPayloadSchema.safeParse(message.payload);
  if (!parsed.success) {
    return err(malformed("INVALID_PAYLOAD", parsed.error.message));
  }

  const levels: PriceLevel[] = [];
  for (const entry of parsed.data.data) {
    if (entry.symbol !== undefined && entry.symbol !== symbol) continue;

    for (const [side, rawLevels] of [
      ["bid", entry.bids ?? []],
      ["ask", entry.asks ?? []],
    ] as const) {
      for (const raw of rawLevels) {
        const level = toPriceLevel(side, raw);
        if (!level) {
          return err(malformed("INVALID_LEVEL", `Invalid ${side} level: ${JSON.stringify(raw)}`));
        }
        levels.push(level);
      }
    }
  }

  return ok({
    channel: message.channel,
    symbol,
    kind,
    embeddedTime: parseEmbeddedTimestamp(message.timestamp),
    checksum: message.checksum ?? null,
    levels,
    payloadText: message.rawText ?? JSON.stringify(message.payload),
  });
}

function toPriceLevel(side: BookSide, raw: RawLevel): PriceLevel | null {
  const rawPrice = Array.isArray(raw) ? raw[0] : raw.price;
  const rawQty = Array.isArray(raw) ? raw[1] : raw.qty;

  const price = normalizeDecimal(rawPrice);
  const quantity = normalizeDecimal(rawQty);
  if (price === null || quantity === null) return null;

  // qty 0 removes a level in updates; a price must be positive
  if (Number(price) <= 0 || Number(quantity) < 0) return null;

  return { side, price, quantity };
}
