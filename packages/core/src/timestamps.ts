/**
 * Timestamp parsing
 *
 * - ISO-8601 strings with optional fraction and zone (no zone means UTC)
 * - Fractions beyond milliseconds are truncated (Kraken sends microseconds)
 * - Numbers are epoch seconds, or epoch milliseconds when large enough
 */

import { err, ok } from "neverthrow";
import type { Result } from "neverthrow";

import type { InvalidRequestError } from "./errors";

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

/** Epoch values at or above this are milliseconds (year 33658 in seconds) */
const EPOCH_MS_THRESHOLD = 1e12;

/**
 * Parse an ISO-8601 date or date-time. Returns null when the text is not a valid instant.
 */
export function parseIsoTimestamp(text: string): Date | null {
  const match = ISO_PATTERN.exec(text.trim());
  if (!match) return null;

  const [, year, month, day, hour = "00", minute = "00", second = "00", fraction = "", zone = "Z"] = match;
  const millis = fraction.padEnd(3, "0").slice(0, 3);
  const normalizedZone = normalizeZone(zone);

  const date = new Date(`${year}-${month}-${day}T${hour}:${minute}:${second}.${millis}${normalizedZone}`);
  if (Number.isNaN(date.getTime())) return null;

  // Reject roll-over dates such as 2024-02-30
  if (normalizedZone === "Z" && (date.getUTCDate() !== Number(day) || date.getUTCMonth() + 1 !== Number(month))) {
    return null;
  }

  return date;
}

function normalizeZone(zone: string): string {
  if (zone.toUpperCase() === "Z") return "Z";
  const sign = zone.slice(0, 1);
  const digits = zone.slice(1).replace(":", "");
  const hours = digits.slice(0, 2);
  const minutes = digits.slice(2, 4) || "00";
  return `${sign}${hours}:${minutes}`;
}

/**
 * Convert an epoch number (seconds or milliseconds) to a Date
 */
export function fromEpoch(value: number): Date | null {
  if (!Number.isFinite(value) || value < 0) return null;
  const ms = value >= EPOCH_MS_THRESHOLD ? value : value * 1000;
  return new Date(Math.round(ms));
}

/**
 * Parse the timestamp a feed message carries. Absent or unparseable values return null.
 */
export function parseEmbeddedTimestamp(value: string | number | null | undefined): Date | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return fromEpoch(value);

  const trimmed = value.trim();
  if (trimmed === "") return null;
  if (/^\d+(\.\d+)?$/.test(trimmed)) return fromEpoch(Number(trimmed));

  return parseIsoTimestamp(trimmed);
}

/**
 * Parse the time a replay client asks for.
 *
 * Strings: `YYYY-MM-DD`, `YYYY-MM-DDTHH:MM:SS`, with optional fraction and zone.
 * Numbers: epoch seconds.
 */
export function parseRequestedTime(value: unknown): Result<Date, InvalidRequestError> {
  if (typeof value === "number") {
    const date = Number.isFinite(value) && value >= 0 ? new Date(Math.round(value * 1000)) : null;
    return date ? ok(date) : err({ type: "INVALID_REQUEST", message: `Invalid epoch seconds: ${value}` });
  }

  if (typeof value === "string") {
    const date = parseIsoTimestamp(value);
    return date ? ok(date) : err({ type: "INVALID_REQUEST", message: `Invalid date format: ${value}` });
  }

  return err({ type: "INVALID_REQUEST", message: "date must be an ISO-8601 string or epoch seconds" });
}
