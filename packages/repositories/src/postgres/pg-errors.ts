/**
 * Postgres error classification
 *
 * Maps driver errors to TRANSIENT / PERMANENT store errors by SQLSTATE or socket error code.
 * drizzle wraps driver errors, so the `cause` chain is searched for the first coded error.
 */

import { permanentStoreError, transientStoreError } from "@book-replay/core";
import type { StoreError } from "@book-replay/core";

const TRANSIENT_SQLSTATE_CLASSES = ["08", "53", "57", "58"];
const TRANSIENT_SQLSTATES = new Set(["40001", "40P01", "55P03"]);
const PERMANENT_SQLSTATE_CLASSES = ["21", "22", "23", "42"];

const TRANSIENT_SOCKET_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "EPIPE", "ENOTFOUND", "EAI_AGAIN"]);

const MAX_MESSAGE_LENGTH = 500;

interface CodedError {
  code: string;
  message: string;
}

function findCodedError(error: unknown): CodedError | null {
  let current: unknown = error;

  for (let depth = 0; depth < 5 && typeof current === "object" && current !== null; depth++) {
    if ("code" in current && typeof current.code === "string") {
      const message = "message" in current && typeof current.message === "string" ? current.message : current.code;
      return { code: current.code, message };
    }
    current = "cause" in current ? current.cause : null;
  }

  return null;
}

export function classifyPgErrorCode(code: string): "transient" | "permanent" {
  if (TRANSIENT_SOCKET_CODES.has(code) || TRANSIENT_SQLSTATES.has(code)) return "transient";

  const sqlClass = code.slice(0, 2);
  if (code.length === 5 && PERMANENT_SQLSTATE_CLASSES.includes(sqlClass)) return "permanent";
  if (code.length === 5 && TRANSIENT_SQLSTATE_CLASSES.includes(sqlClass)) return "transient";

  // unknown failures are retried; the pipeline drops them after the attempt cap
  return "transient";
}

export function toStoreError(error: unknown): StoreError {
  const coded = findCodedError(error);
  if (coded) {
    const message = truncate(`${coded.code}: ${coded.message}`);
    return classifyPgErrorCode(coded.code) === "permanent" ? permanentStoreError(message) : transientStoreError(message);
  }

  return transientStoreError(truncate(error instanceof Error ? error.message : "Unknown error"));
}

function truncate(message: string): string {
  return message.length > MAX_MESSAGE_LENGTH ? `${message.slice(0, MAX_MESSAGE_LENGTH)}…` : message;
}
