/**
 * Shared replay test fixtures
 */

import { err, errAsync, ok } from "neverthrow";
import { z } from "zod";
import type { AppendAck, MessageKind, RawMessageRecord, StoreError } from "@book-replay/core";
import type { EventStore, ScanItem } from "@book-replay/repositories";

import type { ReplaySink } from "../../src/types";

export const T0 = new Date("2025-01-01T00:00:00.000Z");

export function at(base: Date, offsetMs: number): Date {
  return new Date(base.getTime() + offsetMs);
}

export function bookPayload(symbol: string, kind: MessageKind, label: string): string {
  return JSON.stringify({ channel: "book", type: kind, label, data: [{ symbol, bids: [], asks: [] }] });
}

export interface SeededRecord extends AppendAck {
  payload: string;
}

export async function seed(
  store: EventStore,
  symbol: string,
  kind: MessageKind,
  eventTime: Date,
  label: string,
): Promise<SeededRecord> {
  const payload = bookPayload(symbol, kind, label);
  const ack = await store.append({
    eventTime,
    receivedTime: eventTime,
    channel: "book",
    symbol,
    messageKind: kind,
    checksum: null,
    payload,
  });
  if (ack.isErr()) throw new Error(ack.error.message);
  return { ...ack.value, payload };
}

const LabeledSchema = z.object({ label: z.string() });

export const labelOf = (payload: string): string => LabeledSchema.parse(JSON.parse(payload)).label;

/**
 * Store whose scans yield `before`, then fail
 */
export function failingStore(error: StoreError, before: RawMessageRecord[] = []): EventStore {
  return {
    append: () => errAsync(error),
    async *scanRaw(): AsyncGenerator<ScanItem> {
      for (const record of before) {
        yield ok(record);
      }
      yield err(error);
    },
    upsertLevels: () => errAsync(error),
  };
}

export class Gate {
  readonly promise: Promise<void>;
  open: () => void = () => undefined;

  constructor() {
    this.promise = new Promise(resolve => {
      this.open = resolve;
    });
  }
}

/**
 * Records what a session sends. Optionally blocks the send at `blockAt` (0-based) until released.
 */
export class RecordingSink implements ReplaySink {
  readonly messages: string[] = [];
  readonly reached = new Gate();
  readonly release = new Gate();
  open = true;

  constructor(private readonly behavior: { blockAt?: number; closeAfter?: number; failAt?: number } = {}) {}

  async send(text: string): Promise<void> {
    const index = this.messages.length;
    if (index === this.behavior.failAt) throw new Error("socket write failed");

    this.messages.push(text);
    if (index === this.behavior.blockAt) {
      this.reached.open();
      await this.release.promise;
    }
    if (this.messages.length === this.behavior.closeAfter) this.open = false;
  }

  isOpen(): boolean {
    return this.open;
  }

  labels(): string[] {
    return this.messages.map(labelOf);
  }
}

/** Let pending promise chains settle */
export const flush = (): Promise<void> => new Promise(resolve => setImmediate(resolve));
