/**
 * Keyset pagination shared by the store implementations
 *
 * Each page is fetched after the last record of the previous page, so no cursor is held
 * between pages and a scan can restart from any position.
 */

import { err, ok } from "neverthrow";
import type { ResultAsync } from "neverthrow";
import type { RawMessageRecord, StoreError, StreamPosition } from "@book-replay/core";

import type { ScanItem } from "./interfaces/event-store";

export interface PageCursor {
  position: StreamPosition;
  /** include a record sitting exactly at `position` */
  inclusive: boolean;
}

export type PageFetcher = (cursor: PageCursor, limit: number) => ResultAsync<RawMessageRecord[], StoreError>;

export async function* paginateScan(
  fetchPage: PageFetcher,
  from: StreamPosition,
  pageSize: number,
): AsyncGenerator<ScanItem, void, undefined> {
  const limit = Math.max(1, Math.floor(pageSize));
  let cursor: PageCursor = { position: from, inclusive: true };

  while (true) {
    const page = await fetchPage(cursor, limit);
    if (page.isErr()) {
      yield err(page.error);
      return;
    }

    for (const record of page.value) {
      yield ok(record);
    }

    const last = page.value.at(-1);
    if (!last || page.value.length < limit) return;

    cursor = { position: { eventTime: last.eventTime, sequenceId: last.sequenceId }, inclusive: false };
  }
}
