/**
 * Ordering helpers for the (event_time, sequence_id) total order
 */

import type { StreamPosition } from "./types";

export function comparePositions(a: StreamPosition, b: StreamPosition): number {
  const byTime = a.eventTime.getTime() - b.eventTime.getTime();
  if (byTime !== 0) return byTime;
  return a.sequenceId - b.sequenceId;
}

export function isSamePosition(a: StreamPosition, b: StreamPosition): boolean {
  return comparePositions(a, b) === 0;
}

/** Position at the very beginning of a millisecond */
export function positionAt(eventTime: Date): StreamPosition {
  return { eventTime, sequenceId: 0 };
}

export function formatPosition(position: StreamPosition): string {
  return `${position.eventTime.toISOString()}#${position.sequenceId}`;
}
