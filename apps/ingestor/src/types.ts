/**
 * Ingestor Types
 */

/**
 * Ingest counters, kept globally and per symbol
 */
export interface IngestCounters {
  received: number;
  written: number;
  levelsWritten: number;
  malformed: number;
  overflowDropped: number;
  transientRetries: number;
  permanentFailures: number;
  retriesExhausted: number;
  clockClamped: number;
}

export type IngestCounterName = keyof IngestCounters;

export interface SymbolIngestMetrics extends IngestCounters {
  /** messages waiting in the symbol's queue */
  queued: number;
}

/**
 * Ingestor metrics for observability
 */
export interface IngestMetrics extends IngestCounters {
  queued: number;
  bySymbol: Record<string, SymbolIngestMetrics>;
}

export function emptyCounters(): IngestCounters {
  return {
    received: 0,
    written: 0,
    levelsWritten: 0,
    malformed: 0,
    overflowDropped: 0,
    transientRetries: 0,
    permanentFailures: 0,
    retriesExhausted: 0,
    clockClamped: 0,
  };
}

/**
 * Copy just the counters, e.g. to log totals without the per-symbol breakdown
 */
export function countersOf(source: IngestCounters): IngestCounters {
  return {
    received: source.received,
    written: source.written,
    levelsWritten: source.levelsWritten,
    malformed: source.malformed,
    overflowDropped: source.overflowDropped,
    transientRetries: source.transientRetries,
    permanentFailures: source.permanentFailures,
    retriesExhausted: source.retriesExhausted,
    clockClamped: source.clockClamped,
  };
}
