/**
 * Event time assignment
 *
 * event_time = embedded exchange timestamp when present and parseable, else the ingest wall clock.
 * The result is clamped per symbol so it never goes below the previous event_time of that symbol;
 * event_time order therefore always equals arrival order, and sequence_id breaks the ties.
 */

export type EventTimeSource = "embedded" | "received";

export interface AssignedEventTime {
  eventTime: Date;
  source: EventTimeSource;
  /** true when the candidate was earlier than the symbol's previous event_time */
  clamped: boolean;
}

export class EventTimeAssigner {
  private readonly lastBySymbol = new Map<string, number>();

  assign(symbol: string, embeddedTime: Date | null, receivedTime: Date): AssignedEventTime {
    const source: EventTimeSource = embeddedTime ? "embedded" : "received";
    const candidate = (embeddedTime ?? receivedTime).getTime();
    const last = this.lastBySymbol.get(symbol);

    const eventTimeMs = last !== undefined && candidate < last ? last : candidate;
    this.lastBySymbol.set(symbol, eventTimeMs);

    return { eventTime: new Date(eventTimeMs), source, clamped: eventTimeMs !== candidate };
  }

  /**
   * Last assigned event_time for a symbol (ms), if any
   */
  lastFor(symbol: string): number | undefined {
    return this.lastBySymbol.get(symbol);
  }
}
