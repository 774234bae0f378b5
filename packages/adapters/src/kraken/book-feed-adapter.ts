/**
 * Kraken Book Feed Adapter
 *
 * - Subscribes to the v2 `book` channel over a single WebSocket
 * - Forwards book frames with their original text
 * - Ignores heartbeat / status / method acknowledgement frames
 * - No reconnect: an ended stream is reported as `disconnected`
 */

import { err, ok } from "neverthrow";
import type { Result } from "neverthrow";
import { createLogger } from "@book-replay/utils";

import type { BookFeedError, BookFeedEvent, BookFeedPort, BookFeedSubscription } from "../ports";
import {
  buildBookSubscribeRequest,
  isKrakenBookDepth,
  KRAKEN_BOOK_DEPTHS,
  KRAKEN_VENUE,
  KrakenBookEntryHeaderSchema,
  KrakenChannelFrameSchema,
  KrakenFeedConfigSchema,
  KrakenMethodAckSchema,
} from "./types";
import type { KrakenFeedConfig, KrakenFeedConfigInput, KrakenMethodAck } from "./types";
import { defaultConnectionFactory } from "./ws-connection";
import type { IWsConnection, WsConnectionFactory, WsFrame } from "./ws-connection";

const log = createLogger("kraken-feed");

const USER_AGENT = "book-replay-ingestor/0.1";

export class KrakenBookFeedAdapter implements BookFeedPort {
  private readonly config: KrakenFeedConfig;
  private readonly connectionFactory: WsConnectionFactory;
  private readonly now: () => Date;

  private eventHandlers: ((event: BookFeedEvent) => void)[] = [];
  private subscriptions: BookFeedSubscription[] = [];
  private connection: IWsConnection | null = null;
  private listening: Promise<void> | null = null;
  private isConnected_ = false;
  private nextReqId = 1;
  private sawFirstBook = false;

  /**
   * @param connectionFactory - WebSocket factory (tests inject fakes)
   * @param now - receive clock
   */
  constructor(
    config: KrakenFeedConfigInput = {},
    connectionFactory: WsConnectionFactory = defaultConnectionFactory,
    now: () => Date = () => new Date(),
  ) {
    this.config = KrakenFeedConfigSchema.parse(config);
    this.connectionFactory = connectionFactory;
    this.now = now;
  }

  async connect(): Promise<Result<void, BookFeedError>> {
    if (this.isConnected_) return ok(undefined);

    const connection = this.connectionFactory(this.config.url, { "User-Agent": USER_AGENT }, `${KRAKEN_VENUE}:book`);
    try {
      await connection.connect();
    } catch (error) {
      return err({
        type: "connection_failed",
        message: error instanceof Error ? error.message : "Unknown error",
      });
    }

    this.connection = connection;
    this.isConnected_ = true;
    this.sawFirstBook = false;

    this.emitEvent({ type: "connected", ts: this.now(), venue: KRAKEN_VENUE });

    for (const subscription of this.subscriptions) {
      const sent = this.sendSubscribe(connection, subscription);
      if (sent.isErr()) {
        await this.disconnect();
        return sent;
      }
    }

    this.listening = this.listen(connection);
    return ok(undefined);
  }

  subscribe(subscription: BookFeedSubscription): Result<void, BookFeedError> {
    if (subscription.symbols.length === 0) {
      return err({ type: "subscription_failed", message: "At least one symbol is required" });
    }
    if (!isKrakenBookDepth(subscription.depth)) {
      return err({
        type: "subscription_failed",
        message: `Unsupported book depth ${subscription.depth}; expected one of ${KRAKEN_BOOK_DEPTHS.join(", ")}`,
      });
    }

    this.subscriptions.push(subscription);

    if (this.connection) {
      return this.sendSubscribe(this.connection, subscription);
    }
    return ok(undefined);
  }

  async disconnect(): Promise<Result<void, BookFeedError>> {
    const connection = this.connection;
    if (!connection) return ok(undefined);

    this.connection = null;
    this.isConnected_ = false;

    await connection.close();
    await this.listening;
    this.listening = null;

    this.emitEvent({ type: "disconnected", ts: this.now(), venue: KRAKEN_VENUE, reason: "requested" });
    return ok(undefined);
  }

  onEvent(handler: (event: BookFeedEvent) => void): void {
    this.eventHandlers.push(handler);
  }

  isConnected(): boolean {
    return this.isConnected_;
  }

  // ============================================================================
  // Stream
  // ============================================================================

  private sendSubscribe(connection: IWsConnection, subscription: BookFeedSubscription): Result<void, BookFeedError> {
    const request = buildBookSubscribeRequest(subscription.symbols, subscription.depth, this.nextReqId++);
    try {
      connection.send(JSON.stringify(request));
      log.info("Book subscription sent", { symbols: subscription.symbols.join(","), depth: subscription.depth });
      return ok(undefined);
    } catch (error) {
      return err({
        type: "subscription_failed",
        message: error instanceof Error ? error.message : "Unknown error",
      });
    }
  }

  private async listen(connection: IWsConnection): Promise<void> {
    try {
      for await (const frame of connection) {
        if (this.connection !== connection) break;
        this.handleFrame(frame);
      }

      if (this.connection === connection) {
        log.warn("Book stream ended unexpectedly");
        this.handleDisconnect("stream_ended");
      }
    } catch (error) {
      if (this.connection === connection) {
        log.warn("Book stream failed", { error });
        this.handleDisconnect(error instanceof Error ? error.message : "stream_error");
      }
    }
  }

  private handleDisconnect(reason: string): void {
    this.connection = null;
    this.isConnected_ = false;
    this.emitEvent({ type: "disconnected", ts: this.now(), venue: KRAKEN_VENUE, reason });
  }

  // ============================================================================
  // Frame Handling
  // ============================================================================

  private handleFrame(frame: WsFrame): void {
    const receivedAt = this.now();

    if (frame.data === undefined) {
      log.warn("Ignoring non-JSON frame", { length: frame.text.length });
      return;
    }

    const ack = KrakenMethodAckSchema.safeParse(frame.data);
    if (ack.success) {
      this.handleAck(ack.data);
      return;
    }

    const parsed = KrakenChannelFrameSchema.safeParse(frame.data);
    if (!parsed.success) {
      log.debug("Ignoring unrecognized frame");
      return;
    }

    // heartbeat / status / other channels
    if (parsed.data.channel !== "book") return;

    const header = KrakenBookEntryHeaderSchema.safeParse(parsed.data.data?.[0]);
    const symbol = header.success ? (header.data.symbol ?? "") : "";

    if (!this.sawFirstBook) {
      this.sawFirstBook = true;
      log.info("First book frame received", { symbol, kind: parsed.data.type });
    }

    this.emitEvent({
      type: "book",
      receivedAt,
      message: {
        channel: parsed.data.channel,
        symbol,
        kind: parsed.data.type,
        timestamp: header.success ? (header.data.timestamp ?? null) : null,
        checksum: header.success ? (header.data.checksum ?? null) : null,
        payload: frame.data,
        rawText: frame.text,
      },
    });
  }

  private handleAck(ack: KrakenMethodAck): void {
    if (ack.success) {
      log.info("Subscription acknowledged", { method: ack.method, symbol: ack.result?.symbol });
    } else {
      log.error("Subscription rejected", { method: ack.method, error: ack.error });
    }
  }

  private emitEvent(event: BookFeedEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        log.error("Event handler threw an error", { error });
      }
    }
  }
}
