/**
 * WsConnection - WebSocket connection wrapper with AsyncIterable support
 *
 * - Frames are yielded as received text plus the parsed JSON value
 * - `send()` for subscribe requests
 * - connect()/close()/isClosed() so callers decide what happens on disconnect
 */

import WebSocket from "ws";
import { createLogger } from "@book-replay/utils";

const log = createLogger("ws-connection");

/**
 * One text frame. `data` is undefined when the text is not valid JSON.
 */
export interface WsFrame {
  text: string;
  data: unknown;
}

export interface WsConnectionOptions {
  url: string;
  /** Optional handshake headers */
  headers?: Record<string, string>;
  /** Label for logging (e.g., "kraken:book") */
  label?: string;
}

/**
 * Usage:
 * ```ts
 * const conn = new WsConnection({ url: "wss://..." });
 * await conn.connect();
 * conn.send(JSON.stringify(request));
 * for await (const frame of conn) {
 *   // frame.text is the original text, frame.data the parsed value
 * }
 * ```
 */
export class WsConnection implements AsyncIterable<WsFrame> {
  private ws: WebSocket | null = null;
  private closed = true;
  private readonly url: string;
  private readonly headers: Record<string, string>;
  private readonly label: string;

  private queue: WsFrame[] = [];
  private pendingResolve: ((result: IteratorResult<WsFrame, undefined>) => void) | null = null;
  private pendingReject: ((error: unknown) => void) | null = null;
  private lastError: Error | null = null;

  constructor(options: WsConnectionOptions) {
    this.url = options.url;
    this.headers = options.headers ?? {};
    this.label = options.label ?? options.url;
  }

  async connect(): Promise<void> {
    if (this.ws && !this.closed) {
      return;
    }

    return new Promise((resolve, reject) => {
      this.closed = false;
      this.lastError = null;
      this.queue = [];

      const ws = new WebSocket(this.url, { headers: this.headers });
      this.ws = ws;
      let opened = false;

      ws.on("open", () => {
        opened = true;
        log.debug(`WsConnection opened: ${this.label}`);
        resolve();
      });

      ws.on("message", (data: WebSocket.RawData) => {
        const text = rawDataToText(data);
        this.enqueue({ text, data: parseJson(text) });
      });

      ws.on("close", (code, reason) => {
        log.debug(`WsConnection closed: ${this.label}`, { code, reason: reason.toString("utf8") });
        this.handleClose();
      });

      ws.on("error", error => {
        log.warn(`WsConnection error: ${this.label}`, { error });
        this.lastError = error;

        if (!opened) {
          this.closed = true;
          reject(error);
        } else {
          this.handleClose();
        }
      });
    });
  }

  /**
   * Send a text frame; throws when the socket is not open
   */
  send(text: string): void {
    if (!this.ws || this.closed || this.ws.readyState !== WebSocket.OPEN) {
      throw new Error(`WsConnection not open: ${this.label}`);
    }
    this.ws.send(text);
  }

  async close(): Promise<void> {
    if (this.closed) return;

    this.closed = true;

    if (this.ws) {
      this.ws.close();
      this.ws = null;
    }

    if (this.pendingResolve) {
      this.pendingResolve({ value: undefined, done: true });
      this.pendingResolve = null;
      this.pendingReject = null;
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  // =========================================================================
  // AsyncIterable Implementation
  // =========================================================================

  [Symbol.asyncIterator](): AsyncIterator<WsFrame, undefined> {
    return {
      next: async (): Promise<IteratorResult<WsFrame, undefined>> => {
        const queued = this.queue.shift();
        if (queued !== undefined) {
          return { value: queued, done: false };
        }

        if (this.closed) {
          if (this.lastError) {
            throw this.lastError;
          }
          return { value: undefined, done: true };
        }

        return new Promise<IteratorResult<WsFrame, undefined>>((resolve, reject) => {
          this.pendingResolve = resolve;
          this.pendingReject = reject;
        });
      },

      return: async (): Promise<IteratorResult<WsFrame, undefined>> => {
        await this.close();
        return { value: undefined, done: true };
      },
    };
  }

  // =========================================================================
  // Private Helpers
  // =========================================================================

  private enqueue(frame: WsFrame): void {
    if (this.pendingResolve) {
      const resolve = this.pendingResolve;
      this.pendingResolve = null;
      this.pendingReject = null;
      resolve({ value: frame, done: false });
    } else {
      this.queue.push(frame);
    }
  }

  private handleClose(): void {
    this.closed = true;

    if (this.pendingResolve) {
      const resolve = this.pendingResolve;
      const reject = this.pendingReject;
      this.pendingResolve = null;
      this.pendingReject = null;

      if (this.lastError && reject) {
        reject(this.lastError);
      } else {
        resolve({ value: undefined, done: true });
      }
    }
  }
}

function rawDataToText(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

// ============================================================================
// Injection seam
// ============================================================================

/**
 * Interface for WebSocket connections used by adapters.
 * Both WsConnection and test fakes implement this interface.
 */
export interface IWsConnection extends AsyncIterable<WsFrame> {
  connect: () => Promise<void>;
  send: (text: string) => void;
  close: () => Promise<void>;
  isClosed: () => boolean;
}

export type WsConnectionFactory = (url: string, headers?: Record<string, string>, label?: string) => IWsConnection;

export const defaultConnectionFactory: WsConnectionFactory = (url, headers, label) =>
  new WsConnection({ url, headers, label });
