/**
 * Transport - a persistent, bidirectional text channel.
 */
import WebSocket from "ws";

import { ConnectionError } from "../errors";
import { SerialQueue } from "../utils/serial-queue";

// ============================================================
// Types
// ============================================================

export type MessageListener = (text: string) => void;
export type CloseListener = (reason: string) => void;

export type Transport = Readonly<{
  /** @throws ConnectionError when the channel cannot be opened in time */
  open(timeoutMs: number): Promise<void>;
  /** Resolves once the frame is fully written. */
  send(text: string): Promise<void>;
  close(): Promise<void>;
  onMessage(listener: MessageListener): void;
  /** Called once when the channel closes, for any reason. */
  onClose(listener: CloseListener): void;
}>;

// ============================================================
// WebSocket
// ============================================================

export type WebSocketTransportOptions = Readonly<{
  headers?: Readonly<Record<string, string>>;
}>;

/**
 * Transport over the `ws` package. Frames are written one at a time: a
 * send starts only after the previous one has been flushed.
 */
export class WebSocketTransport implements Transport {
  readonly #url: string;
  readonly #options: WebSocketTransportOptions;
  readonly #writes = new SerialQueue();
  readonly #messageListeners: MessageListener[] = [];
  readonly #closeListeners: CloseListener[] = [];
  #socket: WebSocket | undefined;

  constructor(url: string, options: WebSocketTransportOptions = {}) {
    this.#url = url;
    this.#options = options;
  }

  open(timeoutMs: number): Promise<void> {
    if (this.#socket?.readyState === WebSocket.OPEN) return Promise.resolve();

    return new Promise((resolve, reject) => {
      const socket = new WebSocket(this.#url, {
        ...(this.#options.headers !== undefined && {
          headers: { ...this.#options.headers },
        }),
      });
      this.#socket = socket;
      let opened = false;

      const timer = setTimeout(() => {
        socket.terminate();
        reject(
          new ConnectionError(`Connection to ${this.#url} timed out`, {
            url: this.#url,
            timeoutMs,
          }),
        );
      }, timeoutMs);

      socket.on("open", () => {
        opened = true;
        clearTimeout(timer);
        resolve();
      });

      socket.on("message", (data, isBinary) => {
        if (isBinary) return;
        const text = data.toString();
        for (const listener of this.#messageListeners) listener(text);
      });

      socket.on("error", (error) => {
        if (opened) return;
        clearTimeout(timer);
        reject(
          new ConnectionError(
            `Could not connect to ${this.#url}`,
            { url: this.#url },
            { cause: error },
          ),
        );
      });

      socket.on("close", (code, reason) => {
        clearTimeout(timer);
        if (this.#socket === socket) this.#socket = undefined;
        if (!opened) return;
        const text = reason.toString() || `closed with code ${code}`;
        for (const listener of this.#closeListeners) listener(text);
      });
    });
  }

  send(text: string): Promise<void> {
    return this.#writes.run(
      () =>
        new Promise<void>((resolve, reject) => {
          const socket = this.#socket;
          if (socket?.readyState !== WebSocket.OPEN) {
            reject(new ConnectionError("Connection is not open"));
            return;
          }
          socket.send(text, (error) => {
            if (error) {
              reject(
                new ConnectionError("Failed to write frame", {}, { cause: error }),
              );
            } else {
              resolve();
            }
          });
        }),
    );
  }

  close(): Promise<void> {
    const socket = this.#socket;
    if (socket === undefined || socket.readyState === WebSocket.CLOSED) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      socket.once("close", () => {
        resolve();
      });
      socket.close(1000, "Client disconnect");
    });
  }

  onMessage(listener: MessageListener): void {
    this.#messageListeners.push(listener);
  }

  onClose(listener: CloseListener): void {
    this.#closeListeners.push(listener);
  }
}
