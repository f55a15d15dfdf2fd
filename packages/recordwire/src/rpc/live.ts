/**
 * Live subscriptions.
 *
 * One transport carries notifications for every live query. The router
 * hands each notification to the stream of the subscription it names and
 * drops the rest. Each stream buffers up to a high-water mark and then
 * discards its oldest entries, so a slow consumer never holds up the
 * others or the transport.
 */
import {
  type ClientHooks,
  type DroppedNotificationReason,
} from "../client/hooks";
import { type Logger } from "../client/logger";
import { ConnectionError, ProtocolError } from "../errors";
import { type FieldDescriptor } from "../security/field-descriptor";
import { type EncryptionPipeline } from "../security/pipeline";
import { type LiveSelectStatement } from "../statement/live-statement";
import { isRecord } from "../utils/guards";
import {
  decodeQueryResults,
  type InboundFrame,
  type LiveAction,
} from "./protocol";

// ============================================================
// Types
// ============================================================

export type LiveNotification = Readonly<{
  liveId: string;
  action: Exclude<LiveAction, "CLOSE">;
  result: unknown;
  /** Notifications discarded since the previous one was delivered. */
  lost: number;
}>;

export type SubscribeOptions = Readonly<{
  /** Receive JSON Patch diffs instead of whole records. */
  diff?: boolean;
  /** Reversible fields to decrypt in each notification's record. */
  fields?: readonly FieldDescriptor[];
}>;

export type LiveSubscription = Readonly<{
  id: string;
  target: string;
  stream: LiveStream;
}>;

type Sender = (method: string, params: readonly unknown[]) => Promise<unknown>;

export type LiveRouterOptions = Readonly<{
  send: Sender;
  pipeline: EncryptionPipeline;
  logger: Logger;
  hooks?: ClientHooks;
  highWaterMark: number;
}>;

// ============================================================
// Stream
// ============================================================

type Entry = Omit<LiveNotification, "lost">;

type Waiter = Readonly<{
  resolve: (result: IteratorResult<LiveNotification, undefined>) => void;
  reject: (error: Error) => void;
}>;

/**
 * A bounded, cancelable sequence of notifications for one subscription.
 *
 * Ending the iteration early (`break` in `for await`) cancels the
 * subscription on the server.
 */
export class LiveStream implements AsyncIterableIterator<LiveNotification> {
  readonly id: string;
  readonly #highWaterMark: number;
  readonly #onCancel: () => void;
  readonly #buffer: Entry[] = [];
  readonly #waiters: Waiter[] = [];
  #dropped = 0;
  #lostSinceDelivery = 0;
  #closed = false;
  #failure: Error | undefined;

  constructor(id: string, highWaterMark: number, onCancel: () => void) {
    this.id = id;
    this.#highWaterMark = highWaterMark;
    this.#onCancel = onCancel;
  }

  /** Total notifications discarded because the buffer was full. */
  get dropped(): number {
    return this.#dropped;
  }

  get buffered(): number {
    return this.#buffer.length;
  }

  get closed(): boolean {
    return this.#closed;
  }

  /**
   * Queues a notification.
   *
   * @returns false when the oldest buffered notification had to be dropped
   */
  push(entry: Entry): boolean {
    if (this.#closed) return true;

    const waiter = this.#waiters.shift();
    if (waiter !== undefined) {
      waiter.resolve({ done: false, value: this.#deliver(entry) });
      return true;
    }

    let kept = true;
    if (this.#buffer.length >= this.#highWaterMark) {
      this.#buffer.shift();
      this.#dropped++;
      this.#lostSinceDelivery++;
      kept = false;
    }
    this.#buffer.push(entry);
    return kept;
  }

  /**
   * Ends the stream. Buffered notifications are still delivered; after
   * them, iteration finishes, or throws `error` when one is given.
   */
  end(error?: Error): void {
    if (this.#closed) return;
    this.#closed = true;
    this.#failure = error;

    for (const waiter of this.#waiters.splice(0)) {
      if (error === undefined) {
        waiter.resolve({ done: true, value: undefined });
      } else {
        waiter.reject(error);
      }
    }
  }

  next(): Promise<IteratorResult<LiveNotification, undefined>> {
    const entry = this.#buffer.shift();
    if (entry !== undefined) {
      return Promise.resolve({ done: false, value: this.#deliver(entry) });
    }
    if (this.#closed) {
      return this.#failure === undefined ?
          Promise.resolve({ done: true, value: undefined })
        : Promise.reject(this.#failure);
    }
    return new Promise((resolve, reject) => {
      this.#waiters.push({ resolve, reject });
    });
  }

  return(): Promise<IteratorResult<LiveNotification, undefined>> {
    const wasOpen = !this.#closed;
    this.#buffer.length = 0;
    this.end();
    if (wasOpen) this.#onCancel();
    return Promise.resolve({ done: true, value: undefined });
  }

  [Symbol.asyncIterator](): LiveStream {
    return this;
  }

  #deliver(entry: Entry): LiveNotification {
    const lost = this.#lostSinceDelivery;
    this.#lostSinceDelivery = 0;
    return { ...entry, lost };
  }
}

// ============================================================
// Router
// ============================================================

type Registration = Readonly<{
  subscription: LiveSubscription;
  fields: readonly FieldDescriptor[];
}>;

export class LiveSubscriptionRouter {
  readonly #options: LiveRouterOptions;
  readonly #subscriptions = new Map<string, Registration>();

  constructor(options: LiveRouterOptions) {
    this.#options = options;
  }

  get size(): number {
    return this.#subscriptions.size;
  }

  has(id: string): boolean {
    return this.#subscriptions.has(id);
  }

  /**
   * Starts a live query on a table, or on a `LIVE SELECT` statement.
   */
  async subscribe(
    target: string | LiveSelectStatement,
    options: SubscribeOptions = {},
  ): Promise<LiveSubscription> {
    const id =
      typeof target === "string" ?
        await this.#startTable(target, options.diff ?? false)
      : await this.#startStatement(target);

    const stream = new LiveStream(id, this.#options.highWaterMark, () => {
      this.unsubscribe(id).catch((error: unknown) => {
        this.#options.logger.warn({
          event: "live.kill_failed",
          liveId: id,
          error: error instanceof Error ? error.message : String(error),
        });
      });
    });
    const subscription: LiveSubscription = {
      id,
      target: typeof target === "string" ? target : target.table,
      stream,
    };
    this.#subscriptions.set(id, {
      subscription,
      fields: options.fields ?? [],
    });
    return subscription;
  }

  /**
   * Stops routing to `id`, ends its stream and kills the live query.
   * Notifications for `id` are dropped from the moment this is called.
   */
  async unsubscribe(id: string): Promise<void> {
    const registration = this.#subscriptions.get(id);
    if (registration === undefined) return;

    this.#subscriptions.delete(id);
    registration.subscription.stream.end();
    await this.#options.send("kill", [id]);
  }

  /**
   * Delivers a notification frame.
   *
   * @returns false when it was dropped
   */
  route(frame: Extract<InboundFrame, { kind: "notification" }>): boolean {
    const registration = this.#subscriptions.get(frame.liveId);
    if (registration === undefined) {
      this.#dropped(frame.liveId, "unknown-subscription");
      return false;
    }

    const { stream } = registration.subscription;
    if (frame.action === "CLOSE") {
      this.#subscriptions.delete(frame.liveId);
      stream.end();
      return true;
    }

    const result = this.#decrypt(frame.result, registration.fields);
    const kept = stream.push({
      liveId: frame.liveId,
      action: frame.action,
      result,
    });
    if (!kept) this.#dropped(frame.liveId, "buffer-overflow");
    return true;
  }

  /**
   * Ends every stream without contacting the server: after `reset` the
   * server has already dropped them, and after a disconnect it cannot be
   * reached.
   */
  endAll(error?: ConnectionError): void {
    const registrations = [...this.#subscriptions.values()];
    this.#subscriptions.clear();
    for (const { subscription } of registrations) {
      subscription.stream.end(error);
    }
  }

  async #startTable(table: string, diff: boolean): Promise<string> {
    return expectLiveId(await this.#options.send("live", [table, diff]));
  }

  async #startStatement(statement: LiveSelectStatement): Promise<string> {
    const results = decodeQueryResults(
      await this.#options.send("query", [
        statement.render(),
        statement.bindings,
      ]),
    );
    const first = results[0];
    if (first === undefined) {
      throw new ProtocolError("LIVE SELECT returned no result");
    }
    return expectLiveId(first.result);
  }

  #decrypt(result: unknown, fields: readonly FieldDescriptor[]): unknown {
    if (fields.length === 0 || !isRecord(result)) return result;

    const record = { ...result };
    const report = this.#options.pipeline.decryptFields(record, fields);
    for (const failure of report.failures) {
      this.#options.logger.warn({
        event: "live.decrypt_failed",
        field: failure.fieldName,
        error: failure.error.message,
      });
    }
    return record;
  }

  #dropped(liveId: string, reason: DroppedNotificationReason): void {
    this.#options.logger.warn({ event: "live.dropped", liveId, reason });
    this.#options.hooks?.onNotificationDropped?.(liveId, reason);
  }
}

function expectLiveId(value: unknown): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new ProtocolError("Live query did not return an ID", {
      received: typeof value,
    });
  }
  return value;
}
