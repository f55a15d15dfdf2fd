/**
 * RequestCorrelator - matches replies to the requests that caused them.
 */
import { type ClientHooks, type RequestHookContext } from "../client/hooks";
import { type Logger } from "../client/logger";
import { ConfigurationError, RemoteError, TimeoutError } from "../errors";
import { generateId, generateUniqueId, type IdGenerator } from "../utils/id";
import { encodeRequest, type InboundFrame } from "./protocol";

// ============================================================
// Types
// ============================================================

type PendingRequest = Readonly<{
  context: RequestHookContext;
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
  detach: () => void;
}>;

export type CorrelatorOptions = Readonly<{
  /** Writes one encoded envelope to the transport. */
  write: (text: string) => Promise<void>;
  defaultTimeoutMs: number;
  logger: Logger;
  hooks?: ClientHooks;
  idGenerator?: IdGenerator;
}>;

/** Longest delay a Node.js timer accepts. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export type SendOptions = Readonly<{
  /** Overrides the default deadline for this request. */
  timeoutMs?: number;
  /**
   * Aborting stops waiting and frees the pending entry. The server is not
   * told, so the operation may still complete remotely.
   */
  signal?: AbortSignal;
}>;

// ============================================================
// Correlator
// ============================================================

/**
 * Tracks in-flight requests by ID.
 *
 * Every request settles exactly once: with the reply, a {@link RemoteError},
 * a {@link TimeoutError}, an abort, or the error passed to `failAll`.
 * A reply whose ID is not pending (late, duplicate or foreign) is dropped
 * with a warning.
 */
export class RequestCorrelator {
  readonly #options: CorrelatorOptions;
  readonly #pending = new Map<string, PendingRequest>();

  constructor(options: CorrelatorOptions) {
    this.#options = options;
  }

  get pendingCount(): number {
    return this.#pending.size;
  }

  isPending(id: string): boolean {
    return this.#pending.has(id);
  }

  send(
    method: string,
    params: readonly unknown[],
    options: SendOptions = {},
  ): Promise<unknown> {
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(toError(signal.reason));
    }

    const timeoutMs = options.timeoutMs ?? this.#options.defaultTimeoutMs;
    if (!isTimerDelay(timeoutMs)) {
      return Promise.reject(
        new ConfigurationError(
          `Request timeout must be between 0 and ${MAX_TIMEOUT_MS} ms`,
          { method, timeoutMs },
        ),
      );
    }

    const id = generateUniqueId(
      this.#pending,
      this.#options.idGenerator ?? generateId,
    );
    const context: RequestHookContext = {
      requestId: id,
      method,
      startedAt: new Date(),
    };

    const result = new Promise<unknown>((resolve, reject) => {
      const onAbort = () => {
        this.#settle(id, { error: toError(signal?.reason) });
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      this.#pending.set(id, {
        context,
        resolve,
        reject,
        timer: setTimeout(() => {
          this.#settle(id, {
            error: new TimeoutError({ method, requestId: id, timeoutMs }),
          });
        }, timeoutMs),
        detach: () => signal?.removeEventListener("abort", onAbort),
      });
    });

    this.#options.hooks?.onRequestStart?.(context);
    this.#options.write(encodeRequest({ id, method, params })).catch(
      (error: unknown) => {
        this.#settle(id, { error: toError(error) });
      },
    );

    return result;
  }

  /**
   * Settles the request a reply or failure frame belongs to.
   *
   * @returns false when no request with that ID is pending
   */
  dispatch(
    frame: Extract<InboundFrame, { kind: "reply" | "failure" }>,
  ): boolean {
    if (!this.#pending.has(frame.id)) {
      this.#options.logger.warn({
        event: "reply.unmatched",
        requestId: frame.id,
      });
      return false;
    }

    if (frame.kind === "failure") {
      const pending = this.#pending.get(frame.id);
      this.#settle(frame.id, {
        error: new RemoteError(frame.error.message, {
          method: pending?.context.method ?? "unknown",
          ...(frame.error.code !== undefined && {
            remoteCode: frame.error.code,
          }),
        }),
      });
    } else {
      this.#settle(frame.id, { result: frame.result });
    }
    return true;
  }

  /**
   * Stops waiting for `id`. Its promise never settles and a later reply is
   * dropped as unmatched; the server-side operation is not cancelled.
   *
   * @returns false when `id` was not pending
   */
  abandon(id: string): boolean {
    const pending = this.#pending.get(id);
    if (pending === undefined) return false;

    this.#pending.delete(id);
    clearTimeout(pending.timer);
    pending.detach();
    this.#options.logger.debug({
      event: "request.abandoned",
      requestId: id,
      method: pending.context.method,
    });
    return true;
  }

  /**
   * Rejects every pending request with `error`.
   */
  failAll(error: Error): void {
    for (const id of [...this.#pending.keys()]) {
      this.#settle(id, { error });
    }
  }

  #settle(
    id: string,
    outcome: Readonly<{ result: unknown }> | Readonly<{ error: Error }>,
  ): void {
    const pending = this.#pending.get(id);
    if (pending === undefined) return;

    this.#pending.delete(id);
    clearTimeout(pending.timer);
    pending.detach();

    const { context } = pending;
    if ("error" in outcome) {
      this.#options.logger.debug({
        event: "request.failed",
        requestId: id,
        method: context.method,
        error: outcome.error.message,
      });
      this.#options.hooks?.onError?.(context, outcome.error);
      pending.reject(outcome.error);
      return;
    }

    this.#options.hooks?.onRequestEnd?.(context, {
      durationMs: Date.now() - context.startedAt.getTime(),
    });
    pending.resolve(outcome.result);
  }
}

function isTimerDelay(ms: number): boolean {
  return Number.isFinite(ms) && ms >= 0 && ms <= MAX_TIMEOUT_MS;
}

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}
