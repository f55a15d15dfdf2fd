// ============================================================
// Observability Hooks
// ============================================================

/**
 * Context passed to request hooks.
 */
export type RequestHookContext = Readonly<{
  /** Correlation ID carried in the request envelope */
  requestId: string;
  /** RPC method name (e.g., "query", "signin") */
  method: string;
  /** Timestamp when the request was written */
  startedAt: Date;
}>;

/**
 * Why a notification did not reach a subscriber.
 */
export type DroppedNotificationReason =
  | "unknown-subscription"
  | "buffer-overflow";

/**
 * Observability hooks for monitoring a client.
 *
 * Hooks run synchronously on the frame-handling path; keep them cheap.
 *
 * @example
 * ```typescript
 * const hooks: ClientHooks = {
 *   onRequestEnd: (ctx, result) => {
 *     console.log(`[${ctx.requestId}] ${ctx.method} in ${result.durationMs}ms`);
 *   },
 *   onError: (ctx, error) => {
 *     console.error(`[${ctx.requestId}] ${ctx.method} failed:`, error);
 *   },
 * };
 *
 * const client = createClient({ url: "ws://localhost:8000/rpc" }, { hooks });
 * ```
 */
export type ClientHooks = Readonly<{
  /** Called after a request envelope is handed to the transport */
  onRequestStart?: (ctx: RequestHookContext) => void;
  /** Called when a request resolves successfully */
  onRequestEnd?: (
    ctx: RequestHookContext,
    result: Readonly<{ durationMs: number }>,
  ) => void;
  /** Called when a request fails: remote error, timeout or disconnect */
  onError?: (ctx: RequestHookContext, error: Error) => void;
  /** Called for each live notification that was not delivered */
  onNotificationDropped?: (
    liveId: string,
    reason: DroppedNotificationReason,
  ) => void;
}>;
