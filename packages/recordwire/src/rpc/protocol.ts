/**
 * Wire envelopes.
 *
 * Outbound: `{ id, method, params }`.
 * Inbound: a reply `{ id, result }`, a failure `{ id, error }`, or a live
 * notification `{ result: { id, action, result } }` carrying no request id.
 */
import { z } from "zod";

import { ProtocolError } from "../errors";

// ============================================================
// Outbound
// ============================================================

export type RequestEnvelope = Readonly<{
  id: string;
  method: string;
  params: readonly unknown[];
}>;

export function encodeRequest(envelope: RequestEnvelope): string {
  return JSON.stringify(envelope);
}

// ============================================================
// Inbound
// ============================================================

export type LiveAction = "CREATE" | "UPDATE" | "DELETE" | "CLOSE";

export type RemoteFailure = Readonly<{
  code: number | undefined;
  message: string;
}>;

export type InboundFrame =
  | Readonly<{ kind: "reply"; id: string; result: unknown }>
  | Readonly<{ kind: "failure"; id: string; error: RemoteFailure }>
  | Readonly<{
      kind: "notification";
      liveId: string;
      action: LiveAction;
      result: unknown;
    }>;

const idSchema = z.union([z.string(), z.number()]).transform(String);

const errorSchema = z.object({
  code: z.number().optional(),
  message: z.string(),
});

const responseSchema = z.object({
  id: idSchema,
  result: z.unknown().optional(),
  error: errorSchema.nullish(),
});

const notificationSchema = z.object({
  id: z.null().optional(),
  result: z.object({
    id: idSchema,
    action: z
      .string()
      .transform((action) => action.toUpperCase())
      .pipe(z.enum(["CREATE", "UPDATE", "DELETE", "CLOSE", "KILLED"])),
    result: z.unknown().optional(),
  }),
});

/**
 * Parses one inbound text frame.
 *
 * @throws ProtocolError when the text is not JSON or matches no envelope
 */
export function decodeFrame(text: string): InboundFrame {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new ProtocolError(
      "Inbound frame is not valid JSON",
      {},
      { cause: error },
    );
  }

  const notification = notificationSchema.safeParse(value);
  if (notification.success) {
    const { id, action, result } = notification.data.result;
    return {
      kind: "notification",
      liveId: id,
      action: action === "KILLED" ? "CLOSE" : action,
      result,
    };
  }

  const response = responseSchema.safeParse(value);
  if (response.success) {
    const { id, result, error } = response.data;
    if (error !== undefined && error !== null) {
      return {
        kind: "failure",
        id,
        error: { code: error.code, message: error.message },
      };
    }
    return { kind: "reply", id, result };
  }

  throw new ProtocolError("Inbound frame matches no known envelope", {
    frame: text.length > 200 ? `${text.slice(0, 200)}…` : text,
  });
}

// ============================================================
// Query results
// ============================================================

const statementResultSchema = z.object({
  status: z.string(),
  result: z.unknown().optional(),
  detail: z.string().optional(),
  time: z.string().optional(),
});

export type StatementResult = z.output<typeof statementResultSchema>;

/**
 * Reads the per-statement results of a `query` call.
 *
 * @throws ProtocolError when the shape is not a list of statement results
 */
export function decodeQueryResults(value: unknown): readonly StatementResult[] {
  const parsed = z.array(statementResultSchema).safeParse(value);
  if (!parsed.success) {
    throw new ProtocolError(
      "Query response is not a list of statement results",
      {},
      { cause: parsed.error },
    );
  }
  return parsed.data;
}
