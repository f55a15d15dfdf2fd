/**
 * Recordwire Error Hierarchy
 *
 * All errors extend RecordwireError with:
 * - `code`: Machine-readable error code for programmatic handling
 * - `category`: Classification for error handling strategies
 * - `suggestion`: Optional recovery guidance for users
 * - `details`: Structured context about the error
 *
 * @example
 * ```typescript
 * try {
 *   await client.query("SELECT * FROM user");
 * } catch (error) {
 *   if (isRecordwireError(error)) {
 *     console.error(error.toUserMessage());
 *     if (isRetryable(error)) {
 *       // Reconnect and try again
 *     }
 *   }
 * }
 * ```
 */

// ============================================================
// Types
// ============================================================

/**
 * Error category for programmatic handling.
 *
 * - `user`: Caused by invalid input or incorrect usage. Recoverable by fixing input.
 * - `constraint`: Rejected by the remote database. Recoverable by changing the request.
 * - `system`: Transport or infrastructure issue. May require investigation or retry.
 */
export type ErrorCategory = "user" | "constraint" | "system";

/**
 * Options for RecordwireError constructor.
 */
export type RecordwireErrorOptions = Readonly<{
  /** Structured context about the error */
  details?: Record<string, unknown>;
  /** Error category for handling strategies */
  category: ErrorCategory;
  /** Recovery guidance for users */
  suggestion?: string;
  /** Underlying cause of the error */
  cause?: unknown;
}>;

function formatCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.stack ?? cause.message;
  }
  if (typeof cause === "string") {
    return cause;
  }
  if (
    typeof cause === "number" ||
    typeof cause === "boolean" ||
    typeof cause === "bigint"
  ) {
    return String(cause);
  }
  if (typeof cause === "symbol") {
    return cause.description ?? "Symbol";
  }
  if (cause === undefined) {
    return "Unknown cause";
  }

  try {
    return JSON.stringify(cause);
  } catch (error) {
    return `Unserializable cause: ${
      error instanceof Error ? error.message : "Unknown error"
    }`;
  }
}

// ============================================================
// Base Error
// ============================================================

/**
 * Base error class for all recordwire errors.
 */
export class RecordwireError extends Error {
  /** Machine-readable error code (e.g., "TIMEOUT") */
  readonly code: string;

  readonly category: ErrorCategory;

  readonly details: Readonly<Record<string, unknown>>;

  readonly suggestion?: string;

  constructor(message: string, code: string, options: RecordwireErrorOptions) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = "RecordwireError";
    this.code = code;
    this.category = options.category;
    this.details = Object.freeze(options.details ?? {});
    if (options.suggestion !== undefined) {
      this.suggestion = options.suggestion;
    }
  }

  /**
   * Returns a user-friendly error message with suggestion if available.
   */
  toUserMessage(): string {
    if (this.suggestion) {
      return `${this.message}\n\nSuggestion: ${this.suggestion}`;
    }
    return this.message;
  }

  /**
   * Returns a detailed string representation for logging.
   */
  toLogString(): string {
    const lines = [
      `[${this.code}] ${this.message}`,
      `  Category: ${this.category}`,
    ];

    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`);
    }

    if (Object.keys(this.details).length > 0) {
      lines.push(`  Details: ${JSON.stringify(this.details)}`);
    }

    if (this.cause) {
      lines.push(`  Cause: ${formatCause(this.cause)}`);
    }

    return lines.join("\n");
  }
}

// ============================================================
// Usage Errors (category: "user")
// ============================================================

/**
 * Validation issue from Zod or custom validation.
 */
export type ValidationIssue = Readonly<{
  /** Path to the invalid field (e.g., "hashing.bcryptCost") */
  path: string;
  message: string;
  /** Zod error code if from Zod validation */
  code?: string;
}>;

export type ValidationErrorDetails = Readonly<{
  /** What was being validated (e.g., "client config", "inbound frame") */
  subject: string;
  issues: readonly ValidationIssue[];
}>;

/**
 * Thrown when a value fails schema validation.
 */
export class ValidationError extends RecordwireError {
  declare readonly details: ValidationErrorDetails;

  constructor(
    message: string,
    details: ValidationErrorDetails,
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "VALIDATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ??
        `Check the ${details.subject} against the expected shape.`,
      cause: options?.cause,
    });
    this.name = "ValidationError";
  }
}

/**
 * Thrown when configuration is invalid, for example an out-of-range hashing
 * strength or an AES key that is too short.
 */
export class ConfigurationError extends RecordwireError {
  constructor(
    message: string,
    details: Readonly<Record<string, unknown>> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "CONFIGURATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ??
        `Check the client and field configuration for invalid values.`,
      cause: options?.cause,
    });
    this.name = "ConfigurationError";
  }
}

/**
 * The endpoint of a relation that was never supplied.
 */
export type MissingTargetPart = "from" | "to" | "via";

/**
 * Thrown synchronously by the relation builder when source, destination
 * or edge table is missing.
 *
 * @example
 * ```typescript
 * try {
 *   await client.relation().from("user:alice").via("purchased").build();
 * } catch (error) {
 *   if (error instanceof MissingTargetError) {
 *     console.log(error.details.missing); // "to"
 *   }
 * }
 * ```
 */
export class MissingTargetError extends RecordwireError {
  declare readonly details: Readonly<{ missing: MissingTargetPart }>;

  constructor(missing: MissingTargetPart) {
    const what: Record<MissingTargetPart, string> = {
      from: "FROM record not set",
      to: "TO record not set",
      via: "Edge table not set",
    };
    super(`${what[missing]}. Use .${missing}()`, "MISSING_TARGET", {
      details: { missing },
      category: "user",
      suggestion: `Call .${missing}() before building the relation.`,
    });
    this.name = "MissingTargetError";
  }
}

/**
 * Thrown when an operation needs session state that is not there yet,
 * such as a query before a namespace and database are selected.
 */
export class SessionError extends RecordwireError {
  constructor(
    message: string,
    details: Readonly<Record<string, unknown>> = {},
    options?: { suggestion?: string },
  ) {
    super(message, "SESSION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ??
        `Call use(namespace, database) before issuing queries.`,
    });
    this.name = "SessionError";
  }
}

// ============================================================
// Remote Errors (category: "constraint")
// ============================================================

/**
 * Thrown when the server answers a request with an error frame, or when a
 * statement inside a query batch reports a non-OK status.
 */
export class RemoteError extends RecordwireError {
  declare readonly details: Readonly<{
    method: string;
    remoteCode?: number;
    statementIndex?: number;
  }>;

  constructor(
    message: string,
    details: Readonly<{
      method: string;
      remoteCode?: number;
      statementIndex?: number;
    }>,
  ) {
    super(message, "REMOTE_ERROR", {
      details,
      category: "constraint",
      suggestion: `The database rejected the request. Check the statement, permissions and session scope.`,
    });
    this.name = "RemoteError";
  }
}

// ============================================================
// Transport Errors (category: "system")
// ============================================================

/**
 * Thrown when the transport cannot be opened, or when it closes while
 * requests are still pending.
 */
export class ConnectionError extends RecordwireError {
  constructor(
    message: string,
    details: Readonly<Record<string, unknown>> = {},
    options?: { cause?: unknown },
  ) {
    super(message, "CONNECTION_ERROR", {
      details,
      category: "system",
      suggestion: `Check that the database is reachable and reconnect.`,
      cause: options?.cause,
    });
    this.name = "ConnectionError";
  }
}

/**
 * Thrown when no response arrived before the request deadline.
 * The server may still complete the work.
 */
export class TimeoutError extends RecordwireError {
  declare readonly details: Readonly<{
    method: string;
    requestId: string;
    timeoutMs: number;
  }>;

  constructor(
    details: Readonly<{ method: string; requestId: string; timeoutMs: number }>,
  ) {
    super(
      `Request ${details.method} (${details.requestId}) timed out after ${details.timeoutMs}ms`,
      "TIMEOUT",
      {
        details,
        category: "system",
        suggestion: `Raise requestTimeoutMs or narrow the request. The server may still apply it.`,
      },
    );
    this.name = "TimeoutError";
  }
}

/**
 * Thrown when an inbound frame does not match any known envelope.
 */
export class ProtocolError extends RecordwireError {
  constructor(
    message: string,
    details: Readonly<Record<string, unknown>> = {},
    options?: { cause?: unknown },
  ) {
    super(message, "PROTOCOL_ERROR", {
      details,
      category: "system",
      cause: options?.cause,
    });
    this.name = "ProtocolError";
  }
}

/**
 * Thrown when a ciphertext fails authentication or is malformed, usually
 * because of tampering or a wrong key.
 */
export class DecryptionError extends RecordwireError {
  constructor(
    message: string,
    details: Readonly<Record<string, unknown>> = {},
    options?: { cause?: unknown },
  ) {
    super(message, "DECRYPTION_ERROR", {
      details,
      category: "system",
      suggestion: `Make sure every client uses the same encryption key.`,
      cause: options?.cause,
    });
    this.name = "DecryptionError";
  }
}

// ============================================================
// Utility Functions
// ============================================================

export function isRecordwireError(error: unknown): error is RecordwireError {
  return error instanceof RecordwireError;
}

/**
 * Check if error is recoverable by user action (user or constraint error).
 */
export function isUserRecoverable(error: unknown): boolean {
  if (!isRecordwireError(error)) return false;
  return error.category === "user" || error.category === "constraint";
}

/**
 * Check if error indicates a transport or infrastructure issue.
 */
export function isSystemError(error: unknown): boolean {
  return isRecordwireError(error) && error.category === "system";
}

/**
 * Connection loss and timeouts are worth a retry after reconnecting.
 * Note that a timed-out write may already have been applied.
 */
export function isRetryable(error: unknown): boolean {
  return error instanceof ConnectionError || error instanceof TimeoutError;
}

/**
 * Extract suggestion from error if available.
 */
export function getErrorSuggestion(error: unknown): string | undefined {
  return isRecordwireError(error) ? error.suggestion : undefined;
}
