/**
 * Client configuration.
 *
 * @example
 * ```typescript
 * const config = resolveClientConfig({
 *   url: "ws://localhost:8000/rpc",
 *   namespace: "shop",
 *   database: "main",
 *   auth: { username: "root", password: "test-secret" },
 * });
 * ```
 */
import { z } from "zod";

import { ConfigurationError } from "../errors";
import { zodIssuesToValidationIssues } from "../errors/validation";
import { MAX_TIMEOUT_MS } from "../rpc/correlator";
import { MIN_KEY_LENGTH } from "../security/cipher";

// ============================================================
// Schema
// ============================================================

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_CONNECT_TIMEOUT_MS = 15_000;
export const DEFAULT_LIVE_HIGH_WATER_MARK = 1000;

export const clientConfigSchema = z.object({
  /** WebSocket endpoint, e.g. `ws://localhost:8000/rpc` */
  url: z
    .string()
    .regex(/^wss?:\/\/\S+$/, "must be a ws:// or wss:// URL"),
  namespace: z.string().min(1).optional(),
  database: z.string().min(1).optional(),
  /** Root or namespace user signed in right after connecting */
  auth: z
    .object({
      username: z.string().min(1),
      password: z.string(),
    })
    .optional(),
  /** Key material for reversible field encryption */
  encryptionKey: z.string().min(MIN_KEY_LENGTH).optional(),
  requestTimeoutMs: z
    .number()
    .int()
    .positive()
    .max(MAX_TIMEOUT_MS)
    .default(DEFAULT_REQUEST_TIMEOUT_MS),
  connectTimeoutMs: z
    .number()
    .int()
    .positive()
    .max(MAX_TIMEOUT_MS)
    .default(DEFAULT_CONNECT_TIMEOUT_MS),
  /** Buffered notifications per live stream before the oldest are dropped */
  liveHighWaterMark: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_LIVE_HIGH_WATER_MARK),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("warn"),
});

/**
 * Configuration as accepted from callers (defaults optional).
 */
export type ClientConfigInput = z.input<typeof clientConfigSchema>;

/**
 * Configuration with every default applied.
 */
export type ClientConfig = z.output<typeof clientConfigSchema>;

// ============================================================
// Resolution
// ============================================================

/**
 * Validates `input` and applies defaults.
 *
 * @throws ConfigurationError listing every invalid setting
 */
export function resolveClientConfig(input: unknown): ClientConfig {
  const result = clientConfigSchema.safeParse(input);
  if (result.success) return result.data;

  const issues = zodIssuesToValidationIssues(result.error);
  throw new ConfigurationError(
    `Invalid client configuration: ${issues
      .map((issue) => `${issue.path || "(root)"} ${issue.message}`)
      .join("; ")}`,
    { issues },
    { cause: result.error },
  );
}

/**
 * Reads `RECORDWIRE_*` variables into a config input. Unset variables are
 * left out so schema defaults apply.
 *
 * | Variable | Setting |
 * |---|---|
 * | `RECORDWIRE_URL` | `url` |
 * | `RECORDWIRE_NAMESPACE` | `namespace` |
 * | `RECORDWIRE_DATABASE` | `database` |
 * | `RECORDWIRE_USERNAME`, `RECORDWIRE_PASSWORD` | `auth` |
 * | `RECORDWIRE_ENCRYPTION_KEY` | `encryptionKey` |
 * | `RECORDWIRE_REQUEST_TIMEOUT_MS` | `requestTimeoutMs` |
 * | `RECORDWIRE_LOG_LEVEL` | `logLevel` |
 */
export function configFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
): Record<string, unknown> {
  const input: Record<string, unknown> = {};
  const copy = (variable: string, key: string, numeric = false) => {
    const value = env[variable];
    if (value === undefined || value === "") return;
    input[key] = numeric ? Number(value) : value;
  };

  copy("RECORDWIRE_URL", "url");
  copy("RECORDWIRE_NAMESPACE", "namespace");
  copy("RECORDWIRE_DATABASE", "database");
  copy("RECORDWIRE_ENCRYPTION_KEY", "encryptionKey");
  copy("RECORDWIRE_REQUEST_TIMEOUT_MS", "requestTimeoutMs", true);
  copy("RECORDWIRE_LOG_LEVEL", "logLevel");

  const username = env.RECORDWIRE_USERNAME;
  if (username !== undefined && username !== "") {
    input.auth = { username, password: env.RECORDWIRE_PASSWORD ?? "" };
  }

  return input;
}
