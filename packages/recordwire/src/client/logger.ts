/**
 * Structured JSON logger.
 *
 * Log format:
 * { timestamp, level, event, requestId?, method?, ... }
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEntry = Readonly<{
  event: string;
  requestId?: string;
  liveId?: string;
  method?: string;
  durationMs?: number;
  error?: string;
  [key: string]: unknown;
}>;

export type Logger = Readonly<{
  debug(entry: LogEntry): void;
  info(entry: LogEntry): void;
  warn(entry: LogEntry): void;
  error(entry: LogEntry): void;
}>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Creates a logger writing one JSON object per line.
 *
 * @param output - Line sink (default: stderr via console.error)
 * @param minLevel - Entries below this level are discarded
 */
export function createLogger(
  output: (line: string) => void = (line) => {
    console.error(line);
  },
  minLevel: LogLevel = "warn",
): Logger {
  const log = (level: LogLevel, entry: LogEntry) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    output(
      JSON.stringify({ timestamp: new Date().toISOString(), level, ...entry }),
    );
  };

  return {
    debug: (entry) => log("debug", entry),
    info: (entry) => log("info", entry),
    warn: (entry) => log("warn", entry),
    error: (entry) => log("error", entry),
  };
}

/**
 * Discards everything.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Default for a client without an explicit logger: warnings and errors
 * outside production, nothing in production.
 */
export function defaultLogger(minLevel: LogLevel = "warn"): Logger {
  return isProduction() ? silentLogger : createLogger(undefined, minLevel);
}

function isProduction(): boolean {
  if (typeof process === "undefined") {
    return false;
  }
  return process.env.NODE_ENV === "production";
}
