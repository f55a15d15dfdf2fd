export {
  createClient,
  type CreateClientOptions,
  type Credentials,
  type FieldOptions,
  type PatchOperation,
  RecordClient,
  type RecordData,
} from "./client";
export {
  type ClientConfig,
  type ClientConfigInput,
  clientConfigSchema,
  configFromEnv,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_LIVE_HIGH_WATER_MARK,
  DEFAULT_REQUEST_TIMEOUT_MS,
  resolveClientConfig,
} from "./config";
export {
  type ClientHooks,
  type DroppedNotificationReason,
  type RequestHookContext,
} from "./hooks";
export {
  createLogger,
  defaultLogger,
  type LogEntry,
  type Logger,
  type LogLevel,
  silentLogger,
} from "./logger";
