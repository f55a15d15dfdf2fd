/**
 * recordwire: a typed client for record/graph databases spoken to over
 * JSON-RPC on a WebSocket.
 *
 * @example
 * ```typescript
 * import * as rw from "recordwire";
 *
 * const client = rw.createClient({
 *   url: "ws://localhost:8000/rpc",
 *   namespace: "shop",
 *   database: "main",
 *   encryptionKey: "test-secret-key",
 * });
 * await client.connect();
 *
 * const fields = rw.defineFields([
 *   rw.reversible("email"),
 *   rw.hashed("password", "argon2"),
 * ]);
 * await client.create("user:alice", { email: "a@example.com", password: "pw" }, { fields });
 *
 * for await (const event of (await client.live("user")).stream) {
 *   console.log(event.action, event.result);
 * }
 * ```
 */

// ============================================================
// Client
// ============================================================

export {
  createClient,
  type CreateClientOptions,
  type Credentials,
  type FieldOptions,
  type PatchOperation,
  RecordClient,
  type RecordData,
} from "./client/client";
export {
  type ClientConfig,
  type ClientConfigInput,
  clientConfigSchema,
  configFromEnv,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_LIVE_HIGH_WATER_MARK,
  DEFAULT_REQUEST_TIMEOUT_MS,
  resolveClientConfig,
} from "./client/config";
export {
  type ClientHooks,
  type DroppedNotificationReason,
  type RequestHookContext,
} from "./client/hooks";
export {
  createLogger,
  defaultLogger,
  type LogEntry,
  type Logger,
  type LogLevel,
  silentLogger,
} from "./client/logger";

// ============================================================
// Statements
// ============================================================

export {
  type Clause,
  create,
  edgeTarget,
  ExplainClause,
  type ExplainMode,
  FetchClause,
  FilterClause,
  formatDuration,
  formatValue,
  GroupByClause,
  insert,
  InsertStatement,
  joinFragments,
  LetStatement,
  letVariable,
  LimitOffsetClause,
  liveSelect,
  LiveSelectStatement,
  MutationStatement,
  type MutationVerb,
  OmitClause,
  OrderByClause,
  ParallelClause,
  parseTarget,
  raw,
  RawValue,
  type RecordRef,
  relate,
  RelationBuilder,
  type RelationBuilderConfig,
  remove,
  renderTarget,
  type ReturnMode,
  ReturnStatement,
  returnValue,
  select,
  SelectStatement,
  type SortDirection,
  SplitClause,
  type Statement,
  type StatementRunner,
  type StatementTarget,
  TimeoutClause,
  transaction,
  type TransactionOutcome,
  TransactionStatement,
  update,
  upsert,
  type WithEntityOptions,
} from "./statement";

// ============================================================
// Field security
// ============================================================

export {
  AesGcmCipher,
  createDefaultHashers,
  type DecryptionReport,
  defineFields,
  EncryptionPipeline,
  type EncryptionPipelineOptions,
  type FieldAlgorithm,
  type FieldCipher,
  type FieldDefaults,
  type FieldDescriptor,
  type FieldSpec,
  type HashAlgorithm,
  hashed,
  type HasherRegistry,
  type PasswordHasher,
  plain,
  reversible,
  reversibleFields,
  STRENGTH_RANGES,
} from "./security";

// ============================================================
// RPC
// ============================================================

export {
  type ConnectionState,
  KEEP,
  type LiveNotification,
  LiveStream,
  type LiveSubscription,
  type ScopeChange,
  type SendOptions,
  type Session,
  type SubscribeOptions,
  type Transport,
  WebSocketTransport,
} from "./rpc";

// ============================================================
// Errors
// ============================================================

export {
  ConfigurationError,
  ConnectionError,
  DecryptionError,
  type ErrorCategory,
  getErrorSuggestion,
  isRecordwireError,
  isRetryable,
  isSystemError,
  isUserRecoverable,
  MissingTargetError,
  type MissingTargetPart,
  ProtocolError,
  RecordwireError,
  RemoteError,
  SessionError,
  TimeoutError,
  ValidationError,
  type ValidationIssue,
} from "./errors";

// ============================================================
// Utilities
// ============================================================

export { err, isOk, ok, type Result } from "./utils";
