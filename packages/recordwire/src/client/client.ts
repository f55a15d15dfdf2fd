/**
 * RecordClient - session, queries and live subscriptions over one
 * connection.
 *
 * @example
 * ```typescript
 * const client = createClient({
 *   url: "ws://localhost:8000/rpc",
 *   namespace: "shop",
 *   database: "main",
 *   auth: { username: "root", password: "test-secret" },
 *   encryptionKey: "test-secret-key",
 * });
 * await client.connect();
 *
 * const [adults] = await client.execute(
 *   select("user").where("age >= $min").bind("min", 18).limit(10),
 * );
 *
 * await client
 *   .relation()
 *   .from("user:alice")
 *   .to("product:laptop")
 *   .via("purchased")
 *   .withData({ price: 999.99 })
 *   .execute();
 * ```
 */
import { z } from "zod";

import { ConnectionError, ProtocolError, RemoteError } from "../errors";
import { validateWith } from "../errors/validation";
import { RequestCorrelator, type SendOptions } from "../rpc/correlator";
import {
  type LiveSubscription,
  LiveSubscriptionRouter,
  type SubscribeOptions,
} from "../rpc/live";
import {
  decodeFrame,
  decodeQueryResults,
  type InboundFrame,
} from "../rpc/protocol";
import {
  type ConnectionState,
  KEEP,
  type ScopeChange,
  type Session,
  SessionState,
  transitions,
} from "../rpc/session";
import { type Transport, WebSocketTransport } from "../rpc/transport";
import { type FieldDescriptor } from "../security/field-descriptor";
import { type HasherRegistry } from "../security/hashers";
import { EncryptionPipeline, type FieldBag } from "../security/pipeline";
import { type LiveSelectStatement } from "../statement/live-statement";
import { relate, type RelationBuilder } from "../statement/relate-builder";
import { recordIdOf } from "../statement/target";
import { type RecordRef, type Statement } from "../statement/types";
import { isRecord } from "../utils/guards";
import { type IdGenerator } from "../utils/id";
import { SerialQueue } from "../utils/serial-queue";
import {
  type ClientConfig,
  type ClientConfigInput,
  resolveClientConfig,
} from "./config";
import { type ClientHooks } from "./hooks";
import { defaultLogger, type Logger } from "./logger";

// ============================================================
// Types
// ============================================================

export type CreateClientOptions = Readonly<{
  hooks?: ClientHooks;
  /** Defaults to JSON lines on stderr at the configured level. */
  logger?: Logger;
  /** Defaults to a WebSocket on the configured URL. */
  transport?: Transport;
  /** Defaults to one keyed by `encryptionKey`, or a disabled pipeline. */
  pipeline?: EncryptionPipeline;
  hashers?: HasherRegistry;
  idGenerator?: IdGenerator;
}>;

/**
 * Sign-in and sign-up parameters. Known keys are renamed to their wire
 * names; any other key is passed through as a record-access variable.
 */
export type Credentials = Readonly<{
  username?: string;
  password?: string;
  namespace?: string;
  database?: string;
  access?: string;
  [variable: string]: unknown;
}>;

export type RecordData = Readonly<Record<string, unknown>>;

/**
 * Descriptors of the fields to encrypt on the way out and decrypt on the
 * way back.
 */
export type FieldOptions = Readonly<{
  fields?: readonly FieldDescriptor[];
}>;

const patchOperationSchema = z.discriminatedUnion("op", [
  z.object({
    op: z.enum(["add", "replace", "test"]),
    path: z.string(),
    value: z.unknown(),
  }),
  z.object({ op: z.literal("remove"), path: z.string() }),
  z.object({
    op: z.enum(["move", "copy"]),
    from: z.string(),
    path: z.string(),
  }),
]);

/**
 * One JSON Patch (RFC 6902) operation.
 */
export type PatchOperation = z.input<typeof patchOperationSchema>;

const WIRE_CREDENTIAL_KEYS: Readonly<Record<string, string>> = {
  username: "user",
  password: "pass",
  namespace: "NS",
  database: "DB",
  access: "AC",
};

// ============================================================
// Client
// ============================================================

export class RecordClient {
  readonly #config: ClientConfig;
  readonly #transport: Transport;
  readonly #logger: Logger;
  readonly #pipeline: EncryptionPipeline;
  readonly #session = new SessionState();
  readonly #sessionWrites = new SerialQueue();
  readonly #correlator: RequestCorrelator;
  readonly #live: LiveSubscriptionRouter;

  constructor(config: ClientConfig, options: CreateClientOptions = {}) {
    this.#config = config;
    this.#transport = options.transport ?? new WebSocketTransport(config.url);
    this.#logger = options.logger ?? defaultLogger(config.logLevel);
    this.#pipeline =
      options.pipeline ??
      (config.encryptionKey === undefined ?
        EncryptionPipeline.disabled()
      : EncryptionPipeline.fromKey(config.encryptionKey, options.hashers));

    this.#correlator = new RequestCorrelator({
      write: (text) => this.#transport.send(text),
      defaultTimeoutMs: config.requestTimeoutMs,
      logger: this.#logger,
      ...(options.hooks !== undefined && { hooks: options.hooks }),
      ...(options.idGenerator !== undefined && {
        idGenerator: options.idGenerator,
      }),
    });
    this.#live = new LiveSubscriptionRouter({
      send: (method, params) => this.#call(method, params),
      pipeline: this.#pipeline,
      logger: this.#logger,
      highWaterMark: config.liveHighWaterMark,
      ...(options.hooks !== undefined && { hooks: options.hooks }),
    });

    this.#transport.onMessage((text) => {
      this.#receive(text);
    });
    this.#transport.onClose((reason) => {
      if (this.#session.connection.status === "disconnected") return;
      this.#logger.warn({ event: "connection.lost", reason });
      this.#teardown(
        new ConnectionError(`Connection closed: ${reason}`, {
          url: this.#config.url,
        }),
      );
    });
  }

  /** The current session snapshot. */
  get session(): Session {
    return this.#session.current;
  }

  get state(): ConnectionState {
    return this.#session.connection;
  }

  get pipeline(): EncryptionPipeline {
    return this.#pipeline;
  }

  /** Requests sent and not yet answered. */
  get pendingRequests(): number {
    return this.#correlator.pendingCount;
  }

  /** Live subscriptions currently routed. */
  get activeSubscriptions(): number {
    return this.#live.size;
  }

  // ============================================================
  // Lifecycle
  // ============================================================

  /**
   * Opens the connection, then signs in and selects the namespace and
   * database given in the configuration.
   *
   * @throws ConnectionError when the transport cannot be opened
   */
  async connect(): Promise<void> {
    if (this.#session.connection.status !== "disconnected") return;

    this.#session.apply(transitions.connecting);
    try {
      await this.#transport.open(this.#config.connectTimeoutMs);
    } catch (error) {
      this.#session.apply(transitions.disconnected);
      if (error instanceof ConnectionError) throw error;
      throw new ConnectionError(
        `Could not connect to ${this.#config.url}`,
        { url: this.#config.url },
        { cause: error },
      );
    }
    this.#session.apply(transitions.connected);
    this.#logger.info({ event: "connection.open", url: this.#config.url });

    const { auth, namespace, database } = this.#config;
    try {
      if (auth !== undefined) {
        await this.signin({ username: auth.username, password: auth.password });
      }
      if (namespace !== undefined || database !== undefined) {
        await this.use(namespace ?? KEEP, database ?? KEEP);
      }
    } catch (error) {
      await this.disconnect();
      throw error;
    }
  }

  /**
   * Closes the connection. Pending requests reject with a
   * {@link ConnectionError} and every live stream ends.
   */
  async disconnect(): Promise<void> {
    if (this.#session.connection.status === "disconnected") return;

    this.#teardown(
      new ConnectionError("Connection closed", { url: this.#config.url }),
    );
    await this.#transport.close();
    this.#logger.info({ event: "connection.closed", url: this.#config.url });
  }

  // ============================================================
  // Session
  // ============================================================

  /**
   * @returns the session token, when the server issues one
   */
  signin(credentials: Credentials): Promise<string | undefined> {
    return this.#authenticateWith("signin", credentials);
  }

  signup(credentials: Credentials): Promise<string | undefined> {
    return this.#authenticateWith("signup", credentials);
  }

  async authenticate(token: string): Promise<void> {
    await this.#mutate("authenticate", () => [token], (session) =>
      transitions.authenticated(session, token),
    );
  }

  async invalidate(): Promise<void> {
    await this.#mutate("invalidate", () => [], transitions.invalidated);
  }

  /**
   * The record of the signed-in record user, if any.
   */
  info(): Promise<unknown> {
    return this.#call("info", []);
  }

  /**
   * Clears token, scope, variables and live subscriptions. The
   * connection stays open.
   */
  async reset(): Promise<void> {
    await this.#mutate("reset", () => [], transitions.reset);
    this.#live.endAll();
  }

  async ping(): Promise<void> {
    await this.#call("ping", []);
  }

  async version(): Promise<string> {
    const result = await this.#call("version", []);
    if (typeof result !== "string") {
      throw new ProtocolError("version returned a non-string", {
        received: typeof result,
      });
    }
    return result;
  }

  /**
   * Selects namespace and database. `null` clears a part and
   * {@link KEEP} leaves it as it is.
   */
  async use(
    namespace: ScopeChange,
    database: ScopeChange = KEEP,
  ): Promise<void> {
    await this.#mutate(
      "use",
      (session) => [
        namespace === KEEP ? (session.namespace ?? null) : namespace,
        database === KEEP ? (session.database ?? null) : database,
      ],
      (session) => transitions.scoped(session, namespace, database),
    );
  }

  /**
   * Defines a connection-wide variable usable as `$name` in queries.
   */
  async let(name: string, value: unknown): Promise<void> {
    await this.#mutate("let", () => [name, value], (session) =>
      transitions.variableSet(session, name, value),
    );
  }

  async unset(name: string): Promise<void> {
    await this.#mutate("unset", () => [name], (session) =>
      transitions.variableUnset(session, name),
    );
  }

  // ============================================================
  // Queries
  // ============================================================

  /**
   * Runs one or more statements.
   *
   * @returns one result per statement
   * @throws RemoteError for the first statement that did not succeed
   */
  async query(
    text: string,
    variables: Readonly<Record<string, unknown>> = {},
    options: SendOptions = {},
  ): Promise<unknown[]> {
    const results = decodeQueryResults(
      await this.#scoped("query", [text, variables], options),
    );

    const failedIndex = results.findIndex((entry) => entry.status !== "OK");
    const failed = results[failedIndex];
    if (failed !== undefined) {
      throw new RemoteError(
        typeof failed.result === "string" ? failed.result : (
          (failed.detail ?? `Statement ${failedIndex} failed`)
        ),
        { method: "query", statementIndex: failedIndex },
      );
    }

    return results.map((entry) => entry.result);
  }

  /**
   * Runs a built statement with its bound variables.
   */
  execute(
    statement: Statement,
    options: SendOptions = {},
  ): Promise<unknown[]> {
    return this.query(statement.render(), statement.bindings, options);
  }

  async select(
    target: RecordRef,
    options: FieldOptions = {},
  ): Promise<unknown> {
    const result = await this.#scoped("select", [recordIdOf(target)]);
    return this.#decryptResult(result, options.fields);
  }

  async create(
    target: RecordRef,
    data: RecordData = {},
    options: FieldOptions = {},
  ): Promise<unknown> {
    return this.#write("create", target, data, options.fields);
  }

  async insert(
    table: string,
    data: RecordData | readonly RecordData[],
    options: FieldOptions = {},
  ): Promise<unknown> {
    const payload = await this.#encryptMany(data, options.fields);
    const result = await this.#scoped("insert", [table, payload]);
    return this.#decryptResult(result, options.fields);
  }

  /**
   * Replaces the content of the target record or records.
   */
  async update(
    target: RecordRef,
    data: RecordData,
    options: FieldOptions = {},
  ): Promise<unknown> {
    return this.#write("update", target, data, options.fields);
  }

  async upsert(
    target: RecordRef,
    data: RecordData,
    options: FieldOptions = {},
  ): Promise<unknown> {
    return this.#write("upsert", target, data, options.fields);
  }

  /**
   * Merges `data` into the target record or records.
   */
  async merge(
    target: RecordRef,
    data: RecordData,
    options: FieldOptions = {},
  ): Promise<unknown> {
    return this.#write("merge", target, data, options.fields);
  }

  /**
   * Applies JSON Patch operations.
   *
   * @param diff - Return the applied diff instead of the updated record
   * @throws ValidationError when an operation is malformed
   */
  async patch(
    target: RecordRef,
    operations: readonly PatchOperation[],
    diff = false,
  ): Promise<unknown> {
    const valid = validateWith(
      z.array(patchOperationSchema),
      operations,
      "patch operations",
    );
    return this.#scoped("patch", [recordIdOf(target), valid, diff]);
  }

  delete(target: RecordRef): Promise<unknown> {
    return this.#scoped("delete", [recordIdOf(target)]);
  }

  /**
   * Creates an edge `from->edge->to` in one call. See {@link relation}
   * for the statement form.
   */
  async relate(
    from: RecordRef,
    edge: string,
    to: RecordRef,
    data?: RecordData,
    options: FieldOptions = {},
  ): Promise<unknown> {
    const params: unknown[] = [recordIdOf(from), edge, recordIdOf(to)];
    if (data !== undefined) {
      params.push(await this.#encrypt(data, options.fields));
    }
    const result = await this.#scoped("relate", params);
    return this.#decryptResult(result, options.fields);
  }

  /**
   * Inserts edges given as records with `in` and `out` fields.
   */
  async insertRelation(
    table: string,
    data: RecordData | readonly RecordData[],
    options: FieldOptions = {},
  ): Promise<unknown> {
    const payload = await this.#encryptMany(data, options.fields);
    const result = await this.#scoped("insert_relation", [table, payload]);
    return this.#decryptResult(result, options.fields);
  }

  /**
   * Calls a built-in or user-defined function.
   */
  run(
    name: string,
    version?: string,
    args: readonly unknown[] = [],
  ): Promise<unknown> {
    return this.#scoped("run", [name, version ?? null, args]);
  }

  graphql(
    query: string,
    variables: Readonly<Record<string, unknown>> = {},
  ): Promise<unknown> {
    return this.#scoped("graphql", [{ query, variables }]);
  }

  /**
   * A relation builder bound to this client's pipeline. `execute()` on it
   * runs the statement here.
   */
  relation(): RelationBuilder {
    return relate({
      pipeline: this.#pipeline,
      run: async (text) => {
        const [result] = await this.query(text);
        return result;
      },
    });
  }

  // ============================================================
  // Live queries
  // ============================================================

  /**
   * Starts a live query on a table.
   */
  async live(
    table: string,
    options: SubscribeOptions = {},
  ): Promise<LiveSubscription> {
    this.#session.requireScope("live");
    return this.#live.subscribe(table, options);
  }

  /**
   * Starts a `LIVE SELECT` statement.
   */
  async subscribe(
    statement: LiveSelectStatement,
    options: Omit<SubscribeOptions, "diff"> = {},
  ): Promise<LiveSubscription> {
    this.#session.requireScope("subscribe");
    return this.#live.subscribe(statement, options);
  }

  /**
   * Ends a subscription's stream and kills it on the server.
   */
  unsubscribe(id: string): Promise<void> {
    return this.#live.unsubscribe(id);
  }

  /**
   * Kills a live query. Subscriptions made by this client are also
   * unsubscribed.
   */
  async kill(id: string): Promise<void> {
    if (this.#live.has(id)) {
      await this.#live.unsubscribe(id);
      return;
    }
    await this.#scoped("kill", [id]);
  }

  // ============================================================
  // Internals
  // ============================================================

  #call(
    method: string,
    params: readonly unknown[],
    options: SendOptions = {},
  ): Promise<unknown> {
    try {
      this.#session.requireConnected(method);
    } catch (error) {
      return Promise.reject(error);
    }
    return this.#correlator.send(method, params, options);
  }

  #scoped(
    method: string,
    params: readonly unknown[],
    options: SendOptions = {},
  ): Promise<unknown> {
    try {
      this.#session.requireScope(method);
    } catch (error) {
      return Promise.reject(error);
    }
    return this.#correlator.send(method, params, options);
  }

  /**
   * Sends a session-changing request. Requests run one at a time, and the
   * session changes only after the server acknowledges.
   */
  #mutate(
    method: string,
    params: (session: Session) => readonly unknown[],
    transition: (session: Session, result: unknown) => Session,
  ): Promise<unknown> {
    return this.#sessionWrites.run(async () => {
      const result = await this.#call(method, params(this.#session.current));
      this.#session.apply((session) => transition(session, result));
      this.#logger.debug({ event: "session.changed", method });
      return result;
    });
  }

  async #authenticateWith(
    method: "signin" | "signup",
    credentials: Credentials,
  ): Promise<string | undefined> {
    const result = await this.#mutate(
      method,
      () => [toWireCredentials(credentials)],
      (session, token) =>
        transitions.authenticated(
          session,
          typeof token === "string" ? token : undefined,
        ),
    );
    return typeof result === "string" ? result : undefined;
  }

  async #write(
    method: "create" | "update" | "upsert" | "merge",
    target: RecordRef,
    data: RecordData,
    fields: readonly FieldDescriptor[] | undefined,
  ): Promise<unknown> {
    const payload = await this.#encrypt(data, fields);
    const result = await this.#scoped(method, [recordIdOf(target), payload]);
    return this.#decryptResult(result, fields);
  }

  async #encrypt(
    data: RecordData,
    fields: readonly FieldDescriptor[] | undefined,
  ): Promise<FieldBag> {
    const bag: FieldBag = { ...data };
    if (fields === undefined || fields.length === 0) return bag;
    return this.#pipeline.encryptFields(bag, fields);
  }

  async #encryptMany(
    data: RecordData | readonly RecordData[],
    fields: readonly FieldDescriptor[] | undefined,
  ): Promise<FieldBag | FieldBag[]> {
    if (!isRecordList(data)) return this.#encrypt(data, fields);
    return Promise.all(data.map((item) => this.#encrypt(item, fields)));
  }

  #decryptResult(
    value: unknown,
    fields: readonly FieldDescriptor[] | undefined,
  ): unknown {
    if (fields === undefined || fields.length === 0) return value;
    if (Array.isArray(value)) {
      return value.map((item: unknown) => this.#decryptRecord(item, fields));
    }
    return this.#decryptRecord(value, fields);
  }

  #decryptRecord(value: unknown, fields: readonly FieldDescriptor[]): unknown {
    if (!isRecord(value)) return value;

    const record = { ...value };
    const report = this.#pipeline.decryptFields(record, fields);
    for (const failure of report.failures) {
      this.#logger.warn({
        event: "record.decrypt_failed",
        field: failure.fieldName,
        error: failure.error.message,
      });
    }
    return record;
  }

  #receive(text: string): void {
    let frame: InboundFrame;
    try {
      frame = decodeFrame(text);
    } catch (error) {
      if (!(error instanceof ProtocolError)) throw error;
      this.#logger.warn({ event: "frame.malformed", error: error.message });
      return;
    }

    if (frame.kind === "notification") {
      this.#live.route(frame);
    } else {
      this.#correlator.dispatch(frame);
    }
  }

  #teardown(error: ConnectionError): void {
    this.#session.apply(transitions.disconnected);
    this.#correlator.failAll(error);
    this.#live.endAll(error);
  }
}

function toWireCredentials(credentials: Credentials): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(credentials)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => [WIRE_CREDENTIAL_KEYS[key] ?? key, value]),
  );
}

function isRecordList(
  data: RecordData | readonly RecordData[],
): data is readonly RecordData[] {
  return Array.isArray(data);
}

/**
 * Validates `config` and creates a client. Nothing is opened until
 * {@link RecordClient.connect}.
 *
 * @throws ConfigurationError when the configuration is invalid
 */
export function createClient(
  config: ClientConfigInput,
  options: CreateClientOptions = {},
): RecordClient {
  return new RecordClient(resolveClientConfig(config), options);
}
