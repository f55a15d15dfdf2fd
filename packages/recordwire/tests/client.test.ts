/**
 * Tests for RecordClient over an in-process transport.
 */
import { describe, expect, it, vi } from "vitest";

import { createClient, type RecordClient } from "../src/client/client";
import { type ClientConfigInput } from "../src/client/config";
import { type ClientHooks } from "../src/client/hooks";
import {
  ConnectionError,
  RemoteError,
  SessionError,
  ValidationError,
} from "../src/errors";
import { KEEP } from "../src/rpc/session";
import { defineFields, hashed, reversible } from "../src/security";
import { liveSelect, select } from "../src/statement";
import { createRecordingLogger, FakeTransport, flush } from "./test-utils";

const BASE_CONFIG: ClientConfigInput = {
  url: "ws://localhost:8000/rpc",
  namespace: "shop",
  database: "main",
  auth: { username: "root", password: "test-secret" },
};

function setup(
  config: Partial<ClientConfigInput> = {},
  hooks?: ClientHooks,
): Readonly<{
  client: RecordClient;
  transport: FakeTransport;
  events: (level?: "debug" | "info" | "warn" | "error") => string[];
}> {
  const transport = new FakeTransport();
  const { logger, events } = createRecordingLogger();
  const client = createClient(
    { ...BASE_CONFIG, ...config },
    { transport, logger, ...(hooks !== undefined && { hooks }) },
  );
  return { client, transport, events };
}

async function connected(
  config: Partial<ClientConfigInput> = {},
): Promise<ReturnType<typeof setup>> {
  const context = setup(config);
  await context.client.connect();
  return context;
}

describe("RecordClient lifecycle", () => {
  it("signs in and selects the configured scope on connect", async () => {
    const { client, transport } = await connected();

    expect(transport.methods()).toEqual(["signin", "use"]);
    expect(transport.lastRequest("signin")?.params).toEqual([
      { user: "root", pass: "test-secret" },
    ]);
    expect(transport.lastRequest("use")?.params).toEqual(["shop", "main"]);
    expect(client.state).toEqual({ status: "connected", authenticated: true });
    expect(client.session).toMatchObject({
      namespace: "shop",
      database: "main",
    });
  });

  it("connects without signing in when no credentials are configured", async () => {
    const { client, transport } = await connected({ auth: undefined });

    expect(transport.methods()).toEqual(["use"]);
    expect(client.state).toEqual({ status: "connected", authenticated: false });
  });

  it("returns to disconnected when the transport cannot open", async () => {
    const { client, transport } = setup();
    transport.openError = new Error("ECONNREFUSED");

    const failure = client.connect();
    await expect(failure).rejects.toBeInstanceOf(ConnectionError);
    await expect(failure).rejects.toThrow(
      "Could not connect to ws://localhost:8000/rpc",
    );
    expect(client.state).toEqual({ status: "disconnected" });
  });

  it("closes the connection when sign-in is rejected", async () => {
    const { client, transport } = setup();
    transport.handle("signin", () => ({
      error: { code: -32000, message: "There was a problem with authentication" },
    }));

    await expect(client.connect()).rejects.toBeInstanceOf(RemoteError);
    expect(client.state).toEqual({ status: "disconnected" });
    expect(transport.isOpen).toBe(false);
  });

  it("does not reopen an open connection", async () => {
    const { client, transport } = await connected();
    await client.connect();
    expect(transport.opens).toBe(1);
  });

  it("rejects pending requests and ends live streams on disconnect", async () => {
    const { client, transport } = await connected();
    transport.handle("query", () => undefined);
    transport.handle("live", () => ({ result: "live-1" }));

    const subscription = await client.live("orders");
    const pending = client.query("SELECT * FROM orders");
    await flush();

    await client.disconnect();

    await expect(pending).rejects.toThrow("Connection closed");
    await expect(subscription.stream.next()).rejects.toBeInstanceOf(
      ConnectionError,
    );
    expect(client.state).toEqual({ status: "disconnected" });
    expect(client.pendingRequests).toBe(0);
    expect(client.activeSubscriptions).toBe(0);
  });

  it("tears down when the server drops the connection", async () => {
    const { client, transport, events } = await connected();
    transport.handle("query", () => undefined);

    const pending = client.query("SELECT * FROM orders");
    await flush();
    transport.serverClose("going away");

    await expect(pending).rejects.toThrow("Connection closed: going away");
    expect(client.state).toEqual({ status: "disconnected" });
    expect(events("warn")).toContain("connection.lost");
  });

  it("reports request timing through hooks", async () => {
    const onRequestEnd = vi.fn();
    const { client } = setup({}, { onRequestEnd });
    await client.connect();

    expect(onRequestEnd).toHaveBeenCalledTimes(2);
    expect(onRequestEnd.mock.calls[0]?.[0]).toMatchObject({ method: "signin" });
  });
});

describe("RecordClient session", () => {
  it("requires a connection for every call", async () => {
    const { client } = setup();

    await expect(client.ping()).rejects.toBeInstanceOf(ConnectionError);
    await expect(client.query("RETURN 1")).rejects.toThrow(
      "Cannot call query: not connected",
    );
  });

  it("requires a namespace and database for queries", async () => {
    const { client, transport } = await connected({
      namespace: undefined,
      database: undefined,
    });

    await expect(client.query("RETURN 1")).rejects.toBeInstanceOf(
      SessionError,
    );
    await expect(client.select("user")).rejects.toThrow(
      "Cannot call select: no namespace selected",
    );
    expect(transport.methods()).toEqual(["signin"]);
  });

  it("resolves KEEP and null in use()", async () => {
    const { client, transport } = await connected();

    await client.use(KEEP, "archive");
    expect(transport.lastRequest("use")?.params).toEqual(["shop", "archive"]);
    expect(client.session).toMatchObject({
      namespace: "shop",
      database: "archive",
    });

    await client.use(null);
    expect(transport.lastRequest("use")?.params).toEqual([null, "archive"]);
    expect(client.session.namespace).toBeUndefined();
    expect(client.session.database).toBe("archive");
  });

  it("stores the token from sign-in and clears it on invalidate", async () => {
    const { client, transport } = setup({ auth: undefined });
    transport.handle("signin", () => ({ result: "token-abc" }));
    await client.connect();

    await expect(
      client.signin({
        username: "alice",
        password: "test-secret",
        namespace: "shop",
        access: "user",
        plan: "pro",
      }),
    ).resolves.toBe("token-abc");
    expect(transport.lastRequest("signin")?.params).toEqual([
      { user: "alice", pass: "test-secret", NS: "shop", AC: "user", plan: "pro" },
    ]);
    expect(client.session.authToken).toBe("token-abc");

    await client.invalidate();
    expect(client.session.authToken).toBeUndefined();
    expect(client.state).toEqual({ status: "connected", authenticated: false });
  });

  it("authenticates with an existing token", async () => {
    const { client, transport } = await connected({ auth: undefined });

    await client.authenticate("token-xyz");
    expect(transport.lastRequest("authenticate")?.params).toEqual([
      "token-xyz",
    ]);
    expect(client.session.authToken).toBe("token-xyz");
    expect(client.state).toEqual({ status: "connected", authenticated: true });
  });

  it("changes variables only after the server acknowledges", async () => {
    const { client, transport } = await connected();
    transport.handle("let", ([name]) =>
      name === "bad" ? { error: { code: -32000, message: "Invalid name" } }
      : { result: null },
    );

    await client.let("region", "eu");
    await expect(client.let("bad", 1)).rejects.toBeInstanceOf(RemoteError);
    expect(client.session.variables).toEqual({ region: "eu" });

    await client.unset("region");
    expect(client.session.variables).toEqual({});
  });

  it("serializes session changes", async () => {
    const { client, transport } = await connected();
    transport.handle("let", () => undefined);

    const first = client.let("a", 1);
    const second = client.let("b", 2);
    await flush();
    expect(transport.methods().filter((method) => method === "let")).toHaveLength(
      1,
    );

    const firstRequest = transport.lastRequest("let");
    if (firstRequest === undefined) throw new Error("let was not sent");
    transport.receive({ id: firstRequest.id, result: null });
    await first;
    await flush();

    const secondRequest = transport.lastRequest("let");
    if (secondRequest === undefined) throw new Error("let was not sent");
    expect(secondRequest.params).toEqual(["b", 2]);
    transport.receive({ id: secondRequest.id, result: null });
    await second;

    expect(client.session.variables).toEqual({ a: 1, b: 2 });
  });

  it("resets token, scope, variables and subscriptions, idempotently", async () => {
    const { client, transport } = await connected();
    transport.handle("live", () => ({ result: "live-1" }));
    await client.let("region", "eu");
    const { stream } = await client.live("orders");

    await client.reset();
    const afterFirst = client.session;
    await client.reset();

    expect(client.session).toEqual(afterFirst);
    expect(afterFirst).toEqual({
      connection: { status: "connected", authenticated: false },
      authToken: undefined,
      namespace: undefined,
      database: undefined,
      variables: {},
    });
    expect(stream.closed).toBe(true);
    expect(client.activeSubscriptions).toBe(0);
  });

  it("answers ping, version and info without changing the session", async () => {
    const { client, transport } = await connected();
    transport.handle("version", () => ({ result: "surrealdb-2.1.0" }));
    transport.handle("info", () => ({ result: { id: "user:alice" } }));
    const before = client.session;

    await client.ping();
    await expect(client.version()).resolves.toBe("surrealdb-2.1.0");
    await expect(client.info()).resolves.toEqual({ id: "user:alice" });
    expect(client.session).toBe(before);
  });
});

describe("RecordClient queries", () => {
  it("returns one result per statement", async () => {
    const { client, transport } = await connected();
    transport.handle("query", () => ({
      result: [
        { status: "OK", result: [{ id: "user:1" }], time: "1ms" },
        { status: "OK", result: 5, time: "1ms" },
      ],
    }));

    await expect(
      client.query("SELECT * FROM user; RETURN 5", { limit: 1 }),
    ).resolves.toEqual([[{ id: "user:1" }], 5]);
    expect(transport.lastRequest("query")?.params).toEqual([
      "SELECT * FROM user; RETURN 5",
      { limit: 1 },
    ]);
  });

  it("rejects with the first failed statement", async () => {
    const { client, transport } = await connected();
    transport.handle("query", () => ({
      result: [
        { status: "OK", result: 1 },
        { status: "ERR", result: "The table 'nope' does not exist" },
        { status: "ERR", result: "second failure" },
      ],
    }));

    const failure = client.query("RETURN 1; SELECT * FROM nope; THROW 'x'");
    await expect(failure).rejects.toBeInstanceOf(RemoteError);
    await expect(failure).rejects.toMatchObject({
      message: "The table 'nope' does not exist",
      details: { method: "query", statementIndex: 1 },
    });
  });

  it("executes a built statement with its bindings", async () => {
    const { client, transport } = await connected();
    transport.handle("query", () => ({ result: [{ status: "OK", result: [] }] }));

    await client.execute(
      select("user").where("age >= $min").bind("min", 18).limit(10),
    );
    expect(transport.lastRequest("query")?.params).toEqual([
      "SELECT * FROM user WHERE age >= $min LIMIT 10",
      { min: 18 },
    ]);
  });

  it("sends CRUD methods with their wire parameters", async () => {
    const { client, transport } = await connected();

    await client.select({ id: "user:alice" });
    await client.create("user", { name: "Bob" });
    await client.insert("user", [{ name: "C" }, { name: "D" }]);
    await client.update("user:bob", { name: "Robert" });
    await client.upsert("user:eve", { name: "Eve" });
    await client.merge("user:bob", { age: 40 });
    await client.patch("user:bob", [{ op: "replace", path: "/age", value: 41 }], true);
    await client.delete("user:eve");
    await client.relate("user:bob", "knows", { id: "user:alice" }, { since: 2020 });
    await client.insertRelation("knows", { in: "user:a", out: "user:b" });
    await client.run("fn::greet", undefined, ["Bob"]);
    await client.graphql("{ user { name } }");

    expect(transport.sent.slice(2).map((request) => [request.method, request.params])).toEqual([
      ["select", ["user:alice"]],
      ["create", ["user", { name: "Bob" }]],
      ["insert", ["user", [{ name: "C" }, { name: "D" }]]],
      ["update", ["user:bob", { name: "Robert" }]],
      ["upsert", ["user:eve", { name: "Eve" }]],
      ["merge", ["user:bob", { age: 40 }]],
      ["patch", ["user:bob", [{ op: "replace", path: "/age", value: 41 }], true]],
      ["delete", ["user:eve"]],
      ["relate", ["user:bob", "knows", "user:alice", { since: 2020 }]],
      ["insert_relation", ["knows", { in: "user:a", out: "user:b" }]],
      ["run", ["fn::greet", null, ["Bob"]]],
      ["graphql", [{ query: "{ user { name } }", variables: {} }]],
    ]);
  });

  it("validates patch operations before sending", async () => {
    const { client, transport } = await connected();

    await expect(
      client.patch("user:bob", [{ op: "move", path: "/a", from: "/b" }]),
    ).resolves.toBeNull();
    await expect(
      client.patch("user:bob", [
        { op: "replace", path: "/age", value: 1 },
        JSON.parse('{"op":"shuffle","path":"/x"}'),
      ]),
    ).rejects.toBeInstanceOf(ValidationError);
    expect(transport.methods().filter((method) => method === "patch")).toHaveLength(1);
  });

  it("runs relations built from the bound builder", async () => {
    const { client, transport } = await connected();
    transport.handle("query", () => ({
      result: [{ status: "OK", result: [{ id: "purchased:1" }] }],
    }));

    await expect(
      client
        .relation()
        .from("user:alice")
        .to("product:laptop")
        .via("purchased")
        .withData({ price: 999.99 })
        .execute(),
    ).resolves.toEqual([{ id: "purchased:1" }]);
    expect(transport.lastRequest("query")?.params).toEqual([
      'RELATE user:alice->purchased->product:laptop CONTENT {"price":999.99} RETURN AFTER',
      {},
    ]);
  });

  it("does not touch the transport for an incomplete relation", async () => {
    const { client, transport } = await connected();
    const before = transport.sent.length;

    expect(() =>
      client.relation().from("user:alice").via("purchased").execute(),
    ).toThrow("TO record not set. Use .to()");
    expect(transport.sent).toHaveLength(before);
  });
});

describe("RecordClient field encryption", () => {
  const fields = defineFields([
    reversible("email"),
    hashed("password", "sha256"),
  ]);

  it("encrypts on write and decrypts the returned record", async () => {
    const { client, transport } = await connected({
      encryptionKey: "test-secret-key",
    });
    transport.handle("create", ([, data]) => ({ result: [data] }));

    const data = { email: "alice@example.com", password: "pw", name: "Alice" };
    const result = await client.create("user", data, { fields });

    const sent = transport.lastRequest("create")?.params[1];
    expect(sent).toMatchObject({ name: "Alice" });
    expect(sent).not.toMatchObject({ email: "alice@example.com" });
    expect(sent).not.toMatchObject({ password: "pw" });
    expect(data).toEqual({
      email: "alice@example.com",
      password: "pw",
      name: "Alice",
    });
    expect(result).toEqual([
      {
        email: "alice@example.com",
        password: expect.not.stringMatching(/^pw$/),
        name: "Alice",
      },
    ]);
  });

  it("decrypts records read back with descriptors", async () => {
    const { client, transport } = await connected({
      encryptionKey: "test-secret-key",
    });
    const stored = await client.pipeline.encryptFields(
      { id: "user:bob", email: "bob@example.com" },
      fields,
    );
    transport.handle("select", () => ({ result: stored }));

    await expect(client.select("user:bob", { fields })).resolves.toEqual({
      id: "user:bob",
      email: "bob@example.com",
    });
    await expect(client.select("user:bob")).resolves.toEqual(stored);
  });

  it("logs and keeps values that fail to decrypt", async () => {
    const { client, transport, events } = await connected({
      encryptionKey: "test-secret-key",
    });
    transport.handle("select", () => ({
      result: { id: "user:x", email: "garbage" },
    }));

    await expect(client.select("user:x", { fields })).resolves.toEqual({
      id: "user:x",
      email: "garbage",
    });
    expect(events("warn")).toEqual(["record.decrypt_failed"]);
  });
});

describe("RecordClient live queries", () => {
  it("routes notifications to the subscription stream", async () => {
    const { client, transport } = await connected();
    transport.handle("live", () => ({ result: "live-1" }));

    const { id, stream } = await client.live("orders");
    transport.receive({
      result: { id, action: "CREATE", result: { id: "order:1" } },
    });

    await expect(stream.next()).resolves.toEqual({
      done: false,
      value: {
        liveId: "live-1",
        action: "CREATE",
        result: { id: "order:1" },
        lost: 0,
      },
    });
  });

  it("subscribes to LIVE SELECT statements", async () => {
    const { client, transport } = await connected();
    transport.handle("query", () => ({
      result: [{ status: "OK", result: "live-2" }],
    }));

    const subscription = await client.subscribe(
      liveSelect("orders").where("total > 100"),
    );
    expect(subscription.id).toBe("live-2");
    expect(transport.lastRequest("query")?.params).toEqual([
      "LIVE SELECT * FROM orders WHERE total > 100",
      {},
    ]);
  });

  it("kills owned and foreign live queries", async () => {
    const { client, transport } = await connected();
    transport.handle("live", () => ({ result: "live-1" }));
    const { stream } = await client.live("orders");

    await client.kill("live-1");
    await client.kill("live-other");

    expect(stream.closed).toBe(true);
    expect(
      transport.sent
        .filter((request) => request.method === "kill")
        .map((request) => request.params),
    ).toEqual([["live-1"], ["live-other"]]);
  });

  it("unsubscribes", async () => {
    const { client, transport } = await connected();
    transport.handle("live", () => ({ result: "live-1" }));
    await client.live("orders");

    await client.unsubscribe("live-1");
    expect(client.activeSubscriptions).toBe(0);
    expect(transport.lastRequest("kill")?.params).toEqual(["live-1"]);
  });

  it("drops malformed frames with a warning", async () => {
    const { client, transport, events } = await connected();

    transport.receiveText("not json");
    transport.receive({ hello: "world" });

    expect(events("warn")).toEqual(["frame.malformed", "frame.malformed"]);
    await expect(client.ping()).resolves.toBeUndefined();
  });
});
