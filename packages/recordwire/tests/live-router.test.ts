/**
 * Unit tests for live subscription routing and stream buffering.
 */
import { describe, expect, it, vi } from "vitest";

import { ConnectionError, ProtocolError } from "../src/errors";
import { LiveStream, LiveSubscriptionRouter } from "../src/rpc/live";
import { type InboundFrame } from "../src/rpc/protocol";
import { defineFields, EncryptionPipeline } from "../src/security";
import { liveSelect } from "../src/statement";
import { createRecordingLogger } from "./test-utils";

type Notification = Extract<InboundFrame, { kind: "notification" }>;

function notification(
  liveId: string,
  result: unknown,
  action: Notification["action"] = "CREATE",
): Notification {
  return { kind: "notification", liveId, action, result };
}

function setup(highWaterMark = 10, pipeline = EncryptionPipeline.disabled()) {
  const liveIds = ["live-a", "live-b", "live-c"];
  const send = vi.fn(
    (method: string, _params: readonly unknown[]): Promise<unknown> => {
      if (method === "live") return Promise.resolve(liveIds.shift());
      if (method === "query") {
        return Promise.resolve([
          { status: "OK", result: liveIds.shift(), time: "1ms" },
        ]);
      }
      return Promise.resolve(null);
    },
  );
  const dropped: [string, string][] = [];
  const recording = createRecordingLogger();
  const router = new LiveSubscriptionRouter({
    send,
    pipeline,
    logger: recording.logger,
    highWaterMark,
    hooks: {
      onNotificationDropped: (liveId, reason) => dropped.push([liveId, reason]),
    },
  });
  return { router, send, dropped, ...recording };
}

describe("LiveStream", () => {
  it("delivers pushed entries in order", async () => {
    const stream = new LiveStream("s", 10, vi.fn());
    stream.push({ liveId: "s", action: "CREATE", result: 1 });
    stream.push({ liveId: "s", action: "UPDATE", result: 2 });

    await expect(stream.next()).resolves.toEqual({
      done: false,
      value: { liveId: "s", action: "CREATE", result: 1, lost: 0 },
    });
    await expect(stream.next()).resolves.toEqual({
      done: false,
      value: { liveId: "s", action: "UPDATE", result: 2, lost: 0 },
    });
  });

  it("hands an entry straight to a waiting reader", async () => {
    const stream = new LiveStream("s", 10, vi.fn());
    const pending = stream.next();
    stream.push({ liveId: "s", action: "DELETE", result: "user:1" });

    await expect(pending).resolves.toMatchObject({
      value: { action: "DELETE", result: "user:1" },
    });
    expect(stream.buffered).toBe(0);
  });

  it("drops the oldest entries past the high-water mark and counts them", async () => {
    const stream = new LiveStream("s", 2, vi.fn());
    const kept = [1, 2, 3, 4].map((result) =>
      stream.push({ liveId: "s", action: "CREATE", result }),
    );

    expect(kept).toEqual([true, true, false, false]);
    expect(stream.dropped).toBe(2);
    await expect(stream.next()).resolves.toMatchObject({
      value: { result: 3, lost: 2 },
    });
    await expect(stream.next()).resolves.toMatchObject({
      value: { result: 4, lost: 0 },
    });
  });

  it("drains buffered entries after end, then finishes", async () => {
    const stream = new LiveStream("s", 10, vi.fn());
    stream.push({ liveId: "s", action: "CREATE", result: 1 });
    stream.end();

    await expect(stream.next()).resolves.toMatchObject({ value: { result: 1 } });
    await expect(stream.next()).resolves.toEqual({
      done: true,
      value: undefined,
    });
  });

  it("rejects waiting readers when ended with an error", async () => {
    const stream = new LiveStream("s", 10, vi.fn());
    const pending = stream.next();
    stream.end(new ConnectionError("Connection closed"));

    await expect(pending).rejects.toBeInstanceOf(ConnectionError);
  });

  it("cancels once when iteration stops early", async () => {
    const onCancel = vi.fn();
    const stream = new LiveStream("s", 10, onCancel);
    stream.push({ liveId: "s", action: "CREATE", result: 1 });
    stream.push({ liveId: "s", action: "CREATE", result: 2 });

    for await (const event of stream) {
      expect(event.result).toBe(1);
      break;
    }
    await stream.return();

    expect(onCancel).toHaveBeenCalledTimes(1);
    expect(stream.closed).toBe(true);
    expect(stream.buffered).toBe(0);
  });
});

describe("LiveSubscriptionRouter", () => {
  it("starts a table subscription with the live method", async () => {
    const { router, send } = setup();

    const subscription = await router.subscribe("orders", { diff: true });

    expect(send).toHaveBeenCalledWith("live", ["orders", true]);
    expect(subscription).toMatchObject({ id: "live-a", target: "orders" });
    expect(router.has("live-a")).toBe(true);
  });

  it("starts a LIVE SELECT statement through query", async () => {
    const { router, send } = setup();
    const statement = liveSelect("orders")
      .where("total > $min")
      .bind("min", 100);

    const subscription = await router.subscribe(statement);

    expect(send).toHaveBeenCalledWith("query", [
      "LIVE SELECT * FROM orders WHERE total > $min",
      { min: 100 },
    ]);
    expect(subscription.id).toBe("live-a");
  });

  it("rejects a live call that returns no ID", async () => {
    const { router, send } = setup();
    send.mockResolvedValueOnce(null);

    await expect(router.subscribe("orders")).rejects.toBeInstanceOf(
      ProtocolError,
    );
  });

  it("routes notifications only to their own subscription", async () => {
    const { router } = setup();
    const a = await router.subscribe("orders");
    const b = await router.subscribe("users");

    router.route(notification("live-b", { id: "user:1" }));
    router.route(notification("live-a", { id: "order:1" }));

    expect(a.stream.buffered).toBe(1);
    expect(b.stream.buffered).toBe(1);
    await expect(a.stream.next()).resolves.toMatchObject({
      value: { result: { id: "order:1" } },
    });
    await expect(b.stream.next()).resolves.toMatchObject({
      value: { result: { id: "user:1" } },
    });
  });

  it("a full stream does not affect its neighbours", async () => {
    const { router, dropped } = setup(1);
    const slow = await router.subscribe("orders");
    const fast = await router.subscribe("users");

    router.route(notification("live-a", 1));
    router.route(notification("live-a", 2));
    router.route(notification("live-b", 3));

    expect(slow.stream.dropped).toBe(1);
    expect(fast.stream.dropped).toBe(0);
    expect(dropped).toEqual([["live-a", "buffer-overflow"]]);
  });

  it("drops notifications for unknown IDs without throwing", () => {
    const { router, dropped, events } = setup();

    expect(router.route(notification("live-x", {}))).toBe(false);
    expect(dropped).toEqual([["live-x", "unknown-subscription"]]);
    expect(events("warn")).toEqual(["live.dropped"]);
  });

  it("ends the stream on CLOSE", async () => {
    const { router } = setup();
    const { stream } = await router.subscribe("orders");

    router.route(notification("live-a", null, "CLOSE"));

    expect(router.has("live-a")).toBe(false);
    await expect(stream.next()).resolves.toEqual({
      done: true,
      value: undefined,
    });
  });

  it("unsubscribes by killing the query and ending the stream", async () => {
    const { router, send, dropped } = setup();
    const { stream } = await router.subscribe("orders");

    await router.unsubscribe("live-a");
    router.route(notification("live-a", {}));

    expect(send).toHaveBeenLastCalledWith("kill", ["live-a"]);
    expect(stream.closed).toBe(true);
    expect(dropped).toEqual([["live-a", "unknown-subscription"]]);
  });

  it("kills the query when the consumer breaks out of iteration", async () => {
    const { router, send } = setup();
    const { stream } = await router.subscribe("orders");
    router.route(notification("live-a", 1));

    for await (const event of stream) {
      expect(event.result).toBe(1);
      break;
    }

    expect(send).toHaveBeenLastCalledWith("kill", ["live-a"]);
    expect(router.size).toBe(0);
  });

  it("ends every stream on endAll", async () => {
    const { router, send } = setup();
    const a = await router.subscribe("orders");
    const b = await router.subscribe("users");

    router.endAll(new ConnectionError("Connection closed"));

    expect(router.size).toBe(0);
    await expect(a.stream.next()).rejects.toThrow("Connection closed");
    await expect(b.stream.next()).rejects.toThrow("Connection closed");
    expect(send).not.toHaveBeenCalledWith("kill", expect.anything());
  });

  it("decrypts reversible fields of notification records", async () => {
    const pipeline = EncryptionPipeline.fromKey("test-secret");
    const fields = defineFields(["email"]);
    const { router } = setup(10, pipeline);
    const { stream } = await router.subscribe("users", { fields });

    const encrypted = await pipeline.encryptValue("a@example.com", {
      fieldName: "email",
      algorithm: { kind: "reversible" },
      strength: undefined,
      verifiable: false,
    });
    router.route(notification("live-a", { id: "user:1", email: encrypted }));

    await expect(stream.next()).resolves.toMatchObject({
      value: { result: { id: "user:1", email: "a@example.com" } },
    });
  });
});
