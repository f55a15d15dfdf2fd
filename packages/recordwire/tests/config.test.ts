/**
 * Tests for client configuration and logging.
 */
import { describe, expect, it } from "vitest";

import {
  configFromEnv,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_LIVE_HIGH_WATER_MARK,
  DEFAULT_REQUEST_TIMEOUT_MS,
  resolveClientConfig,
} from "../src/client/config";
import { createLogger } from "../src/client/logger";
import { ConfigurationError } from "../src/errors";

describe("resolveClientConfig", () => {
  it("applies defaults", () => {
    expect(resolveClientConfig({ url: "ws://localhost:8000/rpc" })).toEqual({
      url: "ws://localhost:8000/rpc",
      requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
      connectTimeoutMs: DEFAULT_CONNECT_TIMEOUT_MS,
      liveHighWaterMark: DEFAULT_LIVE_HIGH_WATER_MARK,
      logLevel: "warn",
    });
    expect(DEFAULT_REQUEST_TIMEOUT_MS).toBe(30_000);
    expect(DEFAULT_CONNECT_TIMEOUT_MS).toBe(15_000);
    expect(DEFAULT_LIVE_HIGH_WATER_MARK).toBe(1000);
  });

  it("keeps explicit settings", () => {
    const config = resolveClientConfig({
      url: "wss://db.example.com/rpc",
      namespace: "shop",
      database: "main",
      requestTimeoutMs: 500,
      logLevel: "debug",
    });
    expect(config).toMatchObject({
      namespace: "shop",
      database: "main",
      requestTimeoutMs: 500,
      logLevel: "debug",
    });
  });

  it("rejects a non-WebSocket URL", () => {
    expect(() => resolveClientConfig({ url: "http://localhost:8000" })).toThrow(
      "Invalid client configuration: url must be a ws:// or wss:// URL",
    );
  });

  it("caps timeouts at the longest timer delay", () => {
    for (const key of ["requestTimeoutMs", "connectTimeoutMs"]) {
      expect(() =>
        resolveClientConfig({ url: "ws://localhost:8000/rpc", [key]: 2 ** 31 }),
      ).toThrow(ConfigurationError);
    }
    expect(
      resolveClientConfig({
        url: "ws://localhost:8000/rpc",
        requestTimeoutMs: 2_147_483_647,
      }).requestTimeoutMs,
    ).toBe(2_147_483_647);
  });

  it("lists every invalid setting", () => {
    let caught: unknown;
    try {
      resolveClientConfig({
        url: "ws://localhost:8000/rpc",
        requestTimeoutMs: -1,
        encryptionKey: "short",
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (!(caught instanceof ConfigurationError)) return;
    expect(caught.message).toMatch(/^Invalid client configuration: /);
    expect(caught.message).toContain("encryptionKey");
    expect(caught.message).toContain("requestTimeoutMs");
  });
});

describe("configFromEnv", () => {
  it("reads RECORDWIRE_* variables", () => {
    expect(
      configFromEnv({
        RECORDWIRE_URL: "ws://db:8000/rpc",
        RECORDWIRE_NAMESPACE: "shop",
        RECORDWIRE_DATABASE: "",
        RECORDWIRE_USERNAME: "root",
        RECORDWIRE_PASSWORD: "test-secret",
        RECORDWIRE_REQUEST_TIMEOUT_MS: "2500",
        RECORDWIRE_LOG_LEVEL: "info",
      }),
    ).toEqual({
      url: "ws://db:8000/rpc",
      namespace: "shop",
      auth: { username: "root", password: "test-secret" },
      requestTimeoutMs: 2500,
      logLevel: "info",
    });
  });

  it("feeds resolveClientConfig", () => {
    const config = resolveClientConfig(
      configFromEnv({ RECORDWIRE_URL: "ws://db:8000/rpc" }),
    );
    expect(config.url).toBe("ws://db:8000/rpc");
    expect(config.auth).toBeUndefined();
  });
});

describe("createLogger", () => {
  it("writes one JSON object per line at or above the minimum level", () => {
    const lines: string[] = [];
    const logger = createLogger((line) => lines.push(line), "info");

    logger.debug({ event: "ignored" });
    logger.info({ event: "connection.open", url: "ws://db" });
    logger.error({ event: "request.failed", requestId: "r1" });

    expect(lines).toHaveLength(2);
    const entries = lines.map((line): unknown => JSON.parse(line));
    expect(entries[0]).toMatchObject({
      level: "info",
      event: "connection.open",
      url: "ws://db",
    });
    expect(entries[1]).toMatchObject({
      level: "error",
      event: "request.failed",
      requestId: "r1",
    });
    expect(entries[0]).toHaveProperty("timestamp");
  });
});
