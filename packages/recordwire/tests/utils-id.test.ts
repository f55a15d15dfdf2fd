/**
 * Unit tests for request ID generation and type guards.
 */
import { describe, expect, it } from "vitest";

import { isRecord } from "../src/utils/guards";
import { generateId, generateUniqueId } from "../src/utils/id";

describe("generateId", () => {
  it("returns 21-character URL-safe IDs", () => {
    const id = generateId();
    expect(id).toMatch(/^[\w-]{21}$/);
    expect(generateId()).not.toBe(id);
  });
});

describe("generateUniqueId", () => {
  it("skips IDs that are taken", () => {
    const ids = ["a", "b", "c"];
    const generator = () => ids.shift() ?? "z";

    expect(generateUniqueId(new Set(["a", "b"]), generator)).toBe("c");
  });

  it("gives up after the attempt limit", () => {
    expect(() => generateUniqueId(new Set(["same"]), () => "same", 3)).toThrow(
      "Could not generate a unique request ID after 3 attempts",
    );
  });
});

describe("isRecord", () => {
  it("accepts plain objects only", () => {
    expect(isRecord({ id: "user:1" })).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord("text")).toBe(false);
  });
});
