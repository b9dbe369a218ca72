import { describe, it, expect } from "vitest";
import { formatResult } from "../src/format.js";
import { NO_RESULT } from "../src/tree/node.js";

describe("formatResult", () => {
  it("passes strings through", () => {
    expect(formatResult("APPROVED")).toBe("APPROVED");
    expect(formatResult("")).toBe("");
  });

  it("stringifies numbers and booleans", () => {
    expect(formatResult(42)).toBe("42");
    expect(formatResult(0.25)).toBe("0.25");
    expect(formatResult(false)).toBe("false");
  });

  it("prints NO_RESULT by name", () => {
    expect(formatResult(NO_RESULT)).toBe("NO_RESULT");
  });

  it("JSON-encodes other values", () => {
    expect(formatResult({ tier: "gold", limit: 5000 })).toBe('{"tier":"gold","limit":5000}');
    expect(formatResult(null)).toBe("null");
    expect(formatResult(undefined)).toBe("undefined");
  });

  it("stringifies BigInts, including nested ones", () => {
    expect(formatResult(10n)).toBe("10");
    expect(formatResult({ limit: 5n })).toBe('{"limit":"5"}');
  });

  it("marks circular references", () => {
    const node: { name: string; parent?: unknown } = { name: "root" };
    node.parent = node;
    expect(formatResult(node)).toBe('{"name":"root","parent":"[Circular]"}');
  });

  it("does not mark repeated but non-circular references", () => {
    const shared = { id: 1 };
    expect(formatResult({ a: shared, b: shared })).toBe('{"a":{"id":1},"b":{"id":1}}');
  });

  it("reports values whose serialization throws", () => {
    const value = {
      toJSON(): never {
        throw new Error("nope");
      },
    };
    expect(formatResult(value)).toBe("[unserializable: nope]");
  });
});
