import { describe, expect, it } from "vitest";

import { describeResult, fromWire, isOpaque, OpaqueValue, toResultValue, toWire } from "../src/result-value.js";

describe("result values", () => {
  it("rebuilds plain JSON unchanged", () => {
    expect(fromWire({ a: [1, "two", true, null], b: { c: 2.5 } })).toEqual({ a: [1, "two", true, null], b: { c: 2.5 } });
    expect(fromWire(undefined)).toBeNull();
  });

  it("only treats single-key $opaque objects as opaque", () => {
    expect(fromWire({ $opaque: "<socket>" })).toEqual(new OpaqueValue("<socket>"));
    expect(fromWire({ $opaque: "<socket>", other: 1 })).toEqual({ $opaque: "<socket>", other: 1 });
    expect(fromWire({ $opaque: 3 })).toEqual({ $opaque: 3 });
  });

  it("marks non-finite numbers opaque", () => {
    const value = fromWire(Number.POSITIVE_INFINITY);
    expect(isOpaque(value)).toBe(true);
    expect(String(value)).toBe("Infinity");
  });

  it("converts arbitrary host values", () => {
    function helper(): void {}
    expect(toResultValue(10n)).toEqual(new OpaqueValue("10n"));
    expect(toResultValue(helper)).toEqual(new OpaqueValue("[Function helper]"));
    expect(toResultValue(new Map([[1, 2]]))).toEqual(new OpaqueValue("[object Map]"));
    expect(toResultValue({ list: [1, undefined, "a"], nested: { n: Number.NaN } })).toEqual({
      list: [1, null, "a"],
      nested: { n: new OpaqueValue("NaN") }
    });
  });

  it("breaks cycles", () => {
    const node: Record<string, unknown> = { name: "root" };
    node.self = node;
    expect(toResultValue(node)).toEqual({ name: "root", self: new OpaqueValue("[Circular]") });
  });

  it("keeps shared references that are not cycles", () => {
    const shared = { n: 1 };
    expect(toResultValue({ a: shared, b: shared })).toEqual({ a: { n: 1 }, b: { n: 1 } });
  });

  it("serializes opaque values with the wire marker", () => {
    expect(toWire({ handle: new OpaqueValue("<fd 3>") })).toEqual({ handle: { $opaque: "<fd 3>" } });
    expect(fromWire(toWire(new OpaqueValue("<fd 3>")))).toEqual(new OpaqueValue("<fd 3>"));
  });

  it("describes values for display", () => {
    expect(describeResult("text")).toBe("text");
    expect(describeResult(null)).toBe("null");
    expect(describeResult([1, 2])).toBe("[1,2]");
    expect(describeResult(new OpaqueValue("<fd 3>"))).toBe("<fd 3>");
  });
});
