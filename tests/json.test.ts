import { describe, expect, it } from "vitest";
import { canonicalizeRecord, recordsEqual, stableStringify } from "../src/core/json.js";
import { EventType } from "../src/contract/eventTypes.js";
import { childOf, gameRecord, withChildren } from "./helpers/records.js";

describe("stableStringify", () => {
  it("orders object keys deterministically", () => {
    const value = { b: 1, a: 2 };
    expect(stableStringify(value)).toBe('{"a":2,"b":1}');
  });

  it("rejects non-JSON values", () => {
    expect(() => stableStringify({ ok: true, nope: undefined })).toThrow("Invalid JSON value");
  });

  it("rejects non-finite numbers", () => {
    expect(() => stableStringify(NaN)).toThrow("non-finite number");
  });

  it("sorts keys at every level and keeps array order", () => {
    const value = { z: [{ d: 1, c: 2 }, 3], y: { b: null, a: "x" } };
    expect(stableStringify(value)).toBe('{"y":{"a":"x","b":null},"z":[{"c":2,"d":1},3]}');
  });

  it("names the path of the offending value", () => {
    expect(() => stableStringify({ a: [1, new Date(0)] })).toThrow("Invalid JSON value at $.a[1]: object");
  });
});

describe("canonicalizeRecord", () => {
  const parent = gameRecord({ type: EventType.HomeRun, description: "irrelevant" });
  const a = childOf(parent, 0, { type: EventType.AddedMod, description: "a" });
  const b = childOf(parent, 1, { type: EventType.RemovedMod, description: "b" });

  it("orders children by subPlay", () => {
    const record = canonicalizeRecord(withChildren(parent, [b, a]));
    expect(record.metadata.children.map((child) => child.description)).toEqual(["a", "b"]);
  });

  it("treats sibling order as insignificant when comparing", () => {
    expect(recordsEqual(withChildren(parent, [b, a]), withChildren(parent, [a, b]))).toBe(true);
    expect(recordsEqual(withChildren(parent, [a]), withChildren(parent, [a, b]))).toBe(false);
  });
});
