import { describe, expect, it } from "vitest";
import { EventType } from "../src/contract/eventTypes.js";
import {
  firstDifference,
  formatFailure,
  formatSummary,
  verifyJsonl,
  verifyRecord,
} from "../src/lib/feed/verify.js";
import { gameRecord, seasonRecord } from "./helpers/records.js";

const ball = () => JSON.stringify(gameRecord({ type: EventType.Ball, description: "Ball. 2-1" }));
const leftover = () => JSON.stringify(gameRecord({ type: EventType.Ball, description: "Ball. 2-1 and more" }));
const tunnels = () => JSON.stringify(seasonRecord({ type: EventType.TunnelsUsed, description: "Somebody enters the Tunnels." }));

describe("verifyRecord", () => {
  it("passes a record that rebuilds identically", () => {
    expect(verifyRecord(JSON.parse(ball()))).toEqual({ status: "pass", kind: "Ball" });
  });

  it("reports schema violations as invalid", () => {
    const verdict = verifyRecord({ id: "nope" });
    expect(verdict.status).toBe("invalid");
    if (verdict.status === "invalid") {
      expect(verdict.message).toMatch(/^Invalid wire record: id: Invalid uuid;/);
    }
  });
});

describe("verifyJsonl", () => {
  it("counts passes by kind and skips blank lines", () => {
    const summary = verifyJsonl([ball(), "", ball(), "   "].join("\n"));
    expect(summary).toMatchObject({ total: 2, passed: 2, failed: 0, skipped: 0, stoppedEarly: false });
    expect(summary.kindCounts).toEqual({ Ball: 2 });
    expect(summary.failures).toEqual([]);
  });

  it("counts unimplemented types as skipped rather than failed", () => {
    const summary = verifyJsonl([tunnels(), ball()].join("\n"));
    expect(summary).toMatchObject({ total: 2, passed: 1, failed: 0, skipped: 1 });
    expect(summary.skippedTypes).toEqual({ TunnelsUsed: 1 });
  });

  it("records failures with their line numbers", () => {
    const summary = verifyJsonl([ball(), "{not json", "", leftover()].join("\n"));
    expect(summary).toMatchObject({ total: 3, passed: 1, failed: 2 });
    expect(summary.failures.map(formatFailure)).toEqual([
      "line 2: invalid: Invalid JSON",
      'line 4: Ball: description not fully parsed, remaining: " and more"',
    ]);
  });

  it("stops at the first failure when asked", () => {
    const summary = verifyJsonl([tunnels(), leftover(), ball()].join("\n"), { stopOnError: true });
    expect(summary).toMatchObject({ total: 2, passed: 0, failed: 1, skipped: 1, stoppedEarly: true });
  });

  it("examines at most the given number of records", () => {
    const summary = verifyJsonl([ball(), ball(), leftover()].join("\n"), { limit: 2 });
    expect(summary).toMatchObject({ total: 2, passed: 2, failed: 0, stoppedEarly: false });
  });

  it("formats the summary line", () => {
    const summary = verifyJsonl([ball(), tunnels(), leftover()].join("\r\n"));
    expect(formatSummary(summary)).toBe("Summary: 1 passed, 1 failed, 1 skipped, 3 total");
  });
});

describe("firstDifference", () => {
  it("returns null for equal values", () => {
    expect(firstDifference({ a: [1, { b: "x" }] }, { a: [1, { b: "x" }] })).toBeNull();
  });

  it("points at the first differing key in sorted order", () => {
    expect(firstDifference({ b: 1, a: { c: [1, 2] } }, { b: 2, a: { c: [1, 3] } })).toBe("$.a.c[1]");
  });

  it("treats a missing key or element as a difference", () => {
    expect(firstDifference({ a: 1 }, { a: 1, z: null })).toBe("$.z");
    expect(firstDifference([1], [1, 2])).toBe("$[1]");
  });

  it("describes a mismatch by its path", () => {
    const record = gameRecord({ type: EventType.Ball, description: "Ball. 2-1" });
    expect(
      formatFailure({
        line: 7,
        verdict: { status: "mismatch", kind: "Ball", path: "$.metadata.play", expected: record, actual: record },
      }),
    ).toBe("line 7: Ball: rebuilt record differs at $.metadata.play");
  });
});
