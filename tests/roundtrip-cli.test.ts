import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { parseRoundtripArgs, runRoundtripCli, UsageError } from "../src/cli/roundtrip-feed.js";
import { EventType } from "../src/contract/eventTypes.js";
import { gameRecord, seasonRecord } from "./helpers/records.js";

describe("parseRoundtripArgs", () => {
  it("reads the file and every flag", () => {
    expect(parseRoundtripArgs(["feed.jsonl", "--limit", "10", "--stop-on-error", "--quiet", "--json"])).toEqual({
      file: "feed.jsonl",
      limit: 10,
      stopOnError: true,
      quiet: true,
      json: true,
      help: false,
    });
    expect(parseRoundtripArgs(["--limit=0", "feed.jsonl"]).limit).toBe(0);
  });

  it("does not need a file for --help", () => {
    expect(parseRoundtripArgs(["-h"]).help).toBe(true);
  });

  it("rejects bad usage", () => {
    expect(() => parseRoundtripArgs([])).toThrow(new UsageError("A feed file is required"));
    expect(() => parseRoundtripArgs(["a.jsonl", "b.jsonl"])).toThrow("Unexpected argument: b.jsonl");
    expect(() => parseRoundtripArgs(["a.jsonl", "--verbose"])).toThrow("Unknown option: --verbose");
    expect(() => parseRoundtripArgs(["a.jsonl", "--limit", "-1"])).toThrow(
      "--limit expects a non-negative integer, got -1",
    );
    expect(() => parseRoundtripArgs(["a.jsonl", "--limit"])).toThrow("--limit expects a non-negative integer, got nothing");
  });
});

describe("runRoundtripCli", () => {
  let dir: string;
  let logs: string[];
  let errors: string[];

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "feed-codec-cli-"));
    logs = [];
    errors = [];
    vi.spyOn(console, "log").mockImplementation((message: string) => {
      logs.push(message);
    });
    vi.spyOn(console, "error").mockImplementation((message: string) => {
      errors.push(message);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  function writeFeed(lines: string[]): string {
    const path = join(dir, "feed.jsonl");
    writeFileSync(path, `${lines.join("\n")}\n`, "utf-8");
    return path;
  }

  const ball = JSON.stringify(gameRecord({ type: EventType.Ball, description: "Ball. 2-1" }));
  const tunnels = JSON.stringify(seasonRecord({ type: EventType.TunnelsUsed, description: "Somebody enters the Tunnels." }));

  it("exits 0 and prints counts when every record passes", async () => {
    const code = await runRoundtripCli([writeFeed([ball, tunnels])]);
    expect(code).toBe(0);
    expect(errors).toEqual([]);
    expect(logs).toEqual([
      "Parsed kinds:",
      "  Ball: 1",
      "Unimplemented types:",
      "  TunnelsUsed: 1",
      "Summary: 1 passed, 0 failed, 1 skipped, 2 total",
    ]);
  });

  it("exits 1 and lists failures", async () => {
    const code = await runRoundtripCli([writeFeed(["[1,", ball]), "--quiet"]);
    expect(code).toBe(1);
    expect(errors).toEqual([]);
    expect(logs).toEqual(["Summary: 1 passed, 1 failed, 0 skipped, 2 total"]);

    logs.length = 0;
    expect(await runRoundtripCli([join(dir, "feed.jsonl")])).toBe(1);
    expect(errors).toEqual(["line 1: invalid: Invalid JSON"]);
  });

  it("prints a machine-readable report", async () => {
    const code = await runRoundtripCli([writeFeed(["[1,", ball]), "--json"]);
    expect(code).toBe(1);
    expect(JSON.parse(logs[0])).toEqual({
      total: 2,
      passed: 1,
      failed: 1,
      skipped: 0,
      stoppedEarly: false,
      kindCounts: { Ball: 1 },
      skippedTypes: {},
      failures: [{ line: 1, status: "invalid", message: "line 1: invalid: Invalid JSON" }],
    });
  });

  it("exits 2 on usage errors and unreadable files", async () => {
    expect(await runRoundtripCli(["--nope"])).toBe(2);
    expect(errors[0]).toBe("Error: Unknown option: --nope");

    errors.length = 0;
    expect(await runRoundtripCli([join(dir, "missing.jsonl")])).toBe(2);
    expect(errors[0]).toMatch(/^Error: cannot read .*missing\.jsonl: /);
  });
});
