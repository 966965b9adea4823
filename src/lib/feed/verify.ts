import { build, parse } from "../../codec/dispatch.js";
import { describeDetail, type FeedParseError } from "../../codec/errors.js";
import { eventTypeName } from "../../contract/eventTypes.js";
import { parseWireRecord, WireRecordError } from "../../contract/schema.js";
import type { WireRecord } from "../../contract/types.js";
import { canonicalizeRecord, stableStringify } from "../../core/json.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type RecordVerdict =
  | { status: "pass"; kind: string }
  | { status: "invalid"; message: string }
  | { status: "parse-error"; error: FeedParseError }
  | { status: "mismatch"; kind: string; path: string; expected: WireRecord; actual: WireRecord };

export interface VerifyOptions {
  /** Stop at the first record that does not pass. Unimplemented kinds do not count. */
  stopOnError?: boolean;
  /** Examine at most this many records. */
  limit?: number;
}

export interface LineResult {
  line: number;
  verdict: RecordVerdict;
}

export interface VerifySummary {
  total: number;
  passed: number;
  failed: number;
  skipped: number;
  /** Counts of passing records by occurrence kind. */
  kindCounts: Record<string, number>;
  /** Counts of unimplemented records by event type name. */
  skippedTypes: Record<string, number>;
  /** Results for every record that did not pass. */
  failures: LineResult[];
  stoppedEarly: boolean;
}

// ---------------------------------------------------------------------------
// Comparison
// ---------------------------------------------------------------------------

function canonicalJson(record: WireRecord): unknown {
  return JSON.parse(stableStringify(canonicalizeRecord(record)));
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Path of the first place two JSON values differ, or null when they are equal. */
export function firstDifference(expected: unknown, actual: unknown, path = "$"): string | null {
  if (Array.isArray(expected) && Array.isArray(actual)) {
    const length = Math.max(expected.length, actual.length);
    for (let i = 0; i < length; i++) {
      const diff = firstDifference(expected[i], actual[i], `${path}[${i}]`);
      if (diff !== null) {
        return diff;
      }
    }
    return null;
  }
  if (isObject(expected) && isObject(actual)) {
    const keys = [...new Set([...Object.keys(expected), ...Object.keys(actual)])].sort();
    for (const key of keys) {
      const diff = firstDifference(expected[key], actual[key], `${path}.${key}`);
      if (diff !== null) {
        return diff;
      }
    }
    return null;
  }
  return expected === actual ? null : path;
}

// ---------------------------------------------------------------------------
// Verification
// ---------------------------------------------------------------------------

/** Validate, parse and rebuild one raw record, comparing the rebuilt record with the input. */
export function verifyRecord(raw: unknown): RecordVerdict {
  let record: WireRecord;
  try {
    record = parseWireRecord(raw);
  } catch (err: unknown) {
    if (err instanceof WireRecordError) {
      return { status: "invalid", message: err.message };
    }
    throw err;
  }

  const outcome = parse(record);
  if (!outcome.ok) {
    return { status: "parse-error", error: outcome.error };
  }

  const kind = outcome.occurrence.data.kind;
  const rebuilt = build(outcome.occurrence);
  const path = firstDifference(canonicalJson(record), canonicalJson(rebuilt));
  if (path === null) {
    return { status: "pass", kind };
  }
  return { status: "mismatch", kind, path, expected: record, actual: rebuilt };
}

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

/** Verify every non-empty line of a JSONL feed. */
export function verifyJsonl(text: string, options: VerifyOptions = {}): VerifySummary {
  const lines = text.split(/\r?\n/);
  const summary: VerifySummary = {
    total: 0,
    passed: 0,
    failed: 0,
    skipped: 0,
    kindCounts: {},
    skippedTypes: {},
    failures: [],
    stoppedEarly: false,
  };

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === "") {
      continue;
    }
    if (options.limit !== undefined && summary.total >= options.limit) {
      break;
    }
    summary.total += 1;

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      summary.failed += 1;
      summary.failures.push({ line: i + 1, verdict: { status: "invalid", message: "Invalid JSON" } });
      if (options.stopOnError) {
        summary.stoppedEarly = true;
        break;
      }
      continue;
    }

    const verdict = verifyRecord(raw);

    if (verdict.status === "pass") {
      summary.passed += 1;
      increment(summary.kindCounts, verdict.kind);
      continue;
    }
    if (verdict.status === "parse-error" && verdict.error.detail.kind === "NotImplemented") {
      summary.skipped += 1;
      increment(summary.skippedTypes, eventTypeName(verdict.error.eventType));
      continue;
    }

    summary.failed += 1;
    summary.failures.push({ line: i + 1, verdict });
    if (options.stopOnError) {
      summary.stoppedEarly = true;
      break;
    }
  }

  return summary;
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/** `line N: <kind>: <message>` for a record that did not pass. */
export function formatFailure(result: LineResult): string {
  const { line, verdict } = result;
  switch (verdict.status) {
    case "pass":
      return `line ${line}: ${verdict.kind}: ok`;
    case "invalid":
      return `line ${line}: invalid: ${verdict.message}`;
    case "parse-error":
      return `line ${line}: ${eventTypeName(verdict.error.eventType)}: ${describeDetail(verdict.error.detail)}`;
    case "mismatch":
      return `line ${line}: ${verdict.kind}: rebuilt record differs at ${verdict.path}`;
  }
}

export function formatSummary(summary: VerifySummary): string {
  return `Summary: ${summary.passed} passed, ${summary.failed} failed, ${summary.skipped} skipped, ${summary.total} total`;
}
