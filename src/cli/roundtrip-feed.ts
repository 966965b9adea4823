import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { stableStringify } from "../core/json.js";
import { formatFailure, formatSummary, verifyJsonl, type VerifySummary } from "../lib/feed/verify.js";

// ---------------------------------------------------------------------------
// Arg parsing
// ---------------------------------------------------------------------------

export interface RoundtripCliArgs {
  file?: string;
  limit?: number;
  stopOnError: boolean;
  quiet: boolean;
  json: boolean;
  help: boolean;
}

export const usage = `Usage: npm run roundtrip -- <file.jsonl> [options]

Parses every record of a feed, rebuilds it and compares it with the original.

Options:
  --limit <n>          Examine at most n records
  --stop-on-error      Stop at the first failing record
  --quiet              Print only the summary line
  --json               Print a machine-readable report
  -h, --help           Show this help message`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function parseLimit(value: string | undefined): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new UsageError(`--limit expects a non-negative integer, got ${value ?? "nothing"}`);
  }
  return parseInt(value, 10);
}

export function parseRoundtripArgs(argv: string[]): RoundtripCliArgs {
  const args: RoundtripCliArgs = { stopOnError: false, quiet: false, json: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") {
      args.help = true;
    } else if (arg === "--limit") {
      args.limit = parseLimit(argv[++i]);
    } else if (arg.startsWith("--limit=")) {
      args.limit = parseLimit(arg.slice("--limit=".length));
    } else if (arg === "--stop-on-error") {
      args.stopOnError = true;
    } else if (arg === "--quiet") {
      args.quiet = true;
    } else if (arg === "--json") {
      args.json = true;
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (args.file === undefined) {
      args.file = arg;
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
  }

  if (!args.help && args.file === undefined) {
    throw new UsageError("A feed file is required");
  }
  return args;
}

// ---------------------------------------------------------------------------
// Reporting
// ---------------------------------------------------------------------------

export function summaryToJson(summary: VerifySummary): string {
  return stableStringify({
    total: summary.total,
    passed: summary.passed,
    failed: summary.failed,
    skipped: summary.skipped,
    stoppedEarly: summary.stoppedEarly,
    kindCounts: summary.kindCounts,
    skippedTypes: summary.skippedTypes,
    failures: summary.failures.map((failure) => ({
      line: failure.line,
      status: failure.verdict.status,
      message: formatFailure(failure),
    })),
  });
}

function printCounts(title: string, counts: Record<string, number>): void {
  const keys = Object.keys(counts).sort((a, b) => a.localeCompare(b));
  if (keys.length === 0) {
    return;
  }
  // eslint-disable-next-line no-console
  console.log(title);
  for (const key of keys) {
    // eslint-disable-next-line no-console
    console.log(`  ${key}: ${counts[key]}`);
  }
}

export async function runRoundtripCli(argv: string[]): Promise<number> {
  let args: RoundtripCliArgs;
  try {
    args = parseRoundtripArgs(argv);
  } catch (err: unknown) {
    if (err instanceof UsageError) {
      // eslint-disable-next-line no-console
      console.error(`Error: ${err.message}`);
      // eslint-disable-next-line no-console
      console.error(usage);
      return 2;
    }
    throw err;
  }

  if (args.help || args.file === undefined) {
    // eslint-disable-next-line no-console
    console.log(usage);
    return 0;
  }

  let text: string;
  try {
    text = await readFile(resolve(process.cwd(), args.file), "utf-8");
  } catch (err: unknown) {
    // eslint-disable-next-line no-console
    console.error(`Error: cannot read ${args.file}: ${err instanceof Error ? err.message : String(err)}`);
    return 2;
  }

  const summary = verifyJsonl(text, { limit: args.limit, stopOnError: args.stopOnError });

  if (args.json) {
    // eslint-disable-next-line no-console
    console.log(summaryToJson(summary));
  } else {
    if (!args.quiet) {
      for (const failure of summary.failures) {
        // eslint-disable-next-line no-console
        console.error(formatFailure(failure));
      }
      printCounts("Parsed kinds:", summary.kindCounts);
      printCounts("Unimplemented types:", summary.skippedTypes);
    }
    // eslint-disable-next-line no-console
    console.log(formatSummary(summary));
  }

  return summary.failed > 0 ? 1 : 0;
}

async function main(): Promise<void> {
  const exitCode = await runRoundtripCli(process.argv.slice(2));
  process.exit(exitCode);
}

// Only run when executed directly (not when imported by tests)
const self = fileURLToPath(import.meta.url);
const entry = resolve(process.argv[1] ?? "");
if (self === entry) {
  main().catch((err: unknown) => {
    // eslint-disable-next-line no-console
    console.error(err);
    process.exit(1);
  });
}
