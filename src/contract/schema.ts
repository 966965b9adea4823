import { z } from "zod";
import type { JsonValue, WireMetadata, WireRecord } from "./types.js";

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

const UuidSchema = z.string().uuid();

/**
 * Validates one feed record and normalizes it: `children` is always present,
 * and `null` reserved keys are dropped so that absent and null compare equal.
 */
export const WireRecordSchema: z.ZodType<WireRecord, z.ZodTypeDef, unknown> = z.lazy(() =>
  z
    .object({
      id: UuidSchema,
      created: z.string(),
      type: z.number().int(),
      category: z.number().int(),
      description: z.string(),
      blurb: z.string().default(""),
      playerTags: z.array(UuidSchema).nullable().default([]),
      teamTags: z.array(UuidSchema).nullable().default([]),
      gameTags: z.array(UuidSchema).nullable().default([]),
      metadata: WireMetadataSchema.nullable().default({}),
      sim: z.string(),
      season: z.number().int(),
      day: z.number().int(),
      phase: z.number().int(),
      tournament: z.number().int(),
      nuts: z.number().int().default(0),
    })
    .strict()
    .transform(
      ({ playerTags, teamTags, gameTags, metadata, ...rest }): WireRecord => ({
        ...rest,
        playerTags: playerTags ?? [],
        teamTags: teamTags ?? [],
        gameTags: gameTags ?? [],
        metadata: metadata ?? { children: [] },
      }),
    ),
);

const WireMetadataSchema = z
  .object({
    children: z.array(WireRecordSchema).nullable().optional(),
    play: z.number().int().nullable().optional(),
    subPlay: z.number().int().nullable().optional(),
    parent: UuidSchema.nullable().optional(),
  })
  .catchall(JsonValueSchema)
  .transform(({ children, play, subPlay, parent, ...other }): WireMetadata => {
    const metadata: WireMetadata = { ...other, children: children ?? [] };
    if (play !== null && play !== undefined) {
      metadata.play = play;
    }
    if (subPlay !== null && subPlay !== undefined) {
      metadata.subPlay = subPlay;
    }
    if (parent !== null && parent !== undefined) {
      metadata.parent = parent;
    }
    return metadata;
  });

export class WireRecordError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    const summary = issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "$"}: ${issue.message}`)
      .join("; ");
    super(`Invalid wire record: ${summary}`);
    this.name = "WireRecordError";
    this.issues = issues;
  }
}

/** Validate and normalize untrusted input, throwing `WireRecordError` on mismatch. */
export function parseWireRecord(input: unknown): WireRecord {
  const result = WireRecordSchema.safeParse(input);
  if (!result.success) {
    throw new WireRecordError(result.error.issues);
  }
  return result.data;
}
