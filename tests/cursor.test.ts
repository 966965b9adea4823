import { describe, expect, it } from "vitest";
import { parse } from "../src/codec/dispatch.js";
import { FeedParseError, type ParseErrorDetail } from "../src/codec/errors.js";
import { ParseCursor } from "../src/codec/cursor.js";
import { tag } from "../src/codec/combinators.js";
import { EventCategory, EventType, ModDuration } from "../src/contract/eventTypes.js";
import type { WireRecord } from "../src/contract/types.js";
import { childOf, gameRecord, seasonRecord, uuid, withChildren } from "./helpers/records.js";

function failure(record: WireRecord): ParseErrorDetail | null {
  const outcome = parse(record);
  return outcome.ok ? null : outcome.error.detail;
}

function detailOf(run: () => void): ParseErrorDetail | null {
  try {
    run();
  } catch (error) {
    if (error instanceof FeedParseError) {
      return error.detail;
    }
    throw error;
  }
  return null;
}

describe("ParseCursor", () => {
  const plain = (fields: Partial<WireRecord>): WireRecord => ({
    ...seasonRecord({ type: EventType.Ball, description: "First\nSecond" }),
    ...fields,
  });

  it("reads lines in order and accepts a fully consumed record", () => {
    const cursor = new ParseCursor(plain({}));
    expect(cursor.line(tag("First"))).toBe("First");
    expect(cursor.tryLine(tag("Third"))).toBeNull();
    expect(cursor.line(tag("Second"))).toBe("Second");
    expect(() => cursor.finish()).not.toThrow();
  });

  it("hands out optional and remaining tags", () => {
    const teams = [uuid(0x901), uuid(0x902), uuid(0x903)];
    const cursor = new ParseCursor(plain({ teamTags: teams }));
    expect(cursor.nextTeamIdOpt()).toBe(teams[0]);
    expect(cursor.remainingTags("team")).toEqual([teams[1], teams[2]]);
    expect(cursor.nextTeamIdOpt()).toBeNull();
  });

  it("fails when a repeated tag names someone else", () => {
    const cursor = new ParseCursor(plain({ playerTags: [uuid(0x911), uuid(0x912)] }));
    const first = cursor.nextPlayerId();
    expect(detailOf(() => cursor.repeatedPlayerId(first))).toEqual({
      kind: "ExpectedEqualTags",
      tagType: "player",
      first: uuid(0x911),
      second: uuid(0x912),
    });
  });

  it("expects Changes from a record outside a game whose grammar never checked", () => {
    const cursor = new ParseCursor(plain({ description: "", category: EventCategory.Special }));
    expect(detailOf(() => cursor.finish())).toEqual({
      kind: "UnexpectedCategory",
      expected: EventCategory.Changes,
      actual: EventCategory.Special,
    });
  });
});

describe("exhaustive parsing", () => {
  it("rejects text left after the grammar", () => {
    expect(failure(gameRecord({ type: EventType.Ball, description: "Ball. 2-1 and more" }))).toEqual({
      kind: "DescriptionNotFullyParsed",
      remaining: " and more",
    });
  });

  it("rejects tags nothing asked for", () => {
    expect(failure(gameRecord({ type: EventType.Ball, description: "Ball. 2-1", playerTags: [uuid(0x921)] }))).toEqual({
      kind: "TooManyTags",
      tagType: "player",
      expected: 0,
      actual: 1,
    });
  });

  it("reports a missing tag", () => {
    expect(failure(gameRecord({ type: EventType.PitcherChange, description: "Lefty Arm is now pitching for the Crew." }))).toEqual({
      kind: "MissingTags",
      tagType: "player",
    });
  });

  it("rejects unread metadata keys", () => {
    expect(failure(gameRecord({ type: EventType.Ball, description: "Ball. 2-1", metadata: { zeta: 1, alpha: true } }))).toEqual({
      kind: "UnconsumedMetadata",
      fields: ["alpha", "zeta"],
    });
  });

  it("rejects a child the grammar did not expect", () => {
    const parent = gameRecord({ type: EventType.Ball, description: "Ball. 2-1" });
    const child = childOf(parent, 0, {
      type: EventType.AddedMod,
      description: "Someone is Wired!",
      metadata: { mod: "WIRED", type: ModDuration.Game },
    });
    expect(failure(withChildren(parent, [child]))).toEqual({ kind: "TooManyChildren", expected: 0, actual: 1 });
  });

  it("rejects a child from another season", () => {
    const parent = gameRecord({ type: EventType.Strikeout, description: "Wyatt Quitter strikes out swinging." });
    const child = childOf(parent, 0, {
      type: EventType.RemovedMod,
      description: "Ghost Runner stopped Inhabiting.",
      playerTags: [uuid(0x931)],
      teamTags: [uuid(0x932)],
      metadata: { mod: "INHABITING", type: ModDuration.Permanent },
    });
    expect(failure(withChildren(parent, [{ ...child, season: 14 }]))).toEqual({
      kind: "ChildEnvelopeMismatch",
      field: "season",
    });
  });

  it("rejects a child numbered out of sequence", () => {
    const parent = gameRecord({ type: EventType.Strikeout, description: "Wyatt Quitter strikes out swinging." });
    const child = childOf(parent, 3, {
      type: EventType.RemovedMod,
      description: "Ghost Runner stopped Inhabiting.",
      playerTags: [uuid(0x931)],
      teamTags: [uuid(0x932)],
      metadata: { mod: "INHABITING", type: ModDuration.Permanent },
    });
    expect(failure(withChildren(parent, [child]))).toEqual({ kind: "ChildEnvelopeMismatch", field: "subPlay" });
  });

  it("rejects a blurb", () => {
    const record = gameRecord({ type: EventType.Ball, description: "Ball. 2-1" });
    expect(failure({ ...record, blurb: "extra words" })).toEqual({ kind: "UnexpectedBlurb", blurb: "extra words" });
  });

  it("rejects a flyout filed under the wrong category", () => {
    expect(
      failure(
        gameRecord({
          type: EventType.FlyOut,
          category: EventCategory.Outcomes,
          description: "Long Swing hit a flyout to Deep Glove.",
        }),
      ),
    ).toEqual({ kind: "UnexpectedCategory", expected: EventCategory.Game, actual: EventCategory.Outcomes });
  });
});

describe("optional children", () => {
  it("rejects a child that matches the optional grammar's text but not its type", () => {
    const parent = gameRecord({ type: EventType.Ball, description: "Ball. 2-1" });
    const child = childOf(parent, 0, {
      type: EventType.AddedMod,
      description: "Lost Soul was Unscattered.",
      playerTags: [uuid(0x941)],
      teamTags: [uuid(0x942)],
      metadata: { mod: "SCATTERED", type: ModDuration.Permanent },
    });
    expect(failure(withChildren(parent, [child]))).toEqual({
      kind: "UnexpectedChildType",
      expected: EventType.RemovedMod,
      actual: EventType.AddedMod,
      childNumber: 0,
    });
  });

  it("leaves a child alone when the optional grammar does not claim it", () => {
    const parent = gameRecord({ type: EventType.Ball, description: "Ball. 2-1" });
    const child = childOf(parent, 0, {
      type: EventType.AddedMod,
      description: "Lost Soul is Wired!",
      metadata: { mod: "WIRED", type: ModDuration.Game },
    });
    expect(failure(withChildren(parent, [child]))).toEqual({ kind: "TooManyChildren", expected: 0, actual: 1 });
  });
});

describe("envelope", () => {
  it("rejects a top-level record in an unknown phase", () => {
    const record = seasonRecord({ type: EventType.PlayerHatched, description: "Baby Doe has been hatched from the field of eggs." });
    expect(failure({ ...record, phase: 99 })).toEqual({ kind: "UnknownEnumValue", field: "phase", value: 99 });
  });

  it("leaves the phase of a child to the parent check", () => {
    const parent = gameRecord({ type: EventType.Ball, description: "Ball. 2-1" });
    const child = childOf(parent, 0, {
      type: EventType.RemovedMod,
      description: "Lost Soul was Unscattered.",
      playerTags: [uuid(0x941)],
      teamTags: [uuid(0x942)],
      metadata: { mod: "SCATTERED", type: ModDuration.Permanent },
    });
    expect(failure(withChildren(parent, [{ ...child, phase: 99 }]))).toEqual({
      kind: "ChildEnvelopeMismatch",
      field: "phase",
    });
  });
});
