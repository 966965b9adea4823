import type { z } from "zod";
import { EventCategory, SIM_PHASE_VALUES } from "../contract/eventTypes.js";
import { JsonValueSchema } from "../contract/schema.js";
import { RESERVED_METADATA_KEYS, type JsonObject, type JsonValue, type WireRecord } from "../contract/types.js";
import { stableStringify } from "../core/json.js";
import type { SubEventRef } from "../model/descriptors.js";
import type { Parser } from "./combinators.js";
import { FeedParseError, type ParseErrorDetail, type TagType } from "./errors.js";

interface ParentScope {
  record: WireRecord;
  subPlay: number;
  /** `play` of a game-anchored parent; children of other records carry none. */
  play: number | undefined;
}

const ENVELOPE_FIELDS = ["sim", "season", "day", "phase", "tournament"] as const;

function sortedChildren(record: WireRecord): WireRecord[] {
  return record.metadata.children
    .map((child, index) => ({ child, index }))
    .sort(
      (a, b) =>
        (a.child.metadata.subPlay ?? Number.MAX_SAFE_INTEGER) -
          (b.child.metadata.subPlay ?? Number.MAX_SAFE_INTEGER) || a.index - b.index,
    )
    .map(({ child }) => child);
}

/**
 * Single-use view over one wire record during parsing.
 *
 * Every part of the record (description text, each tag list, each metadata key,
 * each child and the category) has to be accounted for by the grammar; `finish`
 * rejects the record if anything is left over.
 */
export class ParseCursor {
  readonly record: WireRecord;
  private readonly children: WireRecord[];
  private readonly isChild: boolean;
  private remaining: string;
  private playerIndex = 0;
  private teamIndex = 0;
  private gameIndex = 0;
  private childIndex = 0;
  private readonly consumedKeys = new Set<string>(["children"]);
  private categoryChecked = false;
  private forcedSpecial = false;

  constructor(record: WireRecord, parent?: ParentScope) {
    this.record = record;
    this.remaining = record.description;
    this.children = sortedChildren(record);
    this.isChild = parent !== undefined;
    if (record.blurb !== "") {
      this.fail({ kind: "UnexpectedBlurb", blurb: record.blurb });
    }
    if (parent) {
      this.checkParentScope(parent);
    } else if (!SIM_PHASE_VALUES.some((phase) => phase === record.phase)) {
      this.fail({ kind: "UnknownEnumValue", field: "phase", value: record.phase });
    }
  }

  get type(): number {
    return this.record.type;
  }

  get season(): number {
    return this.record.season;
  }

  get day(): number {
    return this.record.day;
  }

  fail(detail: ParseErrorDetail): never {
    throw new FeedParseError(this.record.type, detail);
  }

  /** Identity of this record, for use as a child reference. */
  subEvent(): SubEventRef {
    return { id: this.record.id, created: this.record.created, nuts: this.record.nuts };
  }

  // ---------------------------------------------------------------------------
  // Description
  // ---------------------------------------------------------------------------

  private get atStart(): boolean {
    return this.remaining.length === this.record.description.length;
  }

  /** Run a parser against the unconsumed description and advance past its match. */
  parse<T>(parser: Parser<T>): T {
    const result = parser(this.remaining);
    if (!result.ok) {
      return this.fail({ kind: "DescriptionMismatch", expected: result.expected, found: result.found });
    }
    this.remaining = result.rest;
    return result.value;
  }

  /** Like `parse`, but leaves the cursor untouched and returns null on failure. */
  tryParse<T>(parser: Parser<T>): T | null {
    const result = parser(this.remaining);
    if (!result.ok) {
      return null;
    }
    this.remaining = result.rest;
    return result.value;
  }

  /** Parse the next line; every line but the first is preceded by a newline. */
  line<T>(parser: Parser<T>): T {
    if (!this.atStart) {
      this.parse(lineBreak);
    }
    return this.parse(parser);
  }

  /** Parse the next line if it matches, otherwise consume nothing. */
  tryLine<T>(parser: Parser<T>): T | null {
    if (this.atStart) {
      return this.tryParse(parser);
    }
    if (!this.remaining.startsWith("\n")) {
      return null;
    }
    const result = parser(this.remaining.slice(1));
    if (!result.ok) {
      return null;
    }
    this.remaining = result.rest;
    return result.value;
  }

  /** Consume a whole line that must read exactly `text`. */
  expectLine(text: string): void {
    this.line((input: string) =>
      input.startsWith(text)
        ? { ok: true, value: text, rest: input.slice(text.length) }
        : { ok: false, expected: JSON.stringify(text), found: input.slice(0, text.length + 10) },
    );
  }

  /** Consume the line `text` if it comes next. */
  tryExpectLine(text: string): boolean {
    return (
      this.tryLine((input: string) =>
        input.startsWith(text)
          ? { ok: true, value: true, rest: input.slice(text.length) }
          : { ok: false, expected: text, found: input },
      ) !== null
    );
  }

  /** The entire description, which must be the only thing the grammar reads from it. */
  wholeDescription(): string {
    const description = this.remaining;
    this.remaining = "";
    return description;
  }

  hasMoreText(): boolean {
    return this.remaining.length > 0;
  }

  // ---------------------------------------------------------------------------
  // Tags
  // ---------------------------------------------------------------------------

  private nextTag(tagType: TagType): string {
    const [tags, index] = this.tagState(tagType);
    const value = tags[index];
    if (value === undefined) {
      return this.fail({ kind: "MissingTags", tagType });
    }
    this.advanceTag(tagType);
    return value;
  }

  private tagState(tagType: TagType): [string[], number] {
    switch (tagType) {
      case "player":
        return [this.record.playerTags, this.playerIndex];
      case "team":
        return [this.record.teamTags, this.teamIndex];
      case "game":
        return [this.record.gameTags, this.gameIndex];
    }
  }

  private advanceTag(tagType: TagType): void {
    switch (tagType) {
      case "player":
        this.playerIndex += 1;
        break;
      case "team":
        this.teamIndex += 1;
        break;
      case "game":
        this.gameIndex += 1;
        break;
    }
  }

  nextPlayerId(): string {
    return this.nextTag("player");
  }

  nextTeamId(): string {
    return this.nextTag("team");
  }

  nextGameId(): string {
    return this.nextTag("game");
  }

  /** The next team tag, or null when the list is already exhausted. */
  nextTeamIdOpt(): string | null {
    const [tags, index] = this.tagState("team");
    return index < tags.length ? this.nextTeamId() : null;
  }

  /** Every tag of `tagType` not yet consumed, for records that carry a free-form list. */
  remainingTags(tagType: TagType): string[] {
    const [tags, index] = this.tagState(tagType);
    const rest = tags.slice(index);
    for (let i = 0; i < rest.length; i += 1) {
      this.advanceTag(tagType);
    }
    return rest;
  }

  /** Consume a player tag that must repeat `expected` (a duplicated tag upstream). */
  repeatedPlayerId(expected: string): void {
    const actual = this.nextPlayerId();
    if (actual !== expected) {
      this.fail({ kind: "ExpectedEqualTags", tagType: "player", first: expected, second: actual });
    }
  }

  repeatedTeamId(expected: string): void {
    const actual = this.nextTeamId();
    if (actual !== expected) {
      this.fail({ kind: "ExpectedEqualTags", tagType: "team", first: expected, second: actual });
    }
  }

  // ---------------------------------------------------------------------------
  // Metadata
  // ---------------------------------------------------------------------------

  hasMetadata(key: string): boolean {
    return this.record.metadata[key] !== undefined;
  }

  /** Read a metadata key through a schema and mark it consumed. */
  metadata<T>(key: string, schema: z.ZodType<T>): T {
    const raw = this.record.metadata[key];
    if (raw === undefined) {
      return this.fail({ kind: "MissingMetadata", field: key });
    }
    this.consumedKeys.add(key);
    const result = schema.safeParse(raw);
    if (!result.success) {
      const message = result.error.issues.map((issue) => issue.message).join("; ");
      return this.fail({ kind: "MetadataTypeError", field: key, message });
    }
    return result.data;
  }

  optionalMetadata<T>(key: string, schema: z.ZodType<T>): T | undefined {
    return this.hasMetadata(key) ? this.metadata(key, schema) : undefined;
  }

  /** Read an integer code that must belong to a known enumeration. */
  metadataEnum<T extends number>(key: string, schema: z.ZodType<number>, values: readonly T[]): T {
    const code = this.metadata(key, schema);
    const known = values.find((candidate) => candidate === code);
    if (known === undefined) {
      return this.fail({ kind: "UnknownEnumValue", field: key, value: code });
    }
    return known;
  }

  /** Consume a key whose value is fixed for this kind of record. */
  expectMetadata(key: string, expected: JsonValue): void {
    const raw = this.record.metadata[key];
    if (raw === undefined) {
      this.fail({ kind: "MissingMetadata", field: key });
    }
    this.consumedKeys.add(key);
    if (stableStringify(raw) !== stableStringify(expected)) {
      this.fail({ kind: "UnexpectedMetadataValue", field: key, value: stableStringify(raw) });
    }
  }

  /** Consume every key not yet read, for records whose metadata is opaque. */
  remainingMetadata(): JsonObject {
    const rest: JsonObject = {};
    for (const [key, value] of Object.entries(this.record.metadata)) {
      if (this.consumedKeys.has(key) || RESERVED_KEYS.has(key) || value === undefined) {
        continue;
      }
      const parsed = JsonValueSchema.safeParse(value);
      if (!parsed.success) {
        continue;
      }
      this.consumedKeys.add(key);
      rest[key] = parsed.data;
    }
    return rest;
  }

  // ---------------------------------------------------------------------------
  // Category
  // ---------------------------------------------------------------------------

  /** The category becomes Special regardless of kind (secret base entries). */
  forceSpecial(): void {
    this.forcedSpecial = true;
  }

  expectCategory(expected: EventCategory): void {
    this.categoryChecked = true;
    const actual = this.forcedSpecial ? EventCategory.Special : expected;
    if (this.record.category !== actual) {
      this.fail({ kind: "UnexpectedCategory", expected: actual, actual: this.record.category });
    }
  }

  /** True when the record is Special, false when it has the kind's usual category. */
  specialFlag(usual: EventCategory = EventCategory.Game): boolean {
    if (this.forcedSpecial) {
      this.expectCategory(EventCategory.Special);
      return false;
    }
    this.categoryChecked = true;
    if (this.record.category === EventCategory.Special) {
      return true;
    }
    if (this.record.category !== usual) {
      this.fail({ kind: "UnexpectedCategory", expected: usual, actual: this.record.category });
    }
    return false;
  }

  // ---------------------------------------------------------------------------
  // Children
  // ---------------------------------------------------------------------------

  peekChild(): WireRecord | undefined {
    return this.children[this.childIndex];
  }

  /** Parse the next child, which must have `type`, with a grammar of its own. */
  child<T>(type: number, grammar: (child: ParseCursor) => T): T {
    const record = this.peekChild();
    if (record === undefined) {
      return this.fail({ kind: "NotEnoughChildren", expectedAtLeast: this.childIndex + 1 });
    }
    if (record.type !== type) {
      return this.fail({
        kind: "UnexpectedChildType",
        expected: type,
        actual: record.type,
        childNumber: this.childIndex,
      });
    }
    const cursor = new ParseCursor(record, {
      record: this.record,
      subPlay: this.childIndex,
      play: this.record.metadata.play,
    });
    this.childIndex += 1;
    const value = grammar(cursor);
    cursor.finish();
    return value;
  }

  /**
   * Parse the next child only if it satisfies `predicate`. A child that
   * satisfies it must also have `type`.
   */
  childIf<T>(
    type: number,
    predicate: (record: WireRecord) => boolean,
    grammar: (child: ParseCursor) => T,
  ): T | null {
    const record = this.peekChild();
    if (record === undefined || !predicate(record)) {
      return null;
    }
    return this.child(type, grammar);
  }

  // ---------------------------------------------------------------------------
  // Exhaustiveness
  // ---------------------------------------------------------------------------

  private checkParentScope(parent: ParentScope): void {
    for (const field of ENVELOPE_FIELDS) {
      if (this.record[field] !== parent.record[field]) {
        this.fail({ kind: "ChildEnvelopeMismatch", field });
      }
    }
    if (stableStringify(this.record.gameTags) !== stableStringify(parent.record.gameTags)) {
      this.fail({ kind: "ChildEnvelopeMismatch", field: "gameTags" });
    }
    this.gameIndex = this.record.gameTags.length;
    const metadata = this.record.metadata;
    if (metadata.parent !== parent.record.id) {
      this.fail({ kind: "ChildEnvelopeMismatch", field: "parent" });
    }
    if (metadata.subPlay !== parent.subPlay) {
      this.fail({ kind: "ChildEnvelopeMismatch", field: "subPlay" });
    }
    if (metadata.play !== parent.play) {
      this.fail({ kind: "ChildEnvelopeMismatch", field: "play" });
    }
    for (const key of RESERVED_KEYS) {
      this.consumedKeys.add(key);
    }
  }

  /** Reject the record unless everything in it has been consumed. */
  finish(): void {
    if (this.remaining.length > 0) {
      this.fail({ kind: "DescriptionNotFullyParsed", remaining: this.remaining });
    }
    const tagTypes: TagType[] = ["player", "team", "game"];
    for (const tagType of tagTypes) {
      const [tags, index] = this.tagState(tagType);
      if (index < tags.length) {
        this.fail({ kind: "TooManyTags", tagType, expected: index, actual: tags.length });
      }
    }
    if (this.childIndex < this.children.length) {
      this.fail({ kind: "TooManyChildren", expected: this.childIndex, actual: this.children.length });
    }
    const unconsumed = Object.keys(this.record.metadata)
      .filter((key) => !this.consumedKeys.has(key))
      .sort();
    if (unconsumed.length > 0) {
      this.fail({ kind: "UnconsumedMetadata", fields: unconsumed });
    }
    if (!this.categoryChecked) {
      // Records anchored to a game default to Game; season records and children to Changes.
      const inGame = !this.isChild && this.gameIndex > 0;
      this.expectCategory(inGame ? EventCategory.Game : EventCategory.Changes);
    }
  }

  /** Mark a reserved key read (root records take `play`/`subPlay` from their game). */
  consumeReserved(key: "play" | "subPlay"): number | undefined {
    this.consumedKeys.add(key);
    return this.record.metadata[key];
  }
}

const RESERVED_KEYS = new Set<string>(RESERVED_METADATA_KEYS);

const lineBreak: Parser<string> = (input) =>
  input.startsWith("\n")
    ? { ok: true, value: "\n", rest: input.slice(1) }
    : { ok: false, expected: "a line break", found: input.slice(0, 40) };
