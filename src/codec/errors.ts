import { eventTypeName } from "../contract/eventTypes.js";

export type TagType = "player" | "team" | "game";

/** What went wrong while parsing one record. */
export type ParseErrorDetail =
  | { kind: "NotImplemented" }
  | { kind: "DescriptionMismatch"; expected: string; found: string }
  | { kind: "DescriptionNotFullyParsed"; remaining: string }
  | { kind: "MissingTags"; tagType: TagType }
  | { kind: "TooManyTags"; tagType: TagType; expected: number; actual: number }
  | { kind: "ExpectedEqualTags"; tagType: TagType; first: string; second: string }
  | { kind: "NotEnoughChildren"; expectedAtLeast: number }
  | { kind: "TooManyChildren"; expected: number; actual: number }
  | { kind: "UnexpectedChildType"; expected: number; actual: number; childNumber: number }
  | { kind: "MissingMetadata"; field: string }
  | { kind: "MetadataTypeError"; field: string; message: string }
  | { kind: "UnexpectedMetadataValue"; field: string; value: string }
  | { kind: "UnconsumedMetadata"; fields: string[] }
  | { kind: "UnknownEnumValue"; field: string; value: number }
  | { kind: "UnexpectedCategory"; expected: number; actual: number }
  | { kind: "ChildEnvelopeMismatch"; field: string }
  | { kind: "UnexpectedBlurb"; blurb: string };

/** One-line explanation of a parse failure, without the event type. */
export function describeDetail(detail: ParseErrorDetail): string {
  switch (detail.kind) {
    case "NotImplemented":
      return "event type is not implemented";
    case "DescriptionMismatch":
      return `expected ${detail.expected} but found ${JSON.stringify(detail.found)}`;
    case "DescriptionNotFullyParsed":
      return `description not fully parsed, remaining: ${JSON.stringify(detail.remaining)}`;
    case "MissingTags":
      return `missing ${detail.tagType} tag`;
    case "TooManyTags":
      return `expected ${detail.expected} ${detail.tagType} tags but found ${detail.actual}`;
    case "ExpectedEqualTags":
      return `expected equal ${detail.tagType} tags but found ${detail.first} and ${detail.second}`;
    case "NotEnoughChildren":
      return `expected at least ${detail.expectedAtLeast} children`;
    case "TooManyChildren":
      return `expected ${detail.expected} children but found ${detail.actual}`;
    case "UnexpectedChildType":
      return `child ${detail.childNumber} has type ${eventTypeName(detail.actual)}, expected ${eventTypeName(detail.expected)}`;
    case "MissingMetadata":
      return `missing metadata field "${detail.field}"`;
    case "MetadataTypeError":
      return `metadata field "${detail.field}" has the wrong shape: ${detail.message}`;
    case "UnexpectedMetadataValue":
      return `unexpected value ${detail.value} for metadata field "${detail.field}"`;
    case "UnconsumedMetadata":
      return `unconsumed metadata fields: ${detail.fields.join(", ")}`;
    case "UnknownEnumValue":
      return `unknown value ${detail.value} for "${detail.field}"`;
    case "UnexpectedCategory":
      return `expected category ${detail.expected} but found ${detail.actual}`;
    case "ChildEnvelopeMismatch":
      return `child field "${detail.field}" does not match its parent`;
    case "UnexpectedBlurb":
      return `unexpected blurb ${JSON.stringify(detail.blurb)}`;
  }
}

/** A record that the codec could not turn into an occurrence. */
export class FeedParseError extends Error {
  readonly eventType: number;
  readonly detail: ParseErrorDetail;

  constructor(eventType: number, detail: ParseErrorDetail) {
    super(`${eventTypeName(eventType)}: ${describeDetail(detail)}`);
    this.name = "FeedParseError";
    this.eventType = eventType;
    this.detail = detail;
  }
}
