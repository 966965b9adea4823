export { build, parse } from "./dispatch.js";
export type { ParseOutcome } from "./dispatch.js";
export { describeDetail, FeedParseError } from "./errors.js";
export type { ParseErrorDetail, TagType } from "./errors.js";
export { ParseCursor } from "./cursor.js";
export { RecordBuilder } from "./builder.js";
