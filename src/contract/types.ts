/** A JSON-serializable value (no functions, no undefined). */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** Record identifiers are UUID strings. */
export type RecordId = string;
export type PlayerId = string;
export type TeamId = string;
export type GameId = string;

// ---------------------------------------------------------------------------
// Wire records
// ---------------------------------------------------------------------------

/**
 * Metadata bag of a wire record. The reserved keys are typed; everything else
 * is negotiated per event type and lives alongside them.
 */
export interface WireMetadata {
  children: WireRecord[];
  play?: number;
  subPlay?: number;
  parent?: RecordId;
  [key: string]: JsonValue | WireRecord[] | undefined;
}

/** One feed record as it appears on the wire (after schema normalization). */
export interface WireRecord {
  id: RecordId;
  created: string;
  type: number;
  category: number;
  description: string;
  blurb: string;
  playerTags: PlayerId[];
  teamTags: TeamId[];
  gameTags: GameId[];
  metadata: WireMetadata;
  sim: string;
  season: number;
  day: number;
  phase: number;
  tournament: number;
  nuts: number;
}

/** Metadata keys the codec manages itself rather than per event type. */
export const RESERVED_METADATA_KEYS = ["children", "play", "subPlay", "parent"] as const;

export const INGEST_TIME_KEY = "_eventually_ingest_time";
export const INGEST_SOURCE_KEY = "_eventually_ingest_source";
