import { EventCategory } from "../contract/eventTypes.js";
import {
  INGEST_SOURCE_KEY,
  INGEST_TIME_KEY,
  type JsonValue,
  type WireMetadata,
  type WireRecord,
} from "../contract/types.js";
import type { Envelope, Game, SubEventRef } from "../model/descriptors.js";

interface Scope {
  sim: string;
  season: number;
  day: number;
  phase: number;
  tournament: number;
}

interface ChildLink {
  parentId: string;
  subPlay: number;
  play: number | undefined;
  gameTags: string[];
}

/**
 * Accumulates one wire record: description lines, tag lists, metadata and
 * children. Children inherit the scope of their parent and are numbered by
 * `subPlay` in the order they are pushed.
 */
export class RecordBuilder {
  private readonly identity: SubEventRef;
  private readonly scope: Scope;
  private readonly link: ChildLink | null;
  private readonly lines: string[] = [];
  private readonly playerTags: string[] = [];
  private readonly teamTags: string[] = [];
  private gameTags: string[] = [];
  private readonly metadata: Record<string, JsonValue> = {};
  private readonly children: WireRecord[] = [];
  private category: EventCategory;
  private forcedSpecial = false;
  private play: number | undefined;

  private constructor(identity: SubEventRef, scope: Scope, link: ChildLink | null) {
    this.identity = identity;
    this.scope = scope;
    this.link = link;
    this.category = EventCategory.Changes;
    if (link) {
      this.gameTags = [...link.gameTags];
    }
  }

  static root(envelope: Envelope): RecordBuilder {
    const builder = new RecordBuilder(
      { id: envelope.id, created: envelope.created, nuts: envelope.nuts },
      {
        sim: envelope.sim,
        season: envelope.season,
        day: envelope.day,
        phase: envelope.phase,
        tournament: envelope.tournament,
      },
      null,
    );
    if (envelope.ingestTime !== undefined) {
      builder.setMetadata(INGEST_TIME_KEY, envelope.ingestTime);
    }
    if (envelope.ingestSource !== undefined) {
      builder.setMetadata(INGEST_SOURCE_KEY, envelope.ingestSource);
    }
    return builder;
  }

  get season(): number {
    return this.scope.season;
  }

  get day(): number {
    return this.scope.day;
  }

  /** The description as written so far. */
  get description(): string {
    return this.lines.join("\n");
  }

  /** Anchor the record to a game: game tag, both team tags and the play counter. */
  setGame(game: Game): void {
    this.gameTags = [game.gameId];
    this.teamTags.push(game.awayTeamId, game.homeTeamId);
    this.play = game.play;
    if (!this.link) {
      this.category = EventCategory.Game;
    }
  }

  pushDescription(line: string): void {
    this.lines.push(line);
  }

  pushPlayerTag(playerId: string): void {
    this.playerTags.push(playerId);
  }

  pushTeamTag(teamId: string | null): void {
    if (teamId !== null) {
      this.teamTags.push(teamId);
    }
  }

  setMetadata(key: string, value: JsonValue): void {
    this.metadata[key] = value;
  }

  setCategory(category: EventCategory): void {
    this.category = category;
  }

  forceSpecial(): void {
    this.forcedSpecial = true;
  }

  /** Build a child record with `fill` and append it under the next `subPlay`. */
  pushChild(sub: SubEventRef, type: number, fill: (child: RecordBuilder) => void): void {
    const child = new RecordBuilder(sub, this.scope, {
      parentId: this.identity.id,
      subPlay: this.children.length,
      play: this.play,
      gameTags: this.gameTags,
    });
    fill(child);
    this.children.push(child.build(type));
  }

  build(type: number): WireRecord {
    const metadata: WireMetadata = { ...this.metadata, children: this.children };
    if (this.link) {
      metadata.parent = this.link.parentId;
      metadata.subPlay = this.link.subPlay;
      if (this.link.play !== undefined) {
        metadata.play = this.link.play;
      }
    } else if (this.play !== undefined) {
      metadata.play = this.play;
      metadata.subPlay = -1;
    }

    return {
      id: this.identity.id,
      created: this.identity.created,
      type,
      category: this.forcedSpecial ? EventCategory.Special : this.category,
      description: this.lines.join("\n"),
      blurb: "",
      playerTags: this.playerTags,
      teamTags: this.teamTags,
      gameTags: this.gameTags,
      metadata,
      sim: this.scope.sim,
      season: this.scope.season,
      day: this.scope.day,
      phase: this.scope.phase,
      tournament: this.scope.tournament,
      nuts: this.identity.nuts,
    };
  }
}
