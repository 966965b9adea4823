import { describe, expect, it } from "vitest";
import { RecordBuilder } from "../src/codec/builder.js";
import { EventCategory, EventType } from "../src/contract/eventTypes.js";
import { INGEST_SOURCE_KEY, INGEST_TIME_KEY } from "../src/contract/types.js";
import type { Envelope, Game } from "../src/model/descriptors.js";
import { AWAY_TEAM, GAME_ID, HOME_TEAM, SIM, uuid } from "./helpers/records.js";

const envelope: Envelope = {
  id: uuid(0xa01),
  created: "2021-03-01T18:00:00.000Z",
  sim: SIM,
  season: 13,
  day: 27,
  phase: 2,
  tournament: -1,
  nuts: 1,
};

const game: Game = {
  gameId: GAME_ID,
  awayTeamId: AWAY_TEAM,
  homeTeamId: HOME_TEAM,
  play: 7,
  unscatter: null,
  attractorSecretBase: null,
};

describe("RecordBuilder", () => {
  it("builds a season record in the Changes category without play counters", () => {
    const b = RecordBuilder.root(envelope);
    b.pushDescription("The Beta Crew are Bottom Dwellers.");
    b.pushTeamTag(HOME_TEAM);
    b.pushTeamTag(null);
    const record = b.build(EventType.PlayerStatIncrease);
    expect(record).toEqual({
      id: envelope.id,
      created: envelope.created,
      type: EventType.PlayerStatIncrease,
      category: EventCategory.Changes,
      description: "The Beta Crew are Bottom Dwellers.",
      blurb: "",
      playerTags: [],
      teamTags: [HOME_TEAM],
      gameTags: [],
      metadata: { children: [] },
      sim: SIM,
      season: 13,
      day: 27,
      phase: 2,
      tournament: -1,
      nuts: 1,
    });
  });

  it("writes the ingest stamp when the envelope has one", () => {
    const b = RecordBuilder.root({ ...envelope, ingestTime: 1614621600, ingestSource: "archive" });
    expect(b.build(EventType.Tidings).metadata).toEqual({
      [INGEST_TIME_KEY]: 1614621600,
      [INGEST_SOURCE_KEY]: "archive",
      children: [],
    });
  });

  it("anchors a record to its game", () => {
    const b = RecordBuilder.root(envelope);
    b.setGame(game);
    b.pushDescription("Play ball!");
    const record = b.build(EventType.PlayBall);
    expect(record.category).toBe(EventCategory.Game);
    expect(record.gameTags).toEqual([GAME_ID]);
    expect(record.teamTags).toEqual([AWAY_TEAM, HOME_TEAM]);
    expect(record.metadata).toEqual({ children: [], play: 7, subPlay: -1 });
  });

  it("numbers children in push order and scopes them to the parent", () => {
    const b = RecordBuilder.root(envelope);
    b.setGame(game);
    const first = { id: uuid(0xa11), created: envelope.created, nuts: 0 };
    const second = { id: uuid(0xa12), created: envelope.created, nuts: 2 };
    b.pushChild(first, EventType.AddedMod, (child) => child.pushDescription("one"));
    b.pushChild(second, EventType.RemovedMod, (child) => child.pushDescription("two"));
    const children = b.build(EventType.HomeRun).metadata.children;
    expect(children.map((child) => [child.id, child.metadata.subPlay, child.category])).toEqual([
      [first.id, 0, EventCategory.Changes],
      [second.id, 1, EventCategory.Changes],
    ]);
    expect(children[1]).toMatchObject({
      gameTags: [GAME_ID],
      nuts: 2,
      season: 13,
      metadata: { parent: envelope.id, play: 7, subPlay: 1, children: [] },
    });
  });

  it("lets a forced Special category win over the kind's own", () => {
    const b = RecordBuilder.root(envelope);
    b.setGame(game);
    b.forceSpecial();
    b.setCategory(EventCategory.Outcomes);
    expect(b.build(EventType.Ball).category).toBe(EventCategory.Special);
  });
});
