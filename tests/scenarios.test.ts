import { describe, expect, it } from "vitest";
import { build, parse } from "../src/codec/dispatch.js";
import { EventCategory, EventType, ModDuration } from "../src/contract/eventTypes.js";
import type { WireRecord } from "../src/contract/types.js";
import type { Occurrence } from "../src/model/occurrence.js";
import {
  AWAY_TEAM,
  GAME_ID,
  HOME_TEAM,
  PLAY,
  childOf,
  gameRecord,
  uuid,
  withChildren,
} from "./helpers/records.js";

function parseOk(record: WireRecord): Occurrence {
  const outcome = parse(record);
  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.occurrence;
}

const game = {
  gameId: GAME_ID,
  awayTeamId: AWAY_TEAM,
  homeTeamId: HOME_TEAM,
  play: PLAY,
  unscatter: null,
  attractorSecretBase: null,
};

describe("ball", () => {
  const record = gameRecord({ type: EventType.Ball, description: "Ball. 2-1" });

  it("reads the count", () => {
    const occurrence = parseOk(record);
    expect(occurrence.data).toEqual({ kind: "Ball", game, balls: 2, strikes: 1, itemDamages: [] });
    expect(occurrence.id).toBe(record.id);
    expect(occurrence.season).toBe(13);
  });

  it("rebuilds the exact record", () => {
    const rebuilt = build(parseOk(record));
    expect(rebuilt.description).toBe("Ball. 2-1");
    expect(rebuilt).toEqual(record);
  });
});

describe("strikeout with a stopped-inhabiting child", () => {
  const ghostId = uuid(0x301);
  const ghostTeamId = uuid(0x302);
  const parent = gameRecord({
    type: EventType.Strikeout,
    description: "Wyatt Quitter strikes out swinging.",
  });
  const child = childOf(parent, 0, {
    type: EventType.RemovedMod,
    description: "Ghost Runner stopped Inhabiting.",
    playerTags: [ghostId],
    teamTags: [ghostTeamId],
    metadata: { mod: "INHABITING", type: ModDuration.Permanent },
    nuts: 3,
  });
  const record = withChildren(parent, [child]);

  it("parses the child into the occurrence", () => {
    const occurrence = parseOk(record);
    expect(occurrence.data).toEqual({
      kind: "StrikeoutSwinging",
      game,
      batterName: "Wyatt Quitter",
      itemDamages: [],
      stoppedInhabiting: {
        sub: { id: child.id, created: child.created, nuts: 3 },
        inhabitingPlayerId: ghostId,
        inhabitingPlayerName: "Ghost Runner",
        inhabitingPlayerTeamId: ghostTeamId,
      },
      freeRefill: null,
      isSpecial: false,
    });
  });

  it("rebuilds parent text and the child record", () => {
    const rebuilt = build(parseOk(record));
    expect(rebuilt.description).toBe("Wyatt Quitter strikes out swinging.");
    expect(rebuilt.metadata.children).toHaveLength(1);
    expect(rebuilt.metadata.children[0].metadata["mod"]).toBe("INHABITING");
    expect(rebuilt.metadata.children[0].playerTags).toEqual([ghostId]);
    expect(rebuilt.metadata.children[0].teamTags).toEqual([ghostTeamId]);
    expect(rebuilt).toEqual(record);
  });
});

describe("home run with a magmatic prefix and two free refills", () => {
  const batterId = uuid(0x401);
  const batterTeamId = uuid(0x402);
  const refillers = [
    { name: "Pour Over", playerId: uuid(0x403), teamId: uuid(0x404) },
    { name: "Cold Brew", playerId: uuid(0x405), teamId: uuid(0x406) },
  ];
  const description = [
    "Sal Volcano is Magmatic!",
    "Sal Volcano hits a 3-run home run!",
    "Pour Over used their Free Refill.",
    "Pour Over Refills the In!",
    "Cold Brew used their Free Refill.",
    "Cold Brew Refills the In!",
  ].join("\n");

  function homeRun(magmaticFirst: boolean): WireRecord {
    const parent = gameRecord({ type: EventType.HomeRun, description, playerTags: [batterId] });
    const magmaticIndex = magmaticFirst ? 0 : 2;
    const refillOffset = magmaticFirst ? 1 : 0;
    const refills = refillers.map((refiller, i) =>
      childOf(parent, refillOffset + i, {
        type: EventType.RemovedMod,
        description: `${refiller.name} used their Free Refill.`,
        playerTags: [refiller.playerId],
        teamTags: [refiller.teamId],
        metadata: { mod: "COFFEE_RALLY", type: ModDuration.Permanent },
      }),
    );
    const magmatic = childOf(parent, magmaticIndex, {
      type: EventType.RemovedMod,
      description: "Sal Volcano is Magmatic!",
      playerTags: [batterId],
      teamTags: [batterTeamId],
      metadata: { mod: "MAGMATIC", type: ModDuration.Permanent },
    });
    return withChildren(parent, magmaticFirst ? [magmatic, ...refills] : [...refills, magmatic]);
  }

  it("collects both refills and the magmatic change", () => {
    const occurrence = parseOk(homeRun(false));
    expect(occurrence.data.kind).toBe("HomeRun");
    if (occurrence.data.kind !== "HomeRun") {
      return;
    }
    expect(occurrence.data.batterName).toBe("Sal Volcano");
    expect(occurrence.data.homeRunType).toBe("3-run home run");
    expect(occurrence.data.freeRefills.map((refill) => refill.playerName)).toEqual([
      "Pour Over",
      "Cold Brew",
    ]);
    expect(occurrence.data.magmatic?.childAfterFreeRefills).toBe(true);
    expect(occurrence.data.magmatic?.change.teamId).toBe(batterTeamId);
  });

  it("keeps the magmatic child after the refills when it came last", () => {
    const record = homeRun(false);
    const rebuilt = build(parseOk(record));
    expect(rebuilt.metadata.children.map((child) => child.metadata["mod"])).toEqual([
      "COFFEE_RALLY",
      "COFFEE_RALLY",
      "MAGMATIC",
    ]);
    expect(rebuilt).toEqual(record);
  });

  it("keeps the magmatic child first when it came first", () => {
    const record = homeRun(true);
    const occurrence = parseOk(record);
    if (occurrence.data.kind === "HomeRun") {
      expect(occurrence.data.magmatic?.childAfterFreeRefills).toBe(false);
    }
    const rebuilt = build(occurrence);
    expect(rebuilt.metadata.children.map((child) => child.metadata["mod"])).toEqual([
      "MAGMATIC",
      "COFFEE_RALLY",
      "COFFEE_RALLY",
    ]);
    expect(rebuilt).toEqual(record);
  });
});

describe("unsupported event types", () => {
  it("reports an unknown discriminant as not implemented", () => {
    const outcome = parse(gameRecord({ type: 9999, description: "Something new happens." }));
    expect(outcome.ok).toBe(false);
    if (outcome.ok) {
      return;
    }
    expect(outcome.error.detail).toEqual({ kind: "NotImplemented" });
    expect(outcome.error.eventType).toBe(9999);
    expect(outcome.error.message).toBe("Type(9999): event type is not implemented");
  });

  it("reports a known but unsupported type as not implemented", () => {
    const outcome = parse(
      gameRecord({ type: EventType.WeatherChange, description: "The weather changes." }),
    );
    expect(outcome.ok ? null : outcome.error.detail.kind).toBe("NotImplemented");
  });
});

describe("missing metadata", () => {
  it("names the missing key and the event type", () => {
    const record = gameRecord({ type: EventType.Ball, description: "Ball. 0-0" });
    const { play: _play, ...metadata } = record.metadata;
    const outcome = parse({ ...record, metadata });
    expect(outcome.ok).toBe(false);
    if (outcome.ok) {
      return;
    }
    expect(outcome.error.detail).toEqual({ kind: "MissingMetadata", field: "play" });
    expect(outcome.error.message).toBe('Ball: missing metadata field "play"');
  });

  it("names a missing per-kind key", () => {
    const record = gameRecord({
      type: EventType.GameEnd,
      description: "Home Team 4, Away Team 2",
      category: EventCategory.Outcomes,
      teamTags: [HOME_TEAM, AWAY_TEAM],
    });
    const outcome = parse(record);
    expect(outcome.ok ? null : outcome.error.detail).toEqual({ kind: "MissingMetadata", field: "winner" });
  });
});
