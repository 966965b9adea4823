import { describe, expect, it } from "vitest";
import { parse } from "../src/codec/dispatch.js";
import { AttrCategory, EventCategory, EventType, ModDuration, Weather } from "../src/contract/eventTypes.js";
import type { WireRecord } from "../src/contract/types.js";
import {
  AWAY_TEAM,
  HOME_TEAM,
  childOf,
  gameRecord,
  uuid,
  withChildren,
} from "./helpers/records.js";
import { expectRoundTrip, failureKind } from "./helpers/roundtrip.js";

describe("game start", () => {
  it("round-trips a Let's Go with weather and stadium", () => {
    const stadium = uuid(0x501);
    const data = expectRoundTrip(
      gameRecord({
        type: EventType.LetsGo,
        description: "Let's Go!",
        metadata: { home: HOME_TEAM, away: AWAY_TEAM, weather: Weather.Coffee, stadium },
      }),
    );
    expect(data).toMatchObject({
      kind: "LetsGo",
      announcement: { type: "letsGo" },
      weather: Weather.Coffee,
      stadiumId: stadium,
    });
  });

  it("reads team names from the older announcement", () => {
    const data = expectRoundTrip(
      gameRecord({
        type: EventType.LetsGo,
        description: "Alpha Squad vs. Beta Crew",
        metadata: { home: HOME_TEAM, away: AWAY_TEAM, weather: Weather.Sun2 },
      }),
    );
    expect(data).toMatchObject({
      announcement: { type: "teamNames", away: "Alpha Squad", home: "Beta Crew" },
      stadiumId: null,
    });
  });

  it("rejects an unknown weather code", () => {
    const outcome = parse(
      gameRecord({
        type: EventType.LetsGo,
        description: "Let's Go!",
        metadata: { home: HOME_TEAM, away: AWAY_TEAM, weather: 22 },
      }),
    );
    expect(outcome.ok ? null : outcome.error.detail).toEqual({
      kind: "UnknownEnumValue",
      field: "weather",
      value: 22,
    });
  });

  it("round-trips Play ball and a half inning", () => {
    expectRoundTrip(gameRecord({ type: EventType.PlayBall, description: "Play ball!" }));
    const data = expectRoundTrip(
      gameRecord({ type: EventType.HalfInning, description: "Bottom of 7, Beta Crew batting." }),
    );
    expect(data).toMatchObject({ topOfInning: false, inning: 7, battingTeamName: "Beta Crew" });
  });
});

describe("batters and pitchers", () => {
  it("separates the wielded item from the team name", () => {
    const data = expectRoundTrip(
      gameRecord({
        type: EventType.BatterUp,
        description: "Nova Hendricks batting for the Crew, wielding a Rubber Bat.",
      }),
    );
    expect(data).toMatchObject({
      kind: "BatterUp",
      batterName: "Nova Hendricks",
      teamName: "Crew",
      wieldingItem: "a Rubber Bat",
      inhabiting: null,
      isRepeating: false,
    });
  });

  it("marks a repeating batter as special", () => {
    const data = expectRoundTrip(
      gameRecord({
        type: EventType.BatterUp,
        category: EventCategory.Special,
        description: "Nova Hendricks is Repeating!\nNova Hendricks batting for the Crew.",
      }),
    );
    expect(data).toMatchObject({ isRepeating: true, wieldingItem: null });
  });

  it("round-trips an inhabiting batter with its mod child", () => {
    const ghost = uuid(0x511);
    const host = uuid(0x512);
    const parent = gameRecord({
      type: EventType.BatterUp,
      category: EventCategory.Special,
      description: "Ghost Runner is Inhabiting Host Player!\nGhost Runner batting for the Crew.",
      playerTags: [ghost, host],
    });
    const child = childOf(parent, 0, {
      type: EventType.AddedMod,
      description: "Ghost Runner is Inhabiting Host Player!",
      playerTags: [ghost],
      teamTags: [HOME_TEAM],
      metadata: { mod: "INHABITING", type: ModDuration.Permanent },
    });
    const data = expectRoundTrip(withChildren(parent, [child]));
    expect(data).toMatchObject({
      inhabiting: { inhabitingPlayerId: ghost, inhabitedPlayerId: host, inhabitingPlayerTeamId: HOME_TEAM },
    });
  });

  it("round-trips a pitcher change", () => {
    const pitcher = uuid(0x521);
    const data = expectRoundTrip(
      gameRecord({
        type: EventType.PitcherChange,
        description: "Lefty Arm is now pitching for the Crew.",
        playerTags: [pitcher],
      }),
    );
    expect(data).toMatchObject({ pitcherName: "Lefty Arm", teamName: "Crew", pitcherId: pitcher });
  });
});

describe("innings and game end", () => {
  it("round-trips an inning end where a pitcher loses Triple Threat", () => {
    const pitcher = uuid(0x531);
    const parent = gameRecord({
      type: EventType.InningEnd,
      description: "Inning 3 is now an Outing.\nLefty Arm is no longer a Triple Threat.",
      playerTags: [pitcher],
    });
    const child = childOf(parent, 0, {
      type: EventType.RemovedMod,
      description: "Lefty Arm is no longer a Triple Threat.",
      playerTags: [pitcher],
      teamTags: [AWAY_TEAM],
      metadata: { mod: "TRIPLE_THREAT", type: ModDuration.Permanent },
    });
    const data = expectRoundTrip(withChildren(parent, [child]));
    expect(data).toMatchObject({ inning: 3, lostTripleThreat: [{ playerName: "Lefty Arm", playerId: pitcher }] });
  });

  it("round-trips a game end with the repeated team tags", () => {
    const data = expectRoundTrip(
      gameRecord({
        type: EventType.GameEnd,
        category: EventCategory.Outcomes,
        description: "Beta Crew 4.5, Alpha Squad 2",
        teamTags: [HOME_TEAM, AWAY_TEAM],
        metadata: { winner: HOME_TEAM },
      }),
    );
    expect(data).toMatchObject({
      winningTeamName: "Beta Crew",
      winningTeamScore: 4.5,
      losingTeamName: "Alpha Squad",
      losingTeamScore: 2,
      winnerId: HOME_TEAM,
    });
  });
});

describe("announcements", () => {
  it("round-trips the fixed special lines", () => {
    const special = EventCategory.Special;
    expectRoundTrip(
      gameRecord({ type: EventType.StrikeZapped, category: special, description: "The Electricity zaps a strike away!" }),
    );
    expectRoundTrip(
      gameRecord({ type: EventType.SolarPanelsAwait, category: special, description: "The Solar Panels are angled toward Sun 2." }),
    );
    expectRoundTrip(
      gameRecord({
        type: EventType.HomeFieldAdvantage,
        category: special,
        description: "The Beta Crew apply Home Field advantage!",
      }),
    );
    expectRoundTrip(
      gameRecord({ type: EventType.PrizeMatch, category: special, description: "Prize Match!\nThe Winner gets a Golden Glove" }),
    );
  });

  it("rejects a fixed line in the wrong category", () => {
    const outcome = parse(
      gameRecord({ type: EventType.StrikeZapped, description: "The Electricity zaps a strike away!" }),
    );
    expect(outcome.ok ? null : outcome.error.detail).toEqual({
      kind: "UnexpectedCategory",
      expected: EventCategory.Special,
      actual: EventCategory.Game,
    });
  });

  it("reads runs and unruns when runs overflow", () => {
    const special = EventCategory.Special;
    const gained = expectRoundTrip(
      gameRecord({ type: EventType.RunsOverflowing, category: special, description: "Runs are Overflowing!\nBeta Crew gain 1 Run." }),
    );
    expect(gained).toMatchObject({ runs: 1 });
    const lost = expectRoundTrip(
      gameRecord({ type: EventType.RunsOverflowing, category: special, description: "Runs are Overflowing!\nBeta Crew gain 3 Unruns." }),
    );
    expect(lost).toMatchObject({ runs: -3 });
  });
});

describe("secret base and parties", () => {
  it("forces the Special category for an attractor entering the secret base", () => {
    const attractor = uuid(0x541);
    const data = expectRoundTrip(
      gameRecord({
        type: EventType.Ball,
        category: EventCategory.Special,
        description: "Pull Magnet enters the Secret Base...\nBall. 1-0",
        playerTags: [attractor],
      }),
    );
    expect(data).toMatchObject({
      kind: "Ball",
      game: { attractorSecretBase: { playerName: "Pull Magnet", playerId: attractor } },
    });
  });

  it("round-trips a party with its stat child", () => {
    const player = uuid(0x551);
    const parent = gameRecord({
      type: EventType.Party,
      description: "Disco Dancer is Partying!",
      playerTags: [player],
    });
    const child = childOf(parent, 0, {
      type: EventType.PlayerStatIncrease,
      description: "Disco Dancer is Partying!",
      playerTags: [player],
      teamTags: [HOME_TEAM],
      metadata: { type: AttrCategory.Overall, before: 2.5, after: 2.75 },
    });
    const data = expectRoundTrip(withChildren(parent, [child]));
    expect(data).toMatchObject({ change: { ratingBefore: 2.5, ratingAfter: 2.75, teamId: HOME_TEAM } });
  });
});

describe("more announcements", () => {
  const special = EventCategory.Special;

  it("round-trips the birds, peanut flavor text and solar panels", () => {
    expectRoundTrip(
      gameRecord({
        type: EventType.BirdsCircle,
        category: special,
        description: "The Birds circle ... but they don't find what they're looking for.",
      }),
    );
    const flavor = expectRoundTrip(
      gameRecord({ type: EventType.PeanutFlavorText, category: special, description: "Peanut Fact: peanuts are not nuts." }),
    );
    expect(flavor).toMatchObject({ message: "Peanut Fact: peanuts are not nuts." });
    const panels = expectRoundTrip(
      gameRecord({
        type: EventType.SolarPanelsActivation,
        category: special,
        description: "The Solar Panels absorb Sun 2's energy!\n10 Runs are collected and saved for the Beta Crew's next game.",
      }),
    );
    expect(panels).toMatchObject({ runs: 10, teamName: "Beta Crew" });
  });

  it("reads the inning of a Holiday Inning", () => {
    const data = expectRoundTrip(
      gameRecord({ type: EventType.HolidayInning, description: "Hotel Motel\nInning 7 is a Holiday Inning!" }),
    );
    expect(data).toMatchObject({ kind: "HolidayInning", inning: 7 });
  });
});

describe("secret base entries and exits", () => {
  const special = EventCategory.Special;
  const runner = uuid(0x561);

  it("round-trips a runner entering and leaving the Secret Base", () => {
    const entered = expectRoundTrip(
      gameRecord({
        type: EventType.EnterSecretBase,
        category: special,
        description: "Pull Magnet enters the Secret Base...",
        playerTags: [runner],
      }),
    );
    expect(entered).toMatchObject({
      kind: "EnterSecretBase",
      playerName: "Pull Magnet",
      playerId: runner,
      game: { attractorSecretBase: null },
    });
    const exited = expectRoundTrip(
      gameRecord({
        type: EventType.ExitSecretBase,
        category: special,
        description: "Pull Magnet exits the Secret Base to Second Base!",
        playerTags: [runner],
      }),
    );
    expect(exited).toMatchObject({ kind: "ExitSecretBase", playerId: runner });
  });
});

describe("performing toggles", () => {
  const special = EventCategory.Special;
  const player = uuid(0x571);
  const other = uuid(0x572);

  function toggleChild(
    parent: WireRecord,
    subPlay: number,
    description: string,
    playerId: string,
    metadata: Record<string, string | number>,
    type: number = EventType.AddedModFromOtherMod,
  ): WireRecord {
    return childOf(parent, subPlay, {
      type,
      description,
      playerTags: [playerId],
      teamTags: [HOME_TEAM],
      metadata: { ...metadata, type: ModDuration.Permanent },
    });
  }

  it("round-trips a Superyummy player changing from under to overperforming", () => {
    const parent = gameRecord({ type: EventType.Superyummy, category: special, description: "Snack Pack loves Peanuts." });
    const child = toggleChild(
      parent,
      0,
      "Snack Pack loves Peanuts.",
      player,
      { source: "SUPERYUMMY", from: "UNDERPERFORMING", to: "OVERPERFORMING" },
      EventType.ChangedModFromOtherMod,
    );
    expect(expectRoundTrip(withChildren(parent, [child]))).toMatchObject({
      peanutsPresent: true,
      toggle: { isOverperforming: true, isFirstProc: false, playerId: player },
    });
  });

  it("round-trips an echoed Superyummy line that changes nothing", () => {
    const record = gameRecord({ type: EventType.Superyummy, category: special, description: "Snack Pack misses Peanuts." });
    expect(expectRoundTrip(record)).toMatchObject({ peanutsPresent: false, toggle: null });
  });

  it("round-trips two Homebody lines", () => {
    const parent = gameRecord({
      type: EventType.Homebody,
      category: special,
      description: "Home Body is happy to be home.\nRoad Tripper is homesick.",
    });
    const data = expectRoundTrip(
      withChildren(parent, [
        toggleChild(parent, 0, "Home Body is happy to be home.", player, { source: "HOMEBODY", mod: "OVERPERFORMING" }),
        toggleChild(parent, 1, "Road Tripper is homesick.", other, { source: "HOMEBODY", mod: "UNDERPERFORMING" }),
      ]),
    );
    expect(data).toMatchObject({
      toggles: [
        { playerName: "Home Body", isOverperforming: true, isFirstProc: true },
        { playerName: "Road Tripper", isOverperforming: false },
      ],
    });
  });

  it("rejects a Homebody child that contradicts its line", () => {
    const parent = gameRecord({ type: EventType.Homebody, category: special, description: "Home Body is happy to be home." });
    const child = toggleChild(parent, 0, "Home Body is happy to be home.", player, {
      source: "HOMEBODY",
      mod: "UNDERPERFORMING",
    });
    expect(failureKind(withChildren(parent, [child]))).toBe("UnexpectedMetadataValue");
  });
});
