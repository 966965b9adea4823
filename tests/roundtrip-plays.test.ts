import { describe, expect, it } from "vitest";
import { build, parse } from "../src/codec/dispatch.js";
import { EventCategory, EventType, ModDuration } from "../src/contract/eventTypes.js";
import { HOME_TEAM, childOf, gameRecord, uuid, withChildren } from "./helpers/records.js";
import { expectRoundTrip, failureKind, parseData } from "./helpers/roundtrip.js";

const special = EventCategory.Special;
const batter = uuid(0x601);
const runner = uuid(0x602);
const pitcher = uuid(0x603);

describe("pitches", () => {
  it("reads each strike style", () => {
    expect(expectRoundTrip(gameRecord({ type: EventType.Strike, description: "Strike, looking. 1-2" }))).toMatchObject({
      kind: "StrikeLooking",
      balls: 1,
      strikes: 2,
    });
    expect(parseData(gameRecord({ type: EventType.Strike, description: "Strike, swinging. 0-1" })).kind).toBe(
      "StrikeSwinging",
    );
    expect(parseData(gameRecord({ type: EventType.Strike, description: "Strike, flinching. 0-1" })).kind).toBe(
      "StrikeFlinching",
    );
  });

  it("writes the foul ball text the way each era did", () => {
    expectRoundTrip(gameRecord({ type: EventType.FoulBall, description: "Foul Ball. 0-1", season: 13 }));
    expectRoundTrip(gameRecord({ type: EventType.FoulBall, description: " Foul Ball. 0-1", season: 19 }));
    const outcome = parse(gameRecord({ type: EventType.FoulBall, description: "Foul Ball. 0-1", season: 19 }));
    expect(outcome.ok ? null : outcome.error.detail.kind).toBe("DescriptionMismatch");
  });

  it("rejects a count that would not be written back the same way", () => {
    const outcome = parse(gameRecord({ type: EventType.Ball, description: "Ball. 02-1" }));
    expect(outcome.ok ? null : outcome.error.detail.kind).toBe("DescriptionMismatch");
  });
});

describe("outs in the field", () => {
  it("round-trips a flyout with a runner tagging up", () => {
    const data = expectRoundTrip(
      gameRecord({
        type: EventType.FlyOut,
        description: "Long Swing hit a flyout to Deep Glove.\nHome Runner tags up and scores!",
        playerTags: [runner],
      }),
    );
    expect(data).toMatchObject({
      kind: "Flyout",
      batterName: "Long Swing",
      fielderName: "Deep Glove",
      scores: { scores: [{ playerId: runner, playerName: "Home Runner", itemDamage: null }], freeRefills: [] },
    });
  });

  it("round-trips a sacrifice ground out", () => {
    const data = expectRoundTrip(
      gameRecord({
        type: EventType.GroundOut,
        description: "Weak Tap hit a ground out to Short Stop.\nHome Runner advances on the sacrifice.",
        playerTags: [runner],
      }),
    );
    expect(data).toMatchObject({ kind: "GroundOut", scores: { scores: [{ playerName: "Home Runner" }] } });
  });

  it("tells fielder's choices and double plays apart from ground outs", () => {
    const choice = expectRoundTrip(
      gameRecord({
        type: EventType.GroundOut,
        description: "Quick Feet out at second base.\nWeak Tap reaches on fielder's choice.",
      }),
    );
    expect(choice).toMatchObject({
      kind: "FieldersChoice",
      runnerOutName: "Quick Feet",
      outAtBase: "second",
      batterName: "Weak Tap",
    });
    const double = expectRoundTrip(
      gameRecord({ type: EventType.GroundOut, description: "Weak Tap hit into a double play!" }),
    );
    expect(double).toMatchObject({ kind: "DoublePlay", batterName: "Weak Tap" });
  });
});

describe("hits", () => {
  it("round-trips a hit that breaks the batter's bat", () => {
    const itemId = uuid(0x611);
    const parent = gameRecord({
      type: EventType.Hit,
      description: "Iron Slugger's Bat broke!\nIron Slugger hits a Double!",
      playerTags: [batter],
    });
    const damage = childOf(parent, 0, {
      type: EventType.ItemBreaks,
      description: "Iron Slugger's Bat broke!",
      playerTags: [batter],
      teamTags: [HOME_TEAM],
      metadata: {
        itemId,
        itemName: "Bat",
        mods: [],
        playerItemRatingBefore: 1.5,
        playerItemRatingAfter: 1,
        playerRating: 3.25,
        itemDurability: 2,
        itemHealthBefore: 1,
        itemHealthAfter: 0,
      },
    });
    const data = expectRoundTrip(withChildren(parent, [damage]));
    expect(data).toMatchObject({
      kind: "Hit",
      hitType: "Double",
      batterId: batter,
      itemDamages: [{ outcome: "broke", playerName: "Iron Slugger", itemName: "Bat", itemHealthAfter: 0 }],
    });
  });

  it("reads a plural item name that was damaged", () => {
    const parent = gameRecord({
      type: EventType.Hit,
      description: "Iron Slugger's Cleats were damaged.\nIron Slugger hits a Single!",
      playerTags: [batter],
    });
    const damage = childOf(parent, 0, {
      type: EventType.ItemDamaged,
      description: "Iron Slugger's Cleats were damaged.",
      playerTags: [batter],
      teamTags: [HOME_TEAM],
      metadata: {
        itemId: uuid(0x612),
        itemName: "Cleats",
        mods: [],
        playerItemRatingBefore: 2,
        playerItemRatingAfter: 1.5,
        playerRating: 3,
        itemDurability: 3,
        itemHealthBefore: 3,
        itemHealthAfter: 2,
      },
    });
    const data = expectRoundTrip(withChildren(parent, [damage]));
    expect(data).toMatchObject({
      kind: "Hit",
      hitType: "Single",
      itemDamages: [{ outcome: "damagedPlural", itemName: "Cleats", itemHealthAfter: 2 }],
    });
  });

  it("tags the batter again when they heat up", () => {
    const data = expectRoundTrip(
      gameRecord({
        type: EventType.Hit,
        description: "Hot Hand hits a Single!\nHot Hand is Heating Up!",
        playerTags: [batter, batter],
      }),
    );
    expect(data).toMatchObject({ spicy: { status: "heatingUp" } });
  });

  it("rejects a heating-up batter tagged as someone else", () => {
    const outcome = parse(
      gameRecord({
        type: EventType.Hit,
        description: "Hot Hand hits a Single!\nHot Hand is Heating Up!",
        playerTags: [batter, runner],
      }),
    );
    expect(outcome.ok ? null : outcome.error.detail).toEqual({
      kind: "ExpectedEqualTags",
      tagType: "player",
      first: batter,
      second: runner,
    });
  });
});

describe("baserunning", () => {
  it("round-trips stolen bases with and without Blaserunning", () => {
    expect(
      expectRoundTrip(
        gameRecord({ type: EventType.StolenBase, description: "Fast Feet steals second base!", playerTags: [runner] }),
      ),
    ).toMatchObject({ kind: "StolenBase", base: "second", blaserunning: false });
    expect(
      expectRoundTrip(
        gameRecord({
          type: EventType.StolenBase,
          description: "Fast Feet steals third base!\nFast Feet scores with Blaserunning!",
          playerTags: [runner, runner],
        }),
      ),
    ).toMatchObject({ base: "third", blaserunning: true });
  });

  it("routes caught stealing by its text", () => {
    const data = expectRoundTrip(
      gameRecord({ type: EventType.StolenBase, description: "Fast Feet gets caught stealing fourth base." }),
    );
    expect(data).toMatchObject({ kind: "CaughtStealing", runnerName: "Fast Feet", base: "fourth" });
  });
});

describe("walks and strikeouts", () => {
  it("round-trips a walk that forces in a run", () => {
    const data = expectRoundTrip(
      gameRecord({
        type: EventType.Walk,
        description: "Patient Eye draws a walk.\nHome Runner scores!",
        playerTags: [batter, runner],
      }),
    );
    expect(data).toMatchObject({ kind: "Walk", batterId: batter, baseInstincts: null });
  });

  it("round-trips Base Instincts", () => {
    const data = expectRoundTrip(
      gameRecord({
        type: EventType.Walk,
        description: "Patient Eye draws a walk.\nBase Instincts take them directly to third base!",
        playerTags: [batter],
      }),
    );
    expect(data).toMatchObject({ baseInstincts: "third" });
  });

  it("round-trips charm strikeouts with the charmer tagged twice", () => {
    const charmer = uuid(0x621);
    const data = expectRoundTrip(
      gameRecord({
        type: EventType.Strikeout,
        category: special,
        description: "Sweet Talker charmed Easy Mark!\nEasy Mark swings 3 times to strike out willingly!",
        playerTags: [charmer, charmer, batter],
      }),
    );
    expect(data).toMatchObject({ kind: "CharmStrikeout", charmerId: charmer, charmedId: batter, numSwings: 3 });
  });

  it("round-trips a charm walk", () => {
    const data = expectRoundTrip(
      gameRecord({
        type: EventType.Walk,
        category: special,
        description: "Easy Mark charms Sweet Talker!\nEasy Mark walks to first base.",
        playerTags: [batter, batter],
      }),
    );
    expect(data).toMatchObject({ kind: "CharmWalk", pitcherName: "Sweet Talker" });
  });

  it("round-trips mild pitches with and without a walk", () => {
    expect(
      expectRoundTrip(
        gameRecord({
          type: EventType.MildPitch,
          category: special,
          description: "Soft Toss throws a Mild pitch!\nBall, 1-0.",
          playerTags: [pitcher],
        }),
      ),
    ).toMatchObject({ kind: "MildPitch", balls: 1, strikes: 0, runnersAdvance: false });
    expect(
      expectRoundTrip(
        gameRecord({
          type: EventType.MildPitch,
          category: special,
          description: "Soft Toss throws a Mild pitch!\nPatient Eye draws a walk.",
          playerTags: [pitcher, batter],
        }),
      ),
    ).toMatchObject({ kind: "MildPitchWalk", pitcherId: pitcher, batterId: batter });
  });

  it("files a mind-trick strikeout as a walk on older records", () => {
    const old = gameRecord({
      type: EventType.Walk,
      category: special,
      season: 13,
      description: "Patient Eye draws a walk.\nMind Bender uses a Mind Trick!\nPatient Eye strikes out thinking.",
      playerTags: [batter, batter],
    });
    expect(expectRoundTrip(old)).toMatchObject({ kind: "MindTrickStrikeout", pitcherName: "Mind Bender" });

    const recent = gameRecord({
      type: EventType.Strikeout,
      category: special,
      season: 20,
      description: "Mind Bender uses a Mind Trick!\nPatient Eye strikes out thinking.",
      playerTags: [batter],
    });
    const occurrence = parse(recent);
    expect(occurrence.ok).toBe(true);
    if (occurrence.ok) {
      expect(build(occurrence.occurrence).type).toBe(EventType.Strikeout);
    }
  });

  it("round-trips a mind-trick walk", () => {
    const data = expectRoundTrip(
      gameRecord({
        type: EventType.Walk,
        category: special,
        description:
          "Patient Eye strikes out looking.\nPatient Eye uses a Mind Trick!\nThe umpire sends them to first base.",
        playerTags: [batter],
      }),
    );
    expect(data).toMatchObject({ kind: "MindTrickWalk", strikeoutType: "looking" });
  });
});

describe("other plate appearances", () => {
  it("round-trips a hit by pitch with its Observed child", () => {
    const parent = gameRecord({
      type: EventType.HitByPitch,
      category: special,
      description: "Hard Thrower hits Unlucky Batter with a pitch!\nUnlucky Batter is now being Observed...",
      playerTags: [pitcher, batter],
    });
    const child = childOf(parent, 0, {
      type: EventType.AddedMod,
      description: "Unlucky Batter is now being Observed...",
      playerTags: [batter],
      teamTags: [HOME_TEAM],
      metadata: { mod: "COFFEE_PERIL", type: ModDuration.Weekly },
    });
    const data = expectRoundTrip(withChildren(parent, [child]));
    expect(data).toMatchObject({ kind: "HitByPitch", batterTeamId: HOME_TEAM });
  });

  it("round-trips a crow ambush", () => {
    const data = expectRoundTrip(
      gameRecord({
        type: EventType.AmbushedByCrows,
        category: special,
        description: "A murder of Crows ambush Bird Food!\nThey run to safety, resulting in an out.",
        playerTags: [batter],
      }),
    );
    expect(data).toMatchObject({ batterName: "Bird Food", friendOfCrows: null });
  });

  it("tags only Elsewhere batters when they are skipped", () => {
    expect(
      expectRoundTrip(gameRecord({ type: EventType.BatterSkipped, description: "Shell Guy is Shelled and cannot escape!" })),
    ).toMatchObject({ reason: { type: "shelled" } });
    expect(
      expectRoundTrip(
        gameRecord({ type: EventType.BatterSkipped, description: "Far Away is Elsewhere..", playerTags: [batter] }),
      ),
    ).toMatchObject({ reason: { type: "elsewhere", batterId: batter } });
  });
});

describe("kinds routed by their text", () => {
  it("rejects a fielder's choice without the runner put out", () => {
    const record = gameRecord({ type: EventType.GroundOut, description: "Weak Tap reaches on fielder's choice." });
    expect(failureKind(record)).toBe("DescriptionMismatch");
  });

  it("rejects a double play followed by a ground out line", () => {
    const record = gameRecord({
      type: EventType.GroundOut,
      description: "Weak Tap hit into a double play!\nWeak Tap hit a ground out to Short Stop.",
    });
    expect(failureKind(record)).toBe("DescriptionNotFullyParsed");
  });

  it("rejects a caught stealing at a base that does not exist", () => {
    const record = gameRecord({ type: EventType.StolenBase, description: "Quick Feet gets caught stealing sixth base." });
    expect(failureKind(record)).toBe("DescriptionMismatch");
  });

  it("rejects a charm strikeout where someone else swings", () => {
    const record = gameRecord({
      type: EventType.Strikeout,
      category: special,
      description: "Sweet Talker charmed Easy Mark!\nPatient Eye swings 3 times to strike out willingly!",
      playerTags: [pitcher, pitcher, batter],
    });
    expect(failureKind(record)).toBe("DescriptionMismatch");
  });

  it("rejects a mind-trick strikeout that is not thinking", () => {
    const record = gameRecord({
      type: EventType.Strikeout,
      category: special,
      season: 20,
      description: "Mind Bender uses a Mind Trick!\nPatient Eye strikes out looking.",
      playerTags: [batter],
    });
    expect(failureKind(record)).toBe("DescriptionMismatch");
  });

  it("rejects a mind-trick walk where another player uses the trick", () => {
    const record = gameRecord({
      type: EventType.Walk,
      category: special,
      description: "Patient Eye strikes out looking.\nMind Bender uses a Mind Trick!\nThe umpire sends them to first base.",
      playerTags: [batter],
    });
    expect(failureKind(record)).toBe("DescriptionMismatch");
  });

  it("rejects a charm walk where another batter walks", () => {
    const record = gameRecord({
      type: EventType.Walk,
      category: special,
      description: "Easy Mark charms Sweet Talker!\nPatient Eye walks to first base.",
      playerTags: [batter, batter],
    });
    expect(failureKind(record)).toBe("DescriptionMismatch");
  });

  it("rejects a mild pitch walk without the mild pitch", () => {
    const record = gameRecord({
      type: EventType.MildPitch,
      category: special,
      description: "Patient Eye draws a walk.",
      playerTags: [batter],
    });
    expect(failureKind(record)).toBe("DescriptionMismatch");
  });
});
