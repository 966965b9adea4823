import { describe, expect, it } from "vitest";
import { parse } from "../src/codec/dispatch.js";
import { Being, EventCategory, EventType, ModDuration, RosterLocation } from "../src/contract/eventTypes.js";
import { AWAY_TEAM, HOME_TEAM, seasonRecord, uuid } from "./helpers/records.js";
import { expectRoundTrip, failureKind } from "./helpers/roundtrip.js";

const outcomes = EventCategory.Outcomes;
const player = uuid(0x801);

describe("narration", () => {
  it("keeps the speaker and the whole message of a big deal", () => {
    const data = expectRoundTrip(
      seasonRecord({
        type: EventType.BigDeal,
        category: EventCategory.Narrative,
        description: "THE MICROPHONE HUMS.\nIT WILL NOT STOP.",
        metadata: { being: Being.Microphone },
      }),
    );
    expect(data).toEqual({ kind: "BeingSpeech", being: Being.Microphone, message: "THE MICROPHONE HUMS.\nIT WILL NOT STOP." });
  });

  it("rejects an unknown speaker", () => {
    const outcome = parse(
      seasonRecord({
        type: EventType.BigDeal,
        category: EventCategory.Narrative,
        description: "...",
        metadata: { being: 99 },
      }),
    );
    expect(outcome.ok ? null : outcome.error.detail).toEqual({ kind: "UnknownEnumValue", field: "being", value: 99 });
  });

  it("carries tidings metadata through untouched", () => {
    const data = expectRoundTrip(
      seasonRecord({
        type: EventType.Tidings,
        category: outcomes,
        description: "The league shifts.",
        playerTags: [player],
        metadata: { extra: { nested: [1, 2] }, note: "kept" },
      }),
    );
    expect(data).toMatchObject({ kind: "Tidings", playerTags: [player], metadata: { note: "kept" } });
  });
});

describe("standings and shame", () => {
  it("round-trips a Sun 2 win", () => {
    const data = expectRoundTrip(
      seasonRecord({
        type: EventType.Sun2SetWin,
        category: outcomes,
        description: "Sun 2 set a Win upon the Beta Crew.",
        teamTags: [HOME_TEAM],
      }),
    );
    expect(data).toEqual({ kind: "Sun2SetWin", teamId: HOME_TEAM, teamName: "Beta Crew" });
  });

  it("round-trips a shaming with its totals", () => {
    const data = expectRoundTrip(
      seasonRecord({
        type: EventType.TeamDidShame,
        category: outcomes,
        description: "The Alpha Squad shamed the Beta Crew.",
        teamTags: [AWAY_TEAM],
        metadata: { totalShames: 3, totalShamings: 1 },
      }),
    );
    expect(data).toMatchObject({ shamingTeamName: "Alpha Squad", shamedTeamName: "Beta Crew", totalShames: 3 });
  });

  it("checks the written place against the place metadata", () => {
    const fields = {
      type: EventType.FinalStandings,
      category: outcomes,
      description: "The Beta Crew finished 2nd in the Wild High.",
      teamTags: [HOME_TEAM],
    };
    expect(expectRoundTrip(seasonRecord({ ...fields, metadata: { place: 1 } }))).toMatchObject({
      place: 1,
      divisionName: "Wild High",
    });
    const outcome = parse(seasonRecord({ ...fields, metadata: { place: 0 } }));
    expect(outcome.ok ? null : outcome.error.detail).toEqual({
      kind: "DescriptionMismatch",
      expected: '"1st"',
      found: "2nd",
    });
  });
});

describe("postseason", () => {
  it("names the following season when a team earns a slot", () => {
    expectRoundTrip(
      seasonRecord({
        type: EventType.EarnedPostseasonSlot,
        category: outcomes,
        season: 13,
        description: "The Beta Crew earned a spot in the Season 14 Postseason.",
        teamTags: [HOME_TEAM],
      }),
    );
  });

  it("reads numbered rounds and the Internet Series", () => {
    const round = expectRoundTrip(
      seasonRecord({
        type: EventType.PostseasonAdvance,
        category: outcomes,
        description: "The Beta Crew advanced to Round 2 of the Season 14 Postseason.",
        teamTags: [HOME_TEAM],
      }),
    );
    expect(round).toMatchObject({ round: 2, displayedSeason: 14 });
    const series = expectRoundTrip(
      seasonRecord({
        type: EventType.PostseasonAdvance,
        category: outcomes,
        description: "The Beta Crew advanced to The Internet Series of the Season 14 Postseason.",
        teamTags: [HOME_TEAM],
      }),
    );
    expect(series).toMatchObject({ round: null });
  });
});

describe("ratings and mods", () => {
  it("tells player boosts from Bottom Dwellers", () => {
    const boosted = expectRoundTrip(
      seasonRecord({
        type: EventType.PlayerStatIncrease,
        description: "Boost Me was boosted.",
        teamTags: [HOME_TEAM],
        playerTags: [player],
        metadata: { before: 2, after: 2.5, type: 4 },
      }),
    );
    expect(boosted).toMatchObject({ kind: "PlayerBoosted", playerName: "Boost Me", ratingAfter: 2.5 });
    const dwellers = expectRoundTrip(
      seasonRecord({
        type: EventType.PlayerStatIncrease,
        description: "The Beta Crew are Bottom Dwellers.",
        teamTags: [HOME_TEAM],
        metadata: { before: 1, after: 1.25, type: 5 },
      }),
    );
    expect(dwellers).toMatchObject({ kind: "BottomDwellers", teamName: "Beta Crew" });
  });

  it("round-trips player and team mod expiry", () => {
    const playerExpiry = expectRoundTrip(
      seasonRecord({
        type: EventType.ModExpires,
        description: "Sal Volcano's weekly mods wore off.",
        teamTags: [HOME_TEAM],
        playerTags: [player],
        metadata: { mods: ["COFFEE_PERIL"], type: ModDuration.Weekly },
      }),
    );
    expect(playerExpiry).toMatchObject({ kind: "PlayerModExpires", playerName: "Sal Volcano", duration: 2 });
    const teamExpiry = expectRoundTrip(
      seasonRecord({
        type: EventType.ModExpires,
        description: "The Sharks' seasonal mods wore off.",
        teamTags: [HOME_TEAM],
        metadata: { mods: ["PARTY_TIME"], type: ModDuration.Seasonal },
      }),
    );
    expect(teamExpiry).toMatchObject({ kind: "TeamModExpires", teamName: "Sharks" });
  });

  it("round-trips each MVP level", () => {
    const first = expectRoundTrip(
      seasonRecord({
        type: EventType.AddedMod,
        description: "Star Player is named an MVP.",
        teamTags: [HOME_TEAM],
        playerTags: [player],
        metadata: { mod: "EGO1", type: ModDuration.Permanent },
      }),
    );
    expect(first).toMatchObject({ kind: "PlayerNamedMvp", level: 1 });
    const second = expectRoundTrip(
      seasonRecord({
        type: EventType.ModChange,
        description: "Star Player is named a 2-Time MVP.",
        teamTags: [HOME_TEAM],
        playerTags: [player],
        metadata: { from: "EGO1", to: "EGO2", type: ModDuration.Permanent },
      }),
    );
    expect(second).toMatchObject({ level: 2 });
    expectRoundTrip(
      seasonRecord({
        type: EventType.ModChange,
        description: "Star Player is named a 3-Time MVP!",
        teamTags: [HOME_TEAM],
        playerTags: [player],
        metadata: { from: "EGO2", to: "EGO3", type: ModDuration.Permanent },
      }),
    );
  });

  it("routes team mods by their text", () => {
    const party = expectRoundTrip(
      seasonRecord({
        type: EventType.AddedMod,
        description: "The Beta Crew have entered Party Time!",
        teamTags: [HOME_TEAM],
        metadata: { mod: "PARTY_TIME", type: ModDuration.Seasonal },
      }),
    );
    expect(party).toEqual({ kind: "TeamEnteredPartyTime", teamId: HOME_TEAM, teamName: "Beta Crew" });
    const lost = expectRoundTrip(
      seasonRecord({
        type: EventType.RemovedMod,
        description: "Hot Foot lost the Fire Eater mod.",
        teamTags: [HOME_TEAM],
        playerTags: [player],
        metadata: { mod: "FIRE_EATER", type: ModDuration.Permanent },
      }),
    );
    expect(lost).toMatchObject({ kind: "PlayerLostMod", mod: "FIRE_EATER", modName: "Fire Eater" });
  });
});

describe("items", () => {
  it("files early chest drops as special and omits absent ratings", () => {
    const itemId = uuid(0x811);
    const data = expectRoundTrip(
      seasonRecord({
        type: EventType.PlayerGainedItem,
        category: EventCategory.Special,
        season: 13,
        description: "The Community Chest Opens! Lucky Guy gained Shiny Cap.",
        teamTags: [HOME_TEAM],
        playerTags: [player],
        metadata: { itemId, itemName: "Shiny Cap", mods: [], playerRating: 2 },
      }),
    );
    expect(data).toMatchObject({
      kind: "CommunityChestOpens",
      playerName: "Lucky Guy",
      playerItemRatingBefore: null,
      playerItemRatingAfter: null,
    });
  });

  it("rejects an item name that disagrees with the text", () => {
    const outcome = parse(
      seasonRecord({
        type: EventType.PlayerLostItem,
        description: "Butter Fingers dropped Old Glove.",
        teamTags: [HOME_TEAM],
        playerTags: [player],
        metadata: {
          itemId: uuid(0x812),
          itemName: "New Glove",
          mods: [],
          playerItemRatingBefore: 1,
          playerItemRatingAfter: 0.5,
          playerRating: 2,
        },
      }),
    );
    expect(outcome.ok ? null : outcome.error.detail).toEqual({
      kind: "UnexpectedMetadataValue",
      field: "itemName",
      value: '"New Glove"',
    });
  });
});

describe("redactions and roster moves", () => {
  const shadows = uuid(0xb9);

  it("keeps a redacted record's text and scales", () => {
    const data = expectRoundTrip(
      seasonRecord({
        type: EventType.Undefined,
        category: EventCategory.Redacted,
        description: "[REDACTED]",
        metadata: { redacted: true, scales: 3 },
      }),
    );
    expect(data).toEqual({ kind: "Redacted", description: "[REDACTED]", scales: 3 });
  });

  it("round-trips a replica fading away", () => {
    const data = expectRoundTrip(
      seasonRecord({
        type: EventType.PlayerRemovedFromTeam,
        description: "Nova Hendricks faded away from the Crew.",
        playerTags: [player],
        teamTags: [HOME_TEAM],
        metadata: { playerId: player, playerName: "Nova Hendricks", teamId: HOME_TEAM, teamName: "Crew" },
      }),
    );
    expect(data).toEqual({
      kind: "ReplicaFadedToDust",
      teamId: HOME_TEAM,
      teamName: "Crew",
      playerId: player,
      playerName: "Nova Hendricks",
    });
  });

  function moved(description: string, location: number, receiveLocation: number, season = 13) {
    return seasonRecord({
      type: EventType.PlayerMoved,
      description,
      playerTags: [player],
      teamTags: [shadows, HOME_TEAM],
      season,
      metadata: {
        location,
        playerId: player,
        playerName: "Nova Hendricks",
        receiveLocation,
        receiveTeamId: HOME_TEAM,
        receiveTeamName: "Crew",
        sendTeamId: shadows,
        sendTeamName: "Shadows",
      },
    });
  }

  it("round-trips a detective returning from the investigation", () => {
    const emptyhanded = expectRoundTrip(
      moved("Nova Hendricks returns from the Investigation emptyhanded.", RosterLocation.Bullpen, RosterLocation.Lineup),
    );
    expect(emptyhanded).toMatchObject({
      kind: "ReturnFromInvestigation",
      previousTeamId: shadows,
      newTeamName: "Crew",
      newLocation: RosterLocation.Lineup,
      emptyhanded: true,
    });
    const found = expectRoundTrip(
      moved("Nova Hendricks returns from the Investigation.", RosterLocation.Bullpen, RosterLocation.Rotation),
    );
    expect(found).toMatchObject({ emptyhanded: false, newLocation: RosterLocation.Rotation });
  });

  it("round-trips a roaming player in both wordings", () => {
    expect(
      expectRoundTrip(moved("Nova Hendricks wandered to a new team.", RosterLocation.Bench, RosterLocation.Bench, 16)),
    ).toMatchObject({ kind: "Roam", location: RosterLocation.Bench, previousTeamName: "Shadows" });
    expect(
      expectRoundTrip(moved("Nova Hendricks roamed to a new team.", RosterLocation.Lineup, RosterLocation.Lineup, 18)),
    ).toMatchObject({ kind: "Roam", location: RosterLocation.Lineup });
  });

  it("rejects a roam that changes the roster slot", () => {
    const outcome = parse(moved("Nova Hendricks wandered to a new team.", RosterLocation.Bench, RosterLocation.Lineup));
    expect(outcome.ok ? null : outcome.error.detail).toEqual({
      kind: "UnexpectedMetadataValue",
      field: "receiveLocation",
      value: "0",
    });
  });

  it("rejects an unknown roster slot", () => {
    const outcome = parse(moved("Nova Hendricks roamed to a new team.", 7, 7, 18));
    expect(outcome.ok ? null : outcome.error.detail).toEqual({ kind: "UnknownEnumValue", field: "location", value: 7 });
  });
});

describe("league outcomes", () => {
  it("keeps an emergency alert's text and team tags", () => {
    const data = expectRoundTrip(
      seasonRecord({
        type: EventType.EmergencyAlert,
        category: outcomes,
        description: "EMERGENCY ALERT\nTwo teams have been swept away.",
        teamTags: [AWAY_TEAM, HOME_TEAM],
      }),
    );
    expect(data).toEqual({
      kind: "EmergencyAlert",
      message: "EMERGENCY ALERT\nTwo teams have been swept away.",
      teamTags: [AWAY_TEAM, HOME_TEAM],
    });
  });

  it("round-trips a swallowed win and a shamed team", () => {
    expect(
      expectRoundTrip(
        seasonRecord({
          type: EventType.BlackHoleSwallowedWin,
          category: outcomes,
          description: "The Black Hole swallowed a Win from the Crew!",
          teamTags: [HOME_TEAM],
        }),
      ),
    ).toMatchObject({ teamId: HOME_TEAM, teamName: "Crew" });
    expect(
      expectRoundTrip(
        seasonRecord({
          type: EventType.TeamWasShamed,
          category: outcomes,
          description: "The Crew were shamed by the Beta.",
          teamTags: [HOME_TEAM],
          metadata: { totalShames: 4, totalShamings: 1 },
        }),
      ),
    ).toMatchObject({ shamedTeamName: "Crew", shamingTeamName: "Beta", totalShames: 4 });
  });

  it("names the displayed season of an elimination and the next season of a championship", () => {
    expect(
      expectRoundTrip(
        seasonRecord({
          type: EventType.PostseasonEliminated,
          category: outcomes,
          description: "The Crew have been eliminated from the Season 14 Postseason.",
          teamTags: [HOME_TEAM],
        }),
      ),
    ).toMatchObject({ displayedSeason: 14 });
    expect(
      expectRoundTrip(
        seasonRecord({
          type: EventType.TeamWonInternetSeries,
          category: outcomes,
          description: "The Crew won the Season 14 Internet Series!",
          teamTags: [HOME_TEAM],
          metadata: { championships: 2 },
        }),
      ),
    ).toMatchObject({ teamName: "Crew", championships: 2 });
  });

  it("rejects a championship credited to the wrong season", () => {
    const record = seasonRecord({
      type: EventType.TeamWonInternetSeries,
      category: outcomes,
      description: "The Crew won the Season 13 Internet Series!",
      teamTags: [HOME_TEAM],
      metadata: { championships: 2 },
    });
    expect(failureKind(record)).toBe("DescriptionMismatch");
  });
});

describe("roster arrivals", () => {
  const newcomer = uuid(0x811);

  it("round-trips a postseason birth and a localized player", () => {
    const birth = expectRoundTrip(
      seasonRecord({
        type: EventType.PlayerAddedToTeam,
        description: "The Crew earn a Postseason Birth!",
        playerTags: [newcomer],
        teamTags: [HOME_TEAM],
        metadata: { location: 0, playerId: newcomer, playerName: "Baby Doe", teamId: HOME_TEAM, teamName: "Crew" },
      }),
    );
    expect(birth).toMatchObject({ kind: "PostseasonBirth", playerName: "Baby Doe", location: 0 });

    const localized = expectRoundTrip(
      seasonRecord({
        type: EventType.PlayerAddedToTeam,
        description: "Nova Hendricks Localized into the Crew's rotation.",
        playerTags: [newcomer],
        teamTags: [HOME_TEAM],
        metadata: { location: 1, playerId: newcomer, playerName: "Nova Hendricks", teamId: HOME_TEAM, teamName: "Crew" },
      }),
    );
    expect(localized).toMatchObject({ kind: "PlayerLocalized", location: "rotation" });
  });

  it("rejects a localized player whose location code disagrees with the text", () => {
    const record = seasonRecord({
      type: EventType.PlayerAddedToTeam,
      description: "Nova Hendricks Localized into the Crew's rotation.",
      playerTags: [newcomer],
      teamTags: [HOME_TEAM],
      metadata: { location: 0, playerId: newcomer, playerName: "Nova Hendricks", teamId: HOME_TEAM, teamName: "Crew" },
    });
    expect(failureKind(record)).toBe("UnexpectedMetadataValue");
  });

  it("round-trips a player promoted from the shadows", () => {
    const data = expectRoundTrip(
      seasonRecord({
        type: EventType.PlayerReplacesReturned,
        description: "The Crew cut a player and promoted another from the shadows.",
        playerTags: [player, newcomer],
        teamTags: [HOME_TEAM],
        metadata: {
          promoteLocation: RosterLocation.Bench,
          promotePlayerId: newcomer,
          promotePlayerName: "Shade Walker",
          removeLocation: RosterLocation.Lineup,
          removePlayerId: player,
          removePlayerName: "Nova Hendricks",
          teamId: HOME_TEAM,
          teamName: "Crew",
        },
      }),
    );
    expect(data).toMatchObject({ promotedPlayerName: "Shade Walker", removedPlayerName: "Nova Hendricks", removedLocation: 0 });
  });

  it("round-trips hatching, joining the league and arriving through the Rift", () => {
    const withId = { playerTags: [newcomer], metadata: { id: newcomer } };
    expect(
      expectRoundTrip(
        seasonRecord({ type: EventType.PlayerHatched, description: "Baby Doe has been hatched from the field of eggs.", ...withId }),
      ),
    ).toMatchObject({ kind: "PlayerHatched", playerName: "Baby Doe" });
    expect(
      expectRoundTrip(seasonRecord({ type: EventType.PlayerDivisionMove, description: "Baby Doe has joined the ILB.", ...withId })),
    ).toMatchObject({ kind: "PlayerJoinedILB" });
    expect(
      expectRoundTrip(
        seasonRecord({ type: EventType.PlayerDivisionMove, description: "Baby Doe was pulled through the Rift.", ...withId }),
      ),
    ).toMatchObject({ kind: "PlayerPulledThroughRift", playerId: newcomer });
  });

  it("round-trips a team joining the league", () => {
    const data = expectRoundTrip(
      seasonRecord({
        type: EventType.TeamDivisionMove,
        description: "The Crew have joined the ILB!\nThey will play in the Wild High division.",
        teamTags: [HOME_TEAM],
        metadata: { divisionId: uuid(0xd1), divisionName: "Wild High", teamId: HOME_TEAM, teamName: "Crew" },
      }),
    );
    expect(data).toMatchObject({ kind: "TeamJoinedILB", divisionName: "Wild High" });
  });

  it("round-trips a player permitted to stay, called back to the Hall and a sorted lineup", () => {
    expect(
      expectRoundTrip(
        seasonRecord({
          type: EventType.PlayerPermittedToStay,
          category: EventCategory.Special,
          description: "Nova Hendricks has been permitted to stay.",
          playerTags: [player],
        }),
      ),
    ).toMatchObject({ playerId: player });
    expect(
      expectRoundTrip(
        seasonRecord({ type: EventType.EnterHallOfFlame, description: "Nova Hendricks entered the Hall of Flame.", playerTags: [player] }),
      ),
    ).toMatchObject({ kind: "PlayerCalledBackToHall" });
    expect(
      expectRoundTrip(
        seasonRecord({ type: EventType.LineupSorted, description: "The Crew's lineup has been optimized.", teamTags: [HOME_TEAM] }),
      ),
    ).toMatchObject({ teamName: "Crew" });
  });
});

describe("renovations, decrees and gifts", () => {
  it("tells the first flag planted from later ones", () => {
    const first = expectRoundTrip(
      seasonRecord({
        type: EventType.FlagPlanted,
        description: "The Crew break ground on The Big Garage, selecting to build the Roof prefab!\nTHE FLAG IS PLANTED",
        teamTags: [HOME_TEAM],
        metadata: { renoId: "roof", title: "Ground Broken", votes: 120 },
      }),
    );
    expect(first).toMatchObject({ ballparkName: "The Big Garage", prefabName: "Roof", isFirst: true, votes: 120 });

    const later = seasonRecord({
      type: EventType.FlagPlanted,
      description: "The Crew break ground on The Big Garage, selecting to build the Roof prefab.\nTHE FLAG IS PLANTED",
      teamTags: [HOME_TEAM],
      metadata: { renoId: "roof", title: "Ground Broken", votes: 120 },
    });
    expect(failureKind(later)).toBe("DescriptionMismatch");
  });

  it("keeps a renovation's text and string votes", () => {
    const data = expectRoundTrip(
      seasonRecord({
        type: EventType.RenovationBuilt,
        description: "The Crew built a Sweet Bunker!",
        teamTags: [HOME_TEAM],
        metadata: { renoId: "bunker", title: "Sweet Bunker", votes: "1,204" },
      }),
    );
    expect(data).toMatchObject({ renovationTitle: "Sweet Bunker", votes: "1,204" });
  });

  it("carries decree, will and blessing metadata through untouched", () => {
    const decree = expectRoundTrip(
      seasonRecord({
        type: EventType.DecreePassed,
        category: outcomes,
        description: "Decree Passed: Forecasting",
        metadata: { decreeId: "forecasting", votes: 3001 },
      }),
    );
    expect(decree).toEqual({ kind: "DecreePassed", decreeTitle: "Forecasting", metadata: { decreeId: "forecasting", votes: 3001 } });

    const will = expectRoundTrip(
      seasonRecord({
        type: EventType.WillRecieved,
        category: outcomes,
        description: "Will Received: Foreshadow",
        teamTags: [HOME_TEAM],
        metadata: { willId: "foreshadow" },
      }),
    );
    expect(will).toMatchObject({ kind: "WillReceived", willTitle: "Foreshadow", teamId: HOME_TEAM });

    const blessing = expectRoundTrip(
      seasonRecord({
        type: EventType.BlessingOrGiftWon,
        category: outcomes,
        description: "Blessing Won: Extra Strike",
        teamTags: [AWAY_TEAM, HOME_TEAM],
        metadata: { blessingId: "extra-strike" },
      }),
    );
    expect(blessing).toMatchObject({ kind: "BlessingWon", blessingTitle: "Extra Strike", teamTags: [AWAY_TEAM, HOME_TEAM] });

    const gift = expectRoundTrip(
      seasonRecord({
        type: EventType.BlessingOrGiftWon,
        category: outcomes,
        description: "Gift Received: Free Refills for the Crew",
        teamTags: [HOME_TEAM],
      }),
    );
    expect(gift).toMatchObject({ kind: "GiftReceived", titleAndRecipient: "Free Refills for the Crew" });
  });

  it("round-trips a team's gift totals", () => {
    const data = expectRoundTrip(
      seasonRecord({
        type: EventType.TeamReceivedGifts,
        category: outcomes,
        description: "",
        teamTags: [HOME_TEAM],
        metadata: {
          recipient: HOME_TEAM,
          top3BenefactorCoins: [500, 250.5, 100],
          top3Benefactors: [AWAY_TEAM, uuid(0xb3), uuid(0xb4)],
          totalBenefactorCoins: 900,
          totalGifts: 3,
        },
      }),
    );
    expect(data).toMatchObject({ recipient: HOME_TEAM, totalGifts: 3, top3BenefactorCoins: [500, 250.5, 100] });
  });

  it("keeps a tarot reading's tags and metadata", () => {
    const data = expectRoundTrip(
      seasonRecord({
        type: EventType.TarotReading,
        description: "The Tower\nYour team will face change.",
        teamTags: [HOME_TEAM],
        metadata: { card: 16 },
      }),
    );
    expect(data).toEqual({
      kind: "TarotReading",
      description: "The Tower\nYour team will face change.",
      playerTags: [],
      teamTags: [HOME_TEAM],
      metadata: { card: 16 },
    });
  });
});
