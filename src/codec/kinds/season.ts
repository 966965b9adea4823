import { z } from "zod";
import {
  BEING_VALUES,
  EventCategory,
  EventType,
  ModDuration,
  ROSTER_LOCATION_VALUES,
  RosterLocation,
} from "../../contract/eventTypes.js";
import type { JsonObject } from "../../contract/types.js";
import type { ActivePosition, ModDesc } from "../../model/descriptors.js";
import type {
  BeingSpeechData,
  BlackHoleSwallowedWinData,
  BlessingWonData,
  BottomDwellersData,
  CommunityChestOpensData,
  DecreePassedData,
  EarnedPostseasonSlotData,
  EmergencyAlertData,
  FinalStandingsData,
  FlagPlantedData,
  GiftReceivedData,
  InvestigationMessageData,
  LineupSortedData,
  ModsFromAnotherModRemovedData,
  PlayerBoostedData,
  PlayerCalledBackToHallData,
  PlayerDropsItemData,
  PlayerHatchedData,
  PlayerJoinedIlbData,
  PlayerLocalizedData,
  PlayerLostModData,
  PlayerModExpiresData,
  PlayerNamedMvpData,
  PlayerPermittedToStayData,
  PlayerPulledThroughRiftData,
  PostseasonAdvanceData,
  PostseasonBirthData,
  PostseasonEliminatedData,
  PrizeMatchWinner,
  RedactedData,
  RenovationBuiltData,
  ReplaceReturnedPlayerFromShadowsData,
  ReplicaFadedToDustData,
  ReturnFromInvestigationData,
  RoamData,
  Sun2SetWinData,
  TarotReadingData,
  TeamDidShameData,
  TeamEnteredPartyTimeData,
  TeamGainedFreeWillData,
  TeamJoinedIlbData,
  TeamLeftPartyTimeData,
  TeamModExpiresData,
  TeamReceivedGiftsData,
  TeamUsedFreeWillData,
  TeamWasShamedData,
  TeamWonInternetSeriesData,
  TidingsData,
  WillReceivedData,
  WonPrizeMatchData,
} from "../../model/occurrence.js";
import type { RecordBuilder } from "../builder.js";
import {
  alt,
  lineEndingWith,
  map,
  oneOf,
  pair,
  possessive,
  possessiveOf,
  preceded,
  restOfText,
  tag,
  takeUntil,
  terminated,
  value,
  wholeNumber,
  type Parser,
} from "../combinators.js";
import type { ParseCursor } from "../cursor.js";
import {
  Int,
  Num,
  Str,
  StrList,
  readItemRatings,
  readLooseItemRatings,
  sameName,
  writeItemRatings,
  writeLooseItemRatings,
} from "../fragments.js";

// Season-level records: no game, no play counter, and Changes unless noted.

/** `The {team}{suffix}` filling the whole line. */
function theTeam(suffix: string): Parser<string> {
  return preceded("The ", lineEndingWith(suffix));
}

const ModDurationSchema = z.union([
  z.literal(ModDuration.Permanent),
  z.literal(ModDuration.Seasonal),
  z.literal(ModDuration.Weekly),
  z.literal(ModDuration.Game),
]);

const VotesSchema = z.union([Int, Str]);

// ---------------------------------------------------------------------------
// Narration and league announcements
// ---------------------------------------------------------------------------

export function parseBeingSpeech(c: ParseCursor): BeingSpeechData {
  c.expectCategory(EventCategory.Narrative);
  const being = c.metadataEnum("being", Int, BEING_VALUES);
  return { kind: "BeingSpeech", being, message: c.wholeDescription() };
}

export function buildBeingSpeech(b: RecordBuilder, d: BeingSpeechData): EventType {
  b.setCategory(EventCategory.Narrative);
  b.pushDescription(d.message);
  b.setMetadata("being", d.being);
  return EventType.BigDeal;
}

export function parseEmergencyAlert(c: ParseCursor): EmergencyAlertData {
  c.expectCategory(EventCategory.Outcomes);
  return { kind: "EmergencyAlert", message: c.wholeDescription(), teamTags: c.remainingTags("team") };
}

export function buildEmergencyAlert(b: RecordBuilder, d: EmergencyAlertData): EventType {
  b.setCategory(EventCategory.Outcomes);
  b.pushDescription(d.message);
  d.teamTags.forEach((teamId) => b.pushTeamTag(teamId));
  return EventType.EmergencyAlert;
}

export function parseInvestigationMessage(c: ParseCursor): InvestigationMessageData {
  c.expectCategory(EventCategory.Special);
  return { kind: "InvestigationMessage", playerId: c.nextPlayerId(), message: c.wholeDescription() };
}

export function buildInvestigationMessage(b: RecordBuilder, d: InvestigationMessageData): EventType {
  b.setCategory(EventCategory.Special);
  b.pushDescription(d.message);
  b.pushPlayerTag(d.playerId);
  return EventType.InvestigationMessage;
}

export function parseTidings(c: ParseCursor): TidingsData {
  c.expectCategory(EventCategory.Outcomes);
  return {
    kind: "Tidings",
    message: c.wholeDescription(),
    playerTags: c.remainingTags("player"),
    metadata: c.remainingMetadata(),
  };
}

export function buildTidings(b: RecordBuilder, d: TidingsData): EventType {
  b.setCategory(EventCategory.Outcomes);
  b.pushDescription(d.message);
  d.playerTags.forEach((playerId) => b.pushPlayerTag(playerId));
  setAll(b, d.metadata);
  return EventType.Tidings;
}

export function parseTarotReading(c: ParseCursor): TarotReadingData {
  c.expectCategory(EventCategory.Changes);
  return {
    kind: "TarotReading",
    description: c.wholeDescription(),
    playerTags: c.remainingTags("player"),
    teamTags: c.remainingTags("team"),
    metadata: c.remainingMetadata(),
  };
}

export function buildTarotReading(b: RecordBuilder, d: TarotReadingData): EventType {
  b.setCategory(EventCategory.Changes);
  b.pushDescription(d.description);
  d.playerTags.forEach((playerId) => b.pushPlayerTag(playerId));
  d.teamTags.forEach((teamId) => b.pushTeamTag(teamId));
  setAll(b, d.metadata);
  return EventType.TarotReading;
}

function setAll(b: RecordBuilder, metadata: JsonObject): void {
  for (const [key, entry] of Object.entries(metadata)) {
    b.setMetadata(key, entry);
  }
}

// ---------------------------------------------------------------------------
// Wins, shames and standings
// ---------------------------------------------------------------------------

export function parseSun2SetWin(c: ParseCursor): Sun2SetWinData {
  c.expectCategory(EventCategory.Outcomes);
  const teamName = c.line(preceded("Sun 2 set a Win upon the ", lineEndingWith(".")));
  return { kind: "Sun2SetWin", teamId: c.nextTeamId(), teamName };
}

export function buildSun2SetWin(b: RecordBuilder, d: Sun2SetWinData): EventType {
  b.setCategory(EventCategory.Outcomes);
  b.pushDescription(`Sun 2 set a Win upon the ${d.teamName}.`);
  b.pushTeamTag(d.teamId);
  return EventType.Sun2SetWin;
}

export function parseBlackHoleSwallowedWin(c: ParseCursor): BlackHoleSwallowedWinData {
  c.expectCategory(EventCategory.Outcomes);
  const teamName = c.line(preceded("The Black Hole swallowed a Win from the ", lineEndingWith("!")));
  return { kind: "BlackHoleSwallowedWin", teamId: c.nextTeamId(), teamName };
}

export function buildBlackHoleSwallowedWin(b: RecordBuilder, d: BlackHoleSwallowedWinData): EventType {
  b.setCategory(EventCategory.Outcomes);
  b.pushDescription(`The Black Hole swallowed a Win from the ${d.teamName}!`);
  b.pushTeamTag(d.teamId);
  return EventType.BlackHoleSwallowedWin;
}

function readShameTotals(c: ParseCursor): { totalShames: number; totalShamings: number } {
  return { totalShames: c.metadata("totalShames", Int), totalShamings: c.metadata("totalShamings", Int) };
}

function writeShameTotals(b: RecordBuilder, d: { totalShames: number; totalShamings: number }): void {
  b.setMetadata("totalShames", d.totalShames);
  b.setMetadata("totalShamings", d.totalShamings);
}

export function parseTeamDidShame(c: ParseCursor): TeamDidShameData {
  c.expectCategory(EventCategory.Outcomes);
  const [shamingTeamName, shamedTeamName] = c.line(
    pair(preceded("The ", takeUntil(" shamed the ")), lineEndingWith(".")),
  );
  return {
    kind: "TeamDidShame",
    shamingTeamId: c.nextTeamId(),
    shamingTeamName,
    shamedTeamName,
    ...readShameTotals(c),
  };
}

export function buildTeamDidShame(b: RecordBuilder, d: TeamDidShameData): EventType {
  b.setCategory(EventCategory.Outcomes);
  b.pushDescription(`The ${d.shamingTeamName} shamed the ${d.shamedTeamName}.`);
  b.pushTeamTag(d.shamingTeamId);
  writeShameTotals(b, d);
  return EventType.TeamDidShame;
}

export function parseTeamWasShamed(c: ParseCursor): TeamWasShamedData {
  c.expectCategory(EventCategory.Outcomes);
  const [shamedTeamName, shamingTeamName] = c.line(
    pair(preceded("The ", takeUntil(" were shamed by the ")), lineEndingWith(".")),
  );
  return {
    kind: "TeamWasShamed",
    shamedTeamId: c.nextTeamId(),
    shamingTeamName,
    shamedTeamName,
    ...readShameTotals(c),
  };
}

export function buildTeamWasShamed(b: RecordBuilder, d: TeamWasShamedData): EventType {
  b.setCategory(EventCategory.Outcomes);
  b.pushDescription(`The ${d.shamedTeamName} were shamed by the ${d.shamingTeamName}.`);
  b.pushTeamTag(d.shamedTeamId);
  writeShameTotals(b, d);
  return EventType.TeamWasShamed;
}

function placeText(place: number): string {
  switch (place) {
    case 0:
      return "1st";
    case 1:
      return "2nd";
    case 2:
      return "3rd";
    default:
      return `${place + 1}th`;
  }
}

export function parseFinalStandings(c: ParseCursor): FinalStandingsData {
  c.expectCategory(EventCategory.Outcomes);
  const [[teamName, written], divisionName] = c.line(
    pair(
      pair(preceded("The ", takeUntil(" finished ")), takeUntil(" in the ")),
      lineEndingWith("."),
    ),
  );
  const place = c.metadata("place", Int);
  sameName(c, placeText(place), written);
  return { kind: "FinalStandings", teamId: c.nextTeamId(), teamName, place, divisionName };
}

export function buildFinalStandings(b: RecordBuilder, d: FinalStandingsData): EventType {
  b.setCategory(EventCategory.Outcomes);
  b.pushDescription(`The ${d.teamName} finished ${placeText(d.place)} in the ${d.divisionName}.`);
  b.pushTeamTag(d.teamId);
  b.setMetadata("place", d.place);
  return EventType.FinalStandings;
}

// ---------------------------------------------------------------------------
// Postseason
// ---------------------------------------------------------------------------

export function parseEarnedPostseasonSlot(c: ParseCursor): EarnedPostseasonSlotData {
  c.expectCategory(EventCategory.Outcomes);
  const teamName = c.line(theTeam(` earned a spot in the Season ${c.season + 1} Postseason.`));
  return { kind: "EarnedPostseasonSlot", teamId: c.nextTeamId(), teamName };
}

export function buildEarnedPostseasonSlot(b: RecordBuilder, d: EarnedPostseasonSlotData): EventType {
  b.setCategory(EventCategory.Outcomes);
  b.pushDescription(`The ${d.teamName} earned a spot in the Season ${b.season + 1} Postseason.`);
  b.pushTeamTag(d.teamId);
  return EventType.EarnedPostseasonSlot;
}

const postseasonRound: Parser<number | null> = alt<number | null>(
  preceded("Round ", wholeNumber),
  value("The Internet Series", null),
);

export function parsePostseasonAdvance(c: ParseCursor): PostseasonAdvanceData {
  c.expectCategory(EventCategory.Outcomes);
  const [[teamName, round], displayedSeason] = c.line(
    pair(
      pair(preceded("The ", takeUntil(" advanced to ")), postseasonRound),
      preceded(" of the Season ", terminated(wholeNumber, " Postseason.")),
    ),
  );
  return { kind: "PostseasonAdvance", teamId: c.nextTeamId(), teamName, round, displayedSeason };
}

export function buildPostseasonAdvance(b: RecordBuilder, d: PostseasonAdvanceData): EventType {
  const round = d.round === null ? "The Internet Series" : `Round ${d.round}`;
  b.setCategory(EventCategory.Outcomes);
  b.pushDescription(
    `The ${d.teamName} advanced to ${round} of the Season ${d.displayedSeason} Postseason.`,
  );
  b.pushTeamTag(d.teamId);
  return EventType.PostseasonAdvance;
}

export function parsePostseasonEliminated(c: ParseCursor): PostseasonEliminatedData {
  c.expectCategory(EventCategory.Outcomes);
  const [teamName, displayedSeason] = c.line(
    pair(
      preceded("The ", takeUntil(" have been eliminated from the Season ")),
      terminated(wholeNumber, " Postseason."),
    ),
  );
  return { kind: "PostseasonEliminated", teamId: c.nextTeamId(), teamName, displayedSeason };
}

export function buildPostseasonEliminated(b: RecordBuilder, d: PostseasonEliminatedData): EventType {
  b.setCategory(EventCategory.Outcomes);
  b.pushDescription(
    `The ${d.teamName} have been eliminated from the Season ${d.displayedSeason} Postseason.`,
  );
  b.pushTeamTag(d.teamId);
  return EventType.PostseasonEliminated;
}

export function parseTeamWonInternetSeries(c: ParseCursor): TeamWonInternetSeriesData {
  c.expectCategory(EventCategory.Outcomes);
  const teamName = c.line(theTeam(` won the Season ${c.season + 1} Internet Series!`));
  return {
    kind: "TeamWonInternetSeries",
    teamId: c.nextTeamId(),
    teamName,
    championships: c.metadata("championships", Int),
  };
}

export function buildTeamWonInternetSeries(b: RecordBuilder, d: TeamWonInternetSeriesData): EventType {
  b.setCategory(EventCategory.Outcomes);
  b.pushDescription(`The ${d.teamName} won the Season ${b.season + 1} Internet Series!`);
  b.pushTeamTag(d.teamId);
  b.setMetadata("championships", d.championships);
  return EventType.TeamWonInternetSeries;
}

// ---------------------------------------------------------------------------
// Roster changes
// ---------------------------------------------------------------------------

const POSTSEASON_BIRTH = " earn a Postseason Birth!";

export function parsePostseasonBirth(c: ParseCursor): PostseasonBirthData {
  const teamName = c.line(theTeam(POSTSEASON_BIRTH));
  const playerId = c.nextPlayerId();
  const teamId = c.nextTeamId();
  const location = c.metadata("location", Int);
  c.expectMetadata("playerId", playerId);
  const playerName = c.metadata("playerName", Str);
  c.expectMetadata("teamId", teamId);
  c.expectMetadata("teamName", teamName);
  return { kind: "PostseasonBirth", teamId, teamName, playerId, playerName, location };
}

export function buildPostseasonBirth(b: RecordBuilder, d: PostseasonBirthData): EventType {
  b.pushDescription(`The ${d.teamName}${POSTSEASON_BIRTH}`);
  b.pushPlayerTag(d.playerId);
  b.pushTeamTag(d.teamId);
  b.setMetadata("location", d.location);
  b.setMetadata("playerId", d.playerId);
  b.setMetadata("playerName", d.playerName);
  b.setMetadata("teamId", d.teamId);
  b.setMetadata("teamName", d.teamName);
  return EventType.PlayerAddedToTeam;
}

const LOCALIZED_INTO = " Localized into the ";

const POSITION_CODES: Record<ActivePosition, number> = { lineup: 0, rotation: 1 };

const localizedPosition: Parser<ActivePosition> = oneOf<ActivePosition>([
  ["lineup.", "lineup"],
  ["rotation.", "rotation"],
]);

export function parsePlayerLocalized(c: ParseCursor): PlayerLocalizedData {
  const [[playerName, teamName], location] = c.line(
    pair(pair(takeUntil(LOCALIZED_INTO), possessive), localizedPosition),
  );
  const playerId = c.nextPlayerId();
  const teamId = c.nextTeamId();
  c.expectMetadata("location", POSITION_CODES[location]);
  c.expectMetadata("playerId", playerId);
  c.expectMetadata("playerName", playerName);
  c.expectMetadata("teamId", teamId);
  c.expectMetadata("teamName", teamName);
  return { kind: "PlayerLocalized", teamId, teamName, playerId, playerName, location };
}

export function buildPlayerLocalized(b: RecordBuilder, d: PlayerLocalizedData): EventType {
  b.pushDescription(`${d.playerName}${LOCALIZED_INTO}${possessiveOf(d.teamName)} ${d.location}.`);
  b.pushPlayerTag(d.playerId);
  b.pushTeamTag(d.teamId);
  b.setMetadata("location", POSITION_CODES[d.location]);
  b.setMetadata("playerId", d.playerId);
  b.setMetadata("playerName", d.playerName);
  b.setMetadata("teamId", d.teamId);
  b.setMetadata("teamName", d.teamName);
  return EventType.PlayerAddedToTeam;
}

/** Both forms of PlayerAddedToTeam that carry no game. */
export function parsePlayerAddedToTeam(c: ParseCursor): PostseasonBirthData | PlayerLocalizedData {
  return c.record.description.endsWith(POSTSEASON_BIRTH) ? parsePostseasonBirth(c) : parsePlayerLocalized(c);
}

export function parseReplaceReturnedPlayerFromShadows(
  c: ParseCursor,
): ReplaceReturnedPlayerFromShadowsData {
  const teamName = c.line(theTeam(" cut a player and promoted another from the shadows."));
  const removedPlayerId = c.nextPlayerId();
  const promotedPlayerId = c.nextPlayerId();
  const teamId = c.nextTeamId();
  const promotedLocation = c.metadata("promoteLocation", Int);
  c.expectMetadata("promotePlayerId", promotedPlayerId);
  const promotedPlayerName = c.metadata("promotePlayerName", Str);
  const removedLocation = c.metadata("removeLocation", Int);
  c.expectMetadata("removePlayerId", removedPlayerId);
  const removedPlayerName = c.metadata("removePlayerName", Str);
  c.expectMetadata("teamId", teamId);
  c.expectMetadata("teamName", teamName);
  return {
    kind: "ReplaceReturnedPlayerFromShadows",
    teamId,
    teamName,
    promotedPlayerId,
    promotedPlayerName,
    promotedLocation,
    removedPlayerId,
    removedPlayerName,
    removedLocation,
  };
}

export function buildReplaceReturnedPlayerFromShadows(
  b: RecordBuilder,
  d: ReplaceReturnedPlayerFromShadowsData,
): EventType {
  b.pushDescription(`The ${d.teamName} cut a player and promoted another from the shadows.`);
  b.pushPlayerTag(d.removedPlayerId);
  b.pushPlayerTag(d.promotedPlayerId);
  b.pushTeamTag(d.teamId);
  b.setMetadata("promoteLocation", d.promotedLocation);
  b.setMetadata("promotePlayerId", d.promotedPlayerId);
  b.setMetadata("promotePlayerName", d.promotedPlayerName);
  b.setMetadata("removeLocation", d.removedLocation);
  b.setMetadata("removePlayerId", d.removedPlayerId);
  b.setMetadata("removePlayerName", d.removedPlayerName);
  b.setMetadata("teamId", d.teamId);
  b.setMetadata("teamName", d.teamName);
  return EventType.PlayerReplacesReturned;
}

export function parsePlayerHatched(c: ParseCursor): PlayerHatchedData {
  const playerName = c.line(lineEndingWith(" has been hatched from the field of eggs."));
  const playerId = c.nextPlayerId();
  c.expectMetadata("id", playerId);
  return { kind: "PlayerHatched", playerId, playerName };
}

export function buildPlayerHatched(b: RecordBuilder, d: PlayerHatchedData): EventType {
  b.pushDescription(`${d.playerName} has been hatched from the field of eggs.`);
  b.pushPlayerTag(d.playerId);
  b.setMetadata("id", d.playerId);
  return EventType.PlayerHatched;
}

const JOINED_ILB = " has joined the ILB.";
const PULLED_THROUGH_RIFT = " was pulled through the Rift.";

/** Player records of type PlayerDivisionMove: joining the league or arriving through the Rift. */
export function parsePlayerDivisionMove(
  c: ParseCursor,
): PlayerJoinedIlbData | PlayerPulledThroughRiftData {
  const [playerName, kind] = c.line(
    alt<[string, "PlayerJoinedILB" | "PlayerPulledThroughRift"]>(
      map<string, [string, "PlayerJoinedILB"]>(lineEndingWith(JOINED_ILB), (name) => [name, "PlayerJoinedILB"]),
      map<string, [string, "PlayerPulledThroughRift"]>(lineEndingWith(PULLED_THROUGH_RIFT), (name) => [
        name,
        "PlayerPulledThroughRift",
      ]),
    ),
  );
  const playerId = c.nextPlayerId();
  c.expectMetadata("id", playerId);
  return { kind, playerId, playerName };
}

export function buildPlayerDivisionMove(
  b: RecordBuilder,
  d: PlayerJoinedIlbData | PlayerPulledThroughRiftData,
): EventType {
  const suffix = d.kind === "PlayerJoinedILB" ? JOINED_ILB : PULLED_THROUGH_RIFT;
  b.pushDescription(`${d.playerName}${suffix}`);
  b.pushPlayerTag(d.playerId);
  b.setMetadata("id", d.playerId);
  return EventType.PlayerDivisionMove;
}

export function parseTeamJoinedIlb(c: ParseCursor): TeamJoinedIlbData {
  const teamName = c.line(theTeam(" have joined the ILB!"));
  const divisionName = c.line(preceded("They will play in the ", lineEndingWith(" division.")));
  const teamId = c.nextTeamId();
  const divisionId = c.metadata("divisionId", Str);
  c.expectMetadata("divisionName", divisionName);
  c.expectMetadata("teamId", teamId);
  c.expectMetadata("teamName", teamName);
  return { kind: "TeamJoinedILB", teamId, teamName, divisionId, divisionName };
}

export function buildTeamJoinedIlb(b: RecordBuilder, d: TeamJoinedIlbData): EventType {
  b.pushDescription(`The ${d.teamName} have joined the ILB!`);
  b.pushDescription(`They will play in the ${d.divisionName} division.`);
  b.pushTeamTag(d.teamId);
  b.setMetadata("divisionId", d.divisionId);
  b.setMetadata("divisionName", d.divisionName);
  b.setMetadata("teamId", d.teamId);
  b.setMetadata("teamName", d.teamName);
  return EventType.TeamDivisionMove;
}

export function parsePlayerPermittedToStay(c: ParseCursor): PlayerPermittedToStayData {
  c.expectCategory(EventCategory.Special);
  const playerName = c.line(lineEndingWith(" has been permitted to stay."));
  return { kind: "PlayerPermittedToStay", playerId: c.nextPlayerId(), playerName };
}

export function buildPlayerPermittedToStay(b: RecordBuilder, d: PlayerPermittedToStayData): EventType {
  b.setCategory(EventCategory.Special);
  b.pushDescription(`${d.playerName} has been permitted to stay.`);
  b.pushPlayerTag(d.playerId);
  return EventType.PlayerPermittedToStay;
}

export function parsePlayerCalledBackToHall(c: ParseCursor): PlayerCalledBackToHallData {
  const playerName = c.line(lineEndingWith(" entered the Hall of Flame."));
  return { kind: "PlayerCalledBackToHall", playerId: c.nextPlayerId(), playerName };
}

export function buildPlayerCalledBackToHall(b: RecordBuilder, d: PlayerCalledBackToHallData): EventType {
  b.pushDescription(`${d.playerName} entered the Hall of Flame.`);
  b.pushPlayerTag(d.playerId);
  return EventType.EnterHallOfFlame;
}

export function parseLineupSorted(c: ParseCursor): LineupSortedData {
  const teamName = c.line(preceded("The ", terminated(possessive, "lineup has been optimized.")));
  return { kind: "LineupSorted", teamId: c.nextTeamId(), teamName };
}

export function buildLineupSorted(b: RecordBuilder, d: LineupSortedData): EventType {
  b.pushDescription(`The ${possessiveOf(d.teamName)} lineup has been optimized.`);
  b.pushTeamTag(d.teamId);
  return EventType.LineupSorted;
}

// ---------------------------------------------------------------------------
// Ratings
// ---------------------------------------------------------------------------

const PLAYER_BOOST_TYPE = 4;
const TEAM_BOOST_TYPE = 5;
const BOOSTED = " was boosted.";
const BOTTOM_DWELLERS = " are Bottom Dwellers.";

export function parsePlayerBoosted(c: ParseCursor): PlayerBoostedData {
  const playerName = c.line(lineEndingWith(BOOSTED));
  const teamId = c.nextTeamId();
  const playerId = c.nextPlayerId();
  const ratingBefore = c.metadata("before", Num);
  const ratingAfter = c.metadata("after", Num);
  c.expectMetadata("type", PLAYER_BOOST_TYPE);
  return { kind: "PlayerBoosted", teamId, playerId, playerName, ratingBefore, ratingAfter };
}

export function buildPlayerBoosted(b: RecordBuilder, d: PlayerBoostedData): EventType {
  b.pushDescription(`${d.playerName}${BOOSTED}`);
  b.pushTeamTag(d.teamId);
  b.pushPlayerTag(d.playerId);
  b.setMetadata("before", d.ratingBefore);
  b.setMetadata("after", d.ratingAfter);
  b.setMetadata("type", PLAYER_BOOST_TYPE);
  return EventType.PlayerStatIncrease;
}

export function parseBottomDwellers(c: ParseCursor): BottomDwellersData {
  const teamName = c.line(theTeam(BOTTOM_DWELLERS));
  const teamId = c.nextTeamId();
  const ratingBefore = c.metadata("before", Num);
  const ratingAfter = c.metadata("after", Num);
  c.expectMetadata("type", TEAM_BOOST_TYPE);
  return { kind: "BottomDwellers", teamId, teamName, ratingBefore, ratingAfter };
}

export function buildBottomDwellers(b: RecordBuilder, d: BottomDwellersData): EventType {
  b.pushDescription(`The ${d.teamName}${BOTTOM_DWELLERS}`);
  b.pushTeamTag(d.teamId);
  b.setMetadata("before", d.ratingBefore);
  b.setMetadata("after", d.ratingAfter);
  b.setMetadata("type", TEAM_BOOST_TYPE);
  return EventType.PlayerStatIncrease;
}

/** PlayerStatIncrease records outside of games. */
export function parseSeasonStatIncrease(c: ParseCursor): PlayerBoostedData | BottomDwellersData {
  return c.record.description.endsWith(BOTTOM_DWELLERS) ? parseBottomDwellers(c) : parsePlayerBoosted(c);
}

// ---------------------------------------------------------------------------
// Mods
// ---------------------------------------------------------------------------

const DURATION_WORDS: ReadonlyArray<readonly [string, ModDuration]> = [
  ["permanent", ModDuration.Permanent],
  ["seasonal", ModDuration.Seasonal],
  ["weekly", ModDuration.Weekly],
  ["game", ModDuration.Game],
];

function durationWord(duration: ModDuration): string {
  const entry = DURATION_WORDS.find(([, candidate]) => candidate === duration);
  return entry ? entry[0] : String(duration);
}

const modsWoreOff: Parser<ModDuration> = terminated(oneOf(DURATION_WORDS), " mods wore off.");

export function parsePlayerModExpires(c: ParseCursor): PlayerModExpiresData {
  const [playerName, duration] = c.line(pair(possessive, modsWoreOff));
  const teamId = c.nextTeamId();
  const playerId = c.nextPlayerId();
  const mods = c.metadata("mods", StrList);
  c.expectMetadata("type", duration);
  return { kind: "PlayerModExpires", teamId, playerId, playerName, mods, duration };
}

export function buildPlayerModExpires(b: RecordBuilder, d: PlayerModExpiresData): EventType {
  b.pushDescription(`${possessiveOf(d.playerName)} ${durationWord(d.duration)} mods wore off.`);
  b.pushTeamTag(d.teamId);
  b.pushPlayerTag(d.playerId);
  b.setMetadata("mods", d.mods);
  b.setMetadata("type", d.duration);
  return EventType.ModExpires;
}

export function parseTeamModExpires(c: ParseCursor): TeamModExpiresData {
  const [teamName, duration] = c.line(preceded("The ", pair(possessive, modsWoreOff)));
  const teamId = c.nextTeamId();
  const mods = c.metadata("mods", StrList);
  c.expectMetadata("type", duration);
  return { kind: "TeamModExpires", teamId, teamName, mods, duration };
}

export function buildTeamModExpires(b: RecordBuilder, d: TeamModExpiresData): EventType {
  b.pushDescription(`The ${possessiveOf(d.teamName)} ${durationWord(d.duration)} mods wore off.`);
  b.pushTeamTag(d.teamId);
  b.setMetadata("mods", d.mods);
  b.setMetadata("type", d.duration);
  return EventType.ModExpires;
}

/** ModExpires on a player carries a player tag; on a team it carries none. */
export function parseModExpires(c: ParseCursor): PlayerModExpiresData | TeamModExpiresData {
  return c.record.playerTags.length > 0 ? parsePlayerModExpires(c) : parseTeamModExpires(c);
}

const ModDescSchema = z.object({ mod: Str, type: ModDurationSchema }).strict();

export function parseModsFromAnotherModRemoved(c: ParseCursor): ModsFromAnotherModRemovedData {
  const [playerName, sourceModName] = c.line(
    pair(possessive, preceded("mods caused by ", lineEndingWith(" were removed."))),
  );
  const playerId = c.nextPlayerId();
  const teamId = c.nextTeamId();
  const sourceModId = c.metadata("source", Str);
  const removes: ModDesc[] = c
    .metadata("removes", z.array(ModDescSchema))
    .map((entry) => ({ modId: entry.mod, duration: entry.type }));
  return {
    kind: "ModsFromAnotherModRemoved",
    teamId,
    playerId,
    playerName,
    sourceModName,
    sourceModId,
    removes,
  };
}

export function buildModsFromAnotherModRemoved(
  b: RecordBuilder,
  d: ModsFromAnotherModRemovedData,
): EventType {
  b.pushDescription(`${possessiveOf(d.playerName)} mods caused by ${d.sourceModName} were removed.`);
  b.pushPlayerTag(d.playerId);
  b.pushTeamTag(d.teamId);
  b.setMetadata("source", d.sourceModId);
  b.setMetadata(
    "removes",
    d.removes.map((entry) => ({ mod: entry.modId, type: entry.duration })),
  );
  return EventType.RemovedModsFromAnotherMod;
}

type TeamModKind =
  | TeamEnteredPartyTimeData
  | TeamLeftPartyTimeData
  | TeamGainedFreeWillData
  | TeamUsedFreeWillData;

interface TeamModLayout {
  suffix: string;
  mod: string;
  duration: ModDuration;
  type: EventType;
}

const TEAM_MOD_LAYOUTS: Record<TeamModKind["kind"], TeamModLayout> = {
  TeamEnteredPartyTime: {
    suffix: " have entered Party Time!",
    mod: "PARTY_TIME",
    duration: ModDuration.Seasonal,
    type: EventType.AddedMod,
  },
  TeamLeftPartyTime: {
    suffix: " have been removed from Party Time to join the Postseason!",
    mod: "PARTY_TIME",
    duration: ModDuration.Seasonal,
    type: EventType.RemovedMod,
  },
  TeamGainedFreeWill: {
    suffix: " gain Free Will.",
    mod: "FREE_WILL",
    duration: ModDuration.Permanent,
    type: EventType.AddedMod,
  },
  TeamUsedFreeWill: {
    suffix: " used their Free Will.",
    mod: "FREE_WILL",
    duration: ModDuration.Permanent,
    type: EventType.RemovedMod,
  },
};

const TEAM_MOD_KINDS: readonly TeamModKind["kind"][] = [
  "TeamEnteredPartyTime",
  "TeamLeftPartyTime",
  "TeamGainedFreeWill",
  "TeamUsedFreeWill",
];

function teamModKindFor(type: number, description: string): TeamModKind["kind"] | null {
  const kind = TEAM_MOD_KINDS.find((candidate) => {
    const layout = TEAM_MOD_LAYOUTS[candidate];
    return layout.type === type && description.startsWith("The ") && description.endsWith(layout.suffix);
  });
  return kind ?? null;
}

function parseTeamMod(c: ParseCursor, kind: TeamModKind["kind"]): TeamModKind {
  const layout = TEAM_MOD_LAYOUTS[kind];
  const teamName = c.line(theTeam(layout.suffix));
  c.expectMetadata("mod", layout.mod);
  c.expectMetadata("type", layout.duration);
  return { kind, teamId: c.nextTeamId(), teamName };
}

export function buildTeamMod(b: RecordBuilder, d: TeamModKind): EventType {
  const layout = TEAM_MOD_LAYOUTS[d.kind];
  b.pushDescription(`The ${d.teamName}${layout.suffix}`);
  b.pushTeamTag(d.teamId);
  b.setMetadata("mod", layout.mod);
  b.setMetadata("type", layout.duration);
  return layout.type;
}

const NAMED_MVP = " is named an MVP.";

const multipleMvp: Parser<[[string, number], string]> = pair(
  pair(takeUntil(" is named a "), terminated(wholeNumber, "-Time MVP")),
  alt<string>(tag("."), tag("!")),
);

function mvpPunctuation(level: number): string {
  return level === 2 ? "." : "!";
}

export function parsePlayerNamedMvp(c: ParseCursor): PlayerNamedMvpData {
  const teamId = c.nextTeamId();
  const playerId = c.nextPlayerId();
  c.expectMetadata("type", ModDuration.Permanent);
  if (c.type === EventType.AddedMod) {
    const playerName = c.line(lineEndingWith(NAMED_MVP));
    c.expectMetadata("mod", "EGO1");
    return { kind: "PlayerNamedMvp", teamId, playerId, playerName, level: 1 };
  }
  const [[playerName, level], punctuation] = c.line(multipleMvp);
  if (level < 2) {
    c.fail({ kind: "DescriptionMismatch", expected: "an MVP level of at least 2", found: String(level) });
  }
  sameName(c, mvpPunctuation(level), punctuation);
  c.expectMetadata("from", `EGO${level - 1}`);
  c.expectMetadata("to", `EGO${level}`);
  return { kind: "PlayerNamedMvp", teamId, playerId, playerName, level };
}

export function buildPlayerNamedMvp(b: RecordBuilder, d: PlayerNamedMvpData): EventType {
  b.pushTeamTag(d.teamId);
  b.pushPlayerTag(d.playerId);
  b.setMetadata("type", ModDuration.Permanent);
  if (d.level === 1) {
    b.pushDescription(`${d.playerName}${NAMED_MVP}`);
    b.setMetadata("mod", "EGO1");
    return EventType.AddedMod;
  }
  b.pushDescription(`${d.playerName} is named a ${d.level}-Time MVP${mvpPunctuation(d.level)}`);
  b.setMetadata("from", `EGO${d.level - 1}`);
  b.setMetadata("to", `EGO${d.level}`);
  return EventType.ModChange;
}

export function parsePlayerLostMod(c: ParseCursor): PlayerLostModData {
  const [playerName, modName] = c.line(pair(takeUntil(" lost the "), lineEndingWith(" mod.")));
  const teamId = c.nextTeamId();
  const playerId = c.nextPlayerId();
  const mod = c.metadata("mod", Str);
  c.expectMetadata("type", ModDuration.Permanent);
  return { kind: "PlayerLostMod", teamId, playerId, playerName, mod, modName };
}

export function buildPlayerLostMod(b: RecordBuilder, d: PlayerLostModData): EventType {
  b.pushDescription(`${d.playerName} lost the ${d.modName} mod.`);
  b.pushTeamTag(d.teamId);
  b.pushPlayerTag(d.playerId);
  b.setMetadata("mod", d.mod);
  b.setMetadata("type", ModDuration.Permanent);
  return EventType.RemovedMod;
}

/** AddedMod records outside of games. */
export function parseSeasonAddedMod(c: ParseCursor): TeamModKind | PlayerNamedMvpData {
  const kind = teamModKindFor(c.type, c.record.description);
  return kind === null ? parsePlayerNamedMvp(c) : parseTeamMod(c, kind);
}

/** RemovedMod records outside of games. */
export function parseSeasonRemovedMod(c: ParseCursor): TeamModKind | PlayerLostModData {
  const kind = teamModKindFor(c.type, c.record.description);
  return kind === null ? parsePlayerLostMod(c) : parseTeamMod(c, kind);
}

// ---------------------------------------------------------------------------
// Ballparks
// ---------------------------------------------------------------------------

const FIRST_FLAG = "THE FLAG IS PLANTED";
const ANOTHER_FLAG = "Another flag is planted!";

const groundBroken: Parser<[[string, string], [string, boolean]]> = pair(
  pair(
    preceded("The ", takeUntil(" break ground on ")),
    takeUntil(", selecting to build the "),
  ),
  alt<[string, boolean]>(
    map<string, [string, boolean]>(lineEndingWith(" prefab!"), (prefab) => [prefab, true]),
    map<string, [string, boolean]>(lineEndingWith(" prefab."), (prefab) => [prefab, false]),
  ),
);

export function parseFlagPlanted(c: ParseCursor): FlagPlantedData {
  const [[teamName, ballparkName], [prefabName, isFirst]] = c.line(groundBroken);
  c.expectLine(isFirst ? FIRST_FLAG : ANOTHER_FLAG);
  const teamId = c.nextTeamId();
  const renovationId = c.metadata("renoId", Str);
  c.expectMetadata("title", "Ground Broken");
  const votes = c.metadata("votes", Int);
  return { kind: "FlagPlanted", teamId, teamName, ballparkName, prefabName, renovationId, votes, isFirst };
}

export function buildFlagPlanted(b: RecordBuilder, d: FlagPlantedData): EventType {
  const ending = d.isFirst ? "!" : ".";
  b.pushDescription(
    `The ${d.teamName} break ground on ${d.ballparkName}, selecting to build the ${d.prefabName} prefab${ending}`,
  );
  b.pushDescription(d.isFirst ? FIRST_FLAG : ANOTHER_FLAG);
  b.pushTeamTag(d.teamId);
  b.setMetadata("renoId", d.renovationId);
  b.setMetadata("title", "Ground Broken");
  b.setMetadata("votes", d.votes);
  return EventType.FlagPlanted;
}

export function parseRenovationBuilt(c: ParseCursor): RenovationBuiltData {
  return {
    kind: "RenovationBuilt",
    teamId: c.nextTeamId(),
    description: c.wholeDescription(),
    renovationId: c.metadata("renoId", Str),
    renovationTitle: c.metadata("title", Str),
    votes: c.metadata("votes", VotesSchema),
  };
}

export function buildRenovationBuilt(b: RecordBuilder, d: RenovationBuiltData): EventType {
  b.pushDescription(d.description);
  b.pushTeamTag(d.teamId);
  b.setMetadata("renoId", d.renovationId);
  b.setMetadata("title", d.renovationTitle);
  b.setMetadata("votes", d.votes);
  return EventType.RenovationBuilt;
}

// ---------------------------------------------------------------------------
// Decrees, blessings and wills
// ---------------------------------------------------------------------------

export function parseDecreePassed(c: ParseCursor): DecreePassedData {
  c.expectCategory(EventCategory.Outcomes);
  const decreeTitle = c.parse(preceded("Decree Passed: ", restOfText));
  return { kind: "DecreePassed", decreeTitle, metadata: c.remainingMetadata() };
}

export function buildDecreePassed(b: RecordBuilder, d: DecreePassedData): EventType {
  b.setCategory(EventCategory.Outcomes);
  b.pushDescription(`Decree Passed: ${d.decreeTitle}`);
  setAll(b, d.metadata);
  return EventType.DecreePassed;
}

export function parseWillReceived(c: ParseCursor): WillReceivedData {
  c.expectCategory(EventCategory.Outcomes);
  const willTitle = c.parse(preceded("Will Received: ", restOfText));
  return { kind: "WillReceived", teamId: c.nextTeamId(), willTitle, metadata: c.remainingMetadata() };
}

export function buildWillReceived(b: RecordBuilder, d: WillReceivedData): EventType {
  b.setCategory(EventCategory.Outcomes);
  b.pushDescription(`Will Received: ${d.willTitle}`);
  b.pushTeamTag(d.teamId);
  setAll(b, d.metadata);
  return EventType.WillRecieved;
}

const BLESSING_WON = "Blessing Won: ";
const GIFT_RECEIVED = "Gift Received: ";

export function parseBlessingOrGift(c: ParseCursor): BlessingWonData | GiftReceivedData {
  c.expectCategory(EventCategory.Outcomes);
  const gift = c.tryParse(preceded(GIFT_RECEIVED, restOfText));
  if (gift !== null) {
    return {
      kind: "GiftReceived",
      teamId: c.nextTeamId(),
      titleAndRecipient: gift,
      metadata: c.remainingMetadata(),
    };
  }
  const blessingTitle = c.parse(preceded(BLESSING_WON, restOfText));
  return {
    kind: "BlessingWon",
    teamTags: c.remainingTags("team"),
    blessingTitle,
    metadata: c.remainingMetadata(),
  };
}

export function buildBlessingWon(b: RecordBuilder, d: BlessingWonData): EventType {
  b.setCategory(EventCategory.Outcomes);
  b.pushDescription(`${BLESSING_WON}${d.blessingTitle}`);
  d.teamTags.forEach((teamId) => b.pushTeamTag(teamId));
  setAll(b, d.metadata);
  return EventType.BlessingOrGiftWon;
}

export function buildGiftReceived(b: RecordBuilder, d: GiftReceivedData): EventType {
  b.setCategory(EventCategory.Outcomes);
  b.pushDescription(`${GIFT_RECEIVED}${d.titleAndRecipient}`);
  b.pushTeamTag(d.teamId);
  setAll(b, d.metadata);
  return EventType.BlessingOrGiftWon;
}

const GiftCountSchema = z.array(Num);

export function parseTeamReceivedGifts(c: ParseCursor): TeamReceivedGiftsData {
  c.expectCategory(EventCategory.Outcomes);
  const recipient = c.nextTeamId();
  c.expectMetadata("recipient", recipient);
  return {
    kind: "TeamReceivedGifts",
    recipient,
    top3BenefactorCoins: c.metadata("top3BenefactorCoins", GiftCountSchema),
    top3Benefactors: c.metadata("top3Benefactors", StrList),
    totalBenefactorCoins: c.metadata("totalBenefactorCoins", Int),
    totalGifts: c.metadata("totalGifts", Int),
  };
}

export function buildTeamReceivedGifts(b: RecordBuilder, d: TeamReceivedGiftsData): EventType {
  b.setCategory(EventCategory.Outcomes);
  b.pushTeamTag(d.recipient);
  b.setMetadata("recipient", d.recipient);
  b.setMetadata("top3BenefactorCoins", d.top3BenefactorCoins);
  b.setMetadata("top3Benefactors", d.top3Benefactors);
  b.setMetadata("totalBenefactorCoins", d.totalBenefactorCoins);
  b.setMetadata("totalGifts", d.totalGifts);
  return EventType.TeamReceivedGifts;
}

// ---------------------------------------------------------------------------
// Items
// ---------------------------------------------------------------------------

const CHEST_OPENS = "The Community Chest Opens! ";

/** Out-of-game chest drops moved from Special to Changes partway through season 18. */
function chestCategory(season: number, day: number): EventCategory {
  return season < 17 || (season === 17 && day < 58) ? EventCategory.Special : EventCategory.Changes;
}

export function parseCommunityChestOpens(c: ParseCursor): CommunityChestOpensData {
  c.expectCategory(chestCategory(c.season, c.day));
  const [playerName, itemName] = c.line(
    pair(preceded(CHEST_OPENS, takeUntil(" gained ")), lineEndingWith(".")),
  );
  const teamId = c.nextTeamId();
  const playerId = c.nextPlayerId();
  return {
    kind: "CommunityChestOpens",
    teamId,
    playerId,
    playerName,
    ...readLooseItemRatings(c, itemName),
  };
}

export function buildCommunityChestOpens(b: RecordBuilder, d: CommunityChestOpensData): EventType {
  b.setCategory(chestCategory(b.season, b.day));
  b.pushDescription(`${CHEST_OPENS}${d.playerName} gained ${d.itemName}.`);
  b.pushTeamTag(d.teamId);
  b.pushPlayerTag(d.playerId);
  writeLooseItemRatings(b, d);
  return EventType.PlayerGainedItem;
}

export function parsePlayerDropsItem(c: ParseCursor): PlayerDropsItemData {
  const [playerName, itemName] = c.line(pair(takeUntil(" dropped "), lineEndingWith(".")));
  const teamId = c.nextTeamId();
  const playerId = c.nextPlayerId();
  return { kind: "PlayerDropsItem", teamId, playerId, playerName, ...readItemRatings(c, itemName) };
}

export function buildPlayerDropsItem(b: RecordBuilder, d: PlayerDropsItemData): EventType {
  b.pushDescription(`${d.playerName} dropped ${d.itemName}.`);
  b.pushTeamTag(d.teamId);
  b.pushPlayerTag(d.playerId);
  writeItemRatings(b, d);
  return EventType.PlayerLostItem;
}

const PRIZE_MATCH_WON = " won the Prize Match!";
const GAINED_PRIZED = " gained the Prized ";

interface PrizeLine {
  winner: PrizeMatchWinner;
  itemName: string | null;
}

const prizeLine: Parser<PrizeLine> = alt<PrizeLine>(
  map<string, PrizeLine>(theTeam(PRIZE_MATCH_WON), (teamName) => ({
    winner: { by: "team", teamName },
    itemName: null,
  })),
  map<[string, string], PrizeLine>(pair(takeUntil(GAINED_PRIZED), lineEndingWith(".")), ([playerName, itemName]) => ({
    winner: { by: "player", playerName },
    itemName,
  })),
);

export function parseWonPrizeMatch(c: ParseCursor): WonPrizeMatchData {
  const line = c.line(prizeLine);
  const teamId = c.nextTeamId();
  const playerId = c.nextPlayerId();
  const itemName = line.itemName ?? c.metadata("itemName", Str);
  const ratings = readLooseItemRatings(c, itemName);
  return {
    kind: "WonPrizeMatch",
    winner: line.winner,
    teamId,
    playerId,
    ...ratings,
    playerItemRatingBefore: c.metadata("playerItemRatingBefore", Num),
  };
}

export function buildWonPrizeMatch(b: RecordBuilder, d: WonPrizeMatchData): EventType {
  b.pushDescription(
    d.winner.by === "team"
      ? `The ${d.winner.teamName}${PRIZE_MATCH_WON}`
      : `${d.winner.playerName}${GAINED_PRIZED}${d.itemName}.`,
  );
  b.pushTeamTag(d.teamId);
  b.pushPlayerTag(d.playerId);
  writeLooseItemRatings(b, d);
  return EventType.PlayerGainedItem;
}

/** PlayerGainedItem records outside of games. */
export function parseSeasonGainedItem(c: ParseCursor): CommunityChestOpensData | WonPrizeMatchData {
  return c.record.description.startsWith(CHEST_OPENS) ? parseCommunityChestOpens(c) : parseWonPrizeMatch(c);
}

// ---------------------------------------------------------------------------
// Redactions and roster moves
// ---------------------------------------------------------------------------

export function parseRedacted(c: ParseCursor): RedactedData {
  c.expectCategory(EventCategory.Redacted);
  c.expectMetadata("redacted", true);
  const scales = c.metadata("scales", Int);
  return { kind: "Redacted", description: c.wholeDescription(), scales };
}

export function buildRedacted(b: RecordBuilder, d: RedactedData): EventType {
  b.setCategory(EventCategory.Redacted);
  b.pushDescription(d.description);
  b.setMetadata("redacted", true);
  b.setMetadata("scales", d.scales);
  return EventType.Undefined;
}

/** Metadata repeated on PlayerRemovedFromTeam records. */
function expectRemovedPlayer(c: ParseCursor, d: ReplicaFadedToDustData): void {
  c.expectMetadata("playerId", d.playerId);
  c.expectMetadata("playerName", d.playerName);
  c.expectMetadata("teamId", d.teamId);
  c.expectMetadata("teamName", d.teamName);
}

export function parseReplicaFadedToDust(c: ParseCursor): ReplicaFadedToDustData {
  const [playerName, teamName] = c.line(pair(takeUntil(" faded away from the "), lineEndingWith(".")));
  const data: ReplicaFadedToDustData = {
    kind: "ReplicaFadedToDust",
    teamId: c.nextTeamId(),
    teamName,
    playerId: c.nextPlayerId(),
    playerName,
  };
  expectRemovedPlayer(c, data);
  return data;
}

export function buildReplicaFadedToDust(b: RecordBuilder, d: ReplicaFadedToDustData): EventType {
  b.pushDescription(`${d.playerName} faded away from the ${d.teamName}.`);
  b.pushTeamTag(d.teamId);
  b.pushPlayerTag(d.playerId);
  b.setMetadata("playerId", d.playerId);
  b.setMetadata("playerName", d.playerName);
  b.setMetadata("teamId", d.teamId);
  b.setMetadata("teamName", d.teamName);
  return EventType.PlayerRemovedFromTeam;
}

interface PlayerMove {
  playerId: string;
  playerName: string;
  previousTeamId: string;
  previousTeamName: string;
  newTeamId: string;
  newTeamName: string;
}

/** Player tag, then the sending and receiving team tags, each repeated in metadata. */
function readPlayerMove(c: ParseCursor, playerName: string): PlayerMove {
  const playerId = c.nextPlayerId();
  const previousTeamId = c.nextTeamId();
  const newTeamId = c.nextTeamId();
  c.expectMetadata("playerId", playerId);
  c.expectMetadata("playerName", playerName);
  c.expectMetadata("sendTeamId", previousTeamId);
  c.expectMetadata("receiveTeamId", newTeamId);
  return {
    playerId,
    playerName,
    previousTeamId,
    previousTeamName: c.metadata("sendTeamName", Str),
    newTeamId,
    newTeamName: c.metadata("receiveTeamName", Str),
  };
}

function writePlayerMove(b: RecordBuilder, move: PlayerMove, location: RosterLocation, receiveLocation: RosterLocation): void {
  b.pushPlayerTag(move.playerId);
  b.pushTeamTag(move.previousTeamId);
  b.pushTeamTag(move.newTeamId);
  b.setMetadata("location", location);
  b.setMetadata("playerId", move.playerId);
  b.setMetadata("playerName", move.playerName);
  b.setMetadata("receiveLocation", receiveLocation);
  b.setMetadata("receiveTeamId", move.newTeamId);
  b.setMetadata("receiveTeamName", move.newTeamName);
  b.setMetadata("sendTeamId", move.previousTeamId);
  b.setMetadata("sendTeamName", move.previousTeamName);
}

const RETURNS = " returns from the Investigation";

const returnLine: Parser<[string, boolean]> = alt<[string, boolean]>(
  map(lineEndingWith(`${RETURNS} emptyhanded.`), (playerName): [string, boolean] => [playerName, true]),
  map(lineEndingWith(`${RETURNS}.`), (playerName): [string, boolean] => [playerName, false]),
);

/** A detective leaving the Shadows; they always went in from the bullpen slot. */
export function parseReturnFromInvestigation(c: ParseCursor): ReturnFromInvestigationData {
  const [playerName, emptyhanded] = c.line(returnLine);
  const move = readPlayerMove(c, playerName);
  c.expectMetadata("location", RosterLocation.Bullpen);
  const newLocation = c.metadataEnum("receiveLocation", Int, ROSTER_LOCATION_VALUES);
  return { kind: "ReturnFromInvestigation", ...move, newLocation, emptyhanded };
}

export function buildReturnFromInvestigation(b: RecordBuilder, d: ReturnFromInvestigationData): EventType {
  b.pushDescription(`${d.playerName}${RETURNS}${d.emptyhanded ? " emptyhanded" : ""}.`);
  writePlayerMove(b, d, RosterLocation.Bullpen, d.newLocation);
  return EventType.PlayerMoved;
}

function roamSuffix(season: number): string {
  return ` ${season < 17 ? "wandered" : "roamed"} to a new team.`;
}

export function parseRoam(c: ParseCursor): RoamData {
  const playerName = c.line(lineEndingWith(roamSuffix(c.season)));
  const move = readPlayerMove(c, playerName);
  const location = c.metadataEnum("location", Int, ROSTER_LOCATION_VALUES);
  c.expectMetadata("receiveLocation", location);
  return { kind: "Roam", ...move, location };
}

export function buildRoam(b: RecordBuilder, d: RoamData): EventType {
  b.pushDescription(`${d.playerName}${roamSuffix(b.season)}`);
  writePlayerMove(b, d, d.location, d.location);
  return EventType.PlayerMoved;
}
