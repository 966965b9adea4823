import { EventType } from "../contract/eventTypes.js";
import { INGEST_SOURCE_KEY, INGEST_TIME_KEY, type WireRecord } from "../contract/types.js";
import type { Envelope } from "../model/descriptors.js";
import type { Occurrence, OccurrenceData } from "../model/occurrence.js";
import { RecordBuilder } from "./builder.js";
import { ParseCursor } from "./cursor.js";
import { FeedParseError } from "./errors.js";
import { Num, Str } from "./fragments.js";
import * as flow from "./kinds/gameFlow.js";
import * as effects from "./kinds/modEffects.js";
import * as plays from "./kinds/plays.js";
import * as season from "./kinds/season.js";
import * as weather from "./kinds/weather.js";

export type ParseOutcome =
  | { ok: true; occurrence: Occurrence }
  | { ok: false; error: FeedParseError };

// ---------------------------------------------------------------------------
// Parse
// ---------------------------------------------------------------------------

function readEnvelope(c: ParseCursor): Envelope {
  const record = c.record;
  const envelope: Envelope = {
    id: record.id,
    created: record.created,
    sim: record.sim,
    season: record.season,
    day: record.day,
    phase: record.phase,
    tournament: record.tournament,
    nuts: record.nuts,
  };
  const ingestTime = c.optionalMetadata(INGEST_TIME_KEY, Num);
  if (ingestTime !== undefined) {
    envelope.ingestTime = ingestTime;
  }
  const ingestSource = c.optionalMetadata(INGEST_SOURCE_KEY, Str);
  if (ingestSource !== undefined) {
    envelope.ingestSource = ingestSource;
  }
  return envelope;
}

function has(c: ParseCursor, text: string): boolean {
  return c.record.description.includes(text);
}

/** Select the grammar for a record. Several kinds share a discriminant; their text tells them apart. */
function parseData(c: ParseCursor): OccurrenceData {
  switch (c.type) {
    // Game flow
    case EventType.LetsGo:
      return flow.parseLetsGo(c);
    case EventType.PlayBall:
      return flow.parsePlayBall(c);
    case EventType.HalfInning:
      return flow.parseHalfInning(c);
    case EventType.BatterUp:
      return flow.parseBatterUp(c);
    case EventType.PitcherChange:
      return flow.parsePitcherChange(c);
    case EventType.InningEnd:
      return flow.parseInningEnd(c);
    case EventType.GameEnd:
      return flow.parseGameEnd(c);
    case EventType.StrikeZapped:
      return flow.parseStrikeZapped(c);
    case EventType.PeanutFlavorText:
      return flow.parsePeanutFlavorText(c);
    case EventType.BirdsCircle:
      return flow.parseBirdsCircle(c);
    case EventType.Superyummy:
      return flow.parseSuperyummy(c);
    case EventType.Homebody:
      return flow.parseHomebody(c);
    case EventType.HolidayInning:
      return flow.parseHolidayInning(c);
    case EventType.HomeFieldAdvantage:
      return flow.parseHomeFieldAdvantage(c);
    case EventType.PrizeMatch:
      return flow.parsePrizeMatch(c);
    case EventType.SolarPanelsAwait:
      return flow.parseSolarPanelsAwait(c);
    case EventType.SolarPanelsActivation:
      return flow.parseSolarPanelsActivation(c);
    case EventType.RunsOverflowing:
      return flow.parseRunsOverflowing(c);
    case EventType.EnterSecretBase:
      return flow.parseEnterSecretBase(c);
    case EventType.ExitSecretBase:
      return flow.parseExitSecretBase(c);
    case EventType.Party:
      return flow.parseParty(c);

    // Plate appearances
    case EventType.Ball:
      return plays.parseBall(c);
    case EventType.Strike:
      return plays.parseStrike(c);
    case EventType.FoulBall:
      return plays.parseFoulBall(c);
    case EventType.FlyOut:
      return plays.parseFlyout(c);
    case EventType.GroundOut:
      if (has(c, " hit into a double play!")) {
        return plays.parseDoublePlay(c);
      }
      return has(c, " reaches on fielder's choice.") ? plays.parseFieldersChoice(c) : plays.parseGroundOut(c);
    case EventType.Hit:
      return plays.parseHit(c);
    case EventType.HomeRun:
      return plays.parseHomeRun(c);
    case EventType.StolenBase:
      return has(c, " gets caught stealing ") ? plays.parseCaughtStealing(c) : plays.parseStolenBase(c);
    case EventType.Strikeout:
      if (has(c, " times to strike out willingly!")) {
        return plays.parseCharmStrikeout(c);
      }
      return has(c, " uses a Mind Trick!") ? plays.parseMindTrickStrikeout(c) : plays.parseStrikeout(c);
    case EventType.Walk:
      if (has(c, " uses a Mind Trick!")) {
        return has(c, "The umpire sends them to first base.")
          ? plays.parseMindTrickWalk(c)
          : plays.parseMindTrickStrikeout(c);
      }
      return has(c, " walks to first base.") ? plays.parseCharmWalk(c) : plays.parseWalk(c);
    case EventType.MildPitch:
      return has(c, " draws a walk.") ? plays.parseMildPitchWalk(c) : plays.parseMildPitch(c);
    case EventType.HitByPitch:
      return plays.parseHitByPitch(c);
    case EventType.AmbushedByCrows:
      return plays.parseAmbushedByCrows(c);
    case EventType.BatterSkipped:
      return plays.parseBatterSkipped(c);

    // Weather and stadium effects
    case EventType.CoffeeBean:
      return weather.parseCoffeeBean(c);
    case EventType.GainFreeRefill:
      return weather.parseGainFreeRefill(c);
    case EventType.BecomeTripleThreat:
      return weather.parseBecomeTripleThreat(c);
    case EventType.Blooddrain:
    case EventType.BlooddrainSiphon:
      return weather.parseBlooddrain(c);
    case EventType.BlooddrainBlocked:
      return weather.parseBlooddrainBlocked(c);
    case EventType.Sun2:
      return weather.parseSun2(c);
    case EventType.BlackHole:
      return weather.parseBlackHole(c);
    case EventType.AllergicReaction:
      return weather.parseAllergicReaction(c);
    case EventType.SuperallergicReaction:
      return weather.parseSuperallergicReaction(c);
    case EventType.PeanutMister:
      return weather.parsePeanutMister(c);
    case EventType.Perk:
      return weather.parsePerkUp(c);
    case EventType.FeedbackSwap:
      return weather.parseFeedback(c);
    case EventType.FeedbackBlocked:
      return weather.parseFeedbackBlocked(c);
    case EventType.ReverbBestowsReverberating:
      return weather.parseBestowReverberating(c);
    case EventType.ReverbRosterShuffle:
      return weather.parseReverb(c);
    case EventType.UnderOver:
      return weather.parseUnderOver(c);
    case EventType.OverUnder:
      return weather.parseOverUnder(c);
    case EventType.TasteTheInfinite:
      return weather.parseTasteTheInfinite(c);
    case EventType.BirdsUnshell:
      return weather.parseBirdsUnshell(c);
    case EventType.FloodingSwept:
      return weather.parseFloodingSwept(c);
    case EventType.ReturnFromElsewhere:
      return weather.parseReturnFromElsewhere(c);
    case EventType.Incineration:
      return weather.parseIncineration(c);
    case EventType.IncinerationBlocked:
      return weather.isFireproofIncineration(c.record.description)
        ? weather.parseFireproofIncineration(c)
        : weather.parseBecameMagmatic(c);
    case EventType.Undersea:
      return weather.parseUndersea(c);
    case EventType.HighPressure:
      return weather.parseHighPressure(c);
    case EventType.EchoReciever:
      return weather.parseEchoReceiver(c);
    case EventType.SalmonSwim:
      return weather.parseSalmonSwim(c);
    case EventType.PolarityShift:
      return weather.parsePolarityShift(c);
    case EventType.Smithy:
      return weather.parseSmithy(c);
    case EventType.ShameDonor:
      return weather.parseDonatedShameApplied(c);
    case EventType.GlitterCrateDrop:
      return weather.parseGlitterCrate(c);
    case EventType.CommunityChestOpens:
      return weather.parseCommunityChestGameMessage(c);

    // Mod effects
    case EventType.Earlbird:
    case EventType.LateToTheParty:
    case EventType.Middling:
    case EventType.Ambitious:
    case EventType.Coasting:
      return effects.parseSubseasonalModsChange(c);
    case EventType.Psychoacoustics:
      return effects.parsePsychoacoustics(c);
    case EventType.ConsumersAttack:
      return has(c, "CONSUMER EXPELLED") ? effects.parseConsumerExpelled(c) : effects.parseConsumersAttack(c);
    case EventType.EchoChamber:
      return effects.parseEchoChamber(c);
    case EventType.GrindRail:
      return effects.parseGrindRail(c);
    case EventType.Echo:
      return effects.parseEcho(c);
    case EventType.EchoIntoStatic:
      return effects.parseEchoIntoStatic(c);
    case EventType.ABloodType:
      return effects.parseABloodType(c);
    case EventType.EnterCrimeScene:
      return effects.parseEnterCrimeScene(c);
    case EventType.FaxMachine:
      return effects.parseFaxMachine(c);

    // Season and league
    case EventType.Undefined:
      return season.parseRedacted(c);
    case EventType.PlayerRemovedFromTeam:
      return season.parseReplicaFadedToDust(c);
    case EventType.PlayerMoved:
      return has(c, " returns from the Investigation") ? season.parseReturnFromInvestigation(c) : season.parseRoam(c);
    case EventType.BigDeal:
      return season.parseBeingSpeech(c);
    case EventType.Sun2SetWin:
      return season.parseSun2SetWin(c);
    case EventType.BlackHoleSwallowedWin:
      return season.parseBlackHoleSwallowedWin(c);
    case EventType.TeamDidShame:
      return season.parseTeamDidShame(c);
    case EventType.TeamWasShamed:
      return season.parseTeamWasShamed(c);
    case EventType.ModExpires:
      return season.parseModExpires(c);
    case EventType.FlagPlanted:
      return season.parseFlagPlanted(c);
    case EventType.EmergencyAlert:
      return season.parseEmergencyAlert(c);
    case EventType.TeamDivisionMove:
      return season.parseTeamJoinedIlb(c);
    case EventType.PlayerDivisionMove:
      return season.parsePlayerDivisionMove(c);
    case EventType.PlayerHatched:
      return season.parsePlayerHatched(c);
    case EventType.PlayerAddedToTeam:
      return season.parsePlayerAddedToTeam(c);
    case EventType.FinalStandings:
      return season.parseFinalStandings(c);
    case EventType.EarnedPostseasonSlot:
      return season.parseEarnedPostseasonSlot(c);
    case EventType.PostseasonAdvance:
      return season.parsePostseasonAdvance(c);
    case EventType.PostseasonEliminated:
      return season.parsePostseasonEliminated(c);
    case EventType.PlayerStatIncrease:
      return season.parseSeasonStatIncrease(c);
    case EventType.TeamWonInternetSeries:
      return season.parseTeamWonInternetSeries(c);
    case EventType.WillRecieved:
      return season.parseWillReceived(c);
    case EventType.BlessingOrGiftWon:
      return season.parseBlessingOrGift(c);
    case EventType.DecreePassed:
      return season.parseDecreePassed(c);
    case EventType.PlayerPermittedToStay:
      return season.parsePlayerPermittedToStay(c);
    case EventType.LineupSorted:
      return season.parseLineupSorted(c);
    case EventType.RenovationBuilt:
      return season.parseRenovationBuilt(c);
    case EventType.AddedMod:
      return season.parseSeasonAddedMod(c);
    case EventType.RemovedMod:
      return season.parseSeasonRemovedMod(c);
    case EventType.ModChange:
      return season.parsePlayerNamedMvp(c);
    case EventType.PlayerReplacesReturned:
      return season.parseReplaceReturnedPlayerFromShadows(c);
    case EventType.EnterHallOfFlame:
      return season.parsePlayerCalledBackToHall(c);
    case EventType.InvestigationMessage:
      return season.parseInvestigationMessage(c);
    case EventType.Tidings:
      return season.parseTidings(c);
    case EventType.RemovedModsFromAnotherMod:
      return season.parseModsFromAnotherModRemoved(c);
    case EventType.TarotReading:
      return season.parseTarotReading(c);
    case EventType.PlayerGainedItem:
      return season.parseSeasonGainedItem(c);
    case EventType.PlayerLostItem:
      return season.parsePlayerDropsItem(c);
    case EventType.TeamReceivedGifts:
      return season.parseTeamReceivedGifts(c);

    default:
      return c.fail({ kind: "NotImplemented" });
  }
}

/**
 * Turn one validated wire record into a typed occurrence. Grammar failures are
 * thrown as `FeedParseError` from wherever they arise and returned from here.
 */
export function parse(record: WireRecord): ParseOutcome {
  try {
    const cursor = new ParseCursor(record);
    const envelope = readEnvelope(cursor);
    const data = parseData(cursor);
    cursor.finish();
    return { ok: true, occurrence: { ...envelope, data } };
  } catch (error) {
    if (error instanceof FeedParseError) {
      return { ok: false, error };
    }
    throw error;
  }
}

// ---------------------------------------------------------------------------
// Build
// ---------------------------------------------------------------------------

function assertNever(value: never): never {
  throw new Error(`Unhandled occurrence kind: ${JSON.stringify(value)}`);
}

function buildData(b: RecordBuilder, d: OccurrenceData): EventType {
  switch (d.kind) {
    case "LetsGo":
      return flow.buildLetsGo(b, d);
    case "PlayBall":
      return flow.buildPlayBall(b, d);
    case "HalfInning":
      return flow.buildHalfInning(b, d);
    case "BatterUp":
      return flow.buildBatterUp(b, d);
    case "PitcherChange":
      return flow.buildPitcherChange(b, d);
    case "InningEnd":
      return flow.buildInningEnd(b, d);
    case "GameEnd":
      return flow.buildGameEnd(b, d);
    case "StrikeZapped":
      return flow.buildStrikeZapped(b, d);
    case "PeanutFlavorText":
      return flow.buildPeanutFlavorText(b, d);
    case "BirdsCircle":
      return flow.buildBirdsCircle(b, d);
    case "Superyummy":
      return flow.buildSuperyummy(b, d);
    case "Homebody":
      return flow.buildHomebody(b, d);
    case "HolidayInning":
      return flow.buildHolidayInning(b, d);
    case "HomeFieldAdvantage":
      return flow.buildHomeFieldAdvantage(b, d);
    case "PrizeMatch":
      return flow.buildPrizeMatch(b, d);
    case "SolarPanelsAwait":
      return flow.buildSolarPanelsAwait(b, d);
    case "SolarPanelsActivation":
      return flow.buildSolarPanelsActivation(b, d);
    case "RunsOverflowing":
      return flow.buildRunsOverflowing(b, d);
    case "EnterSecretBase":
      return flow.buildEnterSecretBase(b, d);
    case "ExitSecretBase":
      return flow.buildExitSecretBase(b, d);
    case "Party":
      return flow.buildParty(b, d);

    case "Ball":
      return plays.buildBall(b, d);
    case "StrikeSwinging":
    case "StrikeLooking":
    case "StrikeFlinching":
      return plays.buildStrike(b, d);
    case "FoulBall":
      return plays.buildFoulBall(b, d);
    case "Flyout":
      return plays.buildFlyout(b, d);
    case "GroundOut":
      return plays.buildGroundOut(b, d);
    case "FieldersChoice":
      return plays.buildFieldersChoice(b, d);
    case "DoublePlay":
      return plays.buildDoublePlay(b, d);
    case "Hit":
      return plays.buildHit(b, d);
    case "HomeRun":
      return plays.buildHomeRun(b, d);
    case "StolenBase":
      return plays.buildStolenBase(b, d);
    case "CaughtStealing":
      return plays.buildCaughtStealing(b, d);
    case "StrikeoutSwinging":
    case "StrikeoutLooking":
      return plays.buildStrikeout(b, d);
    case "Walk":
      return plays.buildWalk(b, d);
    case "CharmStrikeout":
      return plays.buildCharmStrikeout(b, d);
    case "CharmWalk":
      return plays.buildCharmWalk(b, d);
    case "MildPitch":
      return plays.buildMildPitch(b, d);
    case "MildPitchWalk":
      return plays.buildMildPitchWalk(b, d);
    case "MindTrickWalk":
      return plays.buildMindTrickWalk(b, d);
    case "MindTrickStrikeout":
      return plays.buildMindTrickStrikeout(b, d);
    case "HitByPitch":
      return plays.buildHitByPitch(b, d);
    case "AmbushedByCrows":
      return plays.buildAmbushedByCrows(b, d);
    case "BatterSkipped":
      return plays.buildBatterSkipped(b, d);

    case "CoffeeBean":
      return weather.buildCoffeeBean(b, d);
    case "GainFreeRefill":
      return weather.buildGainFreeRefill(b, d);
    case "BecomeTripleThreat":
      return weather.buildBecomeTripleThreat(b, d);
    case "Blooddrain":
      return weather.buildBlooddrain(b, d);
    case "SpecialBlooddrain":
      return weather.buildSpecialBlooddrain(b, d);
    case "BlooddrainBlocked":
      return weather.buildBlooddrainBlocked(b, d);
    case "Sun2":
      return weather.buildSun2(b, d);
    case "BlackHole":
      return weather.buildBlackHole(b, d);
    case "AllergicReaction":
      return weather.buildAllergicReaction(b, d);
    case "SuperallergicReaction":
      return weather.buildSuperallergicReaction(b, d);
    case "PeanutMister":
      return weather.buildPeanutMister(b, d);
    case "PerkUp":
      return weather.buildPerkUp(b, d);
    case "Feedback":
      return weather.buildFeedback(b, d);
    case "FeedbackBlocked":
      return weather.buildFeedbackBlocked(b, d);
    case "BestowReverberating":
      return weather.buildBestowReverberating(b, d);
    case "Reverb":
      return weather.buildReverb(b, d);
    case "UnderOver":
      return weather.buildUnderOver(b, d);
    case "OverUnder":
      return weather.buildOverUnder(b, d);
    case "TasteTheInfinite":
      return weather.buildTasteTheInfinite(b, d);
    case "FloodingSwept":
      return weather.buildFloodingSwept(b, d);
    case "ReturnFromElsewhere":
      return weather.buildReturnFromElsewhere(b, d);
    case "Incineration":
      return weather.buildIncineration(b, d);
    case "BecameMagmatic":
      return weather.buildBecameMagmatic(b, d);
    case "FireproofIncineration":
      return weather.buildFireproofIncineration(b, d);
    case "Undersea":
      return weather.buildUndersea(b, d);
    case "HighPressure":
      return weather.buildHighPressure(b, d);
    case "BirdsUnshell":
      return weather.buildBirdsUnshell(b, d);
    case "EchoReceiver":
      return weather.buildEchoReceiver(b, d);
    case "SalmonSwim":
      return weather.buildSalmonSwim(b, d);
    case "PolarityShift":
      return weather.buildPolarityShift(b, d);
    case "Smithy":
      return weather.buildSmithy(b, d);
    case "DonatedShameApplied":
      return weather.buildDonatedShameApplied(b, d);
    case "GlitterCrate":
      return weather.buildGlitterCrate(b, d);
    case "CommunityChestGameMessage":
      return weather.buildCommunityChestGameMessage(b, d);

    case "SubseasonalModsChange":
      return effects.buildSubseasonalModsChange(b, d);
    case "Psychoacoustics":
      return effects.buildPsychoacoustics(b, d);
    case "ConsumersAttack":
      return effects.buildConsumersAttack(b, d);
    case "ConsumerExpelled":
      return effects.buildConsumerExpelled(b, d);
    case "EchoChamber":
      return effects.buildEchoChamber(b, d);
    case "GrindRail":
      return effects.buildGrindRail(b, d);
    case "Echo":
      return effects.buildEcho(b, d);
    case "EchoIntoStatic":
      return effects.buildEchoIntoStatic(b, d);
    case "ABloodType":
      return effects.buildABloodType(b, d);
    case "EnterCrimeScene":
      return effects.buildEnterCrimeScene(b, d);
    case "FaxMachine":
      return effects.buildFaxMachine(b, d);

    case "Redacted":
      return season.buildRedacted(b, d);
    case "ReplicaFadedToDust":
      return season.buildReplicaFadedToDust(b, d);
    case "ReturnFromInvestigation":
      return season.buildReturnFromInvestigation(b, d);
    case "Roam":
      return season.buildRoam(b, d);
    case "BeingSpeech":
      return season.buildBeingSpeech(b, d);
    case "Sun2SetWin":
      return season.buildSun2SetWin(b, d);
    case "BlackHoleSwallowedWin":
      return season.buildBlackHoleSwallowedWin(b, d);
    case "TeamDidShame":
      return season.buildTeamDidShame(b, d);
    case "TeamWasShamed":
      return season.buildTeamWasShamed(b, d);
    case "PlayerModExpires":
      return season.buildPlayerModExpires(b, d);
    case "TeamModExpires":
      return season.buildTeamModExpires(b, d);
    case "FlagPlanted":
      return season.buildFlagPlanted(b, d);
    case "EmergencyAlert":
      return season.buildEmergencyAlert(b, d);
    case "TeamJoinedILB":
      return season.buildTeamJoinedIlb(b, d);
    case "PlayerHatched":
      return season.buildPlayerHatched(b, d);
    case "PostseasonBirth":
      return season.buildPostseasonBirth(b, d);
    case "FinalStandings":
      return season.buildFinalStandings(b, d);
    case "EarnedPostseasonSlot":
      return season.buildEarnedPostseasonSlot(b, d);
    case "PostseasonAdvance":
      return season.buildPostseasonAdvance(b, d);
    case "PostseasonEliminated":
      return season.buildPostseasonEliminated(b, d);
    case "PlayerBoosted":
      return season.buildPlayerBoosted(b, d);
    case "BottomDwellers":
      return season.buildBottomDwellers(b, d);
    case "TeamWonInternetSeries":
      return season.buildTeamWonInternetSeries(b, d);
    case "WillReceived":
      return season.buildWillReceived(b, d);
    case "BlessingWon":
      return season.buildBlessingWon(b, d);
    case "GiftReceived":
      return season.buildGiftReceived(b, d);
    case "DecreePassed":
      return season.buildDecreePassed(b, d);
    case "PlayerJoinedILB":
    case "PlayerPulledThroughRift":
      return season.buildPlayerDivisionMove(b, d);
    case "PlayerPermittedToStay":
      return season.buildPlayerPermittedToStay(b, d);
    case "LineupSorted":
      return season.buildLineupSorted(b, d);
    case "RenovationBuilt":
      return season.buildRenovationBuilt(b, d);
    case "PlayerNamedMvp":
      return season.buildPlayerNamedMvp(b, d);
    case "ReplaceReturnedPlayerFromShadows":
      return season.buildReplaceReturnedPlayerFromShadows(b, d);
    case "PlayerCalledBackToHall":
      return season.buildPlayerCalledBackToHall(b, d);
    case "TeamEnteredPartyTime":
    case "TeamLeftPartyTime":
    case "TeamGainedFreeWill":
    case "TeamUsedFreeWill":
      return season.buildTeamMod(b, d);
    case "PlayerLostMod":
      return season.buildPlayerLostMod(b, d);
    case "InvestigationMessage":
      return season.buildInvestigationMessage(b, d);
    case "PlayerLocalized":
      return season.buildPlayerLocalized(b, d);
    case "Tidings":
      return season.buildTidings(b, d);
    case "ModsFromAnotherModRemoved":
      return season.buildModsFromAnotherModRemoved(b, d);
    case "TarotReading":
      return season.buildTarotReading(b, d);
    case "CommunityChestOpens":
      return season.buildCommunityChestOpens(b, d);
    case "PlayerDropsItem":
      return season.buildPlayerDropsItem(b, d);
    case "WonPrizeMatch":
      return season.buildWonPrizeMatch(b, d);
    case "TeamReceivedGifts":
      return season.buildTeamReceivedGifts(b, d);

    default:
      return assertNever(d);
  }
}

/** Rebuild the wire record an occurrence was parsed from. */
export function build(occurrence: Occurrence): WireRecord {
  const builder = RecordBuilder.root(occurrence);
  const type = buildData(builder, occurrence.data);
  return builder.build(type);
}
