import {
  AttrCategory,
  EventCategory,
  EventType,
  ModDuration,
  WEATHER_VALUES,
  specialIf,
} from "../../contract/eventTypes.js";
import type { Inhabiting, PerformingToggle } from "../../model/descriptors.js";
import type {
  BatterUpData,
  BirdsCircleData,
  EnterSecretBaseData,
  ExitSecretBaseData,
  GameEndData,
  GameStartAnnouncement,
  HalfInningData,
  HolidayInningData,
  HomebodyData,
  HomeFieldAdvantageData,
  InningEndData,
  LetsGoData,
  PartyData,
  PeanutFlavorTextData,
  PitcherChangeData,
  PlayBallData,
  PrizeMatchData,
  RunsOverflowingData,
  SolarPanelsActivationData,
  SolarPanelsAwaitData,
  StrikeZappedData,
  SuperyummyData,
} from "../../model/occurrence.js";
import type { RecordBuilder } from "../builder.js";
import {
  alt,
  lineEndingWith,
  map,
  oneOf,
  pair,
  preceded,
  restOfLine,
  restOfText,
  takeUntil,
  terminated,
  value,
  wholeNumber,
  type Parser,
} from "../combinators.js";
import type { ParseCursor } from "../cursor.js";
import {
  Int,
  Uuid,
  buildGame,
  buildPerformingToggle,
  buildPlayerModChild,
  buildStatChild,
  buildSubseasonalChanges,
  canonicalNumber,
  hasMod,
  parseGame,
  parsePerformingToggle,
  parsePlayerModChild,
  parseStatChild,
  parseSubseasonalChanges,
  sameName,
  sameTag,
  type ModChildSpec,
  type StatChildSpec,
} from "../fragments.js";

// ---------------------------------------------------------------------------
// Game start
// ---------------------------------------------------------------------------

const announcementLine: Parser<GameStartAnnouncement> = alt<GameStartAnnouncement>(
  value<GameStartAnnouncement>("Let's Go!", { type: "letsGo" }),
  map(
    pair(takeUntil(" vs. "), restOfLine),
    ([away, home]): GameStartAnnouncement => ({ type: "teamNames", away, home }),
  ),
);

function announcementText(announcement: GameStartAnnouncement): string {
  return announcement.type === "letsGo" ? "Let's Go!" : `${announcement.away} vs. ${announcement.home}`;
}

export function parseLetsGo(c: ParseCursor): LetsGoData {
  const game = parseGame(c);
  const announcement = c.line(announcementLine);
  c.expectMetadata("home", game.homeTeamId);
  c.expectMetadata("away", game.awayTeamId);
  const weather = c.metadataEnum("weather", Int, WEATHER_VALUES);
  const stadiumId = c.optionalMetadata("stadium", Uuid) ?? null;
  return { kind: "LetsGo", game, announcement, weather, stadiumId };
}

export function buildLetsGo(b: RecordBuilder, d: LetsGoData): EventType {
  buildGame(b, d.game);
  b.pushDescription(announcementText(d.announcement));
  b.setMetadata("home", d.game.homeTeamId);
  b.setMetadata("away", d.game.awayTeamId);
  b.setMetadata("weather", d.weather);
  if (d.stadiumId !== null) {
    b.setMetadata("stadium", d.stadiumId);
  }
  return EventType.LetsGo;
}

export function parsePlayBall(c: ParseCursor): PlayBallData {
  const game = parseGame(c);
  c.expectLine("Play ball!");
  return { kind: "PlayBall", game };
}

export function buildPlayBall(b: RecordBuilder, d: PlayBallData): EventType {
  buildGame(b, d.game);
  b.pushDescription("Play ball!");
  return EventType.PlayBall;
}

const halfInningLine = pair(
  pair(
    oneOf([
      ["Top", true],
      ["Bottom", false],
    ]),
    preceded(" of ", wholeNumber),
  ),
  preceded(", ", lineEndingWith(" batting.")),
);

export function parseHalfInning(c: ParseCursor): HalfInningData {
  const game = parseGame(c);
  const subseasonalChanges = parseSubseasonalChanges(c);
  const [[topOfInning, inning], battingTeamName] = c.line(halfInningLine);
  return { kind: "HalfInning", game, subseasonalChanges, topOfInning, inning, battingTeamName };
}

export function buildHalfInning(b: RecordBuilder, d: HalfInningData): EventType {
  buildGame(b, d.game);
  buildSubseasonalChanges(b, d.subseasonalChanges);
  b.pushDescription(`${d.topOfInning ? "Top" : "Bottom"} of ${d.inning}, ${d.battingTeamName} batting.`);
  return EventType.HalfInning;
}

// ---------------------------------------------------------------------------
// Batters and pitchers
// ---------------------------------------------------------------------------

const WIELDING = ", wielding ";

export function parseBatterUp(c: ParseCursor): BatterUpData {
  const game = parseGame(c);
  const repeatingName = c.tryLine(lineEndingWith(" is Repeating!"));
  const inhabitingLine = c.tryLine(pair(takeUntil(" is Inhabiting "), lineEndingWith("!")));
  const [batterName, rest] = c.line(pair(takeUntil(" batting for the "), lineEndingWith(".")));
  if (repeatingName !== null) {
    sameName(c, batterName, repeatingName);
  }

  const wieldingAt = rest.indexOf(WIELDING);
  const teamName = wieldingAt === -1 ? rest : rest.slice(0, wieldingAt);
  const wieldingItem = wieldingAt === -1 ? null : rest.slice(wieldingAt + WIELDING.length);

  let inhabiting: Inhabiting | null = null;
  if (inhabitingLine !== null) {
    const [inhabitingName, inhabitedPlayerName] = inhabitingLine;
    sameName(c, batterName, inhabitingName);
    const inhabitingPlayerId = c.nextPlayerId();
    const inhabitedPlayerId = c.nextPlayerId();
    const added = c.childIf(EventType.AddedMod, hasMod("INHABITING"), (child) => {
      child.expectLine(`${batterName} is Inhabiting ${inhabitedPlayerName}!`);
      child.repeatedPlayerId(inhabitingPlayerId);
      const teamId = child.nextTeamIdOpt();
      child.expectMetadata("mod", "INHABITING");
      child.expectMetadata("type", ModDuration.Permanent);
      return { sub: child.subEvent(), teamId };
    });
    inhabiting = {
      sub: added ? added.sub : null,
      inhabitingPlayerId,
      inhabitingPlayerTeamId: added ? added.teamId : null,
      inhabitedPlayerId,
      inhabitedPlayerName,
    };
  }

  const isRepeating = repeatingName !== null;
  c.expectCategory(specialIf(inhabiting !== null || isRepeating));
  return { kind: "BatterUp", game, batterName, teamName, wieldingItem, inhabiting, isRepeating };
}

export function buildBatterUp(b: RecordBuilder, d: BatterUpData): EventType {
  buildGame(b, d.game);
  b.setCategory(specialIf(d.inhabiting !== null || d.isRepeating));
  if (d.isRepeating) {
    b.pushDescription(`${d.batterName} is Repeating!`);
  }
  const inhabiting = d.inhabiting;
  if (inhabiting) {
    const line = `${d.batterName} is Inhabiting ${inhabiting.inhabitedPlayerName}!`;
    b.pushDescription(line);
    b.pushPlayerTag(inhabiting.inhabitingPlayerId);
    b.pushPlayerTag(inhabiting.inhabitedPlayerId);
    if (inhabiting.sub) {
      b.pushChild(inhabiting.sub, EventType.AddedMod, (child) => {
        child.pushDescription(line);
        child.pushPlayerTag(inhabiting.inhabitingPlayerId);
        child.pushTeamTag(inhabiting.inhabitingPlayerTeamId);
        child.setMetadata("mod", "INHABITING");
        child.setMetadata("type", ModDuration.Permanent);
      });
    }
  }
  const wielding = d.wieldingItem === null ? "" : `${WIELDING}${d.wieldingItem}`;
  b.pushDescription(`${d.batterName} batting for the ${d.teamName}${wielding}.`);
  return EventType.BatterUp;
}

export function parsePitcherChange(c: ParseCursor): PitcherChangeData {
  const game = parseGame(c);
  const [pitcherName, teamName] = c.line(pair(takeUntil(" is now pitching for the "), lineEndingWith(".")));
  const pitcherId = c.nextPlayerId();
  return { kind: "PitcherChange", game, pitcherId, pitcherName, teamName };
}

export function buildPitcherChange(b: RecordBuilder, d: PitcherChangeData): EventType {
  buildGame(b, d.game);
  b.pushDescription(`${d.pitcherName} is now pitching for the ${d.teamName}.`);
  b.pushPlayerTag(d.pitcherId);
  return EventType.PitcherChange;
}

// ---------------------------------------------------------------------------
// Innings and game end
// ---------------------------------------------------------------------------

const TRIPLE_THREAT_LOST = " is no longer a Triple Threat.";

function tripleThreatLostSpec(playerName: string): ModChildSpec {
  return { type: EventType.RemovedMod, description: `${playerName}${TRIPLE_THREAT_LOST}`, mod: "TRIPLE_THREAT" };
}

export function parseInningEnd(c: ParseCursor): InningEndData {
  const game = parseGame(c);
  const inning = c.line(preceded("Inning ", terminated(wholeNumber, " is now an Outing.")));
  const lostLine = lineEndingWith(TRIPLE_THREAT_LOST);
  const names: string[] = [];
  for (let name = c.tryLine(lostLine); name !== null; name = c.tryLine(lostLine)) {
    names.push(name);
  }
  const tagged = names.map((playerName) => ({ playerName, playerId: c.nextPlayerId() }));
  const lostTripleThreat = tagged.map(({ playerName, playerId }) => {
    const change = parsePlayerModChild(c, tripleThreatLostSpec(playerName));
    sameTag(c, "player", playerId, change.playerId);
    return { ...change, playerName };
  });
  return { kind: "InningEnd", game, inning, lostTripleThreat };
}

export function buildInningEnd(b: RecordBuilder, d: InningEndData): EventType {
  buildGame(b, d.game);
  b.pushDescription(`Inning ${d.inning} is now an Outing.`);
  for (const lost of d.lostTripleThreat) {
    b.pushDescription(`${lost.playerName}${TRIPLE_THREAT_LOST}`);
  }
  for (const lost of d.lostTripleThreat) {
    b.pushPlayerTag(lost.playerId);
  }
  for (const lost of d.lostTripleThreat) {
    buildPlayerModChild(b, lost, tripleThreatLostSpec(lost.playerName));
  }
  return EventType.InningEnd;
}

/** `Team Name 4` with the score after the last space. */
function teamAndScore(c: ParseCursor, text: string): [string, number] {
  const space = text.lastIndexOf(" ");
  const score = canonicalNumber(text.slice(space + 1));
  if (space <= 0 || !score.ok || score.rest !== "") {
    return c.fail({ kind: "DescriptionMismatch", expected: "a team name and score", found: text });
  }
  return [text.slice(0, space), score.value];
}

export function parseGameEnd(c: ParseCursor): GameEndData {
  const game = parseGame(c);
  const [winnerText, loserText] = c.line(pair(takeUntil(", "), restOfLine));
  const [winningTeamName, winningTeamScore] = teamAndScore(c, winnerText);
  const [losingTeamName, losingTeamScore] = teamAndScore(c, loserText);
  c.repeatedTeamId(game.homeTeamId);
  c.repeatedTeamId(game.awayTeamId);
  c.expectCategory(EventCategory.Outcomes);
  const winnerId = c.metadata("winner", Uuid);
  return {
    kind: "GameEnd",
    game,
    winnerId,
    winningTeamName,
    winningTeamScore,
    losingTeamName,
    losingTeamScore,
  };
}

export function buildGameEnd(b: RecordBuilder, d: GameEndData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Outcomes);
  b.pushDescription(
    `${d.winningTeamName} ${d.winningTeamScore}, ${d.losingTeamName} ${d.losingTeamScore}`,
  );
  b.pushTeamTag(d.game.homeTeamId);
  b.pushTeamTag(d.game.awayTeamId);
  b.setMetadata("winner", d.winnerId);
  return EventType.GameEnd;
}

// ---------------------------------------------------------------------------
// Fixed announcements
// ---------------------------------------------------------------------------

const STRIKE_ZAPPED = "The Electricity zaps a strike away!";
const BIRDS_CIRCLE = "The Birds circle ... but they don't find what they're looking for.";
const SOLAR_PANELS_AWAIT = "The Solar Panels are angled toward Sun 2.";

export function parseStrikeZapped(c: ParseCursor): StrikeZappedData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  c.expectLine(STRIKE_ZAPPED);
  return { kind: "StrikeZapped", game };
}

export function buildStrikeZapped(b: RecordBuilder, d: StrikeZappedData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(STRIKE_ZAPPED);
  return EventType.StrikeZapped;
}

export function parseBirdsCircle(c: ParseCursor): BirdsCircleData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  c.expectLine(BIRDS_CIRCLE);
  return { kind: "BirdsCircle", game };
}

export function buildBirdsCircle(b: RecordBuilder, d: BirdsCircleData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(BIRDS_CIRCLE);
  return EventType.BirdsCircle;
}

export function parseSolarPanelsAwait(c: ParseCursor): SolarPanelsAwaitData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  c.expectLine(SOLAR_PANELS_AWAIT);
  return { kind: "SolarPanelsAwait", game };
}

export function buildSolarPanelsAwait(b: RecordBuilder, d: SolarPanelsAwaitData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(SOLAR_PANELS_AWAIT);
  return EventType.SolarPanelsAwait;
}

export function parsePeanutFlavorText(c: ParseCursor): PeanutFlavorTextData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const message = c.line(restOfText);
  return { kind: "PeanutFlavorText", game, message };
}

export function buildPeanutFlavorText(b: RecordBuilder, d: PeanutFlavorTextData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(d.message);
  return EventType.PeanutFlavorText;
}

export function parseHolidayInning(c: ParseCursor): HolidayInningData {
  const game = parseGame(c);
  c.expectLine("Hotel Motel");
  const inning = c.line(preceded("Inning ", terminated(wholeNumber, " is a Holiday Inning!")));
  return { kind: "HolidayInning", game, inning };
}

export function buildHolidayInning(b: RecordBuilder, d: HolidayInningData): EventType {
  buildGame(b, d.game);
  b.pushDescription("Hotel Motel");
  b.pushDescription(`Inning ${d.inning} is a Holiday Inning!`);
  return EventType.HolidayInning;
}

export function parseHomeFieldAdvantage(c: ParseCursor): HomeFieldAdvantageData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const teamName = c.line(preceded("The ", lineEndingWith(" apply Home Field advantage!")));
  return { kind: "HomeFieldAdvantage", game, teamName };
}

export function buildHomeFieldAdvantage(b: RecordBuilder, d: HomeFieldAdvantageData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(`The ${d.teamName} apply Home Field advantage!`);
  return EventType.HomeFieldAdvantage;
}

export function parsePrizeMatch(c: ParseCursor): PrizeMatchData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  c.expectLine("Prize Match!");
  const itemName = c.line(preceded("The Winner gets ", restOfLine));
  return { kind: "PrizeMatch", game, itemName };
}

export function buildPrizeMatch(b: RecordBuilder, d: PrizeMatchData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription("Prize Match!");
  b.pushDescription(`The Winner gets ${d.itemName}`);
  return EventType.PrizeMatch;
}

const SOLAR_PANELS_ABSORB = "The Solar Panels absorb Sun 2's energy!";

export function parseSolarPanelsActivation(c: ParseCursor): SolarPanelsActivationData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  c.expectLine(SOLAR_PANELS_ABSORB);
  const [runs, teamName] = c.line(
    pair(
      terminated(canonicalNumber, " Runs are collected and saved for the "),
      lineEndingWith("'s next game."),
    ),
  );
  return { kind: "SolarPanelsActivation", game, runs, teamName };
}

export function buildSolarPanelsActivation(b: RecordBuilder, d: SolarPanelsActivationData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(SOLAR_PANELS_ABSORB);
  b.pushDescription(`${d.runs} Runs are collected and saved for the ${d.teamName}'s next game.`);
  return EventType.SolarPanelsActivation;
}

function runsGained(runs: number): string {
  if (runs === -1) {
    return "1 Unrun";
  }
  if (runs === 1) {
    return "1 Run";
  }
  return runs < 0 ? `${-runs} Unruns` : `${runs} Runs`;
}

const runsGainedText: Parser<number> = map(
  pair(canonicalNumber, oneOf([
    [" Unruns", -1],
    [" Unrun", -1],
    [" Runs", 1],
    [" Run", 1],
  ])),
  ([amount, sign]) => amount * sign,
);

export function parseRunsOverflowing(c: ParseCursor): RunsOverflowingData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  c.expectLine("Runs are Overflowing!");
  const [teamName, amount] = c.line(pair(takeUntil(" gain "), lineEndingWith(".")));
  const parsed = runsGainedText(amount);
  if (!parsed.ok || runsGained(parsed.value) !== amount) {
    return c.fail({ kind: "DescriptionMismatch", expected: "a number of Runs or Unruns", found: amount });
  }
  return { kind: "RunsOverflowing", game, teamName, runs: parsed.value };
}

export function buildRunsOverflowing(b: RecordBuilder, d: RunsOverflowingData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription("Runs are Overflowing!");
  b.pushDescription(`${d.teamName} gain ${runsGained(d.runs)}.`);
  return EventType.RunsOverflowing;
}

// ---------------------------------------------------------------------------
// Secret base
// ---------------------------------------------------------------------------

export function parseEnterSecretBase(c: ParseCursor): EnterSecretBaseData {
  const game = parseGame(c, { attractor: false });
  c.expectCategory(EventCategory.Special);
  const playerName = c.line(lineEndingWith(" enters the Secret Base..."));
  return { kind: "EnterSecretBase", game, playerName, playerId: c.nextPlayerId() };
}

export function buildEnterSecretBase(b: RecordBuilder, d: EnterSecretBaseData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(`${d.playerName} enters the Secret Base...`);
  b.pushPlayerTag(d.playerId);
  return EventType.EnterSecretBase;
}

export function parseExitSecretBase(c: ParseCursor): ExitSecretBaseData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const playerName = c.line(lineEndingWith(" exits the Secret Base to Second Base!"));
  return { kind: "ExitSecretBase", game, playerName, playerId: c.nextPlayerId() };
}

export function buildExitSecretBase(b: RecordBuilder, d: ExitSecretBaseData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(`${d.playerName} exits the Secret Base to Second Base!`);
  b.pushPlayerTag(d.playerId);
  return EventType.ExitSecretBase;
}

// ---------------------------------------------------------------------------
// Performing toggles and parties
// ---------------------------------------------------------------------------

function superyummyText(playerName: string, peanutsPresent: boolean): string {
  return `${playerName} ${peanutsPresent ? "loves" : "misses"} Peanuts.`;
}

export function parseSuperyummy(c: ParseCursor): SuperyummyData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const [playerName, peanutsPresent] = c.line(
    alt(
      map(lineEndingWith(" loves Peanuts."), (name): [string, boolean] => [name, true]),
      map(lineEndingWith(" misses Peanuts."), (name): [string, boolean] => [name, false]),
    ),
  );
  const toggle =
    c.peekChild() === undefined
      ? null
      : parsePerformingToggle(c, playerName, superyummyText(playerName, peanutsPresent), "SUPERYUMMY");
  return { kind: "Superyummy", game, playerName, peanutsPresent, toggle };
}

export function buildSuperyummy(b: RecordBuilder, d: SuperyummyData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  const text = superyummyText(d.playerName, d.peanutsPresent);
  b.pushDescription(text);
  if (d.toggle) {
    buildPerformingToggle(b, d.toggle, text, "SUPERYUMMY");
  }
  return EventType.Superyummy;
}

function homebodyText(toggle: Pick<PerformingToggle, "playerName" | "isOverperforming">): string {
  return `${toggle.playerName} is ${toggle.isOverperforming ? "happy to be home" : "homesick"}.`;
}

const homebodyLine: Parser<[string, boolean]> = alt(
  map(lineEndingWith(" is happy to be home."), (name): [string, boolean] => [name, true]),
  map(lineEndingWith(" is homesick."), (name): [string, boolean] => [name, false]),
);

export function parseHomebody(c: ParseCursor): HomebodyData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const lines = [c.line(homebodyLine)];
  for (let next = c.tryLine(homebodyLine); next !== null; next = c.tryLine(homebodyLine)) {
    lines.push(next);
  }
  const toggles = lines.map(([playerName, isOverperforming]) => {
    const toggle = parsePerformingToggle(
      c,
      playerName,
      homebodyText({ playerName, isOverperforming }),
      "HOMEBODY",
    );
    if (toggle.isOverperforming !== isOverperforming) {
      c.fail({ kind: "UnexpectedMetadataValue", field: "mod", value: JSON.stringify(toggle.isOverperforming) });
    }
    return toggle;
  });
  return { kind: "Homebody", game, toggles };
}

export function buildHomebody(b: RecordBuilder, d: HomebodyData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  for (const toggle of d.toggles) {
    b.pushDescription(homebodyText(toggle));
  }
  for (const toggle of d.toggles) {
    buildPerformingToggle(b, toggle, homebodyText(toggle), "HOMEBODY");
  }
  return EventType.Homebody;
}

function partySpec(playerName: string): StatChildSpec {
  return {
    type: EventType.PlayerStatIncrease,
    description: `${playerName} is Partying!`,
    attrCategory: AttrCategory.Overall,
  };
}

export function parseParty(c: ParseCursor): PartyData {
  const game = parseGame(c);
  const playerName = c.line(lineEndingWith(" is Partying!"));
  const playerId = c.nextPlayerId();
  const change = parseStatChild(c, playerName, partySpec(playerName));
  sameTag(c, "player", playerId, change.playerId);
  return { kind: "Party", game, change };
}

export function buildParty(b: RecordBuilder, d: PartyData): EventType {
  buildGame(b, d.game);
  b.pushDescription(`${d.change.playerName} is Partying!`);
  b.pushPlayerTag(d.change.playerId);
  buildStatChild(b, d.change, partySpec(d.change.playerName));
  return EventType.Party;
}
