import { EventCategory, EventType, ModDuration, specialIf } from "../../contract/eventTypes.js";
import type {
  HitType,
  HomeRunType,
  ItemDamage,
  Magmatic,
  ModChange,
  PlayerNameId,
  Scores,
  StrikeoutType,
} from "../../model/descriptors.js";
import type {
  AmbushedByCrowsData,
  BallData,
  BatterSkippedData,
  CaughtStealingData,
  CharmStrikeoutData,
  CharmWalkData,
  DoublePlayData,
  FieldersChoiceData,
  FlyoutData,
  FoulBallData,
  GroundOutData,
  HitByPitchData,
  HitData,
  HomeRunData,
  MildPitchData,
  MildPitchWalkData,
  MindTrickStrikeoutData,
  MindTrickWalkData,
  StolenBaseData,
  StrikeFlinchingData,
  StrikeLookingData,
  StrikeoutLookingData,
  StrikeoutSwingingData,
  StrikeSwingingData,
  WalkData,
} from "../../model/occurrence.js";
import type { RecordBuilder } from "../builder.js";
import {
  alt,
  lineEndingWith,
  map,
  oneOf,
  pair,
  preceded,
  takeUntil,
  terminated,
  wholeNumber,
  type Parser,
} from "../combinators.js";
import type { ParseCursor } from "../cursor.js";
import {
  base,
  buildCooledOff,
  buildFreeRefill,
  buildFreeRefills,
  buildGame,
  buildItemDamages,
  buildMagmaticChild,
  buildScorers,
  buildScores,
  buildSpicy,
  buildStoppedInhabiting,
  canonicalNumber,
  isMagmaticChild,
  parseCooledOff,
  parseFreeRefill,
  parseFreeRefills,
  parseGame,
  parseItemDamages,
  parseMagmaticChild,
  parseMagmaticLine,
  parseScorers,
  parseScores,
  parseSpicy,
  parseStoppedInhabiting,
  sameName,
} from "../fragments.js";

const SCORES = "scores!";
const TAGS_UP = "tags up and scores!";
const SACRIFICE = "advances on the sacrifice.";

const count: Parser<[number, number]> = pair(canonicalNumber, preceded("-", canonicalNumber));

// ---------------------------------------------------------------------------
// Pitches
// ---------------------------------------------------------------------------

export function parseBall(c: ParseCursor): BallData {
  const game = parseGame(c);
  const [balls, strikes] = c.line(preceded("Ball. ", count));
  const itemDamages = parseItemDamages(c);
  return { kind: "Ball", game, balls, strikes, itemDamages };
}

export function buildBall(b: RecordBuilder, d: BallData): EventType {
  buildGame(b, d.game);
  b.pushDescription(`Ball. ${d.balls}-${d.strikes}`);
  buildItemDamages(b, d.itemDamages);
  return EventType.Ball;
}

type StrikeStyle = "swinging" | "looking" | "flinching";
type StrikeData = StrikeSwingingData | StrikeLookingData | StrikeFlinchingData;

const strikeLine = pair(
  preceded(
    "Strike, ",
    oneOf<StrikeStyle>([
      ["swinging", "swinging"],
      ["looking", "looking"],
      ["flinching", "flinching"],
    ]),
  ),
  preceded(". ", count),
);

/** The three Strike records share one discriminant and one sentence shape. */
export function parseStrike(c: ParseCursor): StrikeData {
  const game = parseGame(c);
  const [style, [balls, strikes]] = c.line(strikeLine);
  const itemDamages = parseItemDamages(c);
  switch (style) {
    case "swinging":
      return { kind: "StrikeSwinging", game, balls, strikes, itemDamages };
    case "looking":
      return { kind: "StrikeLooking", game, balls, strikes, itemDamages };
    case "flinching":
      return { kind: "StrikeFlinching", game, balls, strikes, itemDamages };
  }
}

const STRIKE_STYLE: Record<StrikeData["kind"], StrikeStyle> = {
  StrikeSwinging: "swinging",
  StrikeLooking: "looking",
  StrikeFlinching: "flinching",
};

export function buildStrike(b: RecordBuilder, d: StrikeData): EventType {
  buildGame(b, d.game);
  b.pushDescription(`Strike, ${STRIKE_STYLE[d.kind]}. ${d.balls}-${d.strikes}`);
  buildItemDamages(b, d.itemDamages);
  return EventType.Strike;
}

/** From season index 19 on, the text carries a stray leading space. */
function foulBallText(season: number): string {
  return season < 19 ? "Foul Ball" : " Foul Ball";
}

export function parseFoulBall(c: ParseCursor): FoulBallData {
  const game = parseGame(c);
  const [balls, strikes] = c.line(preceded(`${foulBallText(c.season)}. `, count));
  const itemDamages = parseItemDamages(c);
  return { kind: "FoulBall", game, balls, strikes, itemDamages };
}

export function buildFoulBall(b: RecordBuilder, d: FoulBallData): EventType {
  buildGame(b, d.game);
  b.pushDescription(`${foulBallText(b.season)}. ${d.balls}-${d.strikes}`);
  buildItemDamages(b, d.itemDamages);
  return EventType.FoulBall;
}

// ---------------------------------------------------------------------------
// Outs in the field
// ---------------------------------------------------------------------------

export function parseFlyout(c: ParseCursor): FlyoutData {
  const game = parseGame(c);
  const isSpecial = c.specialFlag();
  const [batterName, fielderName] = c.line(pair(takeUntil(" hit a flyout to "), lineEndingWith(".")));
  const itemDamages = parseItemDamages(c, TAGS_UP);
  const scores = parseScores(c, TAGS_UP);
  const stoppedInhabiting = parseStoppedInhabiting(c);
  const cooledOff = parseCooledOff(c, batterName);
  return {
    kind: "Flyout",
    game,
    batterName,
    fielderName,
    itemDamages,
    scores,
    stoppedInhabiting,
    cooledOff,
    isSpecial,
  };
}

export function buildFlyout(b: RecordBuilder, d: FlyoutData): EventType {
  buildGame(b, d.game);
  b.setCategory(specialIf(d.isSpecial));
  b.pushDescription(`${d.batterName} hit a flyout to ${d.fielderName}.`);
  buildItemDamages(b, d.itemDamages);
  buildScores(b, d.scores, TAGS_UP);
  buildStoppedInhabiting(b, d.stoppedInhabiting);
  buildCooledOff(b, d.cooledOff, d.batterName);
  return EventType.FlyOut;
}

/** Before season 18 the sacrifice scores came ahead of the item damage lines. */
function scoresFirst(season: number): boolean {
  return season < 18;
}

export function parseGroundOut(c: ParseCursor): GroundOutData {
  const game = parseGame(c);
  const isSpecial = c.specialFlag();
  const [batterName, fielderName] = c.line(pair(takeUntil(" hit a ground out to "), lineEndingWith(".")));
  let itemDamages: ItemDamage[];
  let scores: Scores;
  if (scoresFirst(c.season)) {
    scores = parseScores(c, SACRIFICE);
    itemDamages = parseItemDamages(c);
  } else {
    itemDamages = parseItemDamages(c, SACRIFICE);
    scores = parseScores(c, SACRIFICE);
  }
  const stoppedInhabiting = parseStoppedInhabiting(c);
  const cooledOff = parseCooledOff(c, batterName);
  return {
    kind: "GroundOut",
    game,
    batterName,
    fielderName,
    itemDamages,
    scores,
    stoppedInhabiting,
    cooledOff,
    isSpecial,
  };
}

export function buildGroundOut(b: RecordBuilder, d: GroundOutData): EventType {
  buildGame(b, d.game);
  b.setCategory(specialIf(d.isSpecial));
  b.pushDescription(`${d.batterName} hit a ground out to ${d.fielderName}.`);
  if (scoresFirst(b.season)) {
    buildScores(b, d.scores, SACRIFICE);
    buildItemDamages(b, d.itemDamages);
  } else {
    buildItemDamages(b, d.itemDamages);
    buildScores(b, d.scores, SACRIFICE);
  }
  buildStoppedInhabiting(b, d.stoppedInhabiting);
  buildCooledOff(b, d.cooledOff, d.batterName);
  return EventType.GroundOut;
}

export function parseFieldersChoice(c: ParseCursor): FieldersChoiceData {
  const game = parseGame(c);
  const isSpecial = c.specialFlag();
  const [runnerOutName, outAtBase] = c.line(pair(takeUntil(" out at "), terminated(base, " base.")));
  const stoppedInhabiting = parseStoppedInhabiting(c);
  const scorers = parseScorers(c, SCORES);
  const itemDamages = parseItemDamages(c);
  const batterName = c.line(lineEndingWith(" reaches on fielder's choice."));
  const freeRefills = parseFreeRefills(c);
  const cooledOff = parseCooledOff(c, batterName);
  return {
    kind: "FieldersChoice",
    game,
    batterName,
    runnerOutName,
    outAtBase,
    scorers,
    itemDamages,
    freeRefills,
    stoppedInhabiting,
    cooledOff,
    isSpecial,
  };
}

export function buildFieldersChoice(b: RecordBuilder, d: FieldersChoiceData): EventType {
  buildGame(b, d.game);
  b.setCategory(specialIf(d.isSpecial));
  b.pushDescription(`${d.runnerOutName} out at ${d.outAtBase} base.`);
  buildStoppedInhabiting(b, d.stoppedInhabiting);
  buildScorers(b, d.scorers, SCORES);
  buildItemDamages(b, d.itemDamages);
  b.pushDescription(`${d.batterName} reaches on fielder's choice.`);
  buildFreeRefills(b, d.freeRefills);
  buildCooledOff(b, d.cooledOff, d.batterName);
  return EventType.GroundOut;
}

export function parseDoublePlay(c: ParseCursor): DoublePlayData {
  const game = parseGame(c);
  const isSpecial = c.specialFlag();
  const batterName = c.line(lineEndingWith(" hit into a double play!"));
  const scores = parseScores(c, SCORES);
  const stoppedInhabiting = parseStoppedInhabiting(c);
  const cooledOff = parseCooledOff(c, batterName);
  return { kind: "DoublePlay", game, batterName, scores, stoppedInhabiting, cooledOff, isSpecial };
}

export function buildDoublePlay(b: RecordBuilder, d: DoublePlayData): EventType {
  buildGame(b, d.game);
  b.setCategory(specialIf(d.isSpecial));
  b.pushDescription(`${d.batterName} hit into a double play!`);
  buildScores(b, d.scores, SCORES);
  buildStoppedInhabiting(b, d.stoppedInhabiting);
  buildCooledOff(b, d.cooledOff, d.batterName);
  return EventType.GroundOut;
}

// ---------------------------------------------------------------------------
// Hits
// ---------------------------------------------------------------------------

const hitLine = pair(
  takeUntil(" hits a "),
  terminated(
    oneOf<HitType>([
      ["Single", "Single"],
      ["Double", "Double"],
      ["Triple", "Triple"],
      ["Quadruple", "Quadruple"],
    ]),
    "!",
  ),
);

export function parseHit(c: ParseCursor): HitData {
  const game = parseGame(c);
  const isSpecial = c.specialFlag();
  const itemDamages = parseItemDamages(c);
  const [batterName, hitType] = c.line(hitLine);
  const batterId = c.nextPlayerId();
  const stoppedInhabiting = parseStoppedInhabiting(c);
  const scores = parseScores(c, SCORES);
  const spicy = parseSpicy(c, batterName, batterId);
  const trailingItemDamages = parseItemDamages(c);
  return {
    kind: "Hit",
    game,
    batterName,
    batterId,
    hitType,
    itemDamages,
    stoppedInhabiting,
    scores,
    spicy,
    trailingItemDamages,
    isSpecial,
  };
}

export function buildHit(b: RecordBuilder, d: HitData): EventType {
  buildGame(b, d.game);
  b.setCategory(specialIf(d.isSpecial));
  buildItemDamages(b, d.itemDamages);
  b.pushDescription(`${d.batterName} hits a ${d.hitType}!`);
  b.pushPlayerTag(d.batterId);
  buildStoppedInhabiting(b, d.stoppedInhabiting);
  buildScores(b, d.scores, SCORES);
  buildSpicy(b, d.spicy, d.batterName, d.batterId);
  buildItemDamages(b, d.trailingItemDamages);
  return EventType.Hit;
}

const homeRunLine = pair(
  takeUntil(" hits a "),
  terminated(
    oneOf<HomeRunType>([
      ["solo home run", "solo home run"],
      ["2-run home run", "2-run home run"],
      ["3-run home run", "3-run home run"],
      ["grand slam", "grand slam"],
    ]),
    "!",
  ),
);

const BIG_BUCKET = "The ball lands in a Big Bucket. An extra Run scores!";

export function parseHomeRun(c: ParseCursor): HomeRunData {
  const game = parseGame(c);
  const isSpecial = c.specialFlag();
  const itemDamages = parseItemDamages(c);
  const magmaticName = parseMagmaticLine(c);
  const [batterName, homeRunType] = c.line(homeRunLine);
  const batterId = c.nextPlayerId();

  // The Magmatic removal child is filed either right here or after the free refills.
  let magmaticChange: ModChange | null = null;
  if (magmaticName !== null) {
    sameName(c, batterName, magmaticName);
    if (isMagmaticChild(c.peekChild())) {
      magmaticChange = parseMagmaticChild(c, batterName, batterId);
    }
  }

  const bigBucket = c.tryExpectLine(BIG_BUCKET);
  const stoppedInhabiting = parseStoppedInhabiting(c);
  const freeRefills = parseFreeRefills(c);

  let magmatic: Magmatic | null = null;
  if (magmaticName !== null) {
    magmatic = magmaticChange
      ? { change: magmaticChange, childAfterFreeRefills: false }
      : { change: parseMagmaticChild(c, batterName, batterId), childAfterFreeRefills: true };
  }

  const spicy = parseSpicy(c, batterName, batterId);
  return {
    kind: "HomeRun",
    game,
    batterName,
    batterId,
    homeRunType,
    itemDamages,
    magmatic,
    bigBucket,
    stoppedInhabiting,
    freeRefills,
    spicy,
    isSpecial,
  };
}

export function buildHomeRun(b: RecordBuilder, d: HomeRunData): EventType {
  buildGame(b, d.game);
  b.setCategory(specialIf(d.isSpecial));
  buildItemDamages(b, d.itemDamages);
  const magmatic = d.magmatic;
  if (magmatic) {
    b.pushDescription(`${d.batterName} is Magmatic!`);
  }
  b.pushDescription(`${d.batterName} hits a ${d.homeRunType}!`);
  b.pushPlayerTag(d.batterId);
  if (magmatic && !magmatic.childAfterFreeRefills) {
    buildMagmaticChild(b, magmatic, d.batterName, d.batterId);
  }
  if (d.bigBucket) {
    b.pushDescription(BIG_BUCKET);
  }
  buildStoppedInhabiting(b, d.stoppedInhabiting);
  buildFreeRefills(b, d.freeRefills);
  if (magmatic && magmatic.childAfterFreeRefills) {
    buildMagmaticChild(b, magmatic, d.batterName, d.batterId);
  }
  buildSpicy(b, d.spicy, d.batterName, d.batterId);
  return EventType.HomeRun;
}

// ---------------------------------------------------------------------------
// Baserunning
// ---------------------------------------------------------------------------

export function parseStolenBase(c: ParseCursor): StolenBaseData {
  const game = parseGame(c);
  const runnerId = c.nextPlayerId();
  const isSpecial = c.specialFlag();
  const [runnerName, stolen] = c.line(pair(takeUntil(" steals "), terminated(base, " base!")));
  const blaserunning = c.tryExpectLine(`${runnerName} scores with Blaserunning!`);
  if (blaserunning) {
    c.repeatedPlayerId(runnerId);
  }
  const freeRefill = parseFreeRefill(c);
  const itemDamages = parseItemDamages(c);
  return {
    kind: "StolenBase",
    game,
    runnerName,
    runnerId,
    base: stolen,
    blaserunning,
    freeRefill,
    itemDamages,
    isSpecial,
  };
}

export function buildStolenBase(b: RecordBuilder, d: StolenBaseData): EventType {
  buildGame(b, d.game);
  b.pushPlayerTag(d.runnerId);
  b.setCategory(specialIf(d.isSpecial));
  b.pushDescription(`${d.runnerName} steals ${d.base} base!`);
  if (d.blaserunning) {
    b.pushDescription(`${d.runnerName} scores with Blaserunning!`);
    b.pushPlayerTag(d.runnerId);
  }
  buildFreeRefill(b, d.freeRefill);
  buildItemDamages(b, d.itemDamages);
  return EventType.StolenBase;
}

export function parseCaughtStealing(c: ParseCursor): CaughtStealingData {
  const game = parseGame(c);
  const [runnerName, stolen] = c.line(
    pair(takeUntil(" gets caught stealing "), terminated(base, " base.")),
  );
  const itemDamages = parseItemDamages(c);
  return { kind: "CaughtStealing", game, runnerName, base: stolen, itemDamages };
}

export function buildCaughtStealing(b: RecordBuilder, d: CaughtStealingData): EventType {
  buildGame(b, d.game);
  b.pushDescription(`${d.runnerName} gets caught stealing ${d.base} base.`);
  buildItemDamages(b, d.itemDamages);
  return EventType.StolenBase;
}

// ---------------------------------------------------------------------------
// Strikeouts and walks
// ---------------------------------------------------------------------------

const strikeoutType: Parser<StrikeoutType> = oneOf<StrikeoutType>([
  ["swinging", "swinging"],
  ["looking", "looking"],
]);

const strikeoutLine = pair(takeUntil(" strikes out "), terminated(strikeoutType, "."));

type StrikeoutData = StrikeoutSwingingData | StrikeoutLookingData;

export function parseStrikeout(c: ParseCursor): StrikeoutData {
  const game = parseGame(c);
  const isSpecial = c.specialFlag();
  const [batterName, type] = c.line(strikeoutLine);
  const itemDamages = parseItemDamages(c);
  const stoppedInhabiting = parseStoppedInhabiting(c);
  const freeRefill = parseFreeRefill(c);
  const fields = { game, batterName, itemDamages, stoppedInhabiting, freeRefill, isSpecial };
  return type === "swinging"
    ? { kind: "StrikeoutSwinging", ...fields }
    : { kind: "StrikeoutLooking", ...fields };
}

export function buildStrikeout(b: RecordBuilder, d: StrikeoutData): EventType {
  buildGame(b, d.game);
  b.setCategory(specialIf(d.isSpecial));
  const type = d.kind === "StrikeoutSwinging" ? "swinging" : "looking";
  b.pushDescription(`${d.batterName} strikes out ${type}.`);
  buildItemDamages(b, d.itemDamages);
  buildStoppedInhabiting(b, d.stoppedInhabiting);
  buildFreeRefill(b, d.freeRefill);
  return EventType.Strikeout;
}

const baseInstinctsLine = preceded("Base Instincts take them directly to ", terminated(base, " base!"));

export function parseWalk(c: ParseCursor): WalkData {
  const game = parseGame(c);
  const isSpecial = c.specialFlag();
  const batterName = c.line(lineEndingWith(" draws a walk."));
  const baseInstincts = c.tryLine(baseInstinctsLine);
  const batterId = c.nextPlayerId();
  const itemDamages = parseItemDamages(c, SCORES);
  const scores = parseScores(c, SCORES);
  const stoppedInhabiting = parseStoppedInhabiting(c);
  return {
    kind: "Walk",
    game,
    batterName,
    batterId,
    baseInstincts,
    itemDamages,
    scores,
    stoppedInhabiting,
    isSpecial,
  };
}

export function buildWalk(b: RecordBuilder, d: WalkData): EventType {
  buildGame(b, d.game);
  b.setCategory(specialIf(d.isSpecial));
  b.pushDescription(`${d.batterName} draws a walk.`);
  if (d.baseInstincts !== null) {
    b.pushDescription(`Base Instincts take them directly to ${d.baseInstincts} base!`);
  }
  b.pushPlayerTag(d.batterId);
  buildItemDamages(b, d.itemDamages);
  buildScores(b, d.scores, SCORES);
  buildStoppedInhabiting(b, d.stoppedInhabiting);
  return EventType.Walk;
}

// ---------------------------------------------------------------------------
// Charms and mind tricks
// ---------------------------------------------------------------------------

export function parseCharmStrikeout(c: ParseCursor): CharmStrikeoutData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const [charmerName, charmedName] = c.line(pair(takeUntil(" charmed "), lineEndingWith("!")));
  const [swingerName, numSwings] = c.line(
    pair(takeUntil(" swings "), terminated(wholeNumber, " times to strike out willingly!")),
  );
  sameName(c, charmedName, swingerName);
  // The charmer is tagged twice.
  const charmerId = c.nextPlayerId();
  c.repeatedPlayerId(charmerId);
  const charmedId = c.nextPlayerId();
  const stoppedInhabiting = parseStoppedInhabiting(c);
  return {
    kind: "CharmStrikeout",
    game,
    charmerId,
    charmerName,
    charmedId,
    charmedName,
    numSwings,
    stoppedInhabiting,
  };
}

export function buildCharmStrikeout(b: RecordBuilder, d: CharmStrikeoutData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(`${d.charmerName} charmed ${d.charmedName}!`);
  b.pushDescription(`${d.charmedName} swings ${d.numSwings} times to strike out willingly!`);
  b.pushPlayerTag(d.charmerId);
  b.pushPlayerTag(d.charmerId);
  b.pushPlayerTag(d.charmedId);
  buildStoppedInhabiting(b, d.stoppedInhabiting);
  return EventType.Strikeout;
}

export function parseCharmWalk(c: ParseCursor): CharmWalkData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const itemDamages = parseItemDamages(c);
  const [batterName, pitcherName] = c.line(pair(takeUntil(" charms "), lineEndingWith("!")));
  c.expectLine(`${batterName} walks to first base.`);
  const batterId = c.nextPlayerId();
  c.repeatedPlayerId(batterId);
  const scores = parseScores(c, SCORES);
  return { kind: "CharmWalk", game, batterName, batterId, pitcherName, itemDamages, scores };
}

export function buildCharmWalk(b: RecordBuilder, d: CharmWalkData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  buildItemDamages(b, d.itemDamages);
  b.pushDescription(`${d.batterName} charms ${d.pitcherName}!`);
  b.pushDescription(`${d.batterName} walks to first base.`);
  b.pushPlayerTag(d.batterId);
  b.pushPlayerTag(d.batterId);
  buildScores(b, d.scores, SCORES);
  return EventType.Walk;
}

export function parseMildPitch(c: ParseCursor): MildPitchData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const pitcherName = c.line(lineEndingWith(" throws a Mild pitch!"));
  const [balls, strikes] = c.line(preceded("Ball, ", terminated(count, ".")));
  const runnersAdvance = c.tryExpectLine("Runners advance on the pathetic play!");
  const pitcherId = c.nextPlayerId();
  const scores = parseScores(c, SCORES);
  return { kind: "MildPitch", game, pitcherId, pitcherName, balls, strikes, runnersAdvance, scores };
}

export function buildMildPitch(b: RecordBuilder, d: MildPitchData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(`${d.pitcherName} throws a Mild pitch!`);
  b.pushDescription(`Ball, ${d.balls}-${d.strikes}.`);
  if (d.runnersAdvance) {
    b.pushDescription("Runners advance on the pathetic play!");
  }
  b.pushPlayerTag(d.pitcherId);
  buildScores(b, d.scores, SCORES);
  return EventType.MildPitch;
}

export function parseMildPitchWalk(c: ParseCursor): MildPitchWalkData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const pitcherName = c.line(lineEndingWith(" throws a Mild pitch!"));
  const batterName = c.line(lineEndingWith(" draws a walk."));
  const pitcherId = c.nextPlayerId();
  const batterId = c.nextPlayerId();
  const scores = parseScores(c, SCORES);
  return { kind: "MildPitchWalk", game, pitcherId, pitcherName, batterId, batterName, scores };
}

export function buildMildPitchWalk(b: RecordBuilder, d: MildPitchWalkData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(`${d.pitcherName} throws a Mild pitch!`);
  b.pushDescription(`${d.batterName} draws a walk.`);
  b.pushPlayerTag(d.pitcherId);
  b.pushPlayerTag(d.batterId);
  buildScores(b, d.scores, SCORES);
  return EventType.MildPitch;
}

export function parseMindTrickWalk(c: ParseCursor): MindTrickWalkData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const [batterName, strikeoutType] = c.line(strikeoutLine);
  c.expectLine(`${batterName} uses a Mind Trick!`);
  c.expectLine("The umpire sends them to first base.");
  const baseInstincts = c.tryLine(baseInstinctsLine);
  const scores = parseScores(c, SCORES);
  const batterId = c.nextPlayerId();
  return { kind: "MindTrickWalk", game, strikeoutType, batterId, batterName, baseInstincts, scores };
}

export function buildMindTrickWalk(b: RecordBuilder, d: MindTrickWalkData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(`${d.batterName} strikes out ${d.strikeoutType}.`);
  b.pushDescription(`${d.batterName} uses a Mind Trick!`);
  b.pushDescription("The umpire sends them to first base.");
  if (d.baseInstincts !== null) {
    b.pushDescription(`Base Instincts take them directly to ${d.baseInstincts} base!`);
  }
  buildScores(b, d.scores, SCORES);
  b.pushPlayerTag(d.batterId);
  return EventType.Walk;
}

/** Until season 18 day 94 a mind-trick strikeout was filed as a walk. */
export function mindTrickStrikeoutIsWalk(season: number, day: number): boolean {
  return season < 17 || (season === 17 && day < 93);
}

export function parseMindTrickStrikeout(c: ParseCursor): MindTrickStrikeoutData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  let walkId: string | null = null;
  let walkName: string | null = null;
  if (mindTrickStrikeoutIsWalk(c.season, c.day)) {
    walkName = c.line(lineEndingWith(" draws a walk."));
    walkId = c.nextPlayerId();
  }
  const pitcherName = c.line(lineEndingWith(" uses a Mind Trick!"));
  const batterName = c.line(lineEndingWith(" strikes out thinking."));
  if (walkName !== null) {
    sameName(c, batterName, walkName);
  }
  // The batter is tagged twice on the older records.
  let batterId: string;
  if (walkId === null) {
    batterId = c.nextPlayerId();
  } else {
    batterId = walkId;
    c.repeatedPlayerId(walkId);
  }
  return { kind: "MindTrickStrikeout", game, batterId, batterName, pitcherName };
}

export function buildMindTrickStrikeout(b: RecordBuilder, d: MindTrickStrikeoutData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  const isWalk = mindTrickStrikeoutIsWalk(b.season, b.day);
  if (isWalk) {
    b.pushDescription(`${d.batterName} draws a walk.`);
    b.pushPlayerTag(d.batterId);
  }
  b.pushDescription(`${d.pitcherName} uses a Mind Trick!`);
  b.pushDescription(`${d.batterName} strikes out thinking.`);
  b.pushPlayerTag(d.batterId);
  return isWalk ? EventType.Walk : EventType.Strikeout;
}

// ---------------------------------------------------------------------------
// Other plate appearances
// ---------------------------------------------------------------------------

export function parseHitByPitch(c: ParseCursor): HitByPitchData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const [pitcherName, batterName] = c.line(pair(takeUntil(" hits "), lineEndingWith(" with a pitch!")));
  const observed = `${batterName} is now being Observed...`;
  c.expectLine(observed);
  const pitcherId = c.nextPlayerId();
  const batterId = c.nextPlayerId();
  const scores = parseScores(c, SCORES);
  const { sub, batterTeamId } = c.child(EventType.AddedMod, (child) => {
    child.expectLine(observed);
    child.repeatedPlayerId(batterId);
    const teamId = child.nextTeamId();
    child.expectMetadata("mod", "COFFEE_PERIL");
    child.expectMetadata("type", ModDuration.Weekly);
    return { sub: child.subEvent(), batterTeamId: teamId };
  });
  return {
    kind: "HitByPitch",
    game,
    pitcherId,
    pitcherName,
    batterId,
    batterName,
    batterTeamId,
    sub,
    scores,
  };
}

export function buildHitByPitch(b: RecordBuilder, d: HitByPitchData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  const observed = `${d.batterName} is now being Observed...`;
  b.pushDescription(`${d.pitcherName} hits ${d.batterName} with a pitch!`);
  b.pushDescription(observed);
  b.pushPlayerTag(d.pitcherId);
  b.pushPlayerTag(d.batterId);
  buildScores(b, d.scores, SCORES);
  b.pushChild(d.sub, EventType.AddedMod, (child) => {
    child.pushDescription(observed);
    child.pushPlayerTag(d.batterId);
    child.pushTeamTag(d.batterTeamId);
    child.setMetadata("mod", "COFFEE_PERIL");
    child.setMetadata("type", ModDuration.Weekly);
  });
  return EventType.HitByPitch;
}

const CROWS_RETREAT = "They run to safety, resulting in an out.";

export function parseAmbushedByCrows(c: ParseCursor): AmbushedByCrowsData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const friendName = c.tryLine(lineEndingWith(" calls upon their Friends!"));
  const batterName = c.line(preceded("A murder of Crows ambush ", lineEndingWith("!")));
  c.expectLine(CROWS_RETREAT);
  let friendOfCrows: PlayerNameId | null = null;
  if (friendName !== null) {
    friendOfCrows = { playerName: friendName, playerId: c.nextPlayerId() };
  }
  const batterId = c.nextPlayerId();
  return { kind: "AmbushedByCrows", game, batterId, batterName, friendOfCrows };
}

export function buildAmbushedByCrows(b: RecordBuilder, d: AmbushedByCrowsData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  if (d.friendOfCrows) {
    b.pushDescription(`${d.friendOfCrows.playerName} calls upon their Friends!`);
  }
  b.pushDescription(`A murder of Crows ambush ${d.batterName}!`);
  b.pushDescription(CROWS_RETREAT);
  if (d.friendOfCrows) {
    b.pushPlayerTag(d.friendOfCrows.playerId);
  }
  b.pushPlayerTag(d.batterId);
  return EventType.AmbushedByCrows;
}

const skippedLine: Parser<[string, boolean]> = alt(
  map(lineEndingWith(" is Shelled and cannot escape!"), (name): [string, boolean] => [name, false]),
  map(lineEndingWith(" is Elsewhere.."), (name): [string, boolean] => [name, true]),
);

export function parseBatterSkipped(c: ParseCursor): BatterSkippedData {
  const game = parseGame(c);
  const [batterName, elsewhere] = c.line(skippedLine);
  // Only Elsewhere batters are tagged.
  const reason: BatterSkippedData["reason"] = elsewhere
    ? { type: "elsewhere", batterId: c.nextPlayerId() }
    : { type: "shelled" };
  return { kind: "BatterSkipped", game, batterName, reason };
}

export function buildBatterSkipped(b: RecordBuilder, d: BatterSkippedData): EventType {
  buildGame(b, d.game);
  if (d.reason.type === "elsewhere") {
    b.pushDescription(`${d.batterName} is Elsewhere..`);
    b.pushPlayerTag(d.reason.batterId);
  } else {
    b.pushDescription(`${d.batterName} is Shelled and cannot escape!`);
  }
  return EventType.BatterSkipped;
}
