import { z } from "zod";
import {
  AttrCategory,
  EventCategory,
  EventType,
  ModDuration,
  Weather,
  specialIf,
} from "../../contract/eventTypes.js";
import type {
  CoffeeBeanMod,
  ItemRepaired,
  ModChange,
  ModChangeWithNamedPlayer,
  ModChangeWithPlayer,
  PlayerNameId,
  PlayerStatChange,
  SentElsewhere,
  StatCategory,
  SubEventRef,
} from "../../model/descriptors.js";
import type {
  AllergicReactionData,
  BecameMagmaticData,
  BecomeTripleThreatData,
  BestowReverberatingData,
  BirdsUnshellData,
  BlackHoleData,
  BlooddrainAction,
  BlooddrainBlockedData,
  BlooddrainData,
  CoffeeBeanData,
  CommunityChestGameMessageData,
  DonatedShameAppliedData,
  EchoReceiverData,
  ElsewhereReturn,
  FeedbackBlockedData,
  FeedbackData,
  FeedbackPlayer,
  FireproofIncinerationData,
  FloodingEffect,
  FloodingSweptData,
  GainFreeRefillData,
  GlitterCrateData,
  HighPressureData,
  IncinerationData,
  OverUnderData,
  PeanutMisterData,
  PerkUpData,
  PolarityShiftData,
  Recongealed,
  ReturnFromElsewhereData,
  ReverbData,
  ReverbType,
  SalmonSwimData,
  SmithyData,
  SpecialBlooddrainData,
  Sun2Data,
  SuperallergicReactionData,
  TasteTheInfiniteData,
  TeamRunsLost,
  TimeElsewhere,
  UnderOverData,
  UnderseaData,
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
  takeUntil,
  terminated,
  wholeNumber,
  type Parser,
} from "../combinators.js";
import type { ParseCursor } from "../cursor.js";
import {
  Int,
  Str,
  buildFreeRefills,
  buildGainedItem,
  buildGame,
  buildGravity,
  buildItemRepairedChild,
  buildMaintenanceMode,
  buildPlayerModChild,
  buildSentElsewhere,
  buildStatChild,
  buildTeamModChild,
  canonicalNumber,
  gainedItemLine,
  gainedItemText,
  hasMod,
  parseFreeRefills,
  parseGainedItem,
  parseGame,
  parseGravity,
  parseItemRepairedChild,
  parseMaintenanceMode,
  parsePlayerModChild,
  parseSentElsewhere,
  parseStatChild,
  parseTeamModChild,
  sameName,
  sameTag,
  type ModChildSpec,
  type StatChildSpec,
} from "../fragments.js";

// ---------------------------------------------------------------------------
// Coffee
// ---------------------------------------------------------------------------

const CoffeeBeanModSchema = z.enum(["WIRED", "TIRED"]);

const COFFEE_CHANGES: ReadonlyArray<readonly [string, readonly [boolean, CoffeeBeanMod]]> = [
  ["is Wired!", [true, "WIRED"]],
  ["is Tired.", [true, "TIRED"]],
  ["is no longer Wired.", [false, "WIRED"]],
  ["is no longer Tired!", [false, "TIRED"]],
];

function coffeeChangeText(playerName: string, gained: boolean, mod: CoffeeBeanMod): string {
  const entry = COFFEE_CHANGES.find(([, [g, m]]) => g === gained && m === mod);
  return `${playerName} ${entry ? entry[0] : ""}`;
}

const beanedLine = pair(
  pair(takeUntil(" is Beaned by a "), takeUntil(" roast with ")),
  lineEndingWith("."),
);

function coffeeChildType(swapped: boolean, gained: boolean): number {
  if (swapped) {
    return EventType.ModChange;
  }
  return gained ? EventType.AddedMod : EventType.RemovedMod;
}

export function parseCoffeeBean(c: ParseCursor): CoffeeBeanData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const [[playerName, roast], notes] = c.line(beanedLine);
  const [gainedMod, whichMod] = c.line(preceded(`${playerName} `, oneOf(COFFEE_CHANGES)));
  const playerId = c.nextPlayerId();
  const hasPrevious = c.peekChild()?.type === EventType.ModChange;
  const { sub, teamId, previousMod } = c.child(coffeeChildType(hasPrevious, gainedMod), (child) => {
    child.expectLine(coffeeChangeText(playerName, gainedMod, whichMod));
    child.repeatedPlayerId(playerId);
    const teamId = child.nextTeamIdOpt();
    let previousMod: CoffeeBeanMod | null = null;
    if (hasPrevious) {
      previousMod = child.metadata("from", CoffeeBeanModSchema);
      child.expectMetadata("to", whichMod);
    } else {
      child.expectMetadata("mod", whichMod);
    }
    child.expectMetadata("type", ModDuration.Game);
    return { sub: child.subEvent(), teamId, previousMod };
  });
  return {
    kind: "CoffeeBean",
    game,
    playerId,
    playerName,
    roast,
    notes,
    whichMod,
    gainedMod,
    previousMod,
    sub,
    teamId,
  };
}

export function buildCoffeeBean(b: RecordBuilder, d: CoffeeBeanData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  const change = coffeeChangeText(d.playerName, d.gainedMod, d.whichMod);
  b.pushDescription(`${d.playerName} is Beaned by a ${d.roast} roast with ${d.notes}.`);
  b.pushDescription(change);
  b.pushPlayerTag(d.playerId);
  b.pushChild(d.sub, coffeeChildType(d.previousMod !== null, d.gainedMod), (child) => {
    child.pushDescription(change);
    child.pushPlayerTag(d.playerId);
    child.pushTeamTag(d.teamId);
    if (d.previousMod !== null) {
      child.setMetadata("from", d.previousMod);
      child.setMetadata("to", d.whichMod);
    } else {
      child.setMetadata("mod", d.whichMod);
    }
    child.setMetadata("type", ModDuration.Game);
  });
  return EventType.CoffeeBean;
}

const pouredOverLine = pair(
  pair(takeUntil(" is Poured Over with a "), takeUntil(" roast blending ")),
  pair(takeUntil(" and "), lineEndingWith("!")),
);

export function parseGainFreeRefill(c: ParseCursor): GainFreeRefillData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const [[playerName, roast], [ingredient1, ingredient2]] = c.line(pouredOverLine);
  const text = `${playerName} got a Free Refill.`;
  c.expectLine(text);
  const playerId = c.nextPlayerId();
  const { sub, teamId } = c.child(EventType.AddedMod, (child) => {
    child.expectLine(text);
    child.repeatedPlayerId(playerId);
    const teamId = child.nextTeamIdOpt();
    child.expectMetadata("mod", "COFFEE_RALLY");
    child.expectMetadata("type", ModDuration.Permanent);
    return { sub: child.subEvent(), teamId };
  });
  return {
    kind: "GainFreeRefill",
    game,
    playerId,
    playerName,
    roast,
    ingredient1,
    ingredient2,
    sub,
    teamId,
  };
}

export function buildGainFreeRefill(b: RecordBuilder, d: GainFreeRefillData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  const text = `${d.playerName} got a Free Refill.`;
  b.pushDescription(
    `${d.playerName} is Poured Over with a ${d.roast} roast blending ${d.ingredient1} and ${d.ingredient2}!`,
  );
  b.pushDescription(text);
  b.pushPlayerTag(d.playerId);
  b.pushChild(d.sub, EventType.AddedMod, (child) => {
    child.pushDescription(text);
    child.pushPlayerTag(d.playerId);
    child.pushTeamTag(d.teamId);
    child.setMetadata("mod", "COFFEE_RALLY");
    child.setMetadata("type", ModDuration.Permanent);
  });
  return EventType.GainFreeRefill;
}

function tripleThreatSpec(playerName: string): ModChildSpec {
  return {
    type: EventType.AddedMod,
    description: `${playerName} is a Triple Threat.`,
    mod: "TRIPLE_THREAT",
  };
}

const chugLine: Parser<string[]> = alt(
  map(pair(takeUntil(" and "), lineEndingWith(" chug a Third Wave of Coffee!")), ([a, b]) => [a, b]),
  map(lineEndingWith(" chugs a Third Wave of Coffee!"), (a) => [a]),
);

function tripleThreatSummary(count: number): string {
  return count === 2 ? "They are now Triple Threats!" : "They are now a Triple Threat!";
}

export function parseBecomeTripleThreat(c: ParseCursor): BecomeTripleThreatData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const names = c.line(chugLine);
  c.expectLine(tripleThreatSummary(names.length));
  const tagged = names.map((playerName): PlayerNameId => ({ playerName, playerId: c.nextPlayerId() }));
  const pitchers = tagged.map(({ playerName, playerId }): ModChangeWithNamedPlayer => {
    const change = parsePlayerModChild(c, tripleThreatSpec(playerName));
    sameTag(c, "player", playerId, change.playerId);
    return { ...change, playerName };
  });
  return { kind: "BecomeTripleThreat", game, pitchers };
}

export function buildBecomeTripleThreat(b: RecordBuilder, d: BecomeTripleThreatData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  const [first, second] = d.pitchers;
  const chug = second
    ? `${first?.playerName ?? ""} and ${second.playerName} chug a Third Wave of Coffee!`
    : `${first?.playerName ?? ""} chugs a Third Wave of Coffee!`;
  b.pushDescription(chug);
  b.pushDescription(tripleThreatSummary(d.pitchers.length));
  for (const pitcher of d.pitchers) {
    b.pushPlayerTag(pitcher.playerId);
  }
  for (const pitcher of d.pitchers) {
    buildPlayerModChild(b, pitcher, tripleThreatSpec(pitcher.playerName));
  }
  return EventType.BecomeTripleThreat;
}

// ---------------------------------------------------------------------------
// Blooddrain
// ---------------------------------------------------------------------------

const GURGLED = "The Blooddrain gurgled!";
const SIPHON_SUFFIX = "'s Siphon activates!";

const STAT_CATEGORY_CODES: Record<StatCategory, number> = {
  hitting: AttrCategory.Hitting,
  pitching: AttrCategory.Pitching,
  defensive: AttrCategory.Defense,
  baserunning: AttrCategory.Baserunning,
};

const STAT_CATEGORIES: readonly StatCategory[] = ["hitting", "pitching", "defensive", "baserunning"];

/** `{sipped}'s {category} ability!` */
const siphonedAbility: Parser<[string, StatCategory]> = alt(
  ...STAT_CATEGORIES.map((category) =>
    map(lineEndingWith(`'s ${category} ability!`), (name): [string, StatCategory] => [name, category]),
  ),
);

const BLOODDRAIN_ACTIONS: ReadonlyArray<readonly [string, BlooddrainAction]> = [
  ["adds a Ball!", { action: "addBall" }],
  ["removes a Ball!", { action: "removeBall" }],
  ["adds a Strike!", { action: "addStrike", strikeoutBatterName: null }],
  ["removes a Strike!", { action: "removeStrike" }],
  ["adds a Out!", { action: "addOut" }],
  ["removes a Out!", { action: "removeOut" }],
];

function blooddrainActionLines(sipperName: string, action: BlooddrainAction): string[] {
  const entry = BLOODDRAIN_ACTIONS.find(([, known]) => known.action === action.action);
  const lines = [`${sipperName} ${entry ? entry[0] : ""}`];
  if (action.action === "addStrike" && action.strikeoutBatterName !== null) {
    lines.push(`${action.strikeoutBatterName} strikes out looking.`);
  }
  return lines;
}

function drainedSpec(
  sippedName: string,
  sipperName: string,
  category: StatCategory,
  recordedAsIncrease = false,
): StatChildSpec {
  return {
    type: recordedAsIncrease ? EventType.PlayerStatIncrease : EventType.PlayerStatDecrease,
    description: `${sippedName} had blood drained by ${sipperName}.`,
    attrCategory: STAT_CATEGORY_CODES[category],
  };
}

function drainerSpec(sipperName: string, sippedName: string, category: StatCategory): StatChildSpec {
  return {
    type: EventType.PlayerStatIncrease,
    description: `${sipperName} drained blood from ${sippedName}.`,
    attrCategory: STAT_CATEGORY_CODES[category],
  };
}

/**
 * Blooddrain and BlooddrainSiphon records. A siphon either raises the sipper's
 * rating like a plain drain or acts on the count instead.
 */
export function parseBlooddrain(c: ParseCursor): BlooddrainData | SpecialBlooddrainData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  c.expectLine(GURGLED);
  const siphonName = c.tryLine(lineEndingWith(SIPHON_SUFFIX));
  const isSiphon = siphonName !== null;
  if (isSiphon !== (c.type === EventType.BlooddrainSiphon)) {
    c.fail({
      kind: "DescriptionMismatch",
      expected: isSiphon ? "no Siphon line" : JSON.stringify(`X${SIPHON_SUFFIX}`),
      found: siphonName ?? "",
    });
  }
  const [sipperName, [sippedName, sippedCategory]] = c.line(
    pair(takeUntil(" siphoned some of "), siphonedAbility),
  );
  if (siphonName !== null) {
    sameName(c, siphonName, sipperName);
  }
  const sipperId = c.nextPlayerId();
  const sippedId = c.nextPlayerId();
  const sippedRecordedAsIncrease = !isSiphon && c.peekChild()?.type === EventType.PlayerStatIncrease;
  const sipped = parseStatChild(
    c,
    sippedName,
    drainedSpec(sippedName, sipperName, sippedCategory, sippedRecordedAsIncrease),
  );
  sameTag(c, "player", sippedId, sipped.playerId);
  const maintenanceMode = parseMaintenanceMode(c);

  if (c.tryExpectLine(`${sipperName} increased their ${sippedCategory} ability!`)) {
    const sipper = parseStatChild(c, sipperName, drainerSpec(sipperName, sippedName, sippedCategory));
    sameTag(c, "player", sipperId, sipper.playerId);
    return {
      kind: "Blooddrain",
      game,
      isSiphon,
      sipper,
      sipped,
      sippedRecordedAsIncrease,
      sippedCategory,
      maintenanceMode,
    };
  }

  if (!isSiphon) {
    c.fail({
      kind: "DescriptionMismatch",
      expected: JSON.stringify(`${sipperName} increased their ${sippedCategory} ability!`),
      found: "",
    });
  }
  const action = c.line(preceded(`${sipperName} `, oneOf(BLOODDRAIN_ACTIONS)));
  const finalAction: BlooddrainAction =
    action.action === "addStrike"
      ? { action: "addStrike", strikeoutBatterName: c.tryLine(lineEndingWith(" strikes out looking.")) }
      : action;
  return {
    kind: "SpecialBlooddrain",
    game,
    sipperId,
    sipperName,
    sipped,
    sippedCategory,
    action: finalAction,
    maintenanceMode,
  };
}

function pushDrainHeader(
  b: RecordBuilder,
  isSiphon: boolean,
  sipperName: string,
  sippedName: string,
  category: StatCategory,
): void {
  b.setCategory(EventCategory.Special);
  b.pushDescription(GURGLED);
  if (isSiphon) {
    b.pushDescription(`${sipperName}${SIPHON_SUFFIX}`);
  }
  b.pushDescription(`${sipperName} siphoned some of ${sippedName}'s ${category} ability!`);
}

export function buildBlooddrain(b: RecordBuilder, d: BlooddrainData): EventType {
  buildGame(b, d.game);
  const { sipper, sipped, sippedCategory } = d;
  pushDrainHeader(b, d.isSiphon, sipper.playerName, sipped.playerName, sippedCategory);
  b.pushDescription(`${sipper.playerName} increased their ${sippedCategory} ability!`);
  b.pushPlayerTag(sipper.playerId);
  b.pushPlayerTag(sipped.playerId);
  buildStatChild(
    b,
    sipped,
    drainedSpec(sipped.playerName, sipper.playerName, sippedCategory, d.sippedRecordedAsIncrease),
  );
  buildMaintenanceMode(b, d.maintenanceMode);
  buildStatChild(b, sipper, drainerSpec(sipper.playerName, sipped.playerName, sippedCategory));
  return d.isSiphon ? EventType.BlooddrainSiphon : EventType.Blooddrain;
}

export function buildSpecialBlooddrain(b: RecordBuilder, d: SpecialBlooddrainData): EventType {
  buildGame(b, d.game);
  pushDrainHeader(b, true, d.sipperName, d.sipped.playerName, d.sippedCategory);
  for (const line of blooddrainActionLines(d.sipperName, d.action)) {
    b.pushDescription(line);
  }
  b.pushPlayerTag(d.sipperId);
  b.pushPlayerTag(d.sipped.playerId);
  buildStatChild(b, d.sipped, drainedSpec(d.sipped.playerName, d.sipperName, d.sippedCategory));
  buildMaintenanceMode(b, d.maintenanceMode);
  return EventType.BlooddrainSiphon;
}

const sealedLine = pair(
  takeUntil(" tried to siphon blood from "),
  lineEndingWith(", but they were Sealed!"),
);

export function parseBlooddrainBlocked(c: ParseCursor): BlooddrainBlockedData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  c.expectLine(GURGLED);
  const siphonName = c.tryLine(lineEndingWith(SIPHON_SUFFIX));
  const [sipperName, sippeeName] = c.line(sealedLine);
  if (siphonName !== null) {
    sameName(c, siphonName, sipperName);
  }
  return {
    kind: "BlooddrainBlocked",
    game,
    isSiphon: siphonName !== null,
    sipperId: c.nextPlayerId(),
    sipperName,
    sippeeId: c.nextPlayerId(),
    sippeeName,
  };
}

export function buildBlooddrainBlocked(b: RecordBuilder, d: BlooddrainBlockedData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(GURGLED);
  if (d.isSiphon) {
    b.pushDescription(`${d.sipperName}${SIPHON_SUFFIX}`);
  }
  b.pushDescription(`${d.sipperName} tried to siphon blood from ${d.sippeeName}, but they were Sealed!`);
  b.pushPlayerTag(d.sipperId);
  b.pushPlayerTag(d.sippeeId);
  return EventType.BlooddrainBlocked;
}

// ---------------------------------------------------------------------------
// Sun 2 and Black Hole
// ---------------------------------------------------------------------------

function overallSpec(type: number, description: string): StatChildSpec {
  return { type, description, attrCategory: AttrCategory.Overall };
}

export function parseSun2(c: ParseCursor): Sun2Data {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const teamName = c.line(preceded("The ", lineEndingWith(" collect 10! Sun 2 smiles.")));
  c.expectLine(`Sun 2 set a Win upon the ${teamName}.`);
  const raysName = c.tryLine(lineEndingWith(" catches some rays."));
  let caughtSomeRays: PlayerStatChange | null = null;
  if (raysName !== null) {
    const playerId = c.nextPlayerId();
    caughtSomeRays = parseStatChild(
      c,
      raysName,
      overallSpec(EventType.PlayerStatIncrease, `${raysName} caught some rays.`),
    );
    sameTag(c, "player", playerId, caughtSomeRays.playerId);
  }
  return { kind: "Sun2", game, teamName, caughtSomeRays };
}

export function buildSun2(b: RecordBuilder, d: Sun2Data): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(`The ${d.teamName} collect 10! Sun 2 smiles.`);
  b.pushDescription(`Sun 2 set a Win upon the ${d.teamName}.`);
  const rays = d.caughtSomeRays;
  if (rays) {
    b.pushDescription(`${rays.playerName} catches some rays.`);
    b.pushPlayerTag(rays.playerId);
    buildStatChild(
      b,
      rays,
      overallSpec(EventType.PlayerStatIncrease, `${rays.playerName} caught some rays.`),
    );
  }
  return EventType.Sun2;
}

const BURPS = "The Black Hole burps!";

export function parseBlackHole(c: ParseCursor): BlackHoleData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const scoringTeamName = c.line(preceded("The ", lineEndingWith(" collect 10!")));
  const victimTeamName = c.line(
    preceded("The Black Hole swallows the Runs and a ", lineEndingWith(" Win.")),
  );
  let compressedByGamma: PlayerStatChange | null = null;
  if (c.tryExpectLine(BURPS)) {
    const playerName = c.line(lineEndingWith(" is compressed by gamma!"));
    const playerId = c.nextPlayerId();
    compressedByGamma = parseStatChild(
      c,
      playerName,
      overallSpec(EventType.PlayerStatDecrease, `${playerName} was compressed by gamma!`),
    );
    sameTag(c, "player", playerId, compressedByGamma.playerId);
  }
  return { kind: "BlackHole", game, scoringTeamName, victimTeamName, compressedByGamma };
}

export function buildBlackHole(b: RecordBuilder, d: BlackHoleData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(`The ${d.scoringTeamName} collect 10!`);
  b.pushDescription(`The Black Hole swallows the Runs and a ${d.victimTeamName} Win.`);
  const gamma = d.compressedByGamma;
  if (gamma) {
    b.pushDescription(BURPS);
    b.pushDescription(`${gamma.playerName} is compressed by gamma!`);
    b.pushPlayerTag(gamma.playerId);
    buildStatChild(
      b,
      gamma,
      overallSpec(EventType.PlayerStatDecrease, `${gamma.playerName} was compressed by gamma!`),
    );
  }
  return EventType.BlackHole;
}

// ---------------------------------------------------------------------------
// Peanuts
// ---------------------------------------------------------------------------

interface ReactionLayout {
  suffix: string;
  childType: number;
  childText: (playerName: string) => string;
}

const ALLERGIC: ReactionLayout = {
  suffix: " swallowed a stray peanut and had an allergic reaction!",
  childType: EventType.PlayerStatDecrease,
  childText: (name) => `${name} had an allergic reaction.`,
};

const SUPERALLERGIC: ReactionLayout = {
  suffix: " swallowed a stray peanut and had a Superallergic reaction!",
  childType: EventType.PlayerStatDecreaseFromSuperallergic,
  childText: (name) => `${name} had a Superallergic reaction.`,
};

function parseReaction(c: ParseCursor, layout: ReactionLayout): PlayerStatChange {
  c.expectCategory(EventCategory.Special);
  const playerName = c.line(lineEndingWith(layout.suffix));
  const playerId = c.nextPlayerId();
  const change = parseStatChild(
    c,
    playerName,
    overallSpec(layout.childType, layout.childText(playerName)),
  );
  sameTag(c, "player", playerId, change.playerId);
  return change;
}

function buildReaction(b: RecordBuilder, change: PlayerStatChange, layout: ReactionLayout): void {
  b.setCategory(EventCategory.Special);
  b.pushDescription(`${change.playerName}${layout.suffix}`);
  b.pushPlayerTag(change.playerId);
  buildStatChild(b, change, overallSpec(layout.childType, layout.childText(change.playerName)));
}

export function parseAllergicReaction(c: ParseCursor): AllergicReactionData {
  const game = parseGame(c);
  return { kind: "AllergicReaction", game, change: parseReaction(c, ALLERGIC) };
}

export function buildAllergicReaction(b: RecordBuilder, d: AllergicReactionData): EventType {
  buildGame(b, d.game);
  buildReaction(b, d.change, ALLERGIC);
  return EventType.AllergicReaction;
}

export function parseSuperallergicReaction(c: ParseCursor): SuperallergicReactionData {
  const game = parseGame(c);
  return { kind: "SuperallergicReaction", game, change: parseReaction(c, SUPERALLERGIC) };
}

export function buildSuperallergicReaction(
  b: RecordBuilder,
  d: SuperallergicReactionData,
): EventType {
  buildGame(b, d.game);
  buildReaction(b, d.change, SUPERALLERGIC);
  return EventType.SuperallergicReaction;
}

const MISTER = "The Peanut Mister activates!";

function lostSuperallergicSpec(playerName: string): ModChildSpec {
  return {
    type: EventType.RemovedMod,
    description: `${playerName} lost the Superallergic mod.`,
    mod: "SUPERALLERGIC",
  };
}

export function parsePeanutMister(c: ParseCursor): PeanutMisterData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  c.expectLine(MISTER);
  const [playerName, wasSuperallergic] = c.line(
    alt(
      map(lineEndingWith(" is no longer Superallergic!"), (name): [string, boolean] => [name, true]),
      map(lineEndingWith(" has been cured of their peanut allergy!"), (name): [string, boolean] => [
        name,
        false,
      ]),
    ),
  );
  const playerId = c.nextPlayerId();
  let superallergy: ModChange | null = null;
  if (wasSuperallergic) {
    const change = parsePlayerModChild(c, lostSuperallergicSpec(playerName));
    sameTag(c, "player", playerId, change.playerId);
    superallergy = { sub: change.sub, teamId: change.teamId };
  }
  return { kind: "PeanutMister", game, playerId, playerName, superallergy };
}

export function buildPeanutMister(b: RecordBuilder, d: PeanutMisterData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(MISTER);
  b.pushDescription(
    d.superallergy
      ? `${d.playerName} is no longer Superallergic!`
      : `${d.playerName} has been cured of their peanut allergy!`,
  );
  b.pushPlayerTag(d.playerId);
  if (d.superallergy) {
    buildPlayerModChild(
      b,
      { ...d.superallergy, playerId: d.playerId },
      lostSuperallergicSpec(d.playerName),
    );
  }
  return EventType.PeanutMister;
}

function perkSpec(playerName: string): ModChildSpec {
  return {
    type: EventType.AddedModFromOtherMod,
    description: `${playerName} Perks up.`,
    mod: "OVERPERFORMING",
    source: "PERK",
    duration: ModDuration.Game,
  };
}

export function parsePerkUp(c: ParseCursor): PerkUpData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const parser = lineEndingWith(" Perks up.");
  const names = [c.line(parser)];
  for (let name = c.tryLine(parser); name !== null; name = c.tryLine(parser)) {
    names.push(name);
  }
  const players = names.map((playerName) => ({
    ...parsePlayerModChild(c, perkSpec(playerName)),
    playerName,
  }));
  return { kind: "PerkUp", game, players };
}

export function buildPerkUp(b: RecordBuilder, d: PerkUpData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  for (const player of d.players) {
    b.pushDescription(`${player.playerName} Perks up.`);
  }
  for (const player of d.players) {
    buildPlayerModChild(b, player, perkSpec(player.playerName));
  }
  return EventType.Perk;
}

// ---------------------------------------------------------------------------
// Feedback and Reverb
// ---------------------------------------------------------------------------

const FLICKERS = "Reality flickers. Things look different ...";
const FLICKERED = "Reality flickered in the Feedback.";

const POSITION_ROLES = [
  ["batting.", "lineup"],
  ["pitching.", "rotation"],
] as const;

function readFeedbackPlayer(
  child: ParseCursor,
  prefix: "a" | "b",
  playerId: string,
  playerName: string,
  teamId: string,
): FeedbackPlayer {
  child.expectMetadata(`${prefix}PlayerId`, playerId);
  child.expectMetadata(`${prefix}PlayerName`, playerName);
  child.expectMetadata(`${prefix}TeamId`, teamId);
  return {
    playerId,
    playerName,
    teamId,
    teamName: child.metadata(`${prefix}TeamName`, Str),
    location: child.metadata(`${prefix}Location`, Int),
  };
}

function writeFeedbackPlayer(child: RecordBuilder, prefix: "a" | "b", player: FeedbackPlayer): void {
  child.setMetadata(`${prefix}Location`, player.location);
  child.setMetadata(`${prefix}PlayerId`, player.playerId);
  child.setMetadata(`${prefix}PlayerName`, player.playerName);
  child.setMetadata(`${prefix}TeamId`, player.teamId);
  child.setMetadata(`${prefix}TeamName`, player.teamName);
}

export function parseFeedback(c: ParseCursor): FeedbackData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  c.expectLine(FLICKERS);
  const [nameA, nameB] = c.line(
    pair(takeUntil(" and "), lineEndingWith(" switch teams in the feedback!")),
  );
  const idA = c.nextPlayerId();
  const idB = c.nextPlayerId();
  const positionType = c.line(preceded(`${nameB} is now `, oneOf(POSITION_ROLES)));
  const { sub, playerA, playerB } = c.child(EventType.PlayerTraded, (child) => {
    child.expectLine(FLICKERED);
    child.repeatedPlayerId(idA);
    child.repeatedPlayerId(idB);
    const teamA = child.nextTeamId();
    const teamB = child.nextTeamId();
    return {
      sub: child.subEvent(),
      playerA: readFeedbackPlayer(child, "a", idA, nameA, teamA),
      playerB: readFeedbackPlayer(child, "b", idB, nameB, teamB),
    };
  });
  return { kind: "Feedback", game, playerA, playerB, positionType, sub };
}

export function buildFeedback(b: RecordBuilder, d: FeedbackData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  const { playerA, playerB } = d;
  b.pushDescription(FLICKERS);
  b.pushDescription(`${playerA.playerName} and ${playerB.playerName} switch teams in the feedback!`);
  b.pushPlayerTag(playerA.playerId);
  b.pushPlayerTag(playerB.playerId);
  const role = d.positionType === "lineup" ? "batting" : "pitching";
  b.pushDescription(`${playerB.playerName} is now ${role}.`);
  b.pushChild(d.sub, EventType.PlayerTraded, (child) => {
    child.pushDescription(FLICKERED);
    child.pushPlayerTag(playerA.playerId);
    child.pushPlayerTag(playerB.playerId);
    child.pushTeamTag(playerA.teamId);
    child.pushTeamTag(playerB.teamId);
    writeFeedbackPlayer(child, "a", playerA);
    writeFeedbackPlayer(child, "b", playerB);
  });
  return EventType.FeedbackSwap;
}

const BEGINS_TO_FLICKER = "Reality begins to flicker ...";

function tangledSpec(playerName: string): StatChildSpec {
  return overallSpec(EventType.PlayerStatDecrease, `${playerName} is tangled in the flicker!`);
}

export function parseFeedbackBlocked(c: ParseCursor): FeedbackBlockedData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  c.expectLine(BEGINS_TO_FLICKER);
  const resistedName = c.line(preceded("But ", lineEndingWith(" resists!")));
  const tangledName = c.line(lineEndingWith(" is tangled in the flicker!"));
  const resistedId = c.nextPlayerId();
  const tangledId = c.nextPlayerId();
  const tangled = parseStatChild(c, tangledName, tangledSpec(tangledName));
  sameTag(c, "player", tangledId, tangled.playerId);
  return { kind: "FeedbackBlocked", game, resistedId, resistedName, tangled };
}

export function buildFeedbackBlocked(b: RecordBuilder, d: FeedbackBlockedData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(BEGINS_TO_FLICKER);
  b.pushDescription(`But ${d.resistedName} resists!`);
  b.pushDescription(`${d.tangled.playerName} is tangled in the flicker!`);
  b.pushPlayerTag(d.resistedId);
  b.pushPlayerTag(d.tangled.playerId);
  buildStatChild(b, d.tangled, tangledSpec(d.tangled.playerName));
  return EventType.FeedbackBlocked;
}

const UNSAFE_LEVELS = "Reverberations are at unsafe levels!";
const DANGEROUS_LEVELS = "Reverberations are at dangerous levels!";

function reverberatingSpec(playerName: string): ModChildSpec {
  return {
    type: EventType.AddedMod,
    description: `${playerName} is now Reverberating wildly!`,
    mod: "REVERBERATING",
  };
}

export function parseBestowReverberating(c: ParseCursor): BestowReverberatingData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  c.expectLine(DANGEROUS_LEVELS);
  const playerName = c.line(lineEndingWith(" is now Reverberating wildly!"));
  const playerId = c.nextPlayerId();
  const change = parsePlayerModChild(c, reverberatingSpec(playerName));
  sameTag(c, "player", playerId, change.playerId);
  return { kind: "BestowReverberating", game, change: { ...change, playerName } };
}

export function buildBestowReverberating(b: RecordBuilder, d: BestowReverberatingData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(DANGEROUS_LEVELS);
  b.pushDescription(`${d.change.playerName} is now Reverberating wildly!`);
  b.pushPlayerTag(d.change.playerId);
  buildPlayerModChild(b, d.change, reverberatingSpec(d.change.playerName));
  return EventType.ReverbBestowsReverberating;
}

interface ReverbLayout {
  levels: string;
  suffix: string;
  childType: number;
  childText: (teamName: string) => string;
}

const REVERB_LAYOUTS: Record<ReverbType, ReverbLayout> = {
  lineup: {
    levels: UNSAFE_LEVELS,
    suffix: " had their lineup shuffled in the Reverb!",
    childType: EventType.ReverbLineupShuffle,
    childText: (team) => `The ${team} had their lineup shuffled.`,
  },
  rotation: {
    levels: UNSAFE_LEVELS,
    suffix: " had their rotation shuffled in the Reverb!",
    childType: EventType.ReverbRotationShuffle,
    childText: (team) => `The ${team} had their rotation shuffled in the Reverb!`,
  },
  full: {
    levels: DANGEROUS_LEVELS,
    suffix: " were shuffled in the Reverb!",
    childType: EventType.ReverbFullShuffle,
    childText: (team) => `The ${team} were shuffled in the Reverb!`,
  },
};

const REVERB_TYPES: readonly ReverbType[] = ["lineup", "rotation", "full"];

const reverbLine: Parser<[string, ReverbType]> = preceded(
  "The ",
  alt(
    ...REVERB_TYPES.map((reverbType) =>
      map(lineEndingWith(REVERB_LAYOUTS[reverbType].suffix), (team): [string, ReverbType] => [
        team,
        reverbType,
      ]),
    ),
  ),
);

export function parseReverb(c: ParseCursor): ReverbData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const levels = c.line(oneOf([
    [UNSAFE_LEVELS, UNSAFE_LEVELS],
    [DANGEROUS_LEVELS, DANGEROUS_LEVELS],
  ]));
  const [teamName, reverbType] = c.line(reverbLine);
  const layout = REVERB_LAYOUTS[reverbType];
  sameName(c, layout.levels, levels);
  const { sub, teamId } = c.child(layout.childType, (child) => {
    child.expectLine(layout.childText(teamName));
    return { sub: child.subEvent(), teamId: child.nextTeamId() };
  });
  const gravityPlayers = parseGravity(c);
  return { kind: "Reverb", game, teamId, teamName, reverbType, sub, gravityPlayers };
}

export function buildReverb(b: RecordBuilder, d: ReverbData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  const layout = REVERB_LAYOUTS[d.reverbType];
  b.pushDescription(layout.levels);
  b.pushDescription(`The ${d.teamName}${layout.suffix}`);
  b.pushChild(d.sub, layout.childType, (child) => {
    child.pushDescription(layout.childText(d.teamName));
    child.pushTeamTag(d.teamId);
  });
  buildGravity(b, d.gravityPlayers);
  return EventType.ReverbRosterShuffle;
}

// ---------------------------------------------------------------------------
// Performance toggles
// ---------------------------------------------------------------------------

interface ToggleLayout {
  phrase: string;
  mod: string;
  source: string;
}

const UNDER_OVER: ToggleLayout = { phrase: "Under Over", mod: "OVERPERFORMING", source: "UNDEROVER" };
const OVER_UNDER: ToggleLayout = { phrase: "Over Under", mod: "UNDERPERFORMING", source: "OVERUNDER" };

function toggleText(playerName: string, layout: ToggleLayout, on: boolean): string {
  return `${playerName}, ${layout.phrase}, ${on ? "On" : "Off"}.`;
}

function toggleSpec(playerName: string, layout: ToggleLayout, on: boolean): ModChildSpec {
  return {
    type: on ? EventType.AddedModFromOtherMod : EventType.RemovedModFromOtherMod,
    description: toggleText(playerName, layout, on),
    mod: layout.mod,
    source: layout.source,
  };
}

function parseToggle(
  c: ParseCursor,
  layout: ToggleLayout,
): { change: ModChangeWithNamedPlayer; on: boolean } {
  c.expectCategory(EventCategory.Special);
  const [playerName, on] = c.line(
    alt(
      map(lineEndingWith(`, ${layout.phrase}, On.`), (name): [string, boolean] => [name, true]),
      map(lineEndingWith(`, ${layout.phrase}, Off.`), (name): [string, boolean] => [name, false]),
    ),
  );
  const change = parsePlayerModChild(c, toggleSpec(playerName, layout, on));
  return { change: { ...change, playerName }, on };
}

function buildToggle(
  b: RecordBuilder,
  change: ModChangeWithNamedPlayer,
  on: boolean,
  layout: ToggleLayout,
): void {
  b.setCategory(EventCategory.Special);
  b.pushDescription(toggleText(change.playerName, layout, on));
  buildPlayerModChild(b, change, toggleSpec(change.playerName, layout, on));
}

export function parseUnderOver(c: ParseCursor): UnderOverData {
  const game = parseGame(c);
  return { kind: "UnderOver", game, ...parseToggle(c, UNDER_OVER) };
}

export function buildUnderOver(b: RecordBuilder, d: UnderOverData): EventType {
  buildGame(b, d.game);
  buildToggle(b, d.change, d.on, UNDER_OVER);
  return EventType.UnderOver;
}

export function parseOverUnder(c: ParseCursor): OverUnderData {
  const game = parseGame(c);
  return { kind: "OverUnder", game, ...parseToggle(c, OVER_UNDER) };
}

export function buildOverUnder(b: RecordBuilder, d: OverUnderData): EventType {
  buildGame(b, d.game);
  buildToggle(b, d.change, d.on, OVER_UNDER);
  return EventType.OverUnder;
}

// ---------------------------------------------------------------------------
// Shells
// ---------------------------------------------------------------------------

export function parseTasteTheInfinite(c: ParseCursor): TasteTheInfiniteData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const shellerName = c.line(lineEndingWith(" tastes the infinite!"));
  const shelleeName = c.line(lineEndingWith(" is Shelled!"));
  const shellerId = c.nextPlayerId();
  const shelleeId = c.nextPlayerId();
  const { sub, shelleeTeamId } = c.child(EventType.AddedMod, (child) => {
    child.expectLine(`${shelleeName} is Shelled!`);
    // The child is tagged with the sheller, not the player who got Shelled.
    child.repeatedPlayerId(shellerId);
    const teamId = child.nextTeamId();
    child.expectMetadata("mod", "SHELLED");
    child.expectMetadata("type", ModDuration.Permanent);
    return { sub: child.subEvent(), shelleeTeamId: teamId };
  });
  return {
    kind: "TasteTheInfinite",
    game,
    shellerId,
    shellerName,
    shelleeId,
    shelleeName,
    shelleeTeamId,
    sub,
  };
}

export function buildTasteTheInfinite(b: RecordBuilder, d: TasteTheInfiniteData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(`${d.shellerName} tastes the infinite!`);
  b.pushDescription(`${d.shelleeName} is Shelled!`);
  b.pushPlayerTag(d.shellerId);
  b.pushPlayerTag(d.shelleeId);
  b.pushChild(d.sub, EventType.AddedMod, (child) => {
    child.pushDescription(`${d.shelleeName} is Shelled!`);
    child.pushPlayerTag(d.shellerId);
    child.pushTeamTag(d.shelleeTeamId);
    child.setMetadata("mod", "SHELLED");
    child.setMetadata("type", ModDuration.Permanent);
  });
  return EventType.TasteTheInfinite;
}

const BIRDS_CIRCLE = "The Birds circle...";

function unshellSpecs(playerName: string): [ModChildSpec, ModChildSpec] {
  return [
    { type: EventType.RemovedMod, description: `The Birds pecked ${playerName} free!`, mod: "SHELLED" },
    {
      type: EventType.AddedMod,
      description: `${playerName} emerges from the shell with a Superallergy!`,
      mod: "SUPERALLERGIC",
    },
  ];
}

export function parseBirdsUnshell(c: ParseCursor): BirdsUnshellData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  c.expectLine(BIRDS_CIRCLE);
  const playerName = c.line(preceded("The Birds pecked ", lineEndingWith(" free!")));
  const playerId = c.nextPlayerId();
  const [peckedSpec, allergySpec] = unshellSpecs(playerName);
  const pecked = parsePlayerModChild(c, peckedSpec);
  const allergy = parsePlayerModChild(c, allergySpec);
  sameTag(c, "player", playerId, pecked.playerId);
  sameTag(c, "player", playerId, allergy.playerId);
  sameTag(c, "team", pecked.teamId, allergy.teamId);
  return {
    kind: "BirdsUnshell",
    game,
    teamId: pecked.teamId,
    playerId,
    playerName,
    peckedFree: pecked.sub,
    superallergy: allergy.sub,
  };
}

export function buildBirdsUnshell(b: RecordBuilder, d: BirdsUnshellData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(BIRDS_CIRCLE);
  b.pushDescription(`The Birds pecked ${d.playerName} free!`);
  b.pushPlayerTag(d.playerId);
  const [peckedSpec, allergySpec] = unshellSpecs(d.playerName);
  const who = { teamId: d.teamId, playerId: d.playerId };
  buildPlayerModChild(b, { ...who, sub: d.peckedFree }, peckedSpec);
  buildPlayerModChild(b, { ...who, sub: d.superallergy }, allergySpec);
  return EventType.BirdsUnshell;
}

// ---------------------------------------------------------------------------
// Flooding and Elsewhere
// ---------------------------------------------------------------------------

const IMMATERIA = "A surge of Immateria rushes up from Under!";
const SWEPT = "Baserunners are swept from play!";
const FLOOD_PUMPS = "The Flood Pumps activate!";
const FLIPPERS_SUFFIX = " uses their Flippers to slingshot home!";
const EGO_SUFFIX = "'s Ego keeps them on base!";

function sweptSuffix(season: number): string {
  return season < 18 ? " is swept Elsewhere!" : " was swept Elsewhere!";
}

type FloodingLine = { effect: FloodingEffect["effect"]; playerName: string };

function floodingLine(season: number): Parser<FloodingLine> {
  return alt(
    map(lineEndingWith(sweptSuffix(season)), (playerName): FloodingLine => ({
      effect: "elsewhere",
      playerName,
    })),
    map(lineEndingWith(FLIPPERS_SUFFIX), (playerName): FloodingLine => ({
      effect: "flippers",
      playerName,
    })),
    map(lineEndingWith(EGO_SUFFIX), (playerName): FloodingLine => ({ effect: "ego", playerName })),
  );
}

export function parseFloodingSwept(c: ParseCursor): FloodingSweptData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  c.expectLine(IMMATERIA);
  c.expectLine(SWEPT);
  const parser = floodingLine(c.season);
  const effects: FloodingEffect[] = [];
  for (let line = c.tryLine(parser); line !== null; line = c.tryLine(parser)) {
    const { playerName } = line;
    switch (line.effect) {
      case "elsewhere": {
        const text = `${playerName}${sweptSuffix(c.season)}`;
        effects.push({ effect: "elsewhere", sent: parseSentElsewhere(c, playerName, text) });
        break;
      }
      case "flippers":
      case "ego":
        effects.push({ effect: line.effect, player: { playerName, playerId: c.nextPlayerId() } });
        break;
    }
  }
  const floodPumps = c.tryExpectLine(FLOOD_PUMPS);
  const freeRefills = parseFreeRefills(c);
  return { kind: "FloodingSwept", game, effects, floodPumps, freeRefills };
}

export function buildFloodingSwept(b: RecordBuilder, d: FloodingSweptData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(IMMATERIA);
  b.pushDescription(SWEPT);
  for (const effect of d.effects) {
    switch (effect.effect) {
      case "elsewhere": {
        const text = `${effect.sent.playerName}${sweptSuffix(b.season)}`;
        buildSentElsewhere(b, effect.sent, text, text);
        break;
      }
      case "flippers":
        b.pushDescription(`${effect.player.playerName}${FLIPPERS_SUFFIX}`);
        b.pushPlayerTag(effect.player.playerId);
        break;
      case "ego":
        b.pushDescription(`${effect.player.playerName}${EGO_SUFFIX}`);
        b.pushPlayerTag(effect.player.playerId);
        break;
    }
  }
  if (d.floodPumps) {
    b.pushDescription(FLOOD_PUMPS);
  }
  buildFreeRefills(b, d.freeRefills);
  return EventType.FloodingSwept;
}

export function timeElsewhereText(time: TimeElsewhere): string {
  if (time.unit === "days") {
    return time.count === 1 ? "1 day" : `${time.count} days`;
  }
  return time.count === 1 ? "one season" : `${time.count} seasons`;
}

const timeElsewhere: Parser<TimeElsewhere> = alt(
  map(
    pair(wholeNumber, oneOf([[" days", "days"], [" day", "days"], [" seasons", "seasons"]] as const)),
    ([count, unit]): TimeElsewhere => ({ unit, count }),
  ),
  map(oneOf([["one season", 1]]), (count): TimeElsewhere => ({ unit: "seasons", count })),
);

/** The time Elsewhere at the end of a line, checked to be written the canonical way. */
function parseTimeElsewhere(c: ParseCursor, text: string): TimeElsewhere {
  const result = timeElsewhere(text);
  if (!result.ok || result.rest !== "" || timeElsewhereText(result.value) !== text) {
    return c.fail({ kind: "DescriptionMismatch", expected: "a time spent Elsewhere", found: text });
  }
  return result.value;
}

function returnedVerb(isPeanut: boolean): string {
  return isPeanut ? "rolled back" : "returned";
}

const RETURN_VERBS: ReadonlyArray<readonly [string, boolean]> = [
  ["returned", false],
  ["rolled back", true],
];

type ReturnLine =
  | { form: "pulledBack"; seekerName: string; playerName: string }
  | { form: "full"; playerName: string; isPeanut: boolean; time: string }
  | { form: "period"; playerName: string; isPeanut: boolean }
  | { form: "hasBang"; playerName: string; isPeanut: boolean };

function returnLine(season: number): Parser<ReturnLine> {
  const has = season < 18 ? "has " : "";
  const byVerb = (build: (verb: string, isPeanut: boolean) => Parser<ReturnLine>): Parser<ReturnLine> =>
    alt(...RETURN_VERBS.map(([verb, isPeanut]) => build(verb, isPeanut)));
  return alt(
    map(
      pair(takeUntil(" sought out Elsewhere teammate "), lineEndingWith("...")),
      ([seekerName, playerName]): ReturnLine => ({ form: "pulledBack", seekerName, playerName }),
    ),
    byVerb((verb, isPeanut) =>
      map(
        pair(takeUntil(` ${has}${verb} from Elsewhere after `), lineEndingWith("!")),
        ([playerName, time]): ReturnLine => ({ form: "full", playerName, isPeanut, time }),
      ),
    ),
    byVerb((verb, isPeanut) =>
      map(
        lineEndingWith(` has ${verb} from Elsewhere!`),
        (playerName): ReturnLine => ({ form: "hasBang", playerName, isPeanut }),
      ),
    ),
    byVerb((verb, isPeanut) =>
      map(
        lineEndingWith(` ${verb} from Elsewhere.`),
        (playerName): ReturnLine => ({ form: "period", playerName, isPeanut }),
      ),
    ),
  );
}

function fullReturnText(season: number, playerName: string, isPeanut: boolean, time: TimeElsewhere): string {
  const has = season < 18 ? "has " : "";
  return `${playerName} ${has}${returnedVerb(isPeanut)} from Elsewhere after ${timeElsewhereText(time)}!`;
}

function shortReturnText(season: number, playerName: string, isPeanut: boolean): string {
  return season < 18
    ? `${playerName} has ${returnedVerb(isPeanut)} from Elsewhere!`
    : `${playerName} ${returnedVerb(isPeanut)} from Elsewhere.`;
}

function falseReturnText(playerName: string, isPeanut: boolean): string {
  return `${playerName} has ${returnedVerb(isPeanut)} from Elsewhere!`;
}

function pulledBackText(playerName: string, time: TimeElsewhere): string {
  return `${playerName} was pulled back from Elsewhere after ${timeElsewhereText(time)}!`;
}

function parseElsewhereRemoval(
  c: ParseCursor,
  text: string,
): ModChangeWithPlayer {
  return c.child(EventType.RemovedMod, (child) => {
    child.expectLine(text);
    const teamId = child.nextTeamId();
    const playerId = child.nextPlayerId();
    child.expectMetadata("mod", "ELSEWHERE");
    child.expectMetadata("type", ModDuration.Permanent);
    return { sub: child.subEvent(), teamId, playerId };
  });
}

function buildElsewhereRemoval(
  b: RecordBuilder,
  sub: SubEventRef,
  text: string,
  teamId: string,
  playerId: string,
): void {
  b.pushChild(sub, EventType.RemovedMod, (child) => {
    child.pushDescription(text);
    child.pushTeamTag(teamId);
    child.pushPlayerTag(playerId);
    child.setMetadata("mod", "ELSEWHERE");
    child.setMetadata("type", ModDuration.Permanent);
  });
}

function recongealedText(playerName: string): string {
  return `${playerName} re-congealed differently.`;
}

function parseFullReturn(
  c: ParseCursor,
  playerName: string,
  isPeanut: boolean,
  time: TimeElsewhere,
): ElsewhereReturn {
  const text = fullReturnText(c.season, playerName, isPeanut, time);
  const scattered = c.childIf(EventType.AddedMod, hasMod("SCATTERED"), (child) => {
    const scatteredName = child.line(lineEndingWith(" was Scattered..."));
    const teamId = child.nextTeamId();
    const playerId = child.nextPlayerId();
    child.expectMetadata("mod", "SCATTERED");
    child.expectMetadata("type", ModDuration.Permanent);
    return { scatteredName, sub: child.subEvent(), teamId, playerId };
  });
  const removal = parseElsewhereRemoval(c, text);
  if (scattered) {
    sameTag(c, "team", scattered.teamId, removal.teamId);
    sameTag(c, "player", scattered.playerId, removal.playerId);
  }
  const next = c.peekChild();
  let recongealed: Recongealed | null = null;
  if (
    next !== undefined &&
    (next.type === EventType.PlayerStatIncrease || next.type === EventType.PlayerStatDecrease) &&
    next.description === recongealedText(playerName)
  ) {
    const increased = next.type === EventType.PlayerStatIncrease;
    const change = parseStatChild(c, playerName, overallSpec(next.type, recongealedText(playerName)));
    recongealed = { change, increased };
  }
  return {
    playerName,
    flavor: {
      flavor: "full",
      teamId: removal.teamId,
      playerId: removal.playerId,
      isPeanut,
      sub: removal.sub,
      timeElsewhere: time,
      scattered: scattered ? { scatteredName: scattered.scatteredName, sub: scattered.sub } : null,
      recongealed,
    },
  };
}

function parseElsewhereReturn(c: ParseCursor, line: ReturnLine): ElsewhereReturn {
  switch (line.form) {
    case "pulledBack": {
      const seekerPlayerId = c.nextPlayerId();
      const time = parseTimeElsewhere(
        c,
        c.line(preceded(`${line.playerName} was pulled back from Elsewhere after `, lineEndingWith("!"))),
      );
      const removal = parseElsewhereRemoval(c, pulledBackText(line.playerName, time));
      return {
        playerName: line.playerName,
        flavor: {
          flavor: "pulledBack",
          teamId: removal.teamId,
          soughtPlayerId: removal.playerId,
          seekerPlayerId,
          seekerPlayerName: line.seekerName,
          sub: removal.sub,
          timeElsewhere: time,
        },
      };
    }
    case "full":
      return parseFullReturn(c, line.playerName, line.isPeanut, parseTimeElsewhere(c, line.time));
    case "period":
    case "hasBang": {
      const short = shortReturnText(c.season, line.playerName, line.isPeanut);
      const written =
        line.form === "period"
          ? `${line.playerName} ${returnedVerb(line.isPeanut)} from Elsewhere.`
          : falseReturnText(line.playerName, line.isPeanut);
      // Before season 18 a false return reads exactly like a short one; only the child tells them apart.
      const next = c.peekChild();
      const hasRemoval =
        next !== undefined && next.type === EventType.RemovedMod && hasMod("ELSEWHERE")(next);
      if (written === short && (line.form === "period" || hasRemoval)) {
        const removal = parseElsewhereRemoval(c, short);
        return {
          playerName: line.playerName,
          flavor: {
            flavor: "short",
            teamId: removal.teamId,
            playerId: removal.playerId,
            isPeanut: line.isPeanut,
            sub: removal.sub,
          },
        };
      }
      if (line.form === "period") {
        return c.fail({ kind: "DescriptionMismatch", expected: JSON.stringify(short), found: written });
      }
      return { playerName: line.playerName, flavor: { flavor: "false", isPeanut: line.isPeanut } };
    }
  }
}

export function parseReturnFromElsewhere(c: ParseCursor): ReturnFromElsewhereData {
  const game = parseGame(c);
  const parser = returnLine(c.season);
  const returns = [parseElsewhereReturn(c, c.line(parser))];
  for (let line = c.tryLine(parser); line !== null; line = c.tryLine(parser)) {
    returns.push(parseElsewhereReturn(c, line));
  }
  return { kind: "ReturnFromElsewhere", game, returns };
}

export function buildReturnFromElsewhere(b: RecordBuilder, d: ReturnFromElsewhereData): EventType {
  buildGame(b, d.game);
  for (const { playerName, flavor } of d.returns) {
    switch (flavor.flavor) {
      case "full": {
        const text = fullReturnText(b.season, playerName, flavor.isPeanut, flavor.timeElsewhere);
        b.pushDescription(text);
        if (flavor.scattered) {
          const { scatteredName, sub } = flavor.scattered;
          b.pushChild(sub, EventType.AddedMod, (child) => {
            child.pushDescription(`${scatteredName} was Scattered...`);
            child.pushTeamTag(flavor.teamId);
            child.pushPlayerTag(flavor.playerId);
            child.setMetadata("mod", "SCATTERED");
            child.setMetadata("type", ModDuration.Permanent);
          });
        }
        buildElsewhereRemoval(b, flavor.sub, text, flavor.teamId, flavor.playerId);
        if (flavor.recongealed) {
          const type = flavor.recongealed.increased
            ? EventType.PlayerStatIncrease
            : EventType.PlayerStatDecrease;
          buildStatChild(b, flavor.recongealed.change, overallSpec(type, recongealedText(playerName)));
        }
        break;
      }
      case "short": {
        const text = shortReturnText(b.season, playerName, flavor.isPeanut);
        b.pushDescription(text);
        buildElsewhereRemoval(b, flavor.sub, text, flavor.teamId, flavor.playerId);
        break;
      }
      case "false":
        b.pushDescription(falseReturnText(playerName, flavor.isPeanut));
        break;
      case "pulledBack": {
        b.pushDescription(`${flavor.seekerPlayerName} sought out Elsewhere teammate ${playerName}...`);
        b.pushPlayerTag(flavor.seekerPlayerId);
        const text = pulledBackText(playerName, flavor.timeElsewhere);
        b.pushDescription(text);
        buildElsewhereRemoval(b, flavor.sub, text, flavor.teamId, flavor.soughtPlayerId);
        break;
      }
    }
  }
  return EventType.ReturnFromElsewhere;
}

// ---------------------------------------------------------------------------
// Incineration
// ---------------------------------------------------------------------------

const DEBT_COLLECTED = "A Debt was collected.";

function markedSpec(playerName: string): ModChildSpec {
  return {
    type: EventType.AddedMod,
    description: `The Instability chains to ${playerName}!`,
    mod: "MARKED",
    duration: ModDuration.Weekly,
  };
}

export function parseIncineration(c: ParseCursor): IncinerationData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const victimId = c.nextPlayerId();
  const replacementId = c.nextPlayerId();
  const unstableName = c.tryLine(lineEndingWith(" is Unstable!"));
  if (unstableName !== null) {
    c.expectLine(DEBT_COLLECTED);
  }
  const victimName = c.line(preceded("Rogue Umpire incinerated ", lineEndingWith("!")));
  if (unstableName !== null) {
    sameName(c, unstableName, victimName);
  }
  const replacementName = c.line(preceded("They're replaced by ", lineEndingWith(".")));

  const { incineration, teamId } = c.child(EventType.Incineration, (child) => {
    child.expectLine(`Rogue Umpire incinerated ${victimName}!`);
    child.repeatedPlayerId(victimId);
    return { incineration: child.subEvent(), teamId: child.nextTeamId() };
  });
  const enterHall = c.child(EventType.EnterHallOfFlame, (child) => {
    child.expectLine(`${victimName} entered the Hall of Flame.`);
    child.repeatedPlayerId(victimId);
    return child.subEvent();
  });
  const hatch = c.child(EventType.PlayerHatched, (child) => {
    child.expectLine(`${replacementName} has been hatched from the field of eggs.`);
    child.repeatedPlayerId(replacementId);
    child.expectMetadata("id", replacementId);
    return child.subEvent();
  });
  const { replace, teamName, location } = c.child(EventType.PlayerBornFromIncineration, (child) => {
    child.expectLine(`${replacementName} replaced the incinerated ${victimName}.`);
    child.repeatedPlayerId(victimId);
    child.repeatedPlayerId(replacementId);
    child.repeatedTeamId(teamId);
    child.expectMetadata("inPlayerId", replacementId);
    child.expectMetadata("inPlayerName", replacementName);
    child.expectMetadata("outPlayerId", victimId);
    child.expectMetadata("outPlayerName", victimName);
    child.expectMetadata("teamId", teamId);
    return {
      replace: child.subEvent(),
      teamName: child.metadata("teamName", Str),
      location: child.metadata("location", Int),
    };
  });

  let unstableChain: ModChangeWithNamedPlayer | null = null;
  if (unstableName !== null) {
    const chainedName = c.line(preceded("The Instability chains to ", lineEndingWith("!")));
    unstableChain = { ...parsePlayerModChild(c, markedSpec(chainedName)), playerName: chainedName };
  }

  return {
    kind: "Incineration",
    game,
    teamId,
    teamName,
    victimId,
    victimName,
    replacementId,
    replacementName,
    location,
    unstableChain,
    subEvents: { incineration, enterHall, hatch, replace },
  };
}

export function buildIncineration(b: RecordBuilder, d: IncinerationData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushPlayerTag(d.victimId);
  b.pushPlayerTag(d.replacementId);
  if (d.unstableChain) {
    b.pushDescription(`${d.victimName} is Unstable!`);
    b.pushDescription(DEBT_COLLECTED);
  }
  b.pushDescription(`Rogue Umpire incinerated ${d.victimName}!`);
  b.pushDescription(`They're replaced by ${d.replacementName}.`);
  b.pushChild(d.subEvents.incineration, EventType.Incineration, (child) => {
    child.pushDescription(`Rogue Umpire incinerated ${d.victimName}!`);
    child.pushPlayerTag(d.victimId);
    child.pushTeamTag(d.teamId);
  });
  b.pushChild(d.subEvents.enterHall, EventType.EnterHallOfFlame, (child) => {
    child.pushDescription(`${d.victimName} entered the Hall of Flame.`);
    child.pushPlayerTag(d.victimId);
  });
  b.pushChild(d.subEvents.hatch, EventType.PlayerHatched, (child) => {
    child.pushDescription(`${d.replacementName} has been hatched from the field of eggs.`);
    child.pushPlayerTag(d.replacementId);
    child.setMetadata("id", d.replacementId);
  });
  b.pushChild(d.subEvents.replace, EventType.PlayerBornFromIncineration, (child) => {
    child.pushDescription(`${d.replacementName} replaced the incinerated ${d.victimName}.`);
    child.pushPlayerTag(d.victimId);
    child.pushPlayerTag(d.replacementId);
    child.pushTeamTag(d.teamId);
    child.setMetadata("inPlayerId", d.replacementId);
    child.setMetadata("inPlayerName", d.replacementName);
    child.setMetadata("location", d.location);
    child.setMetadata("outPlayerId", d.victimId);
    child.setMetadata("outPlayerName", d.victimName);
    child.setMetadata("teamId", d.teamId);
    child.setMetadata("teamName", d.teamName);
  });
  if (d.unstableChain) {
    b.pushDescription(`The Instability chains to ${d.unstableChain.playerName}!`);
    buildPlayerModChild(b, d.unstableChain, markedSpec(d.unstableChain.playerName));
  }
  return EventType.Incineration;
}

const TRIED_TO_INCINERATE = "Rogue Umpire tried to incinerate ";
const ATE_THE_FLAME = " ate the flame! They became Magmatic!";
const FIREPROOF = ", but they're Fireproof! The Umpire was incinerated instead!";

/** Whether an IncinerationBlocked record is the Fireproof form. */
export function isFireproofIncineration(description: string): boolean {
  return description.endsWith(FIREPROOF);
}

export function parseFireproofIncineration(c: ParseCursor): FireproofIncinerationData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const playerName = c.line(preceded(TRIED_TO_INCINERATE, lineEndingWith(FIREPROOF)));
  return { kind: "FireproofIncineration", game, playerId: c.nextPlayerId(), playerName };
}

export function buildFireproofIncineration(b: RecordBuilder, d: FireproofIncinerationData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(`${TRIED_TO_INCINERATE}${d.playerName}${FIREPROOF}`);
  b.pushPlayerTag(d.playerId);
  return EventType.IncinerationBlocked;
}

export function parseBecameMagmatic(c: ParseCursor): BecameMagmaticData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const unstableName = c.tryLine(lineEndingWith(" is Unstable!"));
  const [playerName, repeated] = c.line(
    preceded(TRIED_TO_INCINERATE, pair(takeUntil(", but "), lineEndingWith(ATE_THE_FLAME))),
  );
  sameName(c, playerName, repeated);
  if (unstableName !== null) {
    sameName(c, playerName, unstableName);
  }
  const playerId = c.nextPlayerId();
  const magmaticModAdded = c.childIf(EventType.AddedMod, hasMod("MAGMATIC"), (child) => {
    child.expectLine(`${playerName} ate some flame.`);
    child.repeatedPlayerId(playerId);
    const teamId = child.nextTeamId();
    child.expectMetadata("mod", "MAGMATIC");
    child.expectMetadata("type", ModDuration.Permanent);
    return { sub: child.subEvent(), teamId };
  });
  return {
    kind: "BecameMagmatic",
    game,
    playerId,
    playerName,
    isUnstable: unstableName !== null,
    magmaticModAdded,
  };
}

export function buildBecameMagmatic(b: RecordBuilder, d: BecameMagmaticData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  if (d.isUnstable) {
    b.pushDescription(`${d.playerName} is Unstable!`);
  }
  b.pushDescription(`${TRIED_TO_INCINERATE}${d.playerName}, but ${d.playerName}${ATE_THE_FLAME}`);
  b.pushPlayerTag(d.playerId);
  const added = d.magmaticModAdded;
  if (added) {
    b.pushChild(added.sub, EventType.AddedMod, (child) => {
      child.pushDescription(`${d.playerName} ate some flame.`);
      child.pushPlayerTag(d.playerId);
      child.pushTeamTag(added.teamId);
      child.setMetadata("mod", "MAGMATIC");
      child.setMetadata("type", ModDuration.Permanent);
    });
  }
  return EventType.IncinerationBlocked;
}

// ---------------------------------------------------------------------------
// Team-wide toggles
// ---------------------------------------------------------------------------

function underseaSpec(teamName: string): ModChildSpec {
  return {
    type: EventType.AddedModFromOtherMod,
    description: `The ${teamName} go Undersea. They're now Overperforming!`,
    mod: "OVERPERFORMING",
    source: "UNDERSEA",
    duration: ModDuration.Game,
  };
}

export function parseUndersea(c: ParseCursor): UnderseaData {
  const game = parseGame(c);
  const teamName = c.line(
    preceded("The ", lineEndingWith(" go Undersea. They're now Overperforming!")),
  );
  const change = parseTeamModChild(c, underseaSpec(teamName));
  return { kind: "Undersea", game, teamName, change };
}

export function buildUndersea(b: RecordBuilder, d: UnderseaData): EventType {
  buildGame(b, d.game);
  const spec = underseaSpec(d.teamName);
  b.pushDescription(spec.description);
  buildTeamModChild(b, d.change, spec);
  return EventType.Undersea;
}

function highPressureSpec(teamName: string, isOn: boolean): ModChildSpec {
  return {
    type: isOn ? EventType.AddedModFromOtherMod : EventType.RemovedModFromOtherMod,
    description: isOn
      ? `The pressure is on! The ${teamName} are Overperforming.`
      : `The pressure is off. The ${teamName} are no longer Overperforming.`,
    mod: "OVERPERFORMING",
    source: "HIGH_PRESSURE",
    duration: ModDuration.Game,
  };
}

export function parseHighPressure(c: ParseCursor): HighPressureData {
  const game = parseGame(c);
  const [teamName, isOn] = c.line(
    alt(
      map(
        preceded("The pressure is on! The ", lineEndingWith(" are Overperforming.")),
        (team): [string, boolean] => [team, true],
      ),
      map(
        preceded("The pressure is off. The ", lineEndingWith(" are no longer Overperforming.")),
        (team): [string, boolean] => [team, false],
      ),
    ),
  );
  const change = parseTeamModChild(c, highPressureSpec(teamName, isOn));
  return { kind: "HighPressure", game, teamName, isOn, change };
}

export function buildHighPressure(b: RecordBuilder, d: HighPressureData): EventType {
  buildGame(b, d.game);
  const spec = highPressureSpec(d.teamName, d.isOn);
  b.pushDescription(spec.description);
  buildTeamModChild(b, d.change, spec);
  return EventType.HighPressure;
}

export function parseEchoReceiver(c: ParseCursor): EchoReceiverData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const [echoerName, echoeeName] = c.line(
    preceded("ECHO ", pair(takeUntil(" ECHO "), lineEndingWith(" ECHO"))),
  );
  const text = `ECHO ${echoerName} ECHO ${echoeeName} ECHO`;
  const { sub, echoeeId, echoeeTeamId } = c.child(EventType.ModChange, (child) => {
    child.expectLine(text);
    const echoeeId = child.nextPlayerId();
    const echoeeTeamId = child.nextTeamId();
    child.expectMetadata("from", "RECEIVER");
    child.expectMetadata("to", "ECHO");
    child.expectMetadata("type", ModDuration.Permanent);
    return { sub: child.subEvent(), echoeeId, echoeeTeamId };
  });
  return { kind: "EchoReceiver", game, echoerName, echoeeName, echoeeId, echoeeTeamId, sub };
}

export function buildEchoReceiver(b: RecordBuilder, d: EchoReceiverData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  const text = `ECHO ${d.echoerName} ECHO ${d.echoeeName} ECHO`;
  b.pushDescription(text);
  b.pushChild(d.sub, EventType.ModChange, (child) => {
    child.pushDescription(text);
    child.pushPlayerTag(d.echoeeId);
    child.pushTeamTag(d.echoeeTeamId);
    child.setMetadata("from", "RECEIVER");
    child.setMetadata("to", "ECHO");
    child.setMetadata("type", ModDuration.Permanent);
  });
  return EventType.EchoReciever;
}

// ---------------------------------------------------------------------------
// Salmon, polarity and repairs
// ---------------------------------------------------------------------------

const SALMON_SWIM = "The Salmon swim upstream!";
const SALMON_SWAM = "The Salmon swam upstream!";
const NO_RUNS_LOST = "No Runs are lost.";

const runsLostLine: Parser<TeamRunsLost> = map(
  pair(canonicalNumber, preceded(" of the ", lineEndingWith("'s Runs are lost!"))),
  ([runsLost, teamName]) => ({ runsLost, teamName }),
);

function runsLostText(loss: TeamRunsLost): string {
  return `${loss.runsLost} of the ${loss.teamName}'s Runs are lost!`;
}

function itemRestoredText(repair: Pick<ItemRepaired, "playerName" | "itemName" | "itemHealthBefore">): string {
  const [baseName = ""] = repair.itemName.split(" of ");
  const verb = baseName.endsWith("s") ? "were" : "was";
  const outcome = repair.itemHealthBefore === 0 ? "restored!" : "repaired.";
  return `${possessiveOf(repair.playerName)} ${repair.itemName} ${verb} ${outcome}`;
}

const RESTORED_SUFFIXES = [" were restored!", " was restored!", " were repaired.", " was repaired."];

interface RestoredLine {
  playerName: string;
  itemName: string;
  text: string;
}

const itemRestoredLine: Parser<RestoredLine> = (input) => {
  const result = pair(possessive, alt(...RESTORED_SUFFIXES.map((suffix) => lineEndingWith(suffix))))(input);
  if (!result.ok) {
    return result;
  }
  const [playerName, itemName] = result.value;
  const text = input.slice(0, input.length - result.rest.length);
  return { ok: true, value: { playerName, itemName, text }, rest: result.rest };
};

function expelledTexts(playerName: string): [string, string] {
  return [`${playerName} is caught in the bind!`, `Salmon Cannons expelled ${playerName} Elsewhere.`];
}

export function parseSalmonSwim(c: ParseCursor): SalmonSwimData {
  const game = parseGame(c);
  c.expectLine(SALMON_SWIM);
  const inning = c.line(preceded("Inning ", terminated(wholeNumber, " begins again.")));
  const runLosses: TeamRunsLost[] = [];
  if (!c.tryExpectLine(NO_RUNS_LOST)) {
    runLosses.push(c.line(runsLostLine));
    const second = c.tryLine(runsLostLine);
    if (second !== null) {
      runLosses.push(second);
    }
  }

  let itemRestored: ItemRepaired | null = null;
  const restored = c.tryLine(itemRestoredLine);
  if (restored !== null) {
    const { playerName, itemName, text } = restored;
    itemRestored = parseItemRepairedChild(c, [SALMON_SWAM, text], playerName, itemName);
    sameName(c, itemRestoredText(itemRestored), text);
  }

  const expelledName = c.tryLine(lineEndingWith(" is caught in the bind!"));
  let playerExpelled: SentElsewhere | null = null;
  if (expelledName !== null) {
    const taggedId = c.nextPlayerId();
    playerExpelled = parseSentElsewhere(c, expelledName, expelledTexts(expelledName)[1]);
    sameTag(c, "player", taggedId, playerExpelled.playerId);
  }
  c.expectCategory(specialIf(playerExpelled !== null));
  return { kind: "SalmonSwim", game, inning, runLosses, itemRestored, playerExpelled };
}

export function buildSalmonSwim(b: RecordBuilder, d: SalmonSwimData): EventType {
  buildGame(b, d.game);
  b.setCategory(specialIf(d.playerExpelled !== null));
  b.pushDescription(SALMON_SWIM);
  b.pushDescription(`Inning ${d.inning} begins again.`);
  if (d.runLosses.length === 0) {
    b.pushDescription(NO_RUNS_LOST);
  }
  for (const loss of d.runLosses) {
    b.pushDescription(runsLostText(loss));
  }
  if (d.itemRestored) {
    const line = itemRestoredText(d.itemRestored);
    b.pushDescription(line);
    buildItemRepairedChild(b, d.itemRestored, [SALMON_SWAM, line]);
  }
  const expelled = d.playerExpelled;
  if (expelled) {
    b.pushPlayerTag(expelled.playerId);
    const [outer, inner] = expelledTexts(expelled.playerName);
    buildSentElsewhere(b, expelled, outer, inner);
  }
  return EventType.SalmonSwim;
}

const POLARITY_SHIFTED = "The Polarity shifted!";

function polarityLines(numbersGo: PolarityShiftData["numbersGo"]): [string, string] {
  return [POLARITY_SHIFTED, `Numbers go ${numbersGo}.`];
}

function polarityWeather(numbersGo: PolarityShiftData["numbersGo"]): [Weather, Weather] {
  return numbersGo === "up"
    ? [Weather.PolarityMinus, Weather.PolarityPlus]
    : [Weather.PolarityPlus, Weather.PolarityMinus];
}

export function parsePolarityShift(c: ParseCursor): PolarityShiftData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  c.expectLine(POLARITY_SHIFTED);
  const numbersGo = c.line(
    preceded(
      "Numbers go ",
      oneOf([
        ["up.", "up"],
        ["down.", "down"],
      ] as const),
    ),
  );
  const sub = c.child(EventType.WeatherChange, (child) => {
    for (const line of polarityLines(numbersGo)) {
      child.expectLine(line);
    }
    const [before, after] = polarityWeather(numbersGo);
    child.expectMetadata("before", before);
    child.expectMetadata("after", after);
    return child.subEvent();
  });
  return { kind: "PolarityShift", game, numbersGo, sub };
}

export function buildPolarityShift(b: RecordBuilder, d: PolarityShiftData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  const lines = polarityLines(d.numbersGo);
  for (const line of lines) {
    b.pushDescription(line);
  }
  b.pushChild(d.sub, EventType.WeatherChange, (child) => {
    for (const line of lines) {
      child.pushDescription(line);
    }
    const [before, after] = polarityWeather(d.numbersGo);
    child.setMetadata("before", before);
    child.setMetadata("after", after);
  });
  return EventType.PolarityShift;
}

function smithyChildText(playerName: string, itemName: string): string {
  return `${possessiveOf(playerName)} ${itemName} was repaired by Smithy.`;
}

export function parseSmithy(c: ParseCursor): SmithyData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const playerName = c.line(preceded("Smithy beckons to ", lineEndingWith(".")));
  const playerId = c.nextPlayerId();
  const itemName = c.line(lineEndingWith(" is repaired!"));
  const repair = parseItemRepairedChild(c, [smithyChildText(playerName, itemName)], playerName, itemName);
  sameTag(c, "player", playerId, repair.playerId);
  return { kind: "Smithy", game, repair };
}

export function buildSmithy(b: RecordBuilder, d: SmithyData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  const { repair } = d;
  b.pushDescription(`Smithy beckons to ${repair.playerName}.`);
  b.pushPlayerTag(repair.playerId);
  b.pushDescription(`${repair.itemName} is repaired!`);
  buildItemRepairedChild(b, repair, [smithyChildText(repair.playerName, repair.itemName)]);
  return EventType.Smithy;
}

// ---------------------------------------------------------------------------
// Shame, crates and chests
// ---------------------------------------------------------------------------

const SHAME_GRANTED = "Shame Donations are granted!";

export function parseDonatedShameApplied(c: ParseCursor): DonatedShameAppliedData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  c.expectLine(SHAME_GRANTED);
  const [teamName, unruns] = c.line(
    preceded("The ", pair(takeUntil(" receive "), terminated(canonicalNumber, " Unruns."))),
  );
  return { kind: "DonatedShameApplied", game, teamName, unruns };
}

export function buildDonatedShameApplied(b: RecordBuilder, d: DonatedShameAppliedData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(SHAME_GRANTED);
  b.pushDescription(`The ${d.teamName} receive ${d.unruns} Unruns.`);
  return EventType.ShameDonor;
}

const CRATE_DESCENDS = "A shimmering Crate descends.";

export function parseGlitterCrate(c: ParseCursor): GlitterCrateData {
  const game = parseGame(c);
  c.expectLine(CRATE_DESCENDS);
  return { kind: "GlitterCrate", game, gainedItem: parseGainedItem(c) };
}

export function buildGlitterCrate(b: RecordBuilder, d: GlitterCrateData): EventType {
  buildGame(b, d.game);
  b.pushDescription(CRATE_DESCENDS);
  buildGainedItem(b, d.gainedItem);
  return EventType.GlitterCrateDrop;
}

const CHEST_OPENS = "The Community Chest Opens!";

export function parseCommunityChestGameMessage(c: ParseCursor): CommunityChestGameMessageData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  c.expectLine(CHEST_OPENS);
  const first = c.line(gainedItemLine);
  const second = c.line(gainedItemLine);
  return { kind: "CommunityChestGameMessage", game, first, second };
}

export function buildCommunityChestGameMessage(
  b: RecordBuilder,
  d: CommunityChestGameMessageData,
): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(CHEST_OPENS);
  b.pushDescription(gainedItemText(d.first));
  b.pushDescription(gainedItemText(d.second));
  return EventType.CommunityChestOpens;
}
