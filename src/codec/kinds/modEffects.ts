import { z } from "zod";
import {
  AttrCategory,
  EventCategory,
  EventType,
  ModDuration,
  ROSTER_LOCATION_VALUES,
  RosterLocation,
  eventTypeName,
} from "../../contract/eventTypes.js";
import type { SubEventRef, SubseasonalModChange } from "../../model/descriptors.js";
import type {
  ABloodTypeData,
  ConsumerAttackEffect,
  ConsumerExpelledData,
  ConsumerItemDamage,
  ConsumersAttackData,
  EchoChamberData,
  EchoChamberMod,
  EchoChange,
  EchoData,
  EchoedMods,
  EchoIntoStaticData,
  EnterCrimeSceneData,
  FaxMachineData,
  GrindRailData,
  GrindRailOutcome,
  GrindRailTrick,
  PsychoacousticsData,
  StaticEcho,
  SubseasonalModsChangeData,
} from "../../model/occurrence.js";
import type { RecordBuilder } from "../builder.js";
import {
  alt,
  lineEndingWith,
  map,
  oneOf,
  pair,
  parseAll,
  preceded,
  restOfLine,
  takeUntil,
  terminated,
  value,
  type Parser,
} from "../combinators.js";
import type { ParseCursor } from "../cursor.js";
import {
  Int,
  Str,
  buildGame,
  buildStatChild,
  buildSubseasonalChanges,
  canonicalNumber,
  parseGame,
  parseStatChild,
  parseSubseasonalChanges,
  readLooseItemRatings,
  sameName,
  sameTag,
  subseasonalEventType,
  writeLooseItemRatings,
  type StatChildSpec,
} from "../fragments.js";

// In-game records driven by player and stadium mods. All of them are Special.

function shadowsSpec(playerName: string): StatChildSpec {
  return {
    type: EventType.PlayerStatIncrease,
    description: `${playerName} entered the Shadows.`,
    attrCategory: AttrCategory.Overall,
  };
}

// ---------------------------------------------------------------------------
// Subseasonal mods
// ---------------------------------------------------------------------------

export function parseSubseasonalModsChange(c: ParseCursor): SubseasonalModsChangeData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const parsed = parseSubseasonalChanges(c);
  if (parsed.length === 0) {
    return c.fail({
      kind: "DescriptionMismatch",
      expected: "a subseasonal mod change",
      found: c.record.description.slice(0, 40),
    });
  }
  const [first, ...rest] = parsed;
  const changes: [SubseasonalModChange, ...SubseasonalModChange[]] = [first, ...rest];
  const last = rest.length === 0 ? first : rest[rest.length - 1];
  if (subseasonalEventType(last.sourceMod) !== c.type) {
    return c.fail({
      kind: "DescriptionMismatch",
      expected: `a change filed as ${eventTypeName(c.type)}`,
      found: last.sourceMod,
    });
  }
  return { kind: "SubseasonalModsChange", game, changes };
}

/** Filed under the event type of the last change. */
export function buildSubseasonalModsChange(b: RecordBuilder, d: SubseasonalModsChangeData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  buildSubseasonalChanges(b, d.changes);
  const [first, ...rest] = d.changes;
  const last = rest.length === 0 ? first : rest[rest.length - 1];
  return subseasonalEventType(last.sourceMod);
}

// ---------------------------------------------------------------------------
// Psychoacoustics
// ---------------------------------------------------------------------------

/** The second line said "at the" before day 33 of season 15. */
function earlyPsychoacoustics(season: number, day: number): boolean {
  return season < 15 || (season === 15 && day < 33);
}

function psychoacousticsText(d: PsychoacousticsData, early: boolean): string {
  return [
    `${d.stadiumName} is Resonating.`,
    `PsychoAcoustics Echo ${d.modName} ${early ? "at" : "to"} the ${d.teamNickname}.`,
  ].join("\n");
}

export function parsePsychoacoustics(c: ParseCursor): PsychoacousticsData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const subseasonalChanges = parseSubseasonalChanges(c);
  const early = earlyPsychoacoustics(c.season, c.day);
  const echo = c.child(EventType.AddedModFromOtherMod, (child) => {
    const stadiumName = child.line(lineEndingWith(" is Resonating."));
    const [modName, teamNickname] = child.line(
      preceded("PsychoAcoustics Echo ", pair(takeUntil(early ? " at the " : " to the "), lineEndingWith("."))),
    );
    const teamId = child.nextTeamId();
    const modId = child.metadata("mod", Str);
    child.expectMetadata("source", "PSYCHOACOUSTICS");
    child.expectMetadata("type", ModDuration.Game);
    return { sub: child.subEvent(), stadiumName, modName, teamNickname, teamId, modId };
  });
  const data: PsychoacousticsData = { kind: "Psychoacoustics", game, subseasonalChanges, ...echo };
  // Early records left the parent's own text out.
  if (!early) {
    c.expectLine(psychoacousticsText(data, early));
  }
  return data;
}

export function buildPsychoacoustics(b: RecordBuilder, d: PsychoacousticsData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  buildSubseasonalChanges(b, d.subseasonalChanges);
  const early = earlyPsychoacoustics(b.season, b.day);
  const text = psychoacousticsText(d, early);
  if (!early) {
    b.pushDescription(text);
  }
  b.pushChild(d.sub, EventType.AddedModFromOtherMod, (child) => {
    child.pushDescription(text);
    child.pushTeamTag(d.teamId);
    child.setMetadata("mod", d.modId);
    child.setMetadata("source", "PSYCHOACOUSTICS");
    child.setMetadata("type", ModDuration.Game);
  });
  return EventType.Psychoacoustics;
}

// ---------------------------------------------------------------------------
// Consumers
// ---------------------------------------------------------------------------

function consumerItemText(itemName: string, healthAfter: number): string {
  const outcome = healthAfter > 0 ? "DAMAGED" : itemName.endsWith("s") ? "BREAK" : "BREAKS";
  return `${itemName.toUpperCase()} ${outcome}`;
}

function consumerItemType(healthAfter: number): EventType {
  return healthAfter === 0 ? EventType.ItemBreaks : EventType.ItemDamaged;
}

function parseDefended(c: ParseCursor, itemText: string): { playerId: string; damage: ConsumerItemDamage } {
  const type = c.peekChild()?.type === EventType.ItemBreaks ? EventType.ItemBreaks : EventType.ItemDamaged;
  const description = c.record.description;
  return c.child(type, (child) => {
    child.expectLine(description);
    const playerId = child.nextPlayerId();
    const teamId = child.nextTeamId();
    const itemName = child.metadata("itemName", Str);
    const itemHealthAfter = child.metadata("itemHealthAfter", Int);
    if (consumerItemType(itemHealthAfter) !== type) {
      child.fail({ kind: "UnexpectedMetadataValue", field: "itemHealthAfter", value: String(itemHealthAfter) });
    }
    sameName(child, consumerItemText(itemName, itemHealthAfter), itemText);
    const damage: ConsumerItemDamage = {
      sub: child.subEvent(),
      teamId,
      ...readLooseItemRatings(child, itemName),
      itemDurability: child.metadata("itemDurability", Int),
      itemHealthBefore: child.optionalMetadata("itemHealthBefore", Int) ?? null,
      itemHealthAfter,
    };
    return { playerId, damage };
  });
}

export function parseConsumersAttack(c: ParseCursor): ConsumersAttackData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  c.expectLine("CONSUMERS ATTACK");
  const scattered = c.tryExpectLine("SCATTERED");

  let effect: ConsumerAttackEffect;
  let targetId: string;
  let playerName = c.tryLine(lineEndingWith(" DEFENDS"));
  if (playerName !== null) {
    c.expectLine("");
    const defended = parseDefended(c, c.line(restOfLine));
    effect = { type: "defended", damage: defended.damage };
    targetId = defended.playerId;
  } else {
    playerName = c.line(restOfLine);
    const chomp = parseStatChild(c, playerName, {
      type: EventType.PlayerStatDecrease,
      description: c.record.description,
      attrCategory: AttrCategory.Overall,
    });
    const { sub, teamId, ratingBefore, ratingAfter } = chomp;
    effect = { type: "chomp", sub, teamId, ratingBefore, ratingAfter };
    targetId = chomp.playerId;
  }

  const sensedSomethingFishy = c.childIf(EventType.InvestigationMessage, () => true, (child) => {
    const detectiveName = child.line(lineEndingWith(" sensed something fishy."));
    return { sub: child.subEvent(), playerName: detectiveName, playerId: child.nextPlayerId() };
  });
  const playerId = c.nextPlayerId();
  sameTag(c, "player", playerId, targetId);
  return { kind: "ConsumersAttack", game, playerId, playerName, scattered, effect, sensedSomethingFishy };
}

export function buildConsumersAttack(b: RecordBuilder, d: ConsumersAttackData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushPlayerTag(d.playerId);
  b.pushDescription("CONSUMERS ATTACK");
  if (d.scattered) {
    b.pushDescription("SCATTERED");
  }

  const effect = d.effect;
  if (effect.type === "chomp") {
    b.pushDescription(d.playerName);
    const { sub, teamId, ratingBefore, ratingAfter } = effect;
    buildStatChild(
      b,
      { sub, teamId, playerId: d.playerId, playerName: d.playerName, ratingBefore, ratingAfter },
      { type: EventType.PlayerStatDecrease, description: b.description, attrCategory: AttrCategory.Overall },
    );
  } else {
    const damage = effect.damage;
    b.pushDescription(`${d.playerName} DEFENDS`);
    b.pushDescription("");
    b.pushDescription(consumerItemText(damage.itemName, damage.itemHealthAfter));
    const description = b.description;
    b.pushChild(damage.sub, consumerItemType(damage.itemHealthAfter), (child) => {
      child.pushDescription(description);
      child.pushPlayerTag(d.playerId);
      child.pushTeamTag(damage.teamId);
      writeLooseItemRatings(child, damage);
      child.setMetadata("itemDurability", damage.itemDurability);
      if (damage.itemHealthBefore !== null) {
        child.setMetadata("itemHealthBefore", damage.itemHealthBefore);
      }
      child.setMetadata("itemHealthAfter", damage.itemHealthAfter);
    });
  }

  const fishy = d.sensedSomethingFishy;
  if (fishy) {
    b.pushChild(fishy.sub, EventType.InvestigationMessage, (child) => {
      child.pushDescription(`${fishy.playerName} sensed something fishy.`);
      child.pushPlayerTag(fishy.playerId);
    });
  }
  return EventType.ConsumersAttack;
}

export function parseConsumerExpelled(c: ParseCursor): ConsumerExpelledData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  c.expectLine("SALMON CANNONS FIRE");
  c.expectLine("CONSUMER EXPELLED");
  return { kind: "ConsumerExpelled", game, playerId: c.nextPlayerId() };
}

export function buildConsumerExpelled(b: RecordBuilder, d: ConsumerExpelledData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription("SALMON CANNONS FIRE");
  b.pushDescription("CONSUMER EXPELLED");
  b.pushPlayerTag(d.playerId);
  return EventType.ConsumersAttack;
}

// ---------------------------------------------------------------------------
// Echo Chamber and Grind Rail
// ---------------------------------------------------------------------------

const ECHO_CHAMBER = "The Echo Chamber traps a wave.";

const echoChamberMod: Parser<EchoChamberMod> = oneOf<EchoChamberMod>([
  ["Repeating", "Repeating"],
  ["Reverberating", "Reverberating"],
]);

export function parseEchoChamber(c: ParseCursor): EchoChamberData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  c.expectLine(ECHO_CHAMBER);
  const [playerName, echoMod] = c.line(pair(takeUntil(" is temporarily "), terminated(echoChamberMod, "!")));
  const playerId = c.nextPlayerId();
  const { sub, teamId } = c.child(EventType.AddedMod, (child) => {
    child.expectLine(ECHO_CHAMBER);
    const teamId = child.nextTeamIdOpt();
    child.repeatedPlayerId(playerId);
    child.expectMetadata("mod", echoMod.toUpperCase());
    child.expectMetadata("type", ModDuration.Game);
    return { sub: child.subEvent(), teamId };
  });
  return { kind: "EchoChamber", game, teamId, playerId, playerName, echoMod, sub };
}

export function buildEchoChamber(b: RecordBuilder, d: EchoChamberData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(ECHO_CHAMBER);
  b.pushDescription(`${d.playerName} is temporarily ${d.echoMod}!`);
  b.pushPlayerTag(d.playerId);
  b.pushChild(d.sub, EventType.AddedMod, (child) => {
    child.pushDescription(ECHO_CHAMBER);
    child.pushTeamTag(d.teamId);
    child.pushPlayerTag(d.playerId);
    child.setMetadata("mod", d.echoMod.toUpperCase());
    child.setMetadata("type", ModDuration.Game);
  });
  return EventType.EchoChamber;
}

/** `{prefix}{trick} ({points}){suffix}` on one line. */
function trickLine(prefix: string, suffix: string): Parser<GrindRailTrick> {
  return preceded(prefix, (input) => {
    const body = lineEndingWith(`)${suffix}`)(input);
    if (!body.ok) {
      return body;
    }
    const open = body.value.lastIndexOf(" (");
    const points = open > 0 ? parseAll(canonicalNumber, body.value.slice(open + 2)) : null;
    if (points === null || !points.ok || !Number.isInteger(points.value)) {
      return { ok: false, expected: "a trick and its points", found: input.slice(0, 40) };
    }
    return { ok: true, value: { trickName: body.value.slice(0, open), points: points.value }, rest: body.rest };
  });
}

function trickText(trick: GrindRailTrick): string {
  return `${trick.trickName} (${trick.points})`;
}

const GRIND_RAIL = " hops on the Grind Rail toward third base.";
const BAILED = "... but lose their balance and bail!\nOut!";

const grindRailOutcome: Parser<GrindRailOutcome> = alt<GrindRailOutcome>(
  map(
    terminated(trickLine("They land a ", "!"), "\nSafe!"),
    (secondTrick): GrindRailOutcome => ({ type: "safe", secondTrick }),
  ),
  map(trickLine("They're tagged out doing a ", "!"), (secondTrick): GrindRailOutcome => ({ type: "taggedOut", secondTrick })),
  value<GrindRailOutcome>(BAILED, { type: "bailed" }),
);

function grindRailOutcomeText(outcome: GrindRailOutcome): string {
  switch (outcome.type) {
    case "safe":
      return `They land a ${trickText(outcome.secondTrick)}!\nSafe!`;
    case "taggedOut":
      return `They're tagged out doing a ${trickText(outcome.secondTrick)}!`;
    case "bailed":
      return BAILED;
  }
}

export function parseGrindRail(c: ParseCursor): GrindRailData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const playerName = c.line(lineEndingWith(GRIND_RAIL));
  const firstTrick = c.line(trickLine("They do a ", "!"));
  const outcome = c.line(grindRailOutcome);
  return { kind: "GrindRail", game, playerId: c.nextPlayerId(), playerName, firstTrick, outcome };
}

export function buildGrindRail(b: RecordBuilder, d: GrindRailData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(`${d.playerName}${GRIND_RAIL}`);
  b.pushDescription(`They do a ${trickText(d.firstTrick)}!`);
  b.pushDescription(grindRailOutcomeText(d.outcome));
  b.pushPlayerTag(d.playerId);
  return EventType.GrindRail;
}

// ---------------------------------------------------------------------------
// Echoes
// ---------------------------------------------------------------------------

interface EchoLayout {
  duration: ModDuration;
  source: string;
  fadedSuffix: string;
  addedSuffix: string;
}

function primaryEchoLayout(echoeeName: string): EchoLayout {
  return {
    duration: ModDuration.Permanent,
    source: "ECHO",
    fadedSuffix: "'s Echo faded.",
    addedSuffix: ` Echoed ${echoeeName}!`,
  };
}

function receiverEchoLayout(primaryReceiverName: string): EchoLayout {
  return {
    duration: ModDuration.Seasonal,
    source: "RECEIVER",
    fadedSuffix: "'s Echoed Echo faded.",
    addedSuffix: `'s Echoed an Echo from ${primaryReceiverName}!`,
  };
}

function echoedModsSchema(duration: ModDuration) {
  return z.array(z.object({ mod: Str, type: z.literal(duration) }).strict());
}

function readEchoedMods(child: ParseCursor, key: string, layout: EchoLayout): EchoedMods {
  const mods = child.metadata(key, echoedModsSchema(layout.duration));
  child.expectMetadata("source", layout.source);
  return { sub: child.subEvent(), modIds: mods.map((entry) => entry.mod) };
}

function writeEchoedMods(child: RecordBuilder, key: string, mods: EchoedMods, layout: EchoLayout): void {
  child.setMetadata(
    key,
    mods.modIds.map((mod) => ({ type: layout.duration, mod })),
  );
  child.setMetadata("source", layout.source);
}

/** An optional RemovedModsFromAnotherMod child, then an AddedModsFromAnotherMod one. */
function parseEchoChange(c: ParseCursor, layout: EchoLayout): EchoChange {
  const removed = c.childIf(
    EventType.RemovedModsFromAnotherMod,
    (record) => record.type === EventType.RemovedModsFromAnotherMod,
    (child) => {
      const receiverName = child.line(lineEndingWith(layout.fadedSuffix));
      const receiverId = child.nextPlayerId();
      const receiverTeamId = child.nextTeamId();
      return { receiverName, receiverId, receiverTeamId, mods: readEchoedMods(child, "removes", layout) };
    },
  );
  return c.child(EventType.AddedModsFromAnotherMod, (child) => {
    const receiverName = child.line(lineEndingWith(layout.addedSuffix));
    const receiverId = child.nextPlayerId();
    const receiverTeamId = child.nextTeamId();
    if (removed) {
      sameName(child, removed.receiverName, receiverName);
      sameTag(child, "player", removed.receiverId, receiverId);
      sameTag(child, "team", removed.receiverTeamId, receiverTeamId);
    }
    return {
      receiverId,
      receiverName,
      receiverTeamId,
      modsRemoved: removed ? removed.mods : null,
      modsAdded: readEchoedMods(child, "adds", layout),
    };
  });
}

function buildEchoChange(b: RecordBuilder, echo: EchoChange, layout: EchoLayout): void {
  const removed = echo.modsRemoved;
  if (removed) {
    b.pushChild(removed.sub, EventType.RemovedModsFromAnotherMod, (child) => {
      child.pushDescription(`${echo.receiverName}${layout.fadedSuffix}`);
      child.pushPlayerTag(echo.receiverId);
      child.pushTeamTag(echo.receiverTeamId);
      writeEchoedMods(child, "removes", removed, layout);
    });
  }
  b.pushChild(echo.modsAdded.sub, EventType.AddedModsFromAnotherMod, (child) => {
    child.pushDescription(`${echo.receiverName}${layout.addedSuffix}`);
    child.pushPlayerTag(echo.receiverId);
    child.pushTeamTag(echo.receiverTeamId);
    writeEchoedMods(child, "adds", echo.modsAdded, layout);
  });
}

/**
 * `X Echoed Y!`: the receiver copies the echoee's mods, and every Receiver on
 * the field copies them in turn. The parent has the main echo's text and no tags.
 */
export function parseEcho(c: ParseCursor): EchoData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const [receiverName, echoeeName] = c.line(pair(takeUntil(" Echoed "), lineEndingWith("!")));
  const primaryEcho = parseEchoChange(c, primaryEchoLayout(echoeeName));
  sameName(c, receiverName, primaryEcho.receiverName);
  const receiverEchoes: EchoChange[] = [];
  while (c.peekChild() !== undefined) {
    receiverEchoes.push(parseEchoChange(c, receiverEchoLayout(receiverName)));
  }
  return { kind: "Echo", game, echoeeName, primaryEcho, receiverEchoes };
}

export function buildEcho(b: RecordBuilder, d: EchoData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(`${d.primaryEcho.receiverName} Echoed ${d.echoeeName}!`);
  buildEchoChange(b, d.primaryEcho, primaryEchoLayout(d.echoeeName));
  const layout = receiverEchoLayout(d.primaryEcho.receiverName);
  for (const echo of d.receiverEchoes) {
    buildEchoChange(b, echo, layout);
  }
  return EventType.Echo;
}

const staticLine: Parser<string> = preceded("ECHO ", lineEndingWith(" STATIC"));

interface RemovedFromTeam {
  sub: SubEventRef;
  playerId: string;
  teamId: string;
  teamNickname: string;
}

function parseRemovedFromTeam(c: ParseCursor, description: string, playerName: string): RemovedFromTeam {
  return c.child(EventType.PlayerRemovedFromTeam, (child) => {
    child.expectLine(description);
    const playerId = child.nextPlayerId();
    const teamId = child.nextTeamId();
    child.expectMetadata("playerId", playerId);
    child.expectMetadata("playerName", playerName);
    child.expectMetadata("teamId", teamId);
    const teamNickname = child.metadata("teamName", Str);
    return { sub: child.subEvent(), playerId, teamId, teamNickname };
  });
}

function parseEchoTurnedStatic(c: ParseCursor, description: string, removed: RemovedFromTeam): SubEventRef {
  return c.child(EventType.ModChange, (child) => {
    child.expectLine(description);
    sameTag(child, "player", removed.playerId, child.nextPlayerId());
    sameTag(child, "team", removed.teamId, child.nextTeamId());
    child.expectMetadata("from", "ECHO");
    child.expectMetadata("to", "STATIC");
    child.expectMetadata("type", ModDuration.Permanent);
    return child.subEvent();
  });
}

function staticEcho(playerName: string, removed: RemovedFromTeam, modChangedSub: SubEventRef): StaticEcho {
  return {
    playerId: removed.playerId,
    playerName,
    teamId: removed.teamId,
    teamNickname: removed.teamNickname,
    removedFromTeamSub: removed.sub,
    modChangedSub,
  };
}

/** Both players leave their teams, then both Echo mods turn Static; every child repeats the whole text. */
export function parseEchoIntoStatic(c: ParseCursor): EchoIntoStaticData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const echoerName = c.line(staticLine);
  const echoeeName = c.line(staticLine);
  const description = c.record.description;
  const echoerRemoved = parseRemovedFromTeam(c, description, echoerName);
  const echoeeRemoved = parseRemovedFromTeam(c, description, echoeeName);
  const echoerChanged = parseEchoTurnedStatic(c, description, echoerRemoved);
  const echoeeChanged = parseEchoTurnedStatic(c, description, echoeeRemoved);
  return {
    kind: "EchoIntoStatic",
    game,
    echoer: staticEcho(echoerName, echoerRemoved, echoerChanged),
    echoee: staticEcho(echoeeName, echoeeRemoved, echoeeChanged),
  };
}

export function buildEchoIntoStatic(b: RecordBuilder, d: EchoIntoStaticData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(`ECHO ${d.echoer.playerName} STATIC`);
  b.pushDescription(`ECHO ${d.echoee.playerName} STATIC`);
  const description = b.description;
  for (const echo of [d.echoer, d.echoee]) {
    b.pushChild(echo.removedFromTeamSub, EventType.PlayerRemovedFromTeam, (child) => {
      child.pushDescription(description);
      child.pushPlayerTag(echo.playerId);
      child.pushTeamTag(echo.teamId);
      child.setMetadata("playerId", echo.playerId);
      child.setMetadata("playerName", echo.playerName);
      child.setMetadata("teamId", echo.teamId);
      child.setMetadata("teamName", echo.teamNickname);
    });
  }
  for (const echo of [d.echoer, d.echoee]) {
    b.pushChild(echo.modChangedSub, EventType.ModChange, (child) => {
      child.pushDescription(description);
      child.pushPlayerTag(echo.playerId);
      child.pushTeamTag(echo.teamId);
      child.setMetadata("from", "ECHO");
      child.setMetadata("to", "STATIC");
      child.setMetadata("type", ModDuration.Permanent);
    });
  }
  return EventType.EchoIntoStatic;
}

// ---------------------------------------------------------------------------
// Blood types
// ---------------------------------------------------------------------------

export function parseABloodType(c: ParseCursor): ABloodTypeData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const teamNickname = c.line(preceded("The ", lineEndingWith(" have A Blood Type.")));
  const { sub, teamId, bloodTypeModId } = c.child(EventType.AddedModFromOtherMod, (child) => {
    child.expectLine(`The ${teamNickname} have A Blood Type.`);
    const teamId = child.nextTeamId();
    const bloodTypeModId = child.metadata("mod", Str);
    child.expectMetadata("source", "A");
    child.expectMetadata("type", ModDuration.Game);
    return { sub: child.subEvent(), teamId, bloodTypeModId };
  });
  return { kind: "ABloodType", game, teamId, teamNickname, bloodTypeModId, sub };
}

export function buildABloodType(b: RecordBuilder, d: ABloodTypeData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  const text = `The ${d.teamNickname} have A Blood Type.`;
  b.pushDescription(text);
  b.pushChild(d.sub, EventType.AddedModFromOtherMod, (child) => {
    child.pushDescription(text);
    child.pushTeamTag(d.teamId);
    child.setMetadata("mod", d.bloodTypeModId);
    child.setMetadata("source", "A");
    child.setMetadata("type", ModDuration.Game);
  });
  return EventType.ABloodType;
}

// ---------------------------------------------------------------------------
// Shadows
// ---------------------------------------------------------------------------

export function parseEnterCrimeScene(c: ParseCursor): EnterCrimeSceneData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  const [playerName, stadiumName] = c.line(
    pair(takeUntil(" enters the Crime Scene at "), lineEndingWith(" to Investigate...")),
  );
  const moved = c.child(EventType.PlayerMoved, (child) => {
    child.expectLine(`${playerName} entered the Crime Scene at ${stadiumName} to Investigate...`);
    const playerId = child.nextPlayerId();
    const previousTeamId = child.nextTeamId();
    const newTeamId = child.nextTeamId();
    const previousLocation = child.metadataEnum("location", Int, ROSTER_LOCATION_VALUES);
    child.expectMetadata("playerId", playerId);
    child.expectMetadata("playerName", playerName);
    child.expectMetadata("receiveLocation", RosterLocation.Bullpen);
    child.expectMetadata("receiveTeamId", newTeamId);
    child.expectMetadata("sendTeamId", previousTeamId);
    return {
      crimeSceneSub: child.subEvent(),
      playerId,
      previousTeamId,
      previousTeamName: child.metadata("sendTeamName", Str),
      previousLocation,
      newTeamId,
      newTeamName: child.metadata("receiveTeamName", Str),
    };
  });
  const shadows = parseStatChild(c, playerName, shadowsSpec(playerName));
  sameTag(c, "player", moved.playerId, shadows.playerId);
  sameTag(c, "team", moved.newTeamId, shadows.teamId);
  return {
    kind: "EnterCrimeScene",
    game,
    playerName,
    stadiumName,
    ...moved,
    ratingBefore: shadows.ratingBefore,
    ratingAfter: shadows.ratingAfter,
    shadowsSub: shadows.sub,
  };
}

export function buildEnterCrimeScene(b: RecordBuilder, d: EnterCrimeSceneData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription(`${d.playerName} enters the Crime Scene at ${d.stadiumName} to Investigate...`);
  b.pushChild(d.crimeSceneSub, EventType.PlayerMoved, (child) => {
    child.pushDescription(`${d.playerName} entered the Crime Scene at ${d.stadiumName} to Investigate...`);
    child.pushPlayerTag(d.playerId);
    child.pushTeamTag(d.previousTeamId);
    child.pushTeamTag(d.newTeamId);
    child.setMetadata("location", d.previousLocation);
    child.setMetadata("playerId", d.playerId);
    child.setMetadata("playerName", d.playerName);
    child.setMetadata("receiveLocation", RosterLocation.Bullpen);
    child.setMetadata("receiveTeamId", d.newTeamId);
    child.setMetadata("receiveTeamName", d.newTeamName);
    child.setMetadata("sendTeamId", d.previousTeamId);
    child.setMetadata("sendTeamName", d.previousTeamName);
  });
  buildStatChild(
    b,
    {
      sub: d.shadowsSub,
      teamId: d.newTeamId,
      playerId: d.playerId,
      playerName: d.playerName,
      ratingBefore: d.ratingBefore,
      ratingAfter: d.ratingAfter,
    },
    shadowsSpec(d.playerName),
  );
  return EventType.EnterCrimeScene;
}

/** Before season 17 the swap child only said that the team moved someone. */
function faxSwapText(season: number, teamNickname: string, exitingPitcherName: string): string {
  return season < 17
    ? `The ${teamNickname} made a roster move.`
    : `${exitingPitcherName} was replaced by an incoming Fax.`;
}

export function parseFaxMachine(c: ParseCursor): FaxMachineData {
  const game = parseGame(c);
  c.expectCategory(EventCategory.Special);
  c.expectLine("10 Runs collected.");
  c.expectLine("Incoming Shadow Fax...");
  const [exitingPitcherName, enteringPitcherName] = c.line(pair(takeUntil(" is replaced by "), lineEndingWith(".")));
  const exitingPitcherId = c.nextPlayerId();
  const enteringPitcherId = c.nextPlayerId();

  const swap = c.child(EventType.PlayerSwap, (child) => {
    let printedTeam: string | null = null;
    if (c.season < 17) {
      printedTeam = child.line(preceded("The ", lineEndingWith(" made a roster move.")));
    } else {
      child.expectLine(`${exitingPitcherName} was replaced by an incoming Fax.`);
    }
    child.repeatedPlayerId(exitingPitcherId);
    child.repeatedPlayerId(enteringPitcherId);
    const teamId = child.nextTeamId();
    const teamNickname = child.metadata("teamName", Str);
    if (printedTeam !== null) {
      sameName(child, teamNickname, printedTeam);
    }
    child.expectMetadata("aLocation", RosterLocation.Rotation);
    child.expectMetadata("aPlayerId", exitingPitcherId);
    child.expectMetadata("aPlayerName", exitingPitcherName);
    child.expectMetadata("bPlayerId", enteringPitcherId);
    child.expectMetadata("bPlayerName", enteringPitcherName);
    child.expectMetadata("teamId", teamId);
    return {
      swapSub: child.subEvent(),
      teamId,
      teamNickname,
      shadowsLocation: child.metadataEnum("bLocation", Int, ROSTER_LOCATION_VALUES),
    };
  });

  const shadows = parseStatChild(c, exitingPitcherName, shadowsSpec(exitingPitcherName));
  sameTag(c, "player", exitingPitcherId, shadows.playerId);
  sameTag(c, "team", swap.teamId, shadows.teamId);
  return {
    kind: "FaxMachine",
    game,
    ...swap,
    exitingPitcherId,
    exitingPitcherName,
    enteringPitcherId,
    enteringPitcherName,
    ratingBefore: shadows.ratingBefore,
    ratingAfter: shadows.ratingAfter,
    shadowsSub: shadows.sub,
  };
}

export function buildFaxMachine(b: RecordBuilder, d: FaxMachineData): EventType {
  buildGame(b, d.game);
  b.setCategory(EventCategory.Special);
  b.pushDescription("10 Runs collected.");
  b.pushDescription("Incoming Shadow Fax...");
  b.pushDescription(`${d.exitingPitcherName} is replaced by ${d.enteringPitcherName}.`);
  b.pushPlayerTag(d.exitingPitcherId);
  b.pushPlayerTag(d.enteringPitcherId);
  b.pushChild(d.swapSub, EventType.PlayerSwap, (child) => {
    child.pushDescription(faxSwapText(b.season, d.teamNickname, d.exitingPitcherName));
    child.pushPlayerTag(d.exitingPitcherId);
    child.pushPlayerTag(d.enteringPitcherId);
    child.pushTeamTag(d.teamId);
    child.setMetadata("aLocation", RosterLocation.Rotation);
    child.setMetadata("aPlayerId", d.exitingPitcherId);
    child.setMetadata("aPlayerName", d.exitingPitcherName);
    child.setMetadata("bLocation", d.shadowsLocation);
    child.setMetadata("bPlayerId", d.enteringPitcherId);
    child.setMetadata("bPlayerName", d.enteringPitcherName);
    child.setMetadata("teamId", d.teamId);
    child.setMetadata("teamName", d.teamNickname);
  });
  buildStatChild(
    b,
    {
      sub: d.shadowsSub,
      teamId: d.teamId,
      playerId: d.exitingPitcherId,
      playerName: d.exitingPitcherName,
      ratingBefore: d.ratingBefore,
      ratingAfter: d.ratingAfter,
    },
    shadowsSpec(d.exitingPitcherName),
  );
  return EventType.FaxMachine;
}
