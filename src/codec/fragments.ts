import { z } from "zod";
import { EventType, ModDuration, type EventCategory } from "../contract/eventTypes.js";
import type { WireRecord } from "../contract/types.js";
import type {
  Base,
  FreeRefill,
  GainedItemLine,
  Game,
  ItemDamage,
  ItemDamageOutcome,
  ItemDropped,
  ItemDurability,
  ItemGained,
  ItemRatings,
  ItemRepaired,
  LooseItemRatings,
  Magmatic,
  ModChange,
  ModChangeWithPlayer,
  PerformingToggle,
  PlayerNameId,
  PlayerStatChange,
  ScoringPlayer,
  Scores,
  SentElsewhere,
  SpicyStatus,
  StoppedInhabiting,
  SubEventRef,
  SubseasonalMod,
  SubseasonalModChange,
} from "../model/descriptors.js";
import type { RecordBuilder } from "./builder.js";
import {
  alt,
  decimal,
  lineEndingWith,
  map,
  oneOf,
  pair,
  possessive,
  possessiveOf,
  preceded,
  takeUntil,
  type Parser,
} from "./combinators.js";
import type { ParseCursor } from "./cursor.js";
import type { TagType } from "./errors.js";

// Shared grammar/builder pairs for side effects that appear on many kinds.
// Each parse function consumes text, tags and children in the same per-stream
// order its build counterpart emits them.

export const Uuid = z.string().uuid();
export const Str = z.string();
export const Num = z.number();
export const Int = z.number().int();
export const StrList = z.array(z.string());

export function hasMod(mod: string): (record: WireRecord) => boolean {
  return (record) => record.metadata["mod"] === mod;
}

/** Child predicate matching on the end of the description. */
export function describes(suffix: string): (record: WireRecord) => boolean {
  return (record) => record.description.endsWith(suffix);
}

/** Fail unless a name read twice from the description is the same both times. */
export function sameName(c: ParseCursor, expected: string, found: string): void {
  if (expected !== found) {
    c.fail({ kind: "DescriptionMismatch", expected: JSON.stringify(expected), found });
  }
}

/** Fail unless two ids that must name the same entity agree. */
export function sameTag(c: ParseCursor, tagType: TagType, first: string, second: string): void {
  if (first !== second) {
    c.fail({ kind: "ExpectedEqualTags", tagType, first, second });
  }
}

const BASES: ReadonlyArray<readonly [string, Base]> = [
  ["first", "first"],
  ["second", "second"],
  ["third", "third"],
  ["fourth", "fourth"],
  ["fifth", "fifth"],
];

export const base: Parser<Base> = oneOf(BASES);

/** Number written the way the feed writes it; `4.0` or `04` would not rebuild. */
export const canonicalNumber: Parser<number> = (input) => {
  const result = decimal(input);
  if (result.ok && input.slice(0, input.length - result.rest.length) !== String(result.value)) {
    return { ok: false, expected: "a number in canonical form", found: input.slice(0, 40) };
  }
  return result;
};

// ---------------------------------------------------------------------------
// Games
// ---------------------------------------------------------------------------

const SECRET_BASE_SUFFIX = " enters the Secret Base...";
const UNSCATTERED_SUFFIX = " was Unscattered.";

export interface GameOptions {
  /** Off for the secret-base record itself, whose whole text is that line. */
  attractor?: boolean;
}

export function parseGame(c: ParseCursor, options: GameOptions = {}): Game {
  const gameId = c.nextGameId();
  const awayTeamId = c.nextTeamId();
  const homeTeamId = c.nextTeamId();
  const play = c.consumeReserved("play");
  if (play === undefined) {
    return c.fail({ kind: "MissingMetadata", field: "play" });
  }
  const subPlay = c.consumeReserved("subPlay");
  if (subPlay !== -1) {
    return c.fail({ kind: "UnexpectedMetadataValue", field: "subPlay", value: String(subPlay) });
  }

  const unscatter = c.childIf(EventType.RemovedMod, describes(UNSCATTERED_SUFFIX), (child) => {
    const playerName = child.line(lineEndingWith(UNSCATTERED_SUFFIX));
    const playerId = child.nextPlayerId();
    const teamId = child.nextTeamId();
    child.expectMetadata("mod", "SCATTERED");
    child.expectMetadata("type", ModDuration.Permanent);
    return { sub: child.subEvent(), teamId, playerId, playerName };
  });

  let attractorSecretBase: Game["attractorSecretBase"] = null;
  if (options.attractor !== false) {
    const playerName = c.tryLine(lineEndingWith(SECRET_BASE_SUFFIX));
    if (playerName !== null) {
      attractorSecretBase = { playerName, playerId: c.nextPlayerId() };
      c.forceSpecial();
    }
  }

  return { gameId, homeTeamId, awayTeamId, play, unscatter, attractorSecretBase };
}

export function buildGame(b: RecordBuilder, game: Game): void {
  b.setGame(game);
  const unscatter = game.unscatter;
  if (unscatter) {
    b.pushChild(unscatter.sub, EventType.RemovedMod, (child) => {
      child.pushDescription(`${unscatter.playerName} was Unscattered.`);
      child.pushPlayerTag(unscatter.playerId);
      child.pushTeamTag(unscatter.teamId);
      child.setMetadata("mod", "SCATTERED");
      child.setMetadata("type", ModDuration.Permanent);
    });
  }
  if (game.attractorSecretBase) {
    b.pushDescription(`${game.attractorSecretBase.playerName}${SECRET_BASE_SUFFIX}`);
    b.pushPlayerTag(game.attractorSecretBase.playerId);
    b.forceSpecial();
  }
}

// ---------------------------------------------------------------------------
// Mod changes
// ---------------------------------------------------------------------------

export interface ModChildSpec {
  type: number;
  description: string;
  mod: string;
  duration?: ModDuration;
  /** Mod that caused this one, for the *FromOtherMod types. */
  source?: string;
  category?: EventCategory;
}

function readModMetadata(child: ParseCursor, spec: ModChildSpec): void {
  if (spec.category !== undefined) {
    child.expectCategory(spec.category);
  }
  child.expectLine(spec.description);
  child.expectMetadata("mod", spec.mod);
  if (spec.source !== undefined) {
    child.expectMetadata("source", spec.source);
  }
  child.expectMetadata("type", spec.duration ?? ModDuration.Permanent);
}

function writeModMetadata(child: RecordBuilder, spec: ModChildSpec): void {
  if (spec.category !== undefined) {
    child.setCategory(spec.category);
  }
  child.pushDescription(spec.description);
  child.setMetadata("mod", spec.mod);
  if (spec.source !== undefined) {
    child.setMetadata("source", spec.source);
  }
  child.setMetadata("type", spec.duration ?? ModDuration.Permanent);
}

/** Child adding or removing a mod on a player: one player tag, one team tag. */
export function parsePlayerModChild(c: ParseCursor, spec: ModChildSpec): ModChangeWithPlayer {
  return c.child(spec.type, (child) => {
    readModMetadata(child, spec);
    const playerId = child.nextPlayerId();
    const teamId = child.nextTeamId();
    return { sub: child.subEvent(), playerId, teamId };
  });
}

export function buildPlayerModChild(
  b: RecordBuilder,
  change: ModChangeWithPlayer,
  spec: ModChildSpec,
): void {
  b.pushChild(change.sub, spec.type, (child) => {
    writeModMetadata(child, spec);
    child.pushPlayerTag(change.playerId);
    child.pushTeamTag(change.teamId);
  });
}

/** Child adding or removing a mod on a team: one team tag. */
export function parseTeamModChild(c: ParseCursor, spec: ModChildSpec): ModChange {
  return c.child(spec.type, (child) => {
    readModMetadata(child, spec);
    return { sub: child.subEvent(), teamId: child.nextTeamId() };
  });
}

export function buildTeamModChild(b: RecordBuilder, change: ModChange, spec: ModChildSpec): void {
  b.pushChild(change.sub, spec.type, (child) => {
    writeModMetadata(child, spec);
    child.pushTeamTag(change.teamId);
  });
}

// ---------------------------------------------------------------------------
// Free refills
// ---------------------------------------------------------------------------

export function parseFreeRefill(c: ParseCursor): FreeRefill | null {
  const playerName = c.tryLine(lineEndingWith(" used their Free Refill."));
  if (playerName === null) {
    return null;
  }
  c.expectLine(`${playerName} Refills the In!`);
  return c.child(EventType.RemovedMod, (child) => {
    child.expectLine(`${playerName} used their Free Refill.`);
    const playerId = child.nextPlayerId();
    const teamId = child.nextTeamIdOpt();
    child.expectMetadata("mod", "COFFEE_RALLY");
    child.expectMetadata("type", ModDuration.Permanent);
    return { sub: child.subEvent(), playerName, playerId, teamId };
  });
}

export function buildFreeRefill(b: RecordBuilder, refill: FreeRefill | null): void {
  if (!refill) {
    return;
  }
  b.pushDescription(`${refill.playerName} used their Free Refill.`);
  b.pushDescription(`${refill.playerName} Refills the In!`);
  b.pushChild(refill.sub, EventType.RemovedMod, (child) => {
    child.pushDescription(`${refill.playerName} used their Free Refill.`);
    child.pushPlayerTag(refill.playerId);
    child.pushTeamTag(refill.teamId);
    child.setMetadata("mod", "COFFEE_RALLY");
    child.setMetadata("type", ModDuration.Permanent);
  });
}

export function parseFreeRefills(c: ParseCursor): FreeRefill[] {
  const refills: FreeRefill[] = [];
  for (let refill = parseFreeRefill(c); refill !== null; refill = parseFreeRefill(c)) {
    refills.push(refill);
  }
  return refills;
}

export function buildFreeRefills(b: RecordBuilder, refills: FreeRefill[]): void {
  for (const refill of refills) {
    buildFreeRefill(b, refill);
  }
}

// ---------------------------------------------------------------------------
// Items
// ---------------------------------------------------------------------------

const OUTCOME_TEXT: Record<ItemDamageOutcome, string> = {
  broke: "broke!",
  damaged: "was damaged.",
  damagedPlural: "were damaged.",
};

interface ItemDamageWords {
  itemName: string;
  outcome: ItemDamageOutcome;
}

interface ItemDamageText extends ItemDamageWords {
  playerName: string;
}

const itemDamageLine: Parser<ItemDamageText> = map(
  pair(
    possessive,
    alt<ItemDamageWords>(
      map(lineEndingWith(" broke!"), (itemName): ItemDamageWords => ({ itemName, outcome: "broke" })),
      map(lineEndingWith(" was damaged."), (itemName): ItemDamageWords => ({ itemName, outcome: "damaged" })),
      map(lineEndingWith(" were damaged."), (itemName): ItemDamageWords => ({ itemName, outcome: "damagedPlural" })),
    ),
  ),
  ([playerName, item]) => ({ playerName, ...item }),
);

function itemDamageSentence(text: ItemDamageText): string {
  return `${possessiveOf(text.playerName)} ${text.itemName} ${OUTCOME_TEXT[text.outcome]}`;
}

export function readItemRatings(c: ParseCursor, itemName: string): ItemRatings {
  c.expectMetadata("itemName", itemName);
  return {
    itemId: c.metadata("itemId", Str),
    itemName,
    itemMods: c.metadata("mods", StrList),
    playerItemRatingBefore: c.metadata("playerItemRatingBefore", Num),
    playerItemRatingAfter: c.metadata("playerItemRatingAfter", Num),
    playerRating: c.metadata("playerRating", Num),
  };
}

export function writeItemRatings(b: RecordBuilder, item: ItemRatings): void {
  b.setMetadata("itemId", item.itemId);
  b.setMetadata("itemName", item.itemName);
  b.setMetadata("mods", item.itemMods);
  b.setMetadata("playerItemRatingBefore", item.playerItemRatingBefore);
  b.setMetadata("playerItemRatingAfter", item.playerItemRatingAfter);
  b.setMetadata("playerRating", item.playerRating);
}

function readOptionalRating(c: ParseCursor, key: string): number | null {
  return c.optionalMetadata(key, Num) ?? null;
}

function writeOptionalRating(b: RecordBuilder, key: string, rating: number | null): void {
  if (rating !== null) {
    b.setMetadata(key, rating);
  }
}

export function readLooseItemRatings(c: ParseCursor, itemName: string): LooseItemRatings {
  c.expectMetadata("itemName", itemName);
  return {
    itemId: c.metadata("itemId", Str),
    itemName,
    itemMods: c.metadata("mods", StrList),
    playerItemRatingBefore: readOptionalRating(c, "playerItemRatingBefore"),
    playerItemRatingAfter: readOptionalRating(c, "playerItemRatingAfter"),
    playerRating: c.metadata("playerRating", Num),
  };
}

export function writeLooseItemRatings(b: RecordBuilder, item: LooseItemRatings): void {
  b.setMetadata("itemId", item.itemId);
  b.setMetadata("itemName", item.itemName);
  b.setMetadata("mods", item.itemMods);
  writeOptionalRating(b, "playerItemRatingBefore", item.playerItemRatingBefore);
  writeOptionalRating(b, "playerItemRatingAfter", item.playerItemRatingAfter);
  b.setMetadata("playerRating", item.playerRating);
}

export function readItemDurability(c: ParseCursor): ItemDurability {
  return {
    itemDurability: c.metadata("itemDurability", Int),
    itemHealthBefore: c.metadata("itemHealthBefore", Int),
    itemHealthAfter: c.metadata("itemHealthAfter", Int),
  };
}

export function writeItemDurability(b: RecordBuilder, item: ItemDurability): void {
  b.setMetadata("itemDurability", item.itemDurability);
  b.setMetadata("itemHealthBefore", item.itemHealthBefore);
  b.setMetadata("itemHealthAfter", item.itemHealthAfter);
}

function parseItemDamageChild(c: ParseCursor, text: ItemDamageText): ItemDamage {
  const type = text.outcome === "broke" ? EventType.ItemBreaks : EventType.ItemDamaged;
  return c.child(type, (child) => {
    child.expectLine(itemDamageSentence(text));
    const playerId = child.nextPlayerId();
    const teamId = child.nextTeamId();
    return {
      sub: child.subEvent(),
      outcome: text.outcome,
      playerName: text.playerName,
      playerId,
      teamId,
      ...readItemRatings(child, text.itemName),
      ...readItemDurability(child),
    };
  });
}

/** A damage line, unless it belongs to the `X {scoreText}` line right after it. */
function standaloneItemDamageLine(scoreText: string | undefined): Parser<ItemDamageText> {
  if (scoreText === undefined) {
    return itemDamageLine;
  }
  return (input) => {
    const result = itemDamageLine(input);
    if (!result.ok) {
      return result;
    }
    const scoreLine = `\n${result.value.playerName} ${scoreText}`;
    const next = result.rest.split("\n", 2)[1];
    if (result.rest.startsWith(scoreLine) && next === scoreLine.slice(1)) {
      return { ok: false, expected: "an item damage line", found: input.slice(0, 40) };
    }
    return result;
  };
}

/**
 * `X's Bat broke!` lines, each with an ItemBreaks/ItemDamaged child. With
 * `scoreText`, stops before a damage line that leads into a score.
 */
export function parseItemDamages(c: ParseCursor, scoreText?: string): ItemDamage[] {
  const parser = standaloneItemDamageLine(scoreText);
  const damages: ItemDamage[] = [];
  for (let text = c.tryLine(parser); text !== null; text = c.tryLine(parser)) {
    damages.push(parseItemDamageChild(c, text));
  }
  return damages;
}

export function buildItemDamage(b: RecordBuilder, damage: ItemDamage): void {
  const sentence = itemDamageSentence(damage);
  const type = damage.outcome === "broke" ? EventType.ItemBreaks : EventType.ItemDamaged;
  b.pushDescription(sentence);
  b.pushChild(damage.sub, type, (child) => {
    child.pushDescription(sentence);
    child.pushPlayerTag(damage.playerId);
    child.pushTeamTag(damage.teamId);
    writeItemRatings(child, damage);
    writeItemDurability(child, damage);
  });
}

export function buildItemDamages(b: RecordBuilder, damages: ItemDamage[]): void {
  for (const damage of damages) {
    buildItemDamage(b, damage);
  }
}

const AND_DROPPED = " and dropped ";

export const gainedItemLine: Parser<GainedItemLine> = (input) => {
  const head = takeUntil(" gained ")(input);
  if (!head.ok) {
    return head;
  }
  const body = lineEndingWith(".")(head.rest);
  if (!body.ok) {
    return body;
  }
  const split = body.value.lastIndexOf(AND_DROPPED);
  const value: GainedItemLine =
    split > 0
      ? {
          playerName: head.value,
          itemName: body.value.slice(0, split),
          droppedName: body.value.slice(split + AND_DROPPED.length),
        }
      : { playerName: head.value, itemName: body.value, droppedName: null };
  return { ok: true, value, rest: body.rest };
};

/**
 * `X gained Y.` (or `X gained Y and dropped Z.`) with a PlayerGainedItem child,
 * preceded by a PlayerLostItem child for the dropped item. Neither adds tags
 * to the parent.
 */
export function parseGainedItem(c: ParseCursor): ItemGained {
  const { playerName, itemName, droppedName } = c.line(gainedItemLine);
  const dropped =
    droppedName === null
      ? null
      : c.child(EventType.PlayerLostItem, (child) => {
          child.expectLine(`${playerName} dropped ${droppedName}.`);
          const playerId = child.nextPlayerId();
          const teamId = child.nextTeamId();
          const item: ItemDropped = { sub: child.subEvent(), ...readItemRatings(child, droppedName) };
          return { item, playerId, teamId };
        });
  return c.child(EventType.PlayerGainedItem, (child) => {
    child.expectLine(`${playerName} gained ${itemName}.`);
    const playerId = child.nextPlayerId();
    const teamId = child.nextTeamId();
    if (dropped) {
      sameTag(child, "player", dropped.playerId, playerId);
      sameTag(child, "team", dropped.teamId, teamId);
    }
    return {
      sub: child.subEvent(),
      playerName,
      playerId,
      teamId,
      ...readItemRatings(child, itemName),
      dropped: dropped ? dropped.item : null,
    };
  });
}

export function gainedItemText(line: GainedItemLine): string {
  return line.droppedName === null
    ? `${line.playerName} gained ${line.itemName}.`
    : `${line.playerName} gained ${line.itemName}${AND_DROPPED}${line.droppedName}.`;
}

export function buildGainedItem(b: RecordBuilder, item: ItemGained): void {
  const dropped = item.dropped;
  b.pushDescription(
    gainedItemText({
      playerName: item.playerName,
      itemName: item.itemName,
      droppedName: dropped ? dropped.itemName : null,
    }),
  );
  if (dropped) {
    b.pushChild(dropped.sub, EventType.PlayerLostItem, (child) => {
      child.pushDescription(`${item.playerName} dropped ${dropped.itemName}.`);
      child.pushPlayerTag(item.playerId);
      child.pushTeamTag(item.teamId);
      writeItemRatings(child, dropped);
    });
  }
  b.pushChild(item.sub, EventType.PlayerGainedItem, (child) => {
    child.pushDescription(`${item.playerName} gained ${item.itemName}.`);
    child.pushPlayerTag(item.playerId);
    child.pushTeamTag(item.teamId);
    writeItemRatings(child, item);
  });
}

// ---------------------------------------------------------------------------
// Scores
// ---------------------------------------------------------------------------

interface ScoreLine {
  damage: ItemDamageText | null;
  playerName: string;
}

function scoreLine(scoreText: string): Parser<ScoreLine> {
  const suffix = ` ${scoreText}`;
  return alt<ScoreLine>(
    map(pair(itemDamageLine, preceded("\n", lineEndingWith(suffix))), ([damage, playerName]): ScoreLine => ({
      damage,
      playerName,
    })),
    map(lineEndingWith(suffix), (playerName): ScoreLine => ({ damage: null, playerName })),
  );
}

/** Scoring runners (`X scores!`), then the free refills they triggered. */
export function parseScorers(c: ParseCursor, scoreText: string): ScoringPlayer[] {
  const parser = scoreLine(scoreText);
  const scorers: ScoringPlayer[] = [];
  for (let line = c.tryLine(parser); line !== null; line = c.tryLine(parser)) {
    const itemDamage = line.damage ? parseItemDamageChild(c, line.damage) : null;
    scorers.push({ playerId: c.nextPlayerId(), playerName: line.playerName, itemDamage });
  }
  return scorers;
}

export function buildScorers(b: RecordBuilder, scorers: ScoringPlayer[], scoreText: string): void {
  for (const scorer of scorers) {
    if (scorer.itemDamage) {
      buildItemDamage(b, scorer.itemDamage);
    }
    b.pushDescription(`${scorer.playerName} ${scoreText}`);
    b.pushPlayerTag(scorer.playerId);
  }
}

export function parseScores(c: ParseCursor, scoreText: string): Scores {
  const scores = parseScorers(c, scoreText);
  const freeRefills = parseFreeRefills(c);
  return { scores, freeRefills };
}

export function buildScores(b: RecordBuilder, scores: Scores, scoreText: string): void {
  buildScorers(b, scores.scores, scoreText);
  buildFreeRefills(b, scores.freeRefills);
}

// ---------------------------------------------------------------------------
// Inhabiting, spice and magma
// ---------------------------------------------------------------------------

export function parseStoppedInhabiting(c: ParseCursor): StoppedInhabiting | null {
  return c.childIf(EventType.RemovedMod, hasMod("INHABITING"), (child) => {
    const inhabitingPlayerName = child.line(lineEndingWith(" stopped Inhabiting."));
    const inhabitingPlayerId = child.nextPlayerId();
    const inhabitingPlayerTeamId = child.nextTeamIdOpt();
    child.expectMetadata("mod", "INHABITING");
    child.expectMetadata("type", ModDuration.Permanent);
    return { sub: child.subEvent(), inhabitingPlayerId, inhabitingPlayerName, inhabitingPlayerTeamId };
  });
}

export function buildStoppedInhabiting(b: RecordBuilder, stopped: StoppedInhabiting | null): void {
  if (!stopped) {
    return;
  }
  b.pushChild(stopped.sub, EventType.RemovedMod, (child) => {
    child.pushDescription(`${stopped.inhabitingPlayerName} stopped Inhabiting.`);
    child.pushPlayerTag(stopped.inhabitingPlayerId);
    child.pushTeamTag(stopped.inhabitingPlayerTeamId);
    child.setMetadata("mod", "INHABITING");
    child.setMetadata("type", ModDuration.Permanent);
  });
}

export function parseSpicy(c: ParseCursor, playerName: string, playerId: string): SpicyStatus {
  if (c.tryExpectLine(`${playerName} is Heating Up!`)) {
    c.repeatedPlayerId(playerId);
    return { status: "heatingUp" };
  }
  const redHot = `${playerName} is Red Hot!`;
  if (c.tryExpectLine(redHot)) {
    const change = c.childIf(EventType.AddedMod, hasMod("ON_FIRE"), (child) => {
      child.expectLine(redHot);
      child.repeatedPlayerId(playerId);
      const teamId = child.nextTeamId();
      child.expectMetadata("mod", "ON_FIRE");
      child.expectMetadata("type", ModDuration.Permanent);
      return { sub: child.subEvent(), teamId };
    });
    c.repeatedPlayerId(playerId);
    return { status: "redHot", change };
  }
  return { status: "none" };
}

export function buildSpicy(
  b: RecordBuilder,
  spicy: SpicyStatus,
  playerName: string,
  playerId: string,
): void {
  switch (spicy.status) {
    case "none":
      return;
    case "heatingUp":
      b.pushDescription(`${playerName} is Heating Up!`);
      b.pushPlayerTag(playerId);
      return;
    case "redHot": {
      const redHot = `${playerName} is Red Hot!`;
      b.pushDescription(redHot);
      const change = spicy.change;
      if (change) {
        b.pushChild(change.sub, EventType.AddedMod, (child) => {
          child.pushDescription(redHot);
          child.pushPlayerTag(playerId);
          child.pushTeamTag(change.teamId);
          child.setMetadata("mod", "ON_FIRE");
          child.setMetadata("type", ModDuration.Permanent);
        });
      }
      b.pushPlayerTag(playerId);
      return;
    }
  }
}

export function parseCooledOff(c: ParseCursor, playerName: string): ModChangeWithPlayer | null {
  const text = `${playerName} cooled off.`;
  if (!c.tryExpectLine(text)) {
    return null;
  }
  const change = parsePlayerModChild(c, { type: EventType.RemovedMod, description: text, mod: "ON_FIRE" });
  c.repeatedPlayerId(change.playerId);
  return change;
}

export function buildCooledOff(
  b: RecordBuilder,
  cooledOff: ModChangeWithPlayer | null,
  playerName: string,
): void {
  if (!cooledOff) {
    return;
  }
  const text = `${playerName} cooled off.`;
  b.pushDescription(text);
  buildPlayerModChild(b, cooledOff, { type: EventType.RemovedMod, description: text, mod: "ON_FIRE" });
  b.pushPlayerTag(cooledOff.playerId);
}

/** `X is Magmatic!` line; the mod removal child is placed by the caller. */
export function parseMagmaticLine(c: ParseCursor): string | null {
  return c.tryLine(lineEndingWith(" is Magmatic!"));
}

export function magmaticChildSpec(playerName: string): ModChildSpec {
  return { type: EventType.RemovedMod, description: `${playerName} is Magmatic!`, mod: "MAGMATIC" };
}

/** The Magmatic removal child; its player tag must be the batter's. */
export function parseMagmaticChild(c: ParseCursor, playerName: string, playerId: string): ModChange {
  const spec = magmaticChildSpec(playerName);
  return c.child(spec.type, (child) => {
    readModMetadata(child, spec);
    child.repeatedPlayerId(playerId);
    return { sub: child.subEvent(), teamId: child.nextTeamId() };
  });
}

export function isMagmaticChild(record: WireRecord | undefined): boolean {
  return record !== undefined && record.type === EventType.RemovedMod && hasMod("MAGMATIC")(record);
}

export function buildMagmaticChild(
  b: RecordBuilder,
  magmatic: Magmatic,
  playerName: string,
  playerId: string,
): void {
  const spec = magmaticChildSpec(playerName);
  b.pushChild(magmatic.change.sub, spec.type, (child) => {
    writeModMetadata(child, spec);
    child.pushPlayerTag(playerId);
    child.pushTeamTag(magmatic.change.teamId);
  });
}

// ---------------------------------------------------------------------------
// Stat changes
// ---------------------------------------------------------------------------

export interface StatChildSpec {
  type: number;
  description: string;
  /** Value of the `type` metadata key: the rating category that changed. */
  attrCategory: number;
  category?: EventCategory;
}

export function parseStatChild(
  c: ParseCursor,
  playerName: string,
  spec: StatChildSpec,
): PlayerStatChange {
  return c.child(spec.type, (child) => {
    if (spec.category !== undefined) {
      child.expectCategory(spec.category);
    }
    child.expectLine(spec.description);
    const playerId = child.nextPlayerId();
    const teamId = child.nextTeamId();
    child.expectMetadata("type", spec.attrCategory);
    const ratingBefore = child.metadata("before", Num);
    const ratingAfter = child.metadata("after", Num);
    return { sub: child.subEvent(), teamId, playerId, playerName, ratingBefore, ratingAfter };
  });
}

export function buildStatChild(b: RecordBuilder, change: PlayerStatChange, spec: StatChildSpec): void {
  b.pushChild(change.sub, spec.type, (child) => {
    if (spec.category !== undefined) {
      child.setCategory(spec.category);
    }
    child.pushDescription(spec.description);
    child.pushPlayerTag(change.playerId);
    child.pushTeamTag(change.teamId);
    child.setMetadata("type", spec.attrCategory);
    child.setMetadata("before", change.ratingBefore);
    child.setMetadata("after", change.ratingAfter);
  });
}

// ---------------------------------------------------------------------------
// Performing toggles
// ---------------------------------------------------------------------------

function performingMod(isOverperforming: boolean): string {
  return isOverperforming ? "OVERPERFORMING" : "UNDERPERFORMING";
}

export function parsePerformingToggle(
  c: ParseCursor,
  playerName: string,
  description: string,
  source: string,
): PerformingToggle {
  const next = c.peekChild();
  const isFirstProc = next?.type !== EventType.ChangedModFromOtherMod;
  const type = isFirstProc ? EventType.AddedModFromOtherMod : EventType.ChangedModFromOtherMod;
  return c.child(type, (child) => {
    child.expectLine(description);
    const playerId = child.nextPlayerId();
    const teamId = child.nextTeamId();
    child.expectMetadata("source", source);
    child.expectMetadata("type", ModDuration.Permanent);
    let isOverperforming: boolean;
    if (isFirstProc) {
      isOverperforming = child.metadata("mod", Str) === performingMod(true);
      child.expectMetadata("mod", performingMod(isOverperforming));
    } else {
      isOverperforming = child.metadata("to", Str) === performingMod(true);
      child.expectMetadata("to", performingMod(isOverperforming));
      child.expectMetadata("from", performingMod(!isOverperforming));
    }
    return { sub: child.subEvent(), teamId, playerId, playerName, isOverperforming, isFirstProc };
  });
}

export function buildPerformingToggle(
  b: RecordBuilder,
  toggle: PerformingToggle,
  description: string,
  source: string,
): void {
  const type = toggle.isFirstProc ? EventType.AddedModFromOtherMod : EventType.ChangedModFromOtherMod;
  b.pushChild(toggle.sub, type, (child) => {
    child.pushDescription(description);
    child.pushPlayerTag(toggle.playerId);
    child.pushTeamTag(toggle.teamId);
    child.setMetadata("source", source);
    child.setMetadata("type", ModDuration.Permanent);
    if (toggle.isFirstProc) {
      child.setMetadata("mod", performingMod(toggle.isOverperforming));
    } else {
      child.setMetadata("from", performingMod(!toggle.isOverperforming));
      child.setMetadata("to", performingMod(toggle.isOverperforming));
    }
  });
}

/** Shorthand for the envelope-less identity of a parsed child. */
export function refOf(record: WireRecord): SubEventRef {
  return { id: record.id, created: record.created, nuts: record.nuts };
}

// ---------------------------------------------------------------------------
// Weather side effects
// ---------------------------------------------------------------------------

const MAINTENANCE_MODE: ModChildSpec = {
  type: EventType.AddedMod,
  description: "Impairment Detected. Entering Maintenance Mode.",
  mod: "EXTRA_OUT",
  duration: ModDuration.Game,
};

/** A drained team entering Maintenance Mode (gaining an extra out for the game). */
export function parseMaintenanceMode(c: ParseCursor): ModChange | null {
  return c.childIf(MAINTENANCE_MODE.type, hasMod(MAINTENANCE_MODE.mod), (child) => {
    readModMetadata(child, MAINTENANCE_MODE);
    return { sub: child.subEvent(), teamId: child.nextTeamId() };
  });
}

export function buildMaintenanceMode(b: RecordBuilder, change: ModChange | null): void {
  if (change) {
    buildTeamModChild(b, change, MAINTENANCE_MODE);
  }
}

function elsewhereSpec(description: string): ModChildSpec {
  return { type: EventType.AddedMod, description, mod: "ELSEWHERE" };
}

/**
 * Remainder of a sent-Elsewhere effect once its first line is read: the
 * player tag, then the ELSEWHERE mod child reading `childText`.
 */
export function parseSentElsewhere(c: ParseCursor, playerName: string, childText: string): SentElsewhere {
  const playerId = c.nextPlayerId();
  const change = parsePlayerModChild(c, elsewhereSpec(childText));
  sameTag(c, "player", playerId, change.playerId);
  return { sub: change.sub, playerId, playerName, teamId: change.teamId };
}

export function buildSentElsewhere(
  b: RecordBuilder,
  sent: SentElsewhere,
  text: string,
  childText: string,
): void {
  b.pushDescription(text);
  b.pushPlayerTag(sent.playerId);
  buildPlayerModChild(b, sent, elsewhereSpec(childText));
}

const GRAVITY_SUFFIX = "'s Gravity kept them in place!";

/** `X's Gravity kept them in place!` lines, one player tag each. */
export function parseGravity(c: ParseCursor): PlayerNameId[] {
  const parser = lineEndingWith(GRAVITY_SUFFIX);
  const players: PlayerNameId[] = [];
  for (let name = c.tryLine(parser); name !== null; name = c.tryLine(parser)) {
    players.push({ playerName: name, playerId: c.nextPlayerId() });
  }
  return players;
}

export function buildGravity(b: RecordBuilder, players: PlayerNameId[]): void {
  for (const player of players) {
    b.pushDescription(`${player.playerName}${GRAVITY_SUFFIX}`);
    b.pushPlayerTag(player.playerId);
  }
}

function itemRepairedType(healthBefore: number): number {
  return healthBefore === 0 ? EventType.BrokenItemRepaired : EventType.DamagedItemRepaired;
}

/**
 * BrokenItemRepaired or DamagedItemRepaired child reading `lines`; which one
 * follows from the item's health before the repair.
 */
export function parseItemRepairedChild(
  c: ParseCursor,
  lines: string[],
  playerName: string,
  itemName: string,
): ItemRepaired {
  const next = c.peekChild();
  const type =
    next?.type === EventType.BrokenItemRepaired
      ? EventType.BrokenItemRepaired
      : EventType.DamagedItemRepaired;
  return c.child(type, (child) => {
    for (const line of lines) {
      child.expectLine(line);
    }
    const playerId = child.nextPlayerId();
    const teamId = child.nextTeamId();
    const ratings = readItemRatings(child, itemName);
    const durability = readItemDurability(child);
    if (itemRepairedType(durability.itemHealthBefore) !== type) {
      child.fail({
        kind: "UnexpectedMetadataValue",
        field: "itemHealthBefore",
        value: String(durability.itemHealthBefore),
      });
    }
    return { sub: child.subEvent(), playerName, playerId, teamId, ...ratings, ...durability };
  });
}

export function buildItemRepairedChild(b: RecordBuilder, repair: ItemRepaired, lines: string[]): void {
  b.pushChild(repair.sub, itemRepairedType(repair.itemHealthBefore), (child) => {
    for (const line of lines) {
      child.pushDescription(line);
    }
    child.pushPlayerTag(repair.playerId);
    child.pushTeamTag(repair.teamId);
    writeItemRatings(child, repair);
    writeItemDurability(child, repair);
  });
}

// ---------------------------------------------------------------------------
// Subseasonal mods
// ---------------------------------------------------------------------------

interface SubseasonalLayout {
  modId: string;
  /** The mod actually granted to the subject. */
  performingMod: string;
  eventType: EventType;
  /** Written before each team change until season 15. */
  prefix: string | null;
  teamLabel: string;
  playerLabel: string;
  /** Player line when the mod wears off, where it is not `X is no longer {label}.` */
  playerRemovedSuffix: string | null;
}

const SUBSEASONAL_LAYOUTS: Record<SubseasonalMod, SubseasonalLayout> = {
  Earlbirds: {
    modId: "EARLBIRDS",
    performingMod: "OVERPERFORMING",
    eventType: EventType.Earlbird,
    prefix: "Happy Earlseason!",
    teamLabel: "Earlbirds",
    playerLabel: "an Earlbird",
    playerRemovedSuffix: null,
  },
  LateToTheParty: {
    modId: "LATE_TO_PARTY",
    performingMod: "OVERPERFORMING",
    eventType: EventType.LateToTheParty,
    prefix: "Late to the Party!",
    teamLabel: "Late to the Party",
    playerLabel: "Late to the Party",
    playerRemovedSuffix: null,
  },
  Middling: {
    modId: "MIDDLING",
    performingMod: "OVERPERFORMING",
    eventType: EventType.Middling,
    prefix: "Happy Midseason!",
    teamLabel: "Middling",
    playerLabel: "Middling",
    playerRemovedSuffix: null,
  },
  Ambitious: {
    modId: "AMBITIOUS",
    performingMod: "OVERPERFORMING",
    eventType: EventType.Ambitious,
    prefix: null,
    teamLabel: "Ambitious",
    playerLabel: "Ambitious",
    playerRemovedSuffix: " loses their Ambition.",
  },
  Coasting: {
    modId: "COASTING",
    performingMod: "UNDERPERFORMING",
    eventType: EventType.Coasting,
    prefix: null,
    teamLabel: "Coasting",
    playerLabel: "Coasting",
    playerRemovedSuffix: " stops Coasting.",
  },
};

const SUBSEASONAL_MODS: readonly SubseasonalMod[] = ["Earlbirds", "LateToTheParty", "Middling", "Ambitious", "Coasting"];

/** How the feed printed a team whose nickname it could not find. */
const UNNAMED_TEAM = "[object Object]";

export function subseasonalEventType(mod: SubseasonalMod): EventType {
  return SUBSEASONAL_LAYOUTS[mod].eventType;
}

interface SubseasonalLine {
  sourceMod: SubseasonalMod;
  active: boolean;
  isTeam: boolean;
  name: string;
}

function subseasonalTeamText(season: number, mod: SubseasonalMod, active: boolean, teamName: string | null): string {
  const label = SUBSEASONAL_LAYOUTS[mod].teamLabel;
  const name = teamName ?? UNNAMED_TEAM;
  if (season < 15) {
    return active ? `The ${name} are ${label}!` : `${label} wears off for the ${name}.`;
  }
  return active ? `The ${name} are ${label}.` : `${name} are no longer ${label}.`;
}

function subseasonalPlayerText(mod: SubseasonalMod, active: boolean, playerName: string): string {
  const layout = SUBSEASONAL_LAYOUTS[mod];
  if (active) {
    return `${playerName} is ${layout.playerLabel}.`;
  }
  return `${playerName}${layout.playerRemovedSuffix ?? ` is no longer ${layout.playerLabel}.`}`;
}

function subseasonalLine(season: number): Parser<SubseasonalLine> {
  const parsers: Parser<SubseasonalLine>[] = [];
  for (const sourceMod of SUBSEASONAL_MODS) {
    const layout = SUBSEASONAL_LAYOUTS[sourceMod];
    const line =
      (active: boolean, isTeam: boolean) =>
      (name: string): SubseasonalLine => ({ sourceMod, active, isTeam, name });
    const label = layout.teamLabel;
    const teamLines =
      season < 15
        ? [
            map(preceded("The ", lineEndingWith(` are ${label}!`)), line(true, true)),
            map(preceded(`${label} wears off for the `, lineEndingWith(".")), line(false, true)),
          ]
        : [
            map(preceded("The ", lineEndingWith(` are ${label}.`)), line(true, true)),
            map(lineEndingWith(` are no longer ${label}.`), line(false, true)),
          ];
    for (const teamLine of teamLines) {
      parsers.push(season < 15 && layout.prefix !== null ? preceded(`${layout.prefix}\n`, teamLine) : teamLine);
    }
    parsers.push(map(lineEndingWith(` is ${layout.playerLabel}.`), line(true, false)));
    parsers.push(
      map(lineEndingWith(layout.playerRemovedSuffix ?? ` is no longer ${layout.playerLabel}.`), line(false, false)),
    );
  }
  return alt(...parsers);
}

function subseasonalSpec(mod: SubseasonalMod, active: boolean, description: string): ModChildSpec {
  const layout = SUBSEASONAL_LAYOUTS[mod];
  return {
    type: active ? EventType.AddedModFromOtherMod : EventType.RemovedModFromOtherMod,
    description,
    mod: layout.performingMod,
    source: layout.modId,
  };
}

function parseSubseasonalChange(c: ParseCursor, line: SubseasonalLine): SubseasonalModChange {
  const { sourceMod, active } = line;
  if (line.isTeam) {
    const teamName = line.name === UNNAMED_TEAM ? null : line.name;
    const spec = subseasonalSpec(sourceMod, active, subseasonalTeamText(c.season, sourceMod, active, teamName));
    const change = c.childIf(
      spec.type,
      (record) => record.metadata["source"] === spec.source && record.description === spec.description,
      (child) => {
        readModMetadata(child, spec);
        return { sub: child.subEvent(), teamId: child.nextTeamId() };
      },
    );
    return { sourceMod, active, subject: { type: "team", teamName, change } };
  }
  const playerId = c.nextPlayerId();
  const change = parsePlayerModChild(c, subseasonalSpec(sourceMod, active, subseasonalPlayerText(sourceMod, active, line.name)));
  sameTag(c, "player", playerId, change.playerId);
  return { sourceMod, active, subject: { type: "player", playerName: line.name, change } };
}

/**
 * Lines granting or revoking Earlbirds, Late to the Party, Middling, Ambitious
 * or Coasting. A player line tags the player and always has a child; a team
 * line tags nothing and may lack one.
 */
export function parseSubseasonalChanges(c: ParseCursor): SubseasonalModChange[] {
  const parser = subseasonalLine(c.season);
  const changes: SubseasonalModChange[] = [];
  for (let line = c.tryLine(parser); line !== null; line = c.tryLine(parser)) {
    changes.push(parseSubseasonalChange(c, line));
  }
  return changes;
}

export function buildSubseasonalChanges(b: RecordBuilder, changes: readonly SubseasonalModChange[]): void {
  for (const { sourceMod, active, subject } of changes) {
    if (subject.type === "player") {
      const spec = subseasonalSpec(sourceMod, active, subseasonalPlayerText(sourceMod, active, subject.playerName));
      b.pushDescription(spec.description);
      b.pushPlayerTag(subject.change.playerId);
      buildPlayerModChild(b, subject.change, spec);
      continue;
    }
    const prefix = SUBSEASONAL_LAYOUTS[sourceMod].prefix;
    if (b.season < 15 && prefix !== null) {
      b.pushDescription(prefix);
    }
    const spec = subseasonalSpec(sourceMod, active, subseasonalTeamText(b.season, sourceMod, active, subject.teamName));
    b.pushDescription(spec.description);
    if (subject.change) {
      buildTeamModChild(b, subject.change, spec);
    }
  }
}
