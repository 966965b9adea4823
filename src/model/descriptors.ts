import type { ModDuration } from "../contract/eventTypes.js";
import type { GameId, PlayerId, RecordId, TeamId } from "../contract/types.js";

// ---------------------------------------------------------------------------
// Identity
// ---------------------------------------------------------------------------

/** Fields every occurrence carries, whatever its kind. */
export interface Envelope {
  id: RecordId;
  created: string;
  sim: string;
  season: number;
  day: number;
  phase: number;
  tournament: number;
  nuts: number;
  /** Ingestion stamp, present only on records that went through the archive. */
  ingestTime?: number;
  ingestSource?: string;
}

/** Identity of a nested child record; its layout is described by the owning descriptor. */
export interface SubEventRef {
  id: RecordId;
  created: string;
  nuts: number;
}

export interface PlayerNameId {
  playerId: PlayerId;
  playerName: string;
}

// ---------------------------------------------------------------------------
// Games
// ---------------------------------------------------------------------------

export interface Unscatter {
  sub: SubEventRef;
  teamId: TeamId;
  playerId: PlayerId;
  playerName: string;
}

/**
 * Match context of an in-game occurrence, plus the passive effects that ride
 * along on nearly any in-game record.
 */
export interface Game {
  gameId: GameId;
  homeTeamId: TeamId;
  awayTeamId: TeamId;
  play: number;
  unscatter: Unscatter | null;
  /** A player entering the Secret Base as this record happened. */
  attractorSecretBase: PlayerNameId | null;
}

// ---------------------------------------------------------------------------
// Side effects
// ---------------------------------------------------------------------------

export interface ModChange {
  sub: SubEventRef;
  teamId: TeamId;
}

export interface ModChangeWithPlayer extends ModChange {
  playerId: PlayerId;
}

export interface ModChangeWithNamedPlayer extends ModChangeWithPlayer {
  playerName: string;
}

export interface ModDesc {
  modId: string;
  duration: ModDuration;
}

export interface FreeRefill {
  sub: SubEventRef;
  playerName: string;
  playerId: PlayerId;
  /** Null for ghosts who died before players recorded their team. */
  teamId: TeamId | null;
}

export type ItemDamageOutcome = "broke" | "damaged" | "damagedPlural";

export interface ItemRatings {
  itemId: string;
  itemName: string;
  itemMods: string[];
  playerItemRatingBefore: number;
  playerItemRatingAfter: number;
  playerRating: number;
}

/** Item metadata of records that may omit a rating. */
export interface LooseItemRatings {
  itemId: string;
  itemName: string;
  itemMods: string[];
  playerItemRatingBefore: number | null;
  playerItemRatingAfter: number | null;
  playerRating: number;
}

export interface ItemDurability {
  itemDurability: number;
  itemHealthBefore: number;
  itemHealthAfter: number;
}

export interface ItemDamage extends ItemRatings, ItemDurability {
  sub: SubEventRef;
  outcome: ItemDamageOutcome;
  playerName: string;
  playerId: PlayerId;
  teamId: TeamId;
}

export interface ItemRepaired extends ItemRatings, ItemDurability {
  sub: SubEventRef;
  playerName: string;
  playerId: PlayerId;
  teamId: TeamId;
}

export interface ItemDropped extends ItemRatings {
  sub: SubEventRef;
}

export interface ItemGained extends ItemRatings {
  sub: SubEventRef;
  playerName: string;
  playerId: PlayerId;
  teamId: TeamId;
  /** The item that had to go to make room, if any. */
  dropped: ItemDropped | null;
}

/** `X gained Y.` or `X gained Y and dropped Z.` */
export interface GainedItemLine {
  playerName: string;
  itemName: string;
  droppedName: string | null;
}

export interface ScoringPlayer {
  playerId: PlayerId;
  playerName: string;
  /** Item damaged on the way home; reported just before the score. */
  itemDamage: ItemDamage | null;
}

export interface Scores {
  scores: ScoringPlayer[];
  /** Not attributable to individual scores; may outnumber them. */
  freeRefills: FreeRefill[];
}

export interface Inhabiting {
  /** Null when the player already had the Inhabiting mod. */
  sub: SubEventRef | null;
  inhabitingPlayerId: PlayerId;
  inhabitingPlayerTeamId: TeamId | null;
  inhabitedPlayerId: PlayerId;
  inhabitedPlayerName: string;
}

export interface StoppedInhabiting {
  sub: SubEventRef;
  inhabitingPlayerId: PlayerId;
  inhabitingPlayerName: string;
  inhabitingPlayerTeamId: TeamId | null;
}

export type SpicyStatus =
  | { status: "none" }
  | { status: "heatingUp" }
  | { status: "redHot"; change: ModChange | null };

export interface PlayerStatChange {
  sub: SubEventRef;
  teamId: TeamId;
  playerId: PlayerId;
  playerName: string;
  ratingBefore: number;
  ratingAfter: number;
}

/** Over/under-performing toggle caused by another mod (Superyummy, Homebody, ...). */
export interface PerformingToggle {
  sub: SubEventRef;
  teamId: TeamId;
  playerId: PlayerId;
  playerName: string;
  isOverperforming: boolean;
  /** First toggle of the game adds a mod; later ones change it. */
  isFirstProc: boolean;
}

/** A player moved Elsewhere: an ELSEWHERE mod child with one player and one team tag. */
export interface SentElsewhere {
  sub: SubEventRef;
  playerId: PlayerId;
  playerName: string;
  teamId: TeamId;
}

/** HomeRun decoration: the batter spends their Magmatic mod. */
export interface Magmatic {
  change: ModChange;
  /** Upstream sometimes files the mod removal after the free refills. */
  childAfterFreeRefills: boolean;
}

/** Mods granted and revoked as the season moves through its phases. */
export type SubseasonalMod = "Earlbirds" | "LateToTheParty" | "Middling" | "Ambitious" | "Coasting";

export type SubseasonalSubject =
  | {
      type: "team";
      /** Null where the feed printed the team as `[object Object]`. */
      teamName: string | null;
      /** Some removals were announced without a child. */
      change: ModChange | null;
    }
  | { type: "player"; playerName: string; change: ModChangeWithPlayer };

export interface SubseasonalModChange {
  sourceMod: SubseasonalMod;
  active: boolean;
  subject: SubseasonalSubject;
}

// ---------------------------------------------------------------------------
// Small enumerations
// ---------------------------------------------------------------------------

export type Base = "first" | "second" | "third" | "fourth" | "fifth";

export type HitType = "Single" | "Double" | "Triple" | "Quadruple";

export type HomeRunType = "solo home run" | "2-run home run" | "3-run home run" | "grand slam";

export type StrikeoutType = "swinging" | "looking";

export type ActivePosition = "lineup" | "rotation";

export type StatCategory = "hitting" | "pitching" | "defensive" | "baserunning";

export type CoffeeBeanMod = "WIRED" | "TIRED";
