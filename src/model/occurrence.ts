import type { Being, ModDuration, RosterLocation, Weather } from "../contract/eventTypes.js";
import type { JsonObject, PlayerId, TeamId } from "../contract/types.js";
import type {
  ActivePosition,
  Base,
  CoffeeBeanMod,
  Envelope,
  FreeRefill,
  GainedItemLine,
  Game,
  HitType,
  HomeRunType,
  Inhabiting,
  ItemDamage,
  ItemGained,
  ItemRatings,
  ItemRepaired,
  LooseItemRatings,
  Magmatic,
  ModChange,
  ModChangeWithNamedPlayer,
  ModChangeWithPlayer,
  ModDesc,
  PerformingToggle,
  PlayerNameId,
  PlayerStatChange,
  ScoringPlayer,
  Scores,
  SentElsewhere,
  SpicyStatus,
  StatCategory,
  StoppedInhabiting,
  StrikeoutType,
  SubEventRef,
  SubseasonalModChange,
} from "./descriptors.js";

// One interface per occurrence kind. In-game kinds carry a `game`; the rest are
// season-level. Every field is needed to rebuild the wire record exactly.

interface InGame {
  game: Game;
}

// ---------------------------------------------------------------------------
// Game flow
// ---------------------------------------------------------------------------

export type GameStartAnnouncement =
  | { type: "letsGo" }
  | { type: "teamNames"; away: string; home: string };

export interface LetsGoData extends InGame {
  kind: "LetsGo";
  announcement: GameStartAnnouncement;
  weather: Weather;
  stadiumId: string | null;
}

export interface PlayBallData extends InGame {
  kind: "PlayBall";
}

export interface HalfInningData extends InGame {
  kind: "HalfInning";
  /** Announced ahead of the inning line when a phase starts mid-game. */
  subseasonalChanges: SubseasonalModChange[];
  topOfInning: boolean;
  inning: number;
  battingTeamName: string;
}

export interface BatterUpData extends InGame {
  kind: "BatterUp";
  batterName: string;
  teamName: string;
  wieldingItem: string | null;
  inhabiting: Inhabiting | null;
  isRepeating: boolean;
}

export interface PitcherChangeData extends InGame {
  kind: "PitcherChange";
  pitcherId: PlayerId;
  pitcherName: string;
  teamName: string;
}

export interface InningEndData extends InGame {
  kind: "InningEnd";
  inning: number;
  lostTripleThreat: ModChangeWithNamedPlayer[];
}

export interface GameEndData extends InGame {
  kind: "GameEnd";
  winnerId: TeamId;
  winningTeamName: string;
  winningTeamScore: number;
  losingTeamName: string;
  losingTeamScore: number;
}

export interface StrikeZappedData extends InGame {
  kind: "StrikeZapped";
}

export interface PeanutFlavorTextData extends InGame {
  kind: "PeanutFlavorText";
  message: string;
}

export interface BirdsCircleData extends InGame {
  kind: "BirdsCircle";
}

export interface SuperyummyData extends InGame {
  kind: "Superyummy";
  playerName: string;
  peanutsPresent: boolean;
  /** Absent on echoed Superyummy records, which change nothing. */
  toggle: PerformingToggle | null;
}

export interface HomebodyData extends InGame {
  kind: "Homebody";
  toggles: PerformingToggle[];
}

export interface HolidayInningData extends InGame {
  kind: "HolidayInning";
  inning: number;
}

export interface HomeFieldAdvantageData extends InGame {
  kind: "HomeFieldAdvantage";
  teamName: string;
}

export interface PrizeMatchData extends InGame {
  kind: "PrizeMatch";
  itemName: string;
}

export interface SolarPanelsAwaitData extends InGame {
  kind: "SolarPanelsAwait";
}

export interface SolarPanelsActivationData extends InGame {
  kind: "SolarPanelsActivation";
  runs: number;
  teamName: string;
}

export interface RunsOverflowingData extends InGame {
  kind: "RunsOverflowing";
  teamName: string;
  /** Negative for Unruns. */
  runs: number;
}

export interface EnterSecretBaseData extends InGame {
  kind: "EnterSecretBase";
  playerId: PlayerId;
  playerName: string;
}

export interface ExitSecretBaseData extends InGame {
  kind: "ExitSecretBase";
  playerId: PlayerId;
  playerName: string;
}

export interface PartyData extends InGame {
  kind: "Party";
  change: PlayerStatChange;
}

// ---------------------------------------------------------------------------
// Pitches and plate appearances
// ---------------------------------------------------------------------------

interface Count {
  balls: number;
  strikes: number;
}

export interface BallData extends InGame, Count {
  kind: "Ball";
  itemDamages: ItemDamage[];
}

export interface StrikeSwingingData extends InGame, Count {
  kind: "StrikeSwinging";
  itemDamages: ItemDamage[];
}

export interface StrikeLookingData extends InGame, Count {
  kind: "StrikeLooking";
  itemDamages: ItemDamage[];
}

export interface StrikeFlinchingData extends InGame, Count {
  kind: "StrikeFlinching";
  itemDamages: ItemDamage[];
}

export interface FoulBallData extends InGame, Count {
  kind: "FoulBall";
  itemDamages: ItemDamage[];
}

export interface FlyoutData extends InGame {
  kind: "Flyout";
  batterName: string;
  fielderName: string;
  itemDamages: ItemDamage[];
  scores: Scores;
  stoppedInhabiting: StoppedInhabiting | null;
  cooledOff: ModChangeWithPlayer | null;
  isSpecial: boolean;
}

export interface GroundOutData extends InGame {
  kind: "GroundOut";
  batterName: string;
  fielderName: string;
  itemDamages: ItemDamage[];
  scores: Scores;
  stoppedInhabiting: StoppedInhabiting | null;
  cooledOff: ModChangeWithPlayer | null;
  isSpecial: boolean;
}

export interface FieldersChoiceData extends InGame {
  kind: "FieldersChoice";
  batterName: string;
  runnerOutName: string;
  outAtBase: Base;
  scorers: ScoringPlayer[];
  itemDamages: ItemDamage[];
  freeRefills: FreeRefill[];
  stoppedInhabiting: StoppedInhabiting | null;
  cooledOff: ModChangeWithPlayer | null;
  isSpecial: boolean;
}

export interface DoublePlayData extends InGame {
  kind: "DoublePlay";
  batterName: string;
  scores: Scores;
  stoppedInhabiting: StoppedInhabiting | null;
  cooledOff: ModChangeWithPlayer | null;
  isSpecial: boolean;
}

export interface HitData extends InGame {
  kind: "Hit";
  batterName: string;
  batterId: PlayerId;
  hitType: HitType;
  itemDamages: ItemDamage[];
  stoppedInhabiting: StoppedInhabiting | null;
  scores: Scores;
  spicy: SpicyStatus;
  /** Damage to fielders, reported after everything else. */
  trailingItemDamages: ItemDamage[];
  isSpecial: boolean;
}

export interface HomeRunData extends InGame {
  kind: "HomeRun";
  batterName: string;
  batterId: PlayerId;
  homeRunType: HomeRunType;
  itemDamages: ItemDamage[];
  magmatic: Magmatic | null;
  bigBucket: boolean;
  stoppedInhabiting: StoppedInhabiting | null;
  freeRefills: FreeRefill[];
  spicy: SpicyStatus;
  isSpecial: boolean;
}

export interface StolenBaseData extends InGame {
  kind: "StolenBase";
  runnerName: string;
  runnerId: PlayerId;
  base: Base;
  blaserunning: boolean;
  freeRefill: FreeRefill | null;
  itemDamages: ItemDamage[];
  isSpecial: boolean;
}

export interface CaughtStealingData extends InGame {
  kind: "CaughtStealing";
  runnerName: string;
  base: Base;
  itemDamages: ItemDamage[];
}

export interface StrikeoutSwingingData extends InGame {
  kind: "StrikeoutSwinging";
  batterName: string;
  itemDamages: ItemDamage[];
  stoppedInhabiting: StoppedInhabiting | null;
  freeRefill: FreeRefill | null;
  isSpecial: boolean;
}

export interface StrikeoutLookingData extends InGame {
  kind: "StrikeoutLooking";
  batterName: string;
  itemDamages: ItemDamage[];
  stoppedInhabiting: StoppedInhabiting | null;
  freeRefill: FreeRefill | null;
  isSpecial: boolean;
}

export interface WalkData extends InGame {
  kind: "Walk";
  batterName: string;
  batterId: PlayerId;
  baseInstincts: Base | null;
  itemDamages: ItemDamage[];
  scores: Scores;
  stoppedInhabiting: StoppedInhabiting | null;
  isSpecial: boolean;
}

export interface CharmStrikeoutData extends InGame {
  kind: "CharmStrikeout";
  charmerId: PlayerId;
  charmerName: string;
  charmedId: PlayerId;
  charmedName: string;
  numSwings: number;
  stoppedInhabiting: StoppedInhabiting | null;
}

export interface CharmWalkData extends InGame {
  kind: "CharmWalk";
  batterName: string;
  batterId: PlayerId;
  pitcherName: string;
  itemDamages: ItemDamage[];
  scores: Scores;
}

export interface MildPitchData extends InGame, Count {
  kind: "MildPitch";
  pitcherId: PlayerId;
  pitcherName: string;
  runnersAdvance: boolean;
  scores: Scores;
}

export interface MildPitchWalkData extends InGame {
  kind: "MildPitchWalk";
  pitcherId: PlayerId;
  pitcherName: string;
  batterId: PlayerId;
  batterName: string;
  scores: Scores;
}

export interface MindTrickWalkData extends InGame {
  kind: "MindTrickWalk";
  strikeoutType: StrikeoutType;
  batterId: PlayerId;
  batterName: string;
  baseInstincts: Base | null;
  scores: Scores;
}

export interface MindTrickStrikeoutData extends InGame {
  kind: "MindTrickStrikeout";
  batterId: PlayerId;
  batterName: string;
  pitcherName: string;
}

export interface HitByPitchData extends InGame {
  kind: "HitByPitch";
  pitcherId: PlayerId;
  pitcherName: string;
  batterId: PlayerId;
  batterName: string;
  batterTeamId: TeamId;
  sub: SubEventRef;
  scores: Scores;
}

export interface AmbushedByCrowsData extends InGame {
  kind: "AmbushedByCrows";
  batterId: PlayerId;
  batterName: string;
  friendOfCrows: PlayerNameId | null;
}

export type BatterSkippedReason = { type: "shelled" } | { type: "elsewhere"; batterId: PlayerId };

export interface BatterSkippedData extends InGame {
  kind: "BatterSkipped";
  batterName: string;
  reason: BatterSkippedReason;
}

// ---------------------------------------------------------------------------
// Weather and in-game effects
// ---------------------------------------------------------------------------

export interface CoffeeBeanData extends InGame {
  kind: "CoffeeBean";
  playerId: PlayerId;
  playerName: string;
  roast: string;
  notes: string;
  whichMod: CoffeeBeanMod;
  gainedMod: boolean;
  /** Mod swapped out for `whichMod`; the child is then a ModChange. */
  previousMod: CoffeeBeanMod | null;
  sub: SubEventRef;
  teamId: TeamId | null;
}

export interface GainFreeRefillData extends InGame {
  kind: "GainFreeRefill";
  playerId: PlayerId;
  playerName: string;
  roast: string;
  ingredient1: string;
  ingredient2: string;
  sub: SubEventRef;
  teamId: TeamId | null;
}

export interface BecomeTripleThreatData extends InGame {
  kind: "BecomeTripleThreat";
  /** One or two pitchers. */
  pitchers: ModChangeWithNamedPlayer[];
}

export type BlooddrainAction =
  | { action: "addBall" }
  | { action: "removeBall" }
  | { action: "addStrike"; strikeoutBatterName: string | null }
  | { action: "removeStrike" }
  | { action: "addOut" }
  | { action: "removeOut" };

export interface BlooddrainData extends InGame {
  kind: "Blooddrain";
  isSiphon: boolean;
  sipper: PlayerStatChange;
  sipped: PlayerStatChange;
  /** A few plain drains record the sipped player's change as a stat increase. */
  sippedRecordedAsIncrease: boolean;
  sippedCategory: StatCategory;
  maintenanceMode: ModChange | null;
}

/** Siphon that spends the drained blood on the count instead of a rating. */
export interface SpecialBlooddrainData extends InGame {
  kind: "SpecialBlooddrain";
  sipperId: PlayerId;
  sipperName: string;
  sipped: PlayerStatChange;
  sippedCategory: StatCategory;
  action: BlooddrainAction;
  maintenanceMode: ModChange | null;
}

export interface BlooddrainBlockedData extends InGame {
  kind: "BlooddrainBlocked";
  isSiphon: boolean;
  sipperId: PlayerId;
  sipperName: string;
  sippeeId: PlayerId;
  sippeeName: string;
}

export interface Sun2Data extends InGame {
  kind: "Sun2";
  teamName: string;
  caughtSomeRays: PlayerStatChange | null;
}

export interface BlackHoleData extends InGame {
  kind: "BlackHole";
  scoringTeamName: string;
  victimTeamName: string;
  compressedByGamma: PlayerStatChange | null;
}

export interface AllergicReactionData extends InGame {
  kind: "AllergicReaction";
  change: PlayerStatChange;
}

export interface SuperallergicReactionData extends InGame {
  kind: "SuperallergicReaction";
  change: PlayerStatChange;
}

export interface PeanutMisterData extends InGame {
  kind: "PeanutMister";
  playerId: PlayerId;
  playerName: string;
  /** Present when the player lost Superallergic rather than a plain allergy. */
  superallergy: ModChange | null;
}

export interface PerkUpData extends InGame {
  kind: "PerkUp";
  players: ModChangeWithNamedPlayer[];
}

export interface FeedbackPlayer {
  playerId: PlayerId;
  playerName: string;
  teamId: TeamId;
  teamName: string;
  location: number;
}

export interface FeedbackData extends InGame {
  kind: "Feedback";
  playerA: FeedbackPlayer;
  playerB: FeedbackPlayer;
  positionType: ActivePosition;
  sub: SubEventRef;
}

export interface FeedbackBlockedData extends InGame {
  kind: "FeedbackBlocked";
  resistedId: PlayerId;
  resistedName: string;
  tangled: PlayerStatChange;
}

export interface BestowReverberatingData extends InGame {
  kind: "BestowReverberating";
  change: ModChangeWithNamedPlayer;
}

export type ReverbType = "lineup" | "rotation" | "full";

export interface ReverbData extends InGame {
  kind: "Reverb";
  teamId: TeamId;
  teamName: string;
  reverbType: ReverbType;
  sub: SubEventRef;
  gravityPlayers: PlayerNameId[];
}

export interface UnderOverData extends InGame {
  kind: "UnderOver";
  change: ModChangeWithNamedPlayer;
  on: boolean;
}

export interface OverUnderData extends InGame {
  kind: "OverUnder";
  change: ModChangeWithNamedPlayer;
  on: boolean;
}

export interface TasteTheInfiniteData extends InGame {
  kind: "TasteTheInfinite";
  shellerId: PlayerId;
  shellerName: string;
  shelleeId: PlayerId;
  shelleeName: string;
  shelleeTeamId: TeamId;
  sub: SubEventRef;
}

export type FloodingEffect =
  | { effect: "elsewhere"; sent: SentElsewhere }
  | { effect: "flippers"; player: PlayerNameId }
  | { effect: "ego"; player: PlayerNameId };

export interface FloodingSweptData extends InGame {
  kind: "FloodingSwept";
  effects: FloodingEffect[];
  floodPumps: boolean;
  freeRefills: FreeRefill[];
}

export type TimeElsewhere = { unit: "days"; count: number } | { unit: "seasons"; count: number };

export interface Recongealed {
  change: PlayerStatChange;
  /** Child type: PlayerStatIncrease when true, PlayerStatDecrease otherwise. */
  increased: boolean;
}

export type ReturnFlavor =
  | {
      flavor: "full";
      teamId: TeamId;
      playerId: PlayerId;
      isPeanut: boolean;
      sub: SubEventRef;
      timeElsewhere: TimeElsewhere;
      scattered: { scatteredName: string; sub: SubEventRef } | null;
      recongealed: Recongealed | null;
    }
  | { flavor: "short"; teamId: TeamId; playerId: PlayerId; isPeanut: boolean; sub: SubEventRef }
  | { flavor: "false"; isPeanut: boolean }
  | {
      flavor: "pulledBack";
      teamId: TeamId;
      soughtPlayerId: PlayerId;
      seekerPlayerId: PlayerId;
      seekerPlayerName: string;
      sub: SubEventRef;
      timeElsewhere: TimeElsewhere;
    };

export interface ElsewhereReturn {
  playerName: string;
  flavor: ReturnFlavor;
}

export interface ReturnFromElsewhereData extends InGame {
  kind: "ReturnFromElsewhere";
  returns: ElsewhereReturn[];
}

export interface IncinerationSubEvents {
  incineration: SubEventRef;
  enterHall: SubEventRef;
  hatch: SubEventRef;
  replace: SubEventRef;
}

export interface IncinerationData extends InGame {
  kind: "Incineration";
  teamId: TeamId;
  teamName: string;
  victimId: PlayerId;
  victimName: string;
  replacementId: PlayerId;
  replacementName: string;
  location: number;
  /** An Unstable victim marks another player on the way out. */
  unstableChain: ModChangeWithNamedPlayer | null;
  subEvents: IncinerationSubEvents;
}

export interface BecameMagmaticData extends InGame {
  kind: "BecameMagmatic";
  playerId: PlayerId;
  playerName: string;
  isUnstable: boolean;
  magmaticModAdded: ModChange | null;
}

export interface FireproofIncinerationData extends InGame {
  kind: "FireproofIncineration";
  playerId: PlayerId;
  playerName: string;
}

export interface UnderseaData extends InGame {
  kind: "Undersea";
  teamName: string;
  change: ModChange;
}

export interface HighPressureData extends InGame {
  kind: "HighPressure";
  teamName: string;
  isOn: boolean;
  change: ModChange;
}

export interface BirdsUnshellData extends InGame {
  kind: "BirdsUnshell";
  teamId: TeamId;
  playerId: PlayerId;
  playerName: string;
  peckedFree: SubEventRef;
  superallergy: SubEventRef;
}

export interface EchoReceiverData extends InGame {
  kind: "EchoReceiver";
  echoerName: string;
  echoeeName: string;
  echoeeId: PlayerId;
  echoeeTeamId: TeamId;
  sub: SubEventRef;
}

export interface TeamRunsLost {
  runsLost: number;
  teamName: string;
}

export interface SalmonSwimData extends InGame {
  kind: "SalmonSwim";
  inning: number;
  /** Zero, one or two teams. */
  runLosses: TeamRunsLost[];
  itemRestored: ItemRepaired | null;
  playerExpelled: SentElsewhere | null;
}

export type NumbersGo = "up" | "down";

export interface PolarityShiftData extends InGame {
  kind: "PolarityShift";
  numbersGo: NumbersGo;
  sub: SubEventRef;
}

export interface SmithyData extends InGame {
  kind: "Smithy";
  repair: ItemRepaired;
}

export interface DonatedShameAppliedData extends InGame {
  kind: "DonatedShameApplied";
  teamName: string;
  unruns: number;
}

export interface GlitterCrateData extends InGame {
  kind: "GlitterCrate";
  gainedItem: ItemGained;
}

export interface CommunityChestGameMessageData extends InGame {
  kind: "CommunityChestGameMessage";
  first: GainedItemLine;
  second: GainedItemLine;
}

// ---------------------------------------------------------------------------
// Mod effects and roster moves during games
// ---------------------------------------------------------------------------

export interface SubseasonalModsChangeData extends InGame {
  kind: "SubseasonalModsChange";
  changes: [SubseasonalModChange, ...SubseasonalModChange[]];
}

export interface PsychoacousticsData extends InGame {
  kind: "Psychoacoustics";
  subseasonalChanges: SubseasonalModChange[];
  stadiumName: string;
  teamId: TeamId;
  teamNickname: string;
  modName: string;
  modId: string;
  sub: SubEventRef;
}

/** Item that took the hit for a player; the record never says what it was worth before. */
export interface ConsumerItemDamage extends LooseItemRatings {
  sub: SubEventRef;
  teamId: TeamId;
  itemDurability: number;
  itemHealthBefore: number | null;
  itemHealthAfter: number;
}

export type ConsumerAttackEffect =
  | { type: "chomp"; sub: SubEventRef; teamId: TeamId; ratingBefore: number; ratingAfter: number }
  | { type: "defended"; damage: ConsumerItemDamage };

export interface DetectiveActivity extends PlayerNameId {
  sub: SubEventRef;
}

export interface ConsumersAttackData extends InGame {
  kind: "ConsumersAttack";
  playerId: PlayerId;
  /** As printed, in capitals. */
  playerName: string;
  scattered: boolean;
  effect: ConsumerAttackEffect;
  sensedSomethingFishy: DetectiveActivity | null;
}

export interface ConsumerExpelledData extends InGame {
  kind: "ConsumerExpelled";
  playerId: PlayerId;
}

export type EchoChamberMod = "Repeating" | "Reverberating";

export interface EchoChamberData extends InGame {
  kind: "EchoChamber";
  teamId: TeamId | null;
  playerId: PlayerId;
  playerName: string;
  echoMod: EchoChamberMod;
  sub: SubEventRef;
}

export interface GrindRailTrick {
  trickName: string;
  points: number;
}

export type GrindRailOutcome =
  | { type: "safe"; secondTrick: GrindRailTrick }
  | { type: "taggedOut"; secondTrick: GrindRailTrick }
  | { type: "bailed" };

export interface GrindRailData extends InGame {
  kind: "GrindRail";
  playerId: PlayerId;
  playerName: string;
  firstTrick: GrindRailTrick;
  outcome: GrindRailOutcome;
}

export interface EchoedMods {
  sub: SubEventRef;
  modIds: string[];
}

export interface EchoChange {
  receiverId: PlayerId;
  receiverName: string;
  receiverTeamId: TeamId;
  /** Mods from an earlier Echo that faded first. */
  modsRemoved: EchoedMods | null;
  modsAdded: EchoedMods;
}

export interface EchoData extends InGame {
  kind: "Echo";
  echoeeName: string;
  primaryEcho: EchoChange;
  receiverEchoes: EchoChange[];
}

export interface StaticEcho extends PlayerNameId {
  teamId: TeamId;
  teamNickname: string;
  removedFromTeamSub: SubEventRef;
  modChangedSub: SubEventRef;
}

export interface EchoIntoStaticData extends InGame {
  kind: "EchoIntoStatic";
  echoer: StaticEcho;
  echoee: StaticEcho;
}

export interface ABloodTypeData extends InGame {
  kind: "ABloodType";
  teamId: TeamId;
  teamNickname: string;
  bloodTypeModId: string;
  sub: SubEventRef;
}

export interface EnterCrimeSceneData extends InGame {
  kind: "EnterCrimeScene";
  playerId: PlayerId;
  playerName: string;
  stadiumName: string;
  previousTeamId: TeamId;
  previousTeamName: string;
  previousLocation: RosterLocation;
  newTeamId: TeamId;
  newTeamName: string;
  ratingBefore: number;
  ratingAfter: number;
  crimeSceneSub: SubEventRef;
  shadowsSub: SubEventRef;
}

export interface FaxMachineData extends InGame {
  kind: "FaxMachine";
  teamId: TeamId;
  teamNickname: string;
  exitingPitcherId: PlayerId;
  exitingPitcherName: string;
  enteringPitcherId: PlayerId;
  enteringPitcherName: string;
  /** Where the exiting pitcher lands in the Shadows. */
  shadowsLocation: RosterLocation;
  ratingBefore: number;
  ratingAfter: number;
  swapSub: SubEventRef;
  shadowsSub: SubEventRef;
}

// ---------------------------------------------------------------------------
// Season and league
// ---------------------------------------------------------------------------

interface TeamRef {
  teamId: TeamId;
  teamName: string;
}

interface PlayerRef {
  playerId: PlayerId;
  playerName: string;
}

export interface BeingSpeechData {
  kind: "BeingSpeech";
  being: Being;
  message: string;
}

export interface Sun2SetWinData extends TeamRef {
  kind: "Sun2SetWin";
}

export interface BlackHoleSwallowedWinData extends TeamRef {
  kind: "BlackHoleSwallowedWin";
}

interface Shaming {
  shamingTeamName: string;
  shamedTeamName: string;
  totalShames: number;
  totalShamings: number;
}

export interface TeamDidShameData extends Shaming {
  kind: "TeamDidShame";
  shamingTeamId: TeamId;
}

export interface TeamWasShamedData extends Shaming {
  kind: "TeamWasShamed";
  shamedTeamId: TeamId;
}

export interface PlayerModExpiresData extends PlayerRef {
  kind: "PlayerModExpires";
  teamId: TeamId;
  mods: string[];
  duration: ModDuration;
}

export interface TeamModExpiresData extends TeamRef {
  kind: "TeamModExpires";
  mods: string[];
  duration: ModDuration;
}

export interface FlagPlantedData extends TeamRef {
  kind: "FlagPlanted";
  ballparkName: string;
  prefabName: string;
  renovationId: string;
  votes: number;
  /** The first flag of a ballpark gets the shouted announcement. */
  isFirst: boolean;
}

export interface EmergencyAlertData {
  kind: "EmergencyAlert";
  message: string;
  teamTags: TeamId[];
}

export interface TeamJoinedIlbData extends TeamRef {
  kind: "TeamJoinedILB";
  divisionId: string;
  divisionName: string;
}

export interface PlayerHatchedData extends PlayerRef {
  kind: "PlayerHatched";
}

export interface PostseasonBirthData extends TeamRef, PlayerRef {
  kind: "PostseasonBirth";
  location: number;
}

export interface FinalStandingsData extends TeamRef {
  kind: "FinalStandings";
  /** Zero-based. */
  place: number;
  divisionName: string;
}

export interface TeamLeftPartyTimeData extends TeamRef {
  kind: "TeamLeftPartyTime";
}

export interface EarnedPostseasonSlotData extends TeamRef {
  kind: "EarnedPostseasonSlot";
}

export interface PostseasonAdvanceData extends TeamRef {
  kind: "PostseasonAdvance";
  /** Null when advancing to the Internet Series. */
  round: number | null;
  displayedSeason: number;
}

export interface PostseasonEliminatedData extends TeamRef {
  kind: "PostseasonEliminated";
  displayedSeason: number;
}

export interface PlayerBoostedData extends PlayerRef {
  kind: "PlayerBoosted";
  teamId: TeamId;
  ratingBefore: number;
  ratingAfter: number;
}

export interface TeamEnteredPartyTimeData extends TeamRef {
  kind: "TeamEnteredPartyTime";
}

export interface TeamWonInternetSeriesData extends TeamRef {
  kind: "TeamWonInternetSeries";
  championships: number;
}

export interface BottomDwellersData extends TeamRef {
  kind: "BottomDwellers";
  ratingBefore: number;
  ratingAfter: number;
}

export interface WillReceivedData {
  kind: "WillReceived";
  teamId: TeamId;
  willTitle: string;
  metadata: JsonObject;
}

export interface BlessingWonData {
  kind: "BlessingWon";
  teamTags: TeamId[];
  blessingTitle: string;
  metadata: JsonObject;
}

export interface GiftReceivedData {
  kind: "GiftReceived";
  teamId: TeamId;
  titleAndRecipient: string;
  metadata: JsonObject;
}

export interface DecreePassedData {
  kind: "DecreePassed";
  decreeTitle: string;
  metadata: JsonObject;
}

export interface PlayerJoinedIlbData extends PlayerRef {
  kind: "PlayerJoinedILB";
}

export interface PlayerPulledThroughRiftData extends PlayerRef {
  kind: "PlayerPulledThroughRift";
}

export interface PlayerPermittedToStayData extends PlayerRef {
  kind: "PlayerPermittedToStay";
}

export interface LineupSortedData extends TeamRef {
  kind: "LineupSorted";
}

export interface RenovationBuiltData {
  kind: "RenovationBuilt";
  teamId: TeamId;
  description: string;
  renovationId: string;
  renovationTitle: string;
  /** Manually entered renovations record their votes as text. */
  votes: number | string;
}

export interface PlayerNamedMvpData extends PlayerRef {
  kind: "PlayerNamedMvp";
  teamId: TeamId;
  level: number;
}

export interface ReplaceReturnedPlayerFromShadowsData extends TeamRef {
  kind: "ReplaceReturnedPlayerFromShadows";
  promotedPlayerId: PlayerId;
  promotedPlayerName: string;
  promotedLocation: number;
  removedPlayerId: PlayerId;
  removedPlayerName: string;
  removedLocation: number;
}

export interface PlayerCalledBackToHallData extends PlayerRef {
  kind: "PlayerCalledBackToHall";
}

export interface TeamUsedFreeWillData extends TeamRef {
  kind: "TeamUsedFreeWill";
}

export interface TeamGainedFreeWillData extends TeamRef {
  kind: "TeamGainedFreeWill";
}

export interface PlayerLostModData extends PlayerRef {
  kind: "PlayerLostMod";
  teamId: TeamId;
  mod: string;
  modName: string;
}

export interface InvestigationMessageData {
  kind: "InvestigationMessage";
  playerId: PlayerId;
  message: string;
}

export interface PlayerLocalizedData extends TeamRef, PlayerRef {
  kind: "PlayerLocalized";
  location: ActivePosition;
}

export interface TidingsData {
  kind: "Tidings";
  message: string;
  playerTags: PlayerId[];
  metadata: JsonObject;
}

export interface ModsFromAnotherModRemovedData extends PlayerRef {
  kind: "ModsFromAnotherModRemoved";
  teamId: TeamId;
  sourceModName: string;
  sourceModId: string;
  removes: ModDesc[];
}

export interface TarotReadingData {
  kind: "TarotReading";
  description: string;
  playerTags: PlayerId[];
  teamTags: TeamId[];
  metadata: JsonObject;
}

export interface CommunityChestOpensData extends LooseItemRatings, PlayerRef {
  kind: "CommunityChestOpens";
  teamId: TeamId;
}

export interface PlayerDropsItemData extends ItemRatings, PlayerRef {
  kind: "PlayerDropsItem";
  teamId: TeamId;
}

export type PrizeMatchWinner = { by: "team"; teamName: string } | { by: "player"; playerName: string };

export interface WonPrizeMatchData extends Omit<LooseItemRatings, "playerItemRatingBefore"> {
  kind: "WonPrizeMatch";
  playerItemRatingBefore: number;
  winner: PrizeMatchWinner;
  teamId: TeamId;
  playerId: PlayerId;
}

export interface TeamReceivedGiftsData {
  kind: "TeamReceivedGifts";
  recipient: TeamId;
  top3BenefactorCoins: number[];
  top3Benefactors: string[];
  totalBenefactorCoins: number;
  totalGifts: number;
}

/** A record the feed has hidden; only its text and weight survive. */
export interface RedactedData {
  kind: "Redacted";
  description: string;
  scales: number;
}

export interface ReplicaFadedToDustData extends TeamRef, PlayerRef {
  kind: "ReplicaFadedToDust";
}

interface PlayerMove extends PlayerRef {
  previousTeamId: TeamId;
  previousTeamName: string;
  newTeamId: TeamId;
  newTeamName: string;
}

export interface ReturnFromInvestigationData extends PlayerMove {
  kind: "ReturnFromInvestigation";
  newLocation: RosterLocation;
  emptyhanded: boolean;
}

export interface RoamData extends PlayerMove {
  kind: "Roam";
  location: RosterLocation;
}

// ---------------------------------------------------------------------------
// Union
// ---------------------------------------------------------------------------

export type OccurrenceData =
  | LetsGoData
  | PlayBallData
  | HalfInningData
  | BatterUpData
  | PitcherChangeData
  | InningEndData
  | GameEndData
  | StrikeZappedData
  | PeanutFlavorTextData
  | BirdsCircleData
  | SuperyummyData
  | HomebodyData
  | HolidayInningData
  | HomeFieldAdvantageData
  | PrizeMatchData
  | SolarPanelsAwaitData
  | SolarPanelsActivationData
  | RunsOverflowingData
  | EnterSecretBaseData
  | ExitSecretBaseData
  | PartyData
  | BallData
  | StrikeSwingingData
  | StrikeLookingData
  | StrikeFlinchingData
  | FoulBallData
  | FlyoutData
  | GroundOutData
  | FieldersChoiceData
  | DoublePlayData
  | HitData
  | HomeRunData
  | StolenBaseData
  | CaughtStealingData
  | StrikeoutSwingingData
  | StrikeoutLookingData
  | WalkData
  | CharmStrikeoutData
  | CharmWalkData
  | MildPitchData
  | MildPitchWalkData
  | MindTrickWalkData
  | MindTrickStrikeoutData
  | HitByPitchData
  | AmbushedByCrowsData
  | BatterSkippedData
  | CoffeeBeanData
  | GainFreeRefillData
  | BecomeTripleThreatData
  | BlooddrainData
  | SpecialBlooddrainData
  | BlooddrainBlockedData
  | Sun2Data
  | BlackHoleData
  | AllergicReactionData
  | SuperallergicReactionData
  | PeanutMisterData
  | PerkUpData
  | FeedbackData
  | FeedbackBlockedData
  | BestowReverberatingData
  | ReverbData
  | UnderOverData
  | OverUnderData
  | TasteTheInfiniteData
  | FloodingSweptData
  | ReturnFromElsewhereData
  | IncinerationData
  | BecameMagmaticData
  | FireproofIncinerationData
  | UnderseaData
  | HighPressureData
  | BirdsUnshellData
  | EchoReceiverData
  | SalmonSwimData
  | PolarityShiftData
  | SmithyData
  | DonatedShameAppliedData
  | GlitterCrateData
  | CommunityChestGameMessageData
  | BeingSpeechData
  | Sun2SetWinData
  | BlackHoleSwallowedWinData
  | TeamDidShameData
  | TeamWasShamedData
  | PlayerModExpiresData
  | TeamModExpiresData
  | FlagPlantedData
  | EmergencyAlertData
  | TeamJoinedIlbData
  | PlayerHatchedData
  | PostseasonBirthData
  | FinalStandingsData
  | TeamLeftPartyTimeData
  | EarnedPostseasonSlotData
  | PostseasonAdvanceData
  | PostseasonEliminatedData
  | PlayerBoostedData
  | TeamEnteredPartyTimeData
  | TeamWonInternetSeriesData
  | BottomDwellersData
  | WillReceivedData
  | BlessingWonData
  | GiftReceivedData
  | DecreePassedData
  | PlayerJoinedIlbData
  | PlayerPulledThroughRiftData
  | PlayerPermittedToStayData
  | LineupSortedData
  | RenovationBuiltData
  | PlayerNamedMvpData
  | ReplaceReturnedPlayerFromShadowsData
  | PlayerCalledBackToHallData
  | TeamUsedFreeWillData
  | TeamGainedFreeWillData
  | PlayerLostModData
  | InvestigationMessageData
  | PlayerLocalizedData
  | TidingsData
  | ModsFromAnotherModRemovedData
  | TarotReadingData
  | CommunityChestOpensData
  | PlayerDropsItemData
  | WonPrizeMatchData
  | TeamReceivedGiftsData
  | SubseasonalModsChangeData
  | PsychoacousticsData
  | ConsumersAttackData
  | ConsumerExpelledData
  | EchoChamberData
  | GrindRailData
  | EchoData
  | EchoIntoStaticData
  | ABloodTypeData
  | EnterCrimeSceneData
  | FaxMachineData
  | RedactedData
  | ReplicaFadedToDustData
  | ReturnFromInvestigationData
  | RoamData;

export type OccurrenceKind = OccurrenceData["kind"];

/** One parsed feed record: its envelope plus the kind-specific payload. */
export interface Occurrence extends Envelope {
  data: OccurrenceData;
}
