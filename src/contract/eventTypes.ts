// ---------------------------------------------------------------------------
// Event types
// ---------------------------------------------------------------------------

/** Discriminant values of the `type` field. */
export const EventType = {
  Undefined: -1,
  LetsGo: 0,
  PlayBall: 1,
  HalfInning: 2,
  PitcherChange: 3,
  StolenBase: 4,
  Walk: 5,
  Strikeout: 6,
  FlyOut: 7,
  GroundOut: 8,
  HomeRun: 9,
  Hit: 10,
  GameEnd: 11,
  BatterUp: 12,
  Strike: 13,
  Ball: 14,
  FoulBall: 15,
  RunsOverflowing: 20,
  HomeFieldAdvantage: 21,
  HitByPitch: 22,
  BatterSkipped: 23,
  Party: 24,
  StrikeZapped: 25,
  WeatherChange: 26,
  MildPitch: 27,
  InningEnd: 28,
  BigDeal: 29,
  BlackHole: 30,
  Sun2: 31,
  BirdsCircle: 33,
  AmbushedByCrows: 34,
  BirdsUnshell: 35,
  BecomeTripleThreat: 36,
  GainFreeRefill: 37,
  CoffeeBean: 39,
  FeedbackBlocked: 40,
  FeedbackSwap: 41,
  SuperallergicReaction: 45,
  AllergicReaction: 47,
  ReverbBestowsReverberating: 48,
  ReverbRosterShuffle: 49,
  Blooddrain: 51,
  BlooddrainSiphon: 52,
  BlooddrainBlocked: 53,
  Incineration: 54,
  IncinerationBlocked: 55,
  FlagPlanted: 56,
  RenovationBuilt: 57,
  LightSwitchToggled: 58,
  DecreePassed: 59,
  BlessingOrGiftWon: 60,
  WillRecieved: 61,
  FloodingSwept: 62,
  SalmonSwim: 63,
  PolarityShift: 64,
  EnterSecretBase: 65,
  ExitSecretBase: 66,
  ConsumersAttack: 67,
  EchoChamber: 69,
  GrindRail: 70,
  TunnelsUsed: 71,
  PeanutMister: 72,
  PeanutFlavorText: 73,
  TasteTheInfinite: 74,
  EventHorizonActivation: 76,
  EventHorizonAwaits: 77,
  SolarPanelsAwait: 78,
  SolarPanelsActivation: 79,
  TarotReading: 81,
  EmergencyAlert: 82,
  ReturnFromElsewhere: 84,
  OverUnder: 85,
  UnderOver: 86,
  Undersea: 88,
  Homebody: 91,
  Superyummy: 92,
  Perk: 93,
  Earlbird: 96,
  LateToTheParty: 97,
  ShameDonor: 99,
  AddedMod: 106,
  RemovedMod: 107,
  ModExpires: 108,
  PlayerAddedToTeam: 109,
  PlayerReplacedByNecromancy: 110,
  PlayerReplacesReturned: 111,
  PlayerRemovedFromTeam: 112,
  PlayerTraded: 113,
  PlayerSwap: 114,
  PlayerMoved: 115,
  PlayerBornFromIncineration: 116,
  PlayerStatIncrease: 117,
  PlayerStatDecrease: 118,
  PlayerStatReroll: 119,
  PlayerStatDecreaseFromSuperallergic: 122,
  PlayerMoveFailedForce: 124,
  EnterHallOfFlame: 125,
  ExitHallOfFlame: 126,
  PlayerGainedItem: 127,
  PlayerLostItem: 128,
  ReverbFullShuffle: 130,
  ReverbLineupShuffle: 131,
  ReverbRotationShuffle: 132,
  TeamDivisionMove: 135,
  PlayerDivisionMove: 136,
  PlayerHatched: 137,
  PlayerEvolves: 139,
  TeamWonInternetSeries: 141,
  EarnedPostseasonSlot: 142,
  FinalStandings: 143,
  ModChange: 144,
  PlayerAlternated: 145,
  AddedModFromOtherMod: 146,
  RemovedModFromOtherMod: 147,
  ChangedModFromOtherMod: 148,
  NecromancyOrPlunderNarration: 149,
  PlayerPermittedToStay: 150,
  DecreeNarration: 151,
  WillResults: 152,
  TeamStatAdjustment: 153,
  TeamWasShamed: 154,
  TeamDidShame: 155,
  Sun2SetWin: 156,
  BlackHoleSwallowedWin: 157,
  PostseasonEliminated: 158,
  PostseasonAdvance: 159,
  GainBloodType: 161,
  HighPressure: 165,
  LineupSorted: 166,
  NutButton: 168,
  Echo: 169,
  EchoIntoStatic: 170,
  RemovedModsFromAnotherMod: 171,
  AddedModsFromAnotherMod: 172,
  Psychoacoustics: 173,
  EchoReciever: 174,
  InvestigationMessage: 175,
  Tidings: 176,
  GlitterCrateDrop: 177,
  Middling: 178,
  PlayerAttributeIncrease: 179,
  PlayerAttributeDecrease: 180,
  EnterCrimeScene: 181,
  Ambitious: 182,
  Coasting: 184,
  ItemBreaks: 185,
  ItemDamaged: 186,
  BrokenItemRepaired: 187,
  DamagedItemRepaired: 188,
  CommunityChestOpens: 189,
  NoFreeItemSlot: 190,
  FaxMachine: 191,
  HolidayInning: 192,
  PrizeMatch: 193,
  TeamReceivedGifts: 194,
  Smithy: 195,
  ABloodType: 198,
  PlayerSoulIncrease: 199,
  Announcement: 201,
  RunsScored: 209,
  WinCollectedRegular: 214,
  WinCollectedPostseason: 215,
  GameOver: 216,
  StormWarning: 263,
  Snowflakes: 264,
} as const;

export type EventType = (typeof EventType)[keyof typeof EventType];

const EVENT_TYPE_NAMES = new Map<number, string>(
  Object.entries(EventType).map(([name, value]) => [value, name]),
);

/** Human-readable name of a discriminant, or `Type(n)` for values outside the table. */
export function eventTypeName(type: number): string {
  return EVENT_TYPE_NAMES.get(type) ?? `Type(${type})`;
}

// ---------------------------------------------------------------------------
// Categories
// ---------------------------------------------------------------------------

export const EventCategory = {
  Redacted: -1,
  Game: 0,
  Changes: 1,
  Special: 2,
  Outcomes: 3,
  Narrative: 4,
} as const;

export type EventCategory = (typeof EventCategory)[keyof typeof EventCategory];

/** Special when the condition holds, Game otherwise. */
export function specialIf(condition: boolean): EventCategory {
  return condition ? EventCategory.Special : EventCategory.Game;
}

// ---------------------------------------------------------------------------
// Enumerations stored in metadata
// ---------------------------------------------------------------------------

export const Weather = {
  Void: 0,
  Sun2: 1,
  Overcast: 2,
  Rainy: 3,
  Sandstorm: 4,
  Snowy: 5,
  Acidic: 6,
  SolarEclipse: 7,
  Glitter: 8,
  Blooddrain: 9,
  Peanuts: 10,
  Birds: 11,
  Feedback: 12,
  Reverb: 13,
  BlackHole: 14,
  Coffee: 15,
  Coffee2: 16,
  Coffee3s: 17,
  Flooding: 18,
  Salmon: 19,
  PolarityPlus: 20,
  PolarityMinus: 21,
  Sun90: 23,
  SunPoint1: 24,
  SumSun: 25,
  SupernovaEclipse: 26,
  BlackHoleBlackHole: 27,
  Jazz: 28,
  Night: 29,
} as const;

export type Weather = (typeof Weather)[keyof typeof Weather];

export const WEATHER_VALUES: readonly Weather[] = Object.values(Weather);

/** Speakers of BigDeal narrative records. */
export const Being = {
  EmergencyAlert: -1,
  Peanut: 0,
  Monitor: 1,
  Coin: 2,
  Reader: 3,
  Microphone: 4,
  Lootcrates: 5,
  Namerifeht: 6,
} as const;

export type Being = (typeof Being)[keyof typeof Being];

export const BEING_VALUES: readonly Being[] = Object.values(Being);

/** `phase` of the sim when a record was written. */
export const SimPhase = {
  GodsDay: 0,
  Preseason: 1,
  Earlseason: 2,
  Earlsiesta: 3,
  Midseason: 4,
  Latesiesta: 5,
  Lateseason: 6,
  Endseason: 7,
  PrePostseason: 8,
  Earlpostseason: 9,
  EarlpostseasonEnd: 10,
  Latepostseason: 11,
  PostseasonEnd: 12,
  Election: 13,
  SpecialEvent: 14,
} as const;

export type SimPhase = (typeof SimPhase)[keyof typeof SimPhase];

export const SIM_PHASE_VALUES: readonly SimPhase[] = Object.values(SimPhase);

export const ModDuration = {
  Permanent: 0,
  Seasonal: 1,
  Weekly: 2,
  Game: 3,
} as const;

export type ModDuration = (typeof ModDuration)[keyof typeof ModDuration];

export const MOD_DURATION_VALUES: readonly ModDuration[] = Object.values(ModDuration);

/** Rating category carried in the `type` key of stat-change records. */
export const AttrCategory = {
  Hitting: 0,
  Pitching: 1,
  Defense: 2,
  Baserunning: 3,
  Overall: 4,
} as const;

export type AttrCategory = (typeof AttrCategory)[keyof typeof AttrCategory];

/** Roster location codes used by move/swap records. */
export const RosterLocation = {
  Lineup: 0,
  Rotation: 1,
  Bench: 2,
  Bullpen: 3,
} as const;

export type RosterLocation = (typeof RosterLocation)[keyof typeof RosterLocation];

export const ROSTER_LOCATION_VALUES: readonly RosterLocation[] = Object.values(RosterLocation);
