export type Phase = 'preseason' | 'regular-season' | 'postseason' | 'offseason'

export type Archetype = 'Tank' | 'DPS' | 'Control' | 'Support' | 'Hybrid'
export type AttackType = 'Melee' | 'Ranged' | 'Splash' | 'Magic'
export type Grade = 'S' | 'A' | 'B' | 'C' | 'D'

export type AttributeKey = 'attack' | 'defense' | 'speed' | 'hitSpeed' | 'typeScore' | 'synergy'
export type CardAttributes = Record<AttributeKey, number>

export type BoostStat = 'attack' | 'defense' | 'speed' | 'all'
export type ShopItemStat = BoostStat | 'stamina-reset'

export type AwardKey = 'mvp' | 'dpoy' | 'sixthMan' | 'roty' | 'finalsMvp'

export interface SaveMetadata {
  schemaVersion: number
  engineVersion: string
  seed: number
  createdAt: string
  updatedAt: string
}

export interface LeagueConfig {
  teamCount: number
  maxTeamCost: number
  gamesPerTeam: number
  poolMin: number
  poolCeiling: number
  rookiesPerSeason: number
  extraRetirements: number
  patchSize: number
  playoffTeams: number
  seriesLengths: number[]
  fatigueThreshold: number
  homeAdvantage: number
  rivalryBonus: number
  rivalryMinGames: number
  noiseSpread: number
  mvpMinGames: number
}

export interface CardSeasonSnapshot {
  season: number
  teamId: string | null
  power: number
  grade: Grade
  cost: number
  gamesPlayed: number
  avgContribution: number
  awards: string[]
}

export interface Card {
  id: string
  name: string
  archetype: Archetype
  attackType: AttackType
  attributes: CardAttributes
  power: number
  grade: Grade
  cost: number
  baseCost: number
  age: number
  lifespan: number
  retired: boolean
  retiredInSeason: number | null
  fatigue: number
  gamesPlayed: number
  contributionSum: number
  avgContribution: number
  pickRate: number
  awards: string[]
  history: CardSeasonSnapshot[]
  hofProbability: number
}

export interface Boost {
  key: string
  label: string
  stat: BoostStat
  amount: number
  gamesLeft: number
  teamwide: boolean
  targetCardId: string | null
}

export interface ShopItem {
  key: string
  label: string
  points: number
  stat: ShopItemStat
  amount: number
  games: number
  teamwide: boolean
}

export interface Team {
  id: string
  name: string
  logo: string
  color: string
  gmPersonality: string
  roster: string[]
  backup: string | null
  wins: number
  losses: number
  streak: number
  costSpent: number
  shopPointsLeft: number
  boosts: Boost[]
  tradeCardUsed: boolean
  careerTitles: number
  careerSeasons: number
}

export interface ScheduleEntry {
  day: number
  home: number
  away: number
}

export interface RivalryRecord {
  teamA: number
  teamB: number
  games: number
  aWins: number
  bWins: number
}

export interface GameRecap {
  day: number
  homeTeamId: string
  awayTeamId: string
  homeName: string
  awayName: string
  homeScore: number
  awayScore: number
  winnerTeamId: string
  comment: string
}

export interface SeriesResult {
  round: number
  teamA: number
  teamB: number
  teamAName: string
  teamBName: string
  bestOf: number
  winsA: number
  winsB: number
  winnerIndex: number
}

export interface PostseasonState {
  seeds: number[]
  bracket: Array<[number, number]>
  round: number
  series: SeriesResult[]
  championIndex: number | null
}

export interface AwardWinner {
  cardId: string
  cardName: string
}

export type AwardsTable = Record<AwardKey, AwardWinner | null>

export interface PatchChange {
  cardId: string
  cardName: string
  stat: AttributeKey
  delta: number
}

export interface PatchNotes {
  season: number
  nickname: string
  changes: PatchChange[]
}

export type RetirementReason = 'lifespan' | 'patch-related'

export interface RetirementEntry {
  cardId: string
  cardName: string
  reason: RetirementReason
}

export interface RookieEntry {
  cardId: string
  cardName: string
  badge: 'NEW'
}

export interface OffseasonProgress {
  awards: AwardsTable | null
  costsAdjusted: boolean
  patch: PatchNotes | null
  retirements: RetirementEntry[] | null
  rookies: RookieEntry[] | null
  archived: boolean
}

export interface StandingsRow {
  rank: number
  teamIndex: number
  teamId: string
  teamName: string
  wins: number
  losses: number
  streak: number
}

export interface SeasonArchiveEntry {
  season: number
  standings: StandingsRow[]
  awards: AwardsTable
  postseason: {
    championIndex: number
    championName: string
    series: SeriesResult[]
  }
  patchNotes: PatchNotes
  retirements: RetirementEntry[]
  rookies: RookieEntry[]
  transactions: string[]
}

export interface GameState {
  metadata: SaveMetadata
  config: LeagueConfig
  phase: Phase
  season: number
  day: number
  rngState: number
  teams: Team[]
  cards: Record<string, Card>
  schedule: ScheduleEntry[]
  rivalries: Record<string, RivalryRecord>
  transactions: string[]
  results: GameRecap[]
  postseason: PostseasonState | null
  offseason: OffseasonProgress
  archive: Record<string, SeasonArchiveEntry>
  shopCatalog: ShopItem[]
}

export type TransactionFailureReason = 'not-found' | 'capacity' | 'limit' | 'invalid' | 'phase'

export type TransactionOutcome =
  | { ok: true; message: string }
  | { ok: false; reason: TransactionFailureReason; message: string }

export interface TradeOffer {
  teamIndex: number
  teamName: string
  theirCardId: string
  theirCardName: string
  theirCost: number
}

/** Frozen copy of a league taken when its season closes, keyed by season number. */
export interface SeasonCheckpoint {
  season: number
  phase: Phase
  championName: string | null
  savedAt: string
  state: GameState
}

export interface LeagueSave {
  id: string
  name: string
  state: GameState
  checkpoints: Record<string, SeasonCheckpoint>
  createdAt: string
  updatedAt: string
}

export interface GameSaveRoot {
  metadata: SaveMetadata
  activeLeagueId: string
  leagues: Record<string, LeagueSave>
}
