import type { Archetype, AttackType, AttributeKey, AwardKey, Grade, LeagueConfig, ShopItem } from '@/domain/types'

export const ARCHETYPES: readonly Archetype[] = ['Tank', 'DPS', 'Control', 'Support', 'Hybrid']
export const ATTACK_TYPES: readonly AttackType[] = ['Melee', 'Ranged', 'Splash', 'Magic']
export const ATTRIBUTE_KEYS: readonly AttributeKey[] = ['attack', 'defense', 'speed', 'hitSpeed', 'typeScore', 'synergy']

/**
 * The one power formula. Draft ranking, match strength, award scoring, trade matching and
 * display all read `Card.power` or call `computePower` with these weights.
 */
export const POWER_WEIGHTS: Readonly<Record<AttributeKey, number>> = {
  attack: 0.28,
  defense: 0.24,
  speed: 0.22,
  hitSpeed: 0.1,
  typeScore: 0.06,
  synergy: 0.1,
}

export const GRADE_THRESHOLDS: ReadonlyArray<{ grade: Grade; min: number }> = [
  { grade: 'S', min: 90 },
  { grade: 'A', min: 80 },
  { grade: 'B', min: 70 },
  { grade: 'C', min: 60 },
]

export const COST_FLOOR = 0.5
export const COST_DRIFT = 0.98
export const PATCH_STAT_RANGE = { min: 30, max: 99 } as const
export const PATCH_DELTA_RANGE = { min: -4, max: 4 } as const

export const WORLD_ATTRIBUTE_RANGE: Readonly<Record<AttributeKey, [number, number]>> = {
  attack: [50, 95],
  defense: [50, 95],
  speed: [50, 95],
  hitSpeed: [40, 95],
  typeScore: [40, 95],
  synergy: [40, 95],
}

export const ROOKIE_ATTRIBUTE_RANGE: Readonly<Record<AttributeKey, [number, number]>> = {
  attack: [55, 92],
  defense: [55, 92],
  speed: [55, 92],
  hitSpeed: [45, 92],
  typeScore: [45, 92],
  synergy: [45, 92],
}

export const LIFESPAN_RANGE = { min: 3, max: 8 } as const

// Additive chemistry points per archetype pair; lookups are symmetric.
const SYNERGY_PAIRS: ReadonlyArray<[Archetype, Archetype, number]> = [
  ['Tank', 'Support', 5],
  ['Tank', 'DPS', 2],
  ['Tank', 'Control', -2],
  ['Tank', 'Hybrid', 1],
  ['DPS', 'Support', 1],
  ['DPS', 'Control', 2],
  ['DPS', 'Hybrid', 1],
  ['Control', 'Support', 3],
  ['Control', 'Hybrid', 1],
  ['Support', 'Hybrid', 2],
  ['Tank', 'Tank', -3],
  ['DPS', 'DPS', -2],
  ['Control', 'Control', -1],
  ['Support', 'Support', 0],
  ['Hybrid', 'Hybrid', 0],
]

const synergyTable = new Map<string, number>()
for (const [left, right, value] of SYNERGY_PAIRS) {
  synergyTable.set(`${left}|${right}`, value)
  synergyTable.set(`${right}|${left}`, value)
}

export const archetypeSynergy = (left: Archetype, right: Archetype): number => synergyTable.get(`${left}|${right}`) ?? 0

export const DEFAULT_LEAGUE_CONFIG: LeagueConfig = {
  teamCount: 30,
  maxTeamCost: 20,
  gamesPerTeam: 40,
  poolMin: 160,
  poolCeiling: 170,
  rookiesPerSeason: 4,
  extraRetirements: 3,
  patchSize: 20,
  playoffTeams: 16,
  seriesLengths: [3, 5, 5, 7],
  fatigueThreshold: 25,
  homeAdvantage: 1.03,
  rivalryBonus: 1.02,
  rivalryMinGames: 3,
  noiseSpread: 0.05,
  mvpMinGames: 10,
}

export const STARTER_SLOTS = 3
export const DRAFT_ROUNDS = STARTER_SLOTS + 1

export const DEFAULT_SHOP_CATALOG: ShopItem[] = [
  { key: 'boost-attack-3-2g', label: 'Attack +3 (2 games)', points: 1.5, stat: 'attack', amount: 3, games: 2, teamwide: false },
  { key: 'boost-defense-3-2g', label: 'Defense +3 (2 games)', points: 1.5, stat: 'defense', amount: 3, games: 2, teamwide: false },
  { key: 'boost-speed-3-2g', label: 'Speed +3 (2 games)', points: 1.5, stat: 'speed', amount: 3, games: 2, teamwide: false },
  { key: 'team-all-2-2g', label: 'Team All +2 (2 games)', points: 3, stat: 'all', amount: 2, games: 2, teamwide: true },
  { key: 'stamina-reset', label: 'Reset Fatigue (single)', points: 0.75, stat: 'stamina-reset', amount: 100, games: 0, teamwide: false },
]

export const AWARD_LABELS: Readonly<Record<AwardKey, string>> = {
  mvp: 'MVP',
  dpoy: 'DPOY',
  sixthMan: 'Sixth Man',
  roty: 'ROTY',
  finalsMvp: 'Finals MVP',
}

export const AWARD_COST_BUMPS: Readonly<Record<AwardKey, number>> = {
  mvp: 0.5,
  dpoy: 0.3,
  finalsMvp: 0.3,
  roty: 0.2,
  sixthMan: 0.2,
}

export const TRADE_POWER_WINDOW = 8

export const PATCH_NICKNAMES = ['Tank Nerf Patch', 'Speed Era Begins', 'Synergy Shuffle', 'Meta Mixer', 'Balance Tuning'] as const
