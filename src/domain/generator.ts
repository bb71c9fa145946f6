import { createCard } from '@/domain/cards'
import {
  ARCHETYPES,
  ATTACK_TYPES,
  DEFAULT_LEAGUE_CONFIG,
  DEFAULT_SHOP_CATALOG,
  LIFESPAN_RANGE,
  ROOKIE_ATTRIBUTE_RANGE,
  WORLD_ATTRIBUTE_RANGE,
} from '@/domain/policy/leaguePolicy'
import { createPrng, type Prng } from '@/domain/prng'
import type { AttributeKey, Card, CardAttributes, GameState, LeagueConfig, OffseasonProgress, Team } from '@/domain/types'

export const ENGINE_VERSION = '1.0.0'
export const STATE_SCHEMA_VERSION = 1

const cardNamePool = [
  'Stone Warden',
  'Ember Mage',
  'Frost Archer',
  'Iron Golem',
  'Storm Caller',
  'Shadow Blade',
  'Grove Keeper',
  'Sky Lancer',
  'Rune Smith',
  'Dune Stalker',
  'Tide Shaman',
  'Bone Herald',
  'Spark Tinker',
  'Ash Knight',
  'Moon Seer',
  'Thorn Rider',
  'Vault Guard',
  'Gale Dancer',
  'Cinder Imp',
  'Hollow Monk',
]
const cityPool = ['Northreach', 'Saltmarsh', 'Ironvale', 'Duskmoor', 'Brightwater', 'Stormhold', 'Ashford', 'Greywind', 'Frostgate', 'Redcliff']
const brandPool = ['Wardens', 'Drakes', 'Ravens', 'Golems', 'Sentinels', 'Vipers', 'Titans', 'Wraiths', 'Lynxes', 'Comets']
const logos = ['🛡️', '🐉', '🦅', '🦈', '🦂', '🐺', '🦁', '🐯', '🦊', '🐻', '🦉', '🐍']
const colors = ['#0b1f3a', '#9d1d20', '#1f6f8b', '#f4a300', '#2f5233', '#702963', '#4b6cb7', '#7b241c', '#2e4053', '#0e6655']
const gmStyles = ['Analyst', 'Trader', 'Culture', 'Risk-Taker', 'Balanced']

export interface CreateInitialStateOptions {
  config?: Partial<LeagueConfig>
  createdAt?: string
}

export const emptyOffseason = (): OffseasonProgress => ({
  awards: null,
  costsAdjusted: false,
  patch: null,
  retirements: null,
  rookies: null,
  archived: false,
})

const rollAttributes = (prng: Prng, ranges: Readonly<Record<AttributeKey, [number, number]>>): CardAttributes => {
  const roll = (key: AttributeKey) => prng.nextInt(ranges[key][0], ranges[key][1])
  return {
    attack: roll('attack'),
    defense: roll('defense'),
    speed: roll('speed'),
    hitSpeed: roll('hitSpeed'),
    typeScore: roll('typeScore'),
    synergy: roll('synergy'),
  }
}

const rollCard = (prng: Prng, id: string, name: string, ranges: Readonly<Record<AttributeKey, [number, number]>>): Card => {
  const archetype = prng.pick(ARCHETYPES)
  const attackType = prng.pick(ATTACK_TYPES)
  const attributes = rollAttributes(prng, ranges)
  return createCard({
    id,
    name,
    archetype,
    attackType,
    attributes,
    lifespan: prng.nextInt(LIFESPAN_RANGE.min, LIFESPAN_RANGE.max),
  })
}

export const generateCardPool = (prng: Prng, count: number): Record<string, Card> => {
  const cards: Record<string, Card> = {}
  for (let index = 0; index < count; index += 1) {
    const id = `card-${index + 1}`
    cards[id] = rollCard(prng, id, `${prng.pick(cardNamePool)} #${index + 1}`, WORLD_ATTRIBUTE_RANGE)
  }
  return cards
}

export const generateRookie = (prng: Prng, season: number, ordinal: number): Card => {
  const id = `rookie-s${season}-${ordinal}`
  return rollCard(prng, id, `Rookie ${prng.pick(cardNamePool)} #${prng.nextInt(1000, 9999)}`, ROOKIE_ATTRIBUTE_RANGE)
}

export const generateTeams = (config: LeagueConfig, prng: Prng): Team[] => {
  const used = new Set<string>()

  return Array.from({ length: config.teamCount }, (_, index) => {
    const city = cityPool[index % cityPool.length]
    const available = brandPool.filter((brand) => !used.has(`${city} ${brand}`))
    const name = available.length > 0 ? `${city} ${prng.pick(available)}` : `${city} ${index + 1}`
    used.add(name)

    return {
      id: `team-${index + 1}`,
      name,
      logo: prng.pick(logos),
      color: colors[index % colors.length],
      gmPersonality: prng.pick(gmStyles),
      roster: [],
      backup: null,
      wins: 0,
      losses: 0,
      streak: 0,
      costSpent: 0,
      shopPointsLeft: 0,
      boosts: [],
      tradeCardUsed: false,
      careerTitles: 0,
      careerSeasons: 0,
    }
  })
}

export const resolveLeagueConfig = (overrides: Partial<LeagueConfig> = {}): LeagueConfig => ({
  ...DEFAULT_LEAGUE_CONFIG,
  ...overrides,
  seriesLengths: [...(overrides.seriesLengths ?? DEFAULT_LEAGUE_CONFIG.seriesLengths)],
})

export const createInitialState = (seed: number, options: CreateInitialStateOptions = {}): GameState => {
  const config = resolveLeagueConfig(options.config)
  const prng = createPrng(seed)
  const createdAt = options.createdAt ?? new Date().toISOString()

  const poolSize = prng.nextInt(config.poolMin, Math.max(config.poolMin, Math.min(config.poolMin + 8, config.poolCeiling)))
  const cards = generateCardPool(prng, poolSize)
  const teams = generateTeams(config, prng)

  return {
    metadata: {
      schemaVersion: STATE_SCHEMA_VERSION,
      engineVersion: ENGINE_VERSION,
      seed,
      createdAt,
      updatedAt: createdAt,
    },
    config,
    phase: 'preseason',
    season: 1,
    day: 1,
    rngState: prng.state(),
    teams,
    cards,
    schedule: [],
    rivalries: {},
    transactions: [],
    results: [],
    postseason: null,
    offseason: emptyOffseason(),
    archive: {},
    shopCatalog: structuredClone(DEFAULT_SHOP_CATALOG),
  }
}
