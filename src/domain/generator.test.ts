import { DEFAULT_LEAGUE_CONFIG, ROOKIE_ATTRIBUTE_RANGE } from '@/domain/policy/leaguePolicy'
import { createInitialState, generateRookie } from '@/domain/generator'
import { createPrng } from '@/domain/prng'
import { FIXED_CREATED_AT } from '@/test/leagueFactory'

describe('league generation', () => {
  it('builds a default league in preseason with a pool inside its bounds', () => {
    const state = createInitialState(42, { createdAt: FIXED_CREATED_AT })
    const poolSize = Object.keys(state.cards).length

    expect(state.phase).toBe('preseason')
    expect(state.season).toBe(1)
    expect(state.day).toBe(1)
    expect(state.teams).toHaveLength(DEFAULT_LEAGUE_CONFIG.teamCount)
    expect(poolSize).toBeGreaterThanOrEqual(DEFAULT_LEAGUE_CONFIG.poolMin)
    expect(poolSize).toBeLessThanOrEqual(DEFAULT_LEAGUE_CONFIG.poolCeiling)
    expect(state.metadata.createdAt).toBe(FIXED_CREATED_AT)
    expect(state.shopCatalog).toHaveLength(5)
  })

  it('gives every team a unique name and an empty season', () => {
    const state = createInitialState(42, { createdAt: FIXED_CREATED_AT })

    expect(new Set(state.teams.map((team) => team.name)).size).toBe(state.teams.length)
    expect(state.teams.every((team) => team.roster.length === 0 && team.backup === null && team.wins === 0)).toBe(true)
  })

  it('keeps cards in range with a lifespan of three to eight seasons', () => {
    const state = createInitialState(5, { createdAt: FIXED_CREATED_AT })

    for (const card of Object.values(state.cards)) {
      expect(card.lifespan).toBeGreaterThanOrEqual(3)
      expect(card.lifespan).toBeLessThanOrEqual(8)
      expect(card.cost).toBeGreaterThanOrEqual(0.5)
      expect(Object.values(card.attributes).every((value) => value >= 40 && value <= 95)).toBe(true)
    }
  })

  it('is reproducible from the seed', () => {
    const first = createInitialState(314, { createdAt: FIXED_CREATED_AT })
    const second = createInitialState(314, { createdAt: FIXED_CREATED_AT })

    expect(second).toEqual(first)
  })

  it('applies config overrides', () => {
    const state = createInitialState(1, { config: { teamCount: 8, poolMin: 40, poolCeiling: 44 }, createdAt: FIXED_CREATED_AT })

    expect(state.teams).toHaveLength(8)
    expect(Object.keys(state.cards).length).toBeGreaterThanOrEqual(40)
    expect(Object.keys(state.cards).length).toBeLessThanOrEqual(44)
    expect(state.config.gamesPerTeam).toBe(DEFAULT_LEAGUE_CONFIG.gamesPerTeam)
  })

  it('rolls rookies at age zero inside the rookie ranges', () => {
    const rookie = generateRookie(createPrng(9), 3, 2)

    expect(rookie.id).toBe('rookie-s3-2')
    expect(rookie.age).toBe(0)
    expect(rookie.name.startsWith('Rookie ')).toBe(true)
    expect(rookie.attributes.attack).toBeGreaterThanOrEqual(ROOKIE_ATTRIBUTE_RANGE.attack[0])
    expect(rookie.attributes.hitSpeed).toBeGreaterThanOrEqual(ROOKIE_ATTRIBUTE_RANGE.hitSpeed[0])
    expect(rookie.attributes.synergy).toBeLessThanOrEqual(ROOKIE_ATTRIBUTE_RANGE.synergy[1])
  })
})
