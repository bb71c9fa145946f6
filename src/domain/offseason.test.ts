import { roundPoints } from '@/domain/cards'
import { ValidationError } from '@/domain/errors'
import { createInitialState } from '@/domain/generator'
import { advanceSeason, adjustCosts, applyPatch, archiveSeason, computeAwards, retireAndReplenish, runOffseason } from '@/domain/offseason'
import { assertGameStateSemanticIntegrity } from '@/domain/invariants'
import { simulateFullSeason } from '@/domain/lifecycle'
import { hallOfFameProbability } from '@/domain/offseason/archive'
import { repriceCards } from '@/domain/offseason/economy'
import { retireAndRefill } from '@/domain/offseason/retirement'
import { AWARD_COST_BUMPS } from '@/domain/policy/leaguePolicy'
import { simulatePostseasonToChampion } from '@/domain/postseason'
import { createPrng } from '@/domain/prng'
import { runPreseason, simulateNextDay } from '@/domain/season'
import { recalculateCostSpent, sumCardCosts, teamCardIds } from '@/domain/teams'
import type { AwardsTable, GameState } from '@/domain/types'
import { FIXED_CREATED_AT, createDuelState, createSmallLeague, makeCard } from '@/test/leagueFactory'

const reachOffseason = (seed = 55): GameState => {
  const state = createSmallLeague(seed)
  runPreseason(state)
  while (state.phase === 'regular-season') {
    simulateNextDay(state)
  }
  simulatePostseasonToChampion(state)
  return state
}

describe('offseason ordering', () => {
  it('rejects steps whose predecessor has not run', () => {
    const state = reachOffseason()

    expect(() => adjustCosts(state)).toThrow(ValidationError)
    expect(() => applyPatch(state)).toThrow(ValidationError)
    expect(() => retireAndReplenish(state)).toThrow(ValidationError)
    expect(() => archiveSeason(state)).toThrow(ValidationError)
    expect(() => advanceSeason(state)).toThrow(ValidationError)
  })

  it('rejects offseason steps before the postseason is over', () => {
    const state = createSmallLeague(55)

    expect(() => computeAwards(state)).toThrow(ValidationError)
  })

  it('treats a repeated step as a no-op', () => {
    const state = reachOffseason()
    const awards = computeAwards(state)
    const tagged = Object.values(state.cards).flatMap((card) => card.awards)

    expect(computeAwards(state)).toBe(awards)
    expect(Object.values(state.cards).flatMap((card) => card.awards)).toEqual(tagged)

    adjustCosts(state)
    const costs = Object.values(state.cards).map((card) => card.cost)
    adjustCosts(state)
    expect(Object.values(state.cards).map((card) => card.cost)).toEqual(costs)
  })
})

describe('awards and costs', () => {
  it('tags winners with the season and gives the finals award to the champion roster', () => {
    const state = reachOffseason()
    const championIndex = state.postseason?.championIndex ?? -1
    const awards = computeAwards(state)

    const finalsMvp = awards.finalsMvp
    expect(finalsMvp).not.toBeNull()
    if (finalsMvp) {
      expect(state.teams[championIndex].roster).toContain(finalsMvp.cardId)
      expect(state.cards[finalsMvp.cardId].awards).toContain('Finals MVP S1')
    }
    const mvp = awards.mvp
    if (mvp) {
      expect(state.cards[mvp.cardId].gamesPlayed).toBeGreaterThanOrEqual(state.config.mvpMinGames)
      expect(state.cards[mvp.cardId].awards).toContain('MVP S1')
    }
  })

  it('bumps award winners and drifts everyone else toward the floor', () => {
    const state = reachOffseason()
    const awards = computeAwards(state)
    const before = structuredClone(state.cards)

    adjustCosts(state)

    const bumps = new Map<string, number>()
    for (const key of ['mvp', 'dpoy', 'sixthMan', 'roty', 'finalsMvp'] as const) {
      const winner = awards[key]
      if (winner) {
        bumps.set(winner.cardId, (bumps.get(winner.cardId) ?? 0) + AWARD_COST_BUMPS[key])
      }
    }
    for (const card of Object.values(state.cards)) {
      const previous = before[card.id].cost
      const bump = bumps.get(card.id)
      if (bump === undefined) {
        expect(card.cost).toBe(roundPoints(Math.max(0.5, previous * 0.98)))
      } else {
        expect(card.cost).toBeGreaterThanOrEqual(previous)
        expect(card.cost).toBeLessThanOrEqual(roundPoints(previous + bump))
      }
    }
  })

  it('keeps every payroll equal to its card costs and under the cap after the cost pass', () => {
    for (const seed of [55, 56, 57]) {
      const state = reachOffseason(seed)
      computeAwards(state)

      adjustCosts(state)

      for (const team of state.teams) {
        expect(team.costSpent).toBe(sumCardCosts(state.cards, teamCardIds(team)))
        expect(team.costSpent).toBeLessThanOrEqual(state.config.maxTeamCost)
        expect(team.shopPointsLeft).toBeLessThanOrEqual(roundPoints(state.config.maxTeamCost - team.costSpent))
      }
      expect(() => assertGameStateSemanticIntegrity(state)).not.toThrow()
    }
  })

  it('cuts an award bump down to the headroom its owner has left', () => {
    const state = createDuelState(70, 60)
    const costs: Record<string, number> = { a1: 5, a2: 5, a3: 10 }
    for (const [cardId, cost] of Object.entries(costs)) {
      state.cards[cardId].cost = cost
    }
    state.cards.fa = makeCard('fa', 60, { cost: 2 })
    recalculateCostSpent(state, state.teams[0])
    state.teams[0].shopPointsLeft = 3
    const awards: AwardsTable = {
      mvp: { cardId: 'a1', cardName: 'Card a1' },
      dpoy: { cardId: 'fa', cardName: 'Card fa' },
      sixthMan: null,
      roty: null,
      finalsMvp: null,
    }

    repriceCards(state, awards)

    expect(state.cards.a2.cost).toBe(4.9)
    expect(state.cards.a3.cost).toBe(9.8)
    expect(state.cards.a1.cost).toBe(5.3)
    expect(state.cards.fa.cost).toBe(2.3)
    expect(state.teams[0].costSpent).toBe(20)
    expect(state.teams[0].shopPointsLeft).toBe(0)
    expect(state.transactions).toEqual([`Card a1 award bump limited to 0.3 by the ${state.teams[0].name} cap`])
  })
})

describe('patch, retirement and archive', () => {
  it('records applied deltas inside the patch bounds', () => {
    const state = reachOffseason()
    computeAwards(state)
    adjustCosts(state)

    const patch = applyPatch(state)

    expect(patch.season).toBe(1)
    expect(new Set(patch.changes.map((change) => change.cardId)).size).toBeLessThanOrEqual(state.config.patchSize)
    for (const change of patch.changes) {
      expect(change.delta).not.toBe(0)
      expect(Math.abs(change.delta)).toBeLessThanOrEqual(4)
      const value = state.cards[change.cardId].attributes[change.stat]
      expect(value).toBeGreaterThanOrEqual(30)
      expect(value).toBeLessThanOrEqual(99)
    }
  })

  it('retires a card at the end of its lifespan and never drafts it again', () => {
    const state = reachOffseason()
    const veteranId = state.teams[0].roster[0]
    state.cards[veteranId].age = state.cards[veteranId].lifespan
    computeAwards(state)
    adjustCosts(state)
    applyPatch(state)

    const { retirements, rookies } = retireAndReplenish(state)

    expect(state.cards[veteranId].retired).toBe(true)
    expect(retirements).toContainEqual({ cardId: veteranId, cardName: state.cards[veteranId].name, reason: 'lifespan' })
    expect(retirements.filter((entry) => entry.reason === 'patch-related')).toHaveLength(1)
    expect(rookies.length).toBeGreaterThanOrEqual(2)
    expect(rookies.every((entry) => state.cards[entry.cardId].age === 0)).toBe(true)

    archiveSeason(state)
    advanceSeason(state)
    runPreseason(state)
    const owned = state.teams.flatMap((team) => [...team.roster, ...(team.backup ? [team.backup] : [])])
    expect(owned).not.toContain(veteranId)
  })

  it('archives the season and resets in-season logs', () => {
    const state = reachOffseason()
    const championIndex = state.postseason?.championIndex ?? -1
    const seriesCount = state.postseason?.series.length ?? 0

    const entry = runOffseason(state)

    expect(entry.season).toBe(1)
    expect(entry.postseason.championIndex).toBe(championIndex)
    expect(entry.postseason.championName).toBe(state.teams[championIndex].name)
    expect(entry.postseason.series).toHaveLength(seriesCount)
    expect(entry.standings).toHaveLength(state.teams.length)
    expect(entry.transactions.length).toBeGreaterThan(0)
    expect(state.archive['1']).toBe(entry)
    expect(state.transactions).toEqual([])
    expect(state.results).toEqual([])
    expect(state.postseason).toBeNull()
    expect(state.teams.every((team) => team.careerSeasons === 1)).toBe(true)

    const rookieIds = new Set(entry.rookies.map((rookie) => rookie.cardId))
    for (const card of Object.values(state.cards)) {
      expect(card.history).toHaveLength(rookieIds.has(card.id) ? 0 : 1)
    }
    expect(archiveSeason(state)).toBe(entry)
  })

  it('moves to the next preseason with fresh offseason progress', () => {
    const state = reachOffseason()
    runOffseason(state)

    expect(advanceSeason(state)).toBe(2)
    expect(state.phase).toBe('preseason')
    expect(state.offseason).toEqual({ awards: null, costsAdjusted: false, patch: null, retirements: null, rookies: null, archived: false })
  })
})

describe('pool ceiling', () => {
  const retiredCard = (id: string, retiredInSeason: number, awards: string[] = []) =>
    makeCard(id, 60, { retired: true, retiredInSeason, awards })

  it('prunes older retirees first and award holders only after the award-less ones', () => {
    const state = createDuelState(70, 60, { rookiesPerSeason: 0, extraRetirements: 0, poolCeiling: 11 })
    state.season = 4
    for (const card of [
      retiredCard('r1', 2),
      retiredCard('r2', 1, ['MVP S1']),
      retiredCard('r3', 3, ['DPOY S3']),
      retiredCard('r4', 4),
      retiredCard('r5', 4, ['ROTY S4']),
      retiredCard('r6', 1),
    ]) {
      state.cards[card.id] = card
    }
    state.teams[1].backup = 'r6'

    const pass = retireAndRefill(state, createPrng(5))

    expect(pass.pruned).toEqual(['r1', 'r2', 'r3'])
    expect(pass.rookies).toHaveLength(2)
    expect(Object.keys(state.cards)).toHaveLength(11)
    expect(state.cards.r6).toBeDefined()
  })

  it('shrinks the rookie class to the room left but keeps four active cards per team', () => {
    const state = createDuelState(70, 60, { rookiesPerSeason: 4, extraRetirements: 0, poolCeiling: 8 })

    const pass = retireAndRefill(state, createPrng(5))

    expect(pass.pruned).toEqual([])
    expect(pass.rookies).toHaveLength(2)
    expect(Object.values(state.cards).filter((card) => !card.retired)).toHaveLength(8)
  })

  it('stays at or under the ceiling across many seasons', () => {
    const state = createInitialState(7, { createdAt: FIXED_CREATED_AT })
    const sizes: number[] = []

    for (let season = 1; season <= 15; season += 1) {
      simulateFullSeason(state)
      sizes.push(Object.keys(state.cards).length)
      advanceSeason(state)
    }

    expect(sizes.every((size) => size <= state.config.poolCeiling)).toBe(true)
    expect(Object.values(state.cards).filter((card) => !card.retired).length).toBeGreaterThanOrEqual(state.config.teamCount * 4)
  }, 60_000)
})

describe('hall of fame probability', () => {
  it('weights awards, contribution, longevity and power', () => {
    const card = makeCard('hof', 80, { awards: ['MVP S1', 'Finals MVP S2', 'ROTY S1'], avgContribution: 45, age: 4 })

    expect(hallOfFameProbability(card)).toBe(10 + 6 + 2 + 4.5 + 3 + 4)
  })

  it('stays within zero and one hundred', () => {
    expect(hallOfFameProbability(makeCard('low', 30))).toBe(0)
  })
})
