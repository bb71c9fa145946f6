import { runPreseason } from '@/domain/season'
import { purchaseBoost } from '@/domain/transactions/shop'
import { createSmallLeague } from '@/test/leagueFactory'

const inSeason = () => {
  const state = createSmallLeague(61)
  runPreseason(state)
  return state
}

describe('boost shop', () => {
  it('adds a targeted boost and spends the item points', () => {
    const state = inSeason()
    const team = state.teams[0]
    team.shopPointsLeft = 4
    const target = team.roster[1]

    const outcome = purchaseBoost(state, 0, 'boost-attack-3-2g', target)

    expect(outcome).toEqual({ ok: true, message: 'Boost added' })
    expect(team.shopPointsLeft).toBe(2.5)
    expect(team.boosts).toEqual([
      {
        key: 'boost-attack-3-2g',
        label: 'Attack +3 (2 games)',
        stat: 'attack',
        amount: 3,
        gamesLeft: 2,
        teamwide: false,
        targetCardId: target,
      },
    ])
    expect(state.transactions.at(-1)).toBe(`Shop: ${team.name} purchased Attack +3 (2 games)`)
  })

  it('adds team-wide boosts without a target', () => {
    const state = inSeason()
    state.teams[1].shopPointsLeft = 3

    const outcome = purchaseBoost(state, 1, 'team-all-2-2g')

    expect(outcome.ok).toBe(true)
    expect(state.teams[1].shopPointsLeft).toBe(0)
    expect(state.teams[1].boosts[0]).toMatchObject({ stat: 'all', amount: 2, teamwide: true, targetCardId: null })
  })

  it('fails without spending when the item costs more than the points left', () => {
    const state = inSeason()
    state.teams[0].shopPointsLeft = 1

    const outcome = purchaseBoost(state, 0, 'team-all-2-2g')

    expect(outcome).toEqual({ ok: false, reason: 'capacity', message: `${state.teams[0].name} need 3 shop points but have 1` })
    expect(state.teams[0].shopPointsLeft).toBe(1)
    expect(state.teams[0].boosts).toEqual([])
  })

  it('resets a card to full stamina immediately', () => {
    const state = inSeason()
    const team = state.teams[2]
    team.shopPointsLeft = 1
    const target = team.roster[0]
    state.cards[target].fatigue = 12

    const outcome = purchaseBoost(state, 2, 'stamina-reset', target)

    expect(outcome.ok).toBe(true)
    expect(state.cards[target].fatigue).toBe(100)
    expect(team.shopPointsLeft).toBe(0.25)
    expect(team.boosts).toEqual([])
  })

  it('rejects unknown items, missing and foreign targets, and off-season purchases', () => {
    const state = inSeason()
    state.teams[0].shopPointsLeft = 5
    const foreign = state.teams[1].roster[0]

    expect(purchaseBoost(state, 0, 'no-such-item')).toMatchObject({ ok: false, reason: 'not-found' })
    expect(purchaseBoost(state, 0, 'boost-speed-3-2g')).toMatchObject({ ok: false, reason: 'invalid' })
    expect(purchaseBoost(state, 0, 'boost-speed-3-2g', foreign)).toMatchObject({ ok: false, reason: 'not-found' })
    expect(purchaseBoost(state, 9, 'boost-speed-3-2g', foreign)).toMatchObject({ ok: false, reason: 'not-found' })
    expect(state.teams[0].shopPointsLeft).toBe(5)

    state.phase = 'offseason'
    expect(purchaseBoost(state, 0, 'team-all-2-2g')).toMatchObject({ ok: false, reason: 'phase' })
  })
})
