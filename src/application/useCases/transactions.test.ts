import { roundPoints } from '@/domain/cards'
import { createLeague } from '@/application/useCases/createLeague'
import { runPreseason } from '@/application/useCases/runPreseason'
import { executeTrade, proposeTradeOffers, purchaseBoost } from '@/application/useCases/transactions'
import { FIXED_CREATED_AT, SMALL_LEAGUE_CONFIG } from '@/test/leagueFactory'
import { MemoryRepository } from '@/test/memoryRepository'

const draftedLeague = async (seed: number) => {
  const repo = new MemoryRepository()
  await createLeague(repo, seed, { config: SMALL_LEAGUE_CONFIG, createdAt: FIXED_CREATED_AT })
  await runPreseason(repo)
  return repo
}

describe('transaction use cases', () => {
  it('persists a successful boost purchase', async () => {
    const repo = await draftedLeague(6101)
    const stored = await repo.load()
    if (!stored) {
      throw new Error('expected a league')
    }
    stored.teams[1].shopPointsLeft = 4
    await repo.save(stored)

    const { outcome, state } = await purchaseBoost(repo, { teamIndex: 1, itemKey: 'team-all-2-2g' })

    expect(outcome).toEqual({ ok: true, message: 'Boost added' })
    expect(state.teams[1].shopPointsLeft).toBe(1)
    const reloaded = await repo.load()
    expect(reloaded?.teams[1].shopPointsLeft).toBe(1)
    expect(reloaded?.teams[1].boosts.map((boost) => boost.key)).toEqual(['team-all-2-2g'])
  })

  it('leaves the stored league untouched when a purchase fails', async () => {
    const repo = await draftedLeague(6102)
    const before = await repo.load()

    const { outcome } = await purchaseBoost(repo, { teamIndex: 0, itemKey: 'no-such-item' })

    expect(outcome).toEqual({ ok: false, reason: 'not-found', message: 'Item no-such-item not found' })
    expect(await repo.load()).toEqual(before)
  })

  it('refuses a second trade by the same team', async () => {
    const repo = await draftedLeague(6103)
    const stored = await repo.load()
    if (!stored) {
      throw new Error('expected a league')
    }
    const cardId = stored.teams[0].roster[0]
    const theirCardId = stored.teams[1].roster[0]
    const yours = stored.cards[cardId]
    const theirs = stored.cards[theirCardId]
    const cost = Math.min(yours.cost, theirs.cost)
    stored.teams[0].costSpent = roundPoints(stored.teams[0].costSpent - yours.cost + cost)
    stored.teams[1].costSpent = roundPoints(stored.teams[1].costSpent - theirs.cost + cost)
    stored.cards[cardId] = { ...yours, cost }
    stored.cards[theirCardId] = { ...theirs, attributes: { ...yours.attributes }, power: yours.power, cost }
    await repo.save(stored)

    const offers = await proposeTradeOffers(repo, 0, cardId)
    expect(offers.map((offer) => offer.theirCardId)).toContain(theirCardId)

    const trade = { teamIndex: 0, cardId, otherIndex: 1, theirCardId }
    const first = await executeTrade(repo, trade)
    expect(first.outcome).toEqual({ ok: true, message: 'Trade completed' })
    expect(first.state.teams[0].roster[0]).toBe(theirCardId)
    expect(first.state.teams[1].roster[0]).toBe(cardId)
    const afterFirst = await repo.load()

    const second = await executeTrade(repo, { ...trade, cardId: theirCardId, theirCardId: cardId })
    expect(second.outcome).toMatchObject({ ok: false, reason: 'limit' })
    expect(await repo.load()).toEqual(afterFirst)
  })

  it('reports unknown cards when asking for offers', async () => {
    const repo = await draftedLeague(6104)

    await expect(proposeTradeOffers(repo, 0, 'card-missing')).rejects.toThrow('Card is not on this team')
    await expect(proposeTradeOffers(repo, 99, 'card-1')).rejects.toThrow('Team not found')
  })
})
