import { generateRookie } from '@/domain/generator'
import type { Prng } from '@/domain/prng'
import { rosteredCardIds } from '@/domain/teams'
import type { Card, GameState, RetirementEntry, RookieEntry } from '@/domain/types'

export interface RetirementPass {
  retirements: RetirementEntry[]
  rookies: RookieEntry[]
  pruned: string[]
}

/**
 * Retires expired cards plus a random handful, ages the survivors, then prunes retired, unrostered
 * cards until the rookie class fits under the pool ceiling. Earlier seasons' retirees go before
 * this season's, award-less cards before award holders, earliest retirement first. The rookie
 * class shrinks to the room left, but never below what keeps four active cards per team.
 */
export const retireAndRefill = (state: GameState, prng: Prng): RetirementPass => {
  const { season, config } = state
  const active = Object.values(state.cards).filter((card) => !card.retired)
  const expired = active.filter((card) => card.age >= card.lifespan)
  const expiredIds = new Set(expired.map((card) => card.id))
  const extras = prng.sample(
    active.filter((card) => !expiredIds.has(card.id)),
    config.extraRetirements,
  )

  const retirements: RetirementEntry[] = []
  for (const card of expired) {
    card.retired = true
    card.retiredInSeason = season
    retirements.push({ cardId: card.id, cardName: card.name, reason: 'lifespan' })
  }
  for (const card of extras) {
    card.retired = true
    card.retiredInSeason = season
    retirements.push({ cardId: card.id, cardName: card.name, reason: 'patch-related' })
  }

  const survivors = Object.values(state.cards).filter((card) => !card.retired)
  for (const card of survivors) {
    card.age += 1
  }

  const floorCount = Math.max(0, config.teamCount * 4 - survivors.length)
  const wanted = Math.max(config.rookiesPerSeason, floorCount)

  const pruned: string[] = []
  const rostered = rosteredCardIds(state)
  const pruneTier = (card: Card): number => ((card.retiredInSeason ?? season) < season ? 0 : 2) + (card.awards.length > 0 ? 1 : 0)
  const candidates = Object.values(state.cards)
    .filter((card) => card.retired && !rostered.has(card.id))
    .sort(
      (a, b) =>
        pruneTier(a) - pruneTier(b) || (a.retiredInSeason ?? season) - (b.retiredInSeason ?? season) || a.id.localeCompare(b.id),
    )
  for (const card of candidates) {
    if (Object.keys(state.cards).length + wanted <= config.poolCeiling) {
      break
    }
    delete state.cards[card.id]
    pruned.push(card.id)
  }

  // Retirees still on a roster cannot be pruned until the next draft releases them.
  const room = Math.max(0, config.poolCeiling - Object.keys(state.cards).length)
  const rookieCount = Math.max(floorCount, Math.min(wanted, room))
  const rookies: RookieEntry[] = []
  for (let ordinal = 1; ordinal <= rookieCount; ordinal += 1) {
    const rookie = generateRookie(prng, season, ordinal)
    state.cards[rookie.id] = rookie
    rookies.push({ cardId: rookie.id, cardName: rookie.name, badge: 'NEW' })
  }

  return { retirements, rookies, pruned }
}
