import { clamp, refreshDerivedRatings, roundPoints } from '@/domain/cards'
import { awardEntries } from '@/domain/offseason/awards'
import {
  ATTRIBUTE_KEYS,
  AWARD_COST_BUMPS,
  COST_DRIFT,
  COST_FLOOR,
  PATCH_DELTA_RANGE,
  PATCH_NICKNAMES,
  PATCH_STAT_RANGE,
} from '@/domain/policy/leaguePolicy'
import type { Prng } from '@/domain/prng'
import { findOwnerIndex, recalculateCostSpent, sumCardCosts, teamCardIds } from '@/domain/teams'
import type { AwardsTable, GameState, PatchChange, PatchNotes } from '@/domain/types'

/**
 * Award winners get fixed bumps; every other active card drifts down toward the floor.
 * A bump is cut to whatever headroom its owner has left under the cap once the drift has run,
 * and payrolls and shop points are recomputed from the new prices.
 */
export const repriceCards = (state: GameState, awards: AwardsTable): void => {
  const bumps = new Map<string, number>()
  for (const [key, winner] of awardEntries(awards)) {
    bumps.set(winner.cardId, (bumps.get(winner.cardId) ?? 0) + AWARD_COST_BUMPS[key])
  }

  for (const card of Object.values(state.cards)) {
    if (!card.retired && !bumps.has(card.id)) {
      card.cost = roundPoints(Math.max(COST_FLOOR, card.cost * COST_DRIFT))
    }
  }

  const cap = state.config.maxTeamCost
  for (const [cardId, bump] of [...bumps].sort(([a], [b]) => a.localeCompare(b))) {
    const card = state.cards[cardId]
    if (!card || card.retired) {
      continue
    }
    const ownerIndex = findOwnerIndex(state, cardId)
    if (ownerIndex < 0) {
      card.cost = roundPoints(card.cost + bump)
      continue
    }
    const owner = state.teams[ownerIndex]
    const headroom = roundPoints(cap - sumCardCosts(state.cards, teamCardIds(owner)))
    const applied = roundPoints(Math.max(0, Math.min(bump, headroom)))
    card.cost = roundPoints(card.cost + applied)
    if (applied < bump) {
      state.transactions.push(`${card.name} award bump limited to ${applied} by the ${owner.name} cap`)
    }
  }

  for (const team of state.teams) {
    recalculateCostSpent(state, team)
    team.shopPointsLeft = roundPoints(Math.max(0, Math.min(team.shopPointsLeft, cap - team.costSpent)))
  }
}

const rollDelta = (prng: Prng): number => {
  const delta = prng.nextInt(PATCH_DELTA_RANGE.min, PATCH_DELTA_RANGE.max - 1)
  return delta >= 0 ? delta + 1 : delta
}

export const rollPatch = (state: GameState, prng: Prng): PatchNotes => {
  const active = Object.values(state.cards).filter((card) => !card.retired)
  const changes: PatchChange[] = []

  for (const card of prng.sample(active, state.config.patchSize)) {
    const stats = prng.sample(ATTRIBUTE_KEYS, prng.nextInt(1, 2))
    let touched = false
    for (const stat of stats) {
      const before = card.attributes[stat]
      const after = clamp(before + rollDelta(prng), PATCH_STAT_RANGE.min, PATCH_STAT_RANGE.max)
      if (after === before) {
        continue
      }
      card.attributes[stat] = after
      changes.push({ cardId: card.id, cardName: card.name, stat, delta: after - before })
      touched = true
    }
    if (touched) {
      refreshDerivedRatings(card)
    }
  }

  return { season: state.season, nickname: prng.pick(PATCH_NICKNAMES), changes }
}
