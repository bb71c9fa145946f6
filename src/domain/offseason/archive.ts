import { clamp, roundPoints } from '@/domain/cards'
import { findOwnerIndex } from '@/domain/teams'
import type { Card, GameState } from '@/domain/types'

const awardWeight = (tag: string): number => {
  if (tag.startsWith('Finals MVP')) {
    return 6
  }
  if (tag.startsWith('MVP')) {
    return 10
  }
  if (tag.startsWith('DPOY')) {
    return 4
  }
  if (tag.startsWith('ROTY') || tag.startsWith('Sixth Man')) {
    return 2
  }
  return 0
}

// Awards, contribution, longevity and power, clamped to a 0-100 percentage.
export const hallOfFameProbability = (card: Card): number => {
  const awards = card.awards.reduce((sum, tag) => sum + awardWeight(tag), 0)
  const contribution = Math.min(10, card.avgContribution / 10)
  const longevity = Math.min(8, card.age * 0.75)
  const pedigree = (card.power - 60) * 0.2
  return roundPoints(clamp(awards + contribution + longevity + pedigree))
}

export const snapshotCards = (state: GameState, excludedIds: Set<string>): number => {
  let count = 0
  const suffix = ` S${state.season}`
  for (const card of Object.values(state.cards)) {
    const activeThisSeason = !card.retired || card.retiredInSeason === state.season
    if (!activeThisSeason || excludedIds.has(card.id)) {
      continue
    }
    const ownerIndex = findOwnerIndex(state, card.id)
    card.history.push({
      season: state.season,
      teamId: ownerIndex >= 0 ? state.teams[ownerIndex].id : null,
      power: card.power,
      grade: card.grade,
      cost: card.cost,
      gamesPlayed: card.gamesPlayed,
      avgContribution: card.avgContribution,
      awards: card.awards.filter((tag) => tag.endsWith(suffix)),
    })
    count += 1
  }
  return count
}

export const refreshHallOfFame = (state: GameState): void => {
  for (const card of Object.values(state.cards)) {
    card.hofProbability = hallOfFameProbability(card)
  }
}
