import { roundPoints } from '@/domain/cards'
import type { Card, GameState, Team } from '@/domain/types'

export const teamCardIds = (team: Team): string[] => (team.backup ? [...team.roster, team.backup] : [...team.roster])

export const sumCardCosts = (cards: Record<string, Card>, cardIds: string[]): number =>
  roundPoints(cardIds.reduce((sum, cardId) => sum + (cards[cardId]?.cost ?? 0), 0))

export const recalculateCostSpent = (state: GameState, team: Team): number => {
  team.costSpent = sumCardCosts(state.cards, teamCardIds(team))
  return team.costSpent
}

export const withinCap = (cost: number, maxTeamCost: number): boolean => roundPoints(cost) <= maxTeamCost

export const resetTeamSeason = (team: Team): void => {
  team.wins = 0
  team.losses = 0
  team.streak = 0
  team.roster = []
  team.backup = null
  team.costSpent = 0
  team.shopPointsLeft = 0
  team.boosts = []
  team.tradeCardUsed = false
}

export const findOwnerIndex = (state: GameState, cardId: string): number =>
  state.teams.findIndex((team) => team.roster.includes(cardId) || team.backup === cardId)

export const rosteredCardIds = (state: GameState): Set<string> => new Set(state.teams.flatMap((team) => teamCardIds(team)))

export const recordResult = (team: Team, won: boolean): void => {
  if (won) {
    team.wins += 1
    team.streak = team.streak >= 0 ? team.streak + 1 : 1
    return
  }
  team.losses += 1
  team.streak = team.streak <= 0 ? team.streak - 1 : -1
}
