import { roundPoints } from '@/domain/cards'
import { withinCap } from '@/domain/teams'
import type { Card, LeagueConfig, Team } from '@/domain/types'

export const byPowerThenCost = (left: Card, right: Card): number =>
  right.power - left.power || left.cost - right.cost || left.id.localeCompare(right.id)

export const byCostThenId = (left: Card, right: Card): number => left.cost - right.cost || left.id.localeCompare(right.id)

// Cost set aside so the slots left after this pick can still be filled at the cheapest price on the board.
export const reservedForRemainingSlots = (candidate: Card, cheapestFirst: Card[], slotsAfterPick: number): number => {
  if (slotsAfterPick <= 0) {
    return 0
  }
  const cheapestOther = cheapestFirst.find((card) => card.id !== candidate.id)
  return roundPoints((cheapestOther?.cost ?? 0) * slotsAfterPick)
}

export const fitsSoftTarget = (
  team: Team,
  candidate: Card,
  cheapestFirst: Card[],
  slotsAfterPick: number,
  config: LeagueConfig,
): boolean => withinCap(team.costSpent + candidate.cost + reservedForRemainingSlots(candidate, cheapestFirst, slotsAfterPick), config.maxTeamCost)

export const fitsHardCap = (team: Team, candidate: Card, config: LeagueConfig): boolean =>
  withinCap(team.costSpent + candidate.cost, config.maxTeamCost)

export const backupValue = (card: Card): number => 0.6 * card.attributes.defense + 0.4 * card.attributes.hitSpeed
