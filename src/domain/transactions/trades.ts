import { requireCard, roundPoints } from '@/domain/cards'
import { NotFoundError } from '@/domain/errors'
import { TRADE_POWER_WINDOW } from '@/domain/policy/leaguePolicy'
import { teamCardIds, withinCap } from '@/domain/teams'
import type { GameState, Team, TradeOffer, TransactionFailureReason, TransactionOutcome } from '@/domain/types'

const fail = (reason: TransactionFailureReason, message: string): TransactionOutcome => ({ ok: false, reason, message })

const swapSlot = (team: Team, outgoing: string, incoming: string) => {
  const rosterIndex = team.roster.indexOf(outgoing)
  if (rosterIndex >= 0) {
    team.roster[rosterIndex] = incoming
  } else if (team.backup === outgoing) {
    team.backup = incoming
  }
}

const costAfterSwap = (team: Team, outgoingCost: number, incomingCost: number): number =>
  roundPoints(team.costSpent - outgoingCost + incomingCost)

export const proposeTradeOffers = (state: GameState, teamIndex: number, cardId: string): TradeOffer[] => {
  const team = state.teams[teamIndex]
  if (!team) {
    throw new NotFoundError('Team not found', { teamIndex })
  }
  if (!teamCardIds(team).includes(cardId)) {
    throw new NotFoundError('Card is not on this team', { teamIndex, cardId })
  }
  const yours = requireCard(state.cards, cardId)
  const cap = state.config.maxTeamCost
  const offers: TradeOffer[] = []

  state.teams.forEach((other, otherIndex) => {
    if (otherIndex === teamIndex) {
      return
    }
    for (const theirCardId of teamCardIds(other)) {
      const theirs = requireCard(state.cards, theirCardId)
      if (Math.abs(theirs.power - yours.power) > TRADE_POWER_WINDOW) {
        continue
      }
      if (withinCap(costAfterSwap(team, yours.cost, theirs.cost), cap) && withinCap(costAfterSwap(other, theirs.cost, yours.cost), cap)) {
        offers.push({ teamIndex: otherIndex, teamName: other.name, theirCardId, theirCardName: theirs.name, theirCost: theirs.cost })
      }
    }
  })
  return offers
}

/** One-for-one swap, limited to one per initiating team per season. Nothing changes on failure. */
export const executeTrade = (state: GameState, teamIndex: number, cardId: string, otherIndex: number, theirCardId: string): TransactionOutcome => {
  if (state.phase !== 'regular-season') {
    return fail('phase', 'Trades are only allowed during the regular season')
  }
  const team = state.teams[teamIndex]
  const other = state.teams[otherIndex]
  if (!team || !other) {
    return fail('not-found', 'Team not found')
  }
  if (teamIndex === otherIndex) {
    return fail('invalid', 'A team cannot trade with itself')
  }
  if (team.tradeCardUsed) {
    return fail('limit', `${team.name} already used their card trade this season`)
  }
  if (!teamCardIds(team).includes(cardId)) {
    return fail('not-found', `Card ${cardId} is not on ${team.name}`)
  }
  if (!teamCardIds(other).includes(theirCardId)) {
    return fail('not-found', `Card ${theirCardId} is not on ${other.name}`)
  }

  const yours = requireCard(state.cards, cardId)
  const theirs = requireCard(state.cards, theirCardId)
  const nextCost = costAfterSwap(team, yours.cost, theirs.cost)
  const nextOtherCost = costAfterSwap(other, theirs.cost, yours.cost)
  const cap = state.config.maxTeamCost
  if (!withinCap(nextCost, cap) || !withinCap(nextOtherCost, cap)) {
    return fail('capacity', 'Trade violates the salary cap')
  }

  swapSlot(team, cardId, theirCardId)
  swapSlot(other, theirCardId, cardId)
  team.costSpent = nextCost
  other.costSpent = nextOtherCost
  team.shopPointsLeft = roundPoints(Math.min(team.shopPointsLeft, cap - nextCost))
  other.shopPointsLeft = roundPoints(Math.min(other.shopPointsLeft, cap - nextOtherCost))
  team.tradeCardUsed = true
  state.transactions.push(`Trade: ${team.name} sent ${yours.name} to ${other.name} for ${theirs.name}`)
  return { ok: true, message: 'Trade completed' }
}
