import { roundPoints } from '@/domain/cards'
import { backupValue, byCostThenId, byPowerThenCost, fitsHardCap, fitsSoftTarget } from '@/domain/draft/eligibility'
import { DRAFT_ROUNDS, STARTER_SLOTS } from '@/domain/policy/leaguePolicy'
import type { Prng } from '@/domain/prng'
import { recalculateCostSpent, rosteredCardIds } from '@/domain/teams'
import type { Card, GameState, Team } from '@/domain/types'

export interface DraftReport {
  order: number[]
  picks: number
  exceptionalPicks: number
  emptySlots: number
  freeAgentSignings: number
}

const snakeOrder = (baseOrder: number[], round: number): number[] => (round % 2 === 0 ? [...baseOrder] : [...baseOrder].reverse())

const filledSlots = (team: Team): number => team.roster.length + (team.backup ? 1 : 0)

const assignCard = (team: Team, card: Card, round: number) => {
  if (round < STARTER_SLOTS) {
    team.roster.push(card.id)
  } else {
    team.backup = card.id
  }
  team.costSpent = roundPoints(team.costSpent + card.cost)
}

const selectPick = (state: GameState, team: Team, board: Card[], round: number): { card: Card; exceptional: boolean } | null => {
  const cheapestFirst = [...board].sort(byCostThenId)
  const slotsAfterPick = Math.max(0, DRAFT_ROUNDS - round - 1)
  const preferred = board
    .filter((card) => fitsSoftTarget(team, card, cheapestFirst, slotsAfterPick, state.config))
    .sort(byPowerThenCost)[0]
  if (preferred) {
    return { card: preferred, exceptional: false }
  }

  const cheapest = cheapestFirst[0]
  if (cheapest && fitsHardCap(team, cheapest, state.config)) {
    return { card: cheapest, exceptional: true }
  }
  return null
}

/**
 * Snake draft over three starter rounds and one backup round, followed by free agency for teams
 * still without a backup. Mutates `state` and draws the opening order from `prng`.
 */
export const runDraft = (state: GameState, prng: Prng): DraftReport => {
  const owned = rosteredCardIds(state)
  let board = Object.values(state.cards).filter((card) => !card.retired && !owned.has(card.id))
  const baseOrder = prng.sample(
    state.teams.map((_, index) => index),
    state.teams.length,
  )
  const draftedIds: string[] = []
  const report: DraftReport = { order: baseOrder, picks: 0, exceptionalPicks: 0, emptySlots: 0, freeAgentSignings: 0 }
  let pickNumber = 0

  for (let round = 0; round < DRAFT_ROUNDS; round += 1) {
    for (const teamIndex of snakeOrder(baseOrder, round)) {
      const team = state.teams[teamIndex]
      pickNumber += 1
      if (filledSlots(team) > round) {
        continue
      }

      const selection = selectPick(state, team, board, round)
      if (!selection) {
        report.emptySlots += 1
        const message = `Draft R${round + 1} P${pickNumber}: ${team.name} leave slot empty (no card fits the cap)`
        console.warn(`[draft] ${message}`)
        state.transactions.push(message)
        continue
      }

      const { card, exceptional } = selection
      assignCard(team, card, round)
      board = board.filter((entry) => entry.id !== card.id)
      draftedIds.push(card.id)
      report.picks += 1

      const slotLabel = round < STARTER_SLOTS ? 'starter' : 'backup'
      if (exceptional) {
        report.exceptionalPicks += 1
        const message = `Draft R${round + 1} P${pickNumber}: ${team.name} take cheapest ${card.name} (${card.cost}) as ${slotLabel}`
        console.warn(`[draft] ${message}`)
        state.transactions.push(message)
      } else {
        state.transactions.push(`Draft R${round + 1} P${pickNumber}: ${team.name} select ${card.name} (${card.cost}) as ${slotLabel}`)
      }
    }
  }

  for (const team of state.teams) {
    if (team.backup) {
      continue
    }
    const signing = board
      .filter((card) => fitsHardCap(team, card, state.config))
      .sort((left, right) => backupValue(right) - backupValue(left) || left.id.localeCompare(right.id))[0]
    if (!signing) {
      continue
    }
    team.backup = signing.id
    team.costSpent = roundPoints(team.costSpent + signing.cost)
    board = board.filter((entry) => entry.id !== signing.id)
    report.freeAgentSignings += 1
    state.transactions.push(`Free agency: ${team.name} sign ${signing.name} (${signing.cost}) as backup`)
  }

  const pickRate = draftedIds.length > 0 ? roundPoints(100 / draftedIds.length) : 0
  for (const cardId of draftedIds) {
    state.cards[cardId].pickRate = pickRate
  }

  for (const team of state.teams) {
    recalculateCostSpent(state, team)
    team.shopPointsLeft = roundPoints(state.config.maxTeamCost - team.costSpent)
  }

  return report
}
