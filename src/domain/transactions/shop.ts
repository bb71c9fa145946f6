import { roundPoints } from '@/domain/cards'
import { teamCardIds } from '@/domain/teams'
import type { GameState, TransactionFailureReason, TransactionOutcome } from '@/domain/types'

const fail = (reason: TransactionFailureReason, message: string): TransactionOutcome => ({ ok: false, reason, message })

/**
 * Spends shop points on a catalog item. Targeted boosts and the stamina reset need a card on the
 * buying team; team-wide boosts ignore the target. Nothing changes on failure.
 */
export const purchaseBoost = (state: GameState, teamIndex: number, itemKey: string, targetCardId?: string | null): TransactionOutcome => {
  if (state.phase !== 'regular-season') {
    return fail('phase', 'Boosts can only be bought during the regular season')
  }
  const team = state.teams[teamIndex]
  if (!team) {
    return fail('not-found', `Team ${teamIndex} not found`)
  }
  const item = state.shopCatalog.find((entry) => entry.key === itemKey)
  if (!item) {
    return fail('not-found', `Item ${itemKey} not found`)
  }
  if (roundPoints(team.shopPointsLeft) < item.points) {
    return fail('capacity', `${team.name} need ${item.points} shop points but have ${team.shopPointsLeft}`)
  }

  const needsTarget = !item.teamwide
  if (needsTarget && !targetCardId) {
    return fail('invalid', `${item.label} needs a target card`)
  }
  if (needsTarget && targetCardId && !teamCardIds(team).includes(targetCardId)) {
    return fail('not-found', `Card ${targetCardId} is not on ${team.name}`)
  }

  team.shopPointsLeft = roundPoints(team.shopPointsLeft - item.points)

  if (item.stat === 'stamina-reset') {
    const card = targetCardId ? state.cards[targetCardId] : undefined
    if (card) {
      card.fatigue = 100
      state.transactions.push(`Shop: ${team.name} reset fatigue for ${card.name}`)
    }
    return { ok: true, message: 'Fatigue reset applied' }
  }

  team.boosts.push({
    key: item.key,
    label: item.label,
    stat: item.stat,
    amount: item.amount,
    gamesLeft: item.games,
    teamwide: item.teamwide,
    targetCardId: item.teamwide ? null : targetCardId ?? null,
  })
  state.transactions.push(`Shop: ${team.name} purchased ${item.label}`)
  return { ok: true, message: 'Boost added' }
}
