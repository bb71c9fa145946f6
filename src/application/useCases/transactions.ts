import { requireLeague } from '@/application/useCases/leagueTransaction'
import { ValidationError } from '@/domain/errors'
import { assertGameStateSemanticIntegrity } from '@/domain/invariants'
import { purchaseBoost as purchaseBoostInState } from '@/domain/transactions/shop'
import { executeTrade as executeTradeInState, proposeTradeOffers as proposeTradeOffersInState } from '@/domain/transactions/trades'
import type { GameRepository } from '@/application/gameRepository'
import type { GameState, TradeOffer, TransactionOutcome } from '@/domain/types'

export interface TransactionResult {
  state: GameState
  outcome: TransactionOutcome
}

export interface PurchaseBoostInput {
  teamIndex: number
  itemKey: string
  targetCardId?: string | null
}

export interface ExecuteTradeInput {
  teamIndex: number
  cardId: string
  otherIndex: number
  theirCardId: string
}

// Failed outcomes leave the stored league untouched.
const runTransaction = (
  repository: GameRepository,
  apply: (next: GameState) => TransactionOutcome,
  leagueId?: string,
): Promise<TransactionResult> =>
  repository.transaction<TransactionResult>(async (current) => {
    if (!current) {
      throw new ValidationError('No league loaded')
    }

    const next = structuredClone(current)
    const outcome = apply(next)
    if (!outcome.ok) {
      return { result: { state: current, outcome } }
    }

    next.metadata.updatedAt = new Date().toISOString()
    assertGameStateSemanticIntegrity(next)
    return { nextState: next, result: { state: next, outcome } }
  }, leagueId)

export const purchaseBoost = (repository: GameRepository, input: PurchaseBoostInput, leagueId?: string): Promise<TransactionResult> =>
  runTransaction(repository, (next) => purchaseBoostInState(next, input.teamIndex, input.itemKey, input.targetCardId), leagueId)

export const proposeTradeOffers = async (
  repository: GameRepository,
  teamIndex: number,
  cardId: string,
  leagueId?: string,
): Promise<TradeOffer[]> => proposeTradeOffersInState(await requireLeague(repository, leagueId), teamIndex, cardId)

export const executeTrade = (repository: GameRepository, input: ExecuteTradeInput, leagueId?: string): Promise<TransactionResult> =>
  runTransaction(
    repository,
    (next) => executeTradeInState(next, input.teamIndex, input.cardId, input.otherIndex, input.theirCardId),
    leagueId,
  )
