import { ValidationError } from '@/domain/errors'
import { assertGameStateSemanticIntegrity } from '@/domain/invariants'
import { advanceSeason as advanceSeasonInState } from '@/domain/offseason'
import type { GameRepository } from '@/application/gameRepository'
import { requireLeague } from '@/application/useCases/leagueTransaction'
import type { GameState } from '@/domain/types'

/**
 * Opens the next season. The archived offseason state is kept as the closing season's
 * checkpoint and can be reloaded with `loadCheckpoint`.
 */
export const advanceSeason = async (repository: GameRepository, leagueId?: string): Promise<GameState> => {
  const targetLeagueId = leagueId ?? (await repository.getActiveLeagueId())
  if (!targetLeagueId) {
    throw new ValidationError('No league loaded')
  }

  const closing = await requireLeague(repository, targetLeagueId)
  const next = structuredClone(closing)
  advanceSeasonInState(next)
  next.metadata.updatedAt = new Date().toISOString()
  assertGameStateSemanticIntegrity(next)

  await repository.checkpointSeason(targetLeagueId, closing, next)
  return next
}
