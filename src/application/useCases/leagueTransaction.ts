import { ValidationError } from '@/domain/errors'
import { assertGameStateSemanticIntegrity } from '@/domain/invariants'
import type { GameRepository } from '@/application/gameRepository'
import type { GameState } from '@/domain/types'

export interface LeagueUpdate<T> {
  state: GameState
  result: T
}

export const requireLeague = async (repository: GameRepository, leagueId?: string): Promise<GameState> => {
  const state = await repository.load(leagueId)
  if (!state) {
    throw new ValidationError('No league loaded')
  }
  return state
}

/**
 * Applies a domain step to a copy of the stored league and persists it once the copy passes
 * the semantic integrity checks. A throw anywhere rolls the repository back.
 */
export const updateLeague = <T>(
  repository: GameRepository,
  apply: (next: GameState) => T,
  leagueId?: string,
): Promise<LeagueUpdate<T>> =>
  repository.transaction(async (current) => {
    if (!current) {
      throw new ValidationError('No league loaded')
    }

    const next = structuredClone(current)
    const result = apply(next)
    next.metadata.updatedAt = new Date().toISOString()

    assertGameStateSemanticIntegrity(next)

    return {
      nextState: next,
      result: { state: next, result },
    }
  }, leagueId)
