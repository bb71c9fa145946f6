import { createInitialState, resolveLeagueConfig } from '@/domain/generator'
import { leagueConfigSchema } from '@/application/contracts'
import { ValidationError } from '@/domain/errors'
import type { GameRepository } from '@/application/gameRepository'
import type { GameState, LeagueConfig } from '@/domain/types'

export interface CreateLeagueOptions {
  leagueId?: string
  leagueName?: string
  config?: Partial<LeagueConfig>
  createdAt?: string
}

export const createLeague = async (
  repository: GameRepository,
  seed = Date.now() % 1_000_000_000,
  options: CreateLeagueOptions = {},
): Promise<GameState> => {
  const parsedConfig = leagueConfigSchema.safeParse(resolveLeagueConfig(options.config))
  if (!parsedConfig.success) {
    throw new ValidationError('League config is invalid', parsedConfig.error.flatten())
  }

  const state = createInitialState(seed, { config: parsedConfig.data, createdAt: options.createdAt })
  if (options.leagueId && options.leagueName) {
    await repository.createLeague(options.leagueId, options.leagueName, state)
  } else {
    await repository.save(state, options.leagueId)
  }
  return state
}
