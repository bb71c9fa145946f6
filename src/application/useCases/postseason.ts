import { updateLeague, type LeagueUpdate } from '@/application/useCases/leagueTransaction'
import {
  seedPostseason as seedPostseasonInState,
  simulatePostseasonRound as simulatePostseasonRoundInState,
  simulatePostseasonToChampion as simulatePostseasonToChampionInState,
} from '@/domain/postseason'
import type { GameRepository } from '@/application/gameRepository'
import type { PostseasonState, SeriesResult } from '@/domain/types'

export const seedPostseason = (repository: GameRepository, leagueId?: string): Promise<LeagueUpdate<PostseasonState>> =>
  updateLeague(repository, (next) => structuredClone(seedPostseasonInState(next)), leagueId)

export const simulatePostseasonRound = (repository: GameRepository, leagueId?: string): Promise<LeagueUpdate<SeriesResult[]>> =>
  updateLeague(repository, (next) => simulatePostseasonRoundInState(next), leagueId)

export const simulatePostseasonToChampion = (repository: GameRepository, leagueId?: string): Promise<LeagueUpdate<number>> =>
  updateLeague(repository, (next) => simulatePostseasonToChampionInState(next), leagueId)
