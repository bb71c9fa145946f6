import { requireLeague, updateLeague, type LeagueUpdate } from '@/application/useCases/leagueTransaction'
import { ValidationError } from '@/domain/errors'
import { simulateFullSeason as simulateFullSeasonInState } from '@/domain/lifecycle'
import { lastScheduledDay } from '@/domain/schedule'
import { simulateNextDay as simulateNextDayInState, type DayReport } from '@/domain/season'
import type { GameRepository } from '@/application/gameRepository'
import type { GameState, SeasonArchiveEntry } from '@/domain/types'

export interface SimulateRegularSeasonParams {
  leagueId?: string
  onProgress?: (state: GameState, completedDays: number, totalDays: number) => void
  signal?: AbortSignal
}

export const simulateNextDay = (repository: GameRepository, leagueId?: string): Promise<LeagueUpdate<DayReport>> =>
  updateLeague(repository, (next) => simulateNextDayInState(next), leagueId)

/** Plays up to `days` days in one checkpoint, stopping early when the regular season ends. */
export const simulateDays = async (repository: GameRepository, days: number, leagueId?: string): Promise<LeagueUpdate<DayReport[]>> => {
  if (!Number.isInteger(days) || days < 1) {
    throw new ValidationError('Days to simulate must be a positive integer', { days })
  }

  return updateLeague(
    repository,
    (next) => {
      const reports: DayReport[] = []
      for (let played = 0; played < days && next.phase === 'regular-season'; played += 1) {
        reports.push(simulateNextDayInState(next))
      }
      if (reports.length === 0) {
        throw new ValidationError('Days can only be simulated during the regular season', { phase: next.phase })
      }
      return reports
    },
    leagueId,
  )
}

/**
 * Plays the rest of the regular season one saved day at a time. An abort leaves every day
 * played so far persisted and rejects.
 */
export const simulateRegularSeason = async (
  repository: GameRepository,
  { leagueId, onProgress, signal }: SimulateRegularSeasonParams = {},
): Promise<GameState> => {
  let state = await requireLeague(repository, leagueId)
  if (state.phase !== 'regular-season') {
    throw new ValidationError('Days can only be simulated during the regular season', { phase: state.phase })
  }

  const totalDays = lastScheduledDay(state)
  while (state.phase === 'regular-season') {
    if (signal?.aborted) {
      throw new Error('Season simulation cancelled')
    }
    state = (await simulateNextDay(repository, leagueId)).state
    onProgress?.(state, Math.min(state.day - 1, totalDays), totalDays)
  }
  return state
}

export const simulateFullSeason = (repository: GameRepository, leagueId?: string): Promise<LeagueUpdate<SeasonArchiveEntry>> =>
  updateLeague(repository, (next) => simulateFullSeasonInState(next), leagueId)
