import { updateLeague, type LeagueUpdate } from '@/application/useCases/leagueTransaction'
import type { DraftReport } from '@/domain/draft'
import { regenerateCalendar as regenerateCalendarInState, runPreseason as runPreseasonInState } from '@/domain/season'
import type { GameRepository } from '@/application/gameRepository'

export const runPreseason = (repository: GameRepository, leagueId?: string): Promise<LeagueUpdate<DraftReport>> =>
  updateLeague(repository, (next) => runPreseasonInState(next), leagueId)

export const regenerateCalendar = (repository: GameRepository, leagueId?: string): Promise<LeagueUpdate<number>> =>
  updateLeague(repository, (next) => regenerateCalendarInState(next), leagueId)
