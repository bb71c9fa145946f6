import { runOffseason } from '@/domain/offseason'
import { simulatePostseasonToChampion } from '@/domain/postseason'
import { runPreseason, simulateNextDay } from '@/domain/season'
import type { GameState, SeasonArchiveEntry } from '@/domain/types'

/** Plays whatever remains of the current season, from any phase, through the archive step. */
export const simulateFullSeason = (state: GameState): SeasonArchiveEntry => {
  if (state.phase === 'preseason') {
    runPreseason(state)
  }
  while (state.phase === 'regular-season') {
    simulateNextDay(state)
  }
  if (state.phase === 'postseason') {
    simulatePostseasonToChampion(state)
  }
  return runOffseason(state)
}
