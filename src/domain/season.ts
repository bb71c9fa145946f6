import { activeCards, resetSeasonUsage } from '@/domain/cards'
import { runDraft, type DraftReport } from '@/domain/draft'
import { ValidationError } from '@/domain/errors'
import { resolveScheduledGame } from '@/domain/matchSim'
import { withStatePrng } from '@/domain/prng'
import { gamesOnDay, generateCalendar, isSeasonComplete, releaseCalendarRivalries } from '@/domain/schedule'
import { resetTeamSeason } from '@/domain/teams'
import type { GameRecap, GameState, Phase } from '@/domain/types'

export interface DayReport {
  day: number
  recaps: GameRecap[]
  seasonComplete: boolean
}

export const assertPhase = (state: GameState, phase: Phase, message: string): void => {
  if (state.phase !== phase) {
    throw new ValidationError(message, { expected: phase, actual: state.phase })
  }
}

export const runPreseason = (state: GameState): DraftReport => {
  assertPhase(state, 'preseason', 'Preseason can only be run from preseason')

  for (const team of state.teams) {
    resetTeamSeason(team)
  }
  for (const card of activeCards(state.cards)) {
    resetSeasonUsage(card)
  }
  state.schedule = []
  state.results = []
  state.postseason = null
  state.day = 1

  const report = withStatePrng(state, (prng) => {
    const draft = runDraft(state, prng)
    generateCalendar(state, prng)
    return draft
  })

  state.transactions.push(`Season ${state.season} calendar set: ${state.schedule.length} games`)
  state.phase = 'regular-season'
  return report
}

export const regenerateCalendar = (state: GameState): number => {
  assertPhase(state, 'regular-season', 'Calendar can only be regenerated during the regular season')
  if (state.day !== 1 || state.results.length > 0) {
    throw new ValidationError('Calendar can only be regenerated before the first day is played', { day: state.day })
  }

  releaseCalendarRivalries(state)
  withStatePrng(state, (prng) => generateCalendar(state, prng))
  state.transactions.push(`Season ${state.season} calendar regenerated: ${state.schedule.length} games`)
  return state.schedule.length
}

/**
 * Resolves every game scheduled on the current day exactly once and moves the pointer on.
 * The league enters the postseason as soon as no scheduled day remains.
 */
export const simulateNextDay = (state: GameState): DayReport => {
  assertPhase(state, 'regular-season', 'Days can only be simulated during the regular season')

  const day = state.day
  const entries = gamesOnDay(state, day)
  const recaps = entries.length > 0 ? withStatePrng(state, (prng) => entries.map((entry) => resolveScheduledGame(state, entry, prng))) : []

  state.day = day + 1
  const seasonComplete = isSeasonComplete(state)
  if (seasonComplete) {
    state.phase = 'postseason'
  }
  return { day, recaps, seasonComplete }
}
