import type { Prng } from '@/domain/prng'
import type { GameState, RivalryRecord, ScheduleEntry } from '@/domain/types'

export const rivalryKey = (left: number, right: number): string => `${Math.min(left, right)}-${Math.max(left, right)}`

export const ensureRivalry = (state: GameState, left: number, right: number): RivalryRecord => {
  const key = rivalryKey(left, right)
  const existing = state.rivalries[key]
  if (existing) {
    return existing
  }
  const created: RivalryRecord = { teamA: Math.min(left, right), teamB: Math.max(left, right), games: 0, aWins: 0, bWins: 0 }
  state.rivalries[key] = created
  return created
}

/**
 * Greedy day-by-day pairing: each team with quota left meets a random opponent that also has
 * quota and has not played that day. Stops on the first day that produces no pairing, so
 * leftover quota (odd team counts) is dropped rather than looping forever.
 */
export const generateCalendar = (state: GameState, prng: Prng): ScheduleEntry[] => {
  const teamCount = state.teams.length
  const quota = Array.from({ length: teamCount }, () => state.config.gamesPerTeam)
  const schedule: ScheduleEntry[] = []

  for (let day = 1; ; day += 1) {
    const playedToday = new Set<number>()
    let pairings = 0

    for (let teamIndex = 0; teamIndex < teamCount; teamIndex += 1) {
      if (quota[teamIndex] <= 0 || playedToday.has(teamIndex)) {
        continue
      }
      const opponents: number[] = []
      for (let candidate = 0; candidate < teamCount; candidate += 1) {
        if (candidate !== teamIndex && quota[candidate] > 0 && !playedToday.has(candidate)) {
          opponents.push(candidate)
        }
      }
      if (opponents.length === 0) {
        continue
      }

      const opponent = prng.pick(opponents)
      const teamIsHome = prng.next() < 0.5
      schedule.push({ day, home: teamIsHome ? teamIndex : opponent, away: teamIsHome ? opponent : teamIndex })
      quota[teamIndex] -= 1
      quota[opponent] -= 1
      playedToday.add(teamIndex)
      playedToday.add(opponent)
      ensureRivalry(state, teamIndex, opponent).games += 1
      pairings += 1
    }

    if (pairings === 0) {
      break
    }
  }

  state.schedule = schedule
  return schedule
}

export const releaseCalendarRivalries = (state: GameState): void => {
  for (const entry of state.schedule) {
    const record = state.rivalries[rivalryKey(entry.home, entry.away)]
    if (record) {
      record.games = Math.max(0, record.games - 1)
    }
  }
}

export const gamesOnDay = (state: GameState, day: number): ScheduleEntry[] => state.schedule.filter((entry) => entry.day === day)

export const isSeasonComplete = (state: GameState): boolean => !state.schedule.some((entry) => entry.day >= state.day)

export const lastScheduledDay = (state: GameState): number => state.schedule.reduce((max, entry) => Math.max(max, entry.day), 0)
