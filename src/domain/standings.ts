import type { GameState, StandingsRow } from '@/domain/types'

export const computeStandings = (state: GameState): StandingsRow[] =>
  state.teams
    .map((team, teamIndex) => ({ team, teamIndex }))
    .sort((left, right) => right.team.wins - left.team.wins || left.team.losses - right.team.losses || left.teamIndex - right.teamIndex)
    .map(({ team, teamIndex }, index) => ({
      rank: index + 1,
      teamIndex,
      teamId: team.id,
      teamName: team.name,
      wins: team.wins,
      losses: team.losses,
      streak: team.streak,
    }))

export const formatStreak = (streak: number): string => {
  if (streak === 0) {
    return '-'
  }
  return streak > 0 ? `W${streak}` : `L${Math.abs(streak)}`
}
