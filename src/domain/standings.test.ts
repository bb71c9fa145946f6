import { computeStandings, formatStreak } from '@/domain/standings'
import { createSmallLeague } from '@/test/leagueFactory'

describe('standings', () => {
  it('orders by wins, then fewer losses, then team index', () => {
    const state = createSmallLeague(3)
    const records: Array<[number, number]> = [
      [3, 3],
      [4, 2],
      [3, 2],
      [3, 2],
    ]
    records.forEach(([wins, losses], index) => {
      state.teams[index].wins = wins
      state.teams[index].losses = losses
    })

    const rows = computeStandings(state)

    expect(rows.map((row) => row.teamIndex)).toEqual([1, 2, 3, 0])
    expect(rows.map((row) => row.rank)).toEqual([1, 2, 3, 4])
    expect(rows[0]).toMatchObject({ teamId: state.teams[1].id, wins: 4, losses: 2 })
  })

  it('formats signed streaks', () => {
    expect(formatStreak(3)).toBe('W3')
    expect(formatStreak(-2)).toBe('L2')
    expect(formatStreak(0)).toBe('-')
  })
})
