import { createLeague } from '@/application/useCases/createLeague'
import { runPreseason } from '@/application/useCases/runPreseason'
import { simulateDays, simulateNextDay, simulateRegularSeason } from '@/application/useCases/simulateSeason'
import { FIXED_CREATED_AT, SMALL_LEAGUE_CONFIG } from '@/test/leagueFactory'
import { MemoryRepository } from '@/test/memoryRepository'

const draftedLeague = async (seed: number) => {
  const repo = new MemoryRepository()
  await createLeague(repo, seed, { config: SMALL_LEAGUE_CONFIG, createdAt: FIXED_CREATED_AT })
  await runPreseason(repo)
  return repo
}

describe('season simulation use cases', () => {
  it('persists one day per call', async () => {
    const repo = await draftedLeague(4101)

    const { result, state } = await simulateNextDay(repo)

    expect(result.day).toBe(1)
    expect(result.recaps).toHaveLength(2)
    expect(state.day).toBe(2)
    expect((await repo.load())?.results).toHaveLength(2)
  })

  it('stops a multi-day batch at the end of the regular season', async () => {
    const repo = await draftedLeague(4102)

    const first = await simulateDays(repo, 2)
    expect(first.result.map((report) => report.day)).toEqual([1, 2])

    const rest = await simulateDays(repo, 10)
    expect(rest.result.map((report) => report.day)).toEqual([3, 4, 5, 6])
    expect(rest.state.phase).toBe('postseason')
    expect(rest.state.results).toHaveLength(12)
  })

  it('rejects batches that cannot play a day', async () => {
    const repo = await draftedLeague(4103)

    await expect(simulateDays(repo, 0)).rejects.toThrow('Days to simulate must be a positive integer')

    await simulateRegularSeason(repo)
    await expect(simulateDays(repo, 1)).rejects.toThrow('Days can only be simulated during the regular season')
  })

  it('reports progress for every day of the regular season', async () => {
    const repo = await draftedLeague(4104)
    const progress: Array<[number, number]> = []

    const finalState = await simulateRegularSeason(repo, {
      onProgress: (_state, completedDays, totalDays) => progress.push([completedDays, totalDays]),
    })

    expect(progress).toEqual([
      [1, 6],
      [2, 6],
      [3, 6],
      [4, 6],
      [5, 6],
      [6, 6],
    ])
    expect(finalState.phase).toBe('postseason')
    expect((await repo.load())?.phase).toBe('postseason')
  })

  it('keeps the days already played when the run is aborted', async () => {
    const repo = await draftedLeague(4105)
    const controller = new AbortController()

    await expect(
      simulateRegularSeason(repo, {
        signal: controller.signal,
        onProgress: (_state, completedDays) => {
          if (completedDays === 2) {
            controller.abort()
          }
        },
      }),
    ).rejects.toThrow('Season simulation cancelled')

    const stored = await repo.load()
    expect(stored?.day).toBe(3)
    expect(stored?.results).toHaveLength(4)
    expect(stored?.phase).toBe('regular-season')
  })

  it('replays the same results log from the same seed', async () => {
    const first = await draftedLeague(4106)
    const second = await draftedLeague(4106)

    const a = await simulateRegularSeason(first)
    const b = await simulateRegularSeason(second)

    expect(a.results).toEqual(b.results)
    expect(a.rngState).toBe(b.rngState)
  })
})
