import { SimInvariantError, ValidationError } from '@/domain/errors'
import { playMatch } from '@/domain/matchSim'
import { withStatePrng, type Prng } from '@/domain/prng'
import { assertPhase } from '@/domain/season'
import { computeStandings } from '@/domain/standings'
import type { GameState, PostseasonState, SeriesResult } from '@/domain/types'

const isPowerOfTwo = (value: number): boolean => value >= 2 && (value & (value - 1)) === 0

export const assertBracketShape = (state: GameState): void => {
  const { playoffTeams, seriesLengths, teamCount } = state.config
  if (!isPowerOfTwo(playoffTeams)) {
    throw new SimInvariantError('Postseason bracket size must be a power of two', { playoffTeams })
  }
  if (playoffTeams > teamCount || playoffTeams > state.teams.length) {
    throw new SimInvariantError('Postseason bracket is larger than the league', { playoffTeams, teamCount })
  }
  if (seriesLengths.length !== Math.log2(playoffTeams)) {
    throw new SimInvariantError('Series lengths must cover every postseason round', { playoffTeams, seriesLengths })
  }
}

export const pairSeeds = (seeds: number[]): Array<[number, number]> => {
  if (!isPowerOfTwo(seeds.length)) {
    throw new SimInvariantError('Postseason bracket size must be a power of two', { size: seeds.length })
  }
  const half = seeds.length / 2
  return Array.from({ length: half }, (_, index): [number, number] => [seeds[index], seeds[seeds.length - 1 - index]])
}

export const seedPostseason = (state: GameState): PostseasonState => {
  assertPhase(state, 'postseason', 'Postseason can only be seeded after the regular season')
  if (state.postseason) {
    return state.postseason
  }
  assertBracketShape(state)

  const seeds = computeStandings(state)
    .slice(0, state.config.playoffTeams)
    .map((row) => row.teamIndex)
  state.postseason = { seeds, bracket: pairSeeds(seeds), round: 0, series: [], championIndex: null }
  state.transactions.push(`Postseason seeded: ${seeds.map((teamIndex) => state.teams[teamIndex].name).join(', ')}`)
  return state.postseason
}

export const winsNeeded = (bestOf: number): number => Math.floor(bestOf / 2) + 1

const playSeries = (state: GameState, round: number, teamA: number, teamB: number, bestOf: number, prng: Prng): SeriesResult => {
  const needed = winsNeeded(bestOf)
  let winsA = 0
  let winsB = 0
  let game = 0
  while (winsA < needed && winsB < needed) {
    const aHosts = game % 2 === 0
    const outcome = aHosts ? playMatch(state, teamA, teamB, prng) : playMatch(state, teamB, teamA, prng)
    if (outcome.winnerIndex === teamA) {
      winsA += 1
    } else {
      winsB += 1
    }
    game += 1
  }

  return {
    round: round + 1,
    teamA,
    teamB,
    teamAName: state.teams[teamA].name,
    teamBName: state.teams[teamB].name,
    bestOf,
    winsA,
    winsB,
    winnerIndex: winsA > winsB ? teamA : teamB,
  }
}

/** Plays every series of the current round; crowns the champion and opens the offseason after the final. */
export const simulatePostseasonRound = (state: GameState): SeriesResult[] => {
  const postseason = seedPostseason(state)
  if (postseason.championIndex !== null) {
    throw new ValidationError('Postseason already has a champion')
  }

  const round = postseason.round
  const bestOf = state.config.seriesLengths[round]
  if (bestOf === undefined) {
    throw new SimInvariantError('No series length configured for postseason round', { round })
  }

  const results = withStatePrng(state, (prng) =>
    postseason.bracket.map(([teamA, teamB]) => playSeries(state, round, teamA, teamB, bestOf, prng)),
  )
  for (const series of results) {
    postseason.series.push(series)
    const [winnerWins, loserWins] = series.winnerIndex === series.teamA ? [series.winsA, series.winsB] : [series.winsB, series.winsA]
    const loserName = series.winnerIndex === series.teamA ? series.teamBName : series.teamAName
    state.transactions.push(
      `Postseason R${series.round}: ${state.teams[series.winnerIndex].name} def. ${loserName} ${winnerWins}-${loserWins}`,
    )
  }
  postseason.round = round + 1

  const winners = results.map((series) => series.winnerIndex)
  if (winners.length === 1) {
    const championIndex = winners[0]
    postseason.championIndex = championIndex
    postseason.bracket = []
    state.teams[championIndex].careerTitles += 1
    state.transactions.push(`Champion S${state.season}: ${state.teams[championIndex].name}`)
    state.phase = 'offseason'
  } else {
    postseason.bracket = Array.from({ length: winners.length / 2 }, (_, index): [number, number] => [
      winners[index * 2],
      winners[index * 2 + 1],
    ])
  }
  return results
}

export const simulatePostseasonToChampion = (state: GameState): number => {
  seedPostseason(state)
  let guard = state.config.seriesLengths.length + 1
  while (state.postseason && state.postseason.championIndex === null) {
    if (guard <= 0) {
      throw new SimInvariantError('Postseason did not produce a champion')
    }
    simulatePostseasonRound(state)
    guard -= 1
  }
  const championIndex = state.postseason?.championIndex
  if (championIndex === null || championIndex === undefined) {
    throw new SimInvariantError('Postseason did not produce a champion')
  }
  return championIndex
}
