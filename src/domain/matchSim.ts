import { clamp, computePower, requireCard, roundPoints } from '@/domain/cards'
import { archetypeSynergy } from '@/domain/policy/leaguePolicy'
import type { Prng } from '@/domain/prng'
import { ensureRivalry, rivalryKey } from '@/domain/schedule'
import { recordResult } from '@/domain/teams'
import type { Boost, Card, CardAttributes, GameRecap, GameState, ScheduleEntry, Team } from '@/domain/types'

export interface Lineup {
  active: string[]
  rested: string[]
  substitutedCardId: string | null
}

export interface SideStrength {
  teamIndex: number
  rawPower: number
  total: number
  cardPowers: Array<{ cardId: string; power: number }>
}

export interface MatchOutcome {
  home: number
  away: number
  homeScore: number
  awayScore: number
  winnerIndex: number
  loserIndex: number
}

export const fatigueFactor = (fatigue: number): number => 0.5 + (0.5 * clamp(fatigue)) / 100

/** Starters, with the most fatigued starter under the threshold swapped for the backup. */
export const resolveLineup = (state: GameState, team: Team): Lineup => {
  const starters = [...team.roster]
  if (!team.backup) {
    return { active: starters, rested: [], substitutedCardId: null }
  }

  let tiredest: Card | null = null
  for (const cardId of starters) {
    const card = requireCard(state.cards, cardId)
    if (card.fatigue < state.config.fatigueThreshold && (!tiredest || card.fatigue < tiredest.fatigue)) {
      tiredest = card
    }
  }

  if (!tiredest) {
    return { active: starters, rested: [team.backup], substitutedCardId: null }
  }
  const substituted = tiredest.id
  return {
    active: starters.map((cardId) => (cardId === substituted ? team.backup ?? cardId : cardId)),
    rested: [substituted],
    substitutedCardId: substituted,
  }
}

export const boostedAttributes = (card: Card, boosts: Boost[]): CardAttributes => {
  const attributes = { ...card.attributes }
  for (const boost of boosts) {
    if (!boost.teamwide && boost.targetCardId !== card.id) {
      continue
    }
    // 'all' lifts the three boostable stats, not the whole attribute block.
    if (boost.stat === 'all') {
      attributes.attack += boost.amount
      attributes.defense += boost.amount
      attributes.speed += boost.amount
    } else {
      attributes[boost.stat] += boost.amount
    }
  }
  return {
    attack: clamp(attributes.attack),
    defense: clamp(attributes.defense),
    speed: clamp(attributes.speed),
    hitSpeed: clamp(attributes.hitSpeed),
    typeScore: clamp(attributes.typeScore),
    synergy: clamp(attributes.synergy),
  }
}

export const effectiveCardPower = (card: Card, boosts: Boost[]): number =>
  computePower(boostedAttributes(card, boosts)) * fatigueFactor(card.fatigue)

export const chemistryMultiplier = (cards: Card[]): number => {
  if (cards.length < 2) {
    return 1
  }
  let total = 0
  let pairs = 0
  for (let left = 0; left < cards.length; left += 1) {
    for (let right = left + 1; right < cards.length; right += 1) {
      total += archetypeSynergy(cards[left].archetype, cards[right].archetype)
      pairs += 1
    }
  }
  return 1 + total / pairs / 100
}

// Side trailing the head-to-head once the pair has enough recorded meetings, else null.
export const rivalryUnderdog = (state: GameState, home: number, away: number): number | null => {
  const record = state.rivalries[rivalryKey(home, away)]
  if (!record || record.games < state.config.rivalryMinGames || record.aWins === record.bWins) {
    return null
  }
  return record.aWins < record.bWins ? record.teamA : record.teamB
}

const noise = (state: GameState, prng: Prng): number => {
  const spread = state.config.noiseSpread
  return spread > 0 ? prng.uniform(1 - spread, 1 + spread) : 1
}

export const computeSideStrength = (
  state: GameState,
  teamIndex: number,
  lineup: Lineup,
  modifiers: { home: boolean; underdog: boolean },
  prng: Prng,
): SideStrength => {
  const team = state.teams[teamIndex]
  const cards = lineup.active.map((cardId) => requireCard(state.cards, cardId))
  const cardPowers = cards.map((card) => ({ cardId: card.id, power: effectiveCardPower(card, team.boosts) }))
  const rawPower = cardPowers.reduce((sum, entry) => sum + entry.power, 0)

  let total = rawPower * chemistryMultiplier(cards)
  if (modifiers.home) {
    total *= state.config.homeAdvantage
  }
  if (modifiers.underdog) {
    total *= state.config.rivalryBonus
  }
  total *= noise(state, prng)

  return { teamIndex, rawPower, total, cardPowers }
}

const applyContributions = (state: GameState, side: SideStrength) => {
  for (const entry of side.cardPowers) {
    const card = state.cards[entry.cardId]
    const share = side.rawPower > 0 ? (entry.power / side.rawPower) * 100 : 0
    card.gamesPlayed += 1
    card.contributionSum = roundPoints(card.contributionSum + share)
    card.avgContribution = roundPoints(card.contributionSum / card.gamesPlayed)
  }
}

const applyFatigue = (state: GameState, lineup: Lineup, prng: Prng) => {
  for (const cardId of lineup.active) {
    const card = state.cards[cardId]
    card.fatigue = roundPoints(clamp(card.fatigue - prng.uniform(8, 15)))
  }
  for (const cardId of lineup.rested) {
    const card = state.cards[cardId]
    card.fatigue = roundPoints(clamp(card.fatigue + prng.uniform(10, 18)))
  }
}

export const tickBoosts = (team: Team): void => {
  team.boosts = team.boosts
    .map((boost) => ({ ...boost, gamesLeft: boost.gamesLeft - 1 }))
    .filter((boost) => boost.gamesLeft > 0)
}

/**
 * Resolves one game between two team indices and applies its card-level effects (contribution,
 * fatigue, boost expiry). Standings, rivalries and the results log are left to the caller.
 */
export const playMatch = (state: GameState, home: number, away: number, prng: Prng): MatchOutcome => {
  const homeLineup = resolveLineup(state, state.teams[home])
  const awayLineup = resolveLineup(state, state.teams[away])
  const underdog = rivalryUnderdog(state, home, away)

  const homeSide = computeSideStrength(state, home, homeLineup, { home: true, underdog: underdog === home }, prng)
  const awaySide = computeSideStrength(state, away, awayLineup, { home: false, underdog: underdog === away }, prng)

  let homeScore = Math.round(homeSide.total / 10)
  let awayScore = Math.round(awaySide.total / 10)
  if (homeScore === awayScore) {
    if (prng.next() < 0.5) {
      homeScore += 1
    } else {
      awayScore += 1
    }
  }
  const winnerIndex = homeScore > awayScore ? home : away

  applyContributions(state, homeSide)
  applyContributions(state, awaySide)
  applyFatigue(state, homeLineup, prng)
  applyFatigue(state, awayLineup, prng)
  tickBoosts(state.teams[home])
  tickBoosts(state.teams[away])

  return { home, away, homeScore, awayScore, winnerIndex, loserIndex: winnerIndex === home ? away : home }
}

const recapComment = (winner: Team, loser: Team, margin: number): string => {
  if (margin >= 5) {
    return `${winner.name} rout ${loser.name}`
  }
  if (margin <= 1) {
    return `${winner.name} edge ${loser.name} in a close one`
  }
  return `${winner.name} beat ${loser.name}`
}

/** Plays a scheduled regular-season game and records standings, rivalry and recap. */
export const resolveScheduledGame = (state: GameState, entry: ScheduleEntry, prng: Prng): GameRecap => {
  const outcome = playMatch(state, entry.home, entry.away, prng)
  const homeTeam = state.teams[entry.home]
  const awayTeam = state.teams[entry.away]
  const winner = state.teams[outcome.winnerIndex]
  const loser = state.teams[outcome.loserIndex]

  recordResult(winner, true)
  recordResult(loser, false)

  const rivalry = ensureRivalry(state, entry.home, entry.away)
  if (outcome.winnerIndex === rivalry.teamA) {
    rivalry.aWins += 1
  } else {
    rivalry.bWins += 1
  }

  const recap: GameRecap = {
    day: entry.day,
    homeTeamId: homeTeam.id,
    awayTeamId: awayTeam.id,
    homeName: homeTeam.name,
    awayName: awayTeam.name,
    homeScore: outcome.homeScore,
    awayScore: outcome.awayScore,
    winnerTeamId: winner.id,
    comment: recapComment(winner, loser, Math.abs(outcome.homeScore - outcome.awayScore)),
  }
  state.results.push(recap)
  return recap
}
