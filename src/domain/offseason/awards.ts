import { AWARD_LABELS } from '@/domain/policy/leaguePolicy'
import type { AwardKey, AwardsTable, AwardWinner, Card, GameState } from '@/domain/types'

export const SIXTH_MAN_MIN_GAMES = 5

const best = (cards: Card[], score: (card: Card) => number): Card | null => {
  let winner: Card | null = null
  let winnerScore = Number.NEGATIVE_INFINITY
  for (const card of cards) {
    const value = score(card)
    if (value > winnerScore || (value === winnerScore && winner !== null && card.id.localeCompare(winner.id) < 0)) {
      winner = card
      winnerScore = value
    }
  }
  return winner
}

const toWinner = (card: Card | null): AwardWinner | null => (card ? { cardId: card.id, cardName: card.name } : null)

export const defensiveScore = (card: Card): number => card.attributes.defense * (0.6 + (0.4 * card.avgContribution) / 100)

export const awardTag = (key: AwardKey, season: number): string => `${AWARD_LABELS[key]} S${season}`

export const selectAwards = (state: GameState, championIndex: number): AwardsTable => {
  const active = Object.values(state.cards).filter((card) => !card.retired)
  const qualified = active.filter((card) => card.gamesPlayed >= state.config.mvpMinGames)
  const backupIds = new Set(state.teams.flatMap((team) => (team.backup ? [team.backup] : [])))
  const champion = state.teams[championIndex]
  const finalsPool = champion ? champion.roster.flatMap((cardId) => (state.cards[cardId] ? [state.cards[cardId]] : [])) : []

  return {
    mvp: toWinner(best(qualified, (card) => card.avgContribution)),
    dpoy: toWinner(best(qualified, defensiveScore)),
    sixthMan: toWinner(
      best(
        active.filter((card) => backupIds.has(card.id) && card.gamesPlayed >= SIXTH_MAN_MIN_GAMES),
        (card) => card.avgContribution,
      ),
    ),
    roty: toWinner(
      best(
        active.filter((card) => card.age === 0 && card.gamesPlayed > 0),
        (card) => card.avgContribution,
      ),
    ),
    finalsMvp: toWinner(best(finalsPool, (card) => card.avgContribution)),
  }
}

export const awardEntries = (awards: AwardsTable): Array<[AwardKey, AwardWinner]> => {
  const entries: Array<[AwardKey, AwardWinner]> = []
  const keys: AwardKey[] = ['mvp', 'dpoy', 'sixthMan', 'roty', 'finalsMvp']
  for (const key of keys) {
    const winner = awards[key]
    if (winner) {
      entries.push([key, winner])
    }
  }
  return entries
}
