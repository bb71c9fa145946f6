import { ValidationError, SimInvariantError } from '@/domain/errors'
import { COST_FLOOR, STARTER_SLOTS } from '@/domain/policy/leaguePolicy'
import { sumCardCosts, teamCardIds, withinCap } from '@/domain/teams'
import type { GameState } from '@/domain/types'

const isTeamIndex = (state: GameState, value: number) => Number.isInteger(value) && value >= 0 && value < state.teams.length

export const assertTeamCaps = (state: GameState) => {
  for (const team of state.teams) {
    if (!withinCap(team.costSpent, state.config.maxTeamCost)) {
      throw new SimInvariantError(`Team ${team.name} exceeded the salary cap`, {
        teamId: team.id,
        costSpent: team.costSpent,
        maxTeamCost: state.config.maxTeamCost,
      })
    }
    if (team.shopPointsLeft < 0) {
      throw new SimInvariantError(`Team ${team.name} has negative shop points`, { teamId: team.id, shopPointsLeft: team.shopPointsLeft })
    }
  }
}

export const assertPayrolls = (state: GameState) => {
  for (const team of state.teams) {
    const payroll = sumCardCosts(state.cards, teamCardIds(team))
    if (Math.abs(payroll - team.costSpent) > 0.011) {
      throw new SimInvariantError(`Team ${team.name} payroll is out of sync with its cards`, {
        teamId: team.id,
        costSpent: team.costSpent,
        payroll,
      })
    }
  }
}

export const assertCardBounds = (state: GameState) => {
  for (const card of Object.values(state.cards)) {
    if (!Number.isFinite(card.fatigue) || card.fatigue < 0 || card.fatigue > 100) {
      throw new SimInvariantError('Card fatigue must be in [0, 100]', { cardId: card.id, fatigue: card.fatigue })
    }
    if (card.cost < COST_FLOOR) {
      throw new SimInvariantError('Card cost fell below the floor', { cardId: card.id, cost: card.cost })
    }
  }
}

export const assertRosterReferences = (state: GameState) => {
  const owners = new Map<string, string>()
  const inSeason = state.phase === 'regular-season' || state.phase === 'postseason'

  for (const team of state.teams) {
    if (team.roster.length > STARTER_SLOTS) {
      throw new ValidationError(`Team ${team.name} has too many starters`, { teamId: team.id })
    }
    const cardIds = team.backup ? [...team.roster, team.backup] : team.roster
    for (const cardId of cardIds) {
      const card = state.cards[cardId]
      if (!card) {
        throw new ValidationError('Roster references unknown card', { teamId: team.id, cardId })
      }
      if (inSeason && card.retired) {
        throw new ValidationError('Roster holds a retired card during the season', { teamId: team.id, cardId })
      }
      const owner = owners.get(cardId)
      if (owner) {
        throw new ValidationError('Card is rostered by two teams', { cardId, teams: [owner, team.id] })
      }
      owners.set(cardId, team.id)
    }
  }
}

export const assertScheduleIntegrity = (state: GameState) => {
  const slots = new Set<string>()
  for (const entry of state.schedule) {
    if (!isTeamIndex(state, entry.home) || !isTeamIndex(state, entry.away) || entry.home === entry.away) {
      throw new ValidationError('Schedule entry references invalid teams', entry)
    }
    for (const teamIndex of [entry.home, entry.away]) {
      const slot = `${entry.day}:${teamIndex}`
      if (slots.has(slot)) {
        throw new ValidationError('Team is scheduled twice on one day', entry)
      }
      slots.add(slot)
    }
  }
}

export const assertPostseasonIntegrity = (state: GameState) => {
  const postseason = state.postseason
  if (!postseason) {
    return
  }
  if (postseason.seeds.some((teamIndex) => !isTeamIndex(state, teamIndex))) {
    throw new SimInvariantError('Postseason seeds reference invalid teams', { seeds: postseason.seeds })
  }
  for (const [teamA, teamB] of postseason.bracket) {
    if (!isTeamIndex(state, teamA) || !isTeamIndex(state, teamB) || teamA === teamB) {
      throw new SimInvariantError('Postseason bracket pairing is malformed', { teamA, teamB })
    }
  }
  if (postseason.championIndex !== null && !isTeamIndex(state, postseason.championIndex)) {
    throw new SimInvariantError('Postseason champion is not a league team', { championIndex: postseason.championIndex })
  }
}

export const assertGameStateSemanticIntegrity = (state: GameState) => {
  if (state.teams.length !== state.config.teamCount) {
    throw new ValidationError('Team count does not match league config', {
      teams: state.teams.length,
      teamCount: state.config.teamCount,
    })
  }
  if (state.day < 1 || state.season < 1) {
    throw new ValidationError('Season and day counters start at 1', { season: state.season, day: state.day })
  }

  assertTeamCaps(state)
  assertCardBounds(state)
  assertRosterReferences(state)
  assertPayrolls(state)
  assertScheduleIntegrity(state)
  assertPostseasonIntegrity(state)
}
