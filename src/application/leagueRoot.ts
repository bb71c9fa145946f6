import type { LeagueSummary } from '@/application/gameRepository'
import { NotFoundError, ValidationError } from '@/domain/errors'
import { ENGINE_VERSION } from '@/domain/generator'
import type { GameSaveRoot, GameState, LeagueSave } from '@/domain/types'

// Root-level operations shared by every repository; callers persist the root afterwards.

const ROOT_SCHEMA_VERSION = 2
const DEFAULT_LEAGUE_ID = 'league-primary'

const newLeague = (id: string, name: string, state: GameState, now: string): LeagueSave => ({
  id,
  name,
  state: structuredClone(state),
  checkpoints: {},
  createdAt: now,
  updatedAt: now,
})

const touch = (root: GameSaveRoot, league: LeagueSave, now: string) => {
  league.updatedAt = now
  root.activeLeagueId = league.id
  root.metadata.updatedAt = now
  root.metadata.engineVersion = ENGINE_VERSION
}

const requireRootLeague = (root: GameSaveRoot | null, leagueId: string): { root: GameSaveRoot; league: LeagueSave } => {
  const league = root?.leagues[leagueId]
  if (!root || !league) {
    throw new NotFoundError(`League not found: ${leagueId}`)
  }
  return { root, league }
}

export const createRoot = (leagueId: string, leagueName: string, state: GameState, now: string): GameSaveRoot => ({
  metadata: {
    schemaVersion: ROOT_SCHEMA_VERSION,
    engineVersion: ENGINE_VERSION,
    seed: state.metadata.seed,
    createdAt: now,
    updatedAt: now,
  },
  activeLeagueId: leagueId,
  leagues: { [leagueId]: newLeague(leagueId, leagueName, state, now) },
})

export const findLeague = (root: GameSaveRoot | null, leagueId?: string): LeagueSave | null =>
  root ? (root.leagues[leagueId ?? root.activeLeagueId] ?? null) : null

/** Writes the live state of a league, opening the league (named after its id) on first save. */
export const putLeagueState = (root: GameSaveRoot | null, state: GameState, now: string, leagueId?: string): GameSaveRoot => {
  const targetId = leagueId ?? root?.activeLeagueId ?? DEFAULT_LEAGUE_ID
  if (!root) {
    return createRoot(targetId, targetId, state, now)
  }
  const league = root.leagues[targetId] ?? newLeague(targetId, targetId, state, now)
  league.state = structuredClone(state)
  root.leagues[targetId] = league
  touch(root, league, now)
  return root
}

export const addLeague = (root: GameSaveRoot | null, leagueId: string, leagueName: string, state: GameState, now: string): GameSaveRoot => {
  if (!root) {
    return createRoot(leagueId, leagueName, state, now)
  }
  if (root.leagues[leagueId]) {
    throw new ValidationError(`League already exists: ${leagueId}`)
  }
  const league = newLeague(leagueId, leagueName, state, now)
  root.leagues[leagueId] = league
  touch(root, league, now)
  return root
}

export const addCheckpoint = (
  current: GameSaveRoot | null,
  leagueId: string,
  closing: GameState,
  next: GameState,
  now: string,
): GameSaveRoot => {
  const { root, league } = requireRootLeague(current, leagueId)
  const key = String(closing.season)
  if (league.checkpoints[key]) {
    throw new ValidationError(`Season ${closing.season} is already checkpointed in ${leagueId}`)
  }
  league.checkpoints[key] = {
    season: closing.season,
    phase: closing.phase,
    championName: closing.archive[key]?.postseason.championName ?? null,
    savedAt: now,
    state: structuredClone(closing),
  }
  league.state = structuredClone(next)
  touch(root, league, now)
  return root
}

export const activateLeague = (current: GameSaveRoot | null, leagueId: string, now: string): GameSaveRoot => {
  const { root, league } = requireRootLeague(current, leagueId)
  root.activeLeagueId = league.id
  root.metadata.updatedAt = now
  return root
}

export const checkpointState = (root: GameSaveRoot | null, season: number, leagueId?: string): GameState | null => {
  const checkpoint = findLeague(root, leagueId)?.checkpoints[String(season)]
  return checkpoint ? structuredClone(checkpoint.state) : null
}

export const summarizeLeagues = (root: GameSaveRoot | null): LeagueSummary[] =>
  Object.values(root?.leagues ?? {})
    .map((league) => ({
      id: league.id,
      name: league.name,
      season: league.state.season,
      phase: league.state.phase,
      checkpointSeasons: Object.values(league.checkpoints)
        .map((checkpoint) => checkpoint.season)
        .sort((a, b) => a - b),
      updatedAt: league.updatedAt,
    }))
    .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt) || a.id.localeCompare(b.id))
