import type { GameState, Phase } from '@/domain/types'

export interface LeagueSummary {
  id: string
  name: string
  season: number
  phase: Phase
  checkpointSeasons: number[]
  updatedAt: string
}

export interface GameRepository {
  load(leagueId?: string): Promise<GameState | null>
  save(state: GameState, leagueId?: string): Promise<void>
  transaction<T>(run: (current: GameState | null) => Promise<{ nextState?: GameState; result: T }>, leagueId?: string): Promise<T>
  listLeagues(): Promise<LeagueSummary[]>
  getActiveLeagueId(): Promise<string | null>
  setActiveLeague(leagueId: string): Promise<void>
  createLeague(leagueId: string, leagueName: string, initialState: GameState): Promise<void>
  /** Freezes `closing` under its season number and makes `next` the live state, in one write. */
  checkpointSeason(leagueId: string, closing: GameState, next: GameState): Promise<void>
  loadCheckpoint(season: number, leagueId?: string): Promise<GameState | null>
}
