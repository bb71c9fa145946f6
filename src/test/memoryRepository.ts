import type { GameRepository, LeagueSummary } from '@/application/gameRepository'
import {
  activateLeague,
  addCheckpoint,
  addLeague,
  checkpointState,
  findLeague,
  putLeagueState,
  summarizeLeagues,
} from '@/application/leagueRoot'
import type { GameSaveRoot, GameState } from '@/domain/types'

/** Holds the save root in memory; every read hands out a copy. */
export class MemoryRepository implements GameRepository {
  private root: GameSaveRoot | null = null

  private apply(change: (root: GameSaveRoot | null, now: string) => GameSaveRoot) {
    this.root = change(this.root ? structuredClone(this.root) : null, new Date().toISOString())
  }

  async load(leagueId?: string): Promise<GameState | null> {
    const league = findLeague(this.root, leagueId)
    return league ? structuredClone(league.state) : null
  }

  async save(state: GameState, leagueId?: string): Promise<void> {
    this.apply((root, now) => putLeagueState(root, state, now, leagueId))
  }

  async listLeagues(): Promise<LeagueSummary[]> {
    return summarizeLeagues(this.root)
  }

  async getActiveLeagueId(): Promise<string | null> {
    return this.root?.activeLeagueId ?? null
  }

  async setActiveLeague(leagueId: string): Promise<void> {
    this.apply((root, now) => activateLeague(root, leagueId, now))
  }

  async createLeague(leagueId: string, leagueName: string, initialState: GameState): Promise<void> {
    this.apply((root, now) => addLeague(root, leagueId, leagueName, initialState, now))
  }

  async checkpointSeason(leagueId: string, closing: GameState, next: GameState): Promise<void> {
    this.apply((root, now) => addCheckpoint(root, leagueId, closing, next, now))
  }

  async loadCheckpoint(season: number, leagueId?: string): Promise<GameState | null> {
    return checkpointState(this.root, season, leagueId)
  }

  async transaction<T>(
    run: (current: GameState | null) => Promise<{ nextState?: GameState; result: T }>,
    leagueId?: string,
  ): Promise<T> {
    const before = this.root
    try {
      const { nextState, result } = await run(await this.load(leagueId))
      if (nextState) {
        await this.save(nextState, leagueId)
      }
      return result
    } catch (error) {
      this.root = before
      throw error
    }
  }
}
