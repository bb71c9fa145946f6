import { gameSaveRootSchema } from '@/application/contracts'
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
import type { SaveStore } from '@/infrastructure/repository/sqliteStore'

const ROOT_KEY = 'primary'

/**
 * Keeps every league, live state plus closed-season checkpoints, in one JSON row of the save
 * store. A row that is not valid JSON or fails the root schema is copied to
 * `primary-corrupt-<ts>` and the league list starts over empty.
 */
export class GameRepositoryImpl implements GameRepository {
  constructor(private readonly store: SaveStore) {}

  private async readRoot(): Promise<GameSaveRoot | null> {
    const payload = await this.store.readState(ROOT_KEY)
    if (!payload) {
      return null
    }

    let data: unknown
    try {
      data = JSON.parse(payload)
    } catch (error) {
      await this.quarantine(payload, 'save payload is not JSON', error)
      return null
    }
    const parsed = gameSaveRootSchema.safeParse(data)
    if (!parsed.success) {
      await this.quarantine(payload, 'save payload failed the root schema', parsed.error.issues)
      return null
    }
    return parsed.data
  }

  private async quarantine(payload: string, reason: string, detail: unknown): Promise<void> {
    console.warn(`[storage] ${reason}, moving it aside`, detail)
    try {
      await this.store.writeState(`${ROOT_KEY}-corrupt-${Date.now()}`, payload)
    } catch (error) {
      console.warn('[storage] could not keep a copy of the corrupt save', error)
    }
    await this.store.clearState(ROOT_KEY)
  }

  private async update(change: (root: GameSaveRoot | null, now: string) => GameSaveRoot): Promise<void> {
    const root = change(await this.readRoot(), new Date().toISOString())
    await this.store.writeState(ROOT_KEY, JSON.stringify(root))
  }

  async load(leagueId?: string): Promise<GameState | null> {
    const league = findLeague(await this.readRoot(), leagueId)
    return league ? structuredClone(league.state) : null
  }

  save(state: GameState, leagueId?: string): Promise<void> {
    return this.update((root, now) => putLeagueState(root, state, now, leagueId))
  }

  async listLeagues(): Promise<LeagueSummary[]> {
    return summarizeLeagues(await this.readRoot())
  }

  async getActiveLeagueId(): Promise<string | null> {
    return (await this.readRoot())?.activeLeagueId ?? null
  }

  setActiveLeague(leagueId: string): Promise<void> {
    return this.update((root, now) => activateLeague(root, leagueId, now))
  }

  createLeague(leagueId: string, leagueName: string, initialState: GameState): Promise<void> {
    return this.update((root, now) => addLeague(root, leagueId, leagueName, initialState, now))
  }

  checkpointSeason(leagueId: string, closing: GameState, next: GameState): Promise<void> {
    return this.update((root, now) => addCheckpoint(root, leagueId, closing, next, now))
  }

  async loadCheckpoint(season: number, leagueId?: string): Promise<GameState | null> {
    return checkpointState(await this.readRoot(), season, leagueId)
  }

  async transaction<T>(
    run: (current: GameState | null) => Promise<{ nextState?: GameState; result: T }>,
    leagueId?: string,
  ): Promise<T> {
    const before = await this.store.readState(ROOT_KEY)
    try {
      const { nextState, result } = await run(await this.load(leagueId))
      if (nextState) {
        await this.save(nextState, leagueId)
      }
      return result
    } catch (error) {
      await (before === null ? this.store.clearState(ROOT_KEY) : this.store.writeState(ROOT_KEY, before))
      throw error
    }
  }
}
