import type { GameRepository, LeagueSummary } from '@/application/gameRepository'
import { advanceSeason } from '@/application/useCases/advanceSeason'
import { createLeague as createLeagueUseCase } from '@/application/useCases/createLeague'
import { exportSave } from '@/application/useCases/exportSave'
import { importSave } from '@/application/useCases/importSave'
import { requireLeague, type LeagueUpdate } from '@/application/useCases/leagueTransaction'
import { adjustCosts, applyPatch, archiveSeason, computeAwards, retireAndReplenish, runOffseason } from '@/application/useCases/offseason'
import { seedPostseason, simulatePostseasonRound, simulatePostseasonToChampion } from '@/application/useCases/postseason'
import { regenerateCalendar, runPreseason } from '@/application/useCases/runPreseason'
import {
  simulateDays,
  simulateFullSeason,
  simulateNextDay,
  simulateRegularSeason,
  type SimulateRegularSeasonParams,
} from '@/application/useCases/simulateSeason'
import {
  executeTrade,
  proposeTradeOffers,
  purchaseBoost,
  type ExecuteTradeInput,
  type PurchaseBoostInput,
  type TransactionResult,
} from '@/application/useCases/transactions'
import type { DraftReport } from '@/domain/draft'
import { NotFoundError } from '@/domain/errors'
import { isSeasonComplete } from '@/domain/schedule'
import type { DayReport } from '@/domain/season'
import { computeStandings } from '@/domain/standings'
import type {
  AwardsTable,
  GameState,
  LeagueConfig,
  PatchNotes,
  PostseasonState,
  RetirementEntry,
  RookieEntry,
  SeasonArchiveEntry,
  SeriesResult,
  StandingsRow,
  TradeOffer,
} from '@/domain/types'
import { GameRepositoryImpl } from '@/infrastructure/repository/gameRepositoryImpl'
import { SqliteStore } from '@/infrastructure/repository/sqliteStore'
import type { StorageAdapter } from '@/infrastructure/storage/adapter'
import { selectStorageAdapter } from '@/infrastructure/storage/storageFactory'

export interface CreateLeagueInput {
  id?: string
  name?: string
  seed?: number
  config?: Partial<LeagueConfig>
}

export interface AppServicesOptions {
  repository?: GameRepository
  adapter?: StorageAdapter
}

export interface AppServices {
  repository: GameRepository
  getState(leagueId?: string): Promise<GameState | null>
  loadCheckpoint(season: number): Promise<GameState | null>
  listLeagues(): Promise<LeagueSummary[]>
  getActiveLeagueId(): Promise<string | null>
  selectLeague(leagueId: string): Promise<GameState>
  createLeague(input?: CreateLeagueInput): Promise<{ league: LeagueSummary; state: GameState }>
  runPreseason(): Promise<LeagueUpdate<DraftReport>>
  regenerateCalendar(): Promise<LeagueUpdate<number>>
  simulateNextDay(): Promise<LeagueUpdate<DayReport>>
  simulateDays(days: number): Promise<LeagueUpdate<DayReport[]>>
  simulateRegularSeason(params?: Omit<SimulateRegularSeasonParams, 'leagueId'>): Promise<GameState>
  isSeasonComplete(): Promise<boolean>
  seedPostseason(): Promise<LeagueUpdate<PostseasonState>>
  simulatePostseasonRound(): Promise<LeagueUpdate<SeriesResult[]>>
  simulatePostseasonToChampion(): Promise<LeagueUpdate<number>>
  computeAwards(): Promise<LeagueUpdate<AwardsTable>>
  adjustCosts(): Promise<LeagueUpdate<void>>
  applyPatch(): Promise<LeagueUpdate<PatchNotes>>
  retireAndReplenish(): Promise<LeagueUpdate<{ retirements: RetirementEntry[]; rookies: RookieEntry[] }>>
  archiveSeason(): Promise<LeagueUpdate<SeasonArchiveEntry>>
  runOffseason(): Promise<LeagueUpdate<SeasonArchiveEntry>>
  advanceSeason(): Promise<GameState>
  simulateFullSeason(): Promise<LeagueUpdate<SeasonArchiveEntry>>
  purchaseBoost(input: PurchaseBoostInput): Promise<TransactionResult>
  proposeTradeOffers(teamIndex: number, cardId: string): Promise<TradeOffer[]>
  executeTrade(input: ExecuteTradeInput): Promise<TransactionResult>
  standings(): Promise<StandingsRow[]>
  exportSave(): Promise<string>
  importSave(raw: string): Promise<GameState>
}

const buildRepository = async (adapter?: StorageAdapter): Promise<GameRepository> => {
  if (adapter) {
    return new GameRepositoryImpl(new SqliteStore(adapter))
  }
  const selected = await selectStorageAdapter()
  console.info('[storage] selected adapter', selected.adapter.name, 'chain', selected.fallbackChain.join(' -> '))
  const sqlite = new SqliteStore(selected.adapter)
  return new GameRepositoryImpl(sqlite)
}

export const createAppServices = async (options: AppServicesOptions = {}): Promise<AppServices> => {
  const repository = options.repository ?? (await buildRepository(options.adapter))

  const findLeague = async (leagueId: string): Promise<LeagueSummary> => {
    const league = (await repository.listLeagues()).find((candidate) => candidate.id === leagueId)
    if (!league) {
      throw new NotFoundError(`League not found: ${leagueId}`)
    }
    return league
  }

  return {
    repository,
    getState: (leagueId?: string) => repository.load(leagueId),
    loadCheckpoint: (season: number) => repository.loadCheckpoint(season),
    listLeagues: () => repository.listLeagues(),
    getActiveLeagueId: () => repository.getActiveLeagueId(),
    selectLeague: async (leagueId: string) => {
      await repository.setActiveLeague(leagueId)
      return requireLeague(repository, leagueId)
    },
    createLeague: async (input: CreateLeagueInput = {}) => {
      const leagueId = input.id?.trim() || `league-${Date.now().toString(36)}`
      const leagueName = input.name?.trim() || leagueId
      const state = await createLeagueUseCase(repository, input.seed, { leagueId, leagueName, config: input.config })
      return { league: await findLeague(leagueId), state }
    },
    runPreseason: () => runPreseason(repository),
    regenerateCalendar: () => regenerateCalendar(repository),
    simulateNextDay: () => simulateNextDay(repository),
    simulateDays: (days: number) => simulateDays(repository, days),
    simulateRegularSeason: (params = {}) => simulateRegularSeason(repository, params),
    isSeasonComplete: async () => isSeasonComplete(await requireLeague(repository)),
    seedPostseason: () => seedPostseason(repository),
    simulatePostseasonRound: () => simulatePostseasonRound(repository),
    simulatePostseasonToChampion: () => simulatePostseasonToChampion(repository),
    computeAwards: () => computeAwards(repository),
    adjustCosts: () => adjustCosts(repository),
    applyPatch: () => applyPatch(repository),
    retireAndReplenish: () => retireAndReplenish(repository),
    archiveSeason: () => archiveSeason(repository),
    runOffseason: () => runOffseason(repository),
    advanceSeason: () => advanceSeason(repository),
    simulateFullSeason: () => simulateFullSeason(repository),
    purchaseBoost: (input: PurchaseBoostInput) => purchaseBoost(repository, input),
    proposeTradeOffers: (teamIndex: number, cardId: string) => proposeTradeOffers(repository, teamIndex, cardId),
    executeTrade: (input: ExecuteTradeInput) => executeTrade(repository, input),
    standings: async () => computeStandings(await requireLeague(repository)),
    exportSave: () => exportSave(repository),
    importSave: (raw: string) => importSave(repository, raw),
  }
}
