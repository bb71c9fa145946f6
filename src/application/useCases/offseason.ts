import { updateLeague, type LeagueUpdate } from '@/application/useCases/leagueTransaction'
import {
  adjustCosts as adjustCostsInState,
  applyPatch as applyPatchInState,
  archiveSeason as archiveSeasonInState,
  computeAwards as computeAwardsInState,
  retireAndReplenish as retireAndReplenishInState,
  runOffseason as runOffseasonInState,
} from '@/domain/offseason'
import type { GameRepository } from '@/application/gameRepository'
import type { AwardsTable, PatchNotes, RetirementEntry, RookieEntry, SeasonArchiveEntry } from '@/domain/types'

export const computeAwards = (repository: GameRepository, leagueId?: string): Promise<LeagueUpdate<AwardsTable>> =>
  updateLeague(repository, (next) => computeAwardsInState(next), leagueId)

export const adjustCosts = (repository: GameRepository, leagueId?: string): Promise<LeagueUpdate<void>> =>
  updateLeague(repository, (next) => adjustCostsInState(next), leagueId)

export const applyPatch = (repository: GameRepository, leagueId?: string): Promise<LeagueUpdate<PatchNotes>> =>
  updateLeague(repository, (next) => applyPatchInState(next), leagueId)

export const retireAndReplenish = (
  repository: GameRepository,
  leagueId?: string,
): Promise<LeagueUpdate<{ retirements: RetirementEntry[]; rookies: RookieEntry[] }>> =>
  updateLeague(repository, (next) => retireAndReplenishInState(next), leagueId)

export const archiveSeason = (repository: GameRepository, leagueId?: string): Promise<LeagueUpdate<SeasonArchiveEntry>> =>
  updateLeague(repository, (next) => archiveSeasonInState(next), leagueId)

export const runOffseason = (repository: GameRepository, leagueId?: string): Promise<LeagueUpdate<SeasonArchiveEntry>> =>
  updateLeague(repository, (next) => runOffseasonInState(next), leagueId)
