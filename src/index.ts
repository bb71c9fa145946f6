export * from '@/domain/types'
export * from '@/domain/errors'
export { createPrng, withStatePrng, type Prng } from '@/domain/prng'
export { DEFAULT_LEAGUE_CONFIG, DEFAULT_SHOP_CATALOG } from '@/domain/policy/leaguePolicy'
export { computePower, gradeForPower, refreshDerivedRatings } from '@/domain/cards'
export { createInitialState, resolveLeagueConfig, ENGINE_VERSION } from '@/domain/generator'
export { runDraft, type DraftReport } from '@/domain/draft'
export { generateCalendar, isSeasonComplete } from '@/domain/schedule'
export { playMatch, resolveScheduledGame, type MatchOutcome } from '@/domain/matchSim'
export { runPreseason, regenerateCalendar, simulateNextDay, type DayReport } from '@/domain/season'
export { seedPostseason, simulatePostseasonRound, simulatePostseasonToChampion } from '@/domain/postseason'
export {
  computeAwards,
  adjustCosts,
  applyPatch,
  retireAndReplenish,
  archiveSeason,
  advanceSeason,
  runOffseason,
} from '@/domain/offseason'
export { simulateFullSeason } from '@/domain/lifecycle'
export { computeStandings, formatStreak } from '@/domain/standings'
export { purchaseBoost } from '@/domain/transactions/shop'
export { proposeTradeOffers, executeTrade } from '@/domain/transactions/trades'
export { assertGameStateSemanticIntegrity } from '@/domain/invariants'
export { gameSaveSchema, gameSaveRootSchema, leagueConfigSchema } from '@/application/contracts'
export type { GameRepository, LeagueSummary } from '@/application/gameRepository'
export { createAppServices, type AppServices, type AppServicesOptions, type CreateLeagueInput } from '@/application/services'
