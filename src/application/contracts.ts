import { z } from 'zod'
import type { GameSaveRoot, GameState, LeagueConfig } from '@/domain/types'

const rating = z.number().min(0).max(100)
const teamIndex = z.number().int().min(0)

const attributesSchema = z.object({
  attack: rating,
  defense: rating,
  speed: rating,
  hitSpeed: rating,
  typeScore: rating,
  synergy: rating,
})

const gradeSchema = z.enum(['S', 'A', 'B', 'C', 'D'])

const cardSnapshotSchema = z.object({
  season: z.number().int().min(1),
  teamId: z.string().nullable(),
  power: z.number(),
  grade: gradeSchema,
  cost: z.number().min(0),
  gamesPlayed: z.number().int().min(0),
  avgContribution: z.number(),
  awards: z.array(z.string()),
})

const cardSchema = z.object({
  id: z.string(),
  name: z.string(),
  archetype: z.enum(['Tank', 'DPS', 'Control', 'Support', 'Hybrid']),
  attackType: z.enum(['Melee', 'Ranged', 'Splash', 'Magic']),
  attributes: attributesSchema,
  power: z.number(),
  grade: gradeSchema,
  cost: z.number().min(0),
  baseCost: z.number().min(0),
  age: z.number().int().min(0),
  lifespan: z.number().int().min(1),
  retired: z.boolean(),
  retiredInSeason: z.number().int().nullable(),
  fatigue: rating,
  gamesPlayed: z.number().int().min(0),
  contributionSum: z.number(),
  avgContribution: z.number(),
  pickRate: z.number().min(0),
  awards: z.array(z.string()),
  history: z.array(cardSnapshotSchema),
  hofProbability: z.number().min(0).max(100),
})

const boostSchema = z.object({
  key: z.string(),
  label: z.string(),
  stat: z.enum(['attack', 'defense', 'speed', 'all']),
  amount: z.number(),
  gamesLeft: z.number().int().min(0),
  teamwide: z.boolean(),
  targetCardId: z.string().nullable(),
})

const shopItemSchema = z.object({
  key: z.string(),
  label: z.string(),
  points: z.number().min(0),
  stat: z.enum(['attack', 'defense', 'speed', 'all', 'stamina-reset']),
  amount: z.number(),
  games: z.number().int().min(0),
  teamwide: z.boolean(),
})

const teamSchema = z.object({
  id: z.string(),
  name: z.string(),
  logo: z.string(),
  color: z.string(),
  gmPersonality: z.string(),
  roster: z.array(z.string()),
  backup: z.string().nullable(),
  wins: z.number().int().min(0),
  losses: z.number().int().min(0),
  streak: z.number().int(),
  costSpent: z.number().min(0),
  shopPointsLeft: z.number(),
  boosts: z.array(boostSchema),
  tradeCardUsed: z.boolean(),
  careerTitles: z.number().int().min(0),
  careerSeasons: z.number().int().min(0),
})

const scheduleEntrySchema = z.object({
  day: z.number().int().min(1),
  home: teamIndex,
  away: teamIndex,
})

const rivalrySchema = z.object({
  teamA: teamIndex,
  teamB: teamIndex,
  games: z.number().int().min(0),
  aWins: z.number().int().min(0),
  bWins: z.number().int().min(0),
})

const recapSchema = z.object({
  day: z.number().int().min(1),
  homeTeamId: z.string(),
  awayTeamId: z.string(),
  homeName: z.string(),
  awayName: z.string(),
  homeScore: z.number().int(),
  awayScore: z.number().int(),
  winnerTeamId: z.string(),
  comment: z.string(),
})

const seriesSchema = z.object({
  round: z.number().int().min(1),
  teamA: teamIndex,
  teamB: teamIndex,
  teamAName: z.string(),
  teamBName: z.string(),
  bestOf: z.number().int().min(1),
  winsA: z.number().int().min(0),
  winsB: z.number().int().min(0),
  winnerIndex: teamIndex,
})

const postseasonSchema = z.object({
  seeds: z.array(teamIndex),
  bracket: z.array(z.tuple([teamIndex, teamIndex])),
  round: z.number().int().min(0),
  series: z.array(seriesSchema),
  championIndex: teamIndex.nullable(),
})

const awardWinnerSchema = z.object({
  cardId: z.string(),
  cardName: z.string(),
})

const awardsSchema = z.object({
  mvp: awardWinnerSchema.nullable(),
  dpoy: awardWinnerSchema.nullable(),
  sixthMan: awardWinnerSchema.nullable(),
  roty: awardWinnerSchema.nullable(),
  finalsMvp: awardWinnerSchema.nullable(),
})

const patchSchema = z.object({
  season: z.number().int().min(1),
  nickname: z.string(),
  changes: z.array(
    z.object({
      cardId: z.string(),
      cardName: z.string(),
      stat: z.enum(['attack', 'defense', 'speed', 'hitSpeed', 'typeScore', 'synergy']),
      delta: z.number().int(),
    }),
  ),
})

const retirementSchema = z.object({
  cardId: z.string(),
  cardName: z.string(),
  reason: z.enum(['lifespan', 'patch-related']),
})

const rookieSchema = z.object({
  cardId: z.string(),
  cardName: z.string(),
  badge: z.literal('NEW'),
})

const offseasonSchema = z.object({
  awards: awardsSchema.nullable(),
  costsAdjusted: z.boolean(),
  patch: patchSchema.nullable(),
  retirements: z.array(retirementSchema).nullable(),
  rookies: z.array(rookieSchema).nullable(),
  archived: z.boolean(),
})

const standingsRowSchema = z.object({
  rank: z.number().int().min(1),
  teamIndex,
  teamId: z.string(),
  teamName: z.string(),
  wins: z.number().int().min(0),
  losses: z.number().int().min(0),
  streak: z.number().int(),
})

const archiveEntrySchema = z.object({
  season: z.number().int().min(1),
  standings: z.array(standingsRowSchema),
  awards: awardsSchema,
  postseason: z.object({
    championIndex: teamIndex,
    championName: z.string(),
    series: z.array(seriesSchema),
  }),
  patchNotes: patchSchema,
  retirements: z.array(retirementSchema),
  rookies: z.array(rookieSchema),
  transactions: z.array(z.string()),
})

const phaseSchema = z.enum(['preseason', 'regular-season', 'postseason', 'offseason'])

const metadataSchema = z.object({
  schemaVersion: z.number().int().min(1),
  engineVersion: z.string(),
  seed: z.number().int(),
  createdAt: z.string(),
  updatedAt: z.string(),
})

export const leagueConfigSchema: z.ZodType<LeagueConfig> = z
  .object({
    teamCount: z.number().int().min(2),
    maxTeamCost: z.number().positive(),
    gamesPerTeam: z.number().int().min(1),
    poolMin: z.number().int().min(1),
    poolCeiling: z.number().int().min(1),
    rookiesPerSeason: z.number().int().min(0),
    extraRetirements: z.number().int().min(0),
    patchSize: z.number().int().min(0),
    playoffTeams: z.number().int().min(2),
    seriesLengths: z.array(z.number().int().min(1)),
    fatigueThreshold: rating,
    homeAdvantage: z.number().positive(),
    rivalryBonus: z.number().positive(),
    rivalryMinGames: z.number().int().min(0),
    noiseSpread: z.number().min(0).max(1),
    mvpMinGames: z.number().int().min(0),
  })
  .superRefine((config, context) => {
    if (config.playoffTeams > config.teamCount) {
      context.addIssue({ code: z.ZodIssueCode.custom, path: ['playoffTeams'], message: 'playoffTeams cannot exceed teamCount' })
    }
    if (config.seriesLengths.length !== Math.log2(config.playoffTeams)) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['seriesLengths'],
        message: 'seriesLengths must hold one entry per postseason round',
      })
    }
    if (config.poolCeiling < config.poolMin) {
      context.addIssue({ code: z.ZodIssueCode.custom, path: ['poolCeiling'], message: 'poolCeiling cannot be below poolMin' })
    }
  })

export const gameStateSchema: z.ZodType<GameState> = z.object({
  metadata: metadataSchema,
  config: leagueConfigSchema,
  phase: phaseSchema,
  season: z.number().int().min(1),
  day: z.number().int().min(1),
  rngState: z.number().int().min(0),
  teams: z.array(teamSchema),
  cards: z.record(z.string(), cardSchema),
  schedule: z.array(scheduleEntrySchema),
  rivalries: z.record(z.string(), rivalrySchema),
  transactions: z.array(z.string()),
  results: z.array(recapSchema),
  postseason: postseasonSchema.nullable(),
  offseason: offseasonSchema,
  archive: z.record(z.string(), archiveEntrySchema),
  shopCatalog: z.array(shopItemSchema),
})

const checkpointSchema = z.object({
  season: z.number().int().min(1),
  phase: phaseSchema,
  championName: z.string().nullable(),
  savedAt: z.string(),
  state: gameStateSchema,
})

const leagueSaveSchema = z.object({
  id: z.string(),
  name: z.string(),
  state: gameStateSchema,
  checkpoints: z.record(z.string(), checkpointSchema),
  createdAt: z.string(),
  updatedAt: z.string(),
})

export const gameSaveRootSchema: z.ZodType<GameSaveRoot> = z.object({
  metadata: metadataSchema,
  activeLeagueId: z.string(),
  leagues: z.record(z.string(), leagueSaveSchema),
})

export const gameSaveSchema = gameStateSchema
