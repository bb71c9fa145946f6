import { ValidationError } from '@/domain/errors'
import { emptyOffseason } from '@/domain/generator'
import { refreshHallOfFame, snapshotCards } from '@/domain/offseason/archive'
import { awardEntries, awardTag, selectAwards } from '@/domain/offseason/awards'
import { repriceCards, rollPatch } from '@/domain/offseason/economy'
import { retireAndRefill } from '@/domain/offseason/retirement'
import { AWARD_LABELS } from '@/domain/policy/leaguePolicy'
import { withStatePrng } from '@/domain/prng'
import { assertPhase } from '@/domain/season'
import { computeStandings } from '@/domain/standings'
import type { AwardsTable, GameState, PatchNotes, RetirementEntry, RookieEntry, SeasonArchiveEntry } from '@/domain/types'

const requireStep = <T>(value: T | null | false, message: string): T => {
  if (value === null || value === false) {
    throw new ValidationError(message)
  }
  return value
}

const championOf = (state: GameState): number => {
  const championIndex = state.postseason?.championIndex
  if (championIndex === null || championIndex === undefined) {
    throw new ValidationError('Awards need a crowned champion')
  }
  return championIndex
}

export const computeAwards = (state: GameState): AwardsTable => {
  assertPhase(state, 'offseason', 'Awards can only be computed in the offseason')
  if (state.offseason.awards) {
    return state.offseason.awards
  }

  const awards = selectAwards(state, championOf(state))
  for (const [key, winner] of awardEntries(awards)) {
    state.cards[winner.cardId].awards.push(awardTag(key, state.season))
    state.transactions.push(`${AWARD_LABELS[key]} S${state.season}: ${winner.cardName}`)
  }
  state.offseason.awards = awards
  return awards
}

export const adjustCosts = (state: GameState): void => {
  assertPhase(state, 'offseason', 'Costs can only be adjusted in the offseason')
  if (state.offseason.costsAdjusted) {
    return
  }
  const awards = requireStep(state.offseason.awards, 'Costs can only be adjusted after awards')
  repriceCards(state, awards)
  state.offseason.costsAdjusted = true
  state.transactions.push(`Cost pass applied for S${state.season}`)
}

export const applyPatch = (state: GameState): PatchNotes => {
  assertPhase(state, 'offseason', 'Patches can only be applied in the offseason')
  if (state.offseason.patch) {
    return state.offseason.patch
  }
  requireStep(state.offseason.costsAdjusted, 'Patch can only be applied after the cost pass')

  const patch = withStatePrng(state, (prng) => rollPatch(state, prng))
  state.offseason.patch = patch
  state.transactions.push(`Patch ${patch.nickname} applied with ${patch.changes.length} changes`)
  return patch
}

export const retireAndReplenish = (state: GameState): { retirements: RetirementEntry[]; rookies: RookieEntry[] } => {
  assertPhase(state, 'offseason', 'Retirements can only run in the offseason')
  if (state.offseason.retirements && state.offseason.rookies) {
    return { retirements: state.offseason.retirements, rookies: state.offseason.rookies }
  }
  requireStep(state.offseason.patch, 'Retirements can only run after the patch')

  const pass = withStatePrng(state, (prng) => retireAndRefill(state, prng))
  state.offseason.retirements = pass.retirements
  state.offseason.rookies = pass.rookies
  state.transactions.push(
    `Retired ${pass.retirements.length} cards, added ${pass.rookies.length} rookies, pruned ${pass.pruned.length} archived cards`,
  )
  return { retirements: pass.retirements, rookies: pass.rookies }
}

export const archiveSeason = (state: GameState): SeasonArchiveEntry => {
  assertPhase(state, 'offseason', 'Seasons can only be archived in the offseason')
  const key = String(state.season)
  const existing = state.archive[key]
  if (state.offseason.archived && existing) {
    return existing
  }

  const retirements = requireStep(state.offseason.retirements, 'Season can only be archived after retirements')
  const rookies = requireStep(state.offseason.rookies, 'Season can only be archived after rookies are added')
  const awards = requireStep(state.offseason.awards, 'Season can only be archived after awards')
  const patchNotes = requireStep(state.offseason.patch, 'Season can only be archived after the patch')
  const championIndex = championOf(state)

  const entry: SeasonArchiveEntry = {
    season: state.season,
    standings: computeStandings(state),
    awards: structuredClone(awards),
    postseason: {
      championIndex,
      championName: state.teams[championIndex].name,
      series: structuredClone(state.postseason?.series ?? []),
    },
    patchNotes: structuredClone(patchNotes),
    retirements: structuredClone(retirements),
    rookies: structuredClone(rookies),
    transactions: [...state.transactions],
  }
  state.archive[key] = entry

  snapshotCards(state, new Set(rookies.map((rookie) => rookie.cardId)))
  refreshHallOfFame(state)
  for (const team of state.teams) {
    team.careerSeasons += 1
  }

  state.transactions = []
  state.results = []
  state.postseason = null
  state.offseason.archived = true
  return entry
}

export const advanceSeason = (state: GameState): number => {
  assertPhase(state, 'offseason', 'Season can only be advanced from the offseason')
  requireStep(state.offseason.archived, 'Season can only be advanced after it is archived')

  state.season += 1
  state.day = 1
  state.schedule = []
  state.offseason = emptyOffseason()
  state.phase = 'preseason'
  return state.season
}

export const runOffseason = (state: GameState): SeasonArchiveEntry => {
  computeAwards(state)
  adjustCosts(state)
  applyPatch(state)
  retireAndReplenish(state)
  return archiveSeason(state)
}
