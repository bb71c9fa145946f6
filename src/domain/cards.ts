import { SimInvariantError, ValidationError } from '@/domain/errors'
import { ATTRIBUTE_KEYS, COST_FLOOR, GRADE_THRESHOLDS, POWER_WEIGHTS } from '@/domain/policy/leaguePolicy'
import type { Archetype, AttackType, Card, CardAttributes, Grade } from '@/domain/types'

export const clamp = (value: number, min = 0, max = 100): number => Math.max(min, Math.min(max, value))

export const roundPoints = (value: number): number => Math.round(value * 100) / 100

export const computePower = (attributes: CardAttributes): number => {
  let total = 0
  for (const key of ATTRIBUTE_KEYS) {
    total += attributes[key] * POWER_WEIGHTS[key]
  }
  return Math.round(total * 10) / 10
}

export const gradeForPower = (power: number): Grade => GRADE_THRESHOLDS.find((threshold) => power >= threshold.min)?.grade ?? 'D'

export const baseCostForPower = (power: number): number => roundPoints(Math.max(COST_FLOOR, (power - 50) / 12))

export const refreshDerivedRatings = (card: Card): void => {
  card.power = computePower(card.attributes)
  card.grade = gradeForPower(card.power)
}

export interface CreateCardInput {
  id: string
  name: string
  archetype: Archetype
  attackType: AttackType
  attributes: CardAttributes
  lifespan: number
  age?: number
  cost?: number
}

export const createCard = (input: CreateCardInput): Card => {
  for (const key of ATTRIBUTE_KEYS) {
    const value = input.attributes[key]
    if (!Number.isFinite(value) || value < 0 || value > 100) {
      throw new ValidationError(`Card attribute ${key} must be within [0, 100]`, { cardId: input.id, value })
    }
  }
  if (!Number.isInteger(input.lifespan) || input.lifespan < 1) {
    throw new ValidationError('Card lifespan must be a positive integer', { cardId: input.id, lifespan: input.lifespan })
  }

  const power = computePower(input.attributes)
  const baseCost = baseCostForPower(power)
  const cost = roundPoints(Math.max(COST_FLOOR, input.cost ?? baseCost))

  return {
    id: input.id,
    name: input.name,
    archetype: input.archetype,
    attackType: input.attackType,
    attributes: { ...input.attributes },
    power,
    grade: gradeForPower(power),
    cost,
    baseCost,
    age: input.age ?? 0,
    lifespan: input.lifespan,
    retired: false,
    retiredInSeason: null,
    fatigue: 100,
    gamesPlayed: 0,
    contributionSum: 0,
    avgContribution: 0,
    pickRate: 0,
    awards: [],
    history: [],
    hofProbability: 0,
  }
}

export const resetSeasonUsage = (card: Card): void => {
  card.gamesPlayed = 0
  card.contributionSum = 0
  card.avgContribution = 0
  card.pickRate = 0
  card.fatigue = 100
}

export const requireCard = (cards: Record<string, Card>, cardId: string): Card => {
  const card = cards[cardId]
  if (!card) {
    throw new SimInvariantError('Referenced card is missing from the pool', { cardId })
  }
  return card
}

export const activeCards = (cards: Record<string, Card>): Card[] => Object.values(cards).filter((card) => !card.retired)
