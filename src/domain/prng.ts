export interface Prng {
  next(): number
  nextInt(min: number, max: number): number
  uniform(min: number, max: number): number
  pick<T>(items: readonly T[]): T
  sample<T>(items: readonly T[], count: number): T[]
  state(): number
}

export const createPrng = (seed: number): Prng => {
  let state = seed >>> 0

  const next = () => {
    state = (1664525 * state + 1013904223) >>> 0
    return state / 2 ** 32
  }

  const nextInt = (min: number, max: number) => {
    if (max < min) {
      throw new Error('max must be greater than or equal to min')
    }

    return Math.floor(next() * (max - min + 1)) + min
  }

  const uniform = (min: number, max: number) => min + next() * (max - min)

  const pick = <T>(items: readonly T[]) => {
    if (items.length === 0) {
      throw new Error('cannot pick from empty array')
    }

    return items[nextInt(0, items.length - 1)]
  }

  // Partial Fisher-Yates: the first `count` slots end up as the sample.
  const sample = <T>(items: readonly T[], count: number) => {
    const pool = [...items]
    const size = Math.max(0, Math.min(count, pool.length))
    for (let index = 0; index < size; index += 1) {
      const swapIndex = nextInt(index, pool.length - 1)
      const temp = pool[index]
      pool[index] = pool[swapIndex]
      pool[swapIndex] = temp
    }
    return pool.slice(0, size)
  }

  return { next, nextInt, uniform, pick, sample, state: () => state }
}

// Runs `run` against the generator stored on the state and writes the advanced position back.
export const withStatePrng = <T>(holder: { rngState: number }, run: (prng: Prng) => T): T => {
  const prng = createPrng(holder.rngState)
  const result = run(prng)
  holder.rngState = prng.state()
  return result
}
