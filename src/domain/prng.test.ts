import { createPrng, withStatePrng } from '@/domain/prng'

describe('prng determinism', () => {
  it('replays same sequence from same seed', () => {
    const a = createPrng(12345)
    const b = createPrng(12345)

    const fromA = Array.from({ length: 12 }, () => a.nextInt(0, 1000))
    const fromB = Array.from({ length: 12 }, () => b.nextInt(0, 1000))

    expect(fromA).toEqual(fromB)
  })

  it('resumes the same sequence from a captured state', () => {
    const original = createPrng(99)
    original.next()
    original.next()
    const resumed = createPrng(original.state())

    expect(resumed.next()).toBe(original.next())
    expect(resumed.nextInt(1, 50)).toBe(original.nextInt(1, 50))
  })

  it('samples distinct items without exceeding the pool', () => {
    const prng = createPrng(7)
    const picked = prng.sample(['a', 'b', 'c', 'd'], 3)

    expect(picked).toHaveLength(3)
    expect(new Set(picked).size).toBe(3)
    expect(prng.sample(['a', 'b'], 5)).toHaveLength(2)
    expect(prng.sample([], 2)).toEqual([])
  })

  it('keeps uniform draws inside the requested range', () => {
    const prng = createPrng(31)
    for (let index = 0; index < 200; index += 1) {
      const value = prng.uniform(8, 15)
      expect(value).toBeGreaterThanOrEqual(8)
      expect(value).toBeLessThan(15)
    }
  })

  it('writes the advanced position back to the holder', () => {
    const holder = { rngState: 4242 }
    const expected = createPrng(4242)
    expected.next()

    const value = withStatePrng(holder, (prng) => prng.next())

    expect(holder.rngState).toBe(expected.state())
    expect(value).toBe(createPrng(4242).next())
  })
})
