import { describe, test, expect } from "vitest"
import { calculateBackoffMs } from "./backoff"

describe("calculateBackoffMs", () => {
  test("should double per attempt without jitter when random=0", () => {
    const results = [1, 2, 3, 4, 5].map((attempts) => calculateBackoffMs({ baseMs: 500, attempts, random: () => 0 }))

    expect(results).toEqual([500, 1000, 2000, 4000, 8000])
  })

  test("should add jitter below one base interval", () => {
    expect(calculateBackoffMs({ baseMs: 500, attempts: 1, random: () => 0.5 })).toBe(750)
    expect(calculateBackoffMs({ baseMs: 500, attempts: 2, random: () => 0.999 })).toBeLessThan(1500)
  })

  test("should cap at maxMs", () => {
    const result = calculateBackoffMs({ baseMs: 500, attempts: 20, maxMs: 10_000, random: () => 0 })

    expect(result).toBe(10_000)
  })

  test("should use default cap of 30 seconds", () => {
    expect(calculateBackoffMs({ baseMs: 500, attempts: 40, random: () => 0.9 })).toBe(30_000)
  })

  test("should treat attempts below 1 as the first retry", () => {
    expect(calculateBackoffMs({ baseMs: 500, attempts: 0, random: () => 0 })).toBe(500)
  })

  test("should use real Math.random when not provided", () => {
    const results = new Set<number>()

    for (let i = 0; i < 10; i++) {
      results.add(calculateBackoffMs({ baseMs: 1000, attempts: 1 }))
    }

    expect(results.size).toBeGreaterThan(1)
  })
})
