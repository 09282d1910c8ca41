/**
 * Seeded pseudo-random generator (mulberry32). Same seed, same sequence.
 *
 * @returns A function yielding floats in [0, 1)
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/**
 * Generates line totals in cents for the scalability series.
 * Values repeat often enough to exercise duplicate-key handling.
 *
 * @example
 * ```typescript
 * generateLineTotals(5, 42) // five integers in [0, 100000)
 * ```
 */
export function generateLineTotals(
  size: number,
  seed: number,
  maxCents = 100_000
): number[] {
  const random = createRandom(seed)
  return Array.from({ length: size }, () => Math.floor(random() * maxCents))
}

/**
 * Picks up to `count` evenly spaced targets from a sorted array, plus one
 * value guaranteed to be absent so every run also covers the not-found path.
 */
export function pickSearchTargets(
  sorted: readonly number[],
  count = 100
): number[] {
  if (sorted.length === 0) return [0]

  const step = Math.max(1, Math.floor(sorted.length / count))
  const targets: number[] = []
  for (let i = 0; i < sorted.length && targets.length < count; i += step) {
    targets.push(sorted[i])
  }
  targets.push(sorted[sorted.length - 1] + 1)
  return targets
}
