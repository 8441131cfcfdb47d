import type { PseudorandomOptions, RandomSourceFactory } from './types'
import seedrandom from 'seedrandom'
import { InvalidArgumentError, InvalidDistributionError } from './errors'

/** Indices are stored as bytes, so at most 255 categories (0..254). */
export const MAX_CATEGORIES = 255

// same tolerances as an all-close check of `1` against the sum
const RELATIVE_TOLERANCE = 1e-5
const ABSOLUTE_TOLERANCE = 1e-8

/** ARC4-based generator from `seedrandom`, seeded with the decimal string of `key`. */
export const seededSource: RandomSourceFactory = key => seedrandom(String(key))

function validateDistribution(p: readonly number[]): void {
  if (p.length === 0) {
    throw new InvalidDistributionError('Distribution needs at least one category')
  }
  if (p.length > MAX_CATEGORIES) {
    throw new InvalidDistributionError(`Too many categories: ${p.length} > ${MAX_CATEGORIES}`)
  }
  let sum = 0
  p.forEach((probability, i) => {
    if (!Number.isFinite(probability) || probability < 0) {
      throw new InvalidDistributionError(`Probability at ${i} must be a finite non-negative number, got ${probability}`)
    }
    sum += probability
  })
  if (Math.abs(1 - sum) > ABSOLUTE_TOLERANCE + RELATIVE_TOLERANCE * Math.abs(sum)) {
    throw new InvalidDistributionError(`Probabilities must sum to 1, got ${sum}`)
  }
}

/** `cp[0] = 0`, `cp[i] = cp[i - 1] + p[i - 1]`; `k + 1` entries. */
export function cumulativeBoundaries(p: readonly number[]): Float64Array {
  const cp = new Float64Array(p.length + 1)
  p.forEach((probability, i) => {
    cp[i + 1] = (cp[i] ?? 0) + probability
  })
  return cp
}

/**
 * The first category `i` (ascending) with `cp[i] <= x < cp[i + 1]`, or
 * `undefined` when `x` lies outside `[cp[0], cp[k])`.
 */
export function bucketOf(x: number, cp: Float64Array): number | undefined {
  for (let i = 0; i + 1 < cp.length; i++) {
    const low = cp[i] ?? 0
    const high = cp[i + 1] ?? 0
    if (x >= low && x < high) {
      return i
    }
  }
  return undefined
}

/**
 * Pseudorandom array of category indices.
 *
 * Draws `n` uniform values from a generator seeded with `key` (local to the
 * call) and puts each into the bucket of the cumulative distribution it
 * falls in. Same `n`, `p` and `key` give the same output.
 *
 * ```ts
 * pseudorandom(5, [0.5, 0.5], 123) // Uint8Array [1, 0, 0, 1, 1]
 * pseudorandom(10, [0.5, 0.2, 0.2, 0.1], 5) // Uint8Array [0, 2, 1, 1, 0, 0, 2, 3, 1, 0]
 * ```
 *
 * @throws InvalidArgumentError for a negative or non-integer `n` or `key`
 * @throws InvalidDistributionError for a malformed `p`
 */
export function pseudorandom(
  n: number,
  p: Iterable<number>,
  key: number,
  options: PseudorandomOptions = {},
): Uint8Array {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new InvalidArgumentError(`n must be a non-negative integer, got ${n}`)
  }
  if (!Number.isSafeInteger(key)) {
    throw new InvalidArgumentError(`key must be an integer, got ${key}`)
  }
  const probabilities = Array.from(p)
  validateDistribution(probabilities)

  const cp = cumulativeBoundaries(probabilities)
  // A sum within tolerance but below 1 leaves a sliver above cp[k].
  const lastCategory = probabilities.findLastIndex(probability => probability > 0)

  const random = (options.source ?? seededSource)(key)
  const out = new Uint8Array(n)
  for (let i = 0; i < n; i++) {
    const x = random()
    if (!(x >= 0 && x < 1)) {
      throw new InvalidArgumentError(`Random source produced ${x}, expected a value in [0, 1)`)
    }
    out[i] = bucketOf(x, cp) ?? lastCategory
  }
  return out
}

/** How many times each of the `k` categories occurs in `indices`. */
export function categoryCounts(indices: ArrayLike<number>, k: number): number[] {
  const counts = Array.from({ length: k }, () => 0)
  for (let i = 0; i < indices.length; i++) {
    const index = indices[i]
    if (index !== undefined && index >= 0 && index < k) {
      counts[index] = (counts[index] ?? 0) + 1
    }
  }
  return counts
}
