/** Uniform draws in `[0, 1)`, in a fixed order. */
export type RandomSource = () => number

/** Builds a fresh, independent RandomSource from an integer seed. */
export type RandomSourceFactory = (key: number) => RandomSource

export interface PseudorandomOptions {
  /**
   * Generator behind the draws. Defaults to `seedrandom`'s ARC4 generator
   * seeded with `String(key)`; outputs are only portable between callers
   * that use the same factory.
   */
  source?: RandomSourceFactory
}
