export { InvalidArgumentError, InvalidDistributionError } from './errors'
export {
  bucketOf,
  categoryCounts,
  cumulativeBoundaries,
  MAX_CATEGORIES,
  pseudorandom,
  seededSource,
} from './pseudorandom'
export type { PseudorandomOptions, RandomSource, RandomSourceFactory } from './types'
