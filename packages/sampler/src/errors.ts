/** A negative or non-integer count or seed, or a random source that leaves `[0, 1)`. */
export class InvalidArgumentError extends Error {
  public constructor(message: string) {
    super(message)
    this.name = 'InvalidArgumentError'
  }
}

/** A probability vector with negative or non-finite entries, a sum away from 1, or too many categories. */
export class InvalidDistributionError extends Error {
  public constructor(message: string) {
    super(message)
    this.name = 'InvalidDistributionError'
  }
}
