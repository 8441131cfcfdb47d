/** An I/O failure on an underlying stream, or use of a handle that is already closed. */
export class ResourceError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ResourceError'
  }
}

/** A codec name that is not present in the registry. */
export class ConfigurationError extends Error {
  public constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/** A negative or non-integer count, offset or seed. */
export class InvalidArgumentError extends Error {
  public constructor(message: string) {
    super(message)
    this.name = 'InvalidArgumentError'
  }
}

export function toError(unk: unknown): Error {
  return unk instanceof Error ? unk : new Error(String(unk))
}
