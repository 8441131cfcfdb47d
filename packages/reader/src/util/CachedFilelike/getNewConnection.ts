import { missingRanges, type Range } from './ranges'

export interface GetNewConnectionOptions {
  /** What the active connection still has to deliver, if there is one. */
  currentRemainingRange?: Range
  /** The oldest read request that the cache cannot answer yet. */
  readRequestRange?: Range
  downloadedRanges: readonly Range[]
  lastResolvedCallbackEnd?: number
  /** Upper bound for a single connection, normally the cache size. */
  maxRequestSize: number
  /** How far past the missing bytes a new connection keeps reading. */
  readAheadBytes: number
  fileSize: number
  /** An active connection this close to the missing bytes is left to reach them. */
  continueDownloadingThreshold: number
}

/**
 * Decide whether to start a new connection, and for which range.
 * Returns `undefined` to keep the current connection (or stay idle).
 */
export function getNewConnection(options: GetNewConnectionOptions): Range | undefined {
  const {
    currentRemainingRange,
    readRequestRange,
    downloadedRanges,
    lastResolvedCallbackEnd,
    maxRequestSize,
    readAheadBytes,
    fileSize,
    continueDownloadingThreshold,
  } = options

  if (!readRequestRange) {
    // Nothing is waiting; let a running connection finish its read-ahead.
    return undefined
  }

  const [firstMissing] = missingRanges(readRequestRange, downloadedRanges)
  if (!firstMissing) {
    return undefined
  }

  if (
    currentRemainingRange
    && currentRemainingRange.start <= firstMissing.start
    && firstMissing.start - currentRemainingRange.start <= continueDownloadingThreshold
    && currentRemainingRange.end >= firstMissing.end
  ) {
    return undefined
  }

  // Sequential reads (the next request starts where the last one ended) get
  // the full read-ahead; random access only fetches what is missing.
  const sequential = lastResolvedCallbackEnd !== undefined && lastResolvedCallbackEnd === readRequestRange.start
  const wanted = sequential ? Math.max(readAheadBytes, firstMissing.end - firstMissing.start) : firstMissing.end - firstMissing.start
  const length = Math.min(wanted, maxRequestSize, fileSize - firstMissing.start)
  return { start: firstMissing.start, end: firstMissing.start + length }
}
