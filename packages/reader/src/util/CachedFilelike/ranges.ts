import { complement, intersect, isBefore, isDuring } from 'intervals-fn'

/** A half-open byte range `[start, end)`. */
export interface Range { start: number, end: number }

export function isRangeCoveredByRanges(
  queryRange: Range,
  nonOverlappingMergedAndSortedRanges: readonly Range[],
): boolean {
  for (const range of nonOverlappingMergedAndSortedRanges) {
    if (isBefore(queryRange, range)) {
      return false
    }
    if (isDuring(queryRange, range)) {
      return true
    }
  }
  return false
}

/** The parts of `bounds` not covered by `ranges`, sorted by start. */
export function missingRanges(bounds: Range, ranges: readonly Range[]): Range[] {
  if (bounds.end <= bounds.start) {
    return []
  }
  // `complement` misbehaves when a range exceeds `bounds`, so clip first.
  return complement(bounds, intersect([bounds], [...ranges])).filter(range => range.end > range.start)
}
