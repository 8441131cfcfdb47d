import type { LineCursor } from '@lineblock/reader'
import type { TextblockOptions } from './types'
import { InvalidArgumentError, openLineCursor } from '@lineblock/reader'

function assertOffsets(start: number, stop: number | undefined): void {
  if (!Number.isSafeInteger(start) || start < 0) {
    throw new InvalidArgumentError(`start must be a non-negative integer, got ${start}`)
  }
  if (stop === undefined) {
    return
  }
  if (!Number.isSafeInteger(stop) || stop < 0) {
    throw new InvalidArgumentError(`stop must be a non-negative integer, got ${stop}`)
  }
  if (stop < start) {
    throw new InvalidArgumentError(`stop (${stop}) must not be before start (${start})`)
  }
}

/**
 * Pull out a block of lines from a stream given start and stop bytes.
 *
 * Both ends move forward to the next line boundary: the line holding byte
 * `start - 1` is skipped (nothing is skipped when `start` is 0), and the line
 * holding byte `stop - 1` is kept whole. So the block always starts at a
 * line start and ends after a `\n` or at end of stream.
 *
 * Put differently, a block holds exactly the lines whose first byte lies in
 * `[start, stop)`, so `[a, b)` and `[b, c)` never share a line and a line
 * straddling `b` goes to the first of them.
 *
 * A path is opened through the codec registry and closed again before
 * returning; a LineCursor passed in is only borrowed.
 *
 * @example
 * ```ts
 * // '123\n456\n789\nabc'; 1 and 10 don't line up with line ends
 * await textblock(cursor, 1, 10) // '456\n789\n'
 * ```
 */
export async function textblock(
  source: LineCursor | string,
  start: number,
  stop?: number,
  options: TextblockOptions = {},
): Promise<Uint8Array> {
  assertOffsets(start, stop)

  if (typeof source === 'string') {
    const cursor = await openLineCursor(source, options.codec)
    try {
      return await textblock(cursor, start, stop)
    }
    finally {
      await cursor.close()
    }
  }

  const file = source
  if (start > 0) {
    file.seek(start - 1)
    await file.readLine() // burn a line
    start = file.tell()
  }

  if (stop === undefined) {
    file.seek(start)
    return await file.read()
  }

  if (stop === 0) {
    return new Uint8Array()
  }

  file.seek(stop - 1)
  await file.readLine()
  stop = file.tell()

  file.seek(start)
  return await file.read(Math.max(0, stop - start))
}

/** Same as `textblock`, decoded as UTF-8. */
export async function textblockString(
  source: LineCursor | string,
  start: number,
  stop?: number,
  options: TextblockOptions = {},
): Promise<string> {
  return new TextDecoder().decode(await textblock(source, start, stop, options))
}
