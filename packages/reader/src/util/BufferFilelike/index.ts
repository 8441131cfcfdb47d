import type { Filelike } from '../CachedFilelike/types'

/** An in-memory Filelike, used for decompressed data and in tests. */
export default class BufferFilelike implements Filelike {
  #data: Uint8Array

  public constructor(data: Uint8Array | string) {
    this.#data = typeof data === 'string' ? new TextEncoder().encode(data) : data
  }

  public size(): number {
    return this.#data.byteLength
  }

  public async read(offset: number, length: number): Promise<Uint8Array> {
    if (offset < 0 || length < 0) {
      throw new Error('BufferFilelike#read: invalid input')
    }
    if (offset + length > this.#data.byteLength) {
      throw new Error(`BufferFilelike#read: range ${offset}-${offset + length} is past end of buffer`)
    }
    return this.#data.slice(offset, offset + length)
  }
}
