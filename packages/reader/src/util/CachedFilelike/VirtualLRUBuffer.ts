import { simplify, substract, unify } from 'intervals-fn'
import { isRangeCoveredByRanges, type Range } from './ranges'

const kMaxLength = 2 ** 32

/**
 * 固定虚拟大小的稀疏字节缓冲区，最多由 `numberOfBlocks` 个实际块支撑。
 * 需要更多块时，淘汰最久未使用的块及其数据范围
 */
export default class VirtualLRUBuffer {
  public readonly byteLength: number // 这个buffer表示多少字节
  #blocks: Uint8Array[] = []
  #blockSize: number = Math.trunc(kMaxLength / 2)
  #numberOfBlocks: number = Infinity
  #lastAccessedBlockIndices: number[] = [] // 从最少到最近访问
  #rangesWithData: Range[] = []

  public constructor(options: {
    size: number
    blockSize?: number
    numberOfBlocks?: number
  }) {
    this.byteLength = options.size
    this.#blockSize = options.blockSize ?? this.#blockSize
    this.#numberOfBlocks = options.numberOfBlocks ?? this.#numberOfBlocks
  }

  /** `[start, end)` 的每个字节是否都已由 `copyFrom` 写入且未被淘汰 */
  public hasData(start: number, end: number): boolean {
    return isRangeCoveredByRanges({ start, end }, this.#rangesWithData)
  }

  /** 已有数据的合并范围，按起点排序 */
  public getRangesWithData(): Range[] {
    return this.#rangesWithData
  }

  /**
   * 将 `source` 复制到 `targetStart` 处，超出 `byteLength` 的字节被丢弃
   */
  public copyFrom(source: Uint8Array, targetStart: number): void {
    if (targetStart < 0 || targetStart >= this.byteLength) {
      throw new Error('VirtualLRUBuffer#copyFrom: invalid input')
    }

    const range = {
      start: targetStart,
      end: Math.min(this.byteLength, targetStart + source.byteLength),
    }

    // 复制的数据超过缓存容量时，最早复制的块会被淘汰
    let position = range.start
    while (position < range.end) {
      const { blockIndex, positionInBlock, remainingBytesInBlock }
        = this.#calculatePosition(position)
      const count = Math.min(remainingBytesInBlock, range.end - position)
      const sourceStart = position - targetStart
      this.#getBlock(blockIndex).set(source.subarray(sourceStart, sourceStart + count), positionInBlock)
      position += count
    }

    this.#rangesWithData = simplify(unify([range], this.#rangesWithData))
  }

  /**
   * 返回 `[start, end)` 的副本，`hasData(start, end)` 为 false 时抛出错误
   */
  public slice(start: number, end: number): Uint8Array {
    const size = end - start
    if (start < 0 || end > this.byteLength || size <= 0 || size > kMaxLength) {
      throw new Error('VirtualLRUBuffer#slice: invalid input')
    }
    if (!this.hasData(start, end)) {
      throw new Error('VirtualLRUBuffer#slice: range has no data')
    }

    const startPosition = this.#calculatePosition(start)
    if (size <= startPosition.remainingBytesInBlock) {
      const { blockIndex, positionInBlock } = startPosition
      return this.#getBlock(blockIndex).slice(positionInBlock, positionInBlock + size)
    }

    const result = new Uint8Array(size)
    let position = start
    while (position < end) {
      const { blockIndex, positionInBlock, remainingBytesInBlock }
        = this.#calculatePosition(position)
      const count = Math.min(remainingBytesInBlock, end - position)
      result.set(this.#getBlock(blockIndex).subarray(positionInBlock, positionInBlock + count), position - start)
      position += count
    }
    return result
  }

  /** 丢弃所有块和已记录的范围 */
  public clear(): void {
    this.#blocks = []
    this.#lastAccessedBlockIndices = []
    this.#rangesWithData = []
  }

  /**
   * 获取块的引用，并标记为最近使用。可能会淘汰较旧的块
   */
  #getBlock(index: number): Uint8Array {
    if (!this.#blocks[index]) {
      const blockStart = index * this.#blockSize
      this.#blocks[index] = new Uint8Array(Math.min(this.#blockSize, this.byteLength - blockStart))
    }

    this.#lastAccessedBlockIndices = [
      ...this.#lastAccessedBlockIndices.filter(idx => idx !== index),
      index,
    ]

    if (this.#lastAccessedBlockIndices.length > this.#numberOfBlocks) {
      const deleteIndex = this.#lastAccessedBlockIndices.shift()
      if (deleteIndex !== undefined) {
        delete this.#blocks[deleteIndex]
        this.#rangesWithData = simplify(
          substract(this.#rangesWithData, [
            { start: deleteIndex * this.#blockSize, end: (deleteIndex + 1) * this.#blockSize },
          ]),
        )
      }
    }

    const block = this.#blocks[index]
    if (!block) {
      throw new Error('Invariant violation: no block at index')
    }
    return block
  }

  #calculatePosition(position: number) {
    if (position < 0 || position >= this.byteLength) {
      throw new Error('VirtualLRUBuffer#calculatePosition: invalid input')
    }
    const blockIndex = Math.floor(position / this.#blockSize)
    const positionInBlock = position - blockIndex * this.#blockSize
    const remainingBytesInBlock = this.#getBlock(blockIndex).byteLength - positionInBlock
    return { blockIndex, positionInBlock, remainingBytesInBlock }
  }
}
