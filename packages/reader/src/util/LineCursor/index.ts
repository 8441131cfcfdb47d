import type { Filelike } from '../CachedFilelike/types'
import { InvalidArgumentError, ResourceError } from '../../errors'

const NEWLINE = 0x0A

/** 每次从 Filelike 读取的字节数 */
const DEFAULT_CHUNK_SIZE = 64 * 1024

export interface LineCursorOptions {
  /** 每次从 Filelike 读取的字节数 */
  chunkSize?: number
  /** 释放 Filelike 背后的资源，由 `close()` 调用一次 */
  onClose?: () => void | Promise<void>
}

function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  if (chunks.length === 1 && chunks[0]) {
    return chunks[0]
  }
  const result = new Uint8Array(chunks.reduce((total, chunk) => total + chunk.byteLength, 0))
  let offset = 0
  for (const chunk of chunks) {
    result.set(chunk, offset)
    offset += chunk.byteLength
  }
  return result
}

function assertOffset(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer, got ${value}`)
  }
}

/**
 * Filelike 之上可定位的流句柄：`seek`、`tell`、`readLine`、`read` 和 `close`，
 * 语义与文件对象相同。允许定位到末尾之后，在那里读取返回空结果。
 * 只有读取成功时位置才会移动
 *
 * 不可重入：同一时间只能有一个调用方
 */
export class LineCursor {
  #file: Filelike
  #position: number = 0
  #closed: boolean = false
  #chunkSize: number
  #onClose?: () => void | Promise<void>

  public constructor(file: Filelike, options: LineCursorOptions = {}) {
    const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE
    if (!Number.isSafeInteger(chunkSize) || chunkSize <= 0) {
      throw new InvalidArgumentError(`chunkSize must be a positive integer, got ${chunkSize}`)
    }
    this.#file = file
    this.#chunkSize = chunkSize
    this.#onClose = options.onClose
  }

  public get closed(): boolean {
    return this.#closed
  }

  public size(): number {
    this.#assertOpen()
    try {
      return this.#file.size()
    }
    catch (err) {
      throw new ResourceError('Reading stream size failed', { cause: err })
    }
  }

  public tell(): number {
    this.#assertOpen()
    return this.#position
  }

  public seek(offset: number): void {
    this.#assertOpen()
    assertOffset('offset', offset)
    this.#position = offset
  }

  /** 读到下一个 `\n`（包含）或流末尾 */
  public async readLine(): Promise<Uint8Array> {
    const size = this.size()
    const chunks: Uint8Array[] = []
    let position = this.#position

    while (position < size) {
      const chunk = await this.#readAt(position, Math.min(this.#chunkSize, size - position))
      const newline = chunk.indexOf(NEWLINE)
      if (newline !== -1) {
        chunks.push(chunk.subarray(0, newline + 1))
        position += newline + 1
        break
      }
      chunks.push(chunk)
      position += chunk.byteLength
    }

    this.#position = position
    return concatBytes(chunks)
  }

  /** 最多读取 `length` 个字节（流末尾时更少），省略时读取剩余全部 */
  public async read(length?: number): Promise<Uint8Array> {
    if (length !== undefined) {
      assertOffset('length', length)
    }
    const size = this.size()
    const start = this.#position
    const end = length === undefined ? size : Math.min(size, start + length)

    const chunks: Uint8Array[] = []
    let position = start
    while (position < end) {
      const chunk = await this.#readAt(position, Math.min(this.#chunkSize, end - position))
      chunks.push(chunk)
      position += chunk.byteLength
    }

    this.#position = position
    return concatBytes(chunks)
  }

  /** 可以多次调用，之后的操作抛出 ResourceError */
  public async close(): Promise<void> {
    if (this.#closed) {
      return
    }
    this.#closed = true
    try {
      await this.#onClose?.()
    }
    catch (err) {
      throw new ResourceError('Closing stream failed', { cause: err })
    }
  }

  async #readAt(offset: number, length: number): Promise<Uint8Array> {
    let chunk: Uint8Array
    try {
      chunk = await this.#file.read(offset, length)
    }
    catch (err) {
      throw new ResourceError(`Reading ${length} bytes at offset ${offset} failed`, { cause: err })
    }
    // 防止无限循环
    if (chunk.byteLength === 0) {
      throw new ResourceError(`Read at offset ${offset} returned no data`)
    }
    this.#assertOpen()
    return chunk
  }

  #assertOpen(): void {
    if (this.#closed) {
      throw new ResourceError('Stream is closed')
    }
  }
}
