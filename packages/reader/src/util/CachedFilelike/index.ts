import type { Range } from './ranges'
import type { Filelike, FileReader, FileStream } from './types'
import { toError } from '../../errors'
import { getNewConnection } from './getNewConnection'
import VirtualLRUBuffer from './VirtualLRUBuffer'

/**
 * 默认缓存块大小
 * 缓存块按需分配，每个块在第一次写入时整体分配
 */
const CACHE_BLOCK_SIZE = 1024 * 1024 * 100

/** 不开始新连接的距离（字节） */
const CLOSE_ENOUGH_BYTES_TO_NOT_START_NEW_CONNECTION = 1024 * 1024 * 5

/** 顺序读取时的默认预读（字节） */
const DEFAULT_READ_AHEAD_BYTES = 1024 * 1024

/** 日志间隔（字节） */
const LOGGING_INTERVAL_IN_BYTES = 1024 * 1024 * 100 // 每 100MiB 记录一次

interface ReadRequest {
  range: Range
  resolve: (data: Uint8Array) => void
  reject: (error: Error) => void
}

/**
 * CachedFilelike 提供了一个带缓存的文件类接口，用于高效读取文件数据
 *
 * 读取请求由 VirtualLRUBuffer 应答；缺失的字节通过 FileReader 的单个流式连接获取，
 * 顺序读取时预读。连接失败后重试一次，连续第二次失败则关闭并拒绝所有等待中的读取。
 */
export default class CachedFilelike implements Filelike {
  #fileReader: FileReader

  #fileSize?: number

  /** 缓存大小限制（字节） 当缓存大小 ≥ 文件大小时，不分片 */
  #cacheSizeInBytes: number = Infinity

  #blockSizeInBytes: number

  #readAheadBytes: number

  #virtualBuffer: VirtualLRUBuffer

  #readRequests: ReadRequest[] = []

  /** 上一次已解析读取请求的结束位置，用于判断顺序读取 */
  #lastResolvedCallbackEnd?: number

  /** 连接出错后设置，收到数据后清除 */
  #lastError?: Error

  #closed: boolean = false

  #currentConnection: { stream: FileStream, remainingRange: Range } | undefined

  /**
   * @param options.fileReader - 用于读取文件的文件读取器
   * @param options.cacheSizeInBytes - 缓存大小限制（字节）
   * @param options.blockSizeInBytes - 缓存块大小（字节），决定一次读取最少分配多少内存
   * @param options.readAheadBytes - 顺序读取时每个连接的最小长度，不超过缓存的一半
   */
  public constructor(options: {
    fileReader: FileReader
    cacheSizeInBytes?: number
    blockSizeInBytes?: number
    readAheadBytes?: number
  }) {
    this.#fileReader = options.fileReader
    this.#cacheSizeInBytes = options.cacheSizeInBytes ?? this.#cacheSizeInBytes
    this.#blockSizeInBytes = options.blockSizeInBytes ?? CACHE_BLOCK_SIZE
    this.#readAheadBytes = Math.min(
      options.readAheadBytes ?? DEFAULT_READ_AHEAD_BYTES,
      Math.floor(this.#cacheSizeInBytes / 2),
    )
    console.log('cacheSizeInBytes', this.#cacheSizeInBytes)
    this.#virtualBuffer = new VirtualLRUBuffer({ size: 0 })
  }

  /**
   * 打开文件并初始化文件元数据
   *
   * 该方法是幂等的，可以安全地多次调用。
   */
  public async open(): Promise<void> {
    if (this.#closed) {
      throw new Error('CachedFilelike is closed')
    }
    if (this.#fileSize !== undefined) {
      return
    }

    const { size } = await this.#fileReader.open()
    this.#fileSize = size

    if (this.#cacheSizeInBytes >= size && this.#blockSizeInBytes >= size) {
      // 整个文件放得进一个块，不需要分块
      this.#virtualBuffer = new VirtualLRUBuffer({ size })
    }
    else {
      this.#virtualBuffer = new VirtualLRUBuffer({
        size,
        blockSize: this.#blockSizeInBytes,
        // 总是添加额外的块以允许读取范围不在块边界
        numberOfBlocks: Math.ceil(Math.min(this.#cacheSizeInBytes, size) / this.#blockSizeInBytes) + 2,
      })
    }
  }

  /**
   * @throws 如果文件尚未打开
   */
  public size(): number {
    if (this.#fileSize === undefined) {
      throw new Error('CachedFilelike has not been opened')
    }
    return this.#fileSize
  }

  /**
   * 从文件中读取指定范围的字节
   *
   * 参数为负、超出文件末尾、超过缓存大小或已关闭时拒绝
   */
  public read(offset: number, length: number): Promise<Uint8Array> {
    if (offset < 0 || length < 0) {
      return Promise.reject(new Error('CachedFilelike#read: invalid input'))
    }
    if (this.#closed) {
      return Promise.reject(new Error('CachedFilelike is closed'))
    }
    if (length === 0) {
      return Promise.resolve(new Uint8Array())
    }
    if (length > this.#cacheSizeInBytes) {
      return Promise.reject(new Error(`Read exceeds cache size: ${length} > ${this.#cacheSizeInBytes}`))
    }

    const range = { start: offset, end: offset + length }

    return new Promise((resolve, reject) => {
      this.open()
        .then(() => {
          if (range.end > this.size()) {
            reject(new Error(`CachedFilelike#read: range ${range.start}-${range.end} is past end of file`))
            return
          }

          this.#readRequests.push({ range, resolve, reject })
          this.#updateState()
        })
        .catch((err) => {
          reject(toError(err))
        })
    })
  }

  /**
   * 停止当前连接，拒绝所有等待中的读取并清空缓存。可以多次调用
   */
  public close(): void {
    if (this.#closed) {
      return
    }
    this.#closed = true
    this.#currentConnection?.stream.destroy()
    this.#currentConnection = undefined
    this.#rejectAll(new Error('CachedFilelike is closed'))
    this.#virtualBuffer.clear()
  }

  #rejectAll(error: Error): void {
    const requests = this.#readRequests
    this.#readRequests = []
    for (const request of requests) {
      request.reject(error)
    }
  }

  #setConnection(range: Range): void {
    this.#currentConnection?.stream.destroy()

    const stream = this.#fileReader.fetch(range.start, range.end - range.start)
    this.#currentConnection = { stream, remainingRange: range }

    const isCurrent = () => this.#currentConnection?.stream === stream

    const onError = (error: Error) => {
      if (!isCurrent()) {
        return // 忽略旧连接的错误
      }

      stream.destroy()
      this.#currentConnection = undefined

      if (this.#lastError) {
        // 连续两次失败且中间没有收到数据：放弃
        console.log(`CachedFilelike: connection ${range.start}-${range.end} failed again, closing`)
        this.#closed = true
        this.#rejectAll(error)
        return
      }

      this.#lastError = error
      this.#updateState()
    }

    stream.on('error', onError)

    const startTime = Date.now()
    let bytesRead = 0
    let lastReportedBytesRead = 0

    stream.on('data', (chunk: Uint8Array) => {
      const currentConnection = this.#currentConnection
      if (!currentConnection || stream !== currentConnection.stream) {
        return // 忽略旧连接的数据
      }

      this.#lastError = undefined

      this.#virtualBuffer.copyFrom(chunk, currentConnection.remainingRange.start)
      bytesRead += chunk.byteLength

      if (bytesRead - lastReportedBytesRead > LOGGING_INTERVAL_IN_BYTES) {
        lastReportedBytesRead = bytesRead
        const sec = (Date.now() - startTime) / 1000
        console.log(`Connection @`, currentConnection.remainingRange, sec)
      }

      if (range.start + bytesRead >= range.end) {
        console.log(`连接完成! 范围: ${range.start}-${range.end}`)
        stream.destroy()
        this.#currentConnection = undefined
      }
      else {
        this.#currentConnection = {
          stream,
          remainingRange: { start: range.start + bytesRead, end: range.end },
        }
      }

      this.#updateState()
    })

    stream.on('end', () => {
      if (isCurrent()) {
        onError(new Error(`Stream for ${range.start}-${range.end} ended after ${bytesRead} bytes`))
      }
    })
  }

  #updateState(): void {
    if (this.#closed) {
      return
    }

    // 首先，解析缓存命中的读取请求
    this.#readRequests = this.#readRequests.filter(({ range, resolve }) => {
      if (!this.#virtualBuffer.hasData(range.start, range.end)) {
        return true
      }

      this.#lastResolvedCallbackEnd = range.end
      resolve(this.#virtualBuffer.slice(range.start, range.end))
      return false
    })

    const newConnection = getNewConnection({
      currentRemainingRange: this.#currentConnection?.remainingRange,
      readRequestRange: this.#readRequests[0]?.range,
      downloadedRanges: this.#virtualBuffer.getRangesWithData(),
      lastResolvedCallbackEnd: this.#lastResolvedCallbackEnd,
      maxRequestSize: this.#cacheSizeInBytes,
      readAheadBytes: this.#readAheadBytes,
      fileSize: this.size(),
      continueDownloadingThreshold: CLOSE_ENOUGH_BYTES_TO_NOT_START_NEW_CONNECTION,
    })

    if (newConnection) {
      this.#setConnection(newConnection)
    }
  }
}
