import type { ReadStream, Stats } from 'node:fs'
import type { FileReader, FileStream, FileStreamEvents } from '../CachedFilelike/types'
import { createReadStream } from 'node:fs'
import { stat } from 'node:fs/promises'
import { EventEmitter } from 'eventemitter3'

/** A byte range of a local file, re-emitted as `Uint8Array` chunks. */
class NodeFileStream extends EventEmitter<FileStreamEvents> implements FileStream {
  #stream: ReadStream

  public constructor(path: string, offset: number, length: number) {
    super()
    // `end` is inclusive for fs streams
    this.#stream = createReadStream(path, { start: offset, end: offset + length - 1 })
    this.#stream.on('data', (chunk: Buffer | string) => {
      const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk
      this.emit('data', new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength))
    })
    this.#stream.on('error', (err: Error) => {
      this.emit('error', err)
    })
    this.#stream.on('end', () => {
      this.emit('end')
    })
  }

  public destroy(): void {
    this.#stream.destroy()
    this.removeAllListeners()
  }
}

/** FileReader over a path on the local file system. */
export default class NodeFileReader implements FileReader {
  #path: string

  public constructor(path: string) {
    this.#path = path
  }

  public async open(): Promise<{ size: number }> {
    let stats: Stats
    try {
      stats = await stat(this.#path)
    }
    catch (err) {
      throw new Error(`Opening <${this.#path}> failed. ${err}`, { cause: err })
    }
    if (!stats.isFile()) {
      throw new Error(`Opening <${this.#path}> failed. Not a regular file.`)
    }
    return { size: stats.size }
  }

  public fetch(offset: number, length: number): FileStream {
    return new NodeFileStream(this.#path, offset, length)
  }
}
