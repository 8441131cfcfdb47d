import type { FileReader, FileStream, FileStreamEvents } from './types'
import { EventEmitter } from 'eventemitter3'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import CachedFilelike from './index'

type Behaviour = 'data' | 'error' | 'end' | 'silent'

class MockStream extends EventEmitter<FileStreamEvents> implements FileStream {
  public destroyed = false
  public destroy = vi.fn(() => {
    this.destroyed = true
  })

  public constructor(offset: number, length: number, behaviour: Behaviour) {
    super()
    setTimeout(() => {
      if (this.destroyed) {
        return
      }
      switch (behaviour) {
        case 'data':
          this.emit('data', pattern(offset, length))
          break
        case 'error':
          this.emit('error', new Error('读取失败'))
          break
        case 'end':
          this.emit('end')
          break
        case 'silent':
          break
      }
    }, 0)
  }
}

/** Every byte of the mock file is its own offset modulo 256. */
function pattern(offset: number, length: number): Uint8Array {
  return Uint8Array.from({ length }, (_, i) => (offset + i) % 256)
}

function createFileReader(size: number, behaviours: Behaviour[] = []) {
  const streams: MockStream[] = []
  const fileReader = {
    open: vi.fn(async () => ({ size })),
    fetch: vi.fn((offset: number, length: number) => {
      const stream = new MockStream(offset, length, behaviours.shift() ?? 'data')
      streams.push(stream)
      return stream
    }),
  } satisfies FileReader
  return { fileReader, streams }
}

describe('cachedFilelike', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('open', () => {
    it('应该是幂等的，可以多次调用', async () => {
      const { fileReader } = createFileReader(1024)
      const cachedFile = new CachedFilelike({ fileReader })

      await cachedFile.open()
      await cachedFile.open()

      expect(fileReader.open).toHaveBeenCalledTimes(1)
    })

    it('应该在文件无法打开时抛出错误', async () => {
      const { fileReader } = createFileReader(1024)
      fileReader.open.mockRejectedValue(new Error('无法打开文件'))
      const cachedFile = new CachedFilelike({ fileReader })

      await expect(cachedFile.open()).rejects.toThrow('无法打开文件')
    })
  })

  describe('size', () => {
    it('应该在文件未打开时抛出错误', () => {
      const { fileReader } = createFileReader(1024)
      const cachedFile = new CachedFilelike({ fileReader })

      expect(() => cachedFile.size()).toThrow('CachedFilelike has not been opened')
    })

    it('应该支持空文件', async () => {
      const { fileReader } = createFileReader(0)
      const cachedFile = new CachedFilelike({ fileReader })

      await cachedFile.open()

      expect(cachedFile.size()).toBe(0)
      await expect(cachedFile.read(0, 0)).resolves.toEqual(new Uint8Array())
    })
  })

  describe('read', () => {
    let cachedFile: CachedFilelike
    let fileReader: ReturnType<typeof createFileReader>['fileReader']

    beforeEach(async () => {
      ({ fileReader } = createFileReader(1024))
      cachedFile = new CachedFilelike({ fileReader, readAheadBytes: 300 })
      await cachedFile.open()
    })

    it('应该处理零长度读取', async () => {
      await expect(cachedFile.read(0, 0)).resolves.toEqual(new Uint8Array())
      expect(fileReader.fetch).not.toHaveBeenCalled()
    })

    it('应该在输入无效时抛出错误', async () => {
      await expect(cachedFile.read(-1, 10)).rejects.toThrow('CachedFilelike#read: invalid input')
      await expect(cachedFile.read(10, -1)).rejects.toThrow('CachedFilelike#read: invalid input')
    })

    it('应该在读取超出文件大小时抛出错误', async () => {
      await expect(cachedFile.read(1000, 100)).rejects.toThrow('range 1000-1100 is past end of file')
    })

    it('应该返回请求范围的字节', async () => {
      const result = await cachedFile.read(100, 50)

      expect(result).toEqual(pattern(100, 50))
      expect(fileReader.fetch).toHaveBeenCalledWith(100, 50)
    })

    it('应该从缓存中返回已读取的数据', async () => {
      await cachedFile.read(0, 100)
      const result = await cachedFile.read(10, 20)

      expect(result).toEqual(pattern(10, 20))
      expect(fileReader.fetch).toHaveBeenCalledTimes(1)
    })

    it('顺序读取时应该预读', async () => {
      await cachedFile.read(0, 100)
      await cachedFile.read(100, 50)

      expect(fileReader.fetch).toHaveBeenLastCalledWith(100, 300)
      await expect(cachedFile.read(150, 200)).resolves.toEqual(pattern(150, 200))
      expect(fileReader.fetch).toHaveBeenCalledTimes(2)
    })

    it('预读不应该超出文件末尾', async () => {
      await cachedFile.read(800, 100)
      await cachedFile.read(900, 50)

      expect(fileReader.fetch).toHaveBeenLastCalledWith(900, 124)
    })
  })

  describe('缓存大小', () => {
    it('应该拒绝超过缓存大小的读取', async () => {
      const { fileReader } = createFileReader(1024)
      const cachedFile = new CachedFilelike({ fileReader, cacheSizeInBytes: 64 })

      await expect(cachedFile.read(0, 100)).rejects.toThrow('Read exceeds cache size: 100 > 64')
    })

    it('分块缓存应该返回跨越块边界的字节', async () => {
      const { fileReader } = createFileReader(1024)
      const cachedFile = new CachedFilelike({ fileReader, blockSizeInBytes: 256 })

      await expect(cachedFile.read(200, 200)).resolves.toEqual(pattern(200, 200))
      await expect(cachedFile.read(300, 50)).resolves.toEqual(pattern(300, 50))
      expect(fileReader.fetch).toHaveBeenCalledTimes(1)
    })
  })

  describe('连接错误', () => {
    it('第一次错误后应该重新连接', async () => {
      const { fileReader } = createFileReader(1024, ['error', 'data'])
      const cachedFile = new CachedFilelike({ fileReader })

      await expect(cachedFile.read(0, 10)).resolves.toEqual(pattern(0, 10))
      expect(fileReader.fetch).toHaveBeenCalledTimes(2)
    })

    it('连续两次错误后应该拒绝所有读取', async () => {
      const { fileReader } = createFileReader(1024, ['error', 'error'])
      const cachedFile = new CachedFilelike({ fileReader })

      await expect(cachedFile.read(0, 10)).rejects.toThrow('读取失败')
      await expect(cachedFile.read(0, 10)).rejects.toThrow('CachedFilelike is closed')
    })

    it('流提前结束应该视为错误', async () => {
      const { fileReader } = createFileReader(1024, ['end', 'data'])
      const cachedFile = new CachedFilelike({ fileReader })

      await expect(cachedFile.read(20, 10)).resolves.toEqual(pattern(20, 10))
      expect(fileReader.fetch).toHaveBeenCalledTimes(2)
    })
  })

  describe('close', () => {
    it('应该拒绝等待中和之后的读取', async () => {
      const { fileReader, streams } = createFileReader(1024, ['silent'])
      const cachedFile = new CachedFilelike({ fileReader })
      await cachedFile.open()

      const pending = cachedFile.read(0, 10)
      await vi.waitFor(() => expect(streams).toHaveLength(1))
      cachedFile.close()

      await expect(pending).rejects.toThrow('CachedFilelike is closed')
      await expect(cachedFile.read(0, 10)).rejects.toThrow('CachedFilelike is closed')
      expect(streams[0]?.destroy).toHaveBeenCalled()
    })

    it('应该是幂等的', () => {
      const { fileReader } = createFileReader(1024)
      const cachedFile = new CachedFilelike({ fileReader })

      cachedFile.close()
      expect(() => cachedFile.close()).not.toThrow()
    })
  })
})
