import { readFile } from 'node:fs/promises'
import { promisify } from 'node:util'
import { gunzip } from 'node:zlib'
import { decompress as lz4Decompress } from 'lz4js'
import { ConfigurationError, ResourceError } from './errors'
import BufferFilelike from './util/BufferFilelike'
import CachedFilelike from './util/CachedFilelike'
import { LineCursor } from './util/LineCursor'
import NodeFileReader from './util/NodeFileReader'

/** 打开路径得到 LineCursor，由调用方负责关闭 */
export type Opener = (path: string) => Promise<LineCursor>

const gunzipAsync = promisify(gunzip)

async function openPlain(path: string): Promise<LineCursor> {
  const fileLike = new CachedFilelike({
    fileReader: new NodeFileReader(path),
    cacheSizeInBytes: 1024 * 1024 * 200, // 200MiB
    // 块按需分配，读取小范围时只分配读到的块
    blockSizeInBytes: 1024 * 1024, // 1MiB
  })
  try {
    // 先打开，文件无法读取时会抛出错误
    await fileLike.open()
  }
  catch (err) {
    fileLike.close()
    throw new ResourceError(`Opening <${path}> failed`, { cause: err })
  }
  return new LineCursor(fileLike, { onClose: () => fileLike.close() })
}

/** 压缩文件整体读入内存后解压 */
function decompressing(name: string, decode: (data: Uint8Array) => Promise<Uint8Array>): Opener {
  return async (path) => {
    let data: Uint8Array
    try {
      data = await readFile(path)
    }
    catch (err) {
      throw new ResourceError(`Opening <${path}> failed`, { cause: err })
    }
    try {
      data = await decode(data)
    }
    catch (err) {
      throw new ResourceError(`Decompressing <${path}> as ${name} failed`, { cause: err })
    }
    return new LineCursor(new BufferFilelike(data))
  }
}

/** 按压缩格式名称选择打开方式，模块加载后只读 */
export const codecs: Readonly<Record<string, Opener>> = Object.freeze({
  gzip: decompressing('gzip', data => gunzipAsync(data)),
  lz4: decompressing('lz4', async data => lz4Decompress(data)),
})

export function codecNames(): string[] {
  return Object.keys(codecs)
}

/**
 * 通过 codec 注册表打开 `path`，没有 codec 时按普通文件读取
 *
 * @throws ConfigurationError 如果 `codec` 未注册
 * @throws ResourceError 如果文件无法打开或解压
 */
export async function openLineCursor(path: string, codec?: string): Promise<LineCursor> {
  if (codec === undefined) {
    return await openPlain(path)
  }
  const opener = Object.hasOwn(codecs, codec) ? codecs[codec] : undefined
  if (!opener) {
    throw new ConfigurationError(`Unsupported codec: ${codec}. Known codecs: ${codecNames().join(', ')}`)
  }
  return await opener(path)
}
