// 导出核心模块
export { codecNames, codecs, openLineCursor } from './codecs'
export type { Opener } from './codecs'
export { ConfigurationError, InvalidArgumentError, ResourceError } from './errors'
export { default as BufferFilelike } from './util/BufferFilelike'
export { default as CachedFilelike } from './util/CachedFilelike'
// 导出类型定义
export type {
  Filelike,
  FileReader,
  FileStream,
  FileStreamEvents,
} from './util/CachedFilelike/types'
export { LineCursor } from './util/LineCursor'
export type { LineCursorOptions } from './util/LineCursor'
export { default as NodeFileReader } from './util/NodeFileReader'
