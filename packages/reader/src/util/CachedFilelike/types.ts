import type { EventEmitter } from 'eventemitter3'

export interface Filelike {
  read: (offset: number, length: number) => Promise<Uint8Array>
  size: () => number
}

export interface FileStreamEvents {
  data: (chunk: Uint8Array) => void
  error: (err: Error) => void
  /** 流已发送完所有数据 */
  end: () => void
}

/**
 * 文件流接口，用于异步读取文件数据
 * 提供数据监听、错误处理和流销毁功能
 */
export interface FileStream extends Pick<EventEmitter<FileStreamEvents>, 'on'> {
  /**
   * 销毁当前文件流
   * 用于中断文件读取、释放资源
   */
  destroy: () => void
}

/**
 * 文件读取器接口，提供文件基本读取能力
 * 支持打开文件和获取文件指定范围的数据流
 */
export interface FileReader {
  /**
   * 打开文件
   * @returns 包含文件大小的 Promise
   * @throws 如果文件无法打开，将抛出错误
   */
  open: () => Promise<{ size: number }>

  /**
   * 获取文件指定范围的数据流
   * @param offset 读取起始位置
   * @param length 读取长度
   */
  fetch: (offset: number, length: number) => FileStream
}
