import { describe, expect, it } from 'vitest'
import BufferFilelike from './index'

describe('bufferFilelike', () => {
  it('应该接受字符串并按 UTF-8 编码', () => {
    expect(new BufferFilelike('é\n').size()).toBe(3)
  })

  it('应该返回请求范围的副本', async () => {
    const data = new Uint8Array([1, 2, 3, 4])
    const file = new BufferFilelike(data)

    const result = await file.read(1, 2)
    result[0] = 9

    expect(result).toEqual(new Uint8Array([9, 3]))
    expect(data).toEqual(new Uint8Array([1, 2, 3, 4]))
  })

  it('应该拒绝越界或无效的读取', async () => {
    const file = new BufferFilelike('abc')

    await expect(file.read(2, 2)).rejects.toThrow('BufferFilelike#read: range 2-4 is past end of buffer')
    await expect(file.read(-1, 1)).rejects.toThrow('BufferFilelike#read: invalid input')
  })
})
