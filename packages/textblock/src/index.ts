export { textblock, textblockString } from './textblock'
export type { TextblockOptions } from './types'

export { ConfigurationError, InvalidArgumentError, LineCursor, ResourceError } from '@lineblock/reader'
