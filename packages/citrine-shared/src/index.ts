export { createCodedError, isCodedError, CodedError } from './errors'

export { createId, createUuid, isUuid } from './id'
export type { CreateIdArgs, IdKind } from './id'

export { createNoopLogger, childLogger } from './logger'
export type { Logger, LogMeta } from './logger'

export { z, formatZodErrorMessage, parseOrThrow } from './zod'

export { stableStringify } from './stableStringify'
