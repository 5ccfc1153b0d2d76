import { z } from 'citrine-shared'
import type { Logger } from 'citrine-shared'
import type { FetchFn, HeadersOption } from '../types'

const isFunction = (value: unknown) => typeof value === 'function'

export const retryConfigSchema = z.object({
    maxAttempts: z.number().int().min(1).optional(),
    baseDelayMs: z.number().min(0).optional(),
    maxDelayMs: z.number().min(0).optional(),
    randomize: z.boolean().optional()
})

export const clientOptionsSchema = z.object({
    baseURL: z.string().url(),
    headers: z.union([
        z.record(z.string(), z.string()),
        z.custom<Exclude<HeadersOption, Record<string, string>>>(isFunction)
    ]).optional(),
    fetchFn: z.custom<FetchFn>(isFunction).optional(),
    retry: retryConfigSchema.optional(),
    batchSize: z.number().int().positive().default(50),
    logger: z.custom<Logger>(value => typeof value === 'object' && value !== null).optional()
}).loose()

export type CitrineClientOptions = z.input<typeof clientOptionsSchema>
export type ResolvedClientOptions = z.output<typeof clientOptionsSchema>
