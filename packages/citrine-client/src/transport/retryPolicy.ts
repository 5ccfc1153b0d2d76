import type { Options } from 'p-retry'
import type { RetryConfig } from '../types'

export type ResolvedRetryOptions = Required<Pick<Options, 'retries' | 'factor' | 'minTimeout' | 'maxTimeout' | 'randomize'>>

export function resolveRetryOptions(retry: RetryConfig = {}): ResolvedRetryOptions {
    const retries = retry.maxAttempts === undefined ? 2 : Math.max(0, Math.floor(retry.maxAttempts) - 1)
    const minTimeout = Math.max(0, Math.floor(retry.baseDelayMs ?? 500))
    const maxTimeout = Math.max(minTimeout, Math.floor(retry.maxDelayMs ?? 10_000))

    return {
        retries,
        factor: 2,
        minTimeout,
        maxTimeout,
        randomize: retry.randomize ?? true
    }
}
