import type { WireObject } from 'citrine-gemd'
import { childLogger, createNoopLogger, formatZodErrorMessage, isCodedError } from 'citrine-shared'
import type { Logger, z } from 'citrine-shared'
import pRetry from 'p-retry'
import { invalidResponseError } from '../errors'
import { batchResponseSchema, jobStatusSchema, jobSubmissionSchema } from '../schemas/responses'
import type { DeleteRequestBody, FetchFn, HeadersOption, JobStatus, QueryParams, RetryConfig, Transport } from '../types'
import { createJsonHttpClient } from './jsonClient'
import type { ExecuteJsonArgs, JsonHttpClient } from './jsonClient'
import { resolveRetryOptions } from './retryPolicy'
import type { ResolvedRetryOptions } from './retryPolicy'

export type HttpTransportConfig = {
    baseURL: string
    headers?: HeadersOption
    fetchFn?: FetchFn
    retry?: RetryConfig
    logger?: Logger
}

export class HttpTransport implements Transport {
    private readonly client: JsonHttpClient
    private readonly logger: Logger
    private readonly retryOptions: ResolvedRetryOptions

    constructor(config: HttpTransportConfig) {
        this.logger = childLogger(config.logger ?? createNoopLogger(), { component: 'transport' })
        this.client = createJsonHttpClient({
            baseURL: config.baseURL,
            fetchFn: config.fetchFn ?? ((input, init) => fetch(input, init)),
            headers: config.headers,
            logger: this.logger
        })
        this.retryOptions = resolveRetryOptions(config.retry)
    }

    async submitBatch(path: string, objects: WireObject[], params: QueryParams): Promise<{ objects: unknown[] }> {
        const data = await this.send({ method: 'PUT', path, query: params, body: { objects } })
        return this.decode(batchResponseSchema, data, path)
    }

    async submitDelete(path: string, body: DeleteRequestBody): Promise<string> {
        const data = await this.send({ method: 'POST', path, body })
        return this.decode(jobSubmissionSchema, data, path).job_id
    }

    async pollJobStatus(path: string, jobId: string): Promise<JobStatus> {
        const data = await this.send({ method: 'GET', path, query: { job_id: jobId } })
        return this.decode(jobStatusSchema, data, path)
    }

    private async send(args: ExecuteJsonArgs): Promise<unknown> {
        const retryable = (error: Error) => isCodedError(error) && error.retryable
        const { data } = await pRetry(() => this.client.execute(args), {
            ...this.retryOptions,
            signal: args.signal,
            shouldRetry: ({ error }) => retryable(error),
            onFailedAttempt: (ctx) => {
                if (ctx.retriesLeft <= 0 || !retryable(ctx.error)) return
                const { factor, minTimeout, maxTimeout } = this.retryOptions
                // Upper bound before randomization.
                const delayMs = Math.min(maxTimeout, minTimeout * factor ** (ctx.attemptNumber - 1))
                this.logger.warn?.(`retrying ${args.method} ${args.path}`, {
                    attempt: ctx.attemptNumber,
                    retriesLeft: ctx.retriesLeft,
                    delayMs,
                    error: ctx.error.message
                })
            }
        })
        return data
    }

    private decode<S extends z.ZodType>(schema: S, data: unknown, path: string): z.output<S> {
        const parsed = schema.safeParse(data)
        if (!parsed.success) {
            throw invalidResponseError({
                path,
                message: formatZodErrorMessage(parsed.error, ''),
                cause: parsed.error
            })
        }
        return parsed.data
    }
}
