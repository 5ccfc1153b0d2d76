import { createCodedError } from 'citrine-shared'
import type { CodedError } from 'citrine-shared'
import type { ApiError } from './types'

export type ClientErrorCode =
    | 'BAD_REQUEST'
    | 'UNAUTHORIZED'
    | 'FORBIDDEN'
    | 'NOT_FOUND'
    | 'CONFLICT'
    | 'RATE_LIMITED'
    | 'SERVER_ERROR'
    | 'HTTP_ERROR'
    | 'NETWORK_ERROR'
    | 'INVALID_RESPONSE'
    | 'POLLING_TIMEOUT'
    | 'JOB_FAILURE'
    | 'INVALID_IDENTIFIER'
    | 'MISSING_DATASET'

export type ClientError = CodedError<ClientErrorCode>

const STATUS_CODES: Readonly<Record<number, ClientErrorCode>> = {
    400: 'BAD_REQUEST',
    401: 'UNAUTHORIZED',
    403: 'FORBIDDEN',
    404: 'NOT_FOUND',
    409: 'CONFLICT',
    429: 'RATE_LIMITED'
}

export function codeForStatus(status: number): ClientErrorCode {
    const known = STATUS_CODES[status]
    if (known) return known
    return status >= 500 ? 'SERVER_ERROR' : 'HTTP_ERROR'
}

export function httpError(args: {
    status: number
    method: string
    path: string
    apiError?: ApiError
}): ClientError {
    const code = codeForStatus(args.status)
    const detail = args.apiError?.message ? `: ${args.apiError.message}` : ''
    return createCodedError({
        code,
        message: `${args.method} ${args.path} failed with ${args.status}${detail}`,
        retryable: code === 'RATE_LIMITED' || code === 'SERVER_ERROR',
        details: {
            status: args.status,
            method: args.method,
            path: args.path,
            ...(args.apiError ? { apiError: args.apiError } : {})
        }
    })
}

export function networkError(args: { method: string; path: string; cause: unknown }): ClientError {
    return createCodedError({
        code: 'NETWORK_ERROR',
        message: `${args.method} ${args.path} did not complete`,
        retryable: true,
        details: { method: args.method, path: args.path },
        cause: args.cause
    })
}

export function invalidResponseError(args: { path: string; message: string; cause?: unknown }): ClientError {
    return createCodedError({
        code: 'INVALID_RESPONSE',
        message: `Unexpected response from ${args.path}: ${args.message}`,
        details: { path: args.path },
        cause: args.cause
    })
}

export function pollingTimeoutError(args: { jobId: string; timeoutMs: number }): ClientError {
    return createCodedError({
        code: 'POLLING_TIMEOUT',
        message: `Job ${args.jobId} did not finish within ${args.timeoutMs} ms`,
        details: args
    })
}

export function jobFailureError(args: { jobId: string; jobType: string; reasons: string[] }): ClientError {
    const reasons = args.reasons.length ? `: ${args.reasons.join('; ')}` : ''
    return createCodedError({
        code: 'JOB_FAILURE',
        message: `Job ${args.jobId} (${args.jobType}) failed${reasons}`,
        details: args
    })
}

export function invalidIdentifierError(args: { value: string; reason: string }): ClientError {
    return createCodedError({
        code: 'INVALID_IDENTIFIER',
        message: `Cannot identify ${args.value}: ${args.reason}`,
        details: args
    })
}

export function missingDatasetError(args: { operation: string }): ClientError {
    return createCodedError({
        code: 'MISSING_DATASET',
        message: `${args.operation} needs a dataset id`,
        details: args
    })
}
