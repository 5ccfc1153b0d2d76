import type { Logger } from 'citrine-shared'
import { httpError, networkError } from '../errors'
import { apiErrorSchema } from '../schemas/responses'
import type { ApiError, FetchFn, HeadersOption, QueryParams } from '../types'

export type ExecuteJsonArgs = {
    method: 'GET' | 'PUT' | 'POST' | 'DELETE'
    path: string
    query?: QueryParams
    body?: unknown
    signal?: AbortSignal
}

const hasHeader = (headers: Record<string, string>, name: string) => {
    const needle = name.toLowerCase()
    return Object.keys(headers).some(k => k.toLowerCase() === needle)
}

async function resolveHeaders(option: HeadersOption | undefined): Promise<Record<string, string>> {
    if (!option) return {}
    const headers = typeof option === 'function' ? await option() : option
    return { ...headers }
}

/**
 * Joins `path` onto `baseURL`, keeping any path prefix the base carries.
 */
export function buildUrl(baseURL: string, path: string, query?: QueryParams): URL {
    const base = baseURL.endsWith('/') ? baseURL : `${baseURL}/`
    const url = new URL(path.replace(/^\/+/, ''), base)
    for (const [key, value] of Object.entries(query ?? {})) {
        url.searchParams.set(key, String(value))
    }
    return url
}

function readApiError(json: unknown): ApiError | undefined {
    const parsed = apiErrorSchema.safeParse(json)
    return parsed.success ? parsed.data : undefined
}

export function createJsonHttpClient(deps: {
    baseURL: string
    fetchFn: FetchFn
    headers?: HeadersOption
    logger: Logger
}) {
    const execute = async (args: ExecuteJsonArgs): Promise<{ data: unknown; response: Response }> => {
        const payload = args.body === undefined ? undefined : JSON.stringify(args.body)
        const headers = await resolveHeaders(deps.headers)
        if (payload !== undefined && !hasHeader(headers, 'Content-Type')) {
            headers['Content-Type'] = 'application/json'
        }
        if (!hasHeader(headers, 'Accept')) {
            headers.Accept = 'application/json'
        }

        const request = new Request(buildUrl(deps.baseURL, args.path, args.query), {
            method: args.method,
            headers,
            body: payload,
            signal: args.signal
        })

        let response: Response
        try {
            response = await deps.fetchFn(request)
        } catch (error) {
            if (args.signal?.aborted) throw error
            throw networkError({ method: args.method, path: args.path, cause: error })
        }

        const data = await (async () => {
            if (response.status === 204) return null
            try {
                return await response.json()
            } catch {
                return null
            }
        })()

        const line = `${response.status} ${args.method} ${args.path}`
        if (response.ok) {
            deps.logger.info?.(line)
            return { data, response }
        }

        if (response.status === 404) {
            deps.logger.warn?.(line)
        } else {
            deps.logger.error?.(line, { body: data })
        }
        throw httpError({
            status: response.status,
            method: args.method,
            path: args.path,
            apiError: readApiError(data)
        })
    }

    return { execute }
}

export type JsonHttpClient = ReturnType<typeof createJsonHttpClient>
