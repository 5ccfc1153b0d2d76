import type { Entity, LinkByUID, Uids, WireObject } from 'citrine-gemd'
import type { z } from 'citrine-shared'
import type {
    apiErrorSchema,
    jobStatusSchema,
    taskNodeSchema,
    validationErrorSchema
} from './schemas/responses'

// ============================================================================
// Wire types
// ============================================================================

export type ValidationError = z.infer<typeof validationErrorSchema>
export type ApiError = z.infer<typeof apiErrorSchema>
export type TaskNode = z.infer<typeof taskNodeSchema>
export type JobStatus = z.infer<typeof jobStatusSchema>

export type ScopedId = Readonly<{ scope: string; id: string }>

export type DeleteRequestBody = {
    ids: ScopedId[]
    dataset_id?: string
}

export type QueryParams = Record<string, string | number | boolean>

/**
 * Everything the orchestration needs from the platform. `HttpTransport` is
 * the production implementation; tests pass an in-memory one.
 */
export interface Transport {
    /** Writes (or validates, under `dry_run`) one batch and returns what the server built. */
    submitBatch(path: string, objects: WireObject[], params: QueryParams): Promise<{ objects: unknown[] }>
    /** Starts an asynchronous deletion and returns its job id. */
    submitDelete(path: string, body: DeleteRequestBody): Promise<string>
    pollJobStatus(path: string, jobId: string): Promise<JobStatus>
}

// ============================================================================
// Options
// ============================================================================

export type FetchFn = (input: RequestInfo | URL, init?: RequestInit) => Promise<Response>

export type HeadersOption =
    | Record<string, string>
    | (() => Record<string, string> | Promise<Record<string, string>>)

export type RetryConfig = {
    /** Total attempts per request, the first included. */
    maxAttempts?: number
    baseDelayMs?: number
    maxDelayMs?: number
    /** Spread each delay by a random factor between 1 and 2. Defaults to true. */
    randomize?: boolean
}

export type Clock = {
    now?: () => number
    sleep?: (ms: number) => Promise<void>
}

export type RegisterAllOptions = {
    dryRun?: boolean
    /** Also register every entity reachable from the given ones. */
    includeNested?: boolean
    batchSize?: number
}

export type RegistrationUpdate = {
    original: Entity
    uids: Uids
    tags: string[]
}

export type RegistrationResult = {
    /** Entities as built by the server, in submission order. */
    registered: Entity[]
    /** Identity and tags the server settled on, one entry per input entity. */
    updates: RegistrationUpdate[]
}

export type BatchDeleteOptions = {
    timeoutMs?: number
    pollingDelayMs?: number
    datasetId?: string
}

export type DeletionFailure = {
    id: LinkByUID
    cause: ApiError
}
