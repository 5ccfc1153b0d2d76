export { createCitrineClient } from './createClient'
export type { CitrineClient } from './createClient'
export { GemdCollection } from './GemdCollection'
export type { GemdCollectionConfig } from './GemdCollection'

export { HttpTransport } from './transport/HttpTransport'
export type { HttpTransportConfig } from './transport/HttpTransport'
export { buildUrl, createJsonHttpClient } from './transport/jsonClient'
export type { ExecuteJsonArgs, JsonHttpClient } from './transport/jsonClient'
export { resolveRetryOptions } from './transport/retryPolicy'

export { DEFAULT_JOB_TIMEOUT_MS, DEFAULT_POLLING_DELAY_MS, pollJobCompletion } from './jobs/pollJob'
export type { PollJobOptions } from './jobs/pollJob'
export { DEFAULT_BATCH_SIZE, applyRegistrationUpdates, registerAll } from './registration/registerAll'
export type { RegisterAllDeps } from './registration/registerAll'
export { batchDelete, normalizeIdentifier, readDeletionFailures } from './deletion/batchDelete'
export type { BatchDeleteDeps } from './deletion/batchDelete'

export { clientOptionsSchema } from './schemas/options'
export type { CitrineClientOptions } from './schemas/options'
export { apiErrorSchema, jobStatusSchema } from './schemas/responses'
export { codeForStatus } from './errors'
export type { ClientError, ClientErrorCode } from './errors'

export type {
    ApiError,
    BatchDeleteOptions,
    Clock,
    DeleteRequestBody,
    DeletionFailure,
    FetchFn,
    HeadersOption,
    JobStatus,
    QueryParams,
    RegisterAllOptions,
    RegistrationResult,
    RegistrationUpdate,
    RetryConfig,
    ScopedId,
    TaskNode,
    Transport,
    ValidationError
} from './types'
