import { CITRINE_SCOPE, createLink, isLink, linkFor } from 'citrine-gemd'
import type { Identifier } from 'citrine-gemd'
import { isUuid } from 'citrine-shared'
import type { Logger } from 'citrine-shared'
import { invalidIdentifierError, invalidResponseError } from '../errors'
import { pollJobCompletion } from '../jobs/pollJob'
import { deletionFailuresSchema } from '../schemas/responses'
import type { BatchDeleteOptions, Clock, DeletionFailure, JobStatus, ScopedId, Transport } from '../types'

export type BatchDeleteDeps = Clock & {
    transport: Transport
    /** e.g. `teams/{team}/gemd/async-batch-delete` */
    submitPath: string
    /** e.g. `teams/{team}/execution/job-status` */
    statusPath: string
    logger?: Logger
}

export function normalizeIdentifier(value: Identifier): ScopedId {
    if (typeof value === 'string') {
        if (!isUuid(value)) {
            throw invalidIdentifierError({ value: JSON.stringify(value), reason: 'not a UUID' })
        }
        return { scope: CITRINE_SCOPE, id: value }
    }
    if (isLink(value)) return { scope: value.scope, id: value.id }

    const link = linkFor(value.uids)
    if (!link) {
        throw invalidIdentifierError({ value: `${value.type} "${value.name}"`, reason: 'it has no uids' })
    }
    return { scope: link.scope, id: link.id }
}

export function readDeletionFailures(status: JobStatus, path: string): DeletionFailure[] {
    const raw = status.output?.failures
    if (raw === undefined) return []

    let json: unknown
    try {
        json = JSON.parse(raw)
    } catch (error) {
        throw invalidResponseError({ path, message: 'output.failures is not JSON', cause: error })
    }
    const parsed = deletionFailuresSchema.safeParse(json)
    if (!parsed.success) {
        throw invalidResponseError({ path, message: 'output.failures has an unexpected shape', cause: parsed.error })
    }
    return parsed.data.map(failure => ({
        id: createLink(failure.id.scope, failure.id.id),
        cause: failure.cause
    }))
}

/**
 * Deletes `ids` through an asynchronous platform job and waits for it.
 * Items the platform refused come back as failures; the call itself rejects
 * only when the job fails as a whole or outlives `timeoutMs`.
 */
export async function batchDelete(
    ids: Iterable<Identifier>,
    deps: BatchDeleteDeps,
    options: BatchDeleteOptions = {}
): Promise<DeletionFailure[]> {
    const scoped = Array.from(ids, normalizeIdentifier)
    const body = options.datasetId === undefined
        ? { ids: scoped }
        : { ids: scoped, dataset_id: options.datasetId }

    const jobId = await deps.transport.submitDelete(deps.submitPath, body)
    deps.logger?.info?.(`submitted deletion of ${scoped.length} objects`, { jobId })

    const status = await pollJobCompletion(deps.transport, deps.statusPath, jobId, {
        timeoutMs: options.timeoutMs,
        pollingDelayMs: options.pollingDelayMs,
        now: deps.now,
        sleep: deps.sleep,
        logger: deps.logger
    })
    return readDeletionFailures(status, deps.statusPath)
}
