import type { Logger } from 'citrine-shared'
import { jobFailureError, pollingTimeoutError } from '../errors'
import type { Clock, JobStatus, Transport } from '../types'

export const DEFAULT_JOB_TIMEOUT_MS = 2 * 60 * 1000
export const DEFAULT_POLLING_DELAY_MS = 1000

const TERMINAL_STATUSES = new Set(['Success', 'Failure'])

export const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

export type PollJobOptions = Clock & {
    timeoutMs?: number
    pollingDelayMs?: number
    logger?: Logger
}

export function isTerminal(status: JobStatus): boolean {
    return TERMINAL_STATUSES.has(status.status)
}

/**
 * Polls `path` until the job reaches `Success` or `Failure`. A failed job
 * rejects with JOB_FAILURE carrying every task's failure reason; a job still
 * running after `timeoutMs` rejects with POLLING_TIMEOUT.
 */
export async function pollJobCompletion(
    transport: Transport,
    path: string,
    jobId: string,
    options: PollJobOptions = {}
): Promise<JobStatus> {
    const now = options.now ?? Date.now
    const sleep = options.sleep ?? defaultSleep
    const timeoutMs = options.timeoutMs ?? DEFAULT_JOB_TIMEOUT_MS
    const pollingDelayMs = options.pollingDelayMs ?? DEFAULT_POLLING_DELAY_MS
    const logger = options.logger ?? {}
    const startedAt = now()

    for (;;) {
        const status = await transport.pollJobStatus(path, jobId)

        if (status.status === 'Failure') {
            const reasons = status.tasks.flatMap(task => (task.failure_reason ? [task.failure_reason] : []))
            logger.error?.(`job ${jobId} failed`, { jobType: status.job_type, reasons })
            throw jobFailureError({ jobId, jobType: status.job_type, reasons })
        }
        if (isTerminal(status)) return status

        const elapsedMs = now() - startedAt
        if (elapsedMs >= timeoutMs) {
            logger.error?.(`job ${jobId} timed out`, { status: status.status, elapsedMs, timeoutMs })
            throw pollingTimeoutError({ jobId, timeoutMs })
        }

        logger.info?.(`job ${jobId} is ${status.status}`, { elapsedMs })
        await sleep(pollingDelayMs)
    }
}
