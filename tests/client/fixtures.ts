import { vi } from 'vitest'
import type { WireObject } from 'citrine-gemd'
import type { DeleteRequestBody, FetchFn, JobStatus, QueryParams, Transport } from 'citrine-client'

export function createTestLogger() {
    return {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn()
    }
}

export const json = (body: unknown, status = 200) => new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
})

/**
 * A fetch that answers from a queue and records every request it saw.
 */
export function queuedFetch(responses: Array<(request: Request) => Response | Promise<Response>>) {
    const requests: Request[] = []
    const fetchFn: FetchFn = async (input) => {
        if (!(input instanceof Request)) throw new Error('expected a Request')
        requests.push(input)
        const next = responses.shift()
        if (!next) throw new Error('no response queued')
        return next(input.clone())
    }
    return { fetchFn, requests }
}

export const job = (status: string, extra: Partial<JobStatus> = {}): JobStatus => ({
    job_type: 'batch_delete',
    status,
    tasks: [],
    ...extra
})

/**
 * In-process platform: echoes submitted batches back as built objects and
 * plays back queued job statuses.
 */
export class MemoryTransport implements Transport {
    readonly batches: Array<{ path: string; objects: WireObject[]; params: QueryParams }> = []
    readonly deletes: Array<{ path: string; body: DeleteRequestBody }> = []
    readonly polls: Array<{ path: string; jobId: string }> = []

    constructor(private readonly options: {
        statuses?: JobStatus[]
        failBatch?: { index: number; error: Error }
        tags?: string[]
        /** Fields laid over every echoed object. */
        extra?: WireObject
    } = {}) {}

    async submitBatch(path: string, objects: WireObject[], params: QueryParams) {
        const index = this.batches.length
        this.batches.push({ path, objects, params })
        if (this.options.failBatch?.index === index) throw this.options.failBatch.error
        const { tags, extra } = this.options
        return { objects: objects.map(object => ({ ...object, ...(tags ? { tags } : {}), ...extra })) }
    }

    async submitDelete(path: string, body: DeleteRequestBody) {
        this.deletes.push({ path, body })
        return 'job-1'
    }

    async pollJobStatus(path: string, jobId: string) {
        this.polls.push({ path, jobId })
        const next = this.options.statuses?.shift()
        if (!next) throw new Error('no status queued')
        return next
    }
}

export function createTestClock() {
    const clock = {
        time: 0,
        sleeps: [] as number[],
        now: () => clock.time,
        sleep: async (ms: number) => {
            clock.sleeps.push(ms)
            clock.time += ms
        }
    }
    return clock
}
