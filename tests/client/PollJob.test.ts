import { describe, expect, it } from 'vitest'
import { pollJobCompletion } from 'citrine-client'
import { MemoryTransport, createTestClock, createTestLogger, job } from './fixtures'

const STATUS_PATH = 'teams/t1/execution/job-status'

describe('pollJobCompletion', () => {
    it('polls until the job succeeds', async () => {
        const clock = createTestClock()
        const logger = createTestLogger()
        const transport = new MemoryTransport({ statuses: [job('Running'), job('Pending'), job('Success')] })

        const status = await pollJobCompletion(transport, STATUS_PATH, 'job-1', { ...clock, logger })

        expect(status.status).toBe('Success')
        expect(transport.polls).toEqual([
            { path: STATUS_PATH, jobId: 'job-1' },
            { path: STATUS_PATH, jobId: 'job-1' },
            { path: STATUS_PATH, jobId: 'job-1' }
        ])
        expect(clock.sleeps).toEqual([1000, 1000])
        expect(logger.info).toHaveBeenNthCalledWith(1, 'job job-1 is Running', { elapsedMs: 0 })
        expect(logger.info).toHaveBeenNthCalledWith(2, 'job job-1 is Pending', { elapsedMs: 1000 })
    })

    it('fails with every task failure reason', async () => {
        const transport = new MemoryTransport({
            statuses: [job('Failure', {
                tasks: [
                    { id: 'a', task_type: 'delete', status: 'Failure', dependencies: [], failure_reason: 'locked' },
                    { id: 'b', task_type: 'delete', status: 'Success', dependencies: [] }
                ]
            })]
        })

        await expect(pollJobCompletion(transport, STATUS_PATH, 'job-1', createTestClock())).rejects.toMatchObject({
            code: 'JOB_FAILURE',
            message: 'Job job-1 (batch_delete) failed: locked',
            details: { jobId: 'job-1', jobType: 'batch_delete', reasons: ['locked'] }
        })
    })

    it('times out a job that keeps running', async () => {
        const clock = createTestClock()
        const logger = createTestLogger()
        const transport = new MemoryTransport({
            statuses: [job('Running'), job('Running'), job('Running'), job('Running'), job('Running')]
        })

        await expect(pollJobCompletion(transport, STATUS_PATH, 'job-1', {
            ...clock,
            logger,
            timeoutMs: 2500,
            pollingDelayMs: 1000
        })).rejects.toMatchObject({ code: 'POLLING_TIMEOUT', details: { jobId: 'job-1', timeoutMs: 2500 } })

        expect(transport.polls).toHaveLength(4)
        expect(clock.sleeps).toEqual([1000, 1000, 1000])
        expect(logger.error).toHaveBeenCalledWith('job job-1 timed out', {
            status: 'Running',
            elapsedMs: 3000,
            timeoutMs: 2500
        })
    })
})
