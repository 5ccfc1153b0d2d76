import { createCodedError } from 'citrine-shared'
import type { CodedError } from 'citrine-shared'

export type BatchErrorCode =
    | 'COLLIDING_OBJECTS'
    | 'OVERSIZED_DEPENDENCY'
    | 'CYCLIC_DEPENDENCY'
    | 'INVALID_BATCH_SIZE'

export type BatchError = CodedError<BatchErrorCode>

export function collidingObjectsError(args: { key: string; first: string; second: string }): BatchError {
    return createCodedError({
        code: 'COLLIDING_OBJECTS',
        message: `Colliding objects for ${args.key}: ${args.first} and ${args.second} share an identity but differ`,
        details: args
    })
}

export function oversizedDependencyError(args: { node: string; closureSize: number; batchSize: number }): BatchError {
    return createCodedError({
        code: 'OVERSIZED_DEPENDENCY',
        message: `Object ${args.node} has more than ${args.batchSize - 1} dependencies `
            + `(${args.closureSize} including itself, batch size ${args.batchSize})`,
        details: args
    })
}

export function cyclicDependencyError(args: { node: string }): BatchError {
    return createCodedError({
        code: 'CYCLIC_DEPENDENCY',
        message: `Object ${args.node} depends on itself through its references`,
        details: args
    })
}

export function assertBatchSize(batchSize: number): void {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
        throw createCodedError({
            code: 'INVALID_BATCH_SIZE',
            message: `batchSize must be a positive integer, got ${batchSize}`,
            details: { batchSize }
        })
    }
}
