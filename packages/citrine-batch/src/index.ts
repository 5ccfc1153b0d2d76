import { BatchByDependency } from './BatchByDependency'
import { BatchByType } from './BatchByType'
import type { Batcher, BatcherKind, GraphModel } from './types'

export { BatchByType, coalesceBatches } from './BatchByType'
export { BatchByDependency } from './BatchByDependency'
export { groupAndOrder, sortByPriority } from './TypeGrouper'
export type { TypeGrouperDeps } from './TypeGrouper'
export { makeIndex } from './makeIndex'
export { collapseReplicates } from './replicates'
export {
    assertBatchSize,
    collidingObjectsError,
    cyclicDependencyError,
    oversizedDependencyError
} from './errors'
export type { BatchError, BatchErrorCode } from './errors'
export type { Batcher, BatcherKind, GraphModel, TypePriority } from './types'

export function createBatcher<T extends object>(kind: BatcherKind, model: GraphModel<T>): Batcher<T> {
    switch (kind) {
        case 'by_type':
            return new BatchByType(model)
        case 'by_dependency':
            return new BatchByDependency(model)
    }
}
