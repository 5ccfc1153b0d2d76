import { assertBatchSize } from './errors'
import { collapseReplicates } from './replicates'
import { groupAndOrder } from './TypeGrouper'
import type { Batcher, GraphModel } from './types'

function chunk<T>(items: ReadonlyArray<T>, size: number): T[][] {
    const chunks: T[][] = []
    for (let start = 0; start < items.length; start += size) {
        chunks.push(items.slice(start, start + size))
    }
    return chunks
}

/**
 * Merges each batch into its predecessor when both fit in one batch,
 * scanning from the back. Only neighbours merge, so order is kept.
 */
export function coalesceBatches<T>(batches: T[][], batchSize: number): T[][] {
    const out = batches.slice()
    for (let i = out.length - 2; i >= 0; i--) {
        if (out[i].length + out[i + 1].length > batchSize) continue
        out[i] = out[i].concat(out[i + 1])
        out.splice(i + 1, 1)
    }
    return out
}

/**
 * Write-path batching: batches follow the type priority table, so a batch
 * only references objects of its own or earlier batches.
 */
export class BatchByType<T extends object> implements Batcher<T> {
    constructor(private readonly model: GraphModel<T>) {}

    batch(nodes: Iterable<T>, batchSize: number): T[][] {
        assertBatchSize(batchSize)

        const unique = collapseReplicates(nodes, this.model)
        const typeGroups = groupAndOrder(unique, {
            typeOf: node => this.model.typeOf(node),
            priority: this.model.priority
        })

        const batches: T[][] = []
        for (const group of typeGroups) {
            batches.push(...chunk(group, batchSize))
        }

        return coalesceBatches(batches, batchSize)
    }
}
