import { collidingObjectsError } from './errors'
import type { GraphModel } from './types'

/**
 * Drops replicates (the same instance twice, or two nodes sharing an identity
 * key) keeping the first occurrence. Replicates must be value-equal.
 */
export function collapseReplicates<T extends object>(nodes: Iterable<T>, model: GraphModel<T>): T[] {
    const seen = new Set<T>()
    const seenByKey = new Map<string, T>()
    const unique: T[] = []

    for (const node of nodes) {
        if (seen.has(node)) continue

        const keys = model.identityKeys(node)
        let original: T | undefined
        for (const key of keys) {
            const previous = seenByKey.get(key)
            if (!previous) continue
            if (previous !== node && !model.isEqual(previous, node)) {
                throw collidingObjectsError({
                    key,
                    first: model.describe(previous),
                    second: model.describe(node)
                })
            }
            original = original ?? previous
        }

        const owner = original ?? node
        for (const key of keys) {
            if (!seenByKey.has(key)) seenByKey.set(key, owner)
        }
        if (original) continue

        seen.add(node)
        unique.push(node)
    }

    return unique
}
