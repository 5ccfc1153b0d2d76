import { backReferences, shallowDependencies } from './dependencies'
import { identityKeysOf, isEntity } from './link'
import { writableSortOrder } from './sortOrder'
import type { Entity, Uids } from './types'

export type FlattenOptions = {
    uidsOf?: (entity: Entity) => Uids
}

/**
 * Every entity reachable from `roots` (through references and
 * back-references), each once, in write order. Entities sharing a uid
 * collapse onto the first one found.
 */
export function flatten(roots: Iterable<Entity>, options: FlattenOptions = {}): Entity[] {
    const uidsOf = options.uidsOf ?? (entity => entity.uids)
    const visited = new Set<Entity>()
    const claimed = new Set<string>()
    const found: Entity[] = []

    const stack = Array.from(roots).reverse()
    while (stack.length) {
        const entity = stack.pop()
        if (entity === undefined) break
        if (visited.has(entity)) continue
        visited.add(entity)

        const keys = identityKeysOf(uidsOf(entity))
        if (keys.some(key => claimed.has(key))) continue
        keys.forEach(key => claimed.add(key))
        found.push(entity)

        const next = [...shallowDependencies(entity), ...backReferences(entity)].filter(isEntity)
        for (let i = next.length - 1; i >= 0; i--) {
            if (!visited.has(next[i])) stack.push(next[i])
        }
    }

    return found.sort((a, b) => writableSortOrder(a.type) - writableSortOrder(b.type))
}
