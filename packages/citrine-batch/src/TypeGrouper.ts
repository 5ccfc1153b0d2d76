import type { TypePriority } from './types'

export type TypeGrouperDeps<T> = {
    typeOf: (node: T) => string
    priority: TypePriority
}

/**
 * Buckets nodes by type tag (insertion order kept inside a bucket) and sorts
 * the buckets by the priority of their tag.
 */
export function groupAndOrder<T>(nodes: Iterable<T>, deps: TypeGrouperDeps<T>): T[][] {
    const byType = new Map<string, T[]>()
    for (const node of nodes) {
        const type = deps.typeOf(node)
        const bucket = byType.get(type)
        if (bucket) {
            bucket.push(node)
            continue
        }
        byType.set(type, [node])
    }

    return Array.from(byType.entries())
        .sort(([a], [b]) => deps.priority(a) - deps.priority(b))
        .map(([, bucket]) => bucket)
}

export function sortByPriority<T>(nodes: Iterable<T>, deps: TypeGrouperDeps<T>): T[] {
    return Array.from(nodes)
        .sort((a, b) => deps.priority(deps.typeOf(a)) - deps.priority(deps.typeOf(b)))
}
