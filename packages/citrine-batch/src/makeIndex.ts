/**
 * Identity key -> owning node. The first node to claim a key keeps it.
 */
export function makeIndex<T>(nodes: Iterable<T>, identityKeys: (node: T) => readonly string[]): Map<string, T> {
    const index = new Map<string, T>()
    for (const node of nodes) {
        for (const key of identityKeys(node)) {
            if (!index.has(key)) index.set(key, node)
        }
    }
    return index
}
