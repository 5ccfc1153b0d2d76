import { assertBatchSize, cyclicDependencyError, oversizedDependencyError } from './errors'
import { makeIndex } from './makeIndex'
import { collapseReplicates } from './replicates'
import { groupAndOrder, sortByPriority } from './TypeGrouper'
import type { Batcher, GraphModel } from './types'

/**
 * Dry-run batching: every cluster holds the full dependency closure of each
 * of its members, so it can be validated without any other cluster.
 *
 * A dependency shared by nodes that cannot share a cluster is repeated in
 * each of their clusters; every other node appears exactly once.
 */
export class BatchByDependency<T extends object> implements Batcher<T> {
    constructor(private readonly model: GraphModel<T>) {}

    batch(nodes: Iterable<T>, batchSize: number): T[][] {
        assertBatchSize(batchSize)

        const model = this.model
        const grouping = {
            typeOf: (node: T) => model.typeOf(node),
            priority: model.priority
        }

        const unique = collapseReplicates(nodes, model)
        const members = new Set(unique)
        const index = makeIndex(unique, node => model.identityKeys(node))

        const resolve = (ref: T | string): T | undefined => {
            if (typeof ref === 'string') return index.get(ref)
            if (members.has(ref)) return ref
            for (const key of model.identityKeys(ref)) {
                const hit = index.get(key)
                if (hit) return hit
            }
            return undefined
        }

        const directDependencies = (node: T): Set<T> => {
            const resolved = new Set<T>()
            for (const ref of model.dependencies(node)) {
                const dep = resolve(ref)
                if (dep) resolved.add(dep)
            }
            return resolved
        }

        const closures = new Map<T, T[]>()
        const visiting = new Set<T>()

        const closureOf = (node: T): T[] => {
            const cached = closures.get(node)
            if (cached) return cached
            if (visiting.has(node)) {
                throw cyclicDependencyError({ node: model.describe(node) })
            }

            visiting.add(node)
            const direct = directDependencies(node)
            if (direct.size + 1 > batchSize) {
                throw oversizedDependencyError({
                    node: model.describe(node),
                    closureSize: direct.size + 1,
                    batchSize
                })
            }

            const full = new Set<T>()
            for (const dep of direct) {
                if (dep === node) throw cyclicDependencyError({ node: model.describe(node) })
                full.add(dep)
                for (const transitive of closureOf(dep)) full.add(transitive)
            }
            visiting.delete(node)

            if (full.size + 1 > batchSize) {
                throw oversizedDependencyError({
                    node: model.describe(node),
                    closureSize: full.size + 1,
                    batchSize
                })
            }

            const sorted = sortByPriority(full, grouping)
            closures.set(node, sorted)
            return sorted
        }

        // Closures and the "supported by" reverse index, dependencies first.
        const typeGroups = groupAndOrder(unique, grouping)
        const supportedBy = new Map<T, T[]>()
        for (const group of typeGroups) {
            for (const node of group) {
                const closure = closureOf(node)
                for (let i = closure.length - 1; i >= 0; i--) {
                    const dependency = closure[i]
                    const dependants = supportedBy.get(dependency)
                    if (dependants) {
                        dependants.push(node)
                    } else {
                        supportedBy.set(dependency, [node])
                    }
                }
            }
        }

        // Seed clusters from the most dependent types.
        const clustered = new Set<T>()
        const clusters: T[][] = []
        for (let g = typeGroups.length - 1; g >= 0; g--) {
            for (const seed of typeGroups[g]) {
                if (clustered.has(seed)) continue

                const seedClosure = closureOf(seed)
                const cluster = new Set<T>([seed, ...seedClosure])
                const queue = seedClosure.slice()

                while (queue.length) {
                    const parent = queue.pop()
                    if (parent === undefined) break
                    const dependants = supportedBy.get(parent) ?? []
                    for (let i = dependants.length - 1; i >= 0; i--) {
                        const candidate = dependants[i]
                        if (clustered.has(candidate) || cluster.has(candidate)) continue

                        const novel = [candidate, ...closureOf(candidate)].filter(x => !cluster.has(x))
                        if (cluster.size + novel.length > batchSize) continue

                        for (const added of novel) {
                            cluster.add(added)
                            queue.push(added)
                        }
                    }
                }

                for (const member of cluster) clustered.add(member)
                clusters.push(sortByPriority(cluster, grouping))
            }
        }

        return clusters
    }
}
