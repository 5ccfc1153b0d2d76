import type { GraphModel } from 'citrine-batch'

export type TestNode = {
    id: string
    type: string
    deps: string[]
    value?: string
}

const RANKS: Record<string, number> = { template: 0, spec: 1, run: 2 }

export const node = (id: string, type: string, deps: string[] = [], value?: string): TestNode =>
    ({ id, type, deps, value })

export function createTestModel(): GraphModel<TestNode> {
    return {
        priority: type => RANKS[type] ?? 99,
        typeOf: n => n.type,
        identityKeys: n => [n.id],
        dependencies: n => n.deps,
        isEqual: (a, b) => a.type === b.type && a.value === b.value && a.deps.join() === b.deps.join(),
        describe: n => n.id
    }
}

export const ids = (batches: TestNode[][]) => batches.map(batch => batch.map(n => n.id))

/** t0 <- t1 <- t2 <- s0 <- s1 <- s2 <- r0 <- r1 <- r2 <- r3 */
export function linearChain(): TestNode[] {
    return [
        node('t0', 'template'),
        node('t1', 'template', ['t0']),
        node('t2', 'template', ['t1']),
        node('s0', 'spec', ['t2']),
        node('s1', 'spec', ['s0']),
        node('s2', 'spec', ['s1']),
        node('r0', 'run', ['s2']),
        node('r1', 'run', ['r0']),
        node('r2', 'run', ['r1']),
        node('r3', 'run', ['r2'])
    ]
}
