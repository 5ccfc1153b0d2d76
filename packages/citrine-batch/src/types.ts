/**
 * Rank of a type tag in write order. Lower ranks are written first.
 */
export type TypePriority = (type: string) => number

/**
 * What the batchers need to know about a graph node.
 *
 * Identity keys are opaque strings; two nodes sharing any key are the same
 * logical entity. Dependencies may be returned as nodes or as identity keys.
 */
export interface GraphModel<T extends object> {
    typeOf(node: T): string
    identityKeys(node: T): readonly string[]
    dependencies(node: T): Iterable<T | string>
    isEqual(a: T, b: T): boolean
    describe(node: T): string
    readonly priority: TypePriority
}

export interface Batcher<T extends object> {
    batch(nodes: Iterable<T>, batchSize: number): T[][]
}

export type BatcherKind = 'by_type' | 'by_dependency'
