import type { GraphModel, TypePriority } from 'citrine-batch'
import { stableStringify } from 'citrine-shared'
import { shallowDependencies } from './dependencies'
import { identityKeysOf, isLink, linkKey } from './link'
import { writableSortOrder } from './sortOrder'
import type { Entity, Uids } from './types'
import { toWire } from './wire'

export type GemdGraphModelOptions = {
    /** Uids to identify entities by; defaults to `entity.uids`. */
    uidsOf?: (entity: Entity) => Uids
    priority?: TypePriority
}

/**
 * Value equality over the wire form: references compare by link.
 */
export function entitiesEqual(a: Entity, b: Entity, uidsOf: (entity: Entity) => Uids = e => e.uids): boolean {
    if (a === b) return true
    if (a.type !== b.type) return false
    const options = { uidsOf, unidentified: 'describe' } as const
    return stableStringify(toWire(a, options)) === stableStringify(toWire(b, options))
}

export function describeEntity(entity: Entity, uidsOf: (entity: Entity) => Uids = e => e.uids): string {
    const keys = identityKeysOf(uidsOf(entity))
    return keys.length
        ? `${entity.type} "${entity.name}" (${keys[0]})`
        : `${entity.type} "${entity.name}"`
}

export function createGemdGraphModel(options: GemdGraphModelOptions = {}): GraphModel<Entity> {
    const uidsOf = options.uidsOf ?? ((entity: Entity) => entity.uids)

    return {
        priority: options.priority ?? writableSortOrder,
        typeOf: entity => entity.type,
        identityKeys: entity => identityKeysOf(uidsOf(entity)),
        dependencies: entity => shallowDependencies(entity).map(ref => (isLink(ref) ? linkKey(ref) : ref)),
        isEqual: (a, b) => entitiesEqual(a, b, uidsOf),
        describe: entity => describeEntity(entity, uidsOf)
    }
}
