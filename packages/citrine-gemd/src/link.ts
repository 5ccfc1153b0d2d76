import type { Entity, LinkByUID, Reference, Uids } from './types'

/** Scope of the identifiers assigned by the platform. */
export const CITRINE_SCOPE = 'id'

const KEY_SEPARATOR = '::'

export function createLink(scope: string, id: string): LinkByUID {
    return Object.freeze({ type: 'link_by_uid', scope, id })
}

export function isLink(value: unknown): value is LinkByUID {
    if (!value || typeof value !== 'object') return false
    return 'type' in value && value.type === 'link_by_uid'
        && 'scope' in value && typeof value.scope === 'string'
        && 'id' in value && typeof value.id === 'string'
}

export function identityKey(scope: string, id: string): string {
    return `${scope}${KEY_SEPARATOR}${id}`
}

export function linkKey(link: LinkByUID): string {
    return identityKey(link.scope, link.id)
}

export function identityKeysOf(uids: Uids): string[] {
    return Object.entries(uids).map(([scope, id]) => identityKey(scope, id))
}

/**
 * Link for an entity, preferring the platform scope, then the first uid.
 */
export function linkFor(uids: Uids, preferredScope: string = CITRINE_SCOPE): LinkByUID | undefined {
    const preferred = uids[preferredScope]
    if (preferred !== undefined) return createLink(preferredScope, preferred)
    const first = Object.entries(uids)[0]
    return first ? createLink(first[0], first[1]) : undefined
}

export function isEntity(ref: Reference): ref is Entity {
    return !isLink(ref)
}
