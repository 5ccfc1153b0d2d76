export type IdKind = 'uid' | 'scope'

export type CreateIdArgs = Readonly<{
    kind?: IdKind
    prefix?: string
}>

const DEFAULT_PREFIX_BY_KIND: Readonly<Record<IdKind, string>> = {
    uid: '',
    scope: 'temp'
}

const createRandomFallback = () => `${Date.now().toString(36)}_${Math.random().toString(36).slice(2)}`

function tryRandomUUIDInternal(): string | undefined {
    const cryptoObject: { randomUUID?: () => string } | undefined = globalThis.crypto
    const randomUUID = cryptoObject?.randomUUID
    if (typeof randomUUID !== 'function') return undefined

    try {
        const value = randomUUID.call(cryptoObject)
        if (typeof value === 'string' && value) {
            return value
        }
    } catch {
        // fall through to the non-crypto token
    }

    return undefined
}

function normalizePrefix(prefix: string | undefined, kind: IdKind): string {
    const value = String(prefix ?? DEFAULT_PREFIX_BY_KIND[kind]).trim()
    return value || DEFAULT_PREFIX_BY_KIND[kind]
}

/**
 * A random UUID (v4 when the runtime exposes `crypto.randomUUID`).
 */
export function createUuid(): string {
    const uuid = tryRandomUUIDInternal()
    if (uuid) return uuid
    const hex = createRandomFallback().replace(/[^a-z0-9]/g, '').padEnd(32, '0').slice(0, 32)
    return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`
}

export function createId(args?: CreateIdArgs): string {
    const kind = args?.kind ?? 'uid'
    const prefix = normalizePrefix(args?.prefix, kind)
    const uuid = createUuid()
    return prefix ? `${prefix}_${uuid.replace(/-/g, '')}` : uuid
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i

export function isUuid(value: unknown): value is string {
    return typeof value === 'string' && UUID_PATTERN.test(value)
}
