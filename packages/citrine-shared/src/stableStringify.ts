export function stableStringify(obj: unknown): string {
    const seen = new WeakSet<object>()

    const helper = (value: unknown): unknown => {
        if (value === null || typeof value !== 'object') return value
        if (seen.has(value)) return undefined
        seen.add(value)

        if (Array.isArray(value)) {
            const items = value.map(v => helper(v))
            seen.delete(value)
            return items
        }

        const entries = Object.entries(value)
            .sort(([a], [b]) => a.localeCompare(b))

        const normalized: Record<string, unknown> = {}
        for (const [k, v] of entries) {
            if (typeof v === 'function') continue
            normalized[k] = helper(v)
        }
        seen.delete(value)
        return normalized
    }

    try {
        const s = JSON.stringify(helper(obj))
        return typeof s === 'string' ? s : ''
    } catch {
        return ''
    }
}
