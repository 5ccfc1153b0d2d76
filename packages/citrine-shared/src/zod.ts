import { z } from 'zod/v4'

export { z }

type ZodIssueLike = { path?: ReadonlyArray<PropertyKey>; message?: string }

function formatPath(path: ReadonlyArray<PropertyKey> | undefined): string {
    if (!path || !path.length) return ''
    return path
        .map(seg => (typeof seg === 'number' ? `[${seg}]` : String(seg)))
        .join('.')
        .replace(/\.?\[(\d+)\]/g, '[$1]')
}

function readIssues(error: unknown): ZodIssueLike[] | undefined {
    if (error instanceof z.ZodError) return error.issues
    return undefined
}

export function formatZodErrorMessage(error: unknown, prefix?: string): string {
    const issues = readIssues(error)
    if (!issues?.length) {
        const msg = error instanceof Error ? error.message : String(error)
        return prefix ? `${prefix}${msg}` : msg
    }

    const lines = issues.map(issue => {
        const p = formatPath(issue.path)
        const m = issue.message ? String(issue.message) : 'Invalid input'
        return p ? `${p}: ${m}` : m
    })

    const head = prefix ? `${prefix}validation failed:` : 'validation failed:'
    return `${head}\n- ${lines.join('\n- ')}`
}

export function parseOrThrow<TSchema extends z.ZodType>(
    schema: TSchema,
    value: unknown,
    args?: { prefix?: string }
): z.infer<TSchema> {
    const result = schema.safeParse(value)
    if (result.success) return result.data
    throw new Error(formatZodErrorMessage(result.error, args?.prefix))
}
