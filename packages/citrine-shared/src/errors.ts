const CITRINE_ERROR_BRAND = Symbol.for('citrine.error')

export class CodedError<TCode extends string = string> extends Error {
    readonly code: TCode
    readonly retryable: boolean
    readonly details?: Readonly<Record<string, unknown>>
    readonly [CITRINE_ERROR_BRAND] = true

    constructor(args: {
        code: TCode
        message: string
        retryable?: boolean
        details?: Readonly<Record<string, unknown>>
        cause?: unknown
    }) {
        super(args.message, args.cause === undefined ? undefined : { cause: args.cause })
        this.name = 'CitrineError'
        this.code = args.code
        this.retryable = args.retryable === true
        if (args.details !== undefined) {
            this.details = args.details
        }
    }
}

export function createCodedError<TCode extends string>(args: {
    code: TCode
    message: string
    retryable?: boolean
    details?: Readonly<Record<string, unknown>>
    cause?: unknown
}): CodedError<TCode> {
    return new CodedError(args)
}

export function isCodedError(value: unknown): value is CodedError {
    if (!value || typeof value !== 'object') return false
    if (CITRINE_ERROR_BRAND in value) return true
    return 'code' in value && typeof value.code === 'string'
        && 'retryable' in value && typeof value.retryable === 'boolean'
        && 'message' in value && typeof value.message === 'string'
}
