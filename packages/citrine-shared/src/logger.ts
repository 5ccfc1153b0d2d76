export type LogMeta = Record<string, unknown>

/**
 * Structural logger. Every method is optional so that pino, winston or the
 * console can be passed as-is.
 */
export type Logger = {
    child?: (bindings: LogMeta) => Logger
    debug?: (msg: string, meta?: LogMeta) => void
    info?: (msg: string, meta?: LogMeta) => void
    warn?: (msg: string, meta?: LogMeta) => void
    error?: (msg: string, meta?: LogMeta) => void
}

export function createNoopLogger(): Logger {
    return {}
}

export function childLogger(logger: Logger, bindings: LogMeta): Logger {
    return logger.child ? logger.child(bindings) : logger
}
