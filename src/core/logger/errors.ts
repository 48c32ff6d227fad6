/**
 * Logger errors.
 *
 * Background sinks never throw; these surface from `resultLog`,
 * `setFilePath` and configuration parsing, where a caller is
 * waiting on the outcome.
 */
import type { ZodIssue } from 'zod'


/**
 * Base class for every error raised by the logger.
 *
 * @example
 * ```typescript
 * const [, err] = await attempt(() => logger.resultLog('error', 'app::db', 'Query failed'))
 * if (err instanceof LoggerError) {
 *     console.error(`Could not log: ${err.message}`)
 * }
 * ```
 */
export class LoggerError extends Error {

    override readonly name: string = 'LoggerError'

}


/**
 * Error when the logger cannot be used.
 *
 * Raised when logging through a stopped logger.
 */
export class LoggerAccessError extends LoggerError {

    override readonly name = 'LoggerAccessError' as const

    constructor(public readonly reason: string) {

        super(`Failed to access logger: ${reason}`)
    }
}


/**
 * Error when the log file or its directory cannot be created or opened.
 *
 * @example
 * ```typescript
 * const [, err] = await attempt(() => logger.setFilePath('/root/forbidden/app.log'))
 * if (err instanceof FileAccessError) {
 *     console.log(`Cannot log to ${err.filepath}`)
 * }
 * ```
 */
export class FileAccessError extends LoggerError {

    override readonly name = 'FileAccessError' as const

    constructor(
        public readonly filepath: string,
        public readonly error: Error,
    ) {

        super(`Failed to access file ${filepath}: ${error.message}`, { cause: error })
    }
}


/**
 * Error when writing a line to a sink fails.
 */
export class LogWriteError extends LoggerError {

    override readonly name = 'LogWriteError' as const

    constructor(
        public readonly sink: 'terminal' | 'file',
        public readonly error: Error,
    ) {

        super(`I/O error writing to ${sink}: ${error.message}`, { cause: error })
    }
}


/**
 * Error for invalid configuration values or missing per-level entries.
 *
 * Carries every zod issue when raised by schema validation.
 */
export class ConfigurationError extends LoggerError {

    override readonly name = 'ConfigurationError' as const

    constructor(
        public readonly field: string,
        message: string,
        public readonly issues: ZodIssue[] = [],
    ) {

        super(message)
    }
}
