/**
 * Environment variable configuration.
 *
 * Logger settings can be overridden via LOGWRIGHT_* environment
 * variables, so an embedding application can change verbosity or
 * turn on file output without code changes.
 *
 * @example
 * ```bash
 * LOGWRIGHT_LEVEL=warn
 * LOGWRIGHT_FORMAT="{timestamp} {level} {message}"
 * LOGWRIGHT_TIMEZONE=utc
 * LOGWRIGHT_TIMESTAMP_FORMAT="YYYY-MM-DDTHH:mm:ss.SSS"
 * LOGWRIGHT_TERMINAL=false
 * LOGWRIGHT_TERMINAL_OUTPUT=stderr
 * LOGWRIGHT_FILE=true
 * LOGWRIGHT_FILE_PATH=logs/app.log
 * LOGWRIGHT_ROLLOVER=5000
 * LOGWRIGHT_BUILD=release
 * ```
 *
 * `NODE_ENV=production` implies `LOGWRIGHT_BUILD=release`.
 */
import { z } from 'zod'

import { ConfigurationError } from '../logger/errors.js'
import { parseLevel } from '../level/compare.js'
import { BuildModeSchema, OutputStreamSchema, TimeZoneSchema } from './schema.js'
import type { LoggerConfigInput } from './types.js'


const ENV_PREFIX = 'LOGWRIGHT_'


/**
 * Boolean flag: `true`/`false`/`1`/`0`, case-insensitive.
 */
const FlagSchema = z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(['true', 'false', '1', '0']))
    .transform((value) => value === 'true' || value === '1')


const CountSchema = z.coerce.number().int().min(0)


/**
 * Read logger settings from environment variables.
 *
 * Unset variables are omitted from the result, so it can be merged
 * over any base configuration.
 *
 * @throws ConfigurationError naming the offending variable
 *
 * @example
 * ```typescript
 * // With LOGWRIGHT_LEVEL=error and LOGWRIGHT_TERMINAL_OUTPUT=stderr
 * getEnvConfig()
 * // { minLevel: 'error', terminal: { output: 'stderr' } }
 * ```
 */
export function getEnvConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfigInput {

    const config: LoggerConfigInput = {}
    const terminal: NonNullable<LoggerConfigInput['terminal']> = {}
    const file: NonNullable<LoggerConfigInput['file']> = {}

    const level = readVar(env, 'LEVEL')
    if (level !== undefined) {

        config.minLevel = parseLevel(level)
    }

    const format = readVar(env, 'FORMAT')
    if (format !== undefined) {

        config.format = format
    }

    const timezone = readVar(env, 'TIMEZONE')
    if (timezone !== undefined) {

        config.timezone = parseVar('TIMEZONE', TimeZoneSchema, timezone.toLowerCase())
    }

    const timestampFormat = readVar(env, 'TIMESTAMP_FORMAT')
    if (timestampFormat !== undefined) {

        config.timestampFormat = timestampFormat
    }

    const terminalFlag = readVar(env, 'TERMINAL')
    if (terminalFlag !== undefined) {

        terminal.enabled = parseVar('TERMINAL', FlagSchema, terminalFlag)
    }

    const output = readVar(env, 'TERMINAL_OUTPUT')
    if (output !== undefined) {

        terminal.output = parseVar('TERMINAL_OUTPUT', OutputStreamSchema, output.toLowerCase())
    }

    const fileFlag = readVar(env, 'FILE')
    if (fileFlag !== undefined) {

        file.enabled = parseVar('FILE', FlagSchema, fileFlag)
    }

    const path = readVar(env, 'FILE_PATH')
    if (path !== undefined) {

        file.path = path
    }

    const rollover = readVar(env, 'ROLLOVER')
    if (rollover !== undefined) {

        file.rollover = parseVar('ROLLOVER', CountSchema, rollover)
    }

    const build = readVar(env, 'BUILD')
    if (build !== undefined) {

        config.buildMode = parseVar('BUILD', BuildModeSchema, build.toLowerCase())
    }
    else if (env['NODE_ENV'] === 'production') {

        config.buildMode = 'release'
    }

    if (Object.keys(terminal).length > 0) {

        config.terminal = terminal
    }

    if (Object.keys(file).length > 0) {

        config.file = file
    }

    return config
}


/**
 * Check if the logger's own event tracing is enabled.
 *
 * Returns true if LOGWRIGHT_DEBUG is `1` or `true`.
 */
export function isLoggerDebug(env: NodeJS.ProcessEnv = process.env): boolean {

    const debug = env[`${ENV_PREFIX}DEBUG`]
    return debug === '1' || debug === 'true'
}


/**
 * Read a prefixed variable, treating empty strings as unset.
 */
function readVar(env: NodeJS.ProcessEnv, name: string): string | undefined {

    const value = env[`${ENV_PREFIX}${name}`]

    if (value === undefined || value === '') {

        return undefined
    }

    return value
}


/**
 * Parse a variable's value with a schema.
 *
 * @throws ConfigurationError with the variable name as the field
 */
function parseVar<T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: string): T {

    const result = schema.safeParse(value)

    if (!result.success) {

        throw new ConfigurationError(
            `${ENV_PREFIX}${name}`,
            `Invalid ${ENV_PREFIX}${name}: ${value}`,
            result.error.issues,
        )
    }

    return result.data
}
