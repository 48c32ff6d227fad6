/**
 * Configuration Zod schemas and validation.
 *
 * Validates configuration input from callers and the environment
 * before it is merged over the defaults.
 */
import { z } from 'zod';

import { ConfigurationError } from '../logger/errors.js';
import { isStyle, type Style } from '../style/styles.js';
import type { LoggerConfig, LoggerConfigInput } from './types.js';

// ─────────────────────────────────────────────────────────────
// Base Schemas
// ─────────────────────────────────────────────────────────────

/**
 * Log level.
 */
export const LevelSchema = z.enum([
    'trace',
    'debug',
    'info',
    'warning',
    'error',
    'critical',
    'fatal',
    'diagnostic',
    'none',
]);

/**
 * Label style name.
 */
const StyleSchema = z.custom<Style>(
    (value) => typeof value === 'string' && isStyle(value),
    { message: 'Unknown style' },
);

/**
 * Interval in milliseconds.
 */
const IntervalSchema = z
    .number()
    .int()
    .min(1, 'Interval must be at least 1ms');

/**
 * Clock for timestamps.
 */
export const TimeZoneSchema = z.enum(['local', 'utc']);

/**
 * Terminal stream.
 */
export const OutputStreamSchema = z.enum(['stdout', 'stderr']);

/**
 * Build variant.
 */
export const BuildModeSchema = z.enum(['debug', 'release']);

// ─────────────────────────────────────────────────────────────
// Section Schemas
// ─────────────────────────────────────────────────────────────

const TerminalInputSchema = z.object({
    enabled: z.boolean().optional(),
    output: OutputStreamSchema.optional(),
    ignore: z.array(LevelSchema).optional(),
    flushInterval: IntervalSchema.optional(),
});

const FileInputSchema = z.object({
    enabled: z.boolean().optional(),
    path: z.string().nullable().optional(),
    ignore: z.array(LevelSchema).optional(),
    flushInterval: IntervalSchema.optional(),
    rollover: z.number().int().min(0, 'Rollover must not be negative').optional(),
    rolloverInterval: IntervalSchema.optional(),
});

/**
 * Deep-partial configuration input.
 */
export const LoggerConfigInputSchema = z.object({
    terminal: TerminalInputSchema.optional(),
    file: FileInputSchema.optional(),
    minLevel: LevelSchema.optional(),
    ignore: z.array(LevelSchema).optional(),
    bypass: z.array(LevelSchema).optional(),
    format: z.string().optional(),
    structuredFormat: z.string().optional(),
    timezone: TimeZoneSchema.optional(),
    timestampFormat: z.string().min(1, 'Timestamp format is required').optional(),
    styles: z.record(LevelSchema, z.array(StyleSchema)).optional(),
    buildMode: BuildModeSchema.optional(),
}).strict();

export type LoggerConfigInputSchemaType = z.infer<typeof LoggerConfigInputSchema>;

// ─────────────────────────────────────────────────────────────
// Validation Functions
// ─────────────────────────────────────────────────────────────

/**
 * Validate configuration input.
 *
 * @throws ConfigurationError if validation fails
 *
 * @example
 * ```typescript
 * const [input, err] = attemptSync(() => validateConfigInput(raw))
 * if (err) {
 *     console.error(`Invalid logger config: ${err.message}`)
 * }
 * ```
 */
export function validateConfigInput(input: unknown): LoggerConfigInput {

    const result = LoggerConfigInputSchema.safeParse(input);

    if (!result.success) {

        const firstIssue = result.error.issues[0];

        throw new ConfigurationError(
            firstIssue?.path.join('.') || 'unknown',
            firstIssue?.message ?? 'Validation failed',
            result.error.issues,
        );

    }

    return result.data;

}

/**
 * Apply input over a base configuration, returning a new object.
 *
 * Sections merge field by field; lists replace rather than append.
 * Per-level styles merge by level.
 */
export function mergeConfig(base: LoggerConfig, input: LoggerConfigInput): LoggerConfig {

    const terminal = input.terminal ?? {};
    const file = input.file ?? {};

    return {
        terminal: {
            enabled: terminal.enabled ?? base.terminal.enabled,
            output: terminal.output ?? base.terminal.output,
            ignore: [...(terminal.ignore ?? base.terminal.ignore)],
            flushInterval: terminal.flushInterval ?? base.terminal.flushInterval,
        },
        file: {
            enabled: file.enabled ?? base.file.enabled,
            path: file.path !== undefined ? file.path : base.file.path,
            ignore: [...(file.ignore ?? base.file.ignore)],
            flushInterval: file.flushInterval ?? base.file.flushInterval,
            rollover: file.rollover ?? base.file.rollover,
            rolloverInterval: file.rolloverInterval ?? base.file.rolloverInterval,
        },
        minLevel: input.minLevel ?? base.minLevel,
        ignore: [...(input.ignore ?? base.ignore)],
        bypass: [...(input.bypass ?? base.bypass)],
        format: input.format ?? base.format,
        structuredFormat: input.structuredFormat ?? base.structuredFormat,
        timezone: input.timezone ?? base.timezone,
        timestampFormat: input.timestampFormat ?? base.timestampFormat,
        styles: { ...base.styles, ...input.styles },
        buildMode: input.buildMode ?? base.buildMode,
    };

}

/**
 * Validate input and merge it over a base configuration.
 *
 * @throws ConfigurationError if validation fails
 *
 * @example
 * ```typescript
 * const config = parseConfig({ minLevel: 'warning', file: { enabled: true, path: 'logs/app.log' } }, createDefaultConfig())
 * // config.terminal.enabled === true (default)
 * // config.file.rollover === 0 (default)
 * ```
 */
export function parseConfig(input: unknown, base: LoggerConfig): LoggerConfig {

    return mergeConfig(base, validateConfigInput(input));

}
