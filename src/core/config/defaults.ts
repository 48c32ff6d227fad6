/**
 * Default configuration.
 *
 * Terminal output on stdout, file output off, every level logged,
 * rollover disabled.
 */
import { LEVELS, type Level } from '../level/types.js';
import { DEFAULT_STYLES, type Style } from '../style/styles.js';
import { DEFAULT_TIMESTAMP_FORMAT } from '../time.js';
import type { LoggerConfig, ReadonlyLoggerConfig } from './types.js';

/**
 * Default line template.
 */
export const DEFAULT_FORMAT = '[{timestamp} {module_path}] {level}: {message}';

/**
 * Default per-pair template for structured logging.
 */
export const DEFAULT_STRUCTURED_FORMAT = ' {key}={value}';

/**
 * Create a fresh, mutable copy of the default configuration.
 */
export function createDefaultConfig(): LoggerConfig {

    return {
        terminal: {
            enabled: true,
            output: 'stdout',
            ignore: [],
            flushInterval: 50,
        },
        file: {
            enabled: false,
            path: null,
            ignore: [],
            flushInterval: 100,
            rollover: 0,
            rolloverInterval: 1000,
        },
        minLevel: 'trace',
        ignore: [],
        bypass: ['diagnostic'],
        format: DEFAULT_FORMAT,
        structuredFormat: DEFAULT_STRUCTURED_FORMAT,
        timezone: 'local',
        timestampFormat: DEFAULT_TIMESTAMP_FORMAT,
        styles: copyStyles(DEFAULT_STYLES),
        buildMode: 'debug',
    };

}

/**
 * Default logger configuration, frozen at every depth.
 */
export const DEFAULT_CONFIG: ReadonlyLoggerConfig = freezeConfig(createDefaultConfig());

/**
 * Mutable copy of a style table.
 */
export function copyStyles(
    styles: Readonly<Partial<Record<Level, readonly Style[]>>>,
): Partial<Record<Level, Style[]>> {

    const copy: Partial<Record<Level, Style[]>> = {};

    for (const level of LEVELS) {

        const list = styles[level];

        if (list) {

            copy[level] = [...list];

        }

    }

    return copy;

}

function freezeConfig(config: LoggerConfig): ReadonlyLoggerConfig {

    return Object.freeze({
        ...config,
        terminal: Object.freeze({ ...config.terminal, ignore: Object.freeze(config.terminal.ignore) }),
        file: Object.freeze({ ...config.file, ignore: Object.freeze(config.file.ignore) }),
        ignore: Object.freeze(config.ignore),
        bypass: Object.freeze(config.bypass),
        styles: DEFAULT_STYLES,
    });

}
