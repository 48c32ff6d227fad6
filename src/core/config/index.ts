/**
 * Config module - logger configuration.
 *
 * Copy-on-write configuration, defaults, validation and
 * environment overrides.
 */

// Types
export type {
    OutputStream,
    BuildMode,
    TerminalConfig,
    FileConfig,
    LoggerConfig,
    LoggerConfigInput,
    ReadonlyLoggerConfig,
    DeepReadonly,
} from './types.js';

// Defaults
export {
    DEFAULT_CONFIG,
    DEFAULT_FORMAT,
    DEFAULT_STRUCTURED_FORMAT,
    createDefaultConfig,
} from './defaults.js';

// Schema & Validation
export {
    LevelSchema,
    TimeZoneSchema,
    OutputStreamSchema,
    BuildModeSchema,
    LoggerConfigInputSchema,
    validateConfigInput,
    mergeConfig,
    parseConfig,
    type LoggerConfigInputSchemaType,
} from './schema.js';

// Environment
export { getEnvConfig, isLoggerDebug } from './env.js';

// Configuration
export { Configuration, type ConfigListener } from './configuration.js';
