/**
 * Configuration Types
 *
 * The full state a logger consults on every call. A `LoggerConfig`
 * is plain data: every published snapshot can be cloned and compared
 * without touching the live logger.
 */
import type { Level } from '../level/types.js';
import type { Style } from '../style/styles.js';
import type { TimeZone } from '../time.js';

/**
 * Terminal stream selector.
 */
export type OutputStream = 'stdout' | 'stderr';

/**
 * Build variant. Release builds drop debug-only levels.
 */
export type BuildMode = 'debug' | 'release';

/**
 * Terminal sink settings.
 */
export interface TerminalConfig {

    /** Write lines to the terminal */
    enabled: boolean;

    /** Stream the terminal sink writes to */
    output: OutputStream;

    /** Levels never written to the terminal */
    ignore: Level[];

    /** Milliseconds between terminal drain cycles */
    flushInterval: number;

}

/**
 * File sink settings.
 */
export interface FileConfig {

    /** Write lines to the log file */
    enabled: boolean;

    /** Log file path; file output is inactive while null */
    path: string | null;

    /** Levels never written to the file */
    ignore: Level[];

    /** Milliseconds between file drain cycles */
    flushInterval: number;

    /** Maximum lines kept by rollover, 0 disables rollover */
    rollover: number;

    /** Milliseconds between rollover checks */
    rolloverInterval: number;

}

/**
 * Complete logger configuration.
 */
export interface LoggerConfig {

    terminal: TerminalConfig;

    file: FileConfig;

    /** Messages below this level are dropped everywhere */
    minLevel: Level;

    /** Levels dropped everywhere regardless of `minLevel` */
    ignore: Level[];

    /** Levels that skip `minLevel` and the global ignore list */
    bypass: Level[];

    /** Line template with `{timestamp}`, `{module_path}`, `{level}`, `{message}` */
    format: string;

    /** Per-pair template with `{key}` and `{value}` */
    structuredFormat: string;

    /** Clock for `{timestamp}` */
    timezone: TimeZone;

    /** dayjs pattern for `{timestamp}` */
    timestampFormat: string;

    /** Terminal decoration for each level's label */
    styles: Partial<Record<Level, Style[]>>;

    /** Release builds drop debug-only levels */
    buildMode: BuildMode;

}

/**
 * Read-only view of a value, nested objects and arrays included.
 */
export type DeepReadonly<T> = T extends (infer U)[]
    ? readonly DeepReadonly<U>[]
    : T extends object
        ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
        : T;

/**
 * A published configuration. Nothing in it may be changed in place.
 */
export type ReadonlyLoggerConfig = DeepReadonly<LoggerConfig>;

/**
 * Deep-partial configuration accepted from callers and the environment.
 */
export interface LoggerConfigInput {

    terminal?: Partial<TerminalConfig>;

    file?: Partial<FileConfig>;

    minLevel?: Level;

    ignore?: Level[];

    bypass?: Level[];

    format?: string;

    structuredFormat?: string;

    timezone?: TimeZone;

    timestampFormat?: string;

    styles?: Partial<Record<Level, Style[]>>;

    buildMode?: BuildMode;

}
