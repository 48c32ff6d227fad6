/**
 * Level Types
 *
 * Severity levels for log calls. Levels are string literals with a
 * separate priority table so they read well in configuration and
 * still sort in a fixed order.
 */

/**
 * Log severity level.
 *
 * - trace: Very low priority tracing
 * - debug: Debugging output (debug builds only)
 * - info: Informational messages
 * - warning: Something unexpected but recoverable
 * - error: An operation failed
 * - critical: A component failed and needs attention
 * - fatal: The application cannot continue
 * - diagnostic: Debug-build diagnostics that bypass filtering
 * - none: Sentinel, used as a minimum level to suppress everything
 */
export type Level =
    | 'trace'
    | 'debug'
    | 'info'
    | 'warning'
    | 'error'
    | 'critical'
    | 'fatal'
    | 'diagnostic'
    | 'none';

/**
 * All levels in ascending priority order.
 */
export const LEVELS: readonly Level[] = [
    'trace',
    'debug',
    'info',
    'warning',
    'error',
    'critical',
    'fatal',
    'diagnostic',
    'none',
] as const;

/**
 * Numeric priority for levels.
 * Higher numbers = more urgent.
 */
export const LEVEL_PRIORITY: Record<Level, number> = {
    trace: 0,
    debug: 1,
    info: 2,
    warning: 3,
    error: 4,
    critical: 5,
    fatal: 6,
    diagnostic: 7,
    none: 8,
};

/**
 * Display labels substituted for `{level}`.
 */
export const LEVEL_LABELS: Record<Level, string> = {
    trace: 'TRACE',
    debug: 'DEBUG',
    info: 'INFO',
    warning: 'WARNING',
    error: 'ERROR',
    critical: 'CRITICAL',
    fatal: 'FATAL',
    diagnostic: 'DIAGNOSTIC',
    none: 'NONE',
};

/**
 * Levels whose calls only take effect in debug builds.
 */
export const DEBUG_ONLY_LEVELS: readonly Level[] = ['debug', 'diagnostic'];
