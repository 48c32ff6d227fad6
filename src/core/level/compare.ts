/**
 * Level ordering, labels and parsing.
 */
import { ConfigurationError } from '../logger/errors.js';
import { LEVELS, LEVEL_LABELS, LEVEL_PRIORITY, DEBUG_ONLY_LEVELS, type Level } from './types.js';

/**
 * Width of the widest label, used by `paddedLabel`.
 */
const LABEL_WIDTH = Math.max(...Object.values(LEVEL_LABELS).map((label) => label.length));

/**
 * Short names accepted by `parseLevel` in addition to the level names.
 */
const LEVEL_ALIASES: Record<string, Level> = {
    warn: 'warning',
    crit: 'critical',
    diag: 'diagnostic',
};

/**
 * Compare two levels by priority.
 *
 * @returns Negative when `a` is less urgent than `b`, zero when equal, positive otherwise
 *
 * @example
 * ```typescript
 * compareLevels('info', 'error')   // -2
 * ['error', 'trace'].sort(compareLevels)  // ['trace', 'error']
 * ```
 */
export function compareLevels(a: Level, b: Level): number {

    return LEVEL_PRIORITY[a] - LEVEL_PRIORITY[b];

}

/**
 * Check if `level` sits below `threshold`.
 */
export function isBelow(level: Level, threshold: Level): boolean {

    return compareLevels(level, threshold) < 0;

}

/**
 * Display label for a level, e.g. `INFO`.
 */
export function levelLabel(level: Level): string {

    return LEVEL_LABELS[level];

}

/**
 * Display label right-padded to the widest label, for aligned columns.
 */
export function paddedLabel(level: Level): string {

    return LEVEL_LABELS[level].padEnd(LABEL_WIDTH);

}

/**
 * Check if a level only logs in debug builds.
 */
export function isDebugOnly(level: Level): boolean {

    return DEBUG_ONLY_LEVELS.includes(level);

}

/**
 * Type guard for level names.
 */
export function isLevel(value: unknown): value is Level {

    return typeof value === 'string' && LEVELS.some((level) => level === value);

}

/**
 * Parse a level name from user input.
 *
 * Case-insensitive. Accepts `warn`, `crit` and `diag` as aliases.
 *
 * @throws ConfigurationError when the name is not a level
 *
 * @example
 * ```typescript
 * parseLevel('WARN')  // 'warning'
 * parseLevel('info')  // 'info'
 * ```
 */
export function parseLevel(value: string): Level {

    const name = value.trim().toLowerCase();

    if (isLevel(name)) {

        return name;

    }

    const alias = LEVEL_ALIASES[name];

    if (alias) {

        return alias;

    }

    throw new ConfigurationError('level', `Unknown log level: ${value}`);

}
