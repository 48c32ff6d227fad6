/**
 * Level Filter
 *
 * Decides, from one configuration snapshot, whether a call is dropped
 * and otherwise which sinks receive it.
 *
 * Order of checks:
 * 1. `minLevel: 'none'` and the `none` level itself drop everything
 * 2. Release builds drop debug-only levels
 * 3. Unless the level is in `bypass`: below `minLevel` or globally ignored drops
 * 4. Per sink: enabled, not ignored for that sink, and (file) a path is set
 */
import type { ReadonlyLoggerConfig } from '../config/types.js';
import { isBelow, isDebugOnly } from '../level/compare.js';
import type { Level } from '../level/types.js';
import type { SinkRoute } from './types.js';

/**
 * Check if a level passes the global filters.
 *
 * Sink-specific settings are not considered.
 *
 * @example
 * ```typescript
 * shouldLog('info', { ...config, minLevel: 'warning' })  // false
 * shouldLog('error', { ...config, ignore: ['error'] })   // false
 * ```
 */
export function shouldLog(level: Level, config: ReadonlyLoggerConfig): boolean {

    if (level === 'none' || config.minLevel === 'none') {

        return false;

    }

    if (config.buildMode === 'release' && isDebugOnly(level)) {

        return false;

    }

    if (config.bypass.includes(level)) {

        return true;

    }

    return !isBelow(level, config.minLevel) && !config.ignore.includes(level);

}

/**
 * Route a level to sinks.
 *
 * @returns The sinks to write to, or null when the call is dropped
 */
export function routeLevel(level: Level, config: ReadonlyLoggerConfig): SinkRoute | null {

    if (!shouldLog(level, config)) {

        return null;

    }

    const terminal = config.terminal.enabled && !config.terminal.ignore.includes(level);
    const file = config.file.enabled
        && config.file.path !== null
        && !config.file.ignore.includes(level);

    if (!terminal && !file) {

        return null;

    }

    return { terminal, file };

}
