/**
 * Timestamp formatting for `{timestamp}`.
 *
 * Patterns use dayjs tokens (`YYYY-MM-DD HH:mm:ss.SSS`). Square
 * brackets escape literal text, e.g. `[at] HH:mm`.
 */
import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';

dayjs.extend(utc);

/**
 * Clock used for timestamps.
 */
export type TimeZone = 'local' | 'utc';

/**
 * Default timestamp pattern.
 */
export const DEFAULT_TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';

/**
 * Format a point in time in the given zone.
 *
 * @example
 * ```typescript
 * formatTime('utc', 'YYYY-MM-DD HH:mm:ss', new Date('2024-01-15T10:30:00Z'))
 * // '2024-01-15 10:30:00'
 * ```
 */
export function formatTime(timezone: TimeZone, pattern: string, date: Date = new Date()): string {

    const instant = timezone === 'utc' ? dayjs(date).utc() : dayjs(date);

    return instant.format(pattern);

}
