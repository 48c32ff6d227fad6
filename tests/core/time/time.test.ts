import { describe, it, expect } from 'vitest';

import { DEFAULT_TIMESTAMP_FORMAT, formatTime } from '../../../src/core/time.js';

describe('time: formatTime', () => {

    const instant = new Date('2024-01-15T10:30:45.123Z');

    it('should format in UTC', () => {

        expect(formatTime('utc', DEFAULT_TIMESTAMP_FORMAT, instant)).toBe('2024-01-15 10:30:45');

    });

    it('should support milliseconds and escaped text', () => {

        expect(formatTime('utc', 'HH:mm:ss.SSS', instant)).toBe('10:30:45.123');
        expect(formatTime('utc', '[day] DD', instant)).toBe('day 15');

    });

    it('should format local time from the local clock', () => {

        const local = new Date(2024, 0, 15, 8, 5, 9);

        expect(formatTime('local', DEFAULT_TIMESTAMP_FORMAT, local)).toBe('2024-01-15 08:05:09');

    });

});
