import { describe, it, expect } from 'vitest';

import {
    DEFAULT_STYLES,
    STYLES,
    applyStyles,
    isStyle,
    stylizeLabel,
} from '../../../src/core/style/index.js';
import { LEVELS } from '../../../src/core/level/index.js';

describe('style: names', () => {

    it('should recognize supported styles', () => {

        expect(isStyle('bold')).toBe(true);
        expect(isStyle('bgRed')).toBe(true);
        expect(isStyle('sparkle')).toBe(false);
        expect(isStyle('toString')).toBe(false);

    });

    it('should list every supported style', () => {

        expect(STYLES).toContain('red');
        expect(STYLES).toContain('underline');
        expect(STYLES.every(isStyle)).toBe(true);

    });

    it('should seed a style list for every level', () => {

        for (const level of LEVELS) {

            expect(DEFAULT_STYLES[level]).toBeDefined();

        }

        expect(DEFAULT_STYLES.none).toEqual([]);

    });

    it('should freeze the default style table', () => {

        expect(Object.isFrozen(DEFAULT_STYLES)).toBe(true);
        expect(Object.isFrozen(DEFAULT_STYLES.critical)).toBe(true);
        expect(() => Reflect.set(DEFAULT_STYLES, 'info', [])).not.toThrow();
        expect(Reflect.set(DEFAULT_STYLES, 'info', [])).toBe(false);
        expect(DEFAULT_STYLES.info).toEqual(['green']);

    });

});

describe('style: decoration', () => {

    it('should leave text unchanged without styles', () => {

        expect(applyStyles('INFO', [])).toBe('INFO');

    });

    it('should keep the label text inside the decoration', () => {

        const styled = stylizeLabel('error', ['red', 'bold']);

        expect(styled).toContain('ERROR');

    });

    it('should use the level label for an empty style list', () => {

        expect(stylizeLabel('warning', [])).toBe('WARNING');

    });

});
