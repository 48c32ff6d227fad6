/**
 * Level Styles
 *
 * Terminal decoration for level labels. Each level carries a list of
 * style names which are applied in order with ansis. File output
 * never sees these; only the terminal sink substitutes the styled label.
 *
 * @example
 * ```typescript
 * stylizeLabel('error', ['red', 'bold'])
 * // '\x1b[1m\x1b[31mERROR\x1b[39m\x1b[22m' on a color terminal
 * ```
 */
import ansis from 'ansis';

import type { Level } from '../level/types.js';
import { levelLabel } from '../level/compare.js';

/**
 * Text decoration functions keyed by style name.
 */
const STYLE_FNS = {

    // Modifiers
    bold: ansis.bold,
    dim: ansis.dim,
    italic: ansis.italic,
    underline: ansis.underline,
    inverse: ansis.inverse,
    strikethrough: ansis.strikethrough,

    // Foreground
    black: ansis.black,
    red: ansis.red,
    green: ansis.green,
    yellow: ansis.yellow,
    blue: ansis.blue,
    magenta: ansis.magenta,
    cyan: ansis.cyan,
    white: ansis.white,
    gray: ansis.gray,

    // Background
    bgBlack: ansis.bgBlack,
    bgRed: ansis.bgRed,
    bgGreen: ansis.bgGreen,
    bgYellow: ansis.bgYellow,
    bgBlue: ansis.bgBlue,
    bgMagenta: ansis.bgMagenta,
    bgCyan: ansis.bgCyan,
    bgWhite: ansis.bgWhite,

} satisfies Record<string, (text: string) => string>;

/**
 * A single decoration applied to a level label.
 */
export type Style = keyof typeof STYLE_FNS;

/**
 * Every supported style name.
 */
export const STYLES = Object.keys(STYLE_FNS).filter(isStyle);

/**
 * Replaces the label decoration for the terminal sink.
 *
 * Receives the level and its configured style list and returns the
 * text substituted for `{level}`.
 */
export type Stylizer = (level: Level, styles: readonly Style[]) => string;

/**
 * Default style list per level. Frozen; copy before changing.
 */
export const DEFAULT_STYLES: Readonly<Record<Level, readonly Style[]>> = Object.freeze({
    trace: frozen('gray'),
    debug: frozen('blue'),
    info: frozen('green'),
    warning: frozen('yellow'),
    error: frozen('red'),
    critical: frozen('red', 'bold'),
    fatal: frozen('bgRed', 'white', 'bold'),
    diagnostic: frozen('magenta', 'italic'),
    none: frozen(),
});

function frozen(...styles: Style[]): readonly Style[] {

    return Object.freeze(styles);

}

/**
 * Type guard for style names.
 */
export function isStyle(value: string): value is Style {

    return Object.hasOwn(STYLE_FNS, value);

}

/**
 * Apply a style list to text, first style innermost.
 */
export function applyStyles(text: string, styles: readonly Style[]): string {

    return styles.reduce((styled, style) => STYLE_FNS[style](styled), text);

}

/**
 * Default stylizer: the level label decorated with its styles.
 */
export const stylizeLabel: Stylizer = (level, styles) => applyStyles(levelLabel(level), styles);
