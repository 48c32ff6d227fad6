/**
 * Style Module
 *
 * ansis-backed decoration of level labels for terminal output.
 */
export type { Style, Stylizer } from './styles.js';
export { STYLES, DEFAULT_STYLES, isStyle, applyStyles, stylizeLabel } from './styles.js';
