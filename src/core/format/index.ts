/**
 * Format Module
 *
 * Template rendering for log lines.
 */
export type { LineFields, PairValue, LogPairs } from './formatter.js'
export {
    replaceToken,
    renderBase,
    applyLevel,
    formatLine,
    renderPairs,
    renderStructuredBase,
    formatStructured,
} from './formatter.js'
