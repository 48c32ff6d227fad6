/**
 * Level Module
 *
 * Ordered severity levels with display labels.
 */
export type { Level } from './types.js';
export { LEVELS, LEVEL_PRIORITY, LEVEL_LABELS, DEBUG_ONLY_LEVELS } from './types.js';
export {
    compareLevels,
    isBelow,
    levelLabel,
    paddedLabel,
    isDebugOnly,
    isLevel,
    parseLevel,
} from './compare.js';
