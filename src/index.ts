/**
 * logwright
 *
 * Configurable level-filtered logger with buffered terminal and file
 * sinks and line-count rollover.
 *
 * @example
 * ```typescript
 * import { getLogger } from 'logwright'
 *
 * const logger = getLogger({ config: { minLevel: 'info' } })
 *
 * logger.log('info', 'app::main', 'Started')
 * ```
 */
export * from './core/index.js'
