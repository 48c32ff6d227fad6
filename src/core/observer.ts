/**
 * Logger event system.
 *
 * Each logger owns an observer so embedding code (and tests) can watch
 * what the background sinks are doing without polling. Sinks never
 * throw; their failures arrive here as `sink:error`.
 *
 * @example
 * ```typescript
 * const logger = new Logger()
 *
 * const cleanup = logger.observer.on('sink:error', ({ sink, error }) => {
 *     process.stderr.write(`${sink} sink failed: ${error.message}\n`)
 * })
 *
 * logger.observer.on('rollover:complete', ({ file, dropped }) => {
 *     console.log(`Dropped ${dropped} old lines from ${file}`)
 * })
 *
 * // Clean up when done
 * cleanup()
 * ```
 */
import {
    ObserverEngine,
} from '@logosdx/observer'

import { isLoggerDebug } from './config/env.js'


/**
 * Background loop identifiers.
 */
export type SinkName = 'terminal' | 'file' | 'rollover'


/**
 * All events emitted by a logger.
 *
 * - `logger:*` - Lifecycle
 * - `file:*` - Log file handle
 * - `sink:*` - Terminal and file drain cycles
 * - `rollover:*` - Line-count rollover
 */
export interface LoggerEvents {

    // Lifecycle
    'logger:started': { name: string }
    'logger:stopped': { name: string }

    // File handle
    'file:opened': { file: string }
    'file:closed': { file: string }

    // Sinks
    'sink:flushed': { sink: SinkName; lines: number }
    'sink:error': { sink: SinkName; error: Error }

    // Rollover
    'rollover:start': { file: string; lines: number; keep: number }
    'rollover:complete': { file: string; kept: number; dropped: number }
}


export type LoggerObserver = ObserverEngine<LoggerEvents>


/**
 * Create the observer for a logger.
 *
 * Enable tracing with `LOGWRIGHT_DEBUG=1` to see every event on stderr.
 */
export function createObserver(name: string, debug: boolean = isLoggerDebug()): LoggerObserver {

    return new ObserverEngine<LoggerEvents>({
        name,
        spy: debug
            ? (action) => console.error(`[${name}:${action.fn}] ${String(action.event)}`)
            : undefined
    })
}
