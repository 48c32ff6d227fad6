/**
 * Log Rollover
 *
 * Keeps the log file bounded by line count. On each cycle the rollover
 * loop reads the file under the file lock; when it holds more lines
 * than the configured threshold, the file is truncated and only the
 * newest `threshold` lines are written back, oldest first.
 *
 * The whole read-truncate-rewrite happens under the same lock the file
 * sink appends through, so no line is written mid-rewrite and queued
 * lines simply land after the retained tail.
 */
import { readFile } from 'node:fs/promises'
import { attempt } from '@logosdx/utils'

import type { Configuration } from '../config/configuration.js'
import type { ReadonlyLoggerConfig } from '../config/types.js'
import type { LoggerObserver } from '../observer.js'
import { FileAccessError, LogWriteError } from './errors.js'
import { resolveLogPath, type LogFile } from './log-file.js'
import { IntervalLoop } from './loop.js'
import { joinLines } from './queue.js'


/**
 * Outcome of one rollover check.
 */
export interface RolloverResult {

    /** Whether the file was rewritten */
    rolled: boolean

    /** Lines in the file before the check */
    lines: number

    /** Lines removed from the head of the file */
    dropped: number
}


/**
 * Split file content into lines.
 *
 * A trailing newline does not produce an empty last line.
 *
 * @example
 * ```typescript
 * splitLines('a\nb\n')  // ['a', 'b']
 * splitLines('a\nb')    // ['a', 'b']
 * splitLines('')        // []
 * ```
 */
export function splitLines(content: string): string[] {

    if (content === '') {

        return []
    }

    const lines = content.split('\n')

    if (lines[lines.length - 1] === '') {

        lines.pop()
    }

    return lines
}


/**
 * The newest `max` lines, oldest first.
 *
 * @example
 * ```typescript
 * keepTail(['1', '2', '3', '4'], 2)  // ['3', '4']
 * keepTail(['1', '2'], 5)            // ['1', '2']
 * ```
 */
export function keepTail(lines: readonly string[], max: number): string[] {

    if (max <= 0) {

        return []
    }

    return lines.slice(-max)
}


export class RolloverLoop extends IntervalLoop {

    override readonly sink = 'rollover' as const

    #file: LogFile
    #rolling = false

    constructor(config: Configuration, observer: LoggerObserver, file: LogFile) {

        super(config, observer)

        this.#file = file
    }


    /**
     * True from the moment truncation starts until the tail is rewritten.
     */
    get isRolling(): boolean {

        return this.#rolling
    }


    /**
     * Check the file at `filepath` and roll it if it exceeds `max` lines.
     *
     * @throws FileAccessError if the file cannot be opened or read
     * @throws LogWriteError if truncating or rewriting fails
     */
    roll(filepath: string, max: number): Promise<RolloverResult> {

        return this.#file.exclusive(filepath, async (handle) => {

            const [content, readErr] = await attempt(() => readFile(filepath, 'utf-8'))

            if (readErr) {

                throw new FileAccessError(filepath, readErr)
            }

            const lines = splitLines(content)

            if (lines.length <= max) {

                return { rolled: false, lines: lines.length, dropped: 0 }
            }

            const tail = keepTail(lines, max)

            this.#rolling = true
            this.observer.emit('rollover:start', { file: filepath, lines: lines.length, keep: max })

            try {

                const [, truncateErr] = await attempt(() => handle.truncate(0))

                if (truncateErr) {

                    throw new LogWriteError('file', truncateErr)
                }

                const [, writeErr] = await attempt(() => handle.write(joinLines(tail)))

                if (writeErr) {

                    throw new LogWriteError('file', writeErr)
                }
            }
            finally {

                this.#rolling = false
            }

            const dropped = lines.length - tail.length

            this.observer.emit('rollover:complete', { file: filepath, kept: tail.length, dropped })

            return { rolled: true, lines: lines.length, dropped }
        })
    }


    protected override interval(config: ReadonlyLoggerConfig): number {

        return config.file.rolloverInterval
    }


    protected override async run(config: ReadonlyLoggerConfig): Promise<void> {

        const { enabled, path, rollover } = config.file

        if (rollover === 0 || !enabled || path === null) {

            return
        }

        await this.roll(resolveLogPath(path), rollover)
    }
}
