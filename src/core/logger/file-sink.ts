/**
 * File Sink
 *
 * Drains the file queue on every cycle and appends the lines to the
 * configured log file through the shared `LogFile`. While file output
 * is disabled or no path is set the sink idles and queued lines wait.
 *
 * A failed append drops that batch: the dispatcher's contract is
 * best-effort, and the failure is reported as `sink:error`.
 */
import type { Configuration } from '../config/configuration.js'
import type { ReadonlyLoggerConfig } from '../config/types.js'
import type { LoggerObserver } from '../observer.js'
import { resolveLogPath, type LogFile } from './log-file.js'
import { IntervalLoop } from './loop.js'
import type { LineQueue } from './queue.js'


export class FileSink extends IntervalLoop {

    override readonly sink = 'file' as const

    #queue: LineQueue
    #file: LogFile

    constructor(
        config: Configuration,
        observer: LoggerObserver,
        queue: LineQueue,
        file: LogFile,
    ) {

        super(config, observer)

        this.#queue = queue
        this.#file = file
    }

    protected override interval(config: ReadonlyLoggerConfig): number {

        return config.file.flushInterval
    }

    protected override async run(config: ReadonlyLoggerConfig): Promise<void> {

        if (!config.file.enabled || config.file.path === null) {

            return
        }

        const lines = this.#queue.drain()

        if (lines.length === 0) {

            return
        }

        await this.#file.append(resolveLogPath(config.file.path), lines)

        this.observer.emit('sink:flushed', { sink: this.sink, lines: lines.length })
    }
}
