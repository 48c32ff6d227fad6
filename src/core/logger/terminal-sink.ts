/**
 * Terminal Sink
 *
 * Drains the terminal queue on every cycle and writes the lines to
 * stdout or stderr, whichever the configuration selects at that moment.
 * The queue is emptied before the write starts, so producers never
 * wait on the stream.
 */
import type { Writable } from 'node:stream';
import { attempt } from '@logosdx/utils';

import type { Configuration } from '../config/configuration.js';
import type { ReadonlyLoggerConfig } from '../config/types.js';
import type { LoggerObserver } from '../observer.js';
import { LogWriteError } from './errors.js';
import { IntervalLoop } from './loop.js';
import { joinLines, type LineQueue } from './queue.js';
import type { TerminalStreams } from './types.js';

/** Errors already handed to a write callback. */
const delivered = new WeakSet<Error>();

/**
 * Write a chunk and resolve once the stream has accepted it.
 */
export function writeChunk(stream: Writable, chunk: string): Promise<void> {

    return new Promise((resolve, reject) => {

        stream.write(chunk, (err) => {

            if (err) {

                delivered.add(err);
                reject(err);
                return;

            }

            resolve();

        });

    });

}

/**
 * Write lines to a terminal stream as one chunk.
 *
 * @throws LogWriteError if the stream rejects the write
 */
export async function writeTerminal(stream: Writable, lines: readonly string[]): Promise<void> {

    const [, err] = await attempt(() => writeChunk(stream, joinLines(lines)));

    if (err) {

        throw new LogWriteError('terminal', err);

    }

}

/**
 * Listen for `'error'` events on a terminal stream.
 *
 * A failed write is reported twice by Node: to the write callback and
 * as an `'error'` event. The callback side already rejects, so only
 * errors no write has seen reach `onError`.
 *
 * @returns Removes the listener
 */
export function guardStream(stream: Writable, onError: (error: Error) => void): () => void {

    const listener = (error: Error): void => {

        if (delivered.has(error)) {

            return;

        }

        onError(error);

    };

    stream.on('error', listener);

    return () => {

        stream.off('error', listener);

    };

}

export class TerminalSink extends IntervalLoop {

    override readonly sink = 'terminal' as const;

    #queue: LineQueue;
    #streams: TerminalStreams;
    #release: (() => void)[];

    constructor(
        config: Configuration,
        observer: LoggerObserver,
        queue: LineQueue,
        streams: TerminalStreams,
    ) {

        super(config, observer);

        this.#queue = queue;
        this.#streams = streams;

        this.#release = [...new Set([streams.stdout, streams.stderr])].map((stream) => guardStream(
            stream,
            (error) => this.observer.emit('sink:error', { sink: this.sink, error: new LogWriteError('terminal', error) }),
        ));

    }

    /**
     * Remove the stream error listeners.
     */
    release(): void {

        for (const remove of this.#release) {

            remove();

        }

        this.#release = [];

    }

    protected override interval(config: ReadonlyLoggerConfig): number {

        return config.terminal.flushInterval;

    }

    protected override async run(config: ReadonlyLoggerConfig): Promise<void> {

        const lines = this.#queue.drain();

        if (lines.length === 0) {

            return;

        }

        await writeTerminal(this.#streams[config.terminal.output], lines);

        this.observer.emit('sink:flushed', { sink: this.sink, lines: lines.length });

    }

}
