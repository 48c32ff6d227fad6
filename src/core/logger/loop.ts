/**
 * Interval Loop
 *
 * Base for the three background loops (terminal sink, file sink,
 * rollover). A loop runs one cycle, then sleeps for an interval read
 * from the configuration at that moment, then runs again. Interval
 * changes therefore take effect after the current sleep.
 *
 * Cycles never overlap: `cycle()` queues behind any cycle in flight,
 * so a manual flush and a timer tick serialize. Failures are reported
 * as `sink:error` and the loop keeps going.
 *
 * Timers are unref'd; a running logger never holds the process open.
 */
import { attempt } from '@logosdx/utils';

import type { Configuration } from '../config/configuration.js';
import type { ReadonlyLoggerConfig } from '../config/types.js';
import type { LoggerObserver, SinkName } from '../observer.js';

export abstract class IntervalLoop {

    protected readonly config: Configuration;
    protected readonly observer: LoggerObserver;

    #timer: ReturnType<typeof setTimeout> | null = null;
    #inflight: Promise<void> = Promise.resolve();
    #running = false;
    #cycles = 0;

    constructor(config: Configuration, observer: LoggerObserver) {

        this.config = config;
        this.observer = observer;

    }

    /**
     * Name used in emitted events.
     */
    abstract readonly sink: SinkName;

    /**
     * Milliseconds to sleep between cycles.
     */
    protected abstract interval(config: ReadonlyLoggerConfig): number;

    /**
     * One cycle of work against the current configuration.
     */
    protected abstract run(config: ReadonlyLoggerConfig): Promise<void>;

    /**
     * Check if the timer is armed.
     */
    get isRunning(): boolean {

        return this.#running;

    }

    /**
     * Number of completed cycles.
     */
    get cycles(): number {

        return this.#cycles;

    }

    /**
     * Start cycling. Idempotent.
     */
    start(): void {

        if (this.#running) {

            return;

        }

        this.#running = true;
        this.#schedule();

    }

    /**
     * Stop cycling and wait for the cycle in flight. Idempotent.
     */
    async stop(): Promise<void> {

        this.#running = false;

        if (this.#timer) {

            clearTimeout(this.#timer);
            this.#timer = null;

        }

        await this.#inflight;

    }

    /**
     * Run one cycle now, after any cycle already in flight.
     *
     * Failures are emitted as `sink:error`. The returned promise
     * rejects only when a `sink:error` listener throws; later cycles
     * still run.
     */
    cycle(): Promise<void> {

        const next = this.#inflight.then(() => this.#guarded());

        this.#inflight = next.then(
            () => undefined,
            () => undefined,
        );

        return next;

    }

    async #guarded(): Promise<void> {

        const [, err] = await attempt(() => this.run(this.config.current));

        this.#cycles++;

        if (err) {

            this.observer.emit('sink:error', { sink: this.sink, error: err });

        }

    }

    #schedule(): void {

        if (!this.#running) {

            return;

        }

        this.#timer = setTimeout(() => {

            this.#timer = null;

            void this.cycle()
                .catch((err: unknown) => {

                    // nobody awaits a timer cycle
                    process.emitWarning(err instanceof Error ? err : String(err));

                })
                .finally(() => this.#schedule());

        }, this.interval(this.config.current));

        this.#timer.unref();

    }

}
