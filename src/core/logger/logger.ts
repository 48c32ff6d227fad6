/**
 * Logger
 *
 * The dispatcher every logging call goes through. A call reads the
 * published configuration, filters, renders the line once, and pushes
 * the sink-specific variants onto the terminal and file queues. The
 * call itself never touches a stream or the disk; three background
 * loops drain the queues and keep the file bounded.
 *
 * `resultLog` is the exception: it writes synchronously from the
 * caller's point of view and rejects with a typed error, for callers
 * that need to know the line landed.
 *
 * @example
 * ```typescript
 * const logger = new Logger({
 *     config: {
 *         minLevel: 'info',
 *         file: { enabled: true, rollover: 10_000 },
 *     },
 * })
 *
 * await logger.setFilePath('logs/app.log')
 *
 * logger.log('info', 'app::server', 'Listening on :8080')
 * logger.structuredLog('warning', 'app::db', 'Slow query', { ms: 812, table: 'users' })
 *
 * const [, err] = await attempt(() => logger.resultLog('error', 'app::db', 'Connection lost'))
 * if (err) {
 *     // the line did not reach its sinks
 * }
 *
 * await logger.stop()
 * ```
 */
import { Configuration } from '../config/configuration.js';
import { getEnvConfig } from '../config/env.js';
import type { LoggerConfigInput, ReadonlyLoggerConfig } from '../config/types.js';
import {
    applyLevel,
    renderBase,
    renderStructuredBase,
    type LineFields,
    type LogPairs,
} from '../format/formatter.js';
import { levelLabel } from '../level/compare.js';
import type { Level } from '../level/types.js';
import { createObserver, type LoggerObserver } from '../observer.js';
import { stylizeLabel, type Stylizer } from '../style/styles.js';
import { formatTime } from '../time.js';
import { LoggerAccessError } from './errors.js';
import { routeLevel } from './filter.js';
import { FileSink } from './file-sink.js';
import { LogFile, resolveLogPath } from './log-file.js';
import { LineQueue } from './queue.js';
import { RolloverLoop } from './rollover.js';
import { TerminalSink, writeTerminal } from './terminal-sink.js';
import type { LoggerState, SinkRoute, TerminalStreams } from './types.js';

/**
 * Options for Logger construction.
 */
export interface LoggerOptions {

    /** Name used for the observer and lifecycle events */
    name?: string;

    /** Configuration applied over defaults and environment */
    config?: LoggerConfigInput;

    /** Share an existing configuration instead of creating one */
    configuration?: Configuration;

    /** Environment to read LOGWRIGHT_* overrides from; false to skip */
    env?: NodeJS.ProcessEnv | false;

    /** Terminal streams (default: process.stdout / process.stderr) */
    streams?: Partial<TerminalStreams>;

    /** Replaces the ansis label decoration on the terminal */
    stylize?: Stylizer;

    /** Clock for `{timestamp}` */
    clock?: () => Date;

    /** Start the background loops on construction (default: true) */
    autoStart?: boolean;

}

/**
 * Level-filtering logger with queued terminal and file sinks.
 */
export class Logger {

    #name: string;
    #config: Configuration;
    #observer: LoggerObserver;
    #state: LoggerState = 'idle';

    #terminalQueue = new LineQueue();
    #fileQueue = new LineQueue();
    #file: LogFile;
    #streams: TerminalStreams;

    #terminalSink: TerminalSink;
    #fileSink: FileSink;
    #rollover: RolloverLoop;

    #stylize: Stylizer;
    #clock: () => Date;

    constructor(options: LoggerOptions = {}) {

        this.#name = options.name ?? 'logwright';
        this.#config = options.configuration ?? createConfiguration(options);
        this.#observer = createObserver(this.#name);
        this.#stylize = options.stylize ?? stylizeLabel;
        this.#clock = options.clock ?? (() => new Date());

        this.#streams = {
            stdout: options.streams?.stdout ?? process.stdout,
            stderr: options.streams?.stderr ?? process.stderr,
        };

        this.#file = new LogFile(this.#observer);
        this.#terminalSink = new TerminalSink(this.#config, this.#observer, this.#terminalQueue, this.#streams);
        this.#fileSink = new FileSink(this.#config, this.#observer, this.#fileQueue, this.#file);
        this.#rollover = new RolloverLoop(this.#config, this.#observer, this.#file);

        if (options.autoStart ?? true) {

            this.start();

        }

    }

    /**
     * Logger name.
     */
    get name(): string {

        return this.#name;

    }

    /**
     * Get the current logger state.
     */
    get state(): LoggerState {

        return this.#state;

    }

    /**
     * The shared configuration. Changes apply to the next call and to
     * each loop's next cycle.
     */
    get config(): Configuration {

        return this.#config;

    }

    /**
     * Events from the sinks and the log file.
     */
    get observer(): LoggerObserver {

        return this.#observer;

    }

    /**
     * True while a rollover is rewriting the log file.
     */
    get isRolling(): boolean {

        return this.#rollover.isRolling;

    }

    /**
     * Lines queued and not yet written, per sink.
     */
    get pending(): { terminal: number; file: number } {

        return {
            terminal: this.#terminalQueue.size,
            file: this.#fileQueue.size,
        };

    }

    /**
     * Path of the open log file, or null.
     */
    get filepath(): string | null {

        return this.#file.filepath;

    }

    /**
     * Start the terminal, file and rollover loops.
     */
    start(): void {

        if (this.#state !== 'idle') {

            return;

        }

        this.#terminalSink.start();
        this.#fileSink.start();
        this.#rollover.start();

        this.#state = 'running';

        this.#observer.emit('logger:started', { name: this.#name });

    }

    /**
     * Drain both queues now and wait for the writes.
     */
    async flush(): Promise<void> {

        await Promise.all([
            this.#terminalSink.cycle(),
            this.#fileSink.cycle(),
        ]);

    }

    /**
     * Run one rollover check now and wait for it.
     */
    async rollover(): Promise<void> {

        await this.#rollover.cycle();

    }

    /**
     * Stop the loops, flush pending lines and close the log file.
     *
     * Calls made after this are dropped (`resultLog` rejects).
     */
    async stop(): Promise<void> {

        if (this.#state === 'stopped') {

            return;

        }

        this.#state = 'stopped';

        await Promise.all([
            this.#terminalSink.stop(),
            this.#fileSink.stop(),
            this.#rollover.stop(),
        ]);

        await this.flush();
        await this.#file.close();

        this.#terminalSink.release();

        this.#observer.emit('logger:stopped', { name: this.#name });

    }

    /**
     * Set the log file path, create its directories and open it.
     *
     * The path is published before the file is opened, so on failure
     * the sinks keep trying (and dropping) until the path is changed.
     *
     * @throws FileAccessError if the directory or file cannot be created
     *
     * @example
     * ```typescript
     * const [, err] = await attempt(() => logger.setFilePath('logs/app.log'))
     * if (err) {
     *     console.error(`File logging unavailable: ${err.message}`)
     * }
     * ```
     */
    async setFilePath(path: string): Promise<void> {

        this.#config.setFilePath(path);

        await this.#file.open(resolveLogPath(path));

    }

    /**
     * Log a message. Never blocks and never throws for I/O.
     *
     * @param level - Severity
     * @param callSite - Origin of the call, substituted for `{module_path}`
     * @param message - Resolved message text
     */
    log(level: Level, callSite: string, message: string): void {

        if (this.#state === 'stopped') {

            return;

        }

        const config = this.#config.current;
        const route = routeLevel(level, config);

        if (!route) {

            return;

        }

        const base = renderBase(config.format, this.#fields(config, callSite, message));

        this.#enqueue(level, config, route, base);

    }

    /**
     * Log a message followed by key/value pairs rendered with
     * `structuredFormat`.
     *
     * Pairs appear in the container's iteration order.
     */
    structuredLog(level: Level, callSite: string, message: string, pairs: LogPairs): void {

        if (this.#state === 'stopped') {

            return;

        }

        const config = this.#config.current;
        const route = routeLevel(level, config);

        if (!route) {

            return;

        }

        const base = renderStructuredBase(
            config.format,
            this.#fields(config, callSite, message),
            pairs,
            config.structuredFormat,
        );

        this.#enqueue(level, config, route, base);

    }

    /**
     * Log a message, writing it before the promise resolves.
     *
     * Bypasses the queues: the file line is appended under the file
     * lock and the terminal line is written directly. Resolves without
     * writing when the level is filtered out.
     *
     * @throws LoggerAccessError if the logger has been stopped
     * @throws FileAccessError if the log file cannot be created or opened
     * @throws LogWriteError if a write fails
     */
    async resultLog(level: Level, callSite: string, message: string): Promise<void> {

        if (this.#state === 'stopped') {

            throw new LoggerAccessError(`logger '${this.#name}' has been stopped`);

        }

        const config = this.#config.current;
        const route = routeLevel(level, config);

        if (!route) {

            return;

        }

        const base = renderBase(config.format, this.#fields(config, callSite, message));

        if (route.file && config.file.path !== null) {

            await this.#file.append(resolveLogPath(config.file.path), [applyLevel(base, levelLabel(level))]);

        }

        if (route.terminal) {

            const line = applyLevel(base, this.#styledLabel(level, config));

            await writeTerminal(this.#streams[config.terminal.output], [line]);

        }

    }

    #fields(config: ReadonlyLoggerConfig, callSite: string, message: string): LineFields {

        return {
            timestamp: formatTime(config.timezone, config.timestampFormat, this.#clock()),
            modulePath: callSite,
            message,
        };

    }

    #styledLabel(level: Level, config: ReadonlyLoggerConfig): string {

        return this.#stylize(level, config.styles[level] ?? []);

    }

    #enqueue(level: Level, config: ReadonlyLoggerConfig, route: SinkRoute, base: string): void {

        if (route.terminal) {

            this.#terminalQueue.push(applyLevel(base, this.#styledLabel(level, config)));

        }

        if (route.file) {

            this.#fileQueue.push(applyLevel(base, levelLabel(level)));

        }

    }

}

/**
 * Build a configuration from defaults, environment and explicit input.
 *
 * Priority (highest last): defaults, LOGWRIGHT_* environment, `options.config`.
 */
function createConfiguration(options: LoggerOptions): Configuration {

    const configuration = new Configuration();

    if (options.env !== false) {

        configuration.apply(getEnvConfig(options.env ?? process.env));

    }

    if (options.config) {

        configuration.apply(options.config);

    }

    return configuration;

}

// ─────────────────────────────────────────────────────────────
// Singleton / Factory
// ─────────────────────────────────────────────────────────────

let loggerInstance: Logger | null = null;

/**
 * Get or create the process-wide Logger.
 *
 * Options are only used when the instance is created.
 *
 * @param options - Logger options
 * @returns Logger instance
 */
export function getLogger(options?: LoggerOptions): Logger {

    if (!loggerInstance) {

        loggerInstance = new Logger(options);

    }

    return loggerInstance;

}

/**
 * Stop and forget the process-wide Logger.
 *
 * Useful for testing to ensure clean state between tests.
 */
export async function resetLogger(): Promise<void> {

    if (loggerInstance) {

        const logger = loggerInstance;

        loggerInstance = null;

        await logger.stop();

    }

}
