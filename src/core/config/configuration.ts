/**
 * Configuration
 *
 * The shared, hot-swappable configuration every logging call and sink
 * loop reads. State is copy-on-write: each setter builds a new config
 * from the current one and publishes it in a single assignment, so a
 * reader holding `current` always sees a whole snapshot and never a
 * half-applied change.
 *
 * Setters are chainable. Several changes that must become visible
 * together go through `update()`, which applies them to a local draft
 * and publishes once.
 *
 * @example
 * ```typescript
 * const config = new Configuration()
 *
 * config
 *     .setMinLevel('info')
 *     .setTerminalOutput('stderr')
 *     .addGlobalIgnore('warning')
 *
 * // Published together
 * config.update((draft) => {
 *     draft.file.enabled = true
 *     draft.file.path = 'logs/app.log'
 * })
 * ```
 */
import { clone } from '@logosdx/utils';

import type { Level } from '../level/types.js';
import { ConfigurationError } from '../logger/errors.js';
import type { Style } from '../style/styles.js';
import type { TimeZone } from '../time.js';
import { createDefaultConfig } from './defaults.js';
import { mergeConfig, validateConfigInput } from './schema.js';
import type {
    BuildMode,
    LoggerConfig,
    LoggerConfigInput,
    OutputStream,
    ReadonlyLoggerConfig,
} from './types.js';

/**
 * Called after every publish with the new snapshot.
 */
export type ConfigListener = (config: ReadonlyLoggerConfig) => void;

/**
 * Shared logger configuration with copy-on-write publishing.
 */
export class Configuration {

    #current: LoggerConfig;
    #listeners = new Set<ConfigListener>();

    /**
     * Create a configuration from defaults, optionally overridden by input.
     *
     * @throws ConfigurationError if the input is invalid
     */
    constructor(input?: LoggerConfigInput) {

        const defaults = createDefaultConfig();

        this.#current = input ? mergeConfig(defaults, validateConfigInput(input)) : defaults;

    }

    /**
     * The published configuration.
     *
     * Never mutated after publishing; internal readers use it directly
     * instead of paying for a clone per log call.
     */
    get current(): ReadonlyLoggerConfig {

        return this.#current;

    }

    /**
     * Deep copy of the published configuration.
     */
    snapshot(): LoggerConfig {

        return clone(this.#current);

    }

    /**
     * Subscribe to publishes.
     *
     * @returns Cleanup function
     */
    onChange(listener: ConfigListener): () => void {

        this.#listeners.add(listener);

        return () => {

            this.#listeners.delete(listener);

        };

    }

    /**
     * Apply several changes to a draft and publish them at once.
     *
     * The draft is a deep copy; if `mutate` throws, nothing is published.
     */
    update(mutate: (draft: LoggerConfig) => void): this {

        const draft = clone(this.#current);

        mutate(draft);

        this.#publish(draft);

        return this;

    }

    /**
     * Merge validated input over the current configuration.
     *
     * @throws ConfigurationError if the input is invalid
     */
    apply(input: LoggerConfigInput): this {

        this.#publish(mergeConfig(this.#current, validateConfigInput(input)));

        return this;

    }

    // ─────────────────────────────────────────────────────────────
    // Terminal
    // ─────────────────────────────────────────────────────────────

    setTerminalEnabled(enabled: boolean): this {

        return this.update((draft) => {

            draft.terminal.enabled = enabled;

        });

    }

    setTerminalOutput(output: OutputStream): this {

        return this.update((draft) => {

            draft.terminal.output = output;

        });

    }

    /**
     * Stop writing a level to the terminal.
     */
    setTerminalIgnore(level: Level): this {

        return this.update((draft) => {

            addUnique(draft.terminal.ignore, level);

        });

    }

    setTerminalFlushInterval(ms: number): this {

        assertInterval('terminal.flushInterval', ms);

        return this.update((draft) => {

            draft.terminal.flushInterval = ms;

        });

    }

    // ─────────────────────────────────────────────────────────────
    // File
    // ─────────────────────────────────────────────────────────────

    setFileEnabled(enabled: boolean): this {

        return this.update((draft) => {

            draft.file.enabled = enabled;

        });

    }

    /**
     * Record the log file path.
     *
     * Only the configuration changes here. The file sink opens the
     * file on its next cycle; `Logger.setFilePath` opens it eagerly
     * and reports failures.
     */
    setFilePath(path: string | null): this {

        return this.update((draft) => {

            draft.file.path = path;

        });

    }

    /**
     * Stop writing a level to the file.
     */
    setFileIgnore(level: Level): this {

        return this.update((draft) => {

            addUnique(draft.file.ignore, level);

        });

    }

    setFileFlushInterval(ms: number): this {

        assertInterval('file.flushInterval', ms);

        return this.update((draft) => {

            draft.file.flushInterval = ms;

        });

    }

    /**
     * Keep at most `maxLines` lines in the log file. 0 disables rollover.
     */
    setFileRollover(maxLines: number): this {

        if (!Number.isInteger(maxLines) || maxLines < 0) {

            throw new ConfigurationError('file.rollover', `Rollover must be a non-negative integer, got ${maxLines}`);

        }

        return this.update((draft) => {

            draft.file.rollover = maxLines;

        });

    }

    setRolloverInterval(ms: number): this {

        assertInterval('file.rolloverInterval', ms);

        return this.update((draft) => {

            draft.file.rolloverInterval = ms;

        });

    }

    // ─────────────────────────────────────────────────────────────
    // General
    // ─────────────────────────────────────────────────────────────

    setMinLevel(level: Level): this {

        return this.update((draft) => {

            draft.minLevel = level;

        });

    }

    /**
     * Drop a level everywhere, even when it is above `minLevel`.
     */
    addGlobalIgnore(level: Level): this {

        return this.update((draft) => {

            addUnique(draft.ignore, level);

        });

    }

    /**
     * Replace the levels that skip `minLevel` and the global ignore list.
     */
    setBypass(levels: readonly Level[]): this {

        return this.update((draft) => {

            draft.bypass = [...new Set(levels)];

        });

    }

    setLogFormat(template: string): this {

        return this.update((draft) => {

            draft.format = template;

        });

    }

    setStructuredFormat(template: string): this {

        return this.update((draft) => {

            draft.structuredFormat = template;

        });

    }

    setTimezone(timezone: TimeZone): this {

        return this.update((draft) => {

            draft.timezone = timezone;

        });

    }

    setTimestampFormat(pattern: string): this {

        return this.update((draft) => {

            draft.timestampFormat = pattern;

        });

    }

    setBuildMode(mode: BuildMode): this {

        return this.update((draft) => {

            draft.buildMode = mode;

        });

    }

    // ─────────────────────────────────────────────────────────────
    // Styles
    // ─────────────────────────────────────────────────────────────

    /**
     * Styles currently applied to a level's terminal label.
     *
     * @throws ConfigurationError if the level has no style entry
     */
    styles(level: Level): Style[] {

        return [...requireStyles(this.#current, level)];

    }

    /**
     * Replace a level's full style list.
     */
    setStyle(level: Level, styles: readonly Style[]): this {

        return this.update((draft) => {

            draft.styles[level] = [...new Set(styles)];

        });

    }

    /**
     * Add one style to a level's list.
     *
     * @throws ConfigurationError if the level has no style entry
     */
    addStyle(level: Level, style: Style): this {

        return this.update((draft) => {

            addUnique(requireStyles(draft, level), style);

        });

    }

    /**
     * Remove one style from a level's list.
     *
     * @throws ConfigurationError if the level has no style entry
     */
    removeStyle(level: Level, style: Style): this {

        return this.update((draft) => {

            draft.styles[level] = requireStyles(draft, level).filter((s) => s !== style);

        });

    }

    #publish(next: LoggerConfig): void {

        this.#current = next;

        for (const listener of this.#listeners) {

            listener(next);

        }

    }

}

/**
 * A level's style list, or a usage error if it was never seeded.
 */
function requireStyles(config: LoggerConfig, level: Level): Style[] {

    const styles = config.styles[level];

    if (!styles) {

        throw new ConfigurationError(`styles.${level}`, `No style entry for level '${level}'`);

    }

    return styles;

}

function addUnique<T>(list: T[], item: T): void {

    if (!list.includes(item)) {

        list.push(item);

    }

}

function assertInterval(field: string, ms: number): void {

    if (!Number.isInteger(ms) || ms < 1) {

        throw new ConfigurationError(field, `Interval must be a positive integer of milliseconds, got ${ms}`);

    }

}
