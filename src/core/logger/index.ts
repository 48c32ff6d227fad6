/**
 * Logger Module
 *
 * Level-filtered dispatch into queued terminal and file sinks, with
 * line-count rollover of the log file.
 *
 * Features:
 * - Non-blocking `log` / `structuredLog`, checked `resultLog`
 * - Hot-swappable configuration read on every call and cycle
 * - One file lock shared by appends and rollover rewrites
 * - Sink failures reported through the logger's observer
 */

// Types
export type {
    TerminalStreams,
    LoggerState,
    SinkRoute,
    QueueStats,
} from './types.js';

// Errors
export {
    LoggerError,
    LoggerAccessError,
    FileAccessError,
    LogWriteError,
    ConfigurationError,
} from './errors.js';

// Filtering
export { shouldLog, routeLevel } from './filter.js';

// Queue & file
export { LineQueue, joinLines } from './queue.js';
export { FileLock } from './lock.js';
export { LogFile, FALLBACK_FILE_NAME, resolveLogPath } from './log-file.js';

// Loops
export { IntervalLoop } from './loop.js';
export { TerminalSink, guardStream, writeChunk, writeTerminal } from './terminal-sink.js';
export { FileSink } from './file-sink.js';
export { RolloverLoop, splitLines, keepTail, type RolloverResult } from './rollover.js';

// Logger
export { Logger, getLogger, resetLogger, type LoggerOptions } from './logger.js';
