/**
 * Logger Types
 *
 * Type definitions shared by the dispatcher and the sink loops.
 */
import type { Writable } from 'node:stream';

import type { OutputStream } from '../config/types.js';

/**
 * Streams the terminal sink can write to.
 */
export type TerminalStreams = Record<OutputStream, Writable>;

/**
 * Logger lifecycle state.
 *
 * - idle: Constructed, loops not started
 * - running: Loops draining on their intervals
 * - stopped: Loops cancelled and queues flushed; further calls are dropped
 */
export type LoggerState = 'idle' | 'running' | 'stopped';

/**
 * Which sinks a line is routed to.
 */
export interface SinkRoute {

    terminal: boolean;

    file: boolean;

}

/**
 * Queue statistics.
 */
export interface QueueStats {

    /** Lines waiting for the next drain */
    pending: number;

    /** Lines ever enqueued */
    totalEnqueued: number;

    /** Lines handed to a sink by `drain()` */
    totalDrained: number;

}
