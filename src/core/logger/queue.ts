/**
 * Line Queue
 *
 * Unbounded in-memory queue of rendered lines between the dispatcher
 * and a sink loop. `push` never blocks and never fails; `drain` hands
 * over everything queued so far and leaves the queue empty in one
 * step, so a producer can never see a half-drained queue.
 *
 * @example
 * ```typescript
 * const queue = new LineQueue()
 *
 * queue.push('line 1')
 * queue.push('line 2')
 *
 * queue.drain()  // ['line 1', 'line 2']
 * queue.drain()  // []
 * ```
 */
import type { QueueStats } from './types.js'


export class LineQueue {

    #lines: string[] = []
    #totalEnqueued = 0
    #totalDrained = 0


    /**
     * Number of lines waiting.
     */
    get size(): number {

        return this.#lines.length
    }


    /**
     * Get queue statistics.
     */
    get stats(): QueueStats {

        return {
            pending: this.#lines.length,
            totalEnqueued: this.#totalEnqueued,
            totalDrained: this.#totalDrained,
        }
    }


    /**
     * Enqueue a rendered line (without line terminator).
     */
    push(line: string): void {

        this.#lines.push(line)
        this.#totalEnqueued++
    }


    /**
     * Take every queued line in FIFO order and clear the queue.
     */
    drain(): string[] {

        const lines = this.#lines
        this.#lines = []
        this.#totalDrained += lines.length

        return lines
    }
}


/**
 * Join lines into one chunk, each followed by a newline.
 *
 * @example
 * ```typescript
 * joinLines(['a', 'b'])  // 'a\nb\n'
 * joinLines([])          // ''
 * ```
 */
export function joinLines(lines: readonly string[]): string {

    let chunk = ''

    for (const line of lines) {

        chunk += `${line}\n`
    }

    return chunk
}
