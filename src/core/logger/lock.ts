/**
 * File Lock
 *
 * Exclusive async lock around the shared log file handle. The file
 * sink, the rollover loop and `resultLog` all write through it, so a
 * truncate-and-rewrite can never interleave with an append.
 *
 * Holders run in the order they asked for the lock.
 *
 * @example
 * ```typescript
 * const lock = new FileLock()
 *
 * await lock.run(async () => {
 *     await handle.truncate(0)
 *     await handle.write(tail)
 * })
 * ```
 */
export class FileLock {

    #tail: Promise<void> = Promise.resolve();
    #held = false;
    #waiting = 0;

    /**
     * Whether a holder is currently running.
     */
    get isHeld(): boolean {

        return this.#held;

    }

    /**
     * Number of callers queued behind the current holder.
     */
    get waiting(): number {

        return this.#waiting;

    }

    /**
     * Run `fn` while holding the lock.
     *
     * The lock is released when `fn` settles, whether it resolves or
     * rejects; the rejection propagates to the caller.
     */
    run<T>(fn: () => Promise<T>): Promise<T> {

        this.#waiting++;

        const result = this.#tail.then(async () => {

            this.#waiting--;
            this.#held = true;

            try {

                return await fn();

            }
            finally {

                this.#held = false;

            }

        });

        this.#tail = result.then(
            () => undefined,
            () => undefined,
        );

        return result;

    }

}
